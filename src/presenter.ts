import { formatSong } from "./catalog";
import type { Recommendation, Song } from "./types";

const ANSI = {
  reset: "\u001b[0m",
  bold: "\u001b[1m",
  dim: "\u001b[2m",
  red: "\u001b[31m",
  green: "\u001b[32m",
  yellow: "\u001b[33m",
  magenta: "\u001b[35m",
  cyan: "\u001b[36m",
  white: "\u001b[37m"
} as const;

export type StyleName = Exclude<keyof typeof ANSI, "reset">;

export type Styler = (text: string | number, ...styles: StyleName[]) => string;

export function createStyler(color: boolean): Styler {
  return (text, ...styles) => {
    if (!color || !styles.length) return String(text);
    return `${styles.map((s) => ANSI[s]).join("")}${text}${ANSI.reset}`;
  };
}

export function banner(style: Styler): string[] {
  const rule = "═".repeat(52);
  return [
    style(`\n${rule}`, "cyan"),
    style("   DJ Next-Song Assistant", "bold", "cyan"),
    style(`${rule}\n`, "cyan")
  ];
}

export function formatSongList(songs: readonly Song[], style: Styler): string[] {
  return songs.map((song, i) => {
    const n = style(String(i + 1).padStart(2), "cyan");
    const meta = style(`(${song.genre}, ${song.bpm} BPM, E${song.energy})`, "dim");
    return `${n}. ${song.title} ${style("-", "dim")} ${song.artist} ${meta}`;
  });
}

export function formatNowPlaying(song: Song, style: Styler): string {
  return `${style("\nNow playing:", "dim")} ${style(formatSong(song), "bold", "green")}`;
}

export function formatRecommendations(results: readonly Recommendation[], style: Styler): string[] {
  const lines = [style("\nRecommended Next Songs:", "bold", "magenta")];
  if (!results.length) {
    lines.push(style("No recommendations.", "yellow"));
    return lines;
  }
  results.forEach((r, i) => {
    lines.push(
      `${style(`${i + 1}.`, "cyan")} ${style(r.song.title, "bold")} by ${r.song.artist} ${style(`(${r.song.bpm} BPM, E${r.song.energy})`, "dim")}`
    );
    lines.push(`${style("   why:", "dim")} ${style(r.why, "dim")}`);
    lines.push(`${style("   score:", "dim")} ${style(r.score, "dim")}`);
  });
  return lines;
}

export function formatLoadSummary(loadedCount: number, skippedCount: number, style: Styler): string[] {
  const lines = [style(`Loaded ${loadedCount} songs (duplicates auto-removed).`, "green")];
  if (skippedCount > 0) {
    lines.push(style(`Skipped ${skippedCount} bad/invalid lines.`, "yellow"));
  }
  return lines;
}
