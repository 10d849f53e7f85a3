import { SessionAbortedError } from "./errors";
import { log } from "./log";
import { formatNowPlaying, formatRecommendations, formatSongList, type Styler } from "./presenter";
import { DEFAULT_RECOMMEND_LIMIT, filterByGenre, listGenres, normalizeGoal, recommend, resolveGenre } from "./recommend";
import type { EnergyGoal, Recommendation, Song } from "./types";

export interface Prompter {
  /** Resolves to null once input is closed. */
  ask(question: string): Promise<string | null>;
}

export type SessionIO = {
  prompter: Prompter;
  write: (line: string) => void;
  style: Styler;
};

export type SessionResult = {
  current: Song;
  goal: EnergyGoal;
  pool: Song[];
  results: Recommendation[];
};

async function ask(io: SessionIO, question: string): Promise<string> {
  const answer = await io.prompter.ask(io.style(question, "yellow"));
  if (answer === null) {
    throw new SessionAbortedError();
  }
  return answer.trim();
}

async function chooseGenre(io: SessionIO, catalog: readonly Song[]): Promise<string | null> {
  const genres = listGenres(catalog);
  io.write(io.style("Genres found:", "bold", "white"));
  io.write(io.style(genres.join(", "), "dim"));

  const input = await ask(io, "\nType a genre to filter (or press Enter for ALL): ");
  if (!input) return null;

  const genre = resolveGenre(genres, input);
  if (!genre) {
    io.write(io.style("Genre not found. Showing ALL songs.", "yellow"));
  }
  return genre;
}

async function chooseSong(io: SessionIO, pool: readonly Song[]): Promise<Song> {
  io.write(io.style("Available Songs:", "bold", "white"));
  for (const line of formatSongList(pool, io.style)) {
    io.write(line);
  }

  for (;;) {
    const choice = await ask(io, "\nChoose current song number: ");
    if (/^\d+$/.test(choice)) {
      const song = pool[Number(choice) - 1];
      if (song) return song;
    }
    io.write(io.style("Invalid choice. Try again.", "red"));
  }
}

async function chooseGoal(io: SessionIO): Promise<EnergyGoal> {
  const { goal, recognized } = normalizeGoal(await ask(io, "Energy goal (up / down / same): "));
  if (!recognized) {
    io.write(io.style("Invalid option, using 'same'.", "yellow"));
  }
  return goal;
}

export async function runSession(
  catalog: readonly Song[],
  io: SessionIO,
  opts?: { limit?: number }
): Promise<SessionResult> {
  if (!catalog.length) {
    throw new RangeError("runSession needs at least one song in the catalog");
  }
  const genre = await chooseGenre(io, catalog);
  const pool = filterByGenre(catalog, genre);

  const current = await chooseSong(io, pool);
  io.write(formatNowPlaying(current, io.style));

  const goal = await chooseGoal(io);
  const results = recommend(current, goal, pool, opts?.limit ?? DEFAULT_RECOMMEND_LIMIT);
  log("session.recommended", { genre, goal, pool: pool.length, results: results.length });

  for (const line of formatRecommendations(results, io.style)) {
    io.write(line);
  }
  return { current, goal, pool, results };
}
