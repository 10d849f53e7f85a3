import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CatalogEmptyError, CatalogMissingError } from "./errors";
import { log } from "./log";
import type { CatalogLoadResult, CatalogParseOptions, Song } from "./types";

const HEADER_FIELDS = ["title", "artist", "genre", "bpm", "energy"];
const DEFAULT_DELIMITER = ",";
const DEFAULT_ENERGY = 3;
const MIN_ENERGY = 1;
const MAX_ENERGY = 5;
const INTEGER_RE = /^[+-]?\d+$/;

const songSchema = z.object({
  title: z.string().min(1),
  artist: z.string().min(1),
  genre: z.string(),
  // digit strings past 2^53 lose precision, so they are rejected
  bpm: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  energy: z.number().int().min(MIN_ENERGY).max(MAX_ENERGY)
});

function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!INTEGER_RE.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

function clampEnergy(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === null) {
    return DEFAULT_ENERGY;
  }
  return Math.min(MAX_ENERGY, Math.max(MIN_ENERGY, parsed));
}

export function songKey(song: Pick<Song, "title" | "artist">): string {
  return `${song.title.toLowerCase()}\u0000${song.artist.toLowerCase()}`;
}

export function formatSong(song: Song): string {
  return `${song.title} - ${song.artist} (${song.genre}, ${song.bpm} BPM, E${song.energy})`;
}

/**
 * Parses catalog text line by line, reading each row from the right: the last
 * three fields are always genre, bpm and energy. The remaining fields are
 * rejoined and split once at the first delimiter into title and artist, so
 * any further delimiters stay in the artist. A title containing the delimiter
 * unquoted is not recoverable: its tail ends up in the artist.
 *
 * Blank lines, header rows (anywhere in the file) and duplicate title/artist
 * pairs are dropped silently. Rows that are too short or fail validation are
 * counted in `skippedCount`.
 */
export function parseCatalog(text: string, options: CatalogParseOptions = {}): CatalogLoadResult {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  if (!delimiter) {
    throw new RangeError("Catalog delimiter must not be empty");
  }
  const headerSignature = HEADER_FIELDS.join(delimiter);

  const catalog: Song[] = [];
  const seen = new Set<string>();
  let skippedCount = 0;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.toLowerCase().replace(/ /g, "") === headerSignature) {
      continue;
    }

    const parts = line.split(delimiter).map((p) => p.trim());
    if (parts.length < HEADER_FIELDS.length) {
      skippedCount += 1;
      continue;
    }

    const [genre, bpmField, energyField] = parts.slice(-3);
    if (bpmField.toLowerCase() === "bpm" || energyField.toLowerCase() === "energy") {
      continue;
    }

    const left = parts.slice(0, -3).join(delimiter);
    const split = left.indexOf(delimiter);
    if (split < 0) {
      skippedCount += 1;
      continue;
    }
    const title = left.slice(0, split).trim();
    const artist = left.slice(split + delimiter.length).trim();

    const candidate = songSchema.safeParse({
      title,
      artist,
      genre,
      bpm: parseInteger(bpmField) ?? 0,
      energy: clampEnergy(energyField)
    });
    if (!candidate.success) {
      skippedCount += 1;
      continue;
    }

    const song: Song = Object.freeze(candidate.data);
    const key = songKey(song);
    if (seen.has(key)) continue;

    seen.add(key);
    catalog.push(song);
  }

  return { catalog, loadedCount: catalog.length, skippedCount };
}

export async function loadCatalog(filePath: string, options: CatalogParseOptions = {}): Promise<CatalogLoadResult> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new CatalogMissingError(filePath, error);
  }

  const result = parseCatalog(raw, options);
  if (!result.loadedCount) {
    throw new CatalogEmptyError(filePath, result.skippedCount);
  }

  log("catalog.loaded", { path: filePath, loaded: result.loadedCount, skipped: result.skippedCount });
  return result;
}
