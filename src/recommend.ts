import { songKey } from "./catalog";
import type { EnergyGoal, Recommendation, Song } from "./types";

export const DEFAULT_RECOMMEND_LIMIT = 5;

const BASE_SCORE = 100;
const BPM_PENALTY_PER_BEAT = 2;
const ENERGY_DIRECTION_BONUS = 20;
const ENERGY_DIRECTION_PENALTY = 5;
const ENERGY_HOLD_BONUS = 10;
const GENRE_MATCH_BONUS = 10;

const ENERGY_GOALS: readonly EnergyGoal[] = ["up", "down", "same"];

function sameGenre(a: Song, b: Song): boolean {
  return a.genre.toLowerCase() === b.genre.toLowerCase();
}

function signed(n: number): string {
  return n >= 0 ? `+${n}` : String(n);
}

export function scoreCandidate(current: Song, candidate: Song, goal: EnergyGoal): Recommendation {
  const bpmDiff = Math.abs(candidate.bpm - current.bpm);
  const energyDiff = candidate.energy - current.energy;
  const genreMatch = sameGenre(current, candidate);

  // Closer tempo scores higher; large gaps are allowed to go negative.
  let score = BASE_SCORE - bpmDiff * BPM_PENALTY_PER_BEAT;
  const why = [`BPM diff: ${bpmDiff}`];

  if (goal === "up" || goal === "down") {
    const wanted = goal === "up" ? energyDiff > 0 : energyDiff < 0;
    score += wanted ? ENERGY_DIRECTION_BONUS : -ENERGY_DIRECTION_PENALTY;
    why.push(`Energy change: ${signed(energyDiff)} (goal: ${goal})`);
  } else {
    if (energyDiff === 0) {
      score += ENERGY_HOLD_BONUS;
    }
    why.push(`Energy: ${candidate.energy} (goal: same)`);
  }

  if (genreMatch) {
    score += GENRE_MATCH_BONUS;
    why.push(`Genre match: +${GENRE_MATCH_BONUS}`);
  }

  return { score, song: candidate, why: why.join("; ") };
}

/**
 * Ranks every song in `pool` against `current` and returns the best `limit`.
 * The current song is excluded by title/artist, not object identity. Equal
 * scores keep their pool order.
 */
export function recommend(
  current: Song,
  goal: EnergyGoal,
  pool: readonly Song[],
  limit: number = DEFAULT_RECOMMEND_LIMIT
): Recommendation[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`recommend limit must be a positive integer, got ${limit}`);
  }

  const currentKey = songKey(current);
  const scored: Recommendation[] = [];
  for (const song of pool) {
    if (songKey(song) === currentKey) continue;
    scored.push(scoreCandidate(current, song, goal));
  }

  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, limit);
}

export function listGenres(catalog: readonly Song[]): string[] {
  return [...new Set(catalog.map((s) => s.genre))].sort();
}

export function resolveGenre(genres: readonly string[], input: string): string | null {
  const wanted = input.trim().toLowerCase();
  if (!wanted) return null;
  return genres.find((g) => g.toLowerCase() === wanted) ?? null;
}

export function filterByGenre(catalog: readonly Song[], genre: string | null): Song[] {
  if (!genre) return [...catalog];
  const pool = catalog.filter((s) => s.genre === genre);
  return pool.length ? pool : [...catalog];
}

export function normalizeGoal(input: string): { goal: EnergyGoal; recognized: boolean } {
  const value = input.trim().toLowerCase();
  const goal = ENERGY_GOALS.find((g) => g === value);
  return goal ? { goal, recognized: true } : { goal: "same", recognized: false };
}
