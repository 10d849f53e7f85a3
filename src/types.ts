export type Song = Readonly<{
  title: string;
  artist: string;
  genre: string;
  bpm: number;
  energy: number;
}>;

export type EnergyGoal = "up" | "down" | "same";

export type Recommendation = {
  score: number;
  song: Song;
  why: string;
};

export type CatalogParseOptions = {
  delimiter?: string;
};

export type CatalogLoadResult = {
  catalog: Song[];
  loadedCount: number;
  skippedCount: number;
};
