export { formatSong, loadCatalog, parseCatalog, songKey } from "./catalog";
export { loadConfig, type AppConfig } from "./config";
export { CatalogEmptyError, CatalogError, CatalogMissingError, SessionAbortedError, type CatalogErrorCode } from "./errors";
export {
  DEFAULT_RECOMMEND_LIMIT,
  filterByGenre,
  listGenres,
  normalizeGoal,
  recommend,
  resolveGenre,
  scoreCandidate
} from "./recommend";
export { runSession, type Prompter, type SessionIO, type SessionResult } from "./session";
export type { CatalogLoadResult, CatalogParseOptions, EnergyGoal, Recommendation, Song } from "./types";
