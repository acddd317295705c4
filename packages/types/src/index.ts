export type { PageText, PageRange } from "./document.js";
export { UNKNOWN_SECTION } from "./chunk.js";
export type { Chunk, ScoredChunk, ChunkingConfig } from "./chunk.js";
export type {
  QuotaState,
  EmbeddingResult,
  IngestionStatus,
  IngestionResult,
  SolutionAnswer,
} from "./pipeline.js";
export type {
  AppConfig,
  NodeEnv,
  LogLevel,
  DatabaseConfig,
  GeminiConfig,
  ManualConfig,
  ChunkingSettings,
  QuotaConfig,
  IngestionSettings,
  SearchConfig,
} from "./config.js";
