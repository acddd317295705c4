import type { ScoredChunk } from "./chunk.js";

export interface QuotaState {
  /** Local calendar date, formatted YYYY-MM-DD. */
  date: string;
  used: number;
}

export interface EmbeddingResult {
  embedding: number[];
  model: string;
  dimensions: number;
}

export type IngestionStatus = "completed" | "quota-exhausted";

export interface IngestionResult {
  status: IngestionStatus;
  inserted: number;
  skipped: number;
  chunksFound: number;
  chunksAttempted: number;
  /** Quota counter value at the end of the run. */
  quotaUsed: number;
}

export interface SolutionAnswer {
  matches: ScoredChunk[];
  card: string | null;
}
