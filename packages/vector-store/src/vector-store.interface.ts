import type { Chunk, ScoredChunk } from "@manualrag/types";

export interface IVectorStore {
  /** Create the extension and table when absent. Safe to call every run. */
  ensureSchema(): Promise<void>;
  /** Remove every stored chunk (full-replace ingestion). */
  clear(): Promise<void>;
  /** Store one chunk with its vector in its own transaction. */
  insert(chunk: Chunk, embedding: number[]): Promise<void>;
  /** Nearest chunks by cosine distance, closest first. */
  search(vector: number[], topK: number): Promise<ScoredChunk[]>;
  close(): Promise<void>;
}
