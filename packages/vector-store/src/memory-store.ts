import type { Chunk, ScoredChunk } from "@manualrag/types";
import type { IVectorStore } from "./vector-store.interface.js";

interface MemoryRow {
  chunk: Chunk;
  embedding: number[];
}

export function cosineDistanceOf(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * In-process store with the same contract as the pgvector store. Used where
 * no database is available, such as tests and dry runs.
 */
export class InMemoryVectorStore implements IVectorStore {
  readonly rows: MemoryRow[] = [];
  schemaReady = false;

  async ensureSchema(): Promise<void> {
    this.schemaReady = true;
  }

  async clear(): Promise<void> {
    this.rows.length = 0;
  }

  async insert(chunk: Chunk, embedding: number[]): Promise<void> {
    this.rows.push({ chunk: { ...chunk }, embedding: [...embedding] });
  }

  async search(vector: number[], topK: number): Promise<ScoredChunk[]> {
    return this.rows
      .map((row) => ({ ...row.chunk, distance: cosineDistanceOf(row.embedding, vector) }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, topK);
  }

  async close(): Promise<void> {
    // nothing held open
  }
}
