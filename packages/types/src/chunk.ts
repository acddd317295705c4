export const UNKNOWN_SECTION = "Unknown Section";

export interface Chunk {
  content: string;
  pageStart: number;
  pageEnd: number;
  section: string;
}

export interface ScoredChunk extends Chunk {
  /** Cosine distance to the query vector; smaller is closer. */
  distance: number;
}

export interface ChunkingConfig {
  maxWords: number;
  minChunkLength: number;
  keywords: readonly string[];
}
