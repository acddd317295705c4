export type { IVectorStore } from "./vector-store.interface.js";
export { PgVectorStore, toRow, toScoredChunk } from "./pgvector-store.js";
export { InMemoryVectorStore, cosineDistanceOf } from "./memory-store.js";
