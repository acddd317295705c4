export {
  manualEmbeddings,
  EMBEDDING_DIMENSIONS,
  MANUAL_EMBEDDINGS_TABLE,
  type ManualEmbeddingRow,
  type NewManualEmbeddingRow,
} from "./manual-embeddings.js";
