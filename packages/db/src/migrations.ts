import { EMBEDDING_DIMENSIONS, MANUAL_EMBEDDINGS_TABLE } from "./schema/index.js";

/**
 * Idempotent DDL for the embeddings table, one statement per entry so each
 * can run through the extended query protocol.
 */
export function getSchemaStatements(): string[] {
  return [
    "CREATE EXTENSION IF NOT EXISTS vector",
    `CREATE TABLE IF NOT EXISTS ${MANUAL_EMBEDDINGS_TABLE} (
      id SERIAL PRIMARY KEY,
      content TEXT NOT NULL,
      embedding VECTOR(${String(EMBEDDING_DIMENSIONS)}),
      page_start INTEGER,
      page_end INTEGER,
      section TEXT,
      created_at TIMESTAMPTZ DEFAULT NOW()
    )`,
  ];
}
