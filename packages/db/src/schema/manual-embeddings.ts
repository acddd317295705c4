import { pgTable, serial, text, integer, timestamp, vector } from "drizzle-orm/pg-core";

/** Width of the embedding column; the embedding provider must be configured to match. */
export const EMBEDDING_DIMENSIONS = 768;

export const MANUAL_EMBEDDINGS_TABLE = "manual_embeddings";

export const manualEmbeddings = pgTable(MANUAL_EMBEDDINGS_TABLE, {
  id: serial("id").primaryKey(),
  content: text("content").notNull(),
  embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }),
  pageStart: integer("page_start"),
  pageEnd: integer("page_end"),
  section: text("section"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
});

export type ManualEmbeddingRow = typeof manualEmbeddings.$inferSelect;
export type NewManualEmbeddingRow = typeof manualEmbeddings.$inferInsert;
