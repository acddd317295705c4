import { cosineDistance, isNotNull, sql } from "drizzle-orm";
import { UNKNOWN_SECTION } from "@manualrag/types";
import type { Chunk, ScoredChunk } from "@manualrag/types";
import {
  createDbClient,
  getSchemaStatements,
  manualEmbeddings,
  EMBEDDING_DIMENSIONS,
} from "@manualrag/db";
import type { DbClient, ManualEmbeddingRow, NewManualEmbeddingRow } from "@manualrag/db";
import { StorageError, errorMessage } from "@manualrag/errors";
import type { IVectorStore } from "./vector-store.interface.js";

function assertDimensions(vector: number[], operation: string): void {
  if (vector.length !== EMBEDDING_DIMENSIONS) {
    throw new StorageError(
      `Vector has ${String(vector.length)} dimensions, column expects ${String(EMBEDDING_DIMENSIONS)}`,
      operation,
    );
  }
}

type SearchRow = Pick<ManualEmbeddingRow, "content" | "section" | "pageStart" | "pageEnd"> & {
  distance: number;
};

export function toRow(chunk: Chunk, embedding: number[]): NewManualEmbeddingRow {
  return {
    content: chunk.content,
    embedding,
    pageStart: chunk.pageStart,
    pageEnd: chunk.pageEnd,
    section: chunk.section,
  };
}

// Rows written outside this store may leave the nullable columns empty
export function toScoredChunk(row: SearchRow): ScoredChunk {
  return {
    content: row.content,
    section: row.section ?? UNKNOWN_SECTION,
    pageStart: row.pageStart ?? 0,
    pageEnd: row.pageEnd ?? row.pageStart ?? 0,
    distance: row.distance,
  };
}

async function wrap<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(`${operation} failed: ${errorMessage(err)}`, operation, { cause: err });
  }
}

/**
 * PostgreSQL + pgvector store for manual chunks, through drizzle-orm.
 */
export class PgVectorStore implements IVectorStore {
  private db: DbClient;

  constructor(db: DbClient) {
    this.db = db;
  }

  static connect(connectionString: string): PgVectorStore {
    return new PgVectorStore(createDbClient({ url: connectionString }));
  }

  async ensureSchema(): Promise<void> {
    await wrap("ensureSchema", async () => {
      for (const statement of getSchemaStatements()) {
        await this.db.execute(sql.raw(statement));
      }
    });
  }

  async clear(): Promise<void> {
    await wrap("clear", async () => {
      await this.db.delete(manualEmbeddings);
    });
  }

  async insert(chunk: Chunk, embedding: number[]): Promise<void> {
    assertDimensions(embedding, "insert");

    await wrap("insert", () =>
      this.db.transaction(async (tx) => {
        await tx.insert(manualEmbeddings).values(toRow(chunk, embedding));
      }),
    );
  }

  async search(vector: number[], topK: number): Promise<ScoredChunk[]> {
    assertDimensions(vector, "search");
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new StorageError(`topK must be a positive integer, got ${String(topK)}`, "search");
    }

    const distance = cosineDistance(manualEmbeddings.embedding, vector);

    const rows = await wrap("search", () =>
      this.db
        .select({
          content: manualEmbeddings.content,
          section: manualEmbeddings.section,
          pageStart: manualEmbeddings.pageStart,
          pageEnd: manualEmbeddings.pageEnd,
          distance: sql<number>`${distance}`.mapWith(Number),
        })
        .from(manualEmbeddings)
        .where(isNotNull(manualEmbeddings.embedding))
        .orderBy(distance)
        .limit(topK)
        .execute(),
    );

    return rows.map(toScoredChunk);
  }

  async close(): Promise<void> {
    await this.db.$client.end();
  }
}
