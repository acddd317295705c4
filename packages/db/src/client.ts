import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

// Ingestion and queries run one statement at a time
const DEFAULT_POOL = { max: 2 };

export function createDbClient(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_POOL.max,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  return drizzle(connection, { schema });
}

export type DbClient = ReturnType<typeof createDbClient>;
