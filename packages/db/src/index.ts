export * from "./schema/index.js";
export { getSchemaStatements } from "./migrations.js";
export { createDbClient, type DbClient, type DbClientOptions } from "./client.js";
