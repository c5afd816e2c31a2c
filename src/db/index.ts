export { closeDatabase, createDatabase } from "./connection.js";
export { runMigration } from "./migrate.js";
export * from "./schema.js";
