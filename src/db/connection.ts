import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";

import { logger } from "../logger.js";

import type { Database } from "./schema.js";

const IN_MEMORY = ":memory:";

/**
 * Open the SQLite id-map database, creating its directory when needed.
 * Pass ":memory:" for a throwaway database.
 */
export function createDatabase(path: string): Kysely<Database> {
  if (path !== IN_MEMORY) {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  return new Kysely<Database>({
    dialect: new SqliteDialect({
      database: new SQLite(path),
    }),
  });
}

/**
 * Gracefully close the database connection
 */
export async function closeDatabase(db: Kysely<Database>): Promise<void> {
  try {
    await db.destroy();
    logger.debug("Database connection closed");
  } catch (error) {
    logger.error({ error }, "Error closing database connection");
    throw error;
  }
}
