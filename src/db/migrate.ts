import { logger } from "../logger.js";

import type { Database } from "./schema.js";
import type { Kysely } from "kysely";

/**
 * Create the clinic_ids table and its indexes if they do not exist yet
 */
export async function runMigration(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable("clinic_ids")
    .ifNotExists()
    .addColumn("seq", "integer", (col) => col.primaryKey().autoIncrement())
    .addColumn("clinic_id", "text", (col) => col.notNull().unique())
    .addColumn("clinic_name", "text", (col) => col.notNull())
    .addColumn("status", "text", (col) => col.notNull())
    .addColumn("first_seen_at", "text", (col) => col.notNull().defaultTo(""))
    .addColumn("status_changed_at", "text", (col) =>
      col.notNull().defaultTo("")
    )
    .addColumn("address", "text", (col) => col.notNull().defaultTo(""))
    .addColumn("phone", "text", (col) => col.notNull().defaultTo(""))
    .addColumn("director", "text", (col) => col.notNull().defaultTo(""))
    .addColumn("homepage", "text", (col) => col.notNull().defaultTo(""))
    .execute();

  logger.debug("clinic_ids schema ready");
}
