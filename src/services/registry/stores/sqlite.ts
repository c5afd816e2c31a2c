import { closeDatabase, createDatabase, runMigration } from "../../../db/index.js";
import { IdMapFormatError } from "../../../errors.js";
import { registryLogger } from "../../../logger.js";
import { isClinicStatus, type ClinicStatus } from "../../../types/index.js";
import { assertSavable, checkTableIntegrity, createTable } from "../id-map.js";

import type { ClinicIdRow, Database } from "../../../db/index.js";
import type { IdMapEntry, IdMapTable } from "../../../types/index.js";
import type { IdMapStore, SaveOptions } from "./types.js";
import type { Kysely, Transaction } from "kysely";

function toStatus(row: ClinicIdRow): ClinicStatus {
  if (!isClinicStatus(row.status)) {
    throw new IdMapFormatError(
      `clinic_ids row ${row.clinic_id}: unknown status "${row.status}"`
    );
  }
  return row.status;
}

function toEntry(row: ClinicIdRow): IdMapEntry {
  return {
    clinicId: row.clinic_id,
    clinicName: row.clinic_name,
    status: toStatus(row),
    firstSeenAt: row.first_seen_at,
    statusChangedAt: row.status_changed_at,
    address: row.address,
    phone: row.phone,
    director: row.director,
    homepage: row.homepage,
  };
}

async function readTable(
  db: Kysely<Database> | Transaction<Database>,
  source: string
): Promise<IdMapTable> {
  const rows = await db
    .selectFrom("clinic_ids")
    .selectAll()
    .orderBy("seq")
    .execute();
  const entries = rows.map(toEntry);
  checkTableIntegrity(entries, source);
  return createTable(entries);
}

/**
 * Id map kept in a SQLite table. Ids and names are insert-only; a save
 * only updates status and metadata of existing rows.
 */
export class SqliteIdMapStore implements IdMapStore {
  private readonly db: Kysely<Database>;
  private migrated = false;

  constructor(private readonly path: string) {
    this.db = createDatabase(path);
  }

  get location(): string {
    return this.path;
  }

  private async ready(): Promise<void> {
    if (this.migrated) return;
    await runMigration(this.db);
    this.migrated = true;
  }

  async load(): Promise<IdMapTable> {
    await this.ready();
    const table = await readTable(this.db, this.path);
    registryLogger.debug(
      { path: this.path, entries: table.entries.length },
      "Id map loaded"
    );
    return table;
  }

  async verify(table: IdMapTable, options: SaveOptions): Promise<void> {
    await this.ready();
    assertSavable(
      await readTable(this.db, this.path),
      table,
      options.expectedRevision
    );
  }

  async save(table: IdMapTable, options: SaveOptions): Promise<void> {
    await this.ready();

    const inserted = await this.db.transaction().execute(async (trx) => {
      const current = await readTable(trx, this.path);
      assertSavable(current, table, options.expectedRevision);

      const known = new Set(current.entries.map((entry) => entry.clinicId));
      let count = 0;
      for (const entry of table.entries) {
        if (known.has(entry.clinicId)) {
          await trx
            .updateTable("clinic_ids")
            .set({
              status: entry.status,
              status_changed_at: entry.statusChangedAt,
              address: entry.address,
              phone: entry.phone,
              director: entry.director,
              homepage: entry.homepage,
            })
            .where("clinic_id", "=", entry.clinicId)
            .execute();
        } else {
          await trx
            .insertInto("clinic_ids")
            .values({
              clinic_id: entry.clinicId,
              clinic_name: entry.clinicName,
              status: entry.status,
              first_seen_at: entry.firstSeenAt,
              status_changed_at: entry.statusChangedAt,
              address: entry.address,
              phone: entry.phone,
              director: entry.director,
              homepage: entry.homepage,
            })
            .execute();
          count++;
        }
      }
      return count;
    });

    registryLogger.info(
      { path: this.path, entries: table.entries.length, inserted },
      "Id map saved"
    );
  }

  async close(): Promise<void> {
    await closeDatabase(this.db);
  }
}
