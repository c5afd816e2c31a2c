import { existsSync, readFileSync } from "node:fs";

import { IdMapFormatError, errorMessage } from "../../../errors.js";
import { registryLogger } from "../../../logger.js";
import { isClinicStatus } from "../../../types/index.js";
import { formatCsv, parseCsvTable } from "../../../utils/csv.js";
import { writeFileAtomic } from "../../../utils/fs.js";
import {
  assertSavable,
  checkTableIntegrity,
  createTable,
  emptyTable,
} from "../id-map.js";
import { CORE_COLUMNS, ID_MAP_COLUMNS, type IdMapColumn } from "./types.js";

import type { IdMapEntry, IdMapTable } from "../../../types/index.js";
import type { IdMapStore, SaveOptions } from "./types.js";

/**
 * Older id maps tracked the last sighting instead of the last status
 * change. For an INACTIVE clinic that is when it went away; for an ACTIVE
 * one it says nothing about when it became active, so it is left blank.
 */
const LEGACY_LAST_SEEN = "last_seen_at";

/**
 * Parse id-map CSV text. Missing metadata columns default to "";
 * missing core columns are a format error.
 */
export function parseIdMapCsv(content: string, source: string): IdMapTable {
  let parsed: { header: string[]; rows: string[][] };
  try {
    parsed = parseCsvTable(content);
  } catch (error) {
    throw new IdMapFormatError(
      `Id map ${source} could not be parsed: ${errorMessage(error)}`
    );
  }

  const { header, rows } = parsed;
  if (header.length === 0) {
    return emptyTable();
  }

  const positions = new Map<IdMapColumn, number>();
  for (const column of ID_MAP_COLUMNS) {
    const index = header.indexOf(column);
    if (index >= 0) positions.set(column, index);
  }
  const lastSeen = positions.has("status_changed_at")
    ? -1
    : header.indexOf(LEGACY_LAST_SEEN);

  const missing = CORE_COLUMNS.filter((column) => !positions.has(column));
  if (missing.length > 0) {
    throw new IdMapFormatError(
      `Id map ${source} is missing required columns: ${missing.join(", ")}`
    );
  }

  const entries = rows.map((row, index): IdMapEntry => {
    const cell = (column: IdMapColumn): string => {
      const position = positions.get(column);
      return position === undefined ? "" : (row[position] ?? "").trim();
    };

    const status = cell("status");
    if (!isClinicStatus(status)) {
      throw new IdMapFormatError(
        `Id map ${source} line ${String(index + 2)}: unknown status "${status}"`
      );
    }

    let statusChangedAt = cell("status_changed_at");
    if (lastSeen >= 0 && status === "INACTIVE") {
      statusChangedAt = (row[lastSeen] ?? "").trim();
    }

    return {
      clinicId: cell("clinic_id"),
      clinicName: cell("clinic_name"),
      status,
      firstSeenAt: cell("first_seen_at"),
      statusChangedAt,
      address: cell("address"),
      phone: cell("phone"),
      director: cell("director"),
      homepage: cell("homepage"),
    };
  });

  checkTableIntegrity(entries, source);
  return createTable(entries);
}

export function formatIdMapCsv(table: IdMapTable): string {
  return formatCsv(
    ID_MAP_COLUMNS,
    table.entries.map((entry) => [
      entry.clinicId,
      entry.clinicName,
      entry.status,
      entry.firstSeenAt,
      entry.statusChangedAt,
      entry.address,
      entry.phone,
      entry.director,
      entry.homepage,
    ])
  );
}

/**
 * Id map kept as a spreadsheet-friendly CSV file (UTF-8 with BOM)
 */
export class CsvIdMapStore implements IdMapStore {
  constructor(private readonly path: string) {}

  get location(): string {
    return this.path;
  }

  async load(): Promise<IdMapTable> {
    if (!existsSync(this.path)) {
      registryLogger.info({ path: this.path }, "No id map yet, starting empty");
      return emptyTable();
    }
    const table = parseIdMapCsv(readFileSync(this.path, "utf8"), this.path);
    registryLogger.debug(
      { path: this.path, entries: table.entries.length },
      "Id map loaded"
    );
    return table;
  }

  async verify(table: IdMapTable, options: SaveOptions): Promise<void> {
    assertSavable(await this.load(), table, options.expectedRevision);
  }

  async save(table: IdMapTable, options: SaveOptions): Promise<void> {
    await this.verify(table, options);
    writeFileAtomic(this.path, formatIdMapCsv(table));

    registryLogger.info(
      { path: this.path, entries: table.entries.length },
      "Id map saved"
    );
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }
}
