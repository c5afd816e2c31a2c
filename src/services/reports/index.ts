/**
 * Operator reports: mapping.csv (one row per clinic id) and changes.csv
 * (one row per clinic id with its change type for this run).
 */

import { existsSync, readFileSync } from "node:fs";

import { SpreadsheetError } from "../../errors.js";
import { isClinicStatus } from "../../types/index.js";
import { formatCsv, parseCsvTable } from "../../utils/csv.js";

import type {
  ChangeRecord,
  ChangeType,
  IdMapTable,
  MappingRecord,
} from "../../types/index.js";

export const MAPPING_COLUMNS = [
  "clinic_name",
  "clinic_id",
  "status",
  "address",
  "phone",
  "director",
  "homepage",
  "url",
  "page_path",
  "qr_path",
  "qr_named_path",
] as const;

export const CHANGES_COLUMNS = [
  "clinic_id",
  "clinic_name",
  "change_type",
  "notes",
] as const;

export function formatMappingCsv(records: readonly MappingRecord[]): string {
  return formatCsv(
    MAPPING_COLUMNS,
    records.map((record) => [
      record.clinicName,
      record.clinicId,
      record.status,
      record.address,
      record.phone,
      record.director,
      record.homepage,
      record.url,
      record.pagePath,
      record.qrPath,
      record.qrNamedPath,
    ])
  );
}

export function formatChangesCsv(
  changes: readonly ChangeRecord[],
  notesById: ReadonlyMap<string, string> = new Map()
): string {
  return formatCsv(
    CHANGES_COLUMNS,
    changes.map((change) => [
      change.clinicId,
      change.clinicName,
      change.changeType,
      notesById.get(change.clinicId) ?? "",
    ])
  );
}

const NOTE_BY_CHANGE: Partial<
  Record<ChangeType, (since: string) => string>
> = {
  NEW: () => "first seen in this run",
  DEACTIVATED: (since) => `missing from spreadsheet (active since ${since})`,
  REACTIVATED: (since) => `back in spreadsheet (inactive since ${since})`,
};

/**
 * Short operator notes for every changed clinic, keyed by clinic id.
 * `since` is when the previous status began.
 */
export function changeNotes(
  previous: IdMapTable,
  changes: readonly ChangeRecord[]
): Map<string, string> {
  const since = new Map(
    previous.entries.map((entry) => [entry.clinicId, entry.statusChangedAt])
  );
  const notes = new Map<string, string>();
  for (const change of changes) {
    const note = NOTE_BY_CHANGE[change.changeType];
    if (note === undefined) continue;
    notes.set(change.clinicId, note(since.get(change.clinicId) || "unknown"));
  }
  return notes;
}

/**
 * Read a mapping report written by an earlier build
 */
export function readMappingReport(path: string): MappingRecord[] {
  if (!existsSync(path)) {
    throw new SpreadsheetError(`Mapping report not found: ${path}`);
  }

  const { header, rows } = parseCsvTable(readFileSync(path, "utf8"));
  const missing = MAPPING_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new SpreadsheetError(
      `Mapping report ${path} is missing columns: ${missing.join(", ")}`
    );
  }

  return rows.map((row, index) => {
    const cell = (column: (typeof MAPPING_COLUMNS)[number]): string =>
      row[header.indexOf(column)] ?? "";

    const status = cell("status").toUpperCase();
    if (!isClinicStatus(status)) {
      throw new SpreadsheetError(
        `Mapping report ${path} line ${String(index + 2)}: unknown status "${status}"`
      );
    }

    return {
      clinicName: cell("clinic_name"),
      clinicId: cell("clinic_id"),
      status,
      address: cell("address"),
      phone: cell("phone"),
      director: cell("director"),
      homepage: cell("homepage"),
      url: cell("url"),
      pagePath: cell("page_path"),
      qrPath: cell("qr_path"),
      qrNamedPath: cell("qr_named_path"),
    };
  });
}
