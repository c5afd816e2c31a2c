// Clinic registry domain types

// =====================
// Input
// =====================

/**
 * One clinic row from the current spreadsheet batch.
 * All fields are trimmed; blank cells become "".
 */
export interface ClinicRecord {
  name: string;
  address: string;
  phone: string;
  director: string;
  homepage: string;
  /** 1-based spreadsheet row, kept for error reporting */
  rowNumber: number;
}

/**
 * Header names of the required spreadsheet columns
 */
export interface ColumnNames {
  name: string;
  address: string;
  phone: string;
  director: string;
  homepage: string;
}

// =====================
// Id map
// =====================

export const CLINIC_STATUSES = ["ACTIVE", "INACTIVE"] as const;
export type ClinicStatus = (typeof CLINIC_STATUSES)[number];

export function isClinicStatus(value: string): value is ClinicStatus {
  return CLINIC_STATUSES.some((status) => status === value);
}

export const CHANGE_TYPES = [
  "NEW",
  "REACTIVATED",
  "DEACTIVATED",
  "UNCHANGED",
] as const;
export type ChangeType = (typeof CHANGE_TYPES)[number];

/**
 * Persisted binding of a clinic name to its permanent id.
 *
 * `status` is the snapshot written by the last successful run. It is only
 * read back to classify transitions; the current status is always
 * recomputed from the batch.
 */
export interface IdMapEntry {
  clinicId: string;
  clinicName: string;
  status: ClinicStatus;
  firstSeenAt: string;
  statusChangedAt: string;
  address: string;
  phone: string;
  director: string;
  homepage: string;
}

/**
 * The whole id map as an explicit value. `revision` is a content hash used
 * to detect that the stored table moved underneath a run.
 */
export interface IdMapTable {
  entries: IdMapEntry[];
  revision: string;
}

// =====================
// Reconciliation output
// =====================

export interface ChangeRecord {
  clinicId: string;
  clinicName: string;
  changeType: ChangeType;
}

/**
 * A clinic of the updated id map annotated with its status for this run
 */
export interface ClinicView {
  clinicId: string;
  clinicName: string;
  status: ClinicStatus;
  changeType: ChangeType;
  address: string;
  phone: string;
  director: string;
  homepage: string;
}

export interface Reconciliation {
  table: IdMapTable;
  clinics: ClinicView[];
  changes: ChangeRecord[];
  newIds: string[];
}

export type ValidationIssue =
  | { kind: "MISSING_COLUMN"; column: string }
  | { kind: "EMPTY_NAME"; rowNumber: number }
  | { kind: "DUPLICATE_NAME"; name: string; rowNumbers: number[] };

// =====================
// Reports
// =====================

/**
 * One row of the mapping report (output/mapping.csv)
 */
export interface MappingRecord {
  clinicName: string;
  clinicId: string;
  status: ClinicStatus;
  address: string;
  phone: string;
  director: string;
  homepage: string;
  url: string;
  pagePath: string;
  qrPath: string;
  qrNamedPath: string;
}
