import type { IdMapTable } from "../../../types/index.js";

export interface SaveOptions {
  /**
   * Revision of the table the caller reconciled against. The save is
   * refused when the stored table no longer has it.
   */
  expectedRevision: string;
}

/**
 * Persisted clinic-name → clinic-id map
 */
export interface IdMapStore {
  /** Human readable location for logs and errors */
  readonly location: string;
  load(): Promise<IdMapTable>;
  /**
   * Run every check `save` would run, without writing. Lets a caller find
   * out before publishing anything derived from `table`.
   */
  verify(table: IdMapTable, options: SaveOptions): Promise<void>;
  save(table: IdMapTable, options: SaveOptions): Promise<void>;
  close(): Promise<void>;
}

/** Column order of the persisted id map */
export const ID_MAP_COLUMNS = [
  "clinic_id",
  "clinic_name",
  "status",
  "first_seen_at",
  "status_changed_at",
  "address",
  "phone",
  "director",
  "homepage",
] as const;

export type IdMapColumn = (typeof ID_MAP_COLUMNS)[number];

export const CORE_COLUMNS: readonly IdMapColumn[] = [
  "clinic_id",
  "clinic_name",
  "status",
];
