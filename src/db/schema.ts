import type { Generated, Selectable } from "kysely";

// ============================================================================
// Table Types
// ============================================================================

export interface ClinicIdsTable {
  /** Insertion order; the id map is read back in this order */
  seq: Generated<number>;
  clinic_id: string;
  clinic_name: string;
  status: string;
  first_seen_at: string;
  status_changed_at: string;
  address: string;
  phone: string;
  director: string;
  homepage: string;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  clinic_ids: ClinicIdsTable;
}

// ============================================================================
// Row Types (for convenience)
// ============================================================================

export type ClinicIdRow = Selectable<ClinicIdsTable>;
