/**
 * Clinic Registry Reconciler
 *
 * Diffs today's clinic batch against the persisted id map:
 * - existing names keep their clinic id, new names get a freshly minted one
 * - names present in the batch are ACTIVE, every other entry is INACTIVE
 * - each id is classified NEW / REACTIVATED / DEACTIVATED / UNCHANGED
 *
 * The previous table is never mutated; the caller persists the returned one.
 */

import { registryLogger } from "../../logger.js";
import { err, ok, type Result } from "../../types/result.js";
import { classifyChanges } from "./changes.js";
import { ClinicIdGenerator, idPrefixFor } from "./id-generator.js";
import { checkTableIntegrity, createTable } from "./id-map.js";
import { nameKey, normalizeName } from "./normalize.js";

import type {
  ClinicRecord,
  ClinicView,
  IdMapEntry,
  IdMapTable,
  Reconciliation,
  ValidationIssue,
} from "../../types/index.js";

export interface ReconcileOptions {
  year: number;
  idPrefix: string;
  /** Timestamp recorded for first sightings and status changes */
  now: string;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Collect every problem of the batch: names empty after normalization and
 * names that collide once normalized.
 */
export function validateBatch(
  records: readonly ClinicRecord[]
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const rowsByKey = new Map<string, { name: string; rowNumbers: number[] }>();

  for (const record of records) {
    const key = nameKey(record.name);
    if (key === "") {
      issues.push({ kind: "EMPTY_NAME", rowNumber: record.rowNumber });
      continue;
    }
    const group = rowsByKey.get(key);
    if (group === undefined) {
      rowsByKey.set(key, {
        name: normalizeName(record.name),
        rowNumbers: [record.rowNumber],
      });
    } else {
      group.rowNumbers.push(record.rowNumber);
    }
  }

  for (const group of rowsByKey.values()) {
    if (group.rowNumbers.length > 1) {
      issues.push({
        kind: "DUPLICATE_NAME",
        name: group.name,
        rowNumbers: group.rowNumbers,
      });
    }
  }

  return issues;
}

// ============================================================================
// Reconciliation
// ============================================================================

function mergeField(incoming: string | undefined, stored: string): string {
  return incoming !== undefined && incoming !== "" ? incoming : stored;
}

function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function reconcile(
  records: readonly ClinicRecord[],
  previous: IdMapTable,
  options: ReconcileOptions
): Result<Reconciliation, ValidationIssue[]> {
  const issues = validateBatch(records);
  if (issues.length > 0) {
    registryLogger.warn(
      { issueCount: issues.length },
      "Batch rejected before reconciliation"
    );
    return err(issues);
  }

  checkTableIntegrity(previous.entries, "input");

  const batch = new Map<string, ClinicRecord>();
  for (const record of records) {
    batch.set(nameKey(record.name), {
      ...record,
      name: normalizeName(record.name),
    });
  }

  const matchedKeys = new Set<string>();
  const entries: IdMapEntry[] = [];

  for (const entry of previous.entries) {
    const key = nameKey(entry.clinicName);
    const record = batch.get(key);
    if (record !== undefined) {
      matchedKeys.add(key);
      if (record.name !== entry.clinicName) {
        registryLogger.debug(
          { clinicId: entry.clinicId, stored: entry.clinicName, incoming: record.name },
          "Batch spelling differs from stored clinic name"
        );
      }
    }

    const status = record !== undefined ? "ACTIVE" : "INACTIVE";
    entries.push({
      ...entry,
      status,
      statusChangedAt:
        status === entry.status ? entry.statusChangedAt : options.now,
      address: mergeField(record?.address, entry.address),
      phone: mergeField(record?.phone, entry.phone),
      director: mergeField(record?.director, entry.director),
      homepage: mergeField(record?.homepage, entry.homepage),
    });
  }

  const generator = new ClinicIdGenerator(
    idPrefixFor(options.idPrefix, options.year),
    previous.entries.map((entry) => entry.clinicId)
  );
  const newIds: string[] = [];
  const unmatched = [...batch.entries()]
    .filter(([key]) => !matchedKeys.has(key))
    .sort(([a], [b]) => compareCodePoints(a, b));

  for (const [, record] of unmatched) {
    const clinicId = generator.mint();
    newIds.push(clinicId);
    entries.push({
      clinicId,
      clinicName: record.name,
      status: "ACTIVE",
      firstSeenAt: options.now,
      statusChangedAt: options.now,
      address: record.address,
      phone: record.phone,
      director: record.director,
      homepage: record.homepage,
    });
  }

  const table = createTable(entries);
  const changes = classifyChanges(previous, table);
  const changeById = new Map(
    changes.map((change) => [change.clinicId, change.changeType])
  );

  const clinics: ClinicView[] = table.entries.map((entry) => ({
    clinicId: entry.clinicId,
    clinicName: entry.clinicName,
    status: entry.status,
    changeType: changeById.get(entry.clinicId) ?? "UNCHANGED",
    address: entry.address,
    phone: entry.phone,
    director: entry.director,
    homepage: entry.homepage,
  }));

  registryLogger.info(
    {
      batchSize: records.length,
      known: previous.entries.length,
      minted: newIds.length,
    },
    "Batch reconciled"
  );

  return ok({ table, clinics, changes, newIds });
}
