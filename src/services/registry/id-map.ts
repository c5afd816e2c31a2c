/**
 * Id map table helpers: revision hashing and integrity checks.
 */

import { createHash } from "node:crypto";

import {
  IdMapConflictError,
  IdMapFormatError,
  IdMapIntegrityError,
} from "../../errors.js";
import { nameKey } from "./normalize.js";

import type { IdMapEntry, IdMapTable } from "../../types/index.js";

// ============================================================================
// Revision
// ============================================================================

/**
 * Content hash of the entries in table order. Two tables with the same
 * entries have the same revision no matter where they were stored.
 */
export function computeRevision(entries: readonly IdMapEntry[]): string {
  const canonical = entries.map((entry) => [
    entry.clinicId,
    entry.clinicName,
    entry.status,
    entry.firstSeenAt,
    entry.statusChangedAt,
    entry.address,
    entry.phone,
    entry.director,
    entry.homepage,
  ]);
  return createHash("sha256").update(JSON.stringify(canonical)).digest("hex");
}

export function createTable(entries: IdMapEntry[]): IdMapTable {
  return { entries, revision: computeRevision(entries) };
}

export function emptyTable(): IdMapTable {
  return createTable([]);
}

// ============================================================================
// Integrity
// ============================================================================

/**
 * A stored table must bind each id and each name key exactly once.
 */
export function checkTableIntegrity(
  entries: readonly IdMapEntry[],
  source: string
): void {
  const problems: string[] = [];
  const seenIds = new Set<string>();
  const seenKeys = new Map<string, string>();

  for (const entry of entries) {
    if (entry.clinicId === "") {
      problems.push(`empty clinic_id for "${entry.clinicName}"`);
    } else if (seenIds.has(entry.clinicId)) {
      problems.push(`duplicate clinic_id ${entry.clinicId}`);
    }
    seenIds.add(entry.clinicId);

    const key = nameKey(entry.clinicName);
    if (key === "") {
      problems.push(`empty clinic_name for ${entry.clinicId}`);
      continue;
    }
    const other = seenKeys.get(key);
    if (other !== undefined) {
      problems.push(
        `duplicate clinic_name "${entry.clinicName}" (${other}, ${entry.clinicId})`
      );
    }
    seenKeys.set(key, entry.clinicId);
  }

  if (problems.length > 0) {
    throw new IdMapFormatError(
      `Id map ${source} is inconsistent:\n- ${problems.join("\n- ")}`
    );
  }
}

/**
 * The id map only grows: every previous id must survive, bound to the same
 * name. Throws before anything is written otherwise.
 */
export function assertAppendOnly(
  previous: IdMapTable,
  next: IdMapTable
): void {
  const nextById = new Map(next.entries.map((entry) => [entry.clinicId, entry]));

  for (const entry of previous.entries) {
    const successor = nextById.get(entry.clinicId);
    if (successor === undefined) {
      throw new IdMapIntegrityError(
        `Clinic id ${entry.clinicId} ("${entry.clinicName}") would be removed from the id map`
      );
    }
    if (successor.clinicName !== entry.clinicName) {
      throw new IdMapIntegrityError(
        `Clinic id ${entry.clinicId} would be rebound from "${entry.clinicName}" to "${successor.clinicName}"`
      );
    }
  }
}

/**
 * Checks a store runs against what it currently holds before accepting
 * `next`: same revision as the caller loaded, nothing removed or rebound.
 */
export function assertSavable(
  current: IdMapTable,
  next: IdMapTable,
  expectedRevision: string
): void {
  if (current.revision !== expectedRevision) {
    throw new IdMapConflictError(expectedRevision, current.revision);
  }
  assertAppendOnly(current, next);
  checkTableIntegrity(next.entries, "to save");
}
