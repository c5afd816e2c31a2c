import type {
  ChangeRecord,
  ChangeType,
  ClinicStatus,
  IdMapTable,
} from "../../types/index.js";

/**
 * Transition of one clinic id between two id-map snapshots
 */
export function classifyTransition(
  previous: ClinicStatus | undefined,
  next: ClinicStatus
): ChangeType {
  if (previous === undefined) return "NEW";
  if (previous === "ACTIVE" && next === "INACTIVE") return "DEACTIVATED";
  if (previous === "INACTIVE" && next === "ACTIVE") return "REACTIVATED";
  return "UNCHANGED";
}

/**
 * One change record per clinic id of the next table, in table order.
 */
export function classifyChanges(
  previous: IdMapTable,
  next: IdMapTable
): ChangeRecord[] {
  const previousStatus = new Map(
    previous.entries.map((entry) => [entry.clinicId, entry.status])
  );

  return next.entries.map((entry) => ({
    clinicId: entry.clinicId,
    clinicName: entry.clinicName,
    changeType: classifyTransition(
      previousStatus.get(entry.clinicId),
      entry.status
    ),
  }));
}

export function countChanges(
  changes: readonly ChangeRecord[]
): Record<ChangeType, number> {
  const counts: Record<ChangeType, number> = {
    NEW: 0,
    REACTIVATED: 0,
    DEACTIVATED: 0,
    UNCHANGED: 0,
  };
  for (const change of changes) {
    counts[change.changeType]++;
  }
  return counts;
}
