import { isClinicStatus, type ClinicStatus } from "../../types/index.js";

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

/**
 * `--status` filter of `idmap list`, case-insensitive
 */
export function parseStatusFilter(
  value: string | undefined
): ClinicStatus | undefined {
  if (value === undefined) return undefined;
  const status = value.trim().toUpperCase();
  if (!isClinicStatus(status)) {
    throw new Error(`Unknown status "${value}" (expected ACTIVE or INACTIVE)`);
  }
  return status;
}
