import { createHash } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";

export function sha256(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Hash recorded by the last successful build, if any
 */
export function readStoredHash(path: string): string | undefined {
  if (!existsSync(path)) return undefined;
  const value = readFileSync(path, "utf8").trim();
  return value === "" ? undefined : value;
}

export function formatStoredHash(hash: string): string {
  return `${hash}\n`;
}
