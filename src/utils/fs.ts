import {
  cpSync,
  mkdirSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { dirname, join } from "node:path";

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EXDEV";
}

/**
 * Write through a temp file in the same directory, then rename over the
 * target so readers never see a half-written file.
 */
export function writeFileAtomic(path: string, data: string | Buffer): void {
  mkdirSync(dirname(path), { recursive: true });
  const tempPath = `${path}.tmp-${String(process.pid)}`;
  writeFileSync(tempPath, data);
  renameSync(tempPath, path);
}

/**
 * Move a file or a whole directory, copying across devices
 */
export function movePath(from: string, to: string): void {
  mkdirSync(dirname(to), { recursive: true });
  try {
    renameSync(from, to);
  } catch (error) {
    if (!isCrossDeviceError(error)) throw error;
    cpSync(from, to, { recursive: true });
    rmSync(from, { recursive: true, force: true });
  }
}

/**
 * Every file below `root`, as paths relative to it
 */
export function listFiles(root: string, prefix = ""): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(join(root, prefix), { withFileTypes: true })) {
    const relativePath = prefix === "" ? entry.name : join(prefix, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFiles(root, relativePath));
    } else {
      files.push(relativePath);
    }
  }
  return files;
}
