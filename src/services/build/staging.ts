import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  rmSync,
  rmdirSync,
  writeFileSync,
} from "node:fs";
import { dirname, isAbsolute, join, relative } from "node:path";

import { buildLogger } from "../../logger.js";
import { listFiles, movePath } from "../../utils/fs.js";

function contains(root: string, path: string): boolean {
  const rel = relative(root, path);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

interface Undo {
  /** Published path put in place by the commit */
  path: string;
  /** Where the content it displaced was parked, if there was any */
  parked?: string;
}

/**
 * Scratch area mirroring a set of output roots. Files are written to their
 * staged location and only moved into place by `commit`, so a failed build
 * leaves the published outputs as they were. Until `dispose`, a commit can
 * be taken back with `rollback`.
 */
export class Staging {
  readonly dir: string;
  private readonly roots: [name: string, finalRoot: string][];
  private undo: Undo[] = [];

  constructor(parentDir: string, roots: Record<string, string>) {
    mkdirSync(parentDir, { recursive: true });
    this.dir = mkdtempSync(join(parentDir, ".staging-"));
    // Longest root first so nested roots win over their parents
    this.roots = Object.entries(roots).sort(
      ([, a], [, b]) => b.length - a.length
    );
  }

  /**
   * Staged location of a final output path
   */
  path(finalPath: string): string {
    for (const [name, root] of this.roots) {
      if (contains(root, finalPath)) {
        return join(this.dir, name, relative(root, finalPath));
      }
    }
    throw new Error(`Path is outside every staged root: ${finalPath}`);
  }

  write(finalPath: string, data: string | Buffer): void {
    const target = this.path(finalPath);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, data);
  }

  /** Drop staged files below a final path so they are not published */
  discard(finalPath: string): void {
    rmSync(this.path(finalPath), { recursive: true, force: true });
  }

  private park(finalPath: string): string | undefined {
    if (!existsSync(finalPath)) return undefined;
    const parked = join(this.dir, ".parked", String(this.undo.length));
    movePath(finalPath, parked);
    return parked;
  }

  /**
   * Move every staged file into place. Directories listed in `replace` are
   * cleared first, so their content afterwards is exactly what was staged.
   * Displaced files are parked inside the staging directory. A failing
   * commit rolls itself back before rethrowing.
   */
  commit(options: { replace?: readonly string[] } = {}): number {
    let moved = 0;
    try {
      for (const finalDir of options.replace ?? []) {
        if (contains(finalDir, this.dir)) {
          throw new Error(`Cannot replace a directory holding the staging area: ${finalDir}`);
        }
        this.undo.push({ path: finalDir, parked: this.park(finalDir) });
      }

      for (const [name, root] of this.roots) {
        const stagedRoot = join(this.dir, name);
        if (!existsSync(stagedRoot)) continue;
        for (const file of listFiles(stagedRoot)) {
          const target = join(root, file);
          const entry: Undo = { path: target, parked: this.park(target) };
          this.undo.push(entry);
          movePath(join(stagedRoot, file), target);
          moved++;
        }
      }
    } catch (error) {
      this.rollback();
      throw error;
    }

    buildLogger.debug({ moved }, "Staged files committed");
    return moved;
  }

  /** Remove directories a commit created on the way to `path` */
  private prune(path: string): void {
    const root = this.roots.find(([, finalRoot]) => contains(finalRoot, path))?.[1];
    if (root === undefined) return;
    let dir = dirname(path);
    while (dir !== root && contains(root, dir) && existsSync(dir)) {
      if (readdirSync(dir).length > 0) break;
      rmdirSync(dir);
      dir = dirname(dir);
    }
  }

  /**
   * Put back everything the last commit displaced, newest move first
   */
  rollback(): void {
    const undo = this.undo.reverse();
    this.undo = [];
    for (const entry of undo) {
      rmSync(entry.path, { recursive: true, force: true });
      if (entry.parked !== undefined) {
        movePath(entry.parked, entry.path);
      } else {
        this.prune(entry.path);
      }
    }
    buildLogger.warn({ restored: undo.length }, "Committed outputs rolled back");
  }

  dispose(): void {
    rmSync(this.dir, { recursive: true, force: true });
  }
}
