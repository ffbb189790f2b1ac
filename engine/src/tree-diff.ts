/**
 * Tree differ.
 * Walks a pristine and a working tree and reports file-level changes.
 */

import { createHash } from "node:crypto";
import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { IoError } from "./errors.js";
import type { FileChange, FileMode, TreeEntry } from "./types.js";

export interface TreeWalkOptions {
  /** Path segments skipped wherever they appear. Default: [".git"] */
  exclude?: string[];
}

export const DEFAULT_EXCLUDE = [".git"];

export function hashBytes(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

function modeOf(stats: { mode: number; isSymbolicLink(): boolean }): FileMode {
  if (stats.isSymbolicLink()) return "120000";
  return (stats.mode & 0o111) !== 0 ? "100755" : "100644";
}

/**
 * Read every file under root into a map keyed by relative POSIX path.
 * Symbolic links are recorded with their target as content.
 * Any unreadable entry aborts the walk.
 */
export async function snapshotTree(
  root: string,
  options: TreeWalkOptions = {},
): Promise<Map<string, TreeEntry>> {
  const exclude = new Set(options.exclude ?? DEFAULT_EXCLUDE);
  const entries = new Map<string, TreeEntry>();

  try {
    const stats = await fs.stat(root);
    if (!stats.isDirectory()) {
      throw new IoError(root, "Not a directory");
    }
  } catch (err) {
    if (err instanceof IoError) throw err;
    throw IoError.from(root, err);
  }

  async function walk(dir: string, prefix: string): Promise<void> {
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err) {
      throw IoError.from(dir, err);
    }
    names.sort();

    for (const name of names) {
      if (exclude.has(name)) continue;
      const absPath = path.join(dir, name);
      const relPath = prefix ? `${prefix}/${name}` : name;

      let stats: Stats;
      try {
        stats = await fs.lstat(absPath);
      } catch (err) {
        throw IoError.from(absPath, err);
      }

      if (stats.isDirectory()) {
        await walk(absPath, relPath);
        continue;
      }
      if (!stats.isFile() && !stats.isSymbolicLink()) continue;

      let bytes: Buffer;
      try {
        bytes = stats.isSymbolicLink()
          ? Buffer.from(await fs.readlink(absPath), "utf-8")
          : await fs.readFile(absPath);
      } catch (err) {
        throw IoError.from(absPath, err);
      }

      entries.set(relPath, { mode: modeOf(stats), bytes, hash: hashBytes(bytes) });
    }
  }

  await walk(root, "");
  return entries;
}

function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compare two snapshots. Output is ordered by path regardless of the order
 * the filesystem listed entries in.
 */
export function compareSnapshots(
  pristine: Map<string, TreeEntry>,
  working: Map<string, TreeEntry>,
): FileChange[] {
  const paths = new Set<string>([...pristine.keys(), ...working.keys()]);
  const changes: FileChange[] = [];

  for (const relPath of [...paths].sort(comparePaths)) {
    const before = pristine.get(relPath);
    const after = working.get(relPath);

    if (!before && after) {
      changes.push({ path: relPath, kind: "added", newMode: after.mode });
    } else if (before && !after) {
      changes.push({ path: relPath, kind: "deleted", oldMode: before.mode });
    } else if (before && after) {
      if (before.hash !== after.hash) {
        changes.push({ path: relPath, kind: "modified", oldMode: before.mode, newMode: after.mode });
      } else if (before.mode !== after.mode) {
        changes.push({ path: relPath, kind: "mode_changed", oldMode: before.mode, newMode: after.mode });
      }
    }
  }

  return changes;
}

export async function diffTrees(
  pristineRoot: string,
  workingRoot: string,
  options: TreeWalkOptions = {},
): Promise<FileChange[]> {
  const pristine = await snapshotTree(pristineRoot, options);
  const working = await snapshotTree(workingRoot, options);
  return compareSnapshots(pristine, working);
}
