/**
 * Apply orchestrator.
 *
 * Builds the patched state of every file in memory first. Only when every
 * file diff applies (or is already in place) is anything written, and a
 * failure while writing undoes what was written before it.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { applyHunk, DEFAULT_FUZZ_LEVEL, DEFAULT_MAX_SEARCH_WINDOW } from "./applier.js";
import { formatOsError, type ApplyError } from "./errors.js";
import { decodeLines, joinLines } from "./lines.js";
import { hashBytes } from "./tree-diff.js";
import type { FileDiff, FileMode, LineRecord, PatchDocument } from "./types.js";

export interface ApplyPatchOptions {
  fuzzLevel?: number;
  maxSearchWindow?: number;
}

export interface HunkPlacement {
  hunkIndex: number;
  offset: number;
  fuzz: number;
}

export type FileOutcome =
  | { status: "applied"; path: string; hunks: HunkPlacement[] }
  | { status: "skipped"; path: string; reason: string }
  | { status: "failed"; path: string; error: ApplyError };

export interface ApplyResult {
  /** True when the target tree was written */
  committed: boolean;
  files: FileOutcome[];
  /** Problems after a successful commit, such as an empty directory that could not be pruned */
  warnings: string[];
}

interface FileState {
  bytes: Buffer;
  mode: FileMode;
}

/** What a path holds on disk before anything is written. */
type DiskState = FileState | "directory" | null;

/** Planned state per path; null means the path is removed. */
type Overlay = Map<string, FileState | null>;

class PlanError extends Error {
  readonly error: ApplyError;

  constructor(error: ApplyError) {
    super(error.message);
    this.error = error;
  }
}

function ioFailure(message: string): PlanError {
  return new PlanError({ kind: "io_error", message });
}

function resolveTargetPath(root: string, relPath: string): string {
  const resolvedRoot = path.resolve(root);
  const resolved = path.resolve(resolvedRoot, relPath);
  if (!isPathWithinRoot(resolvedRoot, resolved) || resolved === resolvedRoot) {
    throw ioFailure(`Path escapes the target tree: ${relPath}`);
  }
  return resolved;
}

function isPathWithinRoot(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

function isErrnoCode(err: unknown, ...codes: string[]): boolean {
  return !!err && typeof err === "object" && "code" in err && codes.includes(String(err.code));
}

/** "a/b/c" -> ["a/b", "a"] */
function ancestorsOf(relPath: string): string[] {
  const ancestors: string[] = [];
  let slash = relPath.lastIndexOf("/");
  while (slash > 0) {
    relPath = relPath.slice(0, slash);
    ancestors.push(relPath);
    slash = relPath.lastIndexOf("/");
  }
  return ancestors;
}

function isNested(parent: string, child: string): boolean {
  return child.startsWith(`${parent}/`);
}

async function readDisk(absPath: string, relPath: string): Promise<DiskState> {
  try {
    const stats = await fs.lstat(absPath);
    if (stats.isSymbolicLink()) {
      return { bytes: Buffer.from(await fs.readlink(absPath), "utf-8"), mode: "120000" };
    }
    if (stats.isDirectory()) {
      return "directory";
    }
    if (!stats.isFile()) {
      throw ioFailure(`Not a regular file: ${relPath}`);
    }
    const mode: FileMode = (stats.mode & 0o111) !== 0 ? "100755" : "100644";
    return { bytes: await fs.readFile(absPath), mode };
  } catch (err) {
    if (err instanceof PlanError) throw err;
    // ENOTDIR: an ancestor is a file, so nothing exists here
    if (isErrnoCode(err, "ENOENT", "ENOTDIR")) {
      return null;
    }
    throw ioFailure(`Failed to read ${relPath}: ${formatOsError(err)}`);
  }
}

class ApplyPlan {
  readonly overlay: Overlay = new Map();
  private readonly disk = new Map<string, DiskState>();

  constructor(private readonly root: string) {}

  async diskState(relPath: string): Promise<DiskState> {
    const cached = this.disk.get(relPath);
    if (cached !== undefined) return cached;
    const state = await readDisk(resolveTargetPath(this.root, relPath), relPath);
    this.disk.set(relPath, state);
    return state;
  }

  /** The file at relPath before the patch; a directory counts as no file. */
  async original(relPath: string): Promise<FileState | null> {
    const state = await this.diskState(relPath);
    return state === "directory" ? null : state;
  }

  /**
   * The planned file at relPath. A directory reads as absent here so a file
   * can take its place; verifyPlacement checks it is emptied by the patch.
   */
  async current(relPath: string): Promise<FileState | null> {
    if (this.overlay.has(relPath)) {
      return this.overlay.get(relPath) ?? null;
    }
    return this.original(relPath);
  }

  async require(relPath: string): Promise<FileState> {
    const state = this.overlay.has(relPath) ? this.overlay.get(relPath) : await this.diskState(relPath);
    if (state === "directory") {
      throw ioFailure(`Not a regular file: ${relPath}`);
    }
    if (!state) {
      throw ioFailure(`No such file or directory: ${relPath}`);
    }
    return state;
  }

  /**
   * Check that a file planned at relPath has room once every planned removal
   * is done: a directory there must lose all its files, and no ancestor may
   * remain a file.
   */
  async verifyPlacement(relPath: string): Promise<void> {
    if (!this.overlay.get(relPath)) return;

    if ((await this.diskState(relPath)) === "directory" && !(await this.isEmptied(relPath))) {
      throw ioFailure(`Not a regular file: ${relPath}`);
    }

    for (const ancestor of ancestorsOf(relPath)) {
      if (this.overlay.has(ancestor)) {
        if (this.overlay.get(ancestor)) {
          throw ioFailure(`Not a directory: ${ancestor}`);
        }
        continue;
      }
      const state = await this.diskState(ancestor);
      if (state !== null && state !== "directory") {
        throw ioFailure(`Not a directory: ${ancestor}`);
      }
    }
  }

  /** True when every file below the directory relPath is planned for removal. */
  private async isEmptied(relPath: string): Promise<boolean> {
    let names: string[];
    try {
      names = await fs.readdir(resolveTargetPath(this.root, relPath));
    } catch (err) {
      throw ioFailure(`Failed to read ${relPath}: ${formatOsError(err)}`);
    }
    for (const name of names) {
      const child = `${relPath}/${name}`;
      const state = await this.diskState(child);
      if (state === "directory") {
        if (!(await this.isEmptied(child))) return false;
      } else if (!(this.overlay.has(child) && this.overlay.get(child) === null)) {
        return false;
      }
    }
    return true;
  }
}

function foldHunks(
  diff: FileDiff,
  lines: LineRecord[],
  options: Required<ApplyPatchOptions>,
): { lines: LineRecord[]; placements: HunkPlacement[] } {
  let current = lines;
  let lineOffset = 0;
  const placements: HunkPlacement[] = [];

  diff.hunks.forEach((hunk, hunkIndex) => {
    const result = applyHunk(current, hunk, options.fuzzLevel, {
      lineOffset,
      maxSearchWindow: options.maxSearchWindow,
      hunkIndex,
    });
    if (!result.ok) {
      throw new PlanError(result.error);
    }
    current = result.lines;
    lineOffset += result.offset + hunk.newLen - hunk.oldLen;
    placements.push({ hunkIndex, offset: result.offset, fuzz: result.fuzz });
  });

  return { lines: current, placements };
}

function toBytes(lines: LineRecord[]): Buffer {
  return Buffer.from(joinLines(lines), "utf-8");
}

async function planBinary(plan: ApplyPlan, diff: FileDiff): Promise<FileOutcome> {
  const binary = diff.binary;
  if (!binary) {
    throw ioFailure(`Missing binary payload: ${diff.path}`);
  }
  const current = await plan.current(diff.path);
  const currentHash = current ? hashBytes(current.bytes) : null;

  if (currentHash === binary.newHash) {
    return { status: "skipped", path: diff.path, reason: "already up to date" };
  }
  if (current === null && binary.oldHash !== null) {
    throw ioFailure(`No such file or directory: ${diff.path}`);
  }
  if (currentHash !== binary.oldHash) {
    throw new PlanError({
      kind: "binary_conflict",
      expectedHash: binary.oldHash,
      actualHash: currentHash,
      message: `Binary file ${diff.path} does not match the patch's original`,
    });
  }

  if (binary.content === null) {
    plan.overlay.set(diff.path, null);
  } else {
    const mode = diff.newMode ?? current?.mode ?? "100644";
    plan.overlay.set(diff.path, { bytes: binary.content, mode });
  }
  return { status: "applied", path: diff.path, hunks: [] };
}

async function planText(
  plan: ApplyPlan,
  diff: FileDiff,
  options: Required<ApplyPatchOptions>,
): Promise<FileOutcome> {
  switch (diff.kind) {
    case "added": {
      const { lines, placements } = foldHunks(diff, [], options);
      const bytes = toBytes(lines);
      const mode = diff.newMode ?? "100644";
      const current = await plan.current(diff.path);
      if (current) {
        if (current.bytes.equals(bytes) && current.mode === mode) {
          return { status: "skipped", path: diff.path, reason: "already present" };
        }
        throw ioFailure(`File already exists: ${diff.path}`);
      }
      plan.overlay.set(diff.path, { bytes, mode });
      return { status: "applied", path: diff.path, hunks: placements };
    }

    case "deleted": {
      const current = await plan.require(diff.path);
      const { lines, placements } = foldHunks(diff, decodeLines(current.bytes), options);
      if (lines.length > 0) {
        throw ioFailure(`File has content beyond the deleted lines: ${diff.path}`);
      }
      plan.overlay.set(diff.path, null);
      return { status: "applied", path: diff.path, hunks: placements };
    }

    case "modified": {
      const current = await plan.require(diff.path);
      const { lines, placements } = foldHunks(diff, decodeLines(current.bytes), options);
      plan.overlay.set(diff.path, { bytes: toBytes(lines), mode: diff.newMode ?? current.mode });
      return { status: "applied", path: diff.path, hunks: placements };
    }

    case "mode_changed": {
      const current = await plan.require(diff.path);
      const mode = diff.newMode ?? current.mode;
      if (current.mode === mode) {
        return { status: "skipped", path: diff.path, reason: `mode is already ${mode}` };
      }
      plan.overlay.set(diff.path, { bytes: current.bytes, mode });
      return { status: "applied", path: diff.path, hunks: [] };
    }

    case "renamed": {
      const from = diff.oldPath;
      if (!from) {
        throw ioFailure(`Rename without a source path: ${diff.path}`);
      }
      const source = await plan.require(from);
      if (await plan.current(diff.path)) {
        throw ioFailure(`Rename destination already exists: ${diff.path}`);
      }
      const { lines, placements } = foldHunks(diff, decodeLines(source.bytes), options);
      const bytes = diff.hunks.length > 0 ? toBytes(lines) : source.bytes;
      plan.overlay.set(from, null);
      plan.overlay.set(diff.path, { bytes, mode: diff.newMode ?? source.mode });
      return { status: "applied", path: diff.path, hunks: placements };
    }
  }
}

// ============================================================================
// Commit
// ============================================================================

type Undo = () => Promise<void>;

function describeRollback(failures: string[]): string {
  return failures.length > 0 ? `; rollback incomplete: ${failures.join("; ")}` : "";
}

class CommitError extends Error {
  constructor(
    readonly path: string,
    reason: unknown,
    rollbackFailures: string[],
  ) {
    super(`Failed to write ${path}: ${formatOsError(reason)}${describeRollback(rollbackFailures)}`);
  }
}

function modeBits(mode: FileMode): number {
  return mode === "100755" ? 0o755 : 0o644;
}

async function writeState(absPath: string, state: FileState): Promise<void> {
  if (state.mode === "120000") {
    await fs.rm(absPath, { force: true });
    await fs.symlink(state.bytes.toString("utf-8"), absPath);
    return;
  }
  const tmpPath = path.join(path.dirname(absPath), `.${path.basename(absPath)}.${process.pid}.tmp`);
  await fs.writeFile(tmpPath, state.bytes);
  await fs.chmod(tmpPath, modeBits(state.mode));
  try {
    await fs.rm(absPath, { force: true });
    await fs.rename(tmpPath, absPath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

async function restoreState(absPath: string, state: FileState): Promise<void> {
  await fs.mkdir(path.dirname(absPath), { recursive: true });
  await writeState(absPath, state);
}

/** Prune directories left empty above a removed file. Returns a warning on failure. */
async function removeEmptyParents(root: string, absPath: string): Promise<string | undefined> {
  let dir = path.dirname(absPath);
  while (dir !== root && isPathWithinRoot(root, dir)) {
    try {
      const entries = await fs.readdir(dir);
      if (entries.length > 0) return undefined;
      await fs.rmdir(dir);
    } catch (err) {
      // Already gone, or replaced by a file the patch wrote
      if (isErrnoCode(err, "ENOENT", "ENOTDIR")) return undefined;
      return `Failed to remove empty directory ${path.relative(root, dir)}: ${formatOsError(err)}`;
    }
    dir = path.dirname(dir);
  }
  return undefined;
}

class Commit {
  private readonly undo: Undo[] = [];
  readonly removed: string[] = [];

  constructor(
    private readonly root: string,
    private readonly plan: ApplyPlan,
  ) {}

  async remove(relPath: string): Promise<void> {
    const before = await this.plan.original(relPath);
    if (!before) return;
    const absPath = resolveTargetPath(this.root, relPath);
    await fs.rm(absPath);
    this.removed.push(absPath);
    this.undo.push(() => restoreState(absPath, before));
  }

  async write(relPath: string, next: FileState): Promise<void> {
    const absPath = resolveTargetPath(this.root, relPath);
    const before = await this.plan.original(relPath);

    if (before && before.bytes.equals(next.bytes) && before.mode !== "120000" && next.mode !== "120000") {
      if (before.mode !== next.mode) {
        await fs.chmod(absPath, modeBits(next.mode));
        this.undo.push(() => fs.chmod(absPath, modeBits(before.mode)));
      }
      return;
    }

    // Only empty directories remain here once the files below were removed
    if ((await this.plan.diskState(relPath)) === "directory") {
      await fs.rm(absPath, { recursive: true });
      this.undo.push(async () => {
        await fs.mkdir(absPath, { recursive: true });
      });
    }

    const createdDir = await fs.mkdir(path.dirname(absPath), { recursive: true });
    if (createdDir) {
      this.undo.push(() => fs.rm(createdDir, { recursive: true, force: true }));
    }
    await writeState(absPath, next);
    this.undo.push(before ? () => writeState(absPath, before) : () => fs.rm(absPath, { force: true }));
  }

  /** Undo every step taken so far, newest first. Returns the steps that failed. */
  async rollback(): Promise<string[]> {
    const failures: string[] = [];
    for (const step of this.undo.reverse()) {
      try {
        await step();
      } catch (err) {
        failures.push(formatOsError(err));
      }
    }
    return failures;
  }
}

/**
 * Write the plan. Writes go first, in plan order, so a rename's source
 * survives a failed write; a removal that stands in the way of a write (a file
 * becoming a directory or the reverse) is done just before it. The remaining
 * removals follow, then empty directories are pruned.
 */
async function commit(root: string, plan: ApplyPlan): Promise<string[]> {
  const resolvedRoot = path.resolve(root);
  const run = new Commit(resolvedRoot, plan);
  const removals = [...plan.overlay.entries()].filter(([, next]) => next === null).map(([relPath]) => relPath);
  const done = new Set<string>();

  let relPath = "";
  try {
    for (const [entryPath, next] of plan.overlay) {
      if (next === null) continue;
      for (const removal of removals) {
        if (done.has(removal) || !(isNested(removal, entryPath) || isNested(entryPath, removal))) continue;
        relPath = removal;
        await run.remove(removal);
        done.add(removal);
      }
      relPath = entryPath;
      await run.write(entryPath, next);
    }
    for (const removal of removals) {
      if (done.has(removal)) continue;
      relPath = removal;
      await run.remove(removal);
    }
  } catch (err) {
    throw new CommitError(relPath, err, await run.rollback());
  }

  const warnings: string[] = [];
  for (const absPath of run.removed) {
    const warning = await removeEmptyParents(resolvedRoot, absPath);
    if (warning) warnings.push(warning);
  }
  return warnings;
}

// ============================================================================
// Entry point
// ============================================================================

export async function applyPatch(
  doc: PatchDocument,
  targetRoot: string,
  options: ApplyPatchOptions = {},
): Promise<ApplyResult> {
  const resolved: Required<ApplyPatchOptions> = {
    fuzzLevel: options.fuzzLevel ?? DEFAULT_FUZZ_LEVEL,
    maxSearchWindow: options.maxSearchWindow ?? DEFAULT_MAX_SEARCH_WINDOW,
  };
  const plan = new ApplyPlan(targetRoot);
  const files: FileOutcome[] = [];

  for (const diff of doc.files) {
    try {
      files.push(diff.binary ? await planBinary(plan, diff) : await planText(plan, diff, resolved));
    } catch (err) {
      if (!(err instanceof PlanError)) throw err;
      files.push({ status: "failed", path: diff.path, error: err.error });
    }
  }

  // Placement depends on the removals of later diffs, so it is checked last
  for (const [index, outcome] of files.entries()) {
    if (outcome.status !== "applied") continue;
    try {
      await plan.verifyPlacement(outcome.path);
    } catch (err) {
      if (!(err instanceof PlanError)) throw err;
      files[index] = { status: "failed", path: outcome.path, error: err.error };
    }
  }

  if (files.some((outcome) => outcome.status === "failed")) {
    return { committed: false, files, warnings: [] };
  }

  let warnings: string[];
  try {
    warnings = await commit(targetRoot, plan);
  } catch (err) {
    if (!(err instanceof CommitError)) throw err;
    const failed: FileOutcome = {
      status: "failed",
      path: err.path,
      error: { kind: "io_error", message: err.message },
    };
    const matched = files.some((outcome) => outcome.path === err.path);
    return {
      committed: false,
      files: matched
        ? files.map((outcome) => (outcome.path === err.path ? failed : outcome))
        : [...files, failed],
      warnings: [],
    };
  }

  return { committed: true, files, warnings };
}
