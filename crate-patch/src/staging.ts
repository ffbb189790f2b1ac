/**
 * Staging manager.
 *
 * Owns the on-disk layout of a workspace: editable working copies under
 * targetDir and patch files under patchesDir. Every path is derived from the
 * workspace root passed in; nothing is looked up globally.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { formatOsError } from "@crate-patch/engine";
import type { CratePatchConfig, CrateSpec } from "./config.js";

export const PATCH_EXTENSION = ".patch";
const LOCK_SUFFIX = ".lock";

export type StagingErrorKind = "locked" | "io_error";

export class StagingError extends Error {
  readonly kind: StagingErrorKind;
  readonly path: string;

  constructor(kind: StagingErrorKind, filePath: string, message: string) {
    super(message);
    this.kind = kind;
    this.path = filePath;
    this.name = "StagingError";
  }
}

export interface PatchFileEntry {
  name: string;
  version: string;
  /** Absolute path of the patch file */
  file: string;
}

export type PrepareOutcome = "created" | "existing";

function isErrnoCode(err: unknown, code: string): boolean {
  return err !== null && typeof err === "object" && "code" in err && err.code === code;
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return false;
    throw new StagingError("io_error", target, `Failed to stat ${target}: ${formatOsError(err)}`);
  }
}

async function removeDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch (err) {
    throw new StagingError("io_error", dir, `Failed to remove ${dir}: ${formatOsError(err)}`);
  }
}

export class StagingManager {
  readonly patchesDir: string;
  readonly targetDir: string;

  constructor(
    readonly workspaceRoot: string,
    config: Pick<CratePatchConfig, "patchesDir" | "targetDir">,
  ) {
    this.patchesDir = path.resolve(workspaceRoot, config.patchesDir);
    this.targetDir = path.resolve(workspaceRoot, config.targetDir);
  }

  workingCopyPath(crate: CrateSpec): string {
    return path.join(this.targetDir, `${crate.name}-${crate.version}`);
  }

  patchFilePath(crate: CrateSpec): string {
    return path.join(this.patchesDir, `${crate.name}+${crate.version}${PATCH_EXTENSION}`);
  }

  async hasWorkingCopy(crate: CrateSpec): Promise<boolean> {
    return exists(this.workingCopyPath(crate));
  }

  /**
   * Copy the pristine sources into the working copy. An existing copy is kept
   * unless force is set, in which case it is replaced.
   */
  async prepareWorkingCopy(
    crate: CrateSpec,
    pristineRoot: string,
    options: { force?: boolean } = {},
  ): Promise<PrepareOutcome> {
    const dest = this.workingCopyPath(crate);
    if ((await exists(dest)) && !options.force) {
      return "existing";
    }

    try {
      await fs.rm(dest, { recursive: true, force: true });
      await fs.mkdir(path.dirname(dest), { recursive: true });
      await fs.cp(pristineRoot, dest, { recursive: true, verbatimSymlinks: true });
    } catch (err) {
      throw new StagingError("io_error", dest, `Failed to copy ${pristineRoot} to ${dest}: ${formatOsError(err)}`);
    }
    return "created";
  }

  async removeWorkingCopy(crate: CrateSpec): Promise<void> {
    await removeDir(this.workingCopyPath(crate));
  }

  /** Patch files named <name>+<version>.patch, sorted by file name. */
  async listPatchFiles(): Promise<PatchFileEntry[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.patchesDir);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw new StagingError("io_error", this.patchesDir, `Failed to list ${this.patchesDir}: ${formatOsError(err)}`);
    }

    const entries: PatchFileEntry[] = [];
    for (const fileName of names.sort()) {
      if (!fileName.endsWith(PATCH_EXTENSION)) continue;
      const stem = fileName.slice(0, -PATCH_EXTENSION.length);
      const plus = stem.indexOf("+");
      if (plus <= 0) continue;
      const file = path.join(this.patchesDir, fileName);
      const stats = await fs.stat(file);
      if (!stats.isFile()) continue;
      entries.push({ name: stem.slice(0, plus), version: stem.slice(plus + 1), file });
    }
    return entries;
  }

  /**
   * Run fn while holding an exclusive claim on dir. The claim is a sibling
   * "<dir>.lock" directory; mkdir either creates it or fails.
   */
  async claim<T>(dir: string, fn: () => Promise<T>): Promise<T> {
    const lockPath = `${dir}${LOCK_SUFFIX}`;
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    try {
      await fs.mkdir(lockPath);
    } catch (err) {
      if (isErrnoCode(err, "EEXIST")) {
        throw new StagingError("locked", dir, `${dir} is in use by another crate-patch run`);
      }
      throw new StagingError("io_error", lockPath, `Failed to claim ${dir}: ${formatOsError(err)}`);
    }

    try {
      return await fn();
    } finally {
      await fs.rm(lockPath, { recursive: true, force: true });
    }
  }

  /**
   * Remove every working copy, each under its own claim. Copies another run
   * holds are left in place and returned.
   */
  async clean(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.targetDir);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw new StagingError("io_error", this.targetDir, `Failed to list ${this.targetDir}: ${formatOsError(err)}`);
    }

    const busy: string[] = [];
    for (const name of names.sort()) {
      if (name.endsWith(LOCK_SUFFIX)) continue;
      const dir = path.join(this.targetDir, name);
      try {
        await this.claim(dir, () => removeDir(dir));
      } catch (err) {
        if (!(err instanceof StagingError && err.kind === "locked")) throw err;
        busy.push(dir);
      }
    }
    return busy;
  }
}
