/**
 * Create and apply runs over the configured crates.
 */

import fs from "node:fs/promises";
import path from "node:path";
import {
  applyPatch,
  formatOsError,
  generatePatch,
  parsePatch,
  PatchEngineError,
  serializePatch,
  type FileOutcome,
} from "@crate-patch/engine";
import { configuredCrates, formatCrateSpec, parseCrateSpec, type CratePatchConfig, type CrateSpec } from "./config.js";
import { FetchError, type CrateFetcher } from "./fetcher.js";
import { log } from "./log.js";
import { StagingError, type PatchFileEntry, type StagingManager } from "./staging.js";

export interface RunnerDeps {
  config: CratePatchConfig;
  staging: StagingManager;
  fetcher: CrateFetcher;
}

export type CrateStatus = "created" | "unchanged" | "applied" | "prepared" | "skipped" | "failed";

export interface CrateReport {
  crate: string;
  status: CrateStatus;
  message: string;
  patchFile?: string;
  files?: FileOutcome[];
}

export interface RunReport {
  action: "create" | "apply";
  crates: CrateReport[];
}

export interface ApplyRunOptions {
  force?: boolean;
  /** Overrides config.fuzz */
  fuzz?: number;
}

function isKnownError(err: unknown): err is Error {
  return err instanceof PatchEngineError || err instanceof StagingError || err instanceof FetchError;
}

function relativeToWorkspace(deps: RunnerDeps, file: string): string {
  return path.relative(deps.staging.workspaceRoot, file) || file;
}

async function runCrate(
  crate: CrateSpec,
  deps: RunnerDeps,
  fn: () => Promise<CrateReport>,
): Promise<CrateReport> {
  try {
    return await deps.staging.claim(deps.staging.workingCopyPath(crate), fn);
  } catch (err) {
    if (!isKnownError(err)) throw err;
    log.error(`crate: ${formatCrateSpec(crate)}, ${err.message}`);
    return { crate: formatCrateSpec(crate), status: "failed", message: err.message };
  }
}

/**
 * Find the configured crate for a request of "name" or "name@version".
 */
function resolveRequest(request: string, config: CratePatchConfig): CrateSpec | undefined {
  const wanted = parseCrateSpec(request);
  return configuredCrates(config).find((crate) =>
    wanted ? crate.name === wanted.name && crate.version === wanted.version : crate.name === request,
  );
}

// ============================================================================
// Create
// ============================================================================

async function createPatch(crate: CrateSpec, deps: RunnerDeps): Promise<CrateReport> {
  const spec = formatCrateSpec(crate);
  log.info(`crate: ${spec}, starting patch creation`);

  const pristine = await deps.fetcher.fetch(crate.name, crate.version);
  const workingCopy = deps.staging.workingCopyPath(crate);
  if (!(await deps.staging.hasWorkingCopy(crate))) {
    return {
      crate: spec,
      status: "failed",
      message: `No working copy at ${relativeToWorkspace(deps, workingCopy)}; run crate_patch_apply first`,
    };
  }

  const doc = await generatePatch(pristine, workingCopy, {
    contextSize: deps.config.context,
    exclude: deps.config.exclude,
  });
  if (doc.files.length === 0) {
    log.info(`crate: ${spec}, no changes`);
    return { crate: spec, status: "unchanged", message: "Working copy matches the pristine sources" };
  }

  const patchFile = deps.staging.patchFilePath(crate);
  const rel = relativeToWorkspace(deps, patchFile);
  try {
    await fs.mkdir(path.dirname(patchFile), { recursive: true });
    await fs.writeFile(patchFile, serializePatch(doc), "utf-8");
  } catch (err) {
    throw new StagingError("io_error", patchFile, `Failed to write ${rel}: ${formatOsError(err)}`);
  }

  log.info(`crate: ${spec}, created ${rel}`);
  return {
    crate: spec,
    status: "created",
    message: `${doc.files.length} file(s) changed, written to ${rel}`,
    patchFile: rel,
  };
}

export async function createPatches(names: string[], deps: RunnerDeps): Promise<RunReport> {
  const reports: CrateReport[] = [];
  for (const name of names) {
    const crate = resolveRequest(name, deps.config);
    if (!crate) {
      log.warn(`crate: ${name}, not listed in the crates config`);
      reports.push({ crate: name, status: "failed", message: "Not listed in the crates config" });
      continue;
    }
    reports.push(await runCrate(crate, deps, () => createPatch(crate, deps)));
  }
  return { action: "create", crates: reports };
}

// ============================================================================
// Apply
// ============================================================================

function describePlacements(files: FileOutcome[]): string[] {
  const notes: string[] = [];
  for (const outcome of files) {
    if (outcome.status !== "applied") continue;
    for (const hunk of outcome.hunks) {
      if (hunk.offset === 0 && hunk.fuzz === 0) continue;
      notes.push(`${outcome.path}: hunk #${hunk.hunkIndex + 1} applied at offset ${hunk.offset} with fuzz ${hunk.fuzz}`);
    }
  }
  return notes;
}

async function applyCrate(
  crate: CrateSpec,
  entry: PatchFileEntry | undefined,
  options: ApplyRunOptions,
  deps: RunnerDeps,
): Promise<CrateReport> {
  const spec = formatCrateSpec(crate);
  const workingCopy = deps.staging.workingCopyPath(crate);

  if (!options.force && (await deps.staging.hasWorkingCopy(crate))) {
    const message = `${relativeToWorkspace(deps, workingCopy)} already exists; use force to re-apply`;
    log.info(`crate: ${spec}, skip applying patch, ${message}`);
    return { crate: spec, status: "skipped", message };
  }

  const pristine = await deps.fetcher.fetch(crate.name, crate.version);
  await deps.staging.prepareWorkingCopy(crate, pristine, { force: true });

  if (!entry) {
    return { crate: spec, status: "prepared", message: `Working copy at ${relativeToWorkspace(deps, workingCopy)}` };
  }

  const patchFile = relativeToWorkspace(deps, entry.file);
  log.info(`crate: ${spec}, applying ${patchFile}`);

  let text: string;
  try {
    text = await fs.readFile(entry.file, "utf-8");
  } catch (err) {
    await deps.staging.removeWorkingCopy(crate);
    throw new StagingError("io_error", entry.file, `Failed to read ${patchFile}: ${formatOsError(err)}`);
  }

  try {
    const result = await applyPatch(parsePatch(text), workingCopy, {
      fuzzLevel: options.fuzz ?? deps.config.fuzz,
      maxSearchWindow: deps.config.maxSearchWindow,
    });

    if (!result.committed) {
      await deps.staging.removeWorkingCopy(crate);
      const failed = result.files.filter((outcome) => outcome.status === "failed");
      log.error(`crate: ${spec}, failed to apply ${patchFile} (${failed.length} file(s) rejected)`);
      return {
        crate: spec,
        status: "failed",
        message: `${patchFile} does not apply`,
        patchFile,
        files: result.files,
      };
    }

    for (const note of describePlacements(result.files)) {
      log.warn(`crate: ${spec}, ${note}`);
    }
    log.info(`crate: ${spec}, applied ${patchFile}`);
    return {
      crate: spec,
      status: "applied",
      message: `${result.files.length} file(s) patched`,
      patchFile,
      files: result.files,
    };
  } catch (err) {
    await deps.staging.removeWorkingCopy(crate);
    throw err;
  }
}

export async function applyPatches(options: ApplyRunOptions, deps: RunnerDeps): Promise<RunReport> {
  if (options.force) {
    log.info("Cleaning up working copies");
    for (const dir of await deps.staging.clean()) {
      log.warn(`${relativeToWorkspace(deps, dir)} is in use by another crate-patch run, left in place`);
    }
  }

  const crates = configuredCrates(deps.config);
  const patchFiles = await deps.staging.listPatchFiles();
  const reports: CrateReport[] = [];

  for (const entry of patchFiles) {
    const listed = crates.some((crate) => crate.name === entry.name && crate.version === entry.version);
    if (listed) continue;
    const spec = `${entry.name}@${entry.version}`;
    log.warn(`crate: ${spec}, has a patch file but is not listed in the crates config`);
    reports.push({
      crate: spec,
      status: "skipped",
      message: "Not listed in the crates config",
      patchFile: relativeToWorkspace(deps, entry.file),
    });
  }

  const applied = await Promise.all(
    crates.map((crate) => {
      const entry = patchFiles.find((file) => file.name === crate.name && file.version === crate.version);
      return runCrate(crate, deps, () => applyCrate(crate, entry, options, deps));
    }),
  );

  return { action: "apply", crates: [...reports, ...applied] };
}

// ============================================================================
// Report
// ============================================================================

export function formatRunReport(report: RunReport): string {
  if (report.crates.length === 0) {
    return report.action === "create" ? "No crates requested." : "No crates configured.";
  }

  const counts = new Map<CrateStatus, number>();
  for (const crate of report.crates) {
    counts.set(crate.status, (counts.get(crate.status) ?? 0) + 1);
  }
  const summary = [...counts.entries()].map(([status, count]) => `${count} ${status}`).join(", ");

  const lines = [`crate_patch ${report.action}: ${summary}`];
  for (const crate of report.crates) {
    lines.push(`- ${crate.crate}: ${crate.status}, ${crate.message}`);
    for (const outcome of crate.files ?? []) {
      if (outcome.status === "failed") {
        lines.push(`    ${outcome.path}: ${outcome.error.message}`);
      }
    }
    if (crate.status === "applied" && crate.files) {
      for (const note of describePlacements(crate.files)) {
        lines.push(`    ${note}`);
      }
    }
  }
  return lines.join("\n");
}
