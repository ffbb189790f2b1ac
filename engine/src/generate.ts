import { buildHunks, DEFAULT_CONTEXT_SIZE } from "./hunks.js";
import { decodeLines, isBinary } from "./lines.js";
import { compareSnapshots, snapshotTree, type TreeWalkOptions } from "./tree-diff.js";
import type { FileChange, FileDiff, LineRecord, PatchDocument, TreeEntry } from "./types.js";

export interface GeneratePatchOptions extends TreeWalkOptions {
  contextSize?: number;
  /** Pair identical added/deleted files into renames. Default: true */
  detectRenames?: boolean;
}

interface RenamePair {
  from: string;
  to: string;
}

/**
 * Each added path, in path order, takes the first unpaired deleted path with
 * the same content hash and mode.
 */
function pairRenames(
  changes: FileChange[],
  pristine: Map<string, TreeEntry>,
  working: Map<string, TreeEntry>,
): RenamePair[] {
  const deleted = changes.filter((change) => change.kind === "deleted").map((change) => change.path);
  const taken = new Set<string>();
  const pairs: RenamePair[] = [];

  for (const change of changes) {
    if (change.kind !== "added") continue;
    const after = working.get(change.path);
    if (!after) continue;
    const from = deleted.find((candidate) => {
      const before = pristine.get(candidate);
      return !taken.has(candidate) && before?.hash === after.hash && before.mode === after.mode;
    });
    if (from === undefined) continue;
    taken.add(from);
    pairs.push({ from, to: change.path });
  }
  return pairs;
}

function linesOf(entry: TreeEntry | undefined): LineRecord[] {
  return entry ? decodeLines(entry.bytes) : [];
}

function toFileDiff(
  change: FileChange,
  before: TreeEntry | undefined,
  after: TreeEntry | undefined,
  contextSize: number,
): FileDiff {
  const diff: FileDiff = { path: change.path, kind: change.kind, hunks: [] };
  if (change.kind === "added") {
    diff.newMode = change.newMode;
  } else if (change.kind === "deleted") {
    diff.oldMode = change.oldMode;
  } else if (change.oldMode !== change.newMode) {
    diff.oldMode = change.oldMode;
    diff.newMode = change.newMode;
  }

  if (change.kind === "mode_changed") {
    return diff;
  }

  if ((before && isBinary(before.bytes)) || (after && isBinary(after.bytes))) {
    diff.binary = {
      oldHash: before?.hash ?? null,
      newHash: after?.hash ?? null,
      content: after?.bytes ?? null,
    };
    return diff;
  }

  diff.hunks = buildHunks(linesOf(before), linesOf(after), contextSize);
  return diff;
}

function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Diff two trees into a patch document ordered by path. */
export async function generatePatch(
  pristineRoot: string,
  workingRoot: string,
  options: GeneratePatchOptions = {},
): Promise<PatchDocument> {
  const walkOptions: TreeWalkOptions = { exclude: options.exclude };
  const pristine = await snapshotTree(pristineRoot, walkOptions);
  const working = await snapshotTree(workingRoot, walkOptions);
  const changes = compareSnapshots(pristine, working);
  const contextSize = options.contextSize ?? DEFAULT_CONTEXT_SIZE;

  const pairs = options.detectRenames === false ? [] : pairRenames(changes, pristine, working);
  const paired = new Set(pairs.flatMap((pair) => [pair.from, pair.to]));

  const files: FileDiff[] = [];
  for (const change of changes) {
    if (paired.has(change.path)) continue;
    files.push(toFileDiff(change, pristine.get(change.path), working.get(change.path), contextSize));
  }
  for (const pair of pairs) {
    files.push({ path: pair.to, kind: "renamed", oldPath: pair.from, hunks: [] });
  }

  files.sort((a, b) => comparePaths(a.path, b.path));
  return { files };
}
