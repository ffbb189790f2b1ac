/**
 * Hunk builder.
 * Myers shortest-edit-script line diff grouped into unified-diff hunks.
 */

import { lineKey } from "./lines.js";
import type { Hunk, HunkLine, LineRecord } from "./types.js";

export const DEFAULT_CONTEXT_SIZE = 3;

export type EditKind = "equal" | "removed" | "added";

export interface Edit {
  kind: EditKind;
  /** Index into the old lines; for additions, the old line that follows */
  oldIndex: number;
  /** Index into the new lines; for removals, the new line that follows */
  newIndex: number;
}

/**
 * Mark removed/added lines of a[aStart, aEnd) against b[bStart, bEnd).
 * Forward greedy Myers with a per-round snapshot of the diagonal frontier,
 * walked back from the end to recover the path.
 */
function markChanges(
  a: string[],
  aStart: number,
  aEnd: number,
  b: string[],
  bStart: number,
  bEnd: number,
  removed: boolean[],
  added: boolean[],
): void {
  const n = aEnd - aStart;
  const m = bEnd - bStart;
  if (n === 0) {
    for (let j = bStart; j < bEnd; j += 1) added[j] = true;
    return;
  }
  if (m === 0) {
    for (let i = aStart; i < aEnd; i += 1) removed[i] = true;
    return;
  }

  const max = n + m;
  const offset = max + 1;
  const v = new Int32Array(2 * max + 3);
  // trace[d] holds v[k] for k in [-d-1, d+1] as it was before round d
  const trace: Int32Array[] = [];

  let found = false;
  for (let d = 0; d <= max && !found; d += 1) {
    trace.push(v.slice(offset - d - 1, offset + d + 2));
    for (let k = -d; k <= d; k += 2) {
      let x: number;
      if (k === -d || (k !== d && v[offset + k - 1] < v[offset + k + 1])) {
        x = v[offset + k + 1];
      } else {
        x = v[offset + k - 1] + 1;
      }
      let y = x - k;
      while (x < n && y < m && a[aStart + x] === b[bStart + y]) {
        x += 1;
        y += 1;
      }
      v[offset + k] = x;
      if (x >= n && y >= m) {
        found = true;
        break;
      }
    }
  }

  let x = n;
  let y = m;
  for (let d = trace.length - 1; d > 0; d -= 1) {
    const snapshot = trace[d];
    const at = (k: number): number => snapshot[k + d + 1];
    const k = x - y;
    const prevK = k === -d || (k !== d && at(k - 1) < at(k + 1)) ? k + 1 : k - 1;
    const prevX = at(prevK);
    const prevY = prevX - prevK;
    while (x > prevX && y > prevY) {
      x -= 1;
      y -= 1;
    }
    if (prevK === k + 1) {
      added[bStart + prevY] = true;
    } else {
      removed[aStart + prevX] = true;
    }
    x = prevX;
    y = prevY;
  }
}

/**
 * Slide every run of changed lines towards the start of the file while the
 * line before the run equals the run's last line. The unchanged lines keep the
 * same contents in the same order, so the pairing with the other side holds.
 */
function slideUp(changed: boolean[], keys: string[]): void {
  let i = 0;
  while (i < changed.length) {
    if (!changed[i]) {
      i += 1;
      continue;
    }
    let start = i;
    let end = i;
    while (end < changed.length && changed[end]) end += 1;

    while (start > 0 && !changed[start - 1] && keys[start - 1] === keys[end - 1]) {
      changed[start - 1] = true;
      changed[end - 1] = false;
      start -= 1;
      end -= 1;
      while (start > 0 && changed[start - 1]) start -= 1;
    }
    i = end + 1;
  }
}

export function diffLines(oldLines: readonly LineRecord[], newLines: readonly LineRecord[]): Edit[] {
  const a = oldLines.map(lineKey);
  const b = newLines.map(lineKey);
  const removed = new Array<boolean>(a.length).fill(false);
  const added = new Array<boolean>(b.length).fill(false);

  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix += 1;
  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix += 1;
  }

  markChanges(a, prefix, a.length - suffix, b, prefix, b.length - suffix, removed, added);
  slideUp(removed, a);
  slideUp(added, b);

  const edits: Edit[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length || j < b.length) {
    if (i < a.length && removed[i]) {
      edits.push({ kind: "removed", oldIndex: i, newIndex: j });
      i += 1;
    } else if (j < b.length && added[j]) {
      edits.push({ kind: "added", oldIndex: i, newIndex: j });
      j += 1;
    } else {
      edits.push({ kind: "equal", oldIndex: i, newIndex: j });
      i += 1;
      j += 1;
    }
  }
  return edits;
}

function toHunk(
  edits: Edit[],
  start: number,
  end: number,
  oldLines: readonly LineRecord[],
  newLines: readonly LineRecord[],
): Hunk {
  const lines: HunkLine[] = [];
  let oldLen = 0;
  let newLen = 0;
  for (let idx = start; idx < end; idx += 1) {
    const edit = edits[idx];
    if (edit.kind === "equal") {
      lines.push({ sign: "context", line: oldLines[edit.oldIndex] });
      oldLen += 1;
      newLen += 1;
    } else if (edit.kind === "removed") {
      lines.push({ sign: "removed", line: oldLines[edit.oldIndex] });
      oldLen += 1;
    } else {
      lines.push({ sign: "added", line: newLines[edit.newIndex] });
      newLen += 1;
    }
  }
  const first = edits[start];
  return {
    oldStart: oldLen > 0 ? first.oldIndex + 1 : first.oldIndex,
    oldLen,
    newStart: newLen > 0 ? first.newIndex + 1 : first.newIndex,
    newLen,
    lines,
  };
}

export function buildHunks(
  oldLines: readonly LineRecord[],
  newLines: readonly LineRecord[],
  contextSize: number = DEFAULT_CONTEXT_SIZE,
): Hunk[] {
  const context = Math.max(0, Math.floor(contextSize));
  const edits = diffLines(oldLines, newLines);
  const hunks: Hunk[] = [];

  let idx = 0;
  while (idx < edits.length) {
    if (edits[idx].kind === "equal") {
      idx += 1;
      continue;
    }

    const start = Math.max(0, idx - context);
    let end = idx;
    for (;;) {
      while (end < edits.length && edits[end].kind !== "equal") end += 1;
      let run = 0;
      while (end + run < edits.length && edits[end + run].kind === "equal") run += 1;
      // Gaps of up to two context regions are folded into one hunk
      if (end + run < edits.length && run <= 2 * context) {
        end += run;
        continue;
      }
      end += Math.min(run, context);
      break;
    }

    hunks.push(toHunk(edits, start, end, oldLines, newLines));
    idx = end;
  }

  return hunks;
}
