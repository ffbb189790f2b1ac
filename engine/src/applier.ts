/**
 * Hunk applier.
 * Locates a hunk in a (possibly drifted) file and splices it in. Pure: works on
 * line arrays only.
 */

import { linesEqual } from "./lines.js";
import type { NoMatchError } from "./errors.js";
import type { Hunk, LineRecord } from "./types.js";

export const DEFAULT_FUZZ_LEVEL = 2;
export const DEFAULT_MAX_SEARCH_WINDOW = 1000;

export interface ApplyHunkOptions {
  /** Shift of the expected position, e.g. drift from earlier hunks of the same file */
  lineOffset?: number;
  /** Cap on how far either side of the expected position to search */
  maxSearchWindow?: number;
  /** Reported in NoMatch errors */
  hunkIndex?: number;
}

export type HunkApplyResult =
  | {
      ok: true;
      lines: LineRecord[];
      /** Distance from the expected position the hunk was found at */
      offset: number;
      /** Context lines ignored at each end to find it */
      fuzz: number;
    }
  | { ok: false; error: NoMatchError };

interface HunkSides {
  oldSide: LineRecord[];
  newSide: LineRecord[];
  leadingContext: number;
  trailingContext: number;
}

function splitSides(hunk: Hunk): HunkSides {
  const oldSide: LineRecord[] = [];
  const newSide: LineRecord[] = [];
  for (const { sign, line } of hunk.lines) {
    if (sign !== "added") oldSide.push(line);
    if (sign !== "removed") newSide.push(line);
  }

  let leadingContext = 0;
  while (leadingContext < hunk.lines.length && hunk.lines[leadingContext].sign === "context") {
    leadingContext += 1;
  }
  let trailingContext = 0;
  while (
    trailingContext < hunk.lines.length - leadingContext &&
    hunk.lines[hunk.lines.length - 1 - trailingContext].sign === "context"
  ) {
    trailingContext += 1;
  }

  return { oldSide, newSide, leadingContext, trailingContext };
}

function matchesAt(fileLines: readonly LineRecord[], pattern: readonly LineRecord[], at: number): boolean {
  if (at < 0 || at + pattern.length > fileLines.length) return false;
  for (let i = 0; i < pattern.length; i += 1) {
    if (!linesEqual(fileLines[at + i], pattern[i])) return false;
  }
  return true;
}

/** Offsets 0, -1, +1, -2, +2, ... up to window. */
function* searchOffsets(window: number): Generator<number> {
  yield 0;
  for (let distance = 1; distance <= window; distance += 1) {
    yield -distance;
    yield distance;
  }
}

function bestEffortOffset(
  fileLines: readonly LineRecord[],
  pattern: readonly LineRecord[],
  expected: number,
  window: number,
): number {
  let bestOffset = 0;
  let bestScore = -1;
  for (const offset of searchOffsets(window)) {
    const at = expected + offset;
    if (at < 0 || at > fileLines.length) continue;
    let score = 0;
    for (let i = 0; i < pattern.length && at + i < fileLines.length; i += 1) {
      if (linesEqual(fileLines[at + i], pattern[i])) score += 1;
    }
    if (score > bestScore) {
      bestScore = score;
      bestOffset = offset;
    }
  }
  return bestOffset;
}

export function searchWindowFor(fileLength: number, maxSearchWindow: number = DEFAULT_MAX_SEARCH_WINDOW): number {
  return Math.max(0, Math.min(fileLength, maxSearchWindow));
}

/**
 * Apply one hunk to fileLines.
 *
 * Fuzz level f ignores up to f lines of leading and trailing context. Every
 * offset in the window is tried at fuzz 0 before any fuzz is used, and at a
 * given fuzz the nearest offset wins, the earlier one on ties.
 */
export function applyHunk(
  fileLines: readonly LineRecord[],
  hunk: Hunk,
  fuzzLevel: number = DEFAULT_FUZZ_LEVEL,
  options: ApplyHunkOptions = {},
): HunkApplyResult {
  const { oldSide, newSide, leadingContext, trailingContext } = splitSides(hunk);
  const anchor = hunk.oldLen > 0 ? hunk.oldStart - 1 : hunk.oldStart;
  const expected = anchor + (options.lineOffset ?? 0);
  const window = searchWindowFor(fileLines.length, options.maxSearchWindow);
  const maxFuzz = Math.max(0, Math.floor(fuzzLevel));

  for (let fuzz = 0; fuzz <= maxFuzz; fuzz += 1) {
    const front = Math.min(fuzz, leadingContext);
    const back = Math.min(fuzz, trailingContext);
    if (fuzz > 0 && front === 0 && back === 0) break;
    // Trimming everything leaves nothing to anchor on
    if (fuzz > 0 && front + back >= oldSide.length) break;

    const pattern = oldSide.slice(front, oldSide.length - back);
    const replacement = newSide.slice(front, newSide.length - back);

    for (const offset of searchOffsets(window)) {
      const at = expected + offset + front;
      if (!matchesAt(fileLines, pattern, at)) continue;
      return {
        ok: true,
        lines: [...fileLines.slice(0, at), ...replacement, ...fileLines.slice(at + pattern.length)],
        offset,
        fuzz,
      };
    }
  }

  const hunkIndex = options.hunkIndex ?? 0;
  const bestOffset = bestEffortOffset(fileLines, oldSide, expected, window);
  return {
    ok: false,
    error: {
      kind: "no_match",
      hunkIndex,
      bestOffset,
      message: `Hunk #${hunkIndex + 1} (@@ -${hunk.oldStart},${hunk.oldLen} +${hunk.newStart},${hunk.newLen} @@) does not match; closest offset ${bestOffset}`,
    },
  };
}
