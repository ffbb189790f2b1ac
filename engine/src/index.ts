export * from "./types.js";
export * from "./errors.js";
export { splitLines, joinLines, decodeLines, isBinary, lineKey, linesEqual } from "./lines.js";
export { snapshotTree, compareSnapshots, diffTrees, hashBytes, DEFAULT_EXCLUDE } from "./tree-diff.js";
export type { TreeWalkOptions } from "./tree-diff.js";
export { buildHunks, diffLines, DEFAULT_CONTEXT_SIZE } from "./hunks.js";
export type { Edit, EditKind } from "./hunks.js";
export { serializePatch, parsePatch } from "./codec.js";
export { applyHunk, searchWindowFor, DEFAULT_FUZZ_LEVEL, DEFAULT_MAX_SEARCH_WINDOW } from "./applier.js";
export type { ApplyHunkOptions, HunkApplyResult } from "./applier.js";
export { applyPatch } from "./orchestrator.js";
export type { ApplyPatchOptions, ApplyResult, FileOutcome, HunkPlacement } from "./orchestrator.js";
export { generatePatch } from "./generate.js";
export type { GeneratePatchOptions } from "./generate.js";
