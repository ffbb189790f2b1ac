/**
 * Shared types for the patch engine.
 */

// ============================================================================
// Lines
// ============================================================================

export type LineTerminator = "" | "\n" | "\r\n";

export interface LineRecord {
  content: string;
  /** "" only on the last line of a file without a final newline */
  terminator: LineTerminator;
}

// ============================================================================
// Tree changes
// ============================================================================

/** git mode strings: regular file, executable, symbolic link */
export type FileMode = "100644" | "100755" | "120000";

export type ChangeKind = "added" | "deleted" | "modified" | "mode_changed";

export interface FileChange {
  readonly path: string;
  readonly kind: ChangeKind;
  readonly oldMode?: FileMode;
  readonly newMode?: FileMode;
}

export interface TreeEntry {
  mode: FileMode;
  bytes: Buffer;
  hash: string;
}

// ============================================================================
// Hunks and documents
// ============================================================================

export type HunkLineSign = "context" | "removed" | "added";

export interface HunkLine {
  sign: HunkLineSign;
  line: LineRecord;
}

export interface Hunk {
  /** 1-based; when oldLen is 0, the line before the insertion point */
  oldStart: number;
  oldLen: number;
  newStart: number;
  newLen: number;
  lines: HunkLine[];
}

export interface BinaryPayload {
  /** sha256 hex, null when the file does not exist before the change */
  oldHash: string | null;
  newHash: string | null;
  /** Bytes after the change, null for deletions */
  content: Buffer | null;
}

export type FileDiffKind = ChangeKind | "renamed";

export interface FileDiff {
  path: string;
  kind: FileDiffKind;
  oldMode?: FileMode;
  newMode?: FileMode;
  hunks: Hunk[];
  /** Source path of a rename */
  oldPath?: string;
  binary?: BinaryPayload;
}

export interface PatchDocument {
  files: FileDiff[];
}
