/**
 * Engine error types.
 *
 * Fatal conditions (unreadable trees, malformed patch text) are thrown as
 * PatchEngineError subclasses. Per-hunk and per-file apply failures are plain
 * values carried inside results so the orchestrator can decide on commit.
 */

export type PatchEngineErrorKind = "io_error" | "malformed_patch";

export class PatchEngineError extends Error {
  readonly kind: PatchEngineErrorKind;

  constructor(kind: PatchEngineErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = new.target.name;
  }
}

export class IoError extends PatchEngineError {
  readonly path: string;

  constructor(path: string, message: string) {
    super("io_error", `${message}: ${path}`);
    this.path = path;
  }

  static from(path: string, err: unknown): IoError {
    return new IoError(path, formatOsError(err));
  }
}

export class PatchParseError extends PatchEngineError {
  /** Byte offset of the offending line in the patch text */
  readonly offset: number;
  readonly path?: string;

  constructor(message: string, offset: number, path?: string) {
    const where = path ? ` (${path}, byte ${offset})` : ` (byte ${offset})`;
    super("malformed_patch", `${message}${where}`);
    this.offset = offset;
    this.path = path;
  }
}

// ============================================================================
// Apply-time error values
// ============================================================================

export interface NoMatchError {
  kind: "no_match";
  hunkIndex: number;
  /** Offset from the expected position that matched the most lines */
  bestOffset: number;
  message: string;
}

export interface BinaryConflictError {
  kind: "binary_conflict";
  expectedHash: string | null;
  actualHash: string | null;
  message: string;
}

export interface IoErrorValue {
  kind: "io_error";
  message: string;
}

export type ApplyError = NoMatchError | BinaryConflictError | IoErrorValue;

export function formatOsError(err: unknown): string {
  if (err && typeof err === "object" && "code" in err) {
    const code = String(err.code);
    if (code === "ENOENT") {
      return "No such file or directory";
    }
    if (code === "EACCES") {
      return "Permission denied";
    }
    if (code === "EISDIR") {
      return "Is a directory";
    }
    if (code === "ENOTDIR") {
      return "Not a directory";
    }
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
