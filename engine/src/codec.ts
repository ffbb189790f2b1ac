/**
 * Patch codec.
 * Serializes a PatchDocument to git-style unified diff text and parses it back.
 */

import { PatchParseError } from "./errors.js";
import type {
  BinaryPayload,
  FileDiff,
  FileDiffKind,
  FileMode,
  Hunk,
  HunkLine,
  LineRecord,
  PatchDocument,
} from "./types.js";

const DIFF_HEADER = "diff --git ";
const DEV_NULL = "/dev/null";
const NO_NEWLINE_MARKER = "\\ No newline at end of file";
const BASE64_LINE_LENGTH = 76;
const HUNK_HEADER_RE = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;
const FILE_MODES: readonly FileMode[] = ["100644", "100755", "120000"];

// ============================================================================
// Serialize
// ============================================================================

const SIGN_PREFIX: Record<HunkLine["sign"], string> = {
  context: " ",
  removed: "-",
  added: "+",
};

function serializeHunk(hunk: Hunk): string {
  let out = `@@ -${hunk.oldStart},${hunk.oldLen} +${hunk.newStart},${hunk.newLen} @@\n`;
  for (const { sign, line } of hunk.lines) {
    out += SIGN_PREFIX[sign] + line.content;
    if (line.terminator === "") {
      out += `\n${NO_NEWLINE_MARKER}\n`;
    } else {
      out += line.terminator;
    }
  }
  return out;
}

function serializeBinary(binary: BinaryPayload): string {
  let out = `binary ${binary.oldHash ?? "-"} ${binary.newHash ?? "-"}\n`;
  if (binary.content) {
    out += `literal ${binary.content.length}\n`;
    const encoded = binary.content.toString("base64");
    for (let i = 0; i < encoded.length; i += BASE64_LINE_LENGTH) {
      out += `${encoded.slice(i, i + BASE64_LINE_LENGTH)}\n`;
    }
  }
  return out;
}

function serializeFile(file: FileDiff): string {
  const oldPath = file.kind === "renamed" && file.oldPath ? file.oldPath : file.path;
  const header: string[] = [`${DIFF_HEADER}a/${oldPath} b/${file.path}`];

  if (file.kind === "added") {
    header.push(`new file mode ${file.newMode ?? "100644"}`);
  } else if (file.kind === "deleted") {
    header.push(`deleted file mode ${file.oldMode ?? "100644"}`);
  } else if (file.oldMode && file.newMode && file.oldMode !== file.newMode) {
    header.push(`old mode ${file.oldMode}`, `new mode ${file.newMode}`);
  }

  if (file.kind === "renamed") {
    header.push("similarity index 100%", `rename from ${oldPath}`, `rename to ${file.path}`);
  }

  let out = `${header.join("\n")}\n`;

  if (file.binary) {
    return out + serializeBinary(file.binary);
  }

  if (file.hunks.length > 0) {
    out += `--- ${file.kind === "added" ? DEV_NULL : `a/${oldPath}`}\n`;
    out += `+++ ${file.kind === "deleted" ? DEV_NULL : `b/${file.path}`}\n`;
    for (const hunk of file.hunks) {
      out += serializeHunk(hunk);
    }
  }
  return out;
}

export function serializePatch(doc: PatchDocument): string {
  return doc.files.map(serializeFile).join("");
}

// ============================================================================
// Parse
// ============================================================================

interface RawLine {
  text: string;
  /** Byte offset of the line start */
  offset: number;
}

interface FileHeader {
  gitOld?: string;
  gitNew?: string;
  oldMode?: FileMode;
  newMode?: FileMode;
  newFileMode?: FileMode;
  deletedFileMode?: FileMode;
  renameFrom?: string;
  renameTo?: string;
  minusPath?: string | null;
  plusPath?: string | null;
  binary?: BinaryPayload;
}

function splitRaw(text: string): RawLine[] {
  const parts = text.split("\n");
  if (parts.length > 0 && parts[parts.length - 1] === "") {
    parts.pop();
  }
  const lines: RawLine[] = [];
  let offset = 0;
  for (const part of parts) {
    lines.push({ text: part, offset });
    offset += Buffer.byteLength(part, "utf-8") + 1;
  }
  return lines;
}

/** Header lines tolerate a patch whose line endings were converted to CRLF. */
function headerText(line: RawLine): string {
  return line.text.endsWith("\r") ? line.text.slice(0, -1) : line.text;
}

function parseGitPaths(rest: string): { oldPath: string; newPath: string } | undefined {
  if (!rest.startsWith("a/")) return undefined;
  const half = (rest.length - 5) / 2;
  if (Number.isInteger(half) && half > 0) {
    const oldPath = rest.slice(2, 2 + half);
    if (rest.slice(2 + half, 5 + half) === " b/" && rest.slice(5 + half) === oldPath) {
      return { oldPath, newPath: oldPath };
    }
  }
  const split = rest.indexOf(" b/");
  if (split === -1) return undefined;
  return { oldPath: rest.slice(2, split), newPath: rest.slice(split + 3) };
}

function parseMode(value: string, line: RawLine, path?: string): FileMode {
  const mode = FILE_MODES.find((candidate) => candidate === value.trim());
  if (!mode) {
    throw new PatchParseError(`Unsupported file mode '${value}'`, line.offset, path);
  }
  return mode;
}

/** "a/x", "b/x" or /dev/null; anything after a tab is a timestamp. */
function parsePathLine(value: string): string | null {
  const withoutStamp = value.split("\t")[0];
  if (withoutStamp === DEV_NULL) return null;
  if (withoutStamp.startsWith("a/") || withoutStamp.startsWith("b/")) {
    return withoutStamp.slice(2);
  }
  return withoutStamp;
}

function parseHash(value: string): string | null {
  return value === "-" ? null : value;
}

function parseBinary(
  lines: RawLine[],
  index: number,
  path: string | undefined,
): { binary: BinaryPayload; next: number } {
  const line = lines[index];
  const fields = headerText(line).split(" ");
  if (fields.length !== 3) {
    throw new PatchParseError(`Malformed binary header '${headerText(line)}'`, line.offset, path);
  }
  const binary: BinaryPayload = {
    oldHash: parseHash(fields[1]),
    newHash: parseHash(fields[2]),
    content: null,
  };

  let next = index + 1;
  if (next < lines.length && headerText(lines[next]).startsWith("literal ")) {
    const literalLine = lines[next];
    const size = Number(headerText(literalLine).slice("literal ".length));
    if (!Number.isInteger(size) || size < 0) {
      throw new PatchParseError(`Malformed literal size '${headerText(literalLine)}'`, literalLine.offset, path);
    }
    next += 1;
    let encoded = "";
    while (next < lines.length && BASE64_RE.test(headerText(lines[next]))) {
      encoded += headerText(lines[next]);
      next += 1;
    }
    const content = Buffer.from(encoded, "base64");
    if (content.length !== size) {
      throw new PatchParseError(
        `Binary literal decodes to ${content.length} bytes, expected ${size}`,
        literalLine.offset,
        path,
      );
    }
    binary.content = content;
  }

  if (binary.newHash !== null && binary.content === null) {
    throw new PatchParseError("Binary patch is missing its literal", line.offset, path);
  }
  return { binary, next };
}

function toLineRecord(body: string): LineRecord {
  if (body.endsWith("\r")) {
    return { content: body.slice(0, -1), terminator: "\r\n" };
  }
  return { content: body, terminator: "\n" };
}

function markNoNewline(lines: HunkLine[], marker: RawLine, path: string): void {
  const last = lines[lines.length - 1];
  if (!last) {
    throw new PatchParseError("No-newline marker without a preceding line", marker.offset, path);
  }
  const restored = last.line.terminator === "\r\n" ? `${last.line.content}\r` : last.line.content;
  last.line = { content: restored, terminator: "" };
}

function parseHunk(lines: RawLine[], index: number, path: string): { hunk: Hunk; next: number } {
  const headerLine = lines[index];
  const match = HUNK_HEADER_RE.exec(headerText(headerLine));
  if (!match) {
    throw new PatchParseError(`Malformed hunk header '${headerText(headerLine)}'`, headerLine.offset, path);
  }

  const hunk: Hunk = {
    oldStart: Number(match[1]),
    oldLen: match[2] === undefined ? 1 : Number(match[2]),
    newStart: Number(match[3]),
    newLen: match[4] === undefined ? 1 : Number(match[4]),
    lines: [],
  };

  let remainingOld = hunk.oldLen;
  let remainingNew = hunk.newLen;
  let next = index + 1;

  const mismatch = (line: RawLine): PatchParseError =>
    new PatchParseError(
      `Hunk body does not match its header -${hunk.oldStart},${hunk.oldLen} +${hunk.newStart},${hunk.newLen}`,
      line.offset,
      path,
    );

  while (remainingOld > 0 || remainingNew > 0) {
    if (next >= lines.length) {
      throw mismatch(lines[lines.length - 1]);
    }
    const line = lines[next];
    const raw = line.text;

    if (raw.startsWith("\\")) {
      markNoNewline(hunk.lines, line, path);
      next += 1;
      continue;
    }

    // An empty line is a context line whose leading space was stripped
    const prefix = raw === "" ? " " : raw[0];
    const record = toLineRecord(raw.slice(1));
    if (prefix === " " && remainingOld > 0 && remainingNew > 0) {
      hunk.lines.push({ sign: "context", line: record });
      remainingOld -= 1;
      remainingNew -= 1;
    } else if (prefix === "-" && remainingOld > 0) {
      hunk.lines.push({ sign: "removed", line: record });
      remainingOld -= 1;
    } else if (prefix === "+" && remainingNew > 0) {
      hunk.lines.push({ sign: "added", line: record });
      remainingNew -= 1;
    } else {
      throw mismatch(line);
    }
    next += 1;
  }

  if (next < lines.length && lines[next].text.startsWith("\\")) {
    markNoNewline(hunk.lines, lines[next], path);
    next += 1;
  }

  return { hunk, next };
}

function resolveKind(header: FileHeader, hunkCount: number): FileDiffKind {
  if (header.newFileMode) return "added";
  if (header.deletedFileMode) return "deleted";
  if (header.renameFrom !== undefined || header.renameTo !== undefined) return "renamed";
  if (hunkCount === 0 && !header.binary && header.oldMode && header.newMode) return "mode_changed";
  return "modified";
}

function parseFileBlock(lines: RawLine[], index: number): { file: FileDiff; next: number } {
  const first = lines[index];
  const header: FileHeader = {};
  const gitPaths = parseGitPaths(headerText(first).slice(DIFF_HEADER.length));
  header.gitOld = gitPaths?.oldPath;
  header.gitNew = gitPaths?.newPath;

  let next = index + 1;
  while (next < lines.length) {
    const line = lines[next];
    const text = headerText(line);
    const knownPath = header.gitNew;

    if (text.startsWith("old mode ")) {
      header.oldMode = parseMode(text.slice("old mode ".length), line, knownPath);
    } else if (text.startsWith("new mode ")) {
      header.newMode = parseMode(text.slice("new mode ".length), line, knownPath);
    } else if (text.startsWith("new file mode ")) {
      header.newFileMode = parseMode(text.slice("new file mode ".length), line, knownPath);
    } else if (text.startsWith("deleted file mode ")) {
      header.deletedFileMode = parseMode(text.slice("deleted file mode ".length), line, knownPath);
    } else if (text.startsWith("rename from ")) {
      header.renameFrom = text.slice("rename from ".length);
    } else if (text.startsWith("rename to ")) {
      header.renameTo = text.slice("rename to ".length);
    } else if (
      text.startsWith("similarity index ") ||
      text.startsWith("dissimilarity index ") ||
      text.startsWith("index ")
    ) {
      // informational only
    } else if (text.startsWith("--- ")) {
      header.minusPath = parsePathLine(text.slice(4));
    } else if (text.startsWith("+++ ")) {
      header.plusPath = parsePathLine(text.slice(4));
    } else if (text.startsWith("binary ")) {
      const parsed = parseBinary(lines, next, knownPath);
      header.binary = parsed.binary;
      next = parsed.next;
      break;
    } else {
      break;
    }
    next += 1;
  }

  const path = header.renameTo ?? header.plusPath ?? header.gitNew ?? header.minusPath ?? undefined;
  const oldPath = header.renameFrom ?? header.minusPath ?? header.gitOld ?? path;
  if (!path) {
    throw new PatchParseError("File diff has no path", first.offset);
  }

  const hunks: Hunk[] = [];
  while (next < lines.length && lines[next].text.startsWith("@@")) {
    const parsed = parseHunk(lines, next, path);
    hunks.push(parsed.hunk);
    next = parsed.next;
  }

  const kind = resolveKind(header, hunks.length);
  const file: FileDiff = { path, kind, hunks };
  if (kind === "added") {
    file.newMode = header.newFileMode;
  } else if (kind === "deleted") {
    file.oldMode = header.deletedFileMode;
  } else if (header.oldMode && header.newMode) {
    file.oldMode = header.oldMode;
    file.newMode = header.newMode;
  }
  if (kind === "renamed" && oldPath) {
    file.oldPath = oldPath;
  }
  if (header.binary) {
    file.binary = header.binary;
  }
  return { file, next };
}

export function parsePatch(text: string): PatchDocument {
  const lines = splitRaw(text);
  const files: FileDiff[] = [];

  let index = 0;
  while (index < lines.length) {
    const line = lines[index];
    if (headerText(line).trim() === "") {
      index += 1;
      continue;
    }
    if (!headerText(line).startsWith(DIFF_HEADER)) {
      const last = files[files.length - 1];
      const message = last
        ? `Unexpected content after the diff for ${last.path}: '${headerText(line)}'`
        : `Unrecognized header '${headerText(line)}'`;
      throw new PatchParseError(message, line.offset, last?.path);
    }
    const parsed = parseFileBlock(lines, index);
    files.push(parsed.file);
    index = parsed.next;
  }

  return { files };
}
