import type { LineRecord } from "./types.js";

const BINARY_SNIFF_BYTES = 8000;

export function splitLines(text: string): LineRecord[] {
  if (text === "") return [];

  const records: LineRecord[] = [];
  let start = 0;
  while (start < text.length) {
    const newline = text.indexOf("\n", start);
    if (newline === -1) {
      records.push({ content: text.slice(start), terminator: "" });
      break;
    }
    if (newline > start && text[newline - 1] === "\r") {
      records.push({ content: text.slice(start, newline - 1), terminator: "\r\n" });
    } else {
      records.push({ content: text.slice(start, newline), terminator: "\n" });
    }
    start = newline + 1;
  }
  return records;
}

export function joinLines(records: readonly LineRecord[]): string {
  let out = "";
  for (const record of records) {
    out += record.content + record.terminator;
  }
  return out;
}

/** Lines that differ only in their terminator compare unequal. */
export function lineKey(record: LineRecord): string {
  return record.content + record.terminator;
}

export function linesEqual(a: LineRecord, b: LineRecord): boolean {
  return a.content === b.content && a.terminator === b.terminator;
}

/**
 * NUL in the first 8000 bytes (git's heuristic), or bytes that are not valid
 * UTF-8 and so could not survive a decode/encode cycle.
 */
export function isBinary(bytes: Uint8Array): boolean {
  const limit = Math.min(bytes.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i += 1) {
    if (bytes[i] === 0) return true;
  }
  try {
    new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    return true;
  }
  return false;
}

export function decodeLines(bytes: Uint8Array): LineRecord[] {
  return splitLines(new TextDecoder("utf-8", { ignoreBOM: true }).decode(bytes));
}
