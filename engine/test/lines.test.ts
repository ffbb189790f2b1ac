import { describe, it, expect } from "vitest";
import { decodeLines, isBinary, joinLines, lineKey, linesEqual, splitLines } from "../src/lines.js";

describe("splitLines", () => {
  it("returns no records for empty text", () => {
    expect(splitLines("")).toEqual([]);
  });

  it("keeps each line's terminator", () => {
    expect(splitLines("a\nb\r\nc")).toEqual([
      { content: "a", terminator: "\n" },
      { content: "b", terminator: "\r\n" },
      { content: "c", terminator: "" },
    ]);
  });

  it("treats a lone carriage return as content", () => {
    expect(splitLines("a\rb\n")).toEqual([{ content: "a\rb", terminator: "\n" }]);
  });

  it("reports an empty line as its own record", () => {
    expect(splitLines("\n\n")).toEqual([
      { content: "", terminator: "\n" },
      { content: "", terminator: "\n" },
    ]);
  });

  it("round-trips through joinLines", () => {
    const text = "fn main() {\r\n    println!();\n}\n\nlast";
    expect(joinLines(splitLines(text))).toBe(text);
  });
});

describe("line comparison", () => {
  it("distinguishes lines by terminator", () => {
    const lf = { content: "x", terminator: "\n" } as const;
    const crlf = { content: "x", terminator: "\r\n" } as const;
    expect(linesEqual(lf, crlf)).toBe(false);
    expect(lineKey(lf)).not.toBe(lineKey(crlf));
  });
});

describe("isBinary", () => {
  it("flags NUL bytes", () => {
    expect(isBinary(Buffer.from([0x61, 0x00, 0x62]))).toBe(true);
  });

  it("flags invalid UTF-8", () => {
    expect(isBinary(Buffer.from([0xff, 0xfe, 0x41]))).toBe(true);
  });

  it("accepts UTF-8 text", () => {
    expect(isBinary(Buffer.from("héllo wörld\n", "utf-8"))).toBe(false);
  });
});

describe("decodeLines", () => {
  it("keeps a byte order mark as content", () => {
    const records = decodeLines(Buffer.from("\uFEFFa\n", "utf-8"));
    expect(records).toEqual([{ content: "\uFEFFa", terminator: "\n" }]);
  });
});
