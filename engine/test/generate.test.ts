import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { generatePatch } from "../src/generate.js";
import { hashBytes } from "../src/tree-diff.js";
import { makeTempDir, writeTree } from "./helpers.js";

describe("generatePatch", () => {
  let tmpDir: string;
  let pristine: string;
  let working: string;

  beforeEach(() => {
    tmpDir = makeTempDir("generate-patch-");
    pristine = path.join(tmpDir, "pristine");
    working = path.join(tmpDir, "working");
    fs.mkdirSync(pristine);
    fs.mkdirSync(working);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns an empty document for identical trees", async () => {
    writeTree(pristine, { "Cargo.toml": "[package]\n" });
    writeTree(working, { "Cargo.toml": "[package]\n" });
    expect(await generatePatch(pristine, working)).toEqual({ files: [] });
  });

  it("describes each kind of change in path order", async () => {
    writeTree(pristine, {
      "build.sh": "echo hi\n",
      "data.bin": Buffer.from([0, 1, 2]),
      "docs/a.md": "moved\n",
      "src/lib.rs": "a\nb\nc\n",
      "src/old.rs": "old\n",
    });
    writeTree(working, {
      "build.sh": "echo hi\n",
      "data.bin": Buffer.from([0, 1, 3]),
      "docs/b.md": "moved\n",
      "src/lib.rs": "a\nB\nc\n",
      "src/new.rs": "new\n",
    });
    fs.chmodSync(path.join(working, "build.sh"), 0o755);

    const doc = await generatePatch(pristine, working);

    expect(doc.files.map((file) => [file.path, file.kind])).toEqual([
      ["build.sh", "mode_changed"],
      ["data.bin", "modified"],
      ["docs/b.md", "renamed"],
      ["src/lib.rs", "modified"],
      ["src/new.rs", "added"],
      ["src/old.rs", "deleted"],
    ]);
    expect(doc.files[0]).toEqual({
      path: "build.sh",
      kind: "mode_changed",
      oldMode: "100644",
      newMode: "100755",
      hunks: [],
    });
    expect(doc.files[1].binary).toEqual({
      oldHash: hashBytes(Buffer.from([0, 1, 2])),
      newHash: hashBytes(Buffer.from([0, 1, 3])),
      content: Buffer.from([0, 1, 3]),
    });
    expect(doc.files[2]).toEqual({ path: "docs/b.md", kind: "renamed", oldPath: "docs/a.md", hunks: [] });
    expect(doc.files[4].newMode).toBe("100644");
    expect(doc.files[4].hunks[0].lines).toEqual([{ sign: "added", line: { content: "new", terminator: "\n" } }]);
    expect(doc.files[5].oldMode).toBe("100644");
  });

  it("keeps additions and deletions apart without rename detection", async () => {
    writeTree(pristine, { "a.txt": "same\n" });
    writeTree(working, { "b.txt": "same\n" });

    const doc = await generatePatch(pristine, working, { detectRenames: false });
    expect(doc.files.map((file) => [file.path, file.kind])).toEqual([
      ["a.txt", "deleted"],
      ["b.txt", "added"],
    ]);
  });

  it("pairs each duplicate with its own source", async () => {
    writeTree(pristine, { "a1.txt": "dup\n", "a2.txt": "dup\n" });
    writeTree(working, { "b1.txt": "dup\n", "b2.txt": "dup\n" });

    const doc = await generatePatch(pristine, working);
    expect(doc.files.map((file) => [file.oldPath, file.path])).toEqual([
      ["a1.txt", "b1.txt"],
      ["a2.txt", "b2.txt"],
    ]);
  });

  it("honours the context size", async () => {
    const numbered = Array.from({ length: 9 }, (_, i) => `${i + 1}\n`);
    writeTree(pristine, { "f.txt": numbered.join("") });
    writeTree(working, { "f.txt": numbered.map((line) => (line === "5\n" ? "five\n" : line)).join("") });

    const doc = await generatePatch(pristine, working, { contextSize: 1 });
    const [hunk] = doc.files[0].hunks;
    expect([hunk.oldStart, hunk.oldLen, hunk.newStart, hunk.newLen]).toEqual([4, 3, 4, 3]);
  });
});
