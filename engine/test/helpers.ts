import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export type TreeSpec = Record<string, string | Buffer>;

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeTree(root: string, files: TreeSpec): void {
  for (const [relPath, content] of Object.entries(files)) {
    const absPath = path.join(root, relPath);
    fs.mkdirSync(path.dirname(absPath), { recursive: true });
    fs.writeFileSync(absPath, content);
  }
}

export function readText(root: string, relPath: string): string {
  return fs.readFileSync(path.join(root, relPath), "utf-8");
}

export function isExecutable(root: string, relPath: string): boolean {
  return (fs.statSync(path.join(root, relPath)).mode & 0o111) !== 0;
}
