import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG } from "../src/config.js";
import { FetchError, type CrateFetcher } from "../src/fetcher.js";
import { applyPatches, createPatches, formatRunReport, type RunnerDeps } from "../src/runner.js";
import { StagingManager } from "../src/staging.js";

const LIB_PATCH = [
  "diff --git a/src/lib.rs b/src/lib.rs",
  "--- a/src/lib.rs",
  "+++ b/src/lib.rs",
  "@@ -1,3 +1,3 @@",
  " a",
  "-b",
  "+B",
  " c",
  "",
].join("\n");

describe("runner", () => {
  let workspace: string;
  let pristine: string;
  let deps: RunnerDeps;

  function workingFile(relPath: string): string {
    return path.join(workspace, "target", "patch", "foo-1.0.0", relPath);
  }

  function patchFile(name: string): string {
    return path.join(workspace, "patches", name);
  }

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), "crate-patch-runner-"));
    pristine = path.join(workspace, "registry", "foo-1.0.0");
    fs.mkdirSync(path.join(pristine, "src"), { recursive: true });
    fs.writeFileSync(path.join(pristine, "src", "lib.rs"), "a\nb\nc\n");

    const config = { ...DEFAULT_CONFIG, crates: ["foo@1.0.0"] };
    const fetcher: CrateFetcher = {
      async fetch(name, version) {
        if (name === "foo" && version === "1.0.0") return pristine;
        throw new FetchError(`${name}@${version} not found`);
      },
    };
    deps = { config, staging: new StagingManager(workspace, config), fetcher };

    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  describe("applyPatches", () => {
    it("prepares working copies for crates without a patch", async () => {
      const report = await applyPatches({}, deps);
      expect(report.crates).toEqual([
        { crate: "foo@1.0.0", status: "prepared", message: "Working copy at target/patch/foo-1.0.0" },
      ]);
      expect(fs.readFileSync(workingFile("src/lib.rs"), "utf-8")).toBe("a\nb\nc\n");
    });

    it("applies the crate's patch file", async () => {
      fs.mkdirSync(path.join(workspace, "patches"));
      fs.writeFileSync(patchFile("foo+1.0.0.patch"), LIB_PATCH);

      const report = await applyPatches({}, deps);
      expect(report.crates[0].status).toBe("applied");
      expect(report.crates[0].patchFile).toBe("patches/foo+1.0.0.patch");
      expect(fs.readFileSync(workingFile("src/lib.rs"), "utf-8")).toBe("a\nB\nc\n");
    });

    it("keeps an existing working copy unless forced", async () => {
      await applyPatches({}, deps);
      fs.writeFileSync(workingFile("src/lib.rs"), "edited\n");

      const skipped = await applyPatches({}, deps);
      expect(skipped.crates[0].status).toBe("skipped");
      expect(fs.readFileSync(workingFile("src/lib.rs"), "utf-8")).toBe("edited\n");

      const forced = await applyPatches({ force: true }, deps);
      expect(forced.crates[0].status).toBe("prepared");
      expect(fs.readFileSync(workingFile("src/lib.rs"), "utf-8")).toBe("a\nb\nc\n");
    });

    it("leaves a working copy held by another run alone when forced", async () => {
      await applyPatches({}, deps);
      fs.writeFileSync(workingFile("src/lib.rs"), "edited\n");
      fs.mkdirSync(`${workingFile("")}.lock`);

      const report = await applyPatches({ force: true }, deps);
      expect(report.crates[0]).toEqual({
        crate: "foo@1.0.0",
        status: "failed",
        message: `${path.join(workspace, "target", "patch", "foo-1.0.0")} is in use by another crate-patch run`,
      });
      expect(fs.readFileSync(workingFile("src/lib.rs"), "utf-8")).toBe("edited\n");
      expect(console.warn).toHaveBeenCalledWith(
        "[crate-patch] target/patch/foo-1.0.0 is in use by another crate-patch run, left in place",
      );
    });

    it("removes the working copy when the patch does not apply", async () => {
      fs.mkdirSync(path.join(workspace, "patches"));
      fs.writeFileSync(patchFile("foo+1.0.0.patch"), LIB_PATCH.replace(" a\n", " x\n"));

      const report = await applyPatches({ fuzz: 0 }, deps);
      expect(report.crates[0].status).toBe("failed");
      expect(report.crates[0].files?.[0].status).toBe("failed");
      expect(fs.existsSync(workingFile(""))).toBe(false);
    });

    it("reports a malformed patch file", async () => {
      fs.mkdirSync(path.join(workspace, "patches"));
      fs.writeFileSync(patchFile("foo+1.0.0.patch"), "not a patch\n");

      const report = await applyPatches({}, deps);
      expect(report.crates[0]).toEqual({
        crate: "foo@1.0.0",
        status: "failed",
        message: "Unrecognized header 'not a patch' (byte 0)",
      });
      expect(fs.existsSync(workingFile(""))).toBe(false);
    });

    it("warns about patch files for crates that are not configured", async () => {
      fs.mkdirSync(path.join(workspace, "patches"));
      fs.writeFileSync(patchFile("bar+2.0.0.patch"), LIB_PATCH);

      const report = await applyPatches({}, deps);
      expect(report.crates.map((crate) => [crate.crate, crate.status])).toEqual([
        ["bar@2.0.0", "skipped"],
        ["foo@1.0.0", "prepared"],
      ]);
      expect(console.warn).toHaveBeenCalledWith(
        "[crate-patch] crate: bar@2.0.0, has a patch file but is not listed in the crates config",
      );
    });
  });

  describe("createPatches", () => {
    it("writes the diff of the working copy", async () => {
      await applyPatches({}, deps);
      fs.writeFileSync(workingFile("src/lib.rs"), "a\nB\nc\n");

      const report = await createPatches(["foo"], deps);
      expect(report.crates).toEqual([
        {
          crate: "foo@1.0.0",
          status: "created",
          message: "1 file(s) changed, written to patches/foo+1.0.0.patch",
          patchFile: "patches/foo+1.0.0.patch",
        },
      ]);
      expect(fs.readFileSync(patchFile("foo+1.0.0.patch"), "utf-8")).toBe(LIB_PATCH);
    });

    it("round-trips through a forced apply", async () => {
      await applyPatches({}, deps);
      fs.writeFileSync(workingFile("src/lib.rs"), "a\nB\nc\n");
      fs.writeFileSync(workingFile("src/extra.rs"), "pub mod extra;\n");
      await createPatches(["foo@1.0.0"], deps);

      const report = await applyPatches({ force: true }, deps);
      expect(report.crates[0].status).toBe("applied");
      expect(fs.readFileSync(workingFile("src/lib.rs"), "utf-8")).toBe("a\nB\nc\n");
      expect(fs.readFileSync(workingFile("src/extra.rs"), "utf-8")).toBe("pub mod extra;\n");
    });

    it("writes nothing when the working copy is unchanged", async () => {
      await applyPatches({}, deps);
      const report = await createPatches(["foo"], deps);
      expect(report.crates[0].status).toBe("unchanged");
      expect(fs.existsSync(patchFile("foo+1.0.0.patch"))).toBe(false);
    });

    it("requires a working copy", async () => {
      const report = await createPatches(["foo"], deps);
      expect(report.crates[0]).toEqual({
        crate: "foo@1.0.0",
        status: "failed",
        message: "No working copy at target/patch/foo-1.0.0; run crate_patch_apply first",
      });
    });

    it("rejects crates that are not configured", async () => {
      const report = await createPatches(["bar"], deps);
      expect(report.crates).toEqual([{ crate: "bar", status: "failed", message: "Not listed in the crates config" }]);
    });

    it("fails while another run holds the working copy", async () => {
      await applyPatches({}, deps);
      const lockPath = `${workingFile("")}.lock`;
      fs.mkdirSync(lockPath);

      const report = await createPatches(["foo"], deps);
      expect(report.crates[0].status).toBe("failed");
      expect(report.crates[0].message).toBe(`${path.join(workspace, "target", "patch", "foo-1.0.0")} is in use by another crate-patch run`);
    });
  });
});

describe("formatRunReport", () => {
  it("summarizes statuses and lists details", () => {
    const text = formatRunReport({
      action: "apply",
      crates: [
        {
          crate: "foo@1.0.0",
          status: "applied",
          message: "1 file(s) patched",
          files: [{ status: "applied", path: "src/lib.rs", hunks: [{ hunkIndex: 0, offset: 2, fuzz: 1 }] }],
        },
        {
          crate: "baz@0.3.0",
          status: "failed",
          message: "patches/baz+0.3.0.patch does not apply",
          files: [{ status: "failed", path: "src/main.rs", error: { kind: "io_error", message: "No such file or directory: src/main.rs" } }],
        },
        { crate: "bar@2.0.0", status: "skipped", message: "Not listed in the crates config" },
      ],
    });

    expect(text).toBe(
      [
        "crate_patch apply: 1 applied, 1 failed, 1 skipped",
        "- foo@1.0.0: applied, 1 file(s) patched",
        "    src/lib.rs: hunk #1 applied at offset 2 with fuzz 1",
        "- baz@0.3.0: failed, patches/baz+0.3.0.patch does not apply",
        "    src/main.rs: No such file or directory: src/main.rs",
        "- bar@2.0.0: skipped, Not listed in the crates config",
      ].join("\n"),
    );
  });

  it("says when there is nothing to do", () => {
    expect(formatRunReport({ action: "apply", crates: [] })).toBe("No crates configured.");
  });
});
