/**
 * Tests for config loading.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  configuredCrates,
  DEFAULT_CONFIG,
  loadConfig,
  parseCrateSpec,
  resolveCargoHome,
} from "../src/config.js";

describe("loadConfig", () => {
  let workspace: string;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), "crate-patch-config-"));
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    fs.mkdirSync(path.join(workspace, ".pi"), { recursive: true });
    fs.writeFileSync(path.join(workspace, ".pi", "crate-patch.json"), content);
  }

  it("returns defaults when no config file exists", () => {
    expect(loadConfig(workspace)).toEqual(DEFAULT_CONFIG);
    expect(console.error).not.toHaveBeenCalled();
  });

  it("merges the file over defaults", () => {
    writeConfig(JSON.stringify({ crates: ["serde@1.0.200"], fuzz: 0, cargoHome: "/opt/cargo" }));
    expect(loadConfig(workspace)).toEqual({
      ...DEFAULT_CONFIG,
      crates: ["serde@1.0.200"],
      fuzz: 0,
      cargoHome: "/opt/cargo",
    });
  });

  it("falls back to defaults on invalid values", () => {
    writeConfig(JSON.stringify({ fuzz: -1 }));
    expect(loadConfig(workspace)).toEqual(DEFAULT_CONFIG);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("rejects unknown keys", () => {
    writeConfig(JSON.stringify({ fuz: 1 }));
    expect(loadConfig(workspace)).toEqual(DEFAULT_CONFIG);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("rejects crate entries without a version", () => {
    writeConfig(JSON.stringify({ crates: ["serde"] }));
    expect(loadConfig(workspace).crates).toEqual([]);
  });

  it("falls back to defaults on malformed JSON", () => {
    writeConfig("{ not json");
    expect(loadConfig(workspace)).toEqual(DEFAULT_CONFIG);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});

describe("crate specs", () => {
  it("splits name and version at the first @", () => {
    expect(parseCrateSpec("tokio@1.37.0")).toEqual({ name: "tokio", version: "1.37.0" });
    expect(parseCrateSpec("tokio")).toBeUndefined();
    expect(parseCrateSpec("@1.0.0")).toBeUndefined();
    expect(parseCrateSpec("tokio@")).toBeUndefined();
  });

  it("lists configured crates", () => {
    const config = { ...DEFAULT_CONFIG, crates: ["a@1.0.0", "b-c@0.2.1"] };
    expect(configuredCrates(config)).toEqual([
      { name: "a", version: "1.0.0" },
      { name: "b-c", version: "0.2.1" },
    ]);
  });

  it("prefers the configured cargo home", () => {
    expect(resolveCargoHome({ ...DEFAULT_CONFIG, cargoHome: "/opt/cargo" })).toBe("/opt/cargo");
  });
});
