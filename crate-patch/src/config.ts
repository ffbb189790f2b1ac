/**
 * Configuration loading.
 * Reads <workspace>/.pi/crate-patch.json over the defaults below.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { log } from "./log.js";

export const CONFIG_FILE = path.join(".pi", "crate-patch.json");

// ============================================================================
// Schema
// ============================================================================

export const CratePatchConfigSchema = Type.Object(
  {
    /** Crates to patch, as "name@version" */
    crates: Type.Array(Type.String({ pattern: "^[A-Za-z0-9_-]+@[^@\\s]+$" })),
    fuzz: Type.Integer({ minimum: 0 }),
    context: Type.Integer({ minimum: 0 }),
    maxSearchWindow: Type.Integer({ minimum: 0 }),
    patchesDir: Type.String({ minLength: 1 }),
    targetDir: Type.String({ minLength: 1 }),
    exclude: Type.Array(Type.String()),
    cargoHome: Type.Union([Type.String(), Type.Null()]),
  },
  { additionalProperties: false },
);

export type CratePatchConfig = Static<typeof CratePatchConfigSchema>;

const ConfigFileSchema = Type.Partial(CratePatchConfigSchema, { additionalProperties: false });

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: CratePatchConfig = {
  crates: [],
  fuzz: 2,
  context: 3,
  maxSearchWindow: 1000,
  patchesDir: "patches",
  targetDir: path.join("target", "patch"),
  exclude: [".git"],
  cargoHome: null,
};

// ============================================================================
// Crate specs
// ============================================================================

export interface CrateSpec {
  name: string;
  version: string;
}

export function parseCrateSpec(spec: string): CrateSpec | undefined {
  const at = spec.indexOf("@");
  if (at <= 0 || at === spec.length - 1) return undefined;
  return { name: spec.slice(0, at), version: spec.slice(at + 1) };
}

export function formatCrateSpec(crate: CrateSpec): string {
  return `${crate.name}@${crate.version}`;
}

export function configuredCrates(config: CratePatchConfig): CrateSpec[] {
  const crates: CrateSpec[] = [];
  for (const spec of config.crates) {
    const crate = parseCrateSpec(spec);
    if (crate) crates.push(crate);
  }
  return crates;
}

export function resolveCargoHome(config: CratePatchConfig): string {
  return config.cargoHome ?? process.env.CARGO_HOME ?? path.join(os.homedir(), ".cargo");
}

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load configuration for a workspace. A missing file means defaults; an
 * unreadable or invalid one is logged and also falls back to defaults.
 */
export function loadConfig(workspaceRoot: string): CratePatchConfig {
  const configPath = path.join(workspaceRoot, CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  try {
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    if (!Value.Check(ConfigFileSchema, raw)) {
      const first = Value.Errors(ConfigFileSchema, raw).First();
      const detail = first ? ` (${first.path || "/"}: ${first.message})` : "";
      log.error(`Invalid config ${configPath}${detail}, using defaults`);
      return { ...DEFAULT_CONFIG };
    }
    return { ...DEFAULT_CONFIG, ...raw };
  } catch (err) {
    log.error("Failed to load config, using defaults:", err);
    return { ...DEFAULT_CONFIG };
  }
}
