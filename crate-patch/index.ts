import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { Type } from "@sinclair/typebox";
import { loadConfig, resolveCargoHome } from "./src/config.js";
import { CargoRegistryFetcher } from "./src/fetcher.js";
import { applyPatches, createPatches, formatRunReport, type RunnerDeps, type RunReport } from "./src/runner.js";
import { StagingManager } from "./src/staging.js";

/** Dependencies for a run in the session's working directory. */
export function createDeps(workspaceRoot: string): RunnerDeps {
  const config = loadConfig(workspaceRoot);
  return {
    config,
    staging: new StagingManager(workspaceRoot, config),
    fetcher: new CargoRegistryFetcher(resolveCargoHome(config)),
  };
}

function toToolResult(report: RunReport) {
  return {
    content: [{ type: "text" as const, text: formatRunReport(report) }],
    details: report,
  };
}

export default function (pi: ExtensionAPI) {
  pi.registerTool({
    name: "crate_patch_create",
    label: "Crate Patch: Create",
    description:
      "Diff the working copies of the given crates (target/patch/<name>-<version>) against their pristine " +
      "sources and write patches/<name>+<version>.patch.",
    parameters: Type.Object({
      crates: Type.Array(Type.String(), {
        description: "Crate names, or name@version, listed in .pi/crate-patch.json",
        minItems: 1,
      }),
    }),
    async execute(_toolCallId, params, _onUpdate, ctx) {
      const report = await createPatches(params.crates, createDeps(ctx.cwd));
      return toToolResult(report);
    },
  });

  pi.registerTool({
    name: "crate_patch_apply",
    label: "Crate Patch: Apply",
    description:
      "Create working copies of the configured crates and apply their patch files. Existing working " +
      "copies are kept unless force is set.",
    parameters: Type.Object({
      force: Type.Optional(Type.Boolean({ description: "Recreate working copies that already exist" })),
      fuzz: Type.Optional(
        Type.Integer({ minimum: 0, description: "Context lines a hunk may ignore at each end (default from config)" }),
      ),
    }),
    async execute(_toolCallId, params, _onUpdate, ctx) {
      const report = await applyPatches({ force: params.force, fuzz: params.fuzz }, createDeps(ctx.cwd));
      return toToolResult(report);
    },
  });
}
