/**
 * status command: per-drive index state from saved snapshots
 */

import type { Command } from "commander";
import type { IndexState, Scope } from "@driveindex/sdk";
import { parseScope } from "../lib/arg.js";
import type { CommandContext } from "../lib/context.js";
import { withCliFileIndex } from "../lib/file-index.js";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

function describeState(state: IndexState): string {
  switch (state.status) {
    case "ready":
      return `ready (${state.count} entries)`;
    case "failed":
      return `failed: ${state.reason}`;
    default:
      return state.status;
  }
}

export function registerStatusCommand(program: Command, ctx: CommandContext): void {
  program
    .command("status")
    .description("Show index status for one or all drives")
    .argument("[drive]", "Drive id (default: all drives)", parseScope)
    .option("--json", "Output as JSON")
    .action(async (drive: Scope | undefined, options: { json?: boolean }) => {
      await withTiming(ctx.sink(), "cli.status", async () => {
        await withCliFileIndex(ctx.indexOptions(true), async ({ index }) => {
          const report = index.checkIndexStatus(drive ?? "all");

          if (options.json) {
            printJson(ctx.output, report);
            return;
          }

          const lines = Object.entries(report.perDrive).map(([id, state]) => `${id}: ${describeState(state)}`);
          lines.push(`${report.readyCount}/${report.totalDrives} drives ready, ${report.totalFiles} entries`);
          printLines(ctx.output, lines);
        });
      });
    });
}
