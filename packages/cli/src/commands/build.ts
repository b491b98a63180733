/**
 * build command: walk drives, publish generations, save snapshots
 */

import type { Command } from "commander";
import type { Scope } from "@driveindex/sdk";
import { parseScope } from "../lib/arg.js";
import type { CommandContext } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import { withCliFileIndex } from "../lib/file-index.js";
import { colorize, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export function registerBuildCommand(program: Command, ctx: CommandContext): void {
  program
    .command("build")
    .description("Build the index for one or all drives and save snapshots")
    .argument("[drive]", "Drive id (default: all drives)", parseScope)
    .addHelpText(
      "after",
      `
Examples:
  $ driveindex build
  $ driveindex --config drives.json build home`
    )
    .action(async (drive: Scope | undefined) => {
      await withTiming(ctx.sink(), "cli.build", async () => {
        const { quiet } = ctx.globals();
        const scope = drive ?? "all";

        await withCliFileIndex(ctx.indexOptions(false), async ({ index, dataDir }) => {
          const summary = await index.buildIndex(scope);
          if (summary.builtDrives.length > 0) {
            await index.saveSnapshots(dataDir);
          }

          if (!quiet) {
            const report = index.checkIndexStatus(scope);
            const tty = ctx.output.outIsTTY;
            const lines: string[] = [];
            for (const id of Object.keys(report.perDrive)) {
              const state = report.perDrive[id];
              const failure = summary.failedDrives.find((f) => f.drive === id);
              if (failure) {
                lines.push(colorize(`✗ ${id}: ${failure.reason}`, "red", tty));
              } else if (state?.status === "ready") {
                lines.push(colorize(`✓ ${id}: ${state.count} entries`, "green", tty));
              }
            }
            printLines(ctx.output, lines);
          }

          const failed = summary.failedDrives.length;
          if (failed > 0) {
            const total = failed + summary.builtDrives.length;
            throw new CliError(`${failed} of ${total} drive${total === 1 ? "" : "s"} failed to build`);
          }
        });
      });
    });
}
