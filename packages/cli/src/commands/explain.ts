/**
 * explain command: print the compiled form of a query
 */

import type { Command } from "commander";
import { compileQuery } from "@driveindex/sdk";
import { joinQuery } from "../lib/arg.js";
import type { CommandContext } from "../lib/context.js";
import { printJson } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export function registerExplainCommand(program: Command, ctx: CommandContext): void {
  program
    .command("explain")
    .description("Print the compiled query as JSON")
    .argument("<query...>", "Query words and filters")
    .option("--raw", "Output compact JSON")
    .action(async (words: string[], options: { raw?: boolean }) => {
      await withTiming(ctx.sink(), "cli.explain", async () => {
        printJson(ctx.output, compileQuery(joinQuery(words)), { raw: options.raw });
      });
    });
}
