/**
 * search command: stream matches from saved snapshots
 */

import type { Command } from "commander";
import type { Scope, SearchResult } from "@driveindex/sdk";
import { joinQuery, parseNonNegativeInt, parseScope } from "../lib/arg.js";
import type { CommandContext } from "../lib/context.js";
import { withCliFileIndex } from "../lib/file-index.js";
import { colorize, formatResultLine, printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface SearchCommandOptions {
  drive?: Scope;
  limit?: number;
  nameOnly?: boolean;
  long?: boolean;
  json?: boolean;
}

export function registerSearchCommand(program: Command, ctx: CommandContext): void {
  program
    .command("search")
    .description("Search indexed files and folders")
    .argument("<query...>", "Query words and filters")
    .option("--drive <id>", "Drive to search (default: all drives)", parseScope)
    .option("--limit <n>", "Maximum results per drive", (value: string) => parseNonNegativeInt(value, "--limit"))
    .option("--name-only", "Match keywords against file names only, not full paths")
    .option("--long", "Show modification time and size")
    .option("--json", "Output results as a JSON array")
    .addHelpText(
      "after",
      `
Examples:
  $ driveindex search report ext:pdf
  $ driveindex search "photo|image" size:>5mb --drive media
  $ driveindex search --name-only "*.ts"`
    )
    .action(async (words: string[], options: SearchCommandOptions) => {
      await withTiming(ctx.sink(), "cli.search", async () => {
        const { quiet } = ctx.globals();

        await withCliFileIndex(ctx.indexOptions(true), async ({ index }) => {
          const events = index.compileAndSearch(joinQuery(words), options.drive ?? "all", {
            maxResults: options.limit,
            matchMode: options.nameOnly ? "name" : "path",
          });

          const collected: SearchResult[] = [];
          for await (const event of events) {
            if (event.type === "batch") {
              if (options.json) {
                collected.push(...event.results);
              } else {
                printLines(
                  ctx.output,
                  event.results.map((result) => formatResultLine(result, options.long))
                );
              }
              continue;
            }

            if (options.json) {
              printJson(ctx.output, collected);
            }
            if (quiet) continue;

            for (const [drive, status] of Object.entries(event.drives)) {
              if (status !== "searched") {
                ctx.output.writeErr(colorize(`warning: drive ${drive} ${status}`, "yellow", ctx.output.errIsTTY) + "\n");
              }
            }
            const plural = event.total === 1 ? "" : "s";
            ctx.output.writeErr(`${event.total} result${plural}${event.truncated ? " (truncated)" : ""}\n`);
          }
        });
      });
    });
}
