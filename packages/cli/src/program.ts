/**
 * CLI program definition
 */

import { Command, CommanderError } from "commander";
import { logger } from "@driveindex/sdk";
import { registerBuildCommand } from "./commands/build.js";
import { registerExplainCommand } from "./commands/explain.js";
import { registerSearchCommand } from "./commands/search.js";
import { registerStatusCommand } from "./commands/status.js";
import { createCommandContext } from "./lib/context.js";
import type { CliContext } from "./lib/context.js";
import { isVerbose } from "./lib/env.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { processOutput } from "./lib/io.js";
import { colorize } from "./lib/render.js";

export const CLI_VERSION = "0.1.0";

/**
 * Build the commander program bound to a context
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => ctx.output.writeOut(str),
      writeErr: (str) => ctx.output.writeErr(colorize(str, "red", ctx.output.errIsTTY)),
    })
    .exitOverride();

  // Global options
  program
    .name("driveindex")
    .description("Drive index - fast file-name search over indexed drives")
    .version(CLI_VERSION)
    .option("--config <path>", "Drive config file (JSON)")
    .option("--data <dir>", "Snapshot directory")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const commandContext = createCommandContext(program, ctx);

  // SDK diagnostics only in verbose mode
  program.hook("preAction", () => {
    logger.setEnabled(commandContext.verbose());
  });

  registerBuildCommand(program, commandContext);
  registerStatusCommand(program, commandContext);
  registerSearchCommand(program, commandContext);
  registerExplainCommand(program, commandContext);

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix)
 * @returns process exit code
 */
export async function run(argv: string[], context: Partial<CliContext> = {}): Promise<number> {
  const ctx: CliContext = {
    output: context.output ?? processOutput,
    env: context.env ?? process.env,
    cwd: context.cwd ?? process.cwd(),
  };
  const program = createProgram(ctx);

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already written usage errors, help and version
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = program.opts<{ verbose?: boolean }>().verbose === true || isVerbose(ctx.env);
    ctx.output.writeErr(`Error: ${formatCliError(err, verbose)}\n`);
    return mapSdkErrorToExitCode(err);
  }
}
