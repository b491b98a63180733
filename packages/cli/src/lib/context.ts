/**
 * Shared state handed to every command
 */

import type { Command } from "commander";
import { isVerbose, resolveConfigPath, resolveDataDir } from "./env.js";
import type { CliIndexOptions } from "./file-index.js";
import type { CliOutput } from "./io.js";
import type { MetricSink } from "./telemetry.js";

export interface GlobalOptions {
  config?: string;
  data?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CliContext {
  output: CliOutput;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

export interface CommandContext extends CliContext {
  globals(): GlobalOptions;
  verbose(): boolean;
  sink(): MetricSink;
  indexOptions(loadSnapshots: boolean): CliIndexOptions;
}

export function createCommandContext(program: Command, ctx: CliContext): CommandContext {
  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const verbose = (): boolean => globals().verbose === true || isVerbose(ctx.env);

  return {
    ...ctx,
    globals,
    verbose,
    sink: () => ({ enabled: verbose(), output: ctx.output }),
    indexOptions: (loadSnapshots) => {
      const opts = globals();
      return {
        configPath: resolveConfigPath(opts.config, ctx.env),
        dataDir: resolveDataDir(opts.data, ctx.env, ctx.cwd),
        cwd: ctx.cwd,
        loadSnapshots,
      };
    },
  };
}
