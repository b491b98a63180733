/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { expandTilde } from "@driveindex/sdk";

export const DEFAULT_DATA_DIR = "~/.driveindex";

/**
 * Resolve the snapshot directory
 * Priority: CLI option > DRIVEINDEX_HOME env var > default "~/.driveindex"
 */
export function resolveDataDir(
  cliData?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  const dir = cliData ?? env.DRIVEINDEX_HOME ?? DEFAULT_DATA_DIR;
  return path.resolve(cwd, expandTilde(dir));
}

/**
 * Resolve the config file path, if any
 * Priority: CLI option > DRIVEINDEX_CONFIG env var
 */
export function resolveConfigPath(cliConfig?: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const file = cliConfig ?? env.DRIVEINDEX_CONFIG;
  return file ? expandTilde(file) : undefined;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.DRIVEINDEX_CLI_DEBUG === "1";
}
