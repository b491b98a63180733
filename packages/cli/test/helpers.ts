/**
 * In-process CLI runner for tests
 */

import { run } from "../src/program.js";
import type { CliOutput } from "../src/lib/io.js";

export interface CliRun {
  stdout: string;
  stderr: string;
  exitCode: number;
}

class CapturedOutput implements CliOutput {
  stdout = "";
  stderr = "";
  readonly outIsTTY = false;
  readonly errIsTTY = false;

  writeOut(content: string): void {
    this.stdout += content;
  }

  writeErr(content: string): void {
    this.stderr += content;
  }
}

/**
 * Run the CLI in-process with an empty environment
 */
export async function runCli(args: string[], options: { cwd: string; env?: NodeJS.ProcessEnv }): Promise<CliRun> {
  const output = new CapturedOutput();
  const exitCode = await run(args, { output, cwd: options.cwd, env: options.env ?? {} });
  return { stdout: output.stdout, stderr: output.stderr, exitCode };
}

/**
 * Output lines, sorted; walk order depends on the filesystem
 */
export function sortedLines(text: string): string[] {
  return text
    .split("\n")
    .filter((line) => line.length > 0)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
