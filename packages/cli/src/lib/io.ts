/**
 * Output streams for the CLI
 *
 * Commands never touch process.stdout directly, so they can run in-process
 * against a captured output.
 */

export interface CliOutput {
  writeOut(content: string): void;
  writeErr(content: string): void;
  /** Whether stdout is an interactive terminal (enables color) */
  readonly outIsTTY: boolean;
  readonly errIsTTY: boolean;
}

/**
 * Output bound to the process streams
 */
export const processOutput: CliOutput = {
  writeOut: (content) => {
    process.stdout.write(content);
  },
  writeErr: (content) => {
    process.stderr.write(content);
  },
  get outIsTTY() {
    return process.stdout.isTTY ?? false;
  },
  get errIsTTY() {
    return process.stderr.isTTY ?? false;
  },
};
