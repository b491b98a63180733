export { createProgram, run } from "./program.js";
export type { CliContext } from "./lib/context.js";
export type { CliOutput } from "./lib/io.js";
