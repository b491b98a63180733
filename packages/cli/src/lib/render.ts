/**
 * Output rendering helpers
 */

import type { SearchResult } from "@driveindex/sdk";
import type { CliOutput } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 */
export function printJson(output: CliOutput, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  output.writeOut(json + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(output: CliOutput, lines: string[]): void {
  for (const line of lines) {
    output.writeOut(line + "\n");
  }
}

/**
 * Apply ANSI color only when writing to a TTY
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * Format bytes to human-readable string
 * @returns Formatted string (e.g., "1.23 KB")
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";

  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const magnitude = Math.floor(Math.log(bytes) / Math.log(k));
  const i = Math.min(Math.max(magnitude, 0), sizes.length - 1);
  const value = bytes / Math.pow(k, i);

  return `${value.toFixed(2)} ${sizes[i]}`;
}

/**
 * One search result as a line; directories end with a separator
 */
export function formatResultLine(result: SearchResult, long = false): string {
  const name = result.isDir ? `${result.fullPath}/` : result.fullPath;
  if (!long) {
    return name;
  }
  const modified = new Date(result.mtime * 1000).toISOString().slice(0, 19).replace("T", " ");
  const size = result.isDir ? "-" : formatBytes(result.size);
  return `${modified}  ${size.padStart(10)}  ${name}`;
}
