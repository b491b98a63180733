/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { InvalidDriveIdError, validateDriveId } from "@driveindex/sdk";
import type { Scope } from "@driveindex/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Enforce reasonable max to prevent runaway output
  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse a drive id, or "all" for every configured drive
 */
export function parseScope(value: string): Scope {
  if (value === "all") {
    return value;
  }
  try {
    validateDriveId(value);
  } catch (err) {
    if (err instanceof InvalidDriveIdError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
  return value;
}

/**
 * Join variadic query words back into one raw query
 */
export function joinQuery(words: readonly string[]): string {
  return words.join(" ").trim();
}
