/**
 * Input validation for drive ids and raw entries
 */

import { InvalidDriveIdError } from "./errors.js";
import type { RawEntry } from "./types.js";

const DRIVE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Validate a drive id; ids double as snapshot file names
 * @throws InvalidDriveIdError
 */
export function validateDriveId(drive: string): void {
  if (!drive) {
    throw new InvalidDriveIdError(drive, "must be non-empty");
  }
  if (drive === "all") {
    throw new InvalidDriveIdError(drive, '"all" is reserved for the all-drives scope');
  }
  if (drive.length > 64) {
    throw new InvalidDriveIdError(drive, "must be at most 64 characters");
  }
  if (!DRIVE_ID_PATTERN.test(drive) || drive.includes("..")) {
    throw new InvalidDriveIdError(
      drive,
      "must start with a letter or digit and contain only letters, digits, dots, underscores, or dashes"
    );
  }
}

/**
 * Type guard for a raw entry read from untrusted input (snapshots, deltas)
 */
export function isRawEntry(value: unknown): value is RawEntry {
  if (value === null || typeof value !== "object") return false;
  const entry: Partial<Record<keyof RawEntry, unknown>> = value;
  return (
    typeof entry.name === "string" &&
    typeof entry.fullPath === "string" &&
    typeof entry.size === "number" &&
    Number.isFinite(entry.size) &&
    typeof entry.mtime === "number" &&
    Number.isFinite(entry.mtime) &&
    typeof entry.isDir === "boolean" &&
    (entry.attributes === undefined || typeof entry.attributes === "number")
  );
}
