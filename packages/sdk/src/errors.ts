/**
 * Error types for drive index operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Query compilation never throws; there is no compile error type
 */

import type { DriveId, IndexStatus } from "./types.js";

/**
 * Base class for all drive index errors
 */
export abstract class DriveIndexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an explicit single-drive search targets a drive with no published index
 */
export class DriveNotReadyError extends DriveIndexError {
  readonly code = "E_NOT_READY";

  constructor(
    public readonly drive: DriveId,
    public readonly status: IndexStatus,
    options?: ErrorOptions
  ) {
    super(`Drive "${drive}" has no index yet (status: ${status})`, options);
  }
}

/**
 * Thrown when a scope names a drive the index does not know
 */
export class UnknownDriveError extends DriveIndexError {
  readonly code = "E_UNKNOWN_DRIVE";

  constructor(
    public readonly drive: DriveId,
    options?: ErrorOptions
  ) {
    super(`Unknown drive: ${drive}`, options);
  }
}

/**
 * Wraps a walker failure; surfaces as a Failed state, never across drives
 */
export class BuildError extends DriveIndexError {
  readonly code = "E_BUILD";

  constructor(
    public readonly drive: DriveId,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Index build failed for drive "${drive}": ${reason}`, options);
  }
}

/**
 * Thrown when a state change is not in the transition table
 */
export class InvalidTransitionError extends DriveIndexError {
  readonly code = "E_TRANSITION";

  constructor(
    public readonly drive: DriveId,
    public readonly from: IndexStatus,
    public readonly to: IndexStatus,
    options?: ErrorOptions
  ) {
    super(`Invalid index state transition for drive "${drive}": ${from} -> ${to}`, options);
  }
}

/**
 * Thrown when a drive id is not usable as a registry key or file name
 */
export class InvalidDriveIdError extends DriveIndexError {
  readonly code = "E_DRIVE_ID";

  constructor(drive: string, reason: string, options?: ErrorOptions) {
    super(`Invalid drive id "${drive}": ${reason}`, options);
  }
}

/**
 * Thrown when a snapshot file cannot be read or parsed
 */
export class SnapshotReadError extends DriveIndexError {
  readonly code = "E_SNAPSHOT_READ";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read snapshot: ${filePath}`, options);
  }
}

/**
 * Thrown when a snapshot file cannot be written
 */
export class SnapshotWriteError extends DriveIndexError {
  readonly code = "E_SNAPSHOT_WRITE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write snapshot: ${filePath}`, options);
  }
}

/**
 * Thrown by operations on a closed file index
 */
export class IndexClosedError extends DriveIndexError {
  readonly code = "E_CLOSED";

  constructor(options?: ErrorOptions) {
    super("File index is closed", options);
  }
}

/**
 * Thrown when an index config file is missing, unreadable or malformed
 */
export class ConfigError extends DriveIndexError {
  readonly code = "E_CONFIG";

  constructor(
    public readonly source: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid config (${source}): ${reason}`, options);
  }
}

/**
 * Node error code of a thrown value (e.g. "ENOENT"), if any
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Extract a human-readable reason from an unknown thrown value
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const code = errorCode(err);
    return code && !err.message.includes(code) ? `${code}: ${err.message}` : err.message;
  }
  return String(err);
}
