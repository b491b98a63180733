/**
 * On-disk snapshots of a drive generation
 *
 * Layout: `<dir>/<drive>.snapshot.json`, written atomically. Records are stored
 * as compact tuples; indexes are rebuilt on load.
 */

import { join } from "node:path";
import { atomicWrite, readTextFile } from "./io.js";
import { SnapshotReadError } from "./errors.js";
import { validateDriveId } from "./validation.js";
import type { DriveStore } from "./drive-store.js";
import type { DriveId, RawEntry } from "./types.js";

export const SNAPSHOT_VERSION = 1;

/** name, fullPath, size, mtime, isDir (0/1), attributes */
export type SnapshotRecord = [string, string, number, number, 0 | 1, number];

export interface SnapshotFile {
  version: typeof SNAPSHOT_VERSION;
  drive: DriveId;
  generationId: number;
  createdAt: string;
  records: SnapshotRecord[];
}

export interface LoadedSnapshot {
  drive: DriveId;
  generationId: number;
  createdAt: string;
  entries: RawEntry[];
}

export function snapshotPath(dir: string, drive: DriveId): string {
  validateDriveId(drive);
  return join(dir, `${drive}.snapshot.json`);
}

/**
 * Write the live records of a store
 * @returns path written
 */
export async function writeSnapshot(dir: string, store: DriveStore): Promise<string> {
  const file = snapshotPath(dir, store.drive);
  const records: SnapshotRecord[] = [];
  for (const r of store.records()) {
    records.push([r.name, r.fullPath, r.size, r.mtime, r.isDir ? 1 : 0, r.attributes]);
  }

  const snapshot: SnapshotFile = {
    version: SNAPSHOT_VERSION,
    drive: store.drive,
    generationId: store.generationId,
    createdAt: new Date(store.builtAt).toISOString(),
    records,
  };
  await atomicWrite(file, JSON.stringify(snapshot) + "\n");
  return file;
}

/**
 * Read a drive's snapshot
 * @returns undefined when no snapshot exists
 * @throws SnapshotReadError if the file is unreadable, not JSON, or of the wrong shape
 */
export async function readSnapshot(dir: string, drive: DriveId): Promise<LoadedSnapshot | undefined> {
  const file = snapshotPath(dir, drive);
  const text = await readTextFile(file);
  if (text === null) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new SnapshotReadError(file, { cause: err });
  }

  if (!isSnapshotFile(parsed) || parsed.drive !== drive) {
    throw new SnapshotReadError(file, {
      cause: new Error(`Unsupported or malformed snapshot for drive "${drive}"`),
    });
  }

  return {
    drive,
    generationId: parsed.generationId,
    createdAt: parsed.createdAt,
    entries: parsed.records.map(([name, fullPath, size, mtime, isDir, attributes]) => ({
      name,
      fullPath,
      size,
      mtime,
      isDir: isDir === 1,
      attributes,
    })),
  };
}

function isSnapshotFile(value: unknown): value is SnapshotFile {
  if (value === null || typeof value !== "object") return false;
  const file: Partial<Record<keyof SnapshotFile, unknown>> = value;
  return (
    file.version === SNAPSHOT_VERSION &&
    typeof file.drive === "string" &&
    typeof file.generationId === "number" &&
    typeof file.createdAt === "string" &&
    Array.isArray(file.records) &&
    file.records.every(isSnapshotRecord)
  );
}

function isSnapshotRecord(value: unknown): value is SnapshotRecord {
  return (
    Array.isArray(value) &&
    value.length === 6 &&
    typeof value[0] === "string" &&
    typeof value[1] === "string" &&
    typeof value[2] === "number" &&
    typeof value[3] === "number" &&
    (value[4] === 0 || value[4] === 1) &&
    typeof value[5] === "number"
  );
}
