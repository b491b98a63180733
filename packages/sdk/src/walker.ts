/**
 * Default filesystem walker
 *
 * Depth-first over a drive root with fs.opendir. Symbolic links are indexed
 * as entries but never followed. An unreadable subdirectory is logged and
 * skipped; an unreadable root fails the walk.
 */

import * as fs from "node:fs/promises";
import { join } from "node:path";
import { describeError, errorCode } from "./errors.js";
import { logger } from "./observability/logs.js";
import { Attribute } from "./types.js";
import type { DriveDefinition, RawEntry, Walker } from "./types.js";

export const DEFAULT_SKIP_DIRS = [".git", "node_modules"];

export interface FsWalkerOptions {
  /** Directory names never descended into (default: .git, node_modules) */
  skipDirs?: readonly string[];
}

function attributesOf(name: string, mode: number): number {
  let attributes = 0;
  if (name.startsWith(".")) attributes |= Attribute.HIDDEN;
  if ((mode & 0o222) === 0) attributes |= Attribute.READONLY;
  return attributes;
}

async function statEntry(fullPath: string, name: string): Promise<RawEntry | undefined> {
  try {
    const stats = await fs.lstat(fullPath);
    const isDir = stats.isDirectory();
    return {
      name,
      fullPath,
      size: isDir ? 0 : stats.size,
      mtime: Math.floor(stats.mtimeMs / 1000),
      isDir,
      attributes: attributesOf(name, stats.mode),
    };
  } catch (err) {
    // Entry vanished between readdir and lstat, or is not stat-able
    logger.debug("walk.stat_failed", { message: `${fullPath}: ${describeError(err)}` });
    return undefined;
  }
}

/**
 * Create a walker that enumerates each drive's root directory
 */
export function createFsWalker(options: FsWalkerOptions = {}): Walker {
  const skip = new Set(options.skipDirs ?? DEFAULT_SKIP_DIRS);

  return async function* walk(drive: DriveDefinition): AsyncGenerator<RawEntry> {
    const stack: string[] = [drive.root];
    let isRoot = true;

    while (stack.length > 0) {
      const dir = stack.pop();
      if (dir === undefined) break;

      let handle: Awaited<ReturnType<typeof fs.opendir>>;
      try {
        handle = await fs.opendir(dir);
      } catch (err) {
        if (isRoot) {
          throw err;
        }
        logger.warn("walk.dir_skipped", {
          drive: drive.id,
          message: `${dir}: ${errorCode(err) ?? describeError(err)}`,
        });
        continue;
      }
      isRoot = false;

      const subdirs: string[] = [];
      for await (const dirent of handle) {
        const fullPath = join(dir, dirent.name);
        const entry = await statEntry(fullPath, dirent.name);
        if (!entry) continue;

        yield entry;
        if (entry.isDir && !skip.has(dirent.name)) {
          subdirs.push(fullPath);
        }
      }

      // Reverse so siblings are visited in directory order
      for (let i = subdirs.length - 1; i >= 0; i--) {
        stack.push(subdirs[i]!);
      }
    }
  };
}
