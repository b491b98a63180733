/**
 * File system test utilities
 */

import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "driveindex-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "driveindex-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Description of a file to create under a temp directory
 */
export interface TreeFile {
  /** Path relative to the tree root, "/"-separated */
  path: string;
  content?: string;
  /** Modification time in seconds since epoch */
  mtime?: number;
}

/**
 * Create files (and their parent directories) under `root`
 */
export async function writeTree(root: string, files: TreeFile[]): Promise<void> {
  for (const file of files) {
    const target = join(root, ...file.path.split("/"));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, file.content ?? "", "utf-8");
    if (file.mtime !== undefined) {
      await utimes(target, file.mtime, file.mtime);
    }
  }
}
