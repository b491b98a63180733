/**
 * Index configuration file loading
 *
 * A config file is JSON: `{ drives: [{ id, root }], skipDirs?, maxResults?, batchSize?, buildConcurrency? }`.
 * Relative roots resolve against the config file's directory.
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { readTextFile } from "./io.js";
import { validateDriveId } from "./validation.js";
import type { DriveDefinition } from "./types.js";

/** Drive id used when no config file is given */
export const DEFAULT_DRIVE_ID = "cwd";

const DriveConfigSchema = z
  .object({
    id: z.string().min(1, "drive id must be non-empty"),
    root: z.string().min(1, "drive root must be non-empty"),
  })
  .strict();

export const IndexConfigSchema = z
  .object({
    drives: z.array(DriveConfigSchema).min(1, "at least one drive is required"),
    skipDirs: z.array(z.string().min(1)).optional(),
    maxResults: z.number().int().nonnegative().optional(),
    batchSize: z.number().int().positive().optional(),
    buildConcurrency: z.number().int().min(1).max(16).optional(),
  })
  .strict();

export type IndexConfig = z.infer<typeof IndexConfigSchema>;

/**
 * Expand a leading `~` or `~/` to the home directory; `~user` is left as is
 */
export function expandTilde(input: string): string {
  if (input === "~") {
    return homedir();
  }
  const match = input.match(/^~[\\/](.*)/);
  if (!match) {
    return input;
  }
  return path.join(homedir(), match[1] ?? "");
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate parsed config JSON and resolve drive roots against `baseDir`
 * @throws ConfigError when the shape is wrong or drive ids repeat
 * @throws InvalidDriveIdError for an unusable drive id
 */
export function parseIndexConfig(value: unknown, baseDir: string, source = "config"): IndexConfig {
  const parsed = IndexConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(source, formatIssues(parsed.error));
  }

  const seen = new Set<string>();
  const drives = parsed.data.drives.map((drive) => {
    validateDriveId(drive.id);
    if (seen.has(drive.id)) {
      throw new ConfigError(source, `duplicate drive id "${drive.id}"`);
    }
    seen.add(drive.id);
    return { id: drive.id, root: path.resolve(baseDir, expandTilde(drive.root)) };
  });

  return { ...parsed.data, drives };
}

/**
 * Load an index config file, or the single-drive default rooted at `cwd` when no path is given
 */
export async function loadIndexConfig(configPath?: string, cwd: string = process.cwd()): Promise<IndexConfig> {
  if (configPath === undefined) {
    return { drives: [{ id: DEFAULT_DRIVE_ID, root: path.resolve(cwd) }] };
  }

  const file = path.resolve(cwd, expandTilde(configPath));
  let content: string | null;
  try {
    content = await readTextFile(file);
  } catch (err) {
    throw new ConfigError(file, "file could not be read", { cause: err });
  }
  if (content === null) {
    throw new ConfigError(file, "file not found");
  }

  let value: unknown;
  try {
    // Strip BOM if present
    value = JSON.parse(content.charCodeAt(0) === 0xfeff ? content.slice(1) : content);
  } catch (err) {
    throw new ConfigError(file, err instanceof Error ? err.message : String(err), { cause: err });
  }

  return parseIndexConfig(value, path.dirname(file), file);
}

/**
 * Drive definitions of a loaded config
 */
export function configDrives(config: IndexConfig): DriveDefinition[] {
  return config.drives.map((drive) => ({ id: drive.id, root: drive.root }));
}
