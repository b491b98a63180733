/**
 * File index adapter for CLI commands
 */

import { configDrives, loadIndexConfig, openFileIndex } from "@driveindex/sdk";
import type { FileIndex, IndexConfig } from "@driveindex/sdk";

export interface CliIndexOptions {
  /** Config file; the current directory is indexed as drive "cwd" when absent */
  configPath?: string;
  /** Snapshot directory */
  dataDir: string;
  cwd: string;
  /** Load saved snapshots before running */
  loadSnapshots?: boolean;
}

export interface CliIndex {
  index: FileIndex;
  config: IndexConfig;
  dataDir: string;
}

/**
 * Open a file index from the CLI's config, optionally restoring saved snapshots
 */
export async function openCliFileIndex(options: CliIndexOptions): Promise<CliIndex> {
  const config = await loadIndexConfig(options.configPath, options.cwd);
  const index = openFileIndex({
    drives: configDrives(config),
    skipDirs: config.skipDirs,
    maxResults: config.maxResults,
    batchSize: config.batchSize,
    buildConcurrency: config.buildConcurrency,
  });

  if (options.loadSnapshots) {
    await index.loadSnapshots(options.dataDir);
  }

  return { index, config, dataDir: options.dataDir };
}

/**
 * Run `fn` against an open CLI index, closing it afterwards
 */
export async function withCliFileIndex<T>(options: CliIndexOptions, fn: (cli: CliIndex) => Promise<T>): Promise<T> {
  const cli = await openCliFileIndex(options);
  try {
    return await fn(cli);
  } finally {
    await cli.index.close();
  }
}
