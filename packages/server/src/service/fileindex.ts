/**
 * File index service adapter
 * Wraps the @driveindex/sdk FileIndex with snapshot persistence and result caps
 */

import * as path from "node:path";
import { configDrives, expandTilde, loadIndexConfig, openFileIndex } from "@driveindex/sdk";
import type {
  BuildSummary,
  DriveId,
  DriveSearchStatus,
  FileIndex,
  IndexStatusReport,
  Query,
  Scope,
  SearchResult,
} from "@driveindex/sdk";
import { logger } from "../observability/logger.js";

export const DEFAULT_DATA_DIR = "~/.driveindex";

export interface SearchRequest {
  query: string;
  drive?: Scope;
  limit: number;
  nameOnly: boolean;
}

export interface SearchResponse {
  results: SearchResult[];
  total: number;
  truncated: boolean;
  drives: Record<DriveId, DriveSearchStatus>;
}

export class FileIndexService {
  #index: FileIndex;
  #dataDir: string;
  #searchSeq = 0;

  constructor(index: FileIndex, dataDir: string) {
    this.#index = index;
    this.#dataDir = dataDir;
  }

  get dataDir(): string {
    return this.#dataDir;
  }

  /**
   * Run a search to completion; results across drives are capped at `limit`.
   * Aborting `signal` cancels the search session.
   */
  async search(request: SearchRequest, signal?: AbortSignal): Promise<SearchResponse> {
    signal?.throwIfAborted();
    const sessionKey = `search_files:${++this.#searchSeq}`;
    const events = this.#index.compileAndSearch(request.query, request.drive ?? "all", {
      maxResults: request.limit,
      matchMode: request.nameOnly ? "name" : "path",
      sessionKey,
    });
    const cancel = () => {
      this.#index.cancelSearch(sessionKey);
    };
    signal?.addEventListener("abort", cancel, { once: true });

    const results: SearchResult[] = [];
    let truncated = false;
    let drives: Record<DriveId, DriveSearchStatus> = {};

    try {
      for await (const event of events) {
        if (event.type === "batch") {
          results.push(...event.results);
        } else {
          truncated = event.truncated;
          drives = event.drives;
        }
      }
    } finally {
      signal?.removeEventListener("abort", cancel);
    }
    signal?.throwIfAborted();

    if (results.length > request.limit) {
      truncated = true;
      results.length = request.limit;
    }

    return { results, total: results.length, truncated, drives };
  }

  /**
   * Build drives and persist the new generations
   */
  async build(drive?: Scope): Promise<BuildSummary> {
    const summary = await this.#index.buildIndex(drive ?? "all");
    if (summary.builtDrives.length > 0) {
      await this.#index.saveSnapshots(this.#dataDir);
    }
    return summary;
  }

  status(drive?: Scope): IndexStatusReport {
    return this.#index.checkIndexStatus(drive ?? "all");
  }

  explain(query: string): Query {
    return this.#index.compile(query);
  }

  async close(): Promise<void> {
    await this.#index.close();
  }
}

/**
 * Open the service from DRIVEINDEX_CONFIG and DRIVEINDEX_HOME, restoring saved snapshots
 */
export async function openFileIndexService(env: NodeJS.ProcessEnv = process.env): Promise<FileIndexService> {
  const config = await loadIndexConfig(env.DRIVEINDEX_CONFIG);
  const dataDir = path.resolve(expandTilde(env.DRIVEINDEX_HOME ?? DEFAULT_DATA_DIR));

  const index = openFileIndex({
    drives: configDrives(config),
    skipDirs: config.skipDirs,
    maxResults: config.maxResults,
    batchSize: config.batchSize,
    buildConcurrency: config.buildConcurrency,
  });
  const loaded = await index.loadSnapshots(dataDir);

  logger.info("service.init", {
    data_dir: dataDir,
    drives: config.drives.map((d) => d.id),
    loaded,
  });

  return new FileIndexService(index, dataDir);
}
