/**
 * FileIndex facade: query cache, lifecycle registry, search coordinator and events
 */

import { EventEmitter } from "node:events";
import { QueryCache } from "./cache.js";
import { SearchCoordinator } from "./coordinator.js";
import { IndexClosedError, UnknownDriveError, describeError } from "./errors.js";
import { DEFAULT_BATCH_SIZE, DEFAULT_MAX_RESULTS } from "./executor.js";
import { IndexRegistry } from "./lifecycle.js";
import { createFsWalker } from "./walker.js";
import { logger } from "./observability/logs.js";
import type { RemovedEntry } from "./lifecycle.js";
import type {
  BuildOutcome,
  BuildSummary,
  CoordinatorSearchOptions,
  DeltaOutcome,
  DriveId,
  FileIndexEvents,
  FileIndexOptions,
  IndexStatusReport,
  Query,
  RawEntry,
  Scope,
  SearchEvent,
  SearchSummary,
} from "./types.js";

/** Session key used by startSearch when the caller gives none */
export const INTERACTIVE_SESSION = "interactive";

export interface FileIndex {
  /** Compile a raw query (cached) */
  compile(rawQuery: string): Query;
  compileAndSearch(
    rawQuery: string,
    scope: Scope,
    options?: CoordinatorSearchOptions
  ): AsyncGenerator<SearchEvent, void, undefined>;
  startSearch(rawQuery: string, scope: Scope, options?: CoordinatorSearchOptions): Promise<SearchSummary | null>;
  cancelSearch(sessionKey?: string): boolean;
  buildIndex(scope?: Scope): Promise<BuildSummary>;
  checkIndexStatus(scope?: Scope): IndexStatusReport;
  applyFsDelta(drive: DriveId, added: readonly RawEntry[], removed: readonly RemovedEntry[]): Promise<DeltaOutcome>;
  saveSnapshots(dir: string): Promise<string[]>;
  loadSnapshots(dir: string): Promise<DriveId[]>;
  drives(): DriveId[];
  on<K extends keyof FileIndexEvents>(event: K, listener: (...args: FileIndexEvents[K]) => void): this;
  off<K extends keyof FileIndexEvents>(event: K, listener: (...args: FileIndexEvents[K]) => void): this;
  close(): Promise<void>;
}

class DriveFileIndex implements FileIndex {
  #events = new EventEmitter();
  #cache: QueryCache;
  #registry: IndexRegistry;
  #coordinator: SearchCoordinator;
  #maxResults: number;
  #batchSize: number;
  #buildConcurrency: number;
  #closed = false;

  constructor(options: FileIndexOptions) {
    this.#maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.#batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    // Clamp build concurrency to a sane range (1-16)
    this.#buildConcurrency = Math.max(1, Math.min(16, options.buildConcurrency ?? 4));

    this.#cache = new QueryCache({ maxSize: options.queryCacheSize });
    this.#registry = new IndexRegistry(options.drives, {
      walker: options.walker ?? createFsWalker({ skipDirs: options.skipDirs }),
      yieldEvery: options.yieldEvery,
      onEvent: (event) => this.#emit("index-building", event),
    });
    this.#coordinator = new SearchCoordinator(this.#registry);
  }

  compile(rawQuery: string): Query {
    return this.#cache.compile(rawQuery);
  }

  compileAndSearch(
    rawQuery: string,
    scope: Scope,
    options: CoordinatorSearchOptions = {}
  ): AsyncGenerator<SearchEvent, void, undefined> {
    this.#assertOpen();
    const query = this.#cache.compile(rawQuery);
    return this.#coordinator.search(query, scope, {
      ...options,
      maxResults: options.maxResults ?? this.#maxResults,
      batchSize: options.batchSize ?? this.#batchSize,
    });
  }

  async startSearch(
    rawQuery: string,
    scope: Scope,
    options: CoordinatorSearchOptions = {}
  ): Promise<SearchSummary | null> {
    const events = this.compileAndSearch(rawQuery, scope, {
      ...options,
      sessionKey: options.sessionKey ?? INTERACTIVE_SESSION,
    });

    for await (const event of events) {
      if (event.type === "batch") {
        this.#emit("search-batch", { sessionId: event.sessionId, drive: event.drive, results: event.results });
      } else {
        this.#emit("search-complete", { sessionId: event.sessionId, total: event.total });
        return {
          sessionId: event.sessionId,
          total: event.total,
          truncated: event.truncated,
          drives: event.drives,
        };
      }
    }

    // Superseded or cancelled
    return null;
  }

  cancelSearch(sessionKey: string = INTERACTIVE_SESSION): boolean {
    return this.#coordinator.cancel(sessionKey);
  }

  async buildIndex(scope: Scope = "all"): Promise<BuildSummary> {
    this.#assertOpen();
    const queue = this.#scopeDrives(scope);
    const outcomes: BuildOutcome[] = [];

    // Build drives with bounded concurrency
    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(this.#buildConcurrency, queue.length); i++) {
      workers.push(
        (async () => {
          while (queue.length > 0) {
            const drive = queue.shift();
            if (drive === undefined) break;
            outcomes.push(await this.#registry.buildOrRebuild(drive));
          }
        })()
      );
    }
    await Promise.all(workers);

    const summary: BuildSummary = { builtDrives: [], failedDrives: [] };
    for (const outcome of outcomes) {
      if (outcome.ok) {
        summary.builtDrives.push(outcome.drive);
      } else {
        summary.failedDrives.push({ drive: outcome.drive, reason: outcome.reason });
      }
    }

    const success = summary.builtDrives.length;
    const failed = summary.failedDrives.length;
    const message =
      failed === 0
        ? `Indexed ${success} drive${success === 1 ? "" : "s"}`
        : `Indexed ${success} drive${success === 1 ? "" : "s"}, ${failed} failed`;
    this.#emit("index-rebuild-finished", { success, failed, message });

    return summary;
  }

  checkIndexStatus(scope: Scope = "all"): IndexStatusReport {
    const report: IndexStatusReport = { perDrive: {}, readyCount: 0, totalDrives: 0, totalFiles: 0 };

    for (const drive of this.#scopeDrives(scope)) {
      const state = this.#registry.status(drive);
      report.perDrive[drive] = state;
      report.totalDrives++;
      if (state.status === "ready") {
        report.readyCount++;
      }
      report.totalFiles += this.#registry.store(drive)?.count ?? 0;
    }

    return report;
  }

  async applyFsDelta(
    drive: DriveId,
    added: readonly RawEntry[],
    removed: readonly RemovedEntry[]
  ): Promise<DeltaOutcome> {
    this.#assertOpen();
    return this.#registry.applyDelta(drive, added, removed);
  }

  async saveSnapshots(dir: string): Promise<string[]> {
    const written: string[] = [];
    for (const drive of this.#registry.drives()) {
      const file = await this.#registry.saveSnapshot(drive, dir);
      if (file) written.push(file);
    }
    return written;
  }

  /**
   * Load every drive's snapshot; a drive whose snapshot cannot be read is logged and left as it was
   * @returns drives that were loaded
   */
  async loadSnapshots(dir: string): Promise<DriveId[]> {
    this.#assertOpen();
    const loaded: DriveId[] = [];
    for (const drive of this.#registry.drives()) {
      try {
        const outcome = await this.#registry.loadSnapshot(drive, dir);
        if (outcome?.ok) loaded.push(drive);
      } catch (err) {
        logger.warn("index.snapshot.load_failed", { drive, message: describeError(err) });
      }
    }
    return loaded;
  }

  drives(): DriveId[] {
    return this.#registry.drives();
  }

  on<K extends keyof FileIndexEvents>(event: K, listener: (...args: FileIndexEvents[K]) => void): this {
    this.#events.on(event, listener);
    return this;
  }

  off<K extends keyof FileIndexEvents>(event: K, listener: (...args: FileIndexEvents[K]) => void): this {
    this.#events.off(event, listener);
    return this;
  }

  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    this.#coordinator.cancelAll();
    await this.#registry.idle();
    this.#cache.clear();
    this.#events.removeAllListeners();
  }

  #emit<K extends keyof FileIndexEvents>(event: K, ...args: FileIndexEvents[K]): void {
    this.#events.emit(event, ...args);
  }

  #scopeDrives(scope: Scope): DriveId[] {
    if (scope === "all") {
      return this.#registry.drives();
    }
    if (!this.#registry.has(scope)) {
      throw new UnknownDriveError(scope);
    }
    return [scope];
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new IndexClosedError();
    }
  }
}

/**
 * Open a file index over a set of drives
 *
 * Nothing is built until buildIndex() or loadSnapshots() is called.
 *
 * @example
 * ```typescript
 * const index = openFileIndex({ drives: [{ id: "home", root: "/home/me" }] });
 * await index.buildIndex();
 * for await (const event of index.compileAndSearch("ext:pdf report", "all")) {
 *   if (event.type === "batch") console.log(event.results);
 * }
 * ```
 */
export function openFileIndex(options: FileIndexOptions): FileIndex {
  return new DriveFileIndex(options);
}
