/**
 * Index lifecycle: per-drive state machine, builds, deltas and snapshots
 *
 * Invariants:
 * - State changes go through the TRANSITIONS table; anything else throws
 * - At most one build (or snapshot load) per drive is in flight; callers
 *   arriving meanwhile share its promise
 * - Publishing a generation is a single reference swap under the drive mutex
 * - A failed build leaves the previously published generation in place
 * - Deltas mutate the published generation under the same mutex
 */

import { DriveStore } from "./drive-store.js";
import { BuildError, InvalidDriveIdError, InvalidTransitionError, UnknownDriveError, describeError } from "./errors.js";
import { readSnapshot, writeSnapshot } from "./snapshot.js";
import { isRawEntry, validateDriveId } from "./validation.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type {
  BuildOutcome,
  DeltaOutcome,
  DriveDefinition,
  DriveId,
  FileIndexEvents,
  IndexState,
  IndexStatus,
  RawEntry,
  Walker,
} from "./types.js";

/**
 * Simple mutex for serializing writes to one drive
 */
class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      next();
    } else {
      this.#locked = false;
    }
  }

  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

const TRANSITIONS: Record<IndexStatus, readonly IndexStatus[]> = {
  "not-built": ["building"],
  building: ["ready", "failed"],
  ready: ["building"],
  failed: ["building"],
};

export type IndexBuildingEvent = FileIndexEvents["index-building"][0];

export interface IndexRegistryOptions {
  walker: Walker;
  /** Entries between event-loop yields during builds (default: 5000) */
  yieldEvery?: number;
  /** Receives index-building notifications */
  onEvent?: (event: IndexBuildingEvent) => void;
}

/**
 * A record removed by id (this generation) or by full path
 */
export type RemovedEntry = number | string;

interface DriveHandle {
  definition: DriveDefinition;
  state: IndexState;
  store?: DriveStore;
  building?: Promise<BuildOutcome>;
  mutex: Mutex;
}

type EntrySource = () => AsyncIterable<RawEntry> | Iterable<RawEntry>;

export class IndexRegistry {
  #handles = new Map<DriveId, DriveHandle>();
  #walker: Walker;
  #yieldEvery: number;
  #onEvent?: (event: IndexBuildingEvent) => void;
  #nextGeneration = 1;

  constructor(drives: readonly DriveDefinition[], options: IndexRegistryOptions) {
    for (const definition of drives) {
      validateDriveId(definition.id);
      if (this.#handles.has(definition.id)) {
        throw new InvalidDriveIdError(definition.id, "drive is defined more than once");
      }
      this.#handles.set(definition.id, {
        definition: { ...definition },
        state: { status: "not-built" },
        mutex: new Mutex(),
      });
    }
    this.#walker = options.walker;
    this.#yieldEvery = options.yieldEvery ?? 5000;
    this.#onEvent = options.onEvent;
  }

  drives(): DriveId[] {
    return [...this.#handles.keys()];
  }

  has(drive: DriveId): boolean {
    return this.#handles.has(drive);
  }

  /**
   * @throws UnknownDriveError
   */
  status(drive: DriveId): IndexState {
    return this.#handle(drive).state;
  }

  /**
   * Published generation, if any (kept through later failed builds)
   * @throws UnknownDriveError
   */
  store(drive: DriveId): DriveStore | undefined {
    return this.#handle(drive).store;
  }

  /**
   * Build a new generation, or join the build already in flight
   * @throws UnknownDriveError
   */
  buildOrRebuild(drive: DriveId): Promise<BuildOutcome> {
    const handle = this.#handle(drive);
    return handle.building ?? this.#startBuild(handle, () => this.#walker(handle.definition), "walk");
  }

  /**
   * Apply filesystem changes to the published generation
   * Removals run first so a renamed entry ends up present.
   * @throws UnknownDriveError
   */
  async applyDelta(
    drive: DriveId,
    added: readonly RawEntry[],
    removed: readonly RemovedEntry[]
  ): Promise<DeltaOutcome> {
    const handle = this.#handle(drive);

    return handle.mutex.withLock(() => {
      const store = handle.store;
      if (!store) {
        logger.debug("index.delta.ignored", { drive, message: "no published generation" });
        return { drive, applied: false, added: 0, removed: 0 };
      }

      let removedCount = 0;
      for (const target of removed) {
        const ok = typeof target === "number" ? store.remove(target) : store.removeByPath(target) !== undefined;
        if (ok) removedCount++;
      }

      let addedCount = 0;
      for (const entry of added) {
        if (!isRawEntry(entry)) {
          logger.warn("index.delta.invalid_entry", { drive, details: { entry } });
          continue;
        }
        store.add(entry);
        addedCount++;
      }

      if (handle.state.status === "ready") {
        handle.state = { status: "ready", count: store.count, generationId: store.generationId };
      }
      metrics.recordDelta(drive, addedCount + removedCount);
      metrics.updateSize(drive, store.count, store.trigramCount);
      logger.debug("index.delta.applied", { drive, details: { added: addedCount, removed: removedCount } });

      return { drive, applied: true, added: addedCount, removed: removedCount };
    });
  }

  /**
   * Write the published generation to `<dir>/<drive>.snapshot.json`
   * @returns path written, or undefined when nothing is published
   */
  async saveSnapshot(drive: DriveId, dir: string): Promise<string | undefined> {
    const handle = this.#handle(drive);
    return handle.mutex.withLock(async () => {
      if (!handle.store) return undefined;
      const file = await writeSnapshot(dir, handle.store);
      logger.debug("index.snapshot.saved", { drive, details: { file, records: handle.store.count } });
      return file;
    });
  }

  /**
   * Publish a generation from a saved snapshot
   * @returns the load outcome, or undefined when there is no snapshot or a build is in flight
   * @throws SnapshotReadError
   */
  async loadSnapshot(drive: DriveId, dir: string): Promise<BuildOutcome | undefined> {
    const handle = this.#handle(drive);
    if (handle.building) return undefined;

    const snapshot = await readSnapshot(dir, drive);
    if (!snapshot || handle.building) return undefined;

    return this.#startBuild(handle, () => snapshot.entries, "snapshot");
  }

  /**
   * Resolves once no build is in flight
   */
  async idle(): Promise<void> {
    const pending = [...this.#handles.values()].flatMap((h) => (h.building ? [h.building] : []));
    await Promise.allSettled(pending);
  }

  #handle(drive: DriveId): DriveHandle {
    const handle = this.#handles.get(drive);
    if (!handle) {
      throw new UnknownDriveError(drive);
    }
    return handle;
  }

  #transition(handle: DriveHandle, next: IndexState): void {
    const from = handle.state.status;
    if (!TRANSITIONS[from].includes(next.status)) {
      throw new InvalidTransitionError(handle.definition.id, from, next.status);
    }
    handle.state = next;
  }

  #startBuild(handle: DriveHandle, source: EntrySource, origin: "walk" | "snapshot"): Promise<BuildOutcome> {
    const promise: Promise<BuildOutcome> = this.#runBuild(handle, source, origin).finally(() => {
      if (handle.building === promise) {
        handle.building = undefined;
      }
    });
    handle.building = promise;
    return promise;
  }

  async #runBuild(handle: DriveHandle, source: EntrySource, origin: "walk" | "snapshot"): Promise<BuildOutcome> {
    const drive = handle.definition.id;
    const generationId = this.#nextGeneration++;
    const started = performance.now();

    this.#transition(handle, { status: "building" });
    this.#onEvent?.({ drive, status: "building" });
    logger.info("index.build.start", { drive, details: { generationId, origin } });

    try {
      const store = await DriveStore.build(drive, source(), { generationId, yieldEvery: this.#yieldEvery });

      await handle.mutex.withLock(() => {
        handle.store = store;
        this.#transition(handle, { status: "ready", count: store.count, generationId });
      });

      const durationMs = performance.now() - started;
      metrics.recordBuild(drive, durationMs, true);
      metrics.updateSize(drive, store.count, store.trigramCount);
      logger.info("index.build.end", {
        drive,
        details: { generationId, count: store.count, durationMs: Math.round(durationMs) },
      });
      this.#onEvent?.({ drive, status: "completed", count: store.count });

      return { drive, ok: true, count: store.count, generationId, durationMs };
    } catch (err) {
      const reason = describeError(err);
      const error = new BuildError(drive, reason, { cause: err });
      this.#transition(handle, { status: "failed", reason });

      const durationMs = performance.now() - started;
      metrics.recordBuild(drive, durationMs, false);
      logger.error("index.build.failed", {
        drive,
        message: error.message,
        details: { generationId, keptGeneration: handle.store?.generationId ?? null },
      });
      this.#onEvent?.({ drive, status: "failed", reason });

      return { drive, ok: false, reason, durationMs };
    }
  }
}
