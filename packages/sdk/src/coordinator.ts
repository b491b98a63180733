/**
 * Multi-drive search coordinator
 *
 * Invariants:
 * - Scope is resolved when search() is called, so scope errors throw there
 * - Each drive has at most one batch pulled ahead of the consumer
 * - A newer search under the same session key cancels the older one; a
 *   cancelled stream yields nothing further and has no completion event
 * - A drive whose executor throws is reported as "failed"; other drives go on
 */

import { DriveNotReadyError, UnknownDriveError, describeError } from "./errors.js";
import { executeSearch } from "./executor.js";
import { logger } from "./observability/logs.js";
import type { DriveStore } from "./drive-store.js";
import type { SearchBatches } from "./executor.js";
import type { IndexRegistry } from "./lifecycle.js";
import type {
  CoordinatorSearchOptions,
  DriveId,
  DriveSearchStatus,
  ExecutionSummary,
  Query,
  Scope,
  SearchEvent,
  SearchResult,
} from "./types.js";

interface Session {
  readonly id: number;
  readonly key?: string;
  cancelled: boolean;
}

interface Target {
  drive: DriveId;
  store: DriveStore;
}

interface ResolvedScope {
  targets: Target[];
  drives: Record<DriveId, DriveSearchStatus>;
}

type Pull =
  | { index: number; result: IteratorResult<SearchResult[], ExecutionSummary> }
  | { index: number; error: unknown };

export class SearchCoordinator {
  #registry: IndexRegistry;
  #sessions = new Map<string, Session>();
  #nextSession = 1;

  constructor(registry: IndexRegistry) {
    this.#registry = registry;
  }

  /**
   * Search a scope, superseding any running search with the same session key
   * @throws UnknownDriveError for a drive the registry does not know
   * @throws DriveNotReadyError for an explicit drive with no published generation
   */
  search(query: Query, scope: Scope, options: CoordinatorSearchOptions = {}): AsyncGenerator<SearchEvent, void, undefined> {
    const resolved = this.#resolve(scope);

    const session: Session = { id: this.#nextSession++, key: options.sessionKey, cancelled: false };
    if (session.key !== undefined) {
      const previous = this.#sessions.get(session.key);
      if (previous) {
        previous.cancelled = true;
        logger.debug("search.superseded", { details: { sessionKey: session.key, sessionId: previous.id } });
      }
      this.#sessions.set(session.key, session);
    }

    return this.#stream(session, query, resolved, options);
  }

  /**
   * Cancel the running search under a session key
   * @returns false when no search is running under that key
   */
  cancel(sessionKey: string): boolean {
    const session = this.#sessions.get(sessionKey);
    if (!session) return false;
    session.cancelled = true;
    this.#sessions.delete(sessionKey);
    return true;
  }

  /**
   * Cancel every running search
   */
  cancelAll(): void {
    for (const session of this.#sessions.values()) {
      session.cancelled = true;
    }
    this.#sessions.clear();
  }

  #resolve(scope: Scope): ResolvedScope {
    const targets: Target[] = [];
    const drives: Record<DriveId, DriveSearchStatus> = {};

    if (scope === "all") {
      for (const drive of this.#registry.drives()) {
        const store = this.#registry.store(drive);
        if (store) {
          targets.push({ drive, store });
          drives[drive] = "searched";
        } else {
          drives[drive] = this.#registry.status(drive).status === "building" ? "not-ready" : "skipped";
        }
      }
      return { targets, drives };
    }

    if (!this.#registry.has(scope)) {
      throw new UnknownDriveError(scope);
    }
    const store = this.#registry.store(scope);
    if (!store) {
      throw new DriveNotReadyError(scope, this.#registry.status(scope).status);
    }
    targets.push({ drive: scope, store });
    drives[scope] = "searched";
    return { targets, drives };
  }

  async *#stream(
    session: Session,
    query: Query,
    { targets, drives }: ResolvedScope,
    options: CoordinatorSearchOptions
  ): AsyncGenerator<SearchEvent, void, undefined> {
    const sources: { drive: DriveId; batches: SearchBatches; done: boolean }[] = targets.map((t) => ({
      drive: t.drive,
      batches: executeSearch(t.store, query, options, session),
      done: false,
    }));

    const pull = (index: number): Promise<Pull> =>
      sources[index]!.batches.next().then(
        (result) => ({ index, result }),
        (error: unknown) => ({ index, error })
      );

    const pending = new Map<number, Promise<Pull>>();
    sources.forEach((_, index) => pending.set(index, pull(index)));

    let total = 0;
    let truncated = false;

    try {
      while (pending.size > 0) {
        const settled = await Promise.race(pending.values());
        pending.delete(settled.index);
        if (session.cancelled) return;

        const source = sources[settled.index]!;
        if ("error" in settled) {
          source.done = true;
          drives[source.drive] = "failed";
          logger.warn("search.drive_failed", { drive: source.drive, message: describeError(settled.error) });
          continue;
        }

        if (settled.result.done) {
          source.done = true;
          total += settled.result.value.total;
          truncated ||= settled.result.value.truncated;
          continue;
        }

        yield { type: "batch", sessionId: session.id, drive: source.drive, results: settled.result.value };
        if (session.cancelled) return;

        pending.set(settled.index, pull(settled.index));
      }

      yield { type: "complete", sessionId: session.id, total, truncated, drives };
    } finally {
      session.cancelled = true;
      if (session.key !== undefined && this.#sessions.get(session.key) === session) {
        this.#sessions.delete(session.key);
      }
      // Release executors that did not run to completion
      await Promise.allSettled(sources.filter((s) => !s.done).map((s) => s.batches.return({ total: 0, truncated: false })));
    }
  }
}
