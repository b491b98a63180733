/**
 * Single-drive search executor
 *
 * Plan:
 * 1. Narrow candidates: in name mode, AND groups made only of literals of three
 *    or more code points are resolved through the trigram index (union within
 *    a group, intersection across groups, smallest first); the extension index
 *    joins in when an ext filter is present; otherwise every live id
 * 2. Verify every group and NOT atom against each candidate
 * 3. Run the filter predicate
 * 4. Emit batches in ascending id order, capped at maxResults
 *
 * Candidate ids are captured when the search starts. Records removed by a
 * later delta are skipped when their turn comes; records added later are not seen.
 */

import { compileFilterPredicate } from "./filters.js";
import { compileRecordMatcher } from "./matcher.js";
import { isEmptyQuery } from "./query.js";
import { codePointLength, intersectAll, unionSorted } from "./trigram.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { DriveStore } from "./drive-store.js";
import type { Atom, ExecutionSummary, IndexedFile, MatchMode, Query, SearchOptions, SearchResult } from "./types.js";

export const DEFAULT_MAX_RESULTS = 1000;
export const DEFAULT_BATCH_SIZE = 100;

/** Candidates examined between event-loop yields when few of them match */
const SCAN_YIELD_EVERY = 5000;

/**
 * Checked between batches; a set flag ends the run early
 */
export interface CancellationToken {
  readonly cancelled: boolean;
}

export type SearchBatches = AsyncGenerator<SearchResult[], ExecutionSummary, undefined>;

export function epochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function toSearchResult(record: IndexedFile): SearchResult {
  return {
    name: record.name,
    fullPath: record.fullPath,
    size: record.size,
    mtime: record.mtime,
    isDir: record.isDir,
  };
}

/**
 * Literal texts of a group the trigram index can resolve, if every atom qualifies
 */
function trigramTexts(group: readonly Atom[]): string[] | undefined {
  const texts: string[] = [];
  for (const atom of group) {
    if (atom.kind !== "literal" || codePointLength(atom.text) < 3) {
      return undefined;
    }
    texts.push(atom.text);
  }
  return texts;
}

/**
 * Ascending candidate ids for a query; a superset of the matches
 */
export function narrowCandidates(store: DriveStore, query: Query, mode: MatchMode): readonly number[] {
  const sets: (readonly number[])[] = [];

  if (mode === "name") {
    for (const group of query.groups) {
      const texts = trigramTexts(group);
      if (!texts) continue;
      sets.push(unionSorted(texts.map((text) => store.trigramCandidates(text) ?? [])));
    }
  }

  const ext = query.filters.find((f) => f.kind === "extension");
  if (ext && ext.kind === "extension") {
    sets.push(unionSorted(ext.extensions.map((e) => store.lookupExtension(e))));
  }

  return sets.length > 0 ? intersectAll(sets) : store.liveIds();
}

/**
 * Full per-record check: groups, NOT atoms, then filters
 */
export function compileQueryMatcher(
  query: Query,
  mode: MatchMode,
  nowSeconds: number
): (record: IndexedFile, lowerName: string) => boolean {
  const groups = query.groups.map((group) => group.map((atom) => compileRecordMatcher(atom, mode)));
  const excluded = query.excluded.map((atom) => compileRecordMatcher(atom, mode));
  const filters = compileFilterPredicate(query.filters, nowSeconds);

  return (record, lowerName) => {
    const lowerPath = mode === "path" ? record.fullPath.toLowerCase() : "";
    return (
      groups.every((group) => group.some((m) => m(lowerName, lowerPath))) &&
      !excluded.some((m) => m(lowerName, lowerPath)) &&
      filters(record)
    );
  };
}

/**
 * Stream the matches of `query` in one drive as batches
 *
 * The generator's return value reports how many results were emitted and
 * whether more matches existed beyond maxResults.
 */
export async function* executeSearch(
  store: DriveStore,
  query: Query,
  options: SearchOptions = {},
  token?: CancellationToken
): SearchBatches {
  const started = performance.now();
  const maxResults = Math.max(0, options.maxResults ?? DEFAULT_MAX_RESULTS);
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  const mode = options.matchMode ?? "path";
  const nowSeconds = (options.now ?? epochSeconds)();

  let total = 0;
  let truncated = false;
  let cancelled = false;

  try {
    if (isEmptyQuery(query)) {
      return { total, truncated };
    }

    const candidates = narrowCandidates(store, query, mode);
    const matches = compileQueryMatcher(query, mode, nowSeconds);

    let batch: SearchResult[] = [];
    let sinceYield = 0;

    for (const id of candidates) {
      if (++sinceYield >= SCAN_YIELD_EVERY) {
        sinceYield = 0;
        await tick();
      }

      const record = store.get(id);
      if (!record || !matches(record, store.lowerName(id))) {
        continue;
      }
      if (total >= maxResults) {
        truncated = true;
        break;
      }

      batch.push(toSearchResult(record));
      total++;

      if (batch.length >= batchSize) {
        yield batch;
        batch = [];
        sinceYield = 0;
        await tick();
        if (token?.cancelled) {
          cancelled = true;
          return { total, truncated };
        }
      }
    }

    if (batch.length > 0) {
      yield batch;
    }
    return { total, truncated };
  } finally {
    const durationMs = performance.now() - started;
    metrics.recordSearch(store.drive, durationMs);
    logger.debug("search.end", {
      drive: store.drive,
      details: { query: query.raw, total, truncated, cancelled, durationMs: Math.round(durationMs) },
    });
  }
}
