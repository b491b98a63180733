/**
 * Core types for the drive index
 */

/**
 * Attribute bits carried by an indexed entry
 */
export const Attribute = {
  HIDDEN: 1,
  READONLY: 2,
  SYSTEM: 4,
} as const;

/**
 * Drive identifier (e.g. "c", "data", "home")
 */
export type DriveId = string;

/**
 * Search or build scope: one drive or every known drive
 */
export type Scope = DriveId | "all";

/**
 * One filesystem entry as yielded by a walker
 */
export interface RawEntry {
  /** File or directory name (last path segment) */
  name: string;
  /** Absolute path of the entry */
  fullPath: string;
  /** Size in bytes (0 for directories) */
  size: number;
  /** Modification time in seconds since epoch */
  mtime: number;
  /** True for directories */
  isDir: boolean;
  /** Attribute bitset, see {@link Attribute} */
  attributes?: number;
}

/**
 * Immutable snapshot of one filesystem entry at index time
 */
export interface IndexedFile {
  /** Record id, stable only within one generation */
  readonly id: number;
  readonly name: string;
  readonly fullPath: string;
  readonly size: number;
  readonly mtime: number;
  readonly isDir: boolean;
  /** Lowercase extension without the dot; empty for directories */
  readonly extension: string;
  readonly attributes: number;
}

/**
 * Result row handed to consumers
 */
export interface SearchResult {
  name: string;
  fullPath: string;
  size: number;
  mtime: number;
  isDir: boolean;
}

/**
 * Walker collaborator: enumerates the entries of a drive
 */
export type Walker = (drive: DriveDefinition) => AsyncIterable<RawEntry> | Iterable<RawEntry>;

/**
 * Drive definition
 */
export interface DriveDefinition {
  id: DriveId;
  /** Root directory walked for this drive */
  root: string;
}

// ---------------------------------------------------------------------------
// Query model
// ---------------------------------------------------------------------------

/**
 * Keyword atom: literal substring or wildcard pattern (both lowercase)
 */
export type Atom =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "wildcard"; readonly pattern: string };

/**
 * Numeric range; absent bounds are open
 */
export interface NumericRange {
  readonly min?: number;
  readonly max?: number;
  readonly minExclusive?: boolean;
  readonly maxExclusive?: boolean;
}

/**
 * Unresolved point in time, resolved against the clock at evaluation
 */
export type DateBound =
  | { readonly kind: "absolute"; readonly epochSeconds: number }
  | { readonly kind: "ago"; readonly seconds: number }
  | { readonly kind: "startOfDay"; readonly daysAgo: number }
  | { readonly kind: "startOfYear" };

/**
 * Date range: `from` inclusive, `to` exclusive
 */
export interface DateRange {
  readonly from?: DateBound;
  readonly to?: DateBound;
}

/**
 * One filter of a FilterSet. Values inside a filter are alternatives.
 */
export type Filter =
  | { readonly kind: "extension"; readonly extensions: readonly string[] }
  | { readonly kind: "size"; readonly ranges: readonly NumericRange[] }
  | { readonly kind: "modified"; readonly ranges: readonly DateRange[] }
  | { readonly kind: "pathLength"; readonly ranges: readonly NumericRange[] }
  | { readonly kind: "attributes"; readonly masks: readonly number[] }
  | { readonly kind: "path"; readonly needles: readonly string[] }
  | { readonly kind: "entryType"; readonly type: "file" | "folder" };

/**
 * Every filter must pass
 */
export type FilterSet = readonly Filter[];

/**
 * Compiled query
 */
export interface Query {
  readonly raw: string;
  /** AND-list of OR-groups */
  readonly groups: readonly (readonly Atom[])[];
  /** Atoms that must not match */
  readonly excluded: readonly Atom[];
  readonly filters: FilterSet;
}

// ---------------------------------------------------------------------------
// Index state
// ---------------------------------------------------------------------------

export type IndexState =
  | { status: "not-built" }
  | { status: "building" }
  | { status: "ready"; count: number; generationId: number }
  | { status: "failed"; reason: string };

export type IndexStatus = IndexState["status"];

/**
 * Outcome of one drive build
 */
export type BuildOutcome =
  | { drive: DriveId; ok: true; count: number; generationId: number; durationMs: number }
  | { drive: DriveId; ok: false; reason: string; durationMs: number };

/**
 * Outcome of an incremental delta
 */
export interface DeltaOutcome {
  drive: DriveId;
  applied: boolean;
  added: number;
  removed: number;
}

/**
 * Index statistics for one drive generation
 */
export interface StoreStats {
  files: number;
  directories: number;
  totalBytes: number;
}

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

/**
 * Which text a keyword atom is verified against
 */
export type MatchMode = "name" | "path";

export interface SearchOptions {
  /** Maximum results per drive (default: 1000) */
  maxResults?: number;
  /** Results per batch (default: 100) */
  batchSize?: number;
  /** Keyword verification target (default: "path", name or full path) */
  matchMode?: MatchMode;
  /** Clock used to resolve relative dates, in seconds since epoch */
  now?: () => number;
}

/**
 * Per-drive completion of a single executor run
 */
export interface ExecutionSummary {
  total: number;
  truncated: boolean;
}

export type DriveSearchStatus = "searched" | "skipped" | "not-ready" | "failed";

export type SearchEvent =
  | { type: "batch"; sessionId: number; drive: DriveId; results: SearchResult[] }
  | {
      type: "complete";
      sessionId: number;
      total: number;
      truncated: boolean;
      drives: Record<DriveId, DriveSearchStatus>;
    };

export type SearchCompleteEvent = Extract<SearchEvent, { type: "complete" }>;

export interface CoordinatorSearchOptions extends SearchOptions {
  /** Logical session; a newer search with the same key supersedes older ones */
  sessionKey?: string;
}

// ---------------------------------------------------------------------------
// Facade
// ---------------------------------------------------------------------------

export interface FileIndexOptions {
  drives: DriveDefinition[];
  /** Walker used for builds (default: filesystem walker over each drive root) */
  walker?: Walker;
  /** Directory names skipped by the default walker */
  skipDirs?: string[];
  maxResults?: number;
  batchSize?: number;
  /** Maximum drives built at once (default: 4) */
  buildConcurrency?: number;
  /** Entries between event-loop yields during builds (default: 5000) */
  yieldEvery?: number;
  /** Compiled query cache size (default: 256) */
  queryCacheSize?: number;
}

export interface BuildSummary {
  builtDrives: DriveId[];
  failedDrives: { drive: DriveId; reason: string }[];
}

export interface IndexStatusReport {
  perDrive: Record<DriveId, IndexState>;
  readyCount: number;
  totalDrives: number;
  totalFiles: number;
}

export interface SearchSummary {
  sessionId: number;
  total: number;
  truncated: boolean;
  drives: Record<DriveId, DriveSearchStatus>;
}

/**
 * Outbound events
 */
export interface FileIndexEvents {
  "search-batch": [{ sessionId: number; drive: DriveId; results: SearchResult[] }];
  "search-complete": [{ sessionId: number; total: number }];
  "index-building": [
    { drive: DriveId; status: "building" | "completed" | "failed"; reason?: string; count?: number },
  ];
  "index-rebuild-finished": [{ success: number; failed: number; message: string }];
}
