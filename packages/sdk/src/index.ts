/**
 * Drive index SDK
 *
 * In-memory file-metadata index over one or more drives, with a free-text
 * query language and streaming, cancellable multi-drive search
 */

// Re-export types
export type {
  DriveId,
  Scope,
  RawEntry,
  IndexedFile,
  SearchResult,
  Walker,
  DriveDefinition,
  Atom,
  NumericRange,
  DateBound,
  DateRange,
  Filter,
  FilterSet,
  Query,
  IndexState,
  IndexStatus,
  BuildOutcome,
  DeltaOutcome,
  StoreStats,
  MatchMode,
  SearchOptions,
  ExecutionSummary,
  DriveSearchStatus,
  SearchEvent,
  SearchCompleteEvent,
  CoordinatorSearchOptions,
  FileIndexOptions,
  BuildSummary,
  IndexStatusReport,
  SearchSummary,
  FileIndexEvents,
} from "./types.js";
export { Attribute } from "./types.js";

// Facade
export type { FileIndex } from "./file-index.js";
export { openFileIndex, INTERACTIVE_SESSION } from "./file-index.js";

// Query compiler
export { compileQuery, tokenize, isEmptyQuery } from "./query.js";
export type { QueryCacheOptions, QueryCacheStats } from "./cache.js";
export { QueryCache } from "./cache.js";
export { parseSize, parseFilterValue, isFilterKey, FILTER_KEYS, localDayStart, resolveDateBound } from "./filters.js";
export type { FilterKey } from "./filters.js";
export { compileWildcard } from "./matcher.js";

// Store, lifecycle, search
export { DriveStore, extensionOf } from "./drive-store.js";
export type { BuildStoreOptions } from "./drive-store.js";
export { IndexRegistry } from "./lifecycle.js";
export type { IndexRegistryOptions, IndexBuildingEvent, RemovedEntry } from "./lifecycle.js";
export { executeSearch, narrowCandidates, DEFAULT_BATCH_SIZE, DEFAULT_MAX_RESULTS } from "./executor.js";
export type { CancellationToken, SearchBatches } from "./executor.js";
export { SearchCoordinator } from "./coordinator.js";
export { createFsWalker, DEFAULT_SKIP_DIRS } from "./walker.js";
export type { FsWalkerOptions } from "./walker.js";
export { writeSnapshot, readSnapshot, snapshotPath, SNAPSHOT_VERSION } from "./snapshot.js";
export type { SnapshotFile, SnapshotRecord, LoadedSnapshot } from "./snapshot.js";
export { validateDriveId, isRawEntry } from "./validation.js";
export { loadIndexConfig, parseIndexConfig, configDrives, expandTilde, IndexConfigSchema, DEFAULT_DRIVE_ID } from "./config.js";
export type { IndexConfig } from "./config.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogEntry, LogLevel } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { DriveMetrics } from "./observability/metrics.js";

// Errors
export {
  DriveIndexError,
  DriveNotReadyError,
  UnknownDriveError,
  BuildError,
  InvalidTransitionError,
  InvalidDriveIdError,
  SnapshotReadError,
  SnapshotWriteError,
  IndexClosedError,
  ConfigError,
  errorCode,
  describeError,
} from "./errors.js";
