/**
 * In-memory LRU cache of compiled queries, keyed by raw query string
 *
 * Compilation is deterministic and relative dates stay unresolved in the
 * compiled form, so a cached Query never goes stale.
 */

import { compileQuery } from "./query.js";
import type { Query } from "./types.js";

/**
 * Configuration options for the query cache
 */
export interface QueryCacheOptions {
  /** Maximum number of compiled queries to keep (default: 256) */
  maxSize?: number;
}

/**
 * Cache statistics for monitoring and debugging
 */
export interface QueryCacheStats {
  /** Current number of cached queries */
  size: number;
  /** Cache hit rate (hits / total requests) */
  hitRate: number;
  /** Total number of evictions performed */
  evicted: number;
}

/**
 * LRU cache for compiled queries
 *
 * Uses native Map with insertion-order for O(1) LRU operations.
 */
export class QueryCache {
  private cache = new Map<string, Query>();
  private maxSize: number;
  private hits = 0;
  private misses = 0;
  private evicted = 0;

  constructor(options: QueryCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 256;

    // Respect DRIVEINDEX_QUERY_CACHE_SIZE environment variable
    const envCacheSize = process.env.DRIVEINDEX_QUERY_CACHE_SIZE;
    if (envCacheSize !== undefined) {
      const size = parseInt(envCacheSize, 10);
      if (!isNaN(size) && size >= 0) {
        this.maxSize = size;
      }
    }
  }

  /**
   * Compiled query for `raw`, compiling and caching on a miss
   */
  compile(raw: string): Query {
    const cached = this.cache.get(raw);
    if (cached) {
      // LRU: Move to end (most recently used)
      this.cache.delete(raw);
      this.cache.set(raw, cached);
      this.hits++;
      return cached;
    }

    this.misses++;
    const query = compileQuery(raw);
    if (this.maxSize > 0) {
      this.cache.set(raw, query);
      this.evictIfNeeded();
    }
    return query;
  }

  clear(): void {
    this.cache.clear();
  }

  stats(): QueryCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      hitRate: total > 0 ? this.hits / total : 0,
      evicted: this.evicted,
    };
  }

  /**
   * Evict oldest entries until within the size limit
   */
  private evictIfNeeded(): void {
    while (this.cache.size > this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey === undefined) break;

      this.cache.delete(firstKey);
      this.evicted++;
    }
  }
}
