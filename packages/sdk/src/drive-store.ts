/**
 * Per-drive metadata store with name, extension and trigram indexes
 *
 * Invariants:
 * - Record ids are array slots, assigned in insertion order, stable only within
 *   one generation
 * - Every index bucket is an ascending, deduplicated id list
 * - Removed records are tombstoned; their slot is never reused in a generation
 * - Directories are not entered in the extension index
 * - Only the lifecycle manager writes to a store (build, add, remove)
 */

import { trigramsOf, intersectAll, insertSorted, removeSorted, codePointLength } from "./trigram.js";
import type { TextMatcher } from "./matcher.js";
import type { DriveId, IndexedFile, RawEntry, StoreStats } from "./types.js";

/**
 * Lowercase extension of a name; empty for directories, dot-files and names without a dot
 */
export function extensionOf(name: string, isDir: boolean): string {
  if (isDir) return "";
  const dot = name.lastIndexOf(".");
  if (dot <= 0 || dot === name.length - 1) return "";
  return name.slice(dot + 1).toLowerCase();
}

export interface BuildStoreOptions {
  generationId: number;
  /** Entries between event-loop yields (default: 5000) */
  yieldEvery?: number;
}

const EMPTY: readonly number[] = Object.freeze([]);

/**
 * One generation of a drive's index
 */
export class DriveStore {
  readonly drive: DriveId;
  readonly generationId: number;
  readonly builtAt: number;

  #records: (IndexedFile | undefined)[] = [];
  #lowerNames: string[] = [];
  #nameIndex = new Map<string, number[]>();
  #extIndex = new Map<string, number[]>();
  #trigramIndex = new Map<string, number[]>();
  #live = 0;

  constructor(drive: DriveId, generationId: number) {
    this.drive = drive;
    this.generationId = generationId;
    this.builtAt = Date.now();
  }

  /**
   * Build a new generation from walker entries
   */
  static async build(
    drive: DriveId,
    entries: AsyncIterable<RawEntry> | Iterable<RawEntry>,
    options: BuildStoreOptions
  ): Promise<DriveStore> {
    const store = new DriveStore(drive, options.generationId);
    const yieldEvery = Math.max(1, options.yieldEvery ?? 5000);

    let sinceYield = 0;
    for await (const entry of entries) {
      store.add(entry);
      if (++sinceYield >= yieldEvery) {
        sinceYield = 0;
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }

    return store;
  }

  /** Live (non-tombstoned) record count */
  get count(): number {
    return this.#live;
  }

  /** Number of distinct trigrams indexed */
  get trigramCount(): number {
    return this.#trigramIndex.size;
  }

  /**
   * Append a record and enter it into every index
   */
  add(entry: RawEntry): IndexedFile {
    const id = this.#records.length;
    const record: IndexedFile = Object.freeze({
      id,
      name: entry.name,
      fullPath: entry.fullPath,
      size: entry.size,
      mtime: entry.mtime,
      isDir: entry.isDir,
      extension: extensionOf(entry.name, entry.isDir),
      attributes: entry.attributes ?? 0,
    });
    const lower = entry.name.toLowerCase();

    this.#records.push(record);
    this.#lowerNames.push(lower);
    this.#live++;

    bucket(this.#nameIndex, lower).push(id);
    if (record.extension) {
      bucket(this.#extIndex, record.extension).push(id);
    }
    for (const tri of trigramsOf(lower)) {
      // Ids only grow, but insertSorted keeps the invariant if that ever changes
      insertSorted(bucket(this.#trigramIndex, tri), id);
    }

    return record;
  }

  /**
   * Tombstone a record and purge it from every index bucket
   * @returns false if the id is unknown or already removed
   */
  remove(id: number): boolean {
    const record = this.#records[id];
    if (!record) {
      return false;
    }

    const lower = this.#lowerNames[id] ?? record.name.toLowerCase();
    purge(this.#nameIndex, lower, id);
    if (record.extension) {
      purge(this.#extIndex, record.extension, id);
    }
    for (const tri of trigramsOf(lower)) {
      purge(this.#trigramIndex, tri, id);
    }

    this.#records[id] = undefined;
    this.#live--;
    return true;
  }

  /**
   * Remove the record with this full path (case-insensitive), found through the name index
   */
  removeByPath(fullPath: string): IndexedFile | undefined {
    const wanted = fullPath.toLowerCase();
    const name = wanted.split(/[\\/]/).filter(Boolean).pop() ?? wanted;

    for (const id of this.lookupName(name)) {
      const record = this.#records[id];
      if (record && record.fullPath.toLowerCase() === wanted) {
        this.remove(id);
        return record;
      }
    }
    return undefined;
  }

  get(id: number): IndexedFile | undefined {
    return this.#records[id];
  }

  /**
   * Lowercase name of a record (kept even after removal)
   */
  lowerName(id: number): string {
    return this.#lowerNames[id] ?? "";
  }

  /**
   * Ids of every live record, ascending
   */
  liveIds(): number[] {
    const ids: number[] = [];
    for (let id = 0; id < this.#records.length; id++) {
      if (this.#records[id]) ids.push(id);
    }
    return ids;
  }

  /**
   * Live records in insertion order
   */
  *records(): IterableIterator<IndexedFile> {
    for (const record of this.#records) {
      if (record) yield record;
    }
  }

  lookupName(name: string): readonly number[] {
    return this.#nameIndex.get(name.toLowerCase()) ?? EMPTY;
  }

  lookupExtension(ext: string): readonly number[] {
    return this.#extIndex.get(ext.toLowerCase()) ?? EMPTY;
  }

  /**
   * Candidate ids whose name contains every trigram of `text`
   * @returns undefined when `text` is too short for the trigram index
   */
  trigramCandidates(text: string): number[] | undefined {
    const grams = trigramsOf(text.toLowerCase());
    if (grams.length === 0) {
      return undefined;
    }

    const buckets: (readonly number[])[] = [];
    for (const gram of grams) {
      const ids = this.#trigramIndex.get(gram);
      if (!ids) {
        return [];
      }
      buckets.push(ids);
    }
    return intersectAll(buckets);
  }

  /**
   * Ids whose lowercase name contains `text`: trigram candidates verified by
   * substring, or a linear scan for text shorter than three code points
   */
  findByName(text: string): number[] {
    const needle = text.toLowerCase();
    const candidates = codePointLength(needle) >= 3 ? this.trigramCandidates(needle) : undefined;

    if (candidates === undefined) {
      return this.scan((name) => name.includes(needle));
    }
    return candidates.filter((id) => this.lowerName(id).includes(needle));
  }

  /**
   * Linear scan of every live record's lowercase name
   */
  scan(matcher: TextMatcher): number[] {
    const ids: number[] = [];
    for (let id = 0; id < this.#records.length; id++) {
      if (this.#records[id] && matcher(this.lowerName(id))) {
        ids.push(id);
      }
    }
    return ids;
  }

  stats(): StoreStats {
    let files = 0;
    let directories = 0;
    let totalBytes = 0;
    for (const record of this.records()) {
      if (record.isDir) {
        directories++;
      } else {
        files++;
        totalBytes += record.size;
      }
    }
    return { files, directories, totalBytes };
  }
}

function bucket(index: Map<string, number[]>, key: string): number[] {
  let ids = index.get(key);
  if (!ids) {
    ids = [];
    index.set(key, ids);
  }
  return ids;
}

function purge(index: Map<string, number[]>, key: string, id: number): void {
  const ids = index.get(key);
  if (!ids) return;
  removeSorted(ids, id);
  if (ids.length === 0) {
    index.delete(key);
  }
}
