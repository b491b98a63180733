/**
 * In-process walkers and entry builders for index tests
 */

import type { DriveDefinition, RawEntry, Walker } from "@driveindex/sdk";

/**
 * Build a raw entry; fullPath defaults to `/test/<name>`
 */
export function makeEntry(name: string, overrides: Partial<RawEntry> = {}): RawEntry {
  return {
    name,
    fullPath: `/test/${name}`,
    size: 0,
    mtime: 1_700_000_000,
    isDir: false,
    ...overrides,
  };
}

/**
 * Build a directory entry
 */
export function makeDir(name: string, overrides: Partial<RawEntry> = {}): RawEntry {
  return makeEntry(name, { isDir: true, ...overrides });
}

/**
 * Fake walker over fixed entries per drive
 *
 * Entries are copied on every walk, so tests may mutate the fixture between
 * builds. A drive without fixture entries walks as empty.
 */
export interface FakeWalker {
  walker: Walker;
  /** Replace the entries of a drive */
  set(drive: string, entries: RawEntry[]): void;
  /** Make the next walks of a drive throw */
  fail(drive: string, error: Error): void;
  /** Hold walks of a drive until release() is called */
  hold(drive: string): void;
  release(drive: string): void;
  /** Number of walks started per drive */
  walks(drive: string): number;
}

export function createFakeWalker(initial: Record<string, RawEntry[]> = {}): FakeWalker {
  const entries = new Map<string, RawEntry[]>(Object.entries(initial));
  const failures = new Map<string, Error>();
  const gates = new Map<string, { promise: Promise<void>; open: () => void }>();
  const counts = new Map<string, number>();

  async function* walk(drive: DriveDefinition): AsyncGenerator<RawEntry> {
    counts.set(drive.id, (counts.get(drive.id) ?? 0) + 1);

    const gate = gates.get(drive.id);
    if (gate) {
      await gate.promise;
    }
    const failure = failures.get(drive.id);
    if (failure) {
      throw failure;
    }
    for (const entry of [...(entries.get(drive.id) ?? [])]) {
      yield { ...entry };
    }
  }

  return {
    walker: walk,
    set(drive, list) {
      entries.set(drive, list);
      failures.delete(drive);
    },
    fail(drive, error) {
      failures.set(drive, error);
    },
    hold(drive) {
      let open = (): void => undefined;
      const promise = new Promise<void>((resolve) => {
        open = resolve;
      });
      gates.set(drive, { promise, open });
    },
    release(drive) {
      gates.get(drive)?.open();
      gates.delete(drive);
    },
    walks(drive) {
      return counts.get(drive) ?? 0;
    },
  };
}

/**
 * Drive definitions for ids, rooted under /test
 */
export function drivesOf(...ids: string[]): DriveDefinition[] {
  return ids.map((id) => ({ id, root: `/test/${id}` }));
}
