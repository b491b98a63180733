import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { DriveStore, extensionOf } from "./drive-store.js";
import type { RawEntry } from "./types.js";

function entry(name: string, overrides: Partial<RawEntry> = {}): RawEntry {
  return { name, fullPath: `/d/${name}`, size: 10, mtime: 1_700_000_000, isDir: false, ...overrides };
}

function storeOf(names: string[]): DriveStore {
  const store = new DriveStore("d", 1);
  for (const name of names) store.add(entry(name));
  return store;
}

function namesOf(store: DriveStore, ids: readonly number[]): string[] {
  return ids.map((id) => store.get(id)?.name ?? "?");
}

describe("extensionOf", () => {
  it("should return the lowercase suffix", () => {
    expect(extensionOf("Photo.JPG", false)).toBe("jpg");
    expect(extensionOf("archive.tar.gz", false)).toBe("gz");
  });

  it("should be empty for directories, dot-files and trailing dots", () => {
    expect(extensionOf("src.d", true)).toBe("");
    expect(extensionOf(".bashrc", false)).toBe("");
    expect(extensionOf("README", false)).toBe("");
    expect(extensionOf("notes.", false)).toBe("");
  });
});

describe("DriveStore", () => {
  it("should build from an async iterable", async () => {
    async function* entries(): AsyncGenerator<RawEntry> {
      yield entry("a.txt");
      yield entry("b.txt");
      yield entry("c.txt");
    }

    const store = await DriveStore.build("d", entries(), { generationId: 7, yieldEvery: 2 });
    expect(store.count).toBe(3);
    expect(store.generationId).toBe(7);
    expect([...store.records()].map((r) => r.id)).toEqual([0, 1, 2]);
  });

  it("should freeze records", () => {
    const record = storeOf(["a.txt"]).get(0);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("should look up by name and extension", () => {
    const store = storeOf(["Report.PDF", "report.pdf", "memo.txt"]);
    expect(store.lookupName("REPORT.pdf")).toEqual([0, 1]);
    expect(store.lookupExtension("pdf")).toEqual([0, 1]);
    expect(store.lookupExtension("doc")).toEqual([]);
  });

  it("should keep directories out of the extension index", () => {
    const store = new DriveStore("d", 1);
    store.add(entry("photos.jpg", { isDir: true }));
    expect(store.lookupExtension("jpg")).toEqual([]);
    expect(store.get(0)?.extension).toBe("");
  });

  it("should return trigram candidates", () => {
    const store = storeOf(["photo.jpg", "photograph.png", "notes.txt"]);
    expect(store.trigramCandidates("photo")).toEqual([0, 1]);
    expect(store.trigramCandidates("zzz")).toEqual([]);
    expect(store.trigramCandidates("ph")).toBeUndefined();
  });

  it("should find by name with short needles through a scan", () => {
    const store = storeOf(["ab.txt", "cab", "xyz"]);
    expect(store.findByName("ab")).toEqual([0, 1]);
  });

  it("should verify trigram candidates by substring", () => {
    // "abcxbcd" has trigrams abc and bcd but not "abcd"
    const store = storeOf(["abcxbcd", "abcd.txt"]);
    expect(store.trigramCandidates("abcd")).toEqual([0, 1]);
    expect(store.findByName("abcd")).toEqual([1]);
  });

  it("should purge removed records from every index", () => {
    const store = storeOf(["photo.jpg", "photo2.jpg"]);
    expect(store.remove(0)).toBe(true);
    expect(store.remove(0)).toBe(false);
    expect(store.count).toBe(1);
    expect(store.get(0)).toBeUndefined();
    expect(store.lookupName("photo.jpg")).toEqual([]);
    expect(store.lookupExtension("jpg")).toEqual([1]);
    expect(store.trigramCandidates("photo")).toEqual([1]);
    expect(store.liveIds()).toEqual([1]);
  });

  it("should never reuse removed ids", () => {
    const store = storeOf(["a.txt"]);
    store.remove(0);
    expect(store.add(entry("b.txt")).id).toBe(1);
  });

  it("should remove by full path case-insensitively", () => {
    const store = new DriveStore("d", 1);
    store.add(entry("same.txt", { fullPath: "/d/one/same.txt" }));
    store.add(entry("same.txt", { fullPath: "/d/two/same.txt" }));

    expect(store.removeByPath("/D/TWO/same.txt")?.id).toBe(1);
    expect(store.removeByPath("/d/three/same.txt")).toBeUndefined();
    expect(store.liveIds()).toEqual([0]);
  });

  it("should report stats", () => {
    const store = new DriveStore("d", 1);
    store.add(entry("a.bin", { size: 100 }));
    store.add(entry("b.bin", { size: 50 }));
    store.add(entry("dir", { isDir: true, size: 0 }));
    expect(store.stats()).toEqual({ files: 2, directories: 1, totalBytes: 150 });
  });

  it("should match a linear substring scan for any needle of three or more characters", () => {
    const alphabet = fc.constantFrom("a", "b", "c", ".", "é", "😀");
    const name = fc.stringOf(alphabet, { minLength: 1, maxLength: 8 });

    fc.assert(
      fc.property(fc.array(name, { maxLength: 30 }), fc.stringOf(alphabet, { minLength: 3, maxLength: 4 }), (names, needle) => {
        const store = storeOf(names);
        const expected = names.flatMap((n, id) => (n.toLowerCase().includes(needle.toLowerCase()) ? [id] : []));
        expect(store.findByName(needle)).toEqual(expected);
      })
    );
  });

  it("should leave lookups unchanged after add then remove", () => {
    const store = storeOf(["photo.jpg", "notes.txt", "photo_old.png"]);
    const before = namesOf(store, store.findByName("photo"));

    const added = store.add(entry("photo_new.jpg"));
    expect(namesOf(store, store.findByName("photo"))).toEqual(["photo.jpg", "photo_old.png", "photo_new.jpg"]);

    store.remove(added.id);
    expect(namesOf(store, store.findByName("photo"))).toEqual(before);
    expect(store.lookupExtension("jpg")).toEqual([0]);
  });
});
