import { describe, it, expect } from "vitest";
import { readdir, readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { withTempDir } from "@driveindex/testkit";
import { atomicWrite, readTextFile } from "./io.js";
import { SnapshotReadError, SnapshotWriteError } from "./errors.js";

describe("atomicWrite", () => {
  it("should create parent directories and leave no temp files", async () => {
    await withTempDir(async (dir) => {
      const target = join(dir, "nested", "home.snapshot.json");

      await atomicWrite(target, '{"ok":true}');

      expect(await readFile(target, "utf-8")).toBe('{"ok":true}');
      expect(await readdir(join(dir, "nested"))).toEqual(["home.snapshot.json"]);
    });
  });

  it("should replace existing content", async () => {
    await withTempDir(async (dir) => {
      const target = join(dir, "a.json");
      await writeFile(target, "old");

      await atomicWrite(target, "new");

      expect(await readFile(target, "utf-8")).toBe("new");
    });
  });

  it("should wrap failures in SnapshotWriteError", async () => {
    await withTempDir(async (dir) => {
      // Target is an existing directory, so the rename fails
      const target = join(dir, "taken");
      await mkdir(join(target, "child"), { recursive: true });

      await expect(atomicWrite(target, "x")).rejects.toBeInstanceOf(SnapshotWriteError);
      expect(await readdir(dir)).toEqual(["taken"]);
    });
  });
});

describe("readTextFile", () => {
  it("should return null for a missing file", async () => {
    await withTempDir(async (dir) => {
      expect(await readTextFile(join(dir, "missing.json"))).toBeNull();
    });
  });

  it("should throw SnapshotReadError for a directory", async () => {
    await withTempDir(async (dir) => {
      await expect(readTextFile(dir)).rejects.toBeInstanceOf(SnapshotReadError);
    });
  });
});
