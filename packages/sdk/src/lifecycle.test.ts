import { describe, it, expect, beforeEach } from "vitest";
import { createFakeWalker, drivesOf, makeDir, makeEntry, withTempDir } from "@driveindex/testkit";
import { IndexRegistry } from "./lifecycle.js";
import { InvalidDriveIdError, SnapshotReadError, UnknownDriveError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { FakeWalker } from "@driveindex/testkit";
import type { IndexBuildingEvent } from "./lifecycle.js";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";

function paths(registry: IndexRegistry, drive: string): string[] {
  return [...(registry.store(drive)?.records() ?? [])].map((r) => r.fullPath).sort();
}

describe("IndexRegistry", () => {
  let fake: FakeWalker;
  let events: IndexBuildingEvent[];
  let registry: IndexRegistry;

  beforeEach(() => {
    logger.setEnabled(false);
    metrics.reset();
    fake = createFakeWalker({
      c: [makeEntry("a.txt", { fullPath: "/c/a.txt" }), makeDir("docs", { fullPath: "/c/docs" })],
      d: [makeEntry("b.txt", { fullPath: "/d/b.txt" })],
    });
    events = [];
    registry = new IndexRegistry(drivesOf("c", "d"), {
      walker: fake.walker,
      onEvent: (event) => events.push(event),
    });
  });

  it("should start every drive as not built", () => {
    expect(registry.drives()).toEqual(["c", "d"]);
    expect(registry.status("c")).toEqual({ status: "not-built" });
    expect(registry.store("c")).toBeUndefined();
  });

  it("should publish a generation and become ready", async () => {
    const outcome = await registry.buildOrRebuild("c");

    expect(outcome).toMatchObject({ drive: "c", ok: true, count: 2, generationId: 1 });
    expect(registry.status("c")).toEqual({ status: "ready", count: 2, generationId: 1 });
    expect(registry.store("c")?.count).toBe(2);
    expect(events).toEqual([
      { drive: "c", status: "building" },
      { drive: "c", status: "completed", count: 2 },
    ]);
    expect(metrics.getMetrics("c")).toMatchObject({ builds: 1, records: 2 });
  });

  it("should report building while the walk is in progress", async () => {
    fake.hold("c");
    const pending = registry.buildOrRebuild("c");
    expect(registry.status("c")).toEqual({ status: "building" });

    fake.release("c");
    await pending;
    expect(registry.status("c").status).toBe("ready");
  });

  it("should coalesce concurrent builds of one drive", async () => {
    fake.hold("c");
    const first = registry.buildOrRebuild("c");
    const second = registry.buildOrRebuild("c");
    expect(second).toBe(first);

    fake.release("c");
    const [a, b] = await Promise.all([first, second]);
    expect(a).toBe(b);
    expect(fake.walks("c")).toBe(1);

    await registry.buildOrRebuild("c");
    expect(fake.walks("c")).toBe(2);
  });

  it("should build drives independently", async () => {
    fake.fail("d", new Error("disk offline"));
    const [c, d] = await Promise.all([registry.buildOrRebuild("c"), registry.buildOrRebuild("d")]);

    expect(c.ok).toBe(true);
    expect(d).toMatchObject({ drive: "d", ok: false, reason: "disk offline" });
    expect(registry.status("c").status).toBe("ready");
    expect(registry.status("d")).toEqual({ status: "failed", reason: "disk offline" });
  });

  it("should keep the previous generation when a rebuild fails", async () => {
    await registry.buildOrRebuild("c");
    const published = registry.store("c");

    fake.fail("c", new Error("permission denied"));
    const outcome = await registry.buildOrRebuild("c");

    expect(outcome.ok).toBe(false);
    expect(registry.status("c")).toEqual({ status: "failed", reason: "permission denied" });
    expect(registry.store("c")).toBe(published);
    expect(events.at(-1)).toEqual({ drive: "c", status: "failed", reason: "permission denied" });
    expect(metrics.getMetrics("c")?.buildFailures).toBe(1);
  });

  it("should recover from a failed build", async () => {
    fake.fail("c", new Error("busy"));
    await registry.buildOrRebuild("c");
    expect(registry.status("c").status).toBe("failed");

    fake.set("c", [makeEntry("new.txt", { fullPath: "/c/new.txt" })]);
    await registry.buildOrRebuild("c");
    expect(registry.status("c")).toEqual({ status: "ready", count: 1, generationId: 2 });
  });

  it("should fail the build when the walker throws before yielding", async () => {
    const throwing = new IndexRegistry(drivesOf("x"), {
      walker: () => {
        throw new Error("root missing");
      },
    });
    const outcome = await throwing.buildOrRebuild("x");
    expect(outcome).toMatchObject({ ok: false, reason: "root missing" });
    expect(throwing.store("x")).toBeUndefined();
  });

  it("should produce equal generations when nothing changed", async () => {
    const first = await registry.buildOrRebuild("c");
    const before = paths(registry, "c");
    const second = await registry.buildOrRebuild("c");

    expect(second.ok && first.ok && second.count === first.count).toBe(true);
    expect(paths(registry, "c")).toEqual(before);
    expect(registry.status("c")).toMatchObject({ generationId: 2 });
  });

  it("should reject unknown drives", () => {
    expect(() => registry.status("z")).toThrow(UnknownDriveError);
    expect(() => registry.buildOrRebuild("z")).toThrow(UnknownDriveError);
  });

  it("should reject invalid and duplicate drive ids", () => {
    expect(() => new IndexRegistry(drivesOf("all"), { walker: fake.walker })).toThrow(InvalidDriveIdError);
    expect(() => new IndexRegistry(drivesOf("../x"), { walker: fake.walker })).toThrow(InvalidDriveIdError);
    expect(() => new IndexRegistry(drivesOf("c", "c"), { walker: fake.walker })).toThrow(InvalidDriveIdError);
  });

  describe("applyDelta", () => {
    it("should ignore deltas before the first build", async () => {
      const outcome = await registry.applyDelta("c", [makeEntry("x.txt")], []);
      expect(outcome).toEqual({ drive: "c", applied: false, added: 0, removed: 0 });
    });

    it("should apply removals then additions to the published generation", async () => {
      await registry.buildOrRebuild("c");

      const outcome = await registry.applyDelta(
        "c",
        [makeEntry("a.txt", { fullPath: "/c/a.txt", size: 99 })],
        ["/c/a.txt", "/c/missing.txt"]
      );

      expect(outcome).toEqual({ drive: "c", applied: true, added: 1, removed: 1 });
      expect(registry.status("c")).toEqual({ status: "ready", count: 2, generationId: 1 });
      const sizes = [...(registry.store("c")?.records() ?? [])].map((r) => [r.fullPath, r.size]);
      expect(sizes).toEqual([
        ["/c/docs", 0],
        ["/c/a.txt", 99],
      ]);
    });

    it("should remove by record id", async () => {
      await registry.buildOrRebuild("c");
      const outcome = await registry.applyDelta("c", [], [0, 0]);
      expect(outcome.removed).toBe(1);
      expect(paths(registry, "c")).toEqual(["/c/docs"]);
    });
  });

  describe("snapshots", () => {
    it("should round-trip a generation through a snapshot", async () => {
      await withTempDir(async (dir) => {
        await registry.buildOrRebuild("c");
        const file = await registry.saveSnapshot("c", dir);
        expect(file).toBe(join(dir, "c.snapshot.json"));

        const restored = new IndexRegistry(drivesOf("c", "d"), { walker: fake.walker });
        const outcome = await restored.loadSnapshot("c", dir);

        expect(outcome).toMatchObject({ ok: true, count: 2 });
        expect(restored.status("c").status).toBe("ready");
        expect(paths(restored, "c")).toEqual(paths(registry, "c"));
        expect(restored.store("c")?.get(1)?.isDir).toBe(true);
      });
    });

    it("should save nothing for a drive without a generation", async () => {
      await withTempDir(async (dir) => {
        expect(await registry.saveSnapshot("d", dir)).toBeUndefined();
      });
    });

    it("should leave the drive untouched when no snapshot exists", async () => {
      await withTempDir(async (dir) => {
        expect(await registry.loadSnapshot("c", dir)).toBeUndefined();
        expect(registry.status("c")).toEqual({ status: "not-built" });
      });
    });

    it("should throw on a corrupt snapshot", async () => {
      await withTempDir(async (dir) => {
        await writeFile(join(dir, "c.snapshot.json"), "{ not json", "utf-8");
        await expect(registry.loadSnapshot("c", dir)).rejects.toBeInstanceOf(SnapshotReadError);
        expect(registry.status("c")).toEqual({ status: "not-built" });
      });
    });

    it("should skip loading while a build is in flight", async () => {
      await withTempDir(async (dir) => {
        fake.hold("c");
        const pending = registry.buildOrRebuild("c");
        expect(await registry.loadSnapshot("c", dir)).toBeUndefined();
        fake.release("c");
        await pending;
      });
    });
  });
});
