/**
 * Integration tests for MCP tools
 * Runs the tools against a real file index over an in-process walker
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readdir } from "node:fs/promises";
import { z } from "zod";
import { UnknownDriveError, logger as sdkLogger, openFileIndex } from "@driveindex/sdk";
import { createFakeWalker, createTempDir, drivesOf, makeEntry, removeDir } from "@driveindex/testkit";
import type { FakeWalker } from "@driveindex/testkit";
import type { FileIndex, SearchResult } from "@driveindex/sdk";
import { FileIndexService } from "../../service/fileindex.js";
import { createToolHandlers } from "../../tools.js";
import type { ToolHandler } from "../../tools.js";
import { metrics } from "../../observability/metrics.js";

let dataDir: string;
let fake: FakeWalker;
let index: FileIndex;
let service: FileIndexService;
let tools: Record<string, ToolHandler>;

function tool(name: string): ToolHandler {
  const handler = tools[name];
  if (!handler) throw new Error(`missing tool ${name}`);
  return handler;
}

function paths(value: unknown): string[] {
  const results = z.array(z.object({ fullPath: z.string() }).passthrough()).parse(value);
  return results.map((r) => r.fullPath).sort();
}

beforeEach(async () => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  sdkLogger.setEnabled(false);
  metrics.reset();

  dataDir = await createTempDir();
  fake = createFakeWalker({
    docs: [
      makeEntry("report.pdf", { fullPath: "/test/docs/report.pdf", size: 10 }),
      makeEntry("notes.txt", { fullPath: "/test/docs/notes.txt", size: 20 }),
    ],
    media: [makeEntry("report-video.mp4", { fullPath: "/test/media/report-video.mp4", size: 5_000_000 })],
  });
  index = openFileIndex({ drives: drivesOf("docs", "media"), walker: fake.walker });
  service = new FileIndexService(index, dataDir);
  tools = createToolHandlers(service);
});

afterEach(async () => {
  await service.close();
  await removeDir(dataDir);
  sdkLogger.setEnabled(false);
  vi.restoreAllMocks();
});

describe("Tool integration tests", () => {
  it("should skip drives that have not been built", async () => {
    const result = await tool("search_files")({ query: "report" });

    expect(result.content[0]).toEqual({ type: "text", text: "Found 0 matches" });
    expect(result.structuredContent).toEqual({
      results: [],
      total: 0,
      truncated: false,
      drives: { docs: "skipped", media: "skipped" },
    });
  });

  it("should build every drive and save snapshots", async () => {
    const result = await tool("build_index")({});

    expect(result.content[0]).toEqual({ type: "text", text: "Indexed 2 drives" });
    expect((await readdir(dataDir)).sort()).toEqual(["docs.snapshot.json", "media.snapshot.json"]);

    const status = await tool("index_status")({});
    expect(status.content[0]).toEqual({ type: "text", text: "2/2 drives ready" });
    expect(status.structuredContent).toMatchObject({ readyCount: 2, totalDrives: 2, totalFiles: 3 });
  });

  it("should search across drives", async () => {
    await tool("build_index")({});

    const result = await tool("search_files")({ query: "report" });

    expect(result.content[0]).toEqual({ type: "text", text: "Found 2 matches" });
    expect(paths(result.structuredContent?.results)).toEqual([
      "/test/docs/report.pdf",
      "/test/media/report-video.mp4",
    ]);
  });

  it("should apply filters and a single drive scope", async () => {
    await tool("build_index")({});

    const big = await tool("search_files")({ query: "report size:>1mb" });
    expect(paths(big.structuredContent?.results)).toEqual(["/test/media/report-video.mp4"]);

    const docs = await tool("search_files")({ query: "ext:txt", drive: "docs" });
    expect(paths(docs.structuredContent?.results)).toEqual(["/test/docs/notes.txt"]);
  });

  it("should match parent folders unless nameOnly is set", async () => {
    await tool("build_index")({});

    const byPath = await tool("search_files")({ query: "docs" });
    expect(paths(byPath.structuredContent?.results)).toEqual(["/test/docs/notes.txt", "/test/docs/report.pdf"]);

    const byName = await tool("search_files")({ query: "docs", nameOnly: true });
    expect(byName.structuredContent).toMatchObject({ results: [], total: 0 });
  });

  it("should cap results at the limit across drives", async () => {
    await tool("build_index")({});

    const result = await tool("search_files")({ query: "report", limit: 1 });

    expect(result.content[0]).toEqual({ type: "text", text: "Found 1 match (truncated)" });
    expect(result.structuredContent).toMatchObject({ total: 1, truncated: true });
    expect(metrics.getCounter("driveindex.search.truncated_total")).toBe(1);
    expect(metrics.getHistogram("driveindex.search.results")?.sum).toBe(1);
  });

  it("should report drives that failed to build", async () => {
    fake.fail("media", new Error("disk offline"));

    const result = await tool("build_index")({});

    expect(result.content[0]).toEqual({ type: "text", text: "Indexed 1 drive, 1 failed" });
    expect(result.structuredContent).toEqual({
      builtDrives: ["docs"],
      failedDrives: [{ drive: "media", reason: "disk offline" }],
    });
    expect((await readdir(dataDir)).sort()).toEqual(["docs.snapshot.json"]);
  });

  it("should explain a query", async () => {
    const result = await tool("explain_query")({ query: "report|summary !draft ext:pdf" });

    expect(result.content[0]).toEqual({ type: "text", text: "1 keyword group, 1 filter" });
    expect(result.structuredContent).toEqual({
      query: {
        raw: "report|summary !draft ext:pdf",
        groups: [
          [
            { kind: "literal", text: "report" },
            { kind: "literal", text: "summary" },
          ],
        ],
        excluded: [{ kind: "literal", text: "draft" }],
        filters: [{ kind: "extension", extensions: ["pdf"] }],
      },
    });
  });

  it("should cancel the search session when the caller aborts", async () => {
    await tool("build_index")({});
    const cancel = vi.spyOn(index, "cancelSearch");
    const controller = new AbortController();

    const pending = service.search({ query: "report", limit: 10, nameOnly: false }, controller.signal);
    controller.abort(new Error("caller gave up"));

    await expect(pending).rejects.toThrow("caller gave up");
    expect(cancel).toHaveBeenCalledWith("search_files:1");
  });

  it("should reject invalid input before running", async () => {
    await expect(tool("search_files")({ query: "" })).rejects.toBeInstanceOf(z.ZodError);
    await expect(tool("index_status")({ drive: "../etc" })).rejects.toBeInstanceOf(z.ZodError);
    expect(metrics.getCounter("driveindex.tool.calls_total", { tool: "search_files" })).toBe(0);
  });

  it("should surface unknown drives and record the failure", async () => {
    await expect(tool("search_files")({ query: "x", drive: "nope" })).rejects.toBeInstanceOf(UnknownDriveError);

    expect(metrics.getCounter("driveindex.tool.calls_total", { tool: "search_files" })).toBe(1);
    expect(metrics.getCounter("driveindex.tool.errors_total", { tool: "search_files", err_code: "E_UNKNOWN_DRIVE" })).toBe(1);
  });
});
