/**
 * End-to-end MCP protocol tests over an in-memory transport
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { logger as sdkLogger, openFileIndex } from "@driveindex/sdk";
import { createFakeWalker, createTempDir, drivesOf, makeEntry, removeDir } from "@driveindex/testkit";
import { createServer } from "../../server.js";
import type { ServerOptions } from "../../server.js";
import { FileIndexService } from "../../service/fileindex.js";

let dataDir: string;
let service: FileIndexService;
let client: Client;
let closeServer: () => Promise<void>;

async function connect(options: ServerOptions = {}): Promise<void> {
  const server = createServer(service, options);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  client = new Client({ name: "test-client", version: "1.0.0" });
  await client.connect(clientTransport);
  closeServer = () => server.close();
}

beforeEach(async () => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  sdkLogger.setEnabled(false);

  dataDir = await createTempDir();
  const fake = createFakeWalker({
    docs: [makeEntry("report.pdf", { fullPath: "/test/docs/report.pdf", size: 10 })],
  });
  service = new FileIndexService(openFileIndex({ drives: drivesOf("docs"), walker: fake.walker }), dataDir);
});

afterEach(async () => {
  await client.close();
  await closeServer();
  await service.close();
  await removeDir(dataDir);
  sdkLogger.setEnabled(false);
  vi.restoreAllMocks();
});

describe("MCP server", () => {
  it("should list all tools", async () => {
    await connect();

    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name)).toEqual(["search_files", "build_index", "index_status", "explain_query"]);
  });

  it("should build and search through tool calls", async () => {
    await connect();

    await client.callTool({ name: "build_index", arguments: {} });
    const result = await client.callTool({ name: "search_files", arguments: { query: "report" } });

    expect(result.content).toEqual([
      { type: "text", text: "Found 1 match" },
      {
        type: "text",
        text: JSON.stringify({
          results: [{ name: "report.pdf", fullPath: "/test/docs/report.pdf", size: 10, mtime: 1_700_000_000, isDir: false }],
          total: 1,
          truncated: false,
          drives: { docs: "searched" },
        }),
      },
    ]);
  });

  it("should map validation errors to InvalidParams", async () => {
    await connect();

    await expect(client.callTool({ name: "search_files", arguments: { query: "" } })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
  });

  it("should map SDK errors to InternalError", async () => {
    await connect();

    await expect(
      client.callTool({ name: "search_files", arguments: { query: "report", drive: "nope" } })
    ).rejects.toMatchObject({ code: ErrorCode.InternalError });
  });

  it("should reject unknown tools", async () => {
    await connect();

    await expect(client.callTool({ name: "delete_files", arguments: {} })).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });
  });

  it("should hide and refuse build_index in read-only mode", async () => {
    await connect({ readOnly: true });

    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual(["search_files", "index_status", "explain_query"]);

    await expect(client.callTool({ name: "build_index", arguments: {} })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
  });
});
