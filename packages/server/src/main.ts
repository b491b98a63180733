#!/usr/bin/env node

/**
 * stdio entry point for the drive index MCP server
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { logger as sdkLogger } from "@driveindex/sdk";
import { createServer } from "./server.js";
import { openFileIndexService } from "./service/fileindex.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<void> {
  // stdout carries MCP frames; stray console output would corrupt them
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]): void => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const readOnly = process.env.MCP_DRIVEINDEX_READONLY === "true";
  const enabled = process.env.MCP_DRIVEINDEX_ENABLED !== "false";

  if (!enabled) {
    console.error("MCP drive index server is disabled (MCP_DRIVEINDEX_ENABLED=false)");
    process.exit(0);
  }

  // SDK diagnostics only when debugging
  sdkLogger.setEnabled(process.env.LOG_LEVEL === "debug");

  const service = await openFileIndexService();
  const server = createServer(service, { readOnly });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: readOnly ? "readonly" : "readwrite",
    data_dir: service.dataDir,
  });

  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", {});
    await server.close();
    await service.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown.error", { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
