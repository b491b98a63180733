/**
 * MCP server for the drive index
 * Exposes search, build, status and explain tools
 *
 * Protocol: Model Context Protocol (MCP)
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { errorCode } from "@driveindex/sdk";
import { READ_ONLY_TOOLS, ToolTimeoutError, createToolHandlers, toolDefinitions } from "./tools.js";
import type { ToolTimeouts } from "./tools.js";
import type { FileIndexService } from "./service/fileindex.js";
import { logger } from "./observability/logger.js";

export const SERVER_NAME = "driveindex-server";
export const SERVER_VERSION = "0.1.0";

export interface ServerOptions {
  /** Hide and refuse tools that change the index */
  readOnly?: boolean;
  timeouts?: ToolTimeouts;
}

/**
 * Map errors to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`,
    };
  }

  if (error instanceof ToolTimeoutError) {
    return {
      code: ErrorCode.RequestTimeout,
      message: error.message,
    };
  }

  if (error instanceof Error) {
    return {
      code: ErrorCode.InternalError,
      message: error.message,
    };
  }

  return {
    code: ErrorCode.InternalError,
    message: String(error),
  };
}

/**
 * Create and configure the MCP server (not yet connected to a transport)
 */
export function createServer(service: FileIndexService, options: ServerOptions = {}): Server {
  const readOnly = options.readOnly ?? false;
  const handlers = createToolHandlers(service, options.timeouts);

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = readOnly ? toolDefinitions.filter((t) => READ_ONLY_TOOLS.includes(t.name)) : toolDefinitions;
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (readOnly && !READ_ONLY_TOOLS.includes(name)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }

      const handler = Object.hasOwn(handlers, name) ? handlers[name] : undefined;
      if (!handler) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      return await handler(args ?? {});
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCode(err),
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  return server;
}
