/**
 * MCP tool implementations for the drive index
 * Each tool returns a text summary plus the full payload as JSON text and structured content
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { errorCode } from "@driveindex/sdk";
import {
  BuildIndexInputSchema,
  ExplainQueryInputSchema,
  IndexStatusInputSchema,
  SearchFilesInputSchema,
} from "./schemas.js";
import type { FileIndexService } from "./service/fileindex.js";
import { logger } from "./observability/logger.js";
import { recordSearchResults, recordToolExecution } from "./observability/metrics.js";

export type ToolHandler = (args: unknown) => Promise<CallToolResult>;

/** Tools that never change the index */
export const READ_ONLY_TOOLS: readonly string[] = ["search_files", "index_status", "explain_query"];

export interface ToolTimeouts {
  search: number;
  build: number;
  status: number;
}

export const DEFAULT_TIMEOUTS: ToolTimeouts = {
  search: 5000,
  build: 10 * 60 * 1000,
  status: 2000,
};

export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(tool: string, timeoutMs: number) {
    super(`Tool ${tool} execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

// Wrap tool execution with timeout, logging, and metrics
async function executeTool<T>(
  toolName: string,
  timeoutMs: number,
  handler: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: Error | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const controller = new AbortController();

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        const timeout = new ToolTimeoutError(toolName, timeoutMs);
        controller.abort(timeout);
        reject(timeout);
      }, timeoutMs);
    });

    const result = await Promise.race([handler(controller.signal), timeoutPromise]);
    success = true;
    return result;
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
    throw error;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, error);
    recordToolExecution(toolName, duration, success, errorCode(error));
  }
}

function toolResult(summary: string, payload: Record<string, unknown>): CallToolResult {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(payload) },
    ],
    structuredContent: payload,
  };
}

function plural(count: number, word: string, words = `${word}s`): string {
  return `${count} ${count === 1 ? word : words}`;
}

/**
 * Create tool handlers bound to a service
 */
export function createToolHandlers(
  service: FileIndexService,
  timeouts: ToolTimeouts = DEFAULT_TIMEOUTS
): Record<string, ToolHandler> {
  return {
    /**
     * search_files: search indexed files and folders
     */
    search_files: async (args) => {
      const input = SearchFilesInputSchema.parse(args);

      return executeTool("search_files", timeouts.search, async (signal) => {
        const response = await service.search(input, signal);
        recordSearchResults(response.total, response.truncated);
        const suffix = response.truncated ? " (truncated)" : "";
        return toolResult(`Found ${plural(response.total, "match", "matches")}${suffix}`, { ...response });
      });
    },

    /**
     * build_index: walk drives and publish a new index generation
     */
    build_index: async (args) => {
      const { drive } = BuildIndexInputSchema.parse(args);

      return executeTool("build_index", timeouts.build, async () => {
        const summary = await service.build(drive);
        const failed = summary.failedDrives.length;
        const text =
          failed === 0
            ? `Indexed ${plural(summary.builtDrives.length, "drive")}`
            : `Indexed ${plural(summary.builtDrives.length, "drive")}, ${failed} failed`;
        return toolResult(text, { ...summary });
      });
    },

    /**
     * index_status: per-drive index state
     */
    index_status: async (args) => {
      const { drive } = IndexStatusInputSchema.parse(args);

      return executeTool("index_status", timeouts.status, async () => {
        const report = service.status(drive);
        return toolResult(`${report.readyCount}/${plural(report.totalDrives, "drive")} ready`, { ...report });
      });
    },

    /**
     * explain_query: compiled form of a query
     */
    explain_query: async (args) => {
      const { query } = ExplainQueryInputSchema.parse(args);

      return executeTool("explain_query", timeouts.status, async () => {
        const compiled = service.explain(query);
        return toolResult(
          `${plural(compiled.groups.length, "keyword group")}, ${plural(compiled.filters.length, "filter")}`,
          { query: compiled }
        );
      });
    },
  };
}

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions = [
  {
    name: "search_files",
    description:
      "Search indexed file and folder names. Supports keywords (AND), a|b (OR), !word (NOT), wildcards (* ?), " +
      "and filters: ext:, size:, dm:, len:, attrib:, path:, file:, folder:",
    inputSchema: {
      type: "object" as const,
      properties: {
        query: {
          type: "string",
          description: "Query text, e.g. 'report ext:pdf size:>1mb'",
        },
        drive: {
          type: "string",
          description: "Drive id to search (default: all drives)",
        },
        limit: {
          type: "number",
          description: "Maximum number of results (max 1000, default 100)",
        },
        nameOnly: {
          type: "boolean",
          description: "Match keywords against file names only (default: name or full path)",
        },
      },
      required: ["query"],
    },
  },
  {
    name: "build_index",
    description: "Build (or rebuild) the index for one or all drives and save snapshots",
    inputSchema: {
      type: "object" as const,
      properties: {
        drive: {
          type: "string",
          description: "Drive id to build (default: all drives)",
        },
      },
    },
  },
  {
    name: "index_status",
    description: "Report the index state of one or all drives",
    inputSchema: {
      type: "object" as const,
      properties: {
        drive: {
          type: "string",
          description: "Drive id (default: all drives)",
        },
      },
    },
  },
  {
    name: "explain_query",
    description: "Show how a query is compiled into keyword groups, exclusions and filters",
    inputSchema: {
      type: "object" as const,
      properties: {
        query: {
          type: "string",
          description: "Query text",
        },
      },
      required: ["query"],
    },
  },
];
