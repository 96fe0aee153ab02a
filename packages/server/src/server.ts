/**
 * MCP server for the network registry
 * Exposes dataset queries as tools; transports are attached by the caller
 *
 * Protocol: Model Context Protocol (MCP)
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema, ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { PaginationPreconditionError } from "@netviz/engine";
import { READ_ONLY_TOOLS, createToolHandlers, isToolName, toolDefinitions } from "./tools.js";
import type { DatasetService } from "./service/dataset.js";
import { logger, errorCode } from "./observability/logger.js";

export { DatasetService, MAX_SEARCH_RESULTS } from "./service/dataset.js";
export { TOOL_NAMES, READ_ONLY_TOOLS, toolDefinitions, createToolHandlers } from "./tools.js";
export type { ToolName, ToolResult, ToolHandlers } from "./tools.js";
export { Logger, logger, parseLogLevel } from "./observability/logger.js";
export { MetricsRegistry, metrics } from "./observability/metrics.js";

export const SERVER_NAME = "netviz-server";
export const SERVER_VERSION = "0.1.0";

export interface ServerOptions {
  /** Hide and refuse tools that change server state */
  readOnly?: boolean;
}

/**
 * Map validation errors to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    // Zod validation errors -> Invalid params
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ")}`,
    };
  }

  if (error instanceof PaginationPreconditionError) {
    return { code: ErrorCode.InvalidParams, message: error.message };
  }

  if (error instanceof Error) {
    return { code: ErrorCode.InternalError, message: error.message };
  }

  // Unknown error type
  return {
    code: ErrorCode.InternalError,
    message: String(error),
  };
}

/**
 * Create and configure the MCP server
 */
export function createServer(service: DatasetService, options: ServerOptions = {}): Server {
  const readOnly = options.readOnly ?? false;
  const handlers = createToolHandlers(service);

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

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = readOnly
      ? toolDefinitions.filter((t) => isToolName(t.name) && READ_ONLY_TOOLS.has(t.name))
      : toolDefinitions;

    return { tools };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      if (readOnly && !READ_ONLY_TOOLS.has(name)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }

      return await handlers[name](args);
    } catch (error) {
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCode(error),
        err_message: error instanceof Error ? error.message : String(error),
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
