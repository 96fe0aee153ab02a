#!/usr/bin/env -S node --import tsx

/**
 * stdio entry point for the netviz MCP server
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadServerConfig } from "./config.js";
import { createServer } from "./server.js";
import { DatasetService } from "./service/dataset.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<void> {
  // Override console methods to prevent accidental stdout pollution
  // MCP protocol uses stdout, so any stray console.log/info/debug breaks it
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]): void => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const { enabled, readOnly, dataFile } = loadServerConfig();

  if (!enabled) {
    console.error("netviz MCP server is disabled (NETVIZ_MCP_ENABLED=false)");
    process.exit(0);
  }

  const service = await DatasetService.open(dataFile);
  const server = createServer(service, { readOnly });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: readOnly ? "readonly" : "readwrite",
    data_file: dataFile,
  });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", {});
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
