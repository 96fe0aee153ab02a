/**
 * MCP protocol tests
 * Drives the server through a client over a linked in-memory transport
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { silentSink, PaginationPreconditionError } from "@netviz/engine";
import { createTempDir, removeDir, sampleRecords, writeDump } from "@netviz/testkit";
import { createServer, mapErrorToMcp, SERVER_NAME } from "../../server.js";
import { DatasetService } from "../../service/dataset.js";
import { TOOL_NAMES } from "../../tools.js";

const quiet = { log: silentSink };

let testRoot: string;
let file: string;
let client: Client;
let server: Server;

async function connect(options: { readOnly?: boolean } = {}): Promise<void> {
  server = createServer(await DatasetService.open(file, quiet), options);
  client = new Client({ name: "netviz-test-client", version: "0.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
}

function callTool(name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
  return client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
}

function texts(result: CallToolResult): string[] {
  return result.content.flatMap((item) => (item.type === "text" ? [item.text] : []));
}

describe("MCP server", () => {
  beforeEach(async () => {
    testRoot = await createTempDir("netviz-server-test-");
    file = await writeDump(testRoot, sampleRecords);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await removeDir(testRoot);
  });

  it("should identify itself", async () => {
    await connect();
    expect(client.getServerVersion()).toEqual({ name: SERVER_NAME, version: "0.1.0" });
  });

  it("should list every tool", async () => {
    await connect();
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name)).toEqual([...TOOL_NAMES]);
  });

  it("should answer tool calls with a summary and a JSON payload", async () => {
    await connect();
    const result = await callTool("search_networks", { asn: 64501 });

    const [summary, json] = texts(result);
    expect(summary).toBe("Found 1 matching networks");
    expect(JSON.parse(json ?? "")).toEqual({
      results: [expect.objectContaining({ id: 2, name: "Sample Content Delivery" })],
      count: 1,
      truncated: false,
    });
  });

  it("should accept a call without arguments", async () => {
    await connect();
    const result = await client.request(
      { method: "tools/call", params: { name: "network_types" } },
      CallToolResultSchema
    );

    expect(texts(result)[0]).toBe("4 network types");
  });

  it("should map validation failures to InvalidParams", async () => {
    await connect();

    await expect(callTool("list_networks", { perPage: 500 })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
      message: expect.stringContaining("perPage: perPage cannot exceed 100"),
    });
  });

  it("should reject unknown tools", async () => {
    await connect();

    await expect(callTool("drop_everything")).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
      message: expect.stringContaining("Unknown tool: drop_everything"),
    });
  });

  it("should reload through the protocol", async () => {
    await connect();
    await writeDump(testRoot, sampleRecords.slice(0, 1));

    const result = await callTool("reload_dataset");

    expect(texts(result)[0]).toBe(`Reloaded 1 networks from ${file}`);
  });

  describe("read-only mode", () => {
    it("should hide the reload tool", async () => {
      await connect({ readOnly: true });
      const { tools } = await client.listTools();

      expect(tools.map((t) => t.name)).not.toContain("reload_dataset");
      expect(tools).toHaveLength(TOOL_NAMES.length - 1);
    });

    it("should refuse reload calls", async () => {
      await connect({ readOnly: true });

      await expect(callTool("reload_dataset")).rejects.toMatchObject({
        code: ErrorCode.InvalidRequest,
        message: expect.stringContaining("Tool 'reload_dataset' not available in read-only mode"),
      });
    });

    it("should still serve queries", async () => {
      await connect({ readOnly: true });
      const result = await callTool("get_stats");

      expect(texts(result)[0]).toBe(`5 networks loaded from ${file}`);
    });
  });
});

describe("mapErrorToMcp", () => {
  it("should map pagination preconditions to InvalidParams", () => {
    const mapped = mapErrorToMcp(new PaginationPreconditionError("perPage must be positive"));

    expect(mapped).toEqual({
      code: ErrorCode.InvalidParams,
      message: "Invalid pagination request: perPage must be positive",
    });
  });

  it("should map other failures to InternalError", () => {
    expect(mapErrorToMcp(new Error("disk on fire"))).toEqual({ code: ErrorCode.InternalError, message: "disk on fire" });
    expect(mapErrorToMcp("bare string")).toEqual({ code: ErrorCode.InternalError, message: "bare string" });
  });
});
