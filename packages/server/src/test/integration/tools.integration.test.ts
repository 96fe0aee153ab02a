/**
 * Integration tests for MCP tools
 * Tests the full flow of tool execution against a real dump file
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { writeFile } from "node:fs/promises";
import { ZodError } from "zod";
import { silentSink } from "@netviz/engine";
import { createTempDir, makeRecord, removeDir, sampleRecords, toDump, writeDump } from "@netviz/testkit";
import { createToolHandlers } from "../../tools.js";
import type { ToolHandlers, ToolResult } from "../../tools.js";
import { DatasetService } from "../../service/dataset.js";
import { metrics } from "../../observability/metrics.js";

const quiet = { log: silentSink };

let testRoot: string;
let file: string;
let tools: ToolHandlers;

function summary(result: ToolResult): string {
  return result.content[0]?.text ?? "";
}

function payload(result: ToolResult): unknown {
  const item = result.content[1];
  if (!item) {
    throw new Error("tool result has no payload");
  }
  return JSON.parse(item.text);
}

beforeEach(async () => {
  testRoot = await createTempDir("netviz-tools-test-");
  file = await writeDump(testRoot, sampleRecords);
  tools = createToolHandlers(await DatasetService.open(file, quiet));
});

afterEach(async () => {
  await removeDir(testRoot);
});

describe("Tool integration tests", () => {
  describe("get_stats", () => {
    it("should report totals and breakdowns", async () => {
      const result = await tools.get_stats({});

      expect(result.content).toHaveLength(2);
      expect(summary(result)).toBe(`5 networks loaded from ${file}`);
      expect(payload(result)).toEqual({
        totalNetworks: 5,
        networkTypes: [
          { value: "NSP", count: 2 },
          { value: "Content", count: 1 },
          { value: "Educational/Research", count: 1 },
          { value: "Enterprise", count: 1 },
        ],
        policyTypes: [
          { value: "Open", count: 1 },
          { value: "Selective", count: 1 },
          { value: "Restrictive", count: 1 },
          { value: "open", count: 1 },
        ],
        scopes: [
          { value: "Global", count: 2 },
          { value: "Regional", count: 1 },
        ],
        snapshot: { source: file, loadedAt: expect.any(String), records: 5, dropped: 0 },
      });
    });

    it("should report a missing data file", async () => {
      const missing = join(testRoot, "missing.json");
      const result = await createToolHandlers(await DatasetService.open(missing, quiet)).get_stats(undefined);

      expect(summary(result)).toBe(`Dataset unavailable: Data source unavailable: ${missing}`);
      expect(payload(result)).toEqual(
        expect.objectContaining({
          totalNetworks: 0,
          snapshot: expect.objectContaining({ records: 0, error: expect.objectContaining({ code: "ENOENT" }) }),
        })
      );
    });

    it("should reject arguments", async () => {
      await expect(tools.get_stats({ verbose: true })).rejects.toBeInstanceOf(ZodError);
    });
  });

  describe("list_networks", () => {
    it("should list the first page by default", async () => {
      const result = await tools.list_networks(undefined);

      expect(summary(result)).toBe("Page 1 of 1 (5 networks)");
      expect(payload(result)).toEqual(
        expect.objectContaining({ page: 1, perPage: 25, totalPages: 1, totalItems: 5 })
      );
    });

    it("should filter by type case-insensitively", async () => {
      const result = await tools.list_networks({ type: "nsp" });

      expect(summary(result)).toBe("Page 1 of 1 (2 networks)");
      expect(payload(result)).toEqual(
        expect.objectContaining({
          items: [expect.objectContaining({ id: 1 }), expect.objectContaining({ id: 3 })],
        })
      );
    });

    it("should combine the text query with filters", async () => {
      const result = await tools.list_networks({ q: "6450", policy: "OPEN" });

      expect(summary(result)).toBe("Page 1 of 1 (2 networks)");
      expect(payload(result)).toEqual(
        expect.objectContaining({
          items: [expect.objectContaining({ id: 1 }), expect.objectContaining({ id: 4 })],
        })
      );
    });

    it("should paginate", async () => {
      const result = await tools.list_networks({ page: 3, perPage: 2 });

      expect(summary(result)).toBe("Page 3 of 3 (5 networks)");
      expect(payload(result)).toEqual({
        items: [{ id: 5, asn: 64504, status: "deleted", info_type: "Enterprise", ix_count: 0, fac_count: 1 }],
        page: 3,
        perPage: 2,
        totalPages: 3,
        totalItems: 5,
      });
    });

    it("should reject a page size above 100", async () => {
      await expect(tools.list_networks({ perPage: 101 })).rejects.toThrow(/perPage cannot exceed 100/);
    });
  });

  describe("search_networks", () => {
    it("should find networks by name fragment", async () => {
      const result = await tools.search_networks({ name: "TRANSIT" });

      expect(summary(result)).toBe("Found 2 matching networks");
      expect(payload(result)).toEqual({
        results: [expect.objectContaining({ id: 1 }), expect.objectContaining({ id: 3 })],
        count: 2,
        truncated: false,
      });
    });

    it("should match an ASN or a name", async () => {
      const result = await tools.search_networks({ asn: 64504, name: "campus" });

      expect(payload(result)).toEqual(
        expect.objectContaining({
          results: [expect.objectContaining({ id: 4 }), expect.objectContaining({ id: 5 })],
          count: 2,
        })
      );
    });

    it("should return nothing without criteria", async () => {
      const result = await tools.search_networks({});

      expect(summary(result)).toBe("Found 0 matching networks");
      expect(payload(result)).toEqual({ results: [], count: 0, truncated: false });
    });

    it("should cap large result sets", async () => {
      const records = Array.from({ length: 1005 }, (_, i) => makeRecord(i + 1));
      await writeFile(file, toDump(records), "utf-8");
      const capped = createToolHandlers(await DatasetService.open(file, quiet));

      const result = await capped.search_networks({ name: "network" });

      expect(summary(result)).toBe("Found 1005 matching networks (showing first 1000)");
      const body = payload(result);
      expect(body).toEqual(expect.objectContaining({ count: 1005, truncated: true }));
      expect(body).toHaveProperty("results.length", 1000);
    });
  });

  describe("chart tools", () => {
    it("should return network type counts", async () => {
      const result = await tools.network_types({});

      expect(summary(result)).toBe("4 network types");
      expect(payload(result)).toEqual({
        labels: ["NSP", "Content", "Educational/Research", "Enterprise"],
        data: [2, 1, 1, 1],
      });
    });

    it("should return prefix counts for networks reporting both families", async () => {
      const result = await tools.prefixes_distribution({});

      expect(summary(result)).toBe("Prefix counts for 2 networks");
      expect(payload(result)).toEqual({
        networks: ["Example Transit", "Sample Content Delivery"],
        ipv4: [1200, 80],
        ipv6: [300, 0],
      });
    });

    it("should return exchange and facility pairs", async () => {
      const result = await tools.ix_facility_correlation({});

      expect(summary(result)).toBe("3 networks with exchange and facility counts");
      expect(payload(result)).toEqual({
        points: [
          { x: 25, y: 40, label: "Example Transit" },
          { x: 60, y: 12, label: "Sample Content Delivery" },
          { x: 0, y: 1, label: "5" },
        ],
        count: 3,
      });
    });
  });

  describe("reload_dataset", () => {
    it("should publish a changed dump", async () => {
      await writeDump(testRoot, sampleRecords.slice(0, 2));

      const result = await tools.reload_dataset({});

      expect(summary(result)).toBe(`Reloaded 2 networks from ${file}`);
      expect(payload(result)).toEqual({
        published: true,
        snapshot: { source: file, loadedAt: expect.any(String), records: 2, dropped: 0 },
      });
      expect(summary(await tools.get_stats({}))).toBe(`2 networks loaded from ${file}`);
    });

    it("should keep serving the current snapshot when the dump breaks", async () => {
      await writeFile(file, "{", "utf-8");

      const result = await tools.reload_dataset({});

      expect(summary(result)).toMatch(/^Reload failed \(Malformed data source /);
      expect(summary(result)).toContain("still serving 5 networks");
      expect(payload(result)).toEqual(
        expect.objectContaining({
          published: false,
          snapshot: expect.objectContaining({ records: 5 }),
          error: expect.objectContaining({ code: "MALFORMED_SOURCE" }),
        })
      );
      expect(summary(await tools.get_stats({}))).toBe(`5 networks loaded from ${file}`);
    });

    it("should recover once a missing dump appears", async () => {
      const late = join(testRoot, "late.json");
      const recovering = createToolHandlers(await DatasetService.open(late, quiet));

      expect(summary(await recovering.reload_dataset({}))).toBe(`Dataset unavailable: Data source unavailable: ${late}`);

      await writeDump(testRoot, sampleRecords, "late.json");
      expect(summary(await recovering.reload_dataset({}))).toBe(`Reloaded 5 networks from ${late}`);
    });
  });

  describe("metrics", () => {
    it("should count calls per tool", async () => {
      const before = metrics.getCounter("netviz.tool.calls_total", { tool: "network_types" });

      await tools.network_types({});
      await tools.network_types({});

      expect(metrics.getCounter("netviz.tool.calls_total", { tool: "network_types" })).toBe(before + 2);
    });
  });
});
