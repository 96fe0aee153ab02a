/**
 * Performance benchmarks for loading and querying a registry snapshot
 * Run with: npm run bench
 */

import { describe, it, expect, beforeAll } from "vitest";
import { createDataset, memorySource } from "../src/dataset.js";
import { load } from "../src/loader.js";
import type { Dataset } from "../src/types.js";

const TYPES = ["NSP", "Content", "Cable/DSL/ISP", "Enterprise", "Educational/Research"];
const POLICIES = ["Open", "Selective", "Restrictive", "No"];

function buildDump(count: number): string {
  const data = Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    name: `Network ${i + 1}`,
    asn: 64512 + i,
    info_type: TYPES[i % TYPES.length],
    policy_general: POLICIES[i % POLICIES.length],
    info_scope: i % 2 === 0 ? "Global" : "Regional",
    status: "ok",
    info_prefixes4: i % 500,
    info_prefixes6: i % 50,
    ix_count: i % 40,
    fac_count: i % 25,
  }));
  return JSON.stringify({ data });
}

describe("Query Performance Benchmarks", () => {
  const dump = buildDump(30000);
  let dataset: Dataset;

  beforeAll(async () => {
    dataset = await createDataset(memorySource(dump));
  });

  it("30000 records, load < 1000ms", { timeout: 30000 }, () => {
    const start = Date.now();
    const result = load(dump);
    const duration = Date.now() - start;

    console.log(`Load: ${result.records.length} records in ${duration}ms`);
    expect(result.records).toHaveLength(30000);
    expect(duration).toBeLessThanOrEqual(1000);
  });

  it("30000 records, stats < 50ms", () => {
    const start = Date.now();
    const stats = dataset.stats();
    const duration = Date.now() - start;

    console.log(`Stats: ${stats.networkTypes.size} types in ${duration}ms`);
    expect(stats.totalNetworks).toBe(30000);
    expect(duration).toBeLessThanOrEqual(50);
  });

  it("30000 records, filtered listing < 50ms", () => {
    const start = Date.now();
    const page = dataset.list({ q: "network 12", type: "nsp", perPage: 100 });
    const duration = Date.now() - start;

    console.log(`List: ${page.totalItems} matches in ${duration}ms`);
    expect(page.totalItems).toBeGreaterThan(0);
    expect(duration).toBeLessThanOrEqual(50);
  });

  it("30000 records, name search < 50ms", () => {
    const start = Date.now();
    const results = dataset.search({ name: "network 299" });
    const duration = Date.now() - start;

    console.log(`Search: ${results.length} matches in ${duration}ms`);
    expect(results.length).toBeGreaterThan(0);
    expect(duration).toBeLessThanOrEqual(50);
  });
});
