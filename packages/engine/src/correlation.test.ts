import { describe, it, expect } from "vitest";
import { extractPairs } from "./correlation.js";
import type { NetworkRecord } from "./types.js";

describe("extractPairs", () => {
  const records: NetworkRecord[] = [
    { id: 1, name: "Alpha", ix_count: 12, fac_count: 8 },
    { id: 2, name: "Beta", ix_count: 3 },
    { id: 3, name: "Gamma", fac_count: 4 },
    { id: 4, name: "Delta", ix_count: 0, fac_count: 0 },
    { id: 5, ix_count: 2, fac_count: 1 },
    { id: 6, name: "Alpha", ix_count: 5, fac_count: 9 },
  ];

  it("should emit points only for records with both fields present", () => {
    const points = extractPairs(records, "ix_count", "fac_count", "name");
    expect(points.map((p) => p.x)).toEqual([12, 0, 2, 5]);
  });

  it("should keep collection order and duplicate labels", () => {
    expect(extractPairs(records, "ix_count", "fac_count", "name")).toEqual([
      { x: 12, y: 8, label: "Alpha" },
      { x: 0, y: 0, label: "Delta" },
      { x: 2, y: 1, label: "5" },
      { x: 5, y: 9, label: "Alpha" },
    ]);
  });

  it("should include zero values", () => {
    const points = extractPairs([{ id: 1, name: "Zero", ix_count: 0, fac_count: 0 }], "ix_count", "fac_count", "name");
    expect(points).toEqual([{ x: 0, y: 0, label: "Zero" }]);
  });

  it("should fall back to the record id when the label is absent", () => {
    const points = extractPairs([{ id: 42, ix_count: 1, fac_count: 2 }], "ix_count", "fac_count", "aka");
    expect(points).toEqual([{ x: 1, y: 2, label: "42" }]);
  });

  it("should support any pair of numeric fields", () => {
    const points = extractPairs(
      [
        { id: 1, name: "Alpha", info_prefixes4: 100, info_prefixes6: 20 },
        { id: 2, name: "Beta", info_prefixes4: 50 },
      ],
      "info_prefixes4",
      "info_prefixes6",
      "name"
    );
    expect(points).toEqual([{ x: 100, y: 20, label: "Alpha" }]);
  });

  it("should return an empty list for an empty collection", () => {
    expect(extractPairs([], "ix_count", "fac_count", "name")).toEqual([]);
  });
});
