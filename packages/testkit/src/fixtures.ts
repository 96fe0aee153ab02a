/**
 * Network record fixtures
 */

import type { NetworkRecord } from "@netviz/engine";

/**
 * Build a record with placeholder values; `overrides` replace or add fields
 * @param id - Record id
 * @param overrides - Fields to set on top of the defaults
 */
export function makeRecord(id: number, overrides: Partial<Omit<NetworkRecord, "id">> = {}): NetworkRecord {
  return {
    id,
    name: `Network ${id}`,
    asn: 64511 + id,
    ...overrides,
  };
}

/**
 * Small mixed collection used across CLI and server tests
 *
 * Covers absent fields, zero counts, a lowercase policy, and an unnamed record.
 */
export const sampleRecords: readonly NetworkRecord[] = [
  makeRecord(1, {
    name: "Example Transit",
    asn: 64500,
    aka: "ExTr",
    status: "ok",
    info_type: "NSP",
    policy_general: "Open",
    info_scope: "Global",
    info_prefixes4: 1200,
    info_prefixes6: 300,
    ix_count: 25,
    fac_count: 40,
    website: "https://transit.example",
  }),
  makeRecord(2, {
    name: "Sample Content Delivery",
    asn: 64501,
    status: "ok",
    info_type: "Content",
    policy_general: "Selective",
    info_scope: "Global",
    info_prefixes4: 80,
    info_prefixes6: 0,
    ix_count: 60,
    fac_count: 12,
  }),
  makeRecord(3, {
    name: "Another Transit",
    asn: 64502,
    status: "ok",
    info_type: "NSP",
    policy_general: "Restrictive",
    info_scope: "Regional",
    ix_count: 3,
  }),
  makeRecord(4, {
    name: "Campus Network",
    asn: 64503,
    aka: "University Backbone",
    status: "ok",
    info_type: "Educational/Research",
    policy_general: "open",
    info_prefixes4: 4,
  }),
  { id: 5, asn: 64504, status: "deleted", info_type: "Enterprise", ix_count: 0, fac_count: 1 },
];

/**
 * Serialize records as a registry dump (`{"data": [...]}`)
 * @param records - Records, or raw entries when testing invalid input
 */
export function toDump(records: readonly unknown[]): string {
  return JSON.stringify({ data: records });
}
