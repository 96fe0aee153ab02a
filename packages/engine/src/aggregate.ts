/**
 * Categorical aggregation over a record collection
 */

import type { Collection, FieldSelector, NetworkRecord, NetworkStats, OptionalField } from "./types.js";

/**
 * Count records per value of one field
 *
 * Records where the field is absent are skipped entirely; there is no
 * null bucket. Entries appear in the order their value was first seen, so the
 * same input always yields the same table. Sort explicitly for ranked output.
 *
 * @param records - Collection to aggregate
 * @param field - Field name, or a selector returning `undefined` for absent
 * @returns Ordered map from value to count
 *
 * @example
 * ```typescript
 * countBy(records, "info_type"); // Map { "NSP" => 3, "Content" => 5 }
 * countBy(records, (r) => r.name?.charAt(0));
 * ```
 */
export function countBy<K extends OptionalField>(
  records: Collection,
  field: K
): Map<NonNullable<NetworkRecord[K]>, number>;
export function countBy<V>(records: Collection, field: FieldSelector<V>): Map<V, number>;
export function countBy<V>(
  records: Collection,
  field: OptionalField | FieldSelector<V>
): Map<unknown, number> {
  const select: FieldSelector<unknown> = typeof field === "function" ? field : fieldSelector(field);

  const counts = new Map<unknown, number>();
  for (const record of records) {
    const value = select(record);
    if (value === undefined || value === null) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

function fieldSelector(field: OptionalField): FieldSelector<unknown> {
  return (record) => record[field];
}

/**
 * Dashboard statistics: total plus independent type, policy, and scope tables
 */
export function computeStats(records: Collection): NetworkStats {
  return {
    totalNetworks: records.length,
    networkTypes: countBy(records, "info_type"),
    policyTypes: countBy(records, "policy_general"),
    scopes: countBy(records, "info_scope"),
  };
}
