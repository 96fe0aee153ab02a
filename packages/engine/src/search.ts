/**
 * Record matching: search (ASN or name) and listing filters
 */

import type { Collection, ListFilter, NetworkRecord } from "./types.js";

/** Largest 32-bit AS number */
export const MAX_ASN = 4294967295;

/**
 * Find records by exact ASN or by case-insensitive name substring
 *
 * A record is returned if the ASN query is given and equals its `asn`, OR if
 * the name query is given, non-empty, and contained in its `name` (both
 * lowercased). With neither query given the result is empty, never the whole
 * collection. Results keep collection order.
 *
 * @param records - Collection to search
 * @param asnQuery - Exact ASN to match
 * @param nameQuery - Name fragment to match
 * @returns Matching records in collection order
 */
export function search(records: Collection, asnQuery?: number, nameQuery?: string): NetworkRecord[] {
  const needle = nameQuery ? nameQuery.toLowerCase() : undefined;
  if (asnQuery === undefined && needle === undefined) {
    return [];
  }

  return records.filter((record) => {
    const matchesAsn = asnQuery !== undefined && record.asn === asnQuery;
    const matchesName =
      needle !== undefined && record.name !== undefined && record.name.toLowerCase().includes(needle);
    return matchesAsn || matchesName;
  });
}

/**
 * Filter records for the network listing
 *
 * All provided criteria must hold. `q` matches a lowercase substring of the
 * name, the decimal ASN, or the aka name; `type`, `policy`, and `status`
 * compare ASCII-case-insensitively. Empty strings count as not provided, and
 * an absent field never satisfies a provided criterion.
 *
 * @param records - Collection to filter
 * @param filter - Listing criteria
 * @returns Matching records in collection order
 */
export function filterNetworks(records: Collection, filter: ListFilter): NetworkRecord[] {
  const q = filter.q ? filter.q.toLowerCase() : undefined;
  const { type, policy, status } = filter;

  return records.filter((record) => {
    if (q !== undefined) {
      const hit =
        (record.name !== undefined && record.name.toLowerCase().includes(q)) ||
        (record.asn !== undefined && String(record.asn).includes(q)) ||
        (record.aka !== undefined && record.aka.toLowerCase().includes(q));
      if (!hit) return false;
    }

    if (type && !equalsIgnoreAsciiCase(record.info_type, type)) return false;
    if (policy && !equalsIgnoreAsciiCase(record.policy_general, policy)) return false;
    if (status && !equalsIgnoreAsciiCase(record.status, status)) return false;

    return true;
  });
}

/**
 * Compare two strings, folding only ASCII letters
 */
export function equalsIgnoreAsciiCase(value: string | undefined, expected: string): boolean {
  if (value === undefined || value.length !== expected.length) {
    return false;
  }
  return asciiLower(value) === asciiLower(expected);
}

function asciiLower(value: string): string {
  return value.replace(/[A-Z]/g, (c) => c.toLowerCase());
}
