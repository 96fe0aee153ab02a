/**
 * Display formatting helpers
 */

import type { NetworkStats } from "./types.js";

/** Marker appended to truncated display text */
export const ELLIPSIS = "...";

/**
 * Truncate a string to a maximum number of characters (code points, so
 * surrogate pairs are never split), appending "..." when anything was cut
 * @param text - Text to truncate
 * @param maxChars - Maximum characters kept before the marker
 * @returns The original text, or its first `maxChars` characters plus "..."
 */
export function truncateChars(text: string, maxChars: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxChars) {
    return text;
  }
  return chars.slice(0, maxChars).join("") + ELLIPSIS;
}

/**
 * Convert an ordered count table into an array of entries for serialization.
 * Entries keep the table's order; a plain object would reorder integer-like keys.
 */
export function countEntries(counts: ReadonlyMap<string, number>): Array<{ value: string; count: number }> {
  return Array.from(counts, ([value, count]) => ({ value, count }));
}

/**
 * JSON-ready form of dashboard statistics
 */
export interface SerializedStats {
  totalNetworks: number;
  networkTypes: Array<{ value: string; count: number }>;
  policyTypes: Array<{ value: string; count: number }>;
  scopes: Array<{ value: string; count: number }>;
}

/**
 * Convert statistics (which hold Maps) into plain JSON data
 */
export function serializeStats(stats: NetworkStats): SerializedStats {
  return {
    totalNetworks: stats.totalNetworks,
    networkTypes: countEntries(stats.networkTypes),
    policyTypes: countEntries(stats.policyTypes),
    scopes: countEntries(stats.scopes),
  };
}
