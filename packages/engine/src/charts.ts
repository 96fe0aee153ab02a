/**
 * Chart-facing projections of a collection
 */

import type {
  CategorySeries,
  Collection,
  CorrelationPoint,
  NetworkRecord,
  PrefixDistribution,
} from "./types.js";
import { countBy } from "./aggregate.js";
import { extractPairs } from "./correlation.js";
import { truncateChars } from "./format.js";

/** Networks shown in the prefix distribution chart */
export const PREFIX_CHART_LIMIT = 15;

/** Longest network name shown on a chart axis before truncation */
export const CHART_NAME_LENGTH = 30;

/** Records shown on the dashboard preview */
export const DASHBOARD_PREVIEW_SIZE = 10;

/**
 * Network type counts as aligned label/count arrays, in first-seen order
 */
export function networkTypeSeries(records: Collection): CategorySeries {
  const labels: string[] = [];
  const data: number[] = [];
  for (const [label, count] of countBy(records, "info_type")) {
    labels.push(label);
    data.push(count);
  }
  return { labels, data };
}

/**
 * IPv4/IPv6 prefix counts for the first networks reporting both
 *
 * Takes the first `limit` records (collection order, unsorted) where both
 * prefix counts are present; zero counts are present. Names are cut to
 * `maxNameLength` characters plus "..."; a record without a name is labelled
 * by its id.
 */
export function prefixDistribution(
  records: Collection,
  options: { limit?: number; maxNameLength?: number } = {}
): PrefixDistribution {
  const limit = options.limit ?? PREFIX_CHART_LIMIT;
  const maxNameLength = options.maxNameLength ?? CHART_NAME_LENGTH;

  const result: PrefixDistribution = { networks: [], ipv4: [], ipv6: [] };
  for (const record of records) {
    if (result.networks.length >= limit) break;
    const { info_prefixes4: ipv4, info_prefixes6: ipv6 } = record;
    if (ipv4 === undefined || ipv6 === undefined) continue;

    result.networks.push(truncateChars(record.name ?? String(record.id), maxNameLength));
    result.ipv4.push(ipv4);
    result.ipv6.push(ipv6);
  }
  return result;
}

/**
 * Exchange count (x) against facility count (y), labelled by name
 */
export function ixFacilityCorrelation(records: Collection): CorrelationPoint[] {
  return extractPairs(records, "ix_count", "fac_count", "name");
}

/**
 * First records of the collection, for previews
 */
export function recentNetworks(records: Collection, limit = DASHBOARD_PREVIEW_SIZE): NetworkRecord[] {
  return records.slice(0, Math.max(0, limit));
}
