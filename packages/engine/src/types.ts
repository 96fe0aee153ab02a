/**
 * Core types for the network dataset engine
 */

import type { LogSink } from "./observability/logs.js";
import type {
  InvalidRecordError,
  MalformedSourceError,
  SourceUnavailableError,
} from "./errors.js";

/**
 * One network entry from a registry snapshot.
 *
 * Only `id` is required. An absent optional field is `undefined`, never a
 * synthetic zero or empty string; JSON `null` in the source also means absent.
 */
export interface NetworkRecord {
  /** Registry-internal identifier, unique within a snapshot */
  readonly id: number;
  /** Display name (e.g., "Example Transit") */
  readonly name?: string;
  /** Autonomous system number */
  readonly asn?: number;
  /** Also-known-as name */
  readonly aka?: string;
  /** Registry status (e.g., "ok", "deleted") */
  readonly status?: string;
  /** Network type (e.g., "NSP", "Content", "Cable/DSL/ISP") */
  readonly info_type?: string;
  /** General peering policy (e.g., "Open", "Selective", "Restrictive") */
  readonly policy_general?: string;
  /** Geographic scope (e.g., "Global", "Regional") */
  readonly info_scope?: string;
  /** Number of IPv4 prefixes announced */
  readonly info_prefixes4?: number;
  /** Number of IPv6 prefixes announced */
  readonly info_prefixes6?: number;
  /** Number of exchanges the network is present at */
  readonly ix_count?: number;
  /** Number of facilities the network is present at */
  readonly fac_count?: number;
  /** Network website URL */
  readonly website?: string;
}

/**
 * Fields that hold integer metrics
 */
export type NumericField = "asn" | "info_prefixes4" | "info_prefixes6" | "ix_count" | "fac_count";

/**
 * Fields that hold free text
 */
export type TextField = "name" | "aka" | "website";

/**
 * Fields that hold a category label
 */
export type CategoryField = "info_type" | "policy_general" | "info_scope" | "status";

/**
 * Every optional field of a record
 */
export type OptionalField = NumericField | TextField | CategoryField;

/**
 * Derives a value from a record; `undefined` means the value is absent
 */
export type FieldSelector<V> = (record: NetworkRecord) => V | undefined;

/**
 * Immutable record collection shared by all queries
 */
export type Collection = readonly NetworkRecord[];

/**
 * Source-level failure reported by the loader
 */
export type SourceError = SourceUnavailableError | MalformedSourceError;

/**
 * Outcome of turning raw bytes into records.
 * Loading never throws for bad input; failures are carried in `error` and `issues`.
 */
export interface LoadResult {
  /** Valid records in source order */
  records: Collection;
  /** Number of record entries that were dropped */
  dropped: number;
  /** Diagnostics for the first dropped entries (capped) */
  issues: readonly InvalidRecordError[];
  /** Set when the source as a whole could not be used */
  error?: SourceError;
}

/**
 * Options for loading a raw source
 */
export interface LoadOptions {
  /** Name used in diagnostics (default: "<memory>") */
  sourceName?: string;
}

/**
 * One published, immutable version of the dataset
 */
export interface Snapshot {
  readonly records: Collection;
  /** Where the records came from (file path or "<memory>") */
  readonly source: string;
  /** ISO timestamp of the load */
  readonly loadedAt: string;
  readonly dropped: number;
  readonly issues: readonly InvalidRecordError[];
  readonly error?: SourceError;
}

/**
 * Supplier of raw record collections for a dataset
 */
export interface DatasetSource {
  /** Name used in diagnostics and snapshots */
  readonly name: string;
  /** Read and parse the source; must not throw for missing or malformed input */
  read(): Promise<LoadResult>;
}

/**
 * One bounded slice of an ordered sequence
 */
export interface Page<T> {
  items: T[];
  /** Requested page number (1-indexed, not clamped) */
  page: number;
  perPage: number;
  totalPages: number;
  totalItems: number;
}

/**
 * A paired-metric point for scatter plots
 */
export interface CorrelationPoint {
  x: number;
  y: number;
  label: string;
}

/**
 * Dashboard statistics; each table is in first-seen order
 */
export interface NetworkStats {
  totalNetworks: number;
  networkTypes: Map<string, number>;
  policyTypes: Map<string, number>;
  scopes: Map<string, number>;
}

/**
 * Aligned label/count series for a category chart
 */
export interface CategorySeries {
  labels: string[];
  data: number[];
}

/**
 * IPv4/IPv6 prefix counts for the first networks that report both
 */
export interface PrefixDistribution {
  networks: string[];
  ipv4: number[];
  ipv6: number[];
}

/**
 * Criteria for the network listing; all provided criteria must hold
 */
export interface ListFilter {
  /** Case-insensitive substring of name, aka, or decimal ASN */
  q?: string;
  /** Network type, compared case-insensitively */
  type?: string;
  /** General policy, compared case-insensitively */
  policy?: string;
  /** Registry status, compared case-insensitively */
  status?: string;
}

/**
 * Listing request: filter plus pagination
 */
export interface ListQuery extends ListFilter {
  /** 1-indexed page (default: 1) */
  page?: number;
  /** Page size (default: 25) */
  perPage?: number;
}

/**
 * Search request: ASN exact match OR name substring match
 */
export interface SearchQuery {
  asn?: number;
  name?: string;
}

/**
 * Result of a reload attempt
 */
export interface ReloadResult {
  /** True if the new snapshot replaced the previous one */
  published: boolean;
  /** The snapshot now being served */
  snapshot: Snapshot;
  /** Why the attempted load was not published */
  error?: SourceError;
}

/**
 * Options for opening a file-backed dataset
 */
export interface DatasetOptions {
  /** Path to the registry dump (JSON object with a `data` array) */
  file: string;
  /** Keep serving the current snapshot when a reload hits a source error (default: true) */
  keepOnError?: boolean;
  /** Receives load and reload events (default: dropped) */
  log?: LogSink;
}

/**
 * Query handle over the current snapshot.
 *
 * Every query reads the snapshot reference once, so it runs against a single
 * consistent version even if a reload publishes a new one meanwhile.
 */
export interface Dataset {
  /** The snapshot currently being served */
  snapshot(): Snapshot;

  /**
   * Load the source again and publish the result as a new snapshot
   * @returns Whether the new snapshot was published, and the snapshot now served
   */
  reload(): Promise<ReloadResult>;

  /** Total count plus type, policy, and scope tables */
  stats(): NetworkStats;

  /**
   * Statistics plus the first records of the collection
   * @param limit - Number of records to preview (default: 10)
   */
  dashboard(limit?: number): { stats: NetworkStats; recent: NetworkRecord[] };

  /** Frequency table for one category field */
  countBy(field: CategoryField): Map<string, number>;

  /** Filtered, paginated listing */
  list(query?: ListQuery): Page<NetworkRecord>;

  /** ASN or name search (name query is cut to 100 characters) */
  search(query: SearchQuery): NetworkRecord[];

  /** Chart series of network types */
  networkTypes(): CategorySeries;

  /** Chart data of IPv4/IPv6 prefix counts */
  prefixDistribution(): PrefixDistribution;

  /** Scatter points of exchange count against facility count */
  ixFacilityCorrelation(): CorrelationPoint[];
}
