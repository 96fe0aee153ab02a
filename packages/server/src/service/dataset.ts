/**
 * Dataset service adapter
 * Wraps an engine Dataset with result caps; dataset events go to the server logger
 */

import { openDataset, serializeStats } from "@netviz/engine";
import type {
  CategorySeries,
  CorrelationPoint,
  Dataset,
  ListQuery,
  NetworkRecord,
  Page,
  PrefixDistribution,
  SearchQuery,
  SerializedStats,
  LogSink,
  Snapshot,
} from "@netviz/engine";
import { datasetLogSink, logger } from "../observability/logger.js";

// Maximum number of search results to return (prevent unbounded responses)
export const MAX_SEARCH_RESULTS = 1000;

/**
 * Where the served snapshot came from and how it loaded
 */
export interface SnapshotInfo {
  source: string;
  loadedAt: string;
  records: number;
  dropped: number;
  /** Source-level failure of the served snapshot, if any */
  error?: { code: string; message: string };
}

export interface StatsResult extends SerializedStats {
  snapshot: SnapshotInfo;
}

export interface SearchResult {
  results: NetworkRecord[];
  /** Total matches before the cap */
  count: number;
  truncated: boolean;
}

export interface ReloadSummary {
  published: boolean;
  snapshot: SnapshotInfo;
  /** Failure of the attempted load when it was not published */
  error?: { code: string; message: string };
}

function describeSnapshot(snapshot: Snapshot): SnapshotInfo {
  return {
    source: snapshot.source,
    loadedAt: snapshot.loadedAt,
    records: snapshot.records.length,
    dropped: snapshot.dropped,
    ...(snapshot.error && { error: { code: snapshot.error.code, message: snapshot.error.message } }),
  };
}

export class DatasetService {
  #dataset: Dataset;

  constructor(dataset: Dataset) {
    this.#dataset = dataset;
  }

  /**
   * Open a service over a dump file; a missing or malformed file yields an empty dataset
   * @param options.log - Receives dataset events (default: the server logger)
   */
  static async open(file: string, options: { log?: LogSink } = {}): Promise<DatasetService> {
    return new DatasetService(await openDataset({ file, log: options.log ?? datasetLogSink() }));
  }

  /**
   * Describe the snapshot currently being served
   */
  snapshot(): SnapshotInfo {
    return describeSnapshot(this.#dataset.snapshot());
  }

  /**
   * Statistics in JSON-ready form, with snapshot details
   */
  stats(): StatsResult {
    return { ...serializeStats(this.#dataset.stats()), snapshot: this.snapshot() };
  }

  /**
   * Filtered, paginated listing
   * Page size is already bounded by the input schema
   */
  list(query: ListQuery): Page<NetworkRecord> {
    return this.#dataset.list(query);
  }

  /**
   * ASN or name search, capped at MAX_SEARCH_RESULTS
   */
  search(query: SearchQuery): SearchResult {
    const matches = this.#dataset.search(query);

    // Cap the results to prevent unbounded responses
    if (matches.length > MAX_SEARCH_RESULTS) {
      logger.warn("service.search.capped", {
        total: matches.length,
        returned: MAX_SEARCH_RESULTS,
      });
      return { results: matches.slice(0, MAX_SEARCH_RESULTS), count: matches.length, truncated: true };
    }

    return { results: matches, count: matches.length, truncated: false };
  }

  networkTypes(): CategorySeries {
    return this.#dataset.networkTypes();
  }

  prefixDistribution(): PrefixDistribution {
    return this.#dataset.prefixDistribution();
  }

  ixFacilityCorrelation(): CorrelationPoint[] {
    return this.#dataset.ixFacilityCorrelation();
  }

  /**
   * Reload the dump; the current snapshot stays served if the new load fails
   */
  async reload(): Promise<ReloadSummary> {
    const { published, snapshot, error } = await this.#dataset.reload();
    const info = describeSnapshot(snapshot);

    if (published) {
      return { published, snapshot: info };
    }

    return {
      published,
      snapshot: info,
      ...(error && { error: { code: error.code, message: error.message } }),
    };
  }
}
