/**
 * Dataset handle: one published snapshot plus the queries over it
 */

import type {
  CategoryField,
  CategorySeries,
  CorrelationPoint,
  Dataset,
  DatasetOptions,
  DatasetSource,
  ListQuery,
  LoadResult,
  NetworkRecord,
  NetworkStats,
  Page,
  PrefixDistribution,
  ReloadResult,
  SearchQuery,
  Snapshot,
} from "./types.js";
import { load, loadFile, MEMORY_SOURCE } from "./loader.js";
import { computeStats, countBy } from "./aggregate.js";
import { paginate, DEFAULT_PER_PAGE } from "./paginate.js";
import { filterNetworks, search } from "./search.js";
import {
  ixFacilityCorrelation,
  networkTypeSeries,
  prefixDistribution,
  recentNetworks,
  DASHBOARD_PREVIEW_SIZE,
} from "./charts.js";
import { loadEvents, silentSink, type LogEntry, type LogSink } from "./observability/logs.js";

/** Longest name query a search uses; longer input is cut */
export const MAX_NAME_QUERY_LENGTH = 100;

/**
 * Freeze a load result into a publishable snapshot
 */
export function createSnapshot(result: LoadResult, source: string): Snapshot {
  return Object.freeze({
    records: result.records,
    source,
    loadedAt: new Date().toISOString(),
    dropped: result.dropped,
    issues: result.issues,
    ...(result.error && { error: result.error }),
  });
}

/**
 * Source backed by a registry dump file
 */
export function fileSource(file: string): DatasetSource {
  return {
    name: file,
    read: () => loadFile(file),
  };
}

/**
 * Source backed by bytes already in memory (tests, embedding)
 */
export function memorySource(bytes: Uint8Array | string, name = MEMORY_SOURCE): DatasetSource {
  return {
    name,
    read: async () => load(bytes, { sourceName: name }),
  };
}

/**
 * Dataset implementation
 *
 * Holds the current snapshot behind a single reference. Queries capture that
 * reference once and run against it; `reload()` builds a complete new
 * snapshot and publishes it with one assignment, so readers see either the old
 * or the new collection, never a mix.
 *
 * @example
 * ```typescript
 * const dataset = await openDataset({ file: "./data/peeringdb/net.json" });
 *
 * dataset.stats().networkTypes;           // Map { "NSP" => 812, ... }
 * dataset.list({ page: 2, perPage: 50 });  // { items, totalPages, ... }
 * dataset.search({ asn: 64500 });
 * ```
 */
class NetworkDataset implements Dataset {
  #source: DatasetSource;
  #snapshot: Snapshot;
  #keepOnError: boolean;
  #log: LogSink;
  #pendingReload: Promise<ReloadResult> | undefined;

  constructor(source: DatasetSource, initial: Snapshot, options: DatasetHandleOptions = {}) {
    this.#source = source;
    this.#snapshot = initial;
    this.#keepOnError = options.keepOnError ?? true;
    this.#log = options.log ?? silentSink;
  }

  snapshot(): Snapshot {
    return this.#snapshot;
  }

  /**
   * Reload the source and publish a new snapshot
   *
   * Concurrent calls share one in-flight reload. When the new load fails at
   * the source level and the current snapshot has records, the current
   * snapshot stays published (unless `keepOnError` is false).
   */
  reload(): Promise<ReloadResult> {
    if (!this.#pendingReload) {
      this.#pendingReload = this.#reload().finally(() => {
        this.#pendingReload = undefined;
      });
    }
    return this.#pendingReload;
  }

  async #reload(): Promise<ReloadResult> {
    const result = await this.#source.read();
    const next = createSnapshot(result, this.#source.name);
    const current = this.#snapshot;
    emit(this.#log, loadEvents(next.source, result));

    if (next.error && this.#keepOnError && current.records.length > 0) {
      this.#log({
        level: "warn",
        event: "dataset.reload.kept",
        source: this.#source.name,
        message: next.error.message,
        details: { records: current.records.length, loadedAt: current.loadedAt },
      });
      return { published: false, snapshot: current, error: next.error };
    }

    this.#snapshot = next;
    this.#log({
      level: "info",
      event: "dataset.reload",
      source: this.#source.name,
      details: { records: next.records.length, dropped: next.dropped, previous: current.records.length },
    });
    return { published: true, snapshot: next };
  }

  stats(): NetworkStats {
    return computeStats(this.#snapshot.records);
  }

  dashboard(limit = DASHBOARD_PREVIEW_SIZE): { stats: NetworkStats; recent: NetworkRecord[] } {
    const { records } = this.#snapshot;
    return { stats: computeStats(records), recent: recentNetworks(records, limit) };
  }

  countBy(field: CategoryField): Map<string, number> {
    return countBy(this.#snapshot.records, field);
  }

  list(query: ListQuery = {}): Page<NetworkRecord> {
    const { page = 1, perPage = DEFAULT_PER_PAGE, ...filter } = query;
    return paginate(filterNetworks(this.#snapshot.records, filter), page, perPage);
  }

  search(query: SearchQuery): NetworkRecord[] {
    const name =
      query.name === undefined ? undefined : Array.from(query.name).slice(0, MAX_NAME_QUERY_LENGTH).join("");
    return search(this.#snapshot.records, query.asn, name);
  }

  networkTypes(): CategorySeries {
    return networkTypeSeries(this.#snapshot.records);
  }

  prefixDistribution(): PrefixDistribution {
    return prefixDistribution(this.#snapshot.records);
  }

  ixFacilityCorrelation(): CorrelationPoint[] {
    return ixFacilityCorrelation(this.#snapshot.records);
  }
}

/**
 * Options for a dataset over any source
 */
export type DatasetHandleOptions = Omit<DatasetOptions, "file">;

function emit(log: LogSink, entries: LogEntry[]): void {
  for (const entry of entries) {
    log(entry);
  }
}

/**
 * Load a source and return a dataset serving its first snapshot
 * @param source - Where records come from
 * @param options - Reload behaviour and event sink
 */
export async function createDataset(source: DatasetSource, options: DatasetHandleOptions = {}): Promise<Dataset> {
  const result = await source.read();
  const initial = createSnapshot(result, source.name);
  const log = options.log ?? silentSink;

  emit(log, loadEvents(source.name, result));
  log({
    level: "info",
    event: "dataset.open",
    source: source.name,
    details: { records: initial.records.length, dropped: initial.dropped },
  });
  return new NetworkDataset(source, initial, options);
}

/**
 * Open a dataset backed by a registry dump file
 *
 * A missing or malformed file yields an empty dataset (inspect
 * `snapshot().error`); opening never rejects for bad input.
 */
export function openDataset(options: DatasetOptions): Promise<Dataset> {
  const { file, ...handleOptions } = options;
  return createDataset(fileSource(file), handleOptions);
}
