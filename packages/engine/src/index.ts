/**
 * netviz engine
 *
 * In-memory query and aggregation over a network registry snapshot
 */

// Re-export types
export type {
  NetworkRecord,
  NumericField,
  TextField,
  CategoryField,
  OptionalField,
  FieldSelector,
  Collection,
  SourceError,
  LoadResult,
  LoadOptions,
  Snapshot,
  DatasetSource,
  Page,
  CorrelationPoint,
  NetworkStats,
  CategorySeries,
  PrefixDistribution,
  ListFilter,
  ListQuery,
  SearchQuery,
  ReloadResult,
  DatasetOptions,
  Dataset,
} from "./types.js";

// Re-export loading
export { load, loadFile, locateJsonError, MEMORY_SOURCE, MAX_REPORTED_ISSUES } from "./loader.js";
export { validateNetworkRecord, networkRecordSchema } from "./schema/network.js";
export type { RawNetworkRecord, RecordValidation } from "./schema/network.js";

// Re-export queries
export { countBy, computeStats } from "./aggregate.js";
export { extractPairs } from "./correlation.js";
export { paginate, assertPageSize, DEFAULT_PER_PAGE, MAX_PER_PAGE } from "./paginate.js";
export { search, filterNetworks, equalsIgnoreAsciiCase, MAX_ASN } from "./search.js";
export {
  networkTypeSeries,
  prefixDistribution,
  ixFacilityCorrelation,
  recentNetworks,
  PREFIX_CHART_LIMIT,
  CHART_NAME_LENGTH,
  DASHBOARD_PREVIEW_SIZE,
} from "./charts.js";

// Re-export formatting
export { truncateChars, countEntries, serializeStats, ELLIPSIS } from "./format.js";
export type { SerializedStats } from "./format.js";

// Re-export dataset
export {
  openDataset,
  createDataset,
  createSnapshot,
  fileSource,
  memorySource,
  MAX_NAME_QUERY_LENGTH,
} from "./dataset.js";
export type { DatasetHandleOptions } from "./dataset.js";

// Re-export path resolution
export { DEFAULT_DATA_FILE, expandTilde, resolveDataFile } from "./paths.js";

// Re-export logging
export { consoleSink, silentSink, formatLogEntry, loadEvents } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogSink, DatasetEvent, ConsoleSinkOptions } from "./observability/logs.js";

// Re-export errors
export {
  NetVizError,
  SourceUnavailableError,
  MalformedSourceError,
  InvalidRecordError,
  PaginationPreconditionError,
} from "./errors.js";
export type { SourceLocation, RecordIssueReason } from "./errors.js";
