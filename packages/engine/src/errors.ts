/**
 * Error types for dataset operations
 *
 * Invariants:
 * - All errors name the data source or record they concern in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Loader errors are returned as values; only precondition errors are thrown
 */

/**
 * Base class for all dataset errors
 */
export abstract class NetVizError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Raw bytes could not be obtained (e.g., the dump file does not exist)
 */
export class SourceUnavailableError extends NetVizError {
  readonly code = "ENOENT";

  constructor(
    public readonly source: string,
    options?: ErrorOptions
  ) {
    super(`Data source unavailable: ${source}`, options);
  }
}

/**
 * Position of a parse failure within the decoded source text
 */
export interface SourceLocation {
  /** Zero-based character offset */
  offset: number;
  /** One-based line number */
  line: number;
  /** One-based column number */
  column: number;
}

/**
 * Raw bytes do not decode to the expected structure
 */
export class MalformedSourceError extends NetVizError {
  readonly code = "MALFORMED_SOURCE";

  constructor(
    public readonly source: string,
    public readonly detail: string,
    public readonly location?: SourceLocation,
    options?: ErrorOptions
  ) {
    const at = location ? ` (line ${location.line}, column ${location.column})` : "";
    super(`Malformed data source ${source}: ${detail}${at}`, options);
  }
}

/**
 * Why a record entry was dropped
 */
export type RecordIssueReason = "missing-id" | "invalid" | "duplicate-id";

/**
 * A single record entry was dropped during loading
 */
export class InvalidRecordError extends NetVizError {
  readonly code = "INVALID_RECORD";

  constructor(
    public readonly index: number,
    public readonly reason: RecordIssueReason,
    public readonly detail: string,
    public readonly recordId?: number,
    options?: ErrorOptions
  ) {
    const target = recordId === undefined ? `data[${index}]` : `data[${index}] (id ${recordId})`;
    super(`Dropped record ${target}: ${detail}`, options);
  }
}

/**
 * A caller passed pagination parameters that violate the paginator's contract
 */
export class PaginationPreconditionError extends NetVizError {
  readonly code = "E_PRECONDITION";

  constructor(message: string, options?: ErrorOptions) {
    super(`Invalid pagination request: ${message}`, options);
  }
}
