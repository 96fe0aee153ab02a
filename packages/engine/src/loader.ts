/**
 * Dataset loading: raw registry dump bytes -> validated, immutable records
 *
 * Invariants:
 * - Loading never throws for missing or malformed input; failures are returned
 *   as `error` (whole source) or `issues` (single entries) with an empty or
 *   partial collection
 * - Every dropped entry is counted in `dropped`, even beyond the issue cap
 * - Returned records and the collection itself are frozen
 * - `loadFile` is the only function here that performs I/O
 */

import * as fs from "node:fs/promises";
import type { Collection, LoadOptions, LoadResult, NetworkRecord, SourceError } from "./types.js";
import {
  InvalidRecordError,
  MalformedSourceError,
  SourceUnavailableError,
  type SourceLocation,
} from "./errors.js";
import { validateNetworkRecord } from "./schema/network.js";

/** Name used in diagnostics when the caller gives none */
export const MEMORY_SOURCE = "<memory>";

/** Maximum number of per-record diagnostics kept in a load result */
export const MAX_REPORTED_ISSUES = 20;

const EMPTY: Collection = Object.freeze([]);

/**
 * Parse a registry dump into records
 * @param source - Raw bytes or decoded text; `null`/`undefined` means the source is absent
 * @param options - Load options
 * @returns Records plus drop count and diagnostics
 */
export function load(
  source: Uint8Array | string | null | undefined,
  options: LoadOptions = {}
): LoadResult {
  const sourceName = options.sourceName ?? MEMORY_SOURCE;

  if (source === null || source === undefined) {
    return fail(new SourceUnavailableError(sourceName));
  }

  let text: string;
  try {
    text = typeof source === "string" ? source : new TextDecoder("utf-8", { fatal: true }).decode(source);
  } catch (err) {
    return fail(new MalformedSourceError(sourceName, "source is not valid UTF-8", undefined, { cause: err }));
  }

  // Strip BOM if present
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return fail(new MalformedSourceError(sourceName, message, locateJsonError(text, message), { cause: err }));
  }

  const entries = extractEntries(parsed);
  if (!entries) {
    return fail(new MalformedSourceError(sourceName, 'expected an object with a "data" array'));
  }

  return buildCollection(entries);
}

/**
 * Read a registry dump from disk and parse it
 * @param filePath - Path to the dump file
 * @returns Records plus drop count and diagnostics; never rejects
 */
export async function loadFile(filePath: string): Promise<LoadResult> {
  let bytes: Uint8Array;
  try {
    bytes = await fs.readFile(filePath);
  } catch (err) {
    return fail(new SourceUnavailableError(filePath, { cause: err }));
  }
  return load(bytes, { sourceName: filePath });
}

/**
 * Work out where a JSON syntax error occurred
 *
 * The text is scanned for the first offending character; the parser message
 * is consulted only when the scan finds none (its wording varies by runtime
 * and often omits the position).
 *
 * @param text - Text that failed to parse
 * @param message - Parser error message
 * @returns Location, or undefined if neither the text nor the message gives one
 */
export function locateJsonError(text: string, message?: string): SourceLocation | undefined {
  const offset = scanSyntaxError(text) ?? positionFromMessage(message, text.length);
  if (offset === undefined) {
    return undefined;
  }

  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset; i++) {
    if (text.charCodeAt(i) === 0x0a) {
      line++;
      lineStart = i + 1;
    }
  }

  return { offset, line, column: offset - lineStart + 1 };
}

function positionFromMessage(message: string | undefined, length: number): number | undefined {
  const match = message === undefined ? null : /at position (\d+)/.exec(message);
  return match ? Math.min(Number.parseInt(match[1] ?? "0", 10), length) : undefined;
}

const WHITESPACE = new Set([" ", "\t", "\n", "\r"]);
const SIMPLE_ESCAPES = new Set(['"', "\\", "/", "b", "f", "n", "r", "t"]);
const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const HEX4 = /[0-9a-fA-F]{4}/y;

/**
 * Offset of the first character that breaks the JSON grammar, or undefined for valid text
 */
function scanSyntaxError(text: string): number | undefined {
  let i = 0;

  const skipWhitespace = (): void => {
    while (i < text.length && WHITESPACE.has(text.charAt(i))) i++;
  };

  const sticky = (pattern: RegExp): boolean => {
    pattern.lastIndex = i;
    const match = pattern.exec(text);
    if (!match) return false;
    i += match[0].length;
    return true;
  };

  const string = (): boolean => {
    i++; // opening quote
    while (i < text.length) {
      const ch = text.charAt(i);
      if (ch === '"') {
        i++;
        return true;
      }
      if (ch === "\\") {
        i++;
        const escape = text.charAt(i);
        if (escape === "u") {
          i++;
          if (!sticky(HEX4)) return false;
        } else if (SIMPLE_ESCAPES.has(escape)) {
          i++;
        } else {
          return false;
        }
        continue;
      }
      if (text.charCodeAt(i) < 0x20) return false;
      i++;
    }
    return false;
  };

  const array = (): boolean => {
    i++;
    skipWhitespace();
    if (text.charAt(i) === "]") {
      i++;
      return true;
    }
    for (;;) {
      if (!value()) return false;
      skipWhitespace();
      const ch = text.charAt(i);
      if (ch === "]") {
        i++;
        return true;
      }
      if (ch !== ",") return false;
      i++;
    }
  };

  const object = (): boolean => {
    i++;
    skipWhitespace();
    if (text.charAt(i) === "}") {
      i++;
      return true;
    }
    for (;;) {
      skipWhitespace();
      if (text.charAt(i) !== '"' || !string()) return false;
      skipWhitespace();
      if (text.charAt(i) !== ":") return false;
      i++;
      if (!value()) return false;
      skipWhitespace();
      const ch = text.charAt(i);
      if (ch === "}") {
        i++;
        return true;
      }
      if (ch !== ",") return false;
      i++;
    }
  };

  const value = (): boolean => {
    skipWhitespace();
    const ch = text.charAt(i);
    if (ch === "{") return object();
    if (ch === "[") return array();
    if (ch === '"') return string();
    if (ch === "-" || (ch >= "0" && ch <= "9")) return sticky(NUMBER);
    for (const literal of ["true", "false", "null"]) {
      if (text.startsWith(literal, i)) {
        i += literal.length;
        return true;
      }
    }
    return false;
  };

  if (!value()) {
    return i;
  }
  skipWhitespace();
  return i < text.length ? i : undefined;
}

function extractEntries(parsed: unknown): unknown[] | undefined {
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return undefined;
  }
  const data: unknown = Reflect.get(parsed, "data");
  return Array.isArray(data) ? data : undefined;
}

function readId(entry: unknown): unknown {
  if (entry === null || typeof entry !== "object" || Array.isArray(entry)) {
    return undefined;
  }
  return Reflect.get(entry, "id");
}

function buildCollection(entries: unknown[]): LoadResult {
  const records: NetworkRecord[] = [];
  const issues: InvalidRecordError[] = [];
  const seen = new Set<number>();
  let dropped = 0;

  const drop = (issue: InvalidRecordError): void => {
    dropped++;
    if (issues.length < MAX_REPORTED_ISSUES) {
      issues.push(issue);
    }
  };

  entries.forEach((entry, index) => {
    const id = readId(entry);
    if (id === undefined || id === null) {
      drop(new InvalidRecordError(index, "missing-id", "missing required id"));
      return;
    }

    const validation = validateNetworkRecord(entry);
    if (!validation.ok) {
      drop(
        new InvalidRecordError(
          index,
          "invalid",
          validation.message,
          typeof id === "number" ? id : undefined
        )
      );
      return;
    }

    const record = validation.record;
    if (seen.has(record.id)) {
      drop(new InvalidRecordError(index, "duplicate-id", "id already used by an earlier record", record.id));
      return;
    }

    seen.add(record.id);
    records.push(record);
  });

  return {
    records: Object.freeze(records),
    dropped,
    issues: Object.freeze(issues),
  };
}

function fail(error: SourceError): LoadResult {
  return { records: EMPTY, dropped: 0, issues: [], error };
}
