/**
 * Dataset lifecycle events
 *
 * The engine never writes to the console by itself: a dataset reports its
 * events to the sink it was opened with, and the default sink drops them.
 */

import type { LoadResult } from "../types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type DatasetEvent =
  | "dataset.load"
  | "dataset.open"
  | "dataset.reload"
  | "dataset.reload.kept"
  | "dataset.source.unavailable"
  | "dataset.source.malformed"
  | "dataset.records.dropped";

export interface LogEntry {
  level: LogLevel;
  event: DatasetEvent;
  /** Data source the event concerns */
  source: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export const silentSink: LogSink = () => {};

export interface ConsoleSinkOptions {
  /** Line writer (default: console.error) */
  write?: (line: string) => void;
  /** Pass debug events through (default: NETVIZ_DEBUG is set) */
  debug?: boolean;
}

/**
 * Render an entry as one line: `[ts] [LEVEL] [event] source message {details}`
 */
export function formatLogEntry(entry: LogEntry, now: Date = new Date()): string {
  const parts = [`[${now.toISOString()}] [${entry.level.toUpperCase()}] [${entry.event}]`, entry.source];
  if (entry.message) {
    parts.push(entry.message);
  }
  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }
  return parts.join(" ");
}

/**
 * Sink writing formatted lines, stderr by default
 */
export function consoleSink(options: ConsoleSinkOptions = {}): LogSink {
  const write = options.write ?? ((line: string) => console.error(line));
  const debug = options.debug ?? Boolean(process.env.NETVIZ_DEBUG);

  return (entry) => {
    if (entry.level === "debug" && !debug) return;
    write(formatLogEntry(entry));
  };
}

/**
 * Events implied by one load: a source failure, or dropped records plus a summary
 */
export function loadEvents(source: string, result: LoadResult): LogEntry[] {
  const { error } = result;
  if (error) {
    return [
      error.code === "ENOENT"
        ? { level: "warn", event: "dataset.source.unavailable", source, message: error.message }
        : { level: "error", event: "dataset.source.malformed", source, message: error.message },
    ];
  }

  const events: LogEntry[] = [];
  if (result.dropped > 0) {
    events.push({
      level: "warn",
      event: "dataset.records.dropped",
      source,
      details: { dropped: result.dropped, first: result.issues.slice(0, 3).map((issue) => issue.message) },
    });
  }
  events.push({
    level: "debug",
    event: "dataset.load",
    source,
    details: { records: result.records.length, dropped: result.dropped },
  });
  return events;
}
