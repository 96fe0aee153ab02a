/**
 * Structured logging to stderr for MCP server observability
 * All logs go to stderr since stdout is reserved for MCP protocol
 */

import type { LogSink } from "@netviz/engine";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  tool?: string;
  duration_ms?: number;
  err_code?: string;
  err_message?: string;
  [key: string]: unknown;
}

/**
 * Read a minimum level from configuration (e.g., LOG_LEVEL); unknown values mean "info"
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? "info";
}

/**
 * Stable code of an error for logs and metric labels
 */
export function errorCode(err: unknown): string {
  if (typeof err === "object" && err !== null && "code" in err && err.code !== undefined) {
    return String(err.code);
  }
  return "UNKNOWN";
}

export class Logger {
  #minLevel: LogLevel;
  #write: (line: string) => void;

  constructor(minLevel: LogLevel = "info", write: (line: string) => void = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#write = write;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Always use stderr to avoid polluting stdout (MCP protocol channel)
    this.#write(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  // Helper for tool execution logging
  toolCall(tool: string, duration_ms: number, success: boolean, err?: unknown): void {
    if (success) {
      this.info("tool.success", { tool, duration_ms });
    } else {
      this.error("tool.error", {
        tool,
        duration_ms,
        err_code: errorCode(err),
        err_message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

// Singleton logger instance
export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));

/**
 * Engine sink that forwards dataset events to a server logger
 */
export function datasetLogSink(target: Logger = logger): LogSink {
  return ({ level, event, source, message, details }) => {
    target[level](event, { source, ...(message !== undefined && { message }), ...details });
  };
}
