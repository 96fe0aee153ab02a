/**
 * Output rendering helpers
 */

import type { NetworkRecord } from "@netviz/engine";
import type { CliIO } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON
 * @param io - Output channels
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(io: CliIO, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  io.stdout(json + "\n");
}

/**
 * Print lines (one per line)
 */
export function printLines(io: CliIO, lines: readonly string[]): void {
  for (const line of lines) {
    io.stdout(line + "\n");
  }
}

/**
 * Render a count table as indented "label: count" lines
 */
export function formatCounts(counts: Iterable<readonly [string, number]>, indent = "  "): string[] {
  return Array.from(counts, ([label, count]) => `${indent}${label}: ${count}`);
}

/**
 * Render a record as one tab-separated line: id, AS number, name
 */
export function formatNetwork(record: NetworkRecord): string {
  const asn = record.asn === undefined ? "-" : `AS${record.asn}`;
  return [String(record.id), asn, record.name ?? ""].join("\t");
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(text: string, color: Color, stream: NodeJS.WriteStream = process.stdout): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
