/**
 * Data file path resolution shared by the CLI and the MCP server
 */

import * as path from "node:path";
import { homedir } from "node:os";

/** Dump file used when no flag or environment variable names one */
export const DEFAULT_DATA_FILE = "./data/peeringdb/net.json";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched.
    return input;
  }

  return path.join(homedir(), match[2] ?? "");
}

/**
 * Absolute path of the first non-empty candidate, or of the default dump
 * @param candidates - Paths in priority order; empty strings count as unset
 */
export function resolveDataFile(...candidates: Array<string | undefined>): string {
  const file = candidates.find((candidate) => candidate !== undefined && candidate !== "") ?? DEFAULT_DATA_FILE;
  return path.resolve(expandTilde(file));
}
