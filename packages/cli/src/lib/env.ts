/**
 * Environment and configuration resolution
 */

import { resolveDataFile as resolveFrom } from "@netviz/engine";

export { DEFAULT_DATA_FILE, expandTilde } from "@netviz/engine";

/**
 * Resolve the dump file path
 * Priority: CLI option > NETVIZ_DATA_FILE env var > default "./data/peeringdb/net.json"
 */
export function resolveDataFile(cliFile?: string): string {
  return resolveFrom(cliFile, process.env.NETVIZ_DATA_FILE);
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.NETVIZ_CLI_DEBUG === "1";
}

/**
 * Check if output is a TTY
 */
export function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}
