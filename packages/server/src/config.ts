/**
 * Server configuration from environment variables
 * LOG_LEVEL is read by the logger itself
 */

import { resolveDataFile } from "@netviz/engine";

export interface ServerConfig {
  /** NETVIZ_MCP_ENABLED; only "false" disables the server */
  enabled: boolean;
  /** NETVIZ_MCP_READONLY; only "true" hides reload_dataset */
  readOnly: boolean;
  /** NETVIZ_DATA_FILE, tilde-expanded and absolute */
  dataFile: string;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    enabled: env.NETVIZ_MCP_ENABLED !== "false",
    readOnly: env.NETVIZ_MCP_READONLY === "true",
    dataFile: resolveDataFile(env.NETVIZ_DATA_FILE),
  };
}
