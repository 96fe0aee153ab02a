/**
 * MCP tool implementations for the network dataset
 * Every tool returns two text items: a one-line summary and the JSON payload
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { MAX_ASN, MAX_PER_PAGE, DEFAULT_PER_PAGE } from "@netviz/engine";
import {
  GetStatsInputSchema,
  ListNetworksInputSchema,
  SearchNetworksInputSchema,
  NetworkTypesInputSchema,
  PrefixesDistributionInputSchema,
  IxFacilityCorrelationInputSchema,
  ReloadDatasetInputSchema,
  parseArgs,
} from "./schemas.js";
import type { DatasetService } from "./service/dataset.js";
import { logger, errorCode } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

export const TOOL_NAMES = [
  "get_stats",
  "list_networks",
  "search_networks",
  "network_types",
  "prefixes_distribution",
  "ix_facility_correlation",
  "reload_dataset",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** Tools that never change server state */
export const READ_ONLY_TOOLS: ReadonlySet<ToolName> = new Set<ToolName>([
  "get_stats",
  "list_networks",
  "search_networks",
  "network_types",
  "prefixes_distribution",
  "ix_facility_correlation",
]);

const TOOL_NAME_SET: ReadonlySet<string> = new Set(TOOL_NAMES);

export function isToolName(name: string): name is ToolName {
  return TOOL_NAME_SET.has(name);
}

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
}

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

export type ToolHandlers = Record<ToolName, ToolHandler>;

/**
 * Build a result from a summary line and a JSON payload
 */
function toolResult(summary: string, payload: unknown): ToolResult {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(payload) },
    ],
  };
}

// Helper to wrap tool execution with logging and metrics
async function executeTool(toolName: ToolName, handler: () => ToolResult | Promise<ToolResult>): Promise<ToolResult> {
  const startTime = Date.now();
  let success = false;
  let error: unknown;

  try {
    const result = await handler();
    success = true;
    return result;
  } catch (err) {
    error = err;
    throw err;
  } finally {
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, error);
    recordToolExecution(toolName, duration, success, success ? undefined : errorCode(error));
  }
}

/**
 * Bind every tool to a dataset service
 * Arguments are validated before execution; a ZodError propagates to the caller.
 */
export function createToolHandlers(service: DatasetService): ToolHandlers {
  return {
    /**
     * get_stats: Totals and category breakdowns of the served snapshot
     */
    async get_stats(args) {
      parseArgs(GetStatsInputSchema, args);

      return executeTool("get_stats", () => {
        const stats = service.stats();
        const summary = stats.snapshot.error
          ? `Dataset unavailable: ${stats.snapshot.error.message}`
          : `${stats.totalNetworks} networks loaded from ${stats.snapshot.source}`;
        return toolResult(summary, stats);
      });
    },

    /**
     * list_networks: Filtered, paginated listing
     */
    async list_networks(args) {
      const query = parseArgs(ListNetworksInputSchema, args);

      return executeTool("list_networks", () => {
        const page = service.list(query);
        return toolResult(`Page ${page.page} of ${page.totalPages} (${page.totalItems} networks)`, page);
      });
    },

    /**
     * search_networks: Exact ASN or name fragment
     */
    async search_networks(args) {
      const query = parseArgs(SearchNetworksInputSchema, args);

      return executeTool("search_networks", () => {
        const result = service.search(query);
        const summary = result.truncated
          ? `Found ${result.count} matching networks (showing first ${result.results.length})`
          : `Found ${result.count} matching networks`;
        return toolResult(summary, result);
      });
    },

    /**
     * network_types: Type counts as a chart series
     */
    async network_types(args) {
      parseArgs(NetworkTypesInputSchema, args);

      return executeTool("network_types", () => {
        const series = service.networkTypes();
        return toolResult(`${series.labels.length} network types`, series);
      });
    },

    /**
     * prefixes_distribution: IPv4/IPv6 prefix counts for the first networks reporting both
     */
    async prefixes_distribution(args) {
      parseArgs(PrefixesDistributionInputSchema, args);

      return executeTool("prefixes_distribution", () => {
        const distribution = service.prefixDistribution();
        return toolResult(`Prefix counts for ${distribution.networks.length} networks`, distribution);
      });
    },

    /**
     * ix_facility_correlation: Exchange count against facility count
     */
    async ix_facility_correlation(args) {
      parseArgs(IxFacilityCorrelationInputSchema, args);

      return executeTool("ix_facility_correlation", () => {
        const points = service.ixFacilityCorrelation();
        return toolResult(`${points.length} networks with exchange and facility counts`, {
          points,
          count: points.length,
        });
      });
    },

    /**
     * reload_dataset: Read the dump again and publish it
     */
    async reload_dataset(args) {
      parseArgs(ReloadDatasetInputSchema, args);

      return executeTool("reload_dataset", async () => {
        const summary = await service.reload();
        const { published, snapshot, error } = summary;
        let text: string;
        if (!published) {
          text = `Reload failed (${error?.message ?? "unknown error"}); still serving ${snapshot.records} networks loaded at ${snapshot.loadedAt}`;
        } else if (snapshot.error) {
          // Nothing was being served, so the failed load was published as is
          text = `Dataset unavailable: ${snapshot.error.message}`;
        } else {
          text = `Reloaded ${snapshot.records} networks from ${snapshot.source}`;
        }
        return toolResult(text, summary);
      });
    },
  };
}

const NO_ARGS = { type: "object", properties: {}, additionalProperties: false } as const;

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions: Tool[] = [
  {
    name: "get_stats",
    description: "Network total plus type, policy, and scope breakdowns (first-seen order) and snapshot details",
    inputSchema: NO_ARGS,
  },
  {
    name: "list_networks",
    description: `List networks with optional filters, paginated (perPage max ${MAX_PER_PAGE}, default ${DEFAULT_PER_PAGE})`,
    inputSchema: {
      type: "object",
      properties: {
        page: {
          type: "integer",
          minimum: 1,
          description: "1-indexed page number (default 1)",
        },
        perPage: {
          type: "integer",
          minimum: 1,
          maximum: MAX_PER_PAGE,
          description: `Networks per page (default ${DEFAULT_PER_PAGE})`,
        },
        q: {
          type: "string",
          description: "Case-insensitive fragment of the name, aka name, or ASN",
        },
        type: {
          type: "string",
          description: "Network type, e.g. 'NSP' or 'Content' (case-insensitive)",
        },
        policy: {
          type: "string",
          description: "General peering policy, e.g. 'Open' (case-insensitive)",
        },
        status: {
          type: "string",
          description: "Registry status, e.g. 'ok' (case-insensitive)",
        },
      },
      additionalProperties: false,
    },
  },
  {
    name: "search_networks",
    description: "Find networks whose ASN equals `asn` OR whose name contains `name` (case-insensitive); no criteria returns nothing",
    inputSchema: {
      type: "object",
      properties: {
        asn: {
          type: "integer",
          minimum: 0,
          maximum: MAX_ASN,
          description: "Exact AS number",
        },
        name: {
          type: "string",
          description: "Name fragment (only the first 100 characters are used)",
        },
      },
      additionalProperties: false,
    },
  },
  {
    name: "network_types",
    description: "Network type counts as aligned labels/data arrays",
    inputSchema: NO_ARGS,
  },
  {
    name: "prefixes_distribution",
    description: "IPv4 and IPv6 prefix counts for the first 15 networks that report both",
    inputSchema: NO_ARGS,
  },
  {
    name: "ix_facility_correlation",
    description: "Exchange count (x) against facility count (y) for every network reporting both",
    inputSchema: NO_ARGS,
  },
  {
    name: "reload_dataset",
    description: "Re-read the data file; on failure the current snapshot keeps being served",
    inputSchema: NO_ARGS,
  },
];
