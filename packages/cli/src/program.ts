/**
 * netviz CLI program definition
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { DEFAULT_PER_PAGE, serializeStats, type Dataset } from "@netviz/engine";
import { openCliDataset } from "./lib/dataset.js";
import { resolveDataFile } from "./lib/env.js";
import { parseAsn, parsePage, parsePerPage } from "./lib/arg.js";
import { processIO, type CliIO } from "./lib/io.js";
import { colorize, formatCounts, formatNetwork, printJson, printLines } from "./lib/render.js";
import { CliError, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";

// Read package.json for version
const packageJson: { version: string } = JSON.parse(
  readFileSync(new URL("../package.json", import.meta.url), "utf-8")
);

type GlobalOptions = {
  file?: string;
  verbose?: boolean;
  quiet?: boolean;
};

type JsonOption = {
  json?: boolean;
};

type ListOptions = JsonOption & {
  page: number;
  perPage: number;
  q?: string;
  type?: string;
  policy?: string;
  status?: string;
};

type SearchOptions = JsonOption & {
  asn?: number;
  name?: string;
};

/**
 * Build the command tree
 *
 * Actions never exit the process; failures propagate to {@link run}, which
 * maps them to an exit code.
 *
 * @param io - Output channels (default: process streams)
 */
export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  // Configure output; error text is colored only on a TTY
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
      outputError: (str, write) => write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("netviz")
    .description("Query a network registry snapshot: statistics, listings, search, and chart data")
    .version(packageJson.version)
    .option("--file <path>", "Registry dump file (default: $NETVIZ_DATA_FILE or ./data/peeringdb/net.json)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  /**
   * Run a command body against a freshly opened dataset, with timing metrics
   */
  function withDataset(label: string, fn: (dataset: Dataset, opts: GlobalOptions) => void): Promise<void> {
    return withTiming(
      label,
      async () => {
        const opts = program.opts<GlobalOptions>();
        const dataset = await openCliDataset(io, {
          file: resolveDataFile(opts.file),
          verbose: opts.verbose,
          quiet: opts.quiet,
        });
        fn(dataset, opts);
      },
      io.stderr
    );
  }

  // Stats command
  program
    .command("stats")
    .description("Show the network total and type, policy, and scope breakdowns")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: JsonOption) => {
      await withDataset("cli.stats", (dataset) => {
        const stats = dataset.stats();

        if (options.json) {
          printJson(io, serializeStats(stats));
          return;
        }

        printLines(io, [
          `Networks: ${stats.totalNetworks}`,
          "",
          "Network types:",
          ...formatCounts(stats.networkTypes),
          "",
          "Policies:",
          ...formatCounts(stats.policyTypes),
          "",
          "Scopes:",
          ...formatCounts(stats.scopes),
        ]);
      });
    });

  // Types command
  program
    .command("types")
    .description("Show network type counts in first-seen order")
    .option("--json", "Output as JSON ({ labels, data })")
    .action(async (options: JsonOption) => {
      await withDataset("cli.types", (dataset) => {
        const series = dataset.networkTypes();

        if (options.json) {
          printJson(io, series);
          return;
        }

        printLines(
          io,
          series.labels.map((label, i) => `${label}: ${series.data[i]}`)
        );
      });
    });

  // List command
  program
    .command("list")
    .description("List networks, filtered and paginated")
    .option("--page <n>", "Page number (1-indexed)", parsePage, 1)
    .option("--per-page <n>", "Networks per page (max 100)", parsePerPage, DEFAULT_PER_PAGE)
    .option("--q <text>", "Match a name, aka, or ASN fragment")
    .option("--type <type>", "Network type (case-insensitive)")
    .option("--policy <policy>", "General peering policy (case-insensitive)")
    .option("--status <status>", "Registry status (case-insensitive)")
    .option("--json", "Output the page as JSON")
    .action(async (options: ListOptions) => {
      await withDataset("cli.list", (dataset, opts) => {
        const page = dataset.list({
          page: options.page,
          perPage: options.perPage,
          q: options.q,
          type: options.type,
          policy: options.policy,
          status: options.status,
        });

        if (options.json) {
          printJson(io, page);
          return;
        }

        printLines(io, page.items.map(formatNetwork));
        if (!opts.quiet) {
          io.stdout(`Page ${page.page} of ${page.totalPages} (${page.totalItems} networks)\n`);
        }
      });
    });

  // Search command
  program
    .command("search")
    .description("Find networks by exact ASN or by name fragment")
    .option("--asn <asn>", "AS number (e.g., 64500 or AS64500)", parseAsn)
    .option("--name <text>", "Case-insensitive name fragment")
    .option("--json", "Output as JSON array")
    .action(async (options: SearchOptions) => {
      if (options.asn === undefined && !options.name) {
        throw new CliError("Provide --asn, --name, or both");
      }

      await withDataset("cli.search", (dataset, opts) => {
        const results = dataset.search({ asn: options.asn, name: options.name });

        if (options.json) {
          printJson(io, results);
          return;
        }

        printLines(io, results.map(formatNetwork));
        if (results.length === 0 && !opts.quiet) {
          io.stdout("No networks found\n");
        }
      });
    });

  // Prefixes command
  program
    .command("prefixes")
    .description("Show IPv4/IPv6 prefix counts for the first 15 networks reporting both")
    .option("--json", "Output as JSON ({ networks, ipv4, ipv6 })")
    .action(async (options: JsonOption) => {
      await withDataset("cli.prefixes", (dataset, opts) => {
        const distribution = dataset.prefixDistribution();

        if (options.json) {
          printJson(io, distribution);
          return;
        }

        if (!opts.quiet) {
          io.stdout("Network\tIPv4\tIPv6\n");
        }
        printLines(
          io,
          distribution.networks.map((name, i) => `${name}\t${distribution.ipv4[i]}\t${distribution.ipv6[i]}`)
        );
      });
    });

  // Correlation command
  program
    .command("correlation")
    .description("Show exchange count against facility count per network")
    .option("--json", "Output as JSON array of { x, y, label }")
    .action(async (options: JsonOption) => {
      await withDataset("cli.correlation", (dataset, opts) => {
        const points = dataset.ixFacilityCorrelation();

        if (options.json) {
          printJson(io, points);
          return;
        }

        if (!opts.quiet) {
          io.stdout("Network\tExchanges\tFacilities\n");
        }
        printLines(
          io,
          points.map((point) => `${point.label}\t${point.x}\t${point.y}`)
        );
      });
    });

  return program;
}

/**
 * Parse arguments, run one command, and report failures
 * @param argv - User arguments (without the node and script paths)
 * @param io - Output channels
 * @returns Process exit code
 */
export async function run(argv: string[], io: CliIO = processIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    // Usage errors, --help, and --version were already written by commander
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    io.stderr(`Error: ${formatCliError(err, opts.verbose)}\n`);
    return mapErrorToExitCode(err);
  }
}
