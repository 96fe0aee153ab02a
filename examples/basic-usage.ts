/**
 * Basic Usage Example
 *
 * Opens the bundled sample dump and runs the dashboard queries.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { fileURLToPath } from "node:url";
import { consoleSink, openDataset, serializeStats } from "@netviz/engine";

async function main(): Promise<void> {
  const file = fileURLToPath(new URL("./data/net.json", import.meta.url));
  const dataset = await openDataset({ file, log: consoleSink() });
  const snapshot = dataset.snapshot();

  if (snapshot.error) {
    throw snapshot.error;
  }

  console.log(`Loaded ${snapshot.records.length} networks from ${snapshot.source}`);
  for (const issue of snapshot.issues) {
    console.log(`  skipped: ${issue.message}`);
  }

  // Aggregates
  console.log("\nStats:");
  console.log(JSON.stringify(serializeStats(dataset.stats()), null, 2));

  // Listing with filters
  const open = dataset.list({ policy: "open", perPage: 2 });
  console.log(`\nOpen peering, page ${open.page} of ${open.totalPages}:`);
  for (const record of open.items) {
    console.log(`  AS${record.asn ?? "-"}  ${record.name ?? record.id}`);
  }

  // Search: exact ASN OR name fragment
  const found = dataset.search({ asn: 64504, name: "campus" });
  console.log(`\nSearch matched: ${found.map((r) => r.name ?? r.id).join(", ")}`);

  // Chart data
  console.log("\nNetwork types:", dataset.networkTypes());
  console.log("Prefixes:", dataset.prefixDistribution());
  console.log("Exchanges vs facilities:", dataset.ixFacilityCorrelation());
}

main().catch((error: unknown) => {
  console.error("Example failed:", error);
  process.exit(1);
});
