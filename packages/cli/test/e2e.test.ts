/**
 * End-to-end CLI tests
 * Runs the real entry point in a child process
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import {
  createTempDir,
  parseJsonOutput,
  removeDir,
  runCli,
  sampleRecords,
  writeDump,
} from "@netviz/testkit";

// Path to the CLI entry point
const CLI_PATH = fileURLToPath(new URL("../src/cli.ts", import.meta.url));

describe("CLI End-to-End Tests", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir("netviz-cli-e2e-");
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  it("should answer a query from the file named in NETVIZ_DATA_FILE", async () => {
    const file = await writeDump(testDir, sampleRecords);

    const result = await runCli(CLI_PATH, ["stats", "--json"], { env: { NETVIZ_DATA_FILE: file } });

    expect(result.exitCode).toBe(0);
    expect(parseJsonOutput(result.stdout)).toEqual(expect.objectContaining({ totalNetworks: 5 }));
  });

  it("should exit 2 for a missing dump file", async () => {
    const missing = join(testDir, "missing.json");

    const result = await runCli(CLI_PATH, ["--file", missing, "stats"]);

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toContain(`Data source unavailable: ${missing}`);
    expect(result.stdout).toBe("");
  });

  it("should emit timing metrics with NETVIZ_CLI_DEBUG=1", async () => {
    const file = await writeDump(testDir, sampleRecords);

    const result = await runCli(CLI_PATH, ["--file", file, "types"], { env: { NETVIZ_CLI_DEBUG: "1" } });

    expect(result.exitCode).toBe(0);
    expect(result.stderr).toMatch(/^metric cli\.types duration_ms=\d+ success=true$/m);
  });
});
