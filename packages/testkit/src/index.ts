/**
 * Shared test helpers for netviz packages
 */

export { makeRecord, sampleRecords, toDump } from "./fixtures.js";
export { createTempDir, removeDir, writeDump, withTempDataset, withTempDir } from "./fs.js";
export { runCli, parseJsonOutput } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
