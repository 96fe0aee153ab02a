/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openDataset } from "@netviz/engine";
import type { Dataset, DatasetOptions } from "@netviz/engine";
import { toDump } from "./fixtures.js";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "netviz-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "netviz-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write records as a dump file
 * @param dir - Directory to write into
 * @param records - Records (or raw entries) for the `data` array
 * @param fileName - File name (default: "net.json")
 * @returns Absolute path of the written file
 */
export async function writeDump(dir: string, records: readonly unknown[], fileName = "net.json"): Promise<string> {
  const file = join(dir, fileName);
  await writeFile(file, toDump(records), "utf-8");
  return file;
}

/**
 * Execute a function with a dataset opened from a temporary dump file
 * @param records - Records for the dump
 * @param fn - Function to execute with the dataset and the dump path
 * @param options - Optional dataset options (file will be overridden)
 * @returns Result of fn
 */
export async function withTempDataset<T>(
  records: readonly unknown[],
  fn: (dataset: Dataset, file: string) => Promise<T>,
  options?: Partial<DatasetOptions>
): Promise<T> {
  const dir = await createTempDir();
  try {
    const file = await writeDump(dir, records);
    const dataset = await openDataset({ ...options, file });
    return await fn(dataset, file);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
