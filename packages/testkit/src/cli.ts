/**
 * CLI testing utilities
 */

import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory; tsx must resolve from it (default: process cwd) */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Kill the process after this many milliseconds (default: 15000) */
  timeout?: number;
}

/**
 * Execute a TypeScript CLI entry point under tsx
 *
 * Non-zero exits resolve normally; inspect `exitCode`.
 *
 * @param cliPath - Path to the CLI's .ts entry point
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(cliPath: string, args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { cwd, env, input, timeout = 15000 } = options;

  const result = await execa("node", ["--import", "tsx", cliPath, ...args], {
    cwd,
    env: { ...process.env, ...env },
    input,
    timeout,
    reject: false,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
