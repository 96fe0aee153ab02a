/**
 * Dataset adapter for CLI
 * Opens the dump once per invocation and turns source failures into exit code 2
 */

import { consoleSink, openDataset, silentSink, type Dataset } from "@netviz/engine";
import { CliError } from "./errors.js";
import type { CliIO } from "./io.js";

/**
 * Options for opening the CLI dataset
 */
export interface CliDatasetOptions {
  /** Resolved dump file path */
  file: string;
  /** Write dataset events and drop reasons to stderr */
  verbose?: boolean;
  /** Suppress the dropped-records warning */
  quiet?: boolean;
}

/**
 * Open the dump for one command
 *
 * Dataset events go to stderr only with --verbose, so stdout stays parseable.
 *
 * @throws {CliError} exit code 2 if the file is missing or malformed
 */
export async function openCliDataset(io: CliIO, options: CliDatasetOptions): Promise<Dataset> {
  const log = options.verbose
    ? consoleSink({ write: (line) => io.stderr(`${line}\n`), debug: true })
    : silentSink;

  const dataset = await openDataset({ file: options.file, log });
  const snapshot = dataset.snapshot();

  if (snapshot.error) {
    throw new CliError(snapshot.error.message, { exitCode: 2, cause: snapshot.error });
  }

  if (snapshot.dropped > 0 && !options.quiet) {
    const noun = snapshot.dropped === 1 ? "record" : "records";
    io.stderr(`Warning: dropped ${snapshot.dropped} invalid ${noun} from ${snapshot.source}\n`);
    if (options.verbose) {
      for (const issue of snapshot.issues) {
        io.stderr(`  ${issue.message}\n`);
      }
    }
  }

  return dataset;
}
