/**
 * I/O helpers for CLI
 */

/**
 * Output channels for one CLI invocation
 */
export interface CliIO {
  stdout(content: string): void;
  stderr(content: string): void;
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Process streams
 */
export const processIO: CliIO = {
  stdout: writeStdout,
  stderr: writeStderr,
};

/**
 * Collects output in memory (tests, embedding)
 */
export class BufferedIO implements CliIO {
  out = "";
  err = "";

  stdout = (content: string): void => {
    this.out += content;
  };

  stderr = (content: string): void => {
    this.err += content;
  };
}
