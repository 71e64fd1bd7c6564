// SPDX-License-Identifier: Apache-2.0

export interface Logger {
  /** Printed only under `--verbose`; `depth` indents by two spaces per level. */
  verbose(message: string, depth?: number): void;
  /** Always printed. */
  notice(message: string): void;
}

/**
 * Diagnostics go to stderr so stdout carries only the listing or resolution
 * output.
 */
export function createLogger(
  verbose: boolean,
  write: (text: string) => void = (text) => {
    process.stderr.write(text);
  },
): Logger {
  return {
    verbose(message, depth = 0) {
      if (verbose) write(`${"  ".repeat(depth)}${message}\n`);
    },
    notice(message) {
      write(`${message}\n`);
    },
  };
}
