/**
 * CLI Output Factory
 *
 * Picks the OutputPort a command reports progress through. Clack is only
 * used for interactive text runs: its output goes to stdout, which JSON
 * runs reserve for the report.
 */

import type { OutputFormat } from '../types/index.js';
import { consoleOutput, silentOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { createClackOutput } from './clack-output-adapter.js';

export interface CliOutputOptions {
  format?: OutputFormat;
  quiet?: boolean;
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

/** Cached port singleton for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

export function createCliOutput(options: CliOutputOptions = {}): OutputPort {
  if (options.quiet) {
    return silentOutput;
  }
  if (options.format !== 'json' && detectInteractive(options.interactive)) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  return consoleOutput;
}
