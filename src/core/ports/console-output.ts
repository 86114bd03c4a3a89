/**
 * Console Output Adapter (Default/CI)
 *
 * Plain implementation of OutputPort. Writes to stderr so that stdout
 * carries only the report, which keeps `--format json` output parseable.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.error(message);
  },

  step(message: string): void {
    console.error(message);
  },

  message(message: string): void {
    console.error(message);
  },

  success(message: string): void {
    console.error(`✓ ${message}`);
  },

  warn(message: string): void {
    console.error(`⚠ ${message}`);
  },

  spinner(): UnifiedSpinner {
    let msg = '';
    return {
      start(message: string) {
        msg = message;
        console.error(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.error(`✓ ${finalMessage ?? msg}`);
      },
      message(text: string) {
        msg = text;
      },
    };
  },
};

/** OutputPort that discards everything (`--quiet`). */
export const silentOutput: OutputPort = {
  info(): void {},
  step(): void {},
  message(): void {},
  success(): void {},
  warn(): void {},
  spinner(): UnifiedSpinner {
    return { start() {}, stop() {}, message() {} };
  },
};
