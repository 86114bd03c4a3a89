/**
 * Output Port Interface
 *
 * Contract for user-facing progress output. Core logic uses this interface
 * instead of console.log or @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI, interactive text runs): @clack/prompts
 *   - consoleOutput (default, CI, JSON runs): plain lines on stderr
 */

/**
 * Unified spinner interface that works across all output backends.
 */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Create a spinner for long-running operations */
  spinner(): UnifiedSpinner;
}
