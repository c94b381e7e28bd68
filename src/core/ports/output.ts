/**
 * Output Port Interface
 *
 * Contract for user-facing status output. Commands report progress through
 * this port instead of calling console or @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI): routes to @clack/prompts in a TTY
 *   - consoleOutput (default/CI): plain console output on stderr
 */

/**
 * Spinner that works across all output backends.
 */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
}

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Create a spinner for long-running operations */
  spinner(): UnifiedSpinner;
}
