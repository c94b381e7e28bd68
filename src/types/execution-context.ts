/**
 * Execution Context Types
 */

import type { OutputPort } from '../core/ports/output.js';

/**
 * ExecutionContext - what a command needs from its host
 *
 * Carries the working directory and the ports for user-facing output,
 * so the same command logic runs under the CLI and under tests.
 */
export interface ExecutionContext {
  /** Absolute path used to resolve relative paths (config, catalog) */
  cwd: string;

  /** Status, progress and diagnostics */
  output: OutputPort;

  /** Rendered results; kept apart from `output` so they can be piped */
  write(text: string): void;

  /** True in a TTY session; enables colors and rich output */
  interactive: boolean;
}
