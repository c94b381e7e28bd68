/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations.
 * Command handlers use this instead of assembling ports themselves.
 */

import { resolve } from 'path';
import type { ExecutionContext } from '../types/execution-context.js';
import { createClackOutput } from './clack-output-adapter.js';
import { consoleOutput } from '../core/ports/console-output.js';

export interface CliContextOptions {
  cwd?: string;
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

/**
 * Create an ExecutionContext with CLI ports injected.
 *
 * In interactive mode (TTY): Clack for status output.
 * In non-interactive mode (CI/piped): plain console output.
 */
export function createCliExecutionContext(options: CliContextOptions = {}): ExecutionContext {
  const interactive = detectInteractive(options.interactive);
  return {
    cwd: resolve(process.cwd(), options.cwd ?? '.'),
    output: interactive ? createClackOutput() : consoleOutput,
    write: (text: string) => {
      process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
    },
    interactive
  };
}
