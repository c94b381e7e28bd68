import { InvalidArgumentError, type Command } from 'commander';
import { MAX_TIMEOUT_MS } from '../constants/index.js';

/**
 * Options declared on the root program
 */
export interface GlobalOptions {
  cwd?: string;
  config?: string;
  verbose: boolean;
}

export function readGlobalOptions(command: Command): GlobalOptions {
  const programOpts = command.parent?.opts() ?? {};
  return {
    cwd: typeof programOpts.cwd === 'string' ? programOpts.cwd : undefined,
    config: typeof programOpts.config === 'string' ? programOpts.config : undefined,
    verbose: programOpts.verbose === true
  };
}

/**
 * Commander argument parser for counts and durations
 */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseTimeout(value: string): number {
  const parsed = parsePositiveInteger(value);
  if (parsed > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Must be at most ${MAX_TIMEOUT_MS}.`);
  }
  return parsed;
}

export function parseTerminator(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvalidArgumentError('Must not be empty.');
  }
  return trimmed;
}
