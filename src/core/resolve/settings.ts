import type { DbDepsConfig, DependencyDirection, OutputFormat } from '../../types/index.js';
import { MAX_TIMEOUT_MS, RESOLUTION_DEFAULTS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import type { ResolveDependenciesOptions } from '../dependency-resolver/types.js';

/**
 * Command-line flags shared by `resolve` and `tree`
 */
export interface ResolveFlags {
  catalog?: string;
  parents?: boolean;
  includeSelf?: boolean;
  script?: boolean;
  allowSystemObjects?: boolean;
  terminator?: string;
  concurrency?: number;
  timeout?: number;
  format?: OutputFormat;
}

export interface ResolveSettings extends ResolveDependenciesOptions {
  direction: DependencyDirection;
  format: OutputFormat;
}

/**
 * Flags win over the config file, which wins over built-in defaults
 */
export function mergeResolveSettings(config: DbDepsConfig, flags: ResolveFlags): ResolveSettings {
  const terminator = flags.terminator?.trim();
  if (terminator === '') {
    throw new ValidationError('--terminator must not be empty');
  }
  if (flags.timeout !== undefined && flags.timeout > MAX_TIMEOUT_MS) {
    throw new ValidationError(`--timeout must be at most ${MAX_TIMEOUT_MS}`);
  }

  return {
    direction: flags.parents ? 'dependencies' : config.direction ?? RESOLUTION_DEFAULTS.direction,
    allowSystemObjects: flags.allowSystemObjects ?? config.allowSystemObjects ?? RESOLUTION_DEFAULTS.allowSystemObjects,
    includeSelf: flags.includeSelf ?? config.includeSelf ?? RESOLUTION_DEFAULTS.includeSelf,
    includeScript: flags.script ?? config.includeScript ?? RESOLUTION_DEFAULTS.includeScript,
    batchTerminator: terminator ?? config.batchTerminator ?? RESOLUTION_DEFAULTS.batchTerminator,
    concurrency: flags.concurrency ?? config.concurrency ?? RESOLUTION_DEFAULTS.concurrency,
    timeoutMs: flags.timeout ?? config.timeoutMs,
    scriptingOptions: config.scriptingOptions,
    format: flags.format ?? config.format ?? RESOLUTION_DEFAULTS.format
  };
}
