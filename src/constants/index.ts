/**
 * Shared constants for the dbdeps CLI
 */

export const FILE_PATTERNS = {
  CONFIG_FILES: ['dbdeps.config.jsonc', 'dbdeps.config.json'],
} as const;

export const DEFAULT_BATCH_TERMINATOR = 'GO' as const;

/** Longest delay setTimeout honours; larger values fire after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Option values used when neither the config file nor a flag sets them.
 */
export const RESOLUTION_DEFAULTS = {
  direction: 'dependents',
  allowSystemObjects: false,
  includeSelf: false,
  includeScript: true,
  batchTerminator: DEFAULT_BATCH_TERMINATOR,
  concurrency: 1,
  format: 'table',
} as const;

export const OUTPUT_FORMATS = ['table', 'json', 'yaml', 'script'] as const;

export const DIRECTIONS = ['dependents', 'dependencies'] as const;
