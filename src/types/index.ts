// Core types and interfaces for the dbdeps CLI

export type DependencyDirection = 'dependents' | 'dependencies';

export type OutputFormat = 'table' | 'json' | 'yaml' | 'script';

/**
 * Opaque scripting switches forwarded to the catalog resolver as-is.
 */
export type ScriptingOptions = Readonly<Record<string, string | number | boolean>>;

// Configuration types
export interface DbDepsConfig {
  direction?: DependencyDirection;
  allowSystemObjects?: boolean;
  includeSelf?: boolean;
  includeScript?: boolean;
  batchTerminator?: string;
  concurrency?: number;
  timeoutMs?: number;
  /** Path to a catalog snapshot, relative to the config file */
  catalog?: string;
  format?: OutputFormat;
  scriptingOptions?: ScriptingOptions;
}

// Command types
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class DbDepsError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DbDepsError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_INPUT = 'INVALID_INPUT',
  CONTEXT_RESOLUTION_ERROR = 'CONTEXT_RESOLUTION_ERROR',
  DISCOVERY_ERROR = 'DISCOVERY_ERROR',
  RESOLUTION_ERROR = 'RESOLUTION_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
