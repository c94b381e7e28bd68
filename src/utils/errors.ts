import { DbDepsError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the stages of dependency resolution
 */

export class InvalidInputError extends DbDepsError {
  constructor(message: string, details?: { root?: string; [key: string]: unknown }) {
    super(`Invalid input: ${message}`, ErrorCodes.INVALID_INPUT, details);
    this.name = 'InvalidInputError';
  }
}

export class ContextResolutionError extends DbDepsError {
  readonly root: string;

  constructor(root: string, reason: string) {
    super(`Cannot determine the server context of '${root}': ${reason}`, ErrorCodes.CONTEXT_RESOLUTION_ERROR, { root });
    this.name = 'ContextResolutionError';
    this.root = root;
  }
}

export class DiscoveryError extends DbDepsError {
  readonly roots: string[];

  constructor(roots: string[], cause: unknown) {
    super(
      `Dependency discovery failed for ${roots.map(root => `'${root}'`).join(', ')}: ${describeError(cause)}`,
      ErrorCodes.DISCOVERY_ERROR,
      { roots },
      { cause }
    );
    this.name = 'DiscoveryError';
    this.roots = roots;
  }
}

export class ResolutionError extends DbDepsError {
  readonly identity: string;

  constructor(identity: string, cause: unknown) {
    super(`Cannot resolve '${identity}': ${describeError(cause)}`, ErrorCodes.RESOLUTION_ERROR, { identity }, { cause });
    this.name = 'ResolutionError';
    this.identity = identity;
  }
}

export class ValidationError extends DbDepsError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends DbDepsError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class FileSystemError extends DbDepsError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

/**
 * Best-effort message extraction for values thrown by external collaborators
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof DbDepsError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
