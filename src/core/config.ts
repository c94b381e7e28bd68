import { dirname, isAbsolute, join, resolve } from 'path';
import type { DbDepsConfig, ScriptingOptions } from '../types/index.js';
import { DIRECTIONS, FILE_PATTERNS, MAX_TIMEOUT_MS, OUTPUT_FORMATS } from '../constants/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { isOneOf, isRecord, isScalar } from '../utils/type-guards.js';

/**
 * Configuration management for the dbdeps CLI
 * Reads dbdeps.config.jsonc / dbdeps.config.json (JSONC allowed in both)
 */

const KNOWN_KEYS = new Set<string>([
  'direction',
  'allowSystemObjects',
  'includeSelf',
  'includeScript',
  'batchTerminator',
  'concurrency',
  'timeoutMs',
  'catalog',
  'format',
  'scriptingOptions'
]);

class ConfigManager {
  private config: DbDepsConfig | null = null;
  private configPath: string | null = null;
  private readonly cwd: string;
  private readonly explicitPath?: string;

  constructor(cwd: string = process.cwd(), explicitPath?: string) {
    this.cwd = cwd;
    this.explicitPath = explicitPath ? resolve(cwd, explicitPath) : undefined;
  }

  /**
   * Find the config file to read; an explicit path must exist
   */
  private async findConfigFile(): Promise<string | null> {
    if (this.explicitPath) {
      if (!(await exists(this.explicitPath))) {
        throw new ConfigError(`Config file not found: ${this.explicitPath}`);
      }
      return this.explicitPath;
    }

    for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
      const path = join(this.cwd, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load and validate configuration; an absent file yields an empty config
   */
  async load(): Promise<DbDepsConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration: ${describeError(error)}`, {
        configPath
      });
    }

    this.configPath = configPath;
    this.config = validateConfig(raw, configPath);
    return this.config;
  }

  /**
   * Absolute path of the configured catalog snapshot, resolved against the
   * config file's directory
   */
  async getCatalogPath(): Promise<string | undefined> {
    const config = await this.load();
    if (!config.catalog) {
      return undefined;
    }
    if (isAbsolute(config.catalog)) {
      return config.catalog;
    }
    const base = this.configPath ? dirname(this.configPath) : this.cwd;
    return resolve(base, config.catalog);
  }

  /**
   * Path of the file the configuration was read from, if any
   */
  getConfigFilePath(): string | null {
    return this.configPath;
  }
}

/**
 * Validate a parsed config document
 */
export function validateConfig(raw: unknown, source: string): DbDepsConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: configuration must be an object`);
  }

  const fail = (key: string, expected: string): never => {
    throw new ConfigError(`${source}: '${key}' must be ${expected}`, { key });
  };

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`${source}: ignoring unknown config key '${key}'`);
    }
  }

  const config: DbDepsConfig = {};

  if (raw.direction !== undefined) {
    if (!isOneOf(DIRECTIONS, raw.direction)) fail('direction', `one of ${DIRECTIONS.join(', ')}`);
    else config.direction = raw.direction;
  }

  for (const key of ['allowSystemObjects', 'includeSelf', 'includeScript'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') fail(key, 'a boolean');
    else config[key] = value;
  }

  if (raw.batchTerminator !== undefined) {
    if (typeof raw.batchTerminator !== 'string' || !raw.batchTerminator.trim()) fail('batchTerminator', 'a non-empty string');
    else config.batchTerminator = raw.batchTerminator.trim();
  }

  if (raw.concurrency !== undefined) {
    if (!Number.isInteger(raw.concurrency) || Number(raw.concurrency) < 1) fail('concurrency', 'a positive integer');
    else config.concurrency = Number(raw.concurrency);
  }

  if (raw.timeoutMs !== undefined) {
    if (typeof raw.timeoutMs !== 'number' || !(raw.timeoutMs > 0) || raw.timeoutMs > MAX_TIMEOUT_MS) {
      fail('timeoutMs', `a positive number no greater than ${MAX_TIMEOUT_MS}`);
    }
    else config.timeoutMs = raw.timeoutMs;
  }

  if (raw.catalog !== undefined) {
    if (typeof raw.catalog !== 'string' || !raw.catalog) fail('catalog', 'a path');
    else config.catalog = raw.catalog;
  }

  if (raw.format !== undefined) {
    if (!isOneOf(OUTPUT_FORMATS, raw.format)) fail('format', `one of ${OUTPUT_FORMATS.join(', ')}`);
    else config.format = raw.format;
  }

  if (raw.scriptingOptions !== undefined) {
    config.scriptingOptions = validateScriptingOptions(raw.scriptingOptions, source);
  }

  return config;
}

function validateScriptingOptions(value: unknown, source: string): ScriptingOptions {
  if (!isRecord(value)) {
    throw new ConfigError(`${source}: 'scriptingOptions' must be an object`);
  }
  const options: Record<string, string | number | boolean> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isScalar(entry)) {
      throw new ConfigError(`${source}: scripting option '${key}' must be a string, number or boolean`);
    }
    options[key] = entry;
  }
  return options;
}

export { ConfigManager };
