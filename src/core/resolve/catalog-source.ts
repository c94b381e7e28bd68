import { resolve } from 'path';
import { ConfigManager } from '../config.js';
import { ValidationError } from '../../utils/errors.js';
import { loadCatalogSnapshot, type CatalogSnapshot } from '../catalog/snapshot.js';
import type { DbDepsConfig } from '../../types/index.js';

export interface CatalogSourceOptions {
  cwd: string;
  configPath?: string;
  /** --catalog flag, relative to cwd */
  catalog?: string;
}

export interface LoadedCatalogSource {
  config: DbDepsConfig;
  snapshot: CatalogSnapshot;
}

/**
 * Load the config file and the catalog snapshot it (or the flag) points at
 */
export async function loadCatalogSource(options: CatalogSourceOptions): Promise<LoadedCatalogSource> {
  const configManager = new ConfigManager(options.cwd, options.configPath);
  const config = await configManager.load();

  const catalogPath = options.catalog
    ? resolve(options.cwd, options.catalog)
    : await configManager.getCatalogPath();

  if (!catalogPath) {
    throw new ValidationError('no catalog snapshot given; pass --catalog <file> or set "catalog" in dbdeps.config.jsonc');
  }

  const snapshot = await loadCatalogSnapshot(catalogPath);
  return { config, snapshot };
}
