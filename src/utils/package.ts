import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { isRecord } from './type-guards.js';

let cachedVersion: string | undefined;

/**
 * Version of the installed CLI, read from the nearest package.json above
 * this module (works from src/ and from dist/src/).
 */
export function getVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }

  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const manifestPath = join(dir, 'package.json');
    if (existsSync(manifestPath)) {
      const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
      if (isRecord(manifest) && typeof manifest.version === 'string') {
        cachedVersion = manifest.version;
        return cachedVersion;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      cachedVersion = '0.0.0';
      return cachedVersion;
    }
    dir = parent;
  }
}
