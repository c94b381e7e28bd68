import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigManager, validateConfig } from '../../src/core/config.js';
import { mergeResolveSettings } from '../../src/core/resolve/settings.js';
import { ConfigError, ValidationError } from '../../src/utils/errors.js';

let testRoot: string;

before(async () => {
  testRoot = await fs.mkdtemp(join(tmpdir(), 'dbdeps-config-test-'));
});

after(async () => {
  await fs.rm(testRoot, { recursive: true, force: true });
});

async function workspace(name: string, files: Record<string, string> = {}): Promise<string> {
  const dir = join(testRoot, name);
  await fs.mkdir(dir, { recursive: true });
  for (const [file, content] of Object.entries(files)) {
    await fs.mkdir(join(dir, file, '..'), { recursive: true });
    await fs.writeFile(join(dir, file), content);
  }
  return dir;
}

describe('ConfigManager', () => {
  it('yields an empty config when no file exists', async () => {
    const cwd = await workspace('empty');
    const manager = new ConfigManager(cwd);

    assert.deepEqual(await manager.load(), {});
    assert.equal(manager.getConfigFilePath(), null);
    assert.equal(await manager.getCatalogPath(), undefined);
  });

  it('reads JSONC with comments and trailing commas', async () => {
    const cwd = await workspace('jsonc', {
      'dbdeps.config.jsonc': [
        '{',
        '  // walk upwards by default',
        '  "direction": "dependencies",',
        '  "includeScript": false,',
        '  "batchTerminator": "  GO  ",',
        '  "concurrency": 4,',
        '  "catalog": "snapshots/catalog.yml",',
        '  "scriptingOptions": { "IncludeIfNotExists": true },',
        '}'
      ].join('\n')
    });
    const manager = new ConfigManager(cwd);

    assert.deepEqual(await manager.load(), {
      direction: 'dependencies',
      includeScript: false,
      batchTerminator: 'GO',
      concurrency: 4,
      catalog: 'snapshots/catalog.yml',
      scriptingOptions: { IncludeIfNotExists: true }
    });
    assert.equal(manager.getConfigFilePath(), join(cwd, 'dbdeps.config.jsonc'));
    assert.equal(await manager.getCatalogPath(), join(cwd, 'snapshots', 'catalog.yml'));
  });

  it('falls back to dbdeps.config.json', async () => {
    const cwd = await workspace('json', { 'dbdeps.config.json': '{ "format": "yaml" }' });
    assert.deepEqual(await new ConfigManager(cwd).load(), { format: 'yaml' });
  });

  it('resolves the catalog against an explicit config file location', async () => {
    const cwd = await workspace('explicit', {
      'conf/dbdeps.jsonc': '{ "catalog": "../data/catalog.yml" }'
    });
    const manager = new ConfigManager(cwd, 'conf/dbdeps.jsonc');

    assert.equal(await manager.getCatalogPath(), join(cwd, 'data', 'catalog.yml'));
  });

  it('fails for a missing explicit file', async () => {
    const cwd = await workspace('missing');
    await assert.rejects(new ConfigManager(cwd, 'nope.jsonc').load(), {
      name: 'ConfigError',
      message: `Config file not found: ${join(cwd, 'nope.jsonc')}`
    });
  });

  it('fails for a file that does not parse', async () => {
    const cwd = await workspace('broken', { 'dbdeps.config.jsonc': '{ "direction": ' });
    await assert.rejects(new ConfigManager(cwd).load(), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.ok(error.message.startsWith('Failed to load configuration: File system error: Failed to parse JSON/JSONC file: '));
      return true;
    });
  });
});

describe('validateConfig', () => {
  it('rejects values of the wrong shape', () => {
    assert.throws(() => validateConfig({ concurrency: 0 }, 'cfg'), {
      message: "cfg: 'concurrency' must be a positive integer"
    });
    assert.throws(() => validateConfig({ direction: 'sideways' }, 'cfg'), {
      message: "cfg: 'direction' must be one of dependents, dependencies"
    });
    assert.throws(() => validateConfig({ includeSelf: 'yes' }, 'cfg'), {
      message: "cfg: 'includeSelf' must be a boolean"
    });
    assert.throws(() => validateConfig({ timeoutMs: 3000000000 }, 'cfg'), {
      message: "cfg: 'timeoutMs' must be a positive number no greater than 2147483647"
    });
    assert.throws(() => validateConfig({ batchTerminator: '   ' }, 'cfg'), {
      message: "cfg: 'batchTerminator' must be a non-empty string"
    });
    assert.throws(() => validateConfig({ scriptingOptions: { nested: {} } }, 'cfg'), {
      message: "cfg: scripting option 'nested' must be a string, number or boolean"
    });
    assert.throws(() => validateConfig([], 'cfg'), { message: 'cfg: configuration must be an object' });
  });

  it('ignores unknown keys', () => {
    assert.deepEqual(validateConfig({ timeoutMs: 500, colour: 'blue' }, 'cfg'), { timeoutMs: 500 });
  });
});

describe('mergeResolveSettings', () => {
  it('applies defaults when nothing is set', () => {
    assert.deepEqual(mergeResolveSettings({}, {}), {
      direction: 'dependents',
      allowSystemObjects: false,
      includeSelf: false,
      includeScript: true,
      batchTerminator: 'GO',
      concurrency: 1,
      timeoutMs: undefined,
      scriptingOptions: undefined,
      format: 'table'
    });
  });

  it('lets flags override the config file', () => {
    const settings = mergeResolveSettings(
      { direction: 'dependencies', includeScript: false, concurrency: 2, timeoutMs: 1000, format: 'json' },
      { parents: false, script: true, concurrency: 8, format: 'script' }
    );

    assert.equal(settings.direction, 'dependencies');
    assert.equal(settings.includeScript, true);
    assert.equal(settings.concurrency, 8);
    assert.equal(settings.timeoutMs, 1000);
    assert.equal(settings.format, 'script');
  });

  it('maps --parents to the dependencies direction', () => {
    assert.equal(mergeResolveSettings({}, { parents: true }).direction, 'dependencies');
  });

  it('trims the terminator flag', () => {
    assert.equal(mergeResolveSettings({ batchTerminator: 'END' }, { terminator: ' GO ' }).batchTerminator, 'GO');
  });

  it('rejects a blank terminator flag', () => {
    assert.throws(() => mergeResolveSettings({}, { terminator: '  ' }), (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.message, 'Validation error: --terminator must not be empty');
      return true;
    });
  });

  it('rejects a timeout flag longer than a timer can hold', () => {
    assert.throws(() => mergeResolveSettings({}, { timeout: 3_000_000_000 }), {
      message: 'Validation error: --timeout must be at most 2147483647'
    });
  });
});
