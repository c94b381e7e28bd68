import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { enrichAll, enrichNode, normalizeScript } from '../../../src/core/dependency-resolver/enrich.js';
import { flattenDependencyTree } from '../../../src/core/dependency-resolver/flatten.js';
import type { CatalogResolver, FlatNode, ObjectDescription } from '../../../src/core/dependency-resolver/types.js';
import { ResolutionError } from '../../../src/utils/errors.js';
import { CallTimeoutError } from '../../../src/utils/deadline.js';
import { FakeCatalog, buildTree, id } from '../../test-helpers.js';

describe('normalizeScript', () => {
  it('strips the session toggles and appends the terminator', () => {
    const script = 'SET ANSI_NULLS ON\nSET QUOTED_IDENTIFIER ON\nCREATE VIEW dbo.v AS SELECT 1\n';
    assert.equal(normalizeScript(script), 'CREATE VIEW dbo.v AS SELECT 1\nGO');
  });

  it('matches the toggles in any casing with an optional semicolon', () => {
    const script = 'set ansi_nulls on;\r\nCREATE PROCEDURE p AS SELECT 1\r\nSet Quoted_Identifier On';
    assert.equal(normalizeScript(script), 'CREATE PROCEDURE p AS SELECT 1\nGO');
  });

  it('removes every occurrence', () => {
    const script = 'SET ANSI_NULLS ON\nSELECT 1\nSET ANSI_NULLS ON\nSELECT 2';
    assert.equal(normalizeScript(script), 'SELECT 1\n\nSELECT 2\nGO');
  });

  it('leaves other SET statements alone', () => {
    assert.equal(normalizeScript('SET ANSI_NULLS OFF\nSELECT 1'), 'SET ANSI_NULLS OFF\nSELECT 1\nGO');
  });

  it('is idempotent', () => {
    const once = normalizeScript('SET QUOTED_IDENTIFIER ON\nCREATE VIEW dbo.v AS SELECT 1');
    assert.equal(normalizeScript(once), once);
  });

  it('uses a custom terminator and reduces an empty script to it', () => {
    assert.equal(normalizeScript('SELECT 1', 'END_BATCH'), 'SELECT 1\nEND_BATCH');
    assert.equal(normalizeScript('', 'END_BATCH'), 'END_BATCH');
    assert.equal(normalizeScript('SET ANSI_NULLS ON\n'), 'GO');
  });

  it('stays idempotent when the terminator carries whitespace', () => {
    const once = normalizeScript('CREATE VIEW v AS SELECT 1', 'GO ');
    assert.equal(once, 'CREATE VIEW v AS SELECT 1\nGO');
    assert.equal(normalizeScript(once, 'GO '), once);
  });

  it('falls back to the default terminator when given a blank one', () => {
    assert.equal(normalizeScript('CREATE VIEW v AS SELECT 1', ''), 'CREATE VIEW v AS SELECT 1\nGO');
  });
});

function diamondNodes(): FlatNode[] {
  const tree = buildTree([
    { id: 'A', children: [{ id: 'B', children: [{ id: 'D', bound: true }] }, { id: 'C' }] }
  ]);
  return flattenDependencyTree(tree, 'dependents');
}

describe('enrichNode', () => {
  it('builds the record from the node and both descriptions', async () => {
    const catalog = new FakeCatalog();
    catalog.descriptions.set('B', { kind: 'Table', owner: 'sales', name: 'sales.B' });
    catalog.descriptions.set('D', { kind: 'Function' });
    catalog.scripts.set('D', 'SET ANSI_NULLS ON\nCREATE FUNCTION D() RETURNS int AS BEGIN RETURN 1 END');
    const [, d] = diamondNodes();

    const record = await enrichNode(d, catalog, { originRoot: id('A') });

    assert.equal(record.dependentIdentity.key, 'D');
    assert.equal(record.dependentName, 'D');
    assert.equal(record.dependentKind, 'Function');
    assert.equal(record.owner, 'dbo');
    assert.equal(record.isSchemaBound, true);
    assert.equal(record.parentIdentity?.key, 'B');
    assert.equal(record.parentKind, 'Table');
    assert.equal(record.tier, 2);
    assert.equal(record.script, 'CREATE FUNCTION D() RETURNS int AS BEGIN RETURN 1 END\nGO');
    assert.equal(record.originRootIdentity.key, 'A');
  });

  it('reports schema binding flagged by the resolver', async () => {
    const catalog = new FakeCatalog();
    catalog.descriptions.set('C', { isSchemaBound: true });
    const c = diamondNodes()[2];

    const record = await enrichNode(c, catalog, { originRoot: id('A'), includeScript: false });

    assert.equal(record.isSchemaBound, true);
    assert.equal('script' in record, false);
    assert.equal(catalog.scriptCalls.length, 0);
  });

  it('leaves parent fields null for a root-level node', async () => {
    const node: FlatNode = { identity: id('A'), isSchemaBound: false, tier: 0, structuralParent: null };
    const record = await enrichNode(node, new FakeCatalog(), { originRoot: id('A'), includeScript: false });
    assert.equal(record.parentIdentity, null);
    assert.equal(record.parentKind, null);
  });

  it('passes scripting options through to the resolver', async () => {
    const catalog = new FakeCatalog();
    const [b] = diamondNodes();
    await enrichNode(b, catalog, { originRoot: id('A'), scriptingOptions: { IncludeIfNotExists: true } });
    assert.deepEqual(catalog.scriptCalls, [{ key: 'B', options: { IncludeIfNotExists: true } }]);
  });

  it('wraps a failing lookup in a ResolutionError naming the identity', async () => {
    const catalog = new FakeCatalog();
    catalog.failing.add('B');
    const [, d] = diamondNodes();

    await assert.rejects(enrichNode(d, catalog, { originRoot: id('A') }), (error: unknown) => {
      assert.ok(error instanceof ResolutionError);
      assert.equal(error.identity, 'B');
      assert.equal(error.message, "Cannot resolve 'B': B was dropped");
      return true;
    });
  });

  it('times out a lookup that never answers', async () => {
    const hanging: CatalogResolver = {
      resolve: () => new Promise<ObjectDescription>(() => {}),
      script: async () => ''
    };
    const [b] = diamondNodes();

    await assert.rejects(enrichNode(b, hanging, { originRoot: id('A'), timeoutMs: 10 }), (error: unknown) => {
      assert.ok(error instanceof ResolutionError);
      assert.ok(error.cause instanceof CallTimeoutError);
      assert.equal(error.message, "Cannot resolve 'B': Timed out after 10ms");
      return true;
    });
  });
});

describe('enrichAll', () => {
  it('isolates a failing node and keeps the others in order', async () => {
    const tree = buildTree([
      { id: 'A', children: [{ id: 'B' }, { id: 'C' }, { id: 'D' }, { id: 'E' }, { id: 'F' }] }
    ]);
    const nodes = flattenDependencyTree(tree, 'dependents');
    const catalog = new FakeCatalog();
    catalog.failing.add('D');

    const { records, failures } = await enrichAll(nodes, catalog, { originRoot: id('A'), concurrency: 3 });

    assert.deepEqual(records.map(record => record.dependentIdentity.key), ['B', 'C', 'E', 'F']);
    assert.equal(failures.length, 1);
    assert.equal(failures[0].identity.key, 'D');
    assert.equal(failures[0].tier, 1);
    assert.equal(failures[0].error.message, "Cannot resolve 'D': D was dropped");
  });
});
