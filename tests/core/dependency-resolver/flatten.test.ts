import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { countTreeNodes, flattenDependencyTree } from '../../../src/core/dependency-resolver/flatten.js';
import type { FlatNode, RawTreeNode } from '../../../src/core/dependency-resolver/types.js';
import { buildTree, id } from '../../test-helpers.js';

// A is the root; D is reached through both B and C
const diamond = buildTree([
  {
    id: 'A',
    children: [
      { id: 'B', children: [{ id: 'D', bound: true }] },
      { id: 'C', children: [{ id: 'D' }] }
    ]
  }
]);

function summarize(nodes: readonly FlatNode[]): string[] {
  return nodes.map(node => `${node.identity.key}@${node.tier}<${node.structuralParent?.identity.key ?? '-'}`);
}

describe('flattenDependencyTree', () => {
  it('walks dependents in pre-order, skipping the root object', () => {
    const nodes = flattenDependencyTree(diamond, 'dependents');
    assert.deepEqual(summarize(nodes), ['B@1<A', 'D@2<B', 'C@1<A', 'D@2<C']);
    assert.deepEqual(nodes.map(node => node.isSchemaBound), [false, true, false, false]);
  });

  it('emits the root object at tier 0 when self is included', () => {
    const nodes = flattenDependencyTree(diamond, 'dependents', { includeSelf: true });
    assert.deepEqual(summarize(nodes), ['A@0<-', 'B@1<A', 'D@2<B', 'C@1<A', 'D@2<C']);
  });

  it('negates tiers for dependencies without producing -0', () => {
    const nodes = flattenDependencyTree(diamond, 'dependencies', { includeSelf: true });
    assert.deepEqual(nodes.map(node => node.tier), [0, -1, -2, -1, -2]);
    assert.ok(Object.is(nodes[0].tier, 0));
  });

  it('keeps tier signs consistent with the direction', () => {
    for (const node of flattenDependencyTree(diamond, 'dependents', { includeSelf: true })) {
      assert.ok(node.tier >= 0);
    }
    for (const node of flattenDependencyTree(diamond, 'dependencies', { includeSelf: true })) {
      assert.ok(node.tier <= 0);
    }
  });

  it('emits N nodes with self and N-1 without', () => {
    const total = countTreeNodes(diamond);
    assert.equal(total, 5);
    assert.equal(flattenDependencyTree(diamond, 'dependents', { includeSelf: true }).length, total);
    assert.equal(flattenDependencyTree(diamond, 'dependents').length, total - 1);
  });

  it('links structural parents to the emitted parent node', () => {
    const [b, d] = flattenDependencyTree(diamond, 'dependents');
    assert.equal(d.structuralParent, b);
    assert.equal(b.structuralParent?.structuralParent, null);
  });

  it('returns nothing for a root without dependents', () => {
    const lone = buildTree([{ id: 'A' }]);
    assert.deepEqual(flattenDependencyTree(lone, 'dependents'), []);
    assert.deepEqual(summarize(flattenDependencyTree(lone, 'dependents', { includeSelf: true })), ['A@0<-']);
  });

  it('returns nothing for an empty tree', () => {
    const empty: RawTreeNode = { isSchemaBound: false };
    assert.equal(countTreeNodes(empty), 0);
    assert.deepEqual(flattenDependencyTree(empty, 'dependents', { includeSelf: true }), []);
  });

  it('keeps additional roots at tier 0', () => {
    const tree = buildTree([
      { id: 'A', children: [{ id: 'B' }] },
      { id: 'X', children: [{ id: 'Y' }] }
    ]);
    assert.deepEqual(summarize(flattenDependencyTree(tree, 'dependents')), ['B@1<A', 'Y@1<X']);
  });

  it('handles deep chains without recursion', () => {
    let node: RawTreeNode = { identity: id('n5000'), isSchemaBound: false };
    for (let i = 4999; i >= 0; i--) {
      node = { identity: id(`n${i}`), isSchemaBound: false, firstChild: node };
    }
    const nodes = flattenDependencyTree({ isSchemaBound: false, firstChild: node }, 'dependents');
    assert.equal(nodes.length, 5000);
    assert.equal(nodes[nodes.length - 1].tier, 5000);
  });

  it('rejects a node without identity below the synthetic root', () => {
    const broken: RawTreeNode = {
      isSchemaBound: false,
      firstChild: { identity: id('A'), isSchemaBound: false, firstChild: { isSchemaBound: false } }
    };
    assert.throws(() => flattenDependencyTree(broken, 'dependents'), {
      message: 'Discovery tree node at tier 1 has no identity'
    });
  });
});
