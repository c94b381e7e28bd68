import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { renderFlatTree } from '../../../src/core/render/tree.js';
import { flattenDependencyTree } from '../../../src/core/dependency-resolver/flatten.js';
import { buildTree } from '../../test-helpers.js';

const tree = buildTree([
  {
    id: "Table[@Name='A']",
    children: [
      { id: "View[@Name='B']", bound: true, children: [{ id: "View[@Name='D']" }] },
      { id: "View[@Name='C']" }
    ]
  }
]);

describe('renderFlatTree', () => {
  it('indents by distance from the shallowest emitted node', () => {
    assert.equal(
      renderFlatTree(flattenDependencyTree(tree, 'dependencies')),
      ['[-1] View B (schema-bound)', '  [-2] View D', '[-1] View C'].join('\n')
    );
  });

  it('starts at the root object when it is included', () => {
    assert.equal(
      renderFlatTree(flattenDependencyTree(tree, 'dependents', { includeSelf: true })),
      ['[0] Table A', '  [1] View B (schema-bound)', '    [2] View D', '  [1] View C'].join('\n')
    );
  });

  it('renders nothing for no nodes', () => {
    assert.equal(renderFlatTree([]), '');
  });
});
