import { Urn } from '../urn.js';
import type { FlatNode } from '../dependency-resolver/types.js';

/**
 * Indented pre-order listing of an unresolved, flattened tree.
 * Duplicates reached through several paths are shown at every position.
 */
export function renderFlatTree(nodes: readonly FlatNode[]): string {
  const shallowest = nodes.reduce((min, node) => Math.min(min, Math.abs(node.tier)), Infinity);

  return nodes
    .map(node => {
      const depth = Math.abs(node.tier) - shallowest;
      const urn = Urn.tryParse(node.identity.toString());
      const label = urn ? `${urn.kind} ${urn.name}` : node.identity.toString();
      const bound = node.isSchemaBound ? ' (schema-bound)' : '';
      return `${'  '.repeat(depth)}[${node.tier}] ${label}${bound}`;
    })
    .join('\n');
}
