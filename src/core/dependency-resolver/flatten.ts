import type { DependencyDirection } from '../../types/index.js';
import type { FlatNode, RawTreeNode } from './types.js';

export interface FlattenOptions {
  /** Emit the root object itself at tier 0 */
  includeSelf?: boolean;
}

interface WorkItem {
  node: RawTreeNode;
  tier: number;
  parent: FlatNode | null;
}

/**
 * Flatten a discovery tree into pre-order FlatNodes.
 *
 * Top-level nodes (the roots under the synthetic tree root) sit at tier 0;
 * each first-child step adds one, siblings share their tier and structural
 * parent. Tiers are negated when walking dependencies so that ascending tier
 * is a valid causal order in both directions.
 *
 * Without `includeSelf` the tier-0 entries are still walked (they are the
 * structural parents of tier 1) but not emitted.
 */
export function flattenDependencyTree(
  tree: RawTreeNode,
  direction: DependencyDirection,
  options: FlattenOptions = {}
): FlatNode[] {
  const includeSelf = options.includeSelf ?? false;

  // Fewer nodes than this means there is nothing to report
  const minimumNodes = includeSelf ? 1 : 2;
  if (countTreeNodes(tree) < minimumNodes) {
    return [];
  }

  const flattened: FlatNode[] = [];
  const stack: WorkItem[] = [];
  if (tree.firstChild) {
    stack.push({ node: tree.firstChild, tier: 0, parent: null });
  }

  for (let item = stack.pop(); item; item = stack.pop()) {
    const { node, tier, parent } = item;

    if (!node.identity) {
      throw new Error(`Discovery tree node at tier ${tier} has no identity`);
    }

    const flat: FlatNode = {
      identity: node.identity,
      isSchemaBound: node.isSchemaBound,
      tier: signTier(tier, direction),
      structuralParent: parent
    };

    if (tier > 0 || includeSelf) {
      flattened.push(flat);
    }

    // Sibling first so the child subtree is popped (and emitted) before it
    if (node.nextSibling) {
      stack.push({ node: node.nextSibling, tier, parent });
    }
    if (node.firstChild) {
      stack.push({ node: node.firstChild, tier: tier + 1, parent: flat });
    }
  }

  return flattened;
}

/**
 * Count the nodes below the synthetic tree root.
 */
export function countTreeNodes(tree: RawTreeNode): number {
  let count = 0;
  const stack: RawTreeNode[] = tree.firstChild ? [tree.firstChild] : [];

  for (let node = stack.pop(); node; node = stack.pop()) {
    count++;
    if (node.nextSibling) stack.push(node.nextSibling);
    if (node.firstChild) stack.push(node.firstChild);
  }

  return count;
}

function signTier(tier: number, direction: DependencyDirection): number {
  // Avoid emitting -0 for the root object
  return direction === 'dependencies' && tier !== 0 ? -tier : tier;
}
