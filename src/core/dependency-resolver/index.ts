/**
 * Dependency resolver
 *
 * - types.ts: Tree, record and capability types
 * - discovery.ts: Single discovery request with root validation
 * - flatten.ts: First-child/next-sibling tree to tiered FlatNodes
 * - enrich.ts: FlatNode to DependencyRecord, script normalization
 * - precedence.ts: Deduplication and causal ordering
 * - pipeline.ts: Per-root orchestration of the stages above
 */

// Types
export type {
  RawTreeNode,
  FlatNode,
  ObjectDescription,
  DependencyRecord,
  DiscoveryService,
  CatalogResolver,
  ServerContext,
  ServerContextProvider,
  ResolveDependenciesOptions,
  RootInput,
  ResolutionStage,
  NodeFailure,
  RootResolution
} from './types.js';

export { requestDiscovery, type DiscoveryRequest, type DiscoveryResult } from './discovery.js';
export { flattenDependencyTree, countTreeNodes, type FlattenOptions } from './flatten.js';
export {
  enrichNode,
  enrichAll,
  normalizeScript,
  type EnrichOptions,
  type EnrichAllOptions,
  type EnrichAllResult
} from './enrich.js';
export { resolvePrecedence } from './precedence.js';
export { resolveObjectDependencies, resolveRoot } from './pipeline.js';
