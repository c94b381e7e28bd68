import type { DbDepsError, DependencyDirection, ScriptingOptions } from '../../types/index.js';
import type { ObjectIdentity } from '../urn.js';
import type { ResolutionError } from '../../utils/errors.js';

/**
 * Node of the first-child/next-sibling tree returned by the discovery service.
 * The tree root is synthetic (no identity); its first child is the object
 * discovery started from, further siblings being any additional roots.
 */
export interface RawTreeNode {
  readonly identity?: ObjectIdentity;
  /** Whether this node's link to its structural parent is schema-bound */
  readonly isSchemaBound: boolean;
  readonly firstChild?: RawTreeNode;
  readonly nextSibling?: RawTreeNode;
}

/**
 * One visited tree node with its signed tier.
 */
export interface FlatNode {
  readonly identity: ObjectIdentity;
  readonly isSchemaBound: boolean;
  /** Distance from the root object, negated for `dependencies` traversals */
  readonly tier: number;
  /** null when the structural parent is the synthetic tree root */
  readonly structuralParent: FlatNode | null;
}

export interface ObjectDescription {
  kind: string;
  owner: string;
  isSchemaBound: boolean;
  name: string;
}

export interface DependencyRecord {
  readonly dependentIdentity: ObjectIdentity;
  readonly dependentName: string;
  readonly dependentKind: string;
  readonly owner: string;
  readonly isSchemaBound: boolean;
  readonly parentIdentity: ObjectIdentity | null;
  readonly parentKind: string | null;
  readonly tier: number;
  readonly script?: string;
  /** The root object whose discovery produced this record */
  readonly originRootIdentity: ObjectIdentity;
}

// ---------------------------------------------------------------------------
// External capabilities
// ---------------------------------------------------------------------------

export interface DiscoveryService {
  discover(
    roots: readonly ObjectIdentity[],
    allowSystemObjects: boolean,
    direction: DependencyDirection,
    signal?: AbortSignal
  ): Promise<RawTreeNode>;
}

export interface CatalogResolver {
  resolve(identity: ObjectIdentity, signal?: AbortSignal): Promise<ObjectDescription>;
  script(identity: ObjectIdentity, options?: ScriptingOptions, signal?: AbortSignal): Promise<string>;
}

/**
 * The server an identity lives on, with the collaborators bound to it.
 */
export interface ServerContext {
  serverName: string;
  discovery: DiscoveryService;
  catalog: CatalogResolver;
}

export interface ServerContextProvider {
  /** Throws ContextResolutionError when the identity has no traceable server */
  resolveContext(identity: ObjectIdentity): Promise<ServerContext>;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface ResolveDependenciesOptions {
  allowSystemObjects?: boolean;
  direction?: DependencyDirection;
  includeSelf?: boolean;
  includeScript?: boolean;
  scriptingOptions?: ScriptingOptions;
  batchTerminator?: string;
  /** Maximum roots (and enrichments per root) processed at once */
  concurrency?: number;
  /** Deadline for each external call */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type RootInput = string | ObjectIdentity;

export type ResolutionStage = 'validate' | 'context' | 'discover' | 'enrich';

export interface NodeFailure {
  identity: ObjectIdentity;
  tier: number;
  error: ResolutionError;
}

export type RootResolution =
  | {
      status: 'resolved';
      root: string;
      identity: ObjectIdentity;
      records: DependencyRecord[];
      failures: NodeFailure[];
    }
  | {
      status: 'empty';
      root: string;
      identity: ObjectIdentity;
    }
  | {
      status: 'failed';
      root: string;
      stage: ResolutionStage;
      error: DbDepsError;
    };
