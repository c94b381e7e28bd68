import type { DependencyDirection } from '../../types/index.js';
import {
  ContextResolutionError,
  DiscoveryError,
  InvalidInputError,
  describeError
} from '../../utils/errors.js';
import { callWithDeadline } from '../../utils/deadline.js';
import { logger } from '../../utils/logger.js';
import type { ObjectIdentity } from '../urn.js';
import type { RawTreeNode, ServerContext, ServerContextProvider } from './types.js';

export interface DiscoveryRequest {
  allowSystemObjects?: boolean;
  direction?: DependencyDirection;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface DiscoveryResult {
  tree: RawTreeNode;
  context: ServerContext;
}

/**
 * Issue one discovery call for `roots`.
 *
 * Every root must belong to the same server and resolve in its catalog
 * (InvalidInputError names the first one that does not). The discovery call
 * itself is not retried; its failure is wrapped in a DiscoveryError.
 */
export async function requestDiscovery(
  roots: readonly ObjectIdentity[],
  request: DiscoveryRequest,
  provider: ServerContextProvider
): Promise<DiscoveryResult> {
  const { allowSystemObjects = false, direction = 'dependents', timeoutMs, signal } = request;

  if (roots.length === 0) {
    throw new InvalidInputError('at least one root object is required');
  }

  const context = await contextOf(roots[0], provider);
  for (const root of roots.slice(1)) {
    const rootContext = await contextOf(root, provider);
    if (rootContext.serverName !== context.serverName) {
      throw new InvalidInputError(
        `'${root}' belongs to server '${rootContext.serverName}', not '${context.serverName}'`,
        { root: root.toString() }
      );
    }
  }

  for (const root of roots) {
    try {
      await callWithDeadline(callSignal => context.catalog.resolve(root, callSignal), { timeoutMs, signal });
    } catch (error) {
      throw new InvalidInputError(`'${root}' cannot be resolved: ${describeError(error)}`, { root: root.toString() });
    }
  }

  logger.debug(`Discovering ${direction} of ${roots.length} object(s) on ${context.serverName}`, {
    roots: roots.map(root => root.toString()),
    allowSystemObjects
  });

  try {
    const tree = await callWithDeadline(
      callSignal => context.discovery.discover(roots, allowSystemObjects, direction, callSignal),
      { timeoutMs, signal }
    );
    return { tree, context };
  } catch (error) {
    throw new DiscoveryError(roots.map(root => root.toString()), error);
  }
}

async function contextOf(root: ObjectIdentity, provider: ServerContextProvider): Promise<ServerContext> {
  try {
    return await provider.resolveContext(root);
  } catch (error) {
    if (error instanceof ContextResolutionError) {
      throw error;
    }
    throw new ContextResolutionError(root.toString(), describeError(error));
  }
}
