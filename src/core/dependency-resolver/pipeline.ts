/**
 * Dependency resolution pipeline
 *
 * Per root object: validate identity -> resolve server context -> discover ->
 * flatten -> enrich each node -> resolve precedence. Root-level failures are
 * reported per root so a batch can partially succeed; node-level resolution
 * failures only drop the affected node.
 */

import { DbDepsError } from '../../types/index.js';
import {
  ContextResolutionError,
  DiscoveryError,
  InvalidInputError,
  ResolutionError,
  describeError
} from '../../utils/errors.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import { logger } from '../../utils/logger.js';
import { RESOLUTION_DEFAULTS } from '../../constants/index.js';
import { Urn, type ObjectIdentity } from '../urn.js';
import { requestDiscovery, type DiscoveryResult } from './discovery.js';
import { flattenDependencyTree } from './flatten.js';
import { enrichAll } from './enrich.js';
import { resolvePrecedence } from './precedence.js';
import type {
  FlatNode,
  ResolutionStage,
  ResolveDependenciesOptions,
  RootInput,
  RootResolution,
  ServerContextProvider
} from './types.js';

/**
 * Resolve the ordered dependency records of each root.
 * Results are returned in input order whatever the concurrency.
 */
export async function resolveObjectDependencies(
  roots: readonly RootInput[],
  options: ResolveDependenciesOptions,
  provider: ServerContextProvider
): Promise<RootResolution[]> {
  if (roots.length === 0) {
    throw new InvalidInputError('no root objects supplied');
  }

  const concurrency = options.concurrency ?? RESOLUTION_DEFAULTS.concurrency;
  if (concurrency <= 1) {
    const resolutions: RootResolution[] = [];
    for (const root of roots) {
      resolutions.push(await resolveRoot(root, options, provider));
    }
    return resolutions;
  }

  const { results } = await runWithConcurrency(
    roots.map(root => () => resolveRoot(root, options, provider)),
    concurrency
  );
  return results.map(entry => {
    if (entry.status === 'rejected') {
      throw entry.error;
    }
    return entry.value;
  });
}

/**
 * Run the pipeline for a single root. Never rejects for stage failures;
 * they come back as `{ status: 'failed' }`.
 */
export async function resolveRoot(
  input: RootInput,
  options: ResolveDependenciesOptions,
  provider: ServerContextProvider
): Promise<RootResolution> {
  const {
    allowSystemObjects = RESOLUTION_DEFAULTS.allowSystemObjects,
    direction = RESOLUTION_DEFAULTS.direction,
    includeSelf = RESOLUTION_DEFAULTS.includeSelf,
    includeScript = RESOLUTION_DEFAULTS.includeScript,
    batchTerminator = RESOLUTION_DEFAULTS.batchTerminator,
    concurrency = RESOLUTION_DEFAULTS.concurrency,
    scriptingOptions,
    timeoutMs,
    signal
  } = options;

  const root = typeof input === 'string' ? input : input.toString();
  const fail = (stage: ResolutionStage, error: unknown): RootResolution => {
    const wrapped = toStageError(stage, root, error);
    logger.debug(`Resolution of '${root}' failed during ${stage}`, { code: wrapped.code, message: wrapped.message });
    return { status: 'failed', root, stage, error: wrapped };
  };

  let identity: ObjectIdentity;
  try {
    identity = typeof input === 'string' ? Urn.parse(input) : input;
  } catch (error) {
    return fail('validate', error);
  }

  let discovered: DiscoveryResult;
  try {
    discovered = await requestDiscovery([identity], { allowSystemObjects, direction, timeoutMs, signal }, provider);
  } catch (error) {
    return fail(stageOf(error), error);
  }

  let nodes: FlatNode[];
  try {
    nodes = flattenDependencyTree(discovered.tree, direction, { includeSelf });
  } catch (error) {
    return fail('discover', error);
  }

  if (nodes.length === 0) {
    logger.info(`No dependencies detected for ${identity}`);
    return { status: 'empty', root, identity };
  }

  try {
    const { records, failures } = await enrichAll(nodes, discovered.context.catalog, {
      originRoot: identity,
      includeScript,
      scriptingOptions,
      batchTerminator,
      concurrency,
      timeoutMs,
      signal
    });
    logger.debug(`Enriched ${records.length}/${nodes.length} node(s) for ${identity}`);
    return { status: 'resolved', root, identity, records: resolvePrecedence(records), failures };
  } catch (error) {
    return fail('enrich', error);
  }
}

function stageOf(error: unknown): ResolutionStage {
  if (error instanceof ContextResolutionError) return 'context';
  if (error instanceof InvalidInputError) return 'validate';
  return 'discover';
}

function toStageError(stage: ResolutionStage, root: string, error: unknown): DbDepsError {
  if (error instanceof DbDepsError) {
    return error;
  }
  switch (stage) {
    case 'validate':
      return new InvalidInputError(describeError(error), { root });
    case 'context':
      return new ContextResolutionError(root, describeError(error));
    case 'discover':
      return new DiscoveryError([root], error);
    case 'enrich':
      return new ResolutionError(root, error);
  }
}
