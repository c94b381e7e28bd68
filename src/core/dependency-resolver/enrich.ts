import type { ScriptingOptions } from '../../types/index.js';
import { DEFAULT_BATCH_TERMINATOR } from '../../constants/index.js';
import { ResolutionError } from '../../utils/errors.js';
import { callWithDeadline } from '../../utils/deadline.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import { logger } from '../../utils/logger.js';
import type { ObjectIdentity } from '../urn.js';
import type {
  CatalogResolver,
  DependencyRecord,
  FlatNode,
  NodeFailure,
  ObjectDescription
} from './types.js';

export interface EnrichOptions {
  originRoot: ObjectIdentity;
  includeScript?: boolean;
  scriptingOptions?: ScriptingOptions;
  batchTerminator?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface EnrichAllOptions extends EnrichOptions {
  concurrency?: number;
}

export interface EnrichAllResult {
  records: DependencyRecord[];
  failures: NodeFailure[];
}

// Both are session defaults; left in, they break batch splitting downstream
const SESSION_SETTING_PATTERN = /\bSET\s+(?:ANSI_NULLS|QUOTED_IDENTIFIER)\s+ON\b[ \t]*;?/gi;

/**
 * Strip the ANSI_NULLS / QUOTED_IDENTIFIER toggles and terminate the batch.
 * Idempotent: a script already ending in the terminator is not terminated twice.
 */
export function normalizeScript(script: string, batchTerminator: string = DEFAULT_BATCH_TERMINATOR): string {
  const terminator = batchTerminator.trim() || DEFAULT_BATCH_TERMINATOR;
  const lines = script.replace(SESSION_SETTING_PATTERN, '').split(/\r?\n/);

  while (lines.length > 0 && lines[0].trim() === '') {
    lines.shift();
  }

  const body = lines.join('\n').trimEnd();
  if (!body) {
    return terminator;
  }

  const lastLine = body.slice(body.lastIndexOf('\n') + 1).trim();
  if (lastLine.toLowerCase() === terminator.toLowerCase()) {
    return body;
  }

  return `${body}\n${terminator}`;
}

/**
 * Build the DependencyRecord for one flattened node.
 * Any resolver failure surfaces as a ResolutionError naming the identity.
 */
export async function enrichNode(
  node: FlatNode,
  resolver: CatalogResolver,
  options: EnrichOptions
): Promise<DependencyRecord> {
  const { includeScript = true, scriptingOptions, batchTerminator, timeoutMs, signal } = options;

  const described = await describe(node.identity, resolver, { timeoutMs, signal });
  const parent = node.structuralParent
    ? await describe(node.structuralParent.identity, resolver, { timeoutMs, signal })
    : null;

  let script: string | undefined;
  if (includeScript) {
    try {
      const raw = await callWithDeadline(
        callSignal => resolver.script(node.identity, scriptingOptions, callSignal),
        { timeoutMs, signal }
      );
      script = normalizeScript(raw, batchTerminator);
    } catch (error) {
      throw new ResolutionError(node.identity.toString(), error);
    }
  }

  return {
    dependentIdentity: node.identity,
    dependentName: described.name,
    dependentKind: described.kind,
    owner: described.owner,
    isSchemaBound: node.isSchemaBound || described.isSchemaBound,
    parentIdentity: node.structuralParent?.identity ?? null,
    parentKind: parent?.kind ?? null,
    tier: node.tier,
    ...(script !== undefined ? { script } : {}),
    originRootIdentity: options.originRoot
  };
}

/**
 * Enrich every node. ResolutionErrors are isolated per node; anything else
 * aborts the batch. Records keep the order of `nodes`.
 */
export async function enrichAll(
  nodes: readonly FlatNode[],
  resolver: CatalogResolver,
  options: EnrichAllOptions
): Promise<EnrichAllResult> {
  const { concurrency = 1, ...nodeOptions } = options;
  const tasks = nodes.map(node => () => enrichNode(node, resolver, nodeOptions));
  const { results } = await runWithConcurrency(tasks, concurrency);

  const records: DependencyRecord[] = [];
  const failures: NodeFailure[] = [];

  for (let i = 0; i < results.length; i++) {
    const entry = results[i];
    if (entry.status === 'fulfilled') {
      records.push(entry.value);
      continue;
    }
    if (!(entry.error instanceof ResolutionError)) {
      throw entry.error;
    }
    logger.warn(`Skipping ${nodes[i].identity}: ${entry.error.message}`);
    failures.push({ identity: nodes[i].identity, tier: nodes[i].tier, error: entry.error });
  }

  return { records, failures };
}

async function describe(
  identity: ObjectIdentity,
  resolver: CatalogResolver,
  deadline: { timeoutMs?: number; signal?: AbortSignal }
): Promise<ObjectDescription> {
  try {
    return await callWithDeadline(callSignal => resolver.resolve(identity, callSignal), deadline);
  } catch (error) {
    throw new ResolutionError(identity.toString(), error);
  }
}
