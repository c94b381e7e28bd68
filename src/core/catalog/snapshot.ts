/**
 * Catalog snapshot
 *
 * In-process implementation of the discovery, catalog and server-context
 * ports, backed by a YAML description of one server's objects and the
 * dependency edges between them:
 *
 *   server: sql01
 *   objects:
 *     - urn: "Server[@Name='sql01']/Database[@Name='shop']/Table[@Name='Orders' and @Schema='dbo']"
 *       owner: dbo
 *       script: CREATE TABLE ...
 *   dependencies:
 *     - from: <dependent urn>
 *       to: <urn it depends on>
 *       schemaBound: true
 */

import * as yaml from 'js-yaml';
import type { DependencyDirection, ScriptingOptions } from '../../types/index.js';
import { ConfigError, ContextResolutionError, describeError } from '../../utils/errors.js';
import { readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { isRecord } from '../../utils/type-guards.js';
import { Urn, type ObjectIdentity } from '../urn.js';
import type {
  CatalogResolver,
  DiscoveryService,
  ObjectDescription,
  RawTreeNode,
  ServerContext,
  ServerContextProvider
} from '../dependency-resolver/types.js';

export interface SnapshotObject {
  urn: Urn;
  owner: string;
  isSystemObject: boolean;
  isSchemaBound: boolean;
  script?: string;
}

export interface SnapshotEdge {
  from: Urn;
  to: Urn;
  schemaBound: boolean;
}

interface TreeBuildNode {
  identity?: ObjectIdentity;
  isSchemaBound: boolean;
  firstChild?: TreeBuildNode;
  nextSibling?: TreeBuildNode;
}

export class CatalogSnapshot implements DiscoveryService, CatalogResolver, ServerContextProvider {
  readonly serverName: string;
  private readonly objects = new Map<string, SnapshotObject>();
  /** key of the depended-on object -> edges to its dependents */
  private readonly dependents = new Map<string, SnapshotEdge[]>();
  /** key of the dependent object -> edges to what it depends on */
  private readonly dependencies = new Map<string, SnapshotEdge[]>();

  constructor(serverName: string, objects: readonly SnapshotObject[], edges: readonly SnapshotEdge[]) {
    this.serverName = serverName;

    for (const object of objects) {
      if (this.objects.has(object.urn.key)) {
        throw new ConfigError(`Duplicate catalog object: ${object.urn}`);
      }
      this.objects.set(object.urn.key, object);
    }

    for (const edge of edges) {
      for (const end of [edge.from, edge.to]) {
        if (!this.objects.has(end.key)) {
          throw new ConfigError(`Dependency references an unknown object: ${end}`);
        }
      }
      appendTo(this.dependents, edge.to.key, edge);
      appendTo(this.dependencies, edge.from.key, edge);
    }
  }

  get size(): number {
    return this.objects.size;
  }

  async resolveContext(identity: ObjectIdentity): Promise<ServerContext> {
    const urn = Urn.tryParse(identity.toString());
    const server = urn?.serverName;
    if (!server) {
      throw new ContextResolutionError(identity.toString(), 'the identity names no owning server');
    }
    if (server !== this.serverName) {
      throw new ContextResolutionError(identity.toString(), `no catalog is loaded for server '${server}'`);
    }
    return { serverName: this.serverName, discovery: this, catalog: this };
  }

  async resolve(identity: ObjectIdentity): Promise<ObjectDescription> {
    const object = this.lookup(identity);
    return {
      kind: object.urn.kind,
      owner: object.owner,
      isSchemaBound: object.isSchemaBound,
      name: object.urn.name
    };
  }

  async script(identity: ObjectIdentity, options?: ScriptingOptions): Promise<string> {
    const object = this.lookup(identity);
    if (options && Object.keys(options).length > 0) {
      logger.debug(`Catalog snapshot scripts are stored verbatim; ignoring scripting options for ${identity}`, options);
    }
    return object.script ?? '';
  }

  /**
   * Build the first-child/next-sibling tree under a synthetic root.
   * Children follow declaration order; an object already on the current
   * path is not entered again.
   */
  async discover(
    roots: readonly ObjectIdentity[],
    allowSystemObjects: boolean,
    direction: DependencyDirection
  ): Promise<RawTreeNode> {
    const edgeIndex = direction === 'dependents' ? this.dependents : this.dependencies;
    const synthetic: TreeBuildNode = { isSchemaBound: false };
    const work: Array<{ node: TreeBuildNode; object: SnapshotObject; path: ReadonlySet<string> }> = [];

    let previousRoot: TreeBuildNode | undefined;
    for (const root of roots) {
      const object = this.lookup(root);
      const node: TreeBuildNode = { identity: object.urn, isSchemaBound: false };
      if (previousRoot) previousRoot.nextSibling = node;
      else synthetic.firstChild = node;
      previousRoot = node;
      work.push({ node, object, path: new Set([object.urn.key]) });
    }

    for (let item = work.pop(); item; item = work.pop()) {
      const { node, object, path } = item;
      let previous: TreeBuildNode | undefined;

      for (const edge of edgeIndex.get(object.urn.key) ?? []) {
        const next = direction === 'dependents' ? edge.from : edge.to;
        const nextObject = this.lookup(next);

        if (path.has(next.key)) {
          logger.warn(`Circular dependency cut at ${next} (reached from ${object.urn})`);
          continue;
        }
        if (nextObject.isSystemObject && !allowSystemObjects) {
          continue;
        }

        const child: TreeBuildNode = { identity: nextObject.urn, isSchemaBound: edge.schemaBound };
        if (previous) previous.nextSibling = child;
        else node.firstChild = child;
        previous = child;

        work.push({ node: child, object: nextObject, path: new Set([...path, next.key]) });
      }
    }

    return synthetic;
  }

  private lookup(identity: ObjectIdentity): SnapshotObject {
    const object = this.objects.get(identity.key) ?? this.objects.get(Urn.tryParse(identity.toString())?.key ?? '');
    if (!object) {
      throw new Error(`Object not found in catalog: ${identity}`);
    }
    return object;
  }
}

/**
 * Parse a YAML snapshot document
 */
export function parseCatalogSnapshot(content: string, source: string = '<inline>'): CatalogSnapshot {
  let doc: unknown;
  try {
    doc = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`${source}: invalid YAML: ${describeError(error)}`);
  }

  if (!isRecord(doc)) {
    throw new ConfigError(`${source}: catalog snapshot must be a mapping`);
  }
  const { server, objects: objectEntries, dependencies: edgeEntries = [] } = doc;
  if (typeof server !== 'string' || !server) {
    throw new ConfigError(`${source}: 'server' must name the server the snapshot describes`);
  }
  if (!Array.isArray(objectEntries)) {
    throw new ConfigError(`${source}: 'objects' must be a list`);
  }
  if (!Array.isArray(edgeEntries)) {
    throw new ConfigError(`${source}: 'dependencies' must be a list`);
  }

  const objects = objectEntries.map((entry: unknown, index: number) => parseObject(entry, `${source}: objects[${index}]`));
  const edges = edgeEntries.map((entry: unknown, index: number) => parseEdge(entry, `${source}: dependencies[${index}]`));

  return new CatalogSnapshot(server, objects, edges);
}

/**
 * Read and parse a YAML snapshot file
 */
export async function loadCatalogSnapshot(path: string): Promise<CatalogSnapshot> {
  const content = await readTextFile(path);
  const snapshot = parseCatalogSnapshot(content, path);
  logger.debug(`Loaded catalog snapshot for ${snapshot.serverName} (${snapshot.size} objects) from ${path}`);
  return snapshot;
}

function parseObject(entry: unknown, where: string): SnapshotObject {
  if (!isRecord(entry)) {
    throw new ConfigError(`${where}: must be a mapping`);
  }
  const urn = parseUrnField(entry.urn, `${where}.urn`);

  const { owner = 'dbo', script } = entry;
  if (typeof owner !== 'string') {
    throw new ConfigError(`${where}.owner: must be a string`);
  }
  if (script !== undefined && typeof script !== 'string') {
    throw new ConfigError(`${where}.script: must be a string`);
  }

  return {
    urn,
    owner,
    isSystemObject: readFlag(entry.system, `${where}.system`),
    isSchemaBound: readFlag(entry.schemaBound, `${where}.schemaBound`),
    ...(typeof script === 'string' ? { script } : {})
  };
}

function parseEdge(entry: unknown, where: string): SnapshotEdge {
  if (!isRecord(entry)) {
    throw new ConfigError(`${where}: must be a mapping`);
  }
  return {
    from: parseUrnField(entry.from, `${where}.from`),
    to: parseUrnField(entry.to, `${where}.to`),
    schemaBound: readFlag(entry.schemaBound, `${where}.schemaBound`)
  };
}

function parseUrnField(value: unknown, where: string): Urn {
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}: must be a URN string`);
  }
  try {
    return Urn.parse(value);
  } catch (error) {
    throw new ConfigError(`${where}: ${describeError(error)}`);
  }
}

function readFlag(value: unknown, where: string): boolean {
  if (value === undefined) return false;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${where}: must be true or false`);
  }
  return value;
}

function appendTo(index: Map<string, SnapshotEdge[]>, key: string, edge: SnapshotEdge): void {
  const list = index.get(key);
  if (list) list.push(edge);
  else index.set(key, [edge]);
}
