/**
 * Library entry point
 *
 * Everything the CLI uses is reachable from here, so the resolver can be
 * driven by another catalog source (a live server connection, a test fake)
 * through the port interfaces in dependency-resolver/types.ts.
 */

export * from './dependency-resolver/index.js';
export { Urn, type ObjectIdentity, type UrnSegment } from './urn.js';
export {
  CatalogSnapshot,
  parseCatalogSnapshot,
  loadCatalogSnapshot,
  type SnapshotObject,
  type SnapshotEdge
} from './catalog/snapshot.js';
export { ConfigManager, validateConfig } from './config.js';
export {
  renderResolutions,
  renderTable,
  renderJson,
  renderYaml,
  renderScript,
  toRecordView,
  toResolutionView,
  type RecordView,
  type ResolutionView,
  type RenderOptions
} from './render/records.js';
export { renderFlatTree } from './render/tree.js';
export { consoleOutput, type OutputPort, type UnifiedSpinner } from './ports/index.js';

export {
  InvalidInputError,
  ContextResolutionError,
  DiscoveryError,
  ResolutionError,
  ValidationError,
  ConfigError,
  FileSystemError
} from '../utils/errors.js';
export { CallTimeoutError, callWithDeadline } from '../utils/deadline.js';
export {
  DbDepsError,
  ErrorCodes,
  type DbDepsConfig,
  type DependencyDirection,
  type OutputFormat,
  type ScriptingOptions
} from '../types/index.js';
