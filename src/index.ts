export { loadConfig, parseConfig, resolveResultPath, resolveTargets } from './config/config.js';
export type { CompareConfig, DbKey } from './config/config.js';
export { compareColumnAttributes } from './core/columnComparator.js';
export { compareSnapshots, isIdentical, SchemaComparator } from './core/comparator.js';
export { ConfigError, ConnectionError, StructuralError } from './core/errors.js';
export type { StructuralInvariant } from './core/errors.js';
export { Orchestrator } from './core/orchestrator.js';
export type { RunOutcome, SnapshotSide } from './core/orchestrator.js';
export {
  createSnapshot,
  normalizeIdentifier,
  parseSnapshot,
  serializeSnapshot,
  validateSnapshot,
} from './core/snapshot.js';
export type { SerializedSnapshot } from './core/snapshot.js';
export { EngineFactory } from './engines/factory.js';
export type { EngineProvider } from './engines/factory.js';
export type { IDbConnection, IMetadataInspector, QueryRow } from './engines/interfaces.js';
export type * from './types/comparison.js';
export type * from './types/index.js';
export { formatColumnType, SchemaExporter, toReportRows } from './utils/exporter.js';
