// @corpledger/engine
// Snapshot building, change detection and commit

// Normalization (raw rows → canonical attributes)
export {
  normalizeRecord,
  readIdentifier,
  mappedColumns,
  coerceValue,
  coerceString,
  coerceNumber,
  coerceDate,
  isBlank,
  type NormalizeContext,
  type NormalizedRecord,
  type CoercionResult,
} from './normalize/index.js';

// Deduplication
export {
  deduplicate,
  comparePrecedence,
  type DedupCandidate,
  type DeduplicateOptions,
  type DeduplicateResult,
} from './dedupe/index.js';

// Canonical set builder
export {
  buildSnapshot,
  createSnapshot,
  assertTimestamp,
  summarizeSnapshot,
  type BuildSnapshotOptions,
  type BuildSnapshotResult,
} from './build/index.js';

// Diffing
export {
  detectChanges,
  detectChangesAcross,
  classifyChange,
  diffAttributes,
  valuesEqual,
  summarizeChanges,
  type Classification,
  type FieldDelta,
} from './diff/index.js';

// Persistence
export {
  commitSnapshot,
  type CommitSnapshotOptions,
  type CommitSnapshotResult,
} from './commit/index.js';

// Config
export { loadReconcileConfig, createSourceBatches, buildOptionsFromConfig } from './config.js';

// Error types
export {
  EngineError,
  ValidationError,
  ConfigurationError,
  EmptyBatchError,
  InvalidSnapshotOrdering,
  DuplicateIdentifierConflict,
  SnapshotExistsError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type EngineLogger,
  type LogEntry,
} from './logging.js';
