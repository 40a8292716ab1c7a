// Repository interfaces
// These define the contracts for persisting snapshots and change logs.

export type {
  SnapshotRepository,
  SaveSnapshotInput,
  SnapshotInfo,
} from './snapshot-repository.js';

export {
  MAX_CHANGE_QUERY_LIMIT,
  type ChangeLogRepository,
  type ChangeLogEntryMeta,
  type ChangeEventFilter,
  type StoredChangeEvent,
} from './change-log-repository.js';

export {
  isTransactional,
  type RepositoryContext,
  type TransactionFn,
  type TransactionalRepositoryContext,
} from './repository-context.js';
