export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
export { PgSnapshotRepository, rowsToSnapshot } from './snapshot-repository.js';
export {
  PgChangeLogRepository,
  changeEventToRow,
  rowToStoredChangeEvent,
} from './change-log-repository.js';
