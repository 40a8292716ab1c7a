import type { SnapshotRepository } from './snapshot-repository.js';
import type { ChangeLogRepository } from './change-log-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * Pass a RepositoryContext to code that persists snapshots or change logs,
 * and swap implementations (Postgres, in-memory) without changing it.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * await commitSnapshot(repos, snapshot, { summary });
 * ```
 */
export interface RepositoryContext {
  readonly snapshots: SnapshotRepository;
  readonly changeLog: ChangeLogRepository;
}

/**
 * Function run inside a transaction with transaction-scoped repositories.
 */
export type TransactionFn<T> = (
  repos: RepositoryContext
) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a database transaction.
   * All repository operations within the function will be atomic.
   *
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}

export function isTransactional(
  repos: RepositoryContext
): repos is TransactionalRepositoryContext {
  return 'transaction' in repos && typeof repos.transaction === 'function';
}
