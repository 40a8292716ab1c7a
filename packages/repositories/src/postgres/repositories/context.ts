import type { Database, DatabaseExecutor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgSnapshotRepository } from './snapshot-repository.js';
import { PgChangeLogRepository } from './change-log-repository.js';

function createRepositories(db: DatabaseExecutor): RepositoryContext {
  return {
    snapshots: new PgSnapshotRepository(db),
    changeLog: new PgChangeLogRepository(db),
  };
}

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 * const latest = await repos.snapshots.list();
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return createRepositories(db);
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Snapshot writes and change-log appends made inside `transaction`
 * commit together or not at all.
 *
 * Usage:
 * ```ts
 * const repos = createTransactionalPgRepositoryContext(db);
 * await repos.transaction(async (tx) => {
 *   await tx.snapshots.save({ snapshot });
 *   await tx.changeLog.append(segment);
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly snapshots: PgSnapshotRepository;
  readonly changeLog: PgChangeLogRepository;

  constructor(private db: Database) {
    this.snapshots = new PgSnapshotRepository(db);
    this.changeLog = new PgChangeLogRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   * If the function throws, every write it made is rolled back and the error rethrown.
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return this.db.transaction(async (tx) => fn(createRepositories(tx)));
  }
}
