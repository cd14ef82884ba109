import type { Database } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgUserRepository } from './user-repository.js';
import { PgGroupRepository } from './group-repository.js';
import { PgResourceRepository } from './resource-repository.js';
import { PgGrantRepository } from './grant-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase(loadDatabaseConfig(process.env));
 * const repos = createPgRepositoryContext(db);
 * const checker = createAccessChecker(repos);
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    users: new PgUserRepository(db),
    groups: new PgGroupRepository(db),
    resources: new PgResourceRepository(db),
    userGroupGrants: new PgGrantRepository(db, 'user_group'),
    userResourceGrants: new PgGrantRepository(db, 'user_resource'),
    groupResourceGrants: new PgGrantRepository(db, 'group_resource'),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const repos = createTransactionalPgRepositoryContext(db);
 * const gateway = createAccessGateway({ repos });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly users: PgUserRepository;
  readonly groups: PgGroupRepository;
  readonly resources: PgResourceRepository;
  readonly userGroupGrants: PgGrantRepository;
  readonly userResourceGrants: PgGrantRepository;
  readonly groupResourceGrants: PgGrantRepository;

  constructor(private db: Database) {
    this.users = new PgUserRepository(db);
    this.groups = new PgGroupRepository(db);
    this.resources = new PgResourceRepository(db);
    this.userGroupGrants = new PgGrantRepository(db, 'user_group');
    this.userResourceGrants = new PgGrantRepository(db, 'user_resource');
    this.groupResourceGrants = new PgGrantRepository(db, 'group_resource');
  }

  /**
   * Execute a function within a database transaction.
   *
   * Row locks taken through `groups.lock` / `resources.lock` are held until
   * the transaction commits or rolls back.
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      // Drizzle's transaction handle exposes the same query surface
      const txDb = tx as unknown as Database;
      return fn(createPgRepositoryContext(txDb));
    });
  }
}
