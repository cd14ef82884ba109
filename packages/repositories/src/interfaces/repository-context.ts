import type { UserRepository } from './user-repository.js';
import type { GroupRepository } from './group-repository.js';
import type { ResourceRepository } from './resource-repository.js';
import type { GrantRepository } from './grant-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the dependency injection point for the runtime: predicates read
 * through it, and the gateway receives a transaction-scoped one for each
 * mutation.
 *
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * const checker = createAccessChecker(repos);
 * ```
 */
export interface RepositoryContext {
  readonly users: UserRepository;
  readonly groups: GroupRepository;
  readonly resources: ResourceRepository;
  readonly userGroupGrants: GrantRepository;
  readonly userResourceGrants: GrantRepository;
  readonly groupResourceGrants: GrantRepository;
}

/**
 * Work to run against transaction-scoped repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a transaction.
   * All repository operations within the function are atomic.
   *
   * @throws Rolls back the transaction and rethrows if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
