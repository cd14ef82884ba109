// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type { UserRepository, CreateUserInput, UpdateUserInput } from './user-repository.js';

export type { GroupRepository, CreateGroupRecordInput } from './group-repository.js';

export type { ResourceRepository, CreateResourceRecordInput } from './resource-repository.js';

export type {
  GrantRepository,
  GrantFilter,
  UpsertGrantInput,
  UpsertGrantResult,
} from './grant-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
