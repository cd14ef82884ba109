export { PgUserRepository } from './user-repository.js';
export { PgGroupRepository } from './group-repository.js';
export { PgResourceRepository } from './resource-repository.js';
export { PgGrantRepository } from './grant-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
