// @custody/repositories
// Storage contracts for users, groups, resources and grants, with in-memory and
// Postgres implementations.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - TransactionalRepositoryContext scopes a mutation's reads and writes together

export * from './interfaces/index.js';
export * from './in-memory/index.js';
export * as postgres from './postgres/index.js';
