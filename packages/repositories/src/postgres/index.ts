// Postgres implementation of the repository interfaces (drizzle-orm over postgres-js)

export * from './schema/index.js';
export { createDatabase, type Database } from './db.js';
export { loadDatabaseConfig, type DatabaseConfig } from './config.js';
export * from './repositories/index.js';
