// Re-export all schema tables
export * from './users.js';
export * from './groups.js';
export * from './resources.js';
export * from './grants.js';
