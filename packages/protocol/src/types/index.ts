// Re-export all protocol types

export * from './common.js';
export * from './privileges.js';
export * from './principals.js';
export * from './grants.js';
export * from './audit.js';
