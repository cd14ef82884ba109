// @custody/runtime
// Privilege resolution, authorization rules and the access mutation gateway

// Error types
export {
  AccessControlError,
  AuthorizationError,
  UsageError,
  IntegrityError,
  isAccessControlError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  createCapturingLogger,
  describeAccess,
  withAccessContext,
  type AccessLogContext,
  type AccessLogger,
  type LogEntry,
} from './logger.js';

// Privilege Resolver
export * from './privileges/index.js';

// Authorization Engine
export * from './access/index.js';

// Mutation Engine
export * from './gateway/index.js';
