// Access Gateway - The Commit Boundary
//
// The gateway is the ONLY writer of grants and object flags.
// Every action re-checks its rule inside a transaction, then audits the outcome.

export {
  AccessGateway,
  createAccessGateway,
  type AccessGatewayConfig,
  type AccessGatewayOptions,
} from './gateway.js';

export {
  // Audit store interface and implementation
  createInMemoryAuditStore,
  type AuditStore,
  type AuditQueryOptions,
  type AuditQueryFilter,
} from './audit.js';
