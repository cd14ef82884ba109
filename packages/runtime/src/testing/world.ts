// In-memory world for runtime tests: repositories, checker, gateway and holdings
// wired together, with a capturing logger and an inspectable audit store.

import type { User } from '@custody/protocol';
import {
  createInMemoryRepositoryContext,
  type CreateUserInput,
  type InMemoryRepositoryContext,
} from '@custody/repositories';
import { createAccessChecker, type AccessChecker } from '../access/checker.js';
import { createHoldings, type Holdings } from '../access/holdings.js';
import { createInMemoryAuditStore, type AuditStore } from '../gateway/audit.js';
import { createAccessGateway, type AccessGateway, type AccessGatewayConfig } from '../gateway/gateway.js';
import { createCapturingLogger, type AccessLogger, type LogEntry } from '../logger.js';

export const TEST_NOW = new Date('2024-01-01T00:00:00Z');

export type TestWorld = {
  repos: InMemoryRepositoryContext;
  checker: AccessChecker;
  gateway: AccessGateway;
  holdings: Holdings;
  auditStore: AuditStore;
  logger: AccessLogger & { entries: LogEntry[] };
  /** Create a user whose id is its username */
  user(username: string, options?: Omit<CreateUserInput, 'id' | 'username'>): Promise<User>;
};

export function createTestWorld(config?: AccessGatewayConfig): TestWorld {
  const repos = createInMemoryRepositoryContext({ now: () => TEST_NOW });
  const auditStore = createInMemoryAuditStore();
  const logger = createCapturingLogger();

  return {
    repos,
    checker: createAccessChecker(repos),
    gateway: createAccessGateway({ repos, auditStore, logger, config, now: () => TEST_NOW }),
    holdings: createHoldings(repos),
    auditStore,
    logger,
    user(username, options) {
      return repos.users.create({ id: username, username, ...options });
    },
  };
}
