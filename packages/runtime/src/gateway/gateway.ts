// Access Gateway - the commit boundary for grants and flags
//
// Every mutation of the grant relations or object flags goes through here:
// 1. Opens a transaction and locks the object row
// 2. Re-evaluates the same rule the matching AccessChecker predicate uses
// 3. Mutates, preserving at least one OWNER record per object
// 4. Logs and audits the outcome, committed or refused

import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import {
  CreateGroupInputSchema,
  CreateResourceInputSchema,
  GroupFlagsPatchSchema,
  PrivilegeLevel,
  ResourceFlagsPatchSchema,
  type AccessAuditEntry,
  type AccessOperationType,
  type CreateGroupInput,
  type CreateResourceInput,
  type Grant,
  type GroupFlagsPatch,
  type Group,
  type Id,
  type ObjectType,
  type Principal,
  type Resource,
  type ResourceFlagsPatch,
} from '@custody/protocol';
import type {
  GrantRepository,
  RepositoryContext,
  TransactionalRepositoryContext,
} from '@custody/repositories';
import type { AccessDecision } from '../access/decision.js';
import * as rules from '../access/rules.js';
import { AuthorizationError, IntegrityError, UsageError } from '../errors.js';
import {
  consoleLogger,
  withAccessContext,
  type AccessLogContext,
  type AccessLogger,
} from '../logger.js';
import { createInMemoryAuditStore, type AuditStore } from './audit.js';

export type AccessGatewayConfig = {
  /** Record an audit entry for every action (default true) */
  auditEnabled?: boolean;

  /** Called with each audit entry after it is stored */
  onAudit?: (entry: AccessAuditEntry) => void | Promise<void>;
};

export type AccessGatewayOptions = {
  repos: TransactionalRepositoryContext;

  /** Defaults to an in-memory store */
  auditStore?: AuditStore;

  /** Defaults to consoleLogger */
  logger?: AccessLogger;

  config?: AccessGatewayConfig;

  /** Clock for audit timestamps */
  now?: () => Date;
};

type OperationTarget = {
  operationType: AccessOperationType;
  objectType: ObjectType;
  objectId?: Id;
  subjectId?: Id;
  details?: Record<string, unknown>;
};

function enforce(decision: AccessDecision): void {
  if (!decision.allowed) {
    throw new AuthorizationError(decision.reason, decision.message);
  }
}

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new UsageError(`Invalid ${what}: ${parsed.error.issues.map((i) => i.message).join('; ')}`, {
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

/**
 * AccessGateway - the only writer of grants and flags.
 *
 * @example
 * ```ts
 * const gateway = createAccessGateway({
 *   repos: createTransactionalPgRepositoryContext(db),
 *   auditStore: createInMemoryAuditStore(),
 * });
 *
 * const resource = await gateway.createResource(alice, { title: 'Field notes' });
 * await gateway.shareResourceWithUser(alice, resource.id, bob.id, PrivilegeLevel.VIEW);
 * ```
 */
export class AccessGateway {
  private repos: TransactionalRepositoryContext;
  private auditStore: AuditStore;
  private logger: AccessLogger;
  private config: Required<AccessGatewayConfig>;
  private now: () => Date;

  constructor(options: AccessGatewayOptions) {
    this.repos = options.repos;
    this.auditStore = options.auditStore ?? createInMemoryAuditStore();
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? (() => new Date());
    this.config = {
      auditEnabled: options.config?.auditEnabled ?? true,
      onAudit: options.config?.onAudit ?? (() => {}),
    };
  }

  // --- Lifecycle ---

  /**
   * Create a group with the principal as its sole owner.
   */
  async createGroup(principal: Principal, input: CreateGroupInput): Promise<Group> {
    return this.execute(
      principal,
      { operationType: 'create_group', objectType: 'group' },
      async (tx) => {
        const parsed = parseInput(CreateGroupInputSchema, input, 'group');
        enforce(await rules.createObject(tx, principal));
        if (parsed.id !== undefined && (await tx.groups.lock(parsed.id))) {
          throw new UsageError(`Group already exists: ${parsed.id}`, { field: 'id' });
        }

        const group = await tx.groups.create({ id: parsed.id, name: parsed.name });
        await this.bootstrapOwner(tx.userGroupGrants, principal, group.id);
        return group;
      },
      (group) => ({ objectId: group.id })
    );
  }

  /**
   * Create a resource with the principal as its sole owner.
   */
  async createResource(principal: Principal, input: CreateResourceInput): Promise<Resource> {
    return this.execute(
      principal,
      { operationType: 'create_resource', objectType: 'resource' },
      async (tx) => {
        const parsed = parseInput(CreateResourceInputSchema, input, 'resource');
        enforce(await rules.createObject(tx, principal));
        if (parsed.id !== undefined && (await tx.resources.lock(parsed.id))) {
          throw new UsageError(`Resource already exists: ${parsed.id}`, { field: 'id' });
        }

        const resource = await tx.resources.create({
          id: parsed.id,
          title: parsed.title,
          flags: parsed.flags,
        });
        await this.bootstrapOwner(tx.userResourceGrants, principal, resource.id);
        return resource;
      },
      (resource) => ({ objectId: resource.id })
    );
  }

  /**
   * Delete a group, its memberships and the resource grants it held.
   */
  async deleteGroup(principal: Principal, groupId: Id): Promise<Group> {
    return this.execute(
      principal,
      { operationType: 'delete_group', objectType: 'group', objectId: groupId },
      async (tx) => {
        const group = await this.lockGroup(tx, groupId);
        enforce(await rules.administerGroup(tx, principal, groupId));

        await tx.userGroupGrants.delete({ objectId: groupId });
        await tx.groupResourceGrants.delete({ subjectId: groupId });
        await tx.groups.delete(groupId);
        return group;
      }
    );
  }

  async deleteResource(principal: Principal, resourceId: Id): Promise<Resource> {
    return this.execute(
      principal,
      { operationType: 'delete_resource', objectType: 'resource', objectId: resourceId },
      async (tx) => {
        const resource = await this.lockResource(tx, resourceId);
        enforce(await rules.administerResource(tx, principal, resourceId));

        await tx.userResourceGrants.delete({ objectId: resourceId });
        await tx.groupResourceGrants.delete({ objectId: resourceId });
        await tx.resources.delete(resourceId);
        return resource;
      }
    );
  }

  async setGroupFlags(principal: Principal, groupId: Id, patch: GroupFlagsPatch): Promise<Group> {
    return this.execute(
      principal,
      {
        operationType: 'set_group_flags',
        objectType: 'group',
        objectId: groupId,
        details: { patch },
      },
      async (tx) => {
        const flags = parseInput(GroupFlagsPatchSchema, patch, 'group flags');
        await this.lockGroup(tx, groupId);
        enforce(await rules.administerGroup(tx, principal, groupId));

        const updated = await tx.groups.updateFlags(groupId, flags);
        if (!updated) {
          throw new UsageError(`Group not found: ${groupId}`, { field: 'groupId' });
        }
        return updated;
      }
    );
  }

  async setResourceFlags(
    principal: Principal,
    resourceId: Id,
    patch: ResourceFlagsPatch
  ): Promise<Resource> {
    return this.execute(
      principal,
      {
        operationType: 'set_resource_flags',
        objectType: 'resource',
        objectId: resourceId,
        details: { patch },
      },
      async (tx) => {
        const flags = parseInput(ResourceFlagsPatchSchema, patch, 'resource flags');
        await this.lockResource(tx, resourceId);
        enforce(await rules.administerResource(tx, principal, resourceId));

        const updated = await tx.resources.updateFlags(resourceId, flags);
        if (!updated) {
          throw new UsageError(`Resource not found: ${resourceId}`, { field: 'resourceId' });
        }
        return updated;
      }
    );
  }

  // --- Group membership ---

  /**
   * Grant `userId` privilege over the group, as the principal.
   * An owner's or superuser's grant removes weaker grants to the same user.
   */
  async shareGroupWithUser(
    principal: Principal,
    groupId: Id,
    userId: Id,
    level: number
  ): Promise<Grant> {
    return this.execute(
      principal,
      {
        operationType: 'share_group_with_user',
        objectType: 'group',
        objectId: groupId,
        subjectId: userId,
        details: { privilege: level },
      },
      async (tx, log) => {
        await this.lockGroup(tx, groupId);
        enforce(await rules.shareGroupWithUser(tx, principal, groupId, userId, level));

        const overrides =
          principal.isSuperuser || (await rules.ownsGroup(tx, principal, groupId)).allowed;
        return this.upsertShare(
          tx.userGroupGrants,
          principal,
          groupId,
          userId,
          level,
          overrides,
          log
        );
      }
    );
  }

  /**
   * Remove every grant `userId` holds over the group, whoever made it.
   */
  async unshareGroupWithUser(principal: Principal, groupId: Id, userId: Id): Promise<Grant[]> {
    return this.execute(
      principal,
      {
        operationType: 'unshare_group_with_user',
        objectType: 'group',
        objectId: groupId,
        subjectId: userId,
      },
      async (tx) => {
        await this.lockGroup(tx, groupId);
        enforce(await rules.unshareGroupWithUser(tx, principal, groupId, userId));
        return tx.userGroupGrants.delete({ subjectId: userId, objectId: groupId });
      },
      (removed) => ({ details: { removed: removed.length } })
    );
  }

  /**
   * Remove the grant the principal made to `userId` over the group.
   */
  async undoShareGroupWithUser(principal: Principal, groupId: Id, userId: Id): Promise<Grant> {
    return this.undoShareGroupWithUserAs(principal, groupId, userId, principal.id);
  }

  /**
   * Remove the grant `grantorId` made to `userId` over the group.
   * Naming another grantor requires ownership or superuser.
   */
  async undoShareGroupWithUserAs(
    principal: Principal,
    groupId: Id,
    userId: Id,
    grantorId: Id
  ): Promise<Grant> {
    return this.execute(
      principal,
      {
        operationType: 'undo_share_group_with_user',
        objectType: 'group',
        objectId: groupId,
        subjectId: userId,
        details: { grantorId },
      },
      async (tx) => {
        await this.lockGroup(tx, groupId);
        enforce(await rules.undoShareGroupWithUser(tx, principal, groupId, userId, grantorId));
        const [removed] = await tx.userGroupGrants.delete({
          subjectId: userId,
          objectId: groupId,
          grantorId,
        });
        return removed;
      }
    );
  }

  // --- Resource sharing with users ---

  async shareResourceWithUser(
    principal: Principal,
    resourceId: Id,
    userId: Id,
    level: number
  ): Promise<Grant> {
    return this.execute(
      principal,
      {
        operationType: 'share_resource_with_user',
        objectType: 'resource',
        objectId: resourceId,
        subjectId: userId,
        details: { privilege: level },
      },
      async (tx, log) => {
        await this.lockResource(tx, resourceId);
        enforce(await rules.shareResourceWithUser(tx, principal, resourceId, userId, level));

        const overrides =
          principal.isSuperuser || (await rules.ownsResource(tx, principal, resourceId)).allowed;
        return this.upsertShare(
          tx.userResourceGrants,
          principal,
          resourceId,
          userId,
          level,
          overrides,
          log
        );
      }
    );
  }

  async unshareResourceWithUser(
    principal: Principal,
    resourceId: Id,
    userId: Id
  ): Promise<Grant[]> {
    return this.execute(
      principal,
      {
        operationType: 'unshare_resource_with_user',
        objectType: 'resource',
        objectId: resourceId,
        subjectId: userId,
      },
      async (tx) => {
        await this.lockResource(tx, resourceId);
        enforce(await rules.unshareResourceWithUser(tx, principal, resourceId, userId));
        return tx.userResourceGrants.delete({ subjectId: userId, objectId: resourceId });
      },
      (removed) => ({ details: { removed: removed.length } })
    );
  }

  async undoShareResourceWithUser(
    principal: Principal,
    resourceId: Id,
    userId: Id
  ): Promise<Grant> {
    return this.undoShareResourceWithUserAs(principal, resourceId, userId, principal.id);
  }

  async undoShareResourceWithUserAs(
    principal: Principal,
    resourceId: Id,
    userId: Id,
    grantorId: Id
  ): Promise<Grant> {
    return this.execute(
      principal,
      {
        operationType: 'undo_share_resource_with_user',
        objectType: 'resource',
        objectId: resourceId,
        subjectId: userId,
        details: { grantorId },
      },
      async (tx) => {
        await this.lockResource(tx, resourceId);
        enforce(
          await rules.undoShareResourceWithUser(tx, principal, resourceId, userId, grantorId)
        );
        const [removed] = await tx.userResourceGrants.delete({
          subjectId: userId,
          objectId: resourceId,
          grantorId,
        });
        return removed;
      }
    );
  }

  // --- Resource sharing with groups ---

  /**
   * Grant every active member of `groupId` privilege over the resource.
   * Groups never receive OWNER.
   */
  async shareResourceWithGroup(
    principal: Principal,
    resourceId: Id,
    groupId: Id,
    level: number
  ): Promise<Grant> {
    return this.execute(
      principal,
      {
        operationType: 'share_resource_with_group',
        objectType: 'resource',
        objectId: resourceId,
        subjectId: groupId,
        details: { privilege: level },
      },
      async (tx, log) => {
        await this.lockResource(tx, resourceId);
        enforce(await rules.shareResourceWithGroup(tx, principal, resourceId, groupId, level));

        const overrides =
          principal.isSuperuser || (await rules.ownsResource(tx, principal, resourceId)).allowed;
        return this.upsertShare(
          tx.groupResourceGrants,
          principal,
          resourceId,
          groupId,
          level,
          overrides,
          log
        );
      }
    );
  }

  async unshareResourceWithGroup(
    principal: Principal,
    resourceId: Id,
    groupId: Id
  ): Promise<Grant[]> {
    return this.execute(
      principal,
      {
        operationType: 'unshare_resource_with_group',
        objectType: 'resource',
        objectId: resourceId,
        subjectId: groupId,
      },
      async (tx) => {
        await this.lockResource(tx, resourceId);
        enforce(await rules.unshareResourceWithGroup(tx, principal, resourceId, groupId));
        return tx.groupResourceGrants.delete({ subjectId: groupId, objectId: resourceId });
      },
      (removed) => ({ details: { removed: removed.length } })
    );
  }

  async undoShareResourceWithGroup(
    principal: Principal,
    resourceId: Id,
    groupId: Id
  ): Promise<Grant> {
    return this.undoShareResourceWithGroupAs(principal, resourceId, groupId, principal.id);
  }

  async undoShareResourceWithGroupAs(
    principal: Principal,
    resourceId: Id,
    groupId: Id,
    grantorId: Id
  ): Promise<Grant> {
    return this.execute(
      principal,
      {
        operationType: 'undo_share_resource_with_group',
        objectType: 'resource',
        objectId: resourceId,
        subjectId: groupId,
        details: { grantorId },
      },
      async (tx) => {
        await this.lockResource(tx, resourceId);
        enforce(
          await rules.undoShareResourceWithGroup(tx, principal, resourceId, groupId, grantorId)
        );
        const [removed] = await tx.groupResourceGrants.delete({
          subjectId: groupId,
          objectId: resourceId,
          grantorId,
        });
        return removed;
      }
    );
  }

  // --- Internals ---

  private async bootstrapOwner(repo: GrantRepository, principal: Principal, objectId: Id) {
    await repo.upsert({
      subjectId: principal.id,
      objectId,
      grantorId: principal.id,
      privilege: PrivilegeLevel.OWNER,
    });
  }

  /**
   * Upsert the principal's grant, then let an owner's grant supersede every
   * weaker grant the subject holds from other grantors.
   */
  private async upsertShare(
    repo: GrantRepository,
    principal: Principal,
    objectId: Id,
    subjectId: Id,
    level: number,
    overrides: boolean,
    log: AccessLogger
  ): Promise<Grant> {
    const privilege = rules.requireGrantable(level);
    const { grant } = await repo.upsert({
      subjectId,
      objectId,
      grantorId: principal.id,
      privilege,
    });

    if (overrides) {
      const superseded = await repo.delete({ subjectId, objectId, weakerThan: privilege });
      if (superseded.length > 0) {
        log.debug('Superseded weaker grants', {
          relation: repo.relation,
          grantIds: superseded.map((g) => g.id),
        });
      }
    }
    return grant;
  }

  private async lockGroup(tx: RepositoryContext, groupId: Id): Promise<Group> {
    const group = await tx.groups.lock(groupId);
    if (!group) {
      throw new UsageError(`Group not found: ${groupId}`, { field: 'groupId' });
    }
    return group;
  }

  private async lockResource(tx: RepositoryContext, resourceId: Id): Promise<Resource> {
    const resource = await tx.resources.lock(resourceId);
    if (!resource) {
      throw new UsageError(`Resource not found: ${resourceId}`, { field: 'resourceId' });
    }
    return resource;
  }

  /**
   * Run one action in its own transaction, then log and audit the outcome.
   * Errors are rethrown after auditing; the transaction has already rolled back.
   */
  private async execute<T>(
    principal: Principal,
    target: OperationTarget,
    work: (tx: RepositoryContext, log: AccessLogger) => Promise<T>,
    summarize?: (result: T) => { objectId?: Id; details?: Record<string, unknown> }
  ): Promise<T> {
    const startTime = Date.now();
    const entry: AccessAuditEntry = {
      id: randomUUID(),
      timestamp: this.now().toISOString(),
      actorId: principal.id,
      operationType: target.operationType,
      objectType: target.objectType,
      objectId: target.objectId,
      subjectId: target.subjectId,
      details: { ...target.details },
      success: false,
    };
    const context: AccessLogContext = {
      operation: target.operationType,
      actorId: principal.id,
      objectType: target.objectType,
      objectId: target.objectId,
      subjectId: target.subjectId,
    };

    const log = withAccessContext(this.logger, context);

    try {
      const result = await this.repos.transaction((tx) => work(tx, log));
      const summary = summarize?.(result);

      entry.success = true;
      entry.objectId = summary?.objectId ?? entry.objectId;
      entry.details = {
        ...entry.details,
        ...summary?.details,
        durationMs: Date.now() - startTime,
      };

      log.info('Access mutation committed', { objectId: entry.objectId });
      await this.record(entry);
      return result;
    } catch (error) {
      entry.success = false;
      entry.error = error instanceof Error ? error.message : String(error);
      entry.details = {
        ...entry.details,
        durationMs: Date.now() - startTime,
        errorType: error instanceof Error ? error.name : 'UnknownError',
      };

      if (error instanceof AuthorizationError) {
        entry.details.reason = error.reason;
        log.warn('Access denied', { reason: error.reason, message: error.message });
      } else if (error instanceof UsageError) {
        log.warn('Invalid access call', { message: error.message });
      } else if (error instanceof IntegrityError) {
        log.error('Access invariant violated', { message: error.message });
      } else {
        log.error('Access mutation failed', { error: entry.error });
      }

      await this.record(entry);
      throw error;
    }
  }

  private async record(entry: AccessAuditEntry): Promise<void> {
    if (!this.config.auditEnabled) return;
    await this.auditStore.append(entry);
    await this.config.onAudit(entry);
  }
}

/**
 * Create an access gateway instance.
 */
export function createAccessGateway(options: AccessGatewayOptions): AccessGateway {
  return new AccessGateway(options);
}
