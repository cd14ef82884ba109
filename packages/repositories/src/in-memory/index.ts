// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
// - Prototyping callers of the access runtime
//
// Data does not persist between restarts.
//
// Transactions are serialized: each one waits for the previous to settle, and a
// transaction that throws restores every store to the state it started from.

import {
  DEFAULT_GROUP_FLAGS,
  DEFAULT_RESOURCE_FLAGS,
  type Grant,
  type GrantKey,
  type GrantRelation,
  type Group,
  type Id,
  type Resource,
  type User,
} from '@custody/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  UserRepository,
  GroupRepository,
  ResourceRepository,
  GrantRepository,
  GrantFilter,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  users: Map<string, User>;
  groups: Map<string, Group>;
  resources: Map<string, Resource>;
  userGroupGrants: Map<string, Grant>;
  userResourceGrants: Map<string, Grant>;
  groupResourceGrants: Map<string, Grant>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

export type InMemoryRepositoryOptions = {
  /** Clock used for createdAt/updatedAt/grantedAt. Defaults to the system clock. */
  now?: () => Date;
};

/**
 * Check whether a grant satisfies every field set on a filter.
 */
export function matchesGrantFilter(grant: Grant, filter: GrantFilter): boolean {
  if (filter.subjectId !== undefined && grant.subjectId !== filter.subjectId) return false;
  if (filter.subjectIds && !filter.subjectIds.includes(grant.subjectId)) return false;
  if (filter.objectId !== undefined && grant.objectId !== filter.objectId) return false;
  if (filter.objectIds && !filter.objectIds.includes(grant.objectId)) return false;
  if (filter.grantorId !== undefined && grant.grantorId !== filter.grantorId) return false;
  if (filter.privilege !== undefined && grant.privilege !== filter.privilege) return false;
  if (filter.atLeast !== undefined && grant.privilege > filter.atLeast) return false;
  if (filter.weakerThan !== undefined && grant.privilege <= filter.weakerThan) return false;
  if (filter.excludeSubjectId !== undefined && grant.subjectId === filter.excludeSubjectId) {
    return false;
  }
  if (filter.excludeGrantId !== undefined && grant.id === filter.excludeGrantId) return false;
  return true;
}

function grantKeyString(key: GrantKey): string {
  return `${key.subjectId}\u0000${key.objectId}\u0000${key.grantorId}`;
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * const user = await repos.users.create({ username: 'alice' });
 * const group = await repos.groups.create({ name: 'Hydrology' });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.userGroupGrants.size);
 *
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(
  options: InMemoryRepositoryOptions = {}
): InMemoryRepositoryContext {
  const now = options.now ?? (() => new Date());
  const timestamp = () => now().toISOString();

  // Data stores
  const users = new Map<string, User>();
  const groups = new Map<string, Group>();
  const resources = new Map<string, Resource>();
  const userGroupGrants = new Map<string, Grant>();
  const userResourceGrants = new Map<string, Grant>();
  const groupResourceGrants = new Map<string, Grant>();

  const data: InMemoryDataStore = {
    users,
    groups,
    resources,
    userGroupGrants,
    userResourceGrants,
    groupResourceGrants,
  };

  // Monotonic id counters; sizes shrink on delete so they cannot be used.
  const counters = new Map<string, number>();
  const nextId = (prefix: string): Id => {
    const next = (counters.get(prefix) ?? 0) + 1;
    counters.set(prefix, next);
    return `${prefix}-${next}`;
  };

  const pick = <T>(store: Map<string, T>, ids: readonly Id[]): T[] => {
    const result: T[] = [];
    for (const id of new Set(ids)) {
      const item = store.get(id);
      if (item) result.push(item);
    }
    return result;
  };

  // User repository
  const userRepo: UserRepository = {
    async create(input) {
      const id = input.id ?? nextId('user');
      if (users.has(id)) {
        throw new Error(`User already exists: ${id}`);
      }
      const user: User = {
        id,
        username: input.username,
        isActive: input.isActive ?? true,
        isSuperuser: input.isSuperuser ?? false,
        createdAt: timestamp(),
      };
      users.set(id, user);
      return user;
    },
    async get(id) {
      return users.get(id) ?? null;
    },
    async getMany(ids) {
      return pick(users, ids);
    },
    async update(id, input) {
      const existing = users.get(id);
      if (!existing) return null;
      const updated: User = {
        ...existing,
        isActive: input.isActive ?? existing.isActive,
        isSuperuser: input.isSuperuser ?? existing.isSuperuser,
      };
      users.set(id, updated);
      return updated;
    },
  };

  // Group repository
  const groupRepo: GroupRepository = {
    async create(input) {
      const id = input.id ?? nextId('group');
      if (groups.has(id)) {
        throw new Error(`Group already exists: ${id}`);
      }
      const at = timestamp();
      const group: Group = {
        id,
        name: input.name,
        flags: { ...DEFAULT_GROUP_FLAGS, ...input.flags },
        createdAt: at,
        updatedAt: at,
      };
      groups.set(id, group);
      return group;
    },
    async get(id) {
      return groups.get(id) ?? null;
    },
    async getMany(ids) {
      return pick(groups, ids);
    },
    async lock(id) {
      // Transactions are already serialized
      return groups.get(id) ?? null;
    },
    async updateFlags(id, flags) {
      const existing = groups.get(id);
      if (!existing) return null;
      const updated: Group = {
        ...existing,
        flags: { ...existing.flags, ...flags },
        updatedAt: timestamp(),
      };
      groups.set(id, updated);
      return updated;
    },
    async delete(id) {
      return groups.delete(id);
    },
  };

  // Resource repository
  const resourceRepo: ResourceRepository = {
    async create(input) {
      const id = input.id ?? nextId('resource');
      if (resources.has(id)) {
        throw new Error(`Resource already exists: ${id}`);
      }
      const at = timestamp();
      const resource: Resource = {
        id,
        title: input.title,
        flags: { ...DEFAULT_RESOURCE_FLAGS, ...input.flags },
        createdAt: at,
        updatedAt: at,
      };
      resources.set(id, resource);
      return resource;
    },
    async get(id) {
      return resources.get(id) ?? null;
    },
    async getMany(ids) {
      return pick(resources, ids);
    },
    async lock(id) {
      return resources.get(id) ?? null;
    },
    async updateFlags(id, flags) {
      const existing = resources.get(id);
      if (!existing) return null;
      const updated: Resource = {
        ...existing,
        flags: { ...existing.flags, ...flags },
        updatedAt: timestamp(),
      };
      resources.set(id, updated);
      return updated;
    },
    async delete(id) {
      return resources.delete(id);
    },
  };

  // Grant repositories, one per relation
  const createGrantRepo = (relation: GrantRelation, store: Map<string, Grant>): GrantRepository => {
    const findByKey = (key: GrantKey): Grant | undefined => {
      const wanted = grantKeyString(key);
      for (const grant of store.values()) {
        if (grantKeyString(grant) === wanted) return grant;
      }
      return undefined;
    };

    return {
      relation,
      async get(key) {
        return findByKey(key) ?? null;
      },
      async query(filter) {
        return Array.from(store.values()).filter((g) => matchesGrantFilter(g, filter));
      },
      async count(filter) {
        let n = 0;
        for (const grant of store.values()) {
          if (matchesGrantFilter(grant, filter)) n++;
        }
        return n;
      },
      async upsert(input) {
        const existing = findByKey(input);
        if (existing) {
          const updated: Grant = {
            ...existing,
            privilege: input.privilege,
            grantedAt: timestamp(),
          };
          store.set(existing.id, updated);
          return { grant: updated, created: false, previousPrivilege: existing.privilege };
        }
        const grant: Grant = {
          id: nextId('grant'),
          relation,
          subjectId: input.subjectId,
          objectId: input.objectId,
          grantorId: input.grantorId,
          privilege: input.privilege,
          grantedAt: timestamp(),
        };
        store.set(grant.id, grant);
        return { grant, created: true };
      },
      async delete(filter) {
        if (filter.objectId === undefined && filter.subjectId === undefined) {
          throw new Error('Grant deletion requires an objectId or subjectId');
        }
        const removed: Grant[] = [];
        for (const grant of Array.from(store.values())) {
          if (matchesGrantFilter(grant, filter)) {
            store.delete(grant.id);
            removed.push(grant);
          }
        }
        return removed;
      },
    };
  };

  // Build context
  const context: RepositoryContext = {
    users: userRepo,
    groups: groupRepo,
    resources: resourceRepo,
    userGroupGrants: createGrantRepo('user_group', userGroupGrants),
    userResourceGrants: createGrantRepo('user_resource', userResourceGrants),
    groupResourceGrants: createGrantRepo('group_resource', groupResourceGrants),
  };

  const stores: Map<string, unknown>[] = Object.values(data);

  const snapshot = (): Map<string, unknown>[] => stores.map((store) => new Map(store));

  const restore = (saved: Map<string, unknown>[]): void => {
    stores.forEach((store, i) => {
      store.clear();
      for (const [key, value] of saved[i]) {
        store.set(key, value);
      }
    });
  };

  let tail: Promise<unknown> = Promise.resolve();

  return {
    ...context,
    async transaction<T>(fn: TransactionFn<T>): Promise<T> {
      const run = async (): Promise<T> => {
        const saved = snapshot();
        try {
          return await fn(context);
        } catch (error) {
          restore(saved);
          throw error;
        }
      };
      const result = tail.then(run, run);
      // The next transaction waits for this one whether it commits or rolls back
      tail = result.then(
        () => undefined,
        () => undefined
      );
      return result;
    },
    _data: data,
    clear() {
      for (const store of stores) {
        store.clear();
      }
      counters.clear();
    },
  };
}
