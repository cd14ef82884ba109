// Access Audit Store
//
// One entry per attempted gateway action, committed or refused.
// An in-memory store is provided; persistent stores implement AuditStore.

import type { AccessAuditEntry, AccessOperationType, Id, ObjectType } from '@custody/protocol';

export interface AuditStore {
  append(entry: AccessAuditEntry): Promise<void>;

  get(id: Id): Promise<AccessAuditEntry | null>;

  /**
   * Entries touching one group or resource.
   */
  getByObject(
    objectType: ObjectType,
    objectId: Id,
    options?: AuditQueryOptions
  ): Promise<AccessAuditEntry[]>;

  query(filter?: AuditQueryFilter): Promise<AccessAuditEntry[]>;
}

export type AuditQueryOptions = {
  /** Maximum entries to return */
  limit?: number;

  /** Offset for pagination */
  offset?: number;

  /** Start time filter */
  since?: string;

  /** End time filter */
  until?: string;
};

export type AuditQueryFilter = AuditQueryOptions & {
  actorId?: Id;
  objectType?: ObjectType;
  objectId?: Id;
  subjectId?: Id;
  operationType?: AccessOperationType;
  success?: boolean;
};

/**
 * Create an in-memory audit store for testing and development.
 */
export function createInMemoryAuditStore(): AuditStore {
  const entries: AccessAuditEntry[] = [];

  return {
    async append(entry: AccessAuditEntry): Promise<void> {
      entries.push(entry);
    },

    async get(id: Id): Promise<AccessAuditEntry | null> {
      return entries.find((e) => e.id === id) ?? null;
    },

    async getByObject(
      objectType: ObjectType,
      objectId: Id,
      options?: AuditQueryOptions
    ): Promise<AccessAuditEntry[]> {
      return filterAndPaginate(
        entries.filter((e) => e.objectType === objectType && e.objectId === objectId),
        options
      );
    },

    async query(filter?: AuditQueryFilter): Promise<AccessAuditEntry[]> {
      let result = [...entries];

      if (filter?.actorId) {
        result = result.filter((e) => e.actorId === filter.actorId);
      }

      if (filter?.objectType) {
        result = result.filter((e) => e.objectType === filter.objectType);
      }

      if (filter?.objectId) {
        result = result.filter((e) => e.objectId === filter.objectId);
      }

      if (filter?.subjectId) {
        result = result.filter((e) => e.subjectId === filter.subjectId);
      }

      if (filter?.operationType) {
        result = result.filter((e) => e.operationType === filter.operationType);
      }

      if (filter?.success !== undefined) {
        result = result.filter((e) => e.success === filter.success);
      }

      return filterAndPaginate(result, filter);
    },
  };
}

/**
 * Apply time filtering and pagination; most recent first.
 */
function filterAndPaginate(
  entries: AccessAuditEntry[],
  options?: AuditQueryOptions
): AccessAuditEntry[] {
  let result = entries;

  if (options?.since) {
    const since = new Date(options.since);
    result = result.filter((e) => new Date(e.timestamp) >= since);
  }

  if (options?.until) {
    const until = new Date(options.until);
    result = result.filter((e) => new Date(e.timestamp) <= until);
  }

  // Stable sort keeps insertion order among equal timestamps; reverse it so
  // later appends come first
  result = [...result]
    .reverse()
    .sort((a, b) => new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime());

  if (options?.offset) {
    result = result.slice(options.offset);
  }

  if (options?.limit) {
    result = result.slice(0, options.limit);
  }

  return result;
}
