import { describe, it, expect, beforeEach } from 'vitest';
import type { AccessAuditEntry } from '@custody/protocol';
import { createInMemoryAuditStore, type AuditStore } from './audit.js';

function entry(id: string, timestamp: string, overrides: Partial<AccessAuditEntry> = {}): AccessAuditEntry {
  return {
    id,
    timestamp,
    actorId: 'alice',
    operationType: 'share_resource_with_user',
    objectType: 'resource',
    objectId: 'r1',
    subjectId: 'bob',
    details: {},
    success: true,
    ...overrides,
  };
}

describe('createInMemoryAuditStore', () => {
  let store: AuditStore;

  beforeEach(async () => {
    store = createInMemoryAuditStore();
    await store.append(entry('a1', '2024-01-01T00:00:00.000Z'));
    await store.append(entry('a2', '2024-01-02T00:00:00.000Z', { actorId: 'carol' }));
    await store.append(
      entry('a3', '2024-01-03T00:00:00.000Z', {
        operationType: 'delete_group',
        objectType: 'group',
        objectId: 'g1',
        subjectId: undefined,
        success: false,
      })
    );
    await store.append(entry('a4', '2024-01-03T00:00:00.000Z', { objectId: 'r2' }));
  });

  it('returns the most recent first, later appends first on ties', async () => {
    const all = await store.query();
    expect(all.map((e) => e.id)).toEqual(['a4', 'a3', 'a2', 'a1']);
  });

  it('looks entries up by id', async () => {
    expect((await store.get('a2'))?.actorId).toBe('carol');
    expect(await store.get('missing')).toBeNull();
  });

  it('filters by object', async () => {
    const entries = await store.getByObject('resource', 'r1');
    expect(entries.map((e) => e.id)).toEqual(['a2', 'a1']);
  });

  it('filters by actor, outcome and operation', async () => {
    expect((await store.query({ actorId: 'carol' })).map((e) => e.id)).toEqual(['a2']);
    expect((await store.query({ success: false })).map((e) => e.id)).toEqual(['a3']);
    expect((await store.query({ operationType: 'delete_group' })).map((e) => e.id)).toEqual(['a3']);
    expect((await store.query({ subjectId: 'bob', objectType: 'resource' })).map((e) => e.id)).toEqual([
      'a4',
      'a2',
      'a1',
    ]);
  });

  it('filters by time window', async () => {
    const entries = await store.query({
      since: '2024-01-02T00:00:00.000Z',
      until: '2024-01-02T23:59:59.000Z',
    });
    expect(entries.map((e) => e.id)).toEqual(['a2']);
  });

  it('paginates', async () => {
    expect((await store.query({ limit: 2 })).map((e) => e.id)).toEqual(['a4', 'a3']);
    expect((await store.query({ offset: 2, limit: 1 })).map((e) => e.id)).toEqual(['a2']);
    expect(
      (await store.getByObject('resource', 'r1', { offset: 1 })).map((e) => e.id)
    ).toEqual(['a1']);
  });
});
