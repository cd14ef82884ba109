import { randomUUID } from 'node:crypto';
import { eq, inArray } from 'drizzle-orm';
import { DEFAULT_GROUP_FLAGS, type Group, type GroupFlags, type Id } from '@custody/protocol';
import type { Database } from '../db.js';
import { groups } from '../schema/index.js';
import type { GroupRepository, CreateGroupRecordInput } from '../../interfaces/index.js';

export class PgGroupRepository implements GroupRepository {
  constructor(private db: Database) {}

  async create(input: CreateGroupRecordInput): Promise<Group> {
    const now = new Date();
    const flags = { ...DEFAULT_GROUP_FLAGS, ...input.flags };

    const [row] = await this.db
      .insert(groups)
      .values({
        id: input.id ?? randomUUID(),
        name: input.name,
        ...flags,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    return this.rowToGroup(row);
  }

  async get(id: Id): Promise<Group | null> {
    const [row] = await this.db.select().from(groups).where(eq(groups.id, id));
    return row ? this.rowToGroup(row) : null;
  }

  async getMany(ids: readonly Id[]): Promise<Group[]> {
    if (ids.length === 0) return [];
    const rows = await this.db.select().from(groups).where(inArray(groups.id, [...ids]));
    return rows.map((r) => this.rowToGroup(r));
  }

  async lock(id: Id): Promise<Group | null> {
    const [row] = await this.db.select().from(groups).where(eq(groups.id, id)).for('update');
    return row ? this.rowToGroup(row) : null;
  }

  async updateFlags(id: Id, flags: Partial<GroupFlags>): Promise<Group | null> {
    const [row] = await this.db
      .update(groups)
      .set({ ...flags, updatedAt: new Date() })
      .where(eq(groups.id, id))
      .returning();

    return row ? this.rowToGroup(row) : null;
  }

  async delete(id: Id): Promise<boolean> {
    const rows = await this.db.delete(groups).where(eq(groups.id, id)).returning({ id: groups.id });
    return rows.length > 0;
  }

  private rowToGroup(row: typeof groups.$inferSelect): Group {
    return {
      id: row.id,
      name: row.name,
      flags: {
        active: row.active,
        discoverable: row.discoverable,
        public: row.public,
        shareable: row.shareable,
      },
      createdAt: row.createdAt.toISOString(),
      updatedAt: row.updatedAt.toISOString(),
    };
  }
}
