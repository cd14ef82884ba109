import { randomUUID } from 'node:crypto';
import { eq, inArray } from 'drizzle-orm';
import {
  DEFAULT_RESOURCE_FLAGS,
  type Id,
  type Resource,
  type ResourceFlags,
} from '@custody/protocol';
import type { Database } from '../db.js';
import { resources } from '../schema/index.js';
import type { ResourceRepository, CreateResourceRecordInput } from '../../interfaces/index.js';

export class PgResourceRepository implements ResourceRepository {
  constructor(private db: Database) {}

  async create(input: CreateResourceRecordInput): Promise<Resource> {
    const now = new Date();
    const flags = { ...DEFAULT_RESOURCE_FLAGS, ...input.flags };

    const [row] = await this.db
      .insert(resources)
      .values({
        id: input.id ?? randomUUID(),
        title: input.title,
        ...flags,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    return this.rowToResource(row);
  }

  async get(id: Id): Promise<Resource | null> {
    const [row] = await this.db.select().from(resources).where(eq(resources.id, id));
    return row ? this.rowToResource(row) : null;
  }

  async getMany(ids: readonly Id[]): Promise<Resource[]> {
    if (ids.length === 0) return [];
    const rows = await this.db
      .select()
      .from(resources)
      .where(inArray(resources.id, [...ids]));
    return rows.map((r) => this.rowToResource(r));
  }

  async lock(id: Id): Promise<Resource | null> {
    const [row] = await this.db
      .select()
      .from(resources)
      .where(eq(resources.id, id))
      .for('update');
    return row ? this.rowToResource(row) : null;
  }

  async updateFlags(id: Id, flags: Partial<ResourceFlags>): Promise<Resource | null> {
    const [row] = await this.db
      .update(resources)
      .set({ ...flags, updatedAt: new Date() })
      .where(eq(resources.id, id))
      .returning();

    return row ? this.rowToResource(row) : null;
  }

  async delete(id: Id): Promise<boolean> {
    const rows = await this.db
      .delete(resources)
      .where(eq(resources.id, id))
      .returning({ id: resources.id });
    return rows.length > 0;
  }

  private rowToResource(row: typeof resources.$inferSelect): Resource {
    return {
      id: row.id,
      title: row.title,
      flags: {
        active: row.active,
        discoverable: row.discoverable,
        public: row.public,
        shareable: row.shareable,
        published: row.published,
        immutable: row.immutable,
      },
      createdAt: row.createdAt.toISOString(),
      updatedAt: row.updatedAt.toISOString(),
    };
  }
}
