import { randomUUID } from 'node:crypto';
import { eq, inArray } from 'drizzle-orm';
import type { Database } from '../db.js';
import { users } from '../schema/index.js';
import type {
  UserRepository,
  CreateUserInput,
  UpdateUserInput,
} from '../../interfaces/index.js';
import type { Id, User } from '@custody/protocol';

export class PgUserRepository implements UserRepository {
  constructor(private db: Database) {}

  async create(input: CreateUserInput): Promise<User> {
    const [row] = await this.db
      .insert(users)
      .values({
        id: input.id ?? randomUUID(),
        username: input.username,
        isActive: input.isActive ?? true,
        isSuperuser: input.isSuperuser ?? false,
        createdAt: new Date(),
      })
      .returning();

    return this.rowToUser(row);
  }

  async get(id: Id): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id));
    return row ? this.rowToUser(row) : null;
  }

  async getMany(ids: readonly Id[]): Promise<User[]> {
    if (ids.length === 0) return [];
    const rows = await this.db.select().from(users).where(inArray(users.id, [...ids]));
    return rows.map((r) => this.rowToUser(r));
  }

  async update(id: Id, input: UpdateUserInput): Promise<User | null> {
    const existing = await this.get(id);
    if (!existing) return null;

    const [row] = await this.db
      .update(users)
      .set({
        isActive: input.isActive ?? existing.isActive,
        isSuperuser: input.isSuperuser ?? existing.isSuperuser,
      })
      .where(eq(users.id, id))
      .returning();

    return row ? this.rowToUser(row) : null;
  }

  private rowToUser(row: typeof users.$inferSelect): User {
    return {
      id: row.id,
      username: row.username,
      isActive: row.isActive,
      isSuperuser: row.isSuperuser,
      createdAt: row.createdAt.toISOString(),
    };
  }
}
