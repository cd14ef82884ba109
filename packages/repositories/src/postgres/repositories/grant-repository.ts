import { randomUUID } from 'node:crypto';
import { and, count, eq, gt, inArray, lte, ne, type SQL } from 'drizzle-orm';
import type { Database } from '../db.js';
import { grants } from '../schema/index.js';
import type {
  GrantRepository,
  GrantFilter,
  UpsertGrantInput,
  UpsertGrantResult,
} from '../../interfaces/index.js';
import type { Grant, GrantKey, GrantRelation } from '@custody/protocol';

/**
 * Grant repository scoped to one relation of the shared grants table.
 */
export class PgGrantRepository implements GrantRepository {
  constructor(
    private db: Database,
    readonly relation: GrantRelation
  ) {}

  async get(key: GrantKey): Promise<Grant | null> {
    const [row] = await this.db
      .select()
      .from(grants)
      .where(
        and(
          eq(grants.relation, this.relation),
          eq(grants.subjectId, key.subjectId),
          eq(grants.objectId, key.objectId),
          eq(grants.grantorId, key.grantorId)
        )
      );
    return row ? this.rowToGrant(row) : null;
  }

  async query(filter: GrantFilter): Promise<Grant[]> {
    const where = this.conditions(filter);
    if (!where) return [];
    const rows = await this.db.select().from(grants).where(where);
    return rows.map((r) => this.rowToGrant(r));
  }

  async count(filter: GrantFilter): Promise<number> {
    const where = this.conditions(filter);
    if (!where) return 0;
    const [row] = await this.db.select({ value: count() }).from(grants).where(where);
    return row?.value ?? 0;
  }

  async upsert(input: UpsertGrantInput): Promise<UpsertGrantResult> {
    const existing = await this.get(input);
    const now = new Date();

    const [row] = await this.db
      .insert(grants)
      .values({
        id: randomUUID(),
        relation: this.relation,
        subjectId: input.subjectId,
        objectId: input.objectId,
        grantorId: input.grantorId,
        privilege: input.privilege,
        grantedAt: now,
      })
      .onConflictDoUpdate({
        target: [grants.relation, grants.subjectId, grants.objectId, grants.grantorId],
        set: { privilege: input.privilege, grantedAt: now },
      })
      .returning();

    return existing
      ? { grant: this.rowToGrant(row), created: false, previousPrivilege: existing.privilege }
      : { grant: this.rowToGrant(row), created: true };
  }

  async delete(filter: GrantFilter): Promise<Grant[]> {
    if (filter.objectId === undefined && filter.subjectId === undefined) {
      throw new Error('Grant deletion requires an objectId or subjectId');
    }
    const where = this.conditions(filter);
    if (!where) return [];
    const rows = await this.db.delete(grants).where(where).returning();
    return rows.map((r) => this.rowToGrant(r));
  }

  /**
   * Translate a filter into a WHERE clause.
   * @returns undefined when the filter can match nothing (an empty id list)
   */
  private conditions(filter: GrantFilter): SQL | undefined {
    if (filter.subjectIds?.length === 0 || filter.objectIds?.length === 0) {
      return undefined;
    }

    const conditions: SQL[] = [eq(grants.relation, this.relation)];

    if (filter.subjectId !== undefined) {
      conditions.push(eq(grants.subjectId, filter.subjectId));
    }
    if (filter.subjectIds) {
      conditions.push(inArray(grants.subjectId, [...filter.subjectIds]));
    }
    if (filter.objectId !== undefined) {
      conditions.push(eq(grants.objectId, filter.objectId));
    }
    if (filter.objectIds) {
      conditions.push(inArray(grants.objectId, [...filter.objectIds]));
    }
    if (filter.grantorId !== undefined) {
      conditions.push(eq(grants.grantorId, filter.grantorId));
    }
    if (filter.privilege !== undefined) {
      conditions.push(eq(grants.privilege, filter.privilege));
    }
    if (filter.atLeast !== undefined) {
      conditions.push(lte(grants.privilege, filter.atLeast));
    }
    if (filter.weakerThan !== undefined) {
      conditions.push(gt(grants.privilege, filter.weakerThan));
    }
    if (filter.excludeSubjectId !== undefined) {
      conditions.push(ne(grants.subjectId, filter.excludeSubjectId));
    }
    if (filter.excludeGrantId !== undefined) {
      conditions.push(ne(grants.id, filter.excludeGrantId));
    }

    return and(...conditions);
  }

  private rowToGrant(row: typeof grants.$inferSelect): Grant {
    return {
      id: row.id,
      relation: row.relation,
      subjectId: row.subjectId,
      objectId: row.objectId,
      grantorId: row.grantorId,
      privilege: row.privilege,
      grantedAt: row.grantedAt.toISOString(),
    };
  }
}
