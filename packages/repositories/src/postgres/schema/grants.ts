import { pgTable, text, timestamp, smallint, index, uniqueIndex } from 'drizzle-orm/pg-core';
import type { GrantRelation, GrantablePrivilege } from '@custody/protocol';
import { users } from './users.js';

/**
 * Grants table - every delegation of access, for all three relations.
 *
 * subject_id and object_id are polymorphic over users, groups and resources
 * depending on the relation, so only the grantor carries a foreign key.
 * The unique index is what makes re-granting an update rather than a duplicate.
 */
export const grants = pgTable(
  'grants',
  {
    id: text('id').primaryKey(),
    relation: text('relation', {
      enum: ['user_group', 'user_resource', 'group_resource'],
    })
      .notNull()
      .$type<GrantRelation>(),
    subjectId: text('subject_id').notNull(),
    objectId: text('object_id').notNull(),
    grantorId: text('grantor_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    privilege: smallint('privilege').notNull().$type<GrantablePrivilege>(),
    grantedAt: timestamp('granted_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('grants_relation_key_idx').on(
      table.relation,
      table.subjectId,
      table.objectId,
      table.grantorId
    ),
    index('grants_object_idx').on(table.relation, table.objectId, table.privilege),
    index('grants_subject_idx').on(table.relation, table.subjectId),
  ]
);
