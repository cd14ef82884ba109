import { pgTable, text, timestamp, boolean, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Users table - the identity provider's users as seen by the access store.
 */
export const users = pgTable(
  'users',
  {
    id: text('id').primaryKey(),
    username: text('username').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    isSuperuser: boolean('is_superuser').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('users_username_idx').on(table.username)]
);
