import { pgTable, text, timestamp, boolean } from 'drizzle-orm/pg-core';

/**
 * Groups table - existence and flags only. Membership lives in grants.
 */
export const groups = pgTable('groups', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  active: boolean('active').notNull().default(true),
  discoverable: boolean('discoverable').notNull().default(true),
  public: boolean('public').notNull().default(true),
  shareable: boolean('shareable').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
