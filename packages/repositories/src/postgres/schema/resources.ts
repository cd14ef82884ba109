import { pgTable, text, timestamp, boolean } from 'drizzle-orm/pg-core';

/**
 * Resources table - existence and flags of shared content objects.
 */
export const resources = pgTable('resources', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  active: boolean('active').notNull().default(true),
  discoverable: boolean('discoverable').notNull().default(false),
  public: boolean('public').notNull().default(false),
  shareable: boolean('shareable').notNull().default(true),
  published: boolean('published').notNull().default(false),
  immutable: boolean('immutable').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
