/**
 * Drizzle table definitions for the catalog example.
 */

import { integer, pgTable, serial, text, timestamp } from 'drizzle-orm/pg-core';

export const publishers = pgTable('publishers', {
  id: serial('id').primaryKey(),
  name: text('name').notNull(),
  city: text('city'),
});

export const titles = pgTable('titles', {
  id: serial('id').primaryKey(),
  name: text('name').notNull(),
  publisherId: integer('publisher_id').references(() => publishers.id),
  releasedAt: timestamp('released_at'),
});
