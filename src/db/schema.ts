// src/db/schema.ts
import { blob, index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

/**
 * Mirrors src/db/schema.sql, which creates the table. `ordinal_id` holds the
 * decimal form of the 64-bit id; `created_at`/`expires_at` are epoch milliseconds.
 */
export const pastes = sqliteTable(
  'pastes',
  {
    token: text('token').primaryKey(),
    ordinalId: text('ordinal_id').notNull().unique(),
    content: blob('content', { mode: 'buffer' }).notNull(),
    contentType: text('content_type').notNull(),
    sizeBytes: integer('size_bytes').notNull(),
    contentHash: text('content_hash').notNull(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    expiresAt: integer('expires_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    expiresAtIdx: index('pastes_expires_at_idx').on(table.expiresAt),
  })
);

export type PasteRow = typeof pastes.$inferSelect;
export type NewPasteRow = typeof pastes.$inferInsert;
