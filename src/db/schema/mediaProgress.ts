import { integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

/**
 * Locally tracked listening progress, one row per library item.
 * pendingUpload stays true until the server has confirmed the position.
 */
export const mediaProgress = sqliteTable('media_progress', {
  libraryItemId: text('library_item_id').primaryKey(),
  currentTime: real('current_time').notNull(),
  lastUpdate: integer('last_update').notNull(), // epoch ms
  pendingUpload: integer('pending_upload', { mode: 'boolean' }).notNull().default(true),

  // Sync bookkeeping
  syncAttempts: integer('sync_attempts').notNull().default(0),
  lastSyncAttempt: integer('last_sync_attempt', { mode: 'timestamp' }),
  syncError: text('sync_error'),

  updatedAt: integer('updated_at', { mode: 'timestamp' }).notNull(),
});

export type MediaProgressRow = typeof mediaProgress.$inferSelect;
export type NewMediaProgressRow = typeof mediaProgress.$inferInsert;
