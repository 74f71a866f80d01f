import { sqliteTable, text } from 'drizzle-orm/sqlite-core';

/**
 * Key/value store for user preferences (see lib/appSettings)
 */
export const appSettings = sqliteTable('app_settings', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});

export type AppSettingRow = typeof appSettings.$inferSelect;
