// Initial schema migration
// Keep these statements in sync with the Drizzle schema in src/db/schema

export const id = '0000_initial';

export const queries = [
  `CREATE TABLE IF NOT EXISTS media_progress (
      library_item_id TEXT PRIMARY KEY,
      "current_time" REAL NOT NULL,
      last_update INTEGER NOT NULL,
      pending_upload INTEGER NOT NULL DEFAULT 1,
      updated_at INTEGER NOT NULL
    );`,
  `CREATE INDEX IF NOT EXISTS media_progress_pending_idx ON media_progress (pending_upload, last_update);`,
  `CREATE TABLE IF NOT EXISTS app_settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );`,
];
