export const id = '0001_sync_bookkeeping';

export const queries = [
  `ALTER TABLE media_progress ADD COLUMN sync_attempts INTEGER NOT NULL DEFAULT 0;`,
  `ALTER TABLE media_progress ADD COLUMN last_sync_attempt INTEGER;`,
  `ALTER TABLE media_progress ADD COLUMN sync_error TEXT;`,
];
