/**
 * Tests for the migration runner
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import Database from 'better-sqlite3';
import { migrations, runMigrations } from '../index';

describe('runMigrations', () => {
  let sqlite: Database.Database;

  beforeEach(() => {
    sqlite = new Database(':memory:');
  });

  afterEach(() => {
    sqlite.close();
  });

  it('should apply every migration on a fresh database', () => {
    expect(runMigrations(sqlite)).toEqual(['0000_initial', '0001_sync_bookkeeping']);

    const columns = sqlite
      .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('media_progress')")
      .all()
      .map((column) => column.name);
    expect(columns).toEqual([
      'library_item_id',
      'current_time',
      'last_update',
      'pending_upload',
      'updated_at',
      'sync_attempts',
      'last_sync_attempt',
      'sync_error',
    ]);
  });

  it('should apply nothing the second time', () => {
    runMigrations(sqlite);

    expect(runMigrations(sqlite)).toEqual([]);
  });

  it('should only apply migrations that are new', () => {
    runMigrations(sqlite, migrations.slice(0, 1));

    expect(runMigrations(sqlite)).toEqual(['0001_sync_bookkeeping']);
  });

  it('should roll back a failing migration', () => {
    const broken = { id: '9999_broken', queries: ['CREATE TABLE scratch (id TEXT);', 'NOT VALID SQL;'] };

    expect(() => runMigrations(sqlite, [broken])).toThrow();

    const tables = sqlite
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'scratch'")
      .all();
    expect(tables).toEqual([]);
    expect(runMigrations(sqlite, [])).toEqual([]);
  });
});
