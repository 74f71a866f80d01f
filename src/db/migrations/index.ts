import type Database from 'better-sqlite3';
import * as m0000 from './0000_initial';
import * as m0001 from './0001_sync_bookkeeping';

export interface Migration {
  id: string;
  queries: string[];
}

// Applied in order; never reorder or edit an entry that has shipped
export const migrations: Migration[] = [m0000, m0001];

/**
 * Apply pending migrations. Each migration runs in its own transaction and is
 * recorded in __migrations so it is applied exactly once.
 *
 * @returns ids of the migrations applied by this call
 */
export function runMigrations(sqlite: Database.Database, list: Migration[] = migrations): string[] {
  sqlite.exec(`CREATE TABLE IF NOT EXISTS __migrations (
    id TEXT PRIMARY KEY,
    applied_at INTEGER NOT NULL
  );`);

  const applied = new Set(
    sqlite
      .prepare<[], { id: string }>('SELECT id FROM __migrations')
      .all()
      .map((row) => row.id)
  );
  const record = sqlite.prepare('INSERT INTO __migrations (id, applied_at) VALUES (?, ?)');

  const newlyApplied: string[] = [];
  for (const migration of list) {
    if (applied.has(migration.id)) continue;

    sqlite.transaction(() => {
      for (const query of migration.queries) {
        sqlite.exec(query);
      }
      record.run(migration.id, Date.now());
    })();
    newlyApplied.push(migration.id);
  }
  return newlyApplied;
}
