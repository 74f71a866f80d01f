import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { runMigrations } from "./migrations";
import * as schema from "./schema";

export const DEFAULT_DB_PATH = "progress.sqlite";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
  close(): void;
}

/**
 * Open the progress database, apply pending migrations and wrap it in Drizzle.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(path: string = DEFAULT_DB_PATH): DatabaseHandle {
  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  runMigrations(sqlite);

  const db = drizzle(sqlite, { schema });
  return {
    db,
    sqlite,
    close: () => {
      if (sqlite.open) sqlite.close();
    },
  };
}
