/**
 * Logger Database Module
 *
 * Handles all SQLite database operations for the logging system.
 * Uses a separate logs database to avoid contention with the progress database.
 */

import { getLogsDbPath } from "@/lib/config";
import type { LogDbRow, LogEntry, LogLevel } from "@/lib/logger/types";
import Database from "better-sqlite3";

export type LogRow = LogEntry;

let logsDb: Database.Database | null = null;

const LEVEL_FILTERS: Record<LogLevel, string> = {
  debug: "level IN ('debug', 'info', 'warn', 'error')",
  info: "level IN ('info', 'warn', 'error')",
  warn: "level IN ('warn', 'error')",
  error: "level = 'error'",
};

function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS logs (
      id TEXT PRIMARY KEY NOT NULL,
      timestamp INTEGER NOT NULL,
      level TEXT NOT NULL,
      tag TEXT NOT NULL,
      message TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS logs_timestamp_idx ON logs (timestamp);
    CREATE INDEX IF NOT EXISTS logs_level_idx ON logs (level);
  `);
}

/**
 * Open (or reopen) the logs database at a specific path.
 * Tests use ":memory:".
 */
export function openLogsDb(path: string = getLogsDbPath()): Database.Database {
  closeLogsDb();
  const db = new Database(path);
  initializeSchema(db);
  logsDb = db;
  return db;
}

export function closeLogsDb(): void {
  if (logsDb) {
    logsDb.close();
    logsDb = null;
  }
}

function getLogsDb(): Database.Database {
  return logsDb ?? openLogsDb();
}

function toLogRows(rows: LogDbRow[]): LogRow[] {
  return rows.map((row) => ({
    ...row,
    timestamp: new Date(row.timestamp),
  }));
}

export function insertLogToDb(log: LogEntry): void {
  getLogsDb()
    .prepare("INSERT INTO logs (id, timestamp, level, tag, message) VALUES (?, ?, ?, ?, ?)")
    .run(log.id, log.timestamp.getTime(), log.level, log.tag, log.message);
}

/**
 * Get all logs, newest first
 */
export function getAllLogs(limit?: number): LogRow[] {
  const db = getLogsDb();
  const rows = limit
    ? db.prepare<[number], LogDbRow>("SELECT * FROM logs ORDER BY timestamp DESC LIMIT ?").all(limit)
    : db.prepare<[], LogDbRow>("SELECT * FROM logs ORDER BY timestamp DESC").all();
  return toLogRows(rows);
}

/**
 * Get logs by level (inclusive filtering)
 *
 * Level filtering behavior:
 * - debug → all levels (debug, info, warn, error)
 * - info → info, warn, error
 * - warn → warn, error
 * - error → error only
 */
export function getLogsByLevel(level: LogLevel, limit?: number): LogRow[] {
  const db = getLogsDb();
  const levelFilter = LEVEL_FILTERS[level];
  const rows = limit
    ? db
        .prepare<[number], LogDbRow>(
          `SELECT * FROM logs WHERE ${levelFilter} ORDER BY timestamp DESC LIMIT ?`
        )
        .all(limit)
    : db
        .prepare<[], LogDbRow>(`SELECT * FROM logs WHERE ${levelFilter} ORDER BY timestamp DESC`)
        .all();
  return toLogRows(rows);
}

export function getLogsByTag(tag: string, limit?: number): LogRow[] {
  const db = getLogsDb();
  const rows = limit
    ? db
        .prepare<[string, number], LogDbRow>(
          "SELECT * FROM logs WHERE tag = ? ORDER BY timestamp DESC LIMIT ?"
        )
        .all(tag, limit)
    : db
        .prepare<[string], LogDbRow>("SELECT * FROM logs WHERE tag = ? ORDER BY timestamp DESC")
        .all(tag);
  return toLogRows(rows);
}

export function getAllTags(): string[] {
  const rows = getLogsDb()
    .prepare<[], { tag: string }>("SELECT DISTINCT tag FROM logs ORDER BY tag ASC")
    .all();
  return rows.map((row) => row.tag);
}

export function clearAllLogs(): void {
  getLogsDb().prepare("DELETE FROM logs").run();
}

export function deleteLogsBefore(date: Date): void {
  getLogsDb().prepare("DELETE FROM logs WHERE timestamp < ?").run(date.getTime());
}

function countByLevel(level: LogLevel): number {
  const row = getLogsDb()
    .prepare<[string], { count: number }>("SELECT COUNT(*) as count FROM logs WHERE level = ?")
    .get(level);
  return row?.count ?? 0;
}

export function getErrorCount(): number {
  return countByLevel("error");
}

export function getWarningCount(): number {
  return countByLevel("warn");
}

/**
 * Vacuum the database to reclaim space after deletions
 */
export function vacuumDatabase(): void {
  try {
    getLogsDb().exec("VACUUM");
  } catch (error) {
    console.error("[Logger] Failed to vacuum database:", error);
  }
}
