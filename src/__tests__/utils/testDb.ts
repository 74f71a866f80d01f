/**
 * Test database utilities for setting up isolated test databases
 */

import { openDatabase, type AppDatabase, type DatabaseHandle } from "@/db/client";
import type Database from "better-sqlite3";

export class TestDatabase {
  private handle: DatabaseHandle;

  constructor() {
    // In-memory database with every migration applied
    this.handle = openDatabase(":memory:");
  }

  /**
   * Get the Drizzle database instance
   */
  get db(): AppDatabase {
    return this.handle.db;
  }

  /**
   * Get the raw SQLite database instance
   */
  get sqlite(): Database.Database {
    return this.handle.sqlite;
  }

  /**
   * Clean up the database
   */
  cleanup(): void {
    this.handle.close();
  }
}

export function createTestDb(): TestDatabase {
  return new TestDatabase();
}
