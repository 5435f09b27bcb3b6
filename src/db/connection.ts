/**
 * SQLite database connection management.
 *
 * Provides a singleton database connection with WAL mode for concurrent reads,
 * and ensures the data directory exists before opening. `:memory:` opens a
 * private in-memory database (used by tests).
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const MEMORY_DB = ':memory:';

const DEFAULT_DB_PATH = path.join(process.cwd(), 'data', 'turnkeeper.db');

let _db: Database.Database | null = null;

/**
 * Get or create the singleton database connection.
 */
export function getDb(dbPath: string = DEFAULT_DB_PATH): Database.Database {
  if (_db) return _db;
  _db = openDb(dbPath);
  return _db;
}

/**
 * Open a new, independent database connection.
 */
export function openDb(dbPath: string = DEFAULT_DB_PATH): Database.Database {
  if (dbPath !== MEMORY_DB) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  if (dbPath !== MEMORY_DB) {
    // Enable WAL mode for better concurrent read performance
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  return db;
}

/**
 * Close the singleton connection.
 */
export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
