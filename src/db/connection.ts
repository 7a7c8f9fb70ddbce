/**
 * SQLite database connection
 *
 * Manages database connection lifecycle and configuration.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";

let db: Database.Database | null = null;

/**
 * Resolve the database file: explicit path, then DB_PATH, then data/app.db
 */
function resolveDbPath(explicitPath?: string): string {
  const defaultPath = join(process.cwd(), "data", "app.db");
  const dbPath = explicitPath || process.env.DB_PATH || defaultPath;

  // Ensure parent directory exists (skip for :memory:)
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  return dbPath;
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 */
export function openDb(path?: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath(path));

  // Enable foreign keys (SQLite default is OFF)
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Inject a database into the singleton.
 *
 * @internal Test use only
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
