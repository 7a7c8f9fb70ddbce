/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ directory in order.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import * as logger from "@/logger";
import { openDb, closeDb } from "./connection";

const DEFAULT_MIGRATIONS_DIR = join(process.cwd(), "migrations");

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db
    .prepare<[], { version: string }>("SELECT version FROM schema_migrations")
    .all();
  return new Set(rows.map((r) => r.version));
}

function getPendingMigrations(applied: Set<string>, migrationsDir: string): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir);
  } catch {
    // No migrations directory yet
    return [];
  }

  return files
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .filter((f) => !applied.has(f));
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Database.Database, migrationsDir: string, filename: string): void {
  const sql = readFileSync(join(migrationsDir, filename), "utf-8");

  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(filename);
  });

  transaction();
}

/**
 * Apply pending migrations to an open database.
 *
 * @returns Filenames applied, in order
 */
export function applyMigrations(
  db: Database.Database,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR,
): string[] {
  ensureMigrationsTable(db);

  const pending = getPendingMigrations(getAppliedMigrations(db), migrationsDir);
  for (const migration of pending) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migrationsDir, migration);
  }
  return pending;
}

/**
 * Open the configured database, migrate it and close it
 */
export function runMigrations(): void {
  const db = openDb();

  try {
    const applied = applyMigrations(db);
    if (applied.length === 0) {
      logger.info("No pending migrations");
      return;
    }
    logger.info("Migrations complete", { applied });
  } finally {
    closeDb();
  }
}

if (require.main === module) {
  runMigrations();
}
