/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ in filename order and records each
 * one in schema_migrations.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import * as logger from "@/logger";

function migrationsDir(): string {
  return join(process.cwd(), "migrations");
}

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

/**
 * List migration files not yet applied, in order
 */
function getPendingMigrations(applied: Set<string>): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir());
  } catch (err) {
    logger.warn("Migrations directory not readable", {
      dir: migrationsDir(),
      error: err instanceof Error ? err.message : String(err),
    });
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
function applyMigration(db: Database.Database, filename: string): void {
  const sql = readFileSync(join(migrationsDir(), filename), "utf-8");

  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(filename);
  });

  transaction();
}

/**
 * Run all pending migrations on an open connection
 *
 * @returns Filenames of the migrations applied by this call
 */
export function runMigrations(db: Database.Database): string[] {
  ensureMigrationsTable(db);

  const pending = getPendingMigrations(getAppliedMigrations(db));
  if (pending.length === 0) {
    logger.debug("No pending migrations");
    return [];
  }

  logger.info(`Applying ${pending.length} migration(s)`);
  for (const migration of pending) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migration);
  }

  return pending;
}
