/**
 * Process-wide SQLite handle shared by the repositories
 *
 * The CLI opens it once per command with the configured path (see
 * PipelineConfig.dbPath); tests inject their own handle.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

let current: Database.Database | null = null;

/**
 * Apply the pragmas every connection runs with
 */
export function configureConnection(db: Database.Database): Database.Database {
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");
  return db;
}

/**
 * Open the database file, creating its directory first
 *
 * A second call while a handle is open returns that handle.
 */
export function openDb(dbPath: string): Database.Database {
  if (current) {
    return current;
  }
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  current = configureConnection(new Database(dbPath));
  return current;
}

export function closeDb(): void {
  current?.close();
  current = null;
}

/**
 * @throws When no handle is open
 */
export function getDb(): Database.Database {
  if (!current) {
    throw new Error("No open database: call openDb() before using the repositories");
  }
  return current;
}

/**
 * Swap in (or clear, with null) the handle the repositories use
 *
 * @internal Test use only
 */
export function setDbForTesting(db: Database.Database | null): void {
  current = db;
}
