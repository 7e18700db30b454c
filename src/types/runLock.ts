/**
 * Run lock type definitions
 *
 * Types for the run lock that keeps two pipeline runs off the same retry queue.
 */

/**
 * Run lock row (database entity)
 */
export type RunLockRow = {
  /** Lock name (single system-wide lock) */
  lock_name: string;

  /** Owner process identifier (UUID) */
  owner_id: string;

  /** When the lock was acquired (SQLite datetime) */
  acquired_at: string;

  /** When the lock expires (SQLite datetime) */
  expires_at: string;

  /** Last update timestamp */
  updated_at: string;
};

/**
 * Lock acquisition result
 */
export type RunLockAcquireResult =
  | { ok: true }
  | { ok: false; reason: "LOCKED" | "DB_NOT_OPEN" | "UNKNOWN" };
