/**
 * Run lock repository
 *
 * DB-based lock with TTL: only one discovery run may drive the retry queue
 * at a time.
 */

import type { RunLockRow, RunLockAcquireResult } from "@/types";
import { getDb } from "../connection";
import { RUN_LOCK_NAME, RUN_LOCK_TTL_SECONDS } from "@/constants";
import * as logger from "@/logger";

/**
 * Acquire the run lock
 *
 * Inserts the lock row, or takes over an expired one. A live lock held by
 * another owner leaves the row untouched.
 *
 * @param ownerId - Unique process identifier (UUID)
 */
export function acquireRunLock(ownerId: string): RunLockAcquireResult {
  let db: ReturnType<typeof getDb>;
  try {
    db = getDb();
  } catch {
    return { ok: false, reason: "DB_NOT_OPEN" };
  }

  try {
    const result = db
      .prepare(
        `
      INSERT INTO run_lock (lock_name, owner_id, acquired_at, expires_at)
      VALUES (
        ?,
        ?,
        datetime('now'),
        datetime('now', '+' || ? || ' seconds')
      )
      ON CONFLICT(lock_name) DO UPDATE SET
        owner_id = excluded.owner_id,
        acquired_at = excluded.acquired_at,
        expires_at = excluded.expires_at,
        updated_at = datetime('now')
      WHERE datetime('now') >= expires_at
    `,
      )
      .run(RUN_LOCK_NAME, ownerId, RUN_LOCK_TTL_SECONDS);

    return result.changes > 0 ? { ok: true } : { ok: false, reason: "LOCKED" };
  } catch (err) {
    logger.error("Run lock acquisition failed", {
      error: err instanceof Error ? err.message : String(err),
    });
    return { ok: false, reason: "UNKNOWN" };
  }
}

/**
 * Release the run lock if owned by this process
 *
 * @returns true if the lock row was deleted
 */
export function releaseRunLock(ownerId: string): boolean {
  const result = getDb()
    .prepare("DELETE FROM run_lock WHERE lock_name = ? AND owner_id = ?")
    .run(RUN_LOCK_NAME, ownerId);

  return result.changes > 0;
}

/**
 * Current run lock row, or null when no run holds it
 */
export function getRunLock(): RunLockRow | null {
  const row = getDb()
    .prepare<[string], RunLockRow>("SELECT * FROM run_lock WHERE lock_name = ?")
    .get(RUN_LOCK_NAME);

  return row ?? null;
}
