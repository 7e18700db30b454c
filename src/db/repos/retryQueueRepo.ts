/**
 * Retry queue repository
 *
 * Rows of the retry_queue table, one per career site. Implements the
 * RetryQueueStore contract used by the RetryQueue.
 */

import type { RetryQueueRow, RetryQueueStore } from "@/types";
import { getDb } from "../connection";

type NewRetryQueueRow = Omit<RetryQueueRow, "id" | "updated_at">;

/**
 * Get the record of one career site
 */
export function getRetryRow(careerUrl: string): RetryQueueRow | null {
  const row = getDb()
    .prepare<[string], RetryQueueRow>("SELECT * FROM retry_queue WHERE career_url = ?")
    .get(careerUrl);
  return row ?? null;
}

/**
 * Insert a new record
 *
 * @throws When the career site already has a record (UNIQUE constraint)
 */
export function insertRetryRow(row: NewRetryQueueRow): RetryQueueRow {
  const db = getDb();
  db.prepare(
    `
    INSERT INTO retry_queue (
      career_url, company, failure_kind, attempt, failure_count, next_eligible_at,
      first_failed_at, last_failed_at, last_message, http_status
    ) VALUES (
      @career_url, @company, @failure_kind, @attempt, @failure_count, @next_eligible_at,
      @first_failed_at, @last_failed_at, @last_message, @http_status
    )
  `,
  ).run(row);

  const inserted = getRetryRow(row.career_url);
  if (!inserted) {
    throw new Error(`Retry record for ${row.career_url} not found after insert`);
  }
  return inserted;
}

/**
 * Update an existing record in place (id and first_failed_at are kept)
 */
export function updateRetryRow(row: Omit<RetryQueueRow, "updated_at">): RetryQueueRow {
  const result = getDb()
    .prepare(
      `
    UPDATE retry_queue SET
      company = @company,
      failure_kind = @failure_kind,
      attempt = @attempt,
      failure_count = @failure_count,
      next_eligible_at = @next_eligible_at,
      last_failed_at = @last_failed_at,
      last_message = @last_message,
      http_status = @http_status,
      updated_at = datetime('now')
    WHERE id = @id
  `,
    )
    .run({
      id: row.id,
      company: row.company,
      failure_kind: row.failure_kind,
      attempt: row.attempt,
      failure_count: row.failure_count,
      next_eligible_at: row.next_eligible_at,
      last_failed_at: row.last_failed_at,
      last_message: row.last_message,
      http_status: row.http_status,
    });

  if (result.changes === 0) {
    throw new Error(`Retry record ${row.id} (${row.career_url}) does not exist`);
  }

  const updated = getRetryRow(row.career_url);
  if (!updated) {
    throw new Error(`Retry record for ${row.career_url} not found after update`);
  }
  return updated;
}

/**
 * Delete the record of one career site
 *
 * @returns true if a record was deleted
 */
export function deleteRetryRow(careerUrl: string): boolean {
  const result = getDb()
    .prepare("DELETE FROM retry_queue WHERE career_url = ?")
    .run(careerUrl);
  return result.changes > 0;
}

/**
 * Records eligible at or before `nowIso`, earliest first, ties by enqueue order
 */
export function listDueRetryRows(nowIso: string): RetryQueueRow[] {
  return getDb()
    .prepare<[string], RetryQueueRow>(
      `
    SELECT * FROM retry_queue
    WHERE next_eligible_at <= ?
    ORDER BY next_eligible_at ASC, id ASC
  `,
    )
    .all(nowIso);
}

/**
 * Every record, earliest eligibility first
 */
export function listRetryRows(): RetryQueueRow[] {
  return getDb()
    .prepare<[], RetryQueueRow>(
      "SELECT * FROM retry_queue ORDER BY next_eligible_at ASC, id ASC",
    )
    .all();
}

/**
 * RetryQueueStore backed by the process-wide SQLite connection
 */
export const sqliteRetryQueueStore: RetryQueueStore = {
  get: getRetryRow,
  insert: insertRetryRow,
  update: updateRetryRow,
  delete: deleteRetryRow,
  listDue: listDueRetryRows,
  listAll: listRetryRows,
};
