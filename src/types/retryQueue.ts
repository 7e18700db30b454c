/**
 * Retry queue type definitions
 */

import type { FailureKind } from "./failures";
import type { Site } from "./site";

/**
 * Retry queue row (database entity)
 */
export type RetryQueueRow = {
  /** Autoincrement id, doubles as original enqueue order */
  id: number;
  /** Normalized career root URL (site identity) */
  career_url: string;
  company: string;
  failure_kind: string;
  /** Enqueues so far, rate limits included */
  attempt: number;
  /** Retryable failures other than rate limits */
  failure_count: number;
  /** ISO 8601 timestamp */
  next_eligible_at: string;
  /** ISO 8601 timestamp of the first failure */
  first_failed_at: string;
  /** ISO 8601 timestamp of the latest failure */
  last_failed_at: string;
  last_message: string | null;
  http_status: number | null;
  updated_at: string;
};

export type RetryRecord = {
  site: Site;
  kind: FailureKind;
  attempt: number;
  /** Counts toward maxAttempts and drives backoff; rate limits never do */
  failureCount: number;
  nextEligibleAt: string;
  firstFailedAt: string;
  lastFailedAt: string;
  lastMessage: string | null;
  httpStatus: number | null;
  /** Original enqueue order, used to break ties in `due()` */
  sequence: number;
};

/**
 * Optional details attached to an enqueue call
 */
export type EnqueueHint = {
  message?: string;
  httpStatus?: number | null;
  /** Server-suggested wait (Retry-After), used for rate-limited records */
  retryAfterMs?: number;
};

export type EnqueueResult =
  | { status: "scheduled"; record: RetryRecord }
  | { status: "exhausted"; record: RetryRecord }
  | { status: "ignored"; reason: "terminal" | "permanent" };

/**
 * Backoff schedule: failure number (1-based) to delay in milliseconds
 */
export type BackoffFn = (attempt: number) => number;

/**
 * Storage behind the retry queue
 */
export interface RetryQueueStore {
  get(careerUrl: string): RetryQueueRow | null;
  insert(row: Omit<RetryQueueRow, "id" | "updated_at">): RetryQueueRow;
  update(row: Omit<RetryQueueRow, "updated_at">): RetryQueueRow;
  delete(careerUrl: string): boolean;
  listDue(nowIso: string): RetryQueueRow[];
  listAll(): RetryQueueRow[];
}
