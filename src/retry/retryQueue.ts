/**
 * Retry queue: durable schedule of sites to try again later
 *
 * One record per site (keyed by normalized career URL). Attempt counts only
 * grow and each reschedule lands strictly after the previous one. Rate limits
 * bump the attempt but not the failure count that backoff and exhaustion use.
 */

import type {
  BackoffFn,
  EnqueueHint,
  EnqueueResult,
  FailureKind,
  Logger,
  RetryQueueRow,
  RetryQueueStore,
  RetryRecord,
  Site,
} from "@/types";
import { DEFAULT_MAX_RETRY_ATTEMPTS, DEFAULT_RATE_LIMIT_COOLDOWN_MS } from "@/constants";
import { sqliteRetryQueueStore } from "@/db";
import { isRetryableKind, parseFailureKind } from "@/failures";
import { rootLogger } from "@/logger";
import { backoff as defaultBackoff } from "./backoff";

export type RetryQueueOptions = {
  store?: RetryQueueStore;
  /** Retryable failures allowed before a site becomes retries_exhausted */
  maxAttempts?: number;
  /** Wait for rate-limited records without a Retry-After hint */
  rateLimitCooldownMs?: number;
  backoff?: BackoffFn;
  logger?: Logger;
};

/**
 * Map a database row to a retry record
 */
export function toRetryRecord(row: RetryQueueRow): RetryRecord {
  return {
    site: { company: row.company, careerUrl: row.career_url },
    kind: parseFailureKind(row.failure_kind),
    attempt: row.attempt,
    failureCount: row.failure_count,
    nextEligibleAt: row.next_eligible_at,
    firstFailedAt: row.first_failed_at,
    lastFailedAt: row.last_failed_at,
    lastMessage: row.last_message,
    httpStatus: row.http_status,
    sequence: row.id,
  };
}

export class RetryQueue {
  private readonly store: RetryQueueStore;
  private readonly maxAttempts: number;
  private readonly rateLimitCooldownMs: number;
  private readonly backoff: BackoffFn;
  private readonly logger: Logger;
  /** Sites that reached success or a permanent failure during this queue's lifetime */
  private readonly terminal = new Set<string>();

  constructor(options: RetryQueueOptions = {}) {
    this.store = options.store ?? sqliteRetryQueueStore;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_RETRY_ATTEMPTS;
    this.rateLimitCooldownMs = options.rateLimitCooldownMs ?? DEFAULT_RATE_LIMIT_COOLDOWN_MS;
    this.backoff = options.backoff ?? defaultBackoff;
    this.logger = options.logger ?? rootLogger;
  }

  /**
   * Schedule (or reschedule) a site after a retryable failure
   *
   * @param site - Site that failed
   * @param kind - Classified failure kind
   * @param timestamp - When the failure happened
   * @param hint - Message, HTTP status and Retry-After wait of the failure
   */
  enqueue(site: Site, kind: FailureKind, timestamp: Date, hint: EnqueueHint = {}): EnqueueResult {
    if (this.terminal.has(site.careerUrl)) {
      this.logger.debug("Enqueue ignored for terminal site", { careerUrl: site.careerUrl, kind });
      return { status: "ignored", reason: "terminal" };
    }
    if (!isRetryableKind(kind)) {
      this.remove(site);
      return { status: "ignored", reason: "permanent" };
    }

    const existing = this.store.get(site.careerUrl);
    const attempt = existing ? existing.attempt + 1 : 1;
    const failureCount = (existing?.failure_count ?? 0) + (kind === "rate_limited" ? 0 : 1);
    const failedAt = timestamp.toISOString();
    const message = hint.message ?? null;
    const httpStatus = hint.httpStatus ?? null;

    if (failureCount > this.maxAttempts) {
      this.store.delete(site.careerUrl);
      this.terminal.add(site.careerUrl);
      this.logger.info("Retries exhausted", { careerUrl: site.careerUrl, attempts: failureCount - 1, kind });
      return {
        status: "exhausted",
        record: {
          site,
          kind: "retries_exhausted",
          attempt,
          failureCount,
          nextEligibleAt: existing?.next_eligible_at ?? failedAt,
          firstFailedAt: existing?.first_failed_at ?? failedAt,
          lastFailedAt: failedAt,
          lastMessage: message,
          httpStatus,
          sequence: existing?.id ?? 0,
        },
      };
    }

    const delayMs =
      kind === "rate_limited"
        ? (hint.retryAfterMs ?? this.rateLimitCooldownMs)
        : this.backoff(failureCount);
    let nextMs = timestamp.getTime() + delayMs;
    if (existing) {
      const previousMs = Date.parse(existing.next_eligible_at);
      if (!Number.isNaN(previousMs) && nextMs <= previousMs) {
        nextMs = previousMs + 1;
      }
    }
    const nextEligibleAt = new Date(nextMs).toISOString();

    const row = existing
      ? this.store.update({
          id: existing.id,
          career_url: existing.career_url,
          company: site.company,
          failure_kind: kind,
          attempt,
          failure_count: failureCount,
          next_eligible_at: nextEligibleAt,
          first_failed_at: existing.first_failed_at,
          last_failed_at: failedAt,
          last_message: message,
          http_status: httpStatus,
        })
      : this.store.insert({
          career_url: site.careerUrl,
          company: site.company,
          failure_kind: kind,
          attempt,
          failure_count: failureCount,
          next_eligible_at: nextEligibleAt,
          first_failed_at: failedAt,
          last_failed_at: failedAt,
          last_message: message,
          http_status: httpStatus,
        });

    this.logger.debug("Retry scheduled", {
      careerUrl: site.careerUrl,
      kind,
      attempt,
      failureCount,
      nextEligibleAt,
    });
    return { status: "scheduled", record: toRetryRecord(row) };
  }

  /**
   * Records eligible at `now`, earliest first, ties by enqueue order
   */
  due(now: Date): RetryRecord[] {
    return this.store.listDue(now.toISOString()).map(toRetryRecord);
  }

  /**
   * Drop the record of a site
   *
   * @param terminal - Mark the site terminal so later enqueues in this
   * queue's lifetime are ignored (default true)
   * @returns true if a record existed
   */
  remove(site: Site, terminal = true): boolean {
    if (terminal) {
      this.terminal.add(site.careerUrl);
    }
    return this.store.delete(site.careerUrl);
  }

  get(site: Site): RetryRecord | null {
    const row = this.store.get(site.careerUrl);
    return row ? toRetryRecord(row) : null;
  }

  list(): RetryRecord[] {
    return this.store.listAll().map(toRetryRecord);
  }

  isTerminal(site: Site): boolean {
    return this.terminal.has(site.careerUrl);
  }
}
