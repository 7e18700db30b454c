/**
 * Failure taxonomy type definitions
 */

import type { FAILURE_KINDS } from "@/constants";

/**
 * Closed set of failure kinds shared by discovery and the downstream detail
 * stage. `retries_exhausted` is only produced by the retry queue.
 */
export type FailureKind = (typeof FAILURE_KINDS)[number];

export type FailureDisposition = "retryable" | "permanent";

/**
 * Throttling signal produced by the rate-limit detector
 */
export type RateLimitSignal = {
  /** HTTP status of the throttled response */
  status: number;
  /** Recommended wait before retrying, in milliseconds */
  retryAfterMs: number;
  /** Which rule fired */
  reason:
    | "status_429"
    | "status_406"
    | "forbidden_with_rate_limit_body"
    | "retry_after_header"
    | "ratelimit_remaining_zero";
};

/**
 * Response view inspected by the rate-limit detector
 */
export type ThrottleCandidate = {
  status: number;
  headers?: Headers;
  body?: string;
};
