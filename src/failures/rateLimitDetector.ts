/**
 * Rate-limit detector: decides whether a response means "slow down"
 *
 * Pure: inspects status, headers and body only.
 */

import type { RateLimitSignal, ThrottleCandidate } from "@/types";
import {
  DEFAULT_RATE_LIMIT_COOLDOWN_MS,
  RATE_LIMIT_BODY_PHRASES,
  RATE_LIMIT_STATUSES,
} from "@/constants";

export type DetectRateLimitOptions = {
  /** Cooldown used when the response carries no usable Retry-After */
  defaultCooldownMs?: number;
  /** Clock for HTTP-date Retry-After values */
  now?: number;
};

/**
 * Parse a Retry-After header value
 * Supports both delay-seconds and HTTP-date formats
 *
 * @param value - Raw header value
 * @param now - Reference time in epoch milliseconds for HTTP-dates
 * @returns Delay in milliseconds (never negative), or null if missing or invalid
 */
export function parseRetryAfter(
  value: string | null | undefined,
  now: number = Date.now(),
): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed === "") {
    return null;
  }

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, date - now);
}

function bodyMentionsRateLimit(body: string | undefined): boolean {
  if (!body) {
    return false;
  }
  const lower = body.toLowerCase();
  return RATE_LIMIT_BODY_PHRASES.some((phrase) => lower.includes(phrase));
}

/**
 * Detect a throttling response
 *
 * Rules, first match wins:
 * 1. status 429 or 406
 * 2. status 403 with a rate-limit phrase in the body
 * 3. a parseable Retry-After header, or X-RateLimit-Remaining equal to 0
 *
 * The wait is the Retry-After value when present (an explicit 0 included),
 * otherwise the default cooldown.
 *
 * @returns Signal with the recommended wait, or null when the response is not
 * a rate limit
 */
export function detectRateLimit(
  response: ThrottleCandidate,
  options: DetectRateLimitOptions = {},
): RateLimitSignal | null {
  const defaultCooldownMs = options.defaultCooldownMs ?? DEFAULT_RATE_LIMIT_COOLDOWN_MS;
  const retryAfterMs = parseRetryAfter(response.headers?.get("retry-after"), options.now);
  const waitMs = retryAfterMs ?? defaultCooldownMs;

  const statusReason = RATE_LIMIT_STATUSES[response.status];
  if (statusReason) {
    return { status: response.status, retryAfterMs: waitMs, reason: statusReason };
  }

  if (response.status === 403 && bodyMentionsRateLimit(response.body)) {
    return {
      status: response.status,
      retryAfterMs: waitMs,
      reason: "forbidden_with_rate_limit_body",
    };
  }

  if (retryAfterMs !== null) {
    return { status: response.status, retryAfterMs: waitMs, reason: "retry_after_header" };
  }

  if (response.headers?.get("x-ratelimit-remaining")?.trim() === "0") {
    return {
      status: response.status,
      retryAfterMs: waitMs,
      reason: "ratelimit_remaining_zero",
    };
  }

  return null;
}
