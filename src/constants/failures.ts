/**
 * Failure taxonomy constants
 */

import type { FailureKind } from "@/types";

/**
 * Every failure kind known to the pipeline
 */
export const FAILURE_KINDS = [
  "timeout",
  "connection_error",
  "parse_error",
  "not_found",
  "access_forbidden",
  "rate_limited",
  "server_error",
  "unexpected_error",
  "retries_exhausted",
] as const;

/**
 * Kinds worth retrying later. Everything else is terminal.
 * unexpected_error is retryable.
 */
export const RETRYABLE_FAILURE_KINDS: readonly FailureKind[] = [
  "timeout",
  "connection_error",
  "rate_limited",
  "server_error",
  "unexpected_error",
];

/**
 * HTTP status to failure kind. 5xx is handled as a range.
 */
export const STATUS_FAILURE_KINDS: Readonly<Record<number, FailureKind>> = {
  401: "access_forbidden",
  403: "access_forbidden",
  404: "not_found",
  406: "rate_limited",
  408: "timeout",
  410: "not_found",
  429: "rate_limited",
};

/**
 * Statuses that always mean throttling. Avature answers 406 when a client
 * pages or fetches too fast.
 */
export const RATE_LIMIT_STATUSES: Readonly<Record<number, "status_429" | "status_406">> = {
  429: "status_429",
  406: "status_406",
};

/**
 * Error names raised by aborted or timed-out fetches
 */
export const TIMEOUT_ERROR_NAMES = ["AbortError", "TimeoutError"];

/**
 * Error codes (Node system errors and undici) that mean a timeout
 */
export const TIMEOUT_ERROR_CODES = [
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
];

/**
 * Error codes (Node system errors and undici) that mean the connection failed
 */
export const CONNECTION_ERROR_CODES = [
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
];

/**
 * Body phrases that turn a 403 into a rate-limit signal (matched lower-cased)
 */
export const RATE_LIMIT_BODY_PHRASES = ["too many requests", "rate limit"];

/**
 * Cooldown applied when a throttled response carries no Retry-After (30 minutes)
 */
export const DEFAULT_RATE_LIMIT_COOLDOWN_MS = 30 * 60 * 1000;
