/**
 * Unit Tests: Rate-limit detector
 */

import { describe, it, expect } from "vitest";
import { detectRateLimit, parseRetryAfter } from "@/failures";

const THIRTY_MINUTES_MS = 30 * 60 * 1000;

describe("parseRetryAfter", () => {
  const now = Date.parse("2026-01-01T00:00:00Z");

  it("should parse delay-seconds", () => {
    expect(parseRetryAfter("120", now)).toBe(120_000);
    expect(parseRetryAfter(" 5 ", now)).toBe(5_000);
    expect(parseRetryAfter("0", now)).toBe(0);
  });

  it("should parse HTTP-dates relative to now", () => {
    expect(parseRetryAfter("Thu, 01 Jan 2026 00:02:00 GMT", now)).toBe(120_000);
  });

  it("should clamp past HTTP-dates to zero", () => {
    expect(parseRetryAfter("Wed, 31 Dec 2025 23:00:00 GMT", now)).toBe(0);
  });

  it("should return null for missing or invalid values", () => {
    expect(parseRetryAfter(undefined, now)).toBeNull();
    expect(parseRetryAfter(null, now)).toBeNull();
    expect(parseRetryAfter("", now)).toBeNull();
    expect(parseRetryAfter("soon", now)).toBeNull();
  });
});

describe("detectRateLimit", () => {
  it("should flag 429 with the default 30 minute cooldown", () => {
    expect(detectRateLimit({ status: 429 })).toEqual({
      status: 429,
      retryAfterMs: THIRTY_MINUTES_MS,
      reason: "status_429",
    });
  });

  it("should use Retry-After on a 429", () => {
    const signal = detectRateLimit({
      status: 429,
      headers: new Headers({ "Retry-After": "90" }),
    });
    expect(signal).toEqual({ status: 429, retryAfterMs: 90_000, reason: "status_429" });
  });

  it("should honor an explicit Retry-After of zero", () => {
    const signal = detectRateLimit({ status: 429, headers: new Headers({ "Retry-After": "0" }) });
    expect(signal).toEqual({ status: 429, retryAfterMs: 0, reason: "status_429" });
  });

  it("should flag 406 as throttling", () => {
    expect(detectRateLimit({ status: 406, body: "Not Acceptable" })).toEqual({
      status: 406,
      retryAfterMs: THIRTY_MINUTES_MS,
      reason: "status_406",
    });
    expect(
      detectRateLimit({ status: 406, headers: new Headers({ "Retry-After": "45" }) })?.retryAfterMs,
    ).toBe(45_000);
  });

  it("should honor a configured default cooldown", () => {
    const signal = detectRateLimit({ status: 429 }, { defaultCooldownMs: 60_000 });
    expect(signal?.retryAfterMs).toBe(60_000);
  });

  it("should flag 403 whose body mentions rate limiting", () => {
    expect(detectRateLimit({ status: 403, body: "<h1>Too Many Requests</h1>" })).toEqual({
      status: 403,
      retryAfterMs: THIRTY_MINUTES_MS,
      reason: "forbidden_with_rate_limit_body",
    });
    expect(detectRateLimit({ status: 403, body: "You hit our RATE LIMIT" })?.reason).toBe(
      "forbidden_with_rate_limit_body",
    );
  });

  it("should not flag a plain 403", () => {
    expect(detectRateLimit({ status: 403, body: "Access denied" })).toBeNull();
    expect(detectRateLimit({ status: 403 })).toBeNull();
  });

  it("should flag any status carrying a parseable Retry-After", () => {
    const signal = detectRateLimit({
      status: 503,
      headers: new Headers({ "Retry-After": "30" }),
    });
    expect(signal).toEqual({ status: 503, retryAfterMs: 30_000, reason: "retry_after_header" });
  });

  it("should ignore an unparseable Retry-After", () => {
    expect(
      detectRateLimit({ status: 503, headers: new Headers({ "Retry-After": "later" }) }),
    ).toBeNull();
  });

  it("should flag X-RateLimit-Remaining: 0", () => {
    const signal = detectRateLimit({
      status: 500,
      headers: new Headers({ "X-RateLimit-Remaining": "0" }),
    });
    expect(signal).toEqual({
      status: 500,
      retryAfterMs: THIRTY_MINUTES_MS,
      reason: "ratelimit_remaining_zero",
    });
  });

  it("should not flag ordinary errors", () => {
    expect(detectRateLimit({ status: 404 })).toBeNull();
    expect(detectRateLimit({ status: 500, body: "Internal error" })).toBeNull();
    expect(
      detectRateLimit({ status: 500, headers: new Headers({ "X-RateLimit-Remaining": "12" }) }),
    ).toBeNull();
  });
});
