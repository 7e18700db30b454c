/**
 * Document fetching for strategies: turns thrown errors into outcomes
 */

import type {
  DiscoveryFailure,
  DiscoveryMethod,
  DiscoveryRateLimited,
  DiscoverySuccess,
  HttpTextResponse,
  StrategyContext,
} from "@/types";
import { HttpError } from "@/clients/http";
import {
  classifyFailure,
  detectRateLimit,
  errorMessage,
  httpStatusOf,
} from "@/failures";

export type FetchDocumentResult =
  | { ok: true; response: HttpTextResponse }
  | { ok: false; outcome: DiscoveryFailure | DiscoveryRateLimited };

/**
 * Convert a thrown error into a failure or rate-limited outcome
 *
 * Non-2xx responses go through the rate-limit detector first.
 */
export function outcomeFromError(
  err: unknown,
  method: DiscoveryMethod,
  ctx: Pick<StrategyContext, "rateLimitCooldownMs">,
): DiscoveryFailure | DiscoveryRateLimited {
  if (err instanceof HttpError) {
    const signal = detectRateLimit(
      { status: err.status, headers: err.headers, body: err.bodySnippet },
      { defaultCooldownMs: ctx.rateLimitCooldownMs },
    );
    if (signal) {
      return {
        status: "rate_limited",
        httpStatus: signal.status,
        retryAfterMs: signal.retryAfterMs,
        message: `Rate limited (${signal.reason}): ${err.message}`,
        method,
      };
    }
  }

  return {
    status: "failure",
    kind: classifyFailure(err),
    message: errorMessage(err),
    httpStatus: httpStatusOf(err),
    method,
  };
}

/**
 * GET a document through the worker's fetch function
 */
export async function fetchDocument(
  url: string,
  method: DiscoveryMethod,
  ctx: StrategyContext,
  query?: Record<string, string | number>,
): Promise<FetchDocumentResult> {
  try {
    const response = await ctx.fetch({ method: "GET", url, query });
    return { ok: true, response };
  } catch (err) {
    const outcome = outcomeFromError(err, method, ctx);
    ctx.logger.debug("Document fetch failed", {
      url,
      method,
      status: outcome.status,
      httpStatus: outcome.httpStatus,
    });
    return { ok: false, outcome };
  }
}

/**
 * Build a success outcome stamped with the current time
 */
export function successOutcome(
  method: DiscoveryMethod,
  jobUrls: string[],
  expectedCount?: number,
): DiscoverySuccess {
  return {
    status: "success",
    method,
    jobUrls,
    ...(expectedCount === undefined ? {} : { expectedCount }),
    discoveredAt: new Date().toISOString(),
  };
}
