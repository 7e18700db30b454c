/**
 * Discovery runner: drives many sites through the orchestrator
 *
 * Key responsibilities:
 * - Bounded worker pool (p-limit), one request throttle per worker slot
 * - Shared stop signal: once tripped no new site starts, in-flight sites finish
 * - Route each outcome to the result sink and the retry queue
 * - Write never-dispatched sites as pending records
 * - Summarize the failures written, by kind and HTTP status
 */

import pLimit from "p-limit";
import type {
  DiscoveryOutcome,
  FailureRecord,
  HttpRequestFn,
  ResultSink,
  RunCounters,
  RunSummary,
  Site,
  StrategyContext,
} from "@/types";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_WORKERS,
  DEFAULT_RATE_LIMIT_COOLDOWN_MS,
  DEFAULT_REQUEST_DELAY_MS,
} from "@/constants";
import { httpRequest } from "@/clients/http";
import type { DiscoveryOrchestrator } from "@/discovery";
import { errorMessage, isRetryableKind } from "@/failures";
import { withContext } from "@/logger";
import { analyzeFailures, toFailureRecord, toRetryFileRecord, toSuccessRecord } from "@/output";
import type { RetryQueue } from "@/retry";
import { RequestThrottle, sleep } from "./requestThrottle";
import type { SleepFn } from "./requestThrottle";
import { createRunContext } from "./runContext";
import type { RunContext } from "./runContext";

export type DiscoveryRunnerOptions = {
  orchestrator: Pick<DiscoveryOrchestrator, "discover">;
  queue: RetryQueue;
  sink: ResultSink;
  /** Request function shared by all workers (default: native fetch client) */
  http?: HttpRequestFn;
  maxWorkers?: number;
  requestDelayMs?: number;
  requestTimeoutMs?: number;
  rateLimitCooldownMs?: number;
  context?: RunContext;
  sleep?: SleepFn;
};

function emptyCounters(total: number): RunCounters {
  return {
    total,
    dispatched: 0,
    succeeded: 0,
    failed: 0,
    retried: 0,
    exhausted: 0,
    rateLimited: 0,
    skipped: 0,
    jobUrls: 0,
  };
}

/**
 * Run discovery for every site
 *
 * @returns Run summary; the run context's stop signal tells why it stopped early
 */
export async function runDiscovery(
  sites: readonly Site[],
  options: DiscoveryRunnerOptions,
): Promise<RunSummary> {
  const ctx = options.context ?? createRunContext();
  const maxWorkers = options.maxWorkers ?? DEFAULT_MAX_WORKERS;
  const requestDelayMs = options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS;
  const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const rateLimitCooldownMs = options.rateLimitCooldownMs ?? DEFAULT_RATE_LIMIT_COOLDOWN_MS;
  const http = options.http ?? httpRequest;
  const { orchestrator, queue, sink } = options;

  const counters = emptyCounters(sites.length);
  const skipped: number[] = [];
  const failures: FailureRecord[] = [];

  const recordFailure = (record: FailureRecord): void => {
    sink.failure(record);
    failures.push(record);
  };

  // Free worker slots; p-limit guarantees one is available per running task
  const slots = Array.from({ length: maxWorkers }, (_, index) => ({
    index,
    throttle: new RequestThrottle(requestDelayMs, options.sleep ?? sleep),
  }));

  ctx.logger.info("Discovery run started", {
    runId: ctx.runId,
    sites: sites.length,
    maxWorkers,
    requestDelayMs,
  });

  const route = (site: Site, outcome: DiscoveryOutcome, log: StrategyContext["logger"]): void => {
    const now = ctx.now();

    switch (outcome.status) {
      case "success":
        sink.success(toSuccessRecord(site, outcome));
        queue.remove(site);
        counters.succeeded++;
        counters.jobUrls += outcome.jobUrls.length;
        return;

      case "failure": {
        if (!isRetryableKind(outcome.kind)) {
          recordFailure(toFailureRecord(site, outcome.kind, outcome.message, outcome.httpStatus, now));
          queue.remove(site);
          counters.failed++;
          return;
        }

        const result = queue.enqueue(site, outcome.kind, now, {
          message: outcome.message,
          httpStatus: outcome.httpStatus,
        });
        if (result.status === "scheduled") {
          sink.retry(toRetryFileRecord(result.record));
          counters.retried++;
        } else if (result.status === "exhausted") {
          recordFailure(
            toFailureRecord(
              site,
              "retries_exhausted",
              `Retries exhausted after ${result.record.failureCount - 1} attempts: ${outcome.message}`,
              outcome.httpStatus,
              now,
            ),
          );
          counters.failed++;
          counters.exhausted++;
        } else {
          log.warn("Retry not scheduled", { reason: result.reason, kind: outcome.kind });
        }
        return;
      }

      case "rate_limited": {
        counters.rateLimited++;
        const result = queue.enqueue(site, "rate_limited", now, {
          message: outcome.message,
          httpStatus: outcome.httpStatus,
          retryAfterMs: outcome.retryAfterMs,
        });
        if (result.status === "scheduled") {
          sink.retry(toRetryFileRecord(result.record));
        }
        if (ctx.stop.trip("rate_limited", site)) {
          log.warn("Rate limiting detected; halting dispatch of new sites", {
            httpStatus: outcome.httpStatus,
            retryAfterMs: outcome.retryAfterMs,
          });
        }
        return;
      }
    }
  };

  const processSite = async (site: Site, position: number): Promise<void> => {
    if (ctx.stop.tripped) {
      skipped.push(position);
      return;
    }

    const slot = slots.pop();
    if (!slot) {
      throw new Error("No free worker slot; pool size and limiter disagree");
    }

    const log = withContext({ company: site.company, careerUrl: site.careerUrl, worker: slot.index }, ctx.logger);
    const strategyCtx: StrategyContext = {
      fetch: slot.throttle.wrap(http, requestTimeoutMs),
      logger: log,
      rateLimitCooldownMs,
    };

    counters.dispatched++;
    try {
      const outcome = await orchestrator.discover(site, strategyCtx);
      try {
        route(site, outcome, log);
      } catch (err) {
        log.error("Failed to record outcome", { status: outcome.status, error: errorMessage(err) });
        recordFailure(toFailureRecord(site, "unexpected_error", errorMessage(err), null, ctx.now()));
        counters.failed++;
      }
    } finally {
      slots.push(slot);
    }
  };

  const limit = pLimit(maxWorkers);
  await Promise.all(sites.map((site, position) => limit(() => processSite(site, position))));

  skipped.sort((a, b) => a - b);
  for (const position of skipped) {
    sink.pending(sites[position]);
  }
  counters.skipped = skipped.length;

  const summary: RunSummary = {
    ...counters,
    failureBreakdown: analyzeFailures(failures),
    stopReason: ctx.stop.reason,
    stoppedBy: ctx.stop.site,
    startedAt: ctx.startedAt.toISOString(),
    finishedAt: ctx.now().toISOString(),
  };

  ctx.logger.info("Discovery run finished", { runId: ctx.runId, ...summary });
  return summary;
}
