/**
 * Pipeline run: one locked discovery run from a list of sites to output files
 *
 * Expects the database to be open and migrated (see @/db).
 */

import { randomUUID } from "crypto";
import type {
  ExitCode,
  HttpRequestFn,
  PipelineConfig,
  ResultSink,
  RunSummary,
  Site,
} from "@/types";
import { acquireRunLock, releaseRunLock } from "@/db";
import { DiscoveryOrchestrator } from "@/discovery";
import { JsonlResultSink } from "@/output";
import { RetryQueue } from "@/retry";
import { runDiscovery } from "./discoveryRunner";
import type { DiscoveryRunnerOptions } from "./discoveryRunner";
import { exitCodeFor } from "./exitCodes";
import { createRunContext } from "./runContext";
import type { RunContext } from "./runContext";
import type { SleepFn } from "./requestThrottle";

export type PipelineRunOptions = {
  config: PipelineConfig;
  http?: HttpRequestFn;
  context?: RunContext;
  sleep?: SleepFn;
  /** Sink override (default: JSON Lines files under config.outputDir) */
  sink?: ResultSink;
  orchestrator?: DiscoveryRunnerOptions["orchestrator"];
  queue?: RetryQueue;
};

export type PipelineRunResult = {
  summary: RunSummary;
  exitCode: ExitCode;
};

/**
 * Error raised when another run holds the run lock
 */
export class RunLockedError extends Error {
  constructor(reason: string) {
    super(`Run lock not acquired (${reason}); another discovery run may be active`);
    this.name = "RunLockedError";
  }
}

/**
 * Run discovery for the given sites under the run lock
 *
 * @throws {RunLockedError} When another run holds the lock
 */
export async function runPipeline(
  sites: readonly Site[],
  options: PipelineRunOptions,
): Promise<PipelineRunResult> {
  const { config } = options;
  const ctx = options.context ?? createRunContext();
  const ownerId = randomUUID();

  const lock = acquireRunLock(ownerId);
  if (!lock.ok) {
    throw new RunLockedError(lock.reason);
  }

  try {
    const sink = options.sink ?? new JsonlResultSink(config.outputDir, ctx.startedAt);
    const queue =
      options.queue ??
      new RetryQueue({
        maxAttempts: config.maxRetryAttempts,
        rateLimitCooldownMs: config.rateLimitCooldownMs,
        logger: ctx.logger,
      });
    const orchestrator =
      options.orchestrator ??
      new DiscoveryOrchestrator({
        emptyResultPolicy: config.emptyResultPolicy,
        maxPages: config.maxPages,
      });

    const summary = await runDiscovery(sites, {
      orchestrator,
      queue,
      sink,
      http: options.http,
      maxWorkers: config.maxWorkers,
      requestDelayMs: config.requestDelayMs,
      requestTimeoutMs: config.requestTimeoutMs,
      rateLimitCooldownMs: config.rateLimitCooldownMs,
      context: ctx,
      sleep: options.sleep,
    });

    sink.close(summary);
    const exitCode = exitCodeFor(summary);

    if (summary.stopReason === "rate_limited") {
      ctx.logger.warn("Run halted by rate limiting; resume later with the retry command", {
        pending: summary.skipped,
        stoppedBy: summary.stoppedBy?.careerUrl,
      });
    }

    return { summary, exitCode };
  } finally {
    releaseRunLock(ownerId);
  }
}
