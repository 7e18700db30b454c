/**
 * Discovery runner type definitions
 */

import type { EXIT_CODES } from "@/constants";
import type { FailureKind } from "./failures";
import type { Site } from "./site";

/**
 * Why dispatch of new Sites stopped early
 */
export type StopReason = "rate_limited" | "interrupted";

export type RunCounters = {
  /** Sites handed to the runner */
  total: number;
  /** Sites a worker started */
  dispatched: number;
  succeeded: number;
  /** Permanent failures, including exhausted retries */
  failed: number;
  /** Retryable failures scheduled in the retry queue */
  retried: number;
  /** Retryable failures converted to retries_exhausted */
  exhausted: number;
  rateLimited: number;
  /** Sites never dispatched because the run was stopped */
  skipped: number;
  /** Total job URLs across successful Sites */
  jobUrls: number;
};

/**
 * Breakdown of the failure records written during a run
 */
export type FailureBreakdown = {
  byKind: Partial<Record<FailureKind, number>>;
  /** Keyed by status code; records without a status are left out */
  byHttpStatus: Record<string, number>;
  /** Human-readable notes on dominant failure kinds */
  patterns: string[];
};

export type RunSummary = RunCounters & {
  failureBreakdown: FailureBreakdown;
  stopReason: StopReason | null;
  /** Site whose outcome tripped the stop signal */
  stoppedBy: Site | null;
  startedAt: string;
  finishedAt: string;
};

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
