/**
 * Process exit code of a finished run
 */

import type { ExitCode, RunSummary } from "@/types";
import { EXIT_CODES } from "@/constants";

/**
 * - 130: interrupted by the user
 * - 2: rate limiting detected, dispatch halted
 * - 1: at least one site failed or was scheduled for retry
 * - 0: every site processed without error
 */
export function exitCodeFor(summary: RunSummary): ExitCode {
  if (summary.stopReason === "interrupted") {
    return EXIT_CODES.INTERRUPTED;
  }
  if (summary.stopReason === "rate_limited") {
    return EXIT_CODES.RATE_LIMITED;
  }
  if (summary.failed > 0 || summary.retried > 0 || summary.rateLimited > 0) {
    return EXIT_CODES.PARTIAL_FAILURE;
  }
  return EXIT_CODES.OK;
}
