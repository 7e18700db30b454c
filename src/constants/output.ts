/**
 * Output file constants
 */

import type { FailureKind } from "@/types";

export const OUTPUT_FILES = {
  SUCCESS_PREFIX: "job_urls",
  FAILURE_DIR: "failures",
  FAILURE_PREFIX: "failures",
  RETRY_DIR: "retries",
  RETRY_PREFIX: "retries",
  PENDING_PREFIX: "pending",
  SUMMARY_PREFIX: "run_summary",
};

/**
 * Maximum length of an error message written to records
 */
export const ERROR_MESSAGE_MAX_LENGTH = 500;

/**
 * Failure shares that flag a pattern in the run summary (share must exceed
 * the threshold)
 */
export const FAILURE_PATTERN_RULES = [
  { kind: "not_found", threshold: 0.3, label: "High 404 rate", hint: "career URLs may be stale or invalid" },
  { kind: "access_forbidden", threshold: 0.2, label: "High 403 rate", hint: "possible access restrictions" },
  { kind: "timeout", threshold: 0.1, label: "High timeout rate", hint: "servers may be slow" },
] as const satisfies readonly { kind: FailureKind; threshold: number; label: string; hint: string }[];
