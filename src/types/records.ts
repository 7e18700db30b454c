/**
 * Output record type definitions (JSON Lines, snake_case on the wire)
 */

import type { DiscoveryMethod } from "./discovery";
import type { FailureKind } from "./failures";

export type SuccessRecord = {
  career_url: string;
  company: string;
  extraction_method: DiscoveryMethod;
  job_urls_count: number;
  job_urls: string[];
  /** Present when the listing announced a total */
  expected_job_count?: number;
  timestamp: string;
};

export type FailureRecord = {
  career_url: string;
  company: string;
  error_type: FailureKind;
  error_message: string;
  http_status: number | null;
  timestamp: string;
};

export type RetryFileRecord = {
  career_url: string;
  company: string;
  error_type: FailureKind;
  error_message: string;
  http_status: number | null;
  timestamp: string;
  /** Attempt number of the pending retry (1 for the first retry) */
  attempt: number;
  /** ISO 8601 timestamp before which the site should not be retried */
  next_eligible_at: string;
};
