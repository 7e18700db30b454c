/**
 * Record mappers: outcomes and retry records to their JSON Lines shape
 */

import type {
  DiscoverySuccess,
  FailureKind,
  FailureRecord,
  RetryFileRecord,
  RetryRecord,
  Site,
  SuccessRecord,
} from "@/types";
import { ERROR_MESSAGE_MAX_LENGTH } from "@/constants";

function truncateMessage(message: string): string {
  return message.length > ERROR_MESSAGE_MAX_LENGTH
    ? message.substring(0, ERROR_MESSAGE_MAX_LENGTH) + "..."
    : message;
}

export function toSuccessRecord(site: Site, outcome: DiscoverySuccess): SuccessRecord {
  return {
    career_url: site.careerUrl,
    company: site.company,
    extraction_method: outcome.method,
    job_urls_count: outcome.jobUrls.length,
    job_urls: outcome.jobUrls,
    ...(outcome.expectedCount === undefined ? {} : { expected_job_count: outcome.expectedCount }),
    timestamp: outcome.discoveredAt,
  };
}

export function toFailureRecord(
  site: Site,
  kind: FailureKind,
  message: string,
  httpStatus: number | null,
  timestamp: Date,
): FailureRecord {
  return {
    career_url: site.careerUrl,
    company: site.company,
    error_type: kind,
    error_message: truncateMessage(message),
    http_status: httpStatus,
    timestamp: timestamp.toISOString(),
  };
}

/**
 * Retry file record of a scheduled retry (timestamp = latest failure)
 */
export function toRetryFileRecord(record: RetryRecord): RetryFileRecord {
  return {
    career_url: record.site.careerUrl,
    company: record.site.company,
    error_type: record.kind,
    error_message: truncateMessage(record.lastMessage ?? ""),
    http_status: record.httpStatus,
    timestamp: record.lastFailedAt,
    attempt: record.attempt,
    next_eligible_at: record.nextEligibleAt,
  };
}

/**
 * Pending-site line in the `Company|URL` input format
 */
export function toPendingLine(site: Site): string {
  return `${site.company}|${site.careerUrl}`;
}
