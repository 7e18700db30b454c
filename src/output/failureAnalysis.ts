/**
 * Failure analysis: per-kind and per-status counts for the run summary
 */

import type { FailureBreakdown, FailureRecord } from "@/types";
import { FAILURE_PATTERN_RULES } from "@/constants";

const formatShare = (share: number): string => `${(share * 100).toFixed(1)}%`;

export function analyzeFailures(records: readonly FailureRecord[]): FailureBreakdown {
  const byKind: FailureBreakdown["byKind"] = {};
  const byHttpStatus: Record<string, number> = {};

  for (const record of records) {
    byKind[record.error_type] = (byKind[record.error_type] ?? 0) + 1;
    if (record.http_status !== null) {
      const status = String(record.http_status);
      byHttpStatus[status] = (byHttpStatus[status] ?? 0) + 1;
    }
  }

  const patterns: string[] = [];
  for (const rule of FAILURE_PATTERN_RULES) {
    const share = records.length === 0 ? 0 : (byKind[rule.kind] ?? 0) / records.length;
    if (share > rule.threshold) {
      patterns.push(`${rule.label} (${formatShare(share)}): ${rule.hint}`);
    }
  }

  return { byKind, byHttpStatus, patterns };
}
