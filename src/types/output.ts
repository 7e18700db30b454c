/**
 * Result sink type definitions
 */

import type { FailureRecord, RetryFileRecord, SuccessRecord } from "./records";
import type { RunSummary } from "./runner";
import type { Site } from "./site";

/**
 * Destination of per-site records produced by a run
 *
 * Writes are synchronous: a record is complete on disk once the call returns.
 */
export interface ResultSink {
  success(record: SuccessRecord): void;
  failure(record: FailureRecord): void;
  retry(record: RetryFileRecord): void;
  /** Site never dispatched because the run stopped early */
  pending(site: Site): void;
  close(summary: RunSummary): void;
}
