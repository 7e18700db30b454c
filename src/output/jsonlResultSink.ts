/**
 * JSON Lines result sink
 *
 * One complete JSON object per line, appended synchronously. Files are
 * created on first write; the run summary is written on close.
 *
 * Layout under outputDir:
 *   job_urls_<ts>.jsonl
 *   failures/failures_<ts>.jsonl
 *   retries/retries_<ts>.jsonl
 *   retries/pending_<ts>.txt
 *   run_summary_<ts>.json
 */

import { appendFileSync, mkdirSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import type {
  FailureRecord,
  ResultSink,
  RetryFileRecord,
  RunSummary,
  Site,
  SuccessRecord,
} from "@/types";
import { OUTPUT_FILES } from "@/constants";
import { toPendingLine } from "./records";

/**
 * UTC file-name timestamp: YYYYMMDD_HHMMSS
 */
export function formatFileTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export type JsonlResultSinkPaths = {
  success: string;
  failure: string;
  retry: string;
  pending: string;
  summary: string;
};

export class JsonlResultSink implements ResultSink {
  readonly paths: JsonlResultSinkPaths;
  private readonly created = new Set<string>();
  private readonly counts = new Map<string, number>();

  constructor(outputDir: string, startedAt: Date = new Date()) {
    const ts = formatFileTimestamp(startedAt);
    this.paths = {
      success: join(outputDir, `${OUTPUT_FILES.SUCCESS_PREFIX}_${ts}.jsonl`),
      failure: join(outputDir, OUTPUT_FILES.FAILURE_DIR, `${OUTPUT_FILES.FAILURE_PREFIX}_${ts}.jsonl`),
      retry: join(outputDir, OUTPUT_FILES.RETRY_DIR, `${OUTPUT_FILES.RETRY_PREFIX}_${ts}.jsonl`),
      pending: join(outputDir, OUTPUT_FILES.RETRY_DIR, `${OUTPUT_FILES.PENDING_PREFIX}_${ts}.txt`),
      summary: join(outputDir, `${OUTPUT_FILES.SUMMARY_PREFIX}_${ts}.json`),
    };
  }

  success(record: SuccessRecord): void {
    this.appendLine(this.paths.success, JSON.stringify(record));
  }

  failure(record: FailureRecord): void {
    this.appendLine(this.paths.failure, JSON.stringify(record));
  }

  retry(record: RetryFileRecord): void {
    this.appendLine(this.paths.retry, JSON.stringify(record));
  }

  pending(site: Site): void {
    this.appendLine(this.paths.pending, toPendingLine(site));
  }

  close(summary: RunSummary): void {
    const files: Record<string, number> = {};
    for (const [path, lines] of this.counts) {
      files[path] = lines;
    }
    mkdirSync(dirname(this.paths.summary), { recursive: true });
    writeFileSync(this.paths.summary, JSON.stringify({ ...summary, files }, null, 2) + "\n", "utf-8");
  }

  /**
   * Files written so far, in creation order
   */
  writtenFiles(): string[] {
    return [...this.created];
  }

  private appendLine(path: string, line: string): void {
    if (!this.created.has(path)) {
      mkdirSync(dirname(path), { recursive: true });
      this.created.add(path);
    }
    appendFileSync(path, line + "\n", "utf-8");
    this.counts.set(path, (this.counts.get(path) ?? 0) + 1);
  }
}
