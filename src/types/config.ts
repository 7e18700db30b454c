/**
 * Pipeline configuration type definitions
 */

import type { EmptyResultPolicy } from "./discovery";

/**
 * Resolved pipeline configuration (durations in milliseconds)
 */
export type PipelineConfig = {
  maxWorkers: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
  maxRetryAttempts: number;
  rateLimitCooldownMs: number;
  maxPages: number;
  emptyResultPolicy: EmptyResultPolicy;
  outputDir: string;
  dbPath: string;
};

/**
 * Configuration as written by a user (CLI flags), in the units they use
 */
export type PipelineConfigOverrides = {
  maxWorkers?: number;
  requestDelaySeconds?: number;
  requestTimeoutSeconds?: number;
  maxRetryAttempts?: number;
  rateLimitCooldownMinutes?: number;
  maxPages?: number;
  emptyResultPolicy?: EmptyResultPolicy;
  outputDir?: string;
  dbPath?: string;
};
