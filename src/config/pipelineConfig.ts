/**
 * Pipeline configuration: defaults, environment (.env) and CLI overrides
 *
 * Precedence: overrides > environment > defaults. Values are validated with zod
 * and durations converted to milliseconds.
 */

import "dotenv/config";
import { z } from "zod";
import type { PipelineConfig, PipelineConfigOverrides } from "@/types";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_RETRY_ATTEMPTS,
  DEFAULT_MAX_WORKERS,
  DEFAULT_RATE_LIMIT_COOLDOWN_MS,
  DEFAULT_REQUEST_DELAY_MS,
  DISCOVERY_LIMITS,
} from "@/constants";
import { ConfigError } from "./configError";

/**
 * Environment variable backing each option
 */
export const CONFIG_ENV_VARS: Record<keyof PipelineConfigOverrides, string> = {
  maxWorkers: "DISCOVERY_MAX_WORKERS",
  requestDelaySeconds: "DISCOVERY_REQUEST_DELAY_SECONDS",
  requestTimeoutSeconds: "DISCOVERY_REQUEST_TIMEOUT_SECONDS",
  maxRetryAttempts: "DISCOVERY_MAX_RETRY_ATTEMPTS",
  rateLimitCooldownMinutes: "DISCOVERY_RATE_LIMIT_COOLDOWN_MINUTES",
  maxPages: "DISCOVERY_MAX_PAGES",
  emptyResultPolicy: "DISCOVERY_EMPTY_RESULT_POLICY",
  outputDir: "DISCOVERY_OUTPUT_DIR",
  dbPath: "DB_PATH",
};

const configSchema = z.object({
  maxWorkers: z.coerce.number().int().min(1).max(64).default(DEFAULT_MAX_WORKERS),
  requestDelaySeconds: z.coerce
    .number()
    .min(0)
    .default(DEFAULT_REQUEST_DELAY_MS / 1000),
  requestTimeoutSeconds: z.coerce
    .number()
    .positive()
    .default(DEFAULT_HTTP_TIMEOUT_MS / 1000),
  maxRetryAttempts: z.coerce.number().int().min(1).default(DEFAULT_MAX_RETRY_ATTEMPTS),
  rateLimitCooldownMinutes: z.coerce
    .number()
    .positive()
    .default(DEFAULT_RATE_LIMIT_COOLDOWN_MS / 60_000),
  maxPages: z.coerce.number().int().min(1).default(DISCOVERY_LIMITS.DEFAULT_MAX_PAGES),
  emptyResultPolicy: z.enum(["accept", "reject"]).default("accept"),
  outputDir: z.string().min(1).default("output"),
  dbPath: z.string().min(1).default("data/discovery.db"),
});

/**
 * Read the options present in the environment (empty strings count as unset)
 */
function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [option, variable] of Object.entries(CONFIG_ENV_VARS)) {
    const raw = env[variable]?.trim();
    if (raw) {
      values[option] = raw;
    }
  }
  return values;
}

/**
 * Drop undefined override values so they do not mask environment values
 */
function definedOnly(overrides: PipelineConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
}

/**
 * Load and validate the pipeline configuration
 *
 * @param overrides - Values from CLI flags (take precedence)
 * @param env - Environment to read (defaults to process.env)
 * @throws {ConfigError} When any value is out of range or malformed
 */
export function loadPipelineConfig(
  overrides: PipelineConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  const result = configSchema.safeParse({
    ...readEnv(env),
    ...definedOnly(overrides),
  });

  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    const issues: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(fieldErrors)) {
      if (messages && messages.length > 0) {
        issues[field] = messages;
      }
    }
    const summary = Object.entries(issues)
      .map(([field, messages]) => `${field}: ${messages.join(", ")}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${summary}`, issues);
  }

  const values = result.data;
  return {
    maxWorkers: values.maxWorkers,
    requestDelayMs: Math.round(values.requestDelaySeconds * 1000),
    requestTimeoutMs: Math.round(values.requestTimeoutSeconds * 1000),
    maxRetryAttempts: values.maxRetryAttempts,
    rateLimitCooldownMs: Math.round(values.rateLimitCooldownMinutes * 60_000),
    maxPages: values.maxPages,
    emptyResultPolicy: values.emptyResultPolicy,
    outputDir: values.outputDir,
    dbPath: values.dbPath,
  };
}
