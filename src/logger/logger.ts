/**
 * Micro-logger: leveled console logging with structured meta
 * Wraps console.*; level read from LOG_LEVEL (default 'info')
 */

import type { Logger, LogLevel } from "@/types";
import { LOG_LEVELS } from "@/constants";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";
const currentLevelValue = LOG_LEVELS[currentLevel];

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }

  const timestamp = new Date().toISOString();
  const line = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function debug(message: string, meta?: Record<string, unknown>): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: Record<string, unknown>): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: Record<string, unknown>): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: Record<string, unknown>): void {
  log("error", message, meta);
}

/**
 * Default logger (module functions as a Logger object)
 */
export const rootLogger: Logger = { debug, info, warn, error };

/**
 * Create a logger with bound context (merged into the meta of every call)
 *
 * @example
 *   const siteLog = withContext({ site: "https://acme.avature.net" });
 *   siteLog.info("Sitemap fetched", { urls: 12 });
 */
export function withContext(context: Record<string, unknown>, base: Logger = rootLogger): Logger {
  return {
    debug: (message, meta) => base.debug(message, { ...context, ...meta }),
    info: (message, meta) => base.info(message, { ...context, ...meta }),
    warn: (message, meta) => base.warn(message, { ...context, ...meta }),
    error: (message, meta) => base.error(message, { ...context, ...meta }),
  };
}
