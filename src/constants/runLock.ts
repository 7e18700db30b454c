/**
 * Run lock constants
 *
 * Configuration for the run lock (prevents two runs sharing one retry queue).
 */

/**
 * Run lock name (single lock for the whole system)
 */
export const RUN_LOCK_NAME = "discovery";

/**
 * Lock TTL in seconds
 * After this time, a stale lock can be taken over by another process.
 * Default: 2 hours
 */
export const RUN_LOCK_TTL_SECONDS = 7200;
