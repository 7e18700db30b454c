/**
 * Retry queue constants
 */

/**
 * Backoff steps in minutes, indexed by attempt - 1.
 * Attempts past the table reuse the last step.
 */
export const BACKOFF_STEPS_MINUTES = [5, 10, 20, 40, 80];

/**
 * Retryable failures allowed per site before it becomes retries_exhausted
 */
export const DEFAULT_MAX_RETRY_ATTEMPTS = 3;
