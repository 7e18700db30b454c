/**
 * Discovery runner constants
 */

/**
 * Parallel worker slots
 */
export const DEFAULT_MAX_WORKERS = 3;

/**
 * Minimum delay between successive requests of one worker (milliseconds)
 */
export const DEFAULT_REQUEST_DELAY_MS = 1_000;

/**
 * Process exit codes
 *
 * - OK: every site processed without error
 * - PARTIAL_FAILURE: some sites failed or were scheduled for retry
 * - RATE_LIMITED: throttling detected, dispatch halted, retry file written
 * - INTERRUPTED: user interrupt (SIGINT)
 */
export const EXIT_CODES = {
  OK: 0,
  PARTIAL_FAILURE: 1,
  RATE_LIMITED: 2,
  INTERRUPTED: 130,
} as const;
