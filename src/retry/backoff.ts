/**
 * Retry backoff schedule
 */

import type { BackoffFn } from "@/types";
import { BACKOFF_STEPS_MINUTES } from "@/constants";

/**
 * Delay before the given attempt (1-based): 5, 10, 20, 40, 80 minutes,
 * then 80 minutes for every later attempt
 */
export const backoff: BackoffFn = (attempt) => {
  const index = Math.min(Math.max(Math.floor(attempt), 1), BACKOFF_STEPS_MINUTES.length) - 1;
  return BACKOFF_STEPS_MINUTES[index] * 60_000;
};
