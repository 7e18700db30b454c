/**
 * Request throttle: minimum spacing between requests of one worker slot
 */

import type { HttpRequestFn } from "@/types";

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RequestThrottle {
  private lastRequestAt: number | null = null;

  constructor(
    private readonly delayMs: number,
    private readonly sleepFn: SleepFn = sleep,
    private readonly clock: () => number = Date.now,
  ) {}

  /**
   * Wait until `delayMs` has passed since this slot's previous request
   */
  async waitForTurn(): Promise<void> {
    if (this.lastRequestAt !== null && this.delayMs > 0) {
      const elapsed = this.clock() - this.lastRequestAt;
      if (elapsed < this.delayMs) {
        await this.sleepFn(this.delayMs - elapsed);
      }
    }
    this.lastRequestAt = this.clock();
  }

  /**
   * Wrap a request function so every call waits for its turn and carries
   * the per-request timeout
   */
  wrap(request: HttpRequestFn, timeoutMs: number): HttpRequestFn {
    return async (req) => {
      await this.waitForTurn();
      return request({ ...req, timeoutMs: req.timeoutMs ?? timeoutMs });
    };
  }
}
