/**
 * Run context: per-run state shared by all workers
 */

import { randomUUID } from "crypto";
import type { Logger, Site, StopReason } from "@/types";
import { rootLogger } from "@/logger";

/**
 * One-way stop flag. The first trip wins; later trips are ignored.
 */
export class StopSignal {
  private state: { reason: StopReason; site: Site | null } | null = null;

  /**
   * @returns true if this call tripped the signal
   */
  trip(reason: StopReason, site: Site | null = null): boolean {
    if (this.state) {
      return false;
    }
    this.state = { reason, site };
    return true;
  }

  get tripped(): boolean {
    return this.state !== null;
  }

  get reason(): StopReason | null {
    return this.state?.reason ?? null;
  }

  get site(): Site | null {
    return this.state?.site ?? null;
  }
}

export type RunContext = {
  runId: string;
  startedAt: Date;
  stop: StopSignal;
  logger: Logger;
  now: () => Date;
};

export function createRunContext(
  options: { logger?: Logger; now?: () => Date } = {},
): RunContext {
  const now = options.now ?? (() => new Date());
  return {
    runId: randomUUID(),
    startedAt: now(),
    stop: new StopSignal(),
    logger: options.logger ?? rootLogger,
    now,
  };
}

/**
 * Trip the stop signal on SIGINT; a second SIGINT exits immediately
 *
 * @returns Function removing the handler
 */
export function installInterruptHandler(ctx: RunContext, exitCode: number): () => void {
  const onSigint = (): void => {
    if (ctx.stop.trip("interrupted")) {
      ctx.logger.warn("Interrupt received; finishing in-flight sites (Ctrl+C again to abort)");
      return;
    }
    ctx.logger.error("Second interrupt received; aborting");
    process.exit(exitCode);
  };

  process.on("SIGINT", onSigint);
  return () => {
    process.off("SIGINT", onSigint);
  };
}
