/**
 * Discovery orchestrator: runs strategies in order until one yields job URLs
 *
 * - non-empty success: returned immediately
 * - rate_limited: returned immediately, never masked by a fallback
 * - failure or empty success: next strategy
 *
 * With no job URLs at the end, an empty success is returned under the
 * "accept" policy and becomes a parse_error under "reject"; a chain that
 * only failed returns its last failure.
 */

import type {
  AtsProfile,
  DiscoveryFailure,
  DiscoveryOutcome,
  DiscoveryStrategy,
  DiscoverySuccess,
  EmptyResultPolicy,
  Site,
  StrategyContext,
} from "@/types";
import { AVATURE_PROFILE } from "@/constants";
import { errorMessage } from "@/failures";
import { FeedStrategy, HtmlPaginationStrategy, SitemapStrategy } from "./strategies";

export type DiscoveryOrchestratorOptions = {
  /** Strategies in priority order (default: sitemap, feed, html_pagination) */
  strategies?: DiscoveryStrategy[];
  emptyResultPolicy?: EmptyResultPolicy;
  profile?: AtsProfile;
  maxPages?: number;
  maxChildSitemaps?: number;
};

/**
 * Default strategy chain for an ATS profile
 */
export function createDefaultStrategies(
  profile: AtsProfile = AVATURE_PROFILE,
  options: { maxPages?: number; maxChildSitemaps?: number } = {},
): DiscoveryStrategy[] {
  return [
    new SitemapStrategy(profile, { maxChildSitemaps: options.maxChildSitemaps }),
    new FeedStrategy(profile),
    new HtmlPaginationStrategy(profile, { maxPages: options.maxPages }),
  ];
}

export class DiscoveryOrchestrator {
  private readonly strategies: DiscoveryStrategy[];
  private readonly emptyResultPolicy: EmptyResultPolicy;

  constructor(options: DiscoveryOrchestratorOptions = {}) {
    this.strategies =
      options.strategies ??
      createDefaultStrategies(options.profile, {
        maxPages: options.maxPages,
        maxChildSitemaps: options.maxChildSitemaps,
      });
    this.emptyResultPolicy = options.emptyResultPolicy ?? "accept";

    if (this.strategies.length === 0) {
      throw new Error("DiscoveryOrchestrator requires at least one strategy");
    }
  }

  /**
   * Discover job URLs for one site. Never throws.
   */
  async discover(site: Site, ctx: StrategyContext): Promise<DiscoveryOutcome> {
    let lastFailure: DiscoveryFailure | null = null;
    let lastEmpty: DiscoverySuccess | null = null;

    for (const strategy of this.strategies) {
      let outcome: DiscoveryOutcome;
      try {
        outcome = await strategy.attempt(site, ctx);
      } catch (err) {
        ctx.logger.error("Strategy threw unexpectedly", {
          method: strategy.method,
          error: errorMessage(err),
        });
        outcome = {
          status: "failure",
          kind: "unexpected_error",
          message: errorMessage(err),
          httpStatus: null,
          method: strategy.method,
        };
      }

      switch (outcome.status) {
        case "success":
          if (outcome.jobUrls.length > 0) {
            ctx.logger.info("Job URLs discovered", {
              method: outcome.method,
              jobUrls: outcome.jobUrls.length,
            });
            return outcome;
          }
          ctx.logger.debug("Strategy found no job URLs", { method: strategy.method });
          lastEmpty = outcome;
          break;
        case "rate_limited":
          ctx.logger.warn("Rate limit detected", {
            method: strategy.method,
            httpStatus: outcome.httpStatus,
            retryAfterMs: outcome.retryAfterMs,
          });
          return outcome;
        case "failure":
          ctx.logger.debug("Strategy failed", {
            method: strategy.method,
            kind: outcome.kind,
            httpStatus: outcome.httpStatus,
          });
          lastFailure = outcome;
          break;
      }
    }

    if (lastEmpty) {
      if (this.emptyResultPolicy === "accept") {
        return lastEmpty;
      }
      return {
        status: "failure",
        kind: "parse_error",
        message: "no job entries discovered",
        httpStatus: null,
        method: lastEmpty.method,
      };
    }
    if (lastFailure) {
      return lastFailure;
    }
    return {
      status: "failure",
      kind: "unexpected_error",
      message: "no discovery strategy produced an outcome",
      httpStatus: null,
    };
  }
}
