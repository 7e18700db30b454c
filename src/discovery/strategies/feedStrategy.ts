/**
 * Feed strategy: job URLs from the ATS RSS/Atom feed
 *
 * Feeds only carry recently published postings.
 */

import type {
  AtsProfile,
  DiscoveryOutcome,
  DiscoveryStrategy,
  Site,
  StrategyContext,
} from "@/types";
import { AVATURE_PROFILE } from "@/constants";
import { parseFeed } from "../parsers";
import { careerPath, dedupeJobUrls, isJobUrl } from "../urlUtils";
import { fetchDocument, outcomeFromError, successOutcome } from "../fetchDocument";

export class FeedStrategy implements DiscoveryStrategy {
  readonly method = "feed";

  constructor(private readonly profile: AtsProfile = AVATURE_PROFILE) {}

  /**
   * Try each feed path in order; the first parseable feed wins
   *
   * @returns Success, the rate-limited outcome of any path, or the failure of
   * the last path tried
   */
  async attempt(site: Site, ctx: StrategyContext): Promise<DiscoveryOutcome> {
    let lastFailure: DiscoveryOutcome | null = null;

    for (const path of this.profile.feedPaths) {
      const feedUrl = careerPath(site.careerUrl, path);
      const fetched = await fetchDocument(feedUrl, this.method, ctx);
      if (!fetched.ok) {
        if (fetched.outcome.status === "rate_limited") {
          return fetched.outcome;
        }
        lastFailure = fetched.outcome;
        continue;
      }

      let links: string[];
      try {
        links = parseFeed(fetched.response.body, feedUrl);
      } catch (err) {
        lastFailure = outcomeFromError(err, this.method, ctx);
        continue;
      }

      const jobUrls = dedupeJobUrls(links.filter((link) => isJobUrl(link, this.profile.jobUrlPattern)));
      ctx.logger.debug("Feed parsed", { feedUrl, entries: links.length, jobUrls: jobUrls.length });
      return successOutcome(this.method, jobUrls);
    }

    return (
      lastFailure ?? {
        status: "failure",
        kind: "not_found",
        message: "No feed paths configured",
        httpStatus: null,
        method: this.method,
      }
    );
  }
}
