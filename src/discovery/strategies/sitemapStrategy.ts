/**
 * Sitemap strategy: job URLs from <root>/sitemap.xml
 *
 * Sitemap indexes are followed one level deep.
 */

import type {
  AtsProfile,
  DiscoveryFailure,
  DiscoveryOutcome,
  DiscoveryRateLimited,
  DiscoveryStrategy,
  Site,
  StrategyContext,
} from "@/types";
import { AVATURE_PROFILE, DISCOVERY_LIMITS } from "@/constants";
import { parseSitemap } from "../parsers";
import type { ParsedSitemap } from "../parsers";
import { careerPath, dedupeJobUrls, isJobUrl } from "../urlUtils";
import { fetchDocument, outcomeFromError, successOutcome } from "../fetchDocument";

export type SitemapStrategyOptions = {
  /** Child sitemaps fetched from a sitemap index */
  maxChildSitemaps?: number;
};

type LoadResult =
  | { ok: true; sitemap: ParsedSitemap }
  | { ok: false; outcome: DiscoveryFailure | DiscoveryRateLimited };

export class SitemapStrategy implements DiscoveryStrategy {
  readonly method = "sitemap";
  private readonly maxChildSitemaps: number;

  constructor(
    private readonly profile: AtsProfile = AVATURE_PROFILE,
    options: SitemapStrategyOptions = {},
  ) {
    this.maxChildSitemaps = options.maxChildSitemaps ?? DISCOVERY_LIMITS.MAX_CHILD_SITEMAPS;
  }

  async attempt(site: Site, ctx: StrategyContext): Promise<DiscoveryOutcome> {
    const sitemapUrl = careerPath(site.careerUrl, this.profile.sitemapPath);
    const root = await this.load(sitemapUrl, ctx);
    if (!root.ok) {
      return root.outcome;
    }

    let locs: string[];
    if (root.sitemap.kind === "urlset") {
      locs = root.sitemap.locs;
    } else {
      const children = root.sitemap.sitemaps.slice(0, this.maxChildSitemaps);
      if (root.sitemap.sitemaps.length > children.length) {
        ctx.logger.warn("Sitemap index truncated", {
          sitemapUrl,
          children: root.sitemap.sitemaps.length,
          followed: children.length,
        });
      }

      locs = [];
      for (const childUrl of children) {
        const child = await this.load(childUrl, ctx);
        if (!child.ok) {
          return child.outcome;
        }
        if (child.sitemap.kind === "index") {
          ctx.logger.debug("Nested sitemap index skipped", { childUrl });
          continue;
        }
        locs.push(...child.sitemap.locs);
      }
    }

    const jobUrls = dedupeJobUrls(locs.filter((loc) => isJobUrl(loc, this.profile.jobUrlPattern)));
    ctx.logger.debug("Sitemap parsed", { sitemapUrl, locs: locs.length, jobUrls: jobUrls.length });

    return successOutcome(this.method, jobUrls);
  }

  private async load(url: string, ctx: StrategyContext): Promise<LoadResult> {
    const fetched = await fetchDocument(url, this.method, ctx);
    if (!fetched.ok) {
      return fetched;
    }
    try {
      return { ok: true, sitemap: parseSitemap(fetched.response.body, url) };
    } catch (err) {
      return { ok: false, outcome: outcomeFromError(err, this.method, ctx) };
    }
  }
}
