/**
 * HTML pagination strategy: walks the paginated job search listing
 *
 * The offset advances by the entries each page actually returned, since
 * sites may serve fewer records than requested. Stops on an empty page, on a
 * page that adds no new URL (offset ignored by the site), once the total from
 * the page legend is collected, or after maxPages.
 */

import type {
  AtsProfile,
  DiscoveryOutcome,
  DiscoveryStrategy,
  ListingPagination,
  Site,
  StrategyContext,
} from "@/types";
import { AVATURE_PROFILE, DISCOVERY_LIMITS } from "@/constants";
import { parseListing } from "../parsers";
import { careerPath } from "../urlUtils";
import { fetchDocument, successOutcome } from "../fetchDocument";

export type HtmlPaginationStrategyOptions = {
  maxPages?: number;
  pageSize?: number;
};

/**
 * Pick the pagination flavour a listing page asks for
 */
export function selectPagination(profile: AtsProfile, body: string): ListingPagination {
  return (
    profile.paginationFlavours.find((flavour) =>
      flavour.markers.some((marker) => body.includes(marker)),
    ) ?? profile.defaultPagination
  );
}

export class HtmlPaginationStrategy implements DiscoveryStrategy {
  readonly method = "html_pagination";
  private readonly maxPages: number;
  private readonly pageSize: number;

  constructor(
    private readonly profile: AtsProfile = AVATURE_PROFILE,
    options: HtmlPaginationStrategyOptions = {},
  ) {
    this.maxPages = options.maxPages ?? DISCOVERY_LIMITS.DEFAULT_MAX_PAGES;
    this.pageSize = options.pageSize ?? DISCOVERY_LIMITS.LISTING_PAGE_SIZE;
  }

  async attempt(site: Site, ctx: StrategyContext): Promise<DiscoveryOutcome> {
    const listingUrl = careerPath(site.careerUrl, this.profile.listingPath);
    const seen = new Set<string>();
    const jobUrls: string[] = [];
    let pagination = this.profile.defaultPagination;
    let offset = 0;
    let expectedCount: number | undefined;

    for (let page = 1; page <= this.maxPages; page++) {
      const fetched = await fetchDocument(listingUrl, this.method, ctx, {
        ...this.profile.listingExtraQuery,
        [pagination.pageSizeParam]: this.pageSize,
        [pagination.offsetParam]: offset,
      });

      // A failed page fails the strategy: a partial listing is never reported as complete
      if (!fetched.ok) {
        if (page > 1) {
          ctx.logger.warn("Listing page failed mid-pagination", {
            listingUrl,
            page,
            collected: jobUrls.length,
          });
        }
        return fetched.outcome;
      }

      const body = fetched.response.body;
      if (page === 1) {
        pagination = selectPagination(this.profile, body);
        if (pagination !== this.profile.defaultPagination) {
          ctx.logger.debug("Listing uses its own pagination parameters", {
            listingUrl,
            offsetParam: pagination.offsetParam,
          });
        }
      }

      const listing = parseListing(body, fetched.response.url, this.profile.jobUrlPattern);
      if (expectedCount === undefined && listing.totalCount !== null) {
        expectedCount = listing.totalCount;
      }
      if (listing.entries === 0) {
        ctx.logger.debug("Listing page empty, pagination done", { listingUrl, page });
        break;
      }

      let added = 0;
      for (const url of listing.jobUrls) {
        if (!seen.has(url)) {
          seen.add(url);
          jobUrls.push(url);
          added++;
        }
      }

      ctx.logger.debug("Listing page parsed", { listingUrl, page, entries: listing.entries, added });
      if (added === 0) {
        break;
      }
      offset += listing.entries;
      if (expectedCount !== undefined && jobUrls.length >= expectedCount) {
        break;
      }
      if (page === this.maxPages) {
        ctx.logger.warn("Listing pagination reached maxPages", { listingUrl, maxPages: this.maxPages });
      }
    }

    if (expectedCount !== undefined && jobUrls.length < expectedCount) {
      ctx.logger.warn("Listing yielded fewer jobs than it announces", {
        listingUrl,
        expected: expectedCount,
        collected: jobUrls.length,
      });
    }

    return successOutcome(this.method, jobUrls, expectedCount);
  }
}
