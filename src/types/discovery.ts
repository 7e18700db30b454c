/**
 * URL discovery type definitions
 */

import type { DISCOVERY_METHODS } from "@/constants";
import type { FailureKind } from "./failures";
import type { HttpRequest, HttpTextResponse } from "./clients/http";
import type { Logger } from "./logger";
import type { Site } from "./site";

export type DiscoveryMethod = (typeof DISCOVERY_METHODS)[number];

/**
 * Result of one discovery attempt for one Site
 */
export type DiscoveryOutcome =
  | {
      status: "success";
      method: DiscoveryMethod;
      /** Ordered, de-duplicated job-detail URLs */
      jobUrls: string[];
      /** Job count the site announces, when the listing shows one */
      expectedCount?: number;
      /** ISO 8601 timestamp */
      discoveredAt: string;
    }
  | {
      status: "failure";
      kind: FailureKind;
      message: string;
      httpStatus: number | null;
      /** Strategy that produced the failure, if any */
      method?: DiscoveryMethod;
    }
  | {
      status: "rate_limited";
      httpStatus: number | null;
      retryAfterMs: number;
      message: string;
      method?: DiscoveryMethod;
    };

export type DiscoverySuccess = Extract<DiscoveryOutcome, { status: "success" }>;
export type DiscoveryFailure = Extract<DiscoveryOutcome, { status: "failure" }>;
export type DiscoveryRateLimited = Extract<DiscoveryOutcome, { status: "rate_limited" }>;

/**
 * What to do when every strategy ran without error but found no job URLs
 *
 * - accept: report a Success with an empty URL list
 * - reject: report a parse_error Failure
 */
export type EmptyResultPolicy = "accept" | "reject";

/**
 * Query parameters one listing flavour pages with
 */
export type ListingPagination = {
  pageSizeParam: string;
  offsetParam: string;
  /** Page body substrings that select this flavour */
  markers: readonly string[];
};

/**
 * URL conventions of one ATS platform
 */
export type AtsProfile = {
  name: string;
  /** Matches the path of a job-detail page */
  jobUrlPattern: RegExp;
  /** Sitemap path relative to the career root */
  sitemapPath: string;
  /** Candidate feed paths relative to the career root, tried in order */
  feedPaths: string[];
  /** Listing page path relative to the career root */
  listingPath: string;
  /** Parameters for the first page, and for pages matching no other flavour */
  defaultPagination: ListingPagination;
  /** Other flavours, checked in order against the first page body */
  paginationFlavours: readonly ListingPagination[];
  /** Extra query parameters sent with every listing request */
  listingExtraQuery: Record<string, string>;
};

/**
 * How listing pages mark up one job entry
 */
export type ListingEntryRule = {
  selector: string;
  requireJobLink: boolean;
  classContains?: string;
};

/**
 * Per-worker context handed to every strategy call
 */
export type StrategyContext = {
  /** Throttled request function owned by the calling worker */
  fetch: (req: HttpRequest) => Promise<HttpTextResponse>;
  logger: Logger;
  /** Wait recommended for throttled responses without Retry-After */
  rateLimitCooldownMs: number;
};

/**
 * A URL discovery strategy (sitemap, feed, paginated HTML)
 *
 * Implementations never throw: every failure is returned as an outcome.
 */
export interface DiscoveryStrategy {
  readonly method: DiscoveryMethod;
  attempt(site: Site, ctx: StrategyContext): Promise<DiscoveryOutcome>;
}
