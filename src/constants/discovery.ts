/**
 * URL discovery constants
 *
 * ATS URL conventions and tunables for the sitemap, feed and HTML strategies
 */

import type { AtsProfile, ListingEntryRule } from "@/types";

/**
 * Discovery methods in default priority order.
 * Used as the source of truth for method names throughout the system.
 */
export const DISCOVERY_METHODS = ["sitemap", "feed", "html_pagination"] as const;

/**
 * Avature career sites
 *
 * Job pages live under /JobDetail/, /FolderDetail/ or /PipelineDetail/.
 * Listings are paged through /SearchJobs/; pipeline and folder portals use
 * their own RecordsPerPage/Offset pair instead of the job one.
 */
export const AVATURE_PROFILE: AtsProfile = {
  name: "avature",
  jobUrlPattern: /\/(JobDetail|FolderDetail|PipelineDetail)\//,
  sitemapPath: "/sitemap.xml",
  feedPaths: ["/SearchJobs/feed/", "/feed/"],
  listingPath: "/SearchJobs/",
  defaultPagination: { pageSizeParam: "jobRecordsPerPage", offsetParam: "jobOffset", markers: [] },
  paginationFlavours: [
    {
      pageSizeParam: "pipelineRecordsPerPage",
      offsetParam: "pipelineOffset",
      markers: ["pipelineRecordsPerPage", "PipelineDetail"],
    },
    {
      pageSizeParam: "folderRecordsPerPage",
      offsetParam: "folderOffset",
      markers: ["folderRecordsPerPage", "FolderDetail"],
    },
  ],
  listingExtraQuery: { listFilterMode: "1" },
};

/**
 * Limits for discovery operations
 */
export const DISCOVERY_LIMITS = {
  /** Child sitemaps followed from a sitemap index */
  MAX_CHILD_SITEMAPS: 10,
  /** Listing pages requested before pagination gives up */
  DEFAULT_MAX_PAGES: 50,
  /** Records requested per listing page */
  LISTING_PAGE_SIZE: 20,
};

/**
 * Job-entry containers on listing pages, in order of preference.
 * The first rule matching at least one container wins. With `requireJobLink`,
 * only containers holding a job-detail anchor count; `classContains` matches
 * class names case-insensitively.
 */
export const LISTING_ENTRY_RULES: readonly ListingEntryRule[] = [
  { selector: "article.article--result", requireJobLink: false },
  { selector: "li", requireJobLink: true },
  { selector: "tr.card--box", requireJobLink: false },
  { selector: "tr", requireJobLink: true },
  { selector: "div", requireJobLink: false, classContains: "job" },
];

/**
 * Elements that may hold the listing's result count. Only the first one
 * present on the page is read.
 */
export const LISTING_LEGEND_SELECTORS: readonly string[] = [
  "div.list-controls__legend",
  "div.list-controls__text__legend",
  ".list-controls__legend",
  ".search__panel__count--span",
  ".pagination__legend",
  ".legend",
  ".section__title--3",
];

/**
 * Result count phrasings, tried in order. Group 1 is the count; group 2 is
 * the "+" of a capped count such as "999+", which is not a total.
 */
export const LISTING_COUNT_PATTERNS: readonly RegExp[] = [
  /Showing\s+\d+-\d+\s+of\s+(\d+)(\+)?/i,
  /There\s+are\s+(\d+)(\+)?\s+jobs\s+matching/i,
  /of\s+(\d+)(\+)?\s+results/i,
  /of\s+(\d+)(\+)?/i,
  /(\d+)(\+)?\s+results/i,
  /(\d+)(\+)?\s+jobs/i,
  /(\d+)(\+)/,
  /(\d+)(\+)?\s*(?:available|open)\s*positions?/i,
];
