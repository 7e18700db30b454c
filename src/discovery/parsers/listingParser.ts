/**
 * Listing page parser: job entries on paginated search result pages
 */

import { load, type CheerioAPI } from "cheerio";
import type { ListingEntryRule } from "@/types";
import {
  LISTING_COUNT_PATTERNS,
  LISTING_ENTRY_RULES,
  LISTING_LEGEND_SELECTORS,
} from "@/constants";
import { dedupeJobUrls, isJobUrl, resolveLink } from "../urlUtils";

export type ParsedListing = {
  /** Job entry containers found on the page (0 means an empty page) */
  entries: number;
  /** Job-detail URLs, one per entry, de-duplicated in page order */
  jobUrls: string[];
  /** Total results announced by the page legend, null when absent or capped */
  totalCount: number | null;
};

/**
 * Read the result total from the first legend element on the page
 */
function readTotalCount($: CheerioAPI): number | null {
  for (const selector of LISTING_LEGEND_SELECTORS) {
    const legend = $(selector).first();
    if (legend.length === 0) {
      continue;
    }
    const text = legend.text().replace(/\s+/g, " ").trim();
    for (const pattern of LISTING_COUNT_PATTERNS) {
      const match = pattern.exec(text);
      if (match) {
        return match[2] === "+" ? null : Number(match[1]);
      }
    }
    return null;
  }
  return null;
}

/**
 * Parse one listing page
 *
 * Containers are found with the first matching rule; each contributes the
 * first anchor pointing at a job-detail page.
 *
 * @param html - Raw page body
 * @param pageUrl - Page URL, used to resolve relative links
 * @param jobUrlPattern - Matches job-detail paths
 */
export function parseListing(
  html: string,
  pageUrl: string,
  jobUrlPattern: RegExp,
  rules: readonly ListingEntryRule[] = LISTING_ENTRY_RULES,
): ParsedListing {
  const $ = load(html);
  const totalCount = readTotalCount($);

  for (const rule of rules) {
    const entries = $(rule.selector)
      .toArray()
      .flatMap((el) => {
        const container = $(el);
        if (rule.classContains) {
          const className = (container.attr("class") ?? "").toLowerCase();
          if (!className.includes(rule.classContains)) {
            return [];
          }
        }
        const link =
          container
            .find("a[href]")
            .toArray()
            .map((anchor) => resolveLink($(anchor).attr("href"), pageUrl))
            .find((url): url is string => url !== null && isJobUrl(url, jobUrlPattern)) ?? null;

        if (rule.requireJobLink && link === null) {
          return [];
        }
        return [{ link }];
      });

    if (entries.length === 0) {
      continue;
    }

    const links = entries.flatMap((entry) => (entry.link ? [entry.link] : []));
    return { entries: entries.length, jobUrls: dedupeJobUrls(links), totalCount };
  }

  return { entries: 0, jobUrls: [], totalCount };
}
