/**
 * Sitemap parser: <urlset> and <sitemapindex> documents
 */

import { load } from "cheerio";
import { DocumentParseError } from "./documentParseError";
import { assertWellFormedXml } from "./wellFormedXml";

export type ParsedSitemap =
  | { kind: "urlset"; locs: string[] }
  | { kind: "index"; sitemaps: string[] };

/**
 * Parse a sitemap document
 *
 * @param xml - Raw document body
 * @param url - Document URL (for error reporting)
 * @throws {DocumentParseError} When the document is malformed or has neither
 * root element
 */
export function parseSitemap(xml: string, url: string): ParsedSitemap {
  assertWellFormedXml(xml, url, "Sitemap");
  const $ = load(xml, { xml: true });

  const readLocs = (selector: string): string[] =>
    $(selector)
      .toArray()
      .map((el) => $(el).text().trim())
      .filter((loc) => loc !== "");

  if ($("sitemapindex").length > 0) {
    return { kind: "index", sitemaps: readLocs("sitemapindex > sitemap > loc") };
  }
  if ($("urlset").length > 0) {
    return { kind: "urlset", locs: readLocs("urlset > url > loc") };
  }

  throw new DocumentParseError("Sitemap has no <urlset> or <sitemapindex> element", url);
}
