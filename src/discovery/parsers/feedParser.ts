/**
 * Feed parser: RSS 2.0 (<item><link>) and Atom (<entry><link href>)
 */

import { load } from "cheerio";
import { DocumentParseError } from "./documentParseError";
import { assertWellFormedXml } from "./wellFormedXml";
import { resolveLink } from "../urlUtils";

/**
 * Extract entry links from a feed document, in document order
 *
 * @param xml - Raw document body
 * @param url - Feed URL, used to resolve relative links
 * @throws {DocumentParseError} When the document is malformed or neither RSS
 * nor Atom
 */
export function parseFeed(xml: string, url: string): string[] {
  assertWellFormedXml(xml, url, "Feed");
  const $ = load(xml, { xml: true });
  const links: string[] = [];

  if ($("rss, channel").length > 0) {
    $("item").each((_, item) => {
      const link = resolveLink($(item).children("link").first().text(), url);
      if (link) {
        links.push(link);
      }
    });
    return links;
  }

  if ($("feed").length > 0) {
    $("entry").each((_, entry) => {
      const candidates = $(entry).children("link");
      const alternate = candidates.filter((_, el) => {
        const rel = $(el).attr("rel");
        return rel === undefined || rel === "alternate";
      });
      const href = (alternate.length > 0 ? alternate : candidates).first().attr("href");
      const link = resolveLink(href, url);
      if (link) {
        links.push(link);
      }
    });
    return links;
  }

  throw new DocumentParseError("Document is not an RSS or Atom feed", url);
}
