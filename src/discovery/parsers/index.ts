export { parseSitemap } from "./sitemapParser";
export type { ParsedSitemap } from "./sitemapParser";
export { parseFeed } from "./feedParser";
export { parseListing } from "./listingParser";
export type { ParsedListing } from "./listingParser";
export { DocumentParseError } from "./documentParseError";
