export { readSiteList, parseSiteList, detectFormat, toSite } from "./siteListReader";
export type { SiteListFormat } from "./siteListReader";
