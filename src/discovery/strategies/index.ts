export { SitemapStrategy } from "./sitemapStrategy";
export type { SitemapStrategyOptions } from "./sitemapStrategy";
export { FeedStrategy } from "./feedStrategy";
export { HtmlPaginationStrategy, selectPagination } from "./htmlPaginationStrategy";
export type { HtmlPaginationStrategyOptions } from "./htmlPaginationStrategy";
