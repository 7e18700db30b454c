/**
 * Unit Tests: Sitemap, feed and HTML pagination strategies (offline)
 */

import { describe, it, expect, beforeEach } from "vitest";
import { FeedStrategy, HtmlPaginationStrategy, SitemapStrategy } from "@/discovery";
import { AVATURE_PROFILE } from "@/constants";
import type { Site } from "@/types";
import {
  abortError,
  createMockHttp,
  loadFixtureText,
  type MockHttp,
} from "../helpers/mockHttp";
import { createStrategyContext } from "../helpers/strategyContext";

const bloomberg: Site = { company: "Bloomberg", careerUrl: "https://bloomberg.avature.net/careers" };
const acme: Site = { company: "Acme", careerUrl: "https://acme.avature.net/careers" };

const ACME_LISTING = "https://acme.avature.net/careers/SearchJobs/";

describe("SitemapStrategy", () => {
  let mock: MockHttp;

  beforeEach(() => {
    mock = createMockHttp();
  });

  it("should return de-duplicated job URLs in sitemap order", async () => {
    mock.on(
      "GET",
      "https://bloomberg.avature.net/careers/sitemap.xml",
      loadFixtureText("avature/sitemap_urlset.xml"),
    );

    const outcome = await new SitemapStrategy().attempt(bloomberg, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "success",
      method: "sitemap",
      jobUrls: [
        "https://bloomberg.avature.net/careers/JobDetail/Software-Engineer/1001",
        "https://bloomberg.avature.net/careers/JobDetail/Data-Analyst/1002",
        "https://bloomberg.avature.net/careers/JobDetail/Product-Manager/1003",
      ],
    });
  });

  it("should follow a sitemap index one level", async () => {
    mock.on("GET", "https://acme.avature.net/careers/sitemap.xml", loadFixtureText("avature/sitemap_index.xml"));
    mock.on("GET", "https://acme.avature.net/careers/sitemap-jobs-1.xml", loadFixtureText("avature/sitemap_child_1.xml"));
    mock.on("GET", "https://acme.avature.net/careers/sitemap-jobs-2.xml", loadFixtureText("avature/sitemap_child_2.xml"));

    const outcome = await new SitemapStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "success",
      jobUrls: [
        "https://acme.avature.net/careers/JobDetail/Welder/11",
        "https://acme.avature.net/careers/FolderDetail/Engineering/12",
        "https://acme.avature.net/careers/PipelineDetail/Talent-Pool/13",
      ],
    });
  });

  it("should cap the child sitemaps followed", async () => {
    mock.on("GET", "https://acme.avature.net/careers/sitemap.xml", loadFixtureText("avature/sitemap_index.xml"));
    mock.on("GET", "https://acme.avature.net/careers/sitemap-jobs-1.xml", loadFixtureText("avature/sitemap_child_1.xml"));

    const strategy = new SitemapStrategy(AVATURE_PROFILE, { maxChildSitemaps: 1 });
    const outcome = await strategy.attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "success",
      jobUrls: [
        "https://acme.avature.net/careers/JobDetail/Welder/11",
        "https://acme.avature.net/careers/FolderDetail/Engineering/12",
      ],
    });
    expect(mock.getRecordedRequests()).toHaveLength(2);
  });

  it("should classify a missing sitemap as not_found", async () => {
    mock.onResponse("GET", "https://acme.avature.net/careers/sitemap.xml", { status: 404, body: "Not Found" });

    const outcome = await new SitemapStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "failure",
      kind: "not_found",
      httpStatus: 404,
      method: "sitemap",
    });
  });

  it("should report rate limiting with the Retry-After wait", async () => {
    mock.onResponse("GET", "https://acme.avature.net/careers/sitemap.xml", {
      status: 429,
      body: "",
      headers: { "Retry-After": "120" },
    });

    const outcome = await new SitemapStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "rate_limited",
      httpStatus: 429,
      retryAfterMs: 120_000,
      method: "sitemap",
    });
  });

  it("should report a 406 as rate limiting", async () => {
    mock.onResponse("GET", "https://acme.avature.net/careers/sitemap.xml", { status: 406, body: "Not Acceptable" });

    const outcome = await new SitemapStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "rate_limited",
      httpStatus: 406,
      retryAfterMs: 1_800_000,
      method: "sitemap",
    });
  });

  it("should treat a truncated sitemap as parse_error", async () => {
    mock.on(
      "GET",
      "https://acme.avature.net/careers/sitemap.xml",
      "<urlset><url><loc>https://acme.avature.net/careers/JobDetail/Welder/11</loc></url><url><loc>https://acme.av",
    );

    const outcome = await new SitemapStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "failure", kind: "parse_error", httpStatus: null, method: "sitemap" });
  });

  it("should treat a document without a sitemap root as parse_error", async () => {
    mock.on("GET", "https://acme.avature.net/careers/sitemap.xml", "<html><body>Welcome</body></html>");

    const outcome = await new SitemapStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "failure", kind: "parse_error", httpStatus: null });
  });

  it("should classify timeouts", async () => {
    mock.onCustom("GET", "https://acme.avature.net/careers/sitemap.xml", () => {
      throw abortError();
    });

    const outcome = await new SitemapStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "failure", kind: "timeout", httpStatus: null });
  });

  it("should fail when a child sitemap fails", async () => {
    mock.on("GET", "https://acme.avature.net/careers/sitemap.xml", loadFixtureText("avature/sitemap_index.xml"));
    mock.on("GET", "https://acme.avature.net/careers/sitemap-jobs-1.xml", loadFixtureText("avature/sitemap_child_1.xml"));
    mock.onResponse("GET", "https://acme.avature.net/careers/sitemap-jobs-2.xml", { status: 502, body: "" });

    const outcome = await new SitemapStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "failure", kind: "server_error", httpStatus: 502 });
  });
});

describe("FeedStrategy", () => {
  let mock: MockHttp;

  beforeEach(() => {
    mock = createMockHttp();
  });

  it("should fall through to the next feed path", async () => {
    mock.onResponse("GET", "https://acme.avature.net/careers/SearchJobs/feed/", { status: 404, body: "" });
    mock.on("GET", "https://acme.avature.net/careers/feed/", loadFixtureText("avature/feed_rss.xml"));

    const outcome = await new FeedStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "success",
      method: "feed",
      jobUrls: [
        "https://acme.avature.net/careers/JobDetail/Welder/11",
        "https://acme.avature.net/careers/PipelineDetail/Talent-Pool/13",
      ],
    });
    expect(mock.getRecordedRequests().map((req) => req.url)).toEqual([
      "https://acme.avature.net/careers/SearchJobs/feed/",
      "https://acme.avature.net/careers/feed/",
    ]);
  });

  it("should skip a feed path that is not a feed", async () => {
    mock.on("GET", "https://acme.avature.net/careers/SearchJobs/feed/", "<html><body>Search</body></html>");
    mock.on("GET", "https://acme.avature.net/careers/feed/", loadFixtureText("avature/feed_atom.xml"));

    const outcome = await new FeedStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "success",
      jobUrls: [
        "https://acme.avature.net/careers/JobDetail/Welder/11",
        "https://acme.avature.net/careers/JobDetail/Painter/14",
      ],
    });
  });

  it("should return the last failure when no feed works", async () => {
    mock.onResponse("GET", "https://acme.avature.net/careers/SearchJobs/feed/", { status: 500, body: "" });
    mock.onResponse("GET", "https://acme.avature.net/careers/feed/", { status: 404, body: "" });

    const outcome = await new FeedStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "failure", kind: "not_found", httpStatus: 404, method: "feed" });
  });

  it("should stop at a rate-limited feed path", async () => {
    mock.onResponse("GET", "https://acme.avature.net/careers/SearchJobs/feed/", { status: 429, body: "" });

    const outcome = await new FeedStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "rate_limited", httpStatus: 429, retryAfterMs: 1_800_000 });
    expect(mock.getRecordedRequests()).toHaveLength(1);
  });
});

describe("HtmlPaginationStrategy", () => {
  let mock: MockHttp;

  beforeEach(() => {
    mock = createMockHttp();
  });

  function servePages(pages: Record<number, string>): void {
    mock.onCustom("GET", ACME_LISTING, (req) => {
      const offset = Number(req.query?.jobOffset ?? 0);
      return { status: 200, body: pages[offset] ?? loadFixtureText("avature/listing_empty.html") };
    });
  }

  it("should walk pages until an empty page", async () => {
    servePages({
      0: loadFixtureText("avature/listing_page_1.html"),
      3: loadFixtureText("avature/listing_page_2.html"),
    });

    const outcome = await new HtmlPaginationStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "success",
      method: "html_pagination",
      jobUrls: [
        "https://acme.avature.net/careers/JobDetail/Welder/11",
        "https://acme.avature.net/careers/JobDetail/Painter/14",
        "https://acme.avature.net/careers/JobDetail/Carpenter/15",
      ],
    });

    const requests = mock.getRecordedRequests();
    expect(requests).toHaveLength(3);
    expect(requests[0].query).toEqual({ listFilterMode: "1", jobRecordsPerPage: 20, jobOffset: 0 });
    expect(requests.map((req) => req.query?.jobOffset)).toEqual([0, 3, 5]);
  });

  function jobArticles(from: number, to: number): string {
    const articles: string[] = [];
    for (let id = from; id < to; id++) {
      articles.push(`<article class="article--result"><a href="/careers/JobDetail/Job/${id}">Job</a></article>`);
    }
    return articles.join("\n");
  }

  // Serves at most 10 records per page whatever size is asked for
  function serveJobs(total: number, legend = ""): void {
    mock.onCustom("GET", ACME_LISTING, (req) => {
      const offset = Number(req.query?.jobOffset ?? 0);
      return { status: 200, body: legend + jobArticles(offset, Math.min(offset + 10, total)) };
    });
  }

  it("should advance by the entries a short page returned", async () => {
    serveJobs(25);

    const outcome = await new HtmlPaginationStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome.status).toBe("success");
    if (outcome.status !== "success") return;
    expect(outcome.jobUrls).toHaveLength(25);
    expect(outcome.jobUrls[24]).toBe("https://acme.avature.net/careers/JobDetail/Job/24");
    expect(outcome.expectedCount).toBeUndefined();
    expect(mock.getRecordedRequests().map((req) => req.query?.jobOffset)).toEqual([0, 10, 20, 25]);
  });

  it("should stop once the announced total is collected", async () => {
    serveJobs(25, `<div class="list-controls__legend">Showing 1-10 of 25 results</div>`);

    const outcome = await new HtmlPaginationStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "success", expectedCount: 25 });
    if (outcome.status !== "success") return;
    expect(outcome.jobUrls).toHaveLength(25);
    expect(mock.getRecordedRequests()).toHaveLength(3);
  });

  it("should report the announced total when the listing falls short", async () => {
    serveJobs(12, `<div class="list-controls__legend">Showing 1-10 of 30 results</div>`);

    const outcome = await new HtmlPaginationStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "success", expectedCount: 30 });
    if (outcome.status !== "success") return;
    expect(outcome.jobUrls).toHaveLength(12);
  });

  it("should switch to folder pagination parameters", async () => {
    mock.onCustom("GET", ACME_LISTING, (req) =>
      req.query?.jobOffset === 0
        ? {
            status: 200,
            body: `<article class="article--result"><a href="/careers/FolderDetail/Engineering/12">Eng</a></article>
              <article class="article--result"><a href="/careers/FolderDetail/Sales/16">Sales</a></article>`,
          }
        : { status: 200, body: loadFixtureText("avature/listing_empty.html") },
    );

    const outcome = await new HtmlPaginationStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "success",
      jobUrls: [
        "https://acme.avature.net/careers/FolderDetail/Engineering/12",
        "https://acme.avature.net/careers/FolderDetail/Sales/16",
      ],
    });
    expect(mock.getRecordedRequests().map((req) => req.query)).toEqual([
      { listFilterMode: "1", jobRecordsPerPage: 20, jobOffset: 0 },
      { listFilterMode: "1", folderRecordsPerPage: 20, folderOffset: 2 },
    ]);
  });

  it("should stop when a page adds no new URL", async () => {
    mock.on("GET", ACME_LISTING, loadFixtureText("avature/listing_page_1.html"));

    const outcome = await new HtmlPaginationStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "success", jobUrls: [
      "https://acme.avature.net/careers/JobDetail/Welder/11",
      "https://acme.avature.net/careers/JobDetail/Painter/14",
    ] });
    expect(mock.getRecordedRequests()).toHaveLength(2);
  });

  it("should stop at maxPages", async () => {
    mock.onCustom("GET", ACME_LISTING, (req) => ({
      status: 200,
      body: `<article class="article--result"><a href="/careers/JobDetail/Job/${String(req.query?.jobOffset)}">Job</a></article>`,
    }));

    const strategy = new HtmlPaginationStrategy(AVATURE_PROFILE, { maxPages: 2 });
    const outcome = await strategy.attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({
      status: "success",
      jobUrls: [
        "https://acme.avature.net/careers/JobDetail/Job/0",
        "https://acme.avature.net/careers/JobDetail/Job/1",
      ],
    });
    expect(mock.getRecordedRequests()).toHaveLength(2);
  });

  it("should fail instead of reporting a partial listing", async () => {
    mock.onCustom("GET", ACME_LISTING, (req) =>
      req.query?.jobOffset === 0
        ? { status: 200, body: loadFixtureText("avature/listing_page_1.html") }
        : { status: 500, body: "" },
    );

    const outcome = await new HtmlPaginationStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "failure", kind: "server_error", httpStatus: 500 });
  });

  it("should report rate limiting on any page", async () => {
    mock.onResponse("GET", ACME_LISTING, {
      status: 403,
      body: "Rate limit exceeded",
    });

    const outcome = await new HtmlPaginationStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "rate_limited", httpStatus: 403 });
  });

  it("should return an empty success for an empty first page", async () => {
    mock.on("GET", ACME_LISTING, loadFixtureText("avature/listing_empty.html"));

    const outcome = await new HtmlPaginationStrategy().attempt(acme, createStrategyContext(mock));

    expect(outcome).toMatchObject({ status: "success", method: "html_pagination", jobUrls: [] });
  });
});
