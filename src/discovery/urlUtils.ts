/**
 * URL helpers: career-site identity, company inference, link resolution
 */

const AVATURE_HOST_SUFFIX = ".avature.net";

/**
 * Normalize a career-site URL into its identity form
 *
 * Scheme defaults to https, host is lower-cased, fragment and trailing slash
 * are removed. Query strings are kept.
 *
 * @returns Normalized URL, or null when the input is not an http(s) URL
 */
export function normalizeCareerUrl(raw: string): string | null {
  const trimmed = raw.trim();
  if (trimmed === "") {
    return null;
  }

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return null;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return null;
  }
  if (!url.hostname) {
    return null;
  }

  const path = url.pathname.replace(/\/+$/, "");
  return `${url.protocol}//${url.host}${path}${url.search}`;
}

/**
 * Guess the company name from a career-site URL
 *
 * Avature tenants use the label before `.avature.net`; other hosts use the
 * first label that is not `www`.
 *
 * @example
 *   inferCompanyFromUrl("https://bloomberg.avature.net/careers") // "bloomberg"
 *   inferCompanyFromUrl("https://www.acme.com/jobs")              // "acme"
 */
export function inferCompanyFromUrl(careerUrl: string): string {
  let hostname: string;
  try {
    hostname = new URL(careerUrl).hostname.toLowerCase();
  } catch {
    return careerUrl;
  }

  if (hostname.endsWith(AVATURE_HOST_SUFFIX)) {
    const tenant = hostname.slice(0, -AVATURE_HOST_SUFFIX.length);
    const labels = tenant.split(".");
    return labels[labels.length - 1] || hostname;
  }

  const labels = hostname.split(".").filter((label) => label !== "www");
  return labels[0] ?? hostname;
}

/**
 * Append an ATS path to the career root (query string of the root dropped)
 *
 * @example
 *   careerPath("https://acme.avature.net/careers", "/sitemap.xml")
 *   // "https://acme.avature.net/careers/sitemap.xml"
 */
export function careerPath(careerUrl: string, path: string): string {
  const url = new URL(careerUrl);
  url.pathname = url.pathname.replace(/\/+$/, "") + path;
  url.search = "";
  url.hash = "";
  return url.toString();
}

/**
 * Resolve a possibly relative link against a page URL
 *
 * @returns Absolute http(s) URL, or null for unusable links
 */
export function resolveLink(href: string | undefined, baseUrl: string): string | null {
  if (!href) {
    return null;
  }
  const trimmed = href.trim();
  if (trimmed === "" || trimmed.startsWith("#") || /^(javascript|mailto|tel):/i.test(trimmed)) {
    return null;
  }
  try {
    const url = new URL(trimmed, baseUrl);
    return url.protocol === "http:" || url.protocol === "https:" ? url.toString() : null;
  } catch {
    return null;
  }
}

/**
 * De-duplication key of a job URL (fragment ignored)
 */
export function jobUrlKey(url: string): string {
  const hashIndex = url.indexOf("#");
  return hashIndex === -1 ? url : url.slice(0, hashIndex);
}

/**
 * True when the URL path matches the job-detail pattern
 */
export function isJobUrl(url: string, pattern: RegExp): boolean {
  try {
    return pattern.test(new URL(url).pathname);
  } catch {
    return false;
  }
}

/**
 * Ordered de-duplication of job URLs (first occurrence wins, fragments dropped)
 */
export function dedupeJobUrls(urls: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const url of urls) {
    const key = jobUrlKey(url);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(key);
    }
  }
  return result;
}
