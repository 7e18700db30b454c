/**
 * HTTP client constants: defaults and configuration
 */

/**
 * Default request timeout in milliseconds (15 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 15_000;

/**
 * Default headers for career-site document requests
 */
export const DEFAULT_DOCUMENT_HEADERS: Record<string, string> = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "User-Agent": "Mozilla/5.0 (compatible; ATS-Job-Discovery/1.0)",
};

/**
 * Maximum length of error body snippet kept on HttpError.
 * Large enough for the rate-limit detector to find throttling phrases.
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 2_000;
