/**
 * HTTP client: single-attempt text fetch using native fetch
 *
 * Timeouts via AbortController, query params, structured HttpError on non-2xx.
 * Never retries: retry scheduling belongs to the retry queue, and a throttled
 * response must reach the rate-limit detector untouched.
 */

import type { HttpRequest, HttpTextResponse } from "@/types";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_DOCUMENT_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants";
import { HttpError } from "./httpError";
import * as logger from "@/logger";

/**
 * Build URL with query parameters
 */
export function buildUrl(
  baseUrl: string,
  query?: Record<string, string | number | boolean>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * Extract a snippet of the error response body
 * Returns undefined when the body cannot be read
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    logger.debug("Could not read error response body", {
      url: response.url,
      error: err instanceof Error ? err.message : String(err),
    });
    return undefined;
  }
  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
    : text;
}

/**
 * Perform one HTTP request and return the response body as text
 *
 * @param req - HTTP request configuration
 * @returns Status, final URL, headers and body of a 2xx response
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} On network errors; AbortError when the timeout fires
 */
export async function httpRequest(req: HttpRequest): Promise<HttpTextResponse> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: req.method,
      headers: { ...DEFAULT_DOCUMENT_HEADERS, ...req.headers },
      signal: controller.signal,
      redirect: "follow",
    });

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    const body = req.method === "HEAD" ? "" : await response.text();

    logger.debug("HTTP request completed", {
      method: req.method,
      url,
      status: response.status,
      bytes: body.length,
    });

    return {
      status: response.status,
      url: response.url || url,
      headers: response.headers,
      body,
    };
  } finally {
    clearTimeout(timeoutId);
  }
}
