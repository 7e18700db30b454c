/**
 * HttpError class: structured error for non-2xx responses
 *
 * Kept apart from src/types, which holds shapes only.
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Carries status, URL, response headers and a body snippet so the
 * rate-limit detector and the failure classifier can inspect the response
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(`HTTP ${details.status}${details.statusText ? ` ${details.statusText}` : ""} - ${details.url}`);
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}
