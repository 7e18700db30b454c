/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "HEAD";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  timeoutMs?: number;
}

/**
 * Body and metadata of a successful (2xx) response
 */
export interface HttpTextResponse {
  status: number;
  /** Final URL after redirects */
  url: string;
  headers: Headers;
  body: string;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<HttpTextResponse>;
