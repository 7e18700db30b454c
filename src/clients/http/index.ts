/**
 * HTTP client public API
 */

export { httpRequest, buildUrl } from "./httpClient";
export { HttpError } from "./httpError";
export type {
  HttpRequest,
  HttpMethod,
  HttpErrorDetails,
  HttpTextResponse,
  HttpRequestFn,
} from "@/types";
