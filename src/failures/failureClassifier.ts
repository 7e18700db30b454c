/**
 * Failure classifier: maps errors and HTTP statuses to a FailureKind
 *
 * Deterministic table; unknown inputs map to unexpected_error.
 */

import type { FailureDisposition, FailureKind } from "@/types";
import {
  CONNECTION_ERROR_CODES,
  FAILURE_KINDS,
  RETRYABLE_FAILURE_KINDS,
  STATUS_FAILURE_KINDS,
  TIMEOUT_ERROR_CODES,
  TIMEOUT_ERROR_NAMES,
} from "@/constants";
import { HttpError } from "@/clients/http";
import { DocumentParseError } from "@/discovery/parsers/documentParseError";

/**
 * Classify an HTTP status code
 */
export function classifyStatus(status: number): FailureKind {
  const mapped = STATUS_FAILURE_KINDS[status];
  if (mapped) {
    return mapped;
  }
  if (status >= 500 && status <= 599) {
    return "server_error";
  }
  return "unexpected_error";
}

/**
 * Read the system error code of an error or of its cause (undici wraps
 * socket errors in TypeError("fetch failed") with the real error as cause)
 */
function errorCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  const cause: unknown = err.cause;
  if (cause instanceof Error) {
    return errorCode(cause);
  }
  return undefined;
}

function isTimeoutError(err: Error): boolean {
  if (TIMEOUT_ERROR_NAMES.includes(err.name)) {
    return true;
  }
  const code = errorCode(err);
  return code !== undefined && TIMEOUT_ERROR_CODES.includes(code);
}

function isConnectionError(err: Error): boolean {
  const code = errorCode(err);
  if (code !== undefined && CONNECTION_ERROR_CODES.includes(code)) {
    return true;
  }
  return err instanceof TypeError && err.message === "fetch failed";
}

/**
 * Classify an error or a bare HTTP status
 *
 * @param errorOrStatus - Thrown value, or an HTTP status code
 */
export function classifyFailure(errorOrStatus: unknown): FailureKind {
  if (typeof errorOrStatus === "number") {
    return classifyStatus(errorOrStatus);
  }
  if (errorOrStatus instanceof HttpError) {
    return classifyStatus(errorOrStatus.status);
  }
  if (errorOrStatus instanceof DocumentParseError) {
    return "parse_error";
  }
  if (!(errorOrStatus instanceof Error)) {
    return "unexpected_error";
  }
  // Timeout codes are checked first: a connect timeout also surfaces as "fetch failed"
  if (isTimeoutError(errorOrStatus)) {
    return "timeout";
  }
  if (isConnectionError(errorOrStatus)) {
    return "connection_error";
  }
  return "unexpected_error";
}

export function isRetryableKind(kind: FailureKind): boolean {
  return RETRYABLE_FAILURE_KINDS.includes(kind);
}

export function dispositionOf(kind: FailureKind): FailureDisposition {
  return isRetryableKind(kind) ? "retryable" : "permanent";
}

function isFailureKind(value: string): value is FailureKind {
  return FAILURE_KINDS.some((kind) => kind === value);
}

/**
 * Parse a failure kind read back from a file or the database
 * Unknown strings become unexpected_error
 */
export function parseFailureKind(value: string | null | undefined): FailureKind {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isFailureKind(normalized) ? normalized : "unexpected_error";
}

/**
 * HTTP status carried by an error, or null
 */
export function httpStatusOf(err: unknown): number | null {
  return err instanceof HttpError ? err.status : null;
}

/**
 * Human-readable message of a thrown value
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name;
  }
  return String(err);
}
