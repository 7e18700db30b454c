export { detectRateLimit, parseRetryAfter } from "./rateLimitDetector";
export type { DetectRateLimitOptions } from "./rateLimitDetector";
export {
  classifyFailure,
  classifyStatus,
  isRetryableKind,
  dispositionOf,
  parseFailureKind,
  httpStatusOf,
  errorMessage,
} from "./failureClassifier";
