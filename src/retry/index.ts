export { RetryQueue, toRetryRecord } from "./retryQueue";
export type { RetryQueueOptions } from "./retryQueue";
export { backoff } from "./backoff";
