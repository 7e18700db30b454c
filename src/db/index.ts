/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/retryQueueRepo";
export * from "./repos/runLockRepo";
