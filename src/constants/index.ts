export * from "./logger";
export * from "./clients/http";
export * from "./discovery";
export * from "./failures";
export * from "./retryQueue";
export * from "./runner";
export * from "./runLock";
export * from "./output";
