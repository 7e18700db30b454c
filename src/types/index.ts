export * from "./logger";
export * from "./clients/http";
export * from "./site";
export * from "./failures";
export * from "./discovery";
export * from "./retryQueue";
export * from "./records";
export * from "./runner";
export * from "./runLock";
export * from "./config";
export * from "./output";
