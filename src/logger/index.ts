export { debug, info, warn, error, withContext, rootLogger } from "./logger";
