export { loadPipelineConfig, CONFIG_ENV_VARS } from "./pipelineConfig";
export { ConfigError } from "./configError";
