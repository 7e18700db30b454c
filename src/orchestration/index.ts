export { runDiscovery } from "./discoveryRunner";
export type { DiscoveryRunnerOptions } from "./discoveryRunner";
export { StopSignal, createRunContext, installInterruptHandler } from "./runContext";
export type { RunContext } from "./runContext";
export { RequestThrottle, sleep } from "./requestThrottle";
export type { SleepFn } from "./requestThrottle";
export { exitCodeFor } from "./exitCodes";
export { runPipeline, RunLockedError } from "./pipeline";
export type { PipelineRunOptions, PipelineRunResult } from "./pipeline";
