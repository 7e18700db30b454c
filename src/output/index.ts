export { JsonlResultSink, formatFileTimestamp } from "./jsonlResultSink";
export type { JsonlResultSinkPaths } from "./jsonlResultSink";
export {
  toSuccessRecord,
  toFailureRecord,
  toRetryFileRecord,
  toPendingLine,
} from "./records";
export { analyzeFailures } from "./failureAnalysis";
