/**
 * URL discovery public API
 */

export { DiscoveryOrchestrator, createDefaultStrategies } from "./discoveryOrchestrator";
export type { DiscoveryOrchestratorOptions } from "./discoveryOrchestrator";
export * from "./strategies";
export * from "./parsers";
export {
  normalizeCareerUrl,
  inferCompanyFromUrl,
  careerPath,
  resolveLink,
  dedupeJobUrls,
  isJobUrl,
} from "./urlUtils";
export { fetchDocument, outcomeFromError, successOutcome } from "./fetchDocument";
