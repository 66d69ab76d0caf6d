export {
  AnalysisOrchestrator,
  CANCELLED_REASON,
  type AnalysisOrchestratorDependencies,
} from "./application/analysis-orchestrator.js";
export {
  DEFAULT_ORCHESTRATOR_CONFIG,
  withDefaults,
  type OrchestratorConfig,
  type OrchestratorConfigOverrides,
} from "./config.js";
export { ProjectConcurrencyLimiter } from "./domain/project-concurrency-limiter.js";
export type {
  JobResultView,
  JobStore,
  OrchestratorProgressEvent,
  ProjectDefinition,
  ProjectSource,
} from "./domain/types.js";
export { withTimeout } from "./domain/with-timeout.js";
export { InMemoryJobStore } from "./infrastructure/in-memory-job-store.js";
export { InMemoryProjectSource } from "./infrastructure/in-memory-project-source.js";
