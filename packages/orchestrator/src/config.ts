import { DEFAULT_GRAPH_BUILD_OPTIONS, type GraphBuildOptions } from "@depintel/dependency-graph";

export type OrchestratorConfig = {
  // pending and running jobs both count against the limit
  maxConcurrentJobsPerProject: number;
  // bound on the metadata lookups of one graph build
  metadataTimeoutMs: number;
  graph: GraphBuildOptions;
};

export type OrchestratorConfigOverrides = {
  maxConcurrentJobsPerProject?: number;
  metadataTimeoutMs?: number;
  graph?: Partial<GraphBuildOptions>;
};

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  maxConcurrentJobsPerProject: 5,
  metadataTimeoutMs: 30_000,
  graph: DEFAULT_GRAPH_BUILD_OPTIONS,
};

export const withDefaults = (overrides: OrchestratorConfigOverrides | undefined): OrchestratorConfig => ({
  maxConcurrentJobsPerProject:
    overrides?.maxConcurrentJobsPerProject ?? DEFAULT_ORCHESTRATOR_CONFIG.maxConcurrentJobsPerProject,
  metadataTimeoutMs: overrides?.metadataTimeoutMs ?? DEFAULT_ORCHESTRATOR_CONFIG.metadataTimeoutMs,
  graph: {
    ...DEFAULT_ORCHESTRATOR_CONFIG.graph,
    ...overrides?.graph,
  },
});
