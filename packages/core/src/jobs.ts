import type { DependencyRef } from "./graph.js";
import type { AnalysisResult, AnalysisType, Severity } from "./results.js";

export type JobStatus = "pending" | "running" | "completed" | "failed";

export type AnalysisJobConfig = Readonly<Record<string, unknown>>;

type AnalysisJobBase = {
  id: string;
  projectId: string;
  analysisType: AnalysisType;
  config: AnalysisJobConfig;
  createdAt: string;
  cancelRequested: boolean;
};

export type PendingAnalysisJob = AnalysisJobBase & {
  status: "pending";
  startedAt: null;
  completedAt: null;
};

export type RunningAnalysisJob = AnalysisJobBase & {
  status: "running";
  startedAt: string;
  completedAt: null;
};

export type CompletedAnalysisJob = AnalysisJobBase & {
  status: "completed";
  startedAt: string;
  completedAt: string;
  result: AnalysisResult;
};

export type FailedAnalysisJob = AnalysisJobBase & {
  status: "failed";
  startedAt: string | null;
  completedAt: string;
  errorMessage: string;
  errorCode: string;
};

export type AnalysisJob =
  | PendingAnalysisJob
  | RunningAnalysisJob
  | CompletedAnalysisJob
  | FailedAnalysisJob;

export type ActiveAnalysisJob = PendingAnalysisJob | RunningAnalysisJob;

export const isTerminalJob = (
  job: AnalysisJob,
): job is CompletedAnalysisJob | FailedAnalysisJob =>
  job.status === "completed" || job.status === "failed";

export const RECOMMENDATION_TYPES = [
  "impact",
  "compatibility",
  "consolidation",
  "health",
  "license",
  "performance",
] as const;

export type RecommendationType = (typeof RECOMMENDATION_TYPES)[number];

export type RecommendationKind =
  | "impact_monitoring"
  | "usage_optimization"
  | "health_improvement"
  | "breaking_change_planning"
  | "upgrade"
  | "prepare_major_upgrade"
  | "remove_duplicate"
  | "align_versions"
  | "flatten_transitive"
  | "replace"
  | "consider_replacement"
  | "monitor"
  | "update_available"
  | "license_remediation"
  | "license_review"
  | "reduce_bundle_size"
  | "reduce_runtime_impact";

export type VersionTransition = {
  from: string | null;
  to: string;
};

export type Recommendation = {
  title: string;
  description: string;
  type: RecommendationType;
  kind: RecommendationKind;
  sourceAnalysis: AnalysisType;
  severity: Severity;
  dependency: DependencyRef | null;
  versionTransition: VersionTransition | null;
};
