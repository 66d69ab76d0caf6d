import type {
  AnalysisJob,
  AnalysisResult,
  AnalysisType,
  DeclaredDependency,
  FailedAnalysisJob,
} from "@depintel/core";
import type { GraphBuildProgressEvent } from "@depintel/dependency-graph";

export type ProjectDefinition = {
  projectId: string;
  projectName: string;
  dependencies: readonly DeclaredDependency[];
  // fixed instant for time-based analysis; the orchestrator clock is used when null
  referenceDate: string | null;
};

export interface ProjectSource {
  getProject(projectId: string): Promise<ProjectDefinition | null>;
}

export interface JobStore {
  get(jobId: string): AnalysisJob | null;
  put(job: AnalysisJob): void;
  listByProject(projectId: string): readonly AnalysisJob[];
}

export type JobResultView =
  | { state: "completed"; result: AnalysisResult }
  | { state: "failed"; errorMessage: string; errorCode: string; job: FailedAnalysisJob }
  | { state: "not_ready"; status: "pending" | "running" }
  | { state: "not_found" };

export type OrchestratorProgressEvent =
  | { stage: "job_submitted"; jobId: string; projectId: string; analysisType: AnalysisType }
  | { stage: "job_started"; jobId: string }
  | { stage: "graph"; jobId: string; event: GraphBuildProgressEvent }
  | { stage: "job_completed"; jobId: string }
  | { stage: "job_failed"; jobId: string; errorCode: string; errorMessage: string };
