import type { AnalysisJob } from "@depintel/core";
import type { JobStore } from "../domain/types.js";

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, AnalysisJob>();

  get(jobId: string): AnalysisJob | null {
    return this.jobs.get(jobId) ?? null;
  }

  put(job: AnalysisJob): void {
    this.jobs.set(job.id, job);
  }

  listByProject(projectId: string): readonly AnalysisJob[] {
    return [...this.jobs.values()].filter((job) => job.projectId === projectId);
  }
}
