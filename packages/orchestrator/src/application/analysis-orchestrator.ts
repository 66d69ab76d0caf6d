import { randomUUID } from "node:crypto";
import {
  ConcurrencyLimitExceededError,
  JobNotFoundError,
  ProjectNotFoundError,
  createSilentLogger,
  isTerminalJob,
  toErrorCode,
  toErrorMessage,
  type AnalysisJob,
  type AnalysisJobConfig,
  type AnalysisResult,
  type AnalysisType,
  type CompletedAnalysisJob,
  type FailedAnalysisJob,
  type Logger,
  type PendingAnalysisJob,
  type Recommendation,
  type RunningAnalysisJob,
} from "@depintel/core";
import {
  DEFAULT_ANALYSIS_ENGINE_CONFIG,
  generateRecommendations,
  runAnalysis,
  validateAnalysisRequest,
  type AnalysisEngineConfig,
} from "@depintel/analysis-engine";
import { buildDependencyGraph, type MetadataProvider } from "@depintel/dependency-graph";
import { withDefaults, type OrchestratorConfig, type OrchestratorConfigOverrides } from "../config.js";
import { ProjectConcurrencyLimiter } from "../domain/project-concurrency-limiter.js";
import type { JobResultView, JobStore, OrchestratorProgressEvent, ProjectSource } from "../domain/types.js";
import { withTimeout } from "../domain/with-timeout.js";
import { InMemoryJobStore } from "../infrastructure/in-memory-job-store.js";

export const CANCELLED_REASON = "cancelled";

export type AnalysisOrchestratorDependencies = {
  projects: ProjectSource;
  metadataProvider: MetadataProvider;
  store?: JobStore;
  logger?: Logger;
  clock?: () => Date;
  generateId?: () => string;
  engineConfig?: AnalysisEngineConfig;
  config?: OrchestratorConfigOverrides;
  onProgress?: (event: OrchestratorProgressEvent) => void;
};

const baseOf = (job: AnalysisJob) => ({
  id: job.id,
  projectId: job.projectId,
  analysisType: job.analysisType,
  config: job.config,
  createdAt: job.createdAt,
  cancelRequested: job.cancelRequested,
});

/**
 * Runs analysis jobs through pending -> running -> completed | failed.
 *
 * Job records are immutable; every transition replaces the stored record in one
 * synchronous step. Terminal records are never replaced.
 */
export class AnalysisOrchestrator {
  readonly config: OrchestratorConfig;

  private readonly projects: ProjectSource;
  private readonly metadataProvider: MetadataProvider;
  private readonly store: JobStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly generateId: () => string;
  private readonly engineConfig: AnalysisEngineConfig;
  private readonly onProgress: ((event: OrchestratorProgressEvent) => void) | undefined;
  private readonly limiter: ProjectConcurrencyLimiter;
  private readonly executions = new Map<string, Promise<AnalysisJob>>();
  private readonly recommendationsByProject = new Map<string, readonly Recommendation[]>();

  constructor(dependencies: AnalysisOrchestratorDependencies) {
    this.projects = dependencies.projects;
    this.metadataProvider = dependencies.metadataProvider;
    this.store = dependencies.store ?? new InMemoryJobStore();
    this.logger = dependencies.logger ?? createSilentLogger();
    this.clock = dependencies.clock ?? (() => new Date());
    this.generateId = dependencies.generateId ?? randomUUID;
    this.engineConfig = dependencies.engineConfig ?? DEFAULT_ANALYSIS_ENGINE_CONFIG;
    this.onProgress = dependencies.onProgress;
    this.config = withDefaults(dependencies.config);
    this.limiter = new ProjectConcurrencyLimiter(this.config.maxConcurrentJobsPerProject);
  }

  /**
   * Validates the request and queues a pending job. Throws before creating any
   * record when the options are invalid or the project is at its job limit.
   */
  submit(projectId: string, analysisType: string, config: AnalysisJobConfig = {}): string {
    const type = validateAnalysisRequest(analysisType, config, this.engineConfig);
    if (!this.limiter.tryAcquire(projectId)) {
      throw new ConcurrencyLimitExceededError(projectId, this.config.maxConcurrentJobsPerProject);
    }

    const job: PendingAnalysisJob = {
      id: this.generateId(),
      projectId,
      analysisType: type,
      config,
      createdAt: this.now(),
      cancelRequested: false,
      status: "pending",
      startedAt: null,
      completedAt: null,
    };
    this.store.put(job);
    this.logger.info(`job ${job.id} submitted (${type} for project ${projectId})`);
    this.emit({ stage: "job_submitted", jobId: job.id, projectId, analysisType: type });

    const execution = Promise.resolve()
      .then(() => this.execute(job))
      .finally(() => {
        this.executions.delete(job.id);
      });
    this.executions.set(job.id, execution);
    return job.id;
  }

  getStatus(jobId: string): AnalysisJob | null {
    return this.store.get(jobId);
  }

  getResult(jobId: string): JobResultView {
    const job = this.store.get(jobId);
    if (job === null) {
      return { state: "not_found" };
    }

    switch (job.status) {
      case "completed":
        return { state: "completed", result: job.result };
      case "failed":
        return { state: "failed", errorMessage: job.errorMessage, errorCode: job.errorCode, job };
      case "pending":
      case "running":
        return { state: "not_ready", status: job.status };
    }
  }

  /**
   * Advisory: the job keeps running, but its result is discarded and it ends as
   * failed. Cancelling a finished job changes nothing.
   */
  cancel(jobId: string): AnalysisJob {
    const job = this.store.get(jobId);
    if (job === null) {
      throw new JobNotFoundError(jobId);
    }
    if (isTerminalJob(job) || job.cancelRequested) {
      return job;
    }

    const updated: AnalysisJob = { ...job, cancelRequested: true };
    this.store.put(updated);
    this.logger.info(`job ${jobId} cancellation requested`);
    return updated;
  }

  async waitForJob(jobId: string): Promise<AnalysisJob> {
    const execution = this.executions.get(jobId);
    if (execution !== undefined) {
      return execution;
    }

    const job = this.store.get(jobId);
    if (job === null) {
      throw new JobNotFoundError(jobId);
    }

    return job;
  }

  // executions not yet settled; finished jobs are only kept in the store
  inFlightCount(): number {
    return this.executions.size;
  }

  listJobs(projectId: string): readonly AnalysisJob[] {
    return this.store.listByProject(projectId);
  }

  activeJobCount(projectId: string): number {
    return this.limiter.activeCount(projectId);
  }

  /**
   * Rebuilds the project's recommendation set from the latest completed result of
   * each analysis type, replacing whatever was stored before.
   */
  generateRecommendations(projectId: string): readonly Recommendation[] {
    const latestByType = new Map<AnalysisType, CompletedAnalysisJob>();
    for (const job of this.store.listByProject(projectId)) {
      if (job.status !== "completed") {
        continue;
      }

      const previous = latestByType.get(job.analysisType);
      if (previous === undefined || job.completedAt >= previous.completedAt) {
        latestByType.set(job.analysisType, job);
      }
    }

    const results: AnalysisResult[] = [...latestByType.values()].map((job) => job.result);
    const recommendations = generateRecommendations(results, this.engineConfig);
    this.recommendationsByProject.set(projectId, recommendations);
    this.logger.info(
      `generated ${recommendations.length} recommendations for project ${projectId} from ${results.length} analyses`,
    );
    return recommendations;
  }

  getRecommendations(projectId: string): readonly Recommendation[] {
    return this.recommendationsByProject.get(projectId) ?? [];
  }

  private now(): string {
    return this.clock().toISOString();
  }

  private emit(event: OrchestratorProgressEvent): void {
    this.onProgress?.(event);
  }

  private async execute(submitted: PendingAnalysisJob): Promise<AnalysisJob> {
    try {
      const current = this.store.get(submitted.id) ?? submitted;
      if (current.cancelRequested) {
        return this.fail(current, null, CANCELLED_REASON, CANCELLED_REASON);
      }

      const running: RunningAnalysisJob = {
        ...baseOf(current),
        status: "running",
        startedAt: this.now(),
        completedAt: null,
      };
      this.store.put(running);
      this.logger.debug(`job ${running.id} started`);
      this.emit({ stage: "job_started", jobId: running.id });

      const result = await this.run(running);

      const latest = this.store.get(running.id) ?? running;
      if (latest.cancelRequested) {
        return this.fail(latest, running.startedAt, CANCELLED_REASON, CANCELLED_REASON);
      }

      const completed: CompletedAnalysisJob = {
        ...baseOf(latest),
        status: "completed",
        startedAt: running.startedAt,
        completedAt: this.now(),
        result,
      };
      this.store.put(completed);
      this.logger.info(`job ${completed.id} completed`);
      this.emit({ stage: "job_completed", jobId: completed.id });
      return completed;
    } catch (error) {
      const latest = this.store.get(submitted.id) ?? submitted;
      if (latest.cancelRequested) {
        return this.fail(latest, latest.startedAt, CANCELLED_REASON, CANCELLED_REASON);
      }
      return this.fail(latest, latest.startedAt, toErrorMessage(error), toErrorCode(error));
    } finally {
      this.limiter.release(submitted.projectId);
    }
  }

  private async run(job: RunningAnalysisJob): Promise<AnalysisResult> {
    const project = await this.projects.getProject(job.projectId);
    if (project === null) {
      throw new ProjectNotFoundError(job.projectId);
    }

    const graph = await withTimeout(
      buildDependencyGraph(
        {
          projectName: project.projectName,
          dependencies: project.dependencies,
          referenceDate: project.referenceDate ?? job.startedAt,
          options: this.config.graph,
        },
        this.metadataProvider,
        (event) => this.emit({ stage: "graph", jobId: job.id, event }),
      ),
      this.config.metadataTimeoutMs,
    );
    for (const assumption of graph.assumptions) {
      this.logger.debug(`job ${job.id}: ${assumption}`);
    }

    return runAnalysis(job.analysisType, graph, job.config, this.engineConfig);
  }

  private fail(
    job: AnalysisJob,
    startedAt: string | null,
    errorMessage: string,
    errorCode: string,
  ): FailedAnalysisJob {
    const failed: FailedAnalysisJob = {
      ...baseOf(job),
      status: "failed",
      startedAt,
      completedAt: this.now(),
      errorMessage,
      errorCode,
    };
    this.store.put(failed);
    this.logger.warn(`job ${failed.id} failed (${errorCode}): ${errorMessage}`);
    this.emit({ stage: "job_failed", jobId: failed.id, errorCode, errorMessage });
    return failed;
  }
}
