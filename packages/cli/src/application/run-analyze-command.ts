import { AnalysisEngineError, type AnalysisResult, type Logger } from "@depintel/core";
import { createSnapshotOrchestrator, type CliRuntimeOptions } from "./create-orchestrator.js";
import { loadSnapshot } from "./load-snapshot.js";

export class AnalysisJobFailedError extends Error {
  readonly jobId: string;
  readonly errorCode: string;

  constructor(jobId: string, errorCode: string, errorMessage: string) {
    super(`analysis job ${jobId} failed (${errorCode}): ${errorMessage}`);
    this.name = "AnalysisJobFailedError";
    this.jobId = jobId;
    this.errorCode = errorCode;
  }
}

export type AnalyzeCommandInput = {
  snapshotPath: string;
  analysisType: string;
  options: Readonly<Record<string, unknown>>;
};

export const runAnalyzeCommand = async (
  input: AnalyzeCommandInput,
  runtime: CliRuntimeOptions,
  logger: Logger,
): Promise<AnalysisResult> => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const snapshot = loadSnapshot(input.snapshotPath, invocationCwd);
  logger.info(
    `loaded snapshot for ${snapshot.project.projectName} (${snapshot.project.dependencies.length} direct dependencies, ${snapshot.packages.length} package records)`,
  );

  const orchestrator = createSnapshotOrchestrator(snapshot, runtime, logger);
  const jobId = orchestrator.submit(snapshot.project.projectId, input.analysisType, input.options);
  await orchestrator.waitForJob(jobId);

  const view = orchestrator.getResult(jobId);
  switch (view.state) {
    case "completed":
      logger.info(`${view.result.analysisType} completed`);
      return view.result;
    case "failed":
      throw new AnalysisJobFailedError(jobId, view.errorCode, view.errorMessage);
    case "not_ready":
    case "not_found":
      throw new AnalysisEngineError("analysis_failed", `analysis job ${jobId} did not finish (${view.state})`);
  }
};
