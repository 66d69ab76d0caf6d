import { ANALYSIS_TYPES, type AnalysisType, type Logger, type Recommendation } from "@depintel/core";
import { createSnapshotOrchestrator, type CliRuntimeOptions } from "./create-orchestrator.js";
import { loadSnapshot } from "./load-snapshot.js";

export type RecommendCommandInput = {
  snapshotPath: string;
  targetLicense: string | undefined;
  profileType: "bundle_size" | "runtime" | undefined;
};

export type AnalysisOutcome =
  | { analysisType: AnalysisType; status: "completed" }
  | { analysisType: AnalysisType; status: "failed"; errorCode: string; errorMessage: string };

export type RecommendCommandResult = {
  projectId: string;
  analyses: readonly AnalysisOutcome[];
  recommendations: readonly Recommendation[];
};

const optionsFor = (
  analysisType: AnalysisType,
  input: RecommendCommandInput,
): Readonly<Record<string, unknown>> => {
  if (analysisType === "license_compliance" && input.targetLicense !== undefined) {
    return { targetLicense: input.targetLicense };
  }
  if (analysisType === "performance_profiling" && input.profileType !== undefined) {
    return { profileType: input.profileType };
  }

  return {};
};

/**
 * Runs every analysis type against the snapshot and merges their
 * recommendations. A failed analysis is reported but does not stop the others.
 */
export const runRecommendCommand = async (
  input: RecommendCommandInput,
  runtime: CliRuntimeOptions,
  logger: Logger,
): Promise<RecommendCommandResult> => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const snapshot = loadSnapshot(input.snapshotPath, invocationCwd);
  const projectId = snapshot.project.projectId;
  logger.info(`running ${ANALYSIS_TYPES.length} analyses for ${snapshot.project.projectName}`);

  const orchestrator = createSnapshotOrchestrator(snapshot, runtime, logger);
  const analyses: AnalysisOutcome[] = [];
  // one at a time: six analyses would exceed the per-project job limit
  for (const analysisType of ANALYSIS_TYPES) {
    const jobId = orchestrator.submit(projectId, analysisType, optionsFor(analysisType, input));
    const job = await orchestrator.waitForJob(jobId);
    if (job.status === "failed") {
      logger.warn(`${analysisType} failed: ${job.errorMessage}`);
      analyses.push({ analysisType, status: "failed", errorCode: job.errorCode, errorMessage: job.errorMessage });
    } else {
      analyses.push({ analysisType, status: "completed" });
    }
  }

  const recommendations = orchestrator.generateRecommendations(projectId);
  return { projectId, analyses, recommendations };
};
