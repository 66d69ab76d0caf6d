import type { RecommendCommandResult } from "./run-recommend-command.js";

export type RecommendOutputMode = "summary" | "json";

const createSummaryShape = (result: RecommendCommandResult) => ({
  projectId: result.projectId,
  failedAnalyses: result.analyses.flatMap((outcome) =>
    outcome.status === "failed" ? [`${outcome.analysisType}: ${outcome.errorMessage}`] : [],
  ),
  recommendationCount: result.recommendations.length,
  recommendations: result.recommendations.map(
    (recommendation) => `[${recommendation.severity}] ${recommendation.title} (${recommendation.type})`,
  ),
});

export const formatRecommendOutput = (result: RecommendCommandResult, mode: RecommendOutputMode): string =>
  mode === "json" ? JSON.stringify(result, null, 2) : JSON.stringify(createSummaryShape(result), null, 2);
