import type { AnalysisResult } from "@depintel/core";

export type AnalyzeOutputMode = "summary" | "json";

const TOP_COUNT = 5;

type SummaryShape = {
  analysisType: AnalysisResult["analysisType"];
  generatedAt: string;
  summary: AnalysisResult["summary"];
  highlights: readonly string[];
};

const highlightsOf = (result: AnalysisResult): readonly string[] => {
  switch (result.analysisType) {
    case "impact_scoring":
      return result.details.scores
        .slice(0, TOP_COUNT)
        .map((score) => `${score.dependency.name}: ${score.overallScore} (${score.impactLevel})`);
    case "compatibility_prediction":
      return result.details.timeline
        .slice(0, TOP_COUNT)
        .map(
          (entry) =>
            `${entry.date}: ${entry.events.map((event) => `${event.dependency.name} ${event.type}`).join(", ")}`,
        );
    case "dependency_consolidation":
      return result.details.duplicates.map(
        (group) => `${group.category}: keep ${group.keep.name}, remove ${group.remove.map((ref) => ref.name).join(", ")}`,
      );
    case "health_monitoring":
      return result.details.dependencies
        .filter((entry) => entry.healthScore !== null)
        .slice(0, TOP_COUNT)
        .map((entry) => `${entry.dependency.name}: ${entry.healthScore} (${entry.status})`);
    case "license_compliance":
      return result.details.highRiskDependencies.map(
        (entry) => `${entry.dependency.name}: ${entry.reasons.join("; ")}`,
      );
    case "performance_profiling": {
      const details = result.details;
      return details.profileType === "bundle_size"
        ? details.largest
            .slice(0, TOP_COUNT)
            .map((entry) => `${entry.dependency.name}: ${entry.minifiedBytes} bytes (${entry.sizeClass})`)
        : details.highestRuntime
            .map((entry) => `${entry.dependency.name}: ${entry.runtimeMs}ms (${entry.impact})`);
    }
  }
};

const createSummaryShape = (result: AnalysisResult): SummaryShape => ({
  analysisType: result.analysisType,
  generatedAt: result.generatedAt,
  summary: result.summary,
  highlights: highlightsOf(result),
});

export const formatAnalyzeOutput = (result: AnalysisResult, mode: AnalyzeOutputMode): string =>
  mode === "json" ? JSON.stringify(result, null, 2) : JSON.stringify(createSummaryShape(result), null, 2);
