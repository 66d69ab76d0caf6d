import type { AnalysisResult, Recommendation, Severity } from "@depintel/core";
import { DEFAULT_ANALYSIS_ENGINE_CONFIG, type AnalysisEngineConfig } from "../config.js";
import { extractRecommendations } from "./run-analysis.js";

const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  high: 3,
  medium: 2,
  low: 1,
};

const dedupeKey = (recommendation: Recommendation): string =>
  `${recommendation.dependency?.id ?? `title:${recommendation.title}`}\u0000${recommendation.type}`;

export const compareRecommendations = (a: Recommendation, b: Recommendation): number =>
  SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
  (a.dependency?.name ?? "").localeCompare(b.dependency?.name ?? "") ||
  a.title.localeCompare(b.title);

/**
 * Merges the recommendations implied by each analysis result. Entries that
 * target the same dependency with the same recommendation type collapse into
 * the one with the higher severity (the earlier one on a tie).
 */
export const generateRecommendations = (
  results: readonly AnalysisResult[],
  config: AnalysisEngineConfig = DEFAULT_ANALYSIS_ENGINE_CONFIG,
): readonly Recommendation[] => {
  const byKey = new Map<string, Recommendation>();

  for (const result of results) {
    for (const recommendation of extractRecommendations(result, config)) {
      const key = dedupeKey(recommendation);
      const existing = byKey.get(key);
      if (existing === undefined || SEVERITY_RANK[recommendation.severity] > SEVERITY_RANK[existing.severity]) {
        byKey.set(key, recommendation);
      }
    }
  }

  return [...byKey.values()].sort(compareRecommendations);
};
