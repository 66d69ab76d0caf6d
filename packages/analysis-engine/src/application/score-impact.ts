import {
  ANALYSIS_RESULT_SCHEMA_VERSION,
  toDependencyRef,
  type DependencyGraph,
  type DependencyImpactScore,
  type DependencyNode,
  type ImpactAnalysisResult,
  type ImpactFactor,
  type ImpactLevel,
  type Recommendation,
} from "@depintel/core";
import { collectTransitiveDependencies, createGraphIndex, getDirectNodes } from "@depintel/dependency-graph";
import type { AnalysisEngineConfig, ImpactScoringConfig } from "../config.js";
import { computeHealthScore } from "../domain/health-score.js";
import {
  average,
  daysBetween,
  halfLifeRisk,
  normalizeWeights,
  percentile,
  round4,
  toUnitInterval,
  weightedKnownMean,
} from "../domain/math.js";
import type { ImpactScoringOptions } from "../domain/options.js";

const NEUTRAL_SCORE = 0.5;

const ALL_ENABLED = { businessValue: true, usage: true, complexity: true, health: true } as const;

/**
 * Releases per year across the most recent `window` non-yanked releases.
 */
export const releaseChurn = (node: DependencyNode, window: number): number | null => {
  const dates = node.releases
    .filter((release) => !release.isYanked)
    .map((release) => release.releaseDate)
    .sort((a, b) => Date.parse(a) - Date.parse(b))
    .slice(-Math.max(2, window));

  const first = dates[0];
  const last = dates[dates.length - 1];
  if (dates.length < 2 || first === undefined || last === undefined) {
    return null;
  }

  const spanDays = Math.max(1, daysBetween(first, last));
  return ((dates.length - 1) * 365) / spanDays;
};

const impactLevelOf = (score: number, config: ImpactScoringConfig): ImpactLevel => {
  if (score >= config.highThreshold) {
    return "high";
  }
  if (score >= config.mediumThreshold) {
    return "medium";
  }

  return "low";
};

const businessValueOf = (node: DependencyNode): number | null => {
  if (node.usage === null) {
    return null;
  }

  const used = node.usage.usedFeatures.length;
  const unused = node.usage.unusedFeatures.length;
  return used + unused === 0 ? null : used / (used + unused);
};

/**
 * Scores every direct dependency by how much the project stands to lose if it
 * breaks: business value, usage intensity, complexity and (inverted) health.
 */
export const scoreImpact = (
  graph: DependencyGraph,
  options: ImpactScoringOptions,
  config: AnalysisEngineConfig,
): ImpactAnalysisResult => {
  const index = createGraphIndex(graph);
  const weights = normalizeWeights(options.weights, ALL_ENABLED);
  const impactConfig = config.impact;

  const scores: DependencyImpactScore[] = getDirectNodes(graph).map((node) => {
    const unknownFactors: ImpactFactor[] = [];

    const businessValue = businessValueOf(node);
    if (businessValue === null) {
      unknownFactors.push("business_value");
    }

    const usage = node.usage?.usageScore ?? null;
    if (usage === null) {
      unknownFactors.push("usage");
    }

    const health = computeHealthScore(node, graph.referenceDate, config.health).score;
    if (health === null) {
      unknownFactors.push("health");
    }

    const transitiveDependencyCount = collectTransitiveDependencies(node.id, index).length;
    const releasesPerYear = releaseChurn(node, impactConfig.releaseWindow);
    const complexity =
      weightedKnownMean([
        {
          weight: impactConfig.complexityWeights.transitiveDependencies,
          value: halfLifeRisk(transitiveDependencyCount, impactConfig.transitiveHalfLife),
        },
        {
          weight: impactConfig.complexityWeights.releaseChurn,
          value: releasesPerYear === null ? null : halfLifeRisk(releasesPerYear, impactConfig.releaseChurnHalfLife),
        },
      ]) ?? 0;

    const businessValueScore = round4(toUnitInterval(businessValue ?? NEUTRAL_SCORE));
    const usageScore = round4(toUnitInterval(usage ?? NEUTRAL_SCORE));
    const complexityScore = round4(complexity);
    const overallScore = round4(
      toUnitInterval(
        weights.businessValue * businessValueScore +
          weights.usage * usageScore +
          weights.complexity * complexityScore +
          weights.health * (1 - (health ?? NEUTRAL_SCORE)),
      ),
    );

    return {
      dependency: toDependencyRef(node),
      currentVersion: node.currentVersion,
      businessValueScore,
      usageScore,
      complexityScore,
      healthScore: health,
      overallScore,
      impactLevel: impactLevelOf(overallScore, impactConfig),
      transitiveDependencyCount,
      releasesPerYear: releasesPerYear === null ? null : round4(releasesPerYear),
      unknownFactors,
    };
  });

  scores.sort(
    (a, b) =>
      b.overallScore - a.overallScore ||
      b.businessValueScore - a.businessValueScore ||
      a.dependency.name.localeCompare(b.dependency.name),
  );

  const overall = scores.map((score) => score.overallScore);
  const knownHealth = scores.flatMap((score) => (score.healthScore === null ? [] : [score.healthScore]));

  return {
    schemaVersion: ANALYSIS_RESULT_SCHEMA_VERSION,
    analysisType: "impact_scoring",
    generatedAt: graph.referenceDate,
    summary: {
      totalDependencies: scores.length,
      highImpactCount: scores.filter((score) => score.impactLevel === "high").length,
      mediumImpactCount: scores.filter((score) => score.impactLevel === "medium").length,
      lowImpactCount: scores.filter((score) => score.impactLevel === "low").length,
      averageScore: round4(average(overall)),
      medianScore: round4(percentile(overall, 0.5)),
      componentAverages: {
        businessValue: round4(average(scores.map((score) => score.businessValueScore))),
        usage: round4(average(scores.map((score) => score.usageScore))),
        complexity: round4(average(scores.map((score) => score.complexityScore))),
        health: round4(average(knownHealth)),
      },
      weights: {
        businessValue: round4(weights.businessValue),
        usage: round4(weights.usage),
        complexity: round4(weights.complexity),
        health: round4(weights.health),
      },
    },
    details: { scores },
  };
};

export const recommendFromImpact = (
  result: ImpactAnalysisResult,
  config: AnalysisEngineConfig,
): readonly Recommendation[] =>
  result.details.scores.flatMap((score): Recommendation[] => {
    const recommendations: Recommendation[] = [];
    const name = score.dependency.name;

    if (score.impactLevel === "high") {
      recommendations.push({
        title: `Monitor high-impact dependency ${name}`,
        description: `${name} scores ${score.overallScore} on impact; changes to it are likely to affect the project broadly.`,
        type: "impact",
        kind: "impact_monitoring",
        sourceAnalysis: "impact_scoring",
        severity: "high",
        dependency: score.dependency,
        versionTransition: null,
      });
    }

    if (
      !score.unknownFactors.includes("business_value") &&
      score.businessValueScore <= config.impact.lowBusinessValueThreshold
    ) {
      recommendations.push({
        title: `Review low-value usage of ${name}`,
        description: `Only ${Math.round(score.businessValueScore * 100)}% of the imported features of ${name} are used.`,
        type: "consolidation",
        kind: "usage_optimization",
        sourceAnalysis: "impact_scoring",
        severity: "medium",
        dependency: score.dependency,
        versionTransition: null,
      });
    }

    if (score.healthScore !== null && score.healthScore < config.impact.poorHealthThreshold) {
      recommendations.push({
        title: `Improve health exposure of ${name}`,
        description: `${name} has a health score of ${score.healthScore}.`,
        type: "health",
        kind: "health_improvement",
        sourceAnalysis: "impact_scoring",
        severity: "medium",
        dependency: score.dependency,
        versionTransition: null,
      });
    }

    return recommendations;
  });
