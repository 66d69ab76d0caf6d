import {
  ANALYSIS_RESULT_SCHEMA_VERSION,
  toDependencyRef,
  type DependencyGraph,
  type DependencyHealth,
  type DependencyNode,
  type DependencyRef,
  type HealthAnalysisResult,
  type HealthRecommendation,
  type HealthRiskFactor,
  type HealthStatus,
  type Recommendation,
  type Severity,
} from "@depintel/core";
import type { AnalysisEngineConfig, HealthMonitoringConfig } from "../config.js";
import { computeHealthScore, type HealthAssessment } from "../domain/health-score.js";
import { average, percentile, round1, round4 } from "../domain/math.js";
import type { HealthMonitoringOptions } from "../domain/options.js";

const URGENCY_BY_STATUS: Readonly<Record<HealthStatus, Severity>> = {
  at_risk: "high",
  moderate: "medium",
  healthy: "low",
};

type Assessed = {
  node: DependencyNode;
  assessment: HealthAssessment;
};

const findAlternative = (subject: Assessed, peers: readonly Assessed[]): DependencyRef | null => {
  if (subject.node.category === null) {
    return null;
  }

  const candidates = peers
    .filter(
      (peer) =>
        peer.node.id !== subject.node.id &&
        peer.node.ecosystem === subject.node.ecosystem &&
        peer.node.category === subject.node.category &&
        peer.node.deprecated !== true &&
        peer.assessment.score !== null &&
        (subject.assessment.score === null || peer.assessment.score > subject.assessment.score),
    )
    .sort(
      (a, b) =>
        (b.assessment.score ?? 0) - (a.assessment.score ?? 0) || a.node.name.localeCompare(b.node.name),
    );

  const best = candidates[0];
  return best === undefined ? null : toDependencyRef(best.node);
};

const recommendationFor = (
  subject: Assessed,
  alternative: DependencyRef | null,
  config: HealthMonitoringConfig,
): HealthRecommendation | null => {
  const { assessment, node } = subject;
  const urgency = URGENCY_BY_STATUS[assessment.status];

  if (node.deprecated === true) {
    return {
      action: "replace",
      urgency,
      reason: `${node.name} is deprecated`,
      alternative,
    };
  }

  if (assessment.score === null) {
    return null;
  }

  if (assessment.status === "at_risk") {
    return alternative === null
      ? { action: "monitor", urgency, reason: `${node.name} has a health score of ${assessment.score}`, alternative }
      : {
          action: "consider_replacement",
          urgency,
          reason: `${node.name} has a health score of ${assessment.score}; ${alternative.name} is healthier`,
          alternative,
        };
  }

  if (assessment.status === "moderate") {
    return { action: "monitor", urgency, reason: `${node.name} has a health score of ${assessment.score}`, alternative: null };
  }

  if (assessment.daysSinceLastRelease !== null && assessment.daysSinceLastRelease > config.outdatedAfterDays) {
    return {
      action: "update_available",
      urgency,
      reason: `${node.name} has not published a release in ${assessment.daysSinceLastRelease} days`,
      alternative: null,
    };
  }

  return null;
};

/**
 * Scores the health of every dependency in the graph and attaches a suggested
 * action (replace, monitor, update) where one applies.
 */
export const monitorHealth = (
  graph: DependencyGraph,
  options: HealthMonitoringOptions,
  config: AnalysisEngineConfig,
): HealthAnalysisResult => {
  const healthConfig = config.health;
  const assessed: Assessed[] = graph.nodes
    .filter((node) => options.includeTransitive || node.direct)
    .map((node) => ({ node, assessment: computeHealthScore(node, graph.referenceDate, healthConfig) }));

  const dependencies: DependencyHealth[] = assessed.map((subject) => {
    const { node, assessment } = subject;
    const needsAlternative = node.deprecated === true || assessment.status === "at_risk";
    const alternative = needsAlternative ? findAlternative(subject, assessed) : null;

    return {
      dependency: toDependencyRef(node),
      direct: node.direct,
      currentVersion: node.currentVersion,
      latestVersion: node.latestVersion,
      healthScore: assessment.score,
      status: assessment.status,
      deprecated: node.deprecated === true,
      daysSinceLastRelease: assessment.daysSinceLastRelease,
      factors: assessment.factors,
      riskFactors: assessment.riskFactors,
      recommendation: recommendationFor(subject, alternative, healthConfig),
    };
  });

  dependencies.sort((a, b) => {
    if (a.healthScore === null || b.healthScore === null) {
      return (
        Number(a.healthScore === null) - Number(b.healthScore === null) ||
        a.dependency.name.localeCompare(b.dependency.name)
      );
    }

    return a.healthScore - b.healthScore || a.dependency.name.localeCompare(b.dependency.name);
  });

  const total = dependencies.length;
  const knownScores = dependencies.flatMap((entry) => (entry.healthScore === null ? [] : [entry.healthScore]));
  const countStatus = (status: HealthStatus): number => dependencies.filter((entry) => entry.status === status).length;
  const bucket = (status: HealthStatus) => {
    const count = countStatus(status);
    return { count, percentage: total === 0 ? 0 : round1((count / total) * 100) };
  };

  const factorCounts = new Map<HealthRiskFactor, number>();
  for (const entry of dependencies) {
    for (const factor of entry.riskFactors) {
      factorCounts.set(factor, (factorCounts.get(factor) ?? 0) + 1);
    }
  }

  return {
    schemaVersion: ANALYSIS_RESULT_SCHEMA_VERSION,
    analysisType: "health_monitoring",
    generatedAt: graph.referenceDate,
    summary: {
      totalDependencies: total,
      healthyCount: countStatus("healthy"),
      moderateCount: countStatus("moderate"),
      atRiskCount: countStatus("at_risk"),
      unknownCount: total - knownScores.length,
      deprecatedCount: dependencies.filter((entry) => entry.deprecated).length,
      outdatedCount: dependencies.filter(
        (entry) =>
          entry.daysSinceLastRelease !== null && entry.daysSinceLastRelease > healthConfig.outdatedAfterDays,
      ).length,
      averageScore: knownScores.length === 0 ? null : round4(average(knownScores)),
      medianScore: knownScores.length === 0 ? null : round4(percentile(knownScores, 0.5)),
      distribution: {
        healthy: bucket("healthy"),
        moderate: bucket("moderate"),
        at_risk: bucket("at_risk"),
      },
      topRiskFactors: [...factorCounts.entries()]
        .map(([factor, count]) => ({ factor, count }))
        .sort((a, b) => b.count - a.count || a.factor.localeCompare(b.factor))
        .slice(0, healthConfig.topRiskFactorCount),
    },
    details: { dependencies },
  };
};

export const recommendFromHealth = (result: HealthAnalysisResult): readonly Recommendation[] =>
  result.details.dependencies.flatMap((entry): Recommendation[] => {
    const recommendation = entry.recommendation;
    if (recommendation === null) {
      return [];
    }

    const name = entry.dependency.name;
    const titles: Readonly<Record<HealthRecommendation["action"], string>> = {
      replace: `Replace deprecated dependency ${name}`,
      consider_replacement: `Consider replacing ${name}`,
      monitor: `Monitor the health of ${name}`,
      update_available: `Check ${name} for maintenance activity`,
    };
    const alternative = recommendation.alternative === null ? "" : ` Alternative: ${recommendation.alternative.name}.`;

    return [
      {
        title: titles[recommendation.action],
        description: `${recommendation.reason}.${alternative}`,
        type: "health",
        kind: recommendation.action,
        sourceAnalysis: "health_monitoring",
        severity: recommendation.urgency,
        dependency: entry.dependency,
        versionTransition:
          recommendation.action === "update_available" && entry.latestVersion !== null
            ? { from: entry.currentVersion, to: entry.latestVersion }
            : null,
      },
    ];
  });
