import type {
  DependencyNode,
  HealthFactorScores,
  HealthRiskFactor,
  HealthStatus,
} from "@depintel/core";
import type { HealthMonitoringConfig } from "../config.js";
import { daysBetween, halfLifeRisk, round4, toUnitInterval, weightedKnownMean } from "./math.js";

export type HealthAssessment = {
  score: number | null;
  status: HealthStatus;
  factors: HealthFactorScores;
  daysSinceLastRelease: number | null;
  riskFactors: readonly HealthRiskFactor[];
};

export const lastReleaseDate = (node: DependencyNode): string | null => {
  let latest: string | null = null;
  for (const release of node.releases) {
    if (release.isYanked) {
      continue;
    }
    if (latest === null || Date.parse(release.releaseDate) > Date.parse(latest)) {
      latest = release.releaseDate;
    }
  }

  return latest;
};

export const healthStatusOf = (score: number | null, config: HealthMonitoringConfig): HealthStatus => {
  if (score === null) {
    return "moderate";
  }
  if (score >= config.healthyThreshold) {
    return "healthy";
  }
  if (score >= config.atRiskThreshold) {
    return "moderate";
  }

  return "at_risk";
};

const communityScore = (node: DependencyNode, config: HealthMonitoringConfig): number | null => {
  const { contributorCount, openIssueRatio } = node.community;
  return weightedKnownMean([
    {
      weight: config.communityWeights.contributors,
      value: contributorCount === null ? null : halfLifeRisk(contributorCount, config.contributorHalfLife),
    },
    {
      weight: config.communityWeights.issueHygiene,
      value: openIssueRatio === null ? null : 1 - toUnitInterval(openIssueRatio),
    },
  ]);
};

const securityScore = (node: DependencyNode, config: HealthMonitoringConfig): number | null => {
  if (node.vulnerabilities === null) {
    return null;
  }

  const penalty = node.vulnerabilities.reduce(
    (sum, vulnerability) => sum + config.vulnerabilityPenalty[vulnerability.severity],
    0,
  );
  return toUnitInterval(1 - penalty);
};

/**
 * Composite health in [0, 1] built from release recency, community strength and
 * known vulnerabilities. Factors without data drop out of the weighting; when
 * none is known the score is null. Deprecated packages never exceed the cap.
 */
export const computeHealthScore = (
  node: DependencyNode,
  referenceDate: string,
  config: HealthMonitoringConfig,
): HealthAssessment => {
  const lastRelease = lastReleaseDate(node);
  const daysSinceLastRelease =
    lastRelease === null ? null : Math.max(0, Math.floor(daysBetween(lastRelease, referenceDate)));

  const community = communityScore(node, config);
  const factors: HealthFactorScores = {
    recency:
      daysSinceLastRelease === null
        ? null
        : round4(Math.max(0, 1 - daysSinceLastRelease / config.staleAfterDays)),
    community: community === null ? null : round4(community),
    security: securityScore(node, config),
  };

  let score = weightedKnownMean([
    { weight: config.weights.recency, value: factors.recency },
    { weight: config.weights.community, value: factors.community },
    { weight: config.weights.security, value: factors.security },
  ]);

  const deprecated = node.deprecated === true;
  if (deprecated) {
    score = score === null ? config.deprecatedScoreCap : Math.min(score, config.deprecatedScoreCap);
  }
  if (score !== null) {
    score = round4(score);
  }

  const riskFactors: HealthRiskFactor[] = [];
  if (deprecated) {
    riskFactors.push("deprecated");
  }
  if (daysSinceLastRelease !== null && daysSinceLastRelease > config.staleAfterDays) {
    riskFactors.push("stale_release");
  } else if (daysSinceLastRelease !== null && daysSinceLastRelease > config.outdatedAfterDays) {
    riskFactors.push("no_recent_release");
  }
  if (
    node.community.contributorCount !== null &&
    node.community.contributorCount < config.fewContributorsThreshold
  ) {
    riskFactors.push("few_contributors");
  }
  if (node.community.openIssueRatio !== null && node.community.openIssueRatio > config.highOpenIssueRatio) {
    riskFactors.push("high_open_issue_ratio");
  }
  if (node.vulnerabilities !== null && node.vulnerabilities.length > 0) {
    riskFactors.push("known_vulnerabilities");
  }
  if (!node.metadataAvailable) {
    riskFactors.push("metadata_unavailable");
  }

  return {
    score,
    status: healthStatusOf(score, config),
    factors,
    daysSinceLastRelease,
    riskFactors,
  };
};
