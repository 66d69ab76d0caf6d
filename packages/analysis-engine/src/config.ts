import type { ImpactWeights, PerformanceProfileType } from "@depintel/core";

export type ImpactScoringConfig = {
  weights: ImpactWeights;
  highThreshold: number;
  mediumThreshold: number;
  complexityWeights: {
    transitiveDependencies: number;
    releaseChurn: number;
  };
  // transitive dependency count at which the complexity component reaches 0.5
  transitiveHalfLife: number;
  // releases per year at which the churn component reaches 0.5
  releaseChurnHalfLife: number;
  releaseWindow: number;
  lowBusinessValueThreshold: number;
  poorHealthThreshold: number;
};

export type HealthMonitoringConfig = {
  weights: {
    recency: number;
    community: number;
    security: number;
  };
  communityWeights: {
    contributors: number;
    issueHygiene: number;
  };
  // recency decays linearly to 0 over this many days without a release
  staleAfterDays: number;
  outdatedAfterDays: number;
  healthyThreshold: number;
  atRiskThreshold: number;
  deprecatedScoreCap: number;
  contributorHalfLife: number;
  fewContributorsThreshold: number;
  highOpenIssueRatio: number;
  vulnerabilityPenalty: {
    critical: number;
    high: number;
    medium: number;
    low: number;
  };
  topRiskFactorCount: number;
};

export type CompatibilityPredictionConfig = {
  timeHorizonDays: number;
  releaseWindow: number;
  majorBumpsPerYearThreshold: number;
  minorLagThreshold: number;
  defaultCompatibilityScore: number;
};

export type ConsolidationConfig = {
  bloatThreshold: number;
};

export type LicenseComplianceConfig = {
  defaultTargetLicense: string;
};

export type PerformanceProfilingConfig = {
  defaultProfileType: PerformanceProfileType;
  largeSharePercent: number;
  mediumSharePercent: number;
  largestCount: number;
  highRuntimeMs: number;
  mediumRuntimeMs: number;
  topRuntimeCount: number;
};

export type AnalysisEngineConfig = {
  impact: ImpactScoringConfig;
  health: HealthMonitoringConfig;
  compatibility: CompatibilityPredictionConfig;
  consolidation: ConsolidationConfig;
  license: LicenseComplianceConfig;
  performance: PerformanceProfilingConfig;
};

export type AnalysisEngineConfigOverrides = {
  [K in keyof AnalysisEngineConfig]?: Partial<AnalysisEngineConfig[K]>;
};

export const DEFAULT_ANALYSIS_ENGINE_CONFIG: AnalysisEngineConfig = {
  impact: {
    weights: {
      businessValue: 0.35,
      usage: 0.25,
      complexity: 0.15,
      health: 0.25,
    },
    highThreshold: 0.8,
    mediumThreshold: 0.5,
    complexityWeights: {
      transitiveDependencies: 0.6,
      releaseChurn: 0.4,
    },
    transitiveHalfLife: 10,
    releaseChurnHalfLife: 12,
    releaseWindow: 10,
    lowBusinessValueThreshold: 0.3,
    poorHealthThreshold: 0.4,
  },
  health: {
    weights: {
      recency: 0.45,
      community: 0.35,
      security: 0.2,
    },
    communityWeights: {
      contributors: 0.5,
      issueHygiene: 0.5,
    },
    staleAfterDays: 730,
    outdatedAfterDays: 365,
    healthyThreshold: 0.7,
    atRiskThreshold: 0.4,
    deprecatedScoreCap: 0.1,
    contributorHalfLife: 5,
    fewContributorsThreshold: 3,
    highOpenIssueRatio: 0.5,
    vulnerabilityPenalty: {
      critical: 0.5,
      high: 0.3,
      medium: 0.15,
      low: 0.05,
    },
    topRiskFactorCount: 5,
  },
  compatibility: {
    timeHorizonDays: 180,
    releaseWindow: 10,
    majorBumpsPerYearThreshold: 1,
    minorLagThreshold: 2,
    defaultCompatibilityScore: 0.5,
  },
  consolidation: {
    bloatThreshold: 3,
  },
  license: {
    defaultTargetLicense: "MIT",
  },
  performance: {
    defaultProfileType: "bundle_size",
    largeSharePercent: 10,
    mediumSharePercent: 5,
    largestCount: 10,
    highRuntimeMs: 10,
    mediumRuntimeMs: 5,
    topRuntimeCount: 5,
  },
};

export const mergeEngineConfig = (
  overrides: AnalysisEngineConfigOverrides | undefined,
): AnalysisEngineConfig => {
  if (overrides === undefined) {
    return DEFAULT_ANALYSIS_ENGINE_CONFIG;
  }

  const base = DEFAULT_ANALYSIS_ENGINE_CONFIG;
  return {
    impact: { ...base.impact, ...overrides.impact },
    health: { ...base.health, ...overrides.health },
    compatibility: { ...base.compatibility, ...overrides.compatibility },
    consolidation: { ...base.consolidation, ...overrides.consolidation },
    license: { ...base.license, ...overrides.license },
    performance: { ...base.performance, ...overrides.performance },
  };
};
