import type { DependencyRef, Ecosystem, VersionUsage } from "./graph.js";

export const ANALYSIS_RESULT_SCHEMA_VERSION = "depintel.analysis.v1" as const;

export const ANALYSIS_TYPES = [
  "impact_scoring",
  "compatibility_prediction",
  "dependency_consolidation",
  "health_monitoring",
  "license_compliance",
  "performance_profiling",
] as const;

export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export const isAnalysisType = (value: string): value is AnalysisType =>
  ANALYSIS_TYPES.some((type) => type === value);

export type Severity = "high" | "medium" | "low";

export type AnalysisResultEnvelope<T extends AnalysisType, S, D> = {
  schemaVersion: typeof ANALYSIS_RESULT_SCHEMA_VERSION;
  analysisType: T;
  generatedAt: string;
  summary: S;
  details: D;
};

// impact_scoring

export type ImpactLevel = Severity;

export type ImpactWeights = {
  businessValue: number;
  usage: number;
  complexity: number;
  health: number;
};

export type ImpactFactor = "business_value" | "usage" | "health";

export type DependencyImpactScore = {
  dependency: DependencyRef;
  currentVersion: string | null;
  businessValueScore: number;
  usageScore: number;
  complexityScore: number;
  healthScore: number | null;
  overallScore: number;
  impactLevel: ImpactLevel;
  transitiveDependencyCount: number;
  releasesPerYear: number | null;
  unknownFactors: readonly ImpactFactor[];
};

export type ImpactSummary = {
  totalDependencies: number;
  highImpactCount: number;
  mediumImpactCount: number;
  lowImpactCount: number;
  averageScore: number;
  medianScore: number;
  componentAverages: ImpactWeights;
  weights: ImpactWeights;
};

export type ImpactDetails = {
  scores: readonly DependencyImpactScore[];
};

export type ImpactAnalysisResult = AnalysisResultEnvelope<"impact_scoring", ImpactSummary, ImpactDetails>;

// compatibility_prediction

type CompatibilityEventBase = {
  dependency: DependencyRef;
  date: string;
  isTransitive: boolean;
};

export type BreakingChangeEvent = CompatibilityEventBase & {
  type: "breaking_change";
  version: string;
  reason: "yanked_release" | "breaking_change_marker";
  description: string;
  compatibilityScore: number;
};

export type DeprecationEvent = CompatibilityEventBase & {
  type: "deprecation";
  reason: "deprecated_flag" | "major_version_behind" | "minor_version_lag";
  currentVersion: string | null;
  latestVersion: string | null;
  minorVersionsBehind: number | null;
};

export type PredictedReleaseEvent = CompatibilityEventBase & {
  type: "predicted_release";
  isMajor: boolean;
  meanIntervalDays: number;
  confidence: number;
};

export type CompatibilityEvent = BreakingChangeEvent | DeprecationEvent | PredictedReleaseEvent;

export type CompatibilityTimelineEntry = {
  date: string;
  events: readonly CompatibilityEvent[];
};

export type IssueSeverity = Severity | "unknown";

export type DependencyCompatibilityIssue = {
  dependency: DependencyRef;
  severity: IssueSeverity;
  currentVersion: string | null;
  latestVersion: string | null;
  breakingChangeCount: number;
  deprecationCount: number;
  predictedReleaseCount: number;
  predictedMajorRelease: boolean;
  hasReleaseHistory: boolean;
  isTransitive: boolean;
};

export type CompatibilitySummary = {
  totalDependencies: number;
  analyzedDependencies: number;
  affectedDependencies: number;
  eventCount: number;
  issueCounts: Readonly<Record<IssueSeverity, number>>;
  timeHorizonDays: number;
};

export type CompatibilityDetails = {
  timeline: readonly CompatibilityTimelineEntry[];
  dependencyIssues: readonly DependencyCompatibilityIssue[];
};

export type CompatibilityAnalysisResult = AnalysisResultEnvelope<
  "compatibility_prediction",
  CompatibilitySummary,
  CompatibilityDetails
>;

// dependency_consolidation

export type DuplicateFunctionalityGroup = {
  ecosystem: Ecosystem;
  category: string;
  keep: DependencyRef;
  remove: readonly DependencyRef[];
  reason: string;
};

export type VersionInconsistency = {
  dependency: DependencyRef;
  versions: readonly VersionUsage[];
  recommendedVersion: string;
  satisfiesAllConstraints: boolean;
  unsatisfiedConstraints: readonly string[];
};

export type TransitiveBloat = {
  dependency: DependencyRef;
  depth: number;
  reachedBy: readonly string[];
  shortestChain: readonly string[];
};

export type ConsolidationSummary = {
  totalDependencies: number;
  directDependencies: number;
  transitiveDependencies: number;
  duplicateGroups: number;
  duplicateRemovals: number;
  potentialRemovals: number;
  chainReduction: number;
  versionInconsistencies: number;
  reductionPercent: number;
  ecosystemCounts: Readonly<Record<Ecosystem, number>>;
};

export type ConsolidationDetails = {
  duplicates: readonly DuplicateFunctionalityGroup[];
  versionInconsistencies: readonly VersionInconsistency[];
  transitiveBloat: readonly TransitiveBloat[];
};

export type ConsolidationAnalysisResult = AnalysisResultEnvelope<
  "dependency_consolidation",
  ConsolidationSummary,
  ConsolidationDetails
>;

// health_monitoring

export type HealthStatus = "healthy" | "moderate" | "at_risk";

export type HealthRiskFactor =
  | "deprecated"
  | "stale_release"
  | "no_recent_release"
  | "few_contributors"
  | "high_open_issue_ratio"
  | "known_vulnerabilities"
  | "metadata_unavailable";

export type HealthAction = "replace" | "consider_replacement" | "monitor" | "update_available";

export type HealthRecommendation = {
  action: HealthAction;
  urgency: Severity;
  reason: string;
  alternative: DependencyRef | null;
};

export type HealthFactorScores = {
  recency: number | null;
  community: number | null;
  security: number | null;
};

export type DependencyHealth = {
  dependency: DependencyRef;
  direct: boolean;
  currentVersion: string | null;
  latestVersion: string | null;
  healthScore: number | null;
  status: HealthStatus;
  deprecated: boolean;
  daysSinceLastRelease: number | null;
  factors: HealthFactorScores;
  riskFactors: readonly HealthRiskFactor[];
  recommendation: HealthRecommendation | null;
};

export type HealthDistributionBucket = {
  count: number;
  percentage: number;
};

export type HealthSummary = {
  totalDependencies: number;
  healthyCount: number;
  moderateCount: number;
  atRiskCount: number;
  unknownCount: number;
  deprecatedCount: number;
  outdatedCount: number;
  averageScore: number | null;
  medianScore: number | null;
  distribution: Readonly<Record<HealthStatus, HealthDistributionBucket>>;
  topRiskFactors: readonly { factor: HealthRiskFactor; count: number }[];
};

export type HealthDetails = {
  dependencies: readonly DependencyHealth[];
};

export type HealthAnalysisResult = AnalysisResultEnvelope<"health_monitoring", HealthSummary, HealthDetails>;

// license_compliance

export type LicenseClass =
  | "permissive"
  | "public_domain"
  | "weak_copyleft"
  | "strong_copyleft"
  | "proprietary"
  | "unknown";

export type LicenseCompatibility = "compatible" | "conditional" | "incompatible" | "unknown";

export type LicenseRiskLevel = Severity;

export type LicenseEvaluation = {
  license: string;
  licenseClass: LicenseClass;
  compatibility: LicenseCompatibility;
};

export type DependencyLicenseAssessment = {
  dependency: DependencyRef;
  direct: boolean;
  declaredLicenses: readonly string[];
  licenses: readonly LicenseEvaluation[];
  riskLevel: LicenseRiskLevel;
  reasons: readonly string[];
};

export type LicenseSummary = {
  targetLicense: string;
  totalDependencies: number;
  compliancePercentage: number;
  overallRiskLevel: LicenseRiskLevel;
  licenseCounts: Readonly<Record<string, number>>;
  riskCounts: Readonly<Record<LicenseRiskLevel, number>>;
  licenseClassCounts: Readonly<Record<LicenseClass, number>>;
};

export type LicenseDetails = {
  dependencies: readonly DependencyLicenseAssessment[];
  highRiskDependencies: readonly DependencyLicenseAssessment[];
};

export type LicenseAnalysisResult = AnalysisResultEnvelope<"license_compliance", LicenseSummary, LicenseDetails>;

// performance_profiling

export type PerformanceProfileType = "bundle_size" | "runtime";

export type BundleSizeClass = "large" | "medium" | "small" | "unknown";

export type DependencyBundleProfile = {
  dependency: DependencyRef;
  direct: boolean;
  minifiedBytes: number | null;
  gzippedBytes: number | null;
  percentOfTotal: number | null;
  sizeClass: BundleSizeClass;
};

export type BundleSizeSummary = {
  profileType: "bundle_size";
  totalDependencies: number;
  measuredDependencies: number;
  totalMinifiedBytes: number;
  totalGzippedBytes: number;
  directMinifiedBytes: number;
  directGzippedBytes: number;
  largeCount: number;
  mediumCount: number;
  smallCount: number;
  unknownCount: number;
};

export type BundleSizeDetails = {
  profileType: "bundle_size";
  dependencies: readonly DependencyBundleProfile[];
  largest: readonly DependencyBundleProfile[];
};

export type RuntimeImpact = Severity | "unknown";

export type DependencyRuntimeProfile = {
  dependency: DependencyRef;
  startupMs: number | null;
  runtimeMs: number | null;
  memoryMb: number | null;
  impact: RuntimeImpact;
};

export type RuntimeSummary = {
  profileType: "runtime";
  totalDependencies: number;
  measuredDependencies: number;
  totalStartupMs: number;
  totalRuntimeMs: number;
  totalMemoryMb: number;
  averageStartupMs: number;
  averageRuntimeMs: number;
  averageMemoryMb: number;
  highImpactCount: number;
  mediumImpactCount: number;
  lowImpactCount: number;
  unknownCount: number;
};

export type RuntimeDetails = {
  profileType: "runtime";
  dependencies: readonly DependencyRuntimeProfile[];
  highestRuntime: readonly DependencyRuntimeProfile[];
  highestMemory: readonly DependencyRuntimeProfile[];
};

export type PerformanceAnalysisResult = AnalysisResultEnvelope<
  "performance_profiling",
  BundleSizeSummary | RuntimeSummary,
  BundleSizeDetails | RuntimeDetails
>;

export type AnalysisResultByType = {
  impact_scoring: ImpactAnalysisResult;
  compatibility_prediction: CompatibilityAnalysisResult;
  dependency_consolidation: ConsolidationAnalysisResult;
  health_monitoring: HealthAnalysisResult;
  license_compliance: LicenseAnalysisResult;
  performance_profiling: PerformanceAnalysisResult;
};

export type AnalysisResult = AnalysisResultByType[AnalysisType];
