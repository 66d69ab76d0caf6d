export {
  DEFAULT_ANALYSIS_ENGINE_CONFIG,
  mergeEngineConfig,
  type AnalysisEngineConfig,
  type AnalysisEngineConfigOverrides,
  type CompatibilityPredictionConfig,
  type ConsolidationConfig,
  type HealthMonitoringConfig,
  type ImpactScoringConfig,
  type LicenseComplianceConfig,
  type PerformanceProfilingConfig,
} from "./config.js";
export { analyzeConsolidation, recommendFromConsolidation } from "./application/analyze-consolidation.js";
export {
  assessDependencyLicense,
  checkLicenseCompliance,
  recommendFromLicense,
} from "./application/check-license-compliance.js";
export { compareRecommendations, generateRecommendations } from "./application/generate-recommendations.js";
export { monitorHealth, recommendFromHealth } from "./application/monitor-health.js";
export { predictCompatibility, recommendFromCompatibility } from "./application/predict-compatibility.js";
export { profilePerformance, recommendFromPerformance } from "./application/profile-performance.js";
export {
  extractRecommendations,
  runAnalysis,
  validateAnalysisRequest,
  type AnalysisOptionsByType,
  type AnalyzerDefinition,
} from "./application/run-analysis.js";
export { recommendFromImpact, scoreImpact } from "./application/score-impact.js";
export { computeHealthScore, type HealthAssessment } from "./domain/health-score.js";
export {
  createLicenseCatalog,
  evaluateLicenseExpression,
  loadDefaultLicenseCatalog,
  normalizeLicense,
  type LicenseCatalog,
} from "./domain/license-catalog.js";
export type {
  CompatibilityPredictionOptions,
  ConsolidationOptions,
  HealthMonitoringOptions,
  ImpactScoringOptions,
  LicenseComplianceOptions,
  PerformanceProfilingOptions,
} from "./domain/options.js";
