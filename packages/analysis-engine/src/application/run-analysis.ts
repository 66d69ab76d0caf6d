import {
  InvalidConfigurationError,
  isAnalysisType,
  type AnalysisJobConfig,
  type AnalysisResult,
  type AnalysisResultByType,
  type AnalysisType,
  type DependencyGraph,
  type Recommendation,
} from "@depintel/core";
import type { AnalysisEngineConfig } from "../config.js";
import { loadDefaultLicenseCatalog } from "../domain/license-catalog.js";
import {
  parseCompatibilityOptions,
  parseConsolidationOptions,
  parseHealthOptions,
  parseImpactOptions,
  parseLicenseOptions,
  parsePerformanceOptions,
  type CompatibilityPredictionOptions,
  type ConsolidationOptions,
  type HealthMonitoringOptions,
  type ImpactScoringOptions,
  type LicenseComplianceOptions,
  type PerformanceProfilingOptions,
} from "../domain/options.js";
import { analyzeConsolidation, recommendFromConsolidation } from "./analyze-consolidation.js";
import { checkLicenseCompliance, recommendFromLicense } from "./check-license-compliance.js";
import { monitorHealth, recommendFromHealth } from "./monitor-health.js";
import { predictCompatibility, recommendFromCompatibility } from "./predict-compatibility.js";
import { profilePerformance, recommendFromPerformance } from "./profile-performance.js";
import { recommendFromImpact, scoreImpact } from "./score-impact.js";

export type AnalysisOptionsByType = {
  impact_scoring: ImpactScoringOptions;
  compatibility_prediction: CompatibilityPredictionOptions;
  dependency_consolidation: ConsolidationOptions;
  health_monitoring: HealthMonitoringOptions;
  license_compliance: LicenseComplianceOptions;
  performance_profiling: PerformanceProfilingOptions;
};

export type AnalyzerDefinition<K extends AnalysisType> = {
  parseOptions: (raw: AnalysisJobConfig, config: AnalysisEngineConfig) => AnalysisOptionsByType[K];
  run: (graph: DependencyGraph, options: AnalysisOptionsByType[K], config: AnalysisEngineConfig) => AnalysisResultByType[K];
  recommend: (result: AnalysisResultByType[K], config: AnalysisEngineConfig) => readonly Recommendation[];
};

const ANALYZERS: { [K in AnalysisType]: AnalyzerDefinition<K> } = {
  impact_scoring: {
    parseOptions: parseImpactOptions,
    run: scoreImpact,
    recommend: recommendFromImpact,
  },
  compatibility_prediction: {
    parseOptions: parseCompatibilityOptions,
    run: predictCompatibility,
    recommend: recommendFromCompatibility,
  },
  dependency_consolidation: {
    parseOptions: parseConsolidationOptions,
    run: analyzeConsolidation,
    recommend: recommendFromConsolidation,
  },
  health_monitoring: {
    parseOptions: parseHealthOptions,
    run: monitorHealth,
    recommend: recommendFromHealth,
  },
  license_compliance: {
    parseOptions: (raw, config) => parseLicenseOptions(raw, config, loadDefaultLicenseCatalog()),
    run: (graph, options) => checkLicenseCompliance(graph, options, loadDefaultLicenseCatalog()),
    recommend: recommendFromLicense,
  },
  performance_profiling: {
    parseOptions: parsePerformanceOptions,
    run: profilePerformance,
    recommend: recommendFromPerformance,
  },
};

/**
 * Rejects unknown analysis types and malformed options before any work starts.
 */
export const validateAnalysisRequest = (
  analysisType: string,
  rawOptions: AnalysisJobConfig,
  config: AnalysisEngineConfig,
): AnalysisType => {
  if (!isAnalysisType(analysisType)) {
    throw new InvalidConfigurationError([`unknown analysis type: ${analysisType}`]);
  }

  ANALYZERS[analysisType].parseOptions(rawOptions, config);
  return analysisType;
};

export const runAnalysis = <K extends AnalysisType>(
  analysisType: K,
  graph: DependencyGraph,
  rawOptions: AnalysisJobConfig,
  config: AnalysisEngineConfig,
): AnalysisResultByType[K] => {
  const analyzer: AnalyzerDefinition<K> = ANALYZERS[analysisType];
  return analyzer.run(graph, analyzer.parseOptions(rawOptions, config), config);
};

const recommendFor = <K extends AnalysisType>(
  analysisType: K,
  result: AnalysisResultByType[K],
  config: AnalysisEngineConfig,
): readonly Recommendation[] => {
  const analyzer: AnalyzerDefinition<K> = ANALYZERS[analysisType];
  return analyzer.recommend(result, config);
};

export const extractRecommendations = (
  result: AnalysisResult,
  config: AnalysisEngineConfig,
): readonly Recommendation[] => recommendFor(result.analysisType, result, config);
