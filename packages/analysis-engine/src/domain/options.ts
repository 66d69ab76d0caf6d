import {
  InvalidConfigurationError,
  type AnalysisJobConfig,
  type ImpactWeights,
  type PerformanceProfileType,
} from "@depintel/core";
import { z } from "zod";
import type { AnalysisEngineConfig } from "../config.js";
import { normalizeLicense, type LicenseCatalog } from "./license-catalog.js";

export type ImpactScoringOptions = {
  weights: ImpactWeights;
};

export type CompatibilityPredictionOptions = {
  timeHorizonDays: number;
  releaseWindow: number;
  includeTransitive: boolean;
};

export type ConsolidationOptions = {
  bloatThreshold: number;
};

export type HealthMonitoringOptions = {
  includeTransitive: boolean;
};

export type LicenseComplianceOptions = {
  targetLicense: string;
};

export type PerformanceProfilingOptions = {
  profileType: PerformanceProfileType;
};

const weight = z.number().nonnegative();

const impactOptionsSchema = z
  .object({
    weights: z
      .object({
        businessValue: weight.optional(),
        usage: weight.optional(),
        complexity: weight.optional(),
        health: weight.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const compatibilityOptionsSchema = z
  .object({
    timeHorizonDays: z.number().int().positive().optional(),
    releaseWindow: z.number().int().min(2).optional(),
    includeTransitive: z.boolean().optional(),
  })
  .strict();

const consolidationOptionsSchema = z
  .object({
    bloatThreshold: z.number().int().min(1).optional(),
  })
  .strict();

const healthOptionsSchema = z
  .object({
    includeTransitive: z.boolean().optional(),
  })
  .strict();

const licenseOptionsSchema = z
  .object({
    targetLicense: z.string().min(1).optional(),
  })
  .strict();

const performanceOptionsSchema = z
  .object({
    profileType: z.enum(["bundle_size", "runtime"]).optional(),
  })
  .strict();

const toIssues = (error: z.ZodError): readonly string[] =>
  error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path.length === 0 ? issue.message : `${path}: ${issue.message}`;
  });

const parseWith = <T extends z.ZodTypeAny>(schema: T, raw: AnalysisJobConfig): z.infer<T> => {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigurationError(toIssues(parsed.error));
  }

  return parsed.data;
};

export const parseImpactOptions = (
  raw: AnalysisJobConfig,
  config: AnalysisEngineConfig,
): ImpactScoringOptions => {
  const parsed = parseWith(impactOptionsSchema, raw);
  const weights = { ...config.impact.weights };
  const overrides = parsed.weights ?? {};
  weights.businessValue = overrides.businessValue ?? weights.businessValue;
  weights.usage = overrides.usage ?? weights.usage;
  weights.complexity = overrides.complexity ?? weights.complexity;
  weights.health = overrides.health ?? weights.health;

  if (weights.businessValue + weights.usage + weights.complexity + weights.health === 0) {
    throw new InvalidConfigurationError(["weights: at least one weight must be positive"]);
  }

  return { weights };
};

export const parseCompatibilityOptions = (
  raw: AnalysisJobConfig,
  config: AnalysisEngineConfig,
): CompatibilityPredictionOptions => {
  const parsed = parseWith(compatibilityOptionsSchema, raw);
  return {
    timeHorizonDays: parsed.timeHorizonDays ?? config.compatibility.timeHorizonDays,
    releaseWindow: parsed.releaseWindow ?? config.compatibility.releaseWindow,
    includeTransitive: parsed.includeTransitive ?? true,
  };
};

export const parseConsolidationOptions = (
  raw: AnalysisJobConfig,
  config: AnalysisEngineConfig,
): ConsolidationOptions => {
  const parsed = parseWith(consolidationOptionsSchema, raw);
  return {
    bloatThreshold: parsed.bloatThreshold ?? config.consolidation.bloatThreshold,
  };
};

export const parseHealthOptions = (raw: AnalysisJobConfig): HealthMonitoringOptions => {
  const parsed = parseWith(healthOptionsSchema, raw);
  return {
    includeTransitive: parsed.includeTransitive ?? true,
  };
};

export const parseLicenseOptions = (
  raw: AnalysisJobConfig,
  config: AnalysisEngineConfig,
  catalog: LicenseCatalog,
): LicenseComplianceOptions => {
  const parsed = parseWith(licenseOptionsSchema, raw);
  const requested = parsed.targetLicense ?? config.license.defaultTargetLicense;
  const targetLicense = normalizeLicense(requested, catalog);
  if (targetLicense === null) {
    throw new InvalidConfigurationError([`targetLicense: unknown license ${requested}`]);
  }

  return { targetLicense };
};

export const parsePerformanceOptions = (
  raw: AnalysisJobConfig,
  config: AnalysisEngineConfig,
): PerformanceProfilingOptions => {
  const parsed = parseWith(performanceOptionsSchema, raw);
  return {
    profileType: parsed.profileType ?? config.performance.defaultProfileType,
  };
};
