import {
  ANALYSIS_RESULT_SCHEMA_VERSION,
  toDependencyRef,
  type DependencyGraph,
  type DependencyLicenseAssessment,
  type DependencyNode,
  type LicenseAnalysisResult,
  type LicenseClass,
  type LicenseEvaluation,
  type LicenseRiskLevel,
  type Recommendation,
} from "@depintel/core";
import { evaluateLicenseExpression, type LicenseCatalog } from "../domain/license-catalog.js";
import { round1 } from "../domain/math.js";
import type { LicenseComplianceOptions } from "../domain/options.js";

const UNKNOWN_LICENSE = "UNKNOWN";

const reasonFor = (evaluation: LicenseEvaluation, targetLicense: string): string | null => {
  switch (evaluation.compatibility) {
    case "incompatible":
      return `${evaluation.license} is incompatible with ${targetLicense}`;
    case "conditional":
      return `${evaluation.license} is only conditionally compatible with ${targetLicense}`;
    case "unknown":
      return `${evaluation.license} is not a recognized license`;
    case "compatible":
      return null;
  }
};

export const assessDependencyLicense = (
  node: DependencyNode,
  targetLicense: string,
  catalog: LicenseCatalog,
): DependencyLicenseAssessment => {
  const declaredLicenses = node.licenses.filter((license) => license.trim().length > 0);
  const licenses = declaredLicenses.flatMap((license) => evaluateLicenseExpression(license, targetLicense, catalog));

  let riskLevel: LicenseRiskLevel = "low";
  if (licenses.some((evaluation) => evaluation.compatibility === "incompatible")) {
    riskLevel = "high";
  } else if (
    licenses.length === 0 ||
    licenses.some((evaluation) => evaluation.compatibility === "conditional" || evaluation.compatibility === "unknown")
  ) {
    riskLevel = "medium";
  }

  const reasons = licenses.flatMap((evaluation) => {
    const reason = reasonFor(evaluation, targetLicense);
    return reason === null ? [] : [reason];
  });
  if (licenses.length === 0) {
    reasons.push("no license declared");
  }

  return {
    dependency: toDependencyRef(node),
    direct: node.direct,
    declaredLicenses,
    licenses,
    riskLevel,
    reasons,
  };
};

/**
 * Checks every dependency's declared licenses against the project's target
 * license and summarizes how much of the tree is clear to ship.
 */
export const checkLicenseCompliance = (
  graph: DependencyGraph,
  options: LicenseComplianceOptions,
  catalog: LicenseCatalog,
): LicenseAnalysisResult => {
  const dependencies = graph.nodes.map((node) => assessDependencyLicense(node, options.targetLicense, catalog));
  const total = dependencies.length;

  const countRisk = (level: LicenseRiskLevel): number =>
    dependencies.filter((entry) => entry.riskLevel === level).length;
  const riskCounts = { high: countRisk("high"), medium: countRisk("medium"), low: countRisk("low") };

  const licenseCounts = new Map<string, number>();
  const licenseClassCounts: Record<LicenseClass, number> = {
    permissive: 0,
    public_domain: 0,
    weak_copyleft: 0,
    strong_copyleft: 0,
    proprietary: 0,
    unknown: 0,
  };
  for (const entry of dependencies) {
    const names =
      entry.licenses.length === 0 ? [UNKNOWN_LICENSE] : entry.licenses.map((evaluation) => evaluation.license);
    for (const name of new Set(names)) {
      licenseCounts.set(name, (licenseCounts.get(name) ?? 0) + 1);
    }

    const classes: readonly LicenseClass[] =
      entry.licenses.length === 0 ? ["unknown"] : entry.licenses.map((evaluation) => evaluation.licenseClass);
    for (const licenseClass of new Set(classes)) {
      licenseClassCounts[licenseClass] += 1;
    }
  }

  let overallRiskLevel: LicenseRiskLevel = "low";
  if (riskCounts.high > 0) {
    overallRiskLevel = "high";
  } else if (riskCounts.medium > 0) {
    overallRiskLevel = "medium";
  }

  const highRiskDependencies = dependencies
    .filter((entry) => entry.riskLevel === "high")
    .sort(
      (a, b) =>
        Number(b.direct) - Number(a.direct) || a.dependency.name.localeCompare(b.dependency.name),
    );

  return {
    schemaVersion: ANALYSIS_RESULT_SCHEMA_VERSION,
    analysisType: "license_compliance",
    generatedAt: graph.referenceDate,
    summary: {
      targetLicense: options.targetLicense,
      totalDependencies: total,
      compliancePercentage: total === 0 ? 100 : round1((riskCounts.low / total) * 100),
      overallRiskLevel,
      licenseCounts: Object.fromEntries(
        [...licenseCounts.entries()].sort((a, b) => a[0].localeCompare(b[0])),
      ),
      riskCounts,
      licenseClassCounts,
    },
    details: {
      dependencies,
      highRiskDependencies,
    },
  };
};

export const recommendFromLicense = (result: LicenseAnalysisResult): readonly Recommendation[] =>
  result.details.dependencies.flatMap((entry): Recommendation[] => {
    const name = entry.dependency.name;
    if (entry.riskLevel === "high") {
      return [
        {
          title: `Resolve license conflict in ${name}`,
          description: `${entry.reasons.join("; ")}.`,
          type: "license",
          kind: "license_remediation",
          sourceAnalysis: "license_compliance",
          severity: "high",
          dependency: entry.dependency,
          versionTransition: null,
        },
      ];
    }

    if (entry.riskLevel === "medium") {
      return [
        {
          title: `Review the license of ${name}`,
          description: `${entry.reasons.join("; ")}.`,
          type: "license",
          kind: "license_review",
          sourceAnalysis: "license_compliance",
          severity: "medium",
          dependency: entry.dependency,
          versionTransition: null,
        },
      ];
    }

    return [];
  });
