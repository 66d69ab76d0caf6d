import { InvalidConfigurationError } from "@depintel/core";
import { describe, expect, it } from "vitest";
import { DEFAULT_ANALYSIS_ENGINE_CONFIG } from "../config.js";
import { REFERENCE_DATE, makeGraph, makeNode } from "../test-fixtures.js";
import { extractRecommendations, runAnalysis, validateAnalysisRequest } from "./run-analysis.js";

const config = DEFAULT_ANALYSIS_ENGINE_CONFIG;
const graph = makeGraph([makeNode("copyleft", { licenses: ["GPL-3.0"] }), makeNode("plain")]);

const rejectionOf = (action: () => unknown): InvalidConfigurationError => {
  try {
    action();
  } catch (error) {
    if (error instanceof InvalidConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the request to be rejected");
};

describe("validateAnalysisRequest", () => {
  it("accepts a known type with valid options", () => {
    expect(validateAnalysisRequest("license_compliance", { targetLicense: "apache 2.0" }, config)).toBe(
      "license_compliance",
    );
  });

  it("rejects unknown analysis types", () => {
    const error = rejectionOf(() => validateAnalysisRequest("vibe_check", {}, config));

    expect(error.code).toBe("invalid_configuration");
    expect(error.issues).toEqual(["unknown analysis type: vibe_check"]);
  });

  it("rejects unknown option keys", () => {
    const error = rejectionOf(() => validateAnalysisRequest("health_monitoring", { depth: 3 }, config));

    expect(error.issues).toHaveLength(1);
  });

  it("rejects options of the wrong type", () => {
    const error = rejectionOf(() =>
      validateAnalysisRequest("compatibility_prediction", { timeHorizonDays: "soon" }, config),
    );

    expect(error.issues[0]).toMatch(/^timeHorizonDays: /);
  });

  it("rejects all-zero impact weights", () => {
    const error = rejectionOf(() =>
      validateAnalysisRequest(
        "impact_scoring",
        { weights: { businessValue: 0, usage: 0, complexity: 0, health: 0 } },
        config,
      ),
    );

    expect(error.issues).toEqual(["weights: at least one weight must be positive"]);
  });

  it("rejects unknown target licenses", () => {
    const error = rejectionOf(() =>
      validateAnalysisRequest("license_compliance", { targetLicense: "Made-Up-1.0" }, config),
    );

    expect(error.issues).toEqual(["targetLicense: unknown license Made-Up-1.0"]);
  });
});

describe("runAnalysis", () => {
  it("dispatches to the analyzer for the requested type", () => {
    const result = runAnalysis("license_compliance", graph, { targetLicense: "GPL-3.0" }, config);

    expect(result.analysisType).toBe("license_compliance");
    expect(result.schemaVersion).toBe("depintel.analysis.v1");
    expect(result.generatedAt).toBe(REFERENCE_DATE);
    expect(result.summary.targetLicense).toBe("GPL-3.0");
    expect(result.summary.compliancePercentage).toBe(100);
  });

  it("uses the configured default when an option is omitted", () => {
    const result = runAnalysis("performance_profiling", graph, {}, config);

    expect(result.summary.profileType).toBe("bundle_size");
  });

  it("is idempotent for every analysis type", () => {
    for (const analysisType of [
      "impact_scoring",
      "compatibility_prediction",
      "dependency_consolidation",
      "health_monitoring",
      "license_compliance",
      "performance_profiling",
    ] as const) {
      expect(runAnalysis(analysisType, graph, {}, config)).toEqual(runAnalysis(analysisType, graph, {}, config));
    }
  });
});

describe("extractRecommendations", () => {
  it("derives recommendations from any result", () => {
    const result = runAnalysis("license_compliance", graph, {}, config);

    expect(extractRecommendations(result, config).map((entry) => entry.kind)).toEqual(["license_remediation"]);
  });
});
