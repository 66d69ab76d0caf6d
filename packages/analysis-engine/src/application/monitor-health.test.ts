import { describe, expect, it } from "vitest";
import { DEFAULT_ANALYSIS_ENGINE_CONFIG } from "../config.js";
import { parseHealthOptions } from "../domain/options.js";
import { makeGraph, makeNode, release } from "../test-fixtures.js";
import { monitorHealth, recommendFromHealth } from "./monitor-health.js";

const config = DEFAULT_ANALYSIS_ENGINE_CONFIG;
const defaultOptions = parseHealthOptions({});

const aging = makeNode("aging", { deprecated: true, category: "logging" });
const logger = makeNode("logger", {
  category: "logging",
  releases: [release("3.0.0", "2024-05-02")],
  community: { contributorCount: 5, openIssueRatio: 0.2 },
  vulnerabilities: [],
});
const dormant = makeNode("dormant", { releases: [release("1.0.0", "2023-05-01")] });
const unknown = makeNode("unknown");

const graph = makeGraph([unknown, logger, dormant, aging]);

describe("monitorHealth", () => {
  it("orders dependencies from least to most healthy with unknown scores last", () => {
    const result = monitorHealth(graph, defaultOptions, config);

    expect(result.details.dependencies.map((entry) => [entry.dependency.name, entry.healthScore, entry.status])).toEqual([
      ["aging", 0.1, "at_risk"],
      ["dormant", 0.4562, "moderate"],
      ["logger", 0.859, "healthy"],
      ["unknown", null, "moderate"],
    ]);
  });

  it("summarizes the distribution of health", () => {
    const result = monitorHealth(graph, defaultOptions, config);

    expect(result.summary).toEqual({
      totalDependencies: 4,
      healthyCount: 1,
      moderateCount: 2,
      atRiskCount: 1,
      unknownCount: 1,
      deprecatedCount: 1,
      outdatedCount: 1,
      averageScore: 0.4717,
      medianScore: 0.4562,
      distribution: {
        healthy: { count: 1, percentage: 25 },
        moderate: { count: 2, percentage: 50 },
        at_risk: { count: 1, percentage: 25 },
      },
      topRiskFactors: [
        { factor: "deprecated", count: 1 },
        { factor: "no_recent_release", count: 1 },
      ],
    });
  });

  it("suggests a healthier peer for deprecated dependencies", () => {
    const result = monitorHealth(graph, defaultOptions, config);
    const entry = result.details.dependencies.find((dependency) => dependency.dependency.name === "aging");

    expect(entry?.recommendation).toEqual({
      action: "replace",
      urgency: "high",
      reason: "aging is deprecated",
      alternative: { id: "npm:logger", name: "logger", ecosystem: "npm" },
    });
  });

  it("recommends considering a replacement for at-risk dependencies with a peer", () => {
    const shaky = makeNode("shaky", {
      category: "logging",
      releases: [release("0.1.0", "2022-01-01")],
      community: { contributorCount: 1, openIssueRatio: 0.9 },
      vulnerabilities: [{ id: "VULN-3", severity: "critical" }],
    });

    const result = monitorHealth(makeGraph([shaky, logger]), defaultOptions, config);
    const entry = result.details.dependencies[0];

    expect(entry?.status).toBe("at_risk");
    expect(entry?.recommendation?.action).toBe("consider_replacement");
    expect(entry?.recommendation?.alternative?.name).toBe("logger");
  });

  it("flags healthy dependencies that have not released in a year", () => {
    const quiet = makeNode("quiet", {
      currentVersion: "1.0.0",
      latestVersion: "1.2.0",
      releases: [release("1.2.0", "2023-04-28")],
      community: { contributorCount: 100, openIssueRatio: 0 },
      vulnerabilities: [],
    });

    const [entry] = monitorHealth(makeGraph([quiet]), defaultOptions, config).details.dependencies;

    expect(entry?.status).toBe("healthy");
    expect(entry?.daysSinceLastRelease).toBe(400);
    expect(entry?.recommendation).toEqual({
      action: "update_available",
      urgency: "low",
      reason: "quiet has not published a release in 400 days",
      alternative: null,
    });
  });

  it("can restrict monitoring to direct dependencies", () => {
    const nested = makeNode("nested", { depth: 1 });
    const withNested = makeGraph([logger, nested], [["logger", "nested"]]);

    const result = monitorHealth(withNested, parseHealthOptions({ includeTransitive: false }), config);

    expect(result.details.dependencies.map((entry) => entry.dependency.name)).toEqual(["logger"]);
  });

  it("reports null averages for an empty graph", () => {
    const result = monitorHealth(makeGraph([]), defaultOptions, config);

    expect(result.summary.averageScore).toBeNull();
    expect(result.summary.medianScore).toBeNull();
    expect(result.summary.distribution.healthy).toEqual({ count: 0, percentage: 0 });
  });
});

describe("recommendFromHealth", () => {
  it("maps suggested actions to recommendations", () => {
    const recommendations = recommendFromHealth(monitorHealth(graph, defaultOptions, config));

    expect(recommendations.map((entry) => [entry.title, entry.description, entry.severity])).toEqual([
      ["Replace deprecated dependency aging", "aging is deprecated. Alternative: logger.", "high"],
      ["Monitor the health of dormant", "dormant has a health score of 0.4562.", "medium"],
    ]);
  });
});
