import { StaticMetadataProvider, buildDependencyGraph, parsePackageRecords } from "@depintel/dependency-graph";
import { describe, expect, it } from "vitest";
import { DEFAULT_ANALYSIS_ENGINE_CONFIG } from "../config.js";
import { parseCompatibilityOptions } from "../domain/options.js";
import { makeGraph, makeNode, release } from "../test-fixtures.js";
import { majorBumpsPerYear, predictCompatibility, recommendFromCompatibility } from "./predict-compatibility.js";

const config = DEFAULT_ANALYSIS_ENGINE_CONFIG;
const defaultOptions = parseCompatibilityOptions({}, config);

const steady = makeNode("steady", {
  currentVersion: "1.3.0",
  latestVersion: "1.3.0",
  releases: [
    release("1.0.0", "2024-01-01"),
    release("1.1.0", "2024-01-31"),
    release("1.2.0", "2024-03-01"),
    release("1.3.0", "2024-03-31"),
  ],
});
const legacy = makeNode("legacy", {
  currentVersion: "1.0.0",
  latestVersion: "1.4.0",
  releases: [release("1.0.0", "2023-01-01"), release("1.4.0", "2023-07-01")],
});
const broken = makeNode("broken", {
  releases: [release("1.0.0", "2024-01-01"), release("2.0.0", "2024-02-01", true)],
});
const ghost = makeNode("ghost");

const graph = makeGraph([broken, ghost, legacy, steady]);

describe("predictCompatibility", () => {
  it("builds a chronological timeline of events", () => {
    const result = predictCompatibility(graph, defaultOptions, config);

    expect(
      result.details.timeline.map((entry) => [
        entry.date,
        entry.events.map((event) => `${event.dependency.name}:${event.type}`),
      ]),
    ).toEqual([
      ["2024-02-01", ["broken:breaking_change"]],
      ["2024-06-01", ["legacy:deprecation"]],
      ["2024-06-27", ["legacy:predicted_release"]],
      ["2024-06-29", ["steady:predicted_release"]],
    ]);
  });

  it("predicts the next release from the mean release interval, on or after the reference date", () => {
    const result = predictCompatibility(graph, defaultOptions, config);
    const prediction = result.details.timeline
      .flatMap((entry) => entry.events)
      .find((event) => event.dependency.name === "steady");

    expect(prediction).toMatchObject({
      type: "predicted_release",
      date: "2024-06-29T00:00:00.000Z",
      isMajor: false,
      meanIntervalDays: 30,
      confidence: 1,
    });
  });

  it("keeps dependencies without release history out of the timeline", () => {
    const result = predictCompatibility(graph, defaultOptions, config);
    const timelineNames = result.details.timeline.flatMap((entry) => entry.events.map((event) => event.dependency.name));

    expect(timelineNames).not.toContain("ghost");
    expect(result.details.dependencyIssues.find((issue) => issue.dependency.name === "ghost")).toMatchObject({
      severity: "unknown",
      hasReleaseHistory: false,
      breakingChangeCount: 0,
    });
  });

  it("grades each dependency by its most serious event", () => {
    const result = predictCompatibility(graph, defaultOptions, config);

    expect(result.details.dependencyIssues.map((issue) => [issue.dependency.name, issue.severity])).toEqual([
      ["broken", "high"],
      ["ghost", "unknown"],
      ["legacy", "medium"],
      ["steady", "low"],
    ]);
    expect(result.summary).toEqual({
      totalDependencies: 4,
      analyzedDependencies: 3,
      affectedDependencies: 3,
      eventCount: 4,
      issueCounts: { high: 1, medium: 1, low: 1, unknown: 1 },
      timeHorizonDays: 180,
    });
  });

  it("reports the deprecation reason for lagging versions", () => {
    const result = predictCompatibility(graph, defaultOptions, config);
    const deprecation = result.details.timeline
      .flatMap((entry) => entry.events)
      .find((event) => event.type === "deprecation");

    expect(deprecation).toMatchObject({
      dependency: { name: "legacy" },
      reason: "minor_version_lag",
      minorVersionsBehind: 4,
      currentVersion: "1.0.0",
      latestVersion: "1.4.0",
    });
  });

  it("drops predictions beyond the time horizon", () => {
    const future = makeNode("future", {
      releases: [release("1.0.0", "2024-05-01"), release("1.1.0", "2024-05-31")],
      currentVersion: "1.1.0",
      latestVersion: "1.1.0",
    });
    const futureGraph = makeGraph([future]);

    const wide = predictCompatibility(futureGraph, defaultOptions, config);
    const narrow = predictCompatibility(futureGraph, parseCompatibilityOptions({ timeHorizonDays: 10 }, config), config);

    expect(wide.details.timeline.map((entry) => entry.date)).toEqual(["2024-06-30"]);
    expect(narrow.details.timeline).toEqual([]);
    expect(narrow.details.dependencyIssues[0]?.predictedReleaseCount).toBe(0);
  });

  it("rolls predictions for long-quiet packages forward past the reference date", () => {
    const quiet = makeNode("quiet", {
      releases: [release("1.0.0", "2019-01-01"), release("1.1.0", "2019-02-01")],
      currentVersion: "1.1.0",
      latestVersion: "1.1.0",
    });

    const result = predictCompatibility(makeGraph([quiet]), defaultOptions, config);

    expect(result.details.timeline.map((entry) => entry.date)).toEqual(["2024-06-07"]);
    expect(result.details.timeline[0]?.events[0]).toMatchObject({
      type: "predicted_release",
      date: "2024-06-07T00:00:00.000Z",
      meanIntervalDays: 31,
    });
  });

  it("places breaking-change markers at the first matching release", () => {
    const node = makeNode("marked", {
      latestVersion: "2.1.0",
      releases: [release("1.0.0", "2024-01-01"), release("2.0.0", "2024-03-01"), release("2.1.0", "2024-04-01")],
      breakingChanges: [{ versionRange: ">=2.0.0", description: "drops callbacks", apiCompatibility: 0.3 }],
    });

    const result = predictCompatibility(makeGraph([node]), defaultOptions, config);
    const breaking = result.details.timeline
      .flatMap((entry) => entry.events)
      .filter((event) => event.type === "breaking_change");

    expect(breaking).toEqual([
      {
        type: "breaking_change",
        dependency: { id: "npm:marked", name: "marked", ecosystem: "npm" },
        date: "2024-03-01T00:00:00.000Z",
        isTransitive: false,
        version: "2.0.0",
        reason: "breaking_change_marker",
        description: "drops callbacks",
        compatibilityScore: 0.3,
      },
    ]);
  });

  it("can leave transitive dependencies out", () => {
    const nested = makeNode("nested", { depth: 1, releases: [release("1.0.0", "2024-01-01", true)] });
    const withNested = makeGraph([steady, nested], [["steady", "nested"]]);

    const result = predictCompatibility(
      withNested,
      parseCompatibilityOptions({ includeTransitive: false }, config),
      config,
    );

    expect(result.details.dependencyIssues.map((issue) => issue.dependency.name)).toEqual(["steady"]);
  });

  it("measures version lag from the declared constraint, not the resolved release", async () => {
    const provider = new StaticMetadataProvider(
      parsePackageRecords([
        {
          name: "caret",
          ecosystem: "npm",
          latestVersion: "1.5.0",
          releases: ["1.0.0", "1.1.0", "1.2.0", "1.3.0", "1.4.0", "1.5.0"].map((version, index) => ({
            version,
            releaseDate: `2024-0${index + 1}-01T00:00:00.000Z`,
          })),
        },
      ]),
    );
    const built = await buildDependencyGraph(
      {
        projectName: "demo",
        dependencies: [{ name: "caret", ecosystem: "npm", versionConstraint: "^1.0.0", usage: null }],
        referenceDate: "2024-06-15T00:00:00.000Z",
      },
      provider,
    );

    const result = predictCompatibility(built, defaultOptions, config);

    expect(built.nodes[0]?.currentVersion).toBe("1.0.0");
    expect(built.nodes[0]?.versionUsage.map((usage) => usage.version)).toEqual(["1.5.0"]);
    expect(result.details.dependencyIssues[0]).toMatchObject({
      currentVersion: "1.0.0",
      latestVersion: "1.5.0",
      severity: "medium",
      deprecationCount: 1,
    });
  });

  it("returns the same result for the same graph", () => {
    expect(predictCompatibility(graph, defaultOptions, config)).toEqual(predictCompatibility(graph, defaultOptions, config));
  });
});

describe("majorBumpsPerYear", () => {
  it("counts major bumps over at least one year", () => {
    const releases = [release("1.0.0", "2024-01-01"), release("2.0.0", "2024-02-01"), release("3.0.0", "2024-03-01")];

    expect(majorBumpsPerYear(releases)).toBe(2);
  });
});

describe("recommendFromCompatibility", () => {
  it("plans for breaking changes and upgrades", () => {
    const recommendations = recommendFromCompatibility(predictCompatibility(graph, defaultOptions, config));

    expect(
      recommendations.map((entry) => [entry.kind, entry.dependency?.name, entry.severity, entry.versionTransition]),
    ).toEqual([
      ["breaking_change_planning", "broken", "high", { from: "1.0.0", to: "1.0.0" }],
      ["upgrade", "legacy", "medium", { from: "1.0.0", to: "1.4.0" }],
    ]);
  });
});
