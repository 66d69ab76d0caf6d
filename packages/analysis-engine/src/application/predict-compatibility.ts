import {
  ANALYSIS_RESULT_SCHEMA_VERSION,
  toDependencyRef,
  type BreakingChangeEvent,
  type CompatibilityAnalysisResult,
  type CompatibilityEvent,
  type CompatibilityTimelineEntry,
  type DependencyCompatibilityIssue,
  type DependencyGraph,
  type DependencyNode,
  type DeprecationEvent,
  type IssueSeverity,
  type PredictedReleaseEvent,
  type Recommendation,
  type ReleaseRecord,
} from "@depintel/core";
import { isStableVersion, parseVersion, satisfiesConstraint, versionLag } from "@depintel/dependency-graph";
import type { AnalysisEngineConfig, CompatibilityPredictionConfig } from "../config.js";
import { addDays, average, daysBetween, round4, toCalendarDate, toUnitInterval } from "../domain/math.js";
import type { CompatibilityPredictionOptions } from "../domain/options.js";

const byReleaseDate = (a: ReleaseRecord, b: ReleaseRecord): number =>
  Date.parse(a.releaseDate) - Date.parse(b.releaseDate) || a.version.localeCompare(b.version);

/**
 * Major-version bumps per year across the stable history. The span is floored at
 * one year so a short burst of releases does not read as constant churn.
 */
export const majorBumpsPerYear = (releases: readonly ReleaseRecord[]): number => {
  const stable = releases.filter((release) => !release.isYanked && isStableVersion(release.version));
  const first = stable[0];
  const last = stable[stable.length - 1];
  if (first === undefined || last === undefined) {
    return 0;
  }

  let bumps = 0;
  let previousMajor: number | null = null;
  for (const release of stable) {
    const major = parseVersion(release.version)?.major ?? null;
    if (major !== null && previousMajor !== null && major > previousMajor) {
      bumps += 1;
    }
    if (major !== null) {
      previousMajor = Math.max(previousMajor ?? major, major);
    }
  }

  const years = Math.max(1, daysBetween(first.releaseDate, last.releaseDate) / 365);
  return bumps / years;
};

const predictNextRelease = (
  node: DependencyNode,
  releases: readonly ReleaseRecord[],
  referenceDate: string,
  options: CompatibilityPredictionOptions,
  config: CompatibilityPredictionConfig,
): PredictedReleaseEvent | null => {
  const window = releases
    .filter((release) => !release.isYanked && isStableVersion(release.version))
    .slice(-options.releaseWindow);
  if (window.length < 2) {
    return null;
  }

  const intervals: number[] = [];
  for (let i = 1; i < window.length; i += 1) {
    const previous = window[i - 1];
    const current = window[i];
    if (previous !== undefined && current !== undefined) {
      intervals.push(daysBetween(previous.releaseDate, current.releaseDate));
    }
  }

  const meanInterval = average(intervals);
  const last = window[window.length - 1];
  if (last === undefined || meanInterval <= 0) {
    return null;
  }

  // step whole intervals past the last release until the date is not behind the reference date
  const steps = Math.max(1, Math.ceil(daysBetween(last.releaseDate, referenceDate) / meanInterval));
  const predicted = addDays(last.releaseDate, steps * meanInterval);
  if (daysBetween(referenceDate, predicted) > options.timeHorizonDays) {
    return null;
  }

  // consistency of release cadence: 1 - coefficient of variation
  let confidence = 0.5;
  if (intervals.length > 1) {
    const variance = average(intervals.map((interval) => (interval - meanInterval) ** 2));
    confidence = toUnitInterval(1 - Math.sqrt(variance) / meanInterval);
  }

  return {
    type: "predicted_release",
    dependency: toDependencyRef(node),
    date: predicted,
    isTransitive: !node.direct,
    isMajor: majorBumpsPerYear(releases) > config.majorBumpsPerYearThreshold,
    meanIntervalDays: round4(meanInterval),
    confidence: round4(confidence),
  };
};

const detectDeprecation = (
  node: DependencyNode,
  referenceDate: string,
  config: CompatibilityPredictionConfig,
): DeprecationEvent | null => {
  const base = {
    type: "deprecation" as const,
    dependency: toDependencyRef(node),
    date: referenceDate,
    isTransitive: !node.direct,
    currentVersion: node.currentVersion,
    latestVersion: node.latestVersion,
  };

  const lag =
    node.currentVersion === null || node.latestVersion === null
      ? null
      : versionLag(node.currentVersion, node.latestVersion);

  if (node.deprecated === true) {
    return { ...base, reason: "deprecated_flag", minorVersionsBehind: lag?.minorsBehind ?? null };
  }
  if (lag === null) {
    return null;
  }
  if (lag.majorsBehind > 0) {
    return { ...base, reason: "major_version_behind", minorVersionsBehind: lag.minorsBehind };
  }
  if (lag.minorsBehind > config.minorLagThreshold) {
    return { ...base, reason: "minor_version_lag", minorVersionsBehind: lag.minorsBehind };
  }

  return null;
};

const detectBreakingChanges = (
  node: DependencyNode,
  releases: readonly ReleaseRecord[],
  config: CompatibilityPredictionConfig,
): readonly BreakingChangeEvent[] => {
  const events: BreakingChangeEvent[] = [];
  const dependency = toDependencyRef(node);

  for (const release of releases) {
    if (!release.isYanked) {
      continue;
    }

    events.push({
      type: "breaking_change",
      dependency,
      date: release.releaseDate,
      isTransitive: !node.direct,
      version: release.version,
      reason: "yanked_release",
      description: `Release ${release.version} was yanked`,
      compatibilityScore: config.defaultCompatibilityScore,
    });
  }

  for (const marker of node.breakingChanges) {
    const firstMatch = releases.find((release) => satisfiesConstraint(release.version, marker.versionRange) === true);
    if (firstMatch === undefined) {
      continue;
    }

    events.push({
      type: "breaking_change",
      dependency,
      date: firstMatch.releaseDate,
      isTransitive: !node.direct,
      version: firstMatch.version,
      reason: "breaking_change_marker",
      description: marker.description,
      compatibilityScore: marker.apiCompatibility ?? config.defaultCompatibilityScore,
    });
  }

  return events;
};

const severityOf = (events: readonly CompatibilityEvent[]): IssueSeverity => {
  if (events.some((event) => event.type === "breaking_change")) {
    return "high";
  }
  if (events.some((event) => event.type === "deprecation")) {
    return "medium";
  }

  return "low";
};

const EVENT_ORDER: Readonly<Record<CompatibilityEvent["type"], number>> = {
  breaking_change: 0,
  deprecation: 1,
  predicted_release: 2,
};

/**
 * Projects breaking changes, deprecations and upcoming releases for each
 * dependency from its release history, grouped into a dated timeline.
 * Dependencies without any release history only appear in the issue list.
 */
export const predictCompatibility = (
  graph: DependencyGraph,
  options: CompatibilityPredictionOptions,
  config: AnalysisEngineConfig,
): CompatibilityAnalysisResult => {
  const referenceDate = graph.referenceDate;
  const nodes = graph.nodes.filter((node) => options.includeTransitive || node.direct);
  const allEvents: CompatibilityEvent[] = [];
  const dependencyIssues: DependencyCompatibilityIssue[] = [];

  for (const node of nodes) {
    const releases = [...node.releases].sort(byReleaseDate);
    const base = {
      dependency: toDependencyRef(node),
      currentVersion: node.currentVersion,
      latestVersion: node.latestVersion,
      isTransitive: !node.direct,
    };

    if (releases.length === 0) {
      dependencyIssues.push({
        ...base,
        severity: "unknown",
        breakingChangeCount: 0,
        deprecationCount: 0,
        predictedReleaseCount: 0,
        predictedMajorRelease: false,
        hasReleaseHistory: false,
      });
      continue;
    }

    const events: CompatibilityEvent[] = [...detectBreakingChanges(node, releases, config.compatibility)];
    const deprecation = detectDeprecation(node, referenceDate, config.compatibility);
    if (deprecation !== null) {
      events.push(deprecation);
    }
    const prediction = predictNextRelease(node, releases, referenceDate, options, config.compatibility);
    if (prediction !== null) {
      events.push(prediction);
    }

    allEvents.push(...events);
    dependencyIssues.push({
      ...base,
      severity: severityOf(events),
      breakingChangeCount: events.filter((event) => event.type === "breaking_change").length,
      deprecationCount: events.filter((event) => event.type === "deprecation").length,
      predictedReleaseCount: prediction === null ? 0 : 1,
      predictedMajorRelease: prediction?.isMajor ?? false,
      hasReleaseHistory: true,
    });
  }

  const eventsByDate = new Map<string, CompatibilityEvent[]>();
  for (const event of allEvents) {
    const date = toCalendarDate(event.date);
    const bucket = eventsByDate.get(date) ?? [];
    bucket.push(event);
    eventsByDate.set(date, bucket);
  }

  const timeline: CompatibilityTimelineEntry[] = [...eventsByDate.entries()]
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([date, events]) => ({
      date,
      events: [...events].sort(
        (a, b) =>
          Date.parse(a.date) - Date.parse(b.date) ||
          a.dependency.name.localeCompare(b.dependency.name) ||
          EVENT_ORDER[a.type] - EVENT_ORDER[b.type],
      ),
    }));

  dependencyIssues.sort(
    (a, b) => a.dependency.name.localeCompare(b.dependency.name) || a.dependency.ecosystem.localeCompare(b.dependency.ecosystem),
  );

  const countSeverity = (severity: IssueSeverity): number =>
    dependencyIssues.filter((issue) => issue.severity === severity).length;

  return {
    schemaVersion: ANALYSIS_RESULT_SCHEMA_VERSION,
    analysisType: "compatibility_prediction",
    generatedAt: referenceDate,
    summary: {
      totalDependencies: nodes.length,
      analyzedDependencies: dependencyIssues.filter((issue) => issue.hasReleaseHistory).length,
      affectedDependencies: dependencyIssues.filter(
        (issue) => issue.breakingChangeCount + issue.deprecationCount + issue.predictedReleaseCount > 0,
      ).length,
      eventCount: allEvents.length,
      issueCounts: {
        high: countSeverity("high"),
        medium: countSeverity("medium"),
        low: countSeverity("low"),
        unknown: countSeverity("unknown"),
      },
      timeHorizonDays: options.timeHorizonDays,
    },
    details: { timeline, dependencyIssues },
  };
};

export const recommendFromCompatibility = (result: CompatibilityAnalysisResult): readonly Recommendation[] =>
  result.details.dependencyIssues.flatMap((issue): Recommendation[] => {
    const name = issue.dependency.name;
    const transition =
      issue.latestVersion === null ? null : { from: issue.currentVersion, to: issue.latestVersion };

    if (issue.severity === "high") {
      return [
        {
          title: `Plan for breaking changes in ${name}`,
          description: `${name} has ${issue.breakingChangeCount} breaking change event(s) in its release history.`,
          type: "compatibility",
          kind: "breaking_change_planning",
          sourceAnalysis: "compatibility_prediction",
          severity: "high",
          dependency: issue.dependency,
          versionTransition: transition,
        },
      ];
    }

    if (issue.severity === "medium") {
      return [
        {
          title: `Upgrade ${name}`,
          description: `${name} is deprecated or lags behind its latest release.`,
          type: "compatibility",
          kind: "upgrade",
          sourceAnalysis: "compatibility_prediction",
          severity: "medium",
          dependency: issue.dependency,
          versionTransition: transition,
        },
      ];
    }

    if (issue.predictedMajorRelease && !issue.isTransitive) {
      return [
        {
          title: `Prepare for the next major release of ${name}`,
          description: `${name} ships major versions frequently and a release is expected within the forecast horizon.`,
          type: "compatibility",
          kind: "prepare_major_upgrade",
          sourceAnalysis: "compatibility_prediction",
          severity: "low",
          dependency: issue.dependency,
          versionTransition: null,
        },
      ];
    }

    return [];
  });
