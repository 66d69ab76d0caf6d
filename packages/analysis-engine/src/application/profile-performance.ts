import {
  ANALYSIS_RESULT_SCHEMA_VERSION,
  toDependencyRef,
  type BundleSizeClass,
  type DependencyBundleProfile,
  type DependencyGraph,
  type DependencyRuntimeProfile,
  type PerformanceAnalysisResult,
  type Recommendation,
  type RuntimeImpact,
} from "@depintel/core";
import { getDirectNodes } from "@depintel/dependency-graph";
import type { AnalysisEngineConfig, PerformanceProfilingConfig } from "../config.js";
import { average, round4 } from "../domain/math.js";
import type { PerformanceProfilingOptions } from "../domain/options.js";

const sizeClassOf = (percent: number | null, config: PerformanceProfilingConfig): BundleSizeClass => {
  if (percent === null) {
    return "unknown";
  }
  if (percent > config.largeSharePercent) {
    return "large";
  }
  if (percent >= config.mediumSharePercent) {
    return "medium";
  }

  return "small";
};

const runtimeImpactOf = (runtimeMs: number | null, config: PerformanceProfilingConfig): RuntimeImpact => {
  if (runtimeMs === null) {
    return "unknown";
  }
  if (runtimeMs > config.highRuntimeMs) {
    return "high";
  }
  if (runtimeMs > config.mediumRuntimeMs) {
    return "medium";
  }

  return "low";
};

const profileBundleSize = (graph: DependencyGraph, config: PerformanceProfilingConfig): PerformanceAnalysisResult => {
  const measured = graph.nodes.filter((node) => node.size !== null);
  const totalMinifiedBytes = measured.reduce((sum, node) => sum + (node.size?.minifiedBytes ?? 0), 0);
  const totalGzippedBytes = measured.reduce((sum, node) => sum + (node.size?.gzippedBytes ?? 0), 0);

  const dependencies: DependencyBundleProfile[] = graph.nodes.map((node) => {
    const percentOfTotal =
      node.size === null ? null : totalMinifiedBytes === 0 ? 0 : round4((node.size.minifiedBytes / totalMinifiedBytes) * 100);
    return {
      dependency: toDependencyRef(node),
      direct: node.direct,
      minifiedBytes: node.size?.minifiedBytes ?? null,
      gzippedBytes: node.size?.gzippedBytes ?? null,
      percentOfTotal,
      sizeClass: sizeClassOf(percentOfTotal, config),
    };
  });

  dependencies.sort(
    (a, b) =>
      (b.minifiedBytes ?? -1) - (a.minifiedBytes ?? -1) || a.dependency.name.localeCompare(b.dependency.name),
  );

  const directMeasured = measured.filter((node) => node.direct);
  const countClass = (sizeClass: BundleSizeClass): number =>
    dependencies.filter((entry) => entry.sizeClass === sizeClass).length;

  return {
    schemaVersion: ANALYSIS_RESULT_SCHEMA_VERSION,
    analysisType: "performance_profiling",
    generatedAt: graph.referenceDate,
    summary: {
      profileType: "bundle_size",
      totalDependencies: dependencies.length,
      measuredDependencies: measured.length,
      totalMinifiedBytes,
      totalGzippedBytes,
      directMinifiedBytes: directMeasured.reduce((sum, node) => sum + (node.size?.minifiedBytes ?? 0), 0),
      directGzippedBytes: directMeasured.reduce((sum, node) => sum + (node.size?.gzippedBytes ?? 0), 0),
      largeCount: countClass("large"),
      mediumCount: countClass("medium"),
      smallCount: countClass("small"),
      unknownCount: countClass("unknown"),
    },
    details: {
      profileType: "bundle_size",
      dependencies,
      largest: dependencies.filter((entry) => entry.minifiedBytes !== null).slice(0, config.largestCount),
    },
  };
};

const profileRuntime = (graph: DependencyGraph, config: PerformanceProfilingConfig): PerformanceAnalysisResult => {
  const dependencies: DependencyRuntimeProfile[] = getDirectNodes(graph)
    .map((node) => ({
      dependency: toDependencyRef(node),
      startupMs: node.runtime?.startupMs ?? null,
      runtimeMs: node.runtime?.runtimeMs ?? null,
      memoryMb: node.runtime?.memoryMb ?? null,
      impact: runtimeImpactOf(node.runtime?.runtimeMs ?? null, config),
    }))
    .sort((a, b) => a.dependency.name.localeCompare(b.dependency.name));

  const measured = dependencies.filter((entry) => entry.impact !== "unknown");
  const startup = measured.map((entry) => entry.startupMs ?? 0);
  const runtime = measured.map((entry) => entry.runtimeMs ?? 0);
  const memory = measured.map((entry) => entry.memoryMb ?? 0);
  const sum = (values: readonly number[]): number => round4(values.reduce((total, value) => total + value, 0));
  const countImpact = (impact: RuntimeImpact): number =>
    dependencies.filter((entry) => entry.impact === impact).length;

  const topBy = (select: (entry: DependencyRuntimeProfile) => number): readonly DependencyRuntimeProfile[] =>
    [...measured]
      .sort((a, b) => select(b) - select(a) || a.dependency.name.localeCompare(b.dependency.name))
      .slice(0, config.topRuntimeCount);

  return {
    schemaVersion: ANALYSIS_RESULT_SCHEMA_VERSION,
    analysisType: "performance_profiling",
    generatedAt: graph.referenceDate,
    summary: {
      profileType: "runtime",
      totalDependencies: dependencies.length,
      measuredDependencies: measured.length,
      totalStartupMs: sum(startup),
      totalRuntimeMs: sum(runtime),
      totalMemoryMb: sum(memory),
      averageStartupMs: round4(average(startup)),
      averageRuntimeMs: round4(average(runtime)),
      averageMemoryMb: round4(average(memory)),
      highImpactCount: countImpact("high"),
      mediumImpactCount: countImpact("medium"),
      lowImpactCount: countImpact("low"),
      unknownCount: countImpact("unknown"),
    },
    details: {
      profileType: "runtime",
      dependencies,
      highestRuntime: topBy((entry) => entry.runtimeMs ?? 0),
      highestMemory: topBy((entry) => entry.memoryMb ?? 0),
    },
  };
};

/**
 * Bundle-size profiles cover every node with size data; runtime profiles cover
 * direct dependencies only, since only those are loaded by the project itself.
 */
export const profilePerformance = (
  graph: DependencyGraph,
  options: PerformanceProfilingOptions,
  config: AnalysisEngineConfig,
): PerformanceAnalysisResult =>
  options.profileType === "runtime"
    ? profileRuntime(graph, config.performance)
    : profileBundleSize(graph, config.performance);

export const recommendFromPerformance = (result: PerformanceAnalysisResult): readonly Recommendation[] => {
  const details = result.details;
  if (details.profileType === "bundle_size") {
    return details.dependencies
      .filter((entry) => entry.sizeClass === "large")
      .map((entry): Recommendation => ({
        title: `Reduce bundle weight of ${entry.dependency.name}`,
        description: `${entry.dependency.name} accounts for ${entry.percentOfTotal ?? 0}% of the minified dependency bundle.`,
        type: "performance",
        kind: "reduce_bundle_size",
        sourceAnalysis: "performance_profiling",
        severity: "medium",
        dependency: entry.dependency,
        versionTransition: null,
      }));
  }

  return details.dependencies.flatMap((entry): Recommendation[] => {
    if (entry.impact !== "high" && entry.impact !== "medium") {
      return [];
    }

    return [
      {
        title: `Reduce runtime cost of ${entry.dependency.name}`,
        description: `${entry.dependency.name} adds ${entry.runtimeMs ?? 0}ms of runtime overhead.`,
        type: "performance",
        kind: "reduce_runtime_impact",
        sourceAnalysis: "performance_profiling",
        severity: entry.impact === "high" ? "medium" : "low",
        dependency: entry.dependency,
        versionTransition: null,
      },
    ];
  });
};
