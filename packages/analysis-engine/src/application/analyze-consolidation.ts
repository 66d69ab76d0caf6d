import {
  ANALYSIS_RESULT_SCHEMA_VERSION,
  ECOSYSTEMS,
  toDependencyRef,
  type ConsolidationAnalysisResult,
  type DependencyGraph,
  type DependencyNode,
  type DuplicateFunctionalityGroup,
  type Ecosystem,
  type Recommendation,
  type TransitiveBloat,
  type VersionInconsistency,
} from "@depintel/core";
import {
  collectTransitiveDependencies,
  compareVersions,
  createGraphIndex,
  findShortestPath,
  getDirectNodes,
  satisfiesConstraint,
  type GraphIndex,
} from "@depintel/dependency-graph";
import type { AnalysisEngineConfig } from "../config.js";
import { computeHealthScore } from "../domain/health-score.js";
import { round1 } from "../domain/math.js";
import type { ConsolidationOptions } from "../domain/options.js";

const NEUTRAL_HEALTH = 0.5;

const usedFeatureCount = (node: DependencyNode): number => node.usage?.usedFeatures.length ?? 0;

const findDuplicateFunctionality = (
  graph: DependencyGraph,
  config: AnalysisEngineConfig,
): readonly DuplicateFunctionalityGroup[] => {
  const groups = new Map<string, { ecosystem: Ecosystem; category: string; members: DependencyNode[] }>();
  for (const node of getDirectNodes(graph)) {
    if (node.category === null) {
      continue;
    }

    const key = `${node.ecosystem}\u0000${node.category}`;
    const group = groups.get(key) ?? { ecosystem: node.ecosystem, category: node.category, members: [] };
    group.members.push(node);
    groups.set(key, group);
  }

  const healthOf = (node: DependencyNode): number =>
    computeHealthScore(node, graph.referenceDate, config.health).score ?? NEUTRAL_HEALTH;

  const duplicates: DuplicateFunctionalityGroup[] = [];
  for (const group of groups.values()) {
    if (group.members.length < 2) {
      continue;
    }

    const ranked = [...group.members].sort(
      (a, b) =>
        usedFeatureCount(b) - usedFeatureCount(a) ||
        healthOf(b) - healthOf(a) ||
        a.name.localeCompare(b.name),
    );
    const [keep, ...remove] = ranked;
    if (keep === undefined) {
      continue;
    }

    duplicates.push({
      ecosystem: group.ecosystem,
      category: group.category,
      keep: toDependencyRef(keep),
      remove: remove.map(toDependencyRef),
      reason: `${keep.name} covers the most used features among ${group.category} dependencies`,
    });
  }

  return duplicates.sort(
    (a, b) => a.ecosystem.localeCompare(b.ecosystem) || a.category.localeCompare(b.category),
  );
};

const findVersionInconsistencies = (graph: DependencyGraph): readonly VersionInconsistency[] => {
  const inconsistencies: VersionInconsistency[] = [];

  for (const node of graph.nodes) {
    if (node.versionUsage.length < 2) {
      continue;
    }

    const constraints = [...new Set(node.versionUsage.flatMap((usage) => usage.constraints))].sort((a, b) =>
      a.localeCompare(b),
    );
    const candidates = node.versionUsage
      .map((usage) => usage.version)
      .sort((a, b) => compareVersions(b, a));
    const unsatisfiedBy = (version: string): readonly string[] =>
      constraints.filter((constraint) => satisfiesConstraint(version, constraint) !== true);

    const satisfyingAll = candidates.find((version) => unsatisfiedBy(version).length === 0);
    const recommendedVersion = satisfyingAll ?? candidates[0];
    if (recommendedVersion === undefined) {
      continue;
    }

    inconsistencies.push({
      dependency: toDependencyRef(node),
      versions: node.versionUsage,
      recommendedVersion,
      satisfiesAllConstraints: satisfyingAll !== undefined,
      unsatisfiedConstraints: unsatisfiedBy(recommendedVersion),
    });
  }

  return inconsistencies;
};

const findTransitiveBloat = (
  graph: DependencyGraph,
  index: GraphIndex,
  bloatThreshold: number,
): readonly TransitiveBloat[] => {
  const reachedBy = new Map<string, string[]>();
  for (const direct of getDirectNodes(graph)) {
    for (const id of collectTransitiveDependencies(direct.id, index)) {
      const names = reachedBy.get(id) ?? [];
      names.push(direct.name);
      reachedBy.set(id, names);
    }
  }

  const nameOf = (id: string): string =>
    id === graph.rootId ? graph.projectName : (index.nodeById.get(id)?.name ?? id);

  const bloat: TransitiveBloat[] = [];
  for (const node of graph.nodes) {
    const directs = reachedBy.get(node.id) ?? [];
    if (node.depth <= 1 || directs.length <= bloatThreshold) {
      continue;
    }

    bloat.push({
      dependency: toDependencyRef(node),
      depth: node.depth,
      reachedBy: [...directs].sort((a, b) => a.localeCompare(b)),
      shortestChain: (findShortestPath(graph.rootId, node.id, index) ?? []).map(nameOf),
    });
  }

  return bloat;
};

/**
 * Looks for three independent kinds of slack in the tree: direct dependencies
 * that serve the same purpose, packages required at several versions, and deep
 * transitive packages pulled in by many direct dependencies.
 */
export const analyzeConsolidation = (
  graph: DependencyGraph,
  options: ConsolidationOptions,
  config: AnalysisEngineConfig,
): ConsolidationAnalysisResult => {
  const index = createGraphIndex(graph);
  const duplicates = findDuplicateFunctionality(graph, config);
  const versionInconsistencies = findVersionInconsistencies(graph);
  const transitiveBloat = findTransitiveBloat(graph, index, options.bloatThreshold);

  const totalDependencies = graph.nodes.length;
  const directDependencies = graph.nodes.filter((node) => node.direct).length;
  const duplicateRemovals = duplicates.reduce((sum, group) => sum + group.remove.length, 0);
  const ecosystemCounts = Object.fromEntries(
    ECOSYSTEMS.map((ecosystem) => [ecosystem, graph.nodes.filter((node) => node.ecosystem === ecosystem).length]),
  );

  return {
    schemaVersion: ANALYSIS_RESULT_SCHEMA_VERSION,
    analysisType: "dependency_consolidation",
    generatedAt: graph.referenceDate,
    summary: {
      totalDependencies,
      directDependencies,
      transitiveDependencies: totalDependencies - directDependencies,
      duplicateGroups: duplicates.length,
      duplicateRemovals,
      potentialRemovals: duplicateRemovals,
      chainReduction: transitiveBloat.length,
      versionInconsistencies: versionInconsistencies.length,
      reductionPercent: totalDependencies === 0 ? 0 : round1((duplicateRemovals / totalDependencies) * 100),
      ecosystemCounts: {
        npm: ecosystemCounts["npm"] ?? 0,
        pypi: ecosystemCounts["pypi"] ?? 0,
      },
    },
    details: {
      duplicates,
      versionInconsistencies,
      transitiveBloat,
    },
  };
};

export const recommendFromConsolidation = (result: ConsolidationAnalysisResult): readonly Recommendation[] => {
  const recommendations: Recommendation[] = [];

  for (const group of result.details.duplicates) {
    for (const removal of group.remove) {
      recommendations.push({
        title: `Replace ${removal.name} with ${group.keep.name}`,
        description: `${removal.name} and ${group.keep.name} both provide ${group.category} functionality.`,
        type: "consolidation",
        kind: "remove_duplicate",
        sourceAnalysis: "dependency_consolidation",
        severity: "medium",
        dependency: removal,
        versionTransition: null,
      });
    }
  }

  for (const inconsistency of result.details.versionInconsistencies) {
    const lowest = [...inconsistency.versions].map((usage) => usage.version).sort(compareVersions)[0] ?? null;
    recommendations.push({
      title: `Align ${inconsistency.dependency.name} on ${inconsistency.recommendedVersion}`,
      description: inconsistency.satisfiesAllConstraints
        ? `${inconsistency.versions.length} versions are in use; ${inconsistency.recommendedVersion} satisfies every constraint.`
        : `${inconsistency.versions.length} versions are in use; no single version satisfies ${inconsistency.unsatisfiedConstraints.join(", ")}.`,
      type: "consolidation",
      kind: "align_versions",
      sourceAnalysis: "dependency_consolidation",
      severity: inconsistency.satisfiesAllConstraints ? "low" : "medium",
      dependency: inconsistency.dependency,
      versionTransition: { from: lowest, to: inconsistency.recommendedVersion },
    });
  }

  for (const entry of result.details.transitiveBloat) {
    recommendations.push({
      title: `Reduce transitive chains to ${entry.dependency.name}`,
      description: `${entry.dependency.name} is pulled in by ${entry.reachedBy.length} direct dependencies (${entry.reachedBy.join(", ")}).`,
      type: "consolidation",
      kind: "flatten_transitive",
      sourceAnalysis: "dependency_consolidation",
      severity: "low",
      dependency: entry.dependency,
      versionTransition: null,
    });
  }

  return recommendations;
};
