import {
  PROJECT_ROOT_ID,
  UnresolvedDependencyError,
  dependencyId,
  toErrorMessage,
  type DeclaredDependency,
  type DependencyEdge,
  type DependencyGraph,
  type DependencyNode,
  type Ecosystem,
  type PackageMetadata,
  type ReleaseRecord,
  type UsageSignals,
} from "@depintel/core";
import { edgeKey } from "../domain/graph-queries.js";
import { coerceVersion, parseVersion, resolveHighestSatisfying } from "../domain/semver.js";
import {
  DEFAULT_GRAPH_BUILD_OPTIONS,
  type GraphBuildOptions,
  type GraphBuildProgressEvent,
  type MetadataProvider,
} from "../domain/types.js";

export type BuildDependencyGraphInput = {
  projectName: string;
  dependencies: readonly DeclaredDependency[];
  // ISO timestamp every time-based analysis measures against
  referenceDate: string;
  options?: Partial<GraphBuildOptions>;
};

type QueueItem = {
  name: string;
  ecosystem: Ecosystem;
  constraint: string;
  parentId: string;
  depth: number;
};

type FetchedPackage = {
  metadata: PackageMetadata | null;
  releases: readonly ReleaseRecord[];
  failure: string | null;
};

type NodeDraft = {
  id: string;
  name: string;
  ecosystem: Ecosystem;
  versionConstraint: string;
  depth: number;
  direct: boolean;
  parents: Set<string>;
  versionUsage: Map<string, { constraints: Set<string>; requiredBy: Set<string> }>;
  fetched: FetchedPackage;
  usage: UsageSignals | null;
};

const withDefaults = (overrides: Partial<GraphBuildOptions> | undefined): GraphBuildOptions => ({
  ...DEFAULT_GRAPH_BUILD_OPTIONS,
  ...overrides,
});

const mapWithConcurrency = async <T, R>(
  values: readonly T[],
  limit: number,
  handler: (value: T) => Promise<R>,
): Promise<readonly R[]> => {
  const effectiveLimit = Math.max(1, limit);
  const workerCount = Math.min(effectiveLimit, values.length);
  const results: R[] = new Array(values.length);
  let index = 0;

  const workers: Promise<void>[] = Array.from({ length: workerCount }, async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= values.length) {
        return;
      }

      const value = values[current];
      if (value !== undefined) {
        results[current] = await handler(value);
      }
    }
  });

  await Promise.all(workers);
  return results;
};

const fetchPackage = async (
  provider: MetadataProvider,
  name: string,
  ecosystem: Ecosystem,
): Promise<FetchedPackage> => {
  try {
    const [metadata, releases] = await Promise.all([
      provider.lookup(name, ecosystem),
      provider.versionHistory(name, ecosystem),
    ]);
    return { metadata, releases, failure: metadata === null ? "package not found" : null };
  } catch (error) {
    return { metadata: null, releases: [], failure: toErrorMessage(error) };
  }
};

const resolveVersion = (constraint: string, fetched: FetchedPackage): string => {
  const latest = fetched.metadata?.latestVersion ?? null;
  const candidates = fetched.releases
    .filter((release) => !release.isYanked)
    .map((release) => release.version);
  if (latest !== null && !candidates.includes(latest)) {
    candidates.push(latest);
  }

  return resolveHighestSatisfying(candidates, constraint) ?? coerceVersion(constraint) ?? latest ?? constraint;
};

// true when `targetId` is reachable from `startId` along accepted edges
const reaches = (
  startId: string,
  targetId: string,
  adjacency: ReadonlyMap<string, ReadonlySet<string>>,
): boolean => {
  const seen = new Set<string>();
  const stack = [startId];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) {
      continue;
    }
    if (current === targetId) {
      return true;
    }

    seen.add(current);
    for (const next of adjacency.get(current) ?? []) {
      stack.push(next);
    }
  }

  return false;
};

const compareQueueItems = (a: QueueItem, b: QueueItem): number =>
  a.parentId.localeCompare(b.parentId) ||
  a.name.localeCompare(b.name) ||
  a.constraint.localeCompare(b.constraint);

const toNode = (draft: NodeDraft): DependencyNode => {
  const metadata = draft.fetched.metadata;
  // the declared floor; resolved versions live in versionUsage
  const declared = coerceVersion(draft.versionConstraint);
  const currentVersion = declared !== null && parseVersion(declared) !== null ? declared : null;

  return {
    id: draft.id,
    name: draft.name,
    ecosystem: draft.ecosystem,
    versionConstraint: draft.versionConstraint,
    currentVersion,
    latestVersion: metadata?.latestVersion ?? null,
    depth: draft.depth,
    direct: draft.direct,
    parents: [...draft.parents].sort((a, b) => a.localeCompare(b)),
    versionUsage: [...draft.versionUsage.entries()]
      .map(([version, usage]) => ({
        version,
        constraints: [...usage.constraints].sort((a, b) => a.localeCompare(b)),
        requiredBy: [...usage.requiredBy].sort((a, b) => a.localeCompare(b)),
      }))
      .sort((a, b) => a.version.localeCompare(b.version)),
    licenses: metadata?.licenses ?? [],
    deprecated: metadata?.deprecated ?? null,
    category: metadata?.category ?? null,
    community: metadata?.community ?? { contributorCount: null, openIssueRatio: null },
    size: metadata?.size ?? null,
    runtime: metadata?.runtime ?? null,
    vulnerabilities: metadata?.vulnerabilities ?? null,
    breakingChanges: metadata?.breakingChanges ?? [],
    releases: [...draft.fetched.releases].sort(
      (a, b) => a.releaseDate.localeCompare(b.releaseDate) || a.version.localeCompare(b.version),
    ),
    usage: draft.usage,
    metadataAvailable: metadata !== null,
  };
};

/**
 * Breadth-first resolution of the declared dependencies into a dependency graph.
 *
 * Levels are expanded one at a time, so a package is first created at its minimum
 * distance from the project root. Re-encountered packages merge into the existing
 * node. An edge whose target already reaches its source is discarded, which keeps
 * the graph acyclic and guarantees termination.
 *
 * Direct dependencies without metadata raise {@link UnresolvedDependencyError}
 * unless `allowPartialMetadata` is set; transitive gaps only produce partial nodes.
 */
export const buildDependencyGraph = async (
  input: BuildDependencyGraphInput,
  provider: MetadataProvider,
  onProgress?: (event: GraphBuildProgressEvent) => void,
): Promise<DependencyGraph> => {
  const options = withDefaults(input.options);
  const maxDepth = Math.max(0, options.maxDepth);
  const maxNodes = Math.max(1, options.maxNodes);

  const drafts = new Map<string, NodeDraft>();
  const edges = new Map<string, DependencyEdge>();
  const adjacency = new Map<string, Set<string>>();
  const assumptions = new Set<string>();
  const usageById = new Map<string, UsageSignals | null>();
  let truncated = false;

  let level: QueueItem[] = input.dependencies.map((dependency) => {
    const id = dependencyId(dependency.ecosystem, dependency.name);
    if (!usageById.has(id)) {
      usageById.set(id, dependency.usage);
    }

    return {
      name: dependency.name,
      ecosystem: dependency.ecosystem,
      constraint: dependency.versionConstraint,
      parentId: PROJECT_ROOT_ID,
      depth: 0,
    };
  });

  while (level.length > 0) {
    const items = [...level].sort(compareQueueItems);
    const depth = items[0]?.depth ?? 0;

    const newItems = new Map<string, QueueItem>();
    for (const item of items) {
      const id = dependencyId(item.ecosystem, item.name);
      if (!drafts.has(id) && !newItems.has(id)) {
        newItems.set(id, item);
      }
    }

    let accepted = [...newItems.entries()].sort((a, b) => a[0].localeCompare(b[0]));
    if (depth > 0 && drafts.size + accepted.length > maxNodes) {
      accepted = accepted.slice(0, Math.max(0, maxNodes - drafts.size));
      truncated = true;
      assumptions.add(`Dependency graph truncated at ${maxNodes} nodes.`);
    }

    onProgress?.({ stage: "level_started", depth, packages: accepted.length });

    let completed = 0;
    const fetchedEntries = await mapWithConcurrency(accepted, options.metadataConcurrency, async ([id, item]) => {
      const fetched = await fetchPackage(provider, item.name, item.ecosystem);
      completed += 1;
      onProgress?.({
        stage: "package_resolved",
        depth,
        completed,
        total: accepted.length,
        packageName: item.name,
        available: fetched.metadata !== null,
      });
      return { id, item, fetched };
    });

    const created: NodeDraft[] = [];
    for (const { id, item, fetched } of fetchedEntries) {
      const unresolvedReason =
        fetched.failure ?? (fetched.metadata?.latestVersion === null ? "no published version" : null);
      if (depth === 0 && unresolvedReason !== null) {
        if (!options.allowPartialMetadata) {
          throw new UnresolvedDependencyError(item.name, unresolvedReason);
        }
        assumptions.add(`Direct dependency ${item.name} kept without metadata: ${unresolvedReason}.`);
      } else if (fetched.failure !== null) {
        assumptions.add(`Transitive dependency ${item.name} has no metadata: ${fetched.failure}.`);
      }

      const draft: NodeDraft = {
        id,
        name: item.name,
        ecosystem: item.ecosystem,
        versionConstraint: item.constraint,
        depth,
        direct: depth === 0,
        parents: new Set(),
        versionUsage: new Map(),
        fetched,
        usage: usageById.get(id) ?? null,
      };
      drafts.set(id, draft);
      adjacency.set(id, new Set());
      created.push(draft);
    }

    for (const item of items) {
      const id = dependencyId(item.ecosystem, item.name);
      const draft = drafts.get(id);
      if (draft === undefined) {
        continue;
      }

      if (item.parentId !== PROJECT_ROOT_ID && reaches(id, item.parentId, adjacency)) {
        assumptions.add(`Cycle broken: discarded edge ${item.parentId} -> ${id}.`);
        onProgress?.({ stage: "cycle_broken", from: item.parentId, to: id });
        continue;
      }

      const key = edgeKey(item.parentId, id);
      if (!edges.has(key)) {
        edges.set(key, { from: item.parentId, to: id, versionConstraint: item.constraint });
      }
      adjacency.get(item.parentId)?.add(id);
      draft.parents.add(item.parentId);

      const version = resolveVersion(item.constraint, draft.fetched);
      const usage = draft.versionUsage.get(version) ?? { constraints: new Set<string>(), requiredBy: new Set<string>() };
      usage.constraints.add(item.constraint);
      usage.requiredBy.add(item.parentId);
      draft.versionUsage.set(version, usage);
    }

    const next: QueueItem[] = [];
    for (const draft of created) {
      const requirements = draft.fetched.metadata?.requirements ?? [];
      if (requirements.length === 0) {
        continue;
      }

      if (depth >= maxDepth) {
        truncated = true;
        assumptions.add(`Dependency graph truncated at depth ${maxDepth}.`);
        continue;
      }

      for (const requirement of requirements) {
        if (requirement.name.length === 0) {
          continue;
        }

        next.push({
          name: requirement.name,
          ecosystem: draft.ecosystem,
          constraint: requirement.versionConstraint,
          parentId: draft.id,
          depth: depth + 1,
        });
      }
    }

    level = next;
  }

  const graph: DependencyGraph = {
    projectName: input.projectName,
    rootId: PROJECT_ROOT_ID,
    referenceDate: input.referenceDate,
    nodes: [...drafts.values()]
      .map(toNode)
      .sort((a, b) => a.name.localeCompare(b.name) || a.ecosystem.localeCompare(b.ecosystem)),
    edges: [...edges.values()].sort((a, b) => a.from.localeCompare(b.from) || a.to.localeCompare(b.to)),
    truncated,
    assumptions: [...assumptions].sort((a, b) => a.localeCompare(b)),
  };

  onProgress?.({
    stage: "graph_built",
    nodes: graph.nodes.length,
    edges: graph.edges.length,
    truncated,
  });

  return graph;
};
