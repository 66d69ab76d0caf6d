import {
  PROJECT_ROOT_ID,
  dependencyId,
  type DependencyEdge,
  type DependencyGraph,
  type DependencyNode,
  type Ecosystem,
} from "@depintel/core";

export const REFERENCE_DATE = "2024-06-01T00:00:00.000Z";

export const makeNode = (
  name: string,
  overrides: Partial<Omit<DependencyNode, "id" | "name">> = {},
): DependencyNode => {
  const ecosystem: Ecosystem = overrides.ecosystem ?? "npm";
  const depth = overrides.depth ?? 0;
  return {
    id: dependencyId(ecosystem, name),
    name,
    ecosystem,
    versionConstraint: "^1.0.0",
    currentVersion: "1.0.0",
    latestVersion: "1.0.0",
    depth,
    direct: depth === 0,
    parents: depth === 0 ? [PROJECT_ROOT_ID] : [],
    versionUsage: [{ version: "1.0.0", constraints: ["^1.0.0"], requiredBy: [PROJECT_ROOT_ID] }],
    licenses: ["MIT"],
    deprecated: false,
    category: null,
    community: { contributorCount: null, openIssueRatio: null },
    size: null,
    runtime: null,
    vulnerabilities: null,
    breakingChanges: [],
    releases: [],
    usage: null,
    metadataAvailable: true,
    ...overrides,
  };
};

/**
 * Graph over the given nodes. Direct nodes get an edge from the project root;
 * `links` lists additional parent -> child edges by package name.
 */
export const makeGraph = (
  nodes: readonly DependencyNode[],
  links: readonly (readonly [string, string])[] = [],
): DependencyGraph => {
  const idByName = new Map(nodes.map((node) => [node.name, node.id]));
  const edges: DependencyEdge[] = nodes
    .filter((node) => node.direct)
    .map((node) => ({ from: PROJECT_ROOT_ID, to: node.id, versionConstraint: node.versionConstraint }));

  for (const [from, to] of links) {
    const fromId = idByName.get(from);
    const toId = idByName.get(to);
    if (fromId !== undefined && toId !== undefined) {
      edges.push({ from: fromId, to: toId, versionConstraint: "*" });
    }
  }

  return {
    projectName: "demo",
    rootId: PROJECT_ROOT_ID,
    referenceDate: REFERENCE_DATE,
    nodes,
    edges,
    truncated: false,
    assumptions: [],
  };
};

export const release = (version: string, date: string, isYanked = false) => ({
  version,
  releaseDate: `${date}T00:00:00.000Z`,
  isYanked,
});
