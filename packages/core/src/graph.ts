export const ECOSYSTEMS = ["npm", "pypi"] as const;

export type Ecosystem = (typeof ECOSYSTEMS)[number];

export const PROJECT_ROOT_ID = "project";

export type UsageSignals = {
  usedFeatures: readonly string[];
  unusedFeatures: readonly string[];
  usageScore: number | null;
};

export type DeclaredDependency = {
  name: string;
  ecosystem: Ecosystem;
  versionConstraint: string;
  usage: UsageSignals | null;
};

export type PackageRequirement = {
  name: string;
  versionConstraint: string;
};

export type CommunitySignals = {
  contributorCount: number | null;
  openIssueRatio: number | null;
};

export type SizeMetrics = {
  minifiedBytes: number;
  gzippedBytes: number;
};

export type RuntimeMetrics = {
  startupMs: number;
  runtimeMs: number;
  memoryMb: number;
};

export type VulnerabilitySeverity = "critical" | "high" | "medium" | "low";

export type Vulnerability = {
  id: string;
  severity: VulnerabilitySeverity;
};

export type BreakingChangeMarker = {
  versionRange: string;
  description: string;
  // 0 = fully incompatible API, 1 = drop-in
  apiCompatibility: number | null;
};

export type PackageMetadata = {
  name: string;
  ecosystem: Ecosystem;
  latestVersion: string | null;
  licenses: readonly string[];
  deprecated: boolean | null;
  category: string | null;
  requirements: readonly PackageRequirement[];
  community: CommunitySignals;
  size: SizeMetrics | null;
  runtime: RuntimeMetrics | null;
  vulnerabilities: readonly Vulnerability[] | null;
  breakingChanges: readonly BreakingChangeMarker[];
};

export type ReleaseRecord = {
  version: string;
  releaseDate: string;
  isYanked: boolean;
};

export type VersionUsage = {
  version: string;
  constraints: readonly string[];
  requiredBy: readonly string[];
};

export type DependencyRef = {
  id: string;
  name: string;
  ecosystem: Ecosystem;
};

export type DependencyNode = DependencyRef & {
  versionConstraint: string;
  currentVersion: string | null;
  latestVersion: string | null;
  depth: number;
  direct: boolean;
  parents: readonly string[];
  versionUsage: readonly VersionUsage[];
  licenses: readonly string[];
  deprecated: boolean | null;
  category: string | null;
  community: CommunitySignals;
  size: SizeMetrics | null;
  runtime: RuntimeMetrics | null;
  vulnerabilities: readonly Vulnerability[] | null;
  breakingChanges: readonly BreakingChangeMarker[];
  releases: readonly ReleaseRecord[];
  usage: UsageSignals | null;
  metadataAvailable: boolean;
};

export type DependencyEdge = {
  from: string;
  to: string;
  versionConstraint: string;
};

export type DependencyGraph = {
  projectName: string;
  rootId: typeof PROJECT_ROOT_ID;
  referenceDate: string;
  nodes: readonly DependencyNode[];
  edges: readonly DependencyEdge[];
  truncated: boolean;
  assumptions: readonly string[];
};

export const dependencyId = (ecosystem: Ecosystem, name: string): string => `${ecosystem}:${name}`;

export const toDependencyRef = (node: DependencyRef): DependencyRef => ({
  id: node.id,
  name: node.name,
  ecosystem: node.ecosystem,
});
