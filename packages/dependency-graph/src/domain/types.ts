import type { Ecosystem, PackageMetadata, ReleaseRecord } from "@depintel/core";

export interface MetadataProvider {
  lookup(name: string, ecosystem: Ecosystem): Promise<PackageMetadata | null>;
  versionHistory(name: string, ecosystem: Ecosystem): Promise<readonly ReleaseRecord[]>;
}

export type GraphBuildOptions = {
  maxDepth: number;
  maxNodes: number;
  metadataConcurrency: number;
  // keep direct dependencies without metadata instead of failing the build
  allowPartialMetadata: boolean;
};

export const DEFAULT_GRAPH_BUILD_OPTIONS: GraphBuildOptions = {
  maxDepth: 4,
  maxNodes: 500,
  metadataConcurrency: 8,
  allowPartialMetadata: false,
};

export type GraphBuildProgressEvent =
  | { stage: "level_started"; depth: number; packages: number }
  | {
      stage: "package_resolved";
      depth: number;
      completed: number;
      total: number;
      packageName: string;
      available: boolean;
    }
  | { stage: "cycle_broken"; from: string; to: string }
  | { stage: "graph_built"; nodes: number; edges: number; truncated: boolean };
