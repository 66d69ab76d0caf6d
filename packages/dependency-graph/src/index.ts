export {
  buildDependencyGraph,
  type BuildDependencyGraphInput,
} from "./application/build-dependency-graph.js";
export {
  collectTransitiveDependencies,
  createGraphIndex,
  findShortestPath,
  getDirectNodes,
  type GraphIndex,
} from "./domain/graph-queries.js";
export {
  coerceVersion,
  compareVersions,
  isStableVersion,
  parseVersion,
  resolveHighestSatisfying,
  satisfiesConstraint,
  versionLag,
  type ParsedVersion,
  type VersionLag,
} from "./domain/semver.js";
export {
  DEFAULT_GRAPH_BUILD_OPTIONS,
  type GraphBuildOptions,
  type GraphBuildProgressEvent,
  type MetadataProvider,
} from "./domain/types.js";
export { NoopMetadataProvider } from "./infrastructure/noop-metadata-provider.js";
export {
  packageRecordSchema,
  parsePackageRecords,
  releaseRecordSchema,
  type PackageRecord,
  type PackageRecordInput,
} from "./infrastructure/package-record-schema.js";
export { StaticMetadataProvider } from "./infrastructure/static-metadata-provider.js";
