import type { Logger } from "@depintel/core";
import { StaticMetadataProvider } from "@depintel/dependency-graph";
import {
  AnalysisOrchestrator,
  InMemoryProjectSource,
  type OrchestratorProgressEvent,
} from "@depintel/orchestrator";
import type { LoadedSnapshot } from "./load-snapshot.js";

export type CliRuntimeOptions = {
  metadataTimeoutMs: number | null;
};

const createProgressReporter = (logger: Logger): ((event: OrchestratorProgressEvent) => void) => {
  let lastLoggedProgress = 0;

  return (event) => {
    switch (event.stage) {
      case "job_submitted":
        logger.debug(`job ${event.jobId}: ${event.analysisType} submitted`);
        break;
      case "job_started":
        logger.debug(`job ${event.jobId}: started`);
        break;
      case "graph": {
        const graphEvent = event.event;
        if (graphEvent.stage === "level_started") {
          logger.info(`graph: resolving ${graphEvent.packages} packages at depth ${graphEvent.depth}`);
        } else if (graphEvent.stage === "package_resolved") {
          if (
            graphEvent.completed === graphEvent.total ||
            graphEvent.completed === 1 ||
            graphEvent.completed - lastLoggedProgress >= 25
          ) {
            lastLoggedProgress = graphEvent.completed;
            logger.debug(`graph: metadata progress ${graphEvent.completed}/${graphEvent.total}`);
          }
          if (!graphEvent.available) {
            logger.warn(`graph: no metadata for ${graphEvent.packageName}`);
          }
        } else if (graphEvent.stage === "cycle_broken") {
          logger.debug(`graph: cycle broken at ${graphEvent.from} -> ${graphEvent.to}`);
        } else {
          lastLoggedProgress = 0;
          logger.info(
            `graph: built ${graphEvent.nodes} nodes and ${graphEvent.edges} edges${graphEvent.truncated ? " (truncated)" : ""}`,
          );
        }
        break;
      }
      case "job_completed":
        logger.debug(`job ${event.jobId}: completed`);
        break;
      case "job_failed":
        logger.debug(`job ${event.jobId}: failed with ${event.errorCode}`);
        break;
    }
  };
};

export const createSnapshotOrchestrator = (
  snapshot: LoadedSnapshot,
  runtime: CliRuntimeOptions,
  logger: Logger,
): AnalysisOrchestrator =>
  new AnalysisOrchestrator({
    projects: new InMemoryProjectSource([snapshot.project]),
    metadataProvider: new StaticMetadataProvider(snapshot.packages),
    logger,
    onProgress: createProgressReporter(logger),
    config: runtime.metadataTimeoutMs === null ? {} : { metadataTimeoutMs: runtime.metadataTimeoutMs },
  });

export const parseTimeoutMs = (value: string | undefined): number | null => {
  if (value === undefined || value.trim().length === 0) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
};
