import {
  ConcurrencyLimitExceededError,
  InvalidConfigurationError,
  JobNotFoundError,
  type DeclaredDependency,
  type Ecosystem,
  type PackageMetadata,
  type ReleaseRecord,
} from "@depintel/core";
import {
  StaticMetadataProvider,
  parsePackageRecords,
  type MetadataProvider,
} from "@depintel/dependency-graph";
import { describe, expect, it } from "vitest";
import type { OrchestratorProgressEvent, ProjectDefinition } from "../domain/types.js";
import { InMemoryProjectSource } from "../infrastructure/in-memory-project-source.js";
import { AnalysisOrchestrator, type AnalysisOrchestratorDependencies } from "./analysis-orchestrator.js";

const REFERENCE_DATE = "2024-06-01T00:00:00.000Z";

const dependency = (name: string): DeclaredDependency => ({
  name,
  ecosystem: "npm",
  versionConstraint: "^1.0.0",
  usage: null,
});

const project = (projectId: string, dependencies: readonly DeclaredDependency[]): ProjectDefinition => ({
  projectId,
  projectName: projectId,
  dependencies,
  referenceDate: REFERENCE_DATE,
});

const records = parsePackageRecords([
  {
    name: "copyleft",
    ecosystem: "npm",
    latestVersion: "1.0.0",
    licenses: ["GPL-3.0"],
    releases: [{ version: "1.0.0", releaseDate: "2024-01-01T00:00:00.000Z" }],
  },
]);

const createGate = () => {
  let open: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open: () => open() };
};

class GatedMetadataProvider implements MetadataProvider {
  private readonly gate = createGate();

  constructor(private readonly inner: MetadataProvider) {}

  open(): void {
    this.gate.open();
  }

  async lookup(name: string, ecosystem: Ecosystem): Promise<PackageMetadata | null> {
    await this.gate.opened;
    return this.inner.lookup(name, ecosystem);
  }

  async versionHistory(name: string, ecosystem: Ecosystem): Promise<readonly ReleaseRecord[]> {
    await this.gate.opened;
    return this.inner.versionHistory(name, ecosystem);
  }
}

class StalledMetadataProvider implements MetadataProvider {
  lookup(): Promise<PackageMetadata | null> {
    return new Promise(() => {});
  }

  versionHistory(): Promise<readonly ReleaseRecord[]> {
    return new Promise(() => {});
  }
}

const createSteppingClock = (): (() => Date) => {
  let tick = 0;
  return () => {
    tick += 1;
    return new Date(Date.parse("2024-07-01T00:00:00.000Z") + tick * 1000);
  };
};

const createOrchestrator = (overrides: Partial<AnalysisOrchestratorDependencies> = {}): AnalysisOrchestrator => {
  let nextId = 0;
  return new AnalysisOrchestrator({
    projects: new InMemoryProjectSource([project("shop", [dependency("copyleft")]), project("other", [])]),
    metadataProvider: new StaticMetadataProvider(records),
    clock: createSteppingClock(),
    generateId: () => {
      nextId += 1;
      return `job-${nextId}`;
    },
    ...overrides,
  });
};

describe("AnalysisOrchestrator", () => {
  it("moves a job from pending to completed", async () => {
    const orchestrator = createOrchestrator();

    const jobId = orchestrator.submit("shop", "license_compliance", {});

    expect(orchestrator.getStatus(jobId)?.status).toBe("pending");
    expect(orchestrator.getResult(jobId)).toEqual({ state: "not_ready", status: "pending" });

    const job = await orchestrator.waitForJob(jobId);

    expect(job.status).toBe("completed");
    expect(job.startedAt).not.toBeNull();
    expect(job.completedAt).not.toBeNull();
    const view = orchestrator.getResult(jobId);
    if (view.state !== "completed") {
      throw new Error(`expected a completed result, got ${view.state}`);
    }
    expect(view.result.analysisType).toBe("license_compliance");
    expect(view.result.generatedAt).toBe(REFERENCE_DATE);
    expect(orchestrator.activeJobCount("shop")).toBe(0);
  });

  it("rejects a sixth active job for the same project without creating it", async () => {
    const provider = new GatedMetadataProvider(new StaticMetadataProvider(records));
    const orchestrator = createOrchestrator({ metadataProvider: provider });

    const jobIds = Array.from({ length: 5 }, () => orchestrator.submit("shop", "health_monitoring", {}));

    let rejection: unknown = null;
    try {
      orchestrator.submit("shop", "health_monitoring", {});
    } catch (error) {
      rejection = error;
    }

    expect(rejection).toBeInstanceOf(ConcurrencyLimitExceededError);
    expect(rejection).toMatchObject({ code: "concurrency_limit_exceeded", retryable: true, limit: 5 });
    expect(orchestrator.listJobs("shop")).toHaveLength(5);
    expect(orchestrator.activeJobCount("shop")).toBe(5);
    expect(() => orchestrator.submit("other", "health_monitoring", {})).not.toThrow();

    provider.open();
    const finished = await Promise.all(jobIds.map((jobId) => orchestrator.waitForJob(jobId)));

    expect(finished.map((job) => job.status)).toEqual(["completed", "completed", "completed", "completed", "completed"]);
    expect(orchestrator.activeJobCount("shop")).toBe(0);
    expect(() => orchestrator.submit("shop", "health_monitoring", {})).not.toThrow();
  });

  it("rejects invalid requests before creating a job", () => {
    const orchestrator = createOrchestrator();

    expect(() => orchestrator.submit("shop", "impact_scoring", { bogus: 1 })).toThrow(InvalidConfigurationError);
    expect(() => orchestrator.submit("shop", "vibe_check", {})).toThrow(InvalidConfigurationError);
    expect(orchestrator.listJobs("shop")).toEqual([]);
    expect(orchestrator.activeJobCount("shop")).toBe(0);
  });

  it("fails the job when metadata lookups exceed the timeout", async () => {
    const orchestrator = createOrchestrator({
      metadataProvider: new StalledMetadataProvider(),
      config: { metadataTimeoutMs: 20 },
    });

    const job = await orchestrator.waitForJob(orchestrator.submit("shop", "impact_scoring", {}));

    expect(job).toMatchObject({
      status: "failed",
      errorCode: "analysis_timeout",
      errorMessage: "metadata lookups exceeded 20ms",
    });
    expect(orchestrator.getResult(job.id)).toMatchObject({ state: "failed", errorCode: "analysis_timeout" });
  });

  it("fails the job when a direct dependency cannot be resolved", async () => {
    const orchestrator = createOrchestrator({
      projects: new InMemoryProjectSource([project("shop", [dependency("missing")])]),
    });

    const job = await orchestrator.waitForJob(orchestrator.submit("shop", "health_monitoring", {}));

    expect(job).toMatchObject({ status: "failed", errorCode: "unresolved_dependency" });
  });

  it("keeps direct dependencies without metadata when partial metadata is allowed", async () => {
    const orchestrator = createOrchestrator({
      projects: new InMemoryProjectSource([project("shop", [dependency("missing")])]),
      config: { graph: { allowPartialMetadata: true } },
    });

    const job = await orchestrator.waitForJob(orchestrator.submit("shop", "health_monitoring", {}));

    expect(job.status).toBe("completed");
  });

  it("fails the job for an unknown project", async () => {
    const orchestrator = createOrchestrator();

    const job = await orchestrator.waitForJob(orchestrator.submit("ghost", "license_compliance", {}));

    expect(job).toMatchObject({
      status: "failed",
      errorCode: "project_not_found",
      errorMessage: "project not found: ghost",
    });
  });

  it("discards the result of a cancelled job", async () => {
    const provider = new GatedMetadataProvider(new StaticMetadataProvider(records));
    const orchestrator = createOrchestrator({ metadataProvider: provider });
    const jobId = orchestrator.submit("shop", "license_compliance", {});

    expect(orchestrator.cancel(jobId).cancelRequested).toBe(true);

    provider.open();
    const job = await orchestrator.waitForJob(jobId);

    expect(job).toMatchObject({ status: "failed", errorMessage: "cancelled", errorCode: "cancelled" });
    expect(orchestrator.getResult(jobId).state).toBe("failed");
    expect(orchestrator.activeJobCount("shop")).toBe(0);
  });

  it("reports a job cancelled while running as cancelled even when its run fails", async () => {
    const orchestrator: AnalysisOrchestrator = createOrchestrator({
      projects: new InMemoryProjectSource([project("shop", [dependency("missing")])]),
      onProgress: (event) => {
        if (event.stage === "job_started") {
          orchestrator.cancel(event.jobId);
        }
      },
    });

    const job = await orchestrator.waitForJob(orchestrator.submit("shop", "health_monitoring", {}));

    expect(job).toMatchObject({ status: "failed", errorMessage: "cancelled", errorCode: "cancelled" });
    expect(job.startedAt).not.toBeNull();
  });

  it("forgets finished executions and answers waits from the store", async () => {
    const orchestrator = createOrchestrator();
    const jobId = orchestrator.submit("shop", "license_compliance", {});

    expect(orchestrator.inFlightCount()).toBe(1);

    const job = await orchestrator.waitForJob(jobId);

    expect(orchestrator.inFlightCount()).toBe(0);
    await expect(orchestrator.waitForJob(jobId)).resolves.toEqual(job);
  });

  it("never changes a terminal job", async () => {
    const orchestrator = createOrchestrator();
    const job = await orchestrator.waitForJob(orchestrator.submit("shop", "license_compliance", {}));

    const afterCancel = orchestrator.cancel(job.id);

    expect(afterCancel).toEqual(job);
    expect(orchestrator.getStatus(job.id)).toEqual(job);
  });

  it("reports unknown jobs", async () => {
    const orchestrator = createOrchestrator();

    expect(orchestrator.getStatus("nope")).toBeNull();
    expect(orchestrator.getResult("nope")).toEqual({ state: "not_found" });
    expect(() => orchestrator.cancel("nope")).toThrow(JobNotFoundError);
    await expect(orchestrator.waitForJob("nope")).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it("reports job progress in order", async () => {
    const events: OrchestratorProgressEvent[] = [];
    const orchestrator = createOrchestrator({ onProgress: (event) => events.push(event) });

    await orchestrator.waitForJob(orchestrator.submit("shop", "license_compliance", {}));
    const stages = events.map((event) => event.stage);

    expect(stages[0]).toBe("job_submitted");
    expect(stages[1]).toBe("job_started");
    expect(stages).toContain("graph");
    expect(stages[stages.length - 1]).toBe("job_completed");
  });
});

describe("AnalysisOrchestrator recommendations", () => {
  it("returns an empty list when no analysis has completed", () => {
    const orchestrator = createOrchestrator();

    expect(orchestrator.generateRecommendations("shop")).toEqual([]);
    expect(orchestrator.getRecommendations("shop")).toEqual([]);
  });

  it("builds recommendations from the latest completed result of each type", async () => {
    const orchestrator = createOrchestrator();
    await orchestrator.waitForJob(orchestrator.submit("shop", "license_compliance", {}));

    const first = orchestrator.generateRecommendations("shop");

    expect(first.map((entry) => [entry.kind, entry.dependency?.name])).toEqual([["license_remediation", "copyleft"]]);
    expect(orchestrator.getRecommendations("shop")).toEqual(first);

    await orchestrator.waitForJob(orchestrator.submit("shop", "license_compliance", { targetLicense: "GPL-3.0" }));

    expect(orchestrator.generateRecommendations("shop")).toEqual([]);
    expect(orchestrator.getRecommendations("shop")).toEqual([]);
  });
});
