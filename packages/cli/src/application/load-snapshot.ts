import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ECOSYSTEMS } from "@depintel/core";
import { packageRecordSchema, type PackageRecord } from "@depintel/dependency-graph";
import type { ProjectDefinition } from "@depintel/orchestrator";
import { z } from "zod";

export class SnapshotError extends Error {
  readonly snapshotPath: string;

  constructor(snapshotPath: string, message: string) {
    super(`invalid snapshot ${snapshotPath}: ${message}`);
    this.name = "SnapshotError";
    this.snapshotPath = snapshotPath;
  }
}

const declaredDependencySchema = z.object({
  name: z.string().min(1),
  ecosystem: z.enum(ECOSYSTEMS).default("npm"),
  versionConstraint: z.string().default("*"),
  usage: z
    .object({
      usedFeatures: z.array(z.string()).default([]),
      unusedFeatures: z.array(z.string()).default([]),
      usageScore: z.number().min(0).max(1).nullable().default(null),
    })
    .nullable()
    .default(null),
});

export const projectSnapshotSchema = z.object({
  projectId: z.string().min(1).optional(),
  projectName: z.string().min(1),
  referenceDate: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), { message: "expected an ISO date" })
    .optional(),
  dependencies: z.array(declaredDependencySchema),
  packages: z.array(packageRecordSchema).default([]),
});

export type ProjectSnapshotInput = z.input<typeof projectSnapshotSchema>;

export type LoadedSnapshot = {
  project: ProjectDefinition;
  packages: readonly PackageRecord[];
};

export const parseSnapshot = (raw: unknown, snapshotPath: string): LoadedSnapshot => {
  const parsed = projectSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length === 0 ? issue.message : `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new SnapshotError(snapshotPath, issues.join("; "));
  }

  const snapshot = parsed.data;
  return {
    project: {
      projectId: snapshot.projectId ?? snapshot.projectName,
      projectName: snapshot.projectName,
      dependencies: snapshot.dependencies,
      referenceDate: snapshot.referenceDate ?? null,
    },
    packages: snapshot.packages,
  };
};

export const loadSnapshot = (inputPath: string, cwd: string): LoadedSnapshot => {
  const snapshotPath = resolve(cwd, inputPath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(snapshotPath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SnapshotError(snapshotPath, reason);
  }

  return parseSnapshot(raw, snapshotPath);
};
