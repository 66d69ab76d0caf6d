import { ECOSYSTEMS, type PackageMetadata, type ReleaseRecord } from "@depintel/core";
import { z } from "zod";

const isoDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "expected an ISO date" });

const unitInterval = z.number().min(0).max(1);

export const releaseRecordSchema = z.object({
  version: z.string().min(1),
  releaseDate: isoDate,
  isYanked: z.boolean().default(false),
});

export const packageRecordSchema = z.object({
  name: z.string().min(1),
  ecosystem: z.enum(ECOSYSTEMS),
  latestVersion: z.string().min(1).nullable().default(null),
  licenses: z.array(z.string()).default([]),
  deprecated: z.boolean().nullable().default(null),
  category: z.string().min(1).nullable().default(null),
  requirements: z
    .array(z.object({ name: z.string().min(1), versionConstraint: z.string().default("*") }))
    .default([]),
  community: z
    .object({
      contributorCount: z.number().int().nonnegative().nullable().default(null),
      openIssueRatio: unitInterval.nullable().default(null),
    })
    .default({}),
  size: z
    .object({ minifiedBytes: z.number().nonnegative(), gzippedBytes: z.number().nonnegative() })
    .nullable()
    .default(null),
  runtime: z
    .object({
      startupMs: z.number().nonnegative(),
      runtimeMs: z.number().nonnegative(),
      memoryMb: z.number().nonnegative(),
    })
    .nullable()
    .default(null),
  vulnerabilities: z
    .array(z.object({ id: z.string().min(1), severity: z.enum(["critical", "high", "medium", "low"]) }))
    .nullable()
    .default(null),
  breakingChanges: z
    .array(
      z.object({
        versionRange: z.string().min(1),
        description: z.string().default(""),
        apiCompatibility: unitInterval.nullable().default(null),
      }),
    )
    .default([]),
  releases: z.array(releaseRecordSchema).default([]),
});

export type PackageRecordInput = z.input<typeof packageRecordSchema>;

export type PackageRecord = PackageMetadata & {
  releases: readonly ReleaseRecord[];
};

export const parsePackageRecords = (raw: unknown): readonly PackageRecord[] =>
  z.array(packageRecordSchema).parse(raw);
