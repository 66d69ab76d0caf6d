import { readFileSync } from "node:fs";
import type { LicenseClass, LicenseCompatibility, LicenseEvaluation } from "@depintel/core";
import { z } from "zod";

const knownClassSchema = z.enum(["permissive", "public_domain", "weak_copyleft", "strong_copyleft", "proprietary"]);
const compatibilitySchema = z.enum(["compatible", "conditional", "incompatible"]);

const licenseCatalogSchema = z.object({
  licenses: z.record(z.string(), knownClassSchema),
  aliases: z.record(z.string(), z.string()),
  matrix: z.record(knownClassSchema, z.record(knownClassSchema, compatibilitySchema)),
  overrides: z.array(
    z.object({
      dependency: z.string(),
      target: z.string(),
      compatibility: compatibilitySchema,
    }),
  ),
});

type KnownLicenseClass = z.infer<typeof knownClassSchema>;

export type LicenseCatalog = {
  // canonical id by lower-cased spelling (canonical ids and aliases)
  canonicalByKey: ReadonlyMap<string, string>;
  classById: ReadonlyMap<string, KnownLicenseClass>;
  matrix: Readonly<Partial<Record<KnownLicenseClass, Partial<Record<KnownLicenseClass, LicenseCompatibility>>>>>;
  overrides: ReadonlyMap<string, LicenseCompatibility>;
};

const overrideKey = (dependency: string, target: string): string => `${dependency}\u0000${target}`;

export const createLicenseCatalog = (raw: unknown): LicenseCatalog => {
  const parsed = licenseCatalogSchema.parse(raw);
  const classById = new Map(Object.entries(parsed.licenses));
  const canonicalByKey = new Map<string, string>();
  for (const id of classById.keys()) {
    canonicalByKey.set(id.toLowerCase(), id);
  }
  for (const [alias, id] of Object.entries(parsed.aliases)) {
    if (classById.has(id)) {
      canonicalByKey.set(alias.toLowerCase(), id);
    }
  }

  return {
    canonicalByKey,
    classById,
    matrix: parsed.matrix,
    overrides: new Map(
      parsed.overrides.map((entry) => [overrideKey(entry.dependency, entry.target), entry.compatibility]),
    ),
  };
};

let defaultCatalog: LicenseCatalog | null = null;

export const loadDefaultLicenseCatalog = (): LicenseCatalog => {
  if (defaultCatalog === null) {
    const path = new URL("../data/license-catalog.json", import.meta.url);
    defaultCatalog = createLicenseCatalog(JSON.parse(readFileSync(path, "utf8")));
  }

  return defaultCatalog;
};

export const normalizeLicense = (value: string, catalog: LicenseCatalog): string | null => {
  const key = value
    .trim()
    .replace(/^\(+|\)+$/g, "")
    .replace(/\s+/g, " ")
    .toLowerCase();
  if (key.length === 0) {
    return null;
  }

  return catalog.canonicalByKey.get(key) ?? catalog.canonicalByKey.get(key.replace(/ license$/, "")) ?? null;
};

export const classifyLicense = (id: string | null, catalog: LicenseCatalog): LicenseClass =>
  id === null ? "unknown" : (catalog.classById.get(id) ?? "unknown");

export const licenseCompatibility = (
  dependencyLicense: string | null,
  targetLicense: string,
  catalog: LicenseCatalog,
): LicenseCompatibility => {
  if (dependencyLicense === null) {
    return "unknown";
  }
  if (dependencyLicense === targetLicense) {
    return "compatible";
  }

  const override = catalog.overrides.get(overrideKey(dependencyLicense, targetLicense));
  if (override !== undefined) {
    return override;
  }

  const dependencyClass = catalog.classById.get(dependencyLicense);
  const targetClass = catalog.classById.get(targetLicense);
  if (dependencyClass === undefined || targetClass === undefined) {
    return "unknown";
  }

  return catalog.matrix[targetClass]?.[dependencyClass] ?? "unknown";
};

const COMPATIBILITY_RANK: Readonly<Record<LicenseCompatibility, number>> = {
  compatible: 0,
  conditional: 1,
  unknown: 2,
  incompatible: 3,
};

const worstRank = (evaluations: readonly LicenseEvaluation[]): number =>
  evaluations.reduce((worst, evaluation) => Math.max(worst, COMPATIBILITY_RANK[evaluation.compatibility]), 0);

const evaluateSingle = (raw: string, targetLicense: string, catalog: LicenseCatalog): LicenseEvaluation => {
  const id = normalizeLicense(raw, catalog);
  return {
    license: id ?? raw.trim(),
    licenseClass: classifyLicense(id, catalog),
    compatibility: licenseCompatibility(id, targetLicense, catalog),
  };
};

/**
 * Evaluates one declared license string, which may be an SPDX expression. For `OR`
 * the most compatible alternative applies; for `AND` every term applies.
 * `WITH` exceptions are ignored.
 */
export const evaluateLicenseExpression = (
  expression: string,
  targetLicense: string,
  catalog: LicenseCatalog,
): readonly LicenseEvaluation[] => {
  const cleaned = expression.replace(/[()]/g, " ").trim();
  const alternatives = cleaned
    .split(/\s+OR\s+/i)
    .map((alternative) =>
      alternative
        .split(/\s+AND\s+/i)
        .map((term) => term.split(/\s+WITH\s+/i)[0] ?? term)
        .filter((term) => term.trim().length > 0)
        .map((term) => evaluateSingle(term, targetLicense, catalog)),
    )
    .filter((evaluations) => evaluations.length > 0);

  let best: readonly LicenseEvaluation[] | null = null;
  for (const evaluations of alternatives) {
    if (best === null || worstRank(evaluations) < worstRank(best)) {
      best = evaluations;
    }
  }

  return best ?? [];
};
