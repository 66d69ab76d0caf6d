import { describe, expect, it } from "vitest";
import { loadDefaultLicenseCatalog } from "../domain/license-catalog.js";
import { makeGraph, makeNode } from "../test-fixtures.js";
import { assessDependencyLicense, checkLicenseCompliance, recommendFromLicense } from "./check-license-compliance.js";

const catalog = loadDefaultLicenseCatalog();
const mitTarget = { targetLicense: "MIT" };

const mixedGraph = makeGraph([
  makeNode("permissive-a", { licenses: ["MIT"] }),
  makeNode("permissive-b", { licenses: ["ISC"] }),
  makeNode("copyleft", { licenses: ["GPL-3.0"] }),
  makeNode("undeclared", { licenses: [] }),
]);

describe("checkLicenseCompliance", () => {
  it("marks a strong copyleft dependency as high risk under a permissive target", () => {
    const result = checkLicenseCompliance(
      makeGraph([makeNode("copyleft", { licenses: ["GPL-3.0"] })]),
      mitTarget,
      catalog,
    );

    expect(result.summary.compliancePercentage).toBe(0);
    expect(result.summary.overallRiskLevel).toBe("high");
    expect(result.details.highRiskDependencies.map((entry) => [entry.dependency.name, entry.reasons])).toEqual([
      ["copyleft", ["GPL-3.0 is incompatible with MIT"]],
    ]);
  });

  it("summarizes licenses across the whole tree", () => {
    const result = checkLicenseCompliance(mixedGraph, mitTarget, catalog);

    expect(result.summary).toEqual({
      targetLicense: "MIT",
      totalDependencies: 4,
      compliancePercentage: 50,
      overallRiskLevel: "high",
      licenseCounts: { "GPL-3.0": 1, ISC: 1, MIT: 1, UNKNOWN: 1 },
      riskCounts: { high: 1, medium: 1, low: 2 },
      licenseClassCounts: {
        permissive: 2,
        public_domain: 0,
        weak_copyleft: 0,
        strong_copyleft: 1,
        proprietary: 0,
        unknown: 1,
      },
    });
  });

  it("raises compliance when a compatible dependency is added", () => {
    const before = checkLicenseCompliance(mixedGraph, mitTarget, catalog).summary.compliancePercentage;
    const after = checkLicenseCompliance(
      makeGraph([...mixedGraph.nodes, makeNode("permissive-c", { licenses: ["BSD-3-Clause"] })]),
      mitTarget,
      catalog,
    ).summary.compliancePercentage;

    expect(after).toBe(60);
    expect(after).toBeGreaterThan(before);
  });

  it("lists direct high-risk dependencies before transitive ones", () => {
    const graph = makeGraph(
      [
        makeNode("zeta", { licenses: ["AGPL-3.0"] }),
        makeNode("alpha", { depth: 1, licenses: ["GPL-2.0"] }),
      ],
      [["zeta", "alpha"]],
    );

    const result = checkLicenseCompliance(graph, mitTarget, catalog);

    expect(result.details.highRiskDependencies.map((entry) => entry.dependency.name)).toEqual(["zeta", "alpha"]);
  });

  it("treats an empty tree as fully compliant", () => {
    const result = checkLicenseCompliance(makeGraph([]), mitTarget, catalog);

    expect(result.summary.compliancePercentage).toBe(100);
    expect(result.summary.overallRiskLevel).toBe("low");
  });
});

describe("assessDependencyLicense", () => {
  it("grades conditional and unknown licenses as medium risk", () => {
    expect(assessDependencyLicense(makeNode("weak", { licenses: ["LGPL-2.1"] }), "MIT", catalog)).toMatchObject({
      riskLevel: "medium",
      reasons: ["LGPL-2.1 is only conditionally compatible with MIT"],
    });
    expect(assessDependencyLicense(makeNode("odd", { licenses: ["Foo-License"] }), "MIT", catalog)).toMatchObject({
      riskLevel: "medium",
      reasons: ["Foo-License is not a recognized license"],
    });
    expect(assessDependencyLicense(makeNode("bare", { licenses: [] }), "MIT", catalog)).toMatchObject({
      riskLevel: "medium",
      reasons: ["no license declared"],
    });
  });

  it("uses the most compatible alternative of a dual license", () => {
    const assessment = assessDependencyLicense(makeNode("dual", { licenses: ["MIT OR GPL-3.0"] }), "MIT", catalog);

    expect(assessment.riskLevel).toBe("low");
    expect(assessment.reasons).toEqual([]);
  });

  it("evaluates against copyleft targets", () => {
    const node = makeNode("apache", { licenses: ["Apache-2.0"] });

    expect(assessDependencyLicense(node, "GPL-2.0", catalog).riskLevel).toBe("high");
    expect(assessDependencyLicense(node, "GPL-3.0", catalog).riskLevel).toBe("low");
  });
});

describe("recommendFromLicense", () => {
  it("recommends remediation for conflicts and review for uncertain licenses", () => {
    const recommendations = recommendFromLicense(checkLicenseCompliance(mixedGraph, mitTarget, catalog));

    expect(recommendations.map((entry) => [entry.title, entry.description, entry.severity])).toEqual([
      ["Resolve license conflict in copyleft", "GPL-3.0 is incompatible with MIT.", "high"],
      ["Review the license of undeclared", "no license declared.", "medium"],
    ]);
  });
});
