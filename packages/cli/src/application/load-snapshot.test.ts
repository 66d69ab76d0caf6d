import { describe, expect, it } from "vitest";
import { SnapshotError, loadSnapshot, parseSnapshot } from "./load-snapshot.js";

describe("parseSnapshot", () => {
  it("fills in defaults for optional fields", () => {
    const snapshot = parseSnapshot(
      {
        projectName: "demo",
        dependencies: [{ name: "left-pad" }],
      },
      "demo.json",
    );

    expect(snapshot).toEqual({
      project: {
        projectId: "demo",
        projectName: "demo",
        referenceDate: null,
        dependencies: [{ name: "left-pad", ecosystem: "npm", versionConstraint: "*", usage: null }],
      },
      packages: [],
    });
  });

  it("reports every validation issue with its path", () => {
    expect(() => parseSnapshot({ projectName: "demo", dependencies: [{ ecosystem: "cargo" }] }, "demo.json")).toThrow(
      SnapshotError,
    );

    expect(() => parseSnapshot({ dependencies: [] }, "demo.json")).toThrow(
      "invalid snapshot demo.json: projectName: Required",
    );
  });
});

describe("loadSnapshot", () => {
  it("wraps unreadable files in a snapshot error", () => {
    expect(() => loadSnapshot("/nonexistent/depintel-snapshot.json", "/")).toThrow(SnapshotError);
  });
});
