import { describe, expect, it } from "vitest";
import {
  coerceVersion,
  compareVersions,
  resolveHighestSatisfying,
  satisfiesConstraint,
  versionLag,
} from "./semver.js";

describe("satisfiesConstraint", () => {
  it("handles npm caret and tilde ranges", () => {
    expect(satisfiesConstraint("1.4.0", "^1.2.0")).toBe(true);
    expect(satisfiesConstraint("2.0.0", "^1.2.0")).toBe(false);
    expect(satisfiesConstraint("0.2.5", "^0.2.0")).toBe(true);
    expect(satisfiesConstraint("0.3.0", "^0.2.0")).toBe(false);
    expect(satisfiesConstraint("1.2.9", "~1.2.0")).toBe(true);
    expect(satisfiesConstraint("1.3.0", "~1.2.0")).toBe(false);
  });

  it("handles x-ranges, hyphen ranges and alternatives", () => {
    expect(satisfiesConstraint("1.2.7", "1.2")).toBe(true);
    expect(satisfiesConstraint("1.2.3", "1.2.*")).toBe(true);
    expect(satisfiesConstraint("1.5.0", "1.0.0 - 1.4.0")).toBe(false);
    expect(satisfiesConstraint("1.0.0", "^2.0.0 || 1.x")).toBe(true);
  });

  it("handles comma separated specifier sets", () => {
    expect(satisfiesConstraint("2.31.0", ">=2.0,<3")).toBe(true);
    expect(satisfiesConstraint("3.0.0", ">=2.0,<3")).toBe(false);
    expect(satisfiesConstraint("1.4.5", "~=1.4.2")).toBe(true);
    expect(satisfiesConstraint("1.5.0", "~=1.4.2")).toBe(false);
    expect(satisfiesConstraint("2.9.0", "~=2.2")).toBe(true);
    expect(satisfiesConstraint("2.0.1", "!=2.0.1")).toBe(false);
  });

  it("returns null for constraints it cannot interpret", () => {
    expect(satisfiesConstraint("1.0.0", "banana")).toBeNull();
    expect(satisfiesConstraint("not-a-version", "^1.0.0")).toBeNull();
  });
});

describe("resolveHighestSatisfying", () => {
  it("prefers the highest stable match", () => {
    expect(resolveHighestSatisfying(["1.0.0", "1.2.0", "2.0.0", "1.3.0-beta.1"], "^1.0.0")).toBe("1.2.0");
  });

  it("falls back to a prerelease when no stable version matches", () => {
    expect(resolveHighestSatisfying(["1.2.0", "2.0.0", "1.3.0-beta.1"], "^1.3.0-beta.0")).toBe("1.3.0-beta.1");
  });

  it("returns null when nothing matches", () => {
    expect(resolveHighestSatisfying(["1.0.0"], "^2.0.0")).toBeNull();
  });
});

describe("version helpers", () => {
  it("orders versions with unparseable strings first", () => {
    const sorted = ["1.10.0", "1.2.0", "1.2.0-rc.1", "abc"].sort(compareVersions);
    expect(sorted).toEqual(["abc", "1.2.0-rc.1", "1.2.0", "1.10.0"]);
  });

  it("coerces constraints to their floor version", () => {
    expect(coerceVersion("^1.2")).toBe("1.2.0");
    expect(coerceVersion(">=2.0,<3")).toBe("2.0.0");
    expect(coerceVersion("*")).toBeNull();
  });

  it("measures how far a version lags behind latest", () => {
    expect(versionLag("1.2.0", "1.5.3")).toEqual({ majorsBehind: 0, minorsBehind: 3 });
    expect(versionLag("1.9.0", "2.0.0")).toEqual({ majorsBehind: 1, minorsBehind: 0 });
    expect(versionLag("2.0.0", "1.0.0")).toEqual({ majorsBehind: 0, minorsBehind: 0 });
  });
});
