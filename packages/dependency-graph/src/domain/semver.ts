export type ParsedVersion = {
  major: number;
  minor: number;
  patch: number;
  prerelease: readonly (string | number)[];
  // number of numeric components actually written ("1.2" -> 2)
  precision: 1 | 2 | 3;
};

export type VersionLag = {
  majorsBehind: number;
  minorsBehind: number;
};

const VERSION_PATTERN =
  /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-?([0-9A-Za-z][0-9A-Za-z.-]*))?(?:\+[0-9A-Za-z.-]+)?$/;

const parsePrerelease = (value: string | undefined): readonly (string | number)[] => {
  if (value === undefined || value.length === 0) {
    return [];
  }

  return value.split(".").map((part) => {
    const asNumber = Number.parseInt(part, 10);
    if (!Number.isNaN(asNumber) && `${asNumber}` === part) {
      return asNumber;
    }

    return part;
  });
};

export const parseVersion = (value: string): ParsedVersion | null => {
  const match = value.trim().match(VERSION_PATTERN);
  if (match === null) {
    return null;
  }

  const major = Number.parseInt(match[1] ?? "", 10);
  const minor = match[2] === undefined ? 0 : Number.parseInt(match[2], 10);
  const patch = match[3] === undefined ? 0 : Number.parseInt(match[3], 10);
  if (!Number.isFinite(major) || !Number.isFinite(minor) || !Number.isFinite(patch)) {
    return null;
  }

  let precision: 1 | 2 | 3 = 1;
  if (match[3] !== undefined) {
    precision = 3;
  } else if (match[2] !== undefined) {
    precision = 2;
  }

  return {
    major,
    minor,
    patch,
    prerelease: parsePrerelease(match[4]),
    precision,
  };
};

export const isStableVersion = (value: string): boolean => {
  const parsed = parseVersion(value);
  return parsed !== null && parsed.prerelease.length === 0;
};

const compareIdentifier = (left: string | number, right: string | number): number => {
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }

  if (typeof left === "number") {
    return -1;
  }

  if (typeof right === "number") {
    return 1;
  }

  return left.localeCompare(right);
};

export const compareParsedVersions = (left: ParsedVersion, right: ParsedVersion): number => {
  if (left.major !== right.major) {
    return left.major - right.major;
  }
  if (left.minor !== right.minor) {
    return left.minor - right.minor;
  }
  if (left.patch !== right.patch) {
    return left.patch - right.patch;
  }

  if (left.prerelease.length === 0 && right.prerelease.length === 0) {
    return 0;
  }
  if (left.prerelease.length === 0) {
    return 1;
  }
  if (right.prerelease.length === 0) {
    return -1;
  }

  const maxLength = Math.max(left.prerelease.length, right.prerelease.length);
  for (let i = 0; i < maxLength; i += 1) {
    const leftPart = left.prerelease[i];
    const rightPart = right.prerelease[i];

    if (leftPart === undefined && rightPart === undefined) {
      return 0;
    }
    if (leftPart === undefined) {
      return -1;
    }
    if (rightPart === undefined) {
      return 1;
    }

    const diff = compareIdentifier(leftPart, rightPart);
    if (diff !== 0) {
      return diff;
    }
  }

  return 0;
};

/**
 * Orders version strings ascending. Strings that do not parse as versions sort
 * before every parseable version and among themselves lexicographically.
 */
export const compareVersions = (left: string, right: string): number => {
  const parsedLeft = parseVersion(left);
  const parsedRight = parseVersion(right);

  if (parsedLeft === null && parsedRight === null) {
    return left.localeCompare(right);
  }
  if (parsedLeft === null) {
    return -1;
  }
  if (parsedRight === null) {
    return 1;
  }

  return compareParsedVersions(parsedLeft, parsedRight);
};

const isWildcardPart = (value: string | undefined): boolean =>
  value === undefined || value === "*" || value.toLowerCase() === "x";

const matchesPartialVersion = (version: ParsedVersion, token: string): boolean => {
  const normalized = token.trim().replace(/^v/, "");
  if (normalized === "*" || normalized.length === 0) {
    return true;
  }

  const [majorPart, minorPart, patchPart] = normalized.split(".");
  const expected = [majorPart, minorPart, patchPart];
  const actual = [version.major, version.minor, version.patch];

  for (let i = 0; i < expected.length; i += 1) {
    const part = expected[i];
    if (isWildcardPart(part) || part === undefined) {
      continue;
    }

    const value = Number.parseInt(part, 10);
    if (!Number.isFinite(value) || value !== actual[i]) {
      return false;
    }
  }

  return true;
};

const COMPARATOR_OPERATORS = ["===", "==", "!=", "~=", ">=", "<=", ">", "<", "="] as const;

type ComparatorOperator = (typeof COMPARATOR_OPERATORS)[number];

const parseComparatorToken = (
  token: string,
): { operator: ComparatorOperator; versionToken: string } => {
  for (const operator of COMPARATOR_OPERATORS) {
    if (token.startsWith(operator)) {
      return {
        operator,
        versionToken: token.slice(operator.length).trim(),
      };
    }
  }

  return {
    operator: "=",
    versionToken: token.trim(),
  };
};

const withinUpperBound = (
  version: ParsedVersion,
  base: ParsedVersion,
  upper: Omit<ParsedVersion, "precision" | "prerelease">,
): boolean =>
  compareParsedVersions(version, base) >= 0 &&
  compareParsedVersions(version, { ...upper, prerelease: [], precision: 3 }) < 0;

const satisfiesComparator = (version: ParsedVersion, token: string): boolean | null => {
  if (token.length === 0 || token === "*" || token === "latest") {
    return true;
  }

  if (token.startsWith("^")) {
    const base = parseVersion(token.slice(1));
    if (base === null) {
      return null;
    }

    if (base.major > 0 || base.precision === 1) {
      return withinUpperBound(version, base, { major: base.major + 1, minor: 0, patch: 0 });
    }
    if (base.minor > 0 || base.precision === 2) {
      return withinUpperBound(version, base, { major: 0, minor: base.minor + 1, patch: 0 });
    }

    return withinUpperBound(version, base, { major: 0, minor: 0, patch: base.patch + 1 });
  }

  if (token.startsWith("~") && !token.startsWith("~=")) {
    const base = parseVersion(token.slice(1));
    if (base === null) {
      return null;
    }

    if (base.precision === 1) {
      return withinUpperBound(version, base, { major: base.major + 1, minor: 0, patch: 0 });
    }

    return withinUpperBound(version, base, { major: base.major, minor: base.minor + 1, patch: 0 });
  }

  const { operator, versionToken } = parseComparatorToken(token);
  const hasWildcard = /(^|[.])(?:x|X|\*)($|[.])/.test(versionToken);
  if (hasWildcard) {
    if (operator === "=" || operator === "==") {
      return matchesPartialVersion(version, versionToken);
    }
    if (operator === "!=") {
      return !matchesPartialVersion(version, versionToken);
    }

    return null;
  }

  const target = parseVersion(versionToken);
  if (target === null) {
    return null;
  }

  if (operator === "~=") {
    // compatible release: ~=1.4.2 means >=1.4.2 and 1.4.*; ~=2.2 means >=2.2 and 2.*
    if (target.precision === 1) {
      return null;
    }
    if (target.precision === 2) {
      return withinUpperBound(version, target, { major: target.major + 1, minor: 0, patch: 0 });
    }

    return withinUpperBound(version, target, { major: target.major, minor: target.minor + 1, patch: 0 });
  }

  // a bare partial version ("1.2") is an x-range in npm
  if (operator === "=" && target.precision < 3 && target.prerelease.length === 0) {
    return matchesPartialVersion(version, versionToken);
  }

  const comparison = compareParsedVersions(version, target);
  switch (operator) {
    case ">":
      return comparison > 0;
    case ">=":
      return comparison >= 0;
    case "<":
      return comparison < 0;
    case "<=":
      return comparison <= 0;
    case "!=":
      return comparison !== 0;
    case "=":
    case "==":
    case "===":
      return comparison === 0;
    default:
      return null;
  }
};

const satisfiesRangeClause = (version: ParsedVersion, clause: string): boolean | null => {
  const hyphenMatch = clause.match(/^\s*(.+?)\s+-\s+(.+?)\s*$/);
  if (hyphenMatch !== null) {
    const lower = hyphenMatch[1];
    const upper = hyphenMatch[2];
    if (lower === undefined || upper === undefined) {
      return null;
    }

    const lowerResult = satisfiesComparator(version, `>=${lower}`);
    const upperResult = satisfiesComparator(version, `<=${upper}`);
    if (lowerResult === null || upperResult === null) {
      return null;
    }

    return lowerResult && upperResult;
  }

  const tokens = clause
    .replace(/,/g, " ")
    .replace(/(===|==|!=|~=|>=|<=|>|<|=)\s+/g, "$1")
    .split(/\s+/)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

  if (tokens.length === 0) {
    return true;
  }

  for (const token of tokens) {
    const matched = satisfiesComparator(version, token);
    if (matched === null) {
      return null;
    }

    if (!matched) {
      return false;
    }
  }

  return true;
};

/**
 * Tests a version against an npm range or a PEP 440 specifier set.
 * Returns null when the version or the constraint cannot be interpreted.
 */
export const satisfiesConstraint = (version: string, constraint: string): boolean | null => {
  const parsed = parseVersion(version);
  if (parsed === null) {
    return null;
  }

  const clauses = constraint
    .split("||")
    .map((clause) => clause.trim());

  let unsupported = false;
  for (const clause of clauses) {
    const matched = satisfiesRangeClause(parsed, clause);
    if (matched === null) {
      unsupported = true;
      continue;
    }

    if (matched) {
      return true;
    }
  }

  return unsupported ? null : false;
};

/**
 * Highest version satisfying the constraint. Prereleases are only picked when no
 * stable version satisfies it.
 */
export const resolveHighestSatisfying = (
  versions: readonly string[],
  constraint: string,
): string | null => {
  const candidates = versions
    .map((version) => ({ version, parsed: parseVersion(version) }))
    .filter((candidate): candidate is { version: string; parsed: ParsedVersion } => candidate.parsed !== null)
    .sort((a, b) => compareParsedVersions(b.parsed, a.parsed));

  let prereleaseMatch: string | null = null;
  for (const candidate of candidates) {
    if (satisfiesConstraint(candidate.version, constraint) !== true) {
      continue;
    }

    if (candidate.parsed.prerelease.length === 0) {
      return candidate.version;
    }

    prereleaseMatch ??= candidate.version;
  }

  return prereleaseMatch;
};

/**
 * Floor version written in a constraint: "^1.2" -> "1.2.0", ">=2.0,<3" -> "2.0.0".
 */
export const coerceVersion = (constraint: string): string | null => {
  const match = constraint.match(/(\d+)(?:\.(\d+))?(?:\.(\d+))?/);
  if (match === null) {
    return null;
  }

  const major = Number.parseInt(match[1] ?? "0", 10);
  const minor = Number.parseInt(match[2] ?? "0", 10);
  const patch = Number.parseInt(match[3] ?? "0", 10);
  return `${major}.${minor}.${patch}`;
};

export const versionLag = (current: string, latest: string): VersionLag | null => {
  const parsedCurrent = parseVersion(current);
  const parsedLatest = parseVersion(latest);
  if (parsedCurrent === null || parsedLatest === null) {
    return null;
  }

  if (compareParsedVersions(parsedCurrent, parsedLatest) >= 0) {
    return { majorsBehind: 0, minorsBehind: 0 };
  }

  const majorsBehind = parsedLatest.major - parsedCurrent.major;
  return {
    majorsBehind,
    minorsBehind: majorsBehind === 0 ? parsedLatest.minor - parsedCurrent.minor : 0,
  };
};
