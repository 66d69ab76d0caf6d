import { InvalidConfigurationError } from "@depintel/core";

type OptionValue = string | number | boolean | null | OptionMap;
type OptionMap = { [key: string]: OptionValue };

const parseValue = (raw: string): OptionValue => {
  if (raw === "true" || raw === "false") {
    return raw === "true";
  }
  if (raw === "null") {
    return null;
  }

  const numeric = Number(raw);
  if (raw.trim().length > 0 && Number.isFinite(numeric)) {
    return numeric;
  }

  return raw;
};

/**
 * Turns repeated `key=value` flags into an options map. Dotted keys nest
 * (`weights.health=0.5`); numbers and booleans are parsed, anything else stays
 * a string.
 */
export const parseOptionPairs = (pairs: readonly string[]): Readonly<Record<string, unknown>> => {
  const options: OptionMap = {};
  const issues: string[] = [];

  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    const key = separator === -1 ? "" : pair.slice(0, separator).trim();
    if (key.length === 0 || key.split(".").some((segment) => segment.length === 0)) {
      issues.push(`option "${pair}" is not of the form key=value`);
      continue;
    }

    const segments = key.split(".");
    const leaf = segments.pop();
    let target = options;
    let conflict = false;
    for (const segment of segments) {
      const existing = target[segment];
      if (existing === undefined) {
        const child: OptionMap = {};
        target[segment] = child;
        target = child;
      } else if (typeof existing === "object" && existing !== null) {
        target = existing;
      } else {
        conflict = true;
        break;
      }
    }

    if (conflict || leaf === undefined) {
      issues.push(`option "${key}" conflicts with an earlier option`);
      continue;
    }
    target[leaf] = parseValue(pair.slice(separator + 1).trim());
  }

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }

  return options;
};
