import { compareParsed, parseSemver, type ParsedSemver } from "./semver.js";

type Operator = "<" | "<=" | ">" | ">=" | "=";

interface Comparator {
  operator: Operator;
  version: ParsedSemver;
}

/** A partially specified version such as `1`, `1.2`, `1.x` or `*`. */
interface PartialVersion {
  major: number | null;
  minor: number | null;
  patch: number | null;
  prerelease: string[];
}

const PARTIAL_PATTERN =
  /^v?(\d+|[xX*])(?:\.(\d+|[xX*]))?(?:\.(\d+|[xX*]))?(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z-.]+)?$/;

const NON_RANGE_PREFIXES = ["file:", "link:", "git+", "git:", "github:", "gitlab:", "bitbucket:", "http:", "https:", "npm:", "workspace:", "portal:", "patch:"];

/**
 * Whether `spec` is an npm version range rather than a tag, alias, path or URL.
 */
export function isSemverRange(spec: string): boolean {
  const trimmed = spec.trim();
  if (NON_RANGE_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) {
    return false;
  }
  return parseRange(trimmed) !== null;
}

/**
 * npm range satisfaction: `^ ~ x * - || < <= > >= =`, with the prerelease rule that a
 * prerelease version only matches comparators on the same `major.minor.patch` that carry a prerelease.
 */
export function satisfies(version: string, range: string): boolean {
  const parsed = parseSemver(version);
  const sets = parseRange(range.trim());
  if (parsed === null || sets === null) {
    return false;
  }
  return sets.some((set) => testSet(set, parsed));
}

function testSet(set: readonly Comparator[], version: ParsedSemver): boolean {
  for (const comparator of set) {
    if (!testComparator(comparator, version)) {
      return false;
    }
  }

  if (version.prerelease.length === 0) {
    return true;
  }

  return set.some(
    (comparator) =>
      comparator.version.prerelease.length > 0 &&
      comparator.version.major === version.major &&
      comparator.version.minor === version.minor &&
      comparator.version.patch === version.patch,
  );
}

function testComparator(comparator: Comparator, version: ParsedSemver): boolean {
  const compared = compareParsed(version, comparator.version);
  switch (comparator.operator) {
    case "<":
      return compared < 0;
    case "<=":
      return compared <= 0;
    case ">":
      return compared > 0;
    case ">=":
      return compared >= 0;
    case "=":
      return compared === 0;
  }
}

function parseRange(range: string): Comparator[][] | null {
  const sets: Comparator[][] = [];
  for (const part of range.split("||")) {
    const set = parseComparatorSet(part.trim());
    if (set === null) {
      return null;
    }
    sets.push(set);
  }
  return sets;
}

function parseComparatorSet(text: string): Comparator[] | null {
  if (text.length === 0 || text === "*" || text === "x" || text === "X") {
    return [comparator(">=", 0, 0, 0)];
  }

  const hyphen = /^(\S+)\s+-\s+(\S+)$/.exec(text);
  if (hyphen !== null) {
    const from = parsePartial(hyphen[1] ?? "");
    const to = parsePartial(hyphen[2] ?? "");
    if (from === null || to === null) {
      return null;
    }
    return [...lowerBound(">=", from), ...upperBound("<=", to)];
  }

  // "> 1.2" and ">=1.2" are both valid
  const tokens = text.replace(/(<=|>=|<|>|=|\^|~>?)\s+/g, "$1").split(/\s+/);
  const result: Comparator[] = [];
  for (const token of tokens) {
    const desugared = desugar(token);
    if (desugared === null) {
      return null;
    }
    result.push(...desugared);
  }
  return result;
}

function desugar(token: string): Comparator[] | null {
  const match = /^(<=|>=|<|>|=|\^|~>?)?(.*)$/.exec(token);
  if (match === null) {
    return null;
  }
  const operator = match[1] ?? "";
  const partial = parsePartial(match[2] ?? "");
  if (partial === null) {
    return null;
  }

  switch (operator) {
    case "^":
      return caret(partial);
    case "~":
    case "~>":
      return tilde(partial);
    case "":
    case "=":
      return xRange(partial);
    case ">":
    case ">=":
      return lowerBound(operator, partial);
    case "<":
    case "<=":
      return upperBound(operator, partial);
    default:
      return null;
  }
}

function parsePartial(text: string): PartialVersion | null {
  const match = PARTIAL_PATTERN.exec(text.startsWith("=") ? text.slice(1) : text);
  if (match === null) {
    return null;
  }
  const component = (value: string | undefined): number | null =>
    value === undefined || value === "x" || value === "X" || value === "*" ? null : Number(value);

  const major = component(match[1]);
  const minor = major === null ? null : component(match[2]);
  const patch = minor === null ? null : component(match[3]);
  const prerelease = patch !== null && match[4] !== undefined ? match[4].split(".") : [];
  return { major, minor, patch, prerelease };
}

function comparator(operator: Operator, major: number, minor: number, patch: number, prerelease: string[] = []): Comparator {
  return { operator, version: { major, minor, patch, prerelease } };
}

function exclusiveUpper(major: number, minor: number, patch: number): Comparator {
  return comparator("<", major, minor, patch, ["0"]);
}

function xRange(partial: PartialVersion): Comparator[] {
  if (partial.major === null) {
    return [comparator(">=", 0, 0, 0)];
  }
  if (partial.minor === null) {
    return [comparator(">=", partial.major, 0, 0), exclusiveUpper(partial.major + 1, 0, 0)];
  }
  if (partial.patch === null) {
    return [comparator(">=", partial.major, partial.minor, 0), exclusiveUpper(partial.major, partial.minor + 1, 0)];
  }
  return [comparator("=", partial.major, partial.minor, partial.patch, partial.prerelease)];
}

function tilde(partial: PartialVersion): Comparator[] {
  if (partial.major === null) {
    return [comparator(">=", 0, 0, 0)];
  }
  if (partial.minor === null) {
    return [comparator(">=", partial.major, 0, 0), exclusiveUpper(partial.major + 1, 0, 0)];
  }
  return [
    comparator(">=", partial.major, partial.minor, partial.patch ?? 0, partial.prerelease),
    exclusiveUpper(partial.major, partial.minor + 1, 0),
  ];
}

function caret(partial: PartialVersion): Comparator[] {
  const { major, minor, patch, prerelease } = partial;
  if (major === null) {
    return [comparator(">=", 0, 0, 0)];
  }
  if (minor === null) {
    return [comparator(">=", major, 0, 0), exclusiveUpper(major + 1, 0, 0)];
  }
  if (patch === null) {
    if (major === 0) {
      return [comparator(">=", 0, minor, 0), exclusiveUpper(0, minor + 1, 0)];
    }
    return [comparator(">=", major, minor, 0), exclusiveUpper(major + 1, 0, 0)];
  }

  const lower = comparator(">=", major, minor, patch, prerelease);
  if (major > 0) {
    return [lower, exclusiveUpper(major + 1, 0, 0)];
  }
  if (minor > 0) {
    return [lower, exclusiveUpper(0, minor + 1, 0)];
  }
  return [lower, exclusiveUpper(0, 0, patch + 1)];
}

function lowerBound(operator: ">" | ">=", partial: PartialVersion): Comparator[] {
  const { major, minor, patch, prerelease } = partial;
  if (major === null) {
    return operator === ">" ? [comparator("<", 0, 0, 0, ["0"])] : [comparator(">=", 0, 0, 0)];
  }
  if (minor === null) {
    return operator === ">" ? [comparator(">=", major + 1, 0, 0)] : [comparator(">=", major, 0, 0)];
  }
  if (patch === null) {
    return operator === ">" ? [comparator(">=", major, minor + 1, 0)] : [comparator(">=", major, minor, 0)];
  }
  return [comparator(operator, major, minor, patch, prerelease)];
}

function upperBound(operator: "<" | "<=", partial: PartialVersion): Comparator[] {
  const { major, minor, patch, prerelease } = partial;
  if (major === null) {
    return operator === "<" ? [comparator("<", 0, 0, 0, ["0"])] : [comparator(">=", 0, 0, 0)];
  }
  if (minor === null) {
    return operator === "<" ? [exclusiveUpper(major, 0, 0)] : [exclusiveUpper(major + 1, 0, 0)];
  }
  if (patch === null) {
    return operator === "<" ? [exclusiveUpper(major, minor, 0)] : [exclusiveUpper(major, minor + 1, 0)];
  }
  return [comparator(operator, major, minor, patch, prerelease)];
}
