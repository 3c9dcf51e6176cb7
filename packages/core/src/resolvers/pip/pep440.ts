/**
 * PEP 440 versions, enough to order them and to evaluate marker comparisons.
 */
export interface Pep440Version {
  epoch: number;
  release: number[];
  /** `["a" | "b" | "rc", n]` */
  pre: [string, number] | null;
  post: number | null;
  dev: number | null;
  local: string | null;
}

const VERSION_PATTERN =
  /^v?(?:(\d+)!)?(\d+(?:\.\d+)*)(?:[-_.]?(a|b|c|rc|alpha|beta|pre|preview)[-_.]?(\d+)?)?(?:-(\d+)|[-_.]?(post|rev|r)[-_.]?(\d+)?)?(?:[-_.]?(dev)[-_.]?(\d+)?)?(?:\+([a-z0-9]+(?:[-_.][a-z0-9]+)*))?$/i;

const PRE_ALIASES: Record<string, string> = { alpha: "a", beta: "b", c: "rc", pre: "rc", preview: "rc" };

export function parsePep440(value: string): Pep440Version | null {
  const match = VERSION_PATTERN.exec(value.trim());
  if (match === null) {
    return null;
  }
  const [, epoch, release, preLabel, preNumber, postImplicit, postLabel, postNumber, devLabel, devNumber, local] = match;
  const label = preLabel?.toLowerCase();

  return {
    epoch: epoch === undefined ? 0 : Number(epoch),
    release: (release ?? "0").split(".").map(Number),
    pre: label === undefined ? null : [PRE_ALIASES[label] ?? label, preNumber === undefined ? 0 : Number(preNumber)],
    post: postImplicit !== undefined ? Number(postImplicit) : postLabel !== undefined ? Number(postNumber ?? 0) : null,
    dev: devLabel !== undefined ? Number(devNumber ?? 0) : null,
    local: local === undefined ? null : local.toLowerCase(),
  };
}

function compareRelease(left: readonly number[], right: readonly number[]): number {
  const length = Math.max(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const difference = (left[index] ?? 0) - (right[index] ?? 0);
    if (difference !== 0) {
      return Math.sign(difference);
    }
  }
  return 0;
}

const PRE_ORDER: Record<string, number> = { a: 0, b: 1, rc: 2 };

/** Sort key of the pre/post/dev part: dev-only releases sort before pre-releases. */
function phaseKey(version: Pep440Version): number[] {
  const pre =
    version.pre !== null
      ? [PRE_ORDER[version.pre[0]] ?? 0, version.pre[1]]
      : version.post === null && version.dev !== null
        ? [-1, 0]
        : [3, 0];
  const post = version.post === null ? [-1] : [version.post];
  const dev = version.dev === null ? [Number.POSITIVE_INFINITY] : [version.dev];
  return [...pre, ...post, ...dev];
}

export function comparePep440(left: Pep440Version, right: Pep440Version): number {
  if (left.epoch !== right.epoch) {
    return Math.sign(left.epoch - right.epoch);
  }
  const release = compareRelease(left.release, right.release);
  if (release !== 0) {
    return release;
  }
  const leftKey = phaseKey(left);
  const rightKey = phaseKey(right);
  for (let index = 0; index < leftKey.length; index += 1) {
    const a = leftKey[index] ?? 0;
    const b = rightKey[index] ?? 0;
    if (a !== b) {
      return a < b ? -1 : 1;
    }
  }
  if (left.local === right.local) {
    return 0;
  }
  if (left.local === null) {
    return -1;
  }
  if (right.local === null) {
    return 1;
  }
  return left.local < right.local ? -1 : 1;
}

/**
 * Evaluates `<version> <op> <spec>` for the PEP 440 operators. Null when either side does not parse.
 */
export function compareWithOperator(version: string, operator: string, spec: string): boolean | null {
  if (operator === "===") {
    return version === spec;
  }

  const wildcard = spec.endsWith(".*");
  const left = parsePep440(version);
  const right = parsePep440(wildcard ? spec.slice(0, -2) : spec);
  if (left === null || right === null) {
    return null;
  }

  if (wildcard && (operator === "==" || operator === "!=")) {
    const prefix = right.release;
    const matches = prefix.every((segment, index) => (left.release[index] ?? 0) === segment) && left.epoch === right.epoch;
    return operator === "==" ? matches : !matches;
  }

  const order = comparePep440(left, right);
  switch (operator) {
    case "==":
      return order === 0;
    case "!=":
      return order !== 0;
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
    case "~=": {
      if (right.release.length < 2) {
        return null;
      }
      if (order < 0) {
        return false;
      }
      const prefix = right.release.slice(0, -1);
      return prefix.every((segment, index) => (left.release[index] ?? 0) === segment);
    }
    default:
      return null;
  }
}
