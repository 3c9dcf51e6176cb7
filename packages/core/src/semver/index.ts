export { compareSemver, parseSemver, type ParsedSemver } from "./semver.js";
export { isSemverRange, satisfies } from "./range.js";
