import { describe, expect, it } from "vitest";

import { compareSemver, isSemverRange, satisfies } from "../src/semver/index.js";

describe("npm ranges", () => {
  it.each([
    ["1.2.3", "^1.0.0", true],
    ["2.0.0", "^1.0.0", false],
    ["0.2.5", "^0.2.1", true],
    ["0.3.0", "^0.2.1", false],
    ["0.0.3", "^0.0.3", true],
    ["0.0.4", "^0.0.3", false],
    ["1.2.9", "~1.2.3", true],
    ["1.3.0", "~1.2.3", false],
    ["1.4.0", "1.x", true],
    ["2.9.9", "1.2.3 - 2.x", true],
    ["3.0.0", "1.2.3 - 2.x", false],
    ["2.5.0", ">=1.0.0 <2.0.0 || >=2.4.0", true],
    ["1.0.0", "*", true],
    ["1.0.0-beta.1", "^1.0.0", false],
    ["1.0.0-beta.2", "^1.0.0-beta.1", true],
    ["1.0.1-beta.1", "^1.0.0-beta.1", false],
  ])("%s satisfies %s: %s", (version, range, expected) => {
    expect(satisfies(version, range)).toBe(expected);
  });

  it("tells ranges from tags, URLs and aliases", () => {
    expect(isSemverRange("^4.17.21")).toBe(true);
    expect(isSemverRange(">= 1.2")).toBe(true);
    expect(isSemverRange("latest")).toBe(false);
    expect(isSemverRange("github:owner/repo#abc")).toBe(false);
    expect(isSemverRange("npm:other@^1.0.0")).toBe(false);
  });

  it("orders prereleases before releases", () => {
    expect(compareSemver("1.0.0-rc.1", "1.0.0")).toBeLessThan(0);
    expect(compareSemver("1.0.0-alpha.10", "1.0.0-alpha.9")).toBeGreaterThan(0);
    expect(compareSemver("1.10.0", "1.9.0")).toBeGreaterThan(0);
  });
});
