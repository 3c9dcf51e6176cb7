import { createHash } from "node:crypto";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { YarnPackageInput } from "@prefetch/types";

import { ResolutionError } from "../src/errors.js";
import { parseYarnLock, splitSpecifier } from "../src/resolvers/yarn/lockfile.js";
import { mirrorFileName, YarnResolver } from "../src/resolvers/yarn/resolver.js";
import { createWorkspace, sha1Hex, sha512Sri, writeFiles, type TestWorkspace } from "./helpers.js";

const LEFT_URL = "https://registry.yarnpkg.com/left/-/left-1.0.0.tgz";
const SHARED_URL = "https://registry.yarnpkg.com/shared/-/shared-2.1.0.tgz";
const TOOL_URL = "https://registry.yarnpkg.com/@types/tool/-/tool-3.0.0.tgz";

const BODIES = {
  [LEFT_URL]: "left tarball",
  [SHARED_URL]: "shared tarball",
  [TOOL_URL]: "tool tarball",
};

function body(url: keyof typeof BODIES): string {
  return BODIES[url];
}

const YARN_LOCK = [
  "# THIS IS AN AUTOGENERATED FILE. DO NOT EDIT THIS FILE DIRECTLY.",
  "# yarn lockfile v1",
  "",
  "",
  '"@types/tool@^3.0.0":',
  '  version "3.0.0"',
  `  resolved "${TOOL_URL}#${sha1Hex(body(TOOL_URL))}"`,
  `  integrity ${sha512Sri(body(TOOL_URL))}`,
  "  dependencies:",
  '    shared "^2.1.0"',
  "",
  "left@^1.0.0:",
  '  version "1.0.0"',
  `  resolved "${LEFT_URL}#${sha1Hex(body(LEFT_URL))}"`,
  `  integrity ${sha512Sri(body(LEFT_URL))}`,
  "  dependencies:",
  '    shared "^2.0.0"',
  "",
  "shared@^2.0.0, shared@^2.1.0:",
  '  version "2.1.0"',
  `  resolved "${SHARED_URL}#${sha1Hex(body(SHARED_URL))}"`,
  "",
].join("\n");

const MANIFEST = JSON.stringify({
  name: "app",
  dependencies: { left: "^1.0.0" },
  devDependencies: { "@types/tool": "^3.0.0" },
});

function yarnInput(overrides: Partial<YarnPackageInput> = {}): YarnPackageInput {
  return { type: "yarn", path: ".", force: false, includeDev: true, ...overrides };
}

describe("parseYarnLock", () => {
  it("indexes every specifier of an entry", () => {
    const lock = parseYarnLock(YARN_LOCK);

    expect(lock.entries.map((entry) => `${entry.name}@${entry.version}`)).toEqual([
      "@types/tool@3.0.0",
      "left@1.0.0",
      "shared@2.1.0",
    ]);
    expect(lock.bySpecifier.get("shared@^2.0.0")).toBe(lock.bySpecifier.get("shared@^2.1.0"));
    expect([...(lock.bySpecifier.get("left@^1.0.0")?.dependencies ?? [])]).toEqual([["shared", "^2.0.0"]]);
  });

  it("refuses Yarn 2 lockfiles", () => {
    expect(() => parseYarnLock('__metadata:\n  version: 6\n\n"left@npm:^1.0.0":\n  version: 1.0.0\n')).toThrow(
      "yarn.lock was written by Yarn 2 or later",
    );
  });

  it("splits scoped specifiers", () => {
    expect(splitSpecifier("@types/tool@^3.0.0")).toEqual({ name: "@types/tool", range: "^3.0.0" });
    expect(splitSpecifier("left@^1.0.0")).toEqual({ name: "left", range: "^1.0.0" });
  });
});

describe("mirrorFileName", () => {
  it("prefixes scoped tarballs with their scope", () => {
    expect(mirrorFileName("@types/tool", TOOL_URL)).toBe("@types-tool-3.0.0.tgz");
    expect(mirrorFileName("left", LEFT_URL)).toBe("left-1.0.0.tgz");
  });
});

describe("YarnResolver", () => {
  let workspace: TestWorkspace;
  const resolver = new YarnResolver();

  beforeEach(async () => {
    workspace = await createWorkspace();
    for (const [url, content] of Object.entries(BODIES)) {
      workspace.registry.serve(url, content);
    }
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it("scopes components reachable only from devDependencies as dev", async () => {
    await writeFiles(workspace.sourceDir, { "yarn.lock": YARN_LOCK, "package.json": MANIFEST });
    const context = workspace.context();

    const graph = await resolver.resolve(workspace.sourceDir, yarnInput(), context);
    const report = await resolver.fetchAll(graph, context);

    expect(report.entries.map((entry) => [entry.name, entry.role, entry.scope])).toEqual([
      ["left", "direct", "runtime"],
      ["shared", "transitive", "runtime"],
      ["@types/tool", "direct", "dev"],
    ]);
    expect(report.entries[1]?.integrity).toBe(`sha1:${sha1Hex(body(SHARED_URL))}`);
    expect(report.entries[2]?.purl).toBe("pkg:npm/%40types/tool@3.0.0");
    expect(report.projectFiles).toEqual([]);
    expect(report.environment).toEqual([
      { name: "YARN_YARN_OFFLINE_MIRROR", value: "deps/yarn", kind: "path" },
      { name: "YARN_YARN_OFFLINE_MIRROR_PRUNING", value: "false", kind: "literal" },
    ]);
  });

  it("skips dev-only components when dev dependencies are excluded", async () => {
    await writeFiles(workspace.sourceDir, { "yarn.lock": YARN_LOCK, "package.json": MANIFEST });
    const context = workspace.context();

    const graph = await resolver.resolve(workspace.sourceDir, yarnInput({ includeDev: false }), context);

    expect(graph.traverse().map((node) => node.name)).toEqual(["left", "shared"]);
  });

  it("fails when package.json asks for a range yarn.lock does not have", async () => {
    await writeFiles(workspace.sourceDir, {
      "yarn.lock": YARN_LOCK,
      "package.json": JSON.stringify({ dependencies: { left: "^1.0.0", right: "^4.0.0" } }),
    });

    const resolving = resolver.resolve(workspace.sourceDir, yarnInput(), workspace.context());

    await expect(resolving).rejects.toBeInstanceOf(ResolutionError);
    await expect(resolving).rejects.toThrow("yarn.lock has no entry for right@^4.0.0");
  });

  it("points non-registry tarballs at the offline mirror", async () => {
    const url = "https://files.example.test/direct.tgz";
    const content = "direct tarball";
    const lock = [
      "# yarn lockfile v1",
      "",
      `"direct@${url}":`,
      '  version "0.1.0"',
      `  resolved "${url}#${sha1Hex(content)}"`,
      "",
    ].join("\n");
    await writeFiles(workspace.sourceDir, {
      "yarn.lock": lock,
      "package.json": JSON.stringify({ dependencies: { direct: url } }),
    });
    workspace.registry.serve(url, content);
    const context = workspace.context();

    const graph = await resolver.resolve(workspace.sourceDir, yarnInput(), context);
    const report = await resolver.fetchAll(graph, context);

    const fileName = `direct-${createHash("sha256").update(url).digest("hex").slice(0, 16)}.tgz`;
    expect(report.entries[0]).toMatchObject({
      name: "direct",
      origin: { kind: "url", location: url },
      purl: "pkg:npm/direct@0.1.0?download_url=https://files.example.test/direct.tgz",
    });
    expect(report.projectFiles[0]?.template.split("\n")[4]).toBe(
      `  resolved "file:\${output_dir}/deps/yarn/${fileName}"`,
    );
  });
});
