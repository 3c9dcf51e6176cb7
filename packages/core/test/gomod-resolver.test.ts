import { promises as fs } from "node:fs";
import * as path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { GomodPackageInput } from "@prefetch/types";

import { PartialFetchError, ResolutionError } from "../src/errors.js";
import { hashGoMod, hashModuleZip } from "../src/integrity/index.js";
import { escapeModulePath, parseGoMod, parseGoSum, parseVendorModules } from "../src/resolvers/gomod/modfile.js";
import { GomodResolver, moduleDownloadPath } from "../src/resolvers/gomod/resolver.js";
import { createWorkspace, writeFiles, writeZip, type TestWorkspace } from "./helpers.js";

const PROXY = "https://proxy.golang.org";

interface FakeModule {
  path: string;
  version: string;
  goMod: string;
  zip: Buffer;
  zipHash: string;
}

const GO_MOD = [
  "module example.test/app",
  "",
  "go 1.21",
  "",
  "require (",
  "\texample.test/Lib v1.2.0",
  "\texample.test/util v0.3.0 // indirect",
  ")",
  "",
].join("\n");

const EXTRA_GO_MOD = "module example.test/extra\n\ngo 1.20\n";

function gomodInput(): GomodPackageInput {
  return { type: "gomod", path: ".", force: false };
}

function moduleUrl(modulePath: string, version: string, extension: "mod" | "zip"): string {
  return `${PROXY}/${escapeModulePath(modulePath)}/@v/${version}.${extension}`;
}

describe("go.mod parsing", () => {
  it("reads require blocks with indirect markers and replacements", () => {
    const modFile = parseGoMod(
      [
        "module example.test/app",
        "go 1.22.1",
        "toolchain go1.22.3",
        "require example.test/one v1.0.0",
        "require (",
        "\texample.test/two v2.0.0 // indirect",
        ")",
        "replace example.test/one => ../one",
        "replace example.test/two v2.0.0 => example.test/fork v2.0.1",
        "exclude example.test/three v0.0.1",
      ].join("\n"),
    );

    expect(modFile.module).toBe("example.test/app");
    expect(modFile.goVersion).toBe("1.22.1");
    expect(modFile.toolchain).toBe("go1.22.3");
    expect(modFile.requires).toEqual([
      { path: "example.test/one", version: "v1.0.0", indirect: false },
      { path: "example.test/two", version: "v2.0.0", indirect: true },
    ]);
    expect(modFile.replaces).toEqual([
      { oldPath: "example.test/one", oldVersion: null, newPath: "../one", newVersion: null },
      { oldPath: "example.test/two", oldVersion: "v2.0.0", newPath: "example.test/fork", newVersion: "v2.0.1" },
    ]);
    expect(modFile.excludes).toEqual([{ path: "example.test/three", version: "v0.0.1" }]);
  });

  it("keeps only h1 lines of go.sum", () => {
    const sums = parseGoSum("example.test/one v1.0.0 h1:abc=\nexample.test/one v1.0.0/go.mod h1:def=\nexample.test/old v0.1.0 h2:zzz=\n");
    expect([...sums]).toEqual([
      ["example.test/one@v1.0.0", "h1:abc="],
      ["example.test/one@v1.0.0/go.mod", "h1:def="],
    ]);
  });

  it("reads explicit markers and replacements from vendor/modules.txt", () => {
    const modules = parseVendorModules(
      "# example.test/one v1.0.0\n## explicit; go 1.21\nexample.test/one\n# example.test/two v2.0.0 => example.test/fork v2.0.1\nexample.test/two\n",
    );
    expect(modules).toEqual([
      { path: "example.test/one", version: "v1.0.0", explicit: true, replacement: null },
      { path: "example.test/two", version: "v2.0.0", explicit: false, replacement: "example.test/fork v2.0.1" },
    ]);
  });

  it("escapes upper-case letters for the module proxy", () => {
    expect(escapeModulePath("github.com/Azure/SDK")).toBe("github.com/!azure/!s!d!k");
    expect(moduleDownloadPath("example.test/Lib", "v1.2.0", "zip")).toBe("cache/download/example.test/!lib/@v/v1.2.0.zip");
  });
});

describe("GomodResolver", () => {
  let workspace: TestWorkspace;
  let lib: FakeModule;
  let util: FakeModule;
  const resolver = new GomodResolver();

  async function fakeModule(modulePath: string, version: string): Promise<FakeModule> {
    const goMod = `module ${modulePath}\n\ngo 1.21\n`;
    const zipPath = path.join(workspace.outputDir, "..", "zips", `${escapeModulePath(modulePath).replace(/\//g, "_")}-${version}.zip`);
    const zip = await writeZip(zipPath, {
      [`${modulePath}@${version}/go.mod`]: goMod,
      [`${modulePath}@${version}/lib.go`]: `package ${modulePath.split("/").pop()?.toLowerCase() ?? "lib"}\n`,
    });
    return { path: modulePath, version, goMod, zip, zipHash: await hashModuleZip(zipPath) };
  }

  function goSum(modules: readonly FakeModule[]): string {
    const lines = modules.flatMap((module) => [
      `${module.path} ${module.version} ${module.zipHash}`,
      `${module.path} ${module.version}/go.mod ${hashGoMod(module.goMod)}`,
    ]);
    lines.push(`example.test/extra v0.1.0/go.mod ${hashGoMod(EXTRA_GO_MOD)}`);
    return `${lines.join("\n")}\n`;
  }

  function serve(module: FakeModule): void {
    workspace.registry.serve(moduleUrl(module.path, module.version, "mod"), module.goMod);
    workspace.registry.serve(moduleUrl(module.path, module.version, "zip"), module.zip);
  }

  beforeEach(async () => {
    workspace = await createWorkspace();
    lib = await fakeModule("example.test/Lib", "v1.2.0");
    util = await fakeModule("example.test/util", "v0.3.0");
    serve(lib);
    serve(util);
    workspace.registry.serve(moduleUrl("example.test/extra", "v0.1.0", "mod"), EXTRA_GO_MOD);
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it("lays out a module proxy verified against go.sum", async () => {
    await writeFiles(workspace.sourceDir, { "go.mod": GO_MOD, "go.sum": goSum([lib, util]) });
    const context = workspace.context();

    const graph = await resolver.resolve(workspace.sourceDir, gomodInput(), context);
    const report = await resolver.fetchAll(graph, context);

    expect(report.entries.map((entry) => [entry.purl, entry.role])).toEqual([
      ["pkg:golang/example.test/Lib@v1.2.0", "direct"],
      ["pkg:golang/example.test/util@v0.3.0", "transitive"],
      ["pkg:golang/example.test/extra@v0.1.0", "transitive"],
    ]);
    expect(report.entries[0]).toMatchObject({ integrity: hashGoMod(lib.goMod), integritySource: "declared" });
    expect(report.entries[2]?.properties).toEqual({ "gomod:graph-only": "true" });
    expect(workspace.registry.count(moduleUrl("example.test/extra", "v0.1.0", "zip"))).toBe(0);

    const download = path.join(workspace.outputDir, "deps", "gomod", "cache", "download", "example.test", "!lib", "@v");
    expect(await fs.readFile(path.join(download, "v1.2.0.info"), "utf8")).toBe('{"Version":"v1.2.0"}\n');
    expect(await fs.readFile(path.join(download, "list"), "utf8")).toBe("v1.2.0\n");
    expect(await fs.readFile(path.join(download, "v1.2.0.zip"))).toEqual(lib.zip);

    expect(report.environment).toEqual([
      { name: "GOTOOLCHAIN", value: "local", kind: "literal" },
      { name: "GOSUMDB", value: "off", kind: "literal" },
      { name: "GONOSUMDB", value: "*", kind: "literal" },
      { name: "GOPROXY", value: "file://${output_dir}/deps/gomod/cache/download", kind: "literal" },
      { name: "GOMODCACHE", value: "deps/gomod", kind: "path" },
      { name: "GOFLAGS", value: "-mod=mod", kind: "literal" },
    ]);
  });

  it("disables cgo when asked to", async () => {
    await writeFiles(workspace.sourceDir, { "go.mod": GO_MOD, "go.sum": goSum([lib, util]) });

    const graph = await resolver.resolve(workspace.sourceDir, gomodInput(), workspace.context({ flags: ["cgo-disable"] }));

    expect(graph.environment.find((entry) => entry.name === "CGO_ENABLED")?.value).toBe("0");
  });

  it("rejects a module zip whose tree hash differs from go.sum", async () => {
    await writeFiles(workspace.sourceDir, { "go.mod": GO_MOD, "go.sum": goSum([lib, util]) });
    workspace.registry.serve(moduleUrl(util.path, util.version, "zip"), lib.zip);
    const context = workspace.context();

    const graph = await resolver.resolve(workspace.sourceDir, gomodInput(), context);
    const failure = await resolver.fetchAll(graph, context).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(PartialFetchError);
    if (failure instanceof PartialFetchError) {
      expect(failure.report.failures.map((entry) => [entry.name, entry.code])).toEqual([["example.test/util", "INTEGRITY_MISMATCH"]]);
    }
    expect(await workspace.cache.lookup("gomod", `example.test/util@v0.3.0/${moduleDownloadPath(util.path, util.version, "zip")}`)).toEqual([]);
  });

  it("requires go.sum entries for every required module", async () => {
    await writeFiles(workspace.sourceDir, { "go.mod": GO_MOD, "go.sum": goSum([lib]) });

    await expect(resolver.resolve(workspace.sourceDir, gomodInput(), workspace.context())).rejects.toThrow(
      "go.sum has no entry for example.test/util@v0.3.0",
    );
  });

  it("refuses modules older than the pruned module graph", async () => {
    await writeFiles(workspace.sourceDir, { "go.mod": GO_MOD.replace("go 1.21", "go 1.16") });

    const resolving = resolver.resolve(workspace.sourceDir, gomodInput(), workspace.context());

    await expect(resolving).rejects.toBeInstanceOf(ResolutionError);
    await expect(resolving).rejects.toThrow("example.test/app declares go 1.16; go 1.17 or newer is required");
  });

  it("reports local replacements without downloading them", async () => {
    await writeFiles(workspace.sourceDir, {
      "go.mod": `${GO_MOD}replace example.test/Lib => ./third_party/lib\n`,
      "go.sum": goSum([util]),
    });

    const graph = await resolver.resolve(workspace.sourceDir, gomodInput(), workspace.context());

    expect(graph.get("example.test/Lib@v1.2.0")).toMatchObject({
      origin: { kind: "local", location: "./third_party/lib" },
      artifacts: [],
      properties: { "gomod:replaced-by": "./third_party/lib" },
    });
  });

  describe("vendored projects", () => {
    const modulesTxt = [
      "# example.test/Lib v1.2.0",
      "## explicit; go 1.21",
      "example.test/Lib",
      "# example.test/util v0.3.0",
      "## explicit",
      "example.test/util",
      "",
    ].join("\n");

    it("needs the vendor flag", async () => {
      await writeFiles(workspace.sourceDir, { "go.mod": GO_MOD, "vendor/modules.txt": modulesTxt });

      await expect(resolver.resolve(workspace.sourceDir, gomodInput(), workspace.context())).rejects.toThrow(
        "The project vendors its modules but the gomod-vendor flag is not set",
      );
    });

    it("reports vendored modules as local components", async () => {
      await writeFiles(workspace.sourceDir, { "go.mod": GO_MOD, "vendor/modules.txt": modulesTxt });
      const context = workspace.context({ flags: ["gomod-vendor-check"] });

      const graph = await resolver.resolve(workspace.sourceDir, gomodInput(), context);
      const report = await resolver.fetchAll(graph, context);

      expect(report.entries.map((entry) => [entry.name, entry.role, entry.origin.kind, entry.integrity])).toEqual([
        ["example.test/Lib", "direct", "local", null],
        ["example.test/util", "transitive", "local", null],
      ]);
      expect(graph.environment.find((entry) => entry.name === "GOFLAGS")?.value).toBe("-mod=vendor");
      expect(workspace.registry.requests).toEqual([]);
    });

    it("checks vendor/modules.txt against go.mod", async () => {
      await writeFiles(workspace.sourceDir, {
        "go.mod": GO_MOD,
        "vendor/modules.txt": "# example.test/Lib v1.1.0\n## explicit\nexample.test/Lib\n",
      });

      await expect(
        resolver.resolve(workspace.sourceDir, gomodInput(), workspace.context({ flags: ["gomod-vendor-check"] })),
      ).rejects.toThrow(
        "vendor/modules.txt is out of sync with go.mod (missing: example.test/Lib@v1.2.0, example.test/util@v0.3.0; unexpected: example.test/Lib@v1.1.0)",
      );
    });
  });
});
