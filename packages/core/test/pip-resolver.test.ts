import { promises as fs } from "node:fs";
import * as path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { PipPackageInput } from "@prefetch/types";

import { PartialFetchError, ResolutionError } from "../src/errors.js";
import { createLogger, createMemorySink } from "../src/logging/logger.js";
import { indexBase, parseReleaseMetadata, pickSdist } from "../src/resolvers/pip/metadata.js";
import { PipResolver } from "../src/resolvers/pip/resolver.js";
import { createWorkspace, makeTarball, sha256Hex, writeFiles, type TestWorkspace } from "./helpers.js";

const COMMIT = "89abcdef0123456789abcdef0123456789abcdef";

interface Release {
  name: string;
  version: string;
  sdist: string;
  wheel?: string;
}

const REQUESTS: Release = { name: "requests", version: "2.31.0", sdist: "requests sdist", wheel: "requests wheel" };
const CERTIFI: Release = { name: "certifi", version: "2024.2.2", sdist: "certifi sdist" };
const SETUPTOOLS: Release = { name: "setuptools", version: "69.0.0", sdist: "setuptools sdist" };

function sdistName(release: Release): string {
  return `${release.name}-${release.version}.tar.gz`;
}

function wheelName(release: Release): string {
  return `${release.name}-${release.version}-py3-none-any.whl`;
}

function fileUrl(fileName: string): string {
  return `https://files.pypi.test/packages/${fileName}`;
}

function metadataDocument(release: Release): string {
  const urls = [
    {
      filename: sdistName(release),
      url: fileUrl(sdistName(release)),
      packagetype: "sdist",
      digests: { sha256: sha256Hex(release.sdist) },
    },
  ];
  if (release.wheel !== undefined) {
    urls.push({
      filename: wheelName(release),
      url: fileUrl(wheelName(release)),
      packagetype: "bdist_wheel",
      digests: { sha256: sha256Hex(release.wheel) },
    });
  }
  return JSON.stringify({ info: { name: release.name }, urls });
}

function pipInput(overrides: Partial<PipPackageInput> = {}): PipPackageInput {
  return {
    type: "pip",
    path: ".",
    force: false,
    requirementsFiles: null,
    requirementsBuildFiles: null,
    allowBinary: false,
    environment: null,
    ...overrides,
  };
}

const COMPILED = [
  "#",
  "# This file is autogenerated by pip-compile with Python 3.12",
  "#",
  `certifi==${CERTIFI.version} \\`,
  `    --hash=sha256:${sha256Hex(CERTIFI.sdist)}`,
  "    # via requests",
  `requests==${REQUESTS.version} \\`,
  `    --hash=sha256:${sha256Hex(REQUESTS.sdist)} \\`,
  `    --hash=sha256:${sha256Hex(REQUESTS.wheel ?? "")}`,
  "    # via -r requirements.in",
  "",
].join("\n");

describe("pip index metadata", () => {
  it("normalizes index URLs", () => {
    expect(indexBase("https://pypi.test/simple/")).toBe("https://pypi.test");
    expect(indexBase("https://pypi.test")).toBe("https://pypi.test");
  });

  it("prefers tar.gz source distributions", () => {
    const files = parseReleaseMetadata(
      {
        urls: [
          { filename: "pkg-1.0.zip", url: "https://files.test/pkg-1.0.zip", packagetype: "sdist", digests: { sha256: "aa" } },
          { filename: "pkg-1.0-py3-none-any.whl", url: "https://files.test/pkg-1.0-py3-none-any.whl", digests: {} },
          { filename: "pkg-1.0.tar.gz", url: "https://files.test/pkg-1.0.tar.gz", packagetype: "sdist", digests: { sha256: "bb" } },
        ],
      },
      "pkg==1.0",
    );

    expect(files.map((file) => [file.filename, file.kind, file.sha256])).toEqual([
      ["pkg-1.0.zip", "sdist", "aa"],
      ["pkg-1.0-py3-none-any.whl", "wheel", null],
      ["pkg-1.0.tar.gz", "sdist", "bb"],
    ]);
    expect(pickSdist(files)?.filename).toBe("pkg-1.0.tar.gz");
  });

  it("rejects documents without a urls list", () => {
    expect(() => parseReleaseMetadata({ info: {} }, "pkg==1.0")).toThrow('Index metadata for pkg==1.0 has no "urls" list');
  });
});

describe("PipResolver", () => {
  let workspace: TestWorkspace;
  const resolver = new PipResolver();

  beforeEach(async () => {
    workspace = await createWorkspace();
    for (const release of [REQUESTS, CERTIFI, SETUPTOOLS]) {
      workspace.registry.serve(`https://pypi.org/pypi/${release.name}/${release.version}/json`, metadataDocument(release));
      workspace.registry.serve(fileUrl(sdistName(release)), release.sdist);
      if (release.wheel !== undefined) {
        workspace.registry.serve(fileUrl(wheelName(release)), release.wheel);
      }
    }
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it("fetches hashed source distributions in dependency order", async () => {
    await writeFiles(workspace.sourceDir, { "requirements.txt": COMPILED });
    const context = workspace.context();

    const graph = await resolver.resolve(workspace.sourceDir, pipInput(), context);
    const report = await resolver.fetchAll(graph, context);

    expect(report.entries.map((entry) => [entry.purl, entry.role])).toEqual([
      ["pkg:pypi/requests@2.31.0", "direct"],
      ["pkg:pypi/certifi@2024.2.2", "transitive"],
    ]);
    expect(report.entries[0]).toMatchObject({
      integrity: `sha256:${sha256Hex(REQUESTS.sdist)}`,
      integritySource: "declared",
      origin: { kind: "registry", location: "https://pypi.org" },
    });
    expect(report.environment).toEqual([
      { name: "PIP_FIND_LINKS", value: "deps/pip", kind: "path" },
      { name: "PIP_NO_INDEX", value: "true", kind: "literal" },
    ]);
    expect(workspace.registry.count(fileUrl(wheelName(REQUESTS)))).toBe(0);
    const metadataRequest = workspace.registry.requests.find((request) => request.url.endsWith("/requests/2.31.0/json"));
    expect(metadataRequest?.headers["accept"]).toBe("application/json");
    expect(await fs.readFile(path.join(workspace.outputDir, "deps", "pip", sdistName(CERTIFI)), "utf8")).toBe(CERTIFI.sdist);
  });

  it("adds wheels matching the declared hashes when binaries are allowed", async () => {
    await writeFiles(workspace.sourceDir, { "requirements.txt": COMPILED });
    const context = workspace.context();

    const graph = await resolver.resolve(workspace.sourceDir, pipInput({ allowBinary: true }), context);

    expect(graph.get("requests==2.31.0")?.artifacts.map((artifact) => artifact.fileName)).toEqual([
      sdistName(REQUESTS),
      wheelName(REQUESTS),
    ]);
    const report = await resolver.fetchAll(graph, context);
    expect(report.entries[0]?.integrity).toBe(`sha256:${sha256Hex(REQUESTS.sdist)}`);
    expect(workspace.registry.count(fileUrl(wheelName(REQUESTS)))).toBe(1);
  });

  it("refuses a distribution whose index digest is not among the declared hashes", async () => {
    await writeFiles(workspace.sourceDir, {
      "requirements.txt": `requests==2.31.0 --hash=sha256:${sha256Hex("something else")}\n`,
    });

    await expect(resolver.resolve(workspace.sourceDir, pipInput(), workspace.context())).rejects.toThrow(
      `requests-2.31.0.tar.gz (sha256:${sha256Hex(REQUESTS.sdist)}) is not among the --hash values of requests==2.31.0`,
    );
  });

  it("requires every requirement to be pinned", async () => {
    await writeFiles(workspace.sourceDir, { "requirements.txt": "requests>=2.0\n" });

    const resolving = resolver.resolve(workspace.sourceDir, pipInput(), workspace.context());

    await expect(resolving).rejects.toBeInstanceOf(ResolutionError);
    await expect(resolving).rejects.toThrow("requests>=2.0 is not pinned with ==");
  });

  it("skips requirements whose markers exclude the target environment", async () => {
    await writeFiles(workspace.sourceDir, {
      "requirements.txt": 'requests==2.31.0\npywin32==306 ; sys_platform == "win32"\n',
    });

    const graph = await resolver.resolve(
      workspace.sourceDir,
      pipInput({ environment: { sys_platform: "linux" } }),
      workspace.context(),
    );

    expect(graph.traverse().map((node) => node.name)).toEqual(["requests"]);
  });

  it("marks build requirements", async () => {
    await writeFiles(workspace.sourceDir, {
      "requirements.txt": "requests==2.31.0\n",
      "requirements-build.txt": "setuptools==69.0.0\n",
    });

    const graph = await resolver.resolve(workspace.sourceDir, pipInput(), workspace.context());

    expect(graph.get("setuptools==69.0.0")?.properties).toEqual({ "pip:build-dependency": "true" });
    expect(graph.get("requests==2.31.0")?.properties).toEqual({});
  });

  it("fetches commit-pinned git requirements and rewrites their lines", async () => {
    const archiveUrl = `https://github.com/acme/mylib/archive/${COMMIT}.tar.gz`;
    await writeFiles(workspace.sourceDir, {
      "requirements.txt": `requests==2.31.0\nmylib @ git+https://github.com/acme/mylib@${COMMIT}\n`,
    });
    workspace.registry.serve(archiveUrl, "mylib archive");
    const context = workspace.context();

    const graph = await resolver.resolve(workspace.sourceDir, pipInput(), context);
    const report = await resolver.fetchAll(graph, context);

    expect(report.entries[1]).toMatchObject({
      name: "mylib",
      version: "",
      integritySource: "trust-on-first-use",
      origin: { kind: "vcs", location: `git+https://github.com/acme/mylib.git@${COMMIT}` },
    });
    expect(report.projectFiles).toEqual([
      {
        path: path.join(workspace.sourceDir, "requirements.txt"),
        template: `requests==2.31.0\nmylib @ file://\${output_dir}/deps/pip/mylib-gitcommit-${COMMIT}.tar.gz\n`,
      },
    ]);
  });

  it("keeps direct URLs with the same basename apart", async () => {
    const alphaUrl = "https://github.com/acme/alpha/archive/v1.0.tar.gz";
    const betaUrl = "https://github.com/acme/beta/archive/v1.0.tar.gz";
    workspace.registry.serve(alphaUrl, "alpha archive");
    workspace.registry.serve(betaUrl, "beta archive");
    await writeFiles(workspace.sourceDir, {
      "requirements.txt": [
        `alpha @ ${alphaUrl} --hash=sha256:${sha256Hex("alpha archive")}`,
        `beta @ ${betaUrl} --hash=sha256:${sha256Hex("not the beta archive")}`,
        "",
      ].join("\n"),
    });
    const context = workspace.context();

    const graph = await resolver.resolve(workspace.sourceDir, pipInput(), context);
    const failure = await resolver.fetchAll(graph, context).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(PartialFetchError);
    if (failure instanceof PartialFetchError) {
      expect(failure.report.entries.map((entry) => [entry.name, entry.integrity])).toEqual([
        ["alpha", `sha256:${sha256Hex("alpha archive")}`],
      ]);
      expect(failure.report.failures.map((entry) => [entry.name, entry.code])).toEqual([["beta", "INTEGRITY_MISMATCH"]]);
    }
    expect(workspace.registry.count(alphaUrl)).toBe(1);
    expect(workspace.registry.count(betaUrl)).toBe(1);
    expect(await fs.readFile(path.join(workspace.outputDir, "deps", "pip", "alpha-v1.0.tar.gz"), "utf8")).toBe("alpha archive");
    expect(graph.projectFiles[0]?.template.split("\n").slice(0, 2)).toEqual([
      "alpha @ file://${output_dir}/deps/pip/alpha-v1.0.tar.gz \\",
      `    --hash=sha256:${sha256Hex("alpha archive")}`,
    ]);
  });

  it("archives git requirements from other hosts with git", async () => {
    const tarball = await makeTarball(`mylib-${COMMIT}`, { "setup.py": "" });
    workspace.git.add("https://git.example.test/acme/mylib.git", COMMIT, tarball);
    await writeFiles(workspace.sourceDir, {
      "requirements.txt": `mylib @ git+https://git.example.test/acme/mylib.git@${COMMIT}\n`,
    });
    const context = workspace.context();

    const graph = await resolver.resolve(workspace.sourceDir, pipInput(), context);
    const report = await resolver.fetchAll(graph, context);

    expect(report.entries[0]).toMatchObject({
      name: "mylib",
      integrity: `sha256:${sha256Hex(tarball)}`,
      integritySource: "trust-on-first-use",
      origin: { kind: "vcs", location: `git+https://git.example.test/acme/mylib.git@${COMMIT}` },
    });
    expect(workspace.registry.requests).toEqual([]);
    expect(await fs.readFile(path.join(workspace.outputDir, "deps", "pip", `mylib-gitcommit-${COMMIT}.tar.gz`))).toEqual(tarball);
  });

  it("warns about yanked files and marks their components", async () => {
    workspace.registry.serve(
      "https://pypi.org/pypi/oldlib/1.0/json",
      JSON.stringify({
        info: { name: "oldlib" },
        urls: [
          {
            filename: "oldlib-1.0.tar.gz",
            url: fileUrl("oldlib-1.0.tar.gz"),
            packagetype: "sdist",
            digests: { sha256: sha256Hex("oldlib sdist") },
            yanked: true,
          },
        ],
      }),
    );
    await writeFiles(workspace.sourceDir, { "requirements.txt": "oldlib==1.0\n" });
    const sink = createMemorySink();

    const graph = await resolver.resolve(workspace.sourceDir, pipInput(), workspace.context({ logger: createLogger({ noColor: true, sink }) }));

    expect(graph.get("oldlib==1.0")?.properties).toEqual({ "pip:yanked": "true" });
    expect(sink.lines).toContainEqual({ stream: "stderr", line: "warning: oldlib-1.0.tar.gz has been yanked from https://pypi.org" });
  });

  it("fails without requirements files", async () => {
    await writeFiles(workspace.sourceDir, { "pyproject.toml": "[project]\nname = \"app\"\n" });

    expect(await resolver.applies(workspace.sourceDir)).toBe(true);
    await expect(resolver.resolve(workspace.sourceDir, pipInput(), workspace.context())).rejects.toThrow(
      `No requirements files in ${workspace.sourceDir}`,
    );
  });
});
