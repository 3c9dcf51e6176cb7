import { promises as fs } from "node:fs";
import * as path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { GenericPackageInput } from "@prefetch/types";

import { PartialFetchError, ResolutionError } from "../src/errors.js";
import { GenericResolver, parseArtifactsLock } from "../src/resolvers/generic/resolver.js";
import { createWorkspace, sha256Hex, writeFiles, type TestWorkspace } from "./helpers.js";

const TOOL_URL = "https://files.example.test/tools/tool.bin";
const ARCHIVE_URL = "https://files.example.test/downloads/release.tar.gz?token=abc";

function genericInput(overrides: Partial<GenericPackageInput> = {}): GenericPackageInput {
  return { type: "generic", path: ".", force: false, lockfile: "artifacts.lock.yaml", ...overrides };
}

function artifactsLock(toolChecksum: string): string {
  return [
    "metadata:",
    "  version: \"1.0\"",
    "artifacts:",
    `  - download_url: ${TOOL_URL}`,
    `    checksum: ${toolChecksum}`,
    `  - download_url: "${ARCHIVE_URL}"`,
    `    checksum: sha256:${sha256Hex("release archive")}`,
    "    filename: release-1.0.tar.gz",
    "",
  ].join("\n");
}

describe("parseArtifactsLock", () => {
  it("takes file names from the URL unless given", () => {
    expect(parseArtifactsLock(artifactsLock("sha256:00")).map((artifact) => artifact.filename)).toEqual([
      "tool.bin",
      "release-1.0.tar.gz",
    ]);
  });

  it("refuses two artifacts with the same file name", () => {
    const text = [
      "artifacts:",
      "  - download_url: https://a.example.test/tool.bin",
      "    checksum: sha256:00",
      "  - download_url: https://b.example.test/tool.bin",
      "    checksum: sha256:11",
      "",
    ].join("\n");

    expect(() => parseArtifactsLock(text)).toThrow("Two artifacts would be saved as tool.bin");
  });

  it("requires a checksum on every artifact", () => {
    expect(() => parseArtifactsLock(`artifacts:\n  - download_url: ${TOOL_URL}\n`)).toThrow(
      "artifacts[0] needs download_url and checksum",
    );
  });
});

describe("GenericResolver", () => {
  let workspace: TestWorkspace;
  const resolver = new GenericResolver();

  beforeEach(async () => {
    workspace = await createWorkspace();
    workspace.registry.serve(TOOL_URL, "tool binary");
    workspace.registry.serve(ARCHIVE_URL, "release archive");
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it("fetches each artifact under its file name", async () => {
    await writeFiles(workspace.sourceDir, { "artifacts.lock.yaml": artifactsLock(`sha256:${sha256Hex("tool binary")}`) });
    const context = workspace.context();

    expect(await resolver.applies(workspace.sourceDir)).toBe(true);
    const graph = await resolver.resolve(workspace.sourceDir, genericInput(), context);
    const report = await resolver.fetchAll(graph, context);

    expect(report.entries.map((entry) => [entry.name, entry.role, entry.integrity])).toEqual([
      ["tool.bin", "direct", `sha256:${sha256Hex("tool binary")}`],
      ["release-1.0.tar.gz", "direct", `sha256:${sha256Hex("release archive")}`],
    ]);
    expect(report.entries[0]).toMatchObject({
      purl: `pkg:generic/tool.bin?checksum=sha256:${sha256Hex("tool binary")}&download_url=${TOOL_URL}`,
      origin: { kind: "url", location: TOOL_URL },
    });
    expect(await fs.readFile(path.join(workspace.outputDir, "deps", "generic", "release-1.0.tar.gz"), "utf8")).toBe(
      "release archive",
    );
  });

  it("reports checksum mismatches without keeping the file", async () => {
    await writeFiles(workspace.sourceDir, { "artifacts.lock.yaml": artifactsLock(`sha256:${sha256Hex("other binary")}`) });
    const context = workspace.context({ mode: "permissive" });

    const graph = await resolver.resolve(workspace.sourceDir, genericInput(), context);
    const failure = await resolver.fetchAll(graph, context).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(PartialFetchError);
    if (failure instanceof PartialFetchError) {
      expect(failure.report.failures.map((entry) => [entry.name, entry.code])).toEqual([["tool.bin", "INTEGRITY_MISMATCH"]]);
      expect(failure.report.entries.map((entry) => entry.name)).toEqual(["release-1.0.tar.gz"]);
    }
    await expect(fs.access(path.join(workspace.outputDir, "deps", "generic", "tool.bin"))).rejects.toThrow();
  });

  it("refuses a lockfile outside the source directory", async () => {
    const resolving = resolver.resolve(workspace.sourceDir, genericInput({ lockfile: "../artifacts.lock.yaml" }), workspace.context());

    await expect(resolving).rejects.toBeInstanceOf(ResolutionError);
    await expect(resolving).rejects.toThrow("Artifacts lockfile ../artifacts.lock.yaml is outside the source directory");
  });
});
