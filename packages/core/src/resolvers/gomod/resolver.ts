import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { OUTPUT_DIR_PLACEHOLDER, type ComponentReport, type ComponentReportEntry, type PackageInput } from "@prefetch/types";

import { PartialFetchError, ResolutionError } from "../../errors.js";
import { DependencyGraph, type ArtifactSpec, type DependencyNodeInput } from "../../graph/index.js";
import { golangPurl } from "../../purl.js";
import { compareSemver } from "../../semver/index.js";
import { assertInputType, fileExists, readTextFile } from "../common.js";
import { depsDirectory, fetchGraph } from "../fetch-graph.js";
import type { EcosystemResolver, FetchedArtifact, ResolverContext } from "../types.js";
import {
  escapeModulePath,
  goLanguageVersion,
  isLocalReplacement,
  parseGoMod,
  parseGoSum,
  parseVendorModules,
  type GoModFile,
  type GoRequire,
  type ModuleVersion,
} from "./modfile.js";

const MODULE_PATH_PATTERN = /^[A-Za-z0-9.\-_~+]+(?:\/[A-Za-z0-9.\-_~+]+)*$/;
const DOWNLOAD_DIR = "cache/download";
const GRAPH_ONLY_PROPERTY = "gomod:graph-only";

export function moduleDownloadPath(modulePath: string, version: string, extension: "zip" | "mod" | "info"): string {
  return `${DOWNLOAD_DIR}/${escapeModulePath(modulePath)}/@v/${escapeModulePath(version)}.${extension}`;
}

function assertModulePath(modulePath: string): void {
  if (!MODULE_PATH_PATTERN.test(modulePath) || modulePath.split("/").some((segment) => segment === "." || segment === "..")) {
    throw new ResolutionError(`Invalid Go module path ${JSON.stringify(modulePath)}`);
  }
}

interface ResolvedModule {
  required: GoRequire;
  /** Module actually downloaded after `replace` */
  source: ModuleVersion | null;
  localPath: string | null;
}

/**
 * Go modules with a pruned module graph (go 1.17+), verified against go.sum tree hashes.
 */
export class GomodResolver implements EcosystemResolver {
  readonly ecosystem = "gomod" as const;

  async applies(projectDir: string): Promise<boolean> {
    return fileExists(path.join(projectDir, "go.mod"));
  }

  async resolve(projectDir: string, input: PackageInput, context: ResolverContext): Promise<DependencyGraph> {
    assertInputType(input, "gomod");

    const modFile = parseGoMod(await readTextFile(path.join(projectDir, "go.mod"), "go.mod"));
    const language = modFile.goVersion === null ? null : goLanguageVersion(modFile.goVersion);
    if (language === null || language[0] < 1 || (language[0] === 1 && language[1] < 17)) {
      throw new ResolutionError(`${modFile.module} declares go ${modFile.goVersion ?? "(none)"}; go 1.17 or newer is required`, {
        suggestion: "Raise the go directive and run `go mod tidy` so go.mod lists the full module graph.",
      });
    }

    const graph = new DependencyGraph("gomod", input.path);
    graph.setEnvironment("GOTOOLCHAIN", "local");
    graph.setEnvironment("GOSUMDB", "off");
    graph.setEnvironment("GONOSUMDB", "*");
    if (context.flags.has("cgo-disable")) {
      graph.setEnvironment("CGO_ENABLED", "0");
    }

    const vendorList = path.join(projectDir, "vendor", "modules.txt");
    if (await fileExists(vendorList)) {
      await this.resolveVendored(graph, modFile, vendorList, context);
      graph.setEnvironment("GOFLAGS", "-mod=vendor");
      return graph;
    }

    const sumPath = path.join(projectDir, "go.sum");
    const sums = (await fileExists(sumPath)) ? parseGoSum(await readTextFile(sumPath, "go.sum")) : new Map<string, string>();
    const proxy = context.config.registries.goproxy;
    const excluded = new Set(modFile.excludes.map((entry) => `${entry.path}@${entry.version}`));

    const downloaded = new Set<string>();
    for (const required of modFile.requires) {
      if (excluded.has(`${required.path}@${required.version}`)) {
        throw new ResolutionError(`${required.path}@${required.version} is both required and excluded in go.mod`);
      }
      const resolved = applyReplace(modFile, required);
      const node = resolved.localPath !== null ? localNode(resolved, resolved.localPath) : this.moduleNode(resolved, sums, proxy, false);
      graph.add(node);
      const source = resolved.source ?? required;
      downloaded.add(`${source.path}@${source.version}`);
      if (!required.indirect) {
        graph.markRoot(node.key);
      }
    }

    // go.mod files the pruned graph still loads
    for (const key of [...sums.keys()].sort()) {
      const match = /^(.+)@(v[^/]+)\/go\.mod$/.exec(key);
      if (match === null) {
        continue;
      }
      const [, modulePath = "", version = ""] = match;
      const nodeKey = `${modulePath}@${version}`;
      if (graph.has(nodeKey) || downloaded.has(nodeKey) || modulePath === modFile.module) {
        continue;
      }
      graph.add(this.moduleNode({ required: { path: modulePath, version, indirect: true }, source: { path: modulePath, version }, localPath: null }, sums, proxy, true));
    }

    graph.setEnvironment("GOPROXY", `file://${OUTPUT_DIR_PLACEHOLDER}/deps/gomod/${DOWNLOAD_DIR}`);
    graph.setEnvironment("GOMODCACHE", "deps/gomod", "path");
    graph.setEnvironment("GOFLAGS", "-mod=mod");

    context.logger.debug(`gomod: ${modFile.requires.length} required modules, ${graph.size} in total`);
    return graph;
  }

  async fetchAll(graph: DependencyGraph, context: ResolverContext): Promise<ComponentReport> {
    try {
      const report = await fetchGraph(graph, context, { afterArtifact: writeInfoFile });
      await writeVersionLists(report.entries, context.outputDir);
      return report;
    } catch (error) {
      if (error instanceof PartialFetchError) {
        await writeVersionLists(error.report.entries, context.outputDir);
      }
      throw error;
    }
  }

  private moduleNode(resolved: ResolvedModule, sums: ReadonlyMap<string, string>, proxy: string, graphOnly: boolean): DependencyNodeInput {
    const { required } = resolved;
    const source = resolved.source ?? required;
    assertModulePath(source.path);

    const modHash = sums.get(`${source.path}@${source.version}/go.mod`);
    const zipHash = sums.get(`${source.path}@${source.version}`);
    if (modHash === undefined || (!graphOnly && zipHash === undefined)) {
      throw new ResolutionError(`go.sum has no entry for ${source.path}@${source.version}`, {
        suggestion: "Run `go mod tidy` and commit go.sum.",
      });
    }

    const base = `${proxy}/${escapeModulePath(source.path)}/@v/${escapeModulePath(source.version)}`;
    const artifacts: ArtifactSpec[] = [
      {
        url: `${base}.mod`,
        fileName: moduleDownloadPath(source.path, source.version, "mod"),
        digests: [],
        policy: "trust-on-first-use",
        treeHash: { kind: "go-mod", value: modHash },
      },
    ];
    if (!graphOnly && zipHash !== undefined) {
      artifacts.push({
        url: `${base}.zip`,
        fileName: moduleDownloadPath(source.path, source.version, "zip"),
        digests: [],
        policy: "trust-on-first-use",
        treeHash: { kind: "go-zip", value: zipHash },
      });
    }

    const properties: Record<string, string> = {};
    if (graphOnly) {
      properties[GRAPH_ONLY_PROPERTY] = "true";
    }
    if (resolved.source !== null && resolved.source.path !== required.path) {
      properties["gomod:replaced-by"] = `${resolved.source.path}@${resolved.source.version}`;
    }

    return {
      key: `${required.path}@${required.version}`,
      name: required.path,
      version: source.version,
      purl: golangPurl(source.path, source.version),
      origin: { kind: "registry", location: proxy },
      scope: "runtime",
      role: required.indirect ? "transitive" : "direct",
      artifacts,
      properties,
    };
  }

  private async resolveVendored(graph: DependencyGraph, modFile: GoModFile, vendorList: string, context: ResolverContext): Promise<void> {
    if (!context.flags.has("gomod-vendor") && !context.flags.has("gomod-vendor-check")) {
      throw new ResolutionError("The project vendors its modules but the gomod-vendor flag is not set", {
        suggestion: "Pass gomod-vendor to use vendor/, or gomod-vendor-check to also verify it against go.mod.",
      });
    }

    const vendored = parseVendorModules(await readTextFile(vendorList, "vendor/modules.txt"));

    if (context.flags.has("gomod-vendor-check")) {
      const expected = new Set(modFile.requires.map((entry) => `${entry.path}@${entry.version}`));
      const actual = new Set(vendored.filter((entry) => entry.explicit).map((entry) => `${entry.path}@${entry.version}`));
      const missing = [...expected].filter((entry) => !actual.has(entry));
      const extra = [...actual].filter((entry) => !expected.has(entry));
      if (missing.length > 0 || extra.length > 0) {
        throw new ResolutionError(
          `vendor/modules.txt is out of sync with go.mod (missing: ${missing.join(", ") || "none"}; unexpected: ${extra.join(", ") || "none"})`,
          { suggestion: "Run `go mod vendor` and commit the result." },
        );
      }
    }

    const indirect = new Set(modFile.requires.filter((entry) => entry.indirect).map((entry) => entry.path));
    for (const module of vendored) {
      const node = graph.add({
        key: `${module.path}@${module.version}`,
        name: module.path,
        version: module.version,
        purl: golangPurl(module.path, module.version),
        origin: { kind: "local", location: `vendor/${module.path}` },
        scope: "runtime",
        role: module.explicit && !indirect.has(module.path) ? "direct" : "transitive",
        artifacts: [],
        properties: module.replacement === null ? { "gomod:vendored": "true" } : { "gomod:vendored": "true", "gomod:replaced-by": module.replacement },
      });
      if (node.role === "direct") {
        graph.markRoot(node.key);
      }
    }
  }
}

/**
 * `replace` with a version applies to that version only; without one, to every version.
 */
function applyReplace(modFile: GoModFile, required: GoRequire): ResolvedModule {
  const replacement =
    modFile.replaces.find((entry) => entry.oldPath === required.path && entry.oldVersion === required.version) ??
    modFile.replaces.find((entry) => entry.oldPath === required.path && entry.oldVersion === null);

  if (replacement === undefined) {
    return { required, source: null, localPath: null };
  }
  if (isLocalReplacement(replacement.newPath)) {
    return { required, source: null, localPath: replacement.newPath };
  }
  if (replacement.newVersion === null) {
    throw new ResolutionError(`replace ${required.path} => ${replacement.newPath} needs a version for a non-local target`);
  }
  return { required, source: { path: replacement.newPath, version: replacement.newVersion }, localPath: null };
}

function localNode(resolved: ResolvedModule, localPath: string): DependencyNodeInput {
  const { required } = resolved;
  return {
    key: `${required.path}@${required.version}`,
    name: required.path,
    version: required.version,
    purl: golangPurl(required.path, required.version),
    origin: { kind: "local", location: localPath },
    scope: "runtime",
    role: required.indirect ? "transitive" : "direct",
    artifacts: [],
    properties: { "gomod:replaced-by": localPath },
  };
}

async function writeInfoFile(fetched: FetchedArtifact): Promise<void> {
  if (fetched.artifact.treeHash?.kind !== "go-mod") {
    return;
  }
  const infoPath = fetched.target.replace(/\.mod$/, ".info");
  await writeFile(infoPath, `${JSON.stringify({ Version: fetched.node.version })}\n`);
}

/**
 * `@v/list` per module path, versions in semver order.
 */
async function writeVersionLists(entries: readonly ComponentReportEntry[], outputDir: string): Promise<void> {
  const versions = new Map<string, Set<string>>();
  for (const entry of entries) {
    if (entry.origin.kind !== "registry") {
      continue;
    }
    const modulePath = entry.properties["gomod:replaced-by"]?.split("@")[0] ?? entry.name;
    const known = versions.get(modulePath) ?? new Set<string>();
    known.add(entry.version);
    versions.set(modulePath, known);
  }

  const base = depsDirectory(outputDir, "gomod");
  for (const [modulePath, known] of [...versions].sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))) {
    const directory = path.join(base, DOWNLOAD_DIR, escapeModulePath(modulePath), "@v");
    await mkdir(directory, { recursive: true });
    await writeFile(path.join(directory, "list"), [...known].sort(compareSemver).join("\n") + "\n");
  }
}
