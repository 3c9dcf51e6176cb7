import { createHash } from "node:crypto";
import path from "node:path";

import { isPlainObject, isStringRecord, OUTPUT_DIR_PLACEHOLDER, type PackageInput } from "@prefetch/types";

import { ResolutionError } from "../../errors.js";
import { DependencyGraph, type ArtifactSpec, type DependencyNodeInput, type GitArchiveSource } from "../../graph/index.js";
import { parseSri } from "../../integrity/index.js";
import { npmPurl } from "../../purl.js";
import { isSemverRange, satisfies } from "../../semver/index.js";
import {
  anyFileExists,
  assertInputType,
  commitPinnedArchive,
  fileExists,
  policyFor,
  readJsonFile,
  safeFileName,
} from "../common.js";
import { fetchGraph } from "../fetch-graph.js";
import type { EcosystemResolver, ResolverContext } from "../types.js";
import { lookupDependency, parsePackageLock, type LockedPackage } from "./lockfile.js";

const LOCKFILE_NAMES = ["npm-shrinkwrap.json", "package-lock.json"] as const;
const MANIFEST_DEPENDENCY_KEYS = ["dependencies", "devDependencies", "optionalDependencies", "peerDependencies"] as const;
const KNOWN_REGISTRY_HOSTS = new Set(["registry.npmjs.org", "registry.yarnpkg.com"]);

type Classified =
  | { kind: "registry" | "url"; url: string; integrity: string | undefined }
  | { kind: "git"; url: string; vcsUrl: string; fileName: string; git: GitArchiveSource | undefined }
  | { kind: "local"; localPath: string };

export function npmTarballName(name: string, version: string): string {
  return `${name.replace(/^@/, "").replace("/", "-")}-${version}.tgz`;
}

export function registryTarballUrl(registry: string, name: string, version: string): string {
  const unscoped = name.startsWith("@") ? name.slice(name.indexOf("/") + 1) : name;
  return `${registry}/${name}/-/${unscoped}-${version}.tgz`;
}

function isGitSpec(value: string): boolean {
  return /^(git\+|git:|github:|git@)/.test(value) || /^https?:\/\/[^#]+\.git#/.test(value);
}

function classify(entry: LockedPackage, registry: string): Classified {
  const resolved = entry.resolved;

  if (entry.link) {
    return { kind: "local", localPath: (resolved ?? entry.location).replace(/^file:/, "") };
  }

  if (resolved === undefined) {
    if (!entry.location.includes("node_modules/")) {
      return { kind: "local", localPath: entry.location };
    }
    if (entry.version === undefined) {
      throw new ResolutionError(`${entry.location} has neither a version nor a resolved location`);
    }
    return { kind: "registry", url: registryTarballUrl(registry, entry.name, entry.version), integrity: entry.integrity };
  }

  if (resolved.startsWith("file:")) {
    return { kind: "local", localPath: resolved.slice("file:".length) };
  }

  if (isGitSpec(resolved)) {
    const hashIndex = resolved.indexOf("#");
    const remote = hashIndex >= 0 ? resolved.slice(0, hashIndex) : resolved;
    const ref = hashIndex >= 0 ? resolved.slice(hashIndex + 1) : undefined;
    const pinned = commitPinnedArchive(remote, ref, `npm dependency ${entry.name}`);
    return {
      kind: "git",
      url: pinned.url,
      vcsUrl: pinned.vcsUrl,
      fileName: safeFileName(`${pinned.repository.owner}-${pinned.repository.repo}-${pinned.commit}.tar.gz`),
      git: pinned.git,
    };
  }

  if (/^https?:\/\//.test(resolved)) {
    const host = new URL(resolved).host;
    const fromRegistry = resolved.startsWith(`${registry}/`) || KNOWN_REGISTRY_HOSTS.has(host);
    return { kind: fromRegistry ? "registry" : "url", url: resolved, integrity: entry.integrity };
  }

  throw new ResolutionError(`Unsupported resolved location for ${entry.name}: ${resolved}`);
}

interface PlannedNode {
  key: string;
  fileName: string | null;
  kind: Classified["kind"];
}

/**
 * npm lockfiles v1 to v3. Direct ranges in package.json must match the lock.
 */
export class NpmResolver implements EcosystemResolver {
  readonly ecosystem = "npm" as const;

  async applies(projectDir: string): Promise<boolean> {
    return anyFileExists(projectDir, LOCKFILE_NAMES);
  }

  async resolve(projectDir: string, input: PackageInput, context: ResolverContext): Promise<DependencyGraph> {
    assertInputType(input, "npm");

    const lockfileName = await findLockfile(projectDir);
    const lockfilePath = path.join(projectDir, lockfileName);
    const lockDocument = await readJsonFile(lockfilePath, lockfileName);
    const lock = parsePackageLock(lockDocument, lockfileName);

    const manifestPath = path.join(projectDir, "package.json");
    const manifest = await readJsonFile(manifestPath, "package.json");
    if (!isPlainObject(manifest)) {
      throw new ResolutionError("package.json must contain a JSON object");
    }

    const directSpecs = collectDirectSpecs(manifest);
    checkDirectRanges(lock.packages, directSpecs, lockfileName);

    const registry = context.config.registries.npm;
    const graph = new DependencyGraph("npm", input.path);
    const planned = new Map<string, PlannedNode>();
    const directLocations = new Set([...directSpecs.keys()].map((name) => `node_modules/${name}`));

    for (const entry of lock.packages.values()) {
      if (entry.location === "" || entry.bundled || (entry.dev && !input.includeDev)) {
        continue;
      }

      const classified = classify(entry, registry);
      const nodeInput = this.toNodeInput(entry, classified, lock.packages, context, directLocations.has(entry.location));
      const node = graph.add(nodeInput);
      planned.set(entry.location, {
        key: node.key,
        fileName: nodeInput.artifacts[0]?.fileName ?? null,
        kind: classified.kind,
      });
    }

    for (const entry of lock.packages.values()) {
      const from = entry.location === "" ? undefined : planned.get(entry.location);
      if (entry.location !== "" && from === undefined) {
        continue;
      }
      // links carry no dependencies of their own; their folder entry does
      for (const name of entry.dependencies) {
        const target = lookupDependency(lock.packages, entry.location, name);
        const to = target === undefined ? undefined : planned.get(target.location);
        if (from !== undefined && to !== undefined && from.key !== to.key) {
          graph.addEdge(from.key, to.key);
        }
      }
    }

    for (const name of directSpecs.keys()) {
      const target = lookupDependency(lock.packages, "", name);
      const planEntry = target === undefined ? undefined : planned.get(target.location);
      if (planEntry !== undefined) {
        graph.markRoot(planEntry.key);
      }
    }

    const rewrittenLock = rewriteLockfile(lockDocument, planned);
    graph.addProjectFile(lockfilePath, `${JSON.stringify(rewrittenLock, null, 2)}\n`);

    const rewrittenManifest = rewriteManifest(manifest, lock.packages, planned);
    if (rewrittenManifest !== null) {
      graph.addProjectFile(manifestPath, `${JSON.stringify(rewrittenManifest, null, 2)}\n`);
    }

    context.logger.debug(`npm: resolved ${graph.size} packages from ${lockfileName}`, { lockfileVersion: lock.lockfileVersion });
    return graph;
  }

  fetchAll(graph: DependencyGraph, context: ResolverContext) {
    return fetchGraph(graph, context);
  }

  private toNodeInput(
    entry: LockedPackage,
    classified: Classified,
    packages: ReadonlyMap<string, LockedPackage>,
    context: ResolverContext,
    direct: boolean,
  ): DependencyNodeInput {
    const role = direct ? "direct" : "transitive";
    const scope = entry.dev ? "dev" : "runtime";

    if (classified.kind === "local") {
      const folder = packages.get(classified.localPath);
      const version = entry.version ?? folder?.version ?? "";
      return {
        key: `local:${classified.localPath}`,
        name: folder?.name ?? entry.name,
        version,
        purl: npmPurl(folder?.name ?? entry.name, version),
        origin: { kind: "local", location: classified.localPath },
        scope,
        role,
        artifacts: [],
        properties: { "npm:path": classified.localPath },
      };
    }

    const version = entry.version ?? "";

    if (classified.kind === "git") {
      return {
        key: `${entry.name}@${classified.vcsUrl}`,
        name: entry.name,
        version,
        purl: npmPurl(entry.name, version, { vcs_url: classified.vcsUrl }),
        origin: { kind: "vcs", location: classified.vcsUrl },
        scope,
        role,
        artifacts: [
          { url: classified.url, fileName: classified.fileName, digests: [], policy: "trust-on-first-use", git: classified.git },
        ],
      };
    }

    const digests = classified.integrity === undefined ? [] : parseSri(classified.integrity);
    const artifact: ArtifactSpec = {
      url: classified.url,
      fileName:
        classified.kind === "registry"
          ? npmTarballName(entry.name, version)
          : safeFileName(`${entry.name}-${createHash("sha256").update(classified.url).digest("hex").slice(0, 16)}.tgz`),
      digests,
      policy: policyFor(context.mode, digests.length > 0),
    };

    return {
      key: classified.kind === "registry" ? `${entry.name}@${version}` : `${entry.name}@${classified.url}`,
      name: entry.name,
      version,
      purl: npmPurl(entry.name, version, classified.kind === "url" ? { download_url: classified.url } : undefined),
      origin: { kind: classified.kind === "registry" ? "registry" : "url", location: classified.url },
      scope,
      role,
      artifacts: [artifact],
    };
  }
}

async function findLockfile(projectDir: string): Promise<string> {
  for (const name of LOCKFILE_NAMES) {
    if (await fileExists(path.join(projectDir, name))) {
      return name;
    }
  }
  throw new ResolutionError(`No package-lock.json or npm-shrinkwrap.json in ${projectDir}`, {
    suggestion: "Run `npm install --package-lock-only` and commit the lockfile.",
  });
}

function collectDirectSpecs(manifest: Record<string, unknown>): Map<string, string> {
  const specs = new Map<string, string>();
  for (const key of MANIFEST_DEPENDENCY_KEYS) {
    const section = manifest[key];
    if (!isStringRecord(section)) {
      continue;
    }
    for (const [name, spec] of Object.entries(section)) {
      if (!specs.has(name)) {
        specs.set(name, spec);
      }
    }
  }
  return specs;
}

function checkDirectRanges(
  packages: ReadonlyMap<string, LockedPackage>,
  directSpecs: ReadonlyMap<string, string>,
  lockfileName: string,
): void {
  const problems: string[] = [];
  for (const [name, spec] of directSpecs) {
    const locked = packages.get(`node_modules/${name}`);
    if (locked === undefined) {
      continue;
    }
    if (!isSemverRange(spec) || locked.version === undefined || locked.link) {
      continue;
    }
    if (!satisfies(locked.version, spec)) {
      problems.push(`${name}: package.json wants ${spec}, ${lockfileName} has ${locked.version}`);
    }
  }

  if (problems.length > 0) {
    throw new ResolutionError(`${lockfileName} is out of sync with package.json:\n  ${problems.join("\n  ")}`, {
      suggestion: "Run `npm install` and commit the updated lockfile.",
    });
  }
}

function fileUrl(fileName: string): string {
  return `file://${OUTPUT_DIR_PLACEHOLDER}/deps/npm/${fileName}`;
}

function rewriteLockfile(document: unknown, planned: ReadonlyMap<string, PlannedNode>): unknown {
  if (!isPlainObject(document)) {
    return document;
  }
  const copy: Record<string, unknown> = structuredClone(document);

  const packagesSection = copy["packages"];
  if (isPlainObject(packagesSection)) {
    for (const [location, entry] of Object.entries(packagesSection)) {
      const plan = planned.get(location);
      if (plan === undefined || plan.fileName === null || !isPlainObject(entry)) {
        continue;
      }
      entry["resolved"] = fileUrl(plan.fileName);
    }
  }

  const rewriteTree = (tree: Record<string, unknown>, parentLocation: string): void => {
    for (const [name, entry] of Object.entries(tree)) {
      if (!isPlainObject(entry)) {
        continue;
      }
      const location = parentLocation.length > 0 ? `${parentLocation}/node_modules/${name}` : `node_modules/${name}`;
      const plan = planned.get(location);
      if (plan !== undefined && plan.fileName !== null) {
        entry["resolved"] = fileUrl(plan.fileName);
        if (plan.kind === "git") {
          entry["version"] = fileUrl(plan.fileName);
        }
      }
      const nested = entry["dependencies"];
      if (isPlainObject(nested)) {
        rewriteTree(nested, location);
      }
    }
  };

  const dependencies = copy["dependencies"];
  if (isPlainObject(dependencies)) {
    rewriteTree(dependencies, "");
  }

  return copy;
}

/**
 * Points git and URL dependencies of package.json at their fetched archives. Null when nothing changes.
 */
function rewriteManifest(
  manifest: Record<string, unknown>,
  packages: ReadonlyMap<string, LockedPackage>,
  planned: ReadonlyMap<string, PlannedNode>,
): Record<string, unknown> | null {
  const copy: Record<string, unknown> = structuredClone(manifest);
  let changed = false;

  for (const key of MANIFEST_DEPENDENCY_KEYS) {
    const section = copy[key];
    if (!isStringRecord(section)) {
      continue;
    }
    for (const name of Object.keys(section)) {
      const target = lookupDependency(packages, "", name);
      const plan = target === undefined ? undefined : planned.get(target.location);
      if (plan !== undefined && plan.fileName !== null && (plan.kind === "git" || plan.kind === "url")) {
        section[name] = fileUrl(plan.fileName);
        changed = true;
      }
    }
  }

  return changed ? copy : null;
}
