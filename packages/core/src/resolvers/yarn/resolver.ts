import { createHash } from "node:crypto";
import path from "node:path";

import { isPlainObject, isStringRecord, OUTPUT_DIR_PLACEHOLDER, type PackageInput } from "@prefetch/types";

import { ResolutionError } from "../../errors.js";
import { DependencyGraph, type DependencyNodeInput } from "../../graph/index.js";
import { parseSri, splitUrlDigest, type Digest } from "../../integrity/index.js";
import { npmPurl } from "../../purl.js";
import {
  assertInputType,
  commitPinnedArchive,
  fileExists,
  policyFor,
  readJsonFile,
  readTextFile,
  safeFileName,
} from "../common.js";
import { fetchGraph } from "../fetch-graph.js";
import type { EcosystemResolver, ResolverContext } from "../types.js";
import { parseYarnLock, splitSpecifier, type YarnLockEntry } from "./lockfile.js";

const CODELOAD_PATTERN = /^https:\/\/codeload\.github\.com\/([^/]+)\/([^/]+)\/tar\.gz\/([0-9a-fA-F]{40})$/;

interface Planned {
  input: DependencyNodeInput;
  /** Lockfile `resolved` value rewritten to the mirror, null when yarn finds the file by name */
  rewrite: string | null;
}

/** Offline mirror file name yarn derives from a registry tarball URL. */
export function mirrorFileName(name: string, url: string): string {
  const basename = new URL(url).pathname.split("/").pop() ?? "";
  if (name.startsWith("@")) {
    const scope = name.slice(0, name.indexOf("/"));
    return safeFileName(`${scope}-${basename}`);
  }
  return safeFileName(basename);
}

function isGitResolved(value: string): boolean {
  return /^(git\+|git:|github:|git@)/.test(value) || /^https?:\/\/[^#]+\.git#/.test(value);
}

/**
 * yarn classic. Components reachable only from devDependencies are dev scoped.
 */
export class YarnResolver implements EcosystemResolver {
  readonly ecosystem = "yarn" as const;

  async applies(projectDir: string): Promise<boolean> {
    return fileExists(path.join(projectDir, "yarn.lock"));
  }

  async resolve(projectDir: string, input: PackageInput, context: ResolverContext): Promise<DependencyGraph> {
    assertInputType(input, "yarn");

    const lockPath = path.join(projectDir, "yarn.lock");
    const lock = parseYarnLock(await readTextFile(lockPath, "yarn.lock"));
    const manifest = await readJsonFile(path.join(projectDir, "package.json"), "package.json");
    if (!isPlainObject(manifest)) {
      throw new ResolutionError("package.json must contain a JSON object");
    }

    const runtimeRoots = [
      ...Object.entries(isStringRecord(manifest["dependencies"]) ? manifest["dependencies"] : {}),
      ...Object.entries(isStringRecord(manifest["optionalDependencies"]) ? manifest["optionalDependencies"] : {}),
    ];
    const devRoots = Object.entries(isStringRecord(manifest["devDependencies"]) ? manifest["devDependencies"] : {});

    const lookup = (name: string, range: string): YarnLockEntry => {
      const entry = lock.bySpecifier.get(`${name}@${range}`);
      if (entry === undefined) {
        throw new ResolutionError(`yarn.lock has no entry for ${name}@${range}`, {
          suggestion: "Run `yarn install` and commit the updated yarn.lock.",
        });
      }
      return entry;
    };

    const runtimeReach = reachable(runtimeRoots.map(([name, range]) => lookup(name, range)), lookup, lock.bySpecifier);
    const devReach = reachable(devRoots.map(([name, range]) => lookup(name, range)), lookup, lock.bySpecifier);

    const graph = new DependencyGraph("yarn", input.path);
    const planned = new Map<YarnLockEntry, Planned>();
    const directEntries = new Set([...runtimeRoots, ...devRoots].map(([name, range]) => lookup(name, range)));

    for (const entry of lock.entries) {
      const devOnly = devReach.has(entry) && !runtimeReach.has(entry);
      if (devOnly && !input.includeDev) {
        continue;
      }
      const plan = planEntry(entry, context, devOnly ? "dev" : "runtime", directEntries.has(entry) ? "direct" : "transitive");
      graph.add({ ...plan.input, properties: { ...plan.input.properties, "yarn:lockfile-version": "1" } });
      planned.set(entry, plan);
    }

    for (const [entry, plan] of planned) {
      for (const [name, range] of [...entry.dependencies, ...entry.optionalDependencies]) {
        const target = lock.bySpecifier.get(`${name}@${range}`);
        const targetPlan = target === undefined ? undefined : planned.get(target);
        if (targetPlan !== undefined && targetPlan.input.key !== plan.input.key) {
          graph.addEdge(plan.input.key, targetPlan.input.key);
        }
      }
    }

    for (const [name, range] of [...runtimeRoots, ...devRoots]) {
      const plan = planned.get(lookup(name, range));
      if (plan !== undefined) {
        graph.markRoot(plan.input.key);
      }
    }

    const lines = [...lock.lines];
    let rewritten = false;
    for (const [entry, plan] of planned) {
      if (plan.rewrite !== null && entry.resolvedLine !== undefined) {
        lines[entry.resolvedLine] = `  resolved "${plan.rewrite}"`;
        rewritten = true;
      }
    }
    if (rewritten) {
      graph.addProjectFile(lockPath, lines.join("\n"));
    }

    graph.setEnvironment("YARN_YARN_OFFLINE_MIRROR", "deps/yarn", "path");
    graph.setEnvironment("YARN_YARN_OFFLINE_MIRROR_PRUNING", "false");

    context.logger.debug(`yarn: resolved ${graph.size} packages`);
    return graph;
  }

  fetchAll(graph: DependencyGraph, context: ResolverContext) {
    return fetchGraph(graph, context);
  }
}

function reachable(
  roots: readonly YarnLockEntry[],
  lookup: (name: string, range: string) => YarnLockEntry,
  bySpecifier: ReadonlyMap<string, YarnLockEntry>,
): Set<YarnLockEntry> {
  const seen = new Set<YarnLockEntry>();
  const queue = [...roots];
  while (queue.length > 0) {
    const entry = queue.shift();
    if (entry === undefined || seen.has(entry)) {
      continue;
    }
    seen.add(entry);
    for (const [name, range] of entry.dependencies) {
      queue.push(lookup(name, range));
    }
    for (const [name, range] of entry.optionalDependencies) {
      // optional dependencies may be missing for other platforms
      const optional = bySpecifier.get(`${name}@${range}`);
      if (optional !== undefined) {
        queue.push(optional);
      }
    }
  }
  return seen;
}

function mirrorUrl(fileName: string): string {
  return `file:${OUTPUT_DIR_PLACEHOLDER}/deps/yarn/${fileName}`;
}

function planEntry(
  entry: YarnLockEntry,
  context: ResolverContext,
  scope: "runtime" | "dev",
  role: "direct" | "transitive",
): Planned {
  const { name, version, resolved } = entry;

  if (resolved === undefined || resolved.startsWith("file:")) {
    const localPath = localPathOf(entry);
    return {
      input: {
        key: `${name}@file:${localPath}`,
        name,
        version,
        purl: npmPurl(name, version),
        origin: { kind: "local", location: localPath },
        scope,
        role,
        artifacts: [],
        properties: { "yarn:path": localPath },
      },
      rewrite: null,
    };
  }

  const codeload = CODELOAD_PATTERN.exec(resolved);
  if (codeload !== null || isGitResolved(resolved)) {
    const hashIndex = resolved.indexOf("#");
    const pinned =
      codeload !== null
        ? commitPinnedArchive(`https://github.com/${codeload[1] ?? ""}/${codeload[2] ?? ""}`, codeload[3], `yarn dependency ${name}`)
        : commitPinnedArchive(
            hashIndex >= 0 ? resolved.slice(0, hashIndex) : resolved,
            hashIndex >= 0 ? resolved.slice(hashIndex + 1) : undefined,
            `yarn dependency ${name}`,
          );
    const vcsUrl = pinned.vcsUrl;
    const fileName = safeFileName(`${pinned.repository.owner}-${pinned.repository.repo}-${pinned.commit}.tgz`);
    return {
      input: {
        key: `${name}@${vcsUrl}`,
        name,
        version,
        purl: npmPurl(name, version, { vcs_url: vcsUrl }),
        origin: { kind: "vcs", location: vcsUrl },
        scope,
        role,
        artifacts: [{ url: pinned.url, fileName, digests: [], policy: "trust-on-first-use", git: pinned.git }],
      },
      rewrite: mirrorUrl(fileName),
    };
  }

  if (!/^https?:\/\//.test(resolved)) {
    throw new ResolutionError(`Unsupported resolved location for ${name}: ${resolved}`);
  }

  const { url, digest: urlDigest } = splitUrlDigest(resolved);
  const digests: Digest[] = entry.integrity === undefined ? [] : parseSri(entry.integrity);
  if (urlDigest !== null) {
    digests.push(urlDigest);
  }

  const registry = context.config.registries.npm;
  const host = new URL(url).host;
  const fromRegistry = url.startsWith(`${registry}/`) || host === "registry.yarnpkg.com" || host === "registry.npmjs.org";
  const fileName = fromRegistry
    ? mirrorFileName(name, url)
    : safeFileName(`${name}-${createHash("sha256").update(url).digest("hex").slice(0, 16)}.tgz`);

  return {
    input: {
      key: fromRegistry ? `${name}@${version}` : `${name}@${url}`,
      name,
      version,
      purl: npmPurl(name, version, fromRegistry ? undefined : { download_url: url }),
      origin: { kind: fromRegistry ? "registry" : "url", location: url },
      scope,
      role,
      artifacts: [{ url, fileName, digests, policy: policyFor(context.mode, digests.length > 0) }],
    },
    rewrite: fromRegistry ? null : mirrorUrl(fileName),
  };
}

function localPathOf(entry: YarnLockEntry): string {
  for (const specifier of entry.specifiers) {
    const { range } = splitSpecifier(specifier);
    const match = /^(?:file|link):(.+)$/.exec(range);
    if (match?.[1] !== undefined) {
      return match[1];
    }
  }
  if (entry.resolved?.startsWith("file:") === true) {
    return entry.resolved.slice("file:".length).replace(/#.*$/, "");
  }
  throw new ResolutionError(`yarn.lock entry ${entry.specifiers.join(", ")} has no resolved location`);
}
