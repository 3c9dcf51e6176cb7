import { mkdir } from "node:fs/promises";
import path from "node:path";

import { isPlainObject, OUTPUT_DIR_PLACEHOLDER, type PackageInput } from "@prefetch/types";
import * as tar from "tar";
import YAML from "yaml";

import { ResolutionError } from "../../errors.js";
import { DependencyGraph, type DependencyNodeInput } from "../../graph/index.js";
import type { Digest } from "../../integrity/index.js";
import { formatPurl } from "../../purl.js";
import { assertInputType, commitPinnedArchive, fileExists, policyFor, readTextFile, safeFileName } from "../common.js";
import { depsDirectory, fetchGraph } from "../fetch-graph.js";
import type { EcosystemResolver, FetchedArtifact, ResolverContext } from "../types.js";
import { checksumKey, parseGemfileLock, type GemSpec } from "./lockfile.js";

const BUNDLE_SETTINGS = {
  BUNDLE_CACHE_PATH: `${OUTPUT_DIR_PLACEHOLDER}/deps/bundler`,
  BUNDLE_DEPLOYMENT: "true",
  BUNDLE_NO_PRUNE: "true",
  BUNDLE_ALLOW_OFFLINE_INSTALL: "true",
  BUNDLE_DISABLE_VERSION_CHECK: "true",
} as const;

export function gemPurl(spec: Pick<GemSpec, "name" | "version" | "platform">, qualifiers: Record<string, string> = {}): string {
  return formatPurl({
    type: "gem",
    name: spec.name,
    version: spec.version,
    qualifiers: { ...qualifiers, platform: spec.platform ?? undefined },
  });
}

function gemFileName(spec: GemSpec): string {
  return safeFileName(`${spec.name}-${spec.version}${spec.platform === null ? "" : `-${spec.platform}`}.gem`);
}

/** Directory bundler looks for in its cache path for a git source: `<repo>-<first 12 of revision>`. */
export function gitCheckoutName(repo: string, revision: string): string {
  return `${repo}-${revision.slice(0, 12)}`;
}

/**
 * Bundler lockfiles. Platform gems are fetched only with allowBinary.
 */
export class BundlerResolver implements EcosystemResolver {
  readonly ecosystem = "bundler" as const;

  async applies(projectDir: string): Promise<boolean> {
    return fileExists(path.join(projectDir, "Gemfile.lock"));
  }

  async resolve(projectDir: string, input: PackageInput, context: ResolverContext): Promise<DependencyGraph> {
    assertInputType(input, "bundler");

    const lock = parseGemfileLock(await readTextFile(path.join(projectDir, "Gemfile.lock"), "Gemfile.lock"));
    const graph = new DependencyGraph("bundler", input.path);
    const direct = new Set(lock.dependencies);
    const keysByName = new Map<string, string[]>();

    for (const spec of lock.specs) {
      if (spec.platform !== null && spec.source.kind === "gem" && !input.allowBinary) {
        context.logger.debug(`bundler: skipping platform gem ${checksumKey(spec)}`);
        continue;
      }
      const node = graph.add(this.toNode(spec, lock.checksums, context, direct.has(spec.name)));
      keysByName.set(spec.name, [...(keysByName.get(spec.name) ?? []), node.key]);
    }

    for (const spec of lock.specs) {
      const from = keysByName.get(spec.name);
      if (from === undefined) {
        continue;
      }
      for (const dependency of spec.dependencies) {
        for (const fromKey of from) {
          for (const toKey of keysByName.get(dependency) ?? []) {
            if (fromKey !== toKey) {
              graph.addEdge(fromKey, toKey);
            }
          }
        }
      }
    }

    for (const name of lock.dependencies) {
      for (const key of keysByName.get(name) ?? []) {
        graph.markRoot(key);
      }
    }

    const configPath = path.join(projectDir, ".bundle", "config");
    graph.addProjectFile(configPath, await mergedBundleConfig(configPath));

    context.logger.debug(`bundler: ${graph.size} gems, bundled with ${lock.bundledWith ?? "unknown"}`);
    return graph;
  }

  fetchAll(graph: DependencyGraph, context: ResolverContext) {
    return fetchGraph(graph, context, { afterArtifact: unpackGitSource });
  }

  private toNode(
    spec: GemSpec,
    checksums: ReadonlyMap<string, readonly Digest[]>,
    context: ResolverContext,
    isDirect: boolean,
  ): DependencyNodeInput {
    const role = isDirect ? "direct" : "transitive";
    const { source } = spec;

    if (source.kind === "path") {
      return {
        key: `${spec.name}@path:${source.remote}`,
        name: spec.name,
        version: spec.version,
        purl: gemPurl(spec),
        origin: { kind: "local", location: source.remote },
        scope: "runtime",
        role,
        artifacts: [],
      };
    }

    if (source.kind === "git") {
      const pinned = commitPinnedArchive(source.remote, source.revision, `gem ${spec.name}`);
      const vcsUrl = pinned.vcsUrl;
      const checkout = gitCheckoutName(pinned.repository.repo, pinned.commit);
      return {
        key: `${spec.name}@${vcsUrl}`,
        name: spec.name,
        version: spec.version,
        purl: gemPurl(spec, { vcs_url: vcsUrl }),
        origin: { kind: "vcs", location: vcsUrl },
        scope: "runtime",
        role,
        artifacts: [
          {
            url: pinned.url,
            fileName: `${checkout}.tar.gz`,
            identity: vcsUrl,
            digests: [],
            policy: "trust-on-first-use",
            git: pinned.git,
          },
        ],
        properties: { "bundler:checkout": checkout },
      };
    }

    const remote = source.remote.endsWith("/") ? source.remote : `${source.remote}/`;
    if (!/^https?:\/\//.test(remote)) {
      throw new ResolutionError(`Unsupported gem source ${source.remote}`);
    }
    const fileName = gemFileName(spec);
    const digests = checksums.get(checksumKey(spec)) ?? [];
    return {
      key: `${spec.name}@${spec.version}${spec.platform === null ? "" : `-${spec.platform}`}`,
      name: spec.name,
      version: spec.version,
      purl: gemPurl(spec),
      origin: { kind: "registry", location: remote },
      scope: "runtime",
      role,
      artifacts: [{ url: `${remote}gems/${fileName}`, fileName, digests, policy: policyFor(context.mode, digests.length > 0) }],
    };
  }
}

/**
 * Existing `.bundle/config` settings with the offline cache settings on top.
 */
async function mergedBundleConfig(configPath: string): Promise<string> {
  let existing: Record<string, unknown> = {};
  if (await fileExists(configPath)) {
    let parsed: unknown;
    try {
      parsed = YAML.parse(await readTextFile(configPath, ".bundle/config"));
    } catch (error) {
      throw new ResolutionError(`${configPath} is not valid YAML`, { cause: error });
    }
    if (parsed !== null && parsed !== undefined) {
      if (!isPlainObject(parsed)) {
        throw new ResolutionError(`${configPath} must contain a mapping`);
      }
      existing = parsed;
    }
  }
  return YAML.stringify({ ...existing, ...BUNDLE_SETTINGS });
}

async function unpackGitSource(fetched: FetchedArtifact, context: ResolverContext): Promise<void> {
  const checkout = fetched.node.properties["bundler:checkout"];
  if (checkout === undefined) {
    return;
  }
  const directory = path.join(depsDirectory(context.outputDir, "bundler"), checkout);
  await mkdir(directory, { recursive: true });
  await tar.x({ file: fetched.target, cwd: directory, strip: 1 });
}
