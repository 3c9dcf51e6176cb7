import { createReadStream } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";

import type { ComponentReport, ComponentReportEntry, FetchFailure } from "@prefetch/types";
import pLimit from "p-limit";

import type { CacheEntry } from "../cache/index.js";
import { CancelledError, PartialFetchError, ResolutionError, toPrefetchError } from "../errors.js";
import { createGitArchiver, fetchToCache } from "../fetch/index.js";
import type { ArtifactSpec, DependencyGraph, DependencyNode, GitArchiveSource } from "../graph/index.js";
import {
  assertGoModHash,
  assertModuleZipHash,
  formatDigest,
  strongestAlgorithm,
  verify,
  type Digest,
} from "../integrity/index.js";
import type { FetchGraphOptions, ResolverContext } from "./types.js";

type NodeOutcome =
  | { kind: "fetched"; entry: ComponentReportEntry }
  | { kind: "failed"; failure: FetchFailure }
  | { kind: "cancelled" };

export function depsDirectory(outputDir: string, ecosystem: string): string {
  return path.join(outputDir, "deps", ecosystem);
}

/**
 * Cache identity of one artifact of one node.
 */
export function artifactIdentity(node: DependencyNode, artifact: ArtifactSpec): string {
  return artifact.identity ?? `${node.key}/${artifact.fileName}`;
}

/**
 * Shared fetch loop: deterministic traversal order, cache first, bounded concurrency,
 * entries assembled by position so completion order never leaks into the report.
 */
export async function fetchGraph(
  graph: DependencyGraph,
  context: ResolverContext,
  options: FetchGraphOptions = {},
): Promise<ComponentReport> {
  const { signal } = context;
  if (signal?.aborted === true) {
    throw new CancelledError();
  }

  const order = graph.traverse();
  const outcomes: (NodeOutcome | undefined)[] = new Array<NodeOutcome | undefined>(order.length);
  const limit = pLimit(context.config.concurrency);
  const running = new Set<Promise<void>>();
  const claims = claimTargets(graph, order, context.outputDir);
  // one download per target, e.g. several gems or crates from one git archive
  const shared = new Map<string, Promise<CacheEntry>>();
  const logger = context.logger.child(graph.ecosystem);

  const onAbort = (): void => limit.clearQueue();
  signal?.addEventListener("abort", onAbort, { once: true });

  const tasks = order.map((node, position) =>
    limit(async () => {
      if (signal?.aborted === true) {
        return;
      }
      const work = fetchNode(graph, node, context, options, claims, shared).then((outcome) => {
        outcomes[position] = outcome;
      });
      running.add(work);
      try {
        await work;
      } finally {
        running.delete(work);
      }
    }),
  );

  try {
    if (signal === undefined) {
      await Promise.all(tasks);
    } else {
      await Promise.race([Promise.all(tasks), abortion(signal)]);
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }

  if (signal?.aborted === true || outcomes.some((outcome) => outcome?.kind === "cancelled")) {
    limit.clearQueue();
    await Promise.allSettled([...running]);
    throw new CancelledError();
  }

  const entries: ComponentReportEntry[] = [];
  const failures: FetchFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome?.kind === "fetched") {
      entries.push(outcome.entry);
    } else if (outcome?.kind === "failed") {
      failures.push(outcome.failure);
    }
  }

  const report: ComponentReport = {
    ecosystem: graph.ecosystem,
    packagePath: graph.packagePath,
    entries,
    failures,
    environment: [...graph.environment],
    projectFiles: [...graph.projectFiles],
  };

  if (failures.length > 0) {
    for (const failure of failures) {
      logger.error(`${failure.name}@${failure.version}: ${failure.message}`, { code: failure.code });
    }
    throw new PartialFetchError(report);
  }

  logger.success(`Fetched ${entries.length} ${graph.ecosystem} components from ${graph.packagePath}`);
  return report;
}

function abortion(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

async function fetchNode(
  graph: DependencyGraph,
  node: DependencyNode,
  context: ResolverContext,
  options: FetchGraphOptions,
  claims: ReadonlyMap<string, TargetClaim>,
  shared: Map<string, Promise<CacheEntry>>,
): Promise<NodeOutcome> {
  try {
    let primary: { integrity: string; source: ComponentReportEntry["integritySource"] } | null = null;

    for (const artifact of node.artifacts) {
      const target = resolveTarget(context.outputDir, graph.ecosystem, artifact.fileName);
      const claim = claims.get(target);
      if (claim !== undefined && !sameArtifact(claim.artifact, artifact)) {
        throw new ResolutionError(
          `${node.name} and ${claim.owner.name} would both be saved as ${artifact.fileName} from different sources`,
          { suggestion: `${claim.owner.name} keeps ${artifact.fileName}; rename one of the artifacts in the lockfile.` },
        );
      }
      let pending = shared.get(target);
      if (pending === undefined) {
        pending = (async () => {
          const fetched = await fetchArtifact(graph, node, artifact, context, options);
          await context.cache.materialize(fetched, target);
          await options.afterArtifact?.({ node, artifact, entry: fetched, target }, context);
          return fetched;
        })();
        shared.set(target, pending);
      }
      const entry = await pending;

      if (primary === null) {
        primary =
          artifact.treeHash !== undefined
            ? { integrity: artifact.treeHash.value, source: "declared" }
            : { integrity: formatDigest(entry.digest), source: entry.integritySource };
      }
    }

    return {
      kind: "fetched",
      entry: Object.freeze({
        purl: node.purl,
        ecosystem: graph.ecosystem,
        name: node.name,
        version: node.version,
        integrity: primary?.integrity ?? null,
        integritySource: primary?.source ?? "none",
        origin: { ...node.origin },
        role: node.role,
        scope: node.scope,
        packagePath: graph.packagePath,
        properties: Object.freeze({ ...node.properties }),
      }),
    };
  } catch (error) {
    if (error instanceof CancelledError) {
      return { kind: "cancelled" };
    }
    const normalized = toPrefetchError(error);
    return {
      kind: "failed",
      failure: {
        name: node.name,
        version: node.version,
        purl: node.purl,
        code: normalized.code,
        message: normalized.message,
      },
    };
  }
}

async function fetchArtifact(
  graph: DependencyGraph,
  node: DependencyNode,
  artifact: ArtifactSpec,
  context: ResolverContext,
  options: FetchGraphOptions,
): Promise<CacheEntry> {
  const identity = artifactIdentity(node, artifact);
  const cached = await findCached(graph, identity, artifact, context);
  if (cached !== null) {
    if (artifact.treeHash !== undefined) {
      await verifyTreeHash(artifact, cached.path);
    }
    context.logger.debug(`cache hit ${identity}`);
    return cached;
  }

  if (artifact.git !== undefined) {
    return archiveToCache(graph, identity, artifact, artifact.git, context);
  }

  const result = await fetchToCache(
    {
      url: artifact.url,
      ecosystem: graph.ecosystem,
      identity,
      digests: artifact.digests,
      policy: artifact.policy,
      verifyStaged: artifact.treeHash === undefined ? undefined : (staged) => verifyTreeHash(artifact, staged),
      fetchImpl: options.fetchImpl,
    },
    {
      cache: context.cache,
      fetchImpl: context.fetchImpl,
      settings: context.config,
      logger: context.logger,
      signal: context.signal,
    },
  );

  if (result.finalUrl !== artifact.url) {
    node.properties["prefetch:final-url"] = result.finalUrl;
  }
  return result.entry;
}

async function archiveToCache(
  graph: DependencyGraph,
  identity: string,
  artifact: ArtifactSpec,
  source: GitArchiveSource,
  context: ResolverContext,
): Promise<CacheEntry> {
  const archiver = context.git ?? createGitArchiver();
  const location = `${source.remote}@${source.commit}`;
  const staged = await context.cache.stage();
  try {
    context.logger.debug(`git archive ${location}`);
    await archiver.archive({ ...source, target: staged.path, signal: context.signal });
    const verified = await verify(createReadStream(staged.path), artifact.digests, artifact.policy);
    const entry = await staged.commit(graph.ecosystem, identity, verified);
    if (verified.integritySource === "trust-on-first-use") {
      context.logger.warn(`Trusting ${location} on first use (sha256:${verified.sha256})`);
    }
    return entry;
  } finally {
    await staged.discard();
  }
}

async function findCached(
  graph: DependencyGraph,
  identity: string,
  artifact: ArtifactSpec,
  context: ResolverContext,
): Promise<CacheEntry | null> {
  const strongest = strongestAlgorithm(artifact.digests);
  if (strongest !== null) {
    for (const digest of artifact.digests.filter((candidate: Digest) => candidate.algorithm === strongest)) {
      const entry = await context.cache.entry(graph.ecosystem, identity, digest);
      if (entry !== null) {
        return entry;
      }
    }
    return null;
  }

  if (artifact.policy === "reject") {
    return null;
  }

  const [first] = await context.cache.lookup(graph.ecosystem, identity);
  return first ?? null;
}

async function verifyTreeHash(artifact: ArtifactSpec, filePath: string): Promise<void> {
  const treeHash = artifact.treeHash;
  if (treeHash === undefined) {
    return;
  }
  if (treeHash.kind === "go-zip") {
    await assertModuleZipHash(filePath, treeHash.value, artifact.url);
    return;
  }
  assertGoModHash(await readFile(filePath), treeHash.value, artifact.url);
}

interface TargetClaim {
  owner: DependencyNode;
  artifact: ArtifactSpec;
}

function artifactLocation(artifact: ArtifactSpec): string {
  return artifact.git === undefined ? artifact.url : `${artifact.git.remote}@${artifact.git.commit}`;
}

/** Same location, and no algorithm both declare with disjoint values. */
function sameArtifact(left: ArtifactSpec, right: ArtifactSpec): boolean {
  if (artifactLocation(left) !== artifactLocation(right)) {
    return false;
  }
  return left.digests.every(
    (digest) =>
      !right.digests.some((other) => other.algorithm === digest.algorithm) ||
      right.digests.some((other) => other.algorithm === digest.algorithm && other.hex === digest.hex),
  );
}

/**
 * First node in traversal order owns each target path; later nodes may share it only with an identical artifact.
 */
function claimTargets(graph: DependencyGraph, order: readonly DependencyNode[], outputDir: string): Map<string, TargetClaim> {
  const claims = new Map<string, TargetClaim>();
  for (const node of order) {
    for (const artifact of node.artifacts) {
      const target = targetPath(outputDir, graph.ecosystem, artifact.fileName);
      if (target !== null && !claims.has(target)) {
        claims.set(target, { owner: node, artifact });
      }
    }
  }
  return claims;
}

function targetPath(outputDir: string, ecosystem: string, fileName: string): string | null {
  const base = depsDirectory(outputDir, ecosystem);
  const target = path.resolve(base, fileName);
  const relative = path.relative(base, target);
  if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) {
    return null;
  }
  return target;
}

function resolveTarget(outputDir: string, ecosystem: string, fileName: string): string {
  const target = targetPath(outputDir, ecosystem, fileName);
  if (target === null) {
    throw new ResolutionError(`Artifact file name ${JSON.stringify(fileName)} escapes ${depsDirectory(outputDir, ecosystem)}`);
  }
  return target;
}
