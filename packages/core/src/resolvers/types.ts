import type { ComponentReport, EcosystemName, PackageInput, RequestFlag, RequestMode } from "@prefetch/types";

import type { CacheEntry, CacheHandle } from "../cache/index.js";
import type { PrefetchConfig } from "../config/index.js";
import type { FetchLike, GitArchiver } from "../fetch/index.js";
import type { ArtifactSpec, DependencyGraph, DependencyNode } from "../graph/index.js";
import type { Logger } from "../logging/logger.js";

export interface ResolverContext {
  sourceDir: string;
  outputDir: string;
  mode: RequestMode;
  flags: ReadonlySet<RequestFlag>;
  config: PrefetchConfig;
  cache: CacheHandle;
  fetchImpl: FetchLike;
  /** Archives commits from git hosts without a download endpoint; the git executable when unset */
  git?: GitArchiver;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * One ecosystem's pure-parse resolution and fetch pipeline.
 * Resolvers never run project code; where the native tool would, they throw ResolutionError.
 */
export interface EcosystemResolver {
  readonly ecosystem: EcosystemName;
  /** Auto-detection: whether the directory holds this ecosystem's manifests */
  applies(projectDir: string): Promise<boolean>;
  resolve(projectDir: string, input: PackageInput, context: ResolverContext): Promise<DependencyGraph>;
  /** Throws PartialFetchError carrying the report when any dependency failed */
  fetchAll(graph: DependencyGraph, context: ResolverContext): Promise<ComponentReport>;
}

export interface FetchedArtifact {
  node: DependencyNode;
  artifact: ArtifactSpec;
  entry: CacheEntry;
  /** Materialized location under `deps/<ecosystem>/` */
  target: string;
}

export interface FetchGraphOptions {
  /** Runs after an artifact has been materialized, e.g. to unpack or write sidecar files */
  afterArtifact?(fetched: FetchedArtifact, context: ResolverContext): Promise<void>;
  /** Transport for every artifact of this graph (client certificates) */
  fetchImpl?: FetchLike;
}
