import path from "node:path";

import type { ComponentReport, EcosystemSummary, PackageInput, PrefetchRequest, RequestOutput } from "@prefetch/types";

import { openCache, type CacheHandle } from "../cache/index.js";
import type { PrefetchConfig } from "../config/index.js";
import {
  CancelledError,
  OrchestratorError,
  PartialFetchError,
  PrefetchError,
  toPrefetchError,
  type EcosystemFailure,
} from "../errors.js";
import { defaultFetch, type FetchLike, type GitArchiver } from "../fetch/index.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { createDefaultResolverRegistry, type ResolverRegistry } from "../resolvers/index.js";
import { mergeOutcomes, writeRequestOutput, type InputOutcome } from "./output.js";

export interface RunDependencies {
  config: PrefetchConfig;
  fetchImpl?: FetchLike;
  git?: GitArchiver;
  logger?: Logger;
  registry?: ResolverRegistry;
  signal?: AbortSignal;
}

type TaskResult = { kind: "done"; outcome: InputOutcome; error: PrefetchError | null } | { kind: "cancelled" };

function summaryOf(input: PackageInput, report: ComponentReport | null, status: EcosystemSummary["status"], error?: PrefetchError): EcosystemSummary {
  return {
    ecosystem: input.type,
    packagePath: input.path,
    status,
    fetched: report?.entries.length ?? 0,
    failures: report?.failures ?? [],
    ...(error === undefined ? {} : { error: { code: error.code, message: error.message } }),
  };
}

/**
 * Runs every package input of a request and merges the results.
 * All inputs finish before failures are raised together.
 */
export async function run(request: PrefetchRequest, dependencies: RunDependencies): Promise<RequestOutput> {
  const { config, signal } = dependencies;
  const logger = dependencies.logger ?? createLogger();
  const registry = dependencies.registry ?? createDefaultResolverRegistry();
  const fetchImpl = dependencies.fetchImpl ?? defaultFetch;

  if (signal?.aborted === true) {
    throw new CancelledError();
  }

  const cacheRoot = config.cacheDir ?? path.join(request.outputDir, "cache");
  const cache = await openCache(cacheRoot);
  logger.debug(`cache at ${cacheRoot}`);

  try {
    const results = await Promise.all(
      request.packages.map((input) => runInput(input, request, { config, cache, fetchImpl, git: dependencies.git, logger, registry, signal })),
    );

    if (signal?.aborted === true || results.some((result) => result.kind === "cancelled")) {
      throw new CancelledError();
    }

    const outcomes: InputOutcome[] = [];
    const failures: EcosystemFailure[] = [];
    for (const result of results) {
      if (result.kind !== "done") {
        continue;
      }
      outcomes.push(result.outcome);
      if (result.error !== null) {
        failures.push({ ecosystem: result.outcome.input.type, packagePath: result.outcome.input.path, error: result.error });
      }
    }

    const merged = mergeOutcomes(outcomes);
    let output = merged.output;
    if (merged.conflicts.length > 0) {
      const conflicted = new Map<PackageInput, PrefetchError>();
      for (const conflict of merged.conflicts) {
        if (!conflicted.has(conflict.input)) {
          conflicted.set(conflict.input, conflict.error);
        }
      }
      output = {
        ...output,
        summaries: outcomes.map((outcome) => {
          const error = conflicted.get(outcome.input);
          return error === undefined ? outcome.summary : summaryOf(outcome.input, outcome.report, "failed", error);
        }),
      };
      for (const conflict of merged.conflicts) {
        failures.push({ ecosystem: conflict.input.type, packagePath: conflict.input.path, error: conflict.error });
      }
    }

    const written = await writeRequestOutput(request.outputDir, output);
    logger.debug(`wrote ${written}`);

    if (failures.length > 0) {
      for (const failure of failures) {
        logger.error(`${failure.ecosystem} (${failure.packagePath}): ${failure.error.message.split("\n")[0] ?? ""}`);
      }
      throw new OrchestratorError(failures, output);
    }

    logger.success(`Prefetched ${output.components.length} components for ${request.packages.length} package input(s)`);
    return output;
  } finally {
    await cache.close();
  }
}

interface InputContext {
  config: PrefetchConfig;
  cache: CacheHandle;
  fetchImpl: FetchLike;
  git: GitArchiver | undefined;
  logger: Logger;
  registry: ResolverRegistry;
  signal: AbortSignal | undefined;
}

async function runInput(input: PackageInput, request: PrefetchRequest, context: InputContext): Promise<TaskResult> {
  const logger = context.logger.child(input.type);
  const resolver = context.registry.get(input.type);
  if (resolver === undefined) {
    const error = new PrefetchError("UNSUPPORTED_ECOSYSTEM", `No resolver is registered for ${input.type}`);
    return { kind: "done", outcome: { input, summary: summaryOf(input, null, "failed", error), report: null }, error };
  }

  const projectDir = path.join(request.sourceDir, input.path);

  try {
    if (!input.force && !(await resolver.applies(projectDir))) {
      logger.info(`nothing to prefetch in ${input.path}`);
      return { kind: "done", outcome: { input, summary: summaryOf(input, null, "skipped"), report: null }, error: null };
    }

    const resolverContext = {
      sourceDir: request.sourceDir,
      outputDir: request.outputDir,
      mode: request.mode,
      flags: request.flags,
      config: context.config,
      cache: context.cache,
      fetchImpl: context.fetchImpl,
      git: context.git,
      logger,
      signal: context.signal,
    };
    const graph = await resolver.resolve(projectDir, input, resolverContext);
    const report = await resolver.fetchAll(graph, resolverContext);
    return { kind: "done", outcome: { input, summary: summaryOf(input, report, "complete"), report }, error: null };
  } catch (error) {
    if (error instanceof CancelledError) {
      return { kind: "cancelled" };
    }
    if (error instanceof PartialFetchError) {
      return { kind: "done", outcome: { input, summary: summaryOf(input, error.report, "partial"), report: error.report }, error };
    }
    const normalized = toPrefetchError(error);
    return { kind: "done", outcome: { input, summary: summaryOf(input, null, "failed", normalized), report: null }, error: normalized };
  }
}
