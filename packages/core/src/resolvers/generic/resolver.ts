import path from "node:path";

import { isPlainObject, type PackageInput } from "@prefetch/types";
import YAML from "yaml";

import { ResolutionError } from "../../errors.js";
import { DependencyGraph } from "../../graph/index.js";
import { formatDigest, parseDigest } from "../../integrity/index.js";
import { formatPurl } from "../../purl.js";
import { isInside } from "../../request/index.js";
import { assertInputType, fileExists, readTextFile, safeFileName } from "../common.js";
import { fetchGraph } from "../fetch-graph.js";
import type { EcosystemResolver, ResolverContext } from "../types.js";

export const DEFAULT_GENERIC_LOCKFILE = "artifacts.lock.yaml";

export interface GenericArtifact {
  downloadUrl: string;
  checksum: string;
  filename: string;
}

export function parseArtifactsLock(text: string): GenericArtifact[] {
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    throw new ResolutionError("Artifacts lockfile is not valid YAML", { cause: error });
  }
  if (!isPlainObject(document) || !Array.isArray(document["artifacts"])) {
    throw new ResolutionError("Artifacts lockfile needs an artifacts list");
  }

  const seen = new Set<string>();
  return document["artifacts"].map((item: unknown, index: number) => {
    if (!isPlainObject(item) || typeof item["download_url"] !== "string" || typeof item["checksum"] !== "string") {
      throw new ResolutionError(`artifacts[${index}] needs download_url and checksum`);
    }
    const downloadUrl = item["download_url"];
    const explicit = item["filename"];
    if (explicit !== undefined && typeof explicit !== "string") {
      throw new ResolutionError(`artifacts[${index}].filename must be a string`);
    }
    const filename = safeFileName(explicit ?? decodeURIComponent(new URL(downloadUrl).pathname.split("/").pop() ?? ""));
    if (seen.has(filename)) {
      throw new ResolutionError(`Two artifacts would be saved as ${filename}`, {
        suggestion: "Give one of them an explicit filename.",
      });
    }
    seen.add(filename);
    return { downloadUrl, checksum: item["checksum"], filename };
  });
}

/**
 * Arbitrary files pinned by URL and checksum.
 */
export class GenericResolver implements EcosystemResolver {
  readonly ecosystem = "generic" as const;

  async applies(projectDir: string): Promise<boolean> {
    return fileExists(path.join(projectDir, DEFAULT_GENERIC_LOCKFILE));
  }

  async resolve(projectDir: string, input: PackageInput, context: ResolverContext): Promise<DependencyGraph> {
    assertInputType(input, "generic");

    const lockPath = path.resolve(projectDir, input.lockfile);
    if (!isInside(context.sourceDir, lockPath)) {
      throw new ResolutionError(`Artifacts lockfile ${input.lockfile} is outside the source directory`);
    }

    const artifacts = parseArtifactsLock(await readTextFile(lockPath, "artifacts lockfile"));
    const graph = new DependencyGraph("generic", input.path);

    for (const artifact of artifacts) {
      const digests = parseDigest(artifact.checksum);
      const [digest] = digests;
      if (digest === undefined) {
        throw new ResolutionError(`No digest in checksum ${artifact.checksum}`);
      }
      const node = graph.add({
        key: artifact.filename,
        name: artifact.filename,
        version: "",
        purl: formatPurl({
          type: "generic",
          name: artifact.filename,
          qualifiers: { checksum: formatDigest(digest), download_url: artifact.downloadUrl },
        }),
        origin: { kind: "url", location: artifact.downloadUrl },
        scope: "runtime",
        role: "direct",
        artifacts: [{ url: artifact.downloadUrl, fileName: artifact.filename, digests, policy: "reject" }],
      });
      graph.markRoot(node.key);
    }

    context.logger.debug(`generic: ${graph.size} artifacts`);
    return graph;
  }

  fetchAll(graph: DependencyGraph, context: ResolverContext) {
    return fetchGraph(graph, context);
  }
}
