import path from "node:path";

import { OUTPUT_DIR_PLACEHOLDER, type PackageInput, type PackageInputOf } from "@prefetch/types";
import pLimit from "p-limit";

import { ResolutionError } from "../../errors.js";
import { DependencyGraph, type ArtifactSpec, type DependencyNodeInput } from "../../graph/index.js";
import { createDigest, formatDigest, sameDigest, type Digest } from "../../integrity/index.js";
import { normalizePypiName, pypiPurl } from "../../purl.js";
import {
  anyFileExists,
  assertInputType,
  commitPinnedArchive,
  fileExists,
  policyFor,
  safeFileName,
} from "../common.js";
import { fetchGraph } from "../fetch-graph.js";
import type { EcosystemResolver, ResolverContext } from "../types.js";
import { fetchReleaseFiles, indexBase, pickSdist, type DistributionFile } from "./metadata.js";
import { loadRequirementsFiles, type Requirement, type RequirementsFile } from "./requirements.js";

const DETECTION_FILES = ["requirements.txt", "requirements-build.txt", "pyproject.toml", "setup.py"] as const;
const BUILD_PROPERTY = "pip:build-dependency";
const YANKED_PROPERTY = "pip:yanked";

interface Selected {
  requirement: Requirement;
  normalized: string;
  build: boolean;
}

interface Planned {
  selected: Selected;
  input: DependencyNodeInput;
  /** Replacement requirement line for direct references */
  rewrite: string | null;
}

async function defaultFiles(projectDir: string, explicit: string[] | null, fallback: string): Promise<string[]> {
  if (explicit !== null) {
    return explicit;
  }
  return (await fileExists(path.join(projectDir, fallback))) ? [fallback] : [];
}

function splitVcsReference(url: string): { remote: string; ref: string | undefined } {
  const withoutFragment = url.replace(/#.*$/, "").replace(/^git\+/, "");
  const at = withoutFragment.lastIndexOf("@");
  const schemeEnd = withoutFragment.indexOf("://") + 3;
  const pathStart = withoutFragment.indexOf("/", schemeEnd);
  if (at > pathStart && pathStart > 0) {
    return { remote: withoutFragment.slice(0, at), ref: withoutFragment.slice(at + 1) };
  }
  return { remote: withoutFragment, ref: undefined };
}

function fragmentDigests(url: string): Digest[] {
  const hashIndex = url.indexOf("#");
  if (hashIndex < 0) {
    return [];
  }
  const digests: Digest[] = [];
  for (const [key, value] of new URLSearchParams(url.slice(hashIndex + 1))) {
    if (key === "sha256" || key === "sha384" || key === "sha512" || key === "sha1") {
      digests.push(createDigest(key, value));
    }
  }
  return digests;
}

/**
 * pip requirements files, pinned and optionally hashed (pip-compile output).
 */
export class PipResolver implements EcosystemResolver {
  readonly ecosystem = "pip" as const;

  async applies(projectDir: string): Promise<boolean> {
    return anyFileExists(projectDir, DETECTION_FILES);
  }

  async resolve(projectDir: string, input: PackageInput, context: ResolverContext): Promise<DependencyGraph> {
    assertInputType(input, "pip");
    const logger = context.logger.child("pip");

    const runtimeFiles = await defaultFiles(projectDir, input.requirementsFiles, "requirements.txt");
    const buildFiles = await defaultFiles(projectDir, input.requirementsBuildFiles, "requirements-build.txt");
    if (runtimeFiles.length === 0 && buildFiles.length === 0) {
      throw new ResolutionError(`No requirements files in ${projectDir}`, {
        suggestion: "Generate pinned requirements, e.g. with `pip-compile --generate-hashes`, and list them in requirementsFiles.",
      });
    }

    const seen = new Set<string>();
    const runtime = await this.load(projectDir, runtimeFiles, context.sourceDir, seen);
    const build = await this.load(projectDir, buildFiles, context.sourceDir, seen);
    const allFiles = [...runtime, ...build];

    for (const file of allFiles) {
      for (const option of file.ignoredOptions) {
        logger.debug(`${path.basename(file.path)}: ignoring ${option}`);
      }
      for (const constraint of file.constraints) {
        logger.warn(`${path.basename(file.path)}: constraints file ${constraint} is ignored; pins come from requirements`);
      }
    }

    const indexUrls = new Set(allFiles.flatMap((file) => (file.indexUrl === null ? [] : [file.indexUrl])));
    if (indexUrls.size > 1) {
      throw new ResolutionError(`Requirements files name different indexes: ${[...indexUrls].join(", ")}`);
    }
    const [indexUrl] = indexUrls;
    const base = indexBase(indexUrl ?? context.config.registries.pypi);
    const requireHashes = allFiles.some((file) => file.requireHashes);

    const selected = this.select(runtime, build, input, logger);
    const limit = pLimit(context.config.concurrency);
    const planned = await Promise.all(
      selected.map((item) => limit(() => this.plan(item, input, base, requireHashes, context))),
    );

    const graph = new DependencyGraph("pip", input.path);
    const keyByName = new Map<string, string>();
    for (const plan of planned) {
      const node = graph.add(plan.input);
      keyByName.set(plan.selected.normalized, node.key);
    }

    for (const plan of planned) {
      for (const parent of plan.selected.requirement.via) {
        if (parent.startsWith("-r") || parent.startsWith("-c")) {
          continue;
        }
        const parentKey = keyByName.get(normalizePypiName(parent.split(/\s/)[0] ?? parent));
        if (parentKey !== undefined && parentKey !== plan.input.key) {
          graph.addEdge(parentKey, plan.input.key);
        }
      }
    }
    for (const plan of planned) {
      if (plan.input.role === "direct") {
        graph.markRoot(plan.input.key);
      }
    }

    this.addRewrittenFiles(graph, allFiles, planned);
    graph.setEnvironment("PIP_FIND_LINKS", "deps/pip", "path");
    graph.setEnvironment("PIP_NO_INDEX", "true");

    logger.debug(`resolved ${graph.size} requirements against ${base}`);
    return graph;
  }

  fetchAll(graph: DependencyGraph, context: ResolverContext) {
    return fetchGraph(graph, context);
  }

  private async load(projectDir: string, files: readonly string[], sourceDir: string, seen: Set<string>): Promise<RequirementsFile[]> {
    const loaded: RequirementsFile[] = [];
    for (const file of files) {
      loaded.push(...(await loadRequirementsFiles(path.resolve(projectDir, file), sourceDir, seen)));
    }
    return loaded;
  }

  /**
   * Applies markers and merges requirements named in several files.
   */
  private select(
    runtime: readonly RequirementsFile[],
    build: readonly RequirementsFile[],
    input: PackageInputOf<"pip">,
    logger: ResolverContext["logger"],
  ): Selected[] {
    const byName = new Map<string, Selected>();

    const visit = (files: readonly RequirementsFile[], isBuild: boolean): void => {
      for (const file of files) {
        for (const requirement of file.requirements) {
          if (requirement.marker !== null && input.environment !== null) {
            if (requirement.marker.evaluate(input.environment, []) === false) {
              logger.debug(`skipping ${requirement.name}: marker "${requirement.marker.source}" does not match`);
              continue;
            }
          }

          const normalized = normalizePypiName(requirement.name);
          const existing = byName.get(normalized);
          if (existing === undefined) {
            byName.set(normalized, { requirement, normalized, build: isBuild });
            continue;
          }
          if (existing.requirement.version !== requirement.version || existing.requirement.url !== requirement.url) {
            throw new ResolutionError(
              `Conflicting requirements for ${requirement.name}: ${describe(existing.requirement)} and ${describe(requirement)}`,
            );
          }
          existing.requirement.via.push(...requirement.via);
          if (!isBuild) {
            existing.build = false;
          }
        }
      }
    };

    visit(runtime, false);
    visit(build, true);
    return [...byName.values()];
  }

  private async plan(
    selected: Selected,
    input: PackageInputOf<"pip">,
    base: string,
    requireHashes: boolean,
    context: ResolverContext,
  ): Promise<Planned> {
    const { requirement, normalized } = selected;
    const direct = requirement.via.length === 0 || requirement.via.some((parent) => parent.startsWith("-r"));
    const properties: Record<string, string> = selected.build ? { [BUILD_PROPERTY]: "true" } : {};
    const common = {
      name: normalized,
      scope: "runtime" as const,
      role: direct ? ("direct" as const) : ("transitive" as const),
      properties,
    };

    if (requireHashes && requirement.hashes.length === 0 && requirement.url === null) {
      throw new ResolutionError(`${requirement.name} has no --hash while --require-hashes is in effect`);
    }

    if (requirement.url !== null) {
      return this.planDirectReference(selected, common, context);
    }

    if (requirement.version === null) {
      throw new ResolutionError(`${requirement.name}${requirement.specifier} is not pinned with ==`, {
        suggestion: "Pin every requirement, e.g. with `pip-compile`.",
      });
    }

    const version = requirement.version;
    const files = await fetchReleaseFiles(base, normalized, version, context);
    const artifacts = this.chooseArtifacts(requirement, files, input.allowBinary);
    // pip still installs yanked files pinned with ==
    const yanked = files.filter((file) => file.yanked && artifacts.some((artifact) => artifact.url === file.url));
    for (const file of yanked) {
      context.logger.warn(`${file.filename} has been yanked from ${base}`);
    }
    if (yanked.length > 0) {
      properties[YANKED_PROPERTY] = "true";
    }

    return {
      selected,
      input: {
        ...common,
        key: `${normalized}==${version}`,
        version,
        purl: pypiPurl(normalized, version),
        origin: { kind: "registry", location: base },
        artifacts,
      },
      rewrite: null,
    };
  }

  private chooseArtifacts(requirement: Requirement, files: readonly DistributionFile[], allowBinary: boolean): ArtifactSpec[] {
    const what = `${requirement.name}==${requirement.version ?? ""}`;
    const hashed = requirement.hashes.length > 0;

    const accepted = (file: DistributionFile): Digest | null => {
      if (file.sha256 === null) {
        return null;
      }
      const digest = createDigest("sha256", file.sha256);
      if (hashed && !requirement.hashes.some((declared) => sameDigest(declared, digest))) {
        return null;
      }
      return digest;
    };

    const chosen: { file: DistributionFile; digest: Digest }[] = [];
    const sdist = pickSdist(files);
    if (sdist !== null) {
      const digest = accepted(sdist);
      if (digest === null) {
        throw new ResolutionError(
          sdist.sha256 === null
            ? `The index declares no sha256 for ${sdist.filename}`
            : `${sdist.filename} (sha256:${sdist.sha256}) is not among the --hash values of ${what}`,
        );
      }
      chosen.push({ file: sdist, digest });
    } else if (!allowBinary) {
      throw new ResolutionError(`${what} has no source distribution`, {
        suggestion: "Set allowBinary to fetch wheels.",
      });
    }

    if (allowBinary) {
      const wheels = files
        .filter((file) => file.kind === "wheel")
        .sort((left, right) => (left.filename < right.filename ? -1 : left.filename > right.filename ? 1 : 0));
      for (const wheel of wheels) {
        const digest = accepted(wheel);
        if (digest !== null) {
          chosen.push({ file: wheel, digest });
        }
      }
    }

    if (chosen.length === 0) {
      throw new ResolutionError(`No distribution of ${what} matches its declared hashes`);
    }

    return chosen.map(({ file, digest }): ArtifactSpec => ({
      url: file.url,
      fileName: safeFileName(file.filename),
      digests: [digest],
      policy: "reject",
    }));
  }

  private planDirectReference(
    selected: Selected,
    common: Pick<DependencyNodeInput, "name" | "scope" | "role" | "properties">,
    context: ResolverContext,
  ): Planned {
    const { requirement, normalized } = selected;
    const url = requirement.url ?? "";

    if (url.startsWith("git+")) {
      const { remote, ref } = splitVcsReference(url);
      const pinned = commitPinnedArchive(remote, ref, `pip requirement ${requirement.name}`);
      const vcsUrl = pinned.vcsUrl;
      const fileName = safeFileName(`${normalized}-gitcommit-${pinned.commit}.tar.gz`);
      return {
        selected,
        input: {
          ...common,
          key: `${normalized}@${vcsUrl}`,
          version: "",
          purl: pypiPurl(normalized, "", { vcs_url: vcsUrl }),
          origin: { kind: "vcs", location: vcsUrl },
          artifacts: [{ url: pinned.url, fileName, digests: [], policy: "trust-on-first-use", git: pinned.git }],
        },
        rewrite: rewrittenLine(requirement, fileName, []),
      };
    }

    if (!/^https?:\/\//.test(url)) {
      throw new ResolutionError(`Unsupported direct reference for ${requirement.name}: ${url}`);
    }

    const digests = [...fragmentDigests(url), ...requirement.hashes];
    const downloadUrl = url.replace(/#.*$/, "");
    const basename = decodeURIComponent(new URL(downloadUrl).pathname.split("/").pop() ?? "");
    // URLs of different packages may share a basename, e.g. archive/v1.0.tar.gz
    const fileName = safeFileName(basename.length > 0 ? `${normalized}-${basename}` : `${normalized}.tar.gz`);
    const primary = digests[0];

    return {
      selected,
      input: {
        ...common,
        key: `${normalized}@${downloadUrl}`,
        version: "",
        purl: pypiPurl(normalized, "", {
          download_url: downloadUrl,
          checksum: primary === undefined ? undefined : formatDigest(primary),
        }),
        origin: { kind: "url", location: downloadUrl },
        artifacts: [{ url: downloadUrl, fileName, digests, policy: policyFor(context.mode, digests.length > 0) }],
      },
      rewrite: rewrittenLine(requirement, fileName, requirement.hashes),
    };
  }

  private addRewrittenFiles(graph: DependencyGraph, files: readonly RequirementsFile[], planned: readonly Planned[]): void {
    for (const file of files) {
      const replacements = planned.filter((plan) => plan.rewrite !== null && plan.selected.requirement.file === file.path);
      if (replacements.length === 0) {
        continue;
      }
      const lines = [...file.lines];
      for (const plan of [...replacements].sort((left, right) => right.selected.requirement.lines.start - left.selected.requirement.lines.start)) {
        const { start, end } = plan.selected.requirement.lines;
        lines.splice(start, end - start + 1, plan.rewrite ?? "");
      }
      graph.addProjectFile(file.path, lines.join("\n"));
    }
  }
}

function describe(requirement: Requirement): string {
  return requirement.url ?? (requirement.specifier.length > 0 ? requirement.specifier : "(unpinned)");
}

function rewrittenLine(requirement: Requirement, fileName: string, hashes: readonly Digest[]): string {
  const extras = requirement.extras.length > 0 ? `[${requirement.extras.join(",")}]` : "";
  const marker = requirement.marker === null ? "" : ` ; ${requirement.marker.source}`;
  const hashOptions = hashes.map((digest) => ` \\\n    --hash=${formatDigest(digest)}`).join("");
  return `${requirement.name}${extras} @ file://${OUTPUT_DIR_PLACEHOLDER}/deps/pip/${fileName}${marker}${hashOptions}`;
}

