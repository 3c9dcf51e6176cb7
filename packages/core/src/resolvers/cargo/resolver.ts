import { cp, mkdir, readdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { isPlainObject, OUTPUT_DIR_PLACEHOLDER, type ComponentReport, type ComponentReportEntry, type PackageInput } from "@prefetch/types";
import { parse as parseToml, stringify as stringifyToml } from "smol-toml";
import * as tar from "tar";

import { PartialFetchError, ResolutionError } from "../../errors.js";
import { DependencyGraph, type DependencyNodeInput } from "../../graph/index.js";
import { createDigest } from "../../integrity/index.js";
import { formatPurl } from "../../purl.js";
import { assertInputType, commitPinnedArchive, fileExists, policyFor, readTextFile, safeFileName } from "../common.js";
import { depsDirectory, fetchGraph } from "../fetch-graph.js";
import type { EcosystemResolver, FetchedArtifact, ResolverContext } from "../types.js";
import { parseCargoLock, parseCargoSource, parseDependencyReference, type CargoPackage } from "./lockfile.js";

const VENDOR_DIR = "vendor";
const CHECKOUT_DIR = "git";
const CHECKOUT_PROPERTY = "cargo:checkout";
const CHECKSUM_PROPERTY = "cargo:checksum";
const SKIPPED_DIRECTORIES = new Set([".git", "target"]);

export function cratePurl(name: string, version: string, qualifiers?: Record<string, string>): string {
  return formatPurl({ type: "cargo", name, version, qualifiers });
}

function vendorDirectory(outputDir: string, name: string, version: string): string {
  return path.join(depsDirectory(outputDir, "cargo"), VENDOR_DIR, `${name}-${version}`);
}

async function writeChecksumFile(directory: string, checksum: string | null): Promise<void> {
  await writeFile(path.join(directory, ".cargo-checksum.json"), `${JSON.stringify({ files: {}, package: checksum })}\n`);
}

/**
 * Cargo.lock with crates.io and git sources, vendored for `cargo --offline`.
 */
export class CargoResolver implements EcosystemResolver {
  readonly ecosystem = "cargo" as const;

  async applies(projectDir: string): Promise<boolean> {
    return fileExists(path.join(projectDir, "Cargo.lock"));
  }

  async resolve(projectDir: string, input: PackageInput, context: ResolverContext): Promise<DependencyGraph> {
    assertInputType(input, "cargo");

    const lock = parseCargoLock(await readTextFile(path.join(projectDir, "Cargo.lock"), "Cargo.lock"));
    const rootName = await readRootPackageName(projectDir);
    const graph = new DependencyGraph("cargo", input.path);

    const members = lock.packages.filter((pkg) => pkg.source === null);
    const directNames = new Set(members.flatMap((pkg) => pkg.dependencies.map((reference) => parseDependencyReference(reference).name)));
    const keyOf = new Map<CargoPackage, string>();
    const gitSources = new Map<string, { url: string; query: URLSearchParams }>();

    for (const pkg of lock.packages) {
      if (pkg.source === null && pkg.name === rootName) {
        continue;
      }
      const node = graph.add(this.toNode(pkg, context, directNames.has(pkg.name), gitSources));
      keyOf.set(pkg, node.key);
    }

    for (const pkg of lock.packages) {
      const fromKey = keyOf.get(pkg);
      for (const reference of pkg.dependencies) {
        const target = findPackage(lock.packages, reference);
        const toKey = target === undefined ? undefined : keyOf.get(target);
        if (toKey === undefined) {
          continue;
        }
        if (fromKey === undefined) {
          graph.markRoot(toKey);
        } else if (fromKey !== toKey) {
          graph.addEdge(fromKey, toKey);
        }
      }
    }
    for (const member of members) {
      const key = keyOf.get(member);
      if (key !== undefined) {
        graph.markRoot(key);
      }
    }

    const configPath = path.join(projectDir, ".cargo", "config.toml");
    graph.addProjectFile(configPath, await mergedCargoConfig(configPath, gitSources));

    context.logger.debug(`cargo: ${graph.size} packages from Cargo.lock v${lock.version}`);
    return graph;
  }

  async fetchAll(graph: DependencyGraph, context: ResolverContext): Promise<ComponentReport> {
    try {
      const report = await fetchGraph(graph, context, { afterArtifact: unpackArtifact });
      await vendorGitCrates(report.entries, context.outputDir);
      return report;
    } catch (error) {
      if (error instanceof PartialFetchError) {
        await vendorGitCrates(error.report.entries, context.outputDir);
      }
      throw error;
    }
  }

  private toNode(
    pkg: CargoPackage,
    context: ResolverContext,
    isDirect: boolean,
    gitSources: Map<string, { url: string; query: URLSearchParams }>,
  ): DependencyNodeInput {
    const role = isDirect ? "direct" : "transitive";

    if (pkg.source === null) {
      return {
        key: `${pkg.name}@${pkg.version}:local`,
        name: pkg.name,
        version: pkg.version,
        purl: cratePurl(pkg.name, pkg.version),
        origin: { kind: "local", location: "." },
        scope: "runtime",
        role,
        artifacts: [],
      };
    }

    const source = parseCargoSource(pkg.source);

    if (source.kind === "other") {
      throw new ResolutionError(`${pkg.name} ${pkg.version} comes from ${source.value}, which is not supported`, {
        suggestion: "Only crates.io and git sources can be fetched.",
      });
    }

    if (source.kind === "git") {
      const pinned = commitPinnedArchive(source.url, source.commit, `crate ${pkg.name}`);
      const vcsUrl = pinned.vcsUrl;
      const checkout = `${pinned.repository.repo}-${pinned.commit}`;
      gitSources.set(source.sourceId, { url: source.url, query: source.query });
      return {
        key: `${pkg.name}@${pkg.version}+${vcsUrl}`,
        name: pkg.name,
        version: pkg.version,
        purl: cratePurl(pkg.name, pkg.version, { vcs_url: vcsUrl }),
        origin: { kind: "vcs", location: vcsUrl },
        scope: "runtime",
        role,
        artifacts: [
          {
            url: pinned.url,
            fileName: safeFileName(`${checkout}.tar.gz`),
            identity: vcsUrl,
            digests: [],
            policy: "trust-on-first-use",
            git: pinned.git,
          },
        ],
        properties: { [CHECKOUT_PROPERTY]: checkout },
      };
    }

    const digests = pkg.checksum === null ? [] : [createDigest("sha256", pkg.checksum)];
    const base = context.config.registries.cratesDownload;
    return {
      key: `${pkg.name}@${pkg.version}`,
      name: pkg.name,
      version: pkg.version,
      purl: cratePurl(pkg.name, pkg.version),
      origin: { kind: "registry", location: base },
      scope: "runtime",
      role,
      artifacts: [
        {
          url: `${base}/${pkg.name}/${pkg.name}-${pkg.version}.crate`,
          fileName: safeFileName(`${pkg.name}-${pkg.version}.crate`),
          digests,
          policy: policyFor(context.mode, digests.length > 0),
        },
      ],
      properties: pkg.checksum === null ? {} : { [CHECKSUM_PROPERTY]: pkg.checksum },
    };
  }
}

function findPackage(packages: readonly CargoPackage[], reference: string): CargoPackage | undefined {
  const { name, version } = parseDependencyReference(reference);
  return packages.find((pkg) => pkg.name === name && (version === null || pkg.version === version));
}

async function readRootPackageName(projectDir: string): Promise<string | null> {
  const manifestPath = path.join(projectDir, "Cargo.toml");
  if (!(await fileExists(manifestPath))) {
    return null;
  }
  const manifest = parseTomlFile(await readTextFile(manifestPath, "Cargo.toml"), manifestPath);
  const pkg = manifest["package"];
  return isPlainObject(pkg) && typeof pkg["name"] === "string" ? pkg["name"] : null;
}

function parseTomlFile(text: string, filePath: string): Record<string, unknown> {
  try {
    return parseToml(text);
  } catch (error) {
    throw new ResolutionError(`${filePath} is not valid TOML`, { cause: error });
  }
}

/**
 * Project `.cargo/config.toml` with every used source replaced by the vendor directory.
 */
async function mergedCargoConfig(configPath: string, gitSources: ReadonlyMap<string, { url: string; query: URLSearchParams }>): Promise<string> {
  const config = (await fileExists(configPath)) ? parseTomlFile(await readTextFile(configPath, ".cargo/config.toml"), configPath) : {};
  const existingSources = config["source"];
  const sources: Record<string, unknown> = isPlainObject(existingSources) ? { ...existingSources } : {};

  sources["crates-io"] = { "replace-with": "vendored-sources" };
  for (const [sourceId, { url, query }] of [...gitSources].sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))) {
    const entry: Record<string, string> = { git: url };
    for (const key of ["branch", "tag", "rev"]) {
      const value = query.get(key);
      if (value !== null) {
        entry[key] = value;
      }
    }
    entry["replace-with"] = "vendored-sources";
    sources[sourceId] = entry;
  }
  sources["vendored-sources"] = { directory: `${OUTPUT_DIR_PLACEHOLDER}/deps/cargo/${VENDOR_DIR}` };

  return `${stringifyToml({ ...config, source: sources })}\n`;
}

async function unpackArtifact(fetched: FetchedArtifact, context: ResolverContext): Promise<void> {
  const base = depsDirectory(context.outputDir, "cargo");
  const checkout = fetched.node.properties[CHECKOUT_PROPERTY];

  if (checkout !== undefined) {
    const directory = path.join(base, CHECKOUT_DIR, checkout);
    await rm(directory, { recursive: true, force: true });
    await mkdir(directory, { recursive: true });
    await tar.x({ file: fetched.target, cwd: directory, strip: 1 });
    return;
  }

  const { name, version } = fetched.node;
  const target = vendorDirectory(context.outputDir, name, version);
  await rm(target, { recursive: true, force: true });
  await mkdir(target, { recursive: true });
  // .crate archives hold a single `<name>-<version>/` directory
  await tar.x({ file: fetched.target, cwd: target, strip: 1 });
  await writeChecksumFile(target, fetched.node.properties[CHECKSUM_PROPERTY] ?? null);
}

/**
 * Copies each git crate out of its unpacked checkout into the vendor directory.
 */
async function vendorGitCrates(entries: readonly ComponentReportEntry[], outputDir: string): Promise<void> {
  const base = depsDirectory(outputDir, "cargo");
  for (const entry of entries) {
    const checkout = entry.properties[CHECKOUT_PROPERTY];
    if (checkout === undefined) {
      continue;
    }
    const crateDir = await findCrateDirectory(path.join(base, CHECKOUT_DIR, checkout), entry.name);
    if (crateDir === null) {
      throw new ResolutionError(`Crate ${entry.name} was not found in ${checkout}`);
    }
    const target = vendorDirectory(outputDir, entry.name, entry.version);
    await rm(target, { recursive: true, force: true });
    await cp(crateDir, target, { recursive: true });
    await writeChecksumFile(target, null);
  }
}

async function findCrateDirectory(root: string, crateName: string): Promise<string | null> {
  const queue = [root];
  while (queue.length > 0) {
    const directory = queue.shift();
    if (directory === undefined) {
      break;
    }
    const entries = await readdir(directory, { withFileTypes: true });
    for (const entry of entries.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0))) {
      if (entry.isFile() && entry.name === "Cargo.toml") {
        const manifestPath = path.join(directory, entry.name);
        const manifest = parseTomlFile(await readTextFile(manifestPath, "Cargo.toml"), manifestPath);
        const pkg = manifest["package"];
        if (isPlainObject(pkg) && pkg["name"] === crateName) {
          return directory;
        }
      } else if (entry.isDirectory() && !SKIPPED_DIRECTORIES.has(entry.name)) {
        queue.push(path.join(directory, entry.name));
      }
    }
  }
  return null;
}
