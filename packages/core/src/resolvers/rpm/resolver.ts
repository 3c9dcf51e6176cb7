import { createHash } from "node:crypto";
import path from "node:path";

import { OUTPUT_DIR_PLACEHOLDER, type ComponentReport, type DnfRepoOptions, type PackageInput, type SslOptions } from "@prefetch/types";

import { ResolutionError } from "../../errors.js";
import { createTlsTransport, type TlsTransport } from "../../fetch/index.js";
import { DependencyGraph, type DependencyNodeInput } from "../../graph/index.js";
import { parseDigest } from "../../integrity/index.js";
import { formatPurl } from "../../purl.js";
import { assertInputType, fileExists, policyFor, readTextFile, safeFileName } from "../common.js";
import { fetchGraph } from "../fetch-graph.js";
import type { EcosystemResolver, ResolverContext } from "../types.js";
import { parseNevra, parseRpmLock, type RpmLockItem } from "./lockfile.js";

const LOCKFILE = "rpms.lock.yaml";
const REPO_SEGMENT_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:-]*$/;

function assertRepoSegment(value: string, what: string): void {
  if (!REPO_SEGMENT_PATTERN.test(value)) {
    throw new ResolutionError(`Invalid ${what} ${JSON.stringify(value)} in ${LOCKFILE}`);
  }
}

/** Generated id for items without a repoid, stable per repository location. */
export function defaultRepoid(url: string): string {
  const directory = url.slice(0, url.lastIndexOf("/"));
  return `prefetch-${createHash("sha256").update(directory).digest("hex").slice(0, 6)}`;
}

function renderOption(value: string | number | boolean): string {
  if (typeof value === "boolean") {
    return value ? "1" : "0";
  }
  return String(value);
}

/**
 * dnf repository file for one arch: one section per repoid, pointing at the fetched directory.
 */
export function renderRepoFile(arch: string, repoids: readonly string[], dnf: Record<string, DnfRepoOptions> | null): string {
  const sections = [...repoids].sort().map((repoid) => {
    const lines = [
      `[${repoid}]`,
      `name=Packages from ${repoid}`,
      `baseurl=file://${OUTPUT_DIR_PLACEHOLDER}/deps/rpm/${arch}/${repoid}`,
    ];
    const options = dnf?.[repoid] ?? {};
    for (const key of Object.keys(options).sort()) {
      const value = options[key];
      if (value !== undefined && key !== "name" && key !== "baseurl") {
        lines.push(`${key}=${renderOption(value)}`);
      }
    }
    return lines.join("\n");
  });
  return `${sections.join("\n\n")}\n`;
}

export interface RpmResolverOptions {
  /** Transport for inputs with `options.ssl`; an undici agent with the client certificate by default */
  createTransport?: (ssl: SslOptions) => Promise<TlsTransport>;
}

/**
 * rpms.lock.yaml, per arch and repoid, over client certificates when configured.
 */
export class RpmResolver implements EcosystemResolver {
  readonly ecosystem = "rpm" as const;
  private readonly sslByGraph = new WeakMap<DependencyGraph, SslOptions>();
  private readonly createTransport: (ssl: SslOptions) => Promise<TlsTransport>;

  constructor(options: RpmResolverOptions = {}) {
    this.createTransport = options.createTransport ?? createTlsTransport;
  }

  async applies(projectDir: string): Promise<boolean> {
    return fileExists(path.join(projectDir, LOCKFILE));
  }

  async resolve(projectDir: string, input: PackageInput, context: ResolverContext): Promise<DependencyGraph> {
    assertInputType(input, "rpm");

    const lock = parseRpmLock(await readTextFile(path.join(projectDir, LOCKFILE), LOCKFILE));
    const graph = new DependencyGraph("rpm", input.path);
    const allowed = input.arches === null ? null : new Set(input.arches);

    for (const { arch, items } of lock.arches) {
      if (allowed !== null && !allowed.has(arch)) {
        context.logger.debug(`rpm: skipping arch ${arch}`);
        continue;
      }
      assertRepoSegment(arch, "arch");
      const repoids = new Set<string>();
      for (const item of items) {
        const repoid = item.repoid ?? defaultRepoid(item.url);
        assertRepoSegment(repoid, "repoid");
        repoids.add(repoid);
        const node = graph.add(this.toNode(item, arch, repoid, lock.lockfileVendor, context));
        graph.markRoot(node.key);
      }
      graph.addProjectFile(
        `${OUTPUT_DIR_PLACEHOLDER}/deps/rpm/${arch}/repos.d/prefetch.repo`,
        renderRepoFile(arch, [...repoids], input.options?.dnf ?? null),
      );
    }

    const ssl = input.options?.ssl ?? null;
    if (ssl !== null) {
      this.sslByGraph.set(graph, ssl);
    }

    context.logger.debug(`rpm: ${graph.size} packages`);
    return graph;
  }

  async fetchAll(graph: DependencyGraph, context: ResolverContext): Promise<ComponentReport> {
    const ssl = this.sslByGraph.get(graph);
    if (ssl === undefined) {
      return fetchGraph(graph, context);
    }

    const transport = await this.createTransport(ssl);
    try {
      return await fetchGraph(graph, context, { fetchImpl: transport.fetchImpl });
    } finally {
      await transport.close();
    }
  }

  private toNode(item: RpmLockItem, arch: string, repoid: string, vendor: string, context: ResolverContext): DependencyNodeInput {
    const fileName = safeFileName(decodeURIComponent(new URL(item.url).pathname.split("/").pop() ?? ""));
    const nevra = parseNevra(fileName);
    const digests = item.checksum === null ? [] : parseDigest(item.checksum);
    const version = `${nevra.version}-${nevra.release}`;

    return {
      key: `${arch}/${repoid}/${fileName}`,
      name: nevra.name,
      version,
      purl: formatPurl({
        type: "rpm",
        namespace: vendor,
        name: nevra.name,
        version,
        qualifiers: { arch: nevra.arch, repository_id: repoid },
      }),
      origin: { kind: "registry", location: item.url.slice(0, item.url.lastIndexOf("/") + 1) },
      scope: "runtime",
      role: "direct",
      artifacts: [
        {
          url: item.url,
          fileName: `${arch}/${repoid}/${fileName}`,
          digests,
          policy: policyFor(context.mode, digests.length > 0),
        },
      ],
      properties: { "rpm:arch": arch, "rpm:kind": item.kind },
    };
  }
}
