import { createHash } from "node:crypto";
import { createWriteStream, promises as fs } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ReadableStream } from "node:stream/web";
import { pipeline } from "node:stream/promises";

import * as tar from "tar";
import * as yazl from "yazl";

import type { RequestFlag, RequestMode } from "@prefetch/types";

import { openCache, type CacheHandle } from "../src/cache/index.js";
import { DEFAULT_CONFIG, mergeConfig, type PrefetchConfig, type PrefetchConfigOverrides } from "../src/config/index.js";
import { FetchError } from "../src/errors.js";
import type { FetchInit, FetchLike, FetchResponse, GitArchiveRequest, GitArchiver } from "../src/fetch/index.js";
import { silentLogger, type Logger } from "../src/logging/logger.js";
import type { ResolverContext } from "../src/resolvers/index.js";

export async function makeTempDir(prefix = "prefetch-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFiles(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

export function sha256Hex(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

export function sha1Hex(content: string | Buffer): string {
  return createHash("sha1").update(content).digest("hex");
}

export function sha512Sri(content: string | Buffer): string {
  return `sha512-${createHash("sha512").update(content).digest("base64")}`;
}

/** Zip with the given entries, in order. */
export async function writeZip(target: string, entries: Record<string, string>): Promise<Buffer> {
  const zip = new yazl.ZipFile();
  for (const [name, content] of Object.entries(entries)) {
    zip.addBuffer(Buffer.from(content), name, { mtime: new Date("2024-01-01T00:00:00Z") });
  }
  zip.end();
  await fs.mkdir(path.dirname(target), { recursive: true });
  await pipeline(zip.outputStream, createWriteStream(target));
  return fs.readFile(target);
}

/** Gzipped tarball of `files` under a single top-level directory, like a forge archive. */
export async function makeTarball(topLevel: string, files: Record<string, string>): Promise<Buffer> {
  const staging = await makeTempDir("prefetch-tarball-");
  try {
    await writeFiles(path.join(staging, topLevel), files);
    const target = path.join(staging, "archive.tar.gz");
    await tar.c({ gzip: true, file: target, cwd: staging, portable: true }, [topLevel]);
    return await fs.readFile(target);
  } finally {
    await removeDir(staging);
  }
}

/** Retries without waiting, so transient failures resolve quickly. */
export function testConfig(overrides: PrefetchConfigOverrides = {}): PrefetchConfig {
  return mergeConfig(
    mergeConfig(DEFAULT_CONFIG, { retry: { attempts: 3, minTimeoutMs: 1, maxTimeoutMs: 2, factor: 1 }, requestTimeoutMs: 5_000 }),
    overrides,
  );
}

type Route = { status: number; body: Buffer; finalUrl?: string } | { error: Error };

interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
}

/**
 * In-memory registry standing in for the network.
 */
export class FakeRegistry {
  private readonly routes = new Map<string, Route[]>();
  readonly requests: RecordedRequest[] = [];

  serve(url: string, body: string | Buffer, finalUrl?: string): this {
    this.routes.set(url, [{ status: 200, body: Buffer.from(body), finalUrl }]);
    return this;
  }

  fail(url: string, status: number): this {
    this.routes.set(url, [{ status, body: Buffer.from(`HTTP ${status}`) }]);
    return this;
  }

  /** Responses served in order; the last one repeats. */
  sequence(url: string, responses: Route[]): this {
    this.routes.set(url, [...responses]);
    return this;
  }

  requestedUrls(): string[] {
    return this.requests.map((request) => request.url);
  }

  count(url: string): number {
    return this.requests.filter((request) => request.url === url).length;
  }

  readonly fetchImpl: FetchLike = async (url: string, init?: FetchInit): Promise<FetchResponse> => {
    this.requests.push({ url, headers: { ...init?.headers } });
    const queue = this.routes.get(url);
    const route = queue === undefined ? undefined : queue.length > 1 ? queue.shift() : queue[0];
    if (route === undefined) {
      return response(404, Buffer.from("not found"), url);
    }
    if ("error" in route) {
      throw route.error;
    }
    return response(route.status, route.body, route.finalUrl ?? url);
  };
}

function response(status: number, body: Buffer, url: string): FetchResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 404 ? "Not Found" : "",
    url,
    headers: { get: () => null },
    body: new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new Uint8Array(body));
        controller.close();
      },
    }),
    text: async () => body.toString("utf8"),
  };
}

/**
 * Serves fixed tarballs for `remote@commit` in place of the git executable.
 */
export class FakeGitArchiver implements GitArchiver {
  private readonly archives = new Map<string, Buffer>();
  readonly requests: Omit<GitArchiveRequest, "target" | "signal">[] = [];

  add(remote: string, commit: string, tarball: Buffer): this {
    this.archives.set(`${remote}@${commit}`, tarball);
    return this;
  }

  async archive(request: GitArchiveRequest): Promise<void> {
    this.requests.push({ remote: request.remote, commit: request.commit, prefix: request.prefix });
    const tarball = this.archives.get(`${request.remote}@${request.commit}`);
    if (tarball === undefined) {
      throw new FetchError(`git clone failed for ${request.remote}@${request.commit}: repository not found`, {
        kind: "permanent",
        url: request.remote,
      });
    }
    await fs.writeFile(request.target, tarball);
  }
}

export interface TestWorkspace {
  sourceDir: string;
  outputDir: string;
  cache: CacheHandle;
  registry: FakeRegistry;
  git: FakeGitArchiver;
  context(options?: { mode?: RequestMode; flags?: RequestFlag[]; config?: PrefetchConfig; logger?: Logger; signal?: AbortSignal }): ResolverContext;
  cleanup(): Promise<void>;
}

export async function createWorkspace(): Promise<TestWorkspace> {
  const root = await makeTempDir();
  const sourceDir = path.join(root, "source");
  const outputDir = path.join(root, "output");
  await fs.mkdir(sourceDir, { recursive: true });
  const cache = await openCache(path.join(outputDir, "cache"));
  const registry = new FakeRegistry();
  const git = new FakeGitArchiver();

  return {
    sourceDir,
    outputDir,
    cache,
    registry,
    git,
    context(options = {}) {
      return {
        sourceDir,
        outputDir,
        mode: options.mode ?? "strict",
        flags: new Set(options.flags ?? []),
        config: options.config ?? testConfig(),
        cache,
        fetchImpl: registry.fetchImpl,
        git,
        logger: options.logger ?? silentLogger,
        signal: options.signal,
      };
    },
    async cleanup() {
      await cache.close();
      await removeDir(root);
    },
  };
}
