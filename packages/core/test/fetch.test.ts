import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CancelledError, FetchError, IntegrityMismatchError, UnverifiableArtifactError } from "../src/errors.js";
import { fetchText, fetchToCache, type FetchContext } from "../src/fetch/index.js";
import { createDigest } from "../src/integrity/index.js";
import { createLogger, createMemorySink, type MemorySink } from "../src/logging/logger.js";
import { createWorkspace, sha256Hex, testConfig, type TestWorkspace } from "./helpers.js";

const URL_A = "https://registry.test/pkg/-/pkg-1.0.0.tgz";
const BODY = "tarball bytes\n";

describe("fetchToCache", () => {
  let workspace: TestWorkspace;
  let sink: MemorySink;
  let context: FetchContext;

  beforeEach(async () => {
    workspace = await createWorkspace();
    sink = createMemorySink();
    const config = testConfig({ auth: { "https://registry.test/": { token: "test-secret" } } });
    context = {
      cache: workspace.cache,
      fetchImpl: workspace.registry.fetchImpl,
      settings: config,
      logger: createLogger({ noColor: true, sink }),
    };
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  const declared = [createDigest("sha256", sha256Hex(BODY))];

  function request(digests = declared, url = URL_A) {
    return { url, ecosystem: "npm" as const, identity: "pkg@1.0.0/pkg-1.0.0.tgz", digests, policy: "reject" as const };
  }

  it("downloads, verifies and commits with credentials for the matching prefix", async () => {
    workspace.registry.serve(URL_A, BODY);

    const result = await fetchToCache(request(), context);

    expect(result.attempts).toBe(1);
    expect(result.finalUrl).toBe(URL_A);
    expect(result.entry.integritySource).toBe("declared");
    expect(await workspace.cache.has("npm", "pkg@1.0.0/pkg-1.0.0.tgz", result.entry.digest)).toBe(true);
    expect(workspace.registry.requests[0]?.headers["authorization"]).toBe("Bearer test-secret");
  });

  it("retries transient failures", async () => {
    workspace.registry.sequence(URL_A, [
      { error: new Error("socket hang up") },
      { status: 503, body: Buffer.from("busy") },
      { status: 200, body: Buffer.from(BODY) },
    ]);

    const result = await fetchToCache(request(), context);

    expect(result.attempts).toBe(3);
    expect(workspace.registry.count(URL_A)).toBe(3);
  });

  it("gives up after the configured attempts", async () => {
    workspace.registry.fail(URL_A, 503);

    const failure = fetchToCache(request(), context);

    await expect(failure).rejects.toThrow(`GET ${URL_A} failed with HTTP 503 (gave up after 3 attempts)`);
    await expect(failure).rejects.toMatchObject({ kind: "permanent", statusCode: 503, attempts: 3 });
  });

  it("does not retry a 404", async () => {
    const failure = fetchToCache(request(), context);

    await expect(failure).rejects.toBeInstanceOf(FetchError);
    await expect(failure).rejects.toMatchObject({
      statusCode: 404,
      attempts: 1,
      suggestion: "Check that the lockfile references a published artifact.",
    });
    expect(workspace.registry.count(URL_A)).toBe(1);
  });

  it("rejects corrupted downloads without caching or retrying them", async () => {
    workspace.registry.serve(URL_A, "tampered\n");

    await expect(fetchToCache(request(), context)).rejects.toBeInstanceOf(IntegrityMismatchError);

    expect(workspace.registry.count(URL_A)).toBe(1);
    expect(await workspace.cache.lookup("npm", "pkg@1.0.0/pkg-1.0.0.tgz")).toEqual([]);
    expect(sink.lines).toContainEqual({
      stream: "stderr",
      line: `error: Integrity mismatch for ${URL_A}; the artifact may have been tampered with`,
    });
  });

  it("fails closed before downloading an artifact without digests", async () => {
    await expect(fetchToCache(request([]), context)).rejects.toBeInstanceOf(UnverifiableArtifactError);
    expect(workspace.registry.requests).toEqual([]);
  });

  it("warns when trusting an artifact on first use", async () => {
    workspace.registry.serve(URL_A, BODY);

    const result = await fetchToCache({ ...request([]), policy: "trust-on-first-use" }, context);

    expect(result.entry.integritySource).toBe("trust-on-first-use");
    expect(sink.lines).toContainEqual({
      stream: "stderr",
      line: `warning: Trusting ${URL_A} on first use (sha256:${sha256Hex(BODY)})`,
    });
  });

  it("refuses plain http and redirects to it", async () => {
    await expect(fetchToCache(request(declared, "http://registry.test/pkg.tgz"), context)).rejects.toThrow(
      "Refusing to fetch http://registry.test/pkg.tgz: scheme http: is not allowed",
    );

    workspace.registry.serve(URL_A, BODY, "http://mirror.test/pkg.tgz");
    await expect(fetchToCache(request(), context)).rejects.toThrow(
      "Refusing to fetch http://mirror.test/pkg.tgz: scheme http: is not allowed",
    );
    expect(workspace.registry.count(URL_A)).toBe(1);
  });

  it("stops when the run is cancelled", async () => {
    workspace.registry.serve(URL_A, BODY);
    const controller = new AbortController();
    controller.abort();

    await expect(fetchToCache(request(), { ...context, signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
  });
});

describe("fetchText", () => {
  let workspace: TestWorkspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it("sends the accept header and returns the body", async () => {
    workspace.registry.serve("https://pypi.test/pypi/six/1.16.0/json", '{"urls":[]}');

    const body = await fetchText(
      "https://pypi.test/pypi/six/1.16.0/json",
      { fetchImpl: workspace.registry.fetchImpl, settings: testConfig(), logger: createLogger({ sink: createMemorySink() }) },
      "application/json",
    );

    expect(body).toBe('{"urls":[]}');
    expect(workspace.registry.requests[0]?.headers["accept"]).toBe("application/json");
  });
});
