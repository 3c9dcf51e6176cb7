import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import pRetry, { AbortError } from "p-retry";

import {
  CancelledError,
  FetchError,
  IntegrityMismatchError,
  PrefetchError,
} from "../errors.js";
import { DigestTransform, algorithmsFor, assertVerifiable, checkDigests } from "../integrity/index.js";
import { authorizationFor } from "./auth.js";
import type { ArtifactRequest, FetchContext, FetchLike, FetchResponse, FetchResult, FetchSettings } from "./types.js";

const TLS_ERROR_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "ERR_TLS_CERT_ALTNAME_INVALID",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
]);

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Downloads one artifact into the cache, verifying it while it streams.
 */
export async function fetchToCache(request: ArtifactRequest, context: FetchContext): Promise<FetchResult> {
  assertAllowedUrl(request.url, context.settings.allowInsecureHttp);
  assertVerifiable(request.digests, request.policy, request.url);

  const fetchImpl = request.fetchImpl ?? context.fetchImpl;
  const logger = context.logger;

  return withRetries(request.url, context, async (attempt) => {
    const { response, release } = await openResponse(fetchImpl, request.url, context, attempt);
    try {
      const finalUrl = response.url.length > 0 ? response.url : request.url;
      if (finalUrl !== request.url) {
        assertAllowedUrl(finalUrl, context.settings.allowInsecureHttp);
      }

      const body = response.body;
      if (body === null) {
        throw new AbortError(
          new FetchError(`Empty response body from ${request.url}`, { kind: "permanent", url: request.url, statusCode: response.status }),
        );
      }

      const staged = await context.cache.stage();
      try {
        const hasher = new DigestTransform(algorithmsFor(request.digests));
        try {
          await pipeline(Readable.fromWeb(body), hasher, createWriteStream(staged.path));
        } catch (error) {
          throw classifyTransportError(error, request.url, context.signal, attempt);
        }

        const verified = checkDigests(hasher.digests(), hasher.size, request.digests, request.policy, request.url);
        if (request.verifyStaged !== undefined) {
          await request.verifyStaged(staged.path);
        }

        const entry = await staged.commit(request.ecosystem, request.identity, verified);
        if (verified.integritySource === "trust-on-first-use" && request.verifyStaged === undefined) {
          logger.warn(`Trusting ${request.url} on first use (sha256:${verified.sha256})`);
        }
        return { entry, verified, finalUrl, attempts: attempt };
      } catch (error) {
        if (error instanceof IntegrityMismatchError) {
          logger.error(`Integrity mismatch for ${request.url}; the artifact may have been tampered with`, {
            algorithm: error.algorithm,
            expected: error.expected,
            actual: error.actual,
          });
          throw new AbortError(error);
        }
        if (error instanceof AbortError || (error instanceof FetchError && error.kind === "transient")) {
          throw error;
        }
        throw new AbortError(error instanceof Error ? error : new Error(String(error)));
      } finally {
        await staged.discard();
      }
    } finally {
      release();
    }
  });
}

/**
 * Fetches a small text document (index metadata) with the same retry and scheme rules.
 */
export async function fetchText(url: string, context: Omit<FetchContext, "cache">, accept?: string): Promise<string> {
  assertAllowedUrl(url, context.settings.allowInsecureHttp);

  return withRetries(url, context, async (attempt) => {
    const { response, release } = await openResponse(context.fetchImpl, url, context, attempt, accept);
    try {
      return await response.text();
    } catch (error) {
      throw classifyTransportError(error, url, context.signal, attempt);
    } finally {
      release();
    }
  });
}

export function assertAllowedUrl(url: string, allowInsecureHttp: boolean): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new FetchError(`Invalid URL ${url}`, { kind: "permanent", url });
  }

  if (parsed.protocol === "https:") {
    return;
  }
  if (parsed.protocol === "http:" && allowInsecureHttp) {
    return;
  }
  throw new FetchError(`Refusing to fetch ${url}: scheme ${parsed.protocol} is not allowed`, {
    kind: "permanent",
    url,
    suggestion: parsed.protocol === "http:" ? "Set allowInsecureHttp to permit plain http registries." : undefined,
  });
}

interface RetryContext {
  settings: FetchSettings;
  logger: FetchContext["logger"];
  signal?: AbortSignal;
}

async function withRetries<T>(url: string, context: RetryContext, run: (attempt: number) => Promise<T>): Promise<T> {
  const { retry } = context.settings;
  let attempts = 0;

  try {
    return await pRetry(
      async (attemptNumber) => {
        attempts = attemptNumber;
        if (context.signal?.aborted === true) {
          throw new AbortError(new CancelledError());
        }
        try {
          return await run(attemptNumber);
        } catch (error) {
          // only transient transport failures are retried
          if (error instanceof PrefetchError && !(error instanceof FetchError && error.kind === "transient")) {
            throw new AbortError(error);
          }
          throw error;
        }
      },
      {
        retries: retry.attempts - 1,
        factor: retry.factor,
        minTimeout: retry.minTimeoutMs,
        maxTimeout: retry.maxTimeoutMs,
        randomize: false,
        signal: context.signal,
        onFailedAttempt: (error) => {
          context.logger.debug(`Attempt ${error.attemptNumber} for ${url} failed: ${error.message}`, {
            retriesLeft: error.retriesLeft,
          });
        },
      },
    );
  } catch (error) {
    if (context.signal?.aborted === true) {
      throw error instanceof CancelledError ? error : new CancelledError(undefined, { cause: error });
    }
    if (error instanceof FetchError && error.kind === "transient") {
      throw new FetchError(`${error.message} (gave up after ${attempts} attempts)`, {
        kind: "permanent",
        url: error.url,
        statusCode: error.statusCode,
        attempts,
        cause: error,
      });
    }
    if (error instanceof FetchError) {
      throw new FetchError(error.message, {
        kind: error.kind,
        url: error.url,
        statusCode: error.statusCode,
        attempts,
        suggestion: error.suggestion,
        cause: error.cause,
      });
    }
    throw error;
  }
}

async function openResponse(
  fetchImpl: FetchLike,
  url: string,
  context: RetryContext,
  attempt: number,
  accept?: string,
): Promise<{ response: FetchResponse; release: () => void }> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), context.settings.requestTimeoutMs);
  const forwardAbort = (): void => controller.abort();
  context.signal?.addEventListener("abort", forwardAbort, { once: true });
  const release = (): void => {
    clearTimeout(timer);
    context.signal?.removeEventListener("abort", forwardAbort);
  };

  const headers: Record<string, string> = {};
  const authorization = authorizationFor(url, context.settings.auth);
  if (authorization !== undefined) {
    headers["authorization"] = authorization;
  }
  if (accept !== undefined) {
    headers["accept"] = accept;
  }

  let response: FetchResponse;
  try {
    response = await fetchImpl(url, { headers, signal: controller.signal, redirect: "follow" });
  } catch (error) {
    release();
    throw classifyTransportError(error, url, context.signal, attempt, controller.signal);
  }

  if (!response.ok) {
    release();
    throw classifyStatus(response, url, attempt);
  }

  return { response, release };
}

function classifyStatus(response: FetchResponse, url: string, attempt: number): Error {
  const message = `GET ${url} failed with HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`;
  if (isTransientStatus(response.status)) {
    return new FetchError(message, { kind: "transient", url, statusCode: response.status, attempts: attempt });
  }

  const suggestion =
    response.status === 401 || response.status === 403
      ? "Configure credentials for this registry under auth."
      : response.status === 404
        ? "Check that the lockfile references a published artifact."
        : undefined;
  return new AbortError(
    new FetchError(message, { kind: "permanent", url, statusCode: response.status, attempts: attempt, suggestion }),
  );
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  if ("cause" in error) {
    return errorCode(error.cause);
  }
  return undefined;
}

function classifyTransportError(
  error: unknown,
  url: string,
  runSignal: AbortSignal | undefined,
  attempt: number,
  attemptSignal?: AbortSignal,
): Error {
  if (error instanceof AbortError || error instanceof PrefetchError) {
    return error;
  }
  if (runSignal?.aborted === true) {
    return new AbortError(new CancelledError(undefined, { cause: error }));
  }

  const code = errorCode(error);
  const detail = error instanceof Error ? error.message : String(error);
  if (code !== undefined && TLS_ERROR_CODES.has(code)) {
    return new AbortError(
      new FetchError(`TLS failure for ${url}: ${code}`, { kind: "permanent", url, attempts: attempt, cause: error }),
    );
  }

  const timedOut = attemptSignal?.aborted === true || (error instanceof Error && error.name === "AbortError");
  return new FetchError(timedOut ? `Request to ${url} timed out` : `Network error for ${url}: ${detail}`, {
    kind: "transient",
    url,
    attempts: attempt,
    cause: error,
  });
}
