import type { ReadableStream } from "node:stream/web";

import type { EcosystemName } from "@prefetch/types";

import type { CacheEntry, CacheHandle } from "../cache/index.js";
import type { AuthCredentials, RetrySettings } from "../config/index.js";
import type { Digest, DigestPolicy, VerifiedDigest } from "../integrity/index.js";
import type { Logger } from "../logging/logger.js";

export interface FetchInit {
  method?: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  redirect?: "follow";
}

/** The part of a fetch Response the client reads. */
export interface FetchResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  /** Final URL after redirects; may be empty for synthetic responses */
  readonly url: string;
  readonly headers: { get(name: string): string | null };
  readonly body: ReadableStream<Uint8Array> | null;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init?: FetchInit) => Promise<FetchResponse>;

export interface ArtifactRequest {
  /** Resolver-declared location; nothing else is ever requested */
  url: string;
  ecosystem: EcosystemName;
  identity: string;
  digests: readonly Digest[];
  policy: DigestPolicy;
  /** Runs on the staged file before it is committed, e.g. Go h1 tree hashes */
  verifyStaged?: (stagedPath: string) => Promise<void>;
  /** Replaces the context transport for this artifact (client certificates) */
  fetchImpl?: FetchLike;
}

export interface FetchSettings {
  retry: RetrySettings;
  requestTimeoutMs: number;
  allowInsecureHttp: boolean;
  auth: Record<string, AuthCredentials>;
}

export interface FetchContext {
  cache: CacheHandle;
  fetchImpl: FetchLike;
  settings: FetchSettings;
  logger: Logger;
  signal?: AbortSignal;
}

export interface FetchResult {
  entry: CacheEntry;
  verified: VerifiedDigest;
  finalUrl: string;
  attempts: number;
}
