import type { Readable } from "node:stream";

import type { EcosystemName, IntegritySource } from "@prefetch/types";

import type { Digest } from "../integrity/index.js";
import type { VerifiedDigest } from "../integrity/index.js";

export interface CacheEntry {
  readonly ecosystem: EcosystemName;
  /** Package identity the artifact was stored for, e.g. `left-pad@1.3.0/left-pad-1.3.0.tgz` */
  readonly identity: string;
  readonly digest: Digest;
  readonly sha256: string;
  readonly size: number;
  readonly integritySource: Exclude<IntegritySource, "none">;
  /** Absolute path of the stored blob */
  readonly path: string;
}

/**
 * A file being written into the cache staging area.
 */
export interface StagedArtifact {
  readonly path: string;
  /** Publishes the staged file under the verified digest and removes the staging copy. */
  commit(ecosystem: EcosystemName, identity: string, verified: VerifiedDigest): Promise<CacheEntry>;
  discard(): Promise<void>;
}

/**
 * Lifetime-scoped handle on one cache root. Operations after `close()` throw.
 */
export interface CacheHandle {
  readonly root: string;
  has(ecosystem: EcosystemName, identity: string, digest: Digest): Promise<boolean>;
  entry(ecosystem: EcosystemName, identity: string, digest: Digest): Promise<CacheEntry | null>;
  /** Every entry recorded for an identity, strongest digest first */
  lookup(ecosystem: EcosystemName, identity: string): Promise<CacheEntry[]>;
  put(ecosystem: EcosystemName, identity: string, digest: Digest, stream: Readable): Promise<CacheEntry>;
  /** Streams the blob; the stream errors with CacheCorruptionError when the content no longer matches */
  get(ecosystem: EcosystemName, identity: string, digest: Digest): Promise<Readable>;
  stage(): Promise<StagedArtifact>;
  verifyEntry(entry: CacheEntry): Promise<void>;
  /** Hard-links the blob to `target` (copies across devices) */
  materialize(entry: CacheEntry, target: string): Promise<void>;
  close(): Promise<void>;
}
