import { createHash, type Hash } from "node:crypto";
import { Transform, Writable, type Readable, type TransformCallback } from "node:stream";
import { pipeline } from "node:stream/promises";

import type { IntegritySource } from "@prefetch/types";

import { IntegrityMismatchError, UnverifiableArtifactError } from "../errors.js";
import { strongestAlgorithm, type Digest, type DigestAlgorithm, type DigestPolicy } from "./digest.js";

export interface VerifiedDigest {
  /** Authoritative digest: strongest declared algorithm, or sha256 when trusted on first use */
  readonly digest: Digest;
  readonly sha256: string;
  readonly computed: Readonly<Partial<Record<DigestAlgorithm, string>>>;
  readonly integritySource: Exclude<IntegritySource, "none">;
  readonly size: number;
}

/**
 * Pass-through stream hashing every byte with the requested algorithms.
 */
export class DigestTransform extends Transform {
  private readonly hashes = new Map<DigestAlgorithm, Hash>();
  private bytes = 0;
  private results: Partial<Record<DigestAlgorithm, string>> | null = null;

  constructor(algorithms: Iterable<DigestAlgorithm>) {
    super();
    for (const algorithm of algorithms) {
      this.hashes.set(algorithm, createHash(algorithm));
    }
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    for (const hash of this.hashes.values()) {
      hash.update(chunk);
    }
    this.bytes += chunk.length;
    callback(null, chunk);
  }

  override _flush(callback: TransformCallback): void {
    const results: Partial<Record<DigestAlgorithm, string>> = {};
    for (const [algorithm, hash] of this.hashes) {
      results[algorithm] = hash.digest("hex");
    }
    this.results = results;
    callback();
  }

  get size(): number {
    return this.bytes;
  }

  /** Available once the stream has finished. */
  digests(): Partial<Record<DigestAlgorithm, string>> {
    if (this.results === null) {
      throw new Error("Digests are not available before the stream has finished");
    }
    return this.results;
  }
}

/**
 * Algorithms to compute for a set of declared digests: the authoritative one plus sha256.
 */
export function algorithmsFor(expected: readonly Digest[]): DigestAlgorithm[] {
  const strongest = strongestAlgorithm(expected);
  if (strongest === null || strongest === "sha256") {
    return ["sha256"];
  }
  return [strongest, "sha256"];
}

/**
 * Fails closed before any byte is downloaded when nothing is declared and the policy rejects.
 */
export function assertVerifiable(expected: readonly Digest[], policy: DigestPolicy, url: string): void {
  if (expected.length === 0 && policy === "reject") {
    throw new UnverifiableArtifactError(url);
  }
}

/**
 * Compares computed digests with the declared ones.
 */
export function checkDigests(
  computed: Partial<Record<DigestAlgorithm, string>>,
  size: number,
  expected: readonly Digest[],
  policy: DigestPolicy,
  url?: string,
): VerifiedDigest {
  const sha256 = computed.sha256;
  if (sha256 === undefined) {
    throw new Error("sha256 must always be computed");
  }

  const strongest = strongestAlgorithm(expected);
  if (strongest === null) {
    if (policy === "reject") {
      throw new UnverifiableArtifactError(url ?? "artifact");
    }
    return {
      digest: { algorithm: "sha256", hex: sha256 },
      sha256,
      computed,
      integritySource: "trust-on-first-use",
      size,
    };
  }

  const actual = computed[strongest];
  if (actual === undefined) {
    throw new Error(`${strongest} was not computed`);
  }

  const candidates = expected.filter((digest) => digest.algorithm === strongest).map((digest) => digest.hex);
  if (!candidates.includes(actual)) {
    throw new IntegrityMismatchError(
      `${strongest} digest mismatch${url === undefined ? "" : ` for ${url}`}: expected ${candidates.join(" or ")}, got ${actual}`,
      { algorithm: strongest, expected: candidates, actual, url },
    );
  }

  return {
    digest: { algorithm: strongest, hex: actual },
    sha256,
    computed,
    integritySource: "declared",
    size,
  };
}

/**
 * Consumes `stream` and verifies it against `expected`.
 */
export async function verify(
  stream: Readable,
  expected: readonly Digest[],
  policy: DigestPolicy,
): Promise<VerifiedDigest> {
  assertVerifiable(expected, policy, "stream");

  const hasher = new DigestTransform(algorithmsFor(expected));
  const sink = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
  await pipeline(stream, hasher, sink);
  return checkDigests(hasher.digests(), hasher.size, expected, policy);
}
