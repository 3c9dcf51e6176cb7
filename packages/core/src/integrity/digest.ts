import { ResolutionError } from "../errors.js";

export const DIGEST_ALGORITHMS = ["sha1", "sha256", "sha384", "sha512"] as const;

export type DigestAlgorithm = (typeof DIGEST_ALGORITHMS)[number];

/** Weakest first. */
const STRENGTH: Readonly<Record<DigestAlgorithm, number>> = {
  sha1: 1,
  sha256: 2,
  sha384: 3,
  sha512: 4,
};

const HEX_LENGTH: Readonly<Record<DigestAlgorithm, number>> = {
  sha1: 40,
  sha256: 64,
  sha384: 96,
  sha512: 128,
};

export interface Digest {
  readonly algorithm: DigestAlgorithm;
  /** Lowercase hex */
  readonly hex: string;
}

/**
 * What to do with an artifact that declares no digest. There is no default.
 */
export type DigestPolicy = "reject" | "trust-on-first-use";

export function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return DIGEST_ALGORITHMS.some((algorithm) => algorithm === value);
}

export function compareStrength(left: DigestAlgorithm, right: DigestAlgorithm): number {
  return STRENGTH[left] - STRENGTH[right];
}

/**
 * Strongest algorithm among the declared digests, or null when none are declared.
 */
export function strongestAlgorithm(digests: readonly Digest[]): DigestAlgorithm | null {
  let strongest: DigestAlgorithm | null = null;
  for (const digest of digests) {
    if (strongest === null || compareStrength(digest.algorithm, strongest) > 0) {
      strongest = digest.algorithm;
    }
  }
  return strongest;
}

export function formatDigest(digest: Digest): string {
  return `${digest.algorithm}:${digest.hex}`;
}

export function toSri(digest: Digest): string {
  return `${digest.algorithm}-${Buffer.from(digest.hex, "hex").toString("base64")}`;
}

export function createDigest(algorithm: string, hex: string): Digest {
  const normalizedAlgorithm = algorithm.toLowerCase();
  if (!isDigestAlgorithm(normalizedAlgorithm)) {
    throw new ResolutionError(`Unsupported digest algorithm "${algorithm}"`, {
      suggestion: `Declare one of ${DIGEST_ALGORITHMS.join(", ")}.`,
    });
  }

  const normalizedHex = hex.toLowerCase();
  if (normalizedHex.length !== HEX_LENGTH[normalizedAlgorithm] || !/^[0-9a-f]+$/.test(normalizedHex)) {
    throw new ResolutionError(`Malformed ${normalizedAlgorithm} digest "${hex}"`);
  }

  return { algorithm: normalizedAlgorithm, hex: normalizedHex };
}

/**
 * Parses Subresource Integrity metadata (`sha512-<base64>`, space separated).
 */
export function parseSri(value: string): Digest[] {
  const digests: Digest[] = [];
  for (const token of value.trim().split(/\s+/)) {
    if (token.length === 0) {
      continue;
    }
    const separator = token.indexOf("-");
    if (separator <= 0) {
      throw new ResolutionError(`Malformed integrity metadata "${token}"`);
    }

    const algorithm = token.slice(0, separator);
    // options after "?" carry no digest information
    const encoded = token.slice(separator + 1).split("?")[0] ?? "";
    const bytes = Buffer.from(encoded, "base64");
    digests.push(createDigest(algorithm, bytes.toString("hex")));
  }
  return digests;
}

/**
 * Parses one declared digest in any of the accepted forms:
 * SRI, `<algo>:<hex>`, `<algo>=<hex>`, or bare hex with `defaultAlgorithm`.
 */
export function parseDigest(value: string, defaultAlgorithm?: DigestAlgorithm): Digest[] {
  const trimmed = value.trim();

  const separated = /^([A-Za-z0-9]+)[:=]([0-9A-Fa-f]+)$/.exec(trimmed);
  if (separated !== null) {
    return [createDigest(separated[1] ?? "", separated[2] ?? "")];
  }

  if (/^[0-9A-Fa-f]+$/.test(trimmed)) {
    if (defaultAlgorithm === undefined) {
      throw new ResolutionError(`Digest "${trimmed}" does not name its algorithm`);
    }
    return [createDigest(defaultAlgorithm, trimmed)];
  }

  return parseSri(trimmed);
}

/**
 * Splits a yarn-classic `resolved` URL into the download URL and its `#<sha1>` fragment.
 */
export function splitUrlDigest(url: string): { url: string; digest: Digest | null } {
  const hashIndex = url.indexOf("#");
  if (hashIndex < 0) {
    return { url, digest: null };
  }

  const fragment = url.slice(hashIndex + 1);
  const base = url.slice(0, hashIndex);
  if (/^[0-9a-fA-F]{40}$/.test(fragment)) {
    return { url: base, digest: createDigest("sha1", fragment) };
  }
  return { url: base, digest: null };
}

export function sameDigest(left: Digest, right: Digest): boolean {
  return left.algorithm === right.algorithm && left.hex === right.hex;
}
