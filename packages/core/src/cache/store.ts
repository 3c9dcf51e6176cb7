import { createHash, randomBytes, type Hash } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import { copyFile, link, mkdir, readFile, readdir, rm, stat, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { Transform, Writable, type Readable, type TransformCallback } from "node:stream";
import { pipeline } from "node:stream/promises";

import { isEcosystemName, isPlainObject, type EcosystemName } from "@prefetch/types";

import { CacheCorruptionError, PrefetchError } from "../errors.js";
import {
  DigestTransform,
  algorithmsFor,
  checkDigests,
  compareStrength,
  isDigestAlgorithm,
  type Digest,
  type VerifiedDigest,
} from "../integrity/index.js";
import type { CacheEntry, CacheHandle, StagedArtifact } from "./types.js";

const STAGING_DIR = ".staging";
const BLOB_FILE = "blob";

interface IndexRecord {
  identity: string;
  ecosystem: EcosystemName;
  algorithm: string;
  hex: string;
  sha256: string;
  size: number;
  integritySource: "declared" | "trust-on-first-use";
}

export function identityKey(identity: string): string {
  return createHash("sha256").update(identity).digest("hex");
}

export function blobDirectory(root: string, ecosystem: EcosystemName, digest: Digest): string {
  return path.join(root, ecosystem, digest.algorithm, digest.hex.slice(0, 2), digest.hex);
}

function indexDirectory(root: string, ecosystem: EcosystemName, identity: string): string {
  return path.join(root, ecosystem, "index", identityKey(identity));
}

function indexRecordPath(root: string, ecosystem: EcosystemName, identity: string, digest: Digest): string {
  return path.join(indexDirectory(root, ecosystem, identity), `${digest.algorithm}-${digest.hex}.json`);
}

function isIndexRecord(value: unknown): value is IndexRecord {
  if (!isPlainObject(value)) {
    return false;
  }
  const source = value["integritySource"];
  return (
    typeof value["identity"] === "string" &&
    isEcosystemName(value["ecosystem"]) &&
    typeof value["algorithm"] === "string" &&
    typeof value["hex"] === "string" &&
    typeof value["sha256"] === "string" &&
    typeof value["size"] === "number" &&
    (source === "declared" || source === "trust-on-first-use")
  );
}

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

/**
 * Opens a content-addressed cache rooted at `root`.
 *
 * Layout:
 *   <root>/<ecosystem>/<algorithm>/<hh>/<hex>/blob
 *   <root>/<ecosystem>/<algorithm>/<hh>/<hex>/identities/<sha256(identity)>.json
 *   <root>/<ecosystem>/index/<sha256(identity)>/<algorithm>-<hex>.json
 */
export async function openCache(root: string): Promise<CacheHandle> {
  const stagingRoot = path.join(root, STAGING_DIR);
  await mkdir(stagingRoot, { recursive: true });
  return new ContentAddressedCache(root, stagingRoot);
}

class ContentAddressedCache implements CacheHandle {
  private readonly handleId = randomBytes(6).toString("hex");
  private readonly staged = new Set<string>();
  private stagedCounter = 0;
  private closed = false;

  constructor(
    readonly root: string,
    private readonly stagingRoot: string,
  ) {}

  async has(ecosystem: EcosystemName, identity: string, digest: Digest): Promise<boolean> {
    return (await this.entry(ecosystem, identity, digest)) !== null;
  }

  async entry(ecosystem: EcosystemName, identity: string, digest: Digest): Promise<CacheEntry | null> {
    this.assertOpen();
    return this.readRecord(indexRecordPath(this.root, ecosystem, identity, digest));
  }

  async lookup(ecosystem: EcosystemName, identity: string): Promise<CacheEntry[]> {
    this.assertOpen();
    const directory = indexDirectory(this.root, ecosystem, identity);
    let names: string[];
    try {
      names = await readdir(directory);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return [];
      }
      throw error;
    }

    const entries: CacheEntry[] = [];
    for (const name of names.sort()) {
      if (!name.endsWith(".json")) {
        continue;
      }
      const entry = await this.readRecord(path.join(directory, name));
      if (entry !== null && entry.identity === identity) {
        entries.push(entry);
      }
    }

    return entries.sort((left, right) => compareStrength(right.digest.algorithm, left.digest.algorithm));
  }

  async put(ecosystem: EcosystemName, identity: string, digest: Digest, stream: Readable): Promise<CacheEntry> {
    const existing = await this.entry(ecosystem, identity, digest);
    if (existing !== null) {
      stream.resume();
      return existing;
    }

    const staged = await this.stage();
    try {
      const hasher = new DigestTransform(algorithmsFor([digest]));
      await pipeline(stream, hasher, createWriteStream(staged.path));
      const verified = checkDigests(hasher.digests(), hasher.size, [digest], "reject");
      return await staged.commit(ecosystem, identity, verified);
    } finally {
      await staged.discard();
    }
  }

  async get(ecosystem: EcosystemName, identity: string, digest: Digest): Promise<Readable> {
    const entry = await this.entry(ecosystem, identity, digest);
    if (entry === null) {
      throw new PrefetchError("CACHE_MISS", `${identity} (${digest.algorithm}:${digest.hex}) is not cached`);
    }

    const source = createReadStream(entry.path);
    const verifier = new ReadVerifier(entry);
    source.on("error", (error) => verifier.destroy(error));
    return source.pipe(verifier);
  }

  async stage(): Promise<StagedArtifact> {
    this.assertOpen();
    this.stagedCounter += 1;
    const stagedPath = path.join(
      this.stagingRoot,
      `${this.handleId}-${this.stagedCounter}-${randomBytes(4).toString("hex")}`,
    );
    this.staged.add(stagedPath);

    return {
      path: stagedPath,
      commit: (ecosystem, identity, verified) => this.publish(stagedPath, ecosystem, identity, verified),
      discard: async () => {
        await rm(stagedPath, { force: true });
        this.staged.delete(stagedPath);
      },
    };
  }

  async verifyEntry(entry: CacheEntry): Promise<void> {
    this.assertOpen();
    const hasher = new DigestTransform([entry.digest.algorithm]);
    await pipeline(createReadStream(entry.path), hasher, discard());
    const actual = hasher.digests()[entry.digest.algorithm];
    if (actual !== entry.digest.hex) {
      throw new CacheCorruptionError(
        `Cached blob ${entry.path} hashes to ${entry.digest.algorithm}:${actual ?? "?"}, expected ${entry.digest.hex}`,
        entry.path,
      );
    }
  }

  async materialize(entry: CacheEntry, target: string): Promise<void> {
    this.assertOpen();
    await mkdir(path.dirname(target), { recursive: true });

    const [blobStats, targetStats] = await Promise.all([stat(entry.path), statIfExists(target)]);
    if (targetStats !== null) {
      if (targetStats.ino === blobStats.ino && targetStats.dev === blobStats.dev) {
        return;
      }
      await unlink(target);
    }

    try {
      await link(entry.path, target);
    } catch (error) {
      if (hasErrorCode(error, "EXDEV") || hasErrorCode(error, "EPERM")) {
        await copyFile(entry.path, target);
        return;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await Promise.all([...this.staged].map((stagedPath) => rm(stagedPath, { force: true })));
    this.staged.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new PrefetchError("CACHE_CLOSED", `Cache handle for ${this.root} is closed`);
    }
  }

  private async publish(
    stagedPath: string,
    ecosystem: EcosystemName,
    identity: string,
    verified: VerifiedDigest,
  ): Promise<CacheEntry> {
    this.assertOpen();
    const directory = blobDirectory(this.root, ecosystem, verified.digest);
    const blobPath = path.join(directory, BLOB_FILE);
    await mkdir(path.join(directory, "identities"), { recursive: true });
    await linkNoClobber(stagedPath, blobPath);

    const record: IndexRecord = {
      identity,
      ecosystem,
      algorithm: verified.digest.algorithm,
      hex: verified.digest.hex,
      sha256: verified.sha256,
      size: verified.size,
      integritySource: verified.integritySource,
    };
    const content = `${JSON.stringify(record, null, 2)}\n`;

    await this.writeOnce(path.join(directory, "identities", `${identityKey(identity)}.json`), content);
    const recordPath = indexRecordPath(this.root, ecosystem, identity, verified.digest);
    await mkdir(path.dirname(recordPath), { recursive: true });
    await this.writeOnce(recordPath, content);

    return {
      ecosystem,
      identity,
      digest: verified.digest,
      sha256: verified.sha256,
      size: verified.size,
      integritySource: verified.integritySource,
      path: blobPath,
    };
  }

  /** Writes through staging and links, so readers never see a partial file. */
  private async writeOnce(target: string, content: string): Promise<void> {
    const temporary = path.join(this.stagingRoot, `${this.handleId}-meta-${randomBytes(6).toString("hex")}`);
    await writeFile(temporary, content, "utf8");
    try {
      await linkNoClobber(temporary, target);
    } finally {
      await rm(temporary, { force: true });
    }
  }

  private async readRecord(recordPath: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await readFile(recordPath, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CacheCorruptionError(`Cache index record ${recordPath} is not valid JSON`, recordPath, { cause: error });
    }
    if (!isIndexRecord(parsed) || !isDigestAlgorithm(parsed.algorithm)) {
      throw new CacheCorruptionError(`Cache index record ${recordPath} is malformed`, recordPath);
    }

    const digest: Digest = { algorithm: parsed.algorithm, hex: parsed.hex };
    const blobPath = path.join(blobDirectory(this.root, parsed.ecosystem, digest), BLOB_FILE);
    if ((await statIfExists(blobPath)) === null) {
      return null;
    }

    return {
      ecosystem: parsed.ecosystem,
      identity: parsed.identity,
      digest,
      sha256: parsed.sha256,
      size: parsed.size,
      integritySource: parsed.integritySource,
      path: blobPath,
    };
  }
}

async function linkNoClobber(source: string, target: string): Promise<void> {
  try {
    await link(source, target);
  } catch (error) {
    // an identical copy was published first
    if (hasErrorCode(error, "EEXIST")) {
      return;
    }
    throw error;
  }
}

async function statIfExists(target: string) {
  try {
    return await stat(target);
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

function discard(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
}

/**
 * Pass-through that fails at the end of the stream when the content no longer matches its key.
 */
class ReadVerifier extends Transform {
  private readonly hash: Hash;

  constructor(private readonly cacheEntry: CacheEntry) {
    super();
    this.hash = createHash(cacheEntry.digest.algorithm);
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.hash.update(chunk);
    callback(null, chunk);
  }

  override _flush(callback: TransformCallback): void {
    const actual = this.hash.digest("hex");
    if (actual !== this.cacheEntry.digest.hex) {
      callback(
        new CacheCorruptionError(
          `Cached blob ${this.cacheEntry.path} hashes to ${this.cacheEntry.digest.algorithm}:${actual}, expected ${this.cacheEntry.digest.hex}`,
          this.cacheEntry.path,
        ),
      );
      return;
    }
    callback();
  }
}
