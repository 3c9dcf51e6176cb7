import { createHash } from "node:crypto";
import * as path from "node:path";
import { Readable } from "node:stream";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { IntegrityMismatchError, ResolutionError, UnverifiableArtifactError } from "../src/errors.js";
import {
  assertModuleZipHash,
  checkDigests,
  createDigest,
  formatDigest,
  hashGoMod,
  hashModuleZip,
  parseDigest,
  parseSri,
  splitUrlDigest,
  strongestAlgorithm,
  toSri,
  verify,
} from "../src/integrity/index.js";
import { makeTempDir, removeDir, sha1Hex, sha256Hex, sha512Sri, writeZip } from "./helpers.js";

const CONTENT = "console.log('left-pad');\n";

describe("digest parsing", () => {
  it("parses SRI metadata and round-trips it", () => {
    const [digest] = parseSri(sha512Sri(CONTENT));
    expect(digest?.algorithm).toBe("sha512");
    expect(digest?.hex).toBe(createHash("sha512").update(CONTENT).digest("hex"));
    expect(digest === undefined ? "" : toSri(digest)).toBe(sha512Sri(CONTENT));
  });

  it("accepts separated and bare forms", () => {
    const hex = sha256Hex(CONTENT);
    expect(parseDigest(`sha256:${hex}`)).toEqual([{ algorithm: "sha256", hex }]);
    expect(parseDigest(`SHA256=${hex.toUpperCase()}`)).toEqual([{ algorithm: "sha256", hex }]);
    expect(parseDigest(hex, "sha256")).toEqual([{ algorithm: "sha256", hex }]);
    expect(() => parseDigest(hex)).toThrow(`Digest "${hex}" does not name its algorithm`);
  });

  it("rejects unknown algorithms and malformed hex", () => {
    expect(() => createDigest("md5", "d41d8cd98f00b204e9800998ecf8427e")).toThrow(ResolutionError);
    expect(() => createDigest("sha256", "abc")).toThrow('Malformed sha256 digest "abc"');
  });

  it("splits a sha1 fragment off a download URL", () => {
    const sha1 = sha1Hex(CONTENT);
    expect(splitUrlDigest(`https://registry.test/a/-/a-1.0.0.tgz#${sha1}`)).toEqual({
      url: "https://registry.test/a/-/a-1.0.0.tgz",
      digest: { algorithm: "sha1", hex: sha1 },
    });
    expect(splitUrlDigest("https://registry.test/a.tgz#main").digest).toBeNull();
  });

  it("picks the strongest declared algorithm", () => {
    const digests = [...parseDigest(`sha1:${sha1Hex(CONTENT)}`), ...parseSri(sha512Sri(CONTENT))];
    expect(strongestAlgorithm(digests)).toBe("sha512");
    expect(strongestAlgorithm([])).toBeNull();
  });
});

describe("verify", () => {
  it("checks the strongest algorithm and always reports sha256", async () => {
    const digests = [...parseDigest(`sha1:${sha1Hex(CONTENT)}`), ...parseSri(sha512Sri(CONTENT))];
    const verified = await verify(Readable.from([Buffer.from(CONTENT)]), digests, "reject");

    expect(verified.digest.algorithm).toBe("sha512");
    expect(verified.sha256).toBe(sha256Hex(CONTENT));
    expect(verified.integritySource).toBe("declared");
    expect(verified.size).toBe(Buffer.byteLength(CONTENT));
  });

  it("accepts any of several declared digests of the same algorithm", () => {
    const other = sha256Hex("other");
    const verified = checkDigests({ sha256: sha256Hex(CONTENT) }, 1, parseDigest(`sha256:${other}`).concat(parseDigest(`sha256:${sha256Hex(CONTENT)}`)), "reject");
    expect(formatDigest(verified.digest)).toBe(`sha256:${sha256Hex(CONTENT)}`);
  });

  it("raises IntegrityMismatchError for altered content", async () => {
    const digests = parseDigest(`sha256:${sha256Hex(CONTENT)}`);
    const failure = verify(Readable.from([Buffer.from(`${CONTENT}// injected\n`)]), digests, "reject");
    await expect(failure).rejects.toBeInstanceOf(IntegrityMismatchError);
    await expect(failure).rejects.toMatchObject({ algorithm: "sha256", expected: [sha256Hex(CONTENT)] });
  });

  it("trusts on first use only when the policy allows it", async () => {
    await expect(verify(Readable.from([Buffer.from(CONTENT)]), [], "reject")).rejects.toBeInstanceOf(UnverifiableArtifactError);

    const trusted = await verify(Readable.from([Buffer.from(CONTENT)]), [], "trust-on-first-use");
    expect(trusted.integritySource).toBe("trust-on-first-use");
    expect(trusted.digest).toEqual({ algorithm: "sha256", hex: sha256Hex(CONTENT) });
  });
});

describe("Go h1 hashes", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(tmpDir);
  });

  function h1(files: Record<string, string>): string {
    const lines = Object.keys(files)
      .sort()
      .map((name) => `${sha256Hex(files[name] ?? "")}  ${name}\n`)
      .join("");
    return `h1:${createHash("sha256").update(lines).digest("base64")}`;
  }

  it("hashes go.mod content as a single-file tree", () => {
    const goMod = "module example.test/lib\n\ngo 1.21\n";
    expect(hashGoMod(goMod)).toBe(h1({ "go.mod": goMod }));
  });

  it("hashes zip entries independent of their order in the archive", async () => {
    const files = {
      "example.test/lib@v1.2.0/lib.go": "package lib\n",
      "example.test/lib@v1.2.0/go.mod": "module example.test/lib\n",
    };
    const zipPath = path.join(tmpDir, "v1.2.0.zip");
    await writeZip(zipPath, files);

    expect(await hashModuleZip(zipPath)).toBe(h1(files));
    await expect(assertModuleZipHash(zipPath, h1({ "other.go": "x" }))).rejects.toBeInstanceOf(IntegrityMismatchError);
  });
});
