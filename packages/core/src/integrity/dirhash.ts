import { createHash } from "node:crypto";
import type { Readable } from "node:stream";

import * as yauzl from "yauzl";

import { IntegrityMismatchError } from "../errors.js";

/**
 * Go's "h1:" tree hash: sha256 over sorted `"<sha256 hex>  <name>\n"` lines.
 */
export function hash1(files: ReadonlyMap<string, string>): string {
  const names = [...files.keys()].sort();
  const summary = createHash("sha256");
  for (const name of names) {
    if (name.includes("\n")) {
      throw new Error(`File name contains a newline: ${JSON.stringify(name)}`);
    }
    summary.update(`${files.get(name) ?? ""}  ${name}\n`);
  }
  return `h1:${summary.digest("base64")}`;
}

export function hashGoMod(content: Buffer | string): string {
  const fileHash = createHash("sha256").update(content).digest("hex");
  return hash1(new Map([["go.mod", fileHash]]));
}

/**
 * h1 hash of a module zip, computed from its file entries.
 */
export async function hashModuleZip(zipPath: string): Promise<string> {
  const zipfile = await openZip(zipPath);
  const files = new Map<string, string>();

  try {
    await new Promise<void>((resolve, reject) => {
      zipfile.on("error", reject);
      zipfile.on("end", () => resolve());
      zipfile.on("entry", (entry: yauzl.Entry) => {
        if (entry.fileName.endsWith("/")) {
          zipfile.readEntry();
          return;
        }
        if (files.has(entry.fileName)) {
          reject(new Error(`Duplicate zip entry ${entry.fileName}`));
          return;
        }
        zipfile.openReadStream(entry, (error, stream) => {
          if (error !== null || stream === undefined) {
            reject(error ?? new Error(`Cannot read zip entry ${entry.fileName}`));
            return;
          }
          hashStream(stream).then(
            (hex) => {
              files.set(entry.fileName, hex);
              zipfile.readEntry();
            },
            reject,
          );
        });
      });
      zipfile.readEntry();
    });
  } finally {
    zipfile.close();
  }

  return hash1(files);
}

export async function assertModuleZipHash(zipPath: string, expected: string, url?: string): Promise<void> {
  const actual = await hashModuleZip(zipPath);
  if (actual !== expected) {
    throw new IntegrityMismatchError(`h1 digest mismatch${url === undefined ? "" : ` for ${url}`}: expected ${expected}, got ${actual}`, {
      algorithm: "h1",
      expected: [expected],
      actual,
      url,
    });
  }
}

export function assertGoModHash(content: Buffer | string, expected: string, url?: string): void {
  const actual = hashGoMod(content);
  if (actual !== expected) {
    throw new IntegrityMismatchError(`h1 digest mismatch${url === undefined ? "" : ` for ${url}`}: expected ${expected}, got ${actual}`, {
      algorithm: "h1",
      expected: [expected],
      actual,
      url,
    });
  }
}

function openZip(zipPath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true, autoClose: false }, (error, zipfile) => {
      if (error !== null || zipfile === undefined) {
        reject(error ?? new Error(`Cannot open ${zipPath}`));
        return;
      }
      resolve(zipfile);
    });
  });
}

function hashStream(stream: Readable): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash("sha256");
    stream.on("data", (chunk: Buffer) => hash.update(chunk));
    stream.on("error", reject);
    stream.on("end", () => resolve(hash.digest("hex")));
  });
}
