import { isPlainObject } from "@prefetch/types";
import { parse as parseToml } from "smol-toml";

import { ResolutionError } from "../../errors.js";

export interface CargoPackage {
  name: string;
  version: string;
  source: string | null;
  checksum: string | null;
  /** `name`, `name version` or `name version (source)` */
  dependencies: string[];
}

export interface CargoLock {
  version: number;
  packages: CargoPackage[];
}

export type CargoSource =
  | { kind: "crates-io" }
  | { kind: "git"; url: string; query: URLSearchParams; commit: string; sourceId: string }
  | { kind: "other"; value: string };

const CRATES_IO_SOURCES = new Set([
  "registry+https://github.com/rust-lang/crates.io-index",
  "sparse+https://index.crates.io/",
]);

export function parseCargoLock(text: string): CargoLock {
  let document: unknown;
  try {
    document = parseToml(text);
  } catch (error) {
    throw new ResolutionError("Cargo.lock is not valid TOML", { cause: error });
  }
  if (!isPlainObject(document)) {
    throw new ResolutionError("Cargo.lock must be a TOML table");
  }

  const rawPackages = document["package"];
  const packages: CargoPackage[] = [];
  if (Array.isArray(rawPackages)) {
    const items: unknown[] = rawPackages;
    for (const raw of items) {
      if (!isPlainObject(raw) || typeof raw["name"] !== "string" || typeof raw["version"] !== "string") {
        throw new ResolutionError("Cargo.lock has a package without name or version");
      }
      const dependencies = raw["dependencies"];
      packages.push({
        name: raw["name"],
        version: raw["version"],
        source: typeof raw["source"] === "string" ? raw["source"] : null,
        checksum: typeof raw["checksum"] === "string" ? raw["checksum"] : null,
        dependencies: Array.isArray(dependencies) ? dependencies.filter((item): item is string => typeof item === "string") : [],
      });
    }
  }

  const version = document["version"];
  return { version: typeof version === "number" ? version : 1, packages };
}

/**
 * `git+https://github.com/o/r?branch=main#<commit>`: the part before `#` identifies the source.
 */
export function parseCargoSource(source: string): CargoSource {
  if (CRATES_IO_SOURCES.has(source)) {
    return { kind: "crates-io" };
  }
  if (source.startsWith("git+")) {
    const hashIndex = source.indexOf("#");
    if (hashIndex < 0) {
      throw new ResolutionError(`Git source ${source} is not pinned to a commit`);
    }
    const sourceId = source.slice(0, hashIndex);
    const withoutPrefix = sourceId.slice("git+".length);
    const queryIndex = withoutPrefix.indexOf("?");
    return {
      kind: "git",
      url: queryIndex < 0 ? withoutPrefix : withoutPrefix.slice(0, queryIndex),
      query: new URLSearchParams(queryIndex < 0 ? "" : withoutPrefix.slice(queryIndex + 1)),
      commit: source.slice(hashIndex + 1),
      sourceId,
    };
  }
  return { kind: "other", value: source };
}

/** Splits a `dependencies` item into name and optional version. */
export function parseDependencyReference(reference: string): { name: string; version: string | null } {
  const [name = reference, version] = reference.split(" ");
  return { name, version: version ?? null };
}
