import { isPlainObject } from "@prefetch/types";
import YAML from "yaml";

import { ResolutionError } from "../../errors.js";

export interface RpmLockItem {
  url: string;
  repoid: string | null;
  checksum: string | null;
  size: number | null;
  kind: "binary" | "source";
}

export interface RpmLockArch {
  arch: string;
  items: RpmLockItem[];
}

export interface RpmLock {
  lockfileVersion: number;
  lockfileVendor: string;
  arches: RpmLockArch[];
}

export interface Nevra {
  name: string;
  version: string;
  release: string;
  arch: string;
}

/**
 * `name-version-release.arch.rpm`; names may themselves contain dashes.
 */
export function parseNevra(fileName: string): Nevra {
  const match = /^(.+)-([^-]+)-([^-]+)\.([^.]+)\.rpm$/.exec(fileName);
  if (match === null) {
    throw new ResolutionError(`Cannot read name, version, release and arch from ${fileName}`);
  }
  const [, name = "", version = "", release = "", arch = ""] = match;
  return { name, version, release, arch };
}

function readItems(value: unknown, kind: RpmLockItem["kind"], where: string): RpmLockItem[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ResolutionError(`${where} must be a list`);
  }
  return value.map((item: unknown, index: number) => {
    if (!isPlainObject(item) || typeof item["url"] !== "string") {
      throw new ResolutionError(`${where}[${index}] needs a url`);
    }
    const { repoid, checksum, size } = item;
    return {
      url: item["url"],
      repoid: typeof repoid === "string" ? repoid : null,
      checksum: typeof checksum === "string" ? checksum : null,
      size: typeof size === "number" ? size : null,
      kind,
    };
  });
}

export function parseRpmLock(text: string): RpmLock {
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    throw new ResolutionError("rpms.lock.yaml is not valid YAML", { cause: error });
  }
  if (!isPlainObject(document)) {
    throw new ResolutionError("rpms.lock.yaml must contain a mapping");
  }

  const { lockfileVersion, lockfileVendor, arches } = document;
  if (lockfileVersion !== 1) {
    throw new ResolutionError(`Unsupported rpms.lock.yaml lockfileVersion ${String(lockfileVersion)}`);
  }
  if (typeof lockfileVendor !== "string" || lockfileVendor.length === 0) {
    throw new ResolutionError("rpms.lock.yaml needs a lockfileVendor");
  }
  if (!Array.isArray(arches)) {
    throw new ResolutionError("rpms.lock.yaml needs an arches list");
  }

  return {
    lockfileVersion,
    lockfileVendor,
    arches: arches.map((entry: unknown, index: number) => {
      if (!isPlainObject(entry) || typeof entry["arch"] !== "string") {
        throw new ResolutionError(`arches[${index}] needs an arch`);
      }
      const where = `arches[${index}]`;
      return {
        arch: entry["arch"],
        items: [...readItems(entry["packages"], "binary", `${where}.packages`), ...readItems(entry["source"], "source", `${where}.source`)],
      };
    }),
  };
}
