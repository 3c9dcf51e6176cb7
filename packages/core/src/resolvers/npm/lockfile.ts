import { isPlainObject, isStringRecord } from "@prefetch/types";

import { ResolutionError } from "../../errors.js";

/**
 * One installed location in a package lock, normalized across lockfile versions.
 * `location` is the `packages` key: `node_modules/a/node_modules/b`, a workspace path, or "" for the root.
 */
export interface LockedPackage {
  location: string;
  name: string;
  version: string | undefined;
  resolved: string | undefined;
  integrity: string | undefined;
  dev: boolean;
  link: boolean;
  bundled: boolean;
  /** Dependency names in declaration order */
  dependencies: string[];
}

export interface PackageLock {
  lockfileVersion: number;
  packages: Map<string, LockedPackage>;
}

const NODE_MODULES = "node_modules/";

export function nameFromLocation(location: string): string {
  const index = location.lastIndexOf(NODE_MODULES);
  if (index < 0) {
    return location.split("/").pop() ?? location;
  }
  return location.slice(index + NODE_MODULES.length);
}

function readString(value: Record<string, unknown>, key: string): string | undefined {
  const entry = value[key];
  return typeof entry === "string" ? entry : undefined;
}

function dependencyNames(value: Record<string, unknown>, keys: readonly string[]): string[] {
  const names: string[] = [];
  for (const key of keys) {
    const entry = value[key];
    if (isPlainObject(entry)) {
      for (const name of Object.keys(entry)) {
        if (!names.includes(name)) {
          names.push(name);
        }
      }
    }
  }
  return names;
}

/**
 * Parses `package-lock.json` / `npm-shrinkwrap.json` content (lockfile versions 1 to 3).
 */
export function parsePackageLock(document: unknown, fileName: string): PackageLock {
  if (!isPlainObject(document)) {
    throw new ResolutionError(`${fileName} must contain a JSON object`);
  }

  const lockfileVersion = document["lockfileVersion"];
  if (typeof lockfileVersion !== "number" || ![1, 2, 3].includes(lockfileVersion)) {
    throw new ResolutionError(`${fileName}: unsupported lockfileVersion ${JSON.stringify(lockfileVersion)}`, {
      suggestion: "Regenerate the lockfile with npm 7 or newer.",
    });
  }

  const packagesSection = document["packages"];
  if (lockfileVersion >= 2 && isPlainObject(packagesSection)) {
    return { lockfileVersion, packages: parsePackagesSection(packagesSection, fileName) };
  }

  return { lockfileVersion, packages: parseDependencyTree(document, fileName) };
}

function parsePackagesSection(section: Record<string, unknown>, fileName: string): Map<string, LockedPackage> {
  const packages = new Map<string, LockedPackage>();

  for (const [location, entry] of Object.entries(section)) {
    if (!isPlainObject(entry)) {
      throw new ResolutionError(`${fileName}: packages["${location}"] must be an object`);
    }

    packages.set(location, {
      location,
      name: readString(entry, "name") ?? nameFromLocation(location),
      version: readString(entry, "version"),
      resolved: readString(entry, "resolved"),
      integrity: readString(entry, "integrity"),
      // devOptional packages belong to the production tree as well
      dev: entry["dev"] === true,
      link: entry["link"] === true,
      bundled: entry["inBundle"] === true,
      dependencies: dependencyNames(entry, ["dependencies", "optionalDependencies", "peerDependencies"]),
    });
  }

  if (!packages.has("")) {
    packages.set("", {
      location: "",
      name: "",
      version: undefined,
      resolved: undefined,
      integrity: undefined,
      dev: false,
      link: false,
      bundled: false,
      dependencies: [],
    });
  }

  return packages;
}

/**
 * Lockfile v1: a nested `dependencies` tree, flattened into `packages`-style locations.
 */
function parseDependencyTree(document: Record<string, unknown>, fileName: string): Map<string, LockedPackage> {
  const packages = new Map<string, LockedPackage>();
  const topLevel = document["dependencies"];

  packages.set("", {
    location: "",
    name: readString(document, "name") ?? "",
    version: readString(document, "version"),
    resolved: undefined,
    integrity: undefined,
    dev: false,
    link: false,
    bundled: false,
    dependencies: isPlainObject(topLevel) ? Object.keys(topLevel) : [],
  });

  const walk = (tree: Record<string, unknown>, parentLocation: string): void => {
    for (const [name, entry] of Object.entries(tree)) {
      if (!isPlainObject(entry)) {
        throw new ResolutionError(`${fileName}: dependencies["${name}"] must be an object`);
      }

      const location = parentLocation.length > 0 ? `${parentLocation}/${NODE_MODULES}${name}` : `${NODE_MODULES}${name}`;
      const version = readString(entry, "version");
      const requires = entry["requires"];
      const isLocal = version?.startsWith("file:") === true;

      packages.set(location, {
        location,
        name,
        version: isLocal ? undefined : version,
        // v1 stores git and file specs in "version"
        resolved: readString(entry, "resolved") ?? (version !== undefined && !/^\d/.test(version) ? version : undefined),
        integrity: readString(entry, "integrity"),
        dev: entry["dev"] === true,
        link: isLocal,
        bundled: entry["bundled"] === true,
        dependencies: isStringRecord(requires) ? Object.keys(requires) : [],
      });

      const nested = entry["dependencies"];
      if (isPlainObject(nested)) {
        walk(nested, location);
      }
    }
  };

  if (isPlainObject(topLevel)) {
    walk(topLevel, "");
  }

  return packages;
}

/**
 * Node's module lookup: `<from>/node_modules/<name>`, then each ancestor's `node_modules`.
 */
export function lookupDependency(
  packages: ReadonlyMap<string, LockedPackage>,
  fromLocation: string,
  name: string,
): LockedPackage | undefined {
  let current = fromLocation;
  for (;;) {
    const candidate = current.length > 0 ? `${current}/${NODE_MODULES}${name}` : `${NODE_MODULES}${name}`;
    const found = packages.get(candidate);
    if (found !== undefined) {
      return found;
    }
    if (current.length === 0) {
      return undefined;
    }

    const parentIndex = current.lastIndexOf(`/${NODE_MODULES}`);
    // top-level packages and workspace folders fall back to the root node_modules
    current = parentIndex >= 0 ? current.slice(0, parentIndex) : "";
  }
}
