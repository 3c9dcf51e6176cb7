import path from "node:path";

import type { EcosystemName, PackageInput } from "@prefetch/types";

import { DEFAULT_GENERIC_LOCKFILE, createDefaultResolverRegistry, type ResolverRegistry } from "../resolvers/index.js";

/**
 * Input for one ecosystem at `packagePath` with every option at its default.
 */
export function defaultPackageInput(type: EcosystemName, packagePath = "."): PackageInput {
  const base = { path: packagePath, force: false };
  switch (type) {
    case "npm":
      return { ...base, type, includeDev: true };
    case "yarn":
      return { ...base, type, includeDev: true };
    case "pip":
      return { ...base, type, requirementsFiles: null, requirementsBuildFiles: null, allowBinary: false, environment: null };
    case "gomod":
      return { ...base, type };
    case "bundler":
      return { ...base, type, allowBinary: false };
    case "cargo":
      return { ...base, type };
    case "rpm":
      return { ...base, type, arches: null, options: null };
    case "generic":
      return { ...base, type, lockfile: DEFAULT_GENERIC_LOCKFILE };
  }
}

/**
 * Package inputs for every ecosystem whose manifests sit at the top of `sourceDir`.
 */
export async function detectPackages(sourceDir: string, registry: ResolverRegistry = createDefaultResolverRegistry()): Promise<PackageInput[]> {
  const root = path.resolve(sourceDir);
  const detected: PackageInput[] = [];
  for (const resolver of registry.list()) {
    if (await resolver.applies(root)) {
      detected.push(defaultPackageInput(resolver.ecosystem));
    }
  }
  return detected;
}
