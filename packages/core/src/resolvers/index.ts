export { createDefaultResolverRegistry, ResolverRegistryImpl, type ResolverRegistry } from "./registry.js";
export { artifactIdentity, depsDirectory, fetchGraph } from "./fetch-graph.js";
export { BundlerResolver } from "./bundler/resolver.js";
export { CargoResolver } from "./cargo/resolver.js";
export { DEFAULT_GENERIC_LOCKFILE, GenericResolver, parseArtifactsLock } from "./generic/resolver.js";
export { GomodResolver, moduleDownloadPath } from "./gomod/resolver.js";
export { escapeModulePath, parseGoMod, parseGoSum } from "./gomod/modfile.js";
export { NpmResolver } from "./npm/resolver.js";
export { parsePackageLock } from "./npm/lockfile.js";
export { PipResolver } from "./pip/resolver.js";
export { Marker } from "./pip/markers.js";
export { parseRequirementsText } from "./pip/requirements.js";
export { RpmResolver, type RpmResolverOptions } from "./rpm/resolver.js";
export { YarnResolver } from "./yarn/resolver.js";
export { parseYarnLock } from "./yarn/lockfile.js";
export type { EcosystemResolver, FetchGraphOptions, FetchedArtifact, ResolverContext } from "./types.js";
