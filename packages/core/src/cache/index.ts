export { openCache, blobDirectory, identityKey } from "./store.js";
export type { CacheEntry, CacheHandle, StagedArtifact } from "./types.js";
