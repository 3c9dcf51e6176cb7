/**
 * Hermetic prefetch core: resolves lockfiles, fetches verified artifacts into a
 * content-addressed cache and describes what the offline build needs.
 *
 * @packageDocumentation
 */

export * from "@prefetch/types";

export * from "./errors.js";
export * from "./logging/logger.js";
export * from "./config/index.js";
export * from "./request/index.js";
export * from "./integrity/index.js";
export * from "./cache/index.js";
export * from "./fetch/index.js";
export * from "./graph/index.js";
export * from "./purl.js";
export * from "./semver/index.js";
export * from "./resolvers/index.js";
export * from "./orchestrator/index.js";
export * from "./emitter/index.js";
