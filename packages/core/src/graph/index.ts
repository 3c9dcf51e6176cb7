export { DependencyGraph, type ArtifactSpec, type DependencyNode, type DependencyNodeInput, type GitArchiveSource } from "./graph.js";
