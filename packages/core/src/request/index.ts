export { parsePrefetchRequest } from "./parse.js";
export { checkRelativePathSyntax, checkRootedPath, isInside, resolveInside } from "./paths.js";
