import { realpath, stat } from "node:fs/promises";
import path from "node:path";

/**
 * Checks that `relativePath` is a safe, existing location inside `rootDir`.
 * Returns a problem description, or null when the path is acceptable.
 */
export async function checkRootedPath(
  rootDir: string,
  relativePath: string,
  expect: "directory" | "file",
): Promise<string | null> {
  const syntactic = checkRelativePathSyntax(relativePath);
  if (syntactic !== null) {
    return syntactic;
  }

  const target = path.join(rootDir, relativePath);
  let stats;
  try {
    stats = await stat(target);
  } catch {
    return `${expect === "directory" ? "directory" : "file"} does not exist: ${target}`;
  }

  if (expect === "directory" && !stats.isDirectory()) {
    return `not a directory: ${target}`;
  }
  if (expect === "file" && !stats.isFile()) {
    return `not a regular file: ${target}`;
  }

  const [realRoot, realTarget] = await Promise.all([realpath(rootDir), realpath(target)]);
  if (!isInside(realRoot, realTarget)) {
    return `path ${relativePath} resolves outside the source directory (${realTarget})`;
  }

  return null;
}

export function checkRelativePathSyntax(relativePath: string): string | null {
  if (relativePath.length === 0) {
    return "path must not be empty";
  }
  if (path.isAbsolute(relativePath)) {
    return `path must be relative, got ${relativePath}`;
  }
  if (relativePath.split(/[\\/]/).includes("..")) {
    return `path must not contain "..": ${relativePath}`;
  }
  return null;
}

export function isInside(rootDir: string, candidate: string): boolean {
  const relative = path.relative(rootDir, candidate);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Resolves `relativePath` under `rootDir`, refusing escapes through `..` or symlinks.
 */
export async function resolveInside(rootDir: string, relativePath: string): Promise<string | null> {
  if (checkRelativePathSyntax(relativePath) !== null) {
    return null;
  }
  const target = path.join(rootDir, relativePath);
  try {
    const [realRoot, realTarget] = await Promise.all([realpath(rootDir), realpath(target)]);
    return isInside(realRoot, realTarget) ? realTarget : null;
  } catch {
    return null;
  }
}
