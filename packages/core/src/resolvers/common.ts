import { readFile, stat } from "node:fs/promises";
import path from "node:path";

import type { RequestMode } from "@prefetch/types";

import { ResolutionError } from "../errors.js";
import type { GitArchiveSource } from "../graph/index.js";
import type { DigestPolicy } from "../integrity/index.js";

const FULL_COMMIT_PATTERN = /^[0-9a-f]{40}$/;

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function anyFileExists(directory: string, names: readonly string[]): Promise<boolean> {
  for (const name of names) {
    if (await fileExists(path.join(directory, name))) {
      return true;
    }
  }
  return false;
}

export async function readTextFile(filePath: string, description: string): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    throw new ResolutionError(`Cannot read ${description} at ${filePath}`, { cause: error });
  }
}

export async function readJsonFile(filePath: string, description: string): Promise<unknown> {
  const raw = await readTextFile(filePath, description);
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ResolutionError(`${description} at ${filePath} is not valid JSON`, { cause: error });
  }
}

/**
 * Policy for an artifact: declared digests always verify; otherwise the request mode decides.
 */
export function policyFor(mode: RequestMode, hasDeclaredDigest: boolean): DigestPolicy {
  if (hasDeclaredDigest) {
    return "reject";
  }
  return mode === "permissive" ? "trust-on-first-use" : "reject";
}

export function isFullCommit(ref: string): boolean {
  return FULL_COMMIT_PATTERN.test(ref);
}

export interface GitRepository {
  owner: string;
  repo: string;
}

/**
 * Recognizes GitHub remotes in the forms package managers write them.
 */
export function parseGitHubRepository(remote: string): GitRepository | null {
  const patterns = [
    /^(?:git\+)?(?:https|ssh|git):\/\/(?:[^@/]+@)?github\.com[/:]([^/]+)\/([^/#?]+?)(?:\.git)?\/?(?:[#?].*)?$/,
    /^(?:[^@/]+@)?github\.com:([^/]+)\/([^/#?]+?)(?:\.git)?(?:#.*)?$/,
    /^github:([^/]+)\/([^/#?]+?)(?:\.git)?(?:#.*)?$/,
  ];

  for (const pattern of patterns) {
    const match = pattern.exec(remote.trim());
    if (match !== null && match[1] !== undefined && match[2] !== undefined) {
      return { owner: match[1], repo: match[2] };
    }
  }
  return null;
}

export function githubArchiveUrl(repository: GitRepository, commit: string): string {
  return `https://github.com/${repository.owner}/${repository.repo}/archive/${commit}.tar.gz`;
}

export function githubVcsUrl(repository: GitRepository, commit: string): string {
  return `git+https://github.com/${repository.owner}/${repository.repo}.git@${commit}`;
}

export interface GitRemote {
  /** URL handed to `git clone` */
  cloneUrl: string;
  repository: GitRepository;
}

const CLONE_SCHEMES = new Set(["https:", "ssh:", "git:"]);

/**
 * Any other git remote: `https`, `ssh` and `git` URLs, optionally `git+`-prefixed, or scp-like `user@host:path`.
 * The owner is the path segment before the repository, or the host for top-level repositories.
 */
export function parseGitRemote(remote: string): GitRemote | null {
  const trimmed = remote.trim().replace(/^git\+/, "").replace(/#.*$/, "");
  const scp = /^([^@/:]+@)?([^/:]+\.[^/:]+):(?!\/\/)(.+)$/.exec(trimmed);
  const normalized = scp !== null ? `ssh://${scp[1] ?? ""}${scp[2] ?? ""}/${scp[3] ?? ""}` : trimmed;

  let parsed: URL;
  try {
    parsed = new URL(normalized);
  } catch {
    return null;
  }
  if (!CLONE_SCHEMES.has(parsed.protocol) || parsed.hostname.length === 0) {
    return null;
  }

  const segments = parsed.pathname.split("/").filter((segment) => segment.length > 0);
  const last = segments.pop();
  if (last === undefined) {
    return null;
  }
  const repo = last.replace(/\.git$/, "");
  const owner = segments.pop() ?? parsed.hostname;
  parsed.hash = "";
  parsed.search = "";
  return { cloneUrl: parsed.toString(), repository: { owner, repo } };
}

export interface PinnedArchive {
  repository: GitRepository;
  commit: string;
  /** `git+<remote>@<commit>` */
  vcsUrl: string;
  /** GitHub archive URL, or the vcs URL for commits archived with git */
  url: string;
  git?: GitArchiveSource;
}

/**
 * Archive of a VCS dependency pinned to a full commit. GitHub commits download as
 * forge archives; other hosts are cloned and archived with git. Floating refs are refused.
 */
export function commitPinnedArchive(remote: string, ref: string | undefined, what: string): PinnedArchive {
  const host = pinnedHost(remote, what);
  if (ref === undefined || !isFullCommit(ref.toLowerCase())) {
    throw new ResolutionError(`${what} must be pinned to a full commit hash, got ${ref ?? "no ref"}`);
  }
  const commit = ref.toLowerCase();

  if (host.kind === "github") {
    const { repository } = host;
    return { repository, commit, vcsUrl: githubVcsUrl(repository, commit), url: githubArchiveUrl(repository, commit) };
  }
  const { cloneUrl, repository } = host.remote;
  const vcsUrl = `git+${cloneUrl}@${commit}`;
  return {
    repository,
    commit,
    vcsUrl,
    url: vcsUrl,
    git: { remote: cloneUrl, commit, prefix: `${repository.repo}-${commit}` },
  };
}

function pinnedHost(
  remote: string,
  what: string,
): { kind: "github"; repository: GitRepository } | { kind: "git"; remote: GitRemote } {
  const github = parseGitHubRepository(remote);
  if (github !== null) {
    return { kind: "github", repository: github };
  }
  const other = parseGitRemote(remote);
  if (other !== null) {
    return { kind: "git", remote: other };
  }
  throw new ResolutionError(`${what} comes from ${remote}, which is not a supported git host`, {
    suggestion: "Use an https, ssh or git URL for the repository.",
  });
}

/** Relative file names only; keeps lockfile-provided names from escaping the deps directory. */
export function safeFileName(name: string): string {
  const cleaned = name.replace(/[/\\]/g, "-").replace(/^\.+/, "");
  if (cleaned.length === 0) {
    throw new ResolutionError(`Invalid artifact file name ${JSON.stringify(name)}`);
  }
  return cleaned;
}

export function assertInputType<TType extends string>(
  input: { type: string },
  expected: TType,
): asserts input is { type: TType } {
  if (input.type !== expected) {
    throw new ResolutionError(`The ${expected} resolver cannot resolve ${input.type} inputs`);
  }
}
