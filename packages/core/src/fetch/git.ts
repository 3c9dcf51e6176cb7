import { spawn } from "node:child_process";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { CancelledError, FetchError } from "../errors.js";

export interface GitArchiveRequest {
  remote: string;
  /** Full commit hash */
  commit: string;
  /** Top-level directory of every archive entry, like a forge archive */
  prefix: string;
  /** Gzipped tarball to write */
  target: string;
  signal?: AbortSignal;
}

/**
 * Produces a commit archive for hosts without a download endpoint.
 */
export interface GitArchiver {
  archive(request: GitArchiveRequest): Promise<void>;
}

/**
 * Archiver backed by the git executable: a bare clone of the remote, then `git archive` of the commit.
 */
export function createGitArchiver(command = "git"): GitArchiver {
  return {
    async archive(request) {
      const workDir = await mkdtemp(path.join(os.tmpdir(), "prefetch-git-"));
      try {
        const repository = path.join(workDir, "repository.git");
        await runGitCommand(command, ["clone", "--bare", "--quiet", "--", request.remote, repository], request);
        await runGitCommand(
          command,
          ["archive", "--format=tar.gz", `--prefix=${request.prefix}/`, "-o", request.target, request.commit],
          request,
          repository,
        );
      } finally {
        await rm(workDir, { recursive: true, force: true });
      }
    },
  };
}

function runGitCommand(command: string, args: string[], request: GitArchiveRequest, cwd?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
      env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
      signal: request.signal,
    });

    let stdout = "";
    let stderr = "";

    child.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (error) => {
      if (request.signal?.aborted === true) {
        reject(new CancelledError(undefined, { cause: error }));
        return;
      }
      reject(
        new FetchError(`Cannot run ${command} for ${request.remote}: ${error.message}`, {
          kind: "permanent",
          url: request.remote,
          suggestion: "Install git to fetch dependencies from hosts without commit archives.",
          cause: error,
        }),
      );
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve(stdout);
        return;
      }
      if (request.signal?.aborted === true) {
        reject(new CancelledError());
        return;
      }
      reject(
        new FetchError(`git ${args[0] ?? ""} failed for ${request.remote}@${request.commit}: ${stderr.trim()}`, {
          kind: "permanent",
          url: request.remote,
        }),
      );
    });
  });
}
