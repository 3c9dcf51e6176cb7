import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import path from "node:path";

import type { FileEdit } from "@prefetch/types";

import { PrefetchError } from "../errors.js";
import { fileExists } from "../resolvers/common.js";

export const BACKUP_SUFFIX = ".prefetch-orig";
/** Marks a backup of a file that did not exist before the first edit */
const ABSENT_MARKER = "\u0000prefetch:absent\u0000";

export type FileEditResult = "written" | "unchanged";

export interface AppliedEdit {
  edit: FileEdit;
  result: FileEditResult;
}

async function readIfPresent(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

async function writeAtomic(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const temporary = `${filePath}.tmp-${process.pid}`;
  await writeFile(temporary, content);
  await rename(temporary, filePath);
}

function assertAbsolute(edit: FileEdit): void {
  if (!path.isAbsolute(edit.path)) {
    throw new PrefetchError("INVALID_FILE_EDIT", `File edit ${edit.id} targets a relative path: ${edit.path}`, {
      suggestion: "Emit the edits with an absolute output directory.",
    });
  }
}

/**
 * Writes each edit whose content differs from the file on disk.
 * The first original is kept as `<file>.prefetch-orig`; later applies never replace it.
 */
export async function applyFileEdits(edits: readonly FileEdit[]): Promise<AppliedEdit[]> {
  const applied: AppliedEdit[] = [];
  for (const edit of edits) {
    assertAbsolute(edit);
    const current = await readIfPresent(edit.path);
    if (current === edit.content) {
      applied.push({ edit, result: "unchanged" });
      continue;
    }

    const backup = `${edit.path}${BACKUP_SUFFIX}`;
    if (!(await fileExists(backup))) {
      await writeAtomic(backup, current ?? ABSENT_MARKER);
    }
    await writeAtomic(edit.path, edit.content);
    applied.push({ edit, result: "written" });
  }
  return applied;
}

/**
 * Restores every edited file from its backup; files that had no original are removed.
 */
export async function revertFileEdits(edits: readonly FileEdit[]): Promise<string[]> {
  const restored: string[] = [];
  for (const edit of edits) {
    assertAbsolute(edit);
    const backup = `${edit.path}${BACKUP_SUFFIX}`;
    const original = await readIfPresent(backup);
    if (original === null) {
      continue;
    }

    if (original === ABSENT_MARKER) {
      if ((await readIfPresent(edit.path)) !== null) {
        await unlink(edit.path);
      }
    } else {
      await writeAtomic(edit.path, original);
    }
    await unlink(backup);
    restored.push(edit.path);
  }
  return restored;
}
