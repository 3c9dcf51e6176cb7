import { createHash } from "node:crypto";
import path from "node:path";

import { OUTPUT_DIR_PLACEHOLDER, type EnvAssignment, type FileEdit, type RequestOutput } from "@prefetch/types";

export interface EmitOptions {
  outputDir: string;
  /** Where the output directory is mounted during the build, when that differs */
  forOutputDir?: string;
}

export interface EmitResult {
  environment: EnvAssignment[];
  fileEdits: FileEdit[];
}

export type EnvironmentFormat = "env" | "json";

function substitute(value: string, outputDir: string): string {
  return value.split(OUTPUT_DIR_PLACEHOLDER).join(outputDir);
}

export function fileEditId(filePath: string, content: string): string {
  return createHash("sha256").update(filePath).update("\u0000").update(content).digest("hex");
}

/**
 * Environment assignments and file edits for a build that consumes `outputDir`.
 * Sorted and de-duplicated; the same output always emits the same result.
 */
export function emit(output: RequestOutput, options: EmitOptions): EmitResult {
  const outputDir = path.resolve(options.forOutputDir ?? options.outputDir);

  const assignments = new Map<string, EnvAssignment>();
  for (const template of output.environment) {
    const value =
      template.kind === "path"
        ? path.join(outputDir, substitute(template.value, outputDir).replace(/^\/+/, ""))
        : substitute(template.value, outputDir);
    assignments.set(`${template.name}\u0000${value}`, { name: template.name, value });
  }

  const edits = new Map<string, FileEdit>();
  for (const template of output.projectFiles) {
    const filePath = substitute(template.path, outputDir);
    const content = substitute(template.template, outputDir);
    const id = fileEditId(filePath, content);
    edits.set(id, { id, path: filePath, content });
  }

  return {
    environment: [...assignments.values()].sort((a, b) => compare(a.name, b.name) || compare(a.value, b.value)),
    fileEdits: [...edits.values()].sort((a, b) => compare(a.path, b.path) || compare(a.id, b.id)),
  };
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * `export NAME='value'` lines, or a JSON array of `{ name, value }`.
 */
export function formatEnvironment(assignments: readonly EnvAssignment[], format: EnvironmentFormat): string {
  if (format === "json") {
    return `${JSON.stringify(assignments.map(({ name, value }) => ({ name, value })), null, 2)}\n`;
  }
  return assignments.map(({ name, value }) => `export ${name}=${shellQuote(value)}\n`).join("");
}
