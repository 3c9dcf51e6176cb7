import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import {
  isRequestOutput,
  REQUEST_OUTPUT_SCHEMA_VERSION,
  type ComponentReport,
  type ComponentReportEntry,
  type EcosystemSummary,
  type EnvTemplate,
  type IdentityCollision,
  type PackageInput,
  type ProjectFileTemplate,
  type RequestOutput,
} from "@prefetch/types";

import { PrefetchError, ResolutionError } from "../errors.js";

export const OUTPUT_FILE_NAME = "output.json";

/** Result of one package input, in request-declaration order. */
export interface InputOutcome {
  input: PackageInput;
  summary: EcosystemSummary;
  report: ComponentReport | null;
}

export interface MergeConflict {
  input: PackageInput;
  error: ResolutionError;
}

export interface MergedOutput {
  output: RequestOutput;
  conflicts: MergeConflict[];
}

/**
 * Merges per-input reports: components deduplicated by purl within an ecosystem,
 * equal names across ecosystems reported as collisions, environment and files merged by name and path.
 */
export function mergeOutcomes(outcomes: readonly InputOutcome[]): MergedOutput {
  const components: ComponentReportEntry[] = [];
  const seenPurls = new Set<string>();
  const environment: EnvTemplate[] = [];
  const envOwners = new Map<string, { template: EnvTemplate; owner: PackageInput }>();
  const projectFiles: ProjectFileTemplate[] = [];
  const fileOwners = new Map<string, { template: ProjectFileTemplate; owner: PackageInput }>();
  const conflicts: MergeConflict[] = [];

  for (const { input, report } of outcomes) {
    if (report === null) {
      continue;
    }

    for (const entry of report.entries) {
      const key = `${entry.ecosystem}\u0000${entry.purl}`;
      if (!seenPurls.has(key)) {
        seenPurls.add(key);
        components.push(entry);
      }
    }

    for (const template of report.environment) {
      const existing = envOwners.get(template.name);
      if (existing === undefined) {
        envOwners.set(template.name, { template, owner: input });
        environment.push(template);
      } else if (existing.template.value !== template.value || existing.template.kind !== template.kind) {
        conflicts.push({
          input,
          error: new ResolutionError(
            `${template.name} is set to "${template.value}" by ${input.type} (${input.path}) but to "${existing.template.value}" by ${existing.owner.type} (${existing.owner.path})`,
          ),
        });
      }
    }

    for (const template of report.projectFiles) {
      const existing = fileOwners.get(template.path);
      if (existing === undefined) {
        fileOwners.set(template.path, { template, owner: input });
        projectFiles.push(template);
      } else if (existing.template.template !== template.template) {
        conflicts.push({
          input,
          error: new ResolutionError(
            `${template.path} is generated differently by ${input.type} (${input.path}) and ${existing.owner.type} (${existing.owner.path})`,
          ),
        });
      }
    }
  }

  return {
    output: {
      schemaVersion: REQUEST_OUTPUT_SCHEMA_VERSION,
      components,
      environment,
      projectFiles,
      collisions: findCollisions(components),
      summaries: outcomes.map((outcome) => outcome.summary),
    },
    conflicts,
  };
}

/**
 * Names declared by more than one ecosystem, compared case-insensitively.
 */
export function findCollisions(components: readonly ComponentReportEntry[]): IdentityCollision[] {
  const byName = new Map<string, ComponentReportEntry[]>();
  for (const component of components) {
    const key = component.name.toLowerCase();
    byName.set(key, [...(byName.get(key) ?? []), component]);
  }

  const collisions: IdentityCollision[] = [];
  for (const [name, group] of byName) {
    if (new Set(group.map((component) => component.ecosystem)).size < 2) {
      continue;
    }
    collisions.push({
      name,
      components: group.map((component) => ({ ecosystem: component.ecosystem, purl: component.purl, version: component.version })),
    });
  }
  return collisions;
}

export async function writeRequestOutput(outputDir: string, output: RequestOutput): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const target = path.join(outputDir, OUTPUT_FILE_NAME);
  const temporary = `${target}.tmp-${process.pid}`;
  await writeFile(temporary, `${JSON.stringify(output, null, 2)}\n`);
  await rename(temporary, target);
  return target;
}

export async function readRequestOutput(outputDir: string): Promise<RequestOutput> {
  const target = path.join(outputDir, OUTPUT_FILE_NAME);
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(target, "utf8"));
  } catch (error) {
    throw new PrefetchError("INVALID_OUTPUT", `Cannot read ${target}`, {
      cause: error,
      suggestion: "Run the prefetch first.",
    });
  }
  if (!isRequestOutput(parsed)) {
    throw new PrefetchError("INVALID_OUTPUT", `${target} is not a schema version ${REQUEST_OUTPUT_SCHEMA_VERSION} request output`);
  }
  return parsed;
}
