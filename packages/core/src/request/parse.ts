import { stat } from "node:fs/promises";
import path from "node:path";

import {
  isEcosystemName,
  isPlainObject,
  REQUEST_FLAGS,
  type DnfRepoOptions,
  type PackageInput,
  type PipMarkerEnvironment,
  type PrefetchRequest,
  type RequestFlag,
  type RequestMode,
  type RpmOptions,
  type SslOptions,
} from "@prefetch/types";

import { InvalidInputError, type ValidationIssue } from "../errors.js";
import { checkRelativePathSyntax, checkRootedPath } from "./paths.js";

const MARKER_KEYS: readonly (keyof PipMarkerEnvironment)[] = [
  "python_version",
  "python_full_version",
  "sys_platform",
  "platform_machine",
  "platform_system",
  "platform_release",
  "os_name",
  "implementation_name",
  "platform_python_implementation",
];

const SHARED_KEYS = ["type", "path", "force"];

const VARIANT_KEYS: Readonly<Record<PackageInput["type"], readonly string[]>> = {
  npm: ["includeDev"],
  yarn: ["includeDev"],
  pip: ["requirementsFiles", "requirementsBuildFiles", "allowBinary", "environment"],
  gomod: [],
  bundler: ["allowBinary"],
  cargo: [],
  rpm: ["arches", "options"],
  generic: ["lockfile"],
};

class IssueCollector {
  readonly issues: ValidationIssue[] = [];

  add(location: string, message: string): void {
    this.issues.push({ location, message });
  }
}

/**
 * Validates raw user input into a frozen {@link PrefetchRequest}.
 * Every problem is collected and reported in one {@link InvalidInputError}.
 */
export async function parsePrefetchRequest(raw: unknown): Promise<PrefetchRequest> {
  const collector = new IssueCollector();

  if (!isPlainObject(raw)) {
    collector.add("", "input must be an object");
    throw new InvalidInputError(collector.issues);
  }

  rejectUnknownKeys(raw, ["sourceDir", "outputDir", "packages", "flags", "mode"], "", collector);

  const sourceDir = await parseSourceDir(raw["sourceDir"], collector);
  const outputDir = parseAbsolute(raw["outputDir"], "outputDir", collector);
  const flags = parseFlags(raw["flags"], collector);
  const mode = parseMode(raw["mode"], collector);

  const rawPackages = raw["packages"];
  const packages: PackageInput[] = [];
  if (!Array.isArray(rawPackages)) {
    collector.add("packages", "packages must be a list");
  } else if (rawPackages.length === 0) {
    collector.add("packages", "at least one package must be defined");
  } else {
    for (const [index, entry] of rawPackages.entries()) {
      const parsed = await parsePackageInput(entry, `packages.${index}`, sourceDir, collector);
      if (parsed !== null) {
        packages.push(parsed);
      }
    }
  }

  const unique = dedupePackages(packages, collector);

  if (collector.issues.length > 0 || sourceDir === null || outputDir === null) {
    throw new InvalidInputError(collector.issues);
  }

  return Object.freeze({
    sourceDir,
    outputDir,
    packages: Object.freeze(unique.map((input) => Object.freeze(input))),
    flags: new Set(flags),
    mode,
  });
}

function rejectUnknownKeys(
  value: Record<string, unknown>,
  allowed: readonly string[],
  location: string,
  collector: IssueCollector,
): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      collector.add(join(location, key), "extra fields not permitted");
    }
  }
}

function join(location: string, key: string): string {
  return location.length > 0 ? `${location}.${key}` : key;
}

async function parseSourceDir(value: unknown, collector: IssueCollector): Promise<string | null> {
  const sourceDir = parseAbsolute(value, "sourceDir", collector);
  if (sourceDir === null) {
    return null;
  }

  try {
    const stats = await stat(sourceDir);
    if (!stats.isDirectory()) {
      collector.add("sourceDir", `not a directory: ${sourceDir}`);
      return null;
    }
  } catch {
    collector.add("sourceDir", `directory does not exist: ${sourceDir}`);
    return null;
  }

  return sourceDir;
}

function parseAbsolute(value: unknown, location: string, collector: IssueCollector): string | null {
  if (typeof value !== "string" || value.length === 0) {
    collector.add(location, "must be a non-empty string");
    return null;
  }
  if (!path.isAbsolute(value)) {
    collector.add(location, `path must be absolute, got ${value}`);
    return null;
  }
  return path.normalize(value);
}

function parseFlags(value: unknown, collector: IssueCollector): RequestFlag[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    collector.add("flags", "flags must be a list");
    return [];
  }

  const flags: RequestFlag[] = [];
  for (const [index, flag] of value.entries()) {
    const known = REQUEST_FLAGS.find((candidate) => candidate === flag);
    if (known === undefined) {
      collector.add(`flags.${index}`, `unknown flag ${JSON.stringify(flag)}; expected one of ${REQUEST_FLAGS.join(", ")}`);
    } else {
      flags.push(known);
    }
  }
  return flags;
}

function parseMode(value: unknown, collector: IssueCollector): RequestMode {
  if (value === undefined || value === "strict") {
    return "strict";
  }
  if (value === "permissive") {
    return "permissive";
  }
  collector.add("mode", `mode must be "strict" or "permissive"`);
  return "strict";
}

async function parsePackageInput(
  value: unknown,
  location: string,
  sourceDir: string | null,
  collector: IssueCollector,
): Promise<PackageInput | null> {
  const normalized = typeof value === "string" ? { type: value } : value;
  if (!isPlainObject(normalized)) {
    collector.add(location, "package input must be an object or an ecosystem name");
    return null;
  }

  const type = normalized["type"];
  if (!isEcosystemName(type)) {
    collector.add(join(location, "type"), `unknown package type ${JSON.stringify(type)}`);
    return null;
  }

  rejectUnknownKeys(normalized, [...SHARED_KEYS, ...VARIANT_KEYS[type]], location, collector);

  const packagePath = await parsePackagePath(normalized["path"], join(location, "path"), sourceDir, collector);
  const force = parseBoolean(normalized["force"], false, join(location, "force"), collector);

  switch (type) {
    case "npm":
    case "yarn":
      return {
        type,
        path: packagePath,
        force,
        includeDev: parseBoolean(normalized["includeDev"], true, join(location, "includeDev"), collector),
      };
    case "pip":
      return {
        type,
        path: packagePath,
        force,
        requirementsFiles: parseRelativeFileList(normalized["requirementsFiles"], join(location, "requirementsFiles"), collector),
        requirementsBuildFiles: parseRelativeFileList(
          normalized["requirementsBuildFiles"],
          join(location, "requirementsBuildFiles"),
          collector,
        ),
        allowBinary: parseBoolean(normalized["allowBinary"], false, join(location, "allowBinary"), collector),
        environment: parseMarkerEnvironment(normalized["environment"], join(location, "environment"), collector),
      };
    case "gomod":
    case "cargo":
      return { type, path: packagePath, force };
    case "bundler":
      return {
        type,
        path: packagePath,
        force,
        allowBinary: parseBoolean(normalized["allowBinary"], false, join(location, "allowBinary"), collector),
      };
    case "rpm":
      return {
        type,
        path: packagePath,
        force,
        arches: parseStringList(normalized["arches"], join(location, "arches"), collector),
        options: await parseRpmOptions(normalized["options"], join(location, "options"), collector),
      };
    case "generic": {
      const lockfile = normalized["lockfile"];
      if (lockfile !== undefined && (typeof lockfile !== "string" || lockfile.length === 0)) {
        collector.add(join(location, "lockfile"), "lockfile must be a non-empty string");
      }
      return {
        type,
        path: packagePath,
        force,
        lockfile: typeof lockfile === "string" && lockfile.length > 0 ? lockfile : "artifacts.lock.yaml",
      };
    }
  }
}

async function parsePackagePath(
  value: unknown,
  location: string,
  sourceDir: string | null,
  collector: IssueCollector,
): Promise<string> {
  if (value === undefined) {
    return ".";
  }
  if (typeof value !== "string") {
    collector.add(location, "path must be a string");
    return ".";
  }

  const normalized = path.normalize(value);
  if (sourceDir === null) {
    const problem = checkRelativePathSyntax(normalized);
    if (problem !== null) {
      collector.add(location, problem);
    }
    return normalized;
  }

  const problem = await checkRootedPath(sourceDir, normalized, "directory");
  if (problem !== null) {
    collector.add(location, problem);
  }
  return normalized;
}

function parseBoolean(value: unknown, fallback: boolean, location: string, collector: IssueCollector): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    collector.add(location, "must be a boolean");
    return fallback;
  }
  return value;
}

function parseStringList(value: unknown, location: string, collector: IssueCollector): string[] | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (!Array.isArray(value) || !value.every((item) => typeof item === "string" && item.length > 0)) {
    collector.add(location, "must be a list of non-empty strings");
    return null;
  }
  return value.map(String);
}

function parseRelativeFileList(value: unknown, location: string, collector: IssueCollector): string[] | null {
  const list = parseStringList(value, location, collector);
  if (list === null) {
    return null;
  }
  for (const [index, entry] of list.entries()) {
    const problem = checkRelativePathSyntax(entry);
    if (problem !== null) {
      collector.add(`${location}.${index}`, problem);
    }
  }
  return list;
}

function parseMarkerEnvironment(
  value: unknown,
  location: string,
  collector: IssueCollector,
): PipMarkerEnvironment | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (!isPlainObject(value)) {
    collector.add(location, "environment must be a mapping of marker names to strings");
    return null;
  }

  const environment: PipMarkerEnvironment = {};
  for (const [key, entry] of Object.entries(value)) {
    const marker = MARKER_KEYS.find((candidate) => candidate === key);
    if (marker === undefined) {
      collector.add(join(location, key), "unknown marker variable");
      continue;
    }
    if (typeof entry !== "string") {
      collector.add(join(location, key), "must be a string");
      continue;
    }
    environment[marker] = entry;
  }
  return environment;
}

async function parseRpmOptions(value: unknown, location: string, collector: IssueCollector): Promise<RpmOptions | null> {
  if (value === undefined || value === null) {
    return null;
  }
  if (!isPlainObject(value)) {
    collector.add(location, "options must be a mapping");
    return null;
  }

  rejectUnknownKeys(value, ["dnf", "ssl"], location, collector);

  return {
    dnf: parseDnfOptions(value["dnf"], join(location, "dnf"), collector),
    ssl: await parseSslOptions(value["ssl"], join(location, "ssl"), collector),
  };
}

function parseDnfOptions(
  value: unknown,
  location: string,
  collector: IssueCollector,
): Record<string, DnfRepoOptions> | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (!isPlainObject(value)) {
    collector.add(location, "dnf must be a mapping of repoid to repo options");
    return null;
  }

  const result: Record<string, DnfRepoOptions> = {};
  for (const [repoid, options] of Object.entries(value)) {
    if (!isPlainObject(options)) {
      collector.add(join(location, repoid), "repo options must be a mapping");
      continue;
    }
    const repoOptions: DnfRepoOptions = {};
    for (const [key, option] of Object.entries(options)) {
      if (typeof option === "string" || typeof option === "number" || typeof option === "boolean") {
        repoOptions[key] = option;
      } else {
        collector.add(`${location}.${repoid}.${key}`, "repo option values must be scalars");
      }
    }
    result[repoid] = repoOptions;
  }
  return result;
}

async function parseSslOptions(value: unknown, location: string, collector: IssueCollector): Promise<SslOptions | null> {
  if (value === undefined || value === null) {
    return null;
  }
  if (!isPlainObject(value)) {
    collector.add(location, "ssl must be a mapping");
    return null;
  }

  rejectUnknownKeys(value, ["clientCert", "clientKey", "caBundle", "sslVerify"], location, collector);

  const clientCert = await parseSslFile(value["clientCert"], join(location, "clientCert"), collector);
  const clientKey = await parseSslFile(value["clientKey"], join(location, "clientKey"), collector);
  const caBundle = await parseSslFile(value["caBundle"], join(location, "caBundle"), collector);

  if ((clientCert === null) !== (clientKey === null)) {
    collector.add(location, "When using client certificates, clientCert and clientKey must both be provided.");
  }

  return {
    clientCert,
    clientKey,
    caBundle,
    sslVerify: parseBoolean(value["sslVerify"], true, join(location, "sslVerify"), collector),
  };
}

async function parseSslFile(value: unknown, location: string, collector: IssueCollector): Promise<string | null> {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string" || !path.isAbsolute(value)) {
    collector.add(location, "must be an absolute file path");
    return null;
  }

  try {
    const stats = await stat(value);
    if (!stats.isFile()) {
      collector.add(location, `not a regular file: ${value}`);
    }
  } catch {
    collector.add(location, `file does not exist: ${value}`);
  }
  return value;
}

function dedupePackages(packages: readonly PackageInput[], collector: IssueCollector): PackageInput[] {
  const seen = new Map<string, string>();
  const unique: PackageInput[] = [];

  for (const input of packages) {
    const identity = `${input.type}:${input.path}`;
    const serialized = JSON.stringify(input);
    const previous = seen.get(identity);

    if (previous === undefined) {
      seen.set(identity, serialized);
      unique.push(input);
    } else if (previous !== serialized) {
      collector.add(
        "packages",
        `conflicting package definitions for ${input.type} at path "${input.path}"`,
      );
    }
  }

  return unique;
}
