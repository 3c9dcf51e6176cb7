import type {
  ComponentOrigin,
  ComponentReportEntry,
  EnvTemplate,
  FetchFailure,
  ProjectFileTemplate,
} from "./component.js";
import { isEcosystemName, type EcosystemName } from "./ecosystem.js";
import { isPlainObject, isStringRecord } from "./json.js";

export const REQUEST_OUTPUT_SCHEMA_VERSION = 1;

export type EcosystemStatus = "complete" | "partial" | "failed" | "skipped";

export interface EcosystemSummary {
  readonly ecosystem: EcosystemName;
  readonly packagePath: string;
  readonly status: EcosystemStatus;
  readonly fetched: number;
  readonly failures: readonly FetchFailure[];
  /** Set when the whole ecosystem failed before or outside fetching. */
  readonly error?: { code: string; message: string };
}

export interface CollidingComponent {
  readonly ecosystem: EcosystemName;
  readonly purl: string;
  readonly version: string;
}

/** Same package name declared by more than one ecosystem; reported, never merged. */
export interface IdentityCollision {
  readonly name: string;
  readonly components: readonly CollidingComponent[];
}

export interface RequestOutput {
  readonly schemaVersion: typeof REQUEST_OUTPUT_SCHEMA_VERSION;
  readonly components: readonly ComponentReportEntry[];
  readonly environment: readonly EnvTemplate[];
  readonly projectFiles: readonly ProjectFileTemplate[];
  readonly collisions: readonly IdentityCollision[];
  readonly summaries: readonly EcosystemSummary[];
}

export interface EnvAssignment {
  readonly name: string;
  readonly value: string;
}

export interface FileEdit {
  /** Stable identifier derived from path and content. */
  readonly id: string;
  readonly path: string;
  readonly content: string;
}

const ORIGIN_KINDS = new Set(["registry", "vcs", "url", "local"]);
const ROLES = new Set(["direct", "transitive"]);
const SCOPES = new Set(["runtime", "dev"]);
const INTEGRITY_SOURCES = new Set(["declared", "trust-on-first-use", "none"]);
const STATUSES = new Set(["complete", "partial", "failed", "skipped"]);
const ENV_KINDS = new Set(["literal", "path"]);

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isOrigin(value: unknown): value is ComponentOrigin {
  return (
    isPlainObject(value) &&
    isString(value["kind"]) &&
    ORIGIN_KINDS.has(value["kind"]) &&
    isString(value["location"])
  );
}

export function isComponentReportEntry(value: unknown): value is ComponentReportEntry {
  if (!isPlainObject(value)) {
    return false;
  }

  const integrity = value["integrity"];
  return (
    isString(value["purl"]) &&
    isEcosystemName(value["ecosystem"]) &&
    isString(value["name"]) &&
    isString(value["version"]) &&
    (integrity === null || isString(integrity)) &&
    isString(value["integritySource"]) &&
    INTEGRITY_SOURCES.has(value["integritySource"]) &&
    isOrigin(value["origin"]) &&
    isString(value["role"]) &&
    ROLES.has(value["role"]) &&
    isString(value["scope"]) &&
    SCOPES.has(value["scope"]) &&
    isString(value["packagePath"]) &&
    isStringRecord(value["properties"])
  );
}

function isFetchFailure(value: unknown): value is FetchFailure {
  return (
    isPlainObject(value) &&
    isString(value["name"]) &&
    isString(value["version"]) &&
    isString(value["purl"]) &&
    isString(value["code"]) &&
    isString(value["message"])
  );
}

function isEnvTemplate(value: unknown): value is EnvTemplate {
  return (
    isPlainObject(value) &&
    isString(value["name"]) &&
    isString(value["value"]) &&
    isString(value["kind"]) &&
    ENV_KINDS.has(value["kind"])
  );
}

function isProjectFileTemplate(value: unknown): value is ProjectFileTemplate {
  return isPlainObject(value) && isString(value["path"]) && isString(value["template"]);
}

function isCollision(value: unknown): value is IdentityCollision {
  if (!isPlainObject(value) || !isString(value["name"])) {
    return false;
  }

  const components = value["components"];
  return (
    Array.isArray(components) &&
    components.every(
      (item) =>
        isPlainObject(item) &&
        isEcosystemName(item["ecosystem"]) &&
        isString(item["purl"]) &&
        isString(item["version"]),
    )
  );
}

function isSummary(value: unknown): value is EcosystemSummary {
  if (!isPlainObject(value)) {
    return false;
  }

  const error = value["error"];
  const failures = value["failures"];
  return (
    isEcosystemName(value["ecosystem"]) &&
    isString(value["packagePath"]) &&
    isString(value["status"]) &&
    STATUSES.has(value["status"]) &&
    typeof value["fetched"] === "number" &&
    Array.isArray(failures) &&
    failures.every(isFetchFailure) &&
    (error === undefined ||
      (isPlainObject(error) && isString(error["code"]) && isString(error["message"])))
  );
}

function everyItem<T>(value: unknown, guard: (item: unknown) => item is T): value is T[] {
  return Array.isArray(value) && value.every(guard);
}

export function isRequestOutput(value: unknown): value is RequestOutput {
  if (!isPlainObject(value)) {
    return false;
  }

  return (
    value["schemaVersion"] === REQUEST_OUTPUT_SCHEMA_VERSION &&
    everyItem(value["components"], isComponentReportEntry) &&
    everyItem(value["environment"], isEnvTemplate) &&
    everyItem(value["projectFiles"], isProjectFileTemplate) &&
    everyItem(value["collisions"], isCollision) &&
    everyItem(value["summaries"], isSummary)
  );
}
