import type { EcosystemName } from "./ecosystem.js";

export type OriginKind = "registry" | "vcs" | "url" | "local";

export interface ComponentOrigin {
  kind: OriginKind;
  /** Registry URL, VCS URL with ref, download URL, or project-relative path. */
  location: string;
}

export type ComponentRole = "direct" | "transitive";

export type ComponentScope = "runtime" | "dev";

/** How the reported digest came to be trusted. */
export type IntegritySource = "declared" | "trust-on-first-use" | "none";

/**
 * Flattened, externally visible projection of one fetched dependency.
 * This is the input contract of SBOM assembly.
 */
export interface ComponentReportEntry {
  readonly purl: string;
  readonly ecosystem: EcosystemName;
  readonly name: string;
  readonly version: string;
  /** Digest verified during fetch, `<algorithm>:<hex>` or `h1:<base64>`; null for local components. */
  readonly integrity: string | null;
  readonly integritySource: IntegritySource;
  readonly origin: ComponentOrigin;
  readonly role: ComponentRole;
  readonly scope: ComponentScope;
  readonly packagePath: string;
  readonly properties: Readonly<Record<string, string>>;
}

export interface FetchFailure {
  readonly name: string;
  readonly version: string;
  readonly purl: string;
  readonly code: string;
  readonly message: string;
}

export type EnvValueKind = "literal" | "path";

/** Environment variable produced by a resolver; path values are relative to the output directory. */
export interface EnvTemplate {
  readonly name: string;
  readonly value: string;
  readonly kind: EnvValueKind;
}

/**
 * Full content of a file to inject. `path` is absolute or starts with `${output_dir}`;
 * `${output_dir}` inside `template` is replaced when emitted.
 */
export interface ProjectFileTemplate {
  readonly path: string;
  readonly template: string;
}

export const OUTPUT_DIR_PLACEHOLDER = "${output_dir}";

export interface ComponentReport {
  readonly ecosystem: EcosystemName;
  readonly packagePath: string;
  readonly entries: readonly ComponentReportEntry[];
  readonly failures: readonly FetchFailure[];
  readonly environment: readonly EnvTemplate[];
  readonly projectFiles: readonly ProjectFileTemplate[];
}
