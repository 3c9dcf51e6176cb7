import type { EcosystemName } from "./ecosystem.js";

export const REQUEST_FLAGS = ["cgo-disable", "gomod-vendor", "gomod-vendor-check"] as const;
export type RequestFlag = (typeof REQUEST_FLAGS)[number];

/**
 * strict: artifacts without a declared digest are rejected (commit-pinned VCS archives excepted).
 * permissive: such artifacts are trusted on first use and reported as such.
 */
export type RequestMode = "strict" | "permissive";

export interface BasePackageInput<TType extends EcosystemName> {
  type: TType;
  /** Package directory relative to the source directory. */
  path: string;
  /** Dispatch the resolver even when auto-detection finds nothing to do. */
  force: boolean;
}

export interface NpmPackageInput extends BasePackageInput<"npm"> {
  includeDev: boolean;
}

export interface YarnPackageInput extends BasePackageInput<"yarn"> {
  includeDev: boolean;
}

/** PEP 508 marker variables describing the build target. */
export interface PipMarkerEnvironment {
  python_version?: string;
  python_full_version?: string;
  sys_platform?: string;
  platform_machine?: string;
  platform_system?: string;
  platform_release?: string;
  os_name?: string;
  implementation_name?: string;
  platform_python_implementation?: string;
}

export interface PipPackageInput extends BasePackageInput<"pip"> {
  requirementsFiles: string[] | null;
  requirementsBuildFiles: string[] | null;
  allowBinary: boolean;
  environment: PipMarkerEnvironment | null;
}

export type GomodPackageInput = BasePackageInput<"gomod">;

export interface BundlerPackageInput extends BasePackageInput<"bundler"> {
  allowBinary: boolean;
}

export type CargoPackageInput = BasePackageInput<"cargo">;

export interface SslOptions {
  clientCert: string | null;
  clientKey: string | null;
  caBundle: string | null;
  sslVerify: boolean;
}

export type DnfRepoOptions = Record<string, string | number | boolean>;

export interface RpmOptions {
  dnf: Record<string, DnfRepoOptions> | null;
  ssl: SslOptions | null;
}

export interface RpmPackageInput extends BasePackageInput<"rpm"> {
  arches: string[] | null;
  options: RpmOptions | null;
}

export interface GenericPackageInput extends BasePackageInput<"generic"> {
  lockfile: string;
}

export type PackageInput =
  | NpmPackageInput
  | YarnPackageInput
  | PipPackageInput
  | GomodPackageInput
  | BundlerPackageInput
  | CargoPackageInput
  | RpmPackageInput
  | GenericPackageInput;

export type PackageInputOf<TType extends EcosystemName> = Extract<PackageInput, { type: TType }>;

export interface PrefetchRequest {
  readonly sourceDir: string;
  readonly outputDir: string;
  readonly packages: readonly PackageInput[];
  readonly flags: ReadonlySet<RequestFlag>;
  readonly mode: RequestMode;
}
