import type { ComponentReport, RequestOutput } from "@prefetch/types";

export interface PrefetchErrorOptions extends ErrorOptions {
  /** Next step shown to the user */
  suggestion?: string;
}

/**
 * Base error for everything the prefetcher raises on purpose.
 */
export class PrefetchError extends Error {
  override name = "PrefetchError";
  readonly code: string;
  readonly suggestion?: string;

  constructor(code: string, message: string, options?: PrefetchErrorOptions) {
    super(message, options);
    this.code = code;
    this.suggestion = options?.suggestion;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ValidationIssue {
  /** Dotted location inside the input, e.g. `packages.0.path` */
  location: string;
  message: string;
}

export class InvalidInputError extends PrefetchError {
  override name = "InvalidInputError";
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], options?: PrefetchErrorOptions) {
    super("INVALID_INPUT", formatIssues(issues), options);
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  const noun = issues.length === 1 ? "error" : "errors";
  const lines = issues.map((issue) =>
    issue.location.length > 0 ? `${issue.location}\n  ${issue.message}` : issue.message,
  );
  return [`${issues.length} validation ${noun} for user input`, ...lines].join("\n");
}

export class ConfigError extends PrefetchError {
  override name = "ConfigError";

  constructor(message: string, options?: PrefetchErrorOptions) {
    super("CONFIG_ERROR", message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A manifest or lockfile cannot be parsed, or resolving it would require running project code.
 * Fatal for one ecosystem only.
 */
export class ResolutionError extends PrefetchError {
  override name = "ResolutionError";

  constructor(message: string, options?: PrefetchErrorOptions) {
    super("RESOLUTION_ERROR", message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type FetchErrorKind = "transient" | "permanent";

export interface FetchErrorOptions extends PrefetchErrorOptions {
  kind: FetchErrorKind;
  url: string;
  statusCode?: number;
  attempts?: number;
}

export class FetchError extends PrefetchError {
  override name = "FetchError";
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly statusCode?: number;
  readonly attempts: number;

  constructor(message: string, options: FetchErrorOptions) {
    super("FETCH_ERROR", message, options);
    this.kind = options.kind;
    this.url = options.url;
    this.statusCode = options.statusCode;
    this.attempts = options.attempts ?? 1;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface IntegrityMismatchErrorOptions extends PrefetchErrorOptions {
  algorithm: string;
  expected: readonly string[];
  actual: string;
  url?: string;
}

/**
 * Downloaded content does not match its declared digest. Never retried.
 */
export class IntegrityMismatchError extends PrefetchError {
  override name = "IntegrityMismatchError";
  readonly algorithm: string;
  readonly expected: readonly string[];
  readonly actual: string;
  readonly url?: string;

  constructor(message: string, options: IntegrityMismatchErrorOptions) {
    super("INTEGRITY_MISMATCH", message, {
      suggestion: "The artifact differs from what the lockfile declares. Check the source for tampering.",
      ...options,
    });
    this.algorithm = options.algorithm;
    this.expected = options.expected;
    this.actual = options.actual;
    this.url = options.url;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnverifiableArtifactError extends PrefetchError {
  override name = "UnverifiableArtifactError";
  readonly url: string;

  constructor(url: string, options?: PrefetchErrorOptions) {
    super("UNVERIFIABLE_ARTIFACT", `No digest is declared for ${url}`, {
      suggestion: "Pin the artifact with a checksum, or run in permissive mode to trust it on first use.",
      ...options,
    });
    this.url = url;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A stored blob no longer hashes to its key. Indicates filesystem corruption.
 */
export class CacheCorruptionError extends PrefetchError {
  override name = "CacheCorruptionError";
  readonly blobPath: string;

  constructor(message: string, blobPath: string, options?: PrefetchErrorOptions) {
    super("CACHE_CORRUPTION", message, {
      suggestion: `Remove ${blobPath} and run the prefetch again.`,
      ...options,
    });
    this.blobPath = blobPath;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PartialFetchError extends PrefetchError {
  override name = "PartialFetchError";
  readonly report: ComponentReport;

  constructor(report: ComponentReport, options?: PrefetchErrorOptions) {
    super(
      "PARTIAL_FETCH",
      `${report.failures.length} of ${report.failures.length + report.entries.length} ${report.ecosystem} dependencies failed to fetch`,
      options,
    );
    this.report = report;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface EcosystemFailure {
  ecosystem: string;
  packagePath: string;
  error: PrefetchError;
}

export class OrchestratorError extends PrefetchError {
  override name = "OrchestratorError";
  readonly failures: readonly EcosystemFailure[];
  readonly output: RequestOutput;

  constructor(failures: readonly EcosystemFailure[], output: RequestOutput, options?: PrefetchErrorOptions) {
    const lines = failures.map(
      (failure) => `  ${failure.ecosystem} (${failure.packagePath}): ${describeError(failure.error)}`,
    );
    super("ORCHESTRATOR_ERROR", [`Prefetch failed for ${failures.length} package input(s)`, ...lines].join("\n"), options);
    this.failures = failures;
    this.output = output;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CancelledError extends PrefetchError {
  override name = "CancelledError";

  constructor(message = "The prefetch run was cancelled", options?: PrefetchErrorOptions) {
    super("CANCELLED", message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isPrefetchError(value: unknown): value is PrefetchError {
  return value instanceof PrefetchError;
}

export function toPrefetchError(error: unknown): PrefetchError {
  if (isPrefetchError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new PrefetchError("INTERNAL_ERROR", error.message, { cause: error });
  }

  return new PrefetchError("INTERNAL_ERROR", `Unexpected failure: ${String(error)}`);
}

/**
 * One line: `CODE: message`, first message line only.
 */
export function describeError(error: unknown): string {
  const normalized = toPrefetchError(error);
  const firstLine = normalized.message.split("\n")[0] ?? "";
  return `${normalized.code}: ${firstLine}`;
}
