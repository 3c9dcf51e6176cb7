import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";

import { isPlainObject } from "@prefetch/types";
import YAML from "yaml";

import { ConfigError } from "../errors.js";
import { CONFIG_FILE_RELATIVE_PATH, DEFAULT_CONFIG } from "./defaults.js";
import type {
  AuthCredentials,
  PrefetchConfig,
  PrefetchConfigOverrides,
  RegistrySettings,
  ResolvePrefetchConfigOptions,
  RetrySettings,
} from "./types.js";

const ENV_PLACEHOLDER_PATTERN = /\$\{([A-Z0-9_]+)\}/g;

const REGISTRY_KEYS = ["npm", "pypi", "goproxy", "cratesDownload"] as const;
const RETRY_KEYS = ["attempts", "minTimeoutMs", "maxTimeoutMs", "factor"] as const;

/**
 * Layers defaults < config file < environment < explicit overrides.
 */
export async function resolvePrefetchConfig(options: ResolvePrefetchConfigOptions = {}): Promise<PrefetchConfig> {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? nonEmpty(env.PREFETCH_CONFIG);
  const configPath = explicitPath ?? path.join(homedir(), CONFIG_FILE_RELATIVE_PATH);

  const fromFile = await loadConfigFile(configPath, explicitPath !== undefined);
  const fromEnv = readEnvironmentOverrides(env);

  const merged = mergeConfig(mergeConfig(mergeConfig(DEFAULT_CONFIG, fromFile), fromEnv), options.overrides ?? {});
  return finalizeConfig(merged, env);
}

async function loadConfigFile(configPath: string, required: boolean): Promise<PrefetchConfigOverrides> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (error) {
    if (!required && isMissingFile(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read config file ${configPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid YAML`, { cause: error });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  return parseConfigDocument(parsed, configPath);
}

function isMissingFile(error: unknown): boolean {
  return isPlainObjectLike(error) && error["code"] === "ENOENT";
}

function isPlainObjectLike(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function parseConfigDocument(value: unknown, source: string): PrefetchConfigOverrides {
  if (!isPlainObject(value)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`);
  }

  const problems: string[] = [];
  const result: PrefetchConfigOverrides = {};

  for (const [key, entry] of Object.entries(value)) {
    switch (key) {
      case "concurrency":
      case "requestTimeoutMs":
        if (isPositiveInteger(entry)) {
          result[key] = entry;
        } else {
          problems.push(`${key} must be a positive integer`);
        }
        break;
      case "cacheDir":
        if (entry === null || typeof entry === "string") {
          result.cacheDir = entry;
        } else {
          problems.push("cacheDir must be a string");
        }
        break;
      case "allowInsecureHttp":
        if (typeof entry === "boolean") {
          result.allowInsecureHttp = entry;
        } else {
          problems.push("allowInsecureHttp must be a boolean");
        }
        break;
      case "retry":
        result.retry = parseRetry(entry, problems);
        break;
      case "registries":
        result.registries = parseRegistries(entry, problems);
        break;
      case "auth":
        result.auth = parseAuth(entry, problems);
        break;
      default:
        problems.push(`unknown setting "${key}"`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(`${source}: ${problems.join("; ")}`);
  }

  return result;
}

function parseRetry(value: unknown, problems: string[]): Partial<RetrySettings> {
  if (!isPlainObject(value)) {
    problems.push("retry must be a mapping");
    return {};
  }

  const retry: Partial<RetrySettings> = {};
  for (const key of RETRY_KEYS) {
    const entry = value[key];
    if (entry === undefined) {
      continue;
    }
    if (typeof entry === "number" && Number.isFinite(entry) && entry > 0) {
      retry[key] = entry;
    } else {
      problems.push(`retry.${key} must be a positive number`);
    }
  }
  return retry;
}

function parseRegistries(value: unknown, problems: string[]): Partial<RegistrySettings> {
  if (!isPlainObject(value)) {
    problems.push("registries must be a mapping");
    return {};
  }

  const registries: Partial<RegistrySettings> = {};
  for (const key of REGISTRY_KEYS) {
    const entry = value[key];
    if (entry === undefined) {
      continue;
    }
    if (typeof entry === "string" && isHttpUrl(entry)) {
      registries[key] = entry;
    } else {
      problems.push(`registries.${key} must be an http(s) URL`);
    }
  }
  return registries;
}

function parseAuth(value: unknown, problems: string[]): Record<string, AuthCredentials> {
  if (!isPlainObject(value)) {
    problems.push("auth must be a mapping of URL prefix to credentials");
    return {};
  }

  const auth: Record<string, AuthCredentials> = {};
  for (const [prefix, entry] of Object.entries(value)) {
    if (!isPlainObject(entry)) {
      problems.push(`auth["${prefix}"] must be a mapping`);
      continue;
    }

    const token = entry["token"];
    const username = entry["username"];
    const password = entry["password"];
    if (typeof token === "string") {
      auth[prefix] = { token };
    } else if (typeof username === "string" && typeof password === "string") {
      auth[prefix] = { username, password };
    } else {
      problems.push(`auth["${prefix}"] needs either token or username and password`);
    }
  }
  return auth;
}

function readEnvironmentOverrides(env: NodeJS.ProcessEnv): PrefetchConfigOverrides {
  const result: PrefetchConfigOverrides = {};

  const concurrency = readIntegerEnv(env, "PREFETCH_CONCURRENCY");
  if (concurrency !== undefined) {
    result.concurrency = concurrency;
  }

  const timeout = readIntegerEnv(env, "PREFETCH_REQUEST_TIMEOUT_MS");
  if (timeout !== undefined) {
    result.requestTimeoutMs = timeout;
  }

  const attempts = readIntegerEnv(env, "PREFETCH_RETRY_ATTEMPTS");
  if (attempts !== undefined) {
    result.retry = { attempts };
  }

  const cacheDir = nonEmpty(env.PREFETCH_CACHE_DIR);
  if (cacheDir !== undefined) {
    result.cacheDir = cacheDir;
  }

  const registries: Partial<RegistrySettings> = {};
  const npm = nonEmpty(env.PREFETCH_NPM_REGISTRY);
  const pypi = nonEmpty(env.PREFETCH_PYPI_URL);
  const goproxy = nonEmpty(env.PREFETCH_GOPROXY);
  const cratesDownload = nonEmpty(env.PREFETCH_CRATES_DOWNLOAD_URL);
  if (npm !== undefined) registries.npm = npm;
  if (pypi !== undefined) registries.pypi = pypi;
  if (goproxy !== undefined) registries.goproxy = goproxy;
  if (cratesDownload !== undefined) registries.cratesDownload = cratesDownload;
  if (Object.keys(registries).length > 0) {
    result.registries = registries;
  }

  const insecure = nonEmpty(env.PREFETCH_ALLOW_INSECURE_HTTP);
  if (insecure !== undefined) {
    result.allowInsecureHttp = parseBooleanEnv("PREFETCH_ALLOW_INSECURE_HTTP", insecure);
  }

  return result;
}

function readIntegerEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = nonEmpty(env[name]);
  if (raw === undefined) {
    return undefined;
  }

  const value = Number(raw);
  if (!isPositiveInteger(value)) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseBooleanEnv(name: string, raw: string): boolean {
  const normalized = raw.toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

export function mergeConfig(base: PrefetchConfig, overrides: PrefetchConfigOverrides): PrefetchConfig {
  return {
    concurrency: overrides.concurrency ?? base.concurrency,
    retry: { ...base.retry, ...overrides.retry },
    requestTimeoutMs: overrides.requestTimeoutMs ?? base.requestTimeoutMs,
    cacheDir: overrides.cacheDir !== undefined ? overrides.cacheDir : base.cacheDir,
    registries: { ...base.registries, ...overrides.registries },
    auth: { ...base.auth, ...overrides.auth },
    allowInsecureHttp: overrides.allowInsecureHttp ?? base.allowInsecureHttp,
  };
}

function finalizeConfig(config: PrefetchConfig, env: NodeJS.ProcessEnv): PrefetchConfig {
  if (!isPositiveInteger(config.concurrency)) {
    throw new ConfigError("concurrency must be a positive integer");
  }
  if (!Number.isInteger(config.retry.attempts) || config.retry.attempts < 1) {
    throw new ConfigError("retry.attempts must be an integer of at least 1");
  }
  if (config.retry.minTimeoutMs > config.retry.maxTimeoutMs) {
    throw new ConfigError("retry.minTimeoutMs must not exceed retry.maxTimeoutMs");
  }
  if (config.cacheDir !== null && !path.isAbsolute(config.cacheDir)) {
    throw new ConfigError(`cacheDir must be an absolute path, got "${config.cacheDir}"`);
  }

  const registries: RegistrySettings = {
    npm: trimTrailingSlash(config.registries.npm),
    pypi: trimTrailingSlash(config.registries.pypi),
    goproxy: trimTrailingSlash(config.registries.goproxy),
    cratesDownload: trimTrailingSlash(config.registries.cratesDownload),
  };

  const auth: Record<string, AuthCredentials> = {};
  for (const [prefix, credentials] of Object.entries(config.auth)) {
    auth[prefix] =
      "token" in credentials
        ? { token: resolveEnvPlaceholders(credentials.token, env) }
        : {
            username: resolveEnvPlaceholders(credentials.username, env),
            password: resolveEnvPlaceholders(credentials.password, env),
          };
  }

  return { ...config, registries, auth };
}

/**
 * Replaces `${NAME}` occurrences with environment values.
 */
export function resolveEnvPlaceholders(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(ENV_PLACEHOLDER_PATTERN, (_match, name: string) => {
    const resolved = env[name];
    if (typeof resolved !== "string" || resolved.length === 0) {
      throw new ConfigError(`Environment variable ${name} referenced by an auth setting is not set`, {
        suggestion: `Export ${name} before running the prefetch.`,
      });
    }
    return resolved;
  });
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function trimTrailingSlash(value: string): string {
  return value.endsWith("/") ? value.slice(0, -1) : value;
}
