export interface RetrySettings {
  /** Total attempts including the first one */
  attempts: number;
  minTimeoutMs: number;
  maxTimeoutMs: number;
  factor: number;
}

export interface RegistrySettings {
  npm: string;
  pypi: string;
  goproxy: string;
  cratesDownload: string;
}

export type AuthCredentials =
  | { token: string }
  | { username: string; password: string };

export interface PrefetchConfig {
  concurrency: number;
  retry: RetrySettings;
  requestTimeoutMs: number;
  /** Shared cache root; `<outputDir>/cache` when null */
  cacheDir: string | null;
  registries: RegistrySettings;
  /** URL prefix -> credentials, placeholders already resolved */
  auth: Record<string, AuthCredentials>;
  allowInsecureHttp: boolean;
}

export interface PrefetchConfigOverrides {
  concurrency?: number;
  retry?: Partial<RetrySettings>;
  requestTimeoutMs?: number;
  cacheDir?: string | null;
  registries?: Partial<RegistrySettings>;
  auth?: Record<string, AuthCredentials>;
  allowInsecureHttp?: boolean;
}

export interface ResolvePrefetchConfigOptions {
  /** Config file; `PREFETCH_CONFIG` or `~/.config/prefetch/config.yaml` otherwise */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PrefetchConfigOverrides;
}
