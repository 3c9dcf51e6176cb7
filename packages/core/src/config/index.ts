export { resolvePrefetchConfig, resolveEnvPlaceholders, mergeConfig, parseConfigDocument } from "./loader.js";
export { DEFAULT_CONFIG, CONFIG_FILE_RELATIVE_PATH } from "./defaults.js";
export type {
  AuthCredentials,
  PrefetchConfig,
  PrefetchConfigOverrides,
  RegistrySettings,
  ResolvePrefetchConfigOptions,
  RetrySettings,
} from "./types.js";
