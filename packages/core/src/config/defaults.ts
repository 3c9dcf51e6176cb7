import type { PrefetchConfig } from "./types.js";

export const CONFIG_FILE_RELATIVE_PATH = ".config/prefetch/config.yaml";

export const DEFAULT_CONFIG: PrefetchConfig = {
  concurrency: 5,
  retry: {
    attempts: 3,
    minTimeoutMs: 500,
    maxTimeoutMs: 10_000,
    factor: 2,
  },
  requestTimeoutMs: 60_000,
  cacheDir: null,
  registries: {
    npm: "https://registry.npmjs.org",
    pypi: "https://pypi.org",
    goproxy: "https://proxy.golang.org",
    cratesDownload: "https://static.crates.io/crates",
  },
  auth: {},
  allowInsecureHttp: false,
};
