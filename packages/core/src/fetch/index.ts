export { assertAllowedUrl, fetchText, fetchToCache, isTransientStatus } from "./client.js";
export { authorizationFor } from "./auth.js";
export { createGitArchiver, type GitArchiveRequest, type GitArchiver } from "./git.js";
export { createTlsTransport, defaultFetch, type TlsTransport } from "./transport.js";
export type {
  ArtifactRequest,
  FetchContext,
  FetchInit,
  FetchLike,
  FetchResponse,
  FetchResult,
  FetchSettings,
} from "./types.js";
