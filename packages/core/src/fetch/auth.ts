import type { AuthCredentials } from "../config/index.js";

/**
 * Authorization header for the longest configured prefix of `url`.
 */
export function authorizationFor(url: string, auth: Readonly<Record<string, AuthCredentials>>): string | undefined {
  let matchedPrefix: string | undefined;
  for (const prefix of Object.keys(auth)) {
    if (url.startsWith(prefix) && (matchedPrefix === undefined || prefix.length > matchedPrefix.length)) {
      matchedPrefix = prefix;
    }
  }

  if (matchedPrefix === undefined) {
    return undefined;
  }

  const credentials = auth[matchedPrefix];
  if (credentials === undefined) {
    return undefined;
  }

  if ("token" in credentials) {
    return `Bearer ${credentials.token}`;
  }

  const encoded = Buffer.from(`${credentials.username}:${credentials.password}`, "utf8").toString("base64");
  return `Basic ${encoded}`;
}
