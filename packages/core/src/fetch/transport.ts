import { readFile } from "node:fs/promises";

import type { SslOptions } from "@prefetch/types";
import { Agent, fetch as undiciFetch } from "undici";

import type { FetchLike } from "./types.js";

/** undici's fetch on the global dispatcher. */
export const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

export interface TlsTransport {
  fetchImpl: FetchLike;
  close(): Promise<void>;
}

/**
 * Transport presenting a client certificate and trusting a custom CA bundle.
 */
export async function createTlsTransport(ssl: SslOptions): Promise<TlsTransport> {
  const [cert, key, ca] = await Promise.all([
    ssl.clientCert === null ? undefined : readFile(ssl.clientCert),
    ssl.clientKey === null ? undefined : readFile(ssl.clientKey),
    ssl.caBundle === null ? undefined : readFile(ssl.caBundle),
  ]);

  const agent = new Agent({
    connect: {
      cert,
      key,
      ca,
      rejectUnauthorized: ssl.sslVerify,
    },
  });

  return {
    fetchImpl: (url, init) => undiciFetch(url, { ...init, dispatcher: agent }),
    close: () => agent.close(),
  };
}
