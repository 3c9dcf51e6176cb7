import { isPlainObject } from "@prefetch/types";

import { ResolutionError } from "../../errors.js";
import { fetchText } from "../../fetch/index.js";
import type { ResolverContext } from "../types.js";

export type DistributionKind = "sdist" | "wheel";

export interface DistributionFile {
  filename: string;
  url: string;
  sha256: string | null;
  kind: DistributionKind;
  yanked: boolean;
}

const SDIST_PREFERENCE = [".tar.gz", ".tar.bz2", ".zip"];

/** `https://host/simple/` and `https://host` both become `https://host`. */
export function indexBase(indexUrl: string): string {
  return indexUrl.replace(/\/+$/, "").replace(/\/simple$/, "");
}

export function releaseMetadataUrl(base: string, name: string, version: string): string {
  return `${base}/pypi/${encodeURIComponent(name)}/${encodeURIComponent(version)}/json`;
}

function sdistRank(filename: string): number {
  const rank = SDIST_PREFERENCE.findIndex((extension) => filename.endsWith(extension));
  return rank < 0 ? SDIST_PREFERENCE.length : rank;
}

/**
 * Preferred sdist: by archive format, then by file name.
 */
export function pickSdist(files: readonly DistributionFile[]): DistributionFile | null {
  const sdists = files
    .filter((file) => file.kind === "sdist")
    .sort((left, right) => sdistRank(left.filename) - sdistRank(right.filename) || (left.filename < right.filename ? -1 : left.filename > right.filename ? 1 : 0));
  return sdists[0] ?? null;
}

export function parseReleaseMetadata(document: unknown, what: string): DistributionFile[] {
  if (!isPlainObject(document) || !Array.isArray(document["urls"])) {
    throw new ResolutionError(`Index metadata for ${what} has no "urls" list`);
  }

  const files: DistributionFile[] = [];
  const items: unknown[] = document["urls"];
  for (const item of items) {
    if (!isPlainObject(item)) {
      continue;
    }
    const { filename, url, packagetype, digests, yanked } = item;
    if (typeof filename !== "string" || typeof url !== "string") {
      continue;
    }
    const sha256 = isPlainObject(digests) && typeof digests["sha256"] === "string" ? digests["sha256"] : null;
    files.push({
      filename,
      url,
      sha256,
      kind: packagetype === "bdist_wheel" || filename.endsWith(".whl") ? "wheel" : "sdist",
      yanked: yanked === true,
    });
  }
  return files;
}

/**
 * Files of one release from the index JSON API.
 */
export async function fetchReleaseFiles(base: string, name: string, version: string, context: ResolverContext): Promise<DistributionFile[]> {
  const url = releaseMetadataUrl(base, name, version);
  const text = await fetchText(
    url,
    { fetchImpl: context.fetchImpl, settings: context.config, logger: context.logger, signal: context.signal },
    "application/json",
  );

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ResolutionError(`Index metadata at ${url} is not valid JSON`, { cause: error });
  }
  return parseReleaseMetadata(document, `${name}==${version}`);
}
