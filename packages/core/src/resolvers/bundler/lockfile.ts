import { ResolutionError } from "../../errors.js";
import { parseDigest, type Digest } from "../../integrity/index.js";

export type GemSource =
  | { kind: "gem"; remote: string }
  | { kind: "git"; remote: string; revision: string; branch: string | null; tag: string | null }
  | { kind: "path"; remote: string };

export interface GemSpec {
  name: string;
  version: string;
  /** null for pure-ruby gems */
  platform: string | null;
  dependencies: string[];
  source: GemSource;
}

export interface GemfileLock {
  specs: GemSpec[];
  platforms: string[];
  /** Top-level dependency names from `DEPENDENCIES` */
  dependencies: string[];
  /** `name (version[-platform])` -> digests */
  checksums: Map<string, Digest[]>;
  bundledWith: string | null;
}

const SPEC_PATTERN = /^([^\s(]+) \(([^)]+)\)$/;

/** `1.15.4-x86_64-linux` -> version `1.15.4`, platform `x86_64-linux` */
export function splitPlatform(versionText: string): { version: string; platform: string | null } {
  const dash = versionText.indexOf("-");
  if (dash < 0) {
    return { version: versionText, platform: null };
  }
  const platform = versionText.slice(dash + 1);
  return { version: versionText.slice(0, dash), platform: platform === "ruby" ? null : platform };
}

export function checksumKey(spec: Pick<GemSpec, "name" | "version" | "platform">): string {
  return `${spec.name} (${spec.version}${spec.platform === null ? "" : `-${spec.platform}`})`;
}

interface SourceSection {
  kind: GemSource["kind"];
  fields: Map<string, string>;
  specs: { name: string; versionText: string; dependencies: string[] }[];
}

function toSource(section: SourceSection, where: string): GemSource {
  const remote = section.fields.get("remote");
  if (remote === undefined) {
    throw new ResolutionError(`${where} section has no remote`);
  }
  if (section.kind === "git") {
    const revision = section.fields.get("revision");
    if (revision === undefined) {
      throw new ResolutionError(`GIT section for ${remote} has no revision`);
    }
    return {
      kind: "git",
      remote,
      revision,
      branch: section.fields.get("branch") ?? null,
      tag: section.fields.get("tag") ?? null,
    };
  }
  return { kind: section.kind, remote };
}

/**
 * Parses a Gemfile.lock without evaluating the Gemfile.
 */
export function parseGemfileLock(text: string): GemfileLock {
  const lock: GemfileLock = { specs: [], platforms: [], dependencies: [], checksums: new Map(), bundledWith: null };
  const sections: SourceSection[] = [];
  let header: string | null = null;
  let current: SourceSection | null = null;
  let inSpecs = false;

  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim().length === 0) {
      return;
    }
    const indent = line.length - line.trimStart().length;
    const content = line.trim();

    if (indent === 0) {
      header = content;
      inSpecs = false;
      current = null;
      if (content === "GEM" || content === "GIT" || content === "PATH") {
        current = { kind: content === "GEM" ? "gem" : content === "GIT" ? "git" : "path", fields: new Map(), specs: [] };
        sections.push(current);
      }
      return;
    }

    if (current !== null) {
      const section: SourceSection = current;
      if (indent === 2) {
        if (content === "specs:") {
          inSpecs = true;
          return;
        }
        const colon = content.indexOf(":");
        if (colon > 0) {
          section.fields.set(content.slice(0, colon), content.slice(colon + 1).trim());
        }
        return;
      }
      if (!inSpecs) {
        return;
      }
      if (indent === 4) {
        const match = SPEC_PATTERN.exec(content);
        if (match === null) {
          throw new ResolutionError(`Gemfile.lock:${index + 1}: cannot parse spec "${content}"`);
        }
        section.specs.push({ name: match[1] ?? "", versionText: match[2] ?? "", dependencies: [] });
        return;
      }
      const owner = section.specs.at(-1);
      if (indent === 6 && owner !== undefined) {
        owner.dependencies.push(content.split(" ")[0] ?? content);
      }
      return;
    }

    switch (header) {
      case "PLATFORMS":
        lock.platforms.push(content);
        return;
      case "DEPENDENCIES":
        lock.dependencies.push((content.split(" ")[0] ?? content).replace(/!$/, ""));
        return;
      case "CHECKSUMS": {
        const match = /^(\S+ \([^)]+\))(?:\s+(.+))?$/.exec(content);
        if (match?.[1] !== undefined && match[2] !== undefined) {
          lock.checksums.set(
            match[1],
            match[2].split(",").flatMap((part) => parseDigest(part.trim())),
          );
        }
        return;
      }
      case "BUNDLED WITH":
        lock.bundledWith = content;
        return;
      default:
        return;
    }
  });

  for (const section of sections) {
    const source = toSource(section, section.kind.toUpperCase());
    for (const spec of section.specs) {
      const { version, platform } = splitPlatform(spec.versionText);
      lock.specs.push({ name: spec.name, version, platform, dependencies: spec.dependencies, source });
    }
  }

  return lock;
}
