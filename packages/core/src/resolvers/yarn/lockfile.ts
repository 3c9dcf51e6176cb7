import { ResolutionError } from "../../errors.js";

export interface YarnLockEntry {
  /** Specifiers sharing this entry, e.g. `lodash@^4.17.0` */
  specifiers: string[];
  name: string;
  version: string;
  resolved: string | undefined;
  integrity: string | undefined;
  /** name -> range, declaration order */
  dependencies: Map<string, string>;
  optionalDependencies: Map<string, string>;
  /** Zero-based line of the `resolved` field */
  resolvedLine: number | undefined;
}

export interface YarnLock {
  entries: YarnLockEntry[];
  /** specifier -> entry */
  bySpecifier: Map<string, YarnLockEntry>;
  lines: string[];
}

/** Splits `name@range`, keeping the leading `@` of scoped names. */
export function splitSpecifier(specifier: string): { name: string; range: string } {
  const at = specifier.indexOf("@", 1);
  if (at <= 0) {
    return { name: specifier, range: "" };
  }
  return { name: specifier.slice(0, at), range: specifier.slice(at + 1) };
}

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\(.)/g, "$1");
  }
  return trimmed;
}

/** `key value` where either side may be quoted. */
function splitKeyValue(text: string): [string, string] {
  if (text.startsWith('"')) {
    const close = text.indexOf('"', 1);
    return [text.slice(1, close), text.slice(close + 1).trim()];
  }
  const space = text.indexOf(" ");
  return space < 0 ? [text, ""] : [text.slice(0, space), text.slice(space + 1).trim()];
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Parses a yarn classic (v1) lockfile. Berry lockfiles are refused.
 */
export function parseYarnLock(text: string): YarnLock {
  const lines = text.split(/\r?\n/);
  const entries: YarnLockEntry[] = [];
  const bySpecifier = new Map<string, YarnLockEntry>();

  let current: YarnLockEntry | null = null;
  let section: Map<string, string> | null = null;

  const finish = (): void => {
    if (current === null) {
      return;
    }
    if (current.version.length === 0) {
      throw new ResolutionError(`yarn.lock entry ${current.specifiers.join(", ")} has no version`);
    }
    entries.push(current);
    for (const specifier of current.specifiers) {
      bySpecifier.set(specifier, current);
    }
    current = null;
  };

  lines.forEach((line, lineIndex) => {
    if (line.trim().length === 0 || line.trimStart().startsWith("#")) {
      return;
    }
    const indent = indentOf(line);
    const content = line.trim();

    if (indent === 0) {
      finish();
      if (!content.endsWith(":")) {
        throw new ResolutionError(`Unexpected yarn.lock line ${lineIndex + 1}: ${content}`);
      }
      const specifiers = content
        .slice(0, -1)
        .split(",")
        .map(unquote)
        .filter((specifier) => specifier.length > 0);
      if (specifiers.includes("__metadata")) {
        throw new ResolutionError("yarn.lock was written by Yarn 2 or later", {
          suggestion: "Only yarn classic (v1) lockfiles are supported.",
        });
      }
      const first = specifiers[0];
      if (first === undefined) {
        throw new ResolutionError(`Empty yarn.lock entry header at line ${lineIndex + 1}`);
      }
      current = {
        specifiers,
        name: splitSpecifier(first).name,
        version: "",
        resolved: undefined,
        integrity: undefined,
        dependencies: new Map(),
        optionalDependencies: new Map(),
        resolvedLine: undefined,
      };
      section = null;
      return;
    }

    if (current === null) {
      throw new ResolutionError(`Unexpected indentation in yarn.lock at line ${lineIndex + 1}`);
    }
    const entry: YarnLockEntry = current;

    if (indent >= 4 && section !== null) {
      const [name, range] = splitKeyValue(content);
      section.set(name, unquote(range));
      return;
    }

    if (content.endsWith(":")) {
      const key = unquote(content.slice(0, -1));
      section =
        key === "dependencies" ? entry.dependencies : key === "optionalDependencies" ? entry.optionalDependencies : new Map();
      return;
    }

    section = null;
    const [key, rawValue] = splitKeyValue(content);
    const value = unquote(rawValue);
    if (key === "version") {
      entry.version = value;
    } else if (key === "resolved") {
      entry.resolved = value;
      entry.resolvedLine = lineIndex;
    } else if (key === "integrity") {
      entry.integrity = value;
    }
  });
  finish();

  return { entries, bySpecifier, lines };
}
