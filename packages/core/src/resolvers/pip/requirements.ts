import path from "node:path";

import { ResolutionError } from "../../errors.js";
import { parseDigest, type Digest } from "../../integrity/index.js";
import { isInside } from "../../request/index.js";
import { readTextFile } from "../common.js";
import { Marker } from "./markers.js";

export interface Requirement {
  name: string;
  extras: string[];
  /** Version specifier as written, e.g. `==2.31.0` */
  specifier: string;
  /** Pinned version for `==` / `===` specifiers */
  version: string | null;
  /** Direct reference (`name @ url` or a bare URL with `#egg=`) */
  url: string | null;
  marker: Marker | null;
  hashes: Digest[];
  /** Parents from pip-compile `# via` comments; `-r <file>` marks a direct requirement */
  via: string[];
  file: string;
  /** Zero-based physical lines the requirement spans */
  lines: { start: number; end: number };
}

export interface RequirementsFile {
  path: string;
  requirements: Requirement[];
  includes: string[];
  constraints: string[];
  indexUrl: string | null;
  requireHashes: boolean;
  ignoredOptions: string[];
  lines: string[];
}

interface LogicalLine {
  text: string;
  start: number;
  end: number;
}

const REJECTED_OPTIONS: Record<string, string> = {
  "--extra-index-url": "Only a single package index is supported; remove --extra-index-url.",
  "-f": "Use pinned requirements from the index instead of --find-links.",
  "--find-links": "Use pinned requirements from the index instead of --find-links.",
  "-e": "Editable installs run project code; use a pinned requirement instead.",
  "--editable": "Editable installs run project code; use a pinned requirement instead.",
};

const IGNORED_OPTIONS = new Set(["--trusted-host", "--pre", "--prefer-binary", "--no-binary", "--only-binary", "--use-feature"]);
const IGNORED_OPTIONS_WITH_VALUE = new Set(["--trusted-host", "--no-binary", "--only-binary", "--use-feature"]);

const NAME_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[([^\]]*)\])?\s*(.*)$/;
const PIN_PATTERN = /^(===?)\s*([^\s,;*]+)$/;

function logicalLines(lines: readonly string[]): LogicalLine[] {
  const result: LogicalLine[] = [];
  let buffer = "";
  let start = -1;

  lines.forEach((line, index) => {
    if (start < 0) {
      start = index;
    }
    if (line.endsWith("\\") && !line.trimStart().startsWith("#")) {
      buffer += line.slice(0, -1) + " ";
      return;
    }
    result.push({ text: buffer + line, start, end: index });
    buffer = "";
    start = -1;
  });

  if (start >= 0) {
    result.push({ text: buffer, start, end: lines.length - 1 });
  }
  return result;
}

function optionValue(tokens: readonly string[], index: number, option: string, where: string): [string, number] {
  const token = tokens[index] ?? "";
  const equals = token.indexOf("=");
  if (token.startsWith("--") && equals > 0) {
    return [token.slice(equals + 1), index];
  }
  if (!token.startsWith("--") && token.length > 2) {
    return [token.slice(2), index];
  }
  const value = tokens[index + 1];
  if (value === undefined) {
    throw new ResolutionError(`${where}: option ${option} needs a value`);
  }
  return [value, index + 1];
}

function optionName(token: string): string {
  if (token.startsWith("--")) {
    const equals = token.indexOf("=");
    return equals > 0 ? token.slice(0, equals) : token;
  }
  return token.slice(0, 2);
}

/** `git+https://...#egg=name&subdirectory=x` -> `name` */
function eggName(url: string): string | null {
  const hashIndex = url.indexOf("#");
  if (hashIndex < 0) {
    return null;
  }
  const params = new URLSearchParams(url.slice(hashIndex + 1));
  return params.get("egg");
}

/**
 * Parses one requirement specification (without per-requirement options).
 */
export function parseRequirementLine(text: string, where: string): Omit<Requirement, "hashes" | "via" | "file" | "lines"> {
  const trimmed = text.trim();

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    const [url = "", markerText] = trimmed.split(/\s+;\s*/, 2);
    const name = eggName(url);
    if (name === null) {
      throw new ResolutionError(`${where}: direct URL requirement ${url} needs a name (use "name @ url")`);
    }
    return {
      name,
      extras: [],
      specifier: "",
      version: null,
      url,
      marker: markerText === undefined ? null : new Marker(markerText),
    };
  }

  const match = NAME_PATTERN.exec(trimmed);
  if (match === null) {
    throw new ResolutionError(`${where}: cannot parse requirement "${trimmed}"`);
  }
  const [, name = "", extrasText, rest = ""] = match;
  const extras = (extrasText ?? "")
    .split(",")
    .map((extra) => extra.trim())
    .filter((extra) => extra.length > 0);

  if (rest.startsWith("@")) {
    const [url = "", markerText] = rest.slice(1).trim().split(/\s+;\s*/, 2);
    if (url.length === 0) {
      throw new ResolutionError(`${where}: ${name} @ needs a URL`);
    }
    return {
      name,
      extras,
      specifier: "",
      version: null,
      url,
      marker: markerText === undefined ? null : new Marker(markerText),
    };
  }

  const semicolon = rest.indexOf(";");
  const specifier = (semicolon >= 0 ? rest.slice(0, semicolon) : rest).trim().replace(/^\((.*)\)$/, "$1").trim();
  const markerText = semicolon >= 0 ? rest.slice(semicolon + 1).trim() : "";
  const pin = PIN_PATTERN.exec(specifier);

  return {
    name,
    extras,
    specifier,
    version: pin?.[2] ?? null,
    url: null,
    marker: markerText.length > 0 ? new Marker(markerText) : null,
  };
}

/**
 * Parses a requirements file as pip reads it, including pip-compile `# via` annotations.
 */
export function parseRequirementsText(text: string, filePath: string): RequirementsFile {
  const lines = text.split(/\r?\n/);
  const parsed: RequirementsFile = {
    path: filePath,
    requirements: [],
    includes: [],
    constraints: [],
    indexUrl: null,
    requireHashes: false,
    ignoredOptions: [],
    lines,
  };

  let viaTarget: Requirement | null = null;

  for (const line of logicalLines(lines)) {
    const where = `${path.basename(filePath)}:${line.start + 1}`;
    const trimmed = line.text.trim();

    if (trimmed.startsWith("#")) {
      const comment = trimmed.slice(1).trim();
      const via = /^via(?:\s+(.+))?$/.exec(comment);
      const last = parsed.requirements.at(-1);
      if (via !== null && last !== undefined) {
        viaTarget = last;
        if (via[1] !== undefined) {
          last.via.push(via[1].trim());
        }
      } else if (viaTarget !== null && comment.length > 0 && /^#\s{2,}/.test(trimmed)) {
        viaTarget.via.push(comment);
      } else {
        viaTarget = null;
      }
      continue;
    }
    viaTarget = null;

    const content = trimmed.replace(/(^|\s)#.*$/, "").trim();
    if (content.length === 0) {
      continue;
    }

    if (content.startsWith("-")) {
      parseGlobalOptions(content, where, parsed);
      continue;
    }

    const optionStart = content.search(/\s--?[a-z]/i);
    const requirementText = optionStart >= 0 ? content.slice(0, optionStart) : content;
    const requirement: Requirement = {
      ...parseRequirementLine(requirementText, where),
      hashes: [],
      via: [],
      file: filePath,
      lines: { start: line.start, end: line.end },
    };

    if (optionStart >= 0) {
      const tokens = content.slice(optionStart).trim().split(/\s+/);
      for (let index = 0; index < tokens.length; index += 1) {
        const token = tokens[index] ?? "";
        const option = optionName(token);
        if (option !== "--hash") {
          throw new ResolutionError(`${where}: unsupported per-requirement option ${option}`);
        }
        const [value, consumed] = optionValue(tokens, index, option, where);
        requirement.hashes.push(...parseDigest(value));
        index = consumed;
      }
    }

    parsed.requirements.push(requirement);
  }

  return parsed;
}

function parseGlobalOptions(content: string, where: string, parsed: RequirementsFile): void {
  const tokens = content.split(/\s+/);
  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index] ?? "";
    const option = optionName(token);

    const rejection = REJECTED_OPTIONS[option];
    if (rejection !== undefined) {
      throw new ResolutionError(`${where}: ${option} is not supported`, { suggestion: rejection });
    }

    if (option === "-r" || option === "--requirement") {
      const [value, consumed] = optionValue(tokens, index, option, where);
      parsed.includes.push(value);
      index = consumed;
    } else if (option === "-c" || option === "--constraint") {
      const [value, consumed] = optionValue(tokens, index, option, where);
      parsed.constraints.push(value);
      index = consumed;
    } else if (option === "-i" || option === "--index-url") {
      const [value, consumed] = optionValue(tokens, index, option, where);
      if (parsed.indexUrl !== null && parsed.indexUrl !== value) {
        throw new ResolutionError(`${where}: more than one --index-url`);
      }
      parsed.indexUrl = value;
      index = consumed;
    } else if (option === "--require-hashes") {
      parsed.requireHashes = true;
    } else if (IGNORED_OPTIONS.has(option)) {
      parsed.ignoredOptions.push(option);
      if (IGNORED_OPTIONS_WITH_VALUE.has(option) && !token.includes("=")) {
        index += 1;
      }
    } else {
      throw new ResolutionError(`${where}: unsupported option ${option}`);
    }
  }
}

/**
 * Reads a requirements file and its `-r` includes, depth first, each file once.
 * Every file must stay inside `rootDir`.
 */
export async function loadRequirementsFiles(filePath: string, rootDir: string, seen = new Set<string>()): Promise<RequirementsFile[]> {
  const resolved = path.resolve(filePath);
  if (!isInside(rootDir, resolved)) {
    throw new ResolutionError(`Requirements file ${filePath} is outside the source directory`);
  }
  if (seen.has(resolved)) {
    return [];
  }
  seen.add(resolved);

  const parsed = parseRequirementsText(await readTextFile(resolved, "requirements file"), resolved);
  const files = [parsed];
  for (const include of parsed.includes) {
    files.push(...(await loadRequirementsFiles(path.resolve(path.dirname(resolved), include), rootDir, seen)));
  }
  return files;
}
