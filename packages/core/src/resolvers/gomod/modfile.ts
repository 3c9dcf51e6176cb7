import { ResolutionError } from "../../errors.js";

export interface ModuleVersion {
  path: string;
  version: string;
}

export interface GoRequire extends ModuleVersion {
  indirect: boolean;
}

export interface GoReplace {
  oldPath: string;
  oldVersion: string | null;
  newPath: string;
  newVersion: string | null;
}

export interface GoModFile {
  module: string;
  goVersion: string | null;
  toolchain: string | null;
  requires: GoRequire[];
  replaces: GoReplace[];
  excludes: ModuleVersion[];
}

const BLOCK_VERBS = new Set(["require", "replace", "exclude", "retract", "godebug", "tool", "ignore"]);

function unquote(token: string): string {
  if (token.length >= 2 && ((token.startsWith('"') && token.endsWith('"')) || (token.startsWith("`") && token.endsWith("`")))) {
    return token.slice(1, -1);
  }
  return token;
}

function stripComment(line: string): { code: string; comment: string } {
  const index = line.indexOf("//");
  if (index < 0) {
    return { code: line.trim(), comment: "" };
  }
  return { code: line.slice(0, index).trim(), comment: line.slice(index + 2).trim() };
}

/**
 * Parses go.mod directives. Unknown directives are ignored, as newer Go versions add them.
 */
export function parseGoMod(text: string): GoModFile {
  const file: GoModFile = { module: "", goVersion: null, toolchain: null, requires: [], replaces: [], excludes: [] };
  let block: string | null = null;

  const handle = (verb: string, args: string[], comment: string, lineNumber: number): void => {
    const where = `go.mod:${lineNumber}`;
    switch (verb) {
      case "module":
        file.module = unquote(args[0] ?? "");
        return;
      case "go":
        file.goVersion = args[0] ?? null;
        return;
      case "toolchain":
        file.toolchain = args[0] ?? null;
        return;
      case "require": {
        const [modulePath, version] = args;
        if (modulePath === undefined || version === undefined) {
          throw new ResolutionError(`${where}: require needs a module path and version`);
        }
        file.requires.push({ path: unquote(modulePath), version, indirect: /(^|;\s*)indirect(;|$)/.test(comment) });
        return;
      }
      case "exclude": {
        const [modulePath, version] = args;
        if (modulePath === undefined || version === undefined) {
          throw new ResolutionError(`${where}: exclude needs a module path and version`);
        }
        file.excludes.push({ path: unquote(modulePath), version });
        return;
      }
      case "replace": {
        const arrow = args.indexOf("=>");
        if (arrow < 1 || arrow > 2 || args.length - arrow - 1 < 1 || args.length - arrow - 1 > 2) {
          throw new ResolutionError(`${where}: malformed replace directive`);
        }
        file.replaces.push({
          oldPath: unquote(args[0] ?? ""),
          oldVersion: arrow === 2 ? (args[1] ?? null) : null,
          newPath: unquote(args[arrow + 1] ?? ""),
          newVersion: args[arrow + 2] ?? null,
        });
        return;
      }
      default:
        return;
    }
  };

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const { code, comment } = stripComment(rawLine);
    if (code.length === 0) {
      return;
    }

    if (block !== null) {
      if (code === ")") {
        block = null;
        return;
      }
      handle(block, code.split(/\s+/), comment, index + 1);
      return;
    }

    const tokens = code.split(/\s+/);
    const verb = tokens[0] ?? "";
    if (BLOCK_VERBS.has(verb) && tokens[1] === "(") {
      block = verb;
      return;
    }
    handle(verb, tokens.slice(1), comment, index + 1);
  });

  if (file.module.length === 0) {
    throw new ResolutionError("go.mod has no module directive");
  }
  return file;
}

/** `go.sum`: `<module>@<version>` and `<module>@<version>/go.mod` -> `h1:` hash. */
export function parseGoSum(text: string): Map<string, string> {
  const sums = new Map<string, string>();
  text.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      return;
    }
    const [modulePath, version, hash] = trimmed.split(/\s+/);
    if (modulePath === undefined || version === undefined || hash === undefined) {
      throw new ResolutionError(`go.sum:${index + 1}: malformed line`);
    }
    if (hash.startsWith("h1:")) {
      sums.set(`${modulePath}@${version}`, hash);
    }
  });
  return sums;
}

export interface VendoredModule extends ModuleVersion {
  explicit: boolean;
  replacement: string | null;
}

/** `vendor/modules.txt` module lines with their `## explicit` markers. */
export function parseVendorModules(text: string): VendoredModule[] {
  const modules: VendoredModule[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (line.startsWith("# ")) {
      const [modulePath, version, arrow, replacementPath, replacementVersion] = line.slice(2).trim().split(/\s+/);
      if (modulePath === undefined) {
        continue;
      }
      modules.push({
        path: modulePath,
        version: version === "=>" ? "" : (version ?? ""),
        explicit: false,
        replacement:
          version === "=>"
            ? [arrow, replacementPath].filter((part): part is string => part !== undefined).join(" ")
            : arrow === "=>"
              ? [replacementPath, replacementVersion].filter((part): part is string => part !== undefined).join(" ")
              : null,
      });
      continue;
    }
    const last = modules.at(-1);
    if (line.startsWith("## ") && last !== undefined && line.slice(3).split(";").some((part) => part.trim() === "explicit")) {
      last.explicit = true;
    }
  }
  return modules;
}

/**
 * Module proxy case encoding: every upper-case letter becomes `!` plus its lower-case form.
 */
export function escapeModulePath(value: string): string {
  return value.replace(/[A-Z]/g, (letter) => `!${letter.toLowerCase()}`);
}

export function isLocalReplacement(target: string): boolean {
  return target.startsWith("./") || target.startsWith("../") || target.startsWith("/") || target === "." || target === "..";
}

/** `1.21`, `1.21.3`, `1.21rc1` -> `[1, 21]` */
export function goLanguageVersion(value: string): [number, number] | null {
  const match = /^(\d+)\.(\d+)/.exec(value);
  if (match === null) {
    return null;
  }
  return [Number(match[1]), Number(match[2])];
}
