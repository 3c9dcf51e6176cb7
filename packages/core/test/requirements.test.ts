import { promises as fs } from "node:fs";
import * as path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ResolutionError } from "../src/errors.js";
import { loadRequirementsFiles, parseRequirementLine, parseRequirementsText } from "../src/resolvers/pip/requirements.js";
import { makeTempDir, removeDir, sha256Hex } from "./helpers.js";

const HASH_A = sha256Hex("requests sdist");
const HASH_B = sha256Hex("requests wheel");

describe("parseRequirementLine", () => {
  it("splits name, extras, specifier and marker", () => {
    const requirement = parseRequirementLine('Requests[socks, security] == 2.31.0 ; python_version >= "3.8"', "requirements.txt:1");
    expect(requirement.name).toBe("Requests");
    expect(requirement.extras).toEqual(["socks", "security"]);
    expect(requirement.specifier).toBe("== 2.31.0");
    expect(requirement.version).toBe("2.31.0");
    expect(requirement.marker?.source).toBe('python_version >= "3.8"');
  });

  it("leaves ranges unpinned", () => {
    expect(parseRequirementLine("flask>=2,<3", "r:1").version).toBeNull();
    expect(parseRequirementLine("flask==2.*", "r:1").version).toBeNull();
  });

  it("reads direct references", () => {
    expect(parseRequirementLine("mylib @ https://files.test/mylib-1.0.tar.gz#sha256=" + HASH_A, "r:1")).toMatchObject({
      name: "mylib",
      url: `https://files.test/mylib-1.0.tar.gz#sha256=${HASH_A}`,
    });
    expect(parseRequirementLine("git+https://git.test/org/tool.git@0123456789abcdef0123456789abcdef01234567#egg=tool", "r:1")).toMatchObject({
      name: "tool",
      url: "git+https://git.test/org/tool.git@0123456789abcdef0123456789abcdef01234567#egg=tool",
    });
    expect(() => parseRequirementLine("https://files.test/anonymous.tar.gz", "r:3")).toThrow(
      'r:3: direct URL requirement https://files.test/anonymous.tar.gz needs a name (use "name @ url")',
    );
  });
});

describe("parseRequirementsText", () => {
  it("reads pip-compile output with hashes and via comments", () => {
    const text = [
      "--index-url https://pypi.test/simple",
      "--require-hashes",
      "",
      "certifi==2024.2.2 \\",
      `    --hash=sha256:${HASH_B}`,
      "    # via requests",
      "requests==2.31.0 \\",
      `    --hash=sha256:${HASH_A} \\`,
      `    --hash=sha256:${HASH_B}`,
      "    # via",
      "    #   -r requirements.in",
      "    #   other-tool",
      "# trailing comment",
    ].join("\n");

    const parsed = parseRequirementsText(text, "/src/requirements.txt");

    expect(parsed.indexUrl).toBe("https://pypi.test/simple");
    expect(parsed.requireHashes).toBe(true);
    expect(parsed.requirements.map((requirement) => requirement.name)).toEqual(["certifi", "requests"]);

    const [certifi, requests] = parsed.requirements;
    expect(certifi?.via).toEqual(["requests"]);
    expect(certifi?.lines).toEqual({ start: 3, end: 4 });
    expect(requests?.hashes.map((digest) => digest.hex)).toEqual([HASH_A, HASH_B]);
    expect(requests?.via).toEqual(["-r requirements.in", "other-tool"]);
    expect(requests?.lines).toEqual({ start: 6, end: 8 });
  });

  it("records includes, constraints and ignored options", () => {
    const parsed = parseRequirementsText("-r base.txt\n-c constraints.txt\n--prefer-binary\n--trusted-host pypi.test\nsix==1.16.0\n", "/r.txt");
    expect(parsed.includes).toEqual(["base.txt"]);
    expect(parsed.constraints).toEqual(["constraints.txt"]);
    expect(parsed.ignoredOptions).toEqual(["--prefer-binary", "--trusted-host"]);
    expect(parsed.requirements).toHaveLength(1);
  });

  it("rejects options that would reach other sources or run project code", () => {
    expect(() => parseRequirementsText("--extra-index-url https://other.test/simple\n", "/r.txt")).toThrow(
      "r.txt:1: --extra-index-url is not supported",
    );
    expect(() => parseRequirementsText("-e .\n", "/r.txt")).toThrow(ResolutionError);
    expect(() => parseRequirementsText("six==1.16.0 --install-option=--prefix\n", "/r.txt")).toThrow(
      "r.txt:1: unsupported per-requirement option --install-option",
    );
  });
});

describe("loadRequirementsFiles", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(tmpDir);
  });

  it("follows includes depth first and reads each file once", async () => {
    await fs.mkdir(path.join(tmpDir, "reqs"));
    await fs.writeFile(path.join(tmpDir, "requirements.txt"), "-r reqs/base.txt\n-r reqs/test.txt\nflask==3.0.0\n");
    await fs.writeFile(path.join(tmpDir, "reqs", "base.txt"), "six==1.16.0\n");
    await fs.writeFile(path.join(tmpDir, "reqs", "test.txt"), "-r base.txt\npytest==8.0.0\n");

    const files = await loadRequirementsFiles(path.join(tmpDir, "requirements.txt"), tmpDir);

    expect(files.map((file) => path.relative(tmpDir, file.path))).toEqual([
      "requirements.txt",
      path.join("reqs", "base.txt"),
      path.join("reqs", "test.txt"),
    ]);
  });

  it("refuses includes outside the source directory", async () => {
    const project = path.join(tmpDir, "project");
    await fs.mkdir(project);
    await fs.writeFile(path.join(project, "requirements.txt"), "-r ../secrets.txt\n");
    await fs.writeFile(path.join(tmpDir, "secrets.txt"), "six==1.16.0\n");

    await expect(loadRequirementsFiles(path.join(project, "requirements.txt"), project)).rejects.toThrow(
      "is outside the source directory",
    );
  });
});
