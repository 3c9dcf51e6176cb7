import chalk from "chalk";
import { describe, expect, it } from "vitest";

import { createLogger, createMemorySink } from "../src/logging/logger.js";

describe("createLogger", () => {
  it("routes warnings and errors to stderr and hides debug by default", () => {
    const sink = createMemorySink();
    const logger = createLogger({ noColor: true, sink });

    logger.debug("hidden");
    logger.info("resolving");
    logger.warn("slow registry");
    logger.error("failed");

    expect(sink.lines).toEqual([
      { stream: "stdout", line: "resolving" },
      { stream: "stderr", line: "warning: slow registry" },
      { stream: "stderr", line: "error: failed" },
    ]);
  });

  it("colors at the level chalk detects for the terminal", () => {
    const sink = createMemorySink();
    const logger = createLogger({ sink });

    logger.warn("slow registry");

    expect(sink.lines).toEqual([{ stream: "stderr", line: chalk.yellow(`${chalk.bold("warning:")} slow registry`) }]);
  });

  it("prefixes child scopes and shows debug when verbose", () => {
    const sink = createMemorySink();
    const logger = createLogger({ noColor: true, verbose: true, sink }).child("npm").child("fetch");

    logger.debug("cache hit");
    logger.success("done");

    expect(sink.lines).toEqual([
      { stream: "stdout", line: "[debug] [npm:fetch] cache hit" },
      { stream: "stdout", line: "✓ [npm:fetch] done" },
    ]);
  });

  it("keeps only errors when quiet", () => {
    const sink = createMemorySink();
    const logger = createLogger({ noColor: true, quiet: true, sink });

    logger.info("ignored");
    logger.warn("ignored");
    logger.error("kept");

    expect(sink.lines).toEqual([{ stream: "stderr", line: "error: kept" }]);
  });

  it("writes one JSON object per line in json mode", () => {
    const sink = createMemorySink();
    const logger = createLogger({ json: true, sink }).child("pip");

    logger.warn("trusting artifact", { url: "https://example.test/x.tar.gz" });

    expect(sink.lines).toHaveLength(1);
    const first = sink.lines[0];
    expect(first?.stream).toBe("stdout");
    const parsed: unknown = JSON.parse(first?.line ?? "");
    expect(parsed).toMatchObject({
      level: "warn",
      message: "trusting artifact",
      scope: "pip",
      data: { url: "https://example.test/x.tar.gz" },
    });
  });
});
