/**
 * Logger for prefetch runs.
 *
 * Respects verbose, quiet, noColor and json options. Every component receives
 * a logger explicitly; `child(scope)` prefixes messages with `[scope]`.
 */
import chalk, { Chalk, type ChalkInstance } from "chalk";

/**
 * Log levels in order of verbosity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Show debug level */
  verbose?: boolean;
  /** Only show errors */
  quiet?: boolean;
  noColor?: boolean;
  /** Emit one JSON object per line */
  json?: boolean;
  /** Destination of formatted lines; defaults to stdout/stderr */
  sink?: LogSink;
}

export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Info level with a green checkmark */
  success(message: string, data?: Record<string, unknown>): void;
  /** Logger whose messages are prefixed with `[scope]` */
  child(scope: string): Logger;
}

const processSink: LogSink = {
  stdout(line) {
    process.stdout.write(line + "\n");
  },
  stderr(line) {
    process.stderr.write(line + "\n");
  },
};

interface ResolvedLoggerOptions {
  verbose: boolean;
  quiet: boolean;
  noColor: boolean;
  json: boolean;
  sink: LogSink;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const resolved: ResolvedLoggerOptions = {
    verbose: options.verbose ?? false,
    quiet: options.quiet ?? false,
    noColor: options.noColor ?? false,
    json: options.json ?? false,
    sink: options.sink ?? processSink,
  };
  const c = resolved.noColor ? new Chalk({ level: 0 }) : chalk;
  return createScopedLogger(resolved, c, []);
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  success() {},
  child() {
    return silentLogger;
  },
};

function shouldOutput(options: ResolvedLoggerOptions, level: LogLevel): boolean {
  if (options.quiet) {
    return level === "error";
  }

  if (!options.verbose && level === "debug") {
    return false;
  }

  return true;
}

function formatTextMessage(c: ChalkInstance, level: LogLevel, message: string, prefix?: string): string {
  switch (level) {
    case "debug":
      return c.gray(`[debug] ${message}`);
    case "info":
      if (prefix) {
        return `${prefix} ${message}`;
      }
      return message;
    case "warn":
      return c.yellow(`${c.bold("warning:")} ${message}`);
    case "error":
      return c.red(`${c.bold("error:")} ${message}`);
  }
}

function createScopedLogger(options: ResolvedLoggerOptions, c: ChalkInstance, scopes: readonly string[]): Logger {
  const scope = scopes.length > 0 ? scopes.join(":") : undefined;

  const output = (level: LogLevel, message: string, data?: Record<string, unknown>, prefix?: string): void => {
    if (!shouldOutput(options, level)) {
      return;
    }

    if (options.json) {
      const entry: JsonLogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
      };
      if (scope !== undefined) {
        entry.scope = scope;
      }
      if (data) {
        entry.data = data;
      }
      options.sink.stdout(JSON.stringify(entry));
      return;
    }

    const scoped = scope === undefined ? message : `[${scope}] ${message}`;
    const formatted = formatTextMessage(c, level, scoped, prefix);

    if (level === "error" || level === "warn") {
      options.sink.stderr(formatted);
    } else {
      options.sink.stdout(formatted);
    }

    if (data && options.verbose) {
      options.sink.stdout(c.gray(JSON.stringify(data, null, 2)));
    }
  };

  return {
    debug(message, data) {
      output("debug", message, data);
    },
    info(message, data) {
      output("info", message, data);
    },
    warn(message, data) {
      output("warn", message, data);
    },
    error(message, data) {
      output("error", message, data);
    },
    success(message, data) {
      output("info", message, data, c.green("✓"));
    },
    child(childScope) {
      return createScopedLogger(options, c, [...scopes, childScope]);
    },
  };
}

/**
 * Sink that keeps lines in memory.
 */
export interface MemorySink extends LogSink {
  readonly lines: { stream: "stdout" | "stderr"; line: string }[];
}

export function createMemorySink(): MemorySink {
  const lines: { stream: "stdout" | "stderr"; line: string }[] = [];
  return {
    lines,
    stdout(line) {
      lines.push({ stream: "stdout", line });
    },
    stderr(line) {
      lines.push({ stream: "stderr", line });
    },
  };
}
