/**
 * Structured logger for taskhooks.
 *
 * Writes JSON log lines to ~/.taskhooks/logs/ and human-readable output to console.
 * Log format: {ts, level, component, hook, event, msg}
 * Console format: [component] message
 */
import fs from "node:fs";
import path from "node:path";
import { LOG_LEVELS, type LogEntry, type LogLevel } from "./types.js";
import { redactCredentials } from "../security/redaction.js";
import { resolveHomeDir } from "./home.js";

/**
 * Redact sensitive values (API keys, tokens, passwords, secrets) from a string.
 *
 * Delegates to the shared redactCredentials() in security/redaction so that
 * detection and redaction patterns are defined in a single place.
 */
export function sanitize(input: string): string {
  return redactCredentials(input);
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/** Parse a user-supplied level name, returning undefined for unknown values. */
export function normalizeLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lowered = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === lowered);
}

export interface LoggerContext {
  /** Subsystem name (e.g. "detect", "dispatch"). */
  component: string;
  /** Hook name. */
  hook: string;
  /** Event id. */
  event: string;
}

export interface LoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel;
  /** Directory for JSON log files. Defaults to ~/.taskhooks/logs/. */
  logDir?: string;
  /** Whether to write to file. Defaults to true. */
  fileOutput?: boolean;
  /** Whether to write to console. Defaults to true. */
  consoleOutput?: boolean;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly minLevel: number;
  private readonly logDir: string;
  private fileOutput: boolean;
  private readonly consoleOutput: boolean;
  private logFilePath: string | null = null;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.minLevel = LOG_LEVEL_PRIORITY[this.level];
    this.logDir = options.logDir ?? path.join(resolveHomeDir(), ".taskhooks", "logs");
    this.fileOutput = options.fileOutput ?? true;
    this.consoleOutput = options.consoleOutput ?? true;
  }

  fatal(msg: string): void {
    this.log("fatal", msg);
  }

  error(msg: string): void {
    this.log("error", msg);
  }

  warn(msg: string): void {
    this.log("warn", msg);
  }

  info(msg: string): void {
    this.log("info", msg);
  }

  debug(msg: string): void {
    this.log("debug", msg);
  }

  trace(msg: string): void {
    this.log("trace", msg);
  }

  /** Whether messages at `level` would be emitted. */
  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= this.minLevel;
  }

  /** Create a child logger with an updated context. */
  child(overrides: Partial<LoggerContext>): Logger {
    return new Logger(
      { ...this.context, ...overrides },
      {
        level: this.level,
        logDir: this.logDir,
        fileOutput: this.fileOutput,
        consoleOutput: this.consoleOutput,
      },
    );
  }

  private log(level: LogLevel, msg: string): void {
    if (LOG_LEVEL_PRIORITY[level] > this.minLevel) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.context.component,
      hook: this.context.hook,
      event: this.context.event,
      msg,
    };

    if (this.consoleOutput) {
      this.writeConsole(entry);
    }

    if (this.fileOutput) {
      this.writeFile(entry);
    }
  }

  private writeConsole(entry: LogEntry): void {
    const prefix = entry.component ? `[${entry.component}]` : "[taskhooks]";
    const line = `${prefix} ${entry.msg}`;

    if (entry.level === "fatal" || entry.level === "error") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private writeFile(entry: LogEntry): void {
    try {
      if (!this.logFilePath) {
        fs.mkdirSync(this.logDir, { recursive: true });
        const date = new Date().toISOString().slice(0, 10);
        this.logFilePath = path.join(this.logDir, `taskhooks-${date}.jsonl`);
      }
      const sanitized: LogEntry = { ...entry, msg: sanitize(entry.msg) };
      fs.appendFileSync(this.logFilePath, JSON.stringify(sanitized) + "\n");
    } catch (err: unknown) {
      // The diagnostic log is best-effort; report once on stderr and stop writing.
      if (this.consoleOutput) {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`[taskhooks] Log file disabled: ${reason}`);
      }
      this.fileOutput = false;
    }
  }
}

/** Create a logger with default context. */
export function createLogger(
  context: Partial<LoggerContext> = {},
  options: LoggerOptions = {},
): Logger {
  return new Logger(
    {
      component: context.component ?? "",
      hook: context.hook ?? "",
      event: context.event ?? "",
    },
    options,
  );
}

/** Logger that discards everything. Used where callers pass no logger. */
export function silentLogger(): Logger {
  return createLogger({}, { level: "fatal", fileOutput: false, consoleOutput: false });
}
