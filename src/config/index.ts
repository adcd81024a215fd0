/**
 * Configuration system for taskhooks.
 *
 * Resolves the user-level home (~/.taskhooks/ for diagnostic logs) and the
 * project state directory (.taskhooks/ beside the tracked repository), and
 * loads the optional project settings file .taskhooks/config.yaml.
 */
import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { LOG_LEVELS, type LogLevel } from "../shared/types.js";
import { errorMessage, isRecord } from "../shared/guards.js";

export { resolveHomeDir } from "../shared/home.js";

const STATE_DIRNAME = ".taskhooks";
const CONFIG_FILENAME = "config.yaml";

// ---------------------------------------------------------------------------
// Directories
// ---------------------------------------------------------------------------

export interface ProjectPaths {
  /** Absolute project root (the repository working tree). */
  root: string;
  /** .taskhooks/ */
  stateDir: string;
  /** .taskhooks/config.yaml */
  configPath: string;
  /** .taskhooks/hooks/: hook scripts must live here. */
  hooksDir: string;
  /** .taskhooks/audit/audit.jsonl */
  auditLogPath: string;
  /** .taskhooks/metrics/ */
  metricsDir: string;
}

export function resolveProjectPaths(projectRoot: string): ProjectPaths {
  const root = path.resolve(projectRoot);
  const stateDir = path.join(root, STATE_DIRNAME);
  return {
    root,
    stateDir,
    configPath: path.join(stateDir, CONFIG_FILENAME),
    hooksDir: path.join(stateDir, "hooks"),
    auditLogPath: path.join(stateDir, "audit", "audit.jsonl"),
    metricsDir: path.join(stateDir, "metrics"),
  };
}

// ---------------------------------------------------------------------------
// Project settings
// ---------------------------------------------------------------------------

export interface ProjectSettings {
  /** Glob (relative to the project root) selecting tracked task documents. */
  tasksGlob: string;
  /** Identifier prefix, e.g. "task" for task-12. */
  idPrefix: string;
  /** Status value that marks a task complete. */
  terminalStatus: string;
  logLevel?: LogLevel;
  audit: {
    /** Rotate once the active log reaches this many bytes. */
    maxBytes: number;
    /** Rotated generations kept (audit.jsonl.1 .. audit.jsonl.N). */
    maxGenerations: number;
  };
  metrics: {
    periodHours: number;
  };
  health: {
    minSuccessRate: number;
    nearTimeoutRatio: number;
  };
}

export const DEFAULT_SETTINGS: ProjectSettings = {
  tasksGlob: "backlog/tasks/*.md",
  idPrefix: "task",
  terminalStatus: "Done",
  audit: {
    maxBytes: 5 * 1024 * 1024,
    maxGenerations: 3,
  },
  metrics: {
    periodHours: 24,
  },
  health: {
    minSuccessRate: 0.9,
    nearTimeoutRatio: 0.8,
  },
};

export class SettingsError extends Error {
  readonly errors: string[];

  constructor(source: string, errors: string[]) {
    super(`Invalid settings in ${source}:\n  - ${errors.join("\n  - ")}`);
    this.name = "SettingsError";
    this.errors = errors;
  }
}

/**
 * Load .taskhooks/config.yaml, filling every missing key from
 * DEFAULT_SETTINGS. A missing file yields the defaults.
 */
export function loadProjectSettings(projectRoot: string): ProjectSettings {
  const { configPath } = resolveProjectPaths(projectRoot);
  if (!fs.existsSync(configPath)) {
    return DEFAULT_SETTINGS;
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(configPath, "utf-8"));
  } catch (err: unknown) {
    throw new SettingsError(configPath, [`unreadable YAML: ${errorMessage(err)}`]);
  }
  return validateSettings(raw ?? {}, configPath);
}

/** Validate a parsed settings document. Exported for tests. */
export function validateSettings(raw: unknown, source: string): ProjectSettings {
  if (!isRecord(raw)) {
    throw new SettingsError(source, ["top level must be a mapping"]);
  }

  const errors: string[] = [];

  const str = (key: string, fallback: string): string => {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== "string" || value.trim() === "") {
      errors.push(`"${key}" must be a non-empty string`);
      return fallback;
    }
    return value.trim();
  };

  const section = (key: string): Record<string, unknown> => {
    const value = raw[key];
    if (value === undefined) return {};
    if (!isRecord(value)) {
      errors.push(`"${key}" must be a mapping`);
      return {};
    }
    return value;
  };

  const num = (
    block: Record<string, unknown>,
    label: string,
    key: string,
    fallback: number,
    valid: (n: number) => boolean,
    rule: string,
  ): number => {
    const value = block[key];
    if (value === undefined) return fallback;
    if (typeof value !== "number" || !valid(value)) {
      errors.push(`"${label}.${key}" ${rule}`);
      return fallback;
    }
    return value;
  };

  const positiveInt = (n: number): boolean => Number.isInteger(n) && n > 0;
  const ratio = (n: number): boolean => n >= 0 && n <= 1;

  const idPrefix = str("id_prefix", DEFAULT_SETTINGS.idPrefix);
  if (!/^[A-Za-z][A-Za-z0-9_]*$/.test(idPrefix)) {
    errors.push(`"id_prefix" must be alphanumeric and start with a letter`);
  }

  let logLevel: LogLevel | undefined;
  if (raw.log_level !== undefined) {
    const wanted = typeof raw.log_level === "string" ? raw.log_level.trim().toLowerCase() : "";
    logLevel = LOG_LEVELS.find((level) => level === wanted);
    if (!logLevel) {
      errors.push(`"log_level" must be one of fatal, error, warn, info, debug, trace`);
    }
  }

  const audit = section("audit");
  const metrics = section("metrics");
  const health = section("health");

  const settings: ProjectSettings = {
    tasksGlob: str("tasks_glob", DEFAULT_SETTINGS.tasksGlob),
    idPrefix,
    terminalStatus: str("terminal_status", DEFAULT_SETTINGS.terminalStatus),
    logLevel,
    audit: {
      maxBytes: num(audit, "audit", "max_bytes", DEFAULT_SETTINGS.audit.maxBytes, positiveInt, "must be a positive integer"),
      maxGenerations: num(
        audit,
        "audit",
        "max_generations",
        DEFAULT_SETTINGS.audit.maxGenerations,
        positiveInt,
        "must be a positive integer",
      ),
    },
    metrics: {
      periodHours: num(
        metrics,
        "metrics",
        "period_hours",
        DEFAULT_SETTINGS.metrics.periodHours,
        positiveInt,
        "must be a positive integer",
      ),
    },
    health: {
      minSuccessRate: num(
        health,
        "health",
        "min_success_rate",
        DEFAULT_SETTINGS.health.minSuccessRate,
        ratio,
        "must be between 0 and 1",
      ),
      nearTimeoutRatio: num(
        health,
        "health",
        "near_timeout_ratio",
        DEFAULT_SETTINGS.health.nearTimeoutRatio,
        ratio,
        "must be between 0 and 1",
      ),
    },
  };

  if (errors.length > 0) {
    throw new SettingsError(source, errors);
  }
  return settings;
}
