/**
 * Hook registry loader.
 *
 * Reads .taskhooks/hooks/hooks.yaml (or hooks.yml). Loading fails closed:
 * any problem throws a HooksConfigError listing every error found, and the
 * run executes no hooks at all.
 *
 *   version: "1.0"
 *   defaults:
 *     timeout: 30
 *     fail_mode: continue
 *     env_passthrough: [PATH, HOME]
 *   hooks:
 *     - name: notify-done
 *       events:
 *         - type: task.completed
 *           filter: { priority: [high, critical] }
 *       script: notify.sh
 *       timeout: 10
 */
import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { resolveProjectPaths } from "../config/index.js";
import { errorMessage, isRecord, isStringArray } from "../shared/guards.js";
import { isValidMatcherPattern } from "./matcher.js";
import {
  DEFAULT_HOOKS_DEFAULTS,
  FAIL_MODES,
  MAX_TIMEOUT_SECONDS,
  MIN_TIMEOUT_SECONDS,
  type EventMatcher,
  type FailMode,
  type FilterCondition,
  type FilterScalar,
  type HookAction,
  type HookDefinition,
  type HookFilter,
  type HooksConfig,
  type HooksDefaults,
} from "./types.js";

export const HOOKS_CONFIG_FILENAMES = ["hooks.yaml", "hooks.yml"] as const;
export const SUPPORTED_VERSIONS = new Set(["1", "1.0"]);

const HOOK_KEYS = new Set([
  "name",
  "description",
  "events",
  "filter",
  "script",
  "args",
  "command",
  "timeout",
  "working_directory",
  "shell",
  "env",
  "fail_mode",
  "enabled",
]);

const DEFAULT_KEYS = new Set(["timeout", "shell", "fail_mode", "env_passthrough"]);

const ENV_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SHELL_METACHARACTERS = [";", "|", "&", "$", "`", "(", ")", "<", ">"];
const HOOK_NAME = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class HooksConfigError extends Error {
  readonly source: string;
  readonly errors: string[];

  constructor(source: string, errors: string[]) {
    super(`Invalid hooks configuration ${source}:\n  - ${errors.join("\n  - ")}`);
    this.name = "HooksConfigError";
    this.source = source;
    this.errors = errors;
  }
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

/** Locate the registry file; null when the project has none. */
export function findHooksConfig(projectRoot: string): string | null {
  const { hooksDir } = resolveProjectPaths(projectRoot);
  for (const name of HOOKS_CONFIG_FILENAMES) {
    const candidate = path.join(hooksDir, name);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

export function emptyHooksConfig(): HooksConfig {
  return { version: "1.0", defaults: { ...DEFAULT_HOOKS_DEFAULTS }, hooks: [] };
}

/**
 * Load the hook registry.
 *
 * @param configPath - Explicit file; defaults to the discovered registry.
 * @returns An empty registry when no file exists.
 */
export function loadHooksConfig(projectRoot: string, configPath?: string): HooksConfig {
  const file = configPath ? path.resolve(projectRoot, configPath) : findHooksConfig(projectRoot);
  if (!file) return emptyHooksConfig();

  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (err: unknown) {
    throw new HooksConfigError(file, [`cannot read file: ${errorMessage(err)}`]);
  }
  return parseHooksConfig(text, file);
}

/** Parse and validate registry YAML. */
export function parseHooksConfig(text: string, source: string): HooksConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err: unknown) {
    throw new HooksConfigError(source, [`unreadable YAML: ${errorMessage(err)}`]);
  }

  const errors: string[] = [];
  const config = validateHooksDocument(raw ?? {}, errors);
  if (errors.length > 0 || !config) {
    throw new HooksConfigError(source, errors.length > 0 ? errors : ["invalid document"]);
  }
  return { ...config, source };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isFilterScalar(value: unknown): value is FilterScalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function parseFilterValues(value: unknown, ctx: string, errors: string[]): FilterScalar[] | null {
  if (!Array.isArray(value) || value.length === 0 || !value.every(isFilterScalar)) {
    errors.push(`${ctx} must be a non-empty list of scalars`);
    return null;
  }
  return value;
}

function parseFilter(raw: unknown, ctx: string, errors: string[]): HookFilter | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isRecord(raw)) {
    errors.push(`${ctx} must be a mapping of context keys`);
    return undefined;
  }

  const filter: Record<string, FilterCondition> = {};
  for (const [key, value] of Object.entries(raw)) {
    const keyCtx = `${ctx}.${key}`;
    if (isFilterScalar(value)) {
      filter[key] = { op: "equals", value };
    } else if (Array.isArray(value)) {
      const values = parseFilterValues(value, keyCtx, errors);
      if (values) filter[key] = { op: "any", values };
    } else if (isRecord(value) && Object.keys(value).length === 1 && ("any" in value || "all" in value)) {
      const op = "any" in value ? "any" : "all";
      const values = parseFilterValues(value[op], `${keyCtx}.${op}`, errors);
      if (values) filter[key] = { op, values };
    } else {
      errors.push(`${keyCtx} must be a scalar, a list, or { any: [...] } / { all: [...] }`);
    }
  }
  return filter;
}

function parseMatchers(raw: unknown, ctx: string, errors: string[]): EventMatcher[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    errors.push(`${ctx}.events must be a non-empty list`);
    return [];
  }

  const matchers: EventMatcher[] = [];
  raw.forEach((entry: unknown, i: number) => {
    const entryCtx = `${ctx}.events[${i}]`;
    let pattern: unknown;
    let filter: HookFilter | undefined;
    if (typeof entry === "string") {
      pattern = entry;
    } else if (isRecord(entry)) {
      pattern = entry.type;
      const unknownKeys = Object.keys(entry).filter((k) => k !== "type" && k !== "filter");
      if (unknownKeys.length > 0) {
        errors.push(`${entryCtx} has unknown key(s): ${unknownKeys.join(", ")}`);
      }
      filter = parseFilter(entry.filter, `${entryCtx}.filter`, errors);
    } else {
      errors.push(`${entryCtx} must be an event type or { type, filter }`);
      return;
    }

    if (typeof pattern !== "string" || !isValidMatcherPattern(pattern)) {
      errors.push(
        `${entryCtx} has invalid event pattern '${String(pattern)}' ` +
          `(expected an exact type, 'prefix.*', '*.suffix' or '*')`,
      );
      return;
    }
    matchers.push(filter ? { pattern, filter } : { pattern });
  });
  return matchers;
}

function parseFailMode(raw: unknown, ctx: string, errors: string[], fallback: FailMode): FailMode {
  if (raw === undefined) return fallback;
  const mode = FAIL_MODES.find((m) => m === raw);
  if (!mode) {
    errors.push(`${ctx} fail_mode must be one of ${FAIL_MODES.join(", ")}, got '${String(raw)}'`);
    return fallback;
  }
  return mode;
}

function parseTimeout(raw: unknown, ctx: string, errors: string[], fallback: number): number {
  if (raw === undefined) return fallback;
  if (
    typeof raw !== "number" ||
    !Number.isInteger(raw) ||
    raw < MIN_TIMEOUT_SECONDS ||
    raw > MAX_TIMEOUT_SECONDS
  ) {
    errors.push(
      `${ctx} timeout ${String(raw)}s outside allowed range (${MIN_TIMEOUT_SECONDS}-${MAX_TIMEOUT_SECONDS}s)`,
    );
    return fallback;
  }
  return raw;
}

function parseEnv(raw: unknown, ctx: string, errors: string[]): Record<string, string> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    errors.push(`${ctx}.env must be a mapping`);
    return {};
  }
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!ENV_KEY.test(key)) {
      errors.push(`${ctx} env key '${key}' is not a valid identifier`);
      continue;
    }
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      errors.push(`${ctx} env var '${key}' must be a scalar`);
      continue;
    }
    const text = String(value);
    const bad = SHELL_METACHARACTERS.find((c) => text.includes(c));
    if (bad) {
      errors.push(`${ctx} env var '${key}' contains shell metacharacter '${bad}'`);
      continue;
    }
    env[key] = text;
  }
  return env;
}

function parseDefaults(raw: unknown, errors: string[]): HooksDefaults {
  const defaults = { ...DEFAULT_HOOKS_DEFAULTS };
  if (raw === undefined || raw === null) return defaults;
  if (!isRecord(raw)) {
    errors.push("defaults must be a mapping");
    return defaults;
  }

  const unknownKeys = Object.keys(raw).filter((k) => !DEFAULT_KEYS.has(k));
  if (unknownKeys.length > 0) {
    errors.push(`defaults has unknown key(s): ${unknownKeys.join(", ")}`);
  }

  defaults.timeoutSeconds = parseTimeout(raw.timeout, "defaults", errors, defaults.timeoutSeconds);
  defaults.failMode = parseFailMode(raw.fail_mode, "defaults", errors, defaults.failMode);
  if (raw.shell !== undefined) {
    if (typeof raw.shell === "string" && path.isAbsolute(raw.shell)) {
      defaults.shell = raw.shell;
    } else {
      errors.push("defaults.shell must be an absolute path");
    }
  }
  if (raw.env_passthrough !== undefined) {
    if (isStringArray(raw.env_passthrough) && raw.env_passthrough.every((k) => ENV_KEY.test(k))) {
      defaults.envPassthrough = [...raw.env_passthrough];
    } else {
      errors.push("defaults.env_passthrough must be a list of environment variable names");
    }
  }
  return defaults;
}

function parseAction(raw: Record<string, unknown>, ctx: string, errors: string[]): HookAction | null {
  const hasScript = raw.script !== undefined;
  const hasCommand = raw.command !== undefined;

  if (hasScript && hasCommand) {
    errors.push(`${ctx} must define exactly one of script or command, not both`);
    return null;
  }
  if (!hasScript && !hasCommand) {
    errors.push(`${ctx} must define an action (script or command)`);
    return null;
  }

  if (hasCommand) {
    if (raw.args !== undefined) {
      errors.push(`${ctx} args are only allowed with script`);
    }
    if (typeof raw.command !== "string" || raw.command.trim() === "") {
      errors.push(`${ctx} command must be a non-empty string`);
      return null;
    }
    return { kind: "command", command: raw.command };
  }

  if (typeof raw.script !== "string" || raw.script.trim() === "") {
    errors.push(`${ctx} script must be a non-empty string`);
    return null;
  }
  let args: string[] = [];
  if (raw.args !== undefined) {
    if (isStringArray(raw.args)) {
      args = [...raw.args];
    } else {
      errors.push(`${ctx} args must be a list of strings`);
    }
  }
  return { kind: "script", script: raw.script, args };
}

function parseHook(
  raw: unknown,
  index: number,
  defaults: HooksDefaults,
  seen: Set<string>,
  errors: string[],
): HookDefinition | null {
  if (!isRecord(raw)) {
    errors.push(`hooks[${index}] must be a mapping`);
    return null;
  }

  const name = typeof raw.name === "string" ? raw.name.trim() : "";
  const ctx = name ? `hook '${name}'` : `hooks[${index}]`;
  if (!name) {
    errors.push(`hooks[${index}] missing required field "name" (string)`);
  } else if (!HOOK_NAME.test(name)) {
    errors.push(`${ctx} name may only contain letters, digits, '.', '_' and '-'`);
  } else if (seen.has(name)) {
    errors.push(`${ctx} is defined more than once`);
  } else {
    seen.add(name);
  }

  const unknownKeys = Object.keys(raw).filter((k) => !HOOK_KEYS.has(k));
  if (unknownKeys.length > 0) {
    errors.push(`${ctx} has unknown key(s): ${unknownKeys.join(", ")}`);
  }

  const matchers = parseMatchers(raw.events, ctx, errors);
  const filter = parseFilter(raw.filter, `${ctx}.filter`, errors);
  const action = parseAction(raw, ctx, errors);
  const timeoutSeconds = parseTimeout(raw.timeout, ctx, errors, defaults.timeoutSeconds);
  const failMode = parseFailMode(raw.fail_mode, ctx, errors, defaults.failMode);
  const env = parseEnv(raw.env, ctx, errors);

  let workingDirectory = ".";
  if (raw.working_directory !== undefined) {
    if (typeof raw.working_directory === "string" && raw.working_directory.trim() !== "") {
      workingDirectory = raw.working_directory;
    } else {
      errors.push(`${ctx} working_directory must be a non-empty string`);
    }
  }

  let shell = defaults.shell;
  if (raw.shell !== undefined) {
    if (typeof raw.shell === "string" && path.isAbsolute(raw.shell)) {
      shell = raw.shell;
    } else {
      errors.push(`${ctx} shell must be an absolute path`);
    }
  }

  let enabled = true;
  if (raw.enabled !== undefined) {
    if (typeof raw.enabled === "boolean") {
      enabled = raw.enabled;
    } else {
      errors.push(`${ctx} enabled must be true or false`);
    }
  }

  let description: string | undefined;
  if (raw.description !== undefined) {
    if (typeof raw.description === "string") {
      description = raw.description;
    } else {
      errors.push(`${ctx} description must be a string`);
    }
  }

  if (!name || !action) return null;

  const hook: HookDefinition = {
    name,
    matchers,
    action,
    timeoutSeconds,
    workingDirectory,
    shell,
    env,
    failMode,
    enabled,
  };
  if (description !== undefined) hook.description = description;
  if (filter !== undefined) hook.filter = filter;
  return hook;
}

/** Validate a parsed document, pushing every problem onto `errors`. */
export function validateHooksDocument(raw: unknown, errors: string[]): Omit<HooksConfig, "source"> | null {
  if (!isRecord(raw)) {
    errors.push("top level must be a mapping");
    return null;
  }

  const unknownKeys = Object.keys(raw).filter((k) => !["version", "defaults", "hooks"].includes(k));
  if (unknownKeys.length > 0) {
    errors.push(`unknown top-level key(s): ${unknownKeys.join(", ")}`);
  }

  let version = "1.0";
  if (raw.version !== undefined) {
    version = String(raw.version);
    if (!SUPPORTED_VERSIONS.has(version)) {
      errors.push(`unsupported version '${version}' (supported: 1.0)`);
    }
  }

  const defaults = parseDefaults(raw.defaults, errors);

  const hooks: HookDefinition[] = [];
  if (raw.hooks !== undefined && raw.hooks !== null) {
    if (!Array.isArray(raw.hooks)) {
      errors.push("hooks must be a list");
    } else {
      const seen = new Set<string>();
      raw.hooks.forEach((entry: unknown, i: number) => {
        const hook = parseHook(entry, i, defaults, seen, errors);
        if (hook) hooks.push(hook);
      });
    }
  }

  return { version, defaults, hooks };
}
