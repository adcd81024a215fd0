/**
 * Sandbox policy: rules a hook action must pass before anything is spawned.
 *
 *   - Script references resolve inside the hooks directory (no absolute
 *     paths, no '..' segments, no symlink escapes).
 *   - Working directories resolve inside the project root.
 *   - Inline commands are screened for blocked and destructive commands.
 *   - The child environment is built from an allow-list, never inherited.
 *
 * A denied action never runs.
 */
import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { HookEvent } from "../shared/types.js";
import type { HookDefinition } from "../hooks/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ViolationKind =
  | "absolute-path"
  | "path-traversal"
  | "outside-base"
  | "symlink-escape"
  | "working-directory"
  | "blocked-command";

export class SandboxPolicyViolation extends Error {
  readonly kind: ViolationKind;
  /** The offending reference, as written in the configuration. */
  readonly target: string;

  constructor(kind: ViolationKind, target: string, message: string) {
    super(message);
    this.name = "SandboxPolicyViolation";
    this.kind = kind;
    this.target = target;
  }
}

export type PolicyVerdict = "allow" | "deny";

export interface PolicyResult {
  verdict: PolicyVerdict;
  /** Set when denied. */
  reason?: string;
}

// ---------------------------------------------------------------------------
// Path containment
// ---------------------------------------------------------------------------

function isWithin(target: string, base: string): boolean {
  return target === base || target.startsWith(base + path.sep);
}

function realpathIfExists(p: string): string | null {
  try {
    return fs.realpathSync(p);
  } catch {
    return null;
  }
}

function assertContained(
  reference: string,
  baseDir: string,
  kindOutside: ViolationKind,
  label: string,
): string {
  if (path.isAbsolute(reference)) {
    throw new SandboxPolicyViolation("absolute-path", reference, `${label} '${reference}' must be relative`);
  }
  if (reference.split(/[\\/]/).includes("..")) {
    throw new SandboxPolicyViolation(
      "path-traversal",
      reference,
      `${label} '${reference}' contains a '..' traversal segment`,
    );
  }

  const base = path.resolve(baseDir);
  const resolved = path.resolve(base, reference);
  if (!isWithin(resolved, base)) {
    throw new SandboxPolicyViolation(kindOutside, reference, `${label} '${reference}' resolves outside ${base}`);
  }

  const realBase = realpathIfExists(base);
  const realTarget = realpathIfExists(resolved);
  if (realBase && realTarget && !isWithin(realTarget, realBase)) {
    throw new SandboxPolicyViolation(
      "symlink-escape",
      reference,
      `${label} '${reference}' links outside ${base}`,
    );
  }
  return resolved;
}

/**
 * Resolve a script reference against the hooks directory.
 *
 * @throws SandboxPolicyViolation when the reference escapes `baseDir`.
 */
export function resolveScriptPath(script: string, baseDir: string): string {
  return assertContained(script, baseDir, "outside-base", "Script");
}

/**
 * Resolve a working directory against the project root.
 *
 * @throws SandboxPolicyViolation when it escapes the project root.
 */
export function resolveWorkingDirectory(dir: string, projectRoot: string): string {
  return assertContained(dir, projectRoot, "working-directory", "Working directory");
}

// ---------------------------------------------------------------------------
// Inline commands
// ---------------------------------------------------------------------------

/**
 * Commands that are always blocked regardless of arguments.
 */
const BLOCKED_COMMANDS = new Set([
  "shutdown",
  "reboot",
  "halt",
  "poweroff",
  "init",
  "systemctl",
  "mkfs",
  "fdisk",
  "dd",
  "mount",
  "umount",
  "sudo",
  "su",
]);

/**
 * Dangerous flag patterns on git commands.
 */
const BLOCKED_GIT_PATTERNS: Array<{ pattern: RegExp; reason: string }> = [
  { pattern: /\bpush\b.*--force\b/, reason: "Force push is blocked" },
  { pattern: /\bpush\b.*\s-f\b/, reason: "Force push (-f) is blocked" },
  { pattern: /\breset\b.*--hard\b/, reason: "git reset --hard is blocked" },
  { pattern: /\bclean\b.*\s-[a-zA-Z]*f/, reason: "git clean -f is blocked" },
];

/**
 * Patterns for destructive file operations.
 */
const DESTRUCTIVE_PATTERNS: Array<{ pattern: RegExp; reason: string }> = [
  {
    pattern: /\brm\s+(-[a-zA-Z]*r[a-zA-Z]*f|-[a-zA-Z]*f[a-zA-Z]*r|--recursive\b.*--force)\s+[/~]/,
    reason: "Recursive force delete (rm -rf) on absolute or home paths is blocked",
  },
  {
    pattern: /\bchmod\s+(-[a-zA-Z]*R[a-zA-Z]*)?\s*(000|777)\s+\//,
    reason: "Recursive permission changes on the root filesystem are blocked",
  },
  {
    pattern: />\s*\/dev\/sd[a-z]/,
    reason: "Writing directly to block devices is blocked",
  },
  {
    pattern: /:\(\)\s*\{\s*:\|:&\s*\};:/,
    reason: "Fork bombs are blocked",
  },
];

/**
 * Extract the base command from one simple command.
 * Skips leading KEY=value assignments.
 */
export function extractBaseCommand(command: string): string {
  const afterEnvVars = command.trim().replace(/^(\s*\w+=\S*\s+)+/, "");
  const match = /^(\S+)/.exec(afterEnvVars);
  return match?.[1] ? path.posix.basename(match[1]) : "";
}

/** Split a command line into simple commands on ;, &&, || and |. */
export function splitCommandSegments(command: string): string[] {
  return command
    .split(/&&|\|\||[;|\n]/)
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Evaluate an inline command against the command policy.
 */
export function evaluateCommand(command: string): PolicyResult {
  for (const segment of splitCommandSegments(command)) {
    const base = extractBaseCommand(segment);
    if (BLOCKED_COMMANDS.has(base)) {
      return { verdict: "deny", reason: `Command '${base}' is blocked by sandbox policy` };
    }
    if (base === "git") {
      for (const rule of BLOCKED_GIT_PATTERNS) {
        if (rule.pattern.test(segment)) return { verdict: "deny", reason: rule.reason };
      }
    }
  }

  for (const rule of DESTRUCTIVE_PATTERNS) {
    if (rule.pattern.test(command)) {
      return { verdict: "deny", reason: rule.reason };
    }
  }

  return { verdict: "allow" };
}

// ---------------------------------------------------------------------------
// Script content
// ---------------------------------------------------------------------------

const DANGEROUS_SCRIPT_PATTERNS: Array<{ pattern: RegExp; warning: string }> = [
  { pattern: /\brm\s+-[a-zA-Z]*r[a-zA-Z]*f/, warning: "uses recursive force delete (rm -rf)" },
  { pattern: /\b(curl|wget)\b[^\n|]*\|\s*(ba|z)?sh\b/, warning: "pipes a download into a shell" },
  { pattern: /\beval\b/, warning: "uses eval" },
  { pattern: /\bsudo\b/, warning: "uses sudo" },
  { pattern: /\bchmod\s+(-R\s+)?777\b/, warning: "makes files world-writable (chmod 777)" },
  { pattern: /\bgit\s+push\b.*--force\b/, warning: "force-pushes" },
];

/** Warnings for dangerous constructs in a script body. */
export function scanScriptContent(content: string): string[] {
  return DANGEROUS_SCRIPT_PATTERNS.filter((rule) => rule.pattern.test(content)).map((rule) => rule.warning);
}

/** SHA-256 of a script file, hex encoded. */
export function hashScript(scriptPath: string): string {
  return crypto.createHash("sha256").update(fs.readFileSync(scriptPath)).digest("hex");
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export interface HookEnvOptions {
  /** Parent environment keys to copy. */
  passthrough: readonly string[];
  projectRoot: string;
  parentEnv?: NodeJS.ProcessEnv;
}

/**
 * Build the child environment from scratch: allow-listed parent keys, the
 * hook's declared env, then TASKHOOKS_* metadata (which cannot be overridden).
 */
export function buildHookEnv(
  hook: HookDefinition,
  event: HookEvent,
  options: HookEnvOptions,
): Record<string, string> {
  const parent = options.parentEnv ?? process.env;
  const env: Record<string, string> = {};

  for (const key of options.passthrough) {
    const value = parent[key];
    if (value !== undefined) env[key] = value;
  }
  Object.assign(env, hook.env);

  env.TASKHOOKS_HOOK_NAME = hook.name;
  env.TASKHOOKS_EVENT_TYPE = event.event_type;
  env.TASKHOOKS_EVENT_ID = event.event_id;
  env.TASKHOOKS_PROJECT_ROOT = path.resolve(options.projectRoot);
  const taskId = event.context.task_id;
  if (typeof taskId === "string") env.TASKHOOKS_TASK_ID = taskId;
  return env;
}
