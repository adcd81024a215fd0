/**
 * Sandboxed executor: runs one hook action for one event.
 *
 * Policy checks run first; a rejected action is never spawned. The child
 * gets an argument vector (never a shell string built from event data), the
 * event JSON on stdin, and an allow-listed environment. At the timeout it is
 * sent SIGTERM, then SIGKILL after a grace period. Both go to the child's
 * process group.
 */
import { spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import type { HookEvent } from "../shared/types.js";
import type { HookDefinition } from "../hooks/types.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import { errorMessage } from "../shared/guards.js";
import { serializeEvent } from "../events/event.js";
import { redactCredentials } from "../security/redaction.js";
import {
  SandboxPolicyViolation,
  buildHookEnv,
  evaluateCommand,
  hashScript,
  resolveScriptPath,
  resolveWorkingDirectory,
  scanScriptContent,
  type ViolationKind,
} from "./policy.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ExecutionStatus = "success" | "failed" | "timeout" | "error";

export type FailureKind = "security_violation" | "configuration" | "failed" | "timeout" | "error";

export interface StreamSummary {
  bytes: number;
  lines: number;
  truncated: boolean;
}

export interface SecurityOutcome {
  outcome: "allowed" | "rejected";
  violation?: string;
  violationKind?: ViolationKind;
  scriptSha256?: string;
  warnings: string[];
}

export interface ExecutionOutcome {
  kind: "execution" | "security.violation";
  hook: string;
  failMode: HookDefinition["failMode"];
  eventId: string;
  eventType: string;
  /** Whether a child process was actually started. */
  executed: boolean;
  status: ExecutionStatus;
  failureKind?: FailureKind;
  exitCode: number | null;
  signal: string | null;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  timeoutMs: number;
  workingDirectory: string;
  /** Script path relative to the hooks directory, or the inline command. */
  action: string;
  stdout: StreamSummary;
  stderr: StreamSummary;
  /** Redacted tail of stderr. */
  stderrExcerpt: string;
  security: SecurityOutcome;
  error?: string;
  /** Captured stdout (up to the byte cap); kept out of the audit record. */
  output: string;
}

export interface ExecutorOptions {
  projectRoot: string;
  /** Script references must resolve inside this directory. */
  hooksDir: string;
  envPassthrough: readonly string[];
  /** Delay between SIGTERM and SIGKILL. */
  graceMs?: number;
  /** Per-stream capture cap. */
  maxOutputBytes?: number;
  parentEnv?: NodeJS.ProcessEnv;
  logger?: Logger;
  now?: () => Date;
}

export const DEFAULT_GRACE_MS = 5_000;
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;
const STDERR_EXCERPT_CHARS = 2_000;

// ---------------------------------------------------------------------------
// Output capture
// ---------------------------------------------------------------------------

class StreamCapture {
  private readonly chunks: Buffer[] = [];
  private captured = 0;
  private total = 0;
  private newlines = 0;
  private lastByte: number | undefined;

  constructor(private readonly limit: number) {}

  push(data: Buffer): void {
    this.total += data.length;
    for (const byte of data) {
      if (byte === 0x0a) this.newlines++;
    }
    if (data.length > 0) this.lastByte = data[data.length - 1];

    const room = this.limit - this.captured;
    if (room > 0) {
      const slice = data.length > room ? data.subarray(0, room) : data;
      this.chunks.push(slice);
      this.captured += slice.length;
    }
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf-8");
  }

  summary(): StreamSummary {
    const partial = this.total > 0 && this.lastByte !== 0x0a ? 1 : 0;
    return {
      bytes: this.total,
      lines: this.newlines + partial,
      truncated: this.total > this.captured,
    };
  }
}

function emptyStream(): StreamSummary {
  return { bytes: 0, lines: 0, truncated: false };
}

function describeAction(hook: HookDefinition): string {
  return hook.action.kind === "script" ? hook.action.script : hook.action.command;
}

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

interface Prepared {
  argv: [string, ...string[]];
  cwd: string;
  security: SecurityOutcome;
}

type Rejection = {
  status: ExecutionStatus;
  failureKind: FailureKind;
  kind: ExecutionOutcome["kind"];
  error: string;
  security: SecurityOutcome;
  workingDirectory: string;
};

function prepare(hook: HookDefinition, options: ExecutorOptions): Prepared | Rejection {
  const reject = (err: SandboxPolicyViolation, workingDirectory: string): Rejection => ({
    status: "error",
    failureKind: "security_violation",
    kind: "security.violation",
    error: err.message,
    security: { outcome: "rejected", violation: err.message, violationKind: err.kind, warnings: [] },
    workingDirectory,
  });
  const misconfigured = (message: string, workingDirectory: string): Rejection => ({
    status: "error",
    failureKind: "configuration",
    kind: "execution",
    error: message,
    security: { outcome: "allowed", warnings: [] },
    workingDirectory,
  });

  let cwd: string;
  try {
    cwd = resolveWorkingDirectory(hook.workingDirectory, options.projectRoot);
  } catch (err: unknown) {
    if (err instanceof SandboxPolicyViolation) return reject(err, hook.workingDirectory);
    throw err;
  }
  if (!fs.existsSync(cwd) || !fs.statSync(cwd).isDirectory()) {
    return misconfigured(`Working directory '${hook.workingDirectory}' does not exist`, hook.workingDirectory);
  }

  if (hook.action.kind === "command") {
    const verdict = evaluateCommand(hook.action.command);
    if (verdict.verdict === "deny") {
      const reason = verdict.reason ?? "Command denied by sandbox policy";
      return reject(new SandboxPolicyViolation("blocked-command", hook.action.command, reason), hook.workingDirectory);
    }
    return {
      argv: [hook.shell, "-c", hook.action.command],
      cwd,
      security: { outcome: "allowed", warnings: [] },
    };
  }

  let scriptPath: string;
  try {
    scriptPath = resolveScriptPath(hook.action.script, options.hooksDir);
  } catch (err: unknown) {
    if (err instanceof SandboxPolicyViolation) return reject(err, hook.workingDirectory);
    throw err;
  }
  if (!fs.existsSync(scriptPath) || !fs.statSync(scriptPath).isFile()) {
    return misconfigured(`Script '${hook.action.script}' not found in ${options.hooksDir}`, hook.workingDirectory);
  }

  const security: SecurityOutcome = {
    outcome: "allowed",
    scriptSha256: hashScript(scriptPath),
    warnings: scanScriptContent(fs.readFileSync(scriptPath, "utf-8")),
  };

  let executable = true;
  try {
    fs.accessSync(scriptPath, fs.constants.X_OK);
  } catch {
    executable = false;
  }
  const argv: [string, ...string[]] = executable
    ? [scriptPath, ...hook.action.args]
    : [hook.shell, scriptPath, ...hook.action.args];
  return { argv, cwd, security };
}

/**
 * Execute one hook for one event. Never rejects: every failure is reported
 * through the returned outcome.
 */
export function executeHook(
  hook: HookDefinition,
  event: HookEvent,
  options: ExecutorOptions,
): Promise<ExecutionOutcome> {
  const logger = (options.logger ?? silentLogger()).child({ hook: hook.name, event: event.event_id });
  const now = options.now ?? (() => new Date());
  const graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
  const maxBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  const timeoutMs = hook.timeoutSeconds * 1000;

  const base = {
    hook: hook.name,
    failMode: hook.failMode,
    eventId: event.event_id,
    eventType: event.event_type,
    timeoutMs,
    action: describeAction(hook),
  };

  const started = now();
  const prepared = prepare(hook, options);

  if (!("argv" in prepared)) {
    const level = prepared.kind === "security.violation" ? "error" : "warn";
    logger[level](`Hook '${hook.name}' not executed: ${prepared.error}`);
    return Promise.resolve({
      ...base,
      kind: prepared.kind,
      executed: false,
      status: prepared.status,
      failureKind: prepared.failureKind,
      exitCode: null,
      signal: null,
      startedAt: started.toISOString(),
      completedAt: started.toISOString(),
      durationMs: 0,
      workingDirectory: prepared.workingDirectory,
      stdout: emptyStream(),
      stderr: emptyStream(),
      stderrExcerpt: "",
      security: prepared.security,
      error: prepared.error,
      output: "",
    });
  }

  for (const warning of prepared.security.warnings) {
    logger.warn(`Hook '${hook.name}' script ${warning}`);
  }

  const env = buildHookEnv(hook, event, {
    passthrough: options.envPassthrough,
    projectRoot: options.projectRoot,
    parentEnv: options.parentEnv,
  });
  const workingDirectory = path.relative(options.projectRoot, prepared.cwd) || ".";

  return new Promise<ExecutionOutcome>((resolve) => {
    const stdout = new StreamCapture(maxBytes);
    const stderr = new StreamCapture(maxBytes);
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;
    let settled = false;
    let child: ChildProcess;

    const finish = (
      status: ExecutionStatus,
      fields: { exitCode: number | null; signal: string | null; executed: boolean; error?: string },
    ): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);

      const completed = now();
      const stderrText = stderr.text();
      const outcome: ExecutionOutcome = {
        ...base,
        kind: "execution",
        executed: fields.executed,
        status,
        exitCode: fields.exitCode,
        signal: fields.signal,
        startedAt: started.toISOString(),
        completedAt: completed.toISOString(),
        durationMs: Math.max(0, completed.getTime() - started.getTime()),
        workingDirectory,
        stdout: stdout.summary(),
        stderr: stderr.summary(),
        stderrExcerpt: redactCredentials(stderrText.slice(-STDERR_EXCERPT_CHARS)),
        security: prepared.security,
        output: stdout.text(),
      };
      if (status !== "success") outcome.failureKind = status;
      if (fields.error !== undefined) outcome.error = fields.error;

      if (status === "success") {
        logger.debug(`Hook '${hook.name}' succeeded in ${outcome.durationMs}ms`);
      } else {
        logger.warn(`Hook '${hook.name}' ${status}${fields.error ? `: ${fields.error}` : ""}`);
      }
      resolve(outcome);
    };

    // Signals go to the whole process group so a shell's own children die too.
    const signalGroup = (sig: NodeJS.Signals): void => {
      if (typeof child.pid === "number") {
        try {
          process.kill(-child.pid, sig);
          return;
        } catch (err: unknown) {
          logger.debug(`Process group signal failed: ${errorMessage(err)}`);
        }
      }
      child.kill(sig);
    };

    // A grandchild holding stdout or stderr open would delay "close" forever.
    const releasePipes = (): void => {
      child.stdout?.destroy();
      child.stderr?.destroy();
    };

    const settle = (code: number | null, signal: NodeJS.Signals | null): void => {
      if (timedOut) {
        finish("timeout", {
          exitCode: code,
          signal,
          executed: true,
          error: `Timed out after ${hook.timeoutSeconds}s`,
        });
      } else if (signal) {
        finish("error", { exitCode: code, signal, executed: true, error: `Terminated by ${signal}` });
      } else if (code !== 0) {
        finish("failed", { exitCode: code, signal: null, executed: true, error: `Exited with code ${code}` });
      } else {
        finish("success", { exitCode: 0, signal: null, executed: true });
      }
    };

    let killed = false;
    let exited: { code: number | null; signal: NodeJS.Signals | null } | null = null;

    const timer = setTimeout(() => {
      timedOut = true;
      logger.warn(`Hook '${hook.name}' exceeded ${hook.timeoutSeconds}s, sending SIGTERM`);
      killTimer = setTimeout(() => {
        logger.warn(`Hook '${hook.name}' still running after ${graceMs}ms grace, sending SIGKILL`);
        signalGroup("SIGKILL");
        killed = true;
        releasePipes();
        if (exited) settle(exited.code, exited.signal);
      }, graceMs);
      signalGroup("SIGTERM");
    }, timeoutMs);

    const [command, ...args] = prepared.argv;
    try {
      child = spawn(command, args, {
        cwd: prepared.cwd,
        env,
        stdio: ["pipe", "pipe", "pipe"],
        shell: false,
        detached: true,
      });
    } catch (err: unknown) {
      finish("error", { exitCode: null, signal: null, executed: false, error: errorMessage(err) });
      return;
    }

    logger.debug(`Running hook '${hook.name}': ${prepared.argv.join(" ")}`);

    child.stdout?.on("data", (data: Buffer) => stdout.push(data));
    child.stderr?.on("data", (data: Buffer) => stderr.push(data));

    child.on("error", (err: Error) => {
      finish("error", { exitCode: null, signal: null, executed: false, error: err.message });
    });

    child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      exited = { code, signal };
      if (killed) {
        releasePipes();
        settle(code, signal);
      }
    });

    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      settle(code, signal);
    });

    // A child that exits without reading stdin raises EPIPE here.
    child.stdin?.on("error", (err: Error) => {
      logger.debug(`stdin closed early: ${err.message}`);
    });
    child.stdin?.end(serializeEvent(event) + "\n");
  });
}
