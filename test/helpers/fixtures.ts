/**
 * Shared builders for tests that need execution outcomes and audit entries.
 */
import { createEvent } from "../../src/events/event.js";
import { buildAuditRecord } from "../../src/audit/record.js";
import type { AuditEntry } from "../../src/audit/types.js";
import type { ExecutionOutcome } from "../../src/sandbox/executor.js";
import type { ContextValue, HookEvent } from "../../src/shared/types.js";

export function makeEvent(
  eventType = "task.completed",
  context: Record<string, ContextValue> = { task_id: "task-1" },
  eventId = "evt_test",
): HookEvent {
  return createEvent({ eventType, eventId, context, timestamp: "2024-05-01T10:00:00.000Z" });
}

export function makeOutcome(overrides: Partial<ExecutionOutcome> = {}): ExecutionOutcome {
  return {
    kind: "execution",
    hook: "notify",
    failMode: "continue",
    eventId: "evt_test",
    eventType: "task.completed",
    executed: true,
    status: "success",
    exitCode: 0,
    signal: null,
    startedAt: "2024-05-01T10:00:00.000Z",
    completedAt: "2024-05-01T10:00:00.120Z",
    durationMs: 120,
    timeoutMs: 30_000,
    workingDirectory: "/srv/repo",
    action: "notify.sh",
    stdout: { bytes: 6, lines: 1, truncated: false },
    stderr: { bytes: 0, lines: 0, truncated: false },
    stderrExcerpt: "",
    security: { outcome: "allowed", warnings: [] },
    output: "done!\n",
    ...overrides,
  };
}

/** Audit entry for a hook run with the given status, duration and time. */
export function makeEntry(
  overrides: {
    hook?: string;
    eventType?: string;
    status?: ExecutionOutcome["status"];
    durationMs?: number;
    timeoutMs?: number;
    completedAt?: string;
    taskId?: string;
    kind?: ExecutionOutcome["kind"];
  } = {},
): AuditEntry {
  const status = overrides.status ?? "success";
  const kind = overrides.kind ?? "execution";
  const outcome = makeOutcome({
    hook: overrides.hook ?? "notify",
    eventType: overrides.eventType ?? "task.completed",
    status,
    kind,
    executed: kind === "execution",
    exitCode: status === "success" ? 0 : status === "failed" ? 1 : null,
    durationMs: overrides.durationMs ?? 120,
    timeoutMs: overrides.timeoutMs ?? 30_000,
    completedAt: overrides.completedAt ?? "2024-05-01T10:00:00.120Z",
  });
  if (status !== "success") outcome.failureKind = kind === "security.violation" ? "security_violation" : status;
  const event = makeEvent(overrides.eventType ?? "task.completed", { task_id: overrides.taskId ?? "task-1" });
  return buildAuditRecord(outcome, event);
}
