/**
 * Building and chaining audit records.
 */
import crypto from "node:crypto";
import type { HookEvent } from "../shared/types.js";
import { isRecord, isStringArray } from "../shared/guards.js";
import type { ExecutionOutcome, ExecutionStatus } from "../sandbox/executor.js";
import { VERSION } from "../version.js";
import { AUDIT_SCHEMA_VERSION, type AuditEntry, type AuditRecord } from "./types.js";

/** Audit entry for one execution outcome. */
export function buildAuditRecord(outcome: ExecutionOutcome, event: HookEvent): AuditEntry {
  const taskId = event.context.task_id;
  return {
    schema_version: AUDIT_SCHEMA_VERSION,
    record_id: `rec_${crypto.randomUUID()}`,
    kind: outcome.kind,
    timestamp: outcome.completedAt,
    hook: {
      name: outcome.hook,
      fail_mode: outcome.failMode,
      action: outcome.action,
    },
    event: {
      event_id: event.event_id,
      event_type: event.event_type,
      task_id: typeof taskId === "string" ? taskId : null,
    },
    execution: {
      status: outcome.status,
      executed: outcome.executed,
      exit_code: outcome.exitCode,
      signal: outcome.signal,
      duration_ms: outcome.durationMs,
      started_at: outcome.startedAt,
      completed_at: outcome.completedAt,
      timeout_ms: outcome.timeoutMs,
      working_directory: outcome.workingDirectory,
    },
    output: {
      stdout_bytes: outcome.stdout.bytes,
      stdout_lines: outcome.stdout.lines,
      stdout_truncated: outcome.stdout.truncated,
      stderr_bytes: outcome.stderr.bytes,
      stderr_lines: outcome.stderr.lines,
      stderr_truncated: outcome.stderr.truncated,
      stderr_excerpt: outcome.stderrExcerpt,
    },
    security: {
      outcome: outcome.security.outcome,
      violation: outcome.security.violation ?? null,
      violation_kind: outcome.security.violationKind ?? null,
      script_sha256: outcome.security.scriptSha256 ?? null,
      warnings: [...outcome.security.warnings],
    },
    failure_kind: outcome.failureKind ?? null,
    error: outcome.error ?? null,
    tool: { name: "taskhooks", version: VERSION },
  };
}

// ---------------------------------------------------------------------------
// Hash chain
// ---------------------------------------------------------------------------

/** SHA-256 of the record serialized without its entry_hash. */
export function computeEntryHash(record: Omit<AuditRecord, "entry_hash">): string {
  const { schema_version, record_id, kind, timestamp, hook, event, execution, output, security } = record;
  const body = {
    schema_version,
    record_id,
    kind,
    timestamp,
    hook,
    event,
    execution,
    output,
    security,
    failure_kind: record.failure_kind,
    error: record.error,
    tool: record.tool,
    prev_hash: record.prev_hash,
  };
  return crypto.createHash("sha256").update(JSON.stringify(body)).digest("hex");
}

/** Chain an entry onto the record whose hash is `prevHash`. */
export function sealRecord(entry: AuditEntry, prevHash: string | null): AuditRecord {
  const unsealed = { ...entry, prev_hash: prevHash };
  return { ...unsealed, entry_hash: computeEntryHash(unsealed) };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function hasStrings(value: Record<string, unknown>, keys: readonly string[]): boolean {
  return keys.every((k) => typeof value[k] === "string");
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

const EXECUTION_STATUSES: readonly ExecutionStatus[] = ["success", "failed", "timeout", "error"];

function isExecutionStatus(value: unknown): value is ExecutionStatus {
  return EXECUTION_STATUSES.some((status) => status === value);
}

/** Structural check for a parsed audit line. */
export function isAuditRecord(value: unknown): value is AuditRecord {
  if (!isRecord(value)) return false;
  if (!hasStrings(value, ["schema_version", "record_id", "kind", "timestamp", "entry_hash"])) return false;
  if (value.kind !== "execution" && value.kind !== "security.violation") return false;
  if (!isNullableString(value.prev_hash) || !isNullableString(value.failure_kind) || !isNullableString(value.error)) {
    return false;
  }

  const { hook, event, execution, output, security, tool } = value;
  return (
    isRecord(hook) &&
    hasStrings(hook, ["name", "fail_mode", "action"]) &&
    isRecord(event) &&
    hasStrings(event, ["event_id", "event_type"]) &&
    isNullableString(event.task_id) &&
    isRecord(execution) &&
    hasStrings(execution, ["started_at", "completed_at", "working_directory"]) &&
    isExecutionStatus(execution.status) &&
    typeof execution.executed === "boolean" &&
    typeof execution.duration_ms === "number" &&
    typeof execution.timeout_ms === "number" &&
    isRecord(output) &&
    typeof output.stderr_excerpt === "string" &&
    isRecord(security) &&
    typeof security.outcome === "string" &&
    isStringArray(security.warnings) &&
    isRecord(tool) &&
    hasStrings(tool, ["name", "version"])
  );
}

/** Parse one JSONL line; null when it is not an audit record. */
export function parseAuditLine(line: string): AuditRecord | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  return isAuditRecord(value) ? value : null;
}
