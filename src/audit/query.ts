/**
 * Filtering and formatting audit records for `taskhooks audit`.
 */
import { matchesEventType } from "../hooks/matcher.js";
import type { ExecutionStatus } from "../sandbox/executor.js";
import type { AuditRecord, AuditRecordKind } from "./types.js";

export interface AuditQuery {
  hook?: string;
  /** Event type or matcher pattern (`task.*`). */
  eventType?: string;
  status?: ExecutionStatus;
  kind?: AuditRecordKind;
  taskId?: string;
  /** Records at or after this instant. */
  since?: Date;
}

/** Records matching every given criterion, in log order. */
export function queryAuditRecords(records: readonly AuditRecord[], query: AuditQuery): AuditRecord[] {
  const since = query.since?.getTime();
  return records.filter((r) => {
    if (query.hook !== undefined && r.hook.name !== query.hook) return false;
    if (query.eventType !== undefined && !matchesEventType(query.eventType, r.event.event_type)) return false;
    if (query.status !== undefined && r.execution.status !== query.status) return false;
    if (query.kind !== undefined && r.kind !== query.kind) return false;
    if (query.taskId !== undefined && r.event.task_id !== query.taskId) return false;
    if (since !== undefined && Date.parse(r.timestamp) < since) return false;
    return true;
  });
}

/** The last `n` records. */
export function tailRecords(records: readonly AuditRecord[], n: number): AuditRecord[] {
  if (n <= 0) return [];
  return records.slice(-n);
}

/**
 * One line per record:
 * `2024-05-01T10:00:00.000Z success  notify      task.completed  task-1  120ms`
 */
export function formatAuditRecord(record: AuditRecord): string {
  const status = record.kind === "security.violation" ? "rejected" : record.execution.status;
  const parts = [
    record.timestamp,
    status.padEnd(8),
    record.hook.name.padEnd(20),
    record.event.event_type.padEnd(20),
    (record.event.task_id ?? "-").padEnd(12),
    `${record.execution.duration_ms}ms`,
  ];
  let line = parts.join(" ");
  if (record.kind === "security.violation" && record.security.violation) {
    line += `  ${record.security.violation}`;
  } else if (record.execution.exit_code !== null && record.execution.exit_code !== 0) {
    line += `  exit ${record.execution.exit_code}`;
  } else if (record.execution.signal) {
    line += `  ${record.execution.signal}`;
  }
  return line;
}
