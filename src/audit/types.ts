/**
 * Audit record wire format.
 *
 * One JSON object per line in .taskhooks/audit/audit.jsonl. Field names are
 * snake_case and every optional value is written as null, so the serialized
 * form is stable and can be hashed.
 */
import type { FailMode } from "../hooks/types.js";
import type { ExecutionStatus, FailureKind } from "../sandbox/executor.js";

export const AUDIT_SCHEMA_VERSION = "1.0";

export type AuditRecordKind = "execution" | "security.violation";

export interface AuditRecord {
  schema_version: string;
  record_id: string;
  kind: AuditRecordKind;
  /** Completion time of the execution (or of the rejection). */
  timestamp: string;
  hook: {
    name: string;
    fail_mode: FailMode;
    /** Script reference or inline command. */
    action: string;
  };
  event: {
    event_id: string;
    event_type: string;
    task_id: string | null;
  };
  execution: {
    status: ExecutionStatus;
    executed: boolean;
    exit_code: number | null;
    signal: string | null;
    duration_ms: number;
    started_at: string;
    completed_at: string;
    timeout_ms: number;
    working_directory: string;
  };
  output: {
    stdout_bytes: number;
    stdout_lines: number;
    stdout_truncated: boolean;
    stderr_bytes: number;
    stderr_lines: number;
    stderr_truncated: boolean;
    /** Redacted tail of stderr. */
    stderr_excerpt: string;
  };
  security: {
    outcome: "allowed" | "rejected";
    violation: string | null;
    violation_kind: string | null;
    script_sha256: string | null;
    warnings: string[];
  };
  failure_kind: FailureKind | null;
  error: string | null;
  tool: {
    name: string;
    version: string;
  };
  /** entry_hash of the previous record; null for the first record. */
  prev_hash: string | null;
  /** SHA-256 over this record with entry_hash omitted. */
  entry_hash: string;
}

/** A record before it is chained into a log. */
export type AuditEntry = Omit<AuditRecord, "prev_hash" | "entry_hash">;

export interface IntegrityReport {
  valid: boolean;
  /** Number of records checked. */
  records: number;
  errors: string[];
}
