import { describe, it, expect } from "vitest";
import { VERSION } from "../version.js";
import { makeEvent, makeOutcome } from "../../test/helpers/fixtures.js";
import { buildAuditRecord, computeEntryHash, isAuditRecord, parseAuditLine, sealRecord } from "./record.js";

describe("buildAuditRecord", () => {
  it("maps an execution outcome onto the wire format", () => {
    const entry = buildAuditRecord(makeOutcome(), makeEvent());

    expect(entry.record_id).toMatch(/^rec_[0-9a-f-]{36}$/);
    expect(entry).toMatchObject({
      schema_version: "1.0",
      kind: "execution",
      timestamp: "2024-05-01T10:00:00.120Z",
      hook: { name: "notify", fail_mode: "continue", action: "notify.sh" },
      event: { event_id: "evt_test", event_type: "task.completed", task_id: "task-1" },
      execution: {
        status: "success",
        executed: true,
        exit_code: 0,
        signal: null,
        duration_ms: 120,
        started_at: "2024-05-01T10:00:00.000Z",
        completed_at: "2024-05-01T10:00:00.120Z",
        timeout_ms: 30_000,
        working_directory: "/srv/repo",
      },
      output: {
        stdout_bytes: 6,
        stdout_lines: 1,
        stdout_truncated: false,
        stderr_bytes: 0,
        stderr_lines: 0,
        stderr_truncated: false,
        stderr_excerpt: "",
      },
      security: { outcome: "allowed", violation: null, violation_kind: null, script_sha256: null, warnings: [] },
      failure_kind: null,
      error: null,
      tool: { name: "taskhooks", version: VERSION },
    });
  });

  it("keeps captured stdout out of the record", () => {
    const entry = buildAuditRecord(makeOutcome({ output: "secret output" }), makeEvent());
    expect(JSON.stringify(entry)).not.toContain("secret output");
  });

  it("records security rejections", () => {
    const entry = buildAuditRecord(
      makeOutcome({
        kind: "security.violation",
        executed: false,
        status: "error",
        failureKind: "security_violation",
        exitCode: null,
        security: {
          outcome: "rejected",
          violation: "Script '../x.sh' contains a '..' traversal segment",
          violationKind: "path-traversal",
          warnings: [],
        },
      }),
      makeEvent("task.created", {}),
    );

    expect(entry.kind).toBe("security.violation");
    expect(entry.execution.executed).toBe(false);
    expect(entry.failure_kind).toBe("security_violation");
    expect(entry.event.task_id).toBeNull();
    expect(entry.security).toEqual({
      outcome: "rejected",
      violation: "Script '../x.sh' contains a '..' traversal segment",
      violation_kind: "path-traversal",
      script_sha256: null,
      warnings: [],
    });
  });
});

describe("hash chain", () => {
  it("links each record to the previous hash", () => {
    const first = sealRecord(buildAuditRecord(makeOutcome(), makeEvent()), null);
    const second = sealRecord(buildAuditRecord(makeOutcome(), makeEvent()), first.entry_hash);

    expect(first.prev_hash).toBeNull();
    expect(first.entry_hash).toMatch(/^[0-9a-f]{64}$/);
    expect(second.prev_hash).toBe(first.entry_hash);
    expect(computeEntryHash(second)).toBe(second.entry_hash);
  });

  it("changes when any field changes", () => {
    const record = sealRecord(buildAuditRecord(makeOutcome(), makeEvent()), null);
    const tampered = { ...record, execution: { ...record.execution, status: "failed" as const } };
    expect(computeEntryHash(tampered)).not.toBe(record.entry_hash);
  });

  it("survives a JSON round trip", () => {
    const record = sealRecord(buildAuditRecord(makeOutcome(), makeEvent()), "abc");
    const parsed = parseAuditLine(JSON.stringify(record));
    expect(parsed).toEqual(record);
    expect(parsed && computeEntryHash(parsed)).toBe(record.entry_hash);
  });
});

describe("parseAuditLine", () => {
  it("rejects non-JSON and foreign objects", () => {
    expect(parseAuditLine("not json")).toBeNull();
    expect(parseAuditLine('{"kind":"execution"}')).toBeNull();
    expect(isAuditRecord([])).toBe(false);
  });

  it("rejects a record whose execution status is not a known status", () => {
    const record = sealRecord(buildAuditRecord(makeOutcome(), makeEvent()), null);
    const line = JSON.stringify({ ...record, execution: { ...record.execution, status: "bogus" } });
    expect(parseAuditLine(line)).toBeNull();
  });
});
