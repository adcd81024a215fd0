import { describe, it, expect } from "vitest";
import { makeEntry } from "../../test/helpers/fixtures.js";
import { MemoryAuditSink } from "./audit-log.js";
import { formatAuditRecord, queryAuditRecords, tailRecords } from "./query.js";

function seed() {
  const sink = new MemoryAuditSink();
  sink.append(makeEntry({ hook: "notify", eventType: "task.completed", completedAt: "2024-05-01T09:00:00.000Z" }));
  sink.append(
    makeEntry({ hook: "lint", eventType: "task.created", status: "failed", completedAt: "2024-05-01T10:00:00.000Z" }),
  );
  sink.append(
    makeEntry({
      hook: "notify",
      eventType: "task.ac_checked",
      taskId: "task-2",
      completedAt: "2024-05-01T11:00:00.000Z",
    }),
  );
  sink.append(
    makeEntry({
      hook: "escape",
      kind: "security.violation",
      status: "error",
      completedAt: "2024-05-01T12:00:00.000Z",
    }),
  );
  return sink.readAll();
}

describe("queryAuditRecords", () => {
  const records = seed();

  it("returns everything for an empty query", () => {
    expect(queryAuditRecords(records, {})).toHaveLength(4);
  });

  it("filters by hook and status", () => {
    expect(queryAuditRecords(records, { hook: "notify" }).map((r) => r.event.event_type)).toEqual([
      "task.completed",
      "task.ac_checked",
    ]);
    expect(queryAuditRecords(records, { status: "failed" }).map((r) => r.hook.name)).toEqual(["lint"]);
  });

  it("filters by event type pattern", () => {
    expect(queryAuditRecords(records, { eventType: "task.ac_checked" })).toHaveLength(1);
    expect(queryAuditRecords(records, { eventType: "task.*" })).toHaveLength(4);
    expect(queryAuditRecords(records, { eventType: "*.created" }).map((r) => r.hook.name)).toEqual(["lint"]);
  });

  it("filters by kind, task and time", () => {
    expect(queryAuditRecords(records, { kind: "security.violation" }).map((r) => r.hook.name)).toEqual(["escape"]);
    expect(queryAuditRecords(records, { taskId: "task-2" }).map((r) => r.hook.name)).toEqual(["notify"]);
    expect(
      queryAuditRecords(records, { since: new Date("2024-05-01T10:00:00.000Z") }).map((r) => r.hook.name),
    ).toEqual(["lint", "notify", "escape"]);
  });
});

describe("tailRecords", () => {
  const records = seed();

  it("returns the last n records", () => {
    expect(tailRecords(records, 2).map((r) => r.hook.name)).toEqual(["notify", "escape"]);
    expect(tailRecords(records, 10)).toHaveLength(4);
    expect(tailRecords(records, 0)).toEqual([]);
  });
});

describe("formatAuditRecord", () => {
  it("formats a successful run", () => {
    const [record] = seed();
    expect(record && formatAuditRecord(record)).toBe(
      "2024-05-01T09:00:00.000Z success  notify               task.completed       task-1       120ms",
    );
  });

  it("shows the exit code of a failed run", () => {
    const record = seed()[1];
    expect(record && formatAuditRecord(record)).toBe(
      "2024-05-01T10:00:00.000Z failed   lint                 task.created         task-1       120ms  exit 1",
    );
  });
});
