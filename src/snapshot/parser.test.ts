import { describe, it, expect, vi } from "vitest";
import {
  isValidTaskId,
  parseAcceptanceItems,
  parseSnapshot,
  parseSnapshotSet,
  parseTaskId,
} from "./parser.js";
import { createLogger } from "../shared/logger.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const OPTIONS = { idPrefix: "task", tasksGlob: "backlog/tasks/*.md" };

function taskDoc(fileName: string, frontMatter: string, body = ""): { path: string; content: string } {
  return { path: `backlog/tasks/${fileName}`, content: `---\n${frontMatter}\n---\n${body}` };
}

// ---------------------------------------------------------------------------
// Identifier grammar
// ---------------------------------------------------------------------------

describe("parseTaskId", () => {
  it("accepts the canonical forms", () => {
    expect(parseTaskId("task-12.md", "task")).toBe("task-12");
    expect(parseTaskId("task-12.3.md", "task")).toBe("task-12.3");
    expect(parseTaskId("task-001 - Set up CI.md", "task")).toBe("task-001");
    expect(parseTaskId("backlog/tasks/task-7 - Title.md", "task")).toBe("task-7");
  });

  it("rejects everything else", () => {
    for (const name of [
      "task-1..2.md",
      "task--1.md",
      "task-1.2.3.md",
      "task-abc.md",
      "task-1x.md",
      "task-.md",
      "task-1",
      "story-1.md",
      "README.md",
      "task-1-Title.md",
    ]) {
      expect(parseTaskId(name, "task")).toBeNull();
    }
  });

  it("honours a custom prefix", () => {
    expect(parseTaskId("ISSUE-4.md", "ISSUE")).toBe("ISSUE-4");
    expect(parseTaskId("task-4.md", "ISSUE")).toBeNull();
  });
});

describe("isValidTaskId", () => {
  it("matches the whole string only", () => {
    expect(isValidTaskId("task-3", "task")).toBe(true);
    expect(isValidTaskId("task-3.1", "task")).toBe(true);
    expect(isValidTaskId("task-3 ", "task")).toBe(false);
    expect(isValidTaskId("xtask-3", "task")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Acceptance items
// ---------------------------------------------------------------------------

describe("parseAcceptanceItems", () => {
  it("reads indexed checkboxes between the AC markers only", () => {
    const body = [
      "- [x] outside the block",
      "<!-- AC:BEGIN -->",
      "- [x] #1 First",
      "- [ ] #2 Second",
      "- [X] #3 Third",
      "<!-- AC:END -->",
      "- [ ] also outside",
    ].join("\n");

    expect(parseAcceptanceItems(body)).toEqual([
      { index: 1, text: "First", checked: true },
      { index: 2, text: "Second", checked: false },
      { index: 3, text: "Third", checked: true },
    ]);
  });

  it("uses every checkbox and positional indices without markers", () => {
    const body = "## AC\n- [ ] one\n* [x] two\nplain line\n  - [ ] three";
    expect(parseAcceptanceItems(body)).toEqual([
      { index: 1, text: "one", checked: false },
      { index: 2, text: "two", checked: true },
      { index: 3, text: "three", checked: false },
    ]);
  });

  it("returns an empty list when there are no checkboxes", () => {
    expect(parseAcceptanceItems("no criteria yet")).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// parseSnapshot
// ---------------------------------------------------------------------------

describe("parseSnapshot", () => {
  it("parses a complete document", () => {
    const doc = taskDoc(
      "task-5 - Login form.md",
      "id: task-5\nstatus: In Progress\npriority: high\nlabels: [ui, backend, ui]",
      "<!-- AC:BEGIN -->\n- [x] #1 Renders\n- [ ] #2 Validates\n<!-- AC:END -->\n",
    );

    const result = parseSnapshot(doc, OPTIONS);
    expect(result).toEqual({
      kind: "snapshot",
      snapshot: {
        id: "task-5",
        path: "backlog/tasks/task-5 - Login form.md",
        title: "Login form",
        status: "In Progress",
        priority: "high",
        labels: ["backend", "ui"],
        acceptanceItems: [
          { index: 1, text: "Renders", checked: true },
          { index: 2, text: "Validates", checked: false },
        ],
      },
    });
  });

  it("prefers the front-matter title", () => {
    const result = parseSnapshot(taskDoc("task-5 - slug.md", "title: Real title\nstatus: To Do"), OPTIONS);
    expect(result.kind === "snapshot" && result.snapshot.title).toBe("Real title");
  });

  it("skips documents outside the tasks glob", () => {
    const result = parseSnapshot({ path: "docs/task-1.md", content: "---\nstatus: To Do\n---\n" }, OPTIONS);
    expect(result).toMatchObject({ kind: "skip", reason: "not-tracked" });
  });

  it("skips malformed file name ids", () => {
    const result = parseSnapshot(taskDoc("task-1..2.md", "status: To Do"), OPTIONS);
    expect(result).toMatchObject({ kind: "skip", reason: "malformed-id" });
  });

  it("skips malformed front-matter ids", () => {
    const result = parseSnapshot(taskDoc("task-1.md", "id: task-1..2\nstatus: To Do"), OPTIONS);
    expect(result).toMatchObject({ kind: "skip", reason: "malformed-id" });
  });

  it("skips when the front-matter id disagrees with the file name", () => {
    const result = parseSnapshot(taskDoc("task-1.md", "id: task-2\nstatus: To Do"), OPTIONS);
    expect(result).toMatchObject({ kind: "skip", reason: "invalid-metadata" });
  });

  it("skips a missing status", () => {
    const result = parseSnapshot(taskDoc("task-1.md", "title: No status"), OPTIONS);
    expect(result).toEqual({ kind: "skip", reason: "invalid-metadata", detail: "missing status" });
  });

  it("skips missing or broken front matter", () => {
    expect(parseSnapshot({ path: "backlog/tasks/task-1.md", content: "# just markdown" }, OPTIONS)).toMatchObject({
      kind: "skip",
      reason: "invalid-metadata",
    });
    expect(parseSnapshot(taskDoc("task-1.md", "status: [unclosed"), OPTIONS)).toMatchObject({
      kind: "skip",
      reason: "invalid-metadata",
    });
  });

  it("logs skips at debug", () => {
    const logger = createLogger({ component: "snapshot" }, { level: "debug", fileOutput: false });
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    parseSnapshot(taskDoc("task-1.md", "title: x"), { ...OPTIONS, logger });
    expect(spy).toHaveBeenCalledWith(
      "[snapshot] Skipping backlog/tasks/task-1.md: invalid-metadata (missing status)",
    );
    spy.mockRestore();
  });
});

// ---------------------------------------------------------------------------
// parseSnapshotSet
// ---------------------------------------------------------------------------

describe("parseSnapshotSet", () => {
  it("keys snapshots by id and drops skips", () => {
    const set = parseSnapshotSet(
      [
        taskDoc("task-1.md", "status: To Do"),
        taskDoc("task-2 - Two.md", "status: Done"),
        taskDoc("notes.md", "status: To Do"),
        { path: "README.md", content: "hello" },
      ],
      OPTIONS,
    );
    expect([...set.keys()]).toEqual(["task-1", "task-2"]);
    expect(set.get("task-2")?.status).toBe("Done");
  });

  it("excludes every document sharing a duplicated id", () => {
    const logger = createLogger({ component: "snapshot" }, { fileOutput: false });
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const set = parseSnapshotSet(
      [
        taskDoc("task-3.md", "status: To Do"),
        taskDoc("task-3 - Copy.md", "status: Done"),
        taskDoc("task-4.md", "status: To Do"),
      ],
      { ...OPTIONS, logger },
    );
    expect([...set.keys()]).toEqual(["task-4"]);
    expect(warn).toHaveBeenCalledWith(
      "[snapshot] Duplicate task id task-3 in backlog/tasks/task-3.md, backlog/tasks/task-3 - Copy.md; excluding all",
    );
    warn.mockRestore();
  });
});
