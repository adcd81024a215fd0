import { describe, it, expect } from "vitest";
import { createEvent } from "../events/event.js";
import type { ContextValue } from "../shared/types.js";
import {
  getMatchingHooks,
  hookMatches,
  isValidMatcherPattern,
  matchesEventType,
  matchesFilter,
} from "./matcher.js";
import { DEFAULT_HOOKS_DEFAULTS, type HookDefinition, type HooksConfig } from "./types.js";

function makeHook(overrides: Partial<HookDefinition> = {}): HookDefinition {
  return {
    name: "hook",
    matchers: [{ pattern: "*" }],
    action: { kind: "command", command: "echo" },
    timeoutSeconds: 30,
    workingDirectory: ".",
    shell: "/bin/sh",
    env: {},
    failMode: "continue",
    enabled: true,
    ...overrides,
  };
}

function makeEvent(eventType: string, context: Record<string, ContextValue> = {}) {
  return createEvent({ eventType, eventId: "evt_test", context });
}

describe("isValidMatcherPattern", () => {
  it("accepts the supported forms", () => {
    for (const pattern of ["*", "task.created", "task.*", "task.ac.*", "*.completed"]) {
      expect(isValidMatcherPattern(pattern)).toBe(true);
    }
  });

  it("rejects everything else", () => {
    for (const pattern of ["", "task", "task.*.done", "**", "Task.Created", "*.task.*", "task.", "*."]) {
      expect(isValidMatcherPattern(pattern)).toBe(false);
    }
  });
});

describe("matchesEventType", () => {
  it("matches exact types only exactly", () => {
    expect(matchesEventType("task.created", "task.created")).toBe(true);
    expect(matchesEventType("task.created", "task.completed")).toBe(false);
  });

  it("matches one level under a prefix", () => {
    expect(matchesEventType("task.*", "task.ac_checked")).toBe(true);
    expect(matchesEventType("task.*", "task.ac.checked")).toBe(false);
    expect(matchesEventType("task.*", "taskx.created")).toBe(false);
  });

  it("matches a final segment", () => {
    expect(matchesEventType("*.completed", "task.completed")).toBe(true);
    expect(matchesEventType("*.completed", "task.not_completed")).toBe(false);
  });

  it("matches everything with *", () => {
    expect(matchesEventType("*", "task.status_changed")).toBe(true);
  });
});

describe("matchesFilter", () => {
  const context = { priority: "high", labels: ["backend", "api"], ac_total: 3 };

  it("passes when there is no filter", () => {
    expect(matchesFilter(undefined, context)).toBe(true);
  });

  it("compares scalars exactly", () => {
    expect(matchesFilter({ priority: { op: "equals", value: "high" } }, context)).toBe(true);
    expect(matchesFilter({ priority: { op: "equals", value: "High" } }, context)).toBe(false);
    expect(matchesFilter({ ac_total: { op: "equals", value: 3 } }, context)).toBe(true);
    expect(matchesFilter({ ac_total: { op: "equals", value: "3" } }, context)).toBe(false);
  });

  it("matches any listed value, including membership in arrays", () => {
    expect(matchesFilter({ priority: { op: "any", values: ["low", "high"] } }, context)).toBe(true);
    expect(matchesFilter({ labels: { op: "any", values: ["frontend", "api"] } }, context)).toBe(true);
    expect(matchesFilter({ labels: { op: "any", values: ["frontend"] } }, context)).toBe(false);
  });

  it("requires every value for all", () => {
    expect(matchesFilter({ labels: { op: "all", values: ["api", "backend"] } }, context)).toBe(true);
    expect(matchesFilter({ labels: { op: "all", values: ["api", "docs"] } }, context)).toBe(false);
  });

  it("fails when the key is missing", () => {
    expect(matchesFilter({ owner: { op: "equals", value: "sam" } }, context)).toBe(false);
  });

  it("ANDs keys together", () => {
    expect(
      matchesFilter(
        {
          priority: { op: "equals", value: "high" },
          labels: { op: "any", values: ["docs"] },
        },
        context,
      ),
    ).toBe(false);
  });
});

describe("hookMatches", () => {
  it("never matches a disabled hook", () => {
    expect(hookMatches(makeHook({ enabled: false }), makeEvent("task.created"))).toBe(false);
  });

  it("matches when any matcher applies", () => {
    const hook = makeHook({ matchers: [{ pattern: "task.created" }, { pattern: "task.completed" }] });
    expect(hookMatches(hook, makeEvent("task.completed"))).toBe(true);
    expect(hookMatches(hook, makeEvent("task.ac_checked"))).toBe(false);
  });

  it("applies a matcher filter only to its own matcher", () => {
    const hook = makeHook({
      matchers: [
        { pattern: "task.completed", filter: { priority: { op: "equals", value: "high" } } },
        { pattern: "task.created" },
      ],
    });
    expect(hookMatches(hook, makeEvent("task.completed", { priority: "low" }))).toBe(false);
    expect(hookMatches(hook, makeEvent("task.created", { priority: "low" }))).toBe(true);
  });

  it("applies the hook filter on top of the matchers", () => {
    const hook = makeHook({ filter: { labels: { op: "any", values: ["backend"] } } });
    expect(hookMatches(hook, makeEvent("task.created", { labels: ["backend"] }))).toBe(true);
    expect(hookMatches(hook, makeEvent("task.created", { labels: [] }))).toBe(false);
  });
});

describe("getMatchingHooks", () => {
  it("returns every match in declaration order", () => {
    const config: HooksConfig = {
      version: "1.0",
      defaults: { ...DEFAULT_HOOKS_DEFAULTS },
      hooks: [
        makeHook({ name: "first", matchers: [{ pattern: "*.completed" }] }),
        makeHook({ name: "skipped", matchers: [{ pattern: "task.created" }] }),
        makeHook({ name: "second", matchers: [{ pattern: "task.*" }] }),
        makeHook({ name: "third" }),
      ],
    };
    expect(getMatchingHooks(config, makeEvent("task.completed")).map((h) => h.name)).toEqual([
      "first",
      "second",
      "third",
    ]);
  });
});
