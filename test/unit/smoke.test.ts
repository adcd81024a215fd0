/**
 * Smoke test: verifies that key modules from src/ can be imported
 * and their primary exports are available and functional.
 */
import { describe, expect, it } from "vitest";

import { VERSION } from "../../src/version.js";
import { createLogger, Logger, silentLogger, TASK_EVENT_TYPES } from "../../src/shared/index.js";
import { buildProgram } from "../../src/cli/program.js";
import * as lib from "../../src/lib.js";

describe("smoke test, src/ imports", () => {
  it("exports VERSION as a semver-like string", () => {
    expect(typeof VERSION).toBe("string");
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+/);
  });

  it("exports shared utilities", () => {
    expect(typeof createLogger).toBe("function");
    expect(silentLogger()).toBeInstanceOf(Logger);
    expect(TASK_EVENT_TYPES).toHaveLength(5);
  });

  it("exports the CLI program builder", () => {
    expect(buildProgram().name()).toBe("taskhooks");
  });

  it("exports the pipeline stages from the library entry", () => {
    expect(lib.VERSION).toBe(VERSION);
    expect(typeof lib.processRevision).toBe("function");
    expect(typeof lib.detectChanges).toBe("function");
    expect(typeof lib.emitEvents).toBe("function");
    expect(typeof lib.Dispatcher).toBe("function");
    expect(typeof lib.MetricsAggregator).toBe("function");
  });
});
