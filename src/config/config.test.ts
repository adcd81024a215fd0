import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  DEFAULT_SETTINGS,
  SettingsError,
  loadProjectSettings,
  resolveProjectPaths,
  validateSettings,
} from "./index.js";

function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "taskhooks-config-test-"));
}

function rmrf(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

describe("resolveProjectPaths", () => {
  it("places state under .taskhooks", () => {
    const paths = resolveProjectPaths("/work/repo");
    expect(paths.stateDir).toBe("/work/repo/.taskhooks");
    expect(paths.configPath).toBe("/work/repo/.taskhooks/config.yaml");
    expect(paths.hooksDir).toBe("/work/repo/.taskhooks/hooks");
    expect(paths.auditLogPath).toBe("/work/repo/.taskhooks/audit/audit.jsonl");
    expect(paths.metricsDir).toBe("/work/repo/.taskhooks/metrics");
  });
});

describe("loadProjectSettings", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) rmrf(tmpDir);
    tmpDir = undefined;
  });

  it("returns defaults when no config file exists", () => {
    tmpDir = makeTmpDir();
    expect(loadProjectSettings(tmpDir)).toEqual(DEFAULT_SETTINGS);
  });

  it("reads overrides and keeps defaults for the rest", () => {
    tmpDir = makeTmpDir();
    fs.mkdirSync(path.join(tmpDir, ".taskhooks"));
    fs.writeFileSync(
      path.join(tmpDir, ".taskhooks", "config.yaml"),
      "tasks_glob: work/*.md\nterminal_status: Closed\naudit:\n  max_generations: 5\nlog_level: DEBUG\n",
    );

    const settings = loadProjectSettings(tmpDir);
    expect(settings.tasksGlob).toBe("work/*.md");
    expect(settings.terminalStatus).toBe("Closed");
    expect(settings.idPrefix).toBe("task");
    expect(settings.audit).toEqual({ maxBytes: 5 * 1024 * 1024, maxGenerations: 5 });
    expect(settings.logLevel).toBe("debug");
  });

  it("treats an empty file as defaults", () => {
    tmpDir = makeTmpDir();
    fs.mkdirSync(path.join(tmpDir, ".taskhooks"));
    fs.writeFileSync(path.join(tmpDir, ".taskhooks", "config.yaml"), "");
    expect(loadProjectSettings(tmpDir).tasksGlob).toBe(DEFAULT_SETTINGS.tasksGlob);
  });

  it("wraps YAML syntax errors", () => {
    tmpDir = makeTmpDir();
    fs.mkdirSync(path.join(tmpDir, ".taskhooks"));
    fs.writeFileSync(path.join(tmpDir, ".taskhooks", "config.yaml"), "tasks_glob: [unclosed\n");
    expect(() => loadProjectSettings(tmpDir ?? "")).toThrow(SettingsError);
  });
});

describe("validateSettings", () => {
  it("collects every problem", () => {
    try {
      validateSettings(
        { id_prefix: "9bad", audit: { max_bytes: -1 }, health: { min_success_rate: 2 }, log_level: "loud" },
        "config.yaml",
      );
      expect.unreachable("should have thrown");
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(SettingsError);
      if (err instanceof SettingsError) {
        expect(err.errors).toEqual([
          `"id_prefix" must be alphanumeric and start with a letter`,
          `"log_level" must be one of fatal, error, warn, info, debug, trace`,
          `"audit.max_bytes" must be a positive integer`,
          `"health.min_success_rate" must be between 0 and 1`,
        ]);
      }
    }
  });

  it("rejects a non-mapping document", () => {
    expect(() => validateSettings(["a"], "config.yaml")).toThrow(/top level must be a mapping/);
  });
});
