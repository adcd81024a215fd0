/**
 * Per-command context: project root and logger, resolved from global flags.
 */
import { Command } from "commander";
import path from "node:path";
import { loadProjectSettings, type ProjectSettings } from "../config/index.js";
import { createLogger, normalizeLogLevel, type Logger } from "../shared/logger.js";
import type { LogLevel } from "../shared/types.js";

export interface GlobalOptions {
  projectDir?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/** Project root from `--project-dir`, falling back to `fallback` or the cwd. */
export function projectRootFor(command: Command, fallback?: string): string {
  const { projectDir } = command.optsWithGlobals<GlobalOptions>();
  if (projectDir) return path.resolve(projectDir);
  return fallback ?? process.cwd();
}

/**
 * Effective log level: `--verbose` / `--quiet`, then TASKHOOKS_LOG_LEVEL, then
 * the project's `log_level`. Machine-readable output keeps the console quiet.
 */
export function resolveLogLevel(command: Command, settings?: ProjectSettings, json = false): LogLevel {
  const { verbose, quiet } = command.optsWithGlobals<GlobalOptions>();
  if (verbose) return "debug";
  if (quiet || json) return "warn";
  return normalizeLogLevel(process.env.TASKHOOKS_LOG_LEVEL) ?? settings?.logLevel ?? "info";
}

export interface CommandContext {
  projectRoot: string;
  settings: ProjectSettings;
  logger: Logger;
}

export function commandContext(
  command: Command,
  component: string,
  options: { projectRoot?: string; json?: boolean } = {},
): CommandContext {
  const projectRoot = projectRootFor(command, options.projectRoot);
  const settings = loadProjectSettings(projectRoot);
  const logger = createLogger({ component }, { level: resolveLogLevel(command, settings, options.json) });
  return { projectRoot, settings, logger };
}
