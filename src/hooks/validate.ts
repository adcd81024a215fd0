/**
 * Dry-run validation of the hook registry.
 *
 * Runs the loader plus every pre-spawn policy check the executor would run,
 * without executing anything.
 */
import fs from "node:fs";
import { resolveProjectPaths } from "../config/index.js";
import {
  SandboxPolicyViolation,
  evaluateCommand,
  resolveScriptPath,
  resolveWorkingDirectory,
  scanScriptContent,
} from "../sandbox/policy.js";
import { HooksConfigError, loadHooksConfig } from "./config.js";
import type { HookDefinition, HooksConfig } from "./types.js";

export const HIGH_TIMEOUT_SECONDS = 300;

export interface ValidationReport {
  valid: boolean;
  /** Registry file, when one was found. */
  source?: string;
  errors: string[];
  warnings: string[];
  config?: HooksConfig;
}

function isExecutable(file: string): boolean {
  try {
    fs.accessSync(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function checkHook(hook: HookDefinition, projectRoot: string, hooksDir: string, errors: string[], warnings: string[]): void {
  const ctx = `Hook '${hook.name}'`;

  try {
    const cwd = resolveWorkingDirectory(hook.workingDirectory, projectRoot);
    if (!fs.existsSync(cwd)) {
      errors.push(`${ctx} working directory not found: ${hook.workingDirectory}`);
    }
  } catch (err: unknown) {
    if (!(err instanceof SandboxPolicyViolation)) throw err;
    errors.push(`${ctx} ${err.message}`);
  }

  if (hook.action.kind === "command") {
    const verdict = evaluateCommand(hook.action.command);
    if (verdict.verdict === "deny") {
      errors.push(`${ctx} command denied: ${verdict.reason ?? "blocked by sandbox policy"}`);
    }
  } else {
    try {
      const script = resolveScriptPath(hook.action.script, hooksDir);
      if (!fs.existsSync(script)) {
        errors.push(`${ctx} script not found: ${hook.action.script}`);
      } else {
        if (!isExecutable(script)) {
          warnings.push(`${ctx} script ${hook.action.script} is not executable; it will run through ${hook.shell}`);
        }
        for (const warning of scanScriptContent(fs.readFileSync(script, "utf-8"))) {
          warnings.push(`${ctx} script ${warning}`);
        }
      }
    } catch (err: unknown) {
      if (!(err instanceof SandboxPolicyViolation)) throw err;
      errors.push(`${ctx} ${err.message}`);
    }
  }

  if (hook.timeoutSeconds > HIGH_TIMEOUT_SECONDS) {
    warnings.push(`${ctx} has high timeout: ${hook.timeoutSeconds}s (>5 minutes)`);
  }
}

/** Validate the registry without executing any hook. */
export function validateHooksConfigFile(projectRoot: string, configPath?: string): ValidationReport {
  const { hooksDir } = resolveProjectPaths(projectRoot);
  const errors: string[] = [];
  const warnings: string[] = [];

  if (configPath && !fs.existsSync(configPath)) {
    return { valid: false, errors: [`Config file not found: ${configPath}`], warnings };
  }

  let config: HooksConfig;
  try {
    config = loadHooksConfig(projectRoot, configPath);
  } catch (err: unknown) {
    if (err instanceof HooksConfigError) {
      return { valid: false, source: err.source, errors: [...err.errors], warnings };
    }
    throw err;
  }

  if (!config.source) {
    warnings.push(`No hooks configuration found in ${hooksDir}`);
  }
  for (const hook of config.hooks) {
    checkHook(hook, projectRoot, hooksDir, errors, warnings);
  }

  const report: ValidationReport = { valid: errors.length === 0, errors, warnings, config };
  if (config.source) report.source = config.source;
  return report;
}
