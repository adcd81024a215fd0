/**
 * Hook registry CLI commands.
 *
 * Registers `taskhooks validate|list|init|install-git-hook`.
 */
import { Command } from "commander";
import { confirm, isCancel } from "@clack/prompts";
import { projectRootFor } from "../cli/context.js";
import { HooksConfigError, loadHooksConfig } from "./config.js";
import { installGitHook } from "./git-hook.js";
import { existingScaffoldFiles, scaffoldHooksConfig } from "./scaffold.js";
import type { HookDefinition } from "./types.js";
import { validateHooksConfigFile } from "./validate.js";

function describeAction(hook: HookDefinition): string {
  if (hook.action.kind === "command") return `command: ${hook.action.command}`;
  const args = hook.action.args.length > 0 ? ` ${hook.action.args.join(" ")}` : "";
  return `script: ${hook.action.script}${args}`;
}

/**
 * Register hook registry subcommands on the program.
 *
 * @param projectRoot - Overrides `--project-dir` (tests).
 */
export function registerHookCommands(program: Command, projectRoot?: string): void {
  // --- validate ---
  program
    .command("validate")
    .description("Validate the hook registry without running any hook")
    .option("--file <path>", "registry file (default: .taskhooks/hooks/hooks.yaml)")
    .action((opts: { file?: string }, cmd: Command) => {
      const root = projectRootFor(cmd, projectRoot);
      const report = validateHooksConfigFile(root, opts.file);

      if (report.source) console.log(`[taskhooks] Registry: ${report.source}`);
      for (const error of report.errors) console.error(`  error: ${error}`);
      for (const warning of report.warnings) console.warn(`  warning: ${warning}`);

      if (!report.valid) {
        console.error(`[taskhooks] Validation failed with ${report.errors.length} error(s).`);
        process.exitCode = 1;
        return;
      }
      const count = report.config?.hooks.length ?? 0;
      console.log(`[taskhooks] Registry is valid (${count} hook${count === 1 ? "" : "s"}).`);
    });

  // --- list ---
  program
    .command("list")
    .description("List configured hooks")
    .option("--json", "output raw JSON to stdout")
    .action((opts: { json?: boolean }, cmd: Command) => {
      const root = projectRootFor(cmd, projectRoot);
      let hooks: HookDefinition[];
      try {
        hooks = loadHooksConfig(root).hooks;
      } catch (err: unknown) {
        if (!(err instanceof HooksConfigError)) throw err;
        console.error(`[taskhooks] ${err.message}`);
        process.exitCode = 1;
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(hooks, null, 2));
        return;
      }
      if (hooks.length === 0) {
        console.log("[taskhooks] No hooks configured. Create some with: taskhooks init");
        return;
      }

      console.log("Configured Hooks:");
      console.log("");
      for (const hook of hooks) {
        const state = hook.enabled ? "enabled" : "disabled";
        console.log(`  ${hook.name} (${state}, ${hook.timeoutSeconds}s, fail_mode ${hook.failMode})`);
        console.log(`    events: ${hook.matchers.map((m) => m.pattern).join(", ")}`);
        console.log(`    ${describeAction(hook)}`);
        if (hook.description) console.log(`    ${hook.description}`);
      }
    });

  // --- init ---
  program
    .command("init")
    .description("Create an example hook registry under .taskhooks/hooks/")
    .option("--force", "overwrite existing files without asking")
    .option("--disabled", "write every example hook disabled")
    .action(async (opts: { force?: boolean; disabled?: boolean }, cmd: Command) => {
      const root = projectRootFor(cmd, projectRoot);
      let force = opts.force ?? false;

      const existing = existingScaffoldFiles(root);
      if (existing.length > 0 && !force) {
        const overwrite = await confirm({
          message: `${existing.length} file(s) already exist in .taskhooks/hooks/. Overwrite them?`,
          initialValue: false,
        });
        if (isCancel(overwrite)) {
          console.log("[taskhooks] Init cancelled.");
          return;
        }
        force = overwrite;
      }

      const result = scaffoldHooksConfig(root, { force, disabled: opts.disabled ?? false });
      for (const file of result.created) console.log(`  created ${file}`);
      for (const file of result.skipped) console.log(`  kept    ${file}`);
      console.log(`[taskhooks] Hook registry ready in ${result.hooksDir}`);
    });

  // --- install-git-hook ---
  program
    .command("install-git-hook")
    .description("Run `taskhooks detect` after every commit")
    .option("--force", "replace an existing post-commit hook")
    .action((opts: { force?: boolean }, cmd: Command) => {
      const root = projectRootFor(cmd, projectRoot);
      const result = installGitHook(root, { force: opts.force ?? false });

      switch (result.status) {
        case "installed":
          console.log(`[taskhooks] Installed post-commit hook: ${result.path}`);
          break;
        case "replaced":
          console.log(`[taskhooks] Replaced post-commit hook: ${result.path}`);
          break;
        case "unchanged":
          console.log(`[taskhooks] Post-commit hook already installed: ${result.path}`);
          break;
        case "exists":
          console.error(`[taskhooks] ${result.path} already exists. Re-run with --force to replace it.`);
          process.exitCode = 1;
          break;
      }
    });
}
