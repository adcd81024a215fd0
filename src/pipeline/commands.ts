/**
 * Pipeline CLI commands.
 *
 * Registers `taskhooks detect` (the post-commit entry) and `taskhooks emit`.
 */
import { Command, InvalidArgumentError } from "commander";
import picomatch from "picomatch";
import { openAuditLog } from "../audit/commands.js";
import { commandContext } from "../cli/context.js";
import { SettingsError, resolveProjectPaths } from "../config/index.js";
import {
  Dispatcher,
  HookBlockedError,
  type DispatchReport,
  type EventDispatchResult,
} from "../dispatch/dispatcher.js";
import { createEvent, InvalidEventError } from "../events/event.js";
import { HooksConfigError, loadHooksConfig } from "../hooks/config.js";
import { toJson } from "../metrics/report.js";
import type { ContextValue, HookEvent } from "../shared/types.js";
import { GitWorkItemStore } from "../store/git-store.js";
import { WorkItemStoreError, type WorkItemStore } from "../store/work-item-store.js";
import { processRevision } from "./process-revision.js";

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

function describeResult(result: EventDispatchResult): string {
  switch (result.status) {
    case "no_match":
      return "no hooks matched";
    case "dry_run":
      return `would run ${result.matched.join(", ")}`;
    case "skipped":
      return "skipped (blocked earlier)";
    default: {
      const runs = result.runs.map((r) => `${r.hook} ${r.outcome.status}`);
      if (result.skippedHooks.length > 0) runs.push(`skipped ${result.skippedHooks.join(", ")}`);
      return runs.join(", ");
    }
  }
}

function taskLabel(event: HookEvent): string {
  const taskId = event.context.task_id;
  return typeof taskId === "string" ? ` ${taskId}` : "";
}

function printResults(results: readonly EventDispatchResult[]): void {
  for (const result of results) {
    console.log(`  ${result.event.event_type}${taskLabel(result.event)}: ${describeResult(result)}`);
  }
}

function reportJson(report: DispatchReport): Record<string, unknown> {
  return {
    results: report.results.map((r) => ({
      event: r.event,
      status: r.status,
      matched: r.matched,
      runs: r.runs.map((run) => ({
        hook: run.hook,
        status: run.outcome.status,
        failure_kind: run.outcome.failureKind ?? null,
        duration_ms: run.outcome.durationMs,
        record_id: run.record?.record_id ?? null,
      })),
      skipped_hooks: r.skippedHooks,
    })),
    blocked: report.blocked,
    warnings: report.warnings,
  };
}

/** Print known user-facing errors; rethrow anything else. */
function reportFailure(error: unknown): void {
  if (
    error instanceof HooksConfigError ||
    error instanceof SettingsError ||
    error instanceof WorkItemStoreError ||
    error instanceof InvalidEventError
  ) {
    console.error(`[taskhooks] ${error.message}`);
    process.exitCode = 1;
    return;
  }
  throw error;
}

function collectField(value: string, previous: Record<string, string>): Record<string, string> {
  const eq = value.indexOf("=");
  if (eq <= 0) throw new InvalidArgumentError(`expected key=value, got '${value}'`);
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) };
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Register pipeline subcommands on the program.
 *
 * @param projectRoot - Overrides `--project-dir` (tests).
 * @param store - Work-item store override (tests); git otherwise.
 */
export function registerPipelineCommands(program: Command, projectRoot?: string, store?: WorkItemStore): void {
  // --- detect ---
  program
    .command("detect")
    .description("Detect task changes between two revisions and run matching hooks")
    .option("--before <rev>", "revision before the change", "HEAD~1")
    .option("--after <rev>", "revision after the change", "HEAD")
    .option("--dry-run", "match hooks without executing or recording them")
    .option("--json", "output raw JSON to stdout")
    .action(async (opts: { before: string; after: string; dryRun?: boolean; json?: boolean }, cmd: Command) => {
      try {
        const ctx = commandContext(cmd, "detect", { projectRoot, json: opts.json ?? false });
        const result = await processRevision({
          projectRoot: ctx.projectRoot,
          store: store ?? new GitWorkItemStore(ctx.projectRoot, { pathFilter: picomatch(ctx.settings.tasksGlob) }),
          before: opts.before,
          after: opts.after,
          audit: openAuditLog(ctx.projectRoot, ctx.settings, ctx.logger),
          settings: ctx.settings,
          dryRun: opts.dryRun ?? false,
          logger: ctx.logger,
        });

        if (opts.json) {
          console.log(
            toJson({
              no_changes: result.detection.noChanges,
              summary: result.detection.summary,
              ...reportJson(result.dispatch),
            }),
          );
        } else if (!result.detection.noChanges) {
          console.log(`[taskhooks] ${result.events.length} event(s) between ${opts.before} and ${opts.after}:`);
          printResults(result.dispatch.results);
        }

        if (result.blocked) {
          console.error(`[taskhooks] ${result.blocked.message}`);
          process.exitCode = 1;
        }
      } catch (error: unknown) {
        reportFailure(error);
      }
    });

  // --- emit ---
  program
    .command("emit")
    .description("Emit one event by hand and run the hooks that match it")
    .argument("<event-type>", "event type, e.g. task.completed")
    .option("--task-id <id>", "task id placed in the event context")
    .option("--field <key=value>", "extra context field (repeatable)", collectField, {})
    .option("--dry-run", "match hooks without executing or recording them")
    .option("--json", "output raw JSON to stdout")
    .action(
      async (
        eventType: string,
        opts: { taskId?: string; field: Record<string, string>; dryRun?: boolean; json?: boolean },
        cmd: Command,
      ) => {
        try {
          const ctx = commandContext(cmd, "emit", { projectRoot, json: opts.json ?? false });
          const context: Record<string, ContextValue> = { ...opts.field };
          if (opts.taskId) context.task_id = opts.taskId;
          const event = createEvent({ eventType, context });

          const hooks = loadHooksConfig(ctx.projectRoot);
          const paths = resolveProjectPaths(ctx.projectRoot);
          const dispatcher = new Dispatcher({
            config: hooks,
            audit: openAuditLog(ctx.projectRoot, ctx.settings, ctx.logger),
            dryRun: opts.dryRun ?? false,
            logger: ctx.logger,
            executor: { projectRoot: paths.root, hooksDir: paths.hooksDir, envPassthrough: hooks.defaults.envPassthrough },
          });
          const report = await dispatcher.dispatchAll([event]);

          if (opts.json) {
            console.log(toJson(reportJson(report)));
          } else {
            console.log(`[taskhooks] Emitted ${event.event_type} (${event.event_id}):`);
            printResults(report.results);
          }

          if (report.blocked) {
            console.error(`[taskhooks] ${new HookBlockedError(report.blocked).message}`);
            process.exitCode = 1;
          }
        } catch (error: unknown) {
          reportFailure(error);
        }
      },
    );
}
