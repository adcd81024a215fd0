/**
 * Metrics CLI commands.
 *
 * Registers `taskhooks metrics` and `taskhooks health`.
 */
import { Command, InvalidArgumentError } from "commander";
import { openAuditLog } from "../audit/commands.js";
import { queryAuditRecords } from "../audit/query.js";
import { commandContext } from "../cli/context.js";
import { resolveProjectPaths } from "../config/index.js";
import { MetricsAggregator } from "./aggregator.js";
import { compareWindows } from "./compare.js";
import { checkHealth } from "./health.js";
import { loadIndex, loadWindow, resolvePeriod } from "./history.js";
import { comparisonToMarkdown, healthToMarkdown, historyToMarkdown, toJson, windowToMarkdown } from "./report.js";
import type { MetricsWindow } from "./types.js";

function parseSince(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) throw new InvalidArgumentError("must be an ISO-8601 date or time");
  return date;
}

/**
 * Register metrics subcommands on the program.
 *
 * @param projectRoot - Overrides `--project-dir` (tests).
 * @param now - Clock override (tests).
 */
export function registerMetricsCommands(program: Command, projectRoot?: string, now?: () => Date): void {
  const clock = now ?? (() => new Date());

  // --- metrics ---
  program
    .command("metrics")
    .description("Roll up the audit log into per-period metrics and show them")
    .option("--history", "list sealed windows")
    .option("--compare <periods...>", "compare a baseline period with another (default: the current window)")
    .option("--json", "output raw JSON to stdout")
    .action((opts: { history?: boolean; compare?: string[]; json?: boolean }, cmd: Command) => {
      const ctx = commandContext(cmd, "metrics", { projectRoot, json: opts.json ?? false });
      const { metricsDir } = resolveProjectPaths(ctx.projectRoot);
      const log = openAuditLog(ctx.projectRoot, ctx.settings, ctx.logger);
      const aggregator = new MetricsAggregator({
        metricsDir,
        periodHours: ctx.settings.metrics.periodHours,
        logger: ctx.logger,
      });

      const collected = aggregator.collect(log.readAll(), clock());
      ctx.logger.debug(`Collected ${collected.consumed} new audit record(s), sealed ${collected.sealed.length} window(s)`);
      const index = loadIndex(metricsDir);

      if (opts.history) {
        console.log(opts.json ? toJson(index) : historyToMarkdown(index));
        return;
      }

      if (opts.compare) {
        const [baselineRef, currentRef] = opts.compare;
        const baselineEntry = baselineRef ? resolvePeriod(index, baselineRef) : null;
        const baseline = baselineEntry ? loadWindow(metricsDir, baselineEntry.period_start) : null;
        if (!baseline) {
          console.error(`[taskhooks] No sealed window matches "${baselineRef ?? ""}".`);
          process.exitCode = 1;
          return;
        }

        let current: MetricsWindow | null;
        if (currentRef) {
          const entry = resolvePeriod(index, currentRef);
          current = entry ? loadWindow(metricsDir, entry.period_start) : null;
        } else {
          current = collected.current;
        }
        if (!current) {
          console.error(`[taskhooks] No window to compare against${currentRef ? ` matching "${currentRef}"` : ""}.`);
          process.exitCode = 1;
          return;
        }

        const comparison = compareWindows(baseline, current);
        console.log(opts.json ? toJson(comparison) : comparisonToMarkdown(comparison));
        if (comparison.regressions.length > 0) process.exitCode = 1;
        return;
      }

      const latest = index.at(-1);
      const window = collected.current ?? (latest ? loadWindow(metricsDir, latest.period_start) : null);
      if (!window) {
        console.log(opts.json ? "null" : "[taskhooks] No hook executions recorded yet.");
        return;
      }
      console.log(opts.json ? toJson(window) : windowToMarkdown(window));
    });

  // --- health ---
  program
    .command("health")
    .description("Check recent hook runs against the health thresholds")
    .option("--since <time>", "records at or after this time (default: one metrics period ago)", parseSince)
    .option("--strict", "exit 1 when any issue is found")
    .option("--json", "output raw JSON to stdout")
    .action((opts: { since?: Date; strict?: boolean; json?: boolean }, cmd: Command) => {
      const ctx = commandContext(cmd, "health", { projectRoot, json: opts.json ?? false });
      const log = openAuditLog(ctx.projectRoot, ctx.settings, ctx.logger);
      const since = opts.since ?? new Date(clock().getTime() - ctx.settings.metrics.periodHours * 3_600_000);

      const report = checkHealth(queryAuditRecords(log.readAll(), { since }), ctx.settings.health);
      console.log(opts.json ? toJson(report) : healthToMarkdown(report));
      if (opts.strict && !report.healthy) process.exitCode = 1;
    });
}
