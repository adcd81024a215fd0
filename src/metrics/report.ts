/**
 * Metrics report rendering.
 *
 * Produces JSON (for machine consumption) and markdown (for humans) from
 * windows, comparisons and health reports.
 */
import { formatRate } from "./compare.js";
import type {
  HealthReport,
  MetricsIndexEntry,
  MetricsWindow,
  StatsBlock,
  WindowComparison,
} from "./types.js";

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** Format milliseconds as a human-readable duration. */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m${seconds}s`;
}

function statsRow(name: string, stats: StatsBlock): string {
  const d = stats.duration_ms;
  return (
    `| ${name} | ${stats.executions} | ${formatRate(stats.success_rate)} | ${stats.failed} | ${stats.timeout} | ` +
    `${stats.error} | ${stats.security_violations} | ${formatDuration(d.p50)} | ${formatDuration(d.p95)} | ` +
    `${formatDuration(d.p99)} |`
  );
}

function statsTable(title: string, blocks: Record<string, StatsBlock>): string[] {
  const names = Object.keys(blocks);
  if (names.length === 0) return [];
  const lines = [
    `## ${title}`,
    "",
    "| Name | Runs | Success | Failed | Timeout | Error | Rejected | p50 | p95 | p99 |",
    "|------|------|---------|--------|---------|-------|----------|-----|-----|-----|",
  ];
  for (const name of names) {
    const block = blocks[name];
    if (block) lines.push(statsRow(name, block));
  }
  lines.push("");
  return lines;
}

/** Human-readable report for one window. */
export function windowToMarkdown(window: MetricsWindow): string {
  const s = window.summary;
  const lines: string[] = [];

  lines.push(`# Hook Metrics: ${window.period_start} – ${window.period_end}`);
  lines.push("");
  lines.push(`- **State:** ${window.sealed ? "sealed" : "open"}`);
  lines.push(`- **Generated:** ${window.generated_at}`);
  lines.push("");

  lines.push("## Summary");
  lines.push("");
  lines.push("| Metric | Value |");
  lines.push("|--------|-------|");
  lines.push(`| Executions | ${s.executions} |`);
  lines.push(`| Success Rate | ${formatRate(s.success_rate)} |`);
  lines.push(`| Failed | ${s.failed} |`);
  lines.push(`| Timeouts | ${s.timeout} |`);
  lines.push(`| Errors | ${s.error} |`);
  lines.push(`| Security Violations | ${s.security_violations} |`);
  lines.push(`| Duration p50 / p95 / p99 | ${formatDuration(s.duration_ms.p50)} / ${formatDuration(s.duration_ms.p95)} / ${formatDuration(s.duration_ms.p99)} |`);
  lines.push(`| Duration max / mean | ${formatDuration(s.duration_ms.max)} / ${formatDuration(s.duration_ms.mean)} |`);
  lines.push("");

  lines.push(...statsTable("Hooks", window.hooks));
  lines.push(...statsTable("Event Types", window.event_types));

  return lines.join("\n").trimEnd() + "\n";
}

/** One line per sealed window. */
export function historyToMarkdown(index: readonly MetricsIndexEntry[]): string {
  if (index.length === 0) return "No sealed metrics windows yet.\n";
  const lines = ["| Period Start | Period End | Runs | Success |", "|--------------|------------|------|---------|"];
  for (const entry of index) {
    lines.push(`| ${entry.period_start} | ${entry.period_end} | ${entry.executions} | ${formatRate(entry.success_rate)} |`);
  }
  return lines.join("\n") + "\n";
}

function signed(n: number, unit: string): string {
  return `${n > 0 ? "+" : ""}${n}${unit}`;
}

export function comparisonToMarkdown(comparison: WindowComparison): string {
  const lines: string[] = [];
  lines.push(`# Metrics Comparison: ${comparison.baselinePeriod} → ${comparison.currentPeriod}`);
  lines.push("");

  if (comparison.hooks.length > 0) {
    lines.push("| Hook | Runs (before/after) | Success Rate | p95 |");
    lines.push("|------|---------------------|--------------|-----|");
    for (const trend of comparison.hooks) {
      const rate = trend.successRateDelta === null ? "n/a" : signed(trend.successRateDelta, " pts");
      const p95 = `${signed(trend.p95DeltaMs, "ms")} (${signed(trend.p95DeltaPct, "%")})`;
      lines.push(`| ${trend.hook} | ${trend.baselineExecutions}/${trend.currentExecutions} | ${rate} | ${p95} |`);
    }
    lines.push("");
  }

  if (comparison.regressions.length === 0) {
    lines.push("No regressions detected.");
  } else {
    lines.push(`## Regressions (${comparison.regressions.length})`);
    lines.push("");
    for (const r of comparison.regressions) lines.push(`- ${r.message}`);
  }
  return lines.join("\n") + "\n";
}

export function healthToMarkdown(report: HealthReport): string {
  const lines: string[] = [];
  lines.push(report.healthy ? "Hooks are healthy." : `Hook health: ${report.issues.length} issue(s)`);
  lines.push(`Checked ${report.hooksChecked} hook(s).`);
  for (const issue of report.issues) lines.push(`- [${issue.kind}] ${issue.message}`);
  return lines.join("\n") + "\n";
}
