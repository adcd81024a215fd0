/**
 * Hook health checks over recent audit records.
 */
import type { AuditRecord } from "../audit/types.js";
import { formatRate } from "./compare.js";
import type { HealthIssue, HealthReport, HealthThresholds } from "./types.js";

interface HookTally {
  executions: number;
  success: number;
  timeouts: number;
  violations: number;
  nearTimeout: number;
}

/**
 * Report hooks whose success rate is below `minSuccessRate`, that timed
 * out, that were rejected by the sandbox, or whose successful runs came
 * within `nearTimeoutRatio` of their timeout.
 */
export function checkHealth(records: readonly AuditRecord[], thresholds: HealthThresholds): HealthReport {
  const tallies = new Map<string, HookTally>();

  for (const record of records) {
    let tally = tallies.get(record.hook.name);
    if (!tally) {
      tally = { executions: 0, success: 0, timeouts: 0, violations: 0, nearTimeout: 0 };
      tallies.set(record.hook.name, tally);
    }
    const { execution } = record;
    tally.executions++;
    if (execution.status === "success") tally.success++;
    if (execution.status === "timeout") tally.timeouts++;
    if (record.kind === "security.violation") tally.violations++;
    if (
      execution.status === "success" &&
      execution.timeout_ms > 0 &&
      execution.duration_ms >= execution.timeout_ms * thresholds.nearTimeoutRatio
    ) {
      tally.nearTimeout++;
    }
  }

  const issues: HealthIssue[] = [];
  for (const hook of [...tallies.keys()].sort()) {
    const t = tallies.get(hook);
    if (!t) continue;

    const rate = t.success / t.executions;
    if (rate < thresholds.minSuccessRate) {
      issues.push({
        hook,
        kind: "low_success_rate",
        message:
          `${hook}: success rate ${formatRate(rate)} below ${formatRate(thresholds.minSuccessRate)} ` +
          `(${t.success}/${t.executions})`,
      });
    }
    if (t.timeouts > 0) {
      issues.push({ hook, kind: "timeouts", message: `${hook}: ${t.timeouts} run(s) timed out` });
    }
    if (t.violations > 0) {
      issues.push({
        hook,
        kind: "security_violations",
        message: `${hook}: ${t.violations} run(s) rejected by the sandbox policy`,
      });
    }
    if (t.nearTimeout > 0) {
      issues.push({
        hook,
        kind: "near_timeout",
        message:
          `${hook}: ${t.nearTimeout} successful run(s) used at least ` +
          `${Math.round(thresholds.nearTimeoutRatio * 100)}% of the timeout`,
      });
    }
  }

  return { healthy: issues.length === 0, hooksChecked: tallies.size, issues };
}
