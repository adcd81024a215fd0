/**
 * Period-over-period comparison of metrics windows.
 *
 * Thresholds for regression detection:
 * - Success rate: drop of more than 10 percentage points
 * - Duration: p95 more than 50% slower
 */
import type { HookTrend, MetricsWindow, Regression, WindowComparison } from "./types.js";

/** Success rate regression threshold (percentage points). */
const SUCCESS_RATE_DROP_POINTS = 10;

/** p95 duration regression threshold (50% slower). */
const P95_REGRESSION_PCT = 50;

function round(n: number, digits = 1): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

/**
 * Compare two windows hook by hook.
 *
 * Hooks present in only one window are reported with zero executions on
 * the other side; regressions need runs on both sides.
 */
export function compareWindows(baseline: MetricsWindow, current: MetricsWindow): WindowComparison {
  const hooks: HookTrend[] = [];
  const regressions: Regression[] = [];
  const names = [...new Set([...Object.keys(baseline.hooks), ...Object.keys(current.hooks)])].sort();

  for (const hook of names) {
    const base = baseline.hooks[hook];
    const curr = current.hooks[hook];

    const baseRate = base?.success_rate ?? null;
    const currRate = curr?.success_rate ?? null;
    const successRateDelta = baseRate !== null && currRate !== null ? round((currRate - baseRate) * 100) : null;

    const baseP95 = base?.duration_ms.p95 ?? 0;
    const currP95 = curr?.duration_ms.p95 ?? 0;
    const p95DeltaMs = currP95 - baseP95;
    const p95DeltaPct = baseP95 > 0 ? round((p95DeltaMs / baseP95) * 100) : 0;

    hooks.push({
      hook,
      baselineExecutions: base?.executions ?? 0,
      currentExecutions: curr?.executions ?? 0,
      successRateDelta,
      p95DeltaMs,
      p95DeltaPct,
    });

    const dropped = successRateDelta !== null && -successRateDelta > SUCCESS_RATE_DROP_POINTS;
    if (dropped && baseRate !== null && currRate !== null) {
      regressions.push({
        hook,
        metric: "success_rate",
        baseline: baseRate,
        current: currRate,
        message:
          `${hook}: success rate dropped ${round((baseRate - currRate) * 100)} points ` +
          `(${formatRate(baseRate)} → ${formatRate(currRate)})`,
      });
    }

    if (base && curr && base.executions > 0 && curr.executions > 0 && p95DeltaPct > P95_REGRESSION_PCT) {
      regressions.push({
        hook,
        metric: "p95_duration",
        baseline: baseP95,
        current: currP95,
        message: `${hook}: p95 duration ${p95DeltaPct}% slower (${baseP95}ms → ${currP95}ms)`,
      });
    }
  }

  return {
    baselinePeriod: baseline.period_start,
    currentPeriod: current.period_start,
    hooks,
    regressions,
  };
}

export function formatRate(rate: number | null): string {
  return rate === null ? "n/a" : `${round(rate * 100)}%`;
}
