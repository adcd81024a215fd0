/**
 * Metrics roll-up types.
 *
 * Windows are persisted as JSON under .taskhooks/metrics/ with snake_case
 * keys, like the audit records they are built from.
 */

export interface DurationStats {
  p50: number;
  p95: number;
  p99: number;
  max: number;
  mean: number;
}

export interface StatsBlock {
  /** Every record, including security rejections. */
  executions: number;
  success: number;
  failed: number;
  timeout: number;
  error: number;
  security_violations: number;
  /** success / executions; null for an empty block. */
  success_rate: number | null;
  /** Over executed runs only; rejected actions never started. */
  duration_ms: DurationStats;
}

export interface MetricsWindow {
  period_start: string;
  period_end: string;
  generated_at: string;
  /** Sealed windows are complete and never change again. */
  sealed: boolean;
  summary: StatsBlock;
  hooks: Record<string, StatsBlock>;
  event_types: Record<string, StatsBlock>;
}

export interface MetricsIndexEntry {
  period_start: string;
  period_end: string;
  executions: number;
  success_rate: number | null;
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

export interface HookTrend {
  hook: string;
  baselineExecutions: number;
  currentExecutions: number;
  /** Percentage points; null when either side has no runs. */
  successRateDelta: number | null;
  p95DeltaMs: number;
  /** Percent change of p95; 0 when the baseline p95 is 0. */
  p95DeltaPct: number;
}

export interface Regression {
  hook: string;
  metric: "success_rate" | "p95_duration";
  baseline: number;
  current: number;
  message: string;
}

export interface WindowComparison {
  baselinePeriod: string;
  currentPeriod: string;
  hooks: HookTrend[];
  regressions: Regression[];
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthThresholds {
  /** Hooks below this success rate are reported. */
  minSuccessRate: number;
  /** Runs taking at least this fraction of their timeout are reported. */
  nearTimeoutRatio: number;
}

export interface HealthIssue {
  hook: string;
  kind: "low_success_rate" | "near_timeout" | "timeouts" | "security_violations";
  message: string;
}

export interface HealthReport {
  healthy: boolean;
  hooksChecked: number;
  issues: HealthIssue[];
}

// ---------------------------------------------------------------------------
// Persisted aggregator state
// ---------------------------------------------------------------------------

/** Raw counters and every duration seen, so percentiles stay exact across runs. */
export interface BucketState {
  executions: number;
  success: number;
  failed: number;
  timeout: number;
  error: number;
  security_violations: number;
  durations: number[];
}

export interface AccumulatorState {
  period_start: string;
  period_end: string;
  summary: BucketState;
  hooks: Record<string, BucketState>;
  event_types: Record<string, BucketState>;
}

export interface AggregatorCursor {
  /** Last audit record folded in. */
  record_id: string;
  timestamp: string;
}

export interface AggregatorState {
  cursor: AggregatorCursor | null;
  open: AccumulatorState | null;
}
