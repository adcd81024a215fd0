/**
 * Metrics aggregation over audit records.
 *
 * Records are folded into fixed, epoch-aligned periods. Durations are kept
 * in full for the open period so percentiles are exact (nearest rank).
 * A period is sealed once a record or the clock moves past its end; sealed
 * windows are written once and never recomputed.
 */
import type { AuditRecord } from "../audit/types.js";
import { deepFreeze } from "../events/event.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import { loadState, saveState, saveWindow } from "./history.js";
import type {
  AccumulatorState,
  AggregatorState,
  BucketState,
  DurationStats,
  MetricsWindow,
  StatsBlock,
} from "./types.js";

const HOUR_MS = 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------

/**
 * Nearest-rank percentile over the full set: the smallest value such that
 * at least p% of values are at or below it. 0 for an empty set.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.max(1, Math.ceil((p / 100) * sorted.length));
  return sorted[Math.min(rank, sorted.length) - 1] ?? 0;
}

export function durationStats(values: readonly number[]): DurationStats {
  if (values.length === 0) return { p50: 0, p95: 0, p99: 0, max: 0, mean: 0 };
  const total = values.reduce((sum, v) => sum + v, 0);
  return {
    p50: percentile(values, 50),
    p95: percentile(values, 95),
    p99: percentile(values, 99),
    max: Math.max(...values),
    mean: Math.round(total / values.length),
  };
}

function emptyBucket(): BucketState {
  return { executions: 0, success: 0, failed: 0, timeout: 0, error: 0, security_violations: 0, durations: [] };
}

function addToBucket(bucket: BucketState, record: AuditRecord): void {
  bucket.executions++;
  bucket[record.execution.status]++;
  if (record.kind === "security.violation") bucket.security_violations++;
  if (record.execution.executed) bucket.durations.push(record.execution.duration_ms);
}

function bucketFor(buckets: Record<string, BucketState>, key: string): BucketState {
  let bucket = buckets[key];
  if (!bucket) {
    bucket = emptyBucket();
    buckets[key] = bucket;
  }
  return bucket;
}

function toStatsBlock(bucket: BucketState): StatsBlock {
  return {
    executions: bucket.executions,
    success: bucket.success,
    failed: bucket.failed,
    timeout: bucket.timeout,
    error: bucket.error,
    security_violations: bucket.security_violations,
    success_rate: bucket.executions > 0 ? bucket.success / bucket.executions : null,
    duration_ms: durationStats(bucket.durations),
  };
}

function mapBuckets(buckets: Record<string, BucketState>): Record<string, StatsBlock> {
  const out: Record<string, StatsBlock> = {};
  for (const key of Object.keys(buckets).sort()) {
    const bucket = buckets[key];
    if (bucket) out[key] = toStatsBlock(bucket);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Periods
// ---------------------------------------------------------------------------

export interface Period {
  start: string;
  end: string;
}

/** The epoch-aligned period containing `time`. */
export function periodFor(time: Date, periodHours: number): Period {
  const size = periodHours * HOUR_MS;
  const start = Math.floor(time.getTime() / size) * size;
  return { start: new Date(start).toISOString(), end: new Date(start + size).toISOString() };
}

// ---------------------------------------------------------------------------
// Accumulator
// ---------------------------------------------------------------------------

export class MetricsAccumulator {
  private readonly state: AccumulatorState;

  constructor(period: Period, state?: AccumulatorState) {
    this.state = state ?? {
      period_start: period.start,
      period_end: period.end,
      summary: emptyBucket(),
      hooks: {},
      event_types: {},
    };
  }

  get periodStart(): string {
    return this.state.period_start;
  }

  get periodEnd(): string {
    return this.state.period_end;
  }

  add(record: AuditRecord): void {
    addToBucket(this.state.summary, record);
    addToBucket(bucketFor(this.state.hooks, record.hook.name), record);
    addToBucket(bucketFor(this.state.event_types, record.event.event_type), record);
  }

  toState(): AccumulatorState {
    return structuredClone(this.state);
  }

  toWindow(generatedAt: string, sealed: boolean): MetricsWindow {
    return deepFreeze({
      period_start: this.state.period_start,
      period_end: this.state.period_end,
      generated_at: generatedAt,
      sealed,
      summary: toStatsBlock(this.state.summary),
      hooks: mapBuckets(this.state.hooks),
      event_types: mapBuckets(this.state.event_types),
    });
  }
}

/** One-shot window over a set of records (no persistence). */
export function buildWindow(records: readonly AuditRecord[], period: Period, generatedAt: string): MetricsWindow {
  const acc = new MetricsAccumulator(period);
  for (const record of records) acc.add(record);
  return acc.toWindow(generatedAt, false);
}

// ---------------------------------------------------------------------------
// Aggregator
// ---------------------------------------------------------------------------

export interface CollectResult {
  /** Records read past the cursor by this call. */
  consumed: number;
  /** Windows sealed by this call, oldest first. */
  sealed: MetricsWindow[];
  /** Snapshot of the open window, if any. */
  current: MetricsWindow | null;
}

export interface MetricsAggregatorOptions {
  metricsDir: string;
  periodHours: number;
  logger?: Logger;
}

export class MetricsAggregator {
  private readonly metricsDir: string;
  private readonly periodHours: number;
  private readonly logger: Logger;

  constructor(options: MetricsAggregatorOptions) {
    this.metricsDir = options.metricsDir;
    this.periodHours = options.periodHours;
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Fold every record after the persisted cursor into the open window,
   * sealing windows as periods end. Records must be in log order.
   */
  collect(records: readonly AuditRecord[], now: Date = new Date()): CollectResult {
    const state = loadState(this.metricsDir);
    const pending = this.pendingRecords(records, state);
    const generatedAt = now.toISOString();
    const sealed: MetricsWindow[] = [];

    let open = state.open
      ? new MetricsAccumulator({ start: state.open.period_start, end: state.open.period_end }, state.open)
      : null;

    const seal = (acc: MetricsAccumulator): void => {
      const window = acc.toWindow(generatedAt, true);
      saveWindow(this.metricsDir, window);
      sealed.push(window);
      this.logger.debug(`Sealed metrics window ${window.period_start} (${window.summary.executions} executions)`);
    };

    for (const record of pending) {
      state.cursor = { record_id: record.record_id, timestamp: record.timestamp };
      const time = new Date(record.timestamp);
      if (Number.isNaN(time.getTime())) {
        this.logger.warn(`Skipping audit record ${record.record_id}: invalid timestamp '${record.timestamp}'`);
        continue;
      }
      if (open && time.toISOString() >= open.periodEnd) {
        seal(open);
        open = null;
      }
      if (!open) open = new MetricsAccumulator(periodFor(time, this.periodHours));
      open.add(record);
    }

    if (open && generatedAt >= open.periodEnd) {
      seal(open);
      open = null;
    }

    state.open = open ? open.toState() : null;
    saveState(this.metricsDir, state);

    return { consumed: pending.length, sealed, current: open ? open.toWindow(generatedAt, false) : null };
  }

  private pendingRecords(records: readonly AuditRecord[], state: AggregatorState): readonly AuditRecord[] {
    const cursor = state.cursor;
    if (!cursor) return records;

    const index = records.findIndex((r) => r.record_id === cursor.record_id);
    if (index >= 0) return records.slice(index + 1);

    // The cursor record has been rotated out of the retained log.
    this.logger.debug(`Metrics cursor ${cursor.record_id} not in the audit log; resuming by timestamp`);
    return records.filter((r) => r.timestamp > cursor.timestamp);
  }
}
