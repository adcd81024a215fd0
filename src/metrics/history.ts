/**
 * Metrics persistence.
 *
 * Layout under .taskhooks/metrics/:
 * - state.json: cursor into the audit log and the open window
 * - windows/{period}.json: one sealed window per period
 * - index.json: sealed window summaries, oldest first
 */
import fs from "node:fs";
import path from "node:path";
import { errorMessage, isRecord } from "../shared/guards.js";
import type {
  AccumulatorState,
  AggregatorCursor,
  AggregatorState,
  BucketState,
  MetricsIndexEntry,
  MetricsWindow,
  StatsBlock,
} from "./types.js";

const WINDOWS_DIR = "windows";
const INDEX_FILE = "index.json";
const STATE_FILE = "state.json";

// ---------------------------------------------------------------------------
// Shape checks
// ---------------------------------------------------------------------------

const COUNTERS = ["executions", "success", "failed", "timeout", "error", "security_violations"] as const;

function hasCounters(value: Record<string, unknown>): boolean {
  return COUNTERS.every((k) => typeof value[k] === "number");
}

function isBucketState(value: unknown): value is BucketState {
  return (
    isRecord(value) &&
    hasCounters(value) &&
    Array.isArray(value.durations) &&
    value.durations.every((d) => typeof d === "number")
  );
}

function isBucketMap(value: unknown): value is Record<string, BucketState> {
  return isRecord(value) && Object.values(value).every(isBucketState);
}

function isAccumulatorState(value: unknown): value is AccumulatorState {
  return (
    isRecord(value) &&
    typeof value.period_start === "string" &&
    typeof value.period_end === "string" &&
    isBucketState(value.summary) &&
    isBucketMap(value.hooks) &&
    isBucketMap(value.event_types)
  );
}

function isStatsBlock(value: unknown): value is StatsBlock {
  if (!isRecord(value) || !hasCounters(value)) return false;
  if (value.success_rate !== null && typeof value.success_rate !== "number") return false;
  const d = value.duration_ms;
  return isRecord(d) && ["p50", "p95", "p99", "max", "mean"].every((k) => typeof d[k] === "number");
}

function isStatsMap(value: unknown): value is Record<string, StatsBlock> {
  return isRecord(value) && Object.values(value).every(isStatsBlock);
}

export function isMetricsWindow(value: unknown): value is MetricsWindow {
  return (
    isRecord(value) &&
    typeof value.period_start === "string" &&
    typeof value.period_end === "string" &&
    typeof value.generated_at === "string" &&
    typeof value.sealed === "boolean" &&
    isStatsBlock(value.summary) &&
    isStatsMap(value.hooks) &&
    isStatsMap(value.event_types)
  );
}

function isIndexEntry(value: unknown): value is MetricsIndexEntry {
  return (
    isRecord(value) &&
    typeof value.period_start === "string" &&
    typeof value.period_end === "string" &&
    typeof value.executions === "number" &&
    (value.success_rate === null || typeof value.success_rate === "number")
  );
}

function readJson(file: string): unknown {
  if (!fs.existsSync(file)) return undefined;
  try {
    return JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err: unknown) {
    throw new Error(`Corrupt metrics file ${file}: ${errorMessage(err)}`);
  }
}

function writeJson(file: string, value: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const tmp = `${file}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(value, null, 2) + "\n", "utf-8");
  fs.renameSync(tmp, file);
}

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

/** File-name-safe form of a period start. */
export function windowId(periodStart: string): string {
  return periodStart.replace(/:/g, "-");
}

/** Persist a sealed window and add it to the index. Re-saving a period replaces its entry. */
export function saveWindow(metricsDir: string, window: MetricsWindow): string {
  const id = windowId(window.period_start);
  writeJson(path.join(metricsDir, WINDOWS_DIR, `${id}.json`), window);

  const entry: MetricsIndexEntry = {
    period_start: window.period_start,
    period_end: window.period_end,
    executions: window.summary.executions,
    success_rate: window.summary.success_rate,
  };
  const index = loadIndex(metricsDir).filter((e) => e.period_start !== window.period_start);
  index.push(entry);
  index.sort((a, b) => a.period_start.localeCompare(b.period_start));
  writeJson(path.join(metricsDir, INDEX_FILE), index);
  return id;
}

/** A sealed window by period start; null when not found. */
export function loadWindow(metricsDir: string, periodStart: string): MetricsWindow | null {
  const file = path.join(metricsDir, WINDOWS_DIR, `${windowId(periodStart)}.json`);
  const value = readJson(file);
  if (value === undefined) return null;
  if (!isMetricsWindow(value)) throw new Error(`Corrupt metrics file ${file}: not a metrics window`);
  return value;
}

/** Sealed window summaries, oldest first. */
export function loadIndex(metricsDir: string): MetricsIndexEntry[] {
  const file = path.join(metricsDir, INDEX_FILE);
  const value = readJson(file);
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every(isIndexEntry)) {
    throw new Error(`Corrupt metrics file ${file}: not a window index`);
  }
  return value;
}

/**
 * Resolve a period reference: an exact period start, a unique prefix of one
 * (`2024-05-01`), or `latest` / `previous`.
 */
export function resolvePeriod(index: readonly MetricsIndexEntry[], ref: string): MetricsIndexEntry | null {
  if (ref === "latest") return index.at(-1) ?? null;
  if (ref === "previous") return index.at(-2) ?? null;
  const exact = index.find((e) => e.period_start === ref);
  if (exact) return exact;
  const matches = index.filter((e) => e.period_start.startsWith(ref));
  return matches.length === 1 ? (matches[0] ?? null) : null;
}

// ---------------------------------------------------------------------------
// Aggregator state
// ---------------------------------------------------------------------------

export function loadState(metricsDir: string): AggregatorState {
  const file = path.join(metricsDir, STATE_FILE);
  const value = readJson(file);
  if (value === undefined) return { cursor: null, open: null };

  const corrupt = new Error(`Corrupt metrics file ${file}: not an aggregator state`);
  if (!isRecord(value)) throw corrupt;
  const { cursor, open } = value;

  let parsedCursor: AggregatorCursor | null = null;
  if (cursor !== null && cursor !== undefined) {
    if (!isRecord(cursor) || typeof cursor.record_id !== "string" || typeof cursor.timestamp !== "string") {
      throw corrupt;
    }
    parsedCursor = { record_id: cursor.record_id, timestamp: cursor.timestamp };
  }

  let parsedOpen: AccumulatorState | null = null;
  if (open !== null && open !== undefined) {
    if (!isAccumulatorState(open)) throw corrupt;
    parsedOpen = open;
  }
  return { cursor: parsedCursor, open: parsedOpen };
}

export function saveState(metricsDir: string, state: AggregatorState): void {
  writeJson(path.join(metricsDir, STATE_FILE), state);
}
