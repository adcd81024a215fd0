/**
 * Dispatcher: runs the matched hooks for each event, one at a time.
 *
 * Per event the dispatcher moves through:
 *
 *   IDLE → MATCHING → IDLE                                  (no match, dry run)
 *   IDLE → MATCHING → DISPATCHING → EXECUTING → RECORDING → DISPATCHING … → IDLE
 *
 * Each run is appended to the audit sink before the next hook starts. A failed
 * hook with fail_mode "continue" produces a warning; with fail_mode "stop" the
 * remaining hooks for that event are skipped and the event is blocked, and
 * dispatchAll() skips every later event.
 */
import { buildAuditRecord } from "../audit/record.js";
import type { AuditSink } from "../audit/audit-log.js";
import type { AuditRecord } from "../audit/types.js";
import { getMatchingHooks } from "../hooks/matcher.js";
import type { HooksConfig } from "../hooks/types.js";
import { executeHook, type ExecutionOutcome, type ExecutorOptions, type FailureKind } from "../sandbox/executor.js";
import { errorMessage } from "../shared/guards.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import type { HookEvent } from "../shared/types.js";

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

export const DISPATCH_STATES = ["IDLE", "MATCHING", "DISPATCHING", "EXECUTING", "RECORDING"] as const;
export type DispatchState = (typeof DISPATCH_STATES)[number];

const TRANSITIONS: Record<DispatchState, DispatchState[]> = {
  IDLE: ["MATCHING"],
  MATCHING: ["DISPATCHING", "IDLE"],
  DISPATCHING: ["EXECUTING", "IDLE"],
  EXECUTING: ["RECORDING"],
  RECORDING: ["DISPATCHING"],
};

export class InvalidTransitionError extends Error {
  readonly from: DispatchState;
  readonly to: DispatchState;

  constructor(from: DispatchState, to: DispatchState) {
    super(`Invalid dispatcher transition: ${from} → ${to}. Allowed: ${TRANSITIONS[from].join(", ")}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

/** Raised to the caller when a fail-stop hook blocks the triggering operation. */
export class HookBlockedError extends Error {
  readonly hook: string;
  readonly eventId: string;
  readonly eventType: string;
  readonly failureKind: FailureKind;

  constructor(block: BlockInfo) {
    super(`Hook '${block.hook}' blocked ${block.eventType} (${block.eventId}): ${block.failureKind}`);
    this.name = "HookBlockedError";
    this.hook = block.hook;
    this.eventId = block.eventId;
    this.eventType = block.eventType;
    this.failureKind = block.failureKind;
  }
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface BlockInfo {
  hook: string;
  eventId: string;
  eventType: string;
  failureKind: FailureKind;
}

export interface HookRunResult {
  hook: string;
  outcome: ExecutionOutcome;
  /** Null when the audit write failed. */
  record: AuditRecord | null;
}

export type EventDispatchStatus = "no_match" | "dry_run" | "completed" | "blocked" | "skipped";

export interface EventDispatchResult {
  event: HookEvent;
  status: EventDispatchStatus;
  /** Names of the matched hooks, in declaration order. */
  matched: string[];
  runs: HookRunResult[];
  /** Matched hooks not run because an earlier hook blocked the event. */
  skippedHooks: string[];
  blocked: BlockInfo | null;
  warnings: string[];
}

export interface DispatchReport {
  results: EventDispatchResult[];
  blocked: BlockInfo | null;
  warnings: string[];
}

export type TransitionObserver = (from: DispatchState, to: DispatchState, event: HookEvent) => void;

export interface DispatcherOptions {
  config: HooksConfig;
  audit: AuditSink;
  executor: ExecutorOptions;
  /** Match and report without executing or recording. */
  dryRun?: boolean;
  logger?: Logger;
  onTransition?: TransitionObserver;
}

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export class Dispatcher {
  private state: DispatchState = "IDLE";
  private readonly config: HooksConfig;
  private readonly audit: AuditSink;
  private readonly executor: ExecutorOptions;
  private readonly dryRun: boolean;
  private readonly logger: Logger;
  private readonly onTransition: TransitionObserver | undefined;

  constructor(options: DispatcherOptions) {
    this.config = options.config;
    this.audit = options.audit;
    this.executor = options.executor;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? silentLogger();
    this.onTransition = options.onTransition;
  }

  getState(): DispatchState {
    return this.state;
  }

  private transition(to: DispatchState, event: HookEvent): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(from, to);
    }
    this.state = to;
    this.onTransition?.(from, to, event);
  }

  /** Run every matched hook for one event. */
  async dispatch(event: HookEvent): Promise<EventDispatchResult> {
    this.transition("MATCHING", event);
    try {
      return await this.runMatched(event);
    } catch (error: unknown) {
      this.state = "IDLE";
      throw error;
    }
  }

  private async runMatched(event: HookEvent): Promise<EventDispatchResult> {
    const hooks = getMatchingHooks(this.config, event);
    const result: EventDispatchResult = {
      event,
      status: "completed",
      matched: hooks.map((h) => h.name),
      runs: [],
      skippedHooks: [],
      blocked: null,
      warnings: [],
    };

    if (hooks.length === 0) {
      this.logger.info(`No hooks matched ${event.event_type} (${event.event_id})`);
      this.transition("IDLE", event);
      return { ...result, status: "no_match" };
    }

    if (this.dryRun) {
      this.logger.debug(`[dry run] ${event.event_type} would run: ${result.matched.join(", ")}`);
      this.transition("IDLE", event);
      return { ...result, status: "dry_run" };
    }

    this.transition("DISPATCHING", event);
    for (const [i, hook] of hooks.entries()) {
      this.transition("EXECUTING", event);
      const outcome = await executeHook(hook, event, { ...this.executor, logger: this.executor.logger ?? this.logger });

      this.transition("RECORDING", event);
      result.runs.push({ hook: hook.name, outcome, record: this.record(outcome, event, result.warnings) });
      this.transition("DISPATCHING", event);

      if (outcome.status === "success") continue;

      const failureKind = outcome.failureKind ?? outcome.status;
      if (hook.failMode === "stop") {
        result.blocked = { hook: hook.name, eventId: event.event_id, eventType: event.event_type, failureKind };
        result.skippedHooks = hooks.slice(i + 1).map((h) => h.name);
        result.status = "blocked";
        this.logger.error(
          `Hook '${hook.name}' (fail_mode: stop) failed for ${event.event_type}: ${failureKind}` +
            (result.skippedHooks.length > 0 ? `; skipping ${result.skippedHooks.join(", ")}` : ""),
        );
        break;
      }

      const warning = `Hook '${hook.name}' failed for ${event.event_type} (${failureKind}); continuing`;
      this.logger.warn(warning);
      result.warnings.push(warning);
    }

    this.transition("IDLE", event);
    return result;
  }

  private record(outcome: ExecutionOutcome, event: HookEvent, warnings: string[]): AuditRecord | null {
    try {
      return this.audit.append(buildAuditRecord(outcome, event));
    } catch (error: unknown) {
      const warning = `Audit write failed for hook '${outcome.hook}': ${errorMessage(error)}`;
      this.logger.error(warning);
      warnings.push(warning);
      return null;
    }
  }

  /**
   * Dispatch events in order. After a blocked event the rest are reported
   * as skipped without matching.
   */
  async dispatchAll(events: readonly HookEvent[]): Promise<DispatchReport> {
    const report: DispatchReport = { results: [], blocked: null, warnings: [] };

    for (const event of events) {
      if (report.blocked) {
        report.results.push({
          event,
          status: "skipped",
          matched: [],
          runs: [],
          skippedHooks: [],
          blocked: null,
          warnings: [],
        });
        continue;
      }
      const result = await this.dispatch(event);
      report.results.push(result);
      report.warnings.push(...result.warnings);
      if (result.blocked) report.blocked = result.blocked;
    }

    const skipped = report.results.filter((r) => r.status === "skipped").length;
    if (skipped > 0) this.logger.warn(`Skipped ${skipped} event(s) after a blocking hook failure`);
    return report;
  }
}
