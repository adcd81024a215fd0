/**
 * Change detector: diffs two snapshot sets into semantic deltas.
 *
 * Deltas are ordered by ascending task id (numeric-aware, so task-2 sorts
 * before task-10 and task-10 before task-10.1). Within one id the order is
 * created, status_changed, then the acceptance-criteria delta. Tasks that
 * disappear produce nothing.
 */
import type { AcceptanceDelta, TaskDelta, TaskSnapshot } from "../shared/types.js";
import type { SnapshotSet } from "../snapshot/parser.js";
import { silentLogger, type Logger } from "../shared/logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DetectionSummary {
  beforeCount: number;
  afterCount: number;
  created: number;
  statusChanged: number;
  completed: number;
  acChecked: number;
  acUnchecked: number;
}

export interface DetectionResult {
  deltas: TaskDelta[];
  /** True on the explicit no-op path (no tracked task changed). */
  noChanges: boolean;
  summary: DetectionSummary;
}

export interface DetectOptions {
  terminalStatus: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

const NUMERIC_TAIL = /^(.*?)(\d+)(?:\.(\d+))?$/;

/** Numeric-aware comparison of task ids. */
export function compareTaskIds(a: string, b: string): number {
  const ma = NUMERIC_TAIL.exec(a);
  const mb = NUMERIC_TAIL.exec(b);
  if (!ma || !mb || ma[1] !== mb[1]) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  const major = Number(ma[2]) - Number(mb[2]);
  if (major !== 0) return major;
  // A task sorts before its subtasks.
  const minorA = ma[3] === undefined ? -1 : Number(ma[3]);
  const minorB = mb[3] === undefined ? -1 : Number(mb[3]);
  if (minorA !== minorB) return minorA - minorB;
  return a < b ? -1 : a > b ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

function checkedCount(snapshot: TaskSnapshot): number {
  return snapshot.acceptanceItems.filter((item) => item.checked).length;
}

function acceptanceDelta(before: TaskSnapshot, after: TaskSnapshot): AcceptanceDelta | null {
  const beforeChecked = checkedCount(before);
  const afterChecked = checkedCount(after);
  const checkedDelta = afterChecked - beforeChecked;
  if (checkedDelta === 0) return null;
  return {
    kind: checkedDelta > 0 ? "ac_checked" : "ac_unchecked",
    id: after.id,
    checkedDelta,
    beforeChecked,
    afterChecked,
    beforeTotal: before.acceptanceItems.length,
    afterTotal: after.acceptanceItems.length,
    after,
  };
}

/** Diff two snapshot sets. */
export function detectChanges(
  before: SnapshotSet,
  after: SnapshotSet,
  options: DetectOptions,
): DetectionResult {
  const logger = options.logger ?? silentLogger();
  const deltas: TaskDelta[] = [];

  const ids = [...after.keys()].sort(compareTaskIds);
  for (const id of ids) {
    const next = after.get(id);
    if (!next) continue;
    const prev = before.get(id);

    if (!prev) {
      deltas.push({ kind: "created", id, after: next });
      continue;
    }

    if (prev.status !== next.status) {
      deltas.push({
        kind: "status_changed",
        id,
        from: prev.status,
        to: next.status,
        completed: next.status === options.terminalStatus,
        after: next,
      });
    }

    const ac = acceptanceDelta(prev, next);
    if (ac) deltas.push(ac);
  }

  const summary: DetectionSummary = {
    beforeCount: before.size,
    afterCount: after.size,
    created: 0,
    statusChanged: 0,
    completed: 0,
    acChecked: 0,
    acUnchecked: 0,
  };
  for (const delta of deltas) {
    switch (delta.kind) {
      case "created":
        summary.created++;
        break;
      case "status_changed":
        summary.statusChanged++;
        if (delta.completed) summary.completed++;
        break;
      case "ac_checked":
        summary.acChecked++;
        break;
      case "ac_unchecked":
        summary.acUnchecked++;
        break;
    }
  }

  if (deltas.length === 0) {
    logger.info(`No task changes detected (${before.size} before, ${after.size} after)`);
  } else {
    logger.debug(
      `Detected ${deltas.length} change(s): ${summary.created} created, ` +
        `${summary.statusChanged} status, ${summary.acChecked + summary.acUnchecked} acceptance`,
    );
  }

  return { deltas, noChanges: deltas.length === 0, summary };
}
