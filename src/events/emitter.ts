/**
 * Event emitter: pure mapping from deltas to canonical events.
 *
 *   created                         → task.created
 *   status_changed                  → task.status_changed
 *   status_changed (to terminal)    → task.status_changed, task.completed
 *   ac_checked / ac_unchecked       → task.ac_checked / task.ac_unchecked
 */
import type { ContextValue, HookEvent, TaskDelta, TaskEventType, TaskSnapshot } from "../shared/types.js";
import { buildMetadata, createEvent, deriveEventId } from "./event.js";

export interface EmitContext {
  revisionBefore: string;
  revisionAfter: string;
  /** Timestamp stamped on every event (the after-revision commit time). */
  timestamp: string;
}

function checked(snapshot: TaskSnapshot): number {
  return snapshot.acceptanceItems.filter((item) => item.checked).length;
}

/** Identity fields shared by every task event. */
function taskContext(snapshot: TaskSnapshot): Record<string, ContextValue> {
  const context: Record<string, ContextValue> = {
    task_id: snapshot.id,
    path: snapshot.path,
    status: snapshot.status,
    labels: [...snapshot.labels],
  };
  if (snapshot.title !== undefined) context.title = snapshot.title;
  if (snapshot.priority !== undefined) context.priority = snapshot.priority;
  return context;
}

function eventsFor(delta: TaskDelta): Array<{ type: TaskEventType; context: Record<string, ContextValue> }> {
  const base = taskContext(delta.after);
  switch (delta.kind) {
    case "created":
      return [
        {
          type: "task.created",
          context: {
            ...base,
            ac_total: delta.after.acceptanceItems.length,
            ac_checked: checked(delta.after),
          },
        },
      ];
    case "status_changed": {
      const context = { ...base, old_status: delta.from, new_status: delta.to };
      const events: Array<{ type: TaskEventType; context: Record<string, ContextValue> }> = [
        { type: "task.status_changed", context },
      ];
      if (delta.completed) {
        events.push({
          type: "task.completed",
          context: {
            ...context,
            ac_total: delta.after.acceptanceItems.length,
            ac_checked: checked(delta.after),
          },
        });
      }
      return events;
    }
    case "ac_checked":
    case "ac_unchecked":
      return [
        {
          type: delta.kind === "ac_checked" ? "task.ac_checked" : "task.ac_unchecked",
          context: {
            ...base,
            checked_delta: delta.checkedDelta,
            checked_before: delta.beforeChecked,
            checked_after: delta.afterChecked,
            total_before: delta.beforeTotal,
            total_after: delta.afterTotal,
          },
        },
      ];
  }
}

/** Map deltas to events, preserving delta order. */
export function emitEvents(deltas: readonly TaskDelta[], ctx: EmitContext): HookEvent[] {
  const metadata = buildMetadata({ before: ctx.revisionBefore, after: ctx.revisionAfter });
  const events: HookEvent[] = [];
  for (const delta of deltas) {
    for (const { type, context } of eventsFor(delta)) {
      events.push(
        createEvent({
          eventType: type,
          eventId: deriveEventId(ctx.revisionBefore, ctx.revisionAfter, delta.id, type),
          timestamp: ctx.timestamp,
          context,
          metadata,
        }),
      );
    }
  }
  return events;
}
