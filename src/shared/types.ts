/**
 * Shared TypeScript types for taskhooks.
 *
 * Defines the core data structures that flow through the detection
 * pipeline: task snapshots, deltas between revisions, and canonical events.
 */

// ---------------------------------------------------------------------------
// Task Snapshots
// ---------------------------------------------------------------------------

export interface AcceptanceItem {
  /** Criterion number (the `#N` marker, or 1-based position when absent). */
  index: number;
  /** Criterion text without the checkbox and index marker. */
  text: string;
  /** Whether the checkbox is ticked. */
  checked: boolean;
}

export interface TaskSnapshot {
  /** Task identifier (e.g. "task-12" or "task-12.3"). */
  id: string;
  /** Repository-relative path of the document. */
  path: string;
  /** Task title from front matter, when present. */
  title?: string;
  /** Workflow status (e.g. "To Do", "In Progress", "Done"). */
  status: string;
  /** Priority from front matter, when present. */
  priority?: string;
  /** Sorted, de-duplicated labels. */
  labels: string[];
  /** Ordered acceptance criteria. */
  acceptanceItems: AcceptanceItem[];
}

/** One versioned document as supplied by a work-item store. */
export interface TaskDocument {
  /** Repository-relative path (forward slashes). */
  path: string;
  /** Raw document content. */
  content: string;
}

// ---------------------------------------------------------------------------
// Deltas
// ---------------------------------------------------------------------------

export const DELTA_KINDS = ["created", "status_changed", "ac_checked", "ac_unchecked"] as const;

export type DeltaKind = (typeof DELTA_KINDS)[number];

export interface CreatedDelta {
  kind: "created";
  id: string;
  /** Snapshot of the task in the "after" revision. */
  after: TaskSnapshot;
}

export interface StatusChangedDelta {
  kind: "status_changed";
  id: string;
  from: string;
  to: string;
  /** True when `to` is the terminal status. */
  completed: boolean;
  after: TaskSnapshot;
}

export interface AcceptanceDelta {
  kind: "ac_checked" | "ac_unchecked";
  id: string;
  /** after checked count minus before checked count (never zero). */
  checkedDelta: number;
  beforeChecked: number;
  afterChecked: number;
  beforeTotal: number;
  afterTotal: number;
  after: TaskSnapshot;
}

export type TaskDelta = CreatedDelta | StatusChangedDelta | AcceptanceDelta;

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export const EVENT_SCHEMA_VERSION = "1.0";

export const TASK_EVENT_TYPES = [
  "task.created",
  "task.status_changed",
  "task.completed",
  "task.ac_checked",
  "task.ac_unchecked",
] as const;

export type TaskEventType = (typeof TASK_EVENT_TYPES)[number];

/** JSON-compatible value carried in event context. */
export type ContextValue =
  | string
  | number
  | boolean
  | null
  | ContextValue[]
  | { [key: string]: ContextValue };

export interface EventMetadata {
  tool: string;
  tool_version: string;
  node_version: string;
  revision_before?: string;
  revision_after?: string;
}

/**
 * Canonical event payload. Field names are the wire format handed to hook
 * actions on stdin and written to the audit log.
 */
export interface HookEvent {
  schema_version: string;
  event_type: string;
  event_id: string;
  timestamp: string;
  context: Readonly<Record<string, ContextValue>>;
  metadata: Readonly<EventMetadata>;
}

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Severity level. */
  level: LogLevel;
  /** Component that emitted the log (e.g. "dispatch"). */
  component: string;
  /** Hook name, when the message concerns one hook. */
  hook: string;
  /** Event id, when the message concerns one event. */
  event: string;
  /** Human-readable message. */
  msg: string;
}
