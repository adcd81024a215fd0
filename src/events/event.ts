/**
 * Canonical event construction, validation and serialization.
 *
 * Events are deeply frozen once built. Ids of detected events are derived
 * from (revision pair, task id, event type), so detecting the same revision
 * pair twice yields identical events.
 */
import crypto from "node:crypto";
import {
  EVENT_SCHEMA_VERSION,
  type ContextValue,
  type EventMetadata,
  type HookEvent,
} from "../shared/types.js";
import { VERSION } from "../version.js";
import { errorMessage, isRecord } from "../shared/guards.js";

/** Dot-delimited, lower-case segments (e.g. "task.status_changed"). */
const EVENT_TYPE_PATTERN = /^[a-z][a-z0-9_]*(?:\.[a-z][a-z0-9_]*)+$/;

export class InvalidEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidEventError";
  }
}

export function isValidEventType(value: string): boolean {
  return EVENT_TYPE_PATTERN.test(value);
}

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/** Deterministic id for a detected event. */
export function deriveEventId(
  revisionBefore: string,
  revisionAfter: string,
  taskId: string,
  eventType: string,
): string {
  const digest = crypto
    .createHash("sha256")
    .update([revisionBefore, revisionAfter, taskId, eventType].join("\0"))
    .digest("hex");
  return `evt_${digest.slice(0, 24)}`;
}

/** Random id for manually emitted events. */
export function randomEventId(): string {
  return `evt_${crypto.randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function buildMetadata(revisions: { before?: string; after?: string } = {}): EventMetadata {
  const metadata: EventMetadata = {
    tool: "taskhooks",
    tool_version: VERSION,
    node_version: process.versions.node,
  };
  if (revisions.before !== undefined) metadata.revision_before = revisions.before;
  if (revisions.after !== undefined) metadata.revision_after = revisions.after;
  return metadata;
}

export interface CreateEventInput {
  eventType: string;
  context: Record<string, ContextValue>;
  eventId?: string;
  timestamp?: string;
  metadata?: EventMetadata;
}

/** Build a frozen event. Throws InvalidEventError for a malformed event type. */
export function createEvent(input: CreateEventInput): HookEvent {
  if (!isValidEventType(input.eventType)) {
    throw new InvalidEventError(
      `Invalid event type '${input.eventType}': expected dot-delimited lower-case segments`,
    );
  }
  const event: HookEvent = {
    schema_version: EVENT_SCHEMA_VERSION,
    event_type: input.eventType,
    event_id: input.eventId ?? randomEventId(),
    timestamp: input.timestamp ?? new Date().toISOString(),
    context: structuredClone(input.context),
    metadata: { ...(input.metadata ?? buildMetadata()) },
  };
  return deepFreeze(event);
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function serializeEvent(event: HookEvent): string {
  return JSON.stringify(event);
}

function isContextValue(value: unknown): value is ContextValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isContextValue);
      return Object.values(value).every(isContextValue);
    default:
      return false;
  }
}

function isContext(value: unknown): value is Record<string, ContextValue> {
  return isRecord(value) && Object.values(value).every(isContextValue);
}

function parseMetadata(value: unknown): EventMetadata {
  if (
    !isRecord(value) ||
    typeof value.tool !== "string" ||
    typeof value.tool_version !== "string" ||
    typeof value.node_version !== "string"
  ) {
    throw new InvalidEventError("metadata must carry tool, tool_version and node_version strings");
  }
  const metadata: EventMetadata = {
    tool: value.tool,
    tool_version: value.tool_version,
    node_version: value.node_version,
  };
  if (typeof value.revision_before === "string") metadata.revision_before = value.revision_before;
  if (typeof value.revision_after === "string") metadata.revision_after = value.revision_after;
  return metadata;
}

/** Parse and validate a serialized event. */
export function parseEvent(json: string): HookEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err: unknown) {
    throw new InvalidEventError(`Event is not valid JSON: ${errorMessage(err)}`);
  }
  if (!isRecord(raw)) {
    throw new InvalidEventError("Event must be a JSON object");
  }
  if (raw.schema_version !== EVENT_SCHEMA_VERSION) {
    throw new InvalidEventError(`Unsupported schema_version '${String(raw.schema_version)}'`);
  }
  if (typeof raw.event_id !== "string" || raw.event_id === "") {
    throw new InvalidEventError("event_id must be a non-empty string");
  }
  if (typeof raw.timestamp !== "string" || Number.isNaN(Date.parse(raw.timestamp))) {
    throw new InvalidEventError("timestamp must be an ISO-8601 string");
  }
  if (typeof raw.event_type !== "string") {
    throw new InvalidEventError("event_type must be a string");
  }
  if (!isContext(raw.context)) {
    throw new InvalidEventError("context must be an object of JSON values");
  }
  return createEvent({
    eventType: raw.event_type,
    eventId: raw.event_id,
    timestamp: raw.timestamp,
    context: raw.context,
    metadata: parseMetadata(raw.metadata),
  });
}
