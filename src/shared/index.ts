/**
 * Shared utilities for taskhooks.
 */
export type {
  AcceptanceItem,
  ContextValue,
  EventMetadata,
  HookEvent,
  LogEntry,
  LogLevel,
  TaskDelta,
  TaskDocument,
  TaskEventType,
  TaskSnapshot,
} from "./types.js";
export { DELTA_KINDS, EVENT_SCHEMA_VERSION, LOG_LEVELS, TASK_EVENT_TYPES } from "./types.js";
export { Logger, createLogger, normalizeLogLevel, sanitize, silentLogger } from "./logger.js";
export type { LoggerContext, LoggerOptions } from "./logger.js";
export { resolveHomeDir } from "./home.js";
export { errorMessage, isRecord, isStringArray } from "./guards.js";
