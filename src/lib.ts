/**
 * Library entry: the pipeline stages and their types, for embedding
 * taskhooks in another tool without going through the CLI.
 */
export { VERSION } from "./version.js";

export * from "./shared/index.js";
export {
  DEFAULT_SETTINGS,
  SettingsError,
  loadProjectSettings,
  resolveProjectPaths,
  validateSettings,
  type ProjectPaths,
  type ProjectSettings,
} from "./config/index.js";

export { WorkItemStoreError, type RevisionInfo, type WorkItemStore } from "./store/work-item-store.js";
export { GitWorkItemStore, type GitStoreOptions } from "./store/git-store.js";
export { MemoryWorkItemStore, type MemoryRevision } from "./store/memory-store.js";

export {
  parseAcceptanceItems,
  parseSnapshot,
  parseSnapshotSet,
  parseTaskId,
  type ParseOptions,
  type ParseResult,
  type SnapshotSet,
} from "./snapshot/parser.js";
export { compareTaskIds, detectChanges, type DetectionResult, type DetectionSummary } from "./detect/change-detector.js";

export { InvalidEventError, createEvent, isValidEventType, parseEvent, serializeEvent } from "./events/event.js";
export { emitEvents, type EmitContext } from "./events/emitter.js";

export * from "./hooks/index.js";

export { SandboxPolicyViolation, evaluateCommand, type PolicyResult } from "./sandbox/policy.js";
export {
  executeHook,
  type ExecutionOutcome,
  type ExecutionStatus,
  type ExecutorOptions,
  type FailureKind,
} from "./sandbox/executor.js";
export {
  Dispatcher,
  HookBlockedError,
  InvalidTransitionError,
  type DispatchReport,
  type DispatcherOptions,
  type EventDispatchResult,
} from "./dispatch/dispatcher.js";

export { JsonlAuditLog, MemoryAuditSink, type AuditSink } from "./audit/audit-log.js";
export { queryAuditRecords, type AuditQuery } from "./audit/query.js";
export type { AuditRecord, IntegrityReport } from "./audit/types.js";

export { MetricsAggregator, percentile } from "./metrics/aggregator.js";
export { compareWindows } from "./metrics/compare.js";
export { checkHealth } from "./metrics/health.js";
export type { HealthReport, MetricsWindow, WindowComparison } from "./metrics/types.js";

export { processRevision, type ProcessRevisionOptions, type ProcessRevisionResult } from "./pipeline/process-revision.js";
