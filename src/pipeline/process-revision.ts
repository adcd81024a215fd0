/**
 * One revision transition, end to end:
 *
 *   store → snapshot sets (before, after) → detect → emit → dispatch
 *
 * The hook registry is loaded first, so a configuration error aborts the run
 * before anything is read or executed.
 */
import type { AuditSink } from "../audit/audit-log.js";
import { DEFAULT_SETTINGS, resolveProjectPaths, type ProjectSettings } from "../config/index.js";
import { detectChanges, type DetectionResult } from "../detect/change-detector.js";
import {
  Dispatcher,
  HookBlockedError,
  type DispatchReport,
  type TransitionObserver,
} from "../dispatch/dispatcher.js";
import { emitEvents } from "../events/emitter.js";
import { loadHooksConfig } from "../hooks/config.js";
import type { HooksConfig } from "../hooks/types.js";
import type { ExecutorOptions } from "../sandbox/executor.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import type { HookEvent } from "../shared/types.js";
import { parseSnapshotSet } from "../snapshot/parser.js";
import type { WorkItemStore } from "../store/work-item-store.js";

export interface ProcessRevisionOptions {
  projectRoot: string;
  store: WorkItemStore;
  before: string;
  after: string;
  audit: AuditSink;
  settings?: ProjectSettings;
  /** Preloaded registry; read from the project when omitted. */
  hooks?: HooksConfig;
  dryRun?: boolean;
  logger?: Logger;
  onTransition?: TransitionObserver;
  /** Executor settings that do not come from the project (tests). */
  executor?: Pick<ExecutorOptions, "parentEnv" | "graceMs" | "maxOutputBytes" | "now">;
  now?: () => Date;
}

export interface ProcessRevisionResult {
  detection: DetectionResult;
  events: HookEvent[];
  dispatch: DispatchReport;
  /** Set when a fail-stop hook blocked the triggering operation. */
  blocked: HookBlockedError | null;
}

export async function processRevision(options: ProcessRevisionOptions): Promise<ProcessRevisionResult> {
  const logger = options.logger ?? silentLogger();
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const paths = resolveProjectPaths(options.projectRoot);
  const hooks = options.hooks ?? loadHooksConfig(paths.root);

  const beforeInfo = options.store.describeRevision(options.before);
  const afterInfo = options.store.describeRevision(options.after);
  logger.debug(`Comparing ${beforeInfo.ref} → ${afterInfo.ref}`);

  const parseOptions = { idPrefix: settings.idPrefix, tasksGlob: settings.tasksGlob, logger };
  const beforeSet = parseSnapshotSet(options.store.listDocuments(options.before), parseOptions);
  const afterSet = parseSnapshotSet(options.store.listDocuments(options.after), parseOptions);

  const detection = detectChanges(beforeSet, afterSet, { terminalStatus: settings.terminalStatus, logger });
  const events = emitEvents(detection.deltas, {
    revisionBefore: beforeInfo.ref,
    revisionAfter: afterInfo.ref,
    timestamp: afterInfo.committedAt ?? (options.now ?? (() => new Date()))().toISOString(),
  });

  const dispatcher = new Dispatcher({
    config: hooks,
    audit: options.audit,
    dryRun: options.dryRun ?? false,
    logger,
    onTransition: options.onTransition,
    executor: {
      projectRoot: paths.root,
      hooksDir: paths.hooksDir,
      envPassthrough: hooks.defaults.envPassthrough,
      ...options.executor,
    },
  });
  const dispatch = await dispatcher.dispatchAll(events);

  const blocked = dispatch.blocked ? new HookBlockedError(dispatch.blocked) : null;
  return { detection, events, dispatch, blocked };
}
