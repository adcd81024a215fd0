/**
 * Audit CLI command.
 *
 * Registers `taskhooks audit`.
 */
import { Command, InvalidArgumentError } from "commander";
import { commandContext } from "../cli/context.js";
import { resolveProjectPaths } from "../config/index.js";
import type { ExecutionStatus } from "../sandbox/executor.js";
import type { Logger } from "../shared/logger.js";
import { JsonlAuditLog } from "./audit-log.js";
import { formatAuditRecord, queryAuditRecords, tailRecords, type AuditQuery } from "./query.js";

const STATUSES: readonly ExecutionStatus[] = ["success", "failed", "timeout", "error"];

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("must be a non-negative integer");
  return n;
}

function parseStatus(value: string): ExecutionStatus {
  const status = STATUSES.find((s) => s === value);
  if (!status) throw new InvalidArgumentError(`must be one of ${STATUSES.join(", ")}`);
  return status;
}

function parseSince(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) throw new InvalidArgumentError("must be an ISO-8601 date or time");
  return date;
}

interface AuditOptions {
  tail: number;
  hook?: string;
  eventType?: string;
  status?: ExecutionStatus;
  task?: string;
  since?: Date;
  violations?: boolean;
  json?: boolean;
  verify?: boolean;
}

/** Open the project's audit log with its configured rotation settings. */
export function openAuditLog(
  projectRoot: string,
  settings: { audit: { maxBytes: number; maxGenerations: number } },
  logger?: Logger,
): JsonlAuditLog {
  const { auditLogPath } = resolveProjectPaths(projectRoot);
  return new JsonlAuditLog(auditLogPath, {
    maxBytes: settings.audit.maxBytes,
    maxGenerations: settings.audit.maxGenerations,
    logger,
  });
}

/**
 * Register the audit command on the program.
 *
 * @param projectRoot - Overrides `--project-dir` (tests).
 */
export function registerAuditCommands(program: Command, projectRoot?: string): void {
  program
    .command("audit")
    .description("Show hook execution history")
    .option("--tail <n>", "show the last n matching records", parseCount, 20)
    .option("--hook <name>", "only this hook")
    .option("--event-type <pattern>", "only events matching this type or pattern")
    .option("--status <status>", "only this execution status", parseStatus)
    .option("--task <id>", "only events for this task")
    .option("--since <time>", "only records at or after this time", parseSince)
    .option("--violations", "only security violations")
    .option("--json", "output raw JSON lines to stdout")
    .option("--verify", "check the hash chain instead of listing records")
    .action((opts: AuditOptions, cmd: Command) => {
      const ctx = commandContext(cmd, "audit", { projectRoot, json: opts.json ?? false });
      const log = openAuditLog(ctx.projectRoot, ctx.settings, ctx.logger);

      if (opts.verify) {
        const report = log.verifyIntegrity();
        if (opts.json) {
          console.log(JSON.stringify(report, null, 2));
        } else if (report.valid) {
          console.log(`[taskhooks] Audit log intact (${report.records} records).`);
        } else {
          for (const error of report.errors) console.error(`  ${error}`);
          console.error(`[taskhooks] Audit log integrity check failed (${report.errors.length} problem(s)).`);
        }
        if (!report.valid) process.exitCode = 1;
        return;
      }

      const query: AuditQuery = {};
      if (opts.hook) query.hook = opts.hook;
      if (opts.eventType) query.eventType = opts.eventType;
      if (opts.status) query.status = opts.status;
      if (opts.task) query.taskId = opts.task;
      if (opts.since) query.since = opts.since;
      if (opts.violations) query.kind = "security.violation";

      const records = tailRecords(queryAuditRecords(log.readAll(), query), opts.tail);

      if (opts.json) {
        for (const record of records) console.log(JSON.stringify(record));
        return;
      }
      if (records.length === 0) {
        console.log("[taskhooks] No matching audit records.");
        return;
      }
      for (const record of records) console.log(formatAuditRecord(record));
    });
}
