#!/usr/bin/env node
/**
 * taskhooks: task change detection and hook runner CLI.
 *
 * This is the main entry point. It bootstraps the CLI program,
 * installs error handlers, and delegates to Commander.
 */
import process from "node:process";
import { buildProgram } from "./cli/program.js";

const program = buildProgram();

process.on("uncaughtException", (error) => {
  console.error(
    "[taskhooks] Uncaught exception:",
    error instanceof Error ? (error.stack ?? error.message) : error,
  );
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error(
    "[taskhooks] Unhandled rejection:",
    reason instanceof Error ? (reason.stack ?? reason.message) : reason,
  );
  process.exit(1);
});

void program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("[taskhooks] CLI failed:", err instanceof Error ? (err.stack ?? err.message) : err);
  process.exit(1);
});
