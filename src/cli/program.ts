/**
 * CLI program definition for taskhooks.
 *
 * Uses Commander to define the command structure. Each area registers its
 * own subcommands; global flags are read back through optsWithGlobals().
 */
import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerAuditCommands } from "../audit/commands.js";
import { registerHookCommands } from "../hooks/commands.js";
import { registerMetricsCommands } from "../metrics/commands.js";
import { registerPipelineCommands } from "../pipeline/commands.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("taskhooks")
    .description("Detect task state changes in git and run sandboxed, audited hooks")
    .version(VERSION)
    .option("--project-dir <path>", "project root (default: current directory)")
    .option("--verbose", "log debug output")
    .option("--quiet", "log warnings and errors only");

  registerPipelineCommands(program);
  registerHookCommands(program);
  registerAuditCommands(program);
  registerMetricsCommands(program);

  return program;
}
