#!/usr/bin/env node

/**
 * Artifact-Flow CLI
 * Traces analysis scripts, plans their execution order and renders the workflow graph
 */

import { Command, Option } from "commander";
import chalk from "chalk";
import { ConfigurationError, wrapError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";
import { planCommand, PLAN_MODES, type PlanOptions } from "./commands/plan.js";
import { renderCommand, GROUPINGS, type RenderCommandOptions } from "./commands/render.js";
import { schemasCommand, type SchemasOptions } from "./commands/schemas.js";
import { traceCommand, type TraceOptions } from "./commands/trace.js";
import { validateCommand, type ValidateOptions } from "./commands/validate.js";
import { shutdownSource, type GlobalOptions } from "./context.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("artifact-flow")
  .description("Trace which scripts read and write which data artifacts, and in what order they must run")
  .version("0.1.0")
  .option("-c, --config <file>", "Project configuration file (default: ./artifact-flow.config.json)")
  .option("--catalog <file>", "Artifact catalog (default: the bundled urban-energy catalog)")
  .option("--log-level <level>", "Log level written to stderr (default: warn)")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

const globals = (): GlobalOptions => program.opts<GlobalOptions>();

// =============================================================================
// Commands
// =============================================================================

program
  .command("trace")
  .description("Dry-run every catalog script and list the accessor calls it made")
  .option("--json", "Print the trace records as JSON")
  .action((options: TraceOptions) => traceCommand({ ...globals(), ...options }));

program
  .command("plan")
  .description("Order the scripts needed for a target: a script, an artifact or \"all\"")
  .argument("<target>", "script name, artifact (category/name or a unique name) or all")
  .addOption(
    new Option("-m, --mode <mode>", "What to print").choices(PLAN_MODES).default("order")
  )
  .option("--json", "Print JSON instead of text")
  .action((target: string, options: PlanOptions) => planCommand(target, { ...globals(), ...options }));

program
  .command("render")
  .description("Render the workflow graph as Graphviz text")
  .option("-s, --script <name>", "Render only this script's direct inputs and outputs")
  .addOption(
    new Option("-g, --grouping <grouping>", "Cluster artifacts by").choices(GROUPINGS).default("category")
  )
  .option("-o, --out <file>", "Write to a file instead of stdout")
  .option("--pages", "Write one graph per script and one for the whole workflow to the output directory")
  .action((options: RenderCommandOptions) => renderCommand({ ...globals(), ...options }));

program
  .command("validate")
  .description("Report cycles, orphan inputs, dangling outputs and other findings")
  .option("--strict", "Exit non-zero on warnings as well as errors")
  .option("--json", "Print the findings as JSON")
  .action((options: ValidateOptions) => validateCommand({ ...globals(), ...options }));

program
  .command("schemas")
  .description("Write the artifact schema document (paths, kinds, creating and using scripts)")
  .option("-o, --out <file>", "Write to a file instead of stdout")
  .action((options: SchemasOptions) => schemasCommand({ ...globals(), ...options }));

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Print the error and exit
 */
function handleError(error: unknown): void {
  const failure = wrapError(error);
  logger.error({ err: error }, "CLI error occurred");
  console.error(chalk.red(`\n[${failure.code}] ${failure.message}`));
  if (failure instanceof ConfigurationError) {
    failure.issues.forEach((issue) => console.error(chalk.red(`  - ${issue}`)));
  }
  if (error instanceof Error && (process.env.DEBUG || process.env.NODE_ENV === "development")) {
    console.error(chalk.dim(error.stack));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

let isShuttingDown = false;

/**
 * First signal cancels in-flight dry runs; a second one exits at once
 */
function shutdown(signal: string): void {
  if (isShuttingDown) {
    logger.warn("Forced shutdown");
    process.exit(1);
  }

  isShuttingDown = true;
  logger.info({ signal }, "Received shutdown signal");
  console.error(chalk.dim(`\nReceived ${signal}, cancelling dry runs...`));
  shutdownSource.cancel(`received ${signal}`);

  // Dry runs check the token between accessor calls; a script that never calls one is not interruptible
  setTimeout(() => {
    logger.warn("Shutdown timeout, forcing exit");
    process.exit(1);
  }, 5000).unref();
}

// Handle SIGINT (Ctrl+C)
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle SIGTERM (kill command)
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
