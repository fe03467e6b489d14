/**
 * Shared setup of the CLI commands: configuration, catalog, cancellation and
 * the traced workflow.
 */

import chalk from "chalk";
import type { Ora } from "ora";
import { loadCatalog, loadProjectConfig, type Catalog, type ResolvedProjectConfig } from "../core/catalog/index.js";
import type { Finding } from "../core/validator/index.js";
import { analyzeWorkflow, type WorkflowAnalysis } from "../core/workflow.js";
import { unwrap } from "../types/result.js";
import { CancellationTokenSource } from "../utils/async.js";
import { createLogger, isLogLevel, setDefaultLogLevel, type LogLevel } from "../utils/index.js";

const logger = createLogger("cli");

/**
 * Options accepted by every command
 */
export interface GlobalOptions {
  config?: string;
  catalog?: string;
  logLevel?: string;
}

export interface CommandContext {
  config: ResolvedProjectConfig;
  catalog: Catalog;
}

/**
 * Cancelled by SIGINT/SIGTERM; in-flight dry runs observe it
 */
export const shutdownSource = new CancellationTokenSource();

/**
 * Loads configuration and catalog. Command-line options win over the
 * configuration file.
 *
 * @throws ConfigurationError when either document is missing or invalid
 */
export async function loadContext(options: GlobalOptions): Promise<CommandContext> {
  const config = unwrap(await loadProjectConfig({ configPath: options.config }));

  setDefaultLogLevel(resolveLogLevel(options.logLevel, config.logLevel));

  const catalog = await loadCatalog(options.catalog ?? config.catalog);
  logger.debug({ catalog: catalog.source, configPath: config.configPath }, "Command context ready");
  return { config, catalog };
}

/**
 * Traces the catalog with a spinner reporting progress
 */
export async function runAnalysis(context: CommandContext, spinner: Ora): Promise<WorkflowAnalysis> {
  const total = context.catalog.scripts.length;
  spinner.text = `Tracing ${total} scripts...`;

  const analysis = await analyzeWorkflow(context.catalog, {
    scenario: context.config.scenario,
    concurrency: context.config.concurrency,
    token: shutdownSource.token,
    onProgress: (event) => {
      spinner.text = `Tracing scripts ${event.completed}/${event.total} (${event.script})`;
    },
  });

  if (analysis.incomplete.length > 0) {
    spinner.warn(
      chalk.yellow(`Traced ${total} scripts; incomplete: ${analysis.incomplete.join(", ")}`)
    );
  } else {
    spinner.succeed(
      chalk.green(
        `Traced ${total} scripts: ${analysis.graph.artifacts.length} artifacts, ${analysis.graph.edges.length} edges`
      )
    );
  }
  return analysis;
}

// =============================================================================
// Output helpers
// =============================================================================

const SEVERITY_STYLE = {
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.dim,
} as const;

const SEVERITY_MARK = {
  error: "✗",
  warning: "!",
  info: "·",
} as const;

export function formatFinding(finding: Finding): string {
  const style = SEVERITY_STYLE[finding.severity];
  return `  ${style(SEVERITY_MARK[finding.severity])} ${style(finding.type.padEnd(22))} ${finding.message}`;
}

/**
 * Prints findings to stderr so that stdout stays machine-readable
 */
export function reportFindings(findings: readonly Finding[]): void {
  for (const finding of findings) {
    console.error(formatFinding(finding));
  }
}

function resolveLogLevel(cliLevel?: string, configLevel?: LogLevel): LogLevel {
  if (cliLevel !== undefined && isLogLevel(cliLevel)) return cliLevel;
  if (configLevel) return configLevel;
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) return envLevel;
  return "warn";
}
