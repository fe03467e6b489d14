/**
 * validate command - Report structural findings of the traced workflow
 */

import chalk from "chalk";
import ora from "ora";
import { findingsAtLeast, summarizeFindings } from "../../core/validator/index.js";
import { createLogger } from "../../utils/index.js";
import { formatFinding, loadContext, runAnalysis, type GlobalOptions } from "../context.js";

const logger = createLogger("validate");

export interface ValidateOptions extends GlobalOptions {
  strict?: boolean;
  json?: boolean;
}

/**
 * Sets a non-zero exit code on errors, and with --strict on warnings too
 */
export async function validateCommand(options: ValidateOptions): Promise<void> {
  const context = await loadContext(options);
  logger.info({ options }, "Validate command");
  const spinner = ora("Preparing dry runs...").start();
  const { findings } = await runAnalysis(context, spinner).catch((error: unknown) => {
    spinner.fail(chalk.red("Tracing failed"));
    throw error;
  });
  const summary = summarizeFindings(findings);

  if (options.json) {
    console.log(JSON.stringify({ summary, findings }, null, 2));
  } else {
    console.log();
    if (findings.length === 0) {
      console.log(chalk.green("No findings"));
    } else {
      console.log(chalk.white.bold(`Findings (${findings.length})`));
      findings.forEach((finding) => console.log(formatFinding(finding)));
    }
    console.log();
    console.log(
      `  ${chalk.red(`${summary.error} error(s)`)}  ${chalk.yellow(`${summary.warning} warning(s)`)}  ` +
        chalk.dim(`${summary.info} info`)
    );
  }

  const blocking = findingsAtLeast(findings, options.strict ? "warning" : "error");
  if (blocking.length > 0) {
    process.exitCode = 1;
  }
}
