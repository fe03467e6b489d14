/**
 * trace command - Dry-run every catalog script and report what it touched
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/index.js";
import { loadContext, runAnalysis, type GlobalOptions } from "../context.js";

const logger = createLogger("trace");

export interface TraceOptions extends GlobalOptions {
  json?: boolean;
}

export async function traceCommand(options: TraceOptions): Promise<void> {
  const context = await loadContext(options);
  logger.info({ options }, "Trace command");
  const spinner = ora("Preparing dry runs...").start();
  const analysis = await runAnalysis(context, spinner).catch((error: unknown) => {
    spinner.fail(chalk.red("Tracing failed"));
    throw error;
  });

  if (options.json) {
    const traces = [...analysis.traces.values()].map((result) => ({
      script: result.script,
      complete: result.complete,
      records: result.records.map((record) => ({
        sequence: record.sequence,
        accessor: record.accessor,
        direction: record.direction,
        category: record.artifact.category,
        nameTemplate: record.artifact.nameTemplate,
      })),
    }));
    console.log(JSON.stringify(traces, null, 2));
    return;
  }

  console.log();
  console.log(chalk.white.bold("Scripts"));
  for (const result of analysis.traces.values()) {
    const reads = result.records.filter((record) => record.direction === "read").length;
    const writes = result.records.length - reads;
    const status = result.complete ? chalk.green("✓") : chalk.yellow("incomplete");
    console.log(
      `  ${status} ${result.script.padEnd(24)} ${String(reads).padStart(3)} reads  ` +
        `${String(writes).padStart(3)} writes  ${chalk.dim(`${result.durationMs}ms`)}`
    );
  }
  console.log();
}
