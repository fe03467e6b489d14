/**
 * plan command - Order the scripts needed for a target
 */

import chalk from "chalk";
import ora from "ora";
import { ExecutionPlanner, describeTarget, type ExecutionPlan } from "../../core/planner/index.js";
import { renderDot } from "../../core/renderer/index.js";
import type { Finding } from "../../core/validator/index.js";
import { createLogger } from "../../utils/index.js";
import { loadContext, reportFindings, runAnalysis, type GlobalOptions } from "../context.js";

const logger = createLogger("plan");

export const PLAN_MODES = ["order", "graph", "validate"] as const;
export type PlanMode = (typeof PLAN_MODES)[number];

export interface PlanOptions extends GlobalOptions {
  mode?: PlanMode;
  json?: boolean;
}

/**
 * Exits non-zero (through the thrown error) on a cyclic dependency or unknown target
 */
export async function planCommand(target: string, options: PlanOptions): Promise<void> {
  const mode = options.mode ?? "order";

  const context = await loadContext(options);
  logger.info({ target, options }, "Plan command");
  const spinner = ora("Preparing dry runs...").start();
  const analysis = await runAnalysis(context, spinner).catch((error: unknown) => {
    spinner.fail(chalk.red("Tracing failed"));
    throw error;
  });

  const plan = new ExecutionPlanner(analysis.graph).plan(target);
  const members = new Set(plan.scripts);
  const relevant = analysis.findings.filter((finding) => concernsPlan(finding, members));

  switch (mode) {
    case "order":
      printOrder(plan, relevant, options.json ?? false);
      break;
    case "graph": {
      const subgraph = analysis.graph.restrictTo(plan.scripts);
      console.log(
        options.json
          ? JSON.stringify(subgraph.toJSON(), null, 2)
          : renderDot(subgraph, { name: describeTarget(plan.target) }).trimEnd()
      );
      reportFindings(relevant);
      break;
    }
    case "validate":
      if (options.json) {
        console.log(JSON.stringify({ target: plan.target, findings: relevant }, null, 2));
      } else if (relevant.length === 0) {
        console.log(chalk.green(`No findings for ${describeTarget(plan.target)}`));
      } else {
        reportFindings(relevant);
      }
      break;
  }
}

function printOrder(plan: ExecutionPlan, findings: readonly Finding[], json: boolean): void {
  if (json) {
    console.log(JSON.stringify({ ...plan, findings }, null, 2));
    return;
  }
  if (plan.scripts.length === 0) {
    console.log(chalk.dim(`Nothing to run for ${describeTarget(plan.target)}`));
  }
  plan.scripts.forEach((script, index) => {
    console.log(`${String(index + 1).padStart(3)}. ${script}`);
  });
  reportFindings(findings);
}

/**
 * Findings that name a script of the plan or an artifact those scripts touch
 */
function concernsPlan(finding: Finding, members: ReadonlySet<string>): boolean {
  switch (finding.type) {
    case "cycle":
      return finding.scripts.some((script) => members.has(script));
    case "orphan-input":
      return finding.readers.some((script) => members.has(script));
    case "misclassified-external":
    case "dangling-output":
      return finding.writers.some((script) => members.has(script));
    case "no-outputs":
      return members.has(finding.script);
  }
}
