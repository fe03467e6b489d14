/**
 * render command - Write the workflow graph as Graphviz text
 */

import * as path from "node:path";
import chalk from "chalk";
import ora from "ora";
import { pageFileName, renderDot, type Grouping } from "../../core/renderer/index.js";
import { createLogger, writeFile } from "../../utils/index.js";
import { loadContext, reportFindings, runAnalysis, type GlobalOptions } from "../context.js";

const logger = createLogger("render");

export const GROUPINGS = ["category", "kind"] as const satisfies readonly Grouping[];

export interface RenderCommandOptions extends GlobalOptions {
  script?: string;
  grouping?: Grouping;
  out?: string;
  /** One page per script plus the whole workflow, under the configured output directory */
  pages?: boolean;
}

export async function renderCommand(options: RenderCommandOptions): Promise<void> {
  const context = await loadContext(options);
  logger.info({ options }, "Render command");
  const spinner = ora("Preparing dry runs...").start();
  const analysis = await runAnalysis(context, spinner).catch((error: unknown) => {
    spinner.fail(chalk.red("Tracing failed"));
    throw error;
  });
  const grouping = options.grouping ?? "category";

  if (options.pages) {
    const outputDir = context.config.outputDir;
    await writeFile(path.join(outputDir, "workflow.gv"), renderDot(analysis.graph, { grouping }));
    for (const script of analysis.graph.scripts) {
      await writeFile(
        path.join(outputDir, pageFileName(script)),
        renderDot(analysis.graph, { grouping, script })
      );
    }
    console.error(
      chalk.green(`Wrote ${analysis.graph.scripts.length + 1} graphs to ${outputDir}`)
    );
    reportFindings(analysis.findings);
    return;
  }

  const text = renderDot(analysis.graph, { grouping, script: options.script });
  if (options.out) {
    const target = path.resolve(options.out);
    await writeFile(target, text);
    console.error(chalk.green(`Wrote ${target}`));
  } else {
    process.stdout.write(text);
  }
  reportFindings(analysis.findings);
}
