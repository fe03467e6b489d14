/**
 * schemas command - Write the artifact schema document
 */

import * as path from "node:path";
import chalk from "chalk";
import ora from "ora";
import { buildSchemaDocument } from "../../core/renderer/index.js";
import { createLogger, writeFile } from "../../utils/index.js";
import { loadContext, runAnalysis, type GlobalOptions } from "../context.js";

const logger = createLogger("schemas");

export interface SchemasOptions extends GlobalOptions {
  out?: string;
}

export async function schemasCommand(options: SchemasOptions): Promise<void> {
  const context = await loadContext(options);
  logger.info({ options }, "Schemas command");
  const spinner = ora("Preparing dry runs...").start();
  const analysis = await runAnalysis(context, spinner).catch((error: unknown) => {
    spinner.fail(chalk.red("Tracing failed"));
    throw error;
  });

  const document = buildSchemaDocument(
    context.catalog.registry,
    analysis.graph,
    context.config.scenario
  );
  const json = `${JSON.stringify(document, null, 2)}\n`;

  if (options.out) {
    const target = path.resolve(options.out);
    await writeFile(target, json);
    console.error(chalk.green(`Wrote ${Object.keys(document.accessors).length} accessor schemas to ${target}`));
  } else {
    process.stdout.write(json);
  }
}
