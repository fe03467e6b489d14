/**
 * Workflow analysis: trace every script of a catalog, build the graph once all
 * dry runs have finished, then validate it.
 *
 * @module
 */

import type { ScriptDefinition } from "../types/index.js";
import { createLogger } from "../utils/index.js";
import type { Catalog } from "./catalog/index.js";
import type { DependencyGraph } from "./graph/index.js";
import { buildDependencyGraph } from "./graph-builder/index.js";
import { CallTracer, toTraceMap, type TraceAllOptions, type TraceResult } from "./tracer/index.js";
import { validateGraph, type Finding } from "./validator/index.js";

const logger = createLogger("workflow");

export interface AnalyzeWorkflowOptions extends TraceAllOptions {
  /** Root segment of dry-run paths */
  scenario?: string;
  /** Scripts to trace instead of the catalog's declared ones */
  scripts?: readonly ScriptDefinition[];
}

export interface WorkflowAnalysis {
  traces: Map<string, TraceResult>;
  graph: DependencyGraph;
  findings: Finding[];
  /** Scripts whose dry run stopped early on a missing file */
  incomplete: string[];
}

export async function analyzeWorkflow(
  catalog: Catalog,
  options: AnalyzeWorkflowOptions = {}
): Promise<WorkflowAnalysis> {
  const { scenario, scripts = catalog.scripts, ...traceOptions } = options;
  const tracer = new CallTracer(catalog.registry, { scenario });

  const traces = await tracer.traceAll(scripts, traceOptions);
  const graph = buildDependencyGraph(toTraceMap(traces));
  const findings = validateGraph(graph, {
    externalArtifacts: catalog.externalArtifacts,
    publishedOutputs: catalog.publishedOutputs,
  });

  const incomplete = [...traces.values()]
    .filter((result) => !result.complete)
    .map((result) => result.script);
  if (incomplete.length > 0) {
    logger.warn({ incomplete }, "Some traces are incomplete; the graph may miss edges");
  }

  return { traces, graph, findings, incomplete };
}
