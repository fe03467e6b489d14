/**
 * DOT Renderer
 *
 * Projects a dependency graph onto Graphviz text for documentation pages:
 * a legend, one quoted process node per script, and per artifact group a
 * `cluster_<n>_in` of artifacts nothing in the rendered graph writes and a
 * `cluster_<n>_out` of produced ones. Edges carry the accessor names that
 * induced them.
 *
 * Artifact nodes keep their category in `tooltip` and their kind in `comment`
 * so that {@link parseDot} can rebuild the graph from the text alone.
 *
 * @module
 */

import type { Artifact } from "../../types/index.js";
import { compareStrings, createLogger, suggestNames } from "../../utils/index.js";
import { UnknownTargetError } from "../errors.js";
import type { DependencyGraph } from "../graph/index.js";
import { artifactKey } from "../locator/index.js";

const logger = createLogger("renderer");

// =============================================================================
// Types
// =============================================================================

export type Grouping = "category" | "kind";

export interface RenderOptions {
  /** What one cluster pair stands for; category (directory) by default */
  grouping?: Grouping;
  /** Render only this script's direct inputs and outputs */
  script?: string;
  /** Graph identifier in the `digraph` header */
  name?: string;
}

export const SCRIPT_STYLE = {
  fillcolor: "#3FC0C2",
  shape: "note",
} as const;

const INPUT_COLOR = "#E1F2F2";
const OUTPUT_COLOR = "#aadcdd";

/** Legend node ids; labels show the bare words */
const LEGEND_IDS = ["legend:process", "legend:inputs", "legend:outputs"] as const;

// =============================================================================
// Rendering
// =============================================================================

/**
 * Renders the graph, or the neighbourhood of `options.script`
 *
 * @throws UnknownTargetError when `options.script` is not a script of the graph
 */
export function renderDot(graph: DependencyGraph, options: RenderOptions = {}): string {
  const grouping = options.grouping ?? "category";
  const view = options.script !== undefined ? scriptView(graph, options.script) : graph;
  const ids = nodeIds(view);
  const idOf = (artifact: Artifact) => ids.get(artifactKey(artifact)) ?? artifactKey(artifact);

  const groups = [...new Set(view.artifacts.map((artifact) => groupOf(artifact, grouping)))].sort(
    compareStrings
  );

  const lines: string[] = [];
  lines.push(`digraph ${quote(options.name ?? options.script ?? "workflow")} {`);
  lines.push('    rankdir="LR";');
  lines.push("    graph [overlap=false, fontname=arial];");
  lines.push(
    "    node [shape=box, style=filled, color=white, fontsize=15, fontname=arial, " +
      `fixedsize=true, width=${nodeWidth([...ids.values(), ...view.scripts])}];`
  );
  lines.push("    edge [fontname=arial, fontsize=15];");
  lines.push("    newrank=true;");
  lines.push(...legend());

  for (const script of view.scripts) {
    lines.push(
      `    ${quote(script)}[style=filled, color=white, fillcolor="${SCRIPT_STYLE.fillcolor}", ` +
        `shape=${SCRIPT_STYLE.shape}, fontsize=20, fontname=arial];`
    );
  }

  groups.forEach((group, index) => {
    const members = view.artifacts.filter((artifact) => groupOf(artifact, grouping) === group);
    const inputs = members.filter((artifact) => view.writersOf(artifactKey(artifact)).length === 0);
    const outputs = members.filter((artifact) => view.writersOf(artifactKey(artifact)).length > 0);

    if (inputs.length > 0) {
      lines.push(...cluster(`cluster_${index + 1}_in`, INPUT_COLOR, group, inputs, idOf));
    }
    if (outputs.length > 0) {
      lines.push(...cluster(`cluster_${index + 1}_out`, OUTPUT_COLOR, group, outputs, idOf));
    }
  });

  for (const edge of view.edges) {
    const artifact = view.getArtifact(edge.artifact);
    const artifactId = artifact ? idOf(artifact) : edge.artifact;
    const label = quote(`(${edge.accessors.join(", ")})`);
    lines.push(
      edge.direction === "read"
        ? `    ${quote(artifactId)} -> ${quote(edge.script)}[label=${label}];`
        : `    ${quote(edge.script)} -> ${quote(artifactId)}[label=${label}];`
    );
  }

  lines.push("}");

  logger.debug(
    { script: options.script, grouping, nodes: view.scripts.length + view.artifacts.length },
    "Graph rendered"
  );
  return `${lines.join("\n")}\n`;
}

/**
 * Node id of every artifact: its bare name template, or its key when the
 * template is shared with another category, a script name or a legend node
 */
export function nodeIds(graph: DependencyGraph): Map<string, string> {
  const scripts = new Set<string>([...graph.scripts, ...LEGEND_IDS]);
  const uses = new Map<string, number>();
  for (const artifact of graph.artifacts) {
    uses.set(artifact.nameTemplate, (uses.get(artifact.nameTemplate) ?? 0) + 1);
  }

  const ids = new Map<string, string>();
  for (const artifact of graph.artifacts) {
    const key = artifactKey(artifact);
    const shared = (uses.get(artifact.nameTemplate) ?? 0) > 1 || scripts.has(artifact.nameTemplate);
    ids.set(key, shared ? key : artifact.nameTemplate);
  }
  return ids;
}

/**
 * File name of a script's page; characters outside `[A-Za-z0-9_.-]` become "_"
 * and a name made only of dots is prefixed so it stays inside the directory
 */
export function pageFileName(script: string): string {
  const safe = script.replace(/[^A-Za-z0-9_.-]/g, "_");
  return `${/^\.*$/.test(safe) ? `_${safe}` : safe}.gv`;
}

/**
 * Double-quoted DOT identifier; line breaks become `\n` and `\r`
 */
export function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r");
  return `"${escaped}"`;
}

// =============================================================================
// Internals
// =============================================================================

function scriptView(graph: DependencyGraph, script: string): DependencyGraph {
  if (!graph.hasScript(script)) {
    throw new UnknownTargetError(script, suggestNames(script, graph.scripts));
  }
  return graph.neighbourhood(script);
}

function groupOf(artifact: Artifact, grouping: Grouping): string {
  return grouping === "kind" ? artifact.kind : artifact.category;
}

function nodeWidth(labels: readonly string[]): string {
  const longest = labels.reduce((max, label) => Math.max(max, label.length), 0);
  return Math.max(2, longest * 0.15).toFixed(1);
}

function legend(): string[] {
  return [
    "    subgraph cluster_legend {",
    "        fontsize=25;",
    "        style=invis;",
    `        "legend:process"[label="process", style=filled, fillcolor="${SCRIPT_STYLE.fillcolor}", shape=${SCRIPT_STYLE.shape}, fontsize=20, fontname=arial];`,
    `        "legend:inputs"[label="inputs", style=filled, shape=folder, color=white, fillcolor="${INPUT_COLOR}", fontsize=20];`,
    `        "legend:outputs"[label="outputs", style=filled, shape=folder, color=white, fillcolor="${OUTPUT_COLOR}", fontsize=20];`,
    '        "legend:inputs" -> "legend:process"[style=invis];',
    '        "legend:process" -> "legend:outputs"[style=invis];',
    "    }",
  ];
}

function cluster(
  id: string,
  color: string,
  label: string,
  artifacts: readonly Artifact[],
  idOf: (artifact: Artifact) => string
): string[] {
  return [
    `    subgraph ${id} {`,
    "        style=filled;",
    `        color="${color}";`,
    "        fontsize=20;",
    "        rank=same;",
    `        label=${quote(label)};`,
    ...artifacts.map(
      (artifact) =>
        `        ${quote(idOf(artifact))}[tooltip=${quote(artifact.category)}, comment=${quote(artifact.kind)}];`
    ),
    "    }",
  ];
}
