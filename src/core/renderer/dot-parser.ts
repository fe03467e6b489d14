/**
 * DOT Parser
 *
 * Reads text produced by {@link renderDot} back into a dependency graph.
 * Styling is ignored; only nodes, their category/kind attributes and labelled
 * edges matter. This is not a general Graphviz parser.
 *
 * @module
 */

import type { Artifact, Direction } from "../../types/index.js";
import { compareStrings } from "../../utils/index.js";
import { ArtifactKindSchema } from "../../utils/validation.js";
import { ErrorCode, GraphBuildError } from "../errors.js";
import { DependencyGraph, type GraphEdge } from "../graph/index.js";
import { artifactKey } from "../locator/index.js";
import { SCRIPT_STYLE } from "./dot-renderer.js";

const QUOTED = String.raw`"((?:[^"\\]|\\.)*)"`;
const NODE_LINE = new RegExp(`^${QUOTED}\\s*\\[(.*)\\];?$`);
const EDGE_LINE = new RegExp(`^${QUOTED}\\s*->\\s*${QUOTED}\\s*\\[(.*)\\];?$`);
const ATTRIBUTE = new RegExp(`(\\w+)\\s*=\\s*(?:${QUOTED}|([^,\\s]+))`, "g");

/** Lines that only carry layout or structure */
const STRUCTURAL_LINE = /^(?:digraph\b|subgraph\b|\}|(?:graph|node|edge)\s*\[|\w+\s*=|\/\/)/;

interface ParsedEdge {
  from: string;
  to: string;
  accessors: string[];
  line: number;
}

/**
 * @throws GraphBuildError (GRAPH_PARSE_FAILED) on lines the renderer never
 *   writes, or on edges between unknown nodes
 */
export function parseDot(text: string): DependencyGraph {
  const scripts = new Set<string>();
  const artifacts = new Map<string, Artifact>();
  const parsedEdges: ParsedEdge[] = [];

  let legendDepth = 0;
  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    const lineNumber = index + 1;

    if (legendDepth > 0) {
      if (line.endsWith("{")) legendDepth++;
      if (line === "}") legendDepth--;
      return;
    }
    if (line.startsWith("subgraph cluster_legend")) {
      legendDepth = 1;
      return;
    }
    if (line.length === 0) return;

    const edge = EDGE_LINE.exec(line);
    if (edge) {
      const [, from = "", to = "", attributeText = ""] = edge;
      const label = attributes(attributeText).get("label") ?? "";
      parsedEdges.push({
        from: unescape(from),
        to: unescape(to),
        accessors: parseLabel(label),
        line: lineNumber,
      });
      return;
    }

    const node = NODE_LINE.exec(line);
    if (node) {
      const [, id = "", attributeText = ""] = node;
      const nodeId = unescape(id);
      const attrs = attributes(attributeText);
      if (attrs.get("shape") === SCRIPT_STYLE.shape) {
        scripts.add(nodeId);
      } else {
        artifacts.set(nodeId, artifactFromNode(nodeId, attrs, lineNumber));
      }
      return;
    }

    if (STRUCTURAL_LINE.test(line)) return;
    throw parseError(`Unrecognised line ${lineNumber}: ${line}`, lineNumber);
  });

  const edges = new Map<string, GraphEdge>();
  for (const parsed of parsedEdges) {
    const edge = resolveEdge(parsed, scripts, artifacts);
    const id = `${edge.script}\u0000${edge.artifact}\u0000${edge.direction}`;
    const existing = edges.get(id);
    const accessors = [...new Set([...(existing?.accessors ?? []), ...edge.accessors])].sort(
      compareStrings
    );
    edges.set(id, { ...edge, accessors });
  }

  return new DependencyGraph({
    scripts,
    artifacts: artifacts.values(),
    edges: edges.values(),
  });
}

// =============================================================================
// Internals
// =============================================================================

function resolveEdge(
  edge: ParsedEdge,
  scripts: ReadonlySet<string>,
  artifacts: ReadonlyMap<string, Artifact>
): GraphEdge {
  const build = (script: string, artifactId: string, direction: Direction): GraphEdge | undefined => {
    const artifact = artifacts.get(artifactId);
    if (!scripts.has(script) || !artifact) return undefined;
    return { script, artifact: artifactKey(artifact), direction, accessors: edge.accessors };
  };

  const resolved = scripts.has(edge.from)
    ? build(edge.from, edge.to, "write")
    : build(edge.to, edge.from, "read");
  if (!resolved) {
    throw parseError(
      `Edge "${edge.from}" -> "${edge.to}" on line ${edge.line} does not join a script and an artifact`,
      edge.line
    );
  }
  return resolved;
}

function artifactFromNode(id: string, attrs: ReadonlyMap<string, string>, line: number): Artifact {
  const category = attrs.get("tooltip");
  const kind = ArtifactKindSchema.safeParse(attrs.get("comment"));
  if (category === undefined || !kind.success) {
    throw parseError(`Artifact node "${id}" on line ${line} lacks its category or kind`, line);
  }
  // Name templates never contain "/", so a qualified id ends in the template
  return { category, nameTemplate: id.slice(id.lastIndexOf("/") + 1), kind: kind.data };
}

function attributes(text: string): Map<string, string> {
  const attrs = new Map<string, string>();
  for (const match of text.matchAll(ATTRIBUTE)) {
    const [, name = "", quoted, bare] = match;
    attrs.set(name, quoted !== undefined ? unescape(quoted) : (bare ?? ""));
  }
  return attrs;
}

function parseLabel(label: string): string[] {
  const inner = label.startsWith("(") && label.endsWith(")") ? label.slice(1, -1) : label;
  return inner
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
    .sort(compareStrings);
}

function unescape(value: string): string {
  return value.replace(/\\(.)/g, (_, char: string) => (char === "n" ? "\n" : char === "r" ? "\r" : char));
}

function parseError(message: string, line: number): GraphBuildError {
  return new GraphBuildError(message, ErrorCode.GRAPH_PARSE_FAILED, { line });
}
