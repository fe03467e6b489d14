/**
 * Dependency Graph
 *
 * Immutable bipartite graph of scripts and artifacts. An edge artifact → script
 * means the script reads the artifact; script → artifact means it writes it.
 * Nodes and edges are kept in a stable order (artifacts by category then name,
 * scripts by name) so that everything derived from a graph is reproducible.
 *
 * The script precedence projection contracts artifacts away: a script that
 * writes an artifact precedes every other script that reads it.
 *
 * @module
 */

import type { Artifact, Direction } from "../../types/index.js";
import { compareStrings } from "../../utils/index.js";
import { ErrorCode, GraphBuildError } from "../errors.js";
import { artifactKey, compareArtifacts } from "../locator/index.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A deduplicated (script, artifact, direction) relation
 */
export interface GraphEdge {
  readonly script: string;
  /** Artifact key ("<category>/<nameTemplate>") */
  readonly artifact: string;
  readonly direction: Direction;
  /** Accessors through which the relation was observed; documentation only */
  readonly accessors: readonly string[];
}

/**
 * Script-to-script edge of the precedence projection
 */
export interface PrecedenceEdge {
  readonly from: string;
  readonly to: string;
  /** Artifacts written by `from` and read by `to` */
  readonly artifacts: readonly string[];
}

export interface DependencyGraphInput {
  scripts: Iterable<string>;
  artifacts: Iterable<Artifact>;
  edges: Iterable<GraphEdge>;
}

/**
 * Plain structural form of a graph; equal graphs serialize identically
 */
export interface SerializedGraph {
  scripts: string[];
  artifacts: Array<{ key: string; category: string; nameTemplate: string; kind: string }>;
  edges: Array<{ script: string; artifact: string; direction: Direction; accessors: string[] }>;
}

// =============================================================================
// Graph
// =============================================================================

export class DependencyGraph {
  readonly scripts: readonly string[];
  readonly artifacts: readonly Artifact[];
  readonly edges: readonly GraphEdge[];

  private readonly artifactsByKey = new Map<string, Artifact>();
  private readonly edgesByScript = new Map<string, GraphEdge[]>();
  private readonly edgesByArtifact = new Map<string, GraphEdge[]>();
  private readonly precedenceEdges: readonly PrecedenceEdge[];
  private readonly successors = new Map<string, string[]>();
  private readonly predecessors = new Map<string, string[]>();

  /**
   * @throws GraphBuildError when an edge names a script or artifact that is not a node
   */
  constructor(input: DependencyGraphInput) {
    this.scripts = Object.freeze([...new Set(input.scripts)].sort(compareStrings));

    for (const artifact of input.artifacts) {
      this.artifactsByKey.set(artifactKey(artifact), artifact);
    }
    this.artifacts = Object.freeze([...this.artifactsByKey.values()].sort(compareArtifacts));

    const scriptSet = new Set(this.scripts);
    const edges = [...input.edges];
    for (const edge of edges) {
      if (!scriptSet.has(edge.script)) {
        throw new GraphBuildError(
          `Edge references unknown script "${edge.script}"`,
          ErrorCode.GRAPH_SCRIPT_MISMATCH,
          { edge }
        );
      }
      if (!this.artifactsByKey.has(edge.artifact)) {
        throw new GraphBuildError(
          `Edge references unknown artifact "${edge.artifact}"`,
          ErrorCode.GRAPH_INCONSISTENT_ARTIFACT,
          { edge }
        );
      }
    }
    this.edges = Object.freeze(edges.sort((a, b) => this.compareEdges(a, b)));

    for (const script of this.scripts) this.edgesByScript.set(script, []);
    for (const artifact of this.artifacts) this.edgesByArtifact.set(artifactKey(artifact), []);
    for (const edge of this.edges) {
      this.edgesByScript.get(edge.script)?.push(edge);
      this.edgesByArtifact.get(edge.artifact)?.push(edge);
    }

    this.precedenceEdges = Object.freeze(this.projectScripts());
    for (const script of this.scripts) {
      this.successors.set(script, []);
      this.predecessors.set(script, []);
    }
    for (const edge of this.precedenceEdges) {
      this.successors.get(edge.from)?.push(edge.to);
      this.predecessors.get(edge.to)?.push(edge.from);
    }
    for (const list of [...this.successors.values(), ...this.predecessors.values()]) {
      list.sort(compareStrings);
    }
  }

  // ---------------------------------------------------------------------------
  // Lookups
  // ---------------------------------------------------------------------------

  hasScript(name: string): boolean {
    return this.edgesByScript.has(name);
  }

  hasArtifact(key: string): boolean {
    return this.artifactsByKey.has(key);
  }

  getArtifact(key: string): Artifact | undefined {
    return this.artifactsByKey.get(key);
  }

  /**
   * Artifacts whose name template equals `nameTemplate`, in any category
   */
  findArtifacts(nameTemplate: string): Artifact[] {
    return this.artifacts.filter((artifact) => artifact.nameTemplate === nameTemplate);
  }

  /** Read edges of a script */
  inputsOf(script: string): GraphEdge[] {
    return (this.edgesByScript.get(script) ?? []).filter((edge) => edge.direction === "read");
  }

  /** Write edges of a script */
  outputsOf(script: string): GraphEdge[] {
    return (this.edgesByScript.get(script) ?? []).filter((edge) => edge.direction === "write");
  }

  /** Scripts reading an artifact, sorted */
  readersOf(key: string): string[] {
    return this.scriptsOn(key, "read");
  }

  /** Scripts writing an artifact, sorted */
  writersOf(key: string): string[] {
    return this.scriptsOn(key, "write");
  }

  // ---------------------------------------------------------------------------
  // Script projection
  // ---------------------------------------------------------------------------

  precedence(): readonly PrecedenceEdge[] {
    return this.precedenceEdges;
  }

  /** Scripts that read something this script writes */
  successorsOf(script: string): readonly string[] {
    return this.successors.get(script) ?? [];
  }

  /** Scripts that write something this script reads */
  predecessorsOf(script: string): readonly string[] {
    return this.predecessors.get(script) ?? [];
  }

  /**
   * Strongly connected components of the precedence projection with more than
   * one script. Each component is sorted; components are ordered by their first member.
   */
  scriptCycles(): string[][] {
    return findStronglyConnectedComponents(this.scripts, (script) => this.successorsOf(script))
      .filter((component) => component.length > 1)
      .sort((a, b) => compareStrings(a[0] ?? "", b[0] ?? ""));
  }

  /**
   * Artifacts that link the members of a set of scripts to each other
   */
  linkingArtifacts(scripts: Iterable<string>): string[] {
    const members = new Set(scripts);
    const artifacts = new Set<string>();
    for (const edge of this.precedenceEdges) {
      if (members.has(edge.from) && members.has(edge.to)) {
        edge.artifacts.forEach((key) => artifacts.add(key));
      }
    }
    return [...artifacts].sort(compareStrings);
  }

  // ---------------------------------------------------------------------------
  // Subgraphs
  // ---------------------------------------------------------------------------

  /**
   * The given scripts with all their edges and the artifacts those edges touch
   */
  restrictTo(scripts: Iterable<string>): DependencyGraph {
    const kept = new Set([...scripts].filter((script) => this.hasScript(script)));
    const edges = this.edges.filter((edge) => kept.has(edge.script));
    const artifactKeys = new Set(edges.map((edge) => edge.artifact));
    return new DependencyGraph({
      scripts: kept,
      artifacts: this.artifacts.filter((artifact) => artifactKeys.has(artifactKey(artifact))),
      edges,
    });
  }

  /**
   * One script with its direct inputs and outputs
   */
  neighbourhood(script: string): DependencyGraph {
    return this.restrictTo([script]);
  }

  toJSON(): SerializedGraph {
    return {
      scripts: [...this.scripts],
      artifacts: this.artifacts.map((artifact) => ({
        key: artifactKey(artifact),
        category: artifact.category,
        nameTemplate: artifact.nameTemplate,
        kind: artifact.kind,
      })),
      edges: this.edges.map((edge) => ({
        script: edge.script,
        artifact: edge.artifact,
        direction: edge.direction,
        accessors: [...edge.accessors],
      })),
    };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private scriptsOn(key: string, direction: Direction): string[] {
    return (this.edgesByArtifact.get(key) ?? [])
      .filter((edge) => edge.direction === direction)
      .map((edge) => edge.script);
  }

  private compareEdges(a: GraphEdge, b: GraphEdge): number {
    const artifactA = this.artifactsByKey.get(a.artifact);
    const artifactB = this.artifactsByKey.get(b.artifact);
    const byArtifact =
      artifactA && artifactB
        ? compareArtifacts(artifactA, artifactB)
        : compareStrings(a.artifact, b.artifact);
    return (
      compareStrings(a.script, b.script) ||
      byArtifact ||
      compareStrings(a.direction, b.direction)
    );
  }

  private projectScripts(): PrecedenceEdge[] {
    const linked = new Map<string, { from: string; to: string; artifacts: string[] }>();

    for (const artifact of this.artifacts) {
      const key = artifactKey(artifact);
      const writers = this.writersOf(key);
      const readers = this.readersOf(key);
      for (const from of writers) {
        for (const to of readers) {
          if (from === to) continue;
          const pairKey = `${from}\u0000${to}`;
          const existing = linked.get(pairKey);
          if (existing) {
            existing.artifacts.push(key);
          } else {
            linked.set(pairKey, { from, to, artifacts: [key] });
          }
        }
      }
    }

    return [...linked.values()]
      .map((edge) => Object.freeze({ ...edge, artifacts: Object.freeze(edge.artifacts) }))
      .sort((a, b) => compareStrings(a.from, b.from) || compareStrings(a.to, b.to));
  }
}

// =============================================================================
// Strongly Connected Components
// =============================================================================

/**
 * Tarjan's algorithm. Every node ends up in exactly one component; single-node
 * components are included. Members of each component are sorted.
 */
export function findStronglyConnectedComponents(
  nodes: readonly string[],
  successorsOf: (node: string) => readonly string[]
): string[][] {
  const index = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];
  let counter = 0;

  // Returns the lowlink of `node`
  const strongConnect = (node: string): number => {
    const nodeIndex = counter++;
    let lowlink = nodeIndex;
    index.set(node, nodeIndex);
    stack.push(node);
    onStack.add(node);

    for (const next of successorsOf(node)) {
      const nextIndex = index.get(next);
      if (nextIndex === undefined) {
        lowlink = Math.min(lowlink, strongConnect(next));
      } else if (onStack.has(next)) {
        lowlink = Math.min(lowlink, nextIndex);
      }
    }

    if (lowlink === nodeIndex) {
      const component: string[] = [];
      for (let member = stack.pop(); member !== undefined; member = stack.pop()) {
        onStack.delete(member);
        component.push(member);
        if (member === node) break;
      }
      components.push(component.sort(compareStrings));
    }
    return lowlink;
  };

  for (const node of nodes) {
    if (!index.has(node)) {
      strongConnect(node);
    }
  }

  return components;
}
