/**
 * Graph Builder
 *
 * Folds the per-script trace records of one build into a DependencyGraph.
 * Edges are deduplicated by (script, artifact, direction); accessor names are
 * kept as edge labels only. The result does not depend on record order.
 *
 * @module
 */

import type { Artifact, Direction, TraceRecord } from "../../types/index.js";
import { compareStrings, createLogger } from "../../utils/index.js";
import { ErrorCode, GraphBuildError } from "../errors.js";
import { DependencyGraph, type GraphEdge } from "../graph/index.js";
import { artifactKey } from "../locator/index.js";

const logger = createLogger("graph-builder");

/**
 * Trace records of every script in a build, keyed by script name
 */
export type TraceSet = ReadonlyMap<string, readonly TraceRecord[]>;

/**
 * Builds the dependency graph of one complete build.
 * Every key of `traces` becomes a script node, even without records.
 *
 * @throws GraphBuildError when a record belongs to another script, when one
 *   artifact appears with two kinds, or when a script reads and writes the
 *   same artifact through the same accessor
 */
export function buildDependencyGraph(traces: TraceSet): DependencyGraph {
  const artifacts = new Map<string, Artifact>();
  const edgeAccessors = new Map<string, { script: string; artifact: string; direction: Direction; accessors: Set<string> }>();
  const accessorDirections = new Map<string, Set<Direction>>();
  let recordCount = 0;

  for (const [script, records] of traces) {
    for (const record of records) {
      recordCount++;
      if (record.script !== script) {
        throw new GraphBuildError(
          `Trace of "${script}" contains a record of "${record.script}" (call #${record.sequence})`,
          ErrorCode.GRAPH_SCRIPT_MISMATCH,
          { script, record }
        );
      }

      const key = artifactKey(record.artifact);
      const known = artifacts.get(key);
      if (!known) {
        artifacts.set(key, record.artifact);
      } else if (known.kind !== record.artifact.kind) {
        throw new GraphBuildError(
          `Artifact "${key}" is traced both as "${known.kind}" and as "${record.artifact.kind}"`,
          ErrorCode.GRAPH_INCONSISTENT_ARTIFACT,
          { artifact: key, kinds: [known.kind, record.artifact.kind] }
        );
      }

      const edgeKey = [script, key, record.direction].join("\u0000");
      const edge = edgeAccessors.get(edgeKey);
      if (edge) {
        edge.accessors.add(record.accessor);
      } else {
        edgeAccessors.set(edgeKey, {
          script,
          artifact: key,
          direction: record.direction,
          accessors: new Set([record.accessor]),
        });
      }

      const usageKey = [script, key, record.accessor].join("\u0000");
      const directions = accessorDirections.get(usageKey) ?? new Set<Direction>();
      directions.add(record.direction);
      accessorDirections.set(usageKey, directions);
    }
  }

  const selfLoops = [...accessorDirections]
    .filter(([, directions]) => directions.size > 1)
    .map(([usageKey]) => usageKey.split("\u0000"))
    .map(([script = "", artifact = "", accessor = ""]) => ({ script, artifact, accessor }))
    .sort(
      (a, b) =>
        compareStrings(a.script, b.script) ||
        compareStrings(a.artifact, b.artifact) ||
        compareStrings(a.accessor, b.accessor)
    );
  if (selfLoops.length > 0) {
    const described = selfLoops
      .map((loop) => `"${loop.script}" reads and writes "${loop.artifact}" via ${loop.accessor}`)
      .join("; ");
    throw new GraphBuildError(`Self-loop: ${described}`, ErrorCode.GRAPH_SELF_LOOP, { selfLoops });
  }

  const edges: GraphEdge[] = [...edgeAccessors.values()].map((edge) =>
    Object.freeze({
      script: edge.script,
      artifact: edge.artifact,
      direction: edge.direction,
      accessors: Object.freeze([...edge.accessors].sort(compareStrings)),
    })
  );

  const graph = new DependencyGraph({
    scripts: traces.keys(),
    artifacts: artifacts.values(),
    edges,
  });

  logger.info(
    {
      scripts: graph.scripts.length,
      artifacts: graph.artifacts.length,
      edges: graph.edges.length,
      records: recordCount,
    },
    "Dependency graph built"
  );

  return graph;
}
