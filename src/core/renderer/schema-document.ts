/**
 * Artifact schema document: one entry per registered accessor with the
 * location it resolves to and the scripts that create or use it in a traced graph.
 *
 * @module
 */

import type { ArtifactKind, Direction } from "../../types/index.js";
import type { DependencyGraph } from "../graph/index.js";
import { formatPath, type LocatorRegistry } from "../locator/index.js";
import { DEFAULT_SCENARIO } from "../tracer/index.js";

export interface AccessorSchema {
  filePath: string;
  category: string;
  nameTemplate: string;
  kind: ArtifactKind;
  direction: Direction;
  /** Scripts that write through this accessor */
  createdBy: string[];
  /** Scripts that read through this accessor */
  usedBy: string[];
}

export interface SchemaDocument {
  scenario: string;
  accessors: Record<string, AccessorSchema>;
}

export function buildSchemaDocument(
  registry: LocatorRegistry,
  graph: DependencyGraph,
  scenario: string = DEFAULT_SCENARIO
): SchemaDocument {
  const accessors: Record<string, AccessorSchema> = {};

  for (const accessor of registry.accessors()) {
    const through = graph.edges.filter((edge) => edge.accessors.includes(accessor.name));
    const scriptsFor = (direction: Direction) => [
      ...new Set(through.filter((edge) => edge.direction === direction).map((edge) => edge.script)),
    ];

    accessors[accessor.name] = {
      filePath: formatPath(accessor.artifact, scenario),
      category: accessor.artifact.category,
      nameTemplate: accessor.artifact.nameTemplate,
      kind: accessor.artifact.kind,
      direction: accessor.direction,
      createdBy: scriptsFor("write"),
      usedBy: scriptsFor("read"),
    };
  }

  return { scenario, accessors };
}
