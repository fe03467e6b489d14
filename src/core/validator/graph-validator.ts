/**
 * Graph Validator
 *
 * Structural checks over a built dependency graph. Never throws: every problem
 * becomes a finding and the caller decides what is fatal. The planner treats
 * cycles as fatal; everything else is advisory.
 *
 * @module
 */

import { createLogger } from "../../utils/index.js";
import type { DependencyGraph } from "../graph/index.js";
import { ArtifactSelection, artifactKey } from "../locator/index.js";

const logger = createLogger("validator");

// =============================================================================
// Findings
// =============================================================================

export type FindingSeverity = "error" | "warning" | "info";

/**
 * Scripts that depend on each other through the artifacts they exchange
 */
export interface CycleFinding {
  type: "cycle";
  severity: "error";
  scripts: string[];
  artifacts: string[];
  message: string;
}

/**
 * Artifact that is read, never written, and not supplied from outside
 */
export interface OrphanInputFinding {
  type: "orphan-input";
  severity: "warning";
  artifact: string;
  readers: string[];
  message: string;
}

/**
 * Artifact listed as externally supplied that a script writes anyway
 */
export interface MisclassifiedExternalFinding {
  type: "misclassified-external";
  severity: "warning";
  artifact: string;
  writers: string[];
  message: string;
}

/**
 * Script without any write edge
 */
export interface NoOutputsFinding {
  type: "no-outputs";
  severity: "warning";
  script: string;
  message: string;
}

/**
 * Artifact that is written, never read, and not a published deliverable
 */
export interface DanglingOutputFinding {
  type: "dangling-output";
  severity: "info";
  artifact: string;
  writers: string[];
  message: string;
}

export type Finding =
  | CycleFinding
  | OrphanInputFinding
  | MisclassifiedExternalFinding
  | NoOutputsFinding
  | DanglingOutputFinding;

export type FindingType = Finding["type"];

export interface ValidationOptions {
  /** Artifacts supplied from outside the pipeline */
  externalArtifacts?: ArtifactSelection;
  /** Final deliverables nobody is expected to read */
  publishedOutputs?: ArtifactSelection;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Runs every check. Findings come back grouped (cycles, orphan inputs,
 * misclassified externals, scripts without outputs, dangling outputs); within
 * a group they follow the graph's artifact or script order.
 */
export function validateGraph(graph: DependencyGraph, options: ValidationOptions = {}): Finding[] {
  const external = options.externalArtifacts ?? new ArtifactSelection();
  const published = options.publishedOutputs ?? new ArtifactSelection();

  const cycles = graph.scriptCycles().map((scripts): CycleFinding => {
    const artifacts = graph.linkingArtifacts(scripts);
    return {
      type: "cycle",
      severity: "error",
      scripts,
      artifacts,
      message:
        `Scripts ${scripts.join(", ")} depend on each other through ${artifacts.join(", ")}`,
    };
  });

  const orphans: OrphanInputFinding[] = [];
  const misclassified: MisclassifiedExternalFinding[] = [];
  const dangling: DanglingOutputFinding[] = [];

  for (const artifact of graph.artifacts) {
    const key = artifactKey(artifact);
    const readers = graph.readersOf(key);
    const writers = graph.writersOf(key);
    const isExternal = external.has(artifact);

    if (readers.length > 0 && writers.length === 0 && !isExternal) {
      orphans.push({
        type: "orphan-input",
        severity: "warning",
        artifact: key,
        readers,
        message:
          `${key} is read by ${readers.join(", ")} but no script writes it ` +
          "and it is not listed as externally supplied",
      });
    }

    if (writers.length > 0 && isExternal) {
      misclassified.push({
        type: "misclassified-external",
        severity: "warning",
        artifact: key,
        writers,
        message: `${key} is listed as externally supplied but is written by ${writers.join(", ")}`,
      });
    }

    if (writers.length > 0 && readers.length === 0 && !published.has(artifact)) {
      dangling.push({
        type: "dangling-output",
        severity: "info",
        artifact: key,
        writers,
        message: `${key} is written by ${writers.join(", ")} but never read and not a published output`,
      });
    }
  }

  const noOutputs = graph.scripts
    .filter((script) => graph.outputsOf(script).length === 0)
    .map((script): NoOutputsFinding => ({
      type: "no-outputs",
      severity: "warning",
      script,
      message: `${script} does not write any artifact`,
    }));

  // graph.artifacts and graph.scripts are already in stable order
  const findings: Finding[] = [...cycles, ...orphans, ...misclassified, ...noOutputs, ...dangling];

  logger.info(summarizeFindings(findings), "Graph validated");
  return findings;
}

/**
 * Counts per severity
 */
export function summarizeFindings(findings: readonly Finding[]): Record<FindingSeverity, number> {
  const summary: Record<FindingSeverity, number> = { error: 0, warning: 0, info: 0 };
  for (const finding of findings) {
    summary[finding.severity]++;
  }
  return summary;
}

/**
 * Findings at or above a severity
 */
export function findingsAtLeast(
  findings: readonly Finding[],
  severity: FindingSeverity
): Finding[] {
  const rank: Record<FindingSeverity, number> = { info: 0, warning: 1, error: 2 };
  return findings.filter((finding) => rank[finding.severity] >= rank[severity]);
}
