/**
 * Execution Planner
 *
 * Orders scripts so that every producer runs before its consumers, for the
 * whole graph or for the upstream closure of one script or artifact. Among
 * scripts that are ready at the same time, names sort ascending, so a graph
 * always yields the same plan.
 *
 * @module
 */

import { compareStrings, createLogger, suggestNames } from "../../utils/index.js";
import { CyclicDependencyError, UnknownTargetError } from "../errors.js";
import type { DependencyGraph } from "../graph/index.js";
import { artifactKey } from "../locator/index.js";

const logger = createLogger("planner");

// =============================================================================
// Types
// =============================================================================

export const ALL_TARGET = "all";

export type PlanTarget =
  | { kind: "all" }
  | { kind: "script"; name: string }
  | { kind: "artifact"; key: string };

export interface ExecutionPlan {
  target: PlanTarget;
  /** Scripts in run order */
  scripts: string[];
  /**
   * Scripts grouped by depth: each group only depends on earlier groups and
   * can run concurrently
   */
  levels: string[][];
}

// =============================================================================
// Planner
// =============================================================================

export class ExecutionPlanner {
  private readonly cycles: string[][];

  constructor(private readonly graph: DependencyGraph) {
    this.cycles = graph.scriptCycles();
  }

  /**
   * Plans a target given as a structured value or as CLI text
   *
   * @throws UnknownTargetError if the script or artifact is not in the graph
   * @throws CyclicDependencyError if a cycle touches any script of the plan
   */
  plan(target: PlanTarget | string): ExecutionPlan {
    const resolved = typeof target === "string" ? resolveTarget(this.graph, target) : target;
    const members = this.membersOf(resolved);

    const touched = this.cycles.filter((cycle) => cycle.some((script) => members.has(script)));
    if (touched.length > 0) {
      logger.warn({ target: describeTarget(resolved), cycles: touched }, "Plan blocked by cycle");
      throw new CyclicDependencyError(touched);
    }

    const scripts = this.order(members);
    const plan: ExecutionPlan = { target: resolved, scripts, levels: this.levels(scripts) };

    logger.debug({ target: describeTarget(resolved), scripts }, "Execution plan computed");
    return plan;
  }

  /**
   * Scripts that must run before `script`: every script that transitively
   * produces something it consumes. The script itself is not included.
   */
  upstreamOf(script: string): Set<string> {
    const seen = new Set<string>();
    const pending = [...this.graph.predecessorsOf(script)];
    for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
      if (seen.has(next) || next === script) continue;
      seen.add(next);
      pending.push(...this.graph.predecessorsOf(next));
    }
    return seen;
  }

  private membersOf(target: PlanTarget): Set<string> {
    switch (target.kind) {
      case "all":
        return new Set(this.graph.scripts);
      case "script": {
        if (!this.graph.hasScript(target.name)) {
          throw new UnknownTargetError(target.name, suggestNames(target.name, this.graph.scripts));
        }
        return new Set([...this.upstreamOf(target.name), target.name]);
      }
      case "artifact": {
        if (!this.graph.hasArtifact(target.key)) {
          throw new UnknownTargetError(
            target.key,
            suggestNames(target.key, this.graph.artifacts.map(artifactKey))
          );
        }
        const members = new Set<string>();
        for (const producer of this.graph.writersOf(target.key)) {
          members.add(producer);
          this.upstreamOf(producer).forEach((script) => members.add(script));
        }
        return members;
      }
    }
  }

  /**
   * Kahn's algorithm over the members, always taking the smallest ready name
   */
  private order(members: ReadonlySet<string>): string[] {
    const waitingOn = new Map<string, number>();
    const ready: string[] = [];

    for (const script of members) {
      const count = this.graph.predecessorsOf(script).filter((p) => members.has(p)).length;
      waitingOn.set(script, count);
      if (count === 0) ready.push(script);
    }
    ready.sort(compareStrings);

    const ordered: string[] = [];
    for (let script = ready.shift(); script !== undefined; script = ready.shift()) {
      ordered.push(script);
      let released = false;
      for (const successor of this.graph.successorsOf(script)) {
        const count = waitingOn.get(successor);
        if (count === undefined) continue;
        waitingOn.set(successor, count - 1);
        if (count - 1 === 0) {
          ready.push(successor);
          released = true;
        }
      }
      if (released) ready.sort(compareStrings);
    }

    return ordered;
  }

  private levels(ordered: readonly string[]): string[][] {
    const members = new Set(ordered);
    const depth = new Map<string, number>();
    const levels: string[][] = [];

    // `ordered` is topological, so predecessors already have a depth
    for (const script of ordered) {
      const level = this.graph
        .predecessorsOf(script)
        .filter((p) => members.has(p))
        .reduce((max, p) => Math.max(max, (depth.get(p) ?? 0) + 1), 0);
      depth.set(script, level);
      (levels[level] ??= []).push(script);
    }

    return levels.map((level) => level.sort(compareStrings));
  }
}

// =============================================================================
// Target Parsing
// =============================================================================

/**
 * Parses a target string: "all", a script name, an artifact key
 * ("<category>/<name>"), or a bare artifact name that is unique across categories.
 *
 * @throws UnknownTargetError for unknown or ambiguous strings
 */
export function resolveTarget(graph: DependencyGraph, text: string): PlanTarget {
  const target = text.trim();
  if (target === ALL_TARGET) {
    return { kind: "all" };
  }
  if (graph.hasScript(target)) {
    return { kind: "script", name: target };
  }
  if (graph.hasArtifact(target)) {
    return { kind: "artifact", key: target };
  }

  const byName = graph.findArtifacts(target);
  const [only] = byName;
  if (byName.length === 1 && only) {
    return { kind: "artifact", key: artifactKey(only) };
  }
  if (byName.length > 1) {
    throw new UnknownTargetError(target, byName.map(artifactKey), "ambiguous");
  }

  const candidates = [
    ...graph.scripts,
    ...graph.artifacts.map(artifactKey),
  ];
  throw new UnknownTargetError(target, suggestNames(target, candidates));
}

export function describeTarget(target: PlanTarget): string {
  switch (target.kind) {
    case "all":
      return ALL_TARGET;
    case "script":
      return `script ${target.name}`;
    case "artifact":
      return `artifact ${target.key}`;
  }
}
