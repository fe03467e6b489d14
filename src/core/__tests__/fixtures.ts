/**
 * Test fixtures shared by the core tests
 */

import type { ArtifactKind, Direction, TraceRecord } from "../../types/index.js";
import type { AccessorDefinition } from "../locator/index.js";

export interface ScriptShape {
  reads?: string[];
  writes?: string[];
}

/**
 * Splits an artifact key at its last "/" into category and name template
 */
export function splitKey(key: string): { category: string; nameTemplate: string } {
  const slash = key.lastIndexOf("/");
  return { category: key.slice(0, slash), nameTemplate: key.slice(slash + 1) };
}

/**
 * Accessor name derived from an artifact's name template
 */
export function accessorFor(key: string): string {
  const { nameTemplate } = splitKey(key);
  return `get_${nameTemplate.replace(/[^A-Za-z0-9_.-]/g, "_")}`;
}

export function traceRecord(
  script: string,
  key: string,
  direction: Direction,
  sequence: number,
  options: { accessor?: string; kind?: ArtifactKind } = {}
): TraceRecord {
  return {
    script,
    accessor: options.accessor ?? accessorFor(key),
    artifact: { ...splitKey(key), kind: options.kind ?? "computed-result" },
    direction,
    sequence,
  };
}

/**
 * Trace set in which each script reads, then writes, the listed artifact keys
 */
export function tracesOf(shapes: Record<string, ScriptShape>): Map<string, TraceRecord[]> {
  const traces = new Map<string, TraceRecord[]>();
  for (const [script, shape] of Object.entries(shapes)) {
    const calls: Array<[string, Direction]> = [
      ...(shape.reads ?? []).map((key): [string, Direction] => [key, "read"]),
      ...(shape.writes ?? []).map((key): [string, Direction] => [key, "write"]),
    ];
    traces.set(
      script,
      calls.map(([key, direction], sequence) => traceRecord(script, key, direction, sequence))
    );
  }
  return traces;
}

export function accessorEntry(
  name: string,
  key: string,
  direction: Direction,
  kind: ArtifactKind = "computed-result"
): AccessorDefinition {
  return { name, ...splitKey(key), kind, direction };
}
