/**
 * Shared types for Artifact-Flow
 */

import type { CancellationToken } from "../utils/async.js";

// =============================================================================
// Artifacts & Accessors
// =============================================================================

/**
 * Kind of data product an artifact location holds
 */
export type ArtifactKind =
  | "weather"
  | "gis"
  | "spreadsheet-archetype"
  | "tabular-property"
  | "computed-result"
  | "json-metadata";

/**
 * Whether an accessor call is an input (read) or output (write) of the calling script
 */
export type Direction = "read" | "write";

/**
 * Logical data product. Identifies a location contract, never file content.
 */
export interface Artifact {
  /** Directory / namespace, e.g. "inputs/building-geometry" */
  readonly category: string;
  /** File name, may contain placeholders such as {BUILDING} or {NETWORK_TYPE} */
  readonly nameTemplate: string;
  readonly kind: ArtifactKind;
}

/**
 * Named function bound to one artifact and one registered direction
 */
export interface Accessor {
  readonly name: string;
  readonly artifact: Artifact;
  readonly direction: Direction;
}

// =============================================================================
// Trace Records
// =============================================================================

/**
 * One observed accessor invocation during a script's dry run
 */
export interface TraceRecord {
  readonly script: string;
  readonly accessor: string;
  readonly artifact: Artifact;
  readonly direction: Direction;
  /** 0-based position of the call within the dry run */
  readonly sequence: number;
}

// =============================================================================
// Scripts
// =============================================================================

/**
 * Parameters that shape the dry-run path a locator call returns
 */
export type LocatorParams = Readonly<Record<string, string>>;

/**
 * The path-resolving surface a script sees while it runs
 */
export interface Locator {
  /** Resolve using the accessor's registered direction */
  resolve(accessor: string, params?: LocatorParams): string;
  /** Resolve as an input of the calling script */
  read(accessor: string, params?: LocatorParams): string;
  /** Resolve as an output of the calling script */
  write(accessor: string, params?: LocatorParams): string;
}

export type ScriptRunner = (locator: Locator, token: CancellationToken) => void | Promise<void>;

/**
 * A script whose logic is an arbitrary function, observed under interception
 */
export interface RunnableScript {
  readonly kind: "runnable";
  readonly name: string;
  readonly description?: string;
  readonly run: ScriptRunner;
}

/**
 * One call of a declared script
 */
export interface DeclaredCall {
  readonly accessor: string;
  /** Overrides the accessor's registered direction */
  readonly direction?: Direction;
  /** Placeholder values, e.g. { building: "B001" } */
  readonly params?: LocatorParams;
}

/**
 * A script described by its ordered accessor calls (catalog manifests)
 */
export interface DeclaredScript {
  readonly kind: "declared";
  readonly name: string;
  readonly description?: string;
  readonly calls: readonly DeclaredCall[];
}

export type ScriptDefinition = RunnableScript | DeclaredScript;

// =============================================================================
// Catalog
// =============================================================================

/**
 * Matches a whole category, or one artifact when a name is given
 */
export interface ArtifactSelector {
  readonly category: string;
  readonly name?: string;
}
