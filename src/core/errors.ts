/**
 * Error Classes for Artifact-Flow
 * Structured error handling with error codes
 */

import type { TraceRecord } from "../types/index.js";

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_NOT_FOUND = "E1001",
  CATALOG_INVALID = "E1002",

  // Locator errors (2xxx)
  LOCATOR_UNKNOWN_ACCESSOR = "E2000",
  LOCATOR_INVALID_REGISTRY = "E2001",

  // Trace errors (3xxx)
  TRACE_FAILED = "E3000",
  TRACE_CANCELLED = "E3001",
  TRACE_DUPLICATE_SCRIPT = "E3002",

  // Graph errors (4xxx)
  GRAPH_SELF_LOOP = "E4000",
  GRAPH_INCONSISTENT_ARTIFACT = "E4001",
  GRAPH_SCRIPT_MISMATCH = "E4002",
  GRAPH_PARSE_FAILED = "E4003",

  // Planner errors (5xxx)
  PLAN_CYCLIC_DEPENDENCY = "E5000",
  PLAN_UNKNOWN_TARGET = "E5001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all Artifact-Flow errors
 */
export class ArtifactFlowError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ArtifactFlowError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Create a formatted error message
   */
  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Invalid catalog or project configuration
 */
export class ConfigurationError extends ArtifactFlowError {
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { issues?: string[] }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.issues = context?.issues ?? [];
  }

  override toString(): string {
    if (this.issues.length === 0) return super.toString();
    return `${super.toString()}\n${this.issues.map((issue) => `  - ${issue}`).join("\n")}`;
  }
}

/**
 * Lookup of an accessor name that the registry does not know
 */
export class UnknownAccessorError extends ArtifactFlowError {
  public readonly accessor: string;
  public readonly suggestions: string[];

  constructor(accessor: string, suggestions: string[] = []) {
    const hint = suggestions.length > 0 ? ` (did you mean ${suggestions.join(", ")}?)` : "";
    super(`Unknown accessor "${accessor}"${hint}`, ErrorCode.LOCATOR_UNKNOWN_ACCESSOR, {
      accessor,
      suggestions,
    });
    this.name = "UnknownAccessorError";
    this.accessor = accessor;
    this.suggestions = suggestions;
  }
}

/**
 * A dry run that failed for a reason other than a missing file.
 * Carries the records collected before the failure.
 */
export class TraceFailureError extends ArtifactFlowError {
  public readonly script: string;
  public readonly partialTrace: readonly TraceRecord[];
  public readonly cancelled: boolean;
  public override readonly cause: unknown;

  constructor(
    script: string,
    partialTrace: readonly TraceRecord[],
    cause: unknown,
    options: { cancelled?: boolean } = {}
  ) {
    const cancelled = options.cancelled ?? false;
    const reason = cause instanceof Error ? cause.message : String(cause);
    const lastCall = partialTrace[partialTrace.length - 1];
    const where = lastCall
      ? ` after ${partialTrace.length} accessor call(s), last "${lastCall.accessor}"`
      : " before any accessor call";
    super(
      cancelled
        ? `Dry run of "${script}" was cancelled${where}`
        : `Dry run of "${script}" failed${where}: ${reason}`,
      cancelled ? ErrorCode.TRACE_CANCELLED : ErrorCode.TRACE_FAILED,
      { script, recordCount: partialTrace.length, reason }
    );
    this.name = "TraceFailureError";
    this.script = script;
    this.partialTrace = partialTrace;
    this.cancelled = cancelled;
    this.cause = cause;
  }
}

/**
 * Trace records that cannot be folded into a consistent graph
 */
export class GraphBuildError extends ArtifactFlowError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.GRAPH_INCONSISTENT_ARTIFACT,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "GraphBuildError";
  }
}

/**
 * The planner refuses to order scripts that depend on each other in a cycle
 */
export class CyclicDependencyError extends ArtifactFlowError {
  public readonly cycles: string[][];

  constructor(cycles: string[][]) {
    const described = cycles.map((cycle) => `{${cycle.join(", ")}}`).join("; ");
    super(
      `Cannot order scripts: cyclic dependency between ${described}. ` +
        "Break the cycle by removing one of the reads or writes that link these scripts.",
      ErrorCode.PLAN_CYCLIC_DEPENDENCY,
      { cycles }
    );
    this.name = "CyclicDependencyError";
    this.cycles = cycles;
  }
}

/**
 * Requested script or artifact is not part of the graph
 */
export class UnknownTargetError extends ArtifactFlowError {
  public readonly target: string;
  public readonly candidates: string[];

  constructor(target: string, candidates: string[] = [], reason: "unknown" | "ambiguous" = "unknown") {
    const message =
      reason === "ambiguous"
        ? `Target "${target}" is ambiguous; use one of: ${candidates.join(", ")}`
        : `Unknown target "${target}": no script or artifact with that name` +
          (candidates.length > 0 ? ` (did you mean ${candidates.join(", ")}?)` : "");
    super(message, ErrorCode.PLAN_UNKNOWN_TARGET, { target, candidates, reason });
    this.name = "UnknownTargetError";
    this.target = target;
    this.candidates = candidates;
  }
}

/**
 * Check if an error is an ArtifactFlowError
 */
export function isArtifactFlowError(error: unknown): error is ArtifactFlowError {
  return error instanceof ArtifactFlowError;
}

/**
 * Wrap an unknown error in an ArtifactFlowError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): ArtifactFlowError {
  if (isArtifactFlowError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ArtifactFlowError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new ArtifactFlowError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
