/**
 * Call Tracer
 *
 * Dry-runs scripts against an intercepting locator and records every accessor
 * call in invocation order. Each dry run owns its records; nothing is shared
 * between runs except the read-only registry, so runs can proceed concurrently.
 *
 * @module
 */

import * as os from "node:os";
import type {
  DeclaredScript,
  Direction,
  Locator,
  LocatorParams,
  ScriptDefinition,
  ScriptRunner,
  TraceRecord,
} from "../../types/index.js";
import {
  CancellationToken,
  CancellationTokenSource,
  CancelledError,
  settleConcurrent,
} from "../../utils/async.js";
import { createLogger, isMissingFileError } from "../../utils/index.js";
import { ConfigurationError, ErrorCode, TraceFailureError } from "../errors.js";
import { formatPath, type LocatorRegistry } from "../locator/index.js";

const logger = createLogger("tracer");

export const DEFAULT_SCENARIO = "{SCENARIO}";

/**
 * Outcome of one dry run
 */
export interface TraceResult {
  script: string;
  records: readonly TraceRecord[];
  /** False when the script stopped early on a missing file */
  complete: boolean;
  durationMs: number;
}

export interface CallTracerOptions {
  /** Root segment of the paths handed to scripts */
  scenario?: string;
}

export interface TraceProgressEvent {
  script: string;
  completed: number;
  total: number;
  recordCount: number;
}

export interface TraceAllOptions {
  /** Dry runs in flight at once; available cores by default */
  concurrency?: number;
  token?: CancellationToken;
  onProgress?: (event: TraceProgressEvent) => void;
}

export class CallTracer {
  private readonly scenario: string;

  constructor(
    private readonly registry: LocatorRegistry,
    options: CallTracerOptions = {}
  ) {
    this.scenario = options.scenario ?? DEFAULT_SCENARIO;
  }

  /**
   * Runs `run` with an intercepting locator and returns the calls it made.
   *
   * @throws TraceFailureError with the partial trace when the run fails for a
   *   reason other than a missing file, or is cancelled
   */
  async trace(
    script: string,
    run: ScriptRunner,
    token: CancellationToken = CancellationToken.none
  ): Promise<TraceResult> {
    const records: TraceRecord[] = [];
    const startedAt = Date.now();
    let open = true;

    const intercept = (
      accessorName: string,
      direction: Direction | undefined,
      params: LocatorParams | undefined
    ): string => {
      if (!open) {
        throw new Error(`Locator of "${script}" used after its dry run ended`);
      }
      token.throwIfCancelled();
      const accessor = this.registry.resolve(accessorName);
      records.push(
        Object.freeze({
          script,
          accessor: accessor.name,
          artifact: accessor.artifact,
          direction: direction ?? accessor.direction,
          sequence: records.length,
        })
      );
      return formatPath(accessor.artifact, this.scenario, params);
    };

    const locator: Locator = Object.freeze({
      resolve: (name: string, params?: LocatorParams) => intercept(name, undefined, params),
      read: (name: string, params?: LocatorParams) => intercept(name, "read", params),
      write: (name: string, params?: LocatorParams) => intercept(name, "write", params),
    });

    logger.debug({ script }, "Dry run started");
    try {
      token.throwIfCancelled();
      await run(locator, token);
    } catch (error) {
      const partial = Object.freeze(records.slice());
      if (error instanceof CancelledError || token.cancelled) {
        logger.debug({ script, records: partial.length }, "Dry run cancelled");
        throw new TraceFailureError(script, partial, error, { cancelled: true });
      }
      if (isMissingFileError(error)) {
        logger.warn(
          { script, records: partial.length, path: error.path },
          "Dry run stopped on a missing file; trace is incomplete"
        );
        return { script, records: partial, complete: false, durationMs: Date.now() - startedAt };
      }
      logger.error({ script, records: partial.length, err: error }, "Dry run failed");
      throw new TraceFailureError(script, partial, error);
    } finally {
      open = false;
    }

    const durationMs = Date.now() - startedAt;
    logger.debug({ script, records: records.length, durationMs }, "Dry run finished");
    return { script, records: Object.freeze(records.slice()), complete: true, durationMs };
  }

  /**
   * Dry-runs any script variant
   */
  traceScript(
    definition: ScriptDefinition,
    token: CancellationToken = CancellationToken.none
  ): Promise<TraceResult> {
    switch (definition.kind) {
      case "runnable":
        return this.trace(definition.name, definition.run, token);
      case "declared":
        return this.trace(definition.name, replayCalls(definition), token);
    }
  }

  /**
   * Dry-runs every script with bounded concurrency and waits for all of them.
   * The first failure cancels the runs still in flight and is rethrown once
   * every run has settled.
   *
   * @returns Results keyed by script name, in input order
   */
  async traceAll(
    definitions: readonly ScriptDefinition[],
    options: TraceAllOptions = {}
  ): Promise<Map<string, TraceResult>> {
    assertUniqueNames(definitions);

    const concurrency = options.concurrency ?? os.availableParallelism();
    const source = new CancellationTokenSource(options.token);
    let completed = 0;

    logger.info({ scripts: definitions.length, concurrency }, "Tracing scripts");

    const settled = await settleConcurrent(
      definitions,
      async (definition) => {
        try {
          const result = await this.traceScript(definition, source.token);
          completed++;
          options.onProgress?.({
            script: definition.name,
            completed,
            total: definitions.length,
            recordCount: result.records.length,
          });
          return result;
        } catch (error) {
          source.cancel(`dry run of "${definition.name}" failed`);
          throw error;
        }
      },
      concurrency
    );
    source.dispose();

    const failures: unknown[] = [];
    const results = new Map<string, TraceResult>();
    for (const outcome of settled) {
      if (outcome.status === "fulfilled") {
        results.set(outcome.value.script, outcome.value);
      } else {
        failures.push(outcome.reason);
      }
    }

    if (failures.length > 0) {
      const primary =
        failures.find((error) => !(error instanceof TraceFailureError && error.cancelled)) ??
        failures[0];
      throw primary;
    }

    logger.info(
      {
        scripts: results.size,
        records: [...results.values()].reduce((sum, r) => sum + r.records.length, 0),
      },
      "All dry runs finished"
    );
    return results;
  }
}

/**
 * Runner that replays a declared script's calls through the locator
 */
function replayCalls(definition: DeclaredScript): ScriptRunner {
  return (locator, token) => {
    for (const call of definition.calls) {
      token.throwIfCancelled();
      const params: LocatorParams = call.params ?? {};
      switch (call.direction) {
        case "read":
          locator.read(call.accessor, params);
          break;
        case "write":
          locator.write(call.accessor, params);
          break;
        case undefined:
          locator.resolve(call.accessor, params);
          break;
      }
    }
  };
}

function assertUniqueNames(definitions: readonly ScriptDefinition[]): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const definition of definitions) {
    if (seen.has(definition.name)) duplicates.add(definition.name);
    seen.add(definition.name);
  }
  if (duplicates.size > 0) {
    throw new ConfigurationError(
      `Script names must be unique: ${[...duplicates].join(", ")}`,
      ErrorCode.TRACE_DUPLICATE_SCRIPT,
      { duplicates: [...duplicates] }
    );
  }
}

/**
 * Reduces tracer results to the per-script record sequences the graph builder folds
 */
export function toTraceMap(
  results: ReadonlyMap<string, TraceResult>
): Map<string, readonly TraceRecord[]> {
  const traces = new Map<string, readonly TraceRecord[]>();
  for (const [script, result] of results) {
    traces.set(script, result.records);
  }
  return traces;
}
