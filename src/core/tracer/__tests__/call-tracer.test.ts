/**
 * Call Tracer Tests
 *
 * Covers:
 * - Record order, duplicates and returned paths
 * - Direction overrides at the call site
 * - Partial traces on failure, missing files and cancellation
 * - traceAll concurrency limit, fail-fast cancellation and barrier
 */

import { describe, it, expect, vi } from "vitest";
import type { Locator, ScriptDefinition, ScriptRunner } from "../../../types/index.js";
import { CancellationTokenSource, sleep } from "../../../utils/async.js";
import {
  ConfigurationError,
  ErrorCode,
  TraceFailureError,
  UnknownAccessorError,
} from "../../errors.js";
import { LocatorRegistry } from "../../locator/index.js";
import { CallTracer, toTraceMap } from "../index.js";
import { accessorEntry } from "../../__tests__/fixtures.js";

function createRegistry(): LocatorRegistry {
  return LocatorRegistry.fromEntries([
    accessorEntry("get_weather", "databases/weather/weather.epw", "read", "weather"),
    accessorEntry("get_radiation_building", "outputs/data/solar-radiation/{BUILDING}_insolation_Whm2.json", "write", "json-metadata"),
    accessorEntry("get_total_demand", "outputs/data/demand/Total_demand.csv", "write"),
  ]);
}

function missingFile(path: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), {
    code: "ENOENT",
    path,
  });
}

// =============================================================================
// Single dry run
// =============================================================================

describe("CallTracer.trace", () => {
  it("should record every call in invocation order, duplicates included", async () => {
    const tracer = new CallTracer(createRegistry());

    const result = await tracer.trace("demand", (locator) => {
      locator.resolve("get_weather");
      locator.resolve("get_total_demand");
      locator.resolve("get_weather");
    });

    expect(result.complete).toBe(true);
    expect(result.records.map((r) => [r.sequence, r.accessor, r.direction])).toEqual([
      [0, "get_weather", "read"],
      [1, "get_total_demand", "write"],
      [2, "get_weather", "read"],
    ]);
    expect(result.records.every((r) => r.script === "demand")).toBe(true);
  });

  it("should return dry-run paths under the scenario root", async () => {
    const tracer = new CallTracer(createRegistry(), { scenario: "/tmp/scenario" });
    const paths: string[] = [];

    await tracer.trace("radiation", (locator) => {
      paths.push(locator.resolve("get_weather"));
      paths.push(locator.write("get_radiation_building", { building: "B002" }));
      paths.push(locator.write("get_radiation_building"));
    });

    expect(paths).toEqual([
      "/tmp/scenario/databases/weather/weather.epw",
      "/tmp/scenario/outputs/data/solar-radiation/B002_insolation_Whm2.json",
      "/tmp/scenario/outputs/data/solar-radiation/{BUILDING}_insolation_Whm2.json",
    ]);
  });

  it("should let read and write override the registered direction", async () => {
    const tracer = new CallTracer(createRegistry());

    const result = await tracer.trace("solar-collector", (locator) => {
      locator.read("get_radiation_building");
      locator.write("get_weather");
    });

    expect(result.records.map((r) => r.direction)).toEqual(["read", "write"]);
  });

  it("should await asynchronous scripts", async () => {
    const tracer = new CallTracer(createRegistry());

    const result = await tracer.trace("demand", async (locator) => {
      locator.read("get_weather");
      await sleep(5);
      locator.write("get_total_demand");
    });

    expect(result.records).toHaveLength(2);
  });

  it("should attach the partial trace to failures", async () => {
    const tracer = new CallTracer(createRegistry());

    const failure = await tracer
      .trace("demand", (locator) => {
        locator.read("get_weather");
        throw new Error("division by zero");
      })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TraceFailureError);
    if (failure instanceof TraceFailureError) {
      expect(failure.script).toBe("demand");
      expect(failure.cancelled).toBe(false);
      expect(failure.code).toBe(ErrorCode.TRACE_FAILED);
      expect(failure.partialTrace.map((r) => r.accessor)).toEqual(["get_weather"]);
      expect(failure.message).toBe(
        'Dry run of "demand" failed after 1 accessor call(s), last "get_weather": division by zero'
      );
    }
  });

  it("should report unknown accessors as the failure cause", async () => {
    const tracer = new CallTracer(createRegistry());

    const failure = await tracer
      .trace("demand", (locator) => {
        locator.read("get_wheather");
      })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TraceFailureError);
    if (failure instanceof TraceFailureError) {
      expect(failure.cause).toBeInstanceOf(UnknownAccessorError);
      expect(failure.partialTrace).toEqual([]);
      expect(failure.message).toBe(
        'Dry run of "demand" failed before any accessor call: Unknown accessor "get_wheather"'
      );
    }
  });

  it("should end with an incomplete trace on a missing file", async () => {
    const tracer = new CallTracer(createRegistry());

    const result = await tracer.trace("demand", (locator) => {
      const weather = locator.read("get_weather");
      throw missingFile(weather);
    });

    expect(result.complete).toBe(false);
    expect(result.records.map((r) => r.accessor)).toEqual(["get_weather"]);
  });

  it("should abort a cancelled dry run at the next accessor call", async () => {
    const tracer = new CallTracer(createRegistry());
    const source = new CancellationTokenSource();

    const failure = await tracer
      .trace(
        "demand",
        (locator) => {
          locator.read("get_weather");
          source.cancel("stopped by user");
          locator.write("get_total_demand");
        },
        source.token
      )
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TraceFailureError);
    if (failure instanceof TraceFailureError) {
      expect(failure.cancelled).toBe(true);
      expect(failure.code).toBe(ErrorCode.TRACE_CANCELLED);
      expect(failure.partialTrace).toHaveLength(1);
      expect(failure.message).toBe(
        'Dry run of "demand" was cancelled after 1 accessor call(s), last "get_weather"'
      );
    }
  });

  it("should not start a script whose token is already cancelled", async () => {
    const tracer = new CallTracer(createRegistry());
    const source = new CancellationTokenSource();
    source.cancel();
    const run = vi.fn();

    await expect(tracer.trace("demand", run, source.token)).rejects.toBeInstanceOf(TraceFailureError);
    expect(run).not.toHaveBeenCalled();
  });

  it("should refuse locator calls after the dry run ended", async () => {
    const tracer = new CallTracer(createRegistry());
    let leaked: Locator | undefined;

    const result = await tracer.trace("demand", (locator) => {
      leaked = locator;
      locator.read("get_weather");
    });

    expect(() => leaked?.read("get_weather")).toThrow(
      'Locator of "demand" used after its dry run ended'
    );
    expect(result.records).toHaveLength(1);
  });

  it("should keep records of separate runs apart", async () => {
    const tracer = new CallTracer(createRegistry());

    const [first, second] = await Promise.all([
      tracer.trace("a", async (locator) => {
        await sleep(5);
        locator.read("get_weather");
      }),
      tracer.trace("b", (locator) => {
        locator.write("get_total_demand");
      }),
    ]);

    expect(first.records.map((r) => [r.script, r.accessor])).toEqual([["a", "get_weather"]]);
    expect(second.records.map((r) => [r.script, r.accessor])).toEqual([["b", "get_total_demand"]]);
  });
});

// =============================================================================
// Script variants
// =============================================================================

describe("CallTracer.traceScript", () => {
  it("should replay declared calls through the locator", async () => {
    const tracer = new CallTracer(createRegistry());

    const result = await tracer.traceScript({
      kind: "declared",
      name: "solar-collector",
      calls: [
        { accessor: "get_weather" },
        { accessor: "get_radiation_building", direction: "read", params: { building: "B001" } },
        { accessor: "get_total_demand" },
      ],
    });

    expect(result.records.map((r) => [r.accessor, r.direction])).toEqual([
      ["get_weather", "read"],
      ["get_radiation_building", "read"],
      ["get_total_demand", "write"],
    ]);
  });
});

// =============================================================================
// Tracing many scripts
// =============================================================================

describe("CallTracer.traceAll", () => {
  const runnable = (name: string, run: ScriptRunner): ScriptDefinition => ({
    kind: "runnable",
    name,
    run,
  });

  it("should return results in input order", async () => {
    const tracer = new CallTracer(createRegistry());

    const results = await tracer.traceAll(
      [
        runnable("slow", async (locator) => {
          await sleep(10);
          locator.read("get_weather");
        }),
        runnable("fast", (locator) => {
          locator.write("get_total_demand");
        }),
      ],
      { concurrency: 2 }
    );

    expect([...results.keys()]).toEqual(["slow", "fast"]);
    expect(toTraceMap(results).get("slow")?.map((r) => r.accessor)).toEqual(["get_weather"]);
  });

  it("should keep at most `concurrency` dry runs in flight", async () => {
    const tracer = new CallTracer(createRegistry());
    let inFlight = 0;
    let peak = 0;
    const script = (name: string) =>
      runnable(name, async (locator) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await sleep(5);
        locator.read("get_weather");
        inFlight--;
      });

    const progress: number[] = [];
    await tracer.traceAll([script("a"), script("b"), script("c"), script("d")], {
      concurrency: 2,
      onProgress: (event) => progress.push(event.completed),
    });

    expect(peak).toBe(2);
    expect(progress).toEqual([1, 2, 3, 4]);
  });

  it("should cancel the other runs after a failure and rethrow it", async () => {
    const tracer = new CallTracer(createRegistry());
    const later = vi.fn();

    const failure = await tracer
      .traceAll(
        [
          runnable("broken", () => {
            throw new Error("bad input");
          }),
          runnable("waiting", async (locator) => {
            await sleep(10);
            locator.read("get_weather");
          }),
          runnable("queued", later),
        ],
        { concurrency: 2 }
      )
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TraceFailureError);
    if (failure instanceof TraceFailureError) {
      expect(failure.script).toBe("broken");
      expect(failure.cancelled).toBe(false);
    }
    expect(later).not.toHaveBeenCalled();
  });

  it("should stop when the caller's token is cancelled", async () => {
    const tracer = new CallTracer(createRegistry());
    const source = new CancellationTokenSource();
    source.cancel("shutdown");

    const failure = await tracer
      .traceAll([runnable("demand", (locator) => void locator.read("get_weather"))], {
        token: source.token,
      })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TraceFailureError);
    if (failure instanceof TraceFailureError) {
      expect(failure.cancelled).toBe(true);
    }
  });

  it("should reject duplicate script names", async () => {
    const tracer = new CallTracer(createRegistry());

    const failure = await tracer
      .traceAll([
        runnable("demand", () => {}),
        runnable("demand", () => {}),
      ])
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ConfigurationError);
    if (failure instanceof ConfigurationError) {
      expect(failure.code).toBe(ErrorCode.TRACE_DUPLICATE_SCRIPT);
      expect(failure.message).toBe("Script names must be unique: demand");
    }
  });
});
