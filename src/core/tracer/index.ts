/**
 * Call Tracer Module
 *
 * @module
 */

export {
  CallTracer,
  DEFAULT_SCENARIO,
  toTraceMap,
  type CallTracerOptions,
  type TraceAllOptions,
  type TraceProgressEvent,
  type TraceResult,
} from "./call-tracer.js";
