/**
 * Graph Builder Module
 *
 * @module
 */

export { buildDependencyGraph, type TraceSet } from "./graph-builder.js";
