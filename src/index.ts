/**
 * Artifact-Flow
 *
 * Traces which data artifacts analysis scripts read and write, builds the
 * script/artifact dependency graph, validates it, plans execution orders and
 * renders the graph as Graphviz text.
 *
 * @module
 */

export * from "./core/index.js";
export type { Result } from "./types/result.js";
export { ok, err, isOk, isErr, unwrap } from "./types/result.js";
export { CancellationToken, CancellationTokenSource, CancelledError } from "./utils/async.js";
export { createLogger, setDefaultLogLevel, type LogLevel, type Logger } from "./utils/logger.js";
