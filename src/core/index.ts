/**
 * Core module - Shared functionality between the CLI and library users
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./locator/index.js";
export * from "./tracer/index.js";
export * from "./graph/index.js";
export * from "./graph-builder/index.js";
export * from "./validator/index.js";
export * from "./planner/index.js";
export * from "./renderer/index.js";
export * from "./catalog/index.js";
export * from "./workflow.js";

// Re-export types
export * from "../types/index.js";
