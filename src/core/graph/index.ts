/**
 * Dependency Graph Module
 *
 * @module
 */

export {
  DependencyGraph,
  findStronglyConnectedComponents,
  type DependencyGraphInput,
  type GraphEdge,
  type PrecedenceEdge,
  type SerializedGraph,
} from "./dependency-graph.js";
