/**
 * Graph Validator Module
 *
 * @module
 */

export {
  findingsAtLeast,
  summarizeFindings,
  validateGraph,
  type CycleFinding,
  type DanglingOutputFinding,
  type Finding,
  type FindingSeverity,
  type FindingType,
  type MisclassifiedExternalFinding,
  type NoOutputsFinding,
  type OrphanInputFinding,
  type ValidationOptions,
} from "./graph-validator.js";
