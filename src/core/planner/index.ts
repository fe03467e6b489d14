export {
  ALL_TARGET,
  ExecutionPlanner,
  describeTarget,
  resolveTarget,
  type ExecutionPlan,
  type PlanTarget,
} from "./execution-planner.js";
