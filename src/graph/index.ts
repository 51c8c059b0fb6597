/**
 * Stage graph engine shared by the planning, research and report stages.
 */

export {
  StageGraph,
  StageFailure,
  GraphDefinitionError,
  type StageResult,
  type StepRuntime,
  type StepTrace,
} from "./engine.js";
export {
  advance,
  branchTo,
  StepError,
  type Step,
  type StepOutcome,
  type StatePatch,
} from "./step.js";
