export { PipelineCoordinator, type CoordinatorOptions } from "./coordinator.js";
export { RunBusyError } from "./errors.js";
export { evaluateQuorum, requiredSections, type QuorumResult } from "./policy.js";
