export {
  ResearchService,
  toStatus,
  type ResearchServiceOptions,
  type RunStatus,
  type Submission,
} from "./research-service.js";
export { createPipeline, type BootstrapOverrides, type PipelineComponents } from "./bootstrap.js";
