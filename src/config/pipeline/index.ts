/**
 * Pipeline configuration module.
 *
 * Provides schema-validated, immutable configuration for the gateway,
 * the section dispatcher and the coordinator.
 *
 * Usage:
 *   import { buildPipelineConfig } from "./config/pipeline/index.js";
 *
 *   // Defaults
 *   const config = buildPipelineConfig();
 *
 *   // Best-effort reports: accept two thirds of the sections
 *   const relaxed = buildPipelineConfig({ dispatch: { minSuccessRatio: 0.66 } });
 */

export { ModelProvider, SearchProvider } from "./enums.js";

export type {
  PipelineConfig,
  ModelSettings,
  SearchSettings,
  GatewaySettings,
  DispatchSettings,
  StageTimeouts,
  RequestLimits,
} from "./schema.js";

export {
  PipelineConfigSchema,
  ModelSettingsSchema,
  SearchSettingsSchema,
  GatewaySettingsSchema,
  DispatchSettingsSchema,
  StageTimeoutsSchema,
  RequestLimitsSchema,
} from "./schema.js";

export {
  loadPipelineConfig,
  validatePipelineConfig,
  buildPipelineConfig,
  deepFreeze,
  formatZodIssues,
  PipelineConfigError,
  type ConfigValidationIssue,
  type PipelineConfigOverrides,
} from "./loader.js";

export { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
