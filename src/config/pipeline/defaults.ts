/**
 * Default pipeline configuration.
 *
 * Every section must succeed before a report is written; relax
 * `dispatch.minSuccessRatio` to accept reports with omitted sections.
 */

import type { PipelineConfig } from "./schema.js";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  model: {
    provider: "anthropic",
    model: "claude-3-5-sonnet-20241022",
    temperature: 0.1,
    maxTokens: 4096,
  },

  search: {
    provider: "tavily",
    maxContentLength: 2000,
  },

  gateway: {
    timeoutMs: 45_000,
    maxAttempts: 3,
    initialDelayMs: 1_000,
    maxDelayMs: 30_000,
    rateLimitMultiplier: 4,
    unavailableMaxAttempts: 2,
  },

  dispatch: {
    concurrencyLimit: 3,
    minSuccessRatio: 1,
  },

  stageTimeouts: {
    planningMs: 5 * 60_000,
    researchMs: 15 * 60_000,
    reportMs: 10 * 60_000,
  },

  limits: {
    maxSectionCount: 10,
    maxSearchDepth: 5,
    defaultSectionCount: 5,
    defaultSearchDepth: 3,
  },
};
