/**
 * Pipeline configuration schema definition.
 *
 * The configuration is validated once, frozen, and handed to the gateway
 * and the coordinator at construction. Nothing reads it from a global, so
 * two coordinators in one process can run with different settings.
 */

import { z } from "zod";
import { ModelProvider, SearchProvider } from "./enums.js";

/**
 * Text-generation settings passed to the model collaborator on every call.
 */
export const ModelSettingsSchema = z
  .object({
    provider: ModelProvider.describe("Text-generation provider"),
    model: z.string().min(1).describe("Provider model identifier"),
    temperature: z
      .number()
      .min(0)
      .max(2)
      .describe("Sampling temperature"),
    maxTokens: z
      .number()
      .int()
      .min(1)
      .describe("Upper bound on generated tokens per call"),
  })
  .strict();

export type ModelSettings = z.infer<typeof ModelSettingsSchema>;

/**
 * Web-search settings.
 */
export const SearchSettingsSchema = z
  .object({
    provider: SearchProvider.describe("Web-search provider"),
    /** Snippet characters kept per hit when building synthesis prompts */
    maxContentLength: z
      .number()
      .int()
      .min(100)
      .describe("Maximum snippet length fed into section synthesis"),
  })
  .strict();

export type SearchSettings = z.infer<typeof SearchSettingsSchema>;

/**
 * Timeout, retry and backoff settings applied to every external call.
 */
export const GatewaySettingsSchema = z
  .object({
    timeoutMs: z.number().int().min(1).describe("Per-attempt timeout"),
    maxAttempts: z
      .number()
      .int()
      .min(1)
      .max(10)
      .describe("Total attempts per call, first attempt included"),
    initialDelayMs: z
      .number()
      .int()
      .min(0)
      .describe("Backoff before the first retry"),
    maxDelayMs: z.number().int().min(0).describe("Backoff ceiling"),
    rateLimitMultiplier: z
      .number()
      .min(1)
      .describe("Backoff multiplier applied after a RateLimited failure"),
    unavailableMaxAttempts: z
      .number()
      .int()
      .min(1)
      .describe("Attempt ceiling once a collaborator reports Unavailable"),
  })
  .strict()
  .refine((g) => g.maxDelayMs >= g.initialDelayMs, {
    message: "maxDelayMs must be greater than or equal to initialDelayMs",
    path: ["maxDelayMs"],
  });

export type GatewaySettings = z.infer<typeof GatewaySettingsSchema>;

/**
 * Section dispatch and quorum policy.
 */
export const DispatchSettingsSchema = z
  .object({
    concurrencyLimit: z
      .number()
      .int()
      .min(1)
      .describe("Maximum research sub-pipelines running at once"),
    /**
     * Fraction of planned sections that must succeed before Report runs.
     * 1 means every section is required.
     */
    minSuccessRatio: z
      .number()
      .gt(0)
      .max(1)
      .describe("Minimum fraction of successful sections"),
  })
  .strict();

export type DispatchSettings = z.infer<typeof DispatchSettingsSchema>;

/**
 * Overall deadline per stage.
 */
export const StageTimeoutsSchema = z
  .object({
    planningMs: z.number().int().min(1),
    researchMs: z.number().int().min(1),
    reportMs: z.number().int().min(1),
  })
  .strict();

export type StageTimeouts = z.infer<typeof StageTimeoutsSchema>;

/**
 * Bounds and defaults applied when a request is accepted.
 */
export const RequestLimitsSchema = z
  .object({
    maxSectionCount: z.number().int().min(1).max(50),
    maxSearchDepth: z.number().int().min(1).max(20),
    defaultSectionCount: z.number().int().min(1),
    defaultSearchDepth: z.number().int().min(1),
  })
  .strict()
  .refine((l) => l.defaultSectionCount <= l.maxSectionCount, {
    message: "defaultSectionCount exceeds maxSectionCount",
    path: ["defaultSectionCount"],
  })
  .refine((l) => l.defaultSearchDepth <= l.maxSearchDepth, {
    message: "defaultSearchDepth exceeds maxSearchDepth",
    path: ["defaultSearchDepth"],
  });

export type RequestLimits = z.infer<typeof RequestLimitsSchema>;

/**
 * Complete pipeline configuration schema.
 */
export const PipelineConfigSchema = z
  .object({
    model: ModelSettingsSchema,
    search: SearchSettingsSchema,
    gateway: GatewaySettingsSchema,
    dispatch: DispatchSettingsSchema,
    stageTimeouts: StageTimeoutsSchema,
    limits: RequestLimitsSchema,
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
