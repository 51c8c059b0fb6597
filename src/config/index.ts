/**
 * Application configuration.
 * Reads the environment into a typed, frozen AppConfig and derives the
 * pipeline configuration from it.
 */

import {
  ConfigError,
  maybeEnv,
  optionalEnv,
  optionalEnvBool,
  optionalEnvFloat,
  optionalEnvInt,
  type EnvSource,
} from "./env.js";
import {
  DEFAULT_PIPELINE_CONFIG,
  ModelProvider,
  SearchProvider,
  buildPipelineConfig,
  type PipelineConfig,
} from "./pipeline/index.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError, type EnvSource } from "./env.js";

export * from "./pipeline/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Application name */
  readonly appName: string;
  /** Directory holding persisted pipeline runs */
  readonly runDir: string;
  /** Text-generation provider name */
  readonly modelProvider: string;
  /** Provider model identifier */
  readonly modelName: string;
  readonly anthropicApiKey?: string;
  readonly openaiApiKey?: string;
  /** Web-search provider name */
  readonly searchProvider: string;
  readonly tavilyApiKey?: string;
  readonly gatewayTimeoutMs: number;
  readonly gatewayMaxAttempts: number;
  readonly sectionConcurrency: number;
  readonly researchStageTimeoutMs: number;
  readonly minSectionSuccessRatio: number;
}

/**
 * Load application configuration from the environment.
 * Fails fast on malformed numeric or boolean values.
 */
export function loadAppConfig(source: EnvSource = process.env): AppConfig {
  const defaults = DEFAULT_PIPELINE_CONFIG;
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development", source),
    debug: optionalEnvBool("DEBUG", false, source),
    logLevel: optionalEnv("LOG_LEVEL", "info", source),
    logDir: optionalEnv("LOG_DIR", "output/logs", source),
    appName: optionalEnv("APP_NAME", "report-pipeline", source),
    runDir: optionalEnv("RUN_DIR", "output/runs", source),
    modelProvider: optionalEnv("MODEL_PROVIDER", defaults.model.provider, source),
    modelName: optionalEnv("MODEL_NAME", defaults.model.model, source),
    anthropicApiKey: maybeEnv("ANTHROPIC_API_KEY", source),
    openaiApiKey: maybeEnv("OPENAI_API_KEY", source),
    searchProvider: optionalEnv("SEARCH_PROVIDER", defaults.search.provider, source),
    tavilyApiKey: maybeEnv("TAVILY_API_KEY", source),
    gatewayTimeoutMs: optionalEnvInt("GATEWAY_TIMEOUT_MS", defaults.gateway.timeoutMs, source),
    gatewayMaxAttempts: optionalEnvInt(
      "GATEWAY_MAX_ATTEMPTS",
      defaults.gateway.maxAttempts,
      source
    ),
    sectionConcurrency: optionalEnvInt(
      "SECTION_CONCURRENCY",
      defaults.dispatch.concurrencyLimit,
      source
    ),
    researchStageTimeoutMs: optionalEnvInt(
      "RESEARCH_STAGE_TIMEOUT_MS",
      defaults.stageTimeouts.researchMs,
      source
    ),
    minSectionSuccessRatio: optionalEnvFloat(
      "MIN_SECTION_SUCCESS_RATIO",
      defaults.dispatch.minSuccessRatio,
      source
    ),
  });
}

export function parseModelProvider(value: string): ModelProvider {
  const result = ModelProvider.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      `Invalid MODEL_PROVIDER: ${value}. Must be one of ${ModelProvider.options.join(", ")}.`
    );
  }
  return result.data;
}

export function parseSearchProvider(value: string): SearchProvider {
  const result = SearchProvider.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      `Invalid SEARCH_PROVIDER: ${value}. Must be one of ${SearchProvider.options.join(", ")}.`
    );
  }
  return result.data;
}

/**
 * Validate the application configuration.
 * Call this at start-up, before any run is accepted.
 */
export function validateAppConfig(config: AppConfig): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  parseModelProvider(config.modelProvider);
  parseSearchProvider(config.searchProvider);

  if (config.modelProvider === "anthropic" && !config.anthropicApiKey) {
    throw new ConfigError("ANTHROPIC_API_KEY is required when MODEL_PROVIDER=anthropic");
  }

  if (config.modelProvider === "openai" && !config.openaiApiKey) {
    throw new ConfigError("OPENAI_API_KEY is required when MODEL_PROVIDER=openai");
  }

  if (config.searchProvider === "tavily" && !config.tavilyApiKey) {
    throw new ConfigError("TAVILY_API_KEY is required when SEARCH_PROVIDER=tavily");
  }
}

/**
 * Resolve the configured log level, falling back to info.
 */
export function resolveLogLevel(config: AppConfig): LogLevel {
  if (config.debug) return "debug";
  return isLogLevel(config.logLevel) ? config.logLevel : "info";
}

/**
 * Derive the pipeline configuration from the environment-level settings.
 *
 * @throws PipelineConfigError when an override falls outside the schema
 */
export function pipelineConfigFromApp(config: AppConfig): Readonly<PipelineConfig> {
  return buildPipelineConfig({
    model: { provider: parseModelProvider(config.modelProvider), model: config.modelName },
    search: { provider: parseSearchProvider(config.searchProvider) },
    gateway: {
      timeoutMs: config.gatewayTimeoutMs,
      maxAttempts: config.gatewayMaxAttempts,
    },
    dispatch: {
      concurrencyLimit: config.sectionConcurrency,
      minSuccessRatio: config.minSectionSuccessRatio,
    },
    stageTimeouts: { researchMs: config.researchStageTimeoutMs },
  });
}
