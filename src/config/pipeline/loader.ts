/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Validating configuration against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration so a run cannot change it mid-flight
 */

import type { ZodIssue } from "zod";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";

/**
 * Structured validation error for pipeline configuration.
 */
export class PipelineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Pipeline configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

/**
 * Validate and load pipeline configuration.
 *
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(input: unknown): Readonly<PipelineConfig> {
  const result = PipelineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate pipeline configuration without loading.
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = PipelineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Partial overrides, one level deep per section.
 */
export type PipelineConfigOverrides = {
  readonly [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>;
};

/**
 * Merge section-level overrides onto a base configuration and load the
 * result. The base defaults to DEFAULT_PIPELINE_CONFIG.
 */
export function buildPipelineConfig(
  overrides: PipelineConfigOverrides = {},
  base: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): Readonly<PipelineConfig> {
  return loadPipelineConfig({
    model: { ...base.model, ...overrides.model },
    search: { ...base.search, ...overrides.search },
    gateway: { ...base.gateway, ...overrides.gateway },
    dispatch: { ...base.dispatch, ...overrides.dispatch },
    stageTimeouts: { ...base.stageTimeouts, ...overrides.stageTimeouts },
    limits: { ...base.limits, ...overrides.limits },
  });
}
