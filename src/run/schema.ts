/**
 * Run record schemas.
 *
 * A PipelineRun is the durable record of one request moving through
 * Planning, Research and Report. Every shape here is persisted, so each
 * is a zod schema and the TypeScript types are inferred from it.
 *
 * VERSIONING:
 * `schemaVersion` is checked on load; a record written by another
 * version is rejected rather than guessed at.
 */

import { z } from "zod";
import { ErrorKind, ErrorSummarySchema } from "../types/errors.js";
import { RunState, StageName } from "../types/pipeline.js";
import type { RequestLimits } from "../config/pipeline/schema.js";

export const RUN_SCHEMA_VERSION = 1;

// ═══════════════════════════════════════════════════════════════════════════
// Request
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Request validation for submission, bounded by the configured limits.
 * Omitted counts take the configured defaults.
 */
export function createRequestSchema(limits: RequestLimits) {
  return z
    .object({
      topic: z.string().trim().min(1, "topic must not be empty"),
      sectionCount: z
        .number()
        .int()
        .min(1)
        .max(limits.maxSectionCount)
        .default(limits.defaultSectionCount),
      searchDepth: z
        .number()
        .int()
        .min(1)
        .max(limits.maxSearchDepth)
        .default(limits.defaultSearchDepth),
    })
    .strict();
}

/** Stored form of an accepted request. */
export const ResearchRequestSchema = z
  .object({
    topic: z.string().min(1),
    sectionCount: z.number().int().positive(),
    searchDepth: z.number().int().positive(),
  })
  .strict();

export type ResearchRequest = z.infer<typeof ResearchRequestSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// Plan and sections
// ═══════════════════════════════════════════════════════════════════════════

export const SectionSpecSchema = z
  .object({
    /** Zero-based position in the plan; identity of the section */
    index: z.number().int().nonnegative(),
    title: z.string().min(1),
    questions: z.array(z.string()),
  })
  .strict();

export type SectionSpec = z.infer<typeof SectionSpecSchema>;

export const ResearchPlanSchema = z
  .object({
    topic: z.string().min(1),
    methodology: z.string(),
    sections: z.array(SectionSpecSchema).min(1),
  })
  .strict();

export type ResearchPlan = z.infer<typeof ResearchPlanSchema>;

export const SectionResultSchema = z
  .object({
    index: z.number().int().nonnegative(),
    title: z.string(),
    content: z.string(),
    sources: z.array(z.string()),
    queries: z.array(z.string()),
  })
  .strict();

export type SectionResult = z.infer<typeof SectionResultSchema>;

export const SectionOutcomeSchema = z.discriminatedUnion("status", [
  z
    .object({
      status: z.literal("completed"),
      result: SectionResultSchema,
    })
    .strict(),
  z
    .object({
      status: z.literal("failed"),
      index: z.number().int().nonnegative(),
      title: z.string(),
      error: ErrorSummarySchema,
    })
    .strict(),
]);

export type SectionOutcome = z.infer<typeof SectionOutcomeSchema>;

export function outcomeIndex(outcome: SectionOutcome): number {
  return outcome.status === "completed" ? outcome.result.index : outcome.index;
}

// ═══════════════════════════════════════════════════════════════════════════
// Report
// ═══════════════════════════════════════════════════════════════════════════

export const ReportSectionSchema = z
  .object({
    index: z.number().int().nonnegative(),
    title: z.string(),
    content: z.string(),
    sources: z.array(z.string()),
  })
  .strict();

export type ReportSection = z.infer<typeof ReportSectionSchema>;

export const OmittedSectionSchema = z
  .object({
    index: z.number().int().nonnegative(),
    title: z.string(),
    error: ErrorSummarySchema,
  })
  .strict();

export type OmittedSection = z.infer<typeof OmittedSectionSchema>;

export const SourceListSchema = z
  .object({
    web: z.array(z.string()),
    other: z.array(z.string()),
  })
  .strict();

export type SourceList = z.infer<typeof SourceListSchema>;

export const ReportMetadataSchema = z
  .object({
    sectionCount: z.number().int().nonnegative(),
    totalSources: z.number().int().nonnegative(),
    totalQueries: z.number().int().nonnegative(),
    wordCount: z.number().int().nonnegative(),
    generatedAt: z.string().datetime(),
  })
  .strict();

export type ReportMetadata = z.infer<typeof ReportMetadataSchema>;

export const FinalReportSchema = z
  .object({
    title: z.string(),
    executiveSummary: z.string().min(1),
    tableOfContents: z.array(z.string()),
    methodology: z.string(),
    sections: z.array(ReportSectionSchema),
    conclusion: z.string().min(1),
    sources: SourceListSchema,
    omittedSections: z.array(OmittedSectionSchema),
    metadata: ReportMetadataSchema,
    markdown: z.string(),
  })
  .strict();

export type FinalReport = z.infer<typeof FinalReportSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// Run envelope
// ═══════════════════════════════════════════════════════════════════════════

export const RunFailureSchema = z
  .object({
    stage: z.nativeEnum(StageName),
    kind: ErrorKind,
    message: z.string(),
    at: z.string().datetime(),
  })
  .strict();

export type RunFailure = z.infer<typeof RunFailureSchema>;

export const StateChangeSchema = z
  .object({
    state: z.nativeEnum(RunState),
    at: z.string().datetime(),
  })
  .strict();

export type StateChange = z.infer<typeof StateChangeSchema>;

export const PipelineRunSchema = z
  .object({
    schemaVersion: z.literal(RUN_SCHEMA_VERSION),
    id: z.string().min(1),
    /** Null only when the submitted request failed validation */
    request: ResearchRequestSchema.nullable(),
    /** Raw topic as submitted, kept for listing rejected runs */
    topic: z.string(),
    state: z.nativeEnum(RunState),
    plan: ResearchPlanSchema.nullable(),
    /** Outcomes keyed by section index */
    sections: z.record(z.string().regex(/^\d+$/), SectionOutcomeSchema),
    report: FinalReportSchema.nullable(),
    failure: RunFailureSchema.nullable(),
    history: z.array(StateChangeSchema),
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
  })
  .strict();

export type PipelineRun = z.infer<typeof PipelineRunSchema>;
