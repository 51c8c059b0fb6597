/**
 * Error taxonomy shared by every pipeline component.
 */

import { z } from "zod";

/**
 * Classified error kinds.
 *
 * Transient, RateLimited, Unavailable and Timeout are retryable at the
 * gateway; the rest are terminal for the unit of work that raised them.
 */
export const ErrorKind = z.enum([
  "InvalidRequest",
  "Transient",
  "RateLimited",
  "InvalidInput",
  "Unavailable",
  "InsufficientSections",
  "Timeout",
  "InvalidOutput",
  "Internal",
]);
export type ErrorKind = z.infer<typeof ErrorKind>;

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  "Transient",
  "RateLimited",
  "Unavailable",
  "Timeout",
]);

export function isRetryableKind(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

/**
 * Base class for classified pipeline errors.
 */
export class PipelineError extends Error {
  public readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.kind = kind;
  }
}

/** Serializable error summary stored on runs and section outcomes. */
export const ErrorSummarySchema = z
  .object({
    kind: ErrorKind,
    message: z.string(),
  })
  .strict();

export type ErrorSummary = z.infer<typeof ErrorSummarySchema>;

/**
 * Summarize any thrown value. Unclassified values become `Internal`.
 */
export function summarizeError(err: unknown): ErrorSummary {
  if (err instanceof PipelineError) {
    return { kind: err.kind, message: err.message };
  }
  return {
    kind: "Internal",
    message: err instanceof Error ? err.message : String(err),
  };
}
