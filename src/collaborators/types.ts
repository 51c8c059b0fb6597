/**
 * Collaborator contracts consumed by the gateway.
 *
 * The pipeline treats text generation and web search as opaque remote
 * capabilities: each call returns a value or fails, and the gateway turns
 * failures into classified errors.
 */

import { z } from "zod";
import { PipelineError, type ErrorKind } from "../types/index.js";
import type { ModelSettings } from "../config/pipeline/index.js";

export const SearchHitSchema = z
  .object({
    title: z.string(),
    url: z.string(),
    snippet: z.string(),
  })
  .strict();

export type SearchHit = z.infer<typeof SearchHitSchema>;

export interface TextGenerator {
  /** Adapter name used in logs */
  readonly name: string;
  generate(prompt: string, model: ModelSettings, signal: AbortSignal): Promise<string>;
}

export interface WebSearcher {
  /** Adapter name used in logs */
  readonly name: string;
  search(query: string, maxResults: number, signal: AbortSignal): Promise<SearchHit[]>;
}

export interface Collaborators {
  readonly generator: TextGenerator;
  readonly searcher: WebSearcher;
}

/**
 * Failure raised by a collaborator adapter that already knows its kind.
 */
export class CollaboratorError extends PipelineError {
  public readonly collaborator: string;

  constructor(
    collaborator: string,
    kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(kind, message, options);
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
  }
}
