/**
 * Step definitions for stage graphs.
 *
 * A step reads the stage state and returns a patch for the fields it owns.
 * Branching steps name the next step explicitly; targets are restricted to
 * steps later in the graph, so every graph terminates.
 */

import type { ErrorKind } from "../types/index.js";
import { PipelineError } from "../types/index.js";

/** Fields a step may add to the state. */
export type StatePatch<S> = { readonly [K in keyof S]?: S[K] };

export type StepOutcome<S> =
  | { readonly kind: "continue"; readonly patch: StatePatch<S> }
  | { readonly kind: "branch"; readonly to: string; readonly patch: StatePatch<S> };

export interface Step<S, C> {
  readonly name: string;
  /** State fields this step is the single writer of */
  readonly writes: readonly (keyof S & string)[];
  /** Later steps this step may jump to */
  readonly branches?: readonly string[];
  run(state: Readonly<S>, context: C): Promise<StepOutcome<S>>;
}

/** Continue with the next step in order. */
export function advance<S>(patch: StatePatch<S>): StepOutcome<S> {
  return { kind: "continue", patch };
}

/** Jump forward to the named step. */
export function branchTo<S>(to: string, patch: StatePatch<S>): StepOutcome<S> {
  return { kind: "branch", to, patch };
}

/**
 * Classified failure raised by a step itself, e.g. a model answer that
 * cannot be parsed.
 */
export class StepError extends PipelineError {
  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind, message, options);
    this.name = "StepError";
  }
}
