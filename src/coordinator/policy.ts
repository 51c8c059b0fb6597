/**
 * Quorum policy for the research → report transition.
 */

import type { SectionOutcome } from "../run/index.js";

/** Tolerance for ratios such as 0.6 · 5 landing just above an integer */
const RATIO_EPSILON = 1e-9;

export interface QuorumResult {
  readonly satisfied: boolean;
  readonly succeeded: number;
  readonly required: number;
  /** Indexes of sections that failed or have no outcome */
  readonly missing: readonly number[];
}

/**
 * Sections needed to proceed: ceil(ratio · planned), never below one.
 */
export function requiredSections(planned: number, minSuccessRatio: number): number {
  return Math.max(1, Math.ceil(minSuccessRatio * planned - RATIO_EPSILON));
}

export function evaluateQuorum(
  planned: readonly { index: number }[],
  outcomes: readonly SectionOutcome[],
  minSuccessRatio: number
): QuorumResult {
  const succeededIndexes = new Set(
    outcomes.flatMap((o) => (o.status === "completed" ? [o.result.index] : []))
  );
  const missing = planned.map((s) => s.index).filter((i) => !succeededIndexes.has(i));
  const succeeded = planned.length - missing.length;
  const required = requiredSections(planned.length, minSuccessRatio);

  return { satisfied: succeeded >= required, succeeded, required, missing };
}
