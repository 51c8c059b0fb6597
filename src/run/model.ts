/**
 * Pure updates on run records. Every function returns a new record; the
 * coordinator persists whatever it gets back.
 */

import { PipelineError, type ErrorSummary } from "../types/errors.js";
import { canTransition, RunState, type StageName } from "../types/pipeline.js";
import {
  outcomeIndex,
  RUN_SCHEMA_VERSION,
  type FinalReport,
  type PipelineRun,
  type ResearchPlan,
  type ResearchRequest,
  type SectionOutcome,
} from "./schema.js";

export function createRun(
  id: string,
  request: ResearchRequest | null,
  topic: string,
  now: Date
): PipelineRun {
  const at = now.toISOString();
  return {
    schemaVersion: RUN_SCHEMA_VERSION,
    id,
    request,
    topic,
    state: RunState.Accepted,
    plan: null,
    sections: {},
    report: null,
    failure: null,
    history: [{ state: RunState.Accepted, at }],
    createdAt: at,
    updatedAt: at,
  };
}

/**
 * @throws PipelineError (Internal) on a transition the lifecycle forbids
 */
export function transition(run: PipelineRun, to: RunState, now: Date): PipelineRun {
  if (!canTransition(run.state, to)) {
    throw new PipelineError(
      "Internal",
      `Run ${run.id}: illegal transition ${run.state} -> ${to}`
    );
  }
  const at = now.toISOString();
  return {
    ...run,
    state: to,
    history: [...run.history, { state: to, at }],
    updatedAt: at,
  };
}

export function failRun(
  run: PipelineRun,
  stage: StageName,
  error: ErrorSummary,
  now: Date
): PipelineRun {
  const failed = transition(run, RunState.Failed, now);
  return {
    ...failed,
    failure: { stage, kind: error.kind, message: error.message, at: failed.updatedAt },
  };
}

export function withPlan(run: PipelineRun, plan: ResearchPlan, now: Date): PipelineRun {
  return { ...run, plan, updatedAt: now.toISOString() };
}

export function withReport(run: PipelineRun, report: FinalReport, now: Date): PipelineRun {
  return { ...run, report, updatedAt: now.toISOString() };
}

/**
 * Record a section outcome. An index that already has an outcome keeps it.
 */
export function withOutcome(
  run: PipelineRun,
  outcome: SectionOutcome,
  now: Date
): PipelineRun {
  const key = String(outcomeIndex(outcome));
  if (key in run.sections) return run;
  return {
    ...run,
    sections: { ...run.sections, [key]: outcome },
    updatedAt: now.toISOString(),
  };
}

/** Recorded outcomes in plan order. */
export function sectionOutcomes(run: PipelineRun): SectionOutcome[] {
  return Object.values(run.sections).sort((a, b) => outcomeIndex(a) - outcomeIndex(b));
}

export interface SectionProgress {
  planned: number;
  completed: number;
  failed: number;
  pending: number;
}

export function sectionProgress(run: PipelineRun): SectionProgress {
  const planned = run.plan?.sections.length ?? 0;
  const outcomes = Object.values(run.sections);
  const completed = outcomes.filter((o) => o.status === "completed").length;
  const failed = outcomes.length - completed;
  return { planned, completed, failed, pending: Math.max(planned - outcomes.length, 0) };
}
