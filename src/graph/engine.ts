/**
 * Stage graph engine.
 *
 * Runs a fixed list of steps strictly in order over one state record.
 * A step's patch is committed only after the step resolves and the patch
 * passes validation, so a failing step leaves no partial writes. State
 * fields are only ever added: a field written once is never rewritten.
 */

import { PipelineError, summarizeError, type ErrorKind } from "../types/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { StatePatch, Step, StepOutcome } from "./step.js";

/**
 * Runtime every step receives. Stage-specific contexts extend it.
 */
export interface StepRuntime {
  readonly logger?: Logger;
  /** Aborted when the stage deadline passes or the run is cancelled */
  readonly signal?: AbortSignal;
}

export class GraphDefinitionError extends Error {
  constructor(graph: string, message: string) {
    super(`Invalid stage graph "${graph}": ${message}`);
    this.name = "GraphDefinitionError";
  }
}

/**
 * Stage-level failure, attributed to the step that raised it.
 */
export class StageFailure extends PipelineError {
  public readonly graph: string;
  public readonly step: string | null;

  constructor(
    graph: string,
    step: string | null,
    kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(kind, message, options);
    this.name = "StageFailure";
    this.graph = graph;
    this.step = step;
  }
}

export interface StepTrace {
  readonly step: string;
  readonly durationMs: number;
  readonly outcome: "committed" | "failed";
}

export type StageResult<S> =
  | { readonly ok: true; readonly state: Readonly<S>; readonly trace: readonly StepTrace[] }
  | {
      readonly ok: false;
      readonly error: StageFailure;
      /** State as of the last committed step */
      readonly state: Readonly<S>;
      readonly trace: readonly StepTrace[];
    };

export class StageGraph<S extends object, C extends StepRuntime> {
  readonly name: string;
  private readonly steps: readonly Step<S, C>[];
  private readonly positions: ReadonlyMap<string, number>;

  constructor(name: string, steps: readonly Step<S, C>[]) {
    this.name = name;
    this.steps = steps;
    this.positions = validateSteps(name, steps);
  }

  /** Step names in execution order. */
  get stepNames(): string[] {
    return this.steps.map((s) => s.name);
  }

  /**
   * Execute the graph. Never rejects; failures are returned.
   */
  async run(initial: S, context: C): Promise<StageResult<S>> {
    const logger = (context.logger ?? createSilentLogger()).child({ graph: this.name });
    const trace: StepTrace[] = [];
    let state: Readonly<S> = Object.freeze({ ...initial });
    let index = 0;

    while (index < this.steps.length) {
      const step = this.steps[index];
      if (step === undefined) break;

      if (context.signal?.aborted) {
        const error = new StageFailure(
          this.name,
          step.name,
          "Timeout",
          `Stage "${this.name}" cancelled before step "${step.name}"`
        );
        return { ok: false, error, state, trace };
      }

      const started = Date.now();
      let outcome: StepOutcome<S>;
      try {
        outcome = await step.run(state, context);
        checkOutcome(step, state, outcome);
      } catch (err) {
        const summary = summarizeError(err);
        trace.push({ step: step.name, durationMs: Date.now() - started, outcome: "failed" });
        logger.warn("Step failed", { step: step.name, kind: summary.kind, error: summary.message });
        const error = new StageFailure(
          this.name,
          step.name,
          summary.kind,
          `Step "${step.name}" failed: ${summary.message}`,
          { cause: err }
        );
        return { ok: false, error, state, trace };
      }

      state = Object.freeze({ ...state, ...outcome.patch });
      trace.push({ step: step.name, durationMs: Date.now() - started, outcome: "committed" });
      logger.debug("Step committed", {
        step: step.name,
        fields: Object.keys(outcome.patch),
      });

      index = outcome.kind === "branch" ? this.positionOf(outcome.to) : index + 1;
    }

    return { ok: true, state, trace };
  }

  private positionOf(name: string): number {
    const position = this.positions.get(name);
    if (position === undefined) {
      throw new GraphDefinitionError(this.name, `unknown step "${name}"`);
    }
    return position;
  }
}

function validateSteps<S, C>(graph: string, steps: readonly Step<S, C>[]): Map<string, number> {
  if (steps.length === 0) {
    throw new GraphDefinitionError(graph, "a graph needs at least one step");
  }

  const positions = new Map<string, number>();
  steps.forEach((step, i) => {
    if (positions.has(step.name)) {
      throw new GraphDefinitionError(graph, `duplicate step name "${step.name}"`);
    }
    positions.set(step.name, i);
  });

  steps.forEach((step, i) => {
    for (const target of step.branches ?? []) {
      const position = positions.get(target);
      if (position === undefined) {
        throw new GraphDefinitionError(
          graph,
          `step "${step.name}" branches to unknown step "${target}"`
        );
      }
      if (position <= i) {
        throw new GraphDefinitionError(
          graph,
          `step "${step.name}" may only branch forward, not to "${target}"`
        );
      }
    }
  });

  return positions;
}

/**
 * Reject patches that write outside the step's fields, delete a field, or
 * overwrite a field an earlier step already wrote.
 */
function checkOutcome<S extends object, C>(
  step: Step<S, C>,
  state: Readonly<S>,
  outcome: StepOutcome<S>
): void {
  const owned = new Set<string>(step.writes);
  const patch: StatePatch<S> = outcome.patch;

  for (const key of Object.keys(patch)) {
    if (!owned.has(key)) {
      throw new PipelineError(
        "Internal",
        `step "${step.name}" wrote "${key}", which it does not own`
      );
    }
    if (Reflect.get(patch, key) === undefined) {
      throw new PipelineError("Internal", `step "${step.name}" cleared "${key}"`);
    }
    if (Reflect.get(state, key) !== undefined) {
      throw new PipelineError(
        "Internal",
        `step "${step.name}" rewrote "${key}", which is already set`
      );
    }
  }

  if (outcome.kind === "branch" && !(step.branches ?? []).includes(outcome.to)) {
    throw new PipelineError(
      "Internal",
      `step "${step.name}" branched to "${outcome.to}", which is not one of its branches`
    );
  }
}
