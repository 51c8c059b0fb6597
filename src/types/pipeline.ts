/**
 * Run lifecycle and stage definitions.
 * A run moves through the stages in order; `Failed` is absorbing.
 */

export enum RunState {
  Accepted = "accepted",
  Planning = "planning",
  Research = "research",
  Report = "report",
  Completed = "completed",
  Failed = "failed",
}

/** Stage a failure is attributed to. `accepted` covers request validation. */
export enum StageName {
  Accepted = "accepted",
  Planning = "planning",
  Research = "research",
  Report = "report",
}

export const TERMINAL_STATES: ReadonlySet<RunState> = new Set([
  RunState.Completed,
  RunState.Failed,
]);

export function isTerminal(state: RunState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Legal forward transitions. Any non-terminal state may also move to Failed.
 */
const NEXT_STATE: Readonly<Partial<Record<RunState, RunState>>> = {
  [RunState.Accepted]: RunState.Planning,
  [RunState.Planning]: RunState.Research,
  [RunState.Research]: RunState.Report,
  [RunState.Report]: RunState.Completed,
};

export function canTransition(from: RunState, to: RunState): boolean {
  if (isTerminal(from)) return false;
  if (to === RunState.Failed) return true;
  return NEXT_STATE[from] === to;
}

/** Stage that runs while the pipeline sits in the given state. */
export function stageForState(state: RunState): StageName | null {
  switch (state) {
    case RunState.Accepted:
      return StageName.Accepted;
    case RunState.Planning:
      return StageName.Planning;
    case RunState.Research:
      return StageName.Research;
    case RunState.Report:
      return StageName.Report;
    case RunState.Completed:
    case RunState.Failed:
      return null;
  }
}
