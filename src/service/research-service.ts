/**
 * Run submission and query service.
 *
 * `submit` persists the run and returns at once; the run is driven in the
 * background. Status always comes from the store, so a run driven by an
 * earlier process reads the same as one driven by this one.
 */

import { createSilentLogger, type Logger } from "../logging/index.js";
import { isTerminal, type RunState } from "../types/index.js";
import type { PipelineCoordinator } from "../coordinator/index.js";
import { RunStoreError, type RunStore } from "../store/index.js";
import {
  sectionProgress,
  type FinalReport,
  type PipelineRun,
  type RunFailure,
  type SectionProgress,
} from "../run/index.js";

export interface Submission {
  readonly runId: string;
  readonly state: RunState;
}

export interface RunStatus {
  readonly runId: string;
  readonly topic: string;
  readonly state: RunState;
  readonly failure: RunFailure | null;
  readonly progress: SectionProgress;
  /** Present only once the run has completed */
  readonly report: FinalReport | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export function toStatus(run: Readonly<PipelineRun>): RunStatus {
  return {
    runId: run.id,
    topic: run.topic,
    state: run.state,
    failure: run.failure,
    progress: sectionProgress(run),
    report: run.report,
    createdAt: run.createdAt,
    updatedAt: run.updatedAt,
  };
}

export interface ResearchServiceOptions {
  readonly coordinator: PipelineCoordinator;
  readonly store: RunStore;
  readonly logger?: Logger;
}

export class ResearchService {
  private readonly coordinator: PipelineCoordinator;
  private readonly store: RunStore;
  private readonly logger: Logger;
  private readonly inflight = new Map<string, Promise<Readonly<PipelineRun>>>();

  constructor(options: ResearchServiceOptions) {
    this.coordinator = options.coordinator;
    this.store = options.store;
    this.logger = options.logger ?? createSilentLogger();
  }

  async submit(input: unknown): Promise<Submission> {
    const run = await this.coordinator.accept(input);
    if (!isTerminal(run.state)) {
      this.start(run.id);
    }
    return { runId: run.id, state: run.state };
  }

  async status(runId: string): Promise<RunStatus | null> {
    const run = await this.store.load(runId);
    return run === null ? null : toStatus(run);
  }

  /**
   * Resolve once the run is no longer being driven by this service.
   *
   * @throws RunStoreError when the run does not exist
   */
  async waitFor(runId: string): Promise<RunStatus> {
    const task = this.inflight.get(runId);
    if (task !== undefined) {
      await task;
    }
    const status = await this.status(runId);
    if (status === null) {
      throw new RunStoreError(runId, `Run ${runId} not found`);
    }
    return status;
  }

  async list(): Promise<RunStatus[]> {
    const runs = await this.store.list();
    return runs.map(toStatus);
  }

  /**
   * Drive every stored run that is not terminal. Returns their ids.
   */
  async resumePending(): Promise<string[]> {
    const runs = await this.store.list();
    const pending = runs.filter((run) => !isTerminal(run.state));
    for (const run of pending) {
      this.logger.info("Resuming run", { runId: run.id, state: run.state });
      this.start(run.id);
    }
    return pending.map((run) => run.id);
  }

  /** Drive one stored run in the background. */
  resume(runId: string): void {
    this.start(runId);
  }

  /** Wait for every background run to settle. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inflight.values()]);
  }

  private start(runId: string): void {
    if (this.inflight.has(runId)) return;

    const task = this.coordinator.drive(runId).finally(() => {
      this.inflight.delete(runId);
    });
    this.inflight.set(runId, task);

    void task.then(
      (run) => {
        this.logger.info("Run settled", { runId, state: run.state });
      },
      (err: unknown) => {
        this.logger.error("Run driver stopped", {
          runId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    );
  }
}
