/**
 * Pipeline coordinator.
 *
 * Owns the run lifecycle: accepted → planning → research → report →
 * completed, with `failed` reachable from every non-terminal state. The
 * run is saved after every transition and after every committed section
 * outcome, and `drive` re-enters at whatever state was last saved:
 *
 *   - planning is skipped once a plan is stored
 *   - research dispatches only sections without a stored outcome
 *   - terminal runs come back unchanged
 *
 * Stages never retry; a stage failure fails the run with the stage and
 * the error kind.
 */

import { generateRunId, createSilentLogger, type Logger } from "../logging/index.js";
import { isTerminal, RunState, StageName, summarizeError, type ErrorSummary } from "../types/index.js";
import type { PipelineConfig } from "../config/pipeline/index.js";
import type { PromptRenderer } from "../prompts/index.js";
import { dispatchSections } from "../dispatch/index.js";
import { RunStoreError, type RunStore } from "../store/index.js";
import {
  createRequestSchema,
  createRun,
  failRun,
  sectionOutcomes,
  transition,
  withOutcome,
  withPlan,
  withReport,
  type OmittedSection,
  type PipelineRun,
  type ResearchRequest,
  type SectionResult,
} from "../run/index.js";
import {
  createPlanningGraph,
  createReportGraph,
  createSectionGraph,
  initialPlanningState,
  researchSection,
  type StageContext,
  type StepGateway,
} from "../stages/index.js";
import { RunBusyError } from "./errors.js";
import { evaluateQuorum } from "./policy.js";

export interface CoordinatorOptions {
  readonly store: RunStore;
  readonly gateway: StepGateway;
  readonly prompts: PromptRenderer;
  readonly config: PipelineConfig;
  readonly logger?: Logger;
  readonly now?: () => Date;
  readonly generateId?: () => string;
}

type Run = Readonly<PipelineRun>;

/**
 * Run `work` with a signal that aborts after `ms`.
 */
async function withDeadline<T>(ms: number, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), ms);
  try {
    return await work(controller.signal);
  } finally {
    clearTimeout(timer);
  }
}

function submittedTopic(input: unknown): string {
  if (typeof input !== "object" || input === null) return "";
  const topic: unknown = Reflect.get(input, "topic");
  return typeof topic === "string" ? topic.trim() : "";
}

export class PipelineCoordinator {
  private readonly store: RunStore;
  private readonly gateway: StepGateway;
  private readonly prompts: PromptRenderer;
  private readonly config: PipelineConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  private readonly planningGraph = createPlanningGraph();
  private readonly sectionGraph = createSectionGraph();
  private readonly reportGraph = createReportGraph();
  private readonly busy = new Set<string>();

  constructor(options: CoordinatorOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.prompts = options.prompts;
    this.config = options.config;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => generateRunId());
  }

  /**
   * Validate and persist a new run. An invalid request is persisted as
   * failed at the `accepted` stage; nothing runs for it.
   */
  async accept(input: unknown): Promise<Run> {
    const id = this.generateId();
    const logger = this.logger.child({ runId: id });
    const parsed = createRequestSchema(this.config.limits).safeParse(input);

    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(request)"}: ${issue.message}`)
        .join("; ");
      const rejected = failRun(
        createRun(id, null, submittedTopic(input), this.now()),
        StageName.Accepted,
        { kind: "InvalidRequest", message },
        this.now()
      );
      await this.store.save(rejected);
      logger.warn("Request rejected", { error: message });
      return rejected;
    }

    const request: ResearchRequest = Object.freeze(parsed.data);
    const run = createRun(id, request, request.topic, this.now());
    await this.store.save(run);
    logger.info("Run accepted", { ...request });

    const planning = transition(run, RunState.Planning, this.now());
    await this.store.save(planning);
    return planning;
  }

  /**
   * Drive a stored run until it is terminal.
   *
   * @throws RunBusyError when this process is already driving the run
   * @throws RunStoreError when the run does not exist
   */
  async drive(runId: string): Promise<Run> {
    if (this.busy.has(runId)) throw new RunBusyError(runId);
    this.busy.add(runId);

    try {
      const stored = await this.store.load(runId);
      if (stored === null) {
        throw new RunStoreError(runId, `Run ${runId} not found`);
      }

      const logger = this.logger.child({ runId });
      let run: Run = stored;
      if (!isTerminal(run.state)) {
        logger.info("Driving run", { state: run.state });
      }
      while (!isTerminal(run.state)) {
        run = await this.advance(run, logger);
      }
      return run;
    } finally {
      this.busy.delete(runId);
    }
  }

  /** Accept then drive. */
  async execute(input: unknown): Promise<Run> {
    const run = await this.accept(input);
    return isTerminal(run.state) ? run : this.drive(run.id);
  }

  isDriving(runId: string): boolean {
    return this.busy.has(runId);
  }

  private async advance(run: Run, logger: Logger): Promise<Run> {
    switch (run.state) {
      case RunState.Accepted:
        return this.save(transition(run, RunState.Planning, this.now()));
      case RunState.Planning:
        return this.runPlanning(run, logger);
      case RunState.Research:
        return this.runResearch(run, logger);
      case RunState.Report:
        return this.runReport(run, logger);
      case RunState.Completed:
      case RunState.Failed:
        return run;
    }
  }

  // ---------------------------------------------------------------------------
  // Stages
  // ---------------------------------------------------------------------------

  private async runPlanning(run: Run, logger: Logger): Promise<Run> {
    const request = run.request;
    if (request === null) {
      return this.fail(run, StageName.Planning, missingField("request"), logger);
    }
    if (run.plan !== null) {
      logger.info("Plan already stored, skipping planning");
      return this.save(transition(run, RunState.Research, this.now()));
    }

    logger.info("Planning started", { sections: request.sectionCount });
    const result = await withDeadline(this.config.stageTimeouts.planningMs, (signal) =>
      this.planningGraph.run(initialPlanningState(request), this.context(logger, signal))
    );

    if (!result.ok) {
      return this.fail(run, StageName.Planning, summarizeError(result.error), logger);
    }
    if (result.state.plan === undefined) {
      return this.fail(run, StageName.Planning, missingField("plan"), logger);
    }

    logger.info("Plan ready", {
      sections: result.state.plan.sections.map((s) => s.title),
    });
    const planned = withPlan(run, result.state.plan, this.now());
    return this.save(transition(planned, RunState.Research, this.now()));
  }

  private async runResearch(run: Run, logger: Logger): Promise<Run> {
    const { request, plan } = run;
    if (request === null || plan === null) {
      return this.fail(run, StageName.Research, missingField("plan"), logger);
    }

    let current: Run = run;
    const pending = plan.sections.filter((s) => !(String(s.index) in run.sections));

    if (pending.length > 0) {
      logger.info("Research started", {
        pending: pending.length,
        recorded: plan.sections.length - pending.length,
      });
      const report = await dispatchSections(
        pending,
        (section, signal) =>
          researchSection(
            this.sectionGraph,
            request,
            section,
            this.context(logger.child({ section: section.index }), signal)
          ),
        {
          concurrencyLimit: this.config.dispatch.concurrencyLimit,
          stageTimeoutMs: this.config.stageTimeouts.researchMs,
          logger,
          onOutcome: async (outcome) => {
            current = await this.save(withOutcome(current, outcome, this.now()));
          },
        }
      );
      logger.info("Research finished", {
        timedOut: report.timedOut,
        peakConcurrency: report.peakConcurrency,
      });
    }

    const quorum = evaluateQuorum(
      plan.sections,
      sectionOutcomes(current),
      this.config.dispatch.minSuccessRatio
    );
    if (!quorum.satisfied) {
      return this.fail(
        current,
        StageName.Research,
        {
          kind: "InsufficientSections",
          message:
            `${quorum.succeeded} of ${plan.sections.length} section(s) succeeded, ` +
            `${quorum.required} required; missing sections: ${quorum.missing.join(", ")}`,
        },
        logger
      );
    }

    return this.save(transition(current, RunState.Report, this.now()));
  }

  private async runReport(run: Run, logger: Logger): Promise<Run> {
    const plan = run.plan;
    if (plan === null) {
      return this.fail(run, StageName.Report, missingField("plan"), logger);
    }

    const sections: SectionResult[] = [];
    const omitted: OmittedSection[] = [];
    for (const outcome of sectionOutcomes(run)) {
      if (outcome.status === "completed") {
        sections.push(outcome.result);
      } else {
        omitted.push({ index: outcome.index, title: outcome.title, error: outcome.error });
      }
    }

    logger.info("Report started", { sections: sections.length, omitted: omitted.length });
    const result = await withDeadline(this.config.stageTimeouts.reportMs, (signal) =>
      this.reportGraph.run({ plan, sections, omitted }, this.context(logger, signal))
    );

    if (!result.ok) {
      return this.fail(run, StageName.Report, summarizeError(result.error), logger);
    }
    if (result.state.report === undefined) {
      return this.fail(run, StageName.Report, missingField("report"), logger);
    }

    const done = transition(withReport(run, result.state.report, this.now()), RunState.Completed, this.now());
    logger.info("Run completed", { wordCount: result.state.report.metadata.wordCount });
    return this.save(done);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private context(logger: Logger, signal: AbortSignal): StageContext {
    return {
      gateway: this.gateway,
      prompts: this.prompts,
      config: this.config,
      now: this.now,
      logger,
      signal,
    };
  }

  private async save(run: Run): Promise<Run> {
    await this.store.save(run);
    return run;
  }

  private async fail(run: Run, stage: StageName, error: ErrorSummary, logger: Logger): Promise<Run> {
    logger.error("Run failed", { stage, kind: error.kind, error: error.message });
    return this.save(failRun(run, stage, error, this.now()));
  }
}

function missingField(field: string): ErrorSummary {
  return { kind: "Internal", message: `Run has no ${field} at this state` };
}
