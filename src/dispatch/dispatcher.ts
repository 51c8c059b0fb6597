/**
 * Section sub-pipeline dispatcher.
 *
 * Runs one sub-pipeline per plan section with bounded concurrency. A
 * failing section becomes a failed outcome and never affects its
 * siblings. When the stage deadline passes, outstanding sub-pipelines are
 * aborted, late results are ignored, and every section still without an
 * outcome is recorded as failed with `Timeout`. If `onOutcome` rejects,
 * the stage closes the same way and the rejection propagates.
 */

import pLimit from "p-limit";
import { summarizeError } from "../types/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { outcomeIndex, type SectionOutcome, type SectionSpec } from "../run/index.js";

export type SectionRunner = (section: SectionSpec, signal: AbortSignal) => Promise<SectionOutcome>;

export interface DispatchOptions {
  readonly concurrencyLimit: number;
  readonly stageTimeoutMs: number;
  /** Called once per committed outcome, before the next one is committed */
  readonly onOutcome?: (outcome: SectionOutcome) => Promise<void> | void;
  readonly logger?: Logger;
}

export interface DispatchReport {
  /** Keyed by section index */
  readonly outcomes: ReadonlyMap<number, SectionOutcome>;
  readonly timedOut: boolean;
  readonly peakConcurrency: number;
}

export async function dispatchSections(
  sections: readonly SectionSpec[],
  runSection: SectionRunner,
  options: DispatchOptions
): Promise<DispatchReport> {
  const logger = options.logger ?? createSilentLogger();
  const limit = pLimit(Math.max(1, Math.floor(options.concurrencyLimit)));
  const controller = new AbortController();
  const outcomes = new Map<number, SectionOutcome>();

  let closed = false;
  let active = 0;
  let peakConcurrency = 0;
  let commits: Promise<void> = Promise.resolve();

  /** Close the stage: drop queued sections and cancel running ones. */
  const stop = (): void => {
    closed = true;
    limit.clearQueue();
    controller.abort();
  };

  const record = (outcome: SectionOutcome): Promise<void> => {
    const index = outcomeIndex(outcome);
    if (outcomes.has(index)) return commits;
    outcomes.set(index, outcome);
    logger.info("Section finished", { section: index, status: outcome.status });
    commits = commits
      .then(() => options.onOutcome?.(outcome))
      .catch((err: unknown) => {
        stop();
        throw err;
      });
    return commits;
  };

  /** Results that arrive after the deadline are dropped. */
  const commit = (outcome: SectionOutcome): Promise<void> =>
    closed ? commits : record(outcome);

  const task = async (section: SectionSpec): Promise<void> => {
    if (controller.signal.aborted) return;

    active += 1;
    peakConcurrency = Math.max(peakConcurrency, active);
    let outcome: SectionOutcome;
    try {
      outcome = await runSection(section, controller.signal);
    } catch (err) {
      outcome = {
        status: "failed",
        index: section.index,
        title: section.title,
        error: summarizeError(err),
      };
    } finally {
      active -= 1;
    }

    await commit(outcome);
  };

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), options.stageTimeoutMs);
  });

  logger.info("Dispatching sections", {
    sections: sections.length,
    concurrencyLimit: options.concurrencyLimit,
    stageTimeoutMs: options.stageTimeoutMs,
  });

  try {
    const all = Promise.all(sections.map((section) => limit(() => task(section))));
    const finished = await Promise.race([all.then(() => "done" as const), deadline]);

    if (finished === "done") {
      return { outcomes, timedOut: false, peakConcurrency };
    }

    stop();
    const missing = sections.filter((s) => !outcomes.has(s.index));
    logger.warn("Research stage timed out", {
      stageTimeoutMs: options.stageTimeoutMs,
      missing: missing.map((s) => s.index),
    });
    for (const section of missing) {
      await record({
        status: "failed",
        index: section.index,
        title: section.title,
        error: {
          kind: "Timeout",
          message: `Research stage deadline of ${options.stageTimeoutMs}ms passed`,
        },
      });
    }
    await commits;
    return { outcomes, timedOut: true, peakConcurrency };
  } catch (err) {
    stop();
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
