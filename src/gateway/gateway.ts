/**
 * External Call Gateway.
 *
 * Every call into a collaborator goes through `invoke`: a per-attempt
 * timeout, classified retries with exponential backoff, and a terminal
 * GatewayError once the attempt ceiling is reached or the failure is not
 * retryable. Policies are built per call, so one caller's backoff never
 * delays another caller.
 */

import {
  handleWhen,
  retry,
  TaskCancelledError,
  timeout,
  TimeoutStrategy,
  wrap,
} from "cockatiel";
import { isRetryableKind, type ErrorKind } from "../types/index.js";
import type { GatewaySettings, ModelSettings } from "../config/pipeline/index.js";
import type { Collaborators, SearchHit } from "../collaborators/types.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { ClassifiedBackoff } from "./backoff.js";
import { classifyError, describeError } from "./classify.js";
import { GatewayError, type AttemptRecord, type CallKind } from "./errors.js";

export interface CallPayloads {
  generate_text: {
    readonly prompt: string;
    /** Per-call overrides of the configured model settings */
    readonly model?: Partial<ModelSettings>;
  };
  web_search: {
    readonly query: string;
    readonly maxResults: number;
  };
}

export interface CallResults {
  generate_text: string;
  web_search: SearchHit[];
}

export interface CallOptions {
  /** Cancels the in-flight attempt and stops further retries */
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
  readonly maxAttempts?: number;
}

export type GatewayResult<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: readonly AttemptRecord[] }
  | { readonly ok: false; readonly error: GatewayError; readonly attempts: readonly AttemptRecord[] };

type CallHandlers = {
  [K in CallKind]: (payload: CallPayloads[K], signal: AbortSignal) => Promise<CallResults[K]>;
};

interface AttemptSlot {
  attempt: number;
  startedAt: number;
  durationMs?: number;
  errorKind?: ErrorKind;
  outcome?: "success" | "failure";
}

export interface GatewayOptions {
  readonly collaborators: Collaborators;
  readonly settings: GatewaySettings;
  readonly model: ModelSettings;
  readonly logger?: Logger;
  readonly now?: () => number;
}

/**
 * Promise that rejects once `signal` aborts. cockatiel does not watch the
 * caller's signal during a backoff delay, so `invoke` races against this.
 */
function whenCancelled(signal: AbortSignal): { promise: Promise<never>; dispose: () => void } {
  let onAbort = (): void => {};
  const promise = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(new TaskCancelledError("Call cancelled by caller"));
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener("abort", onAbort) };
}

export class CallGateway {
  private readonly settings: GatewaySettings;
  private readonly model: ModelSettings;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly handlers: CallHandlers;

  constructor(options: GatewayOptions) {
    this.settings = options.settings;
    this.model = options.model;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;

    const { generator, searcher } = options.collaborators;
    this.handlers = {
      generate_text: (payload, signal) =>
        generator.generate(payload.prompt, { ...this.model, ...payload.model }, signal),
      web_search: (payload, signal) =>
        searcher.search(payload.query, payload.maxResults, signal),
    };
  }

  /**
   * Perform one external call with timeout, retry and classification.
   * Never rejects: failures come back as `{ ok: false, error }`.
   */
  async invoke<K extends CallKind>(
    kind: K,
    payload: CallPayloads[K],
    options: CallOptions = {}
  ): Promise<GatewayResult<CallResults[K]>> {
    const maxAttempts = options.maxAttempts ?? this.settings.maxAttempts;
    const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs;
    const slots: AttemptSlot[] = [];

    const retryPolicy = retry(
      handleWhen((err) => this.shouldRetry(classifyError(err), slots.length, maxAttempts, options.signal)),
      {
        maxAttempts: maxAttempts - 1,
        backoff: new ClassifiedBackoff(this.settings),
      }
    );
    const listener = retryPolicy.onRetry((reason) => {
      this.logger.warn("Retrying external call", {
        call: kind,
        attempt: slots.length,
        delayMs: reason.delay,
        errorKind: "error" in reason ? classifyError(reason.error) : "Transient",
      });
    });
    const policy = wrap(retryPolicy, timeout(timeoutMs, TimeoutStrategy.Aggressive));
    const cancelled = options.signal === undefined ? undefined : whenCancelled(options.signal);

    try {
      const execution = policy.execute(
        ({ signal }) => this.attempt(kind, payload, signal, slots),
        options.signal
      );
      const value = await (cancelled === undefined
        ? execution
        : Promise.race([execution, cancelled.promise]));
      return { ok: true, value, attempts: this.snapshot(slots) };
    } catch (err) {
      const attempts = this.snapshot(slots);
      const errorKind = classifyError(err);
      const error = new GatewayError(
        kind,
        errorKind,
        `${kind} failed after ${attempts.length} attempt(s) [${errorKind}]: ${describeError(err)}`,
        attempts,
        { cause: err }
      );
      this.logger.warn("External call failed", {
        call: kind,
        attempts: attempts.length,
        errorKind,
      });
      return { ok: false, error, attempts };
    } finally {
      cancelled?.dispose();
      listener.dispose();
    }
  }

  /**
   * Generate text, throwing the GatewayError on failure.
   */
  async generateText(
    prompt: string,
    options: CallOptions & { model?: Partial<ModelSettings> } = {}
  ): Promise<string> {
    const result = await this.invoke("generate_text", { prompt, model: options.model }, options);
    if (!result.ok) throw result.error;
    return result.value;
  }

  /**
   * Search the web, throwing the GatewayError on failure.
   */
  async webSearch(
    query: string,
    maxResults: number,
    options: CallOptions = {}
  ): Promise<SearchHit[]> {
    const result = await this.invoke("web_search", { query, maxResults }, options);
    if (!result.ok) throw result.error;
    return result.value;
  }

  private shouldRetry(
    kind: ErrorKind,
    started: number,
    maxAttempts: number,
    signal: AbortSignal | undefined
  ): boolean {
    if (signal?.aborted) return false;
    if (!isRetryableKind(kind)) return false;
    const ceiling =
      kind === "Unavailable"
        ? Math.min(this.settings.unavailableMaxAttempts, maxAttempts)
        : maxAttempts;
    return started < ceiling;
  }

  private async attempt<K extends CallKind>(
    kind: K,
    payload: CallPayloads[K],
    signal: AbortSignal,
    slots: AttemptSlot[]
  ): Promise<CallResults[K]> {
    if (signal.aborted) {
      throw new TaskCancelledError("Call cancelled before the attempt started");
    }
    const slot: AttemptSlot = { attempt: slots.length + 1, startedAt: this.now() };
    slots.push(slot);
    this.logger.debug("External call attempt", { call: kind, attempt: slot.attempt });

    try {
      const value = await this.handlers[kind](payload, signal);
      slot.outcome = "success";
      return value;
    } catch (err) {
      slot.outcome = "failure";
      slot.errorKind = classifyError(err);
      throw err;
    } finally {
      slot.durationMs = this.now() - slot.startedAt;
    }
  }

  /**
   * Freeze the attempt log. An attempt still in flight was abandoned by
   * the timeout policy and counts as a timed-out failure.
   */
  private snapshot(slots: readonly AttemptSlot[]): readonly AttemptRecord[] {
    const end = this.now();
    return slots.map((slot) =>
      Object.freeze({
        attempt: slot.attempt,
        durationMs: slot.durationMs ?? end - slot.startedAt,
        outcome: slot.outcome ?? "failure",
        errorKind: slot.outcome === undefined ? "Timeout" : slot.errorKind,
      })
    );
  }
}
