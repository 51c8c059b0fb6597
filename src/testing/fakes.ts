/**
 * In-process stand-ins for the collaborators, used by the tests.
 *
 * ScriptedGenerator answers by the heading on the first line of the
 * prompt ("# Research plan", "# Search queries", ...). Queued replies for a
 * heading are used first, then the default answer.
 */

import { buildPipelineConfig, type PipelineConfig, type PipelineConfigOverrides } from "../config/index.js";
import type { ModelSettings } from "../config/pipeline/index.js";
import { CallGateway } from "../gateway/index.js";
import { PipelineCoordinator } from "../coordinator/index.js";
import { PromptLibrary } from "../prompts/index.js";
import { MemoryRunStore } from "../store/index.js";
import type { SearchHit, TextGenerator, WebSearcher } from "../collaborators/index.js";

// ---------------------------------------------------------------------------
// Timing
// ---------------------------------------------------------------------------

export function abortError(): Error {
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

/** Resolve after `ms`, or reject with an AbortError when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortError());
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Pending until `signal` aborts. */
export function hang(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(abortError());
      return;
    }
    signal.addEventListener("abort", () => reject(abortError()), { once: true });
  });
}

/** Error carrying an HTTP status, as SDK errors do. */
export function httpError(status: number, message = `HTTP ${status}`): Error {
  return Object.assign(new Error(message), { status });
}

// ---------------------------------------------------------------------------
// Text generation
// ---------------------------------------------------------------------------

export type Reply = string | Error;

export interface GeneratorCall {
  readonly heading: string;
  readonly prompt: string;
}

function capture(prompt: string, re: RegExp): string {
  return re.exec(prompt)?.[1] ?? "";
}

export class ScriptedGenerator implements TextGenerator {
  readonly name = "scripted";
  readonly calls: GeneratorCall[] = [];
  private readonly queued = new Map<string, Reply[]>();

  /** Titles the plan answer uses; default "Section 1".."Section N" */
  planTitles?: string[];

  /** Queue replies for prompts with this heading. */
  script(heading: string, ...replies: Reply[]): this {
    this.queued.set(heading, [...(this.queued.get(heading) ?? []), ...replies]);
    return this;
  }

  headings(): string[] {
    return this.calls.map((c) => c.heading);
  }

  async generate(prompt: string, _model: ModelSettings, signal: AbortSignal): Promise<string> {
    const heading = prompt.split("\n", 1)[0].replace(/^#\s*/, "").trim();
    this.calls.push({ heading, prompt });
    if (signal.aborted) throw abortError();

    const reply = this.queued.get(heading)?.shift();
    if (reply instanceof Error) throw reply;
    if (reply !== undefined) return reply;
    return this.defaultReply(heading, prompt);
  }

  private defaultReply(heading: string, prompt: string): string {
    switch (heading) {
      case "Topic analysis":
        return `Analysis of ${capture(prompt, /researched: (.+)/)}`;
      case "Research plan": {
        const count = Number(capture(prompt, /Exactly (\d+) sections/));
        const titles = this.planTitles ?? Array.from({ length: count }, (_, i) => `Section ${i + 1}`);
        return JSON.stringify({
          methodology: "Literature review",
          sections: titles.map((title) => ({ title, questions: [`What about ${title}?`] })),
        });
      }
      case "Plan refinement": {
        const count = Number(capture(prompt, /Propose (\d+) additional/));
        return JSON.stringify({
          sections: Array.from({ length: count }, (_, i) => ({
            title: `Extra ${i + 1}`,
            questions: [],
          })),
        });
      }
      case "Search queries": {
        const title = capture(prompt, /^Section: (.+)$/m);
        return [`${title} overview`, `${title} evidence`, `${title} outlook`].join("\n");
      }
      case "Section synthesis":
        return `Content for ${capture(prompt, /Write the "(.+)" section/)}`;
      case "Executive summary":
        return "Executive summary text.";
      case "Conclusion":
        return "Conclusion text.";
      default:
        return "";
    }
  }
}

// ---------------------------------------------------------------------------
// Web search
// ---------------------------------------------------------------------------

export interface SearchBehaviour {
  /** Milliseconds to wait before answering */
  delayMs?: (query: string) => number;
  /** Error to throw instead of answering */
  failWith?: (query: string) => Error | undefined;
  /** Never answer; reject only when the call is aborted */
  hangOn?: (query: string) => boolean;
}

export function slug(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "");
}

export class ScriptedSearcher implements WebSearcher {
  readonly name = "scripted";
  readonly queries: string[] = [];
  active = 0;
  peakActive = 0;

  constructor(private readonly behaviour: SearchBehaviour = {}) {}

  async search(query: string, maxResults: number, signal: AbortSignal): Promise<SearchHit[]> {
    this.queries.push(query);
    this.active += 1;
    this.peakActive = Math.max(this.peakActive, this.active);
    try {
      if (this.behaviour.hangOn?.(query)) {
        await hang(signal);
      }
      await sleep(this.behaviour.delayMs?.(query) ?? 0, signal);
      const failure = this.behaviour.failWith?.(query);
      if (failure !== undefined) throw failure;

      return Array.from({ length: Math.min(2, maxResults) }, (_, i) => ({
        title: `Result ${i + 1} for ${query}`,
        url: `https://example.com/${slug(query)}/${i + 1}`,
        snippet: `Snippet about ${query}`,
      }));
    } finally {
      this.active -= 1;
    }
  }
}

// ---------------------------------------------------------------------------
// Harness
// ---------------------------------------------------------------------------

/** Small timeouts and backoff so tests settle in milliseconds. */
export const TEST_PIPELINE_CONFIG: Readonly<PipelineConfig> = buildPipelineConfig({
  gateway: {
    timeoutMs: 250,
    maxAttempts: 3,
    initialDelayMs: 1,
    maxDelayMs: 4,
    rateLimitMultiplier: 2,
    unavailableMaxAttempts: 2,
  },
  stageTimeouts: { planningMs: 5_000, researchMs: 5_000, reportMs: 5_000 },
});

export function testPipelineConfig(overrides: PipelineConfigOverrides = {}): Readonly<PipelineConfig> {
  return buildPipelineConfig(overrides, TEST_PIPELINE_CONFIG);
}

export const FIXED_NOW = new Date("2025-03-01T12:00:00.000Z");

export function sequentialIds(prefix = "run"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

export interface Harness {
  readonly config: Readonly<PipelineConfig>;
  readonly generator: ScriptedGenerator;
  readonly searcher: ScriptedSearcher;
  readonly store: MemoryRunStore;
  readonly gateway: CallGateway;
  readonly coordinator: PipelineCoordinator;
}

export interface HarnessOptions {
  config?: Readonly<PipelineConfig>;
  generator?: ScriptedGenerator;
  searcher?: ScriptedSearcher;
  store?: MemoryRunStore;
}

let prompts: PromptLibrary | undefined;

export function createHarness(options: HarnessOptions = {}): Harness {
  const config = options.config ?? TEST_PIPELINE_CONFIG;
  const generator = options.generator ?? new ScriptedGenerator();
  const searcher = options.searcher ?? new ScriptedSearcher();
  const store = options.store ?? new MemoryRunStore();
  prompts ??= PromptLibrary.load();

  const gateway = new CallGateway({
    collaborators: { generator, searcher },
    settings: config.gateway,
    model: config.model,
  });
  const coordinator = new PipelineCoordinator({
    store,
    gateway,
    prompts,
    config,
    now: () => FIXED_NOW,
    generateId: sequentialIds(),
  });

  return { config, generator, searcher, store, gateway, coordinator };
}
