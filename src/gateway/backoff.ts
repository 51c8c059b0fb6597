/**
 * Exponential backoff that stretches after rate limiting.
 */

import type { IBackoff, IBackoffFactory, IRetryBackoffContext } from "cockatiel";
import type { ErrorKind } from "../types/index.js";
import type { GatewaySettings } from "../config/pipeline/index.js";
import { classifyError } from "./classify.js";

export type BackoffSettings = Pick<
  GatewaySettings,
  "initialDelayMs" | "maxDelayMs" | "rateLimitMultiplier"
>;

/**
 * Delay before retry number `retry` (0-based).
 * `min(initial · 2^retry, max)`, multiplied for RateLimited failures.
 */
export function computeBackoffDelay(
  settings: BackoffSettings,
  retry: number,
  kind: ErrorKind
): number {
  const base = Math.min(settings.initialDelayMs * 2 ** retry, settings.maxDelayMs);
  return kind === "RateLimited" ? base * settings.rateLimitMultiplier : base;
}

/**
 * cockatiel backoff factory that looks at the failure before choosing the
 * next delay.
 */
export class ClassifiedBackoff implements IBackoffFactory<IRetryBackoffContext<unknown>> {
  constructor(
    private readonly settings: BackoffSettings,
    private readonly retry = 0
  ) {}

  next(context: IRetryBackoffContext<unknown>): IBackoff<IRetryBackoffContext<unknown>> {
    const kind: ErrorKind =
      "error" in context.result ? classifyError(context.result.error) : "Transient";
    const following = new ClassifiedBackoff(this.settings, this.retry + 1);
    return {
      duration: computeBackoffDelay(this.settings, this.retry, kind),
      next: (ctx) => following.next(ctx),
    };
  }
}
