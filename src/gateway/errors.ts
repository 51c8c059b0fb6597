import { PipelineError, type ErrorKind } from "../types/index.js";

export type CallKind = "generate_text" | "web_search";

/**
 * One underlying attempt of a gateway call.
 */
export interface AttemptRecord {
  /** 1-based attempt number */
  readonly attempt: number;
  readonly durationMs: number;
  readonly outcome: "success" | "failure";
  readonly errorKind?: ErrorKind;
}

/**
 * Terminal gateway failure: retries exhausted or a non-retryable error.
 */
export class GatewayError extends PipelineError {
  public readonly callKind: CallKind;
  public readonly attempts: readonly AttemptRecord[];

  constructor(
    callKind: CallKind,
    kind: ErrorKind,
    message: string,
    attempts: readonly AttemptRecord[],
    options?: { cause?: unknown }
  ) {
    super(kind, message, options);
    this.name = "GatewayError";
    this.callKind = callKind;
    this.attempts = attempts;
  }
}
