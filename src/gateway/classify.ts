/**
 * Failure classification for external calls.
 *
 * Adapters raise CollaboratorError when they know the kind. SDK and HTTP
 * errors are recognised structurally: a numeric `status`, a `code` from
 * the socket layer, or an abort/timeout error name.
 */

import { TaskCancelledError } from "cockatiel";
import { PipelineError, type ErrorKind } from "../types/index.js";

const UNAVAILABLE_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN", "EHOSTUNREACH"]);
const TIMEOUT_NAMES = new Set(["AbortError", "TimeoutError", "APIConnectionTimeoutError"]);

function readProperty(err: object, key: string): unknown {
  return Reflect.get(err, key);
}

/**
 * Map an HTTP status code onto the error taxonomy.
 */
export function classifyStatus(status: number): ErrorKind {
  if (status === 429) return "RateLimited";
  if (status === 408) return "Timeout";
  if (status === 503 || status === 529) return "Unavailable";
  if (status >= 500) return "Transient";
  if (status >= 400) return "InvalidInput";
  return "Transient";
}

/**
 * Classify any thrown value.
 */
export function classifyError(err: unknown): ErrorKind {
  if (err instanceof PipelineError) return err.kind;
  if (err instanceof TaskCancelledError) return "Timeout";
  if (err === null || typeof err !== "object") return "Transient";

  const status = readProperty(err, "status");
  if (typeof status === "number") return classifyStatus(status);

  const name = readProperty(err, "name");
  if (typeof name === "string") {
    if (TIMEOUT_NAMES.has(name)) return "Timeout";
    if (name === "APIConnectionError") return "Unavailable";
  }

  const code = readProperty(err, "code");
  if (typeof code === "string" && UNAVAILABLE_CODES.has(code)) return "Unavailable";

  return "Transient";
}

/**
 * Message for a thrown value.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
