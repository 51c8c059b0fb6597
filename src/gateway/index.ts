/**
 * External Call Gateway: timeouts, classified retries and backoff around
 * every collaborator call.
 */

export {
  CallGateway,
  type CallOptions,
  type CallPayloads,
  type CallResults,
  type GatewayOptions,
  type GatewayResult,
} from "./gateway.js";
export { GatewayError, type AttemptRecord, type CallKind } from "./errors.js";
export { classifyError, classifyStatus, describeError } from "./classify.js";
export { computeBackoffDelay, ClassifiedBackoff, type BackoffSettings } from "./backoff.js";
