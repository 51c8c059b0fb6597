/**
 * Run record serialization.
 *
 * Runs are stored as pretty-printed JSON, one file per run:
 * run-{runId}.json. Loading checks the schema version before the shape,
 * so an older record reports a version mismatch instead of a list of
 * field errors.
 */

import { deepFreeze } from "../config/pipeline/index.js";
import { PipelineRunSchema, RUN_SCHEMA_VERSION, type PipelineRun } from "../run/index.js";
import { RunStoreError } from "./errors.js";

/** Ids become file names, so they are restricted to a safe alphabet. */
const RUN_ID_RE = /^[A-Za-z0-9_-]{1,100}$/;

export function assertRunId(id: string): void {
  if (!RUN_ID_RE.test(id)) {
    throw new RunStoreError(id, `Invalid run id "${id}"`);
  }
}

export function runFileName(id: string): string {
  assertRunId(id);
  return `run-${id}.json`;
}

export function serializeRun(run: PipelineRun): string {
  return JSON.stringify(run, null, 2);
}

/**
 * Parse and validate a stored run. The result is deep-frozen.
 *
 * @throws RunStoreError on invalid JSON, another schema version or an invalid shape
 */
export function deserializeRun(json: string, runId: string): Readonly<PipelineRun> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new RunStoreError(runId, `Run ${runId} is not valid JSON`, { cause: err });
  }

  const version: unknown =
    typeof parsed === "object" && parsed !== null ? Reflect.get(parsed, "schemaVersion") : undefined;
  if (version !== RUN_SCHEMA_VERSION) {
    throw new RunStoreError(
      runId,
      `Run ${runId} has schema version ${String(version)}, expected ${RUN_SCHEMA_VERSION}`
    );
  }

  const result = PipelineRunSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new RunStoreError(runId, `Run ${runId} failed validation: ${detail}`);
  }

  return deepFreeze(result.data);
}
