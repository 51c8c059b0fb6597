/**
 * Durable storage for run records.
 */

import type { PipelineRun } from "../run/index.js";

export interface RunStore {
  /** Replace the stored record for `run.id`. */
  save(run: PipelineRun): Promise<void>;
  /** Stored record, or null when the id is unknown. */
  load(id: string): Promise<Readonly<PipelineRun> | null>;
  /** Every stored run, oldest first. */
  list(): Promise<Readonly<PipelineRun>[]>;
}

export function byCreation(a: PipelineRun, b: PipelineRun): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
