import type { PipelineRun } from "../run/index.js";
import { byCreation, type RunStore } from "./run-store.js";
import { assertRunId, deserializeRun, serializeRun } from "./serialization.js";

/**
 * In-process store with the file store's contract. Records go through the
 * same serialization, so callers never share mutable state with it.
 */
export class MemoryRunStore implements RunStore {
  private readonly records = new Map<string, string>();
  /** Number of completed saves */
  saveCount = 0;

  async save(run: PipelineRun): Promise<void> {
    assertRunId(run.id);
    this.records.set(run.id, serializeRun(run));
    this.saveCount += 1;
  }

  async load(id: string): Promise<Readonly<PipelineRun> | null> {
    const json = this.records.get(id);
    return json === undefined ? null : deserializeRun(json, id);
  }

  async list(): Promise<Readonly<PipelineRun>[]> {
    return [...this.records.entries()]
      .map(([id, json]) => deserializeRun(json, id))
      .sort(byCreation);
  }
}
