/**
 * File-backed run store.
 *
 * Each save writes a temp file beside the target and renames it over the
 * target, so a crash mid-write leaves the previous record intact.
 */

import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { randomBytes } from "node:crypto";

import type { PipelineRun } from "../run/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { RunStoreError } from "./errors.js";
import { byCreation, type RunStore } from "./run-store.js";
import { deserializeRun, runFileName, serializeRun } from "./serialization.js";

const RUN_FILE_RE = /^run-([A-Za-z0-9_-]+)\.json$/;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && Reflect.get(err, "code") === "ENOENT";
}

export class FileRunStore implements RunStore {
  constructor(
    private readonly dir: string,
    private readonly logger: Logger = createSilentLogger()
  ) {}

  async save(run: PipelineRun): Promise<void> {
    const target = join(this.dir, runFileName(run.id));
    const temp = `${target}.${randomBytes(4).toString("hex")}.tmp`;

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(temp, serializeRun(run) + "\n", "utf-8");
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw new RunStoreError(run.id, `Failed to save run ${run.id}: ${String(err)}`, {
        cause: err,
      });
    }
  }

  async load(id: string): Promise<Readonly<PipelineRun> | null> {
    const path = join(this.dir, runFileName(id));
    let json: string;
    try {
      json = await readFile(path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new RunStoreError(id, `Failed to read run ${id}: ${String(err)}`, { cause: err });
    }
    return deserializeRun(json, id);
  }

  async list(): Promise<Readonly<PipelineRun>[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const runs: Readonly<PipelineRun>[] = [];
    for (const entry of entries) {
      const match = RUN_FILE_RE.exec(entry);
      if (match === null) continue;
      let run: Readonly<PipelineRun> | null;
      try {
        run = await this.load(match[1]);
      } catch (err) {
        // One unreadable record must not hide the others.
        if (!(err instanceof RunStoreError)) throw err;
        this.logger.warn("Skipping unreadable run record", { file: entry, error: err.message });
        continue;
      }
      if (run !== null) runs.push(run);
    }
    return runs.sort(byCreation);
  }
}
