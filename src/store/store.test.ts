/**
 * Run Store Tests
 *
 * Run with: node --import tsx --test src/store/store.test.ts
 */

import { after, describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  FileRunStore,
  MemoryRunStore,
  RunStoreError,
  deserializeRun,
  runFileName,
  serializeRun,
  type RunStore,
} from "./index.js";
import { createRun, transition, withOutcome, type PipelineRun } from "../run/index.js";
import { RunState } from "../types/index.js";
import { FIXED_NOW } from "../testing/fakes.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

const REQUEST = { topic: "Tides", sectionCount: 2, searchDepth: 1 };

function sampleRun(id = "run-1", now: Date = FIXED_NOW): PipelineRun {
  const planning = transition(createRun(id, REQUEST, "Tides", now), RunState.Planning, now);
  return withOutcome(
    planning,
    {
      status: "failed",
      index: 1,
      title: "Causes",
      error: { kind: "Timeout", message: "deadline passed" },
    },
    now
  );
}

function storeContract(name: string, makeStore: () => RunStore): void {
  describe(name, () => {
    it("round-trips a run and returns a frozen copy", async () => {
      const store = makeStore();
      const run = sampleRun();
      await store.save(run);

      const loaded = await store.load("run-1");
      assert.deepEqual(loaded, run);
      assert.ok(loaded !== null && Object.isFrozen(loaded.history));
    });

    it("returns null for unknown runs", async () => {
      assert.equal(await makeStore().load("absent"), null);
    });

    it("replaces the record on save", async () => {
      const store = makeStore();
      const run = sampleRun();
      await store.save(run);
      await store.save(transition(run, RunState.Failed, FIXED_NOW));

      assert.equal((await store.load("run-1"))?.state, RunState.Failed);
      assert.equal((await store.list()).length, 1);
    });

    it("lists runs oldest first, then by id", async () => {
      const store = makeStore();
      const later = new Date("2025-03-02T00:00:00.000Z");
      await store.save(sampleRun("b", later));
      await store.save(sampleRun("a", later));
      await store.save(sampleRun("c", FIXED_NOW));

      assert.deepEqual(
        (await store.list()).map((r) => r.id),
        ["c", "a", "b"]
      );
    });

    it("rejects ids that are not safe file names", async () => {
      await assert.rejects(makeStore().save(sampleRun("../escape")), RunStoreError);
    });
  });
}

storeContract("MemoryRunStore", () => new MemoryRunStore());

const root = mkdtempSync(join(tmpdir(), "report-pipeline-store-"));
let dirCount = 0;
after(() => rmSync(root, { recursive: true, force: true }));

storeContract("FileRunStore", () => {
  dirCount += 1;
  return new FileRunStore(join(root, `store-${dirCount}`));
});

describe("FileRunStore layout", () => {
  it("writes one JSON file per run and leaves no temp files", async () => {
    const dir = join(root, "layout");
    await new FileRunStore(dir).save(sampleRun());

    assert.deepEqual(readdirSync(dir), ["run-run-1.json"]);
    const text = readFileSync(join(dir, "run-run-1.json"), "utf-8");
    assert.equal(text, serializeRun(sampleRun()) + "\n");
  });

  it("skips records it cannot read when listing", async () => {
    const dir = join(root, "mixed");
    mkdirSync(dir, { recursive: true });
    writeFileSync(
      join(dir, "run-old-1.json"),
      JSON.stringify({ ...sampleRun("old-1"), schemaVersion: 0 }),
      "utf-8"
    );
    const warnings: unknown[] = [];
    const logger: Logger = {
      ...createSilentLogger(),
      warn: (message, context) => {
        warnings.push({ message, context });
      },
    };
    const store = new FileRunStore(dir, logger);
    await store.save(sampleRun("run-2"));

    const runs = await store.list();

    assert.deepEqual(
      runs.map((r) => r.id),
      ["run-2"]
    );
    assert.deepEqual(warnings, [
      {
        message: "Skipping unreadable run record",
        context: {
          file: "run-old-1.json",
          error: "Run old-1 has schema version 0, expected 1",
        },
      },
    ]);
  });

  it("lists nothing when the directory does not exist", async () => {
    assert.deepEqual(await new FileRunStore(join(root, "missing")).list(), []);
  });
});

describe("deserializeRun", () => {
  it("names the file after the run id", () => {
    assert.equal(runFileName("run-1"), "run-run-1.json");
    assert.throws(() => runFileName("a/b"), /Invalid run id "a\/b"/);
  });

  it("rejects invalid JSON", () => {
    assert.throws(() => deserializeRun("{", "run-1"), /^RunStoreError: Run run-1 is not valid JSON$/);
  });

  it("rejects other schema versions", () => {
    const json = JSON.stringify({ ...sampleRun(), schemaVersion: 2 });
    assert.throws(
      () => deserializeRun(json, "run-1"),
      (err: unknown) =>
        err instanceof RunStoreError &&
        err.message === "Run run-1 has schema version 2, expected 1"
    );
  });

  it("rejects records of the wrong shape", () => {
    const json = JSON.stringify({ ...sampleRun(), state: "paused" });
    assert.throws(() => deserializeRun(json, "run-1"), /^RunStoreError: Run run-1 failed validation: state: /);
  });
});
