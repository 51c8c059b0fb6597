/**
 * Stage Graph Engine Tests
 *
 * Run with: node --import tsx --test src/graph/engine.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import {
  GraphDefinitionError,
  StageGraph,
  StepError,
  advance,
  branchTo,
  type Step,
  type StepRuntime,
} from "./index.js";
import { GatewayError } from "../gateway/index.js";

interface Counter {
  start: number;
  doubled?: number;
  label?: string;
  skipped?: boolean;
}

type CounterStep = Step<Counter, StepRuntime>;

const double: CounterStep = {
  name: "double",
  writes: ["doubled"],
  async run(state) {
    return advance({ doubled: state.start * 2 });
  },
};

const label: CounterStep = {
  name: "label",
  writes: ["label"],
  async run(state) {
    return advance({ label: `value ${state.doubled ?? "?"}` });
  },
};

function failing(name: string, err: unknown): CounterStep {
  return {
    name,
    writes: [],
    async run() {
      throw err;
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// Execution
// ═══════════════════════════════════════════════════════════════════════════

describe("StageGraph.run", () => {
  it("runs steps in order and merges their patches", async () => {
    const graph = new StageGraph("counter", [double, label]);
    const result = await graph.run({ start: 4 }, {});

    assert.ok(result.ok);
    assert.deepEqual(result.state, { start: 4, doubled: 8, label: "value 8" });
    assert.deepEqual(
      result.trace.map((t) => [t.step, t.outcome]),
      [
        ["double", "committed"],
        ["label", "committed"],
      ]
    );
    assert.ok(Object.isFrozen(result.state));
  });

  it("jumps forward over skipped steps", async () => {
    const jump: CounterStep = {
      name: "jump",
      writes: ["doubled"],
      branches: ["label"],
      async run() {
        return branchTo("label", { doubled: 0 });
      },
    };
    const skipped: CounterStep = {
      name: "skipped",
      writes: ["skipped"],
      async run() {
        return advance({ skipped: true });
      },
    };

    const result = await new StageGraph("counter", [jump, skipped, label]).run({ start: 1 }, {});

    assert.ok(result.ok);
    assert.equal(result.state.skipped, undefined);
    assert.equal(result.state.label, "value 0");
    assert.deepEqual(graphSteps(result.trace), ["jump", "label"]);
  });

  it("keeps the last committed state when a step throws", async () => {
    const graph = new StageGraph("counter", [double, failing("explode", new Error("boom")), label]);
    const result = await graph.run({ start: 2 }, {});

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "Internal");
    assert.equal(result.error.step, "explode");
    assert.equal(result.error.graph, "counter");
    assert.equal(result.error.message, 'Step "explode" failed: boom');
    assert.deepEqual(result.state, { start: 2, doubled: 4 });
    assert.deepEqual(
      result.trace.map((t) => t.outcome),
      ["committed", "failed"]
    );
  });

  it("keeps the kind of classified errors", async () => {
    const invalid = await new StageGraph("g", [
      failing("parse", new StepError("InvalidOutput", "not json")),
    ]).run({ start: 0 }, {});
    assert.equal(invalid.ok ? null : invalid.error.kind, "InvalidOutput");

    const gateway = await new StageGraph("g", [
      failing("call", new GatewayError("web_search", "RateLimited", "slow down", [])),
    ]).run({ start: 0 }, {});
    assert.equal(gateway.ok ? null : gateway.error.kind, "RateLimited");
  });

  it("stops with Timeout before running a step once the signal aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    let ran = false;
    const watched: CounterStep = {
      name: "watched",
      writes: [],
      async run() {
        ran = true;
        return advance({});
      },
    };

    const result = await new StageGraph("g", [watched]).run(
      { start: 0 },
      { signal: controller.signal }
    );

    assert.equal(ran, false);
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "Timeout");
    assert.equal(result.error.step, "watched");
    assert.deepEqual(result.trace, []);
  });
});

function graphSteps(trace: readonly { step: string }[]): string[] {
  return trace.map((t) => t.step);
}

// ═══════════════════════════════════════════════════════════════════════════
// Patch validation
// ═══════════════════════════════════════════════════════════════════════════

describe("patch validation", () => {
  async function failureOf(steps: CounterStep[], initial: Counter = { start: 1 }): Promise<string> {
    const result = await new StageGraph("g", steps).run(initial, {});
    assert.equal(result.ok, false);
    if (result.ok) return "";
    assert.equal(result.error.kind, "Internal");
    return result.error.message;
  }

  it("rejects writes to fields the step does not own", async () => {
    const sneaky: CounterStep = {
      name: "sneaky",
      writes: ["label"],
      async run() {
        return advance({ doubled: 1 });
      },
    };
    assert.equal(
      await failureOf([sneaky]),
      'Step "sneaky" failed: step "sneaky" wrote "doubled", which it does not own'
    );
  });

  it("rejects rewriting a field that is already set", async () => {
    assert.equal(
      await failureOf([double], { start: 1, doubled: 5 }),
      'Step "double" failed: step "double" rewrote "doubled", which is already set'
    );
  });

  it("rejects clearing a field", async () => {
    const clearing: CounterStep = {
      name: "clearing",
      writes: ["label"],
      async run() {
        return advance({ label: undefined });
      },
    };
    assert.equal(
      await failureOf([clearing]),
      'Step "clearing" failed: step "clearing" cleared "label"'
    );
  });

  it("rejects branches the step did not declare", async () => {
    const rogue: CounterStep = {
      name: "rogue",
      writes: [],
      async run() {
        return branchTo("label", {});
      },
    };
    assert.equal(
      await failureOf([rogue, label]),
      'Step "rogue" failed: step "rogue" branched to "label", which is not one of its branches'
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Definition checks
// ═══════════════════════════════════════════════════════════════════════════

describe("StageGraph definition", () => {
  it("lists step names in order", () => {
    assert.deepEqual(new StageGraph("g", [double, label]).stepNames, ["double", "label"]);
  });

  it("rejects empty graphs and duplicate names", () => {
    assert.throws(() => new StageGraph<Counter, StepRuntime>("g", []), GraphDefinitionError);
    assert.throws(
      () => new StageGraph("g", [double, double]),
      /Invalid stage graph "g": duplicate step name "double"/
    );
  });

  it("rejects unknown and backward branch targets", () => {
    const toNowhere: CounterStep = { ...label, name: "to-nowhere", branches: ["nowhere"] };
    assert.throws(() => new StageGraph("g", [toNowhere]), /unknown step "nowhere"/);

    const backward: CounterStep = { ...label, name: "backward", branches: ["double"] };
    assert.throws(
      () => new StageGraph("g", [double, backward]),
      /may only branch forward, not to "double"/
    );

    const self: CounterStep = { ...label, name: "self", branches: ["self"] };
    assert.throws(() => new StageGraph("g", [self]), GraphDefinitionError);
  });
});
