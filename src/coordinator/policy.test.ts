import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { evaluateQuorum, requiredSections } from "./policy.js";

describe("requiredSections", () => {
  it("rounds the ratio up and never drops below one", () => {
    assert.equal(requiredSections(5, 1), 5);
    assert.equal(requiredSections(5, 0.6), 3);
    assert.equal(requiredSections(5, 0.5), 3);
    assert.equal(requiredSections(3, 0.1), 1);
  });
});

describe("evaluateQuorum", () => {
  const planned = [{ index: 0 }, { index: 1 }, { index: 2 }];

  it("lists sections that failed or never finished", () => {
    const result = evaluateQuorum(
      planned,
      [
        {
          status: "completed",
          result: { index: 0, title: "A", content: "a", sources: [], queries: [] },
        },
        { status: "failed", index: 1, title: "B", error: { kind: "Timeout", message: "late" } },
      ],
      1
    );
    assert.deepEqual(result, { satisfied: false, succeeded: 1, required: 3, missing: [1, 2] });
  });

  it("is satisfied once enough sections succeed", () => {
    const result = evaluateQuorum(
      planned,
      [0, 2].map((index) => ({
        status: "completed" as const,
        result: { index, title: "S", content: "s", sources: [], queries: [] },
      })),
      0.6
    );
    assert.equal(result.satisfied, true);
    assert.deepEqual(result.missing, [1]);
  });
});
