/**
 * Failure classification and backoff tests.
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { TaskCancelledError } from "cockatiel";

import { classifyError, classifyStatus, computeBackoffDelay } from "./index.js";
import { CollaboratorError } from "../collaborators/types.js";
import { abortError, httpError } from "../testing/fakes.js";

describe("classifyStatus", () => {
  const cases: [number, string][] = [
    [429, "RateLimited"],
    [408, "Timeout"],
    [503, "Unavailable"],
    [529, "Unavailable"],
    [500, "Transient"],
    [502, "Transient"],
    [400, "InvalidInput"],
    [401, "InvalidInput"],
    [403, "InvalidInput"],
    [404, "InvalidInput"],
    [413, "InvalidInput"],
    [422, "InvalidInput"],
  ];

  for (const [status, kind] of cases) {
    it(`maps ${status} to ${kind}`, () => {
      assert.equal(classifyStatus(status), kind);
    });
  }
});

describe("classifyError", () => {
  it("keeps the kind of classified errors", () => {
    assert.equal(classifyError(new CollaboratorError("tavily", "InvalidOutput", "bad")), "InvalidOutput");
  });

  it("treats cancellation and aborts as timeouts", () => {
    assert.equal(classifyError(new TaskCancelledError()), "Timeout");
    assert.equal(classifyError(abortError()), "Timeout");
  });

  it("reads HTTP status and socket codes", () => {
    assert.equal(classifyError(httpError(429)), "RateLimited");
    assert.equal(
      classifyError(Object.assign(new Error("refused"), { code: "ECONNREFUSED" })),
      "Unavailable"
    );
  });

  it("defaults to Transient", () => {
    assert.equal(classifyError(new Error("socket hang up")), "Transient");
    assert.equal(classifyError("weird"), "Transient");
  });
});

describe("computeBackoffDelay", () => {
  const settings = { initialDelayMs: 100, maxDelayMs: 1000, rateLimitMultiplier: 4 };

  it("doubles up to the ceiling", () => {
    assert.deepEqual(
      [0, 1, 2, 3, 4].map((retry) => computeBackoffDelay(settings, retry, "Transient")),
      [100, 200, 400, 800, 1000]
    );
  });

  it("stretches the delay after rate limiting", () => {
    assert.equal(computeBackoffDelay(settings, 1, "RateLimited"), 800);
  });
});
