/**
 * Call Gateway Tests
 *
 * Run with: node --import tsx --test src/gateway/gateway.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { CallGateway, GatewayError } from "./index.js";
import type { ModelSettings } from "../config/index.js";
import type { TextGenerator } from "../collaborators/types.js";
import {
  ScriptedGenerator,
  ScriptedSearcher,
  TEST_PIPELINE_CONFIG,
  httpError,
  sleep,
} from "../testing/fakes.js";

function gatewayWith(
  searcher: ScriptedSearcher,
  generator: TextGenerator = new ScriptedGenerator(),
  timeoutMs = TEST_PIPELINE_CONFIG.gateway.timeoutMs
): CallGateway {
  return new CallGateway({
    collaborators: { generator, searcher },
    settings: { ...TEST_PIPELINE_CONFIG.gateway, timeoutMs },
    model: TEST_PIPELINE_CONFIG.model,
  });
}

/** Fails the first `count` calls with `err`, then answers. */
function failFirst(count: number, err: () => Error): (query: string) => Error | undefined {
  let calls = 0;
  return () => {
    calls += 1;
    return calls <= count ? err() : undefined;
  };
}

describe("CallGateway.invoke", () => {
  it("retries transient failures and returns the value", async () => {
    const searcher = new ScriptedSearcher({ failWith: failFirst(2, () => httpError(500)) });
    const result = await gatewayWith(searcher).invoke("web_search", { query: "tides", maxResults: 1 });

    assert.ok(result.ok);
    assert.equal(result.value.length, 1);
    assert.deepEqual(
      result.attempts.map((a) => a.outcome),
      ["failure", "failure", "success"]
    );
    assert.deepEqual(
      result.attempts.map((a) => a.attempt),
      [1, 2, 3]
    );
    assert.equal(result.attempts[0].errorKind, "Transient");
  });

  it("does not retry invalid input", async () => {
    const searcher = new ScriptedSearcher({ failWith: () => httpError(400) });
    const result = await gatewayWith(searcher).invoke("web_search", { query: "tides", maxResults: 1 });

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "InvalidInput");
    assert.equal(result.attempts.length, 1);
    assert.equal(searcher.queries.length, 1);
    assert.equal(result.error.callKind, "web_search");
  });

  it("gives up after the attempt ceiling", async () => {
    const searcher = new ScriptedSearcher({ failWith: () => httpError(502) });
    const result = await gatewayWith(searcher).invoke("web_search", { query: "tides", maxResults: 1 });

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "Transient");
    assert.equal(result.attempts.length, 3);
    assert.match(result.error.message, /^web_search failed after 3 attempt\(s\) \[Transient\]: HTTP 502$/);
  });

  it("uses the lower ceiling for unavailable collaborators", async () => {
    const searcher = new ScriptedSearcher({ failWith: () => httpError(503) });
    const result = await gatewayWith(searcher).invoke("web_search", { query: "tides", maxResults: 1 });

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "Unavailable");
    assert.equal(result.attempts.length, 2);
  });

  it("times out attempts that never answer", async () => {
    const searcher = new ScriptedSearcher({ hangOn: () => true });
    const result = await gatewayWith(searcher, undefined, 20).invoke("web_search", {
      query: "tides",
      maxResults: 1,
    });

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "Timeout");
    assert.equal(result.attempts.length, 3);
    assert.ok(result.attempts.every((a) => a.outcome === "failure" && a.errorKind === "Timeout"));
  });

  it("stops when the caller cancels", async () => {
    const controller = new AbortController();
    controller.abort();
    const searcher = new ScriptedSearcher();
    const result = await gatewayWith(searcher).invoke(
      "web_search",
      { query: "tides", maxResults: 1 },
      { signal: controller.signal }
    );

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "Timeout");
  });

  it("stops waiting for a retry when the caller cancels", async () => {
    const searcher = new ScriptedSearcher({ failWith: () => httpError(500) });
    const gateway = new CallGateway({
      collaborators: { generator: new ScriptedGenerator(), searcher },
      settings: { ...TEST_PIPELINE_CONFIG.gateway, initialDelayMs: 300, maxDelayMs: 300 },
      model: TEST_PIPELINE_CONFIG.model,
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);

    const startedAt = Date.now();
    const result = await gateway.invoke(
      "web_search",
      { query: "tides", maxResults: 1 },
      { signal: controller.signal }
    );
    const elapsed = Date.now() - startedAt;

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.kind, "Timeout");
    assert.ok(elapsed < 200, `returned after ${elapsed}ms`);
    assert.equal(result.attempts.length, 1);

    // The backoff timer inside the retry policy still fires; no new attempt may follow it.
    await sleep(400);
    assert.equal(searcher.queries.length, 1);
  });
});

describe("CallGateway helpers", () => {
  it("throws the GatewayError from webSearch", async () => {
    const searcher = new ScriptedSearcher({ failWith: () => httpError(404) });
    await assert.rejects(
      gatewayWith(searcher).webSearch("tides", 2),
      (err: unknown) => err instanceof GatewayError && err.kind === "InvalidInput"
    );
  });

  it("merges per-call model overrides into the configured settings", async () => {
    const seen: ModelSettings[] = [];
    const generator: TextGenerator = {
      name: "recording",
      async generate(_prompt, model) {
        seen.push(model);
        return "ok";
      },
    };

    const text = await gatewayWith(new ScriptedSearcher(), generator).generateText("# Hi", {
      model: { temperature: 0.7 },
    });

    assert.equal(text, "ok");
    assert.equal(seen.length, 1);
    assert.equal(seen[0].temperature, 0.7);
    assert.equal(seen[0].model, TEST_PIPELINE_CONFIG.model.model);
  });
});
