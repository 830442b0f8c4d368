import { describe, it } from "node:test";
import assert from "node:assert";
import type { ConditionCandidate } from "../types.js";
import { FakeGenerativeService, makeAgentDeps } from "../test-support/fakes.js";
import { CommunityConnectorAgent } from "./community-connector.js";

function candidate(name: string, confidence: number): ConditionCandidate {
  return { name, confidence, matchingSymptoms: [], diagnosticTests: [], evidence: "" };
}

describe("CommunityConnectorAgent", () => {
  it("should return an empty list without calling the model", async () => {
    const generator = new FakeGenerativeService();
    const { deps, clock } = makeAgentDeps(generator);

    const result = await new CommunityConnectorAgent(deps).run([]);
    await deps.limiter.acquire();

    assert.deepStrictEqual(result, { ok: true, data: [] });
    assert.strictEqual(generator.requests.length, 0);
    assert.deepStrictEqual(clock.sleeps, []);
  });

  it("should search the top three conditions in confidence order", async () => {
    const generator = new FakeGenerativeService({
      "CommunityConnector.search": "\n  Support groups and foundations\n",
    });
    const { deps } = makeAgentDeps(generator);

    const result = await new CommunityConnectorAgent(deps).run([
      candidate("Condition A disease", 0.2),
      candidate("Condition B disease", 0.8),
      candidate("Condition C disease", 0.6),
      candidate("Condition D disease", 0.4),
    ]);

    assert.ok(result.ok);
    assert.deepStrictEqual(result.data, [
      { condition: "Condition B disease", resources: "Support groups and foundations" },
      { condition: "Condition C disease", resources: "Support groups and foundations" },
      { condition: "Condition D disease", resources: "Support groups and foundations" },
    ]);
    assert.strictEqual(generator.requests.length, 3);
    assert.ok(generator.requests.every((request) => request.webSearch === true));
  });

  it("should fail the stage only when every lookup fails", async () => {
    const partial = new FakeGenerativeService({
      "CommunityConnector.search": (request) => {
        if (request.prompt.includes("Condition A")) throw new Error("400 Bad Request");
        return "Forum";
      },
    });
    const partialResult = await new CommunityConnectorAgent(makeAgentDeps(partial).deps).run([
      candidate("Condition A disease", 0.9),
      candidate("Condition B disease", 0.5),
    ]);
    assert.deepStrictEqual(partialResult, {
      ok: true,
      data: [{ condition: "Condition B disease", resources: "Forum" }],
    });

    const failing = new FakeGenerativeService({
      "CommunityConnector.search": new Error("400 Bad Request"),
    });
    const failed = await new CommunityConnectorAgent(makeAgentDeps(failing).deps).run([
      candidate("Condition A disease", 0.9),
    ]);
    assert.strictEqual(failed.ok, false);
  });
});
