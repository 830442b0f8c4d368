import { describe, it } from "node:test";
import assert from "node:assert";
import { UsageTracker } from "./usage-tracker.js";

const pricing = {
  "gpt-5": { inputPer1MUsd: 1.25, outputPer1MUsd: 10 },
  "gpt-5-mini": { inputPer1MUsd: 0.25, cachedInputPer1MUsd: 0.025, outputPer1MUsd: 2 },
};

describe("UsageTracker", () => {
  it("should count calls per agent and roll tokens up per model", () => {
    const tracker = new UsageTracker(pricing);
    tracker.record("LiteratureSearch", "gpt-5-mini", {
      inputTokens: 1_000,
      outputTokens: 500,
      totalTokens: 1_500,
    });
    tracker.record("LiteratureSearch", "gpt-5-mini", {});
    tracker.record("SymptomAggregator", "other-model", { inputTokens: 10, outputTokens: 5 });

    const summary = tracker.summary();
    assert.strictEqual(summary.totalCalls, 3);
    assert.deepStrictEqual(summary.byAgent, { LiteratureSearch: 2, SymptomAggregator: 1 });
    assert.deepStrictEqual(summary.byModel, [
      {
        key: "gpt-5-mini",
        calls: 2,
        inputTokens: 1_000,
        outputTokens: 500,
        totalTokens: 1_500,
        estimatedCostUsd: 0.00125,
      },
      {
        key: "other-model",
        calls: 1,
        inputTokens: 10,
        outputTokens: 5,
        totalTokens: 15,
        estimatedCostUsd: null,
      },
    ]);
    assert.strictEqual(summary.totals.estimatedCostUsd, 0.00125);
    assert.strictEqual(tracker.callsFor("LiteratureSearch"), 2);
  });

  it("should count failed attempts per agent without adding tokens", () => {
    const tracker = new UsageTracker(pricing);
    tracker.record("LiteratureSearch", "gpt-5-mini", { inputTokens: 1_000, outputTokens: 500 });
    tracker.recordFailure("LiteratureSearch");
    tracker.recordFailure("LiteratureSearch");
    tracker.recordFailure("ReportCompiler");

    const summary = tracker.summary();
    assert.deepStrictEqual(summary.byAgent, { LiteratureSearch: 3, ReportCompiler: 1 });
    assert.strictEqual(summary.totalCalls, 1);
    assert.strictEqual(summary.totals.totalTokens, 1_500);
    assert.strictEqual(tracker.callsFor("LiteratureSearch"), 3);
  });

  it("should price a dated model by its longest matching family", () => {
    const tracker = new UsageTracker(pricing);
    tracker.record("ReportCompiler", "gpt-5-mini-2025-08-07", { inputTokens: 1_000_000 });

    assert.strictEqual(tracker.summary().totals.estimatedCostUsd, 0.25);
  });
});
