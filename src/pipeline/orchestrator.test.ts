import { describe, it } from "node:test";
import assert from "node:assert";
import { FALLBACK_SUMMARY } from "../constants.js";
import { RateLimiter } from "../openai/rate-limit.js";
import {
  FakeClock,
  FakeGenerativeService,
  FakeLiteratureSource,
  FakeTrialRegistry,
  makeArticle,
  makeStudy,
  type ScriptedReply,
} from "../test-support/fakes.js";
import type { LiteratureSource, TrialStudy } from "../types.js";
import { DiagnosticPipeline, type PipelineEvent } from "./orchestrator.js";
import { InMemorySessionStore } from "./session-store.js";
import { PipelineError } from "./stage-result.js";

const NARRATIVE =
  "Since childhood I have had joint pain, I bruise very easily and I am tired all the time.";

const HAPPY_REPLIES: Record<string, ScriptedReply> = {
  "SymptomAggregator.collect":
    '{"primary_symptoms": ["joint pain", "easy bruising", "fatigue"], "timeline": "Since childhood"}',
  "LiteratureSearch.queries": '["joint hypermobility bruising"]',
  "LiteratureSearch.analyze":
    '[{"name": "Marfan Syndrome", "confidence": 0.4}, {"name": "Ehlers-Danlos Syndrome", "confidence": 0.9}]',
  "SpecialistFinder.specialty": '{"primary_specialty": "Medical Geneticist"}',
  "SpecialistFinder.search": "University genetics clinic",
  "CommunityConnector.search": "Patient foundation",
};

function setup(
  options: {
    replies?: Record<string, ScriptedReply>;
    trials?: TrialStudy[] | Error;
    literature?: LiteratureSource;
    branchTimeoutMs?: number;
  } = {},
) {
  const clock = new FakeClock();
  const generator = new FakeGenerativeService({ ...HAPPY_REPLIES, ...options.replies });
  const trials = new FakeTrialRegistry(
    options.trials ?? [makeStudy("NCT00000001", ["Boston, MA", "Denver, CO", "Austin, TX", "Miami, FL"])],
  );
  const store = new InMemorySessionStore();
  const events: PipelineEvent[] = [];
  const pipeline = new DiagnosticPipeline({
    generator,
    literature: options.literature ?? new FakeLiteratureSource([makeArticle("1", "Collagen study")]),
    trials,
    store,
    clock,
    limiter: new RateLimiter({ callsPerMinute: 60, clock }),
    retry: { maxRetries: 2, initialDelayMs: 1_000, maxDelayMs: 60_000, backoffMultiplier: 2 },
    branchTimeoutMs: options.branchTimeoutMs ?? 0,
    onEvent: (event) => events.push(event),
  });
  return { pipeline, generator, trials, store, clock, events };
}

function states(events: PipelineEvent[]) {
  return events.flatMap((event) => (event.type === "state" ? [event.state] : []));
}

describe("DiagnosticPipeline", () => {
  it("should carry a three-symptom narrative through every stage in order", async () => {
    const { pipeline, generator, trials, store, clock, events } = setup();

    const report = await pipeline.run({
      narrative: NARRATIVE,
      location: "Boston",
      sessionId: "case-1",
    });

    assert.strictEqual(report.symptomProfile.primarySymptoms.length, 3);
    assert.deepStrictEqual(
      report.potentialDiagnoses.map((diagnosis) => diagnosis.name),
      ["Ehlers-Danlos Syndrome", "Marfan Syndrome"],
    );

    const specialtyPrompts = generator.callsTo("SpecialistFinder.specialty").map((r) => r.prompt);
    assert.strictEqual(specialtyPrompts.length, 2);
    assert.ok(specialtyPrompts[0]?.includes("Ehlers-Danlos Syndrome"));
    assert.ok(specialtyPrompts[1]?.includes("Marfan Syndrome"));
    const communityPrompts = generator.callsTo("CommunityConnector.search").map((r) => r.prompt);
    assert.strictEqual(communityPrompts.length, 2);
    assert.ok(communityPrompts[0]?.includes("Ehlers-Danlos Syndrome"));
    assert.ok(communityPrompts[1]?.includes("Marfan Syndrome"));

    assert.deepStrictEqual(
      report.specialistRecommendations.map((item) => [item.condition, item.priority]),
      [
        ["Ehlers-Danlos Syndrome", "High"],
        ["Marfan Syndrome", "High"],
      ],
    );
    assert.strictEqual(report.communityResources.length, 2);
    assert.strictEqual(trials.searches[0]?.condition, "joint pain");
    assert.strictEqual(trials.searches[0]?.options.recruitingOnly, true);
    assert.deepStrictEqual(report.clinicalTrials[0]?.locations, ["Boston, MA", "Denver, CO", "Austin, TX"]);
    assert.strictEqual(report.executiveSummary, FALLBACK_SUMMARY);

    assert.deepStrictEqual(report.warnings, {
      conditionsFailed: false,
      trialsFailed: false,
      specialistsFailed: false,
      communitiesFailed: false,
    });
    assert.strictEqual(report.sessionId, "case-1");
    assert.strictEqual(report.location, "Boston");
    assert.strictEqual(report.executionMetrics.stagesRun, 6);
    assert.deepStrictEqual(report.executionMetrics.agentCalls, {
      SymptomAggregator: 1,
      LiteratureSearch: 2,
      SpecialistFinder: 4,
      CommunityConnector: 2,
      ReportCompiler: 4,
    });
    assert.strictEqual(report.executionMetrics.modelUsage.totalCalls, 13);

    // one limiter slot per model-calling stage, one second apart at 60/min
    assert.deepStrictEqual(clock.sleeps, [1_000, 1_000, 1_000, 1_000]);
    assert.strictEqual(report.executionMetrics.totalTimeMs, 4_000);

    assert.deepStrictEqual(states(events), [
      "INIT",
      "SYMPTOMS_COLLECTED",
      "SEARCHES_DISPATCHED",
      "SEARCHES_JOINED",
      "DEPENDENTS_DISPATCHED",
      "DEPENDENTS_JOINED",
      "REPORT_COMPILED",
      "DONE",
    ]);
    assert.strictEqual(pipeline.state, "DONE");
    assert.deepStrictEqual(
      store.history("case-1").map((entry) => Object.keys(entry.data)),
      [["symptoms"], ["conditions", "trials"], ["specialists", "communities"], ["report"]],
    );
  });

  it("should flag a failed trial search and still compile the report", async () => {
    const { pipeline, events } = setup({ trials: new Error("503 Service Unavailable") });

    const report = await pipeline.run({ narrative: NARRATIVE });

    assert.strictEqual(report.warnings.trialsFailed, true);
    assert.strictEqual(report.warnings.conditionsFailed, false);
    assert.deepStrictEqual(report.clinicalTrials, []);
    assert.strictEqual(report.potentialDiagnoses.length, 2);
    assert.ok(
      events.some(
        (event) =>
          event.type === "stage" &&
          event.stage === "trials" &&
          event.status === "failed" &&
          event.reason === "503 Service Unavailable",
      ),
    );
    assert.strictEqual(pipeline.state, "DONE");
  });

  it("should skip dependent model calls when no conditions are found", async () => {
    const { pipeline, generator } = setup({ replies: { "LiteratureSearch.analyze": "[]" } });

    const report = await pipeline.run({ narrative: NARRATIVE });

    assert.deepStrictEqual(report.specialistRecommendations, []);
    assert.deepStrictEqual(report.communityResources, []);
    assert.deepStrictEqual(report.potentialDiagnoses, []);
    assert.strictEqual(generator.callsTo("SpecialistFinder.specialty").length, 0);
    assert.strictEqual(generator.callsTo("CommunityConnector.search").length, 0);
    assert.deepStrictEqual(report.executionMetrics.agentCalls, {
      SymptomAggregator: 1,
      LiteratureSearch: 2,
      ReportCompiler: 3,
    });
    assert.strictEqual(report.warnings.specialistsFailed, false);
  });

  it("should degrade a failed literature search to an empty candidate list", async () => {
    const { pipeline } = setup({
      replies: { "LiteratureSearch.analyze": new Error("400 Bad Request") },
    });

    const report = await pipeline.run({ narrative: NARRATIVE });

    assert.strictEqual(report.warnings.conditionsFailed, true);
    assert.deepStrictEqual(report.potentialDiagnoses, []);
    assert.strictEqual(report.clinicalTrials.length, 1);
  });

  it("should count failed and retried attempts in the per-agent calls", async () => {
    const { pipeline, generator, clock } = setup({
      replies: { "LiteratureSearch.analyze": new Error("503 Service Unavailable") },
    });

    const report = await pipeline.run({ narrative: NARRATIVE });

    assert.strictEqual(report.warnings.conditionsFailed, true);
    assert.strictEqual(generator.callsTo("LiteratureSearch.analyze").length, 3);
    assert.deepStrictEqual(report.executionMetrics.agentCalls, {
      SymptomAggregator: 1,
      LiteratureSearch: 4,
      ReportCompiler: 3,
    });
    assert.strictEqual(report.executionMetrics.modelUsage.totalCalls, 5);
    // literature waits for its limiter slot, then backs off twice; the report slot is already free
    assert.deepStrictEqual(clock.sleeps, [1_000, 1_100, 2_200]);
  });

  it("should refuse a second run while one is in flight", async () => {
    const { pipeline } = setup();

    const first = pipeline.run({ narrative: NARRATIVE });
    await assert.rejects(pipeline.run({ narrative: NARRATIVE }), {
      message: "pipeline is already running; create one pipeline per concurrent run",
    });

    const report = await first;
    assert.strictEqual(pipeline.state, "DONE");
    assert.strictEqual(report.potentialDiagnoses.length, 2);
    const again = await pipeline.run({ narrative: NARRATIVE });
    assert.strictEqual(again.potentialDiagnoses.length, 2);
  });

  it("should abort with a PipelineError when symptom structuring fails", async () => {
    const { pipeline, generator, events } = setup({
      replies: { "SymptomAggregator.collect": new Error("400 Bad Request") },
    });

    await assert.rejects(
      pipeline.run({ narrative: NARRATIVE, sessionId: "case-2" }),
      (error: unknown) =>
        error instanceof PipelineError &&
        error.stage === "symptoms" &&
        error.message === "symptom structuring failed: 400 Bad Request",
    );
    assert.strictEqual(pipeline.state, "FAILED");
    assert.deepStrictEqual(states(events), ["INIT", "FAILED"]);
    assert.strictEqual(generator.requests.length, 1);
  });

  it("should turn a hanging branch into a soft failure when a timeout is set", async () => {
    const hanging: LiteratureSource = {
      search: () => new Promise(() => undefined),
    };
    const { pipeline } = setup({ literature: hanging, branchTimeoutMs: 20 });

    const report = await pipeline.run({ narrative: NARRATIVE });

    assert.strictEqual(report.warnings.conditionsFailed, true);
    assert.strictEqual(report.warnings.trialsFailed, false);
    assert.deepStrictEqual(report.potentialDiagnoses, []);
  });
});
