import { describe, it } from "node:test";
import assert from "node:assert";
import type { ConditionCandidate } from "../types.js";
import { FakeGenerativeService, makeAgentDeps } from "../test-support/fakes.js";
import {
  dedupeByCondition,
  SpecialistFinderAgent,
  specialistPriority,
} from "./specialist-finder.js";

function candidate(name: string, confidence: number): ConditionCandidate {
  return { name, confidence, matchingSymptoms: [], diagnosticTests: [], evidence: "" };
}

describe("SpecialistFinderAgent", () => {
  it("should return an empty list without calling the model or the limiter", async () => {
    const generator = new FakeGenerativeService();
    const { deps, clock } = makeAgentDeps(generator);

    const result = await new SpecialistFinderAgent(deps).run({ conditions: [], location: "Boston" });
    // a fresh limiter grants immediately; a used one would make this wait
    await deps.limiter.acquire();

    assert.deepStrictEqual(result, { ok: true, data: [] });
    assert.strictEqual(generator.requests.length, 0);
    assert.deepStrictEqual(clock.sleeps, []);
  });

  it("should look up the top three conditions and collapse duplicates", async () => {
    const generator = new FakeGenerativeService({
      "SpecialistFinder.specialty": '{"primary_specialty": "Medical Geneticist"}',
      "SpecialistFinder.search": (request) =>
        request.prompt.includes("Ehlers-Danlos")
          ? "  See the university connective tissue clinic.  "
          : "Local rheumatology practice.",
    });
    const { deps } = makeAgentDeps(generator);

    const result = await new SpecialistFinderAgent(deps).run({
      conditions: [
        candidate("Marfan Syndrome", 0.5),
        candidate("Ehlers-Danlos Syndrome", 0.9),
        candidate("marfan syndrome ", 0.7),
        candidate("Loeys-Dietz Syndrome", 0.1),
      ],
      location: "Boston",
    });

    assert.ok(result.ok);
    assert.deepStrictEqual(result.data, [
      {
        condition: "Ehlers-Danlos Syndrome",
        primarySpecialty: "Medical Geneticist",
        secondarySpecialties: [],
        keyQualifications: [],
        recommendations: "See the university connective tissue clinic.",
        priority: "High",
      },
      {
        condition: "marfan syndrome ",
        primarySpecialty: "Medical Geneticist",
        secondarySpecialties: [],
        keyQualifications: [],
        recommendations: "Local rheumatology practice.",
        priority: "Medium",
      },
    ]);

    const searches = generator.callsTo("SpecialistFinder.search");
    assert.strictEqual(searches.length, 3);
    assert.ok(searches.every((request) => request.webSearch === true));
    assert.ok(searches[0]?.prompt.includes("Boston"));
    assert.strictEqual(generator.callsTo("SpecialistFinder.specialty").length, 3);
    assert.ok(!generator.requests.some((request) => request.prompt.includes("Loeys-Dietz")));
  });

  it("should skip a condition whose lookup fails", async () => {
    const generator = new FakeGenerativeService({
      "SpecialistFinder.specialty": (request) => {
        if (request.prompt.includes("Marfan")) throw new Error("400 Bad Request");
        return "{}";
      },
      "SpecialistFinder.search": "Community clinic",
    });
    const { deps } = makeAgentDeps(generator);

    const result = await new SpecialistFinderAgent(deps).run({
      conditions: [candidate("Ehlers-Danlos Syndrome", 0.9), candidate("Marfan Syndrome", 0.5)],
      location: "Boston",
    });

    assert.ok(result.ok);
    assert.deepStrictEqual(
      result.data.map((item) => [item.condition, item.primarySpecialty, item.priority]),
      [["Ehlers-Danlos Syndrome", "Specialist", "Medium"]],
    );
  });

  it("should fail the stage when every condition fails", async () => {
    const generator = new FakeGenerativeService({
      "SpecialistFinder.specialty": new Error("400 Bad Request"),
    });
    const { deps } = makeAgentDeps(generator);

    const result = await new SpecialistFinderAgent(deps).run({
      conditions: [candidate("Ehlers-Danlos Syndrome", 0.9), candidate("Marfan Syndrome", 0.5)],
      location: "Boston",
    });

    assert.strictEqual(result.ok, false);
    assert.strictEqual(
      result.ok ? "" : result.reason,
      "specialist lookup failed for all 2 conditions",
    );
  });
});

describe("specialist helpers", () => {
  it("should keep the first recommendation per condition name", () => {
    const items = [
      { condition: "Ehlers-Danlos Syndrome", n: 1 },
      { condition: " ehlers-danlos syndrome", n: 2 },
      { condition: "POTS", n: 3 },
    ];
    assert.deepStrictEqual(
      dedupeByCondition(items).map((item) => item.n),
      [1, 3],
    );
  });

  it("should rank academic providers as high priority", () => {
    assert.strictEqual(specialistPriority("Academic medical center in Boston"), "High");
    assert.strictEqual(specialistPriority("A national Centre of Excellence"), "High");
    assert.strictEqual(specialistPriority("Private community clinic"), "Medium");
  });
});
