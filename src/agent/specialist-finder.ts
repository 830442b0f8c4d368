import { SPECIALIST_TOP_K } from "../constants.js";
import { logEvent, toErrorMessage } from "../telemetry.js";
import type {
  ConditionCandidate,
  SpecialistPriority,
  SpecialistRecommendation,
  SpecialtyInfo,
} from "../types.js";
import { normalizeSpecialtyInfo, topConditions } from "./normalizer.js";
import { StageAgent } from "./stage-agent.js";

export type SpecialistInput = {
  conditions: ConditionCandidate[];
  location: string;
};

const HIGH_PRIORITY_PATTERN = /\b(academic|university|center of excellence|centre of excellence)\b/i;

function buildSpecialtyPrompt(condition: string): string {
  return `A patient may have ${condition}. Identify the medical specialists who typically diagnose and treat it.

Return a JSON object:
{
  "primary_specialty": "e.g. Geneticist",
  "secondary_specialties": ["..."],
  "key_qualifications": ["what to look for in a specialist"],
  "search_terms": ["terms to find such specialists"]
}`;
}

function buildSearchPrompt(condition: string, info: SpecialtyInfo, location: string): string {
  return `Find medical specialists and treatment centers for ${condition} in or near ${location}.

Focus on major medical centers with ${info.primarySpecialty} departments, individual specialists
with ${condition} expertise and academic centers researching ${condition}.
Useful search terms: ${info.searchTerms.join(", ") || condition}.

List the top 5 with name, location, specialty focus, contact information when available,
and why each is relevant.`;
}

export function specialistPriority(body: string): SpecialistPriority {
  return HIGH_PRIORITY_PATTERN.test(body) ? "High" : "Medium";
}

/** Keeps the first recommendation seen for each condition name. */
export function dedupeByCondition<T extends { condition: string }>(items: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const item of items) {
    const key = item.condition.trim().toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(item);
  }
  return unique;
}

export class SpecialistFinderAgent extends StageAgent<SpecialistInput, SpecialistRecommendation[]> {
  readonly name = "SpecialistFinder";
  readonly stage = "specialists" as const;

  emptyValue(): SpecialistRecommendation[] {
    return [];
  }

  protected usesModel(input: SpecialistInput): boolean {
    return input.conditions.length > 0;
  }

  protected async execute(input: SpecialistInput): Promise<SpecialistRecommendation[]> {
    const top = topConditions(input.conditions, SPECIALIST_TOP_K);
    if (top.length === 0) return [];

    const found: SpecialistRecommendation[] = [];
    let lastError: unknown = null;
    for (const condition of top) {
      try {
        const info = normalizeSpecialtyInfo(
          await this.callModel(buildSpecialtyPrompt(condition.name), { label: "specialty" }),
        );
        const body = await this.callModel(buildSearchPrompt(condition.name, info, input.location), {
          label: "search",
          webSearch: true,
        });
        found.push({
          condition: condition.name,
          primarySpecialty: info.primarySpecialty,
          secondarySpecialties: info.secondarySpecialties,
          keyQualifications: info.keyQualifications,
          recommendations: body.trim(),
          priority: specialistPriority(body),
        });
      } catch (error) {
        lastError = error;
        logEvent("warn", "specialists.condition_failed", {
          condition: condition.name,
          message: toErrorMessage(error),
        });
      }
    }

    if (found.length === 0 && lastError !== null) {
      throw new Error(`specialist lookup failed for all ${top.length} conditions`, {
        cause: lastError,
      });
    }
    return dedupeByCondition(found);
  }
}
