import type { SymptomProfile } from "../types.js";
import { defaultSymptomProfile, normalizeSymptomProfile } from "./normalizer.js";
import { StageAgent } from "./stage-agent.js";

export type SymptomInput = {
  narrative: string;
};

function buildPrompt(narrative: string): string {
  return `You are a compassionate medical assistant helping a patient organise their symptoms.

Patient's description: "${narrative}"

Extract every symptom mentioned and summarise the timeline, severity, frequency,
family history and any previous diagnoses. List follow-up questions that would
clarify the picture.

Respond with a single JSON object:
{
  "primary_symptoms": ["symptom1", "symptom2"],
  "timeline": "how the symptoms started and progressed",
  "severity": "overall severity",
  "frequency": "constant, intermittent or triggered",
  "family_history": "relevant family history",
  "previous_diagnoses": ["diagnosis1"],
  "questions_to_ask": ["question1"]
}`;
}

export class SymptomAggregatorAgent extends StageAgent<SymptomInput, SymptomProfile> {
  readonly name = "SymptomAggregator";
  readonly stage = "symptoms" as const;

  emptyValue(): SymptomProfile {
    return defaultSymptomProfile();
  }

  protected async execute(input: SymptomInput): Promise<SymptomProfile> {
    const text = await this.callModel(buildPrompt(input.narrative.trim()), { label: "collect" });
    return normalizeSymptomProfile(text);
  }
}
