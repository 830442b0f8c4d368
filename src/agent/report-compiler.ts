import {
  DISCLAIMER,
  FALLBACK_DOCTOR_QUESTIONS,
  FALLBACK_NEXT_STEPS,
  FALLBACK_SUMMARY,
  REPORT_MAX_TRIALS,
  REPORT_TOP_K,
  TIMELINE_MILESTONES,
  TRIAL_MAX_LOCATIONS,
} from "../constants.js";
import { logEvent, toErrorMessage } from "../telemetry.js";
import type {
  CommunityResource,
  ConditionCandidate,
  DiagnosisAssessment,
  DiagnosticReport,
  SpecialistRecommendation,
  SymptomProfile,
  TrialRecord,
} from "../types.js";
import {
  confidenceLevelFor,
  defaultSymptomProfile,
  normalizeConditionAnalysis,
  normalizeStringList,
  topConditions,
  type ConditionAnalysis,
} from "./normalizer.js";
import { StageAgent } from "./stage-agent.js";

export type ReportInput = {
  profile: SymptomProfile;
  conditions: ConditionCandidate[];
  specialists: SpecialistRecommendation[];
  trials: TrialRecord[];
  communities: CommunityResource[];
};

export type CompiledReport = Omit<
  DiagnosticReport,
  "sessionId" | "generatedAt" | "location" | "warnings" | "executionMetrics"
>;

export type ReportSections = {
  executiveSummary: string;
  analysis: ConditionAnalysis[];
  nextSteps: string[];
  questionsForDoctor: string[];
};

export function fallbackSections(): ReportSections {
  return {
    executiveSummary: FALLBACK_SUMMARY,
    analysis: [],
    nextSteps: [...FALLBACK_NEXT_STEPS],
    questionsForDoctor: [...FALLBACK_DOCTOR_QUESTIONS],
  };
}

function conditionNames(conditions: ConditionCandidate[]): string {
  return conditions.map((condition) => condition.name).join(", ") || "none identified yet";
}

function buildSummaryPrompt(input: ReportInput): string {
  return `Write a 2-3 paragraph executive summary for a patient's diagnostic report.

Symptoms: ${input.profile.primarySymptoms.join(", ") || "not specified"}
Timeline: ${input.profile.timeline || "not specified"}
Potential conditions: ${conditionNames(topConditions(input.conditions, 3))}
Specialists identified: ${input.specialists.length}
Clinical trials found: ${input.trials.length}

Use compassionate, plain language, avoid medical jargon and stay hopeful but realistic.`;
}

function buildAnalysisPrompt(profile: SymptomProfile, top: ConditionCandidate[]): string {
  const listed = top
    .map((condition) => `- ${condition.name} (confidence ${condition.confidence.toFixed(2)})`)
    .join("\n");
  return `For each potential condition below explain why it fits the patient's symptoms,
give a confidence level (High, Medium or Low), the key diagnostic tests and any
additional symptoms that would raise confidence.

Patient symptoms: ${profile.primarySymptoms.join(", ") || "not specified"}

Conditions:
${listed}

Return a JSON array of objects with keys: name, why_fits, confidence_level,
diagnostic_tests, additional_symptoms.`;
}

function buildNextStepsPrompt(profile: SymptomProfile, top: ConditionCandidate[]): string {
  return `Create 5-7 actionable next steps for a patient with these symptoms: ${
    profile.primarySymptoms.join(", ") || "not specified"
  }.
Potential conditions: ${conditionNames(top)}

Cover immediate actions, specialist appointments, tests to request, records to gather
and support resources. Return one step per line starting with "- ".`;
}

function buildQuestionsPrompt(profile: SymptomProfile, top: ConditionCandidate[]): string {
  return `Generate 8-10 specific questions a patient should ask their doctor.

Symptoms: ${profile.primarySymptoms.join(", ") || "not specified"}
Potential conditions: ${conditionNames(top)}

Cover diagnostic tests, specialist referrals, treatments, monitoring and lifestyle.
Return one question per line starting with "- ".`;
}

/** Analysis is matched by name onto the ranked candidates, so their order wins. */
export function mergeAssessments(
  ranked: ConditionCandidate[],
  analysis: ConditionAnalysis[],
): DiagnosisAssessment[] {
  const byName = new Map<string, ConditionAnalysis>();
  for (const entry of analysis) {
    const key = entry.name.trim().toLowerCase();
    if (!byName.has(key)) byName.set(key, entry);
  }

  return ranked.map((condition) => {
    const match = byName.get(condition.name.trim().toLowerCase());
    return {
      ...condition,
      diagnosticTests:
        condition.diagnosticTests.length > 0
          ? condition.diagnosticTests
          : (match?.diagnosticTests ?? []),
      confidenceLevel: match?.confidenceLevel ?? confidenceLevelFor(condition.confidence),
      rationale: match?.rationale ?? "",
      additionalSymptoms: match?.additionalSymptoms ?? [],
    };
  });
}

/**
 * Builds the patient-facing report. Every section has a fixed fallback, so
 * a failed sub-call degrades that section only.
 */
export class ReportCompilerAgent extends StageAgent<ReportInput, CompiledReport> {
  readonly name = "ReportCompiler";
  readonly stage = "report" as const;

  emptyValue(): CompiledReport {
    return this.assemble(
      {
        profile: defaultSymptomProfile(),
        conditions: [],
        specialists: [],
        trials: [],
        communities: [],
      },
      fallbackSections(),
    );
  }

  /** Deterministic assembly; used directly when the model sections are unavailable. */
  assemble(input: ReportInput, sections: ReportSections): CompiledReport {
    const top = topConditions(input.conditions, REPORT_TOP_K);
    return {
      executiveSummary: sections.executiveSummary,
      symptomProfile: input.profile,
      potentialDiagnoses: mergeAssessments(top, sections.analysis),
      specialistRecommendations: input.specialists,
      clinicalTrials: input.trials.slice(0, REPORT_MAX_TRIALS).map((trial) => ({
        ...trial,
        locations: trial.locations.slice(0, TRIAL_MAX_LOCATIONS),
      })),
      communityResources: input.communities,
      nextSteps: sections.nextSteps,
      questionsForDoctor: sections.questionsForDoctor,
      timeline: {
        description: input.profile.timeline,
        milestones: [...TIMELINE_MILESTONES],
      },
      disclaimer: DISCLAIMER,
    };
  }

  protected async execute(input: ReportInput): Promise<CompiledReport> {
    const top = topConditions(input.conditions, REPORT_TOP_K);
    const fallback = fallbackSections();

    const executiveSummary = await this.section("summary", fallback.executiveSummary, async () => {
      const text = (await this.callModel(buildSummaryPrompt(input), { label: "summary" })).trim();
      return text || fallback.executiveSummary;
    });

    const analysis =
      top.length === 0
        ? []
        : await this.section("analysis", fallback.analysis, async () =>
            normalizeConditionAnalysis(
              await this.callModel(buildAnalysisPrompt(input.profile, top), { label: "analysis" }),
            ),
          );

    const nextSteps = await this.section("next_steps", fallback.nextSteps, async () =>
      normalizeStringList(
        await this.callModel(buildNextStepsPrompt(input.profile, top), { label: "next_steps" }),
        FALLBACK_NEXT_STEPS,
      ),
    );

    const questionsForDoctor = await this.section(
      "questions",
      fallback.questionsForDoctor,
      async () =>
        normalizeStringList(
          await this.callModel(buildQuestionsPrompt(input.profile, top), { label: "questions" }),
          FALLBACK_DOCTOR_QUESTIONS,
        ),
    );

    return this.assemble(input, { executiveSummary, analysis, nextSteps, questionsForDoctor });
  }

  private async section<T>(name: string, fallback: T, build: () => Promise<T>): Promise<T> {
    try {
      return await build();
    } catch (error) {
      logEvent("warn", "report.section_fallback", {
        section: name,
        message: toErrorMessage(error),
      });
      return fallback;
    }
  }
}
