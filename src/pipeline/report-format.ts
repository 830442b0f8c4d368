import type { DiagnosticReport, PipelineWarnings } from "../types.js";

const RULE = "=".repeat(60);

const WARNING_LABELS: Array<[keyof PipelineWarnings, string]> = [
  ["conditionsFailed", "Literature search was unavailable; potential diagnoses may be incomplete."],
  ["trialsFailed", "Clinical trial search was unavailable."],
  ["specialistsFailed", "Specialist lookup was unavailable."],
  ["communitiesFailed", "Community resource lookup was unavailable."],
];

export function formatConfidence(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

function heading(title: string): string[] {
  return ["", title, "-".repeat(title.length)];
}

function numbered(items: string[]): string[] {
  return items.map((item, index) => `${index + 1}. ${item}`);
}

/** Active warning messages, in field order. */
export function warningMessages(warnings: PipelineWarnings): string[] {
  return WARNING_LABELS.filter(([key]) => warnings[key]).map(([, message]) => message);
}

/** Plain-text rendering for terminals. */
export function formatReport(report: DiagnosticReport): string {
  const lines: string[] = [
    RULE,
    "DIAGNOSTIC PATHWAY REPORT",
    RULE,
    `Session: ${report.sessionId}`,
    `Generated: ${report.generatedAt}`,
    `Location: ${report.location}`,
  ];

  const warnings = warningMessages(report.warnings);
  if (warnings.length > 0) {
    lines.push(...heading("WARNINGS"), ...warnings.map((message) => `! ${message}`));
  }

  lines.push(...heading("EXECUTIVE SUMMARY"), report.executiveSummary);

  lines.push(...heading("SYMPTOMS"));
  if (report.symptomProfile.primarySymptoms.length === 0) {
    lines.push("No symptoms could be extracted.");
  } else {
    lines.push(...report.symptomProfile.primarySymptoms.map((symptom) => `- ${symptom}`));
  }
  if (report.timeline.description) {
    lines.push(`Timeline: ${report.timeline.description}`);
  }

  lines.push(...heading("POTENTIAL DIAGNOSES"));
  if (report.potentialDiagnoses.length === 0) {
    lines.push("No candidate conditions identified.");
  }
  report.potentialDiagnoses.forEach((diagnosis, index) => {
    lines.push(
      `${index + 1}. ${diagnosis.name} (${formatConfidence(diagnosis.confidence)}, ${diagnosis.confidenceLevel})`,
    );
    if (diagnosis.matchingSymptoms.length > 0) {
      lines.push(`   Matching symptoms: ${diagnosis.matchingSymptoms.join(", ")}`);
    }
    if (diagnosis.rationale) lines.push(`   Why it fits: ${diagnosis.rationale}`);
    if (diagnosis.diagnosticTests.length > 0) {
      lines.push(`   Tests: ${diagnosis.diagnosticTests.join(", ")}`);
    }
  });

  if (report.specialistRecommendations.length > 0) {
    lines.push(...heading("SPECIALISTS"));
    for (const specialist of report.specialistRecommendations) {
      lines.push(
        `[${specialist.priority}] ${specialist.condition}: ${specialist.primarySpecialty}`,
        specialist.recommendations,
        "",
      );
    }
  }

  if (report.clinicalTrials.length > 0) {
    lines.push(...heading("CLINICAL TRIALS"));
    for (const trial of report.clinicalTrials) {
      lines.push(`- ${trial.nctId}: ${trial.title} (${trial.status})`, `  ${trial.url}`);
      if (trial.locations.length > 0) lines.push(`  Locations: ${trial.locations.join("; ")}`);
    }
  }

  if (report.communityResources.length > 0) {
    lines.push(...heading("PATIENT COMMUNITIES"));
    for (const community of report.communityResources) {
      lines.push(`${community.condition}:`, community.resources, "");
    }
  }

  lines.push(...heading("NEXT STEPS"), ...numbered(report.nextSteps));
  lines.push(...heading("QUESTIONS FOR YOUR DOCTOR"), ...numbered(report.questionsForDoctor));
  lines.push("", RULE, report.disclaimer, RULE);

  return lines.join("\n");
}
