import {
  DEFAULT_CONFIDENCE,
  MAX_SEARCH_QUERIES,
  TEXT_FALLBACK_CONFIDENCE,
  UNKNOWN_CONDITION,
} from "../constants.js";
import type {
  ConditionCandidate,
  ConfidenceLevel,
  SpecialtyInfo,
  SymptomProfile,
} from "../types.js";

// Accepted key spellings per field, probed in order.
const CONDITION_NAME_KEYS = ["name", "condition", "condition_name", "diagnosis", "disease"];
const CONFIDENCE_KEYS = ["confidence", "confidence_score", "score", "probability"];
const MATCHING_SYMPTOM_KEYS = ["matching_symptoms", "matchingSymptoms", "symptoms", "matched_symptoms"];
const DIAGNOSTIC_TEST_KEYS = [
  "diagnostic_tests",
  "diagnosticTests",
  "tests",
  "key_diagnostic_tests",
  "diagnostic_criteria",
  "key_diagnostic_criteria",
];
const EVIDENCE_KEYS = ["evidence", "supporting_evidence", "supportingEvidence", "rationale"];

const PROFILE_KEYS = {
  primarySymptoms: ["primary_symptoms", "primarySymptoms", "symptoms"],
  timeline: ["timeline", "symptom_timeline", "onset"],
  severity: ["severity", "overall_severity"],
  frequency: ["frequency", "frequency_pattern", "pattern"],
  familyHistory: ["family_history", "familyHistory"],
  previousDiagnoses: ["previous_diagnoses", "previousDiagnoses", "prior_diagnoses", "diagnoses"],
  openQuestions: [
    "questions_to_ask",
    "open_questions",
    "openQuestions",
    "questions",
    "follow_up_questions",
  ],
} satisfies Record<keyof SymptomProfile, string[]>;

const SPECIALTY_KEYS = {
  primarySpecialty: ["primary_specialty", "primarySpecialty", "specialty", "primary_specialist"],
  secondarySpecialties: ["secondary_specialties", "secondarySpecialties", "other_specialties"],
  keyQualifications: ["key_qualifications", "keyQualifications", "qualifications"],
  searchTerms: ["search_terms", "searchTerms", "keywords"],
} satisfies Record<keyof SpecialtyInfo, string[]>;

const ANALYSIS_RATIONALE_KEYS = ["why_fits", "rationale", "fit", "explanation", "reasoning", "why"];
const ANALYSIS_LEVEL_KEYS = ["confidence_level", "confidenceLevel", "confidence"];
const ANALYSIS_ADDITIONAL_KEYS = [
  "additional_symptoms",
  "additionalSymptoms",
  "symptoms_to_watch",
  "additional_symptoms_to_increase_confidence",
];

const LIST_MARKER_LINE = /^(?:[-*•]|\d)/;
const LIST_MARKER_PREFIX = /^[-*•\d.)\s]+/;
const CONDITION_KEYWORDS = /\b(syndrome|disease|disorder|condition)\b/i;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonFragment(text: string, pattern: RegExp): unknown {
  const match = text.match(pattern);
  if (!match) return undefined;
  try {
    return JSON.parse(match[0]) as unknown;
  } catch {
    return undefined;
  }
}

/** First `[ ... ]` span (greedy, across lines) that parses as a JSON array. */
export function extractJsonArray(text: string): unknown[] | null {
  const parsed = parseJsonFragment(text, /\[[\s\S]*\]/);
  return Array.isArray(parsed) ? parsed : null;
}

/** First `{ ... }` span (greedy, across lines) that parses as a JSON object. */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const parsed = parseJsonFragment(text, /\{[\s\S]*\}/);
  return isRecord(parsed) ? parsed : null;
}

/** Lines opening with a bullet, dash or digit, with the marker stripped. */
export function parseListItems(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => LIST_MARKER_LINE.test(line))
    .map((line) => line.replace(LIST_MARKER_PREFIX, "").trim())
    .filter(Boolean);
}

export function pickField(record: Record<string, unknown>, aliases: readonly string[]): unknown {
  for (const alias of aliases) {
    const value = record[alias];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

export function toText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) return toStringList(value).join("; ");
  return "";
}

function firstStringValue(record: Record<string, unknown>): string {
  for (const value of Object.values(record)) {
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return "";
}

export function toStringList(value: unknown): string[] {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? [trimmed] : [];
  }
  if (!Array.isArray(value)) return [];
  const out: string[] = [];
  for (const item of value) {
    const text =
      typeof item === "string"
        ? item.trim()
        : typeof item === "number"
          ? String(item)
          : isRecord(item)
            ? firstStringValue(item)
            : "";
    if (text) out.push(text);
  }
  return out;
}

/**
 * Reads a [0, 1] confidence. Numeric strings are accepted, values in (1, 100]
 * are read as percentages, everything else yields the default.
 */
export function toConfidence(value: unknown): number {
  let numeric: number | null = null;
  if (typeof value === "number") {
    numeric = value;
  } else if (typeof value === "string") {
    const match = value.trim().match(/^(\d+(?:\.\d+)?)\s*%?$/);
    if (match) numeric = Number(match[1]);
  }
  if (numeric == null || !Number.isFinite(numeric)) return DEFAULT_CONFIDENCE;
  if (numeric > 1 && numeric <= 100) numeric /= 100;
  return Math.min(1, Math.max(0, numeric));
}

export function confidenceLevelFor(confidence: number): ConfidenceLevel {
  if (confidence > 0.7) return "High";
  if (confidence > 0.4) return "Medium";
  return "Low";
}

function toConfidenceLevel(value: unknown): ConfidenceLevel | null {
  if (typeof value === "number") return confidenceLevelFor(toConfidence(value));
  if (typeof value !== "string") return null;
  const match = value.match(/\b(high|medium|moderate|low)\b/i);
  if (!match) return null;
  const level = match[1].toLowerCase();
  if (level === "high") return "High";
  if (level === "low") return "Low";
  return "Medium";
}

/**
 * Best-effort string list: a JSON array first, then list-marked lines, then
 * a copy of `fallback`.
 */
export function normalizeStringList(text: string, fallback: readonly string[] = []): string[] {
  const parsed = extractJsonArray(text);
  if (parsed) {
    const items = toStringList(parsed);
    if (items.length > 0) return items;
  }
  const lines = parseListItems(text);
  if (lines.length > 0) return lines;
  return [...fallback];
}

export function normalizeSearchQueries(text: string): string[] {
  const stripQuotes = (value: string) => value.replace(/^["'`]+|["'`,]+$/g, "").trim();
  const parsed = extractJsonArray(text);
  let queries = parsed ? toStringList(parsed) : [];
  if (queries.length === 0) queries = parseListItems(text);
  if (queries.length === 0) {
    queries = text
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }
  return queries.map(stripQuotes).filter(Boolean).slice(0, MAX_SEARCH_QUERIES);
}

export function defaultSymptomProfile(): SymptomProfile {
  return {
    primarySymptoms: [],
    timeline: "",
    severity: "unknown",
    frequency: "",
    familyHistory: "",
    previousDiagnoses: [],
    openQuestions: [],
  };
}

export function normalizeSymptomProfile(text: string): SymptomProfile {
  const record = extractJsonObject(text);
  if (!record) return defaultSymptomProfile();

  return {
    primarySymptoms: toStringList(pickField(record, PROFILE_KEYS.primarySymptoms)),
    timeline: toText(pickField(record, PROFILE_KEYS.timeline)),
    severity: toText(pickField(record, PROFILE_KEYS.severity)) || "unknown",
    frequency: toText(pickField(record, PROFILE_KEYS.frequency)),
    familyHistory: toText(pickField(record, PROFILE_KEYS.familyHistory)),
    previousDiagnoses: toStringList(pickField(record, PROFILE_KEYS.previousDiagnoses)),
    openQuestions: toStringList(pickField(record, PROFILE_KEYS.openQuestions)),
  };
}

export function normalizeCondition(raw: unknown): ConditionCandidate | null {
  if (typeof raw === "string") {
    const name = raw.trim();
    return {
      name: name || UNKNOWN_CONDITION,
      confidence: DEFAULT_CONFIDENCE,
      matchingSymptoms: [],
      diagnosticTests: [],
      evidence: "",
    };
  }
  if (!isRecord(raw)) return null;

  return {
    name: toText(pickField(raw, CONDITION_NAME_KEYS)) || UNKNOWN_CONDITION,
    confidence: toConfidence(pickField(raw, CONFIDENCE_KEYS)),
    matchingSymptoms: toStringList(pickField(raw, MATCHING_SYMPTOM_KEYS)),
    diagnosticTests: toStringList(pickField(raw, DIAGNOSTIC_TEST_KEYS)),
    evidence: toText(pickField(raw, EVIDENCE_KEYS)),
  };
}

/**
 * Condition candidates from model text. A JSON array wins, even an empty
 * one; otherwise list lines naming a syndrome, disease, disorder or
 * condition become low-detail candidates (at most five).
 */
export function normalizeConditions(text: string): ConditionCandidate[] {
  const parsed = extractJsonArray(text);
  if (parsed) {
    const out: ConditionCandidate[] = [];
    for (const item of parsed) {
      const condition = normalizeCondition(item);
      if (condition) out.push(condition);
    }
    return out;
  }

  return parseListItems(text)
    .map((item) => (item.split(":")[0] ?? "").replace(/\*+/g, "").trim())
    .filter((name) => name.length >= 5 && name.length <= 80 && CONDITION_KEYWORDS.test(name))
    .slice(0, 5)
    .map((name) => ({
      name,
      confidence: TEXT_FALLBACK_CONFIDENCE,
      matchingSymptoms: [],
      diagnosticTests: [],
      evidence: "",
    }));
}

export function defaultSpecialtyInfo(): SpecialtyInfo {
  return {
    primarySpecialty: "Specialist",
    secondarySpecialties: [],
    keyQualifications: [],
    searchTerms: [],
  };
}

export function normalizeSpecialtyInfo(text: string): SpecialtyInfo {
  const record = extractJsonObject(text);
  if (!record) return defaultSpecialtyInfo();
  return {
    primarySpecialty:
      toText(pickField(record, SPECIALTY_KEYS.primarySpecialty)) || "Specialist",
    secondarySpecialties: toStringList(pickField(record, SPECIALTY_KEYS.secondarySpecialties)),
    keyQualifications: toStringList(pickField(record, SPECIALTY_KEYS.keyQualifications)),
    searchTerms: toStringList(pickField(record, SPECIALTY_KEYS.searchTerms)),
  };
}

export type ConditionAnalysis = {
  name: string;
  rationale: string;
  confidenceLevel: ConfidenceLevel | null;
  diagnosticTests: string[];
  additionalSymptoms: string[];
};

/** Per-condition commentary; entries without a recognisable name are dropped. */
export function normalizeConditionAnalysis(text: string): ConditionAnalysis[] {
  const parsed = extractJsonArray(text);
  if (!parsed) return [];
  const out: ConditionAnalysis[] = [];
  for (const item of parsed) {
    if (!isRecord(item)) continue;
    const name = toText(pickField(item, CONDITION_NAME_KEYS));
    if (!name) continue;
    out.push({
      name,
      rationale: toText(pickField(item, ANALYSIS_RATIONALE_KEYS)),
      confidenceLevel: toConfidenceLevel(pickField(item, ANALYSIS_LEVEL_KEYS)),
      diagnosticTests: toStringList(pickField(item, DIAGNOSTIC_TEST_KEYS)),
      additionalSymptoms: toStringList(pickField(item, ANALYSIS_ADDITIONAL_KEYS)),
    });
  }
  return out;
}

/** Stable: equal confidences keep their original order. */
export function rankByConfidence<T extends { confidence: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.confidence - a.confidence);
}

export function topConditions<T extends { confidence: number }>(
  items: readonly T[],
  k: number,
): T[] {
  return rankByConfidence(items).slice(0, Math.max(0, k));
}
