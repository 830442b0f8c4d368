export const PUBMED_API_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";
export const PUBMED_ARTICLE_BASE = "https://pubmed.ncbi.nlm.nih.gov";
export const CLINICAL_TRIALS_API_BASE = "https://clinicaltrials.gov/api/v2/studies";
export const CLINICAL_TRIALS_STUDY_BASE = "https://clinicaltrials.gov/study";
export const USER_AGENT = "diagnostic-pathway/0.1";

export const UNKNOWN_CONDITION = "Unknown Condition";
export const DEFAULT_CONFIDENCE = 0.5;
export const TEXT_FALLBACK_CONFIDENCE = 0.6;

export const SPECIALIST_TOP_K = 3;
export const COMMUNITY_TOP_K = 3;
export const REPORT_TOP_K = 5;
export const REPORT_MAX_TRIALS = 5;
export const TRIAL_MAX_LOCATIONS = 3;
export const MAX_SEARCH_QUERIES = 5;
export const QUERIES_TO_RUN = 3;
export const ARTICLES_TO_ANALYZE = 10;

export const DISCLAIMER =
  "IMPORTANT DISCLAIMER: This report is generated by an AI system for informational purposes only. " +
  "It is NOT a medical diagnosis and should NOT replace professional medical advice. " +
  "Always consult with qualified healthcare providers before making any medical decisions.";

export const FALLBACK_SUMMARY =
  "Patient presents with multiple chronic symptoms requiring specialist evaluation.";

export const FALLBACK_NEXT_STEPS = [
  "Schedule appointment with primary care physician to discuss findings",
  "Request referrals to recommended specialists",
  "Keep detailed symptom diary including triggers and patterns",
  "Gather all previous medical records and test results",
  "Research patient advocacy groups for support",
];

export const FALLBACK_DOCTOR_QUESTIONS = [
  "What tests can help confirm or rule out these conditions?",
  "Should I see a specialist, and if so, what type?",
  "Are there any treatments available for these conditions?",
  "What symptoms should I monitor most closely?",
  "Are there any lifestyle changes that could help?",
];

export const TIMELINE_MILESTONES = ["Symptom onset", "Symptom progression", "Current status"];
