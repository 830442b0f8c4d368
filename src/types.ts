export type SymptomProfile = {
  primarySymptoms: string[];
  timeline: string;
  severity: string;
  frequency: string;
  familyHistory: string;
  previousDiagnoses: string[];
  openQuestions: string[];
};

export type ConditionCandidate = {
  name: string;
  /** Always within [0, 1]. */
  confidence: number;
  matchingSymptoms: string[];
  diagnosticTests: string[];
  evidence: string;
};

export type ConfidenceLevel = "High" | "Medium" | "Low";

export type DiagnosisAssessment = ConditionCandidate & {
  confidenceLevel: ConfidenceLevel;
  rationale: string;
  additionalSymptoms: string[];
};

export type TrialRecord = {
  nctId: string;
  title: string;
  status: string;
  url: string;
  locations: string[];
};

export type SpecialistPriority = "High" | "Medium";

export type SpecialtyInfo = {
  primarySpecialty: string;
  secondarySpecialties: string[];
  keyQualifications: string[];
  searchTerms: string[];
};

export type SpecialistRecommendation = {
  condition: string;
  primarySpecialty: string;
  secondarySpecialties: string[];
  keyQualifications: string[];
  recommendations: string;
  priority: SpecialistPriority;
};

export type CommunityResource = {
  condition: string;
  resources: string;
};

export type SymptomTimeline = {
  description: string;
  milestones: string[];
};

export type PipelineWarnings = {
  conditionsFailed: boolean;
  trialsFailed: boolean;
  specialistsFailed: boolean;
  communitiesFailed: boolean;
};

export type UsageRollup = {
  key: string;
  calls: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  estimatedCostUsd: number | null;
};

export type UsageSummary = {
  /** Completed calls, the ones that carry tokens. */
  totalCalls: number;
  /** Attempts per agent, failed and retried ones included. */
  byAgent: Record<string, number>;
  byModel: UsageRollup[];
  totals: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
    estimatedCostUsd: number | null;
  };
};

export type ExecutionMetrics = {
  totalTimeMs: number;
  stagesRun: number;
  agentCalls: Record<string, number>;
  modelUsage: UsageSummary;
};

export type DiagnosticReport = {
  sessionId: string;
  generatedAt: string;
  location: string;
  executiveSummary: string;
  symptomProfile: SymptomProfile;
  potentialDiagnoses: DiagnosisAssessment[];
  specialistRecommendations: SpecialistRecommendation[];
  clinicalTrials: TrialRecord[];
  communityResources: CommunityResource[];
  nextSteps: string[];
  questionsForDoctor: string[];
  timeline: SymptomTimeline;
  disclaimer: string;
  warnings: PipelineWarnings;
  executionMetrics: ExecutionMetrics;
};

export type LiteratureArticle = {
  id: string;
  title: string;
  abstract: string;
  authors: string[];
  year: string;
  url: string;
};

export type TrialStudy = {
  nctId: string;
  title: string;
  status: string;
  summary: string;
  eligibility: string;
  locations: string[];
  url: string;
};

export type TrialSearchOptions = {
  recruitingOnly: boolean;
  maxResults: number;
};

/** Literature query boundary. Resolves to `[]` on no match or transport failure. */
export interface LiteratureSource {
  search(query: string, maxResults: number): Promise<LiteratureArticle[]>;
}

/** Trial registry boundary. Rejects on transport failure. */
export interface TrialRegistry {
  search(condition: string, options: TrialSearchOptions): Promise<TrialStudy[]>;
}
