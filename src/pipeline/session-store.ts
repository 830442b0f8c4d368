import type {
  CommunityResource,
  ConditionCandidate,
  DiagnosticReport,
  SpecialistRecommendation,
  SymptomProfile,
  TrialRecord,
} from "../types.js";

/** Partial pipeline artifacts captured at one point of a run. */
export type SessionSnapshot = {
  symptoms?: SymptomProfile;
  conditions?: ConditionCandidate[];
  trials?: TrialRecord[];
  specialists?: SpecialistRecommendation[];
  communities?: CommunityResource[];
  report?: DiagnosticReport;
};

export type SessionEntry = {
  timestamp: string;
  data: SessionSnapshot;
};

export type SessionRecord = {
  sessionId: string;
  createdAt: string;
  history: SessionEntry[];
};

export interface SessionStore {
  /** Registers the session if it is new; an existing history is left untouched. */
  create(sessionId: string): SessionRecord;
  append(sessionId: string, data: SessionSnapshot): void;
  history(sessionId: string): SessionEntry[];
  get(sessionId: string): SessionRecord | undefined;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  create(sessionId: string): SessionRecord {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;
    const record: SessionRecord = {
      sessionId,
      createdAt: this.now().toISOString(),
      history: [],
    };
    this.sessions.set(sessionId, record);
    return record;
  }

  append(sessionId: string, data: SessionSnapshot): void {
    this.create(sessionId).history.push({
      timestamp: this.now().toISOString(),
      data,
    });
  }

  history(sessionId: string): SessionEntry[] {
    return [...(this.sessions.get(sessionId)?.history ?? [])];
  }

  get(sessionId: string): SessionRecord | undefined {
    return this.sessions.get(sessionId);
  }

  /** Symptom profiles in the order they were recorded. */
  symptomEvolution(sessionId: string): SymptomProfile[] {
    const profiles: SymptomProfile[] = [];
    for (const entry of this.history(sessionId)) {
      if (entry.data.symptoms) profiles.push(entry.data.symptoms);
    }
    return profiles;
  }

  /** Distinct condition names ever surfaced for the session, first-seen order. */
  searchHistory(sessionId: string): string[] {
    const names = new Set<string>();
    for (const entry of this.history(sessionId)) {
      for (const condition of entry.data.conditions ?? []) {
        if (condition.name) names.add(condition.name);
      }
    }
    return [...names];
  }
}
