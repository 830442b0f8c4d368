import { TRIAL_MAX_LOCATIONS } from "../constants.js";
import type { SymptomProfile, TrialRecord, TrialRegistry } from "../types.js";
import { StageAgent, type StageAgentDeps } from "./stage-agent.js";

/** Recruiting trials for the leading symptom. Registry-only: no model call. */
export class TrialSearchAgent extends StageAgent<SymptomProfile, TrialRecord[]> {
  readonly name = "TrialSearch";
  readonly stage = "trials" as const;

  constructor(
    deps: StageAgentDeps,
    private readonly registry: TrialRegistry,
    private readonly maxResults = 5,
  ) {
    super(deps);
  }

  emptyValue(): TrialRecord[] {
    return [];
  }

  protected usesModel(): boolean {
    return false;
  }

  protected async execute(profile: SymptomProfile): Promise<TrialRecord[]> {
    const leading = profile.primarySymptoms[0]?.trim();
    if (!leading) return [];

    const studies = await this.registry.search(leading, {
      recruitingOnly: true,
      maxResults: this.maxResults,
    });
    return studies.map((study) => ({
      nctId: study.nctId,
      title: study.title,
      status: study.status,
      url: study.url,
      locations: study.locations.slice(0, TRIAL_MAX_LOCATIONS),
    }));
  }
}
