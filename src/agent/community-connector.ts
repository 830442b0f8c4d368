import { COMMUNITY_TOP_K } from "../constants.js";
import { logEvent, toErrorMessage } from "../telemetry.js";
import type { CommunityResource, ConditionCandidate } from "../types.js";
import { topConditions } from "./normalizer.js";
import { StageAgent } from "./stage-agent.js";

function buildCommunityPrompt(condition: string): string {
  return `Find patient support communities and resources for people living with ${condition}.

Look for official advocacy organisations and foundations, online support groups,
educational websites, patient conferences and peer support networks.

For each of the top 5 give the name, type, URL when available, a short description and why it helps.`;
}

export class CommunityConnectorAgent extends StageAgent<ConditionCandidate[], CommunityResource[]> {
  readonly name = "CommunityConnector";
  readonly stage = "communities" as const;

  emptyValue(): CommunityResource[] {
    return [];
  }

  protected usesModel(conditions: ConditionCandidate[]): boolean {
    return conditions.length > 0;
  }

  protected async execute(conditions: ConditionCandidate[]): Promise<CommunityResource[]> {
    const top = topConditions(conditions, COMMUNITY_TOP_K);
    const resources: CommunityResource[] = [];
    let lastError: unknown = null;

    for (const condition of top) {
      try {
        const body = await this.callModel(buildCommunityPrompt(condition.name), {
          label: "search",
          webSearch: true,
        });
        resources.push({ condition: condition.name, resources: body.trim() });
      } catch (error) {
        lastError = error;
        logEvent("warn", "communities.condition_failed", {
          condition: condition.name,
          message: toErrorMessage(error),
        });
      }
    }

    if (resources.length === 0 && lastError !== null) {
      throw new Error(`community lookup failed for all ${top.length} conditions`, {
        cause: lastError,
      });
    }
    return resources;
  }
}
