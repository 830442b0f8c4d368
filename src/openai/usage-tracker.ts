import { appConfig, type ModelPricing } from "../config.js";
import type { UsageRollup, UsageSummary } from "../types.js";

export type TokenUsage = {
  inputTokens?: number;
  cachedInputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
};

type CallRecord = {
  agent: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  estimatedCostUsd: number | null;
};

function clampNumber(value: unknown): number {
  const num = Number(value ?? 0);
  if (!Number.isFinite(num) || num < 0) return 0;
  return num;
}

function findModelPricing(
  table: Record<string, ModelPricing>,
  model: string,
): ModelPricing | null {
  const direct = table[model];
  if (direct) return direct;

  // longest prefix wins, so "gpt-5-mini-2025-08-07" prices as gpt-5-mini
  const lowerModel = model.toLowerCase();
  let best: { key: string; pricing: ModelPricing } | null = null;
  for (const [entryModel, pricing] of Object.entries(table)) {
    const lowerEntry = entryModel.toLowerCase();
    const matches = lowerModel === lowerEntry || lowerModel.startsWith(`${lowerEntry}-`);
    if (matches && (!best || lowerEntry.length > best.key.length)) {
      best = { key: lowerEntry, pricing };
    }
  }
  return best?.pricing ?? null;
}

function estimateCostUsd(
  pricing: ModelPricing | null,
  input: { inputTokens: number; cachedInputTokens: number; outputTokens: number },
): number | null {
  if (!pricing) return null;
  const uncachedInput = Math.max(0, input.inputTokens - input.cachedInputTokens);
  const cachedInputRate = pricing.cachedInputPer1MUsd ?? pricing.inputPer1MUsd;
  const cost =
    uncachedInput * (pricing.inputPer1MUsd / 1_000_000) +
    input.cachedInputTokens * (cachedInputRate / 1_000_000) +
    input.outputTokens * (pricing.outputPer1MUsd / 1_000_000);
  return Number(cost.toFixed(8));
}

function sumCosts(values: Array<number | null>): number | null {
  let any = false;
  let total = 0;
  for (const value of values) {
    if (typeof value !== "number") continue;
    any = true;
    total += value;
  }
  return any ? Number(total.toFixed(8)) : null;
}

function aggregate(calls: CallRecord[], keyBy: (call: CallRecord) => string): UsageRollup[] {
  const groups = new Map<string, CallRecord[]>();
  for (const call of calls) {
    const key = keyBy(call);
    const current = groups.get(key) ?? [];
    current.push(call);
    groups.set(key, current);
  }

  return [...groups.entries()]
    .map(([key, group]) => ({
      key,
      calls: group.length,
      inputTokens: group.reduce((acc, item) => acc + item.inputTokens, 0),
      outputTokens: group.reduce((acc, item) => acc + item.outputTokens, 0),
      totalTokens: group.reduce((acc, item) => acc + item.totalTokens, 0),
      estimatedCostUsd: sumCosts(group.map((item) => item.estimatedCostUsd)),
    }))
    .sort((a, b) => b.calls - a.calls || b.totalTokens - a.totalTokens);
}

/**
 * Per-run ledger of completed generative calls, keyed by the stage agent
 * that issued them.
 */
export class UsageTracker {
  private readonly calls: CallRecord[] = [];
  private readonly failedAttempts = new Map<string, number>();

  constructor(
    private readonly pricingByModel: Record<string, ModelPricing> = appConfig.openai.pricingByModel,
  ) {}

  record(agent: string, model: string, usage: TokenUsage = {}): void {
    const inputTokens = clampNumber(usage.inputTokens);
    const cachedInputTokens = Math.min(inputTokens, clampNumber(usage.cachedInputTokens));
    const outputTokens = clampNumber(usage.outputTokens);
    const totalTokensRaw = clampNumber(usage.totalTokens);
    const normalizedModel = model.trim() || "unknown-model";

    this.calls.push({
      agent: agent.trim() || "unknown-agent",
      model: normalizedModel,
      inputTokens,
      outputTokens,
      totalTokens: totalTokensRaw > 0 ? totalTokensRaw : inputTokens + outputTokens,
      estimatedCostUsd: estimateCostUsd(
        findModelPricing(this.pricingByModel, normalizedModel),
        { inputTokens, cachedInputTokens, outputTokens },
      ),
    });
  }

  /** A model call that threw; counted per agent, no tokens. */
  recordFailure(agent: string): void {
    const key = agent.trim() || "unknown-agent";
    this.failedAttempts.set(key, (this.failedAttempts.get(key) ?? 0) + 1);
  }

  /** Every attempt by `agent`, failed ones included. */
  callsFor(agent: string): number {
    return (
      this.calls.filter((call) => call.agent === agent).length +
      (this.failedAttempts.get(agent) ?? 0)
    );
  }

  summary(): UsageSummary {
    const byAgent: Record<string, number> = {};
    for (const call of this.calls) {
      byAgent[call.agent] = (byAgent[call.agent] ?? 0) + 1;
    }
    for (const [agent, failed] of this.failedAttempts) {
      byAgent[agent] = (byAgent[agent] ?? 0) + failed;
    }

    return {
      totalCalls: this.calls.length,
      byAgent,
      byModel: aggregate(this.calls, (call) => call.model),
      totals: {
        inputTokens: this.calls.reduce((acc, item) => acc + item.inputTokens, 0),
        outputTokens: this.calls.reduce((acc, item) => acc + item.outputTokens, 0),
        totalTokens: this.calls.reduce((acc, item) => acc + item.totalTokens, 0),
        estimatedCostUsd: sumCosts(this.calls.map((item) => item.estimatedCostUsd)),
      },
    };
  }
}
