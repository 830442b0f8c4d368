import fs from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";

const envCandidates = [
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
];

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    loadDotenv({ path: envPath, override: false, quiet: true });
  }
}

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return fallback;
  return parsed;
};

const parseOptionalString = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export type LogLevelSetting = "silent" | "error" | "warn" | "info";

const parseLogLevel = (value: string | undefined): LogLevelSetting => {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === "silent" ||
    normalized === "error" ||
    normalized === "warn" ||
    normalized === "info"
  ) {
    return normalized;
  }
  return "info";
};

const modelPricingSchema = z.object({
  inputPer1MUsd: z.coerce.number().finite(),
  outputPer1MUsd: z.coerce.number().finite(),
  cachedInputPer1MUsd: z.coerce.number().finite().optional(),
});

export type ModelPricing = z.infer<typeof modelPricingSchema>;

/** `OPENAI_MODEL_PRICING_JSON` overrides; rows that do not validate are dropped. */
function parseModelPricingMap(value: string | undefined): Record<string, ModelPricing> {
  if (!value) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    console.warn(`OPENAI_MODEL_PRICING_JSON is not valid JSON, ignoring it: ${String(error)}`);
    return {};
  }

  const rows = z.record(z.unknown()).safeParse(parsed);
  if (!rows.success) return {};
  const out: Record<string, ModelPricing> = {};
  for (const [model, raw] of Object.entries(rows.data)) {
    const row = modelPricingSchema.safeParse(raw);
    if (row.success) out[model] = row.data;
  }
  return out;
}

const defaultModelPricing: Record<string, ModelPricing> = {
  "gpt-5": {
    inputPer1MUsd: 1.25,
    cachedInputPer1MUsd: 0.125,
    outputPer1MUsd: 10,
  },
  "gpt-5-mini": {
    inputPer1MUsd: 0.25,
    cachedInputPer1MUsd: 0.025,
    outputPer1MUsd: 2,
  },
  "gpt-5-nano": {
    inputPer1MUsd: 0.05,
    cachedInputPer1MUsd: 0.005,
    outputPer1MUsd: 0.4,
  },
};

export const appConfig = {
  openAiApiKey: parseOptionalString(process.env.OPENAI_API_KEY),
  openai: {
    model: process.env.OPENAI_MODEL ?? "gpt-5-mini",
    pricingByModel: {
      ...defaultModelPricing,
      ...parseModelPricingMap(process.env.OPENAI_MODEL_PRICING_JSON),
    },
  },
  rateLimit: {
    callsPerMinute: Math.max(
      1,
      parseNumber(process.env.RATE_LIMIT_CALLS_PER_MINUTE, 10),
    ),
  },
  retry: {
    maxRetries: Math.max(0, Math.floor(parseNumber(process.env.RETRY_MAX_RETRIES, 3))),
    initialDelayMs: parseNumber(process.env.RETRY_INITIAL_DELAY_MS, 1_000),
    maxDelayMs: parseNumber(process.env.RETRY_MAX_DELAY_MS, 60_000),
    backoffMultiplier: parseNumber(process.env.RETRY_BACKOFF_MULTIPLIER, 2),
  },
  sources: {
    ncbiApiKey: parseOptionalString(process.env.NCBI_API_KEY),
    pubmedMcpUrl: parseOptionalString(process.env.PUBMED_MCP_URL),
    pubmedMaxResults: parseNumber(process.env.PUBMED_MAX_RESULTS, 10),
    clinicalTrialsMaxResults: parseNumber(process.env.CLINICAL_TRIALS_MAX_RESULTS, 5),
    httpTimeoutMs: parseNumber(process.env.HTTP_TIMEOUT_MS, 15_000),
  },
  pipeline: {
    // 0 keeps fan-out branches unbounded
    branchTimeoutMs: Math.max(0, parseNumber(process.env.PIPELINE_BRANCH_TIMEOUT_MS, 0)),
    defaultLocation: process.env.DEFAULT_PATIENT_LOCATION ?? "United States",
  },
  cache: {
    ttlMs: parseNumber(process.env.CACHE_TTL_MS, 60 * 60 * 1000),
    maxEntries: parseNumber(process.env.CACHE_MAX_ENTRIES, 500),
  },
  server: {
    host: process.env.HOST ?? "0.0.0.0",
    port: parseNumber(process.env.PORT, 3000),
  },
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};

export function assertRuntimeConfig(): void {
  if (!appConfig.openAiApiKey) {
    console.warn("OPENAI_API_KEY missing: every generative stage will fail until it is set.");
  }
}
