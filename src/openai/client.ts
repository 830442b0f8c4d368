import OpenAI from "openai";
import { appConfig } from "../config.js";
import { logEvent } from "../telemetry.js";
import type { TokenUsage } from "./usage-tracker.js";

export type GenerationRequest = {
  prompt: string;
  /** Name of the stage agent issuing the call; used for logs and usage. */
  agent: string;
  /** Step within the agent, e.g. "queries" or "analyze". */
  operation?: string;
  model?: string;
  /** Grounds the answer with the provider's web search tool. */
  webSearch?: boolean;
};

export type GenerationResult = {
  text: string;
  model: string;
  usage?: TokenUsage;
};

/**
 * Free-text generation boundary. Output is unstructured and may or may not
 * contain a JSON fragment; quota and transient failures reject with errors
 * that `isRetriableError` recognises.
 */
export interface GenerativeService {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

const clientCache = new Map<string, OpenAI>();

function getOpenAiClient(apiKey: string): OpenAI {
  const cached = clientCache.get(apiKey);
  if (cached) return cached;
  // retries are owned by withRetry
  const client = new OpenAI({ apiKey, maxRetries: 0 });
  clientCache.set(apiKey, client);
  return client;
}

export class OpenAiGenerativeService implements GenerativeService {
  constructor(
    private readonly apiKey: string | undefined = appConfig.openAiApiKey,
    private readonly defaultModel: string = appConfig.openai.model,
  ) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    if (!this.apiKey) {
      throw new Error("OPENAI_API_KEY is not configured");
    }

    const model = request.model ?? this.defaultModel;
    const startedAt = Date.now();
    const response = await getOpenAiClient(this.apiKey).responses.create({
      model,
      input: request.prompt,
      tools: request.webSearch ? [{ type: "web_search_preview" }] : undefined,
    });

    const usage = response.usage;
    logEvent("info", "openai.generate", {
      agent: request.agent,
      operation: request.operation,
      model,
      webSearch: Boolean(request.webSearch),
      durationMs: Date.now() - startedAt,
      totalTokens: usage?.total_tokens,
    });

    return {
      text: response.output_text,
      model: response.model || model,
      usage: usage
        ? {
            inputTokens: usage.input_tokens,
            cachedInputTokens: usage.input_tokens_details?.cached_tokens,
            outputTokens: usage.output_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
    };
  }
}
