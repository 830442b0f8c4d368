import type { GenerativeService } from "../openai/client.js";
import type { RateLimiter } from "../openai/rate-limit.js";
import { withRetry, type RetryOptions } from "../openai/retry.js";
import type { UsageTracker } from "../openai/usage-tracker.js";
import {
  stageFailure,
  stageSuccess,
  type StageName,
  type StageResult,
} from "../pipeline/stage-result.js";
import { logEvent, toErrorMessage } from "../telemetry.js";

export type StageAgentDeps = {
  generator: GenerativeService;
  /** Shared with every other agent of the same pipeline. */
  limiter: RateLimiter;
  usage: UsageTracker;
  retry?: Partial<RetryOptions>;
  model?: string;
};

export type ModelCallOptions = {
  webSearch?: boolean;
  label?: string;
};

/**
 * One pipeline stage: prompt → generative call (retry + limiter) → normalize
 * → post-filter. `run` never throws; failures come back as a tagged result
 * and the orchestrator decides whether they are fatal.
 */
export abstract class StageAgent<I, O> {
  abstract readonly name: string;
  abstract readonly stage: StageName;

  constructor(protected readonly deps: StageAgentDeps) {}

  abstract emptyValue(): O;

  protected abstract execute(input: I): Promise<O>;

  /** False when `input` cannot lead to a model call, so no limiter slot is taken. */
  protected usesModel(_input: I): boolean {
    return true;
  }

  async run(input: I): Promise<StageResult<O>> {
    try {
      if (this.usesModel(input)) {
        await this.deps.limiter.acquire();
      }
      return stageSuccess(await this.execute(input));
    } catch (error) {
      logEvent("warn", "stage.failed", {
        stage: this.stage,
        agent: this.name,
        message: toErrorMessage(error),
      });
      return stageFailure(error);
    }
  }

  protected async callModel(prompt: string, options: ModelCallOptions = {}): Promise<string> {
    const operation = options.label ?? "generate";
    const result = await withRetry(
      () =>
        this.deps.generator
          .generate({
            prompt,
            agent: this.name,
            operation,
            model: this.deps.model,
            webSearch: options.webSearch,
          })
          .catch((error: unknown) => {
            this.deps.usage.recordFailure(this.name);
            throw error;
          }),
      { ...this.deps.retry, label: `${this.name}.${operation}` },
    );
    this.deps.usage.record(this.name, result.model, result.usage);
    return result.text;
  }
}
