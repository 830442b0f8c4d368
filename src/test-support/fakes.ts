import type { StageAgentDeps } from "../agent/stage-agent.js";
import type { GenerationRequest, GenerationResult, GenerativeService } from "../openai/client.js";
import { RateLimiter, type Clock } from "../openai/rate-limit.js";
import { UsageTracker } from "../openai/usage-tracker.js";
import type {
  LiteratureArticle,
  LiteratureSource,
  TrialRegistry,
  TrialSearchOptions,
  TrialStudy,
} from "../types.js";

/** Virtual time: `sleep` advances `now` immediately and records the wait. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export type ScriptedReply = string | Error | ((request: GenerationRequest) => string);

/**
 * Replies keyed by `agent.operation`. A list is consumed one entry per
 * call; the last entry repeats once the rest are used up.
 */
export class FakeGenerativeService implements GenerativeService {
  readonly requests: GenerationRequest[] = [];
  private readonly queues = new Map<string, ScriptedReply[]>();

  constructor(
    replies: Record<string, ScriptedReply | ScriptedReply[]> = {},
    private readonly fallback: ScriptedReply = "",
  ) {
    for (const [key, reply] of Object.entries(replies)) {
      this.queues.set(key, Array.isArray(reply) ? [...reply] : [reply]);
    }
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push(request);
    const key = `${request.agent}.${request.operation ?? "generate"}`;
    const queue = this.queues.get(key);
    const reply = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    const resolved = reply ?? this.fallback;

    if (resolved instanceof Error) throw resolved;
    const text = typeof resolved === "function" ? resolved(request) : resolved;
    return {
      text,
      model: request.model ?? "test-model",
      usage: { inputTokens: 100, outputTokens: 20, totalTokens: 120 },
    };
  }

  callsTo(key: string): GenerationRequest[] {
    return this.requests.filter(
      (request) => `${request.agent}.${request.operation ?? "generate"}` === key,
    );
  }
}

export class FakeLiteratureSource implements LiteratureSource {
  readonly queries: Array<{ query: string; maxResults: number }> = [];

  constructor(private readonly articles: LiteratureArticle[] = []) {}

  async search(query: string, maxResults: number): Promise<LiteratureArticle[]> {
    this.queries.push({ query, maxResults });
    return this.articles.slice(0, maxResults);
  }
}

export class FakeTrialRegistry implements TrialRegistry {
  readonly searches: Array<{ condition: string; options: TrialSearchOptions }> = [];

  constructor(private readonly result: TrialStudy[] | Error = []) {}

  async search(condition: string, options: TrialSearchOptions): Promise<TrialStudy[]> {
    this.searches.push({ condition, options });
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export function makeArticle(id: string, title: string): LiteratureArticle {
  return {
    id,
    title,
    abstract: `Abstract for ${title}`,
    authors: ["A Author"],
    year: "2024",
    url: `https://pubmed.ncbi.nlm.nih.gov/${id}/`,
  };
}

export function makeStudy(nctId: string, locations: string[] = []): TrialStudy {
  return {
    nctId,
    title: `Study ${nctId}`,
    status: "RECRUITING",
    summary: "Summary",
    eligibility: "Adults",
    locations,
    url: `https://clinicaltrials.gov/study/${nctId}`,
  };
}

/** Agent wiring on virtual time; retries sleep on the same clock. */
export function makeAgentDeps(generator: GenerativeService, clock = new FakeClock()) {
  const deps: StageAgentDeps = {
    generator,
    limiter: new RateLimiter({ callsPerMinute: 60, clock }),
    usage: new UsageTracker({}),
    retry: {
      maxRetries: 2,
      initialDelayMs: 1_000,
      maxDelayMs: 60_000,
      backoffMultiplier: 2,
      sleep: (ms) => clock.sleep(ms),
    },
  };
  return { deps, clock };
}
