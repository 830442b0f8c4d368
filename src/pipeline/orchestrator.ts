import { randomUUID } from "node:crypto";
import { CommunityConnectorAgent } from "../agent/community-connector.js";
import { LiteratureSearchAgent } from "../agent/literature-search.js";
import { fallbackSections, ReportCompilerAgent, type ReportInput } from "../agent/report-compiler.js";
import { SpecialistFinderAgent } from "../agent/specialist-finder.js";
import type { StageAgent, StageAgentDeps } from "../agent/stage-agent.js";
import { SymptomAggregatorAgent } from "../agent/symptom-aggregator.js";
import { TrialSearchAgent } from "../agent/trial-search.js";
import { appConfig } from "../config.js";
import { withTimeout } from "../http.js";
import type { GenerativeService } from "../openai/client.js";
import { RateLimiter, systemClock, type Clock } from "../openai/rate-limit.js";
import type { RetryOptions } from "../openai/retry.js";
import { UsageTracker } from "../openai/usage-tracker.js";
import {
  endRunLog,
  errorRunLog,
  startRunLog,
  stepRunLog,
  warnRunLog,
  type RunLogContext,
} from "../telemetry.js";
import type {
  DiagnosticReport,
  LiteratureSource,
  PipelineWarnings,
  TrialRegistry,
} from "../types.js";
import type { SessionStore } from "./session-store.js";
import {
  PipelineError,
  stageFailure,
  unwrapOr,
  type StageName,
  type StageResult,
} from "./stage-result.js";

export type PipelineState =
  | "INIT"
  | "SYMPTOMS_COLLECTED"
  | "SEARCHES_DISPATCHED"
  | "SEARCHES_JOINED"
  | "DEPENDENTS_DISPATCHED"
  | "DEPENDENTS_JOINED"
  | "REPORT_COMPILED"
  | "DONE"
  | "FAILED";

export type StageStatus = "started" | "succeeded" | "failed";

export type PipelineEvent =
  | { type: "state"; state: PipelineState }
  | { type: "stage"; stage: StageName; status: StageStatus; reason?: string };

export type PipelineDeps = {
  generator: GenerativeService;
  literature: LiteratureSource;
  trials: TrialRegistry;
  store?: SessionStore;
  /** Shared by every agent of every run on this pipeline; one is created when omitted. */
  limiter?: RateLimiter;
  clock?: Clock;
  retry?: Partial<RetryOptions>;
  model?: string;
  /** Per fan-out branch; 0 leaves branches unbounded. */
  branchTimeoutMs?: number;
  onEvent?: (event: PipelineEvent) => void;
};

export type DiagnoseRequest = {
  narrative: string;
  location?: string;
  sessionId?: string;
};

type RunContext = {
  log: RunLogContext;
  stagesRun: number;
};

/**
 * Runs the five stage agents in dependency order:
 * symptoms → (literature ∥ trials) → (specialists ∥ communities) → report.
 * Only a symptom-structuring failure aborts the run; every other stage
 * degrades to its empty value and raises a warning flag.
 *
 * An instance serves one run at a time, since `state` tracks that run;
 * build one pipeline per concurrent request and share the limiter instead.
 */
export class DiagnosticPipeline {
  private readonly limiter: RateLimiter;
  private readonly clock: Clock;
  private currentState: PipelineState = "INIT";
  private running = false;

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? systemClock;
    this.limiter =
      deps.limiter ??
      new RateLimiter({ callsPerMinute: appConfig.rateLimit.callsPerMinute, clock: this.clock });
  }

  get state(): PipelineState {
    return this.currentState;
  }

  async run(request: DiagnoseRequest): Promise<DiagnosticReport> {
    if (this.running) {
      throw new Error("pipeline is already running; create one pipeline per concurrent run");
    }
    this.running = true;
    try {
      return await this.execute(request);
    } finally {
      this.running = false;
    }
  }

  private async execute(request: DiagnoseRequest): Promise<DiagnosticReport> {
    const startedAt = this.clock.now();
    const sessionId = request.sessionId?.trim() || randomUUID();
    const location = request.location?.trim() || appConfig.pipeline.defaultLocation;
    const usage = new UsageTracker();
    const agentDeps: StageAgentDeps = {
      generator: this.deps.generator,
      limiter: this.limiter,
      usage,
      model: this.deps.model,
      retry: { sleep: (ms) => this.clock.sleep(ms), ...this.deps.retry },
    };
    const ctx: RunContext = {
      log: startRunLog("pipeline", { sessionId, location }),
      stagesRun: 0,
    };

    this.transition(ctx, "INIT");
    this.deps.store?.create(sessionId);

    const symptomsResult = await this.runStage(
      ctx,
      new SymptomAggregatorAgent(agentDeps),
      { narrative: request.narrative },
      false,
    );
    if (!symptomsResult.ok) {
      this.transition(ctx, "FAILED");
      errorRunLog(ctx.log, "pipeline.failed", symptomsResult.error, { stage: "symptoms" });
      throw new PipelineError("symptoms", `symptom structuring failed: ${symptomsResult.reason}`, {
        cause: symptomsResult.error,
      });
    }
    const profile = symptomsResult.data;
    this.deps.store?.append(sessionId, { symptoms: profile });
    this.transition(ctx, "SYMPTOMS_COLLECTED", {
      primarySymptoms: profile.primarySymptoms.length,
    });

    const literatureAgent = new LiteratureSearchAgent(
      agentDeps,
      this.deps.literature,
      appConfig.sources.pubmedMaxResults,
    );
    const trialAgent = new TrialSearchAgent(
      agentDeps,
      this.deps.trials,
      appConfig.sources.clinicalTrialsMaxResults,
    );
    this.transition(ctx, "SEARCHES_DISPATCHED");
    const [literatureResult, trialsResult] = await Promise.all([
      this.runStage(ctx, literatureAgent, profile, true),
      this.runStage(ctx, trialAgent, profile, true),
    ]);
    const conditions = unwrapOr(literatureResult, literatureAgent.emptyValue());
    const trials = unwrapOr(trialsResult, trialAgent.emptyValue());
    this.deps.store?.append(sessionId, { conditions, trials });
    this.transition(ctx, "SEARCHES_JOINED", {
      conditions: conditions.length,
      trials: trials.length,
    });

    const specialistAgent = new SpecialistFinderAgent(agentDeps);
    const communityAgent = new CommunityConnectorAgent(agentDeps);
    this.transition(ctx, "DEPENDENTS_DISPATCHED");
    const [specialistsResult, communitiesResult] = await Promise.all([
      this.runStage(ctx, specialistAgent, { conditions, location }, true),
      this.runStage(ctx, communityAgent, conditions, true),
    ]);
    const specialists = unwrapOr(specialistsResult, specialistAgent.emptyValue());
    const communities = unwrapOr(communitiesResult, communityAgent.emptyValue());
    this.deps.store?.append(sessionId, { specialists, communities });
    this.transition(ctx, "DEPENDENTS_JOINED", {
      specialists: specialists.length,
      communities: communities.length,
    });

    const compiler = new ReportCompilerAgent(agentDeps);
    const reportInput: ReportInput = { profile, conditions, specialists, trials, communities };
    const compiled = await this.runStage(ctx, compiler, reportInput, false);
    const body = compiled.ok ? compiled.data : compiler.assemble(reportInput, fallbackSections());

    const warnings: PipelineWarnings = {
      conditionsFailed: !literatureResult.ok,
      trialsFailed: !trialsResult.ok,
      specialistsFailed: !specialistsResult.ok,
      communitiesFailed: !communitiesResult.ok,
    };
    const modelUsage = usage.summary();
    const report: DiagnosticReport = {
      sessionId,
      generatedAt: new Date(this.clock.now()).toISOString(),
      location,
      ...body,
      warnings,
      executionMetrics: {
        totalTimeMs: this.clock.now() - startedAt,
        stagesRun: ctx.stagesRun,
        agentCalls: modelUsage.byAgent,
        modelUsage,
      },
    };
    this.transition(ctx, "REPORT_COMPILED");

    this.deps.store?.append(sessionId, { report });
    this.transition(ctx, "DONE");
    endRunLog(ctx.log, {
      sessionId,
      totalTimeMs: report.executionMetrics.totalTimeMs,
      modelCalls: modelUsage.totalCalls,
      warnings,
    });
    return report;
  }

  private async runStage<I, O>(
    ctx: RunContext,
    agent: StageAgent<I, O>,
    input: I,
    bounded: boolean,
  ): Promise<StageResult<O>> {
    ctx.stagesRun += 1;
    this.emit({ type: "stage", stage: agent.stage, status: "started" });

    const timeoutMs = this.deps.branchTimeoutMs ?? appConfig.pipeline.branchTimeoutMs;
    const result =
      bounded && timeoutMs > 0
        ? await withTimeout(agent.run(input), timeoutMs).catch((error: unknown) =>
            stageFailure(error),
          )
        : await agent.run(input);

    if (result.ok) {
      this.emit({ type: "stage", stage: agent.stage, status: "succeeded" });
      stepRunLog(ctx.log, "stage.succeeded", { stage: agent.stage, agent: agent.name });
    } else {
      this.emit({ type: "stage", stage: agent.stage, status: "failed", reason: result.reason });
      warnRunLog(ctx.log, "pipeline.stage_failed", {
        stage: agent.stage,
        agent: agent.name,
        reason: result.reason,
      });
    }
    return result;
  }

  private transition(ctx: RunContext, state: PipelineState, fields: Record<string, unknown> = {}) {
    this.currentState = state;
    stepRunLog(ctx.log, "pipeline.state", { state, ...fields });
    this.emit({ type: "state", state });
  }

  private emit(event: PipelineEvent) {
    this.deps.onEvent?.(event);
  }
}
