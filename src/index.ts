export { DiagnosticPipeline } from "./pipeline/orchestrator.js";
export type {
  DiagnoseRequest,
  PipelineDeps,
  PipelineEvent,
  PipelineState,
} from "./pipeline/orchestrator.js";
export { createDefaultPipeline } from "./pipeline/default-pipeline.js";
export { InMemorySessionStore, type SessionStore } from "./pipeline/session-store.js";
export { PipelineError, type StageResult } from "./pipeline/stage-result.js";
export { formatReport } from "./pipeline/report-format.js";
export { RateLimiter } from "./openai/rate-limit.js";
export { withRetry } from "./openai/retry.js";
export type { GenerativeService } from "./openai/client.js";
export { createApp } from "./server.js";
export type * from "./types.js";
