import { toErrorMessage } from "../telemetry.js";

export type StageName =
  | "symptoms"
  | "literature"
  | "trials"
  | "specialists"
  | "communities"
  | "report";

export type StageSuccess<T> = { ok: true; data: T };
export type StageFailure = { ok: false; reason: string; error: unknown };
export type StageResult<T> = StageSuccess<T> | StageFailure;

export function stageSuccess<T>(data: T): StageSuccess<T> {
  return { ok: true, data };
}

export function stageFailure(error: unknown, reason = toErrorMessage(error)): StageFailure {
  return { ok: false, reason, error };
}

/** Data on success, the supplied empty value on failure. */
export function unwrapOr<T>(result: StageResult<T>, empty: T): T {
  return result.ok ? result.data : empty;
}

/** Run-level failure; only raised when symptom structuring cannot complete. */
export class PipelineError extends Error {
  readonly stage: StageName;

  constructor(stage: StageName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.stage = stage;
  }
}
