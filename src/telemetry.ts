import { randomUUID } from "node:crypto";
import { appConfig } from "./config.js";

type LogLevel = "info" | "warn" | "error";

const levelRank: Record<LogLevel | "silent", number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

export type RunLogContext = {
  runId: string;
  scope: string;
  startedAt: number;
};

function nowIso() {
  return new Date().toISOString();
}

export function compactString(value: string, max = 240): string {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (normalized.length <= max) return normalized;
  return `${normalized.slice(0, max - 1)}…`;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return compactString(error.message);
  if (typeof error === "string") return compactString(error);
  return "unknown error";
}

function emit(level: LogLevel, event: string, fields: Record<string, unknown>) {
  if (levelRank[level] < levelRank[appConfig.logLevel]) return;
  const payload = {
    ts: nowIso(),
    level,
    event,
    ...fields,
  };
  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function logEvent(
  level: LogLevel,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit(level, event, fields);
}

export function startRunLog(
  scope: string,
  fields: Record<string, unknown> = {},
): RunLogContext {
  const context: RunLogContext = {
    runId: randomUUID().slice(0, 8),
    scope,
    startedAt: Date.now(),
  };

  emit("info", "run.start", {
    runId: context.runId,
    scope,
    ...fields,
  });
  return context;
}

export function stepRunLog(
  context: RunLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit("info", event, {
    runId: context.runId,
    scope: context.scope,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function warnRunLog(
  context: RunLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit("warn", event, {
    runId: context.runId,
    scope: context.scope,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function errorRunLog(
  context: RunLogContext,
  event: string,
  error: unknown,
  fields: Record<string, unknown> = {},
) {
  emit("error", event, {
    runId: context.runId,
    scope: context.scope,
    elapsedMs: Date.now() - context.startedAt,
    message: toErrorMessage(error),
    ...fields,
  });
}

export function endRunLog(
  context: RunLogContext,
  fields: Record<string, unknown> = {},
) {
  emit("info", "run.end", {
    runId: context.runId,
    scope: context.scope,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}
