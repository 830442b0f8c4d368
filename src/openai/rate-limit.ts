import { setTimeout as sleepMs } from "node:timers/promises";
import { logEvent } from "../telemetry.js";

export type Clock = {
  now(): number;
  sleep(ms: number): Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    if (ms > 0) await sleepMs(ms);
  },
};

const RETRIABLE_STATUS_CODES = new Set([429, 500, 503]);

function normalizeMessage(error: unknown): string {
  if (!error) return "";
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  if (typeof error === "object") {
    const message = (error as Record<string, unknown>).message;
    if (typeof message === "string") return message;
  }
  return "";
}

function readNumberLike(object: Record<string, unknown> | undefined, key: string): number | null {
  if (!object) return null;
  const value = object[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && /^\d{3}$/.test(value.trim())) return Number(value.trim());
  return null;
}

/**
 * Transient quota or service errors: HTTP 429/500/503 on the error or its
 * response, a `status`/`code` string naming `RESOURCE_EXHAUSTED`, or a message
 * naming one of them.
 */
export function isRetriableError(error: unknown): boolean {
  if (!error) return false;
  if (typeof error === "object") {
    const info = error as Record<string, unknown>;
    const response =
      typeof info.response === "object" && info.response
        ? (info.response as Record<string, unknown>)
        : undefined;
    const status = readNumberLike(info, "status") ?? readNumberLike(response, "status");
    if (status != null && RETRIABLE_STATUS_CODES.has(status)) return true;
    const code = readNumberLike(info, "code") ?? readNumberLike(response, "code");
    if (code != null && RETRIABLE_STATUS_CODES.has(code)) return true;
    for (const source of [info, response]) {
      for (const key of ["status", "code"]) {
        const value = source?.[key];
        if (typeof value === "string" && /RESOURCE_EXHAUSTED/.test(value)) return true;
      }
    }
  }
  const message = normalizeMessage(error);
  if (/RESOURCE_EXHAUSTED/.test(message)) return true;
  if (/\b(429|500|503)\b/.test(message)) return true;
  return /rate limit|too many requests/i.test(message);
}

export type RateLimiterOptions = {
  callsPerMinute: number;
  clock?: Clock;
};

/**
 * Paces generative-service stages to `callsPerMinute`. Grants are spaced at
 * least `60_000 / callsPerMinute` ms apart; the next grant slot is reserved
 * before the caller suspends, so concurrent acquirers queue chronologically.
 */
export class RateLimiter {
  readonly intervalMs: number;
  private readonly clock: Clock;
  private lastGrantMs = Number.NEGATIVE_INFINITY;

  constructor(options: RateLimiterOptions) {
    if (!(options.callsPerMinute > 0)) {
      throw new RangeError(`callsPerMinute must be positive, got ${options.callsPerMinute}`);
    }
    this.intervalMs = 60_000 / options.callsPerMinute;
    this.clock = options.clock ?? systemClock;
  }

  async acquire(): Promise<void> {
    const now = this.clock.now();
    const grantAt = Math.max(now, this.lastGrantMs + this.intervalMs);
    this.lastGrantMs = grantAt;

    const waitMs = grantAt - now;
    if (waitMs > 0) {
      logEvent("info", "rate_limit.wait", { waitMs: Math.round(waitMs) });
      await this.clock.sleep(waitMs);
    }
  }
}
