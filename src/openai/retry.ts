import { appConfig } from "../config.js";
import { logEvent, toErrorMessage } from "../telemetry.js";
import { isRetriableError, systemClock } from "./rate-limit.js";

export type RetryOptions = {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Fraction of the current delay added on top of it before capping. */
  jitterRatio: number;
  sleep: (ms: number) => Promise<void>;
  isRetriable: (error: unknown) => boolean;
  label: string;
};

export function defaultRetryOptions(): RetryOptions {
  return {
    maxRetries: appConfig.retry.maxRetries,
    initialDelayMs: appConfig.retry.initialDelayMs,
    maxDelayMs: appConfig.retry.maxDelayMs,
    backoffMultiplier: appConfig.retry.backoffMultiplier,
    jitterRatio: 0.1,
    sleep: systemClock.sleep,
    isRetriable: isRetriableError,
    label: "operation",
  };
}

/**
 * Runs `operation`, retrying retriable failures with exponential backoff.
 * Non-retriable errors are rethrown on the spot without sleeping; once
 * `maxRetries` retries are spent the last error is rethrown.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  overrides: Partial<RetryOptions> = {},
): Promise<T> {
  // explicit `undefined` in overrides keeps the default
  const defaults = defaultRetryOptions();
  const options: RetryOptions = {
    maxRetries: overrides.maxRetries ?? defaults.maxRetries,
    initialDelayMs: overrides.initialDelayMs ?? defaults.initialDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? defaults.maxDelayMs,
    backoffMultiplier: overrides.backoffMultiplier ?? defaults.backoffMultiplier,
    jitterRatio: overrides.jitterRatio ?? defaults.jitterRatio,
    sleep: overrides.sleep ?? defaults.sleep,
    isRetriable: overrides.isRetriable ?? defaults.isRetriable,
    label: overrides.label ?? defaults.label,
  };
  let delay = options.initialDelayMs;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (!options.isRetriable(error)) {
        logEvent("error", "retry.fatal", {
          label: options.label,
          attempt: attempt + 1,
          message: toErrorMessage(error),
        });
        throw error;
      }

      if (attempt >= options.maxRetries) {
        logEvent("error", "retry.exhausted", {
          label: options.label,
          retries: options.maxRetries,
          message: toErrorMessage(error),
        });
        throw error;
      }

      const waitMs = Math.min(delay * (1 + options.jitterRatio), options.maxDelayMs);
      logEvent("warn", "retry.scheduled", {
        label: options.label,
        attempt: attempt + 1,
        maxRetries: options.maxRetries,
        waitMs: Math.round(waitMs),
        message: toErrorMessage(error).slice(0, 100),
      });
      await options.sleep(waitMs);
      delay *= options.backoffMultiplier;
    }
  }
}
