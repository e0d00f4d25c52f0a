/**
 * Retry with exponential backoff
 *
 * One decision routine (`planRetry`) drives two loops:
 * - `withRetrySync`: blocks the thread between attempts
 * - `withRetry`: awaits an abortable timer between attempts
 *
 * Both produce the same number of invocations and the same delays for the
 * same sequence of failures.
 */

import { isCancellation, toError } from "../errors";
import { createLogger } from "../logger";
import { sleep, sleepSync, throwIfAborted } from "../utils/sleep";

const log = createLogger("Retry");

export interface RetryConfig {
  /** Retries after the first attempt. 0 means a single invocation. */
  maxRetries: number;
  initialDelayMs: number;
  /** Multiplier applied per retry, > 1 */
  exponentialBase: number;
  maxDelayMs: number;
  jitter: boolean;
  /** Symbolic names an error must match to be retried; empty matches all */
  conditions: readonly string[];
  trackMetrics: boolean;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
  maxRetries: 3,
  initialDelayMs: 1000,
  exponentialBase: 2,
  maxDelayMs: 60000,
  jitter: true,
  conditions: Object.freeze([]),
  trackMetrics: true,
});

export type ErrorClass = abstract new (...args: never[]) => Error;

export type RetryCallback = (error: Error, attempt: number, delayMs: number) => void;

export interface RetryOptions {
  /** Error types eligible for retry. Default: any Error */
  retryableErrors?: readonly ErrorClass[];
  shouldRetry?: (error: Error) => boolean;
  /** Runs synchronously before each wait. A throwing callback is logged and ignored. */
  onRetry?: RetryCallback;
  random?: () => number;
}

export interface SyncRetryOptions extends RetryOptions {
  sleepSync?: (ms: number) => void;
}

export interface AsyncRetryOptions extends RetryOptions {
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type RetryDecision = { retry: false } | { retry: true; delayMs: number };

/**
 * Delay before retry number `attempt` (1-based). With jitter the wait is
 * drawn from the upper half of the bound, never above it.
 */
export function computeRetryDelay(
  config: Pick<RetryConfig, "initialDelayMs" | "exponentialBase" | "maxDelayMs" | "jitter">,
  attempt: number,
  random: () => number = Math.random
): number {
  const bound = Math.min(
    config.initialDelayMs * Math.pow(config.exponentialBase, attempt - 1),
    config.maxDelayMs
  );
  if (!config.jitter) {
    return bound;
  }
  return bound * (0.5 + 0.5 * random());
}

/**
 * A condition matches the error's name, code or transient reason
 * (case-insensitive), or any substring of its message.
 */
export function matchesRetryCondition(error: Error, conditions: readonly string[]): boolean {
  if (conditions.length === 0) {
    return true;
  }
  const code = "code" in error ? error.code : undefined;
  const reason = "reason" in error ? error.reason : undefined;
  const labels = [error.name, code, reason]
    .filter((value): value is string => typeof value === "string")
    .map((value) => value.toLowerCase());
  const message = error.message.toLowerCase();

  return conditions.some((condition) => {
    const name = condition.trim().toLowerCase();
    return name !== "" && (labels.includes(name) || message.includes(name));
  });
}

export function planRetry(
  error: unknown,
  attempt: number,
  config: RetryConfig,
  options: RetryOptions = {}
): RetryDecision {
  if (attempt > config.maxRetries || isCancellation(error)) {
    return { retry: false };
  }
  const err = toError(error);
  const retryable = options.retryableErrors ?? [Error];
  if (!retryable.some((type) => err instanceof type)) {
    return { retry: false };
  }
  if (options.shouldRetry && !options.shouldRetry(err)) {
    return { retry: false };
  }
  if (!matchesRetryCondition(err, config.conditions)) {
    return { retry: false };
  }
  return { retry: true, delayMs: computeRetryDelay(config, attempt, options.random) };
}

function notifyRetry(
  onRetry: RetryCallback | undefined,
  error: unknown,
  attempt: number,
  delayMs: number
): void {
  if (!onRetry) return;
  try {
    onRetry(toError(error), attempt, delayMs);
  } catch (callbackError) {
    log.warn("onRetry callback failed; continuing with retry", {
      attempt,
      error: callbackError instanceof Error ? callbackError.message : String(callbackError),
    });
  }
}

/**
 * Invoke `fn` until it succeeds or retries are exhausted, blocking between
 * attempts. The last error propagates unchanged.
 */
export function withRetrySync<T>(
  fn: (attempt: number) => T,
  config: RetryConfig,
  options: SyncRetryOptions = {}
): T {
  const wait = options.sleepSync ?? sleepSync;
  for (let attempt = 1; ; attempt++) {
    try {
      return fn(attempt);
    } catch (error) {
      const decision = planRetry(error, attempt, config, options);
      if (!decision.retry) {
        throw error;
      }
      notifyRetry(options.onRetry, error, attempt, decision.delayMs);
      if (decision.delayMs > 0) {
        wait(decision.delayMs);
      }
    }
  }
}

/**
 * Async counterpart of {@link withRetrySync}. Aborting `signal` stops further
 * attempts and rejects with the abort reason.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig,
  options: AsyncRetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await fn(attempt);
    } catch (error) {
      if (isCancellation(error, options.signal)) {
        throw error;
      }
      const decision = planRetry(error, attempt, config, options);
      if (!decision.retry) {
        throw error;
      }
      notifyRetry(options.onRetry, error, attempt, decision.delayMs);
      if (decision.delayMs > 0) {
        await wait(decision.delayMs, options.signal);
      }
    }
  }
}
