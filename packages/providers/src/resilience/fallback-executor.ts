/**
 * Fallback Executor
 *
 * Tries provider slots strictly in order until one succeeds. Each slot may
 * carry its own circuit breaker; a slot whose breaker refuses the call is
 * skipped without being invoked.
 *
 * Two drivers share the attempt bookkeeping:
 * - `executeFallbackSync` goes through `CircuitBreaker.call`
 * - `executeFallback` runs beginAttempt / recordSuccess / recordFailure by hand
 *   so that a cancelled await leaves the breaker untouched
 */

import {
  AllProvidersFailedError,
  CircuitOpenError,
  ConfigurationError,
  isCancellation,
  toError,
  type ProviderAttemptError,
} from "../errors";
import { createLogger } from "../logger";
import { throwIfAborted } from "../utils/sleep";
import type { CircuitBreaker } from "./circuit-breaker";

const log = createLogger("FallbackExecutor");

export interface FallbackSlot<P> {
  providerId: string;
  provider: P;
  /** null when circuit breaking is disabled */
  breaker: CircuitBreaker | null;
}

export type FallbackOperation = "completion" | "embeddings";

export interface FallbackResult<T> {
  result: T;
  providerId: string;
  usedFallback: boolean;
  attempts: number;
  errors: ProviderAttemptError[];
}

export interface FallbackExecutionOptions {
  signal?: AbortSignal;
}

type AttemptOutcome<T> =
  | { status: "success"; value: T }
  | { status: "skipped"; error: CircuitOpenError }
  | { status: "failure"; error: Error };

interface FallbackRun {
  operation: FallbackOperation;
  errors: ProviderAttemptError[];
  attempts: number;
  lastProviderId: string | null;
  lastError: Error | null;
}

function startRun<P>(slots: readonly FallbackSlot<P>[], operation: FallbackOperation): FallbackRun {
  if (slots.length === 0) {
    throw new ConfigurationError(`No providers configured for ${operation} fallback`);
  }
  return { operation, errors: [], attempts: 0, lastProviderId: null, lastError: null };
}

/**
 * Breaker gate for a slot. Returns the refusal when the slot must be skipped.
 */
function openSlot<P>(slot: FallbackSlot<P>): CircuitOpenError | null {
  if (!slot.breaker || slot.breaker.canAttempt()) {
    return null;
  }
  return slot.breaker.openError();
}

/**
 * Record one attempt. Returns the result wrapper on success, null otherwise.
 */
function settleSlot<P, T>(
  run: FallbackRun,
  slot: FallbackSlot<P>,
  outcome: AttemptOutcome<T>,
  firstProviderId: string
): FallbackResult<T> | null {
  run.attempts++;
  run.lastProviderId = slot.providerId;

  if (outcome.status === "success") {
    return {
      result: outcome.value,
      providerId: slot.providerId,
      usedFallback: slot.providerId !== firstProviderId,
      attempts: run.attempts,
      errors: run.errors,
    };
  }

  run.lastError = outcome.error;
  const message =
    outcome.status === "skipped" ? `Circuit open: ${outcome.error.message}` : outcome.error.message;
  run.errors.push({ providerId: slot.providerId, error: message });

  if (outcome.status === "skipped") {
    log.warn(`Skipping provider ${slot.providerId}: ${message}`);
  } else {
    log.error(`Provider ${slot.providerId} failed for ${run.operation}: ${message}`);
  }
  return null;
}

function allFailed(run: FallbackRun): AllProvidersFailedError {
  const lastMessage = run.lastError?.message ?? "unknown error";
  return new AllProvidersFailedError(
    `All providers failed for ${run.operation}. Last error: ${lastMessage}`,
    run.errors,
    { providerId: run.lastProviderId ?? undefined, cause: run.lastError ?? undefined }
  );
}

/**
 * Blocking driver. Each invocation goes through the slot's breaker.
 */
export function executeFallbackSync<P, T>(
  slots: readonly FallbackSlot<P>[],
  operation: FallbackOperation,
  invoke: (provider: P) => T
): FallbackResult<T> {
  const run = startRun(slots, operation);
  const firstProviderId = slots[0].providerId;

  for (const slot of slots) {
    const refusal = openSlot(slot);
    let outcome: AttemptOutcome<T>;
    if (refusal) {
      outcome = { status: "skipped", error: refusal };
    } else {
      try {
        const { breaker } = slot;
        const value = breaker ? breaker.call(() => invoke(slot.provider)) : invoke(slot.provider);
        outcome = { status: "success", value };
      } catch (error) {
        outcome = { status: "failure", error: toError(error) };
      }
    }

    const result = settleSlot(run, slot, outcome, firstProviderId);
    if (result) {
      return result;
    }
  }

  throw allFailed(run);
}

/**
 * Promise driver. A cancelled attempt is neither success nor failure for the
 * breaker, and stops the loop with the cancellation error.
 */
export async function executeFallback<P, T>(
  slots: readonly FallbackSlot<P>[],
  operation: FallbackOperation,
  invoke: (provider: P, signal?: AbortSignal) => Promise<T>,
  options: FallbackExecutionOptions = {}
): Promise<FallbackResult<T>> {
  const { signal } = options;
  const run = startRun(slots, operation);
  const firstProviderId = slots[0].providerId;

  for (const slot of slots) {
    throwIfAborted(signal);
    const refusal = openSlot(slot);
    let outcome: AttemptOutcome<T>;
    if (refusal) {
      outcome = { status: "skipped", error: refusal };
    } else {
      const { breaker } = slot;
      breaker?.beginAttempt();
      try {
        const value = await invoke(slot.provider, signal);
        breaker?.recordSuccess();
        outcome = { status: "success", value };
      } catch (error) {
        if (isCancellation(error, signal)) {
          breaker?.abandonAttempt();
          throw error;
        }
        breaker?.recordFailure(error);
        outcome = { status: "failure", error: toError(error) };
      }
    }

    const result = settleSlot(run, slot, outcome, firstProviderId);
    if (result) {
      return result;
    }
  }

  throw allFailed(run);
}
