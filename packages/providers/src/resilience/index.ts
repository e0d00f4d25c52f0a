/**
 * Resilience Module
 *
 * Fault tolerance shared by every provider:
 * - Retry with exponential backoff for individual calls
 * - Circuit breaker per provider slot
 * - Ordered fallback across provider slots
 */

export {
  CircuitBreaker,
  createCircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  type CircuitState,
} from "./circuit-breaker";

export {
  DEFAULT_RETRY_CONFIG,
  computeRetryDelay,
  matchesRetryCondition,
  planRetry,
  withRetry,
  withRetrySync,
  type AsyncRetryOptions,
  type ErrorClass,
  type RetryCallback,
  type RetryConfig,
  type RetryDecision,
  type RetryOptions,
  type SyncRetryOptions,
} from "./retry";

export {
  executeFallback,
  executeFallbackSync,
  type FallbackExecutionOptions,
  type FallbackOperation,
  type FallbackResult,
  type FallbackSlot,
} from "./fallback-executor";
