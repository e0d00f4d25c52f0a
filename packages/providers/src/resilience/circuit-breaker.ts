/**
 * Circuit Breaker Pattern Implementation
 *
 * Guards one provider slot inside a fallback chain. Three states:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Circuit is tripped, requests fail immediately
 * - HALF_OPEN: Recovery window elapsed, exactly one trial request passes
 *
 * The breaker is not locked. It must only be mutated by the one logical
 * operation that owns it at a time.
 */

import { CircuitOpenError, errorMessage } from "../errors";
import { createLogger } from "../logger";

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerConfig {
  /** Consecutive failures before opening circuit. Default: 5 */
  failureThreshold: number;
  /** Time in ms the circuit stays open before a trial is admitted. Default: 60000 */
  recoveryTimeoutMs: number;
  /** Label used in logs and errors */
  name?: string;
  /** Optional callback when state changes */
  onStateChange?: (
    oldState: CircuitState,
    newState: CircuitState,
    context: { consecutiveFailures: number }
  ) => void;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  consecutiveFailures: number;
  openedAt: number | null;
  trialInFlight: boolean;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeoutMs: 60000,
};

const log = createLogger("CircuitBreaker");

export class CircuitBreaker {
  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;
  private totalRequests = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get name(): string {
    return this.config.name ?? "circuit";
  }

  /**
   * Check if a request can be attempted.
   * Moves an open circuit to half-open once the recovery window has passed.
   */
  canAttempt(): boolean {
    if (this.state === "closed") {
      return true;
    }

    if (this.state === "open") {
      // Strictly after the window: with a zero timeout an immediate retry is still refused
      if (this.openedAt !== null && Date.now() - this.openedAt > this.config.recoveryTimeoutMs) {
        this.transitionTo("half-open");
        return true;
      }
      return false;
    }

    // half-open admits a single trial at a time
    return !this.trialInFlight;
  }

  /**
   * Claim permission for one attempt. Throws CircuitOpenError when refused.
   * Every successful call must be settled with recordSuccess, recordFailure
   * or abandonAttempt.
   */
  beginAttempt(): void {
    if (!this.canAttempt()) {
      throw this.openError();
    }
    if (this.state === "half-open") {
      this.trialInFlight = true;
    }
  }

  /**
   * Record a successful request. Closes the circuit and clears the failure run.
   */
  recordSuccess(): void {
    this.totalRequests++;
    this.totalSuccesses++;
    this.trialInFlight = false;
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.transitionTo("closed");
  }

  /**
   * Record a failed request.
   * Opens the circuit once the threshold is reached, and re-opens it (with a
   * fresh recovery window) when a half-open trial fails.
   */
  recordFailure(error: unknown): void {
    this.totalRequests++;
    this.totalFailures++;
    this.consecutiveFailures++;

    const failedTrial = this.state === "half-open";
    this.trialInFlight = false;

    if (failedTrial || this.consecutiveFailures >= this.config.failureThreshold) {
      this.openedAt = Date.now();
      this.transitionTo("open");
    }

    log.debug(`${this.name} failure recorded`, {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      error: errorMessage(error),
    });
  }

  /**
   * Release a claimed attempt that was cancelled. Counters are untouched.
   */
  abandonAttempt(): void {
    this.trialInFlight = false;
  }

  /**
   * Call a synchronous function with circuit breaker protection.
   */
  call<T>(fn: () => T): T {
    this.beginAttempt();
    let result: T;
    try {
      result = fn();
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  /**
   * Execute an async function with circuit breaker protection.
   * Throws CircuitOpenError if circuit is open. A cancelled attempt
   * (`isCancelled` returns true) leaves the counters unchanged.
   */
  async execute<T>(
    fn: () => Promise<T>,
    isCancelled: (error: unknown) => boolean = () => false
  ): Promise<T> {
    this.beginAttempt();
    let result: T;
    try {
      result = await fn();
    } catch (error) {
      if (isCancelled(error)) {
        this.abandonAttempt();
      } else {
        this.recordFailure(error);
      }
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  /**
   * Get current circuit breaker statistics.
   */
  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      trialInFlight: this.trialInFlight,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
    };
  }

  getState(): CircuitState {
    return this.state;
  }

  /**
   * Force circuit to open state (for testing or manual intervention).
   */
  forceOpen(): void {
    this.consecutiveFailures = Math.max(this.consecutiveFailures, this.config.failureThreshold);
    this.openedAt = Date.now();
    this.trialInFlight = false;
    this.transitionTo("open");
  }

  /**
   * Force circuit to closed state (for testing or manual intervention).
   */
  forceClosed(): void {
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.trialInFlight = false;
    this.transitionTo("closed");
  }

  /**
   * Reset all counters and return to closed state.
   */
  reset(): void {
    this.state = "closed";
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.trialInFlight = false;
    this.totalRequests = 0;
    this.totalFailures = 0;
    this.totalSuccesses = 0;
  }

  /**
   * The refusal reported while the circuit is not admitting calls.
   */
  openError(): CircuitOpenError {
    const remainingMs = this.remainingOpenMs();
    return new CircuitOpenError(
      `Circuit ${this.name} is ${this.state}. Retry in ${Math.ceil(remainingMs / 1000)}s`,
      remainingMs,
      { providerId: this.config.name }
    );
  }

  private remainingOpenMs(): number {
    if (this.openedAt === null) return 0;
    return Math.max(0, this.config.recoveryTimeoutMs - (Date.now() - this.openedAt));
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) return;

    const oldState = this.state;
    this.state = newState;

    this.config.onStateChange?.(oldState, newState, {
      consecutiveFailures: this.consecutiveFailures,
    });

    log.info(`${this.name} state transition: ${oldState} -> ${newState}`);
  }
}

/**
 * Create a circuit breaker with custom configuration.
 */
export function createCircuitBreaker(config?: Partial<CircuitBreakerConfig>): CircuitBreaker {
  return new CircuitBreaker(config);
}
