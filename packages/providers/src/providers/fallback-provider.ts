import { ConfigurationError } from "../errors";
import { createLogger } from "../logger";
import { CircuitBreaker, type CircuitBreakerStats } from "../resilience/circuit-breaker";
import {
  executeFallback,
  executeFallbackSync,
  type FallbackResult,
  type FallbackSlot,
} from "../resilience/fallback-executor";
import { BaseProvider, type BaseProviderOptions } from "./base-provider";
import type {
  AsyncCallOptions,
  CompletionRequest,
  Embedding,
  EmbeddingInput,
  Provider,
} from "./types";

const log = createLogger("FallbackProvider");

export interface FallbackCircuitBreakerSettings {
  enabled: boolean;
  failureThreshold: number;
  recoveryTimeoutMs: number;
}

export interface FallbackProviderOptions extends BaseProviderOptions {
  /** Turns an identifier from the order into a concrete provider */
  resolveProvider: (providerId: string) => Provider;
  /** When false only the first provider in the order is used. Default: true */
  fallbackEnabled?: boolean;
  circuitBreaker?: FallbackCircuitBreakerSettings;
}

const DEFAULT_BREAKER_SETTINGS: FallbackCircuitBreakerSettings = {
  enabled: true,
  failureThreshold: 5,
  recoveryTimeoutMs: 60000,
};

/**
 * Ordered chain of providers, one circuit breaker per slot. Breaker state
 * lives as long as this instance; share the instance to share the state.
 */
export class FallbackProvider extends BaseProvider {
  readonly kind = "fallback" as const;
  readonly id = "fallback";
  readonly slots: readonly FallbackSlot<Provider>[];

  constructor(order: readonly string[], options: FallbackProviderOptions) {
    super(options);
    if (order.length === 0) {
      throw new ConfigurationError("Fallback provider requires at least one provider id");
    }

    const breakerSettings = options.circuitBreaker ?? DEFAULT_BREAKER_SETTINGS;
    const activeOrder = options.fallbackEnabled === false ? order.slice(0, 1) : order;

    this.slots = Object.freeze(
      activeOrder.map((providerId) => ({
        providerId,
        provider: options.resolveProvider(providerId),
        breaker: breakerSettings.enabled
          ? new CircuitBreaker({
              name: providerId,
              failureThreshold: breakerSettings.failureThreshold,
              recoveryTimeoutMs: breakerSettings.recoveryTimeoutMs,
            })
          : null,
      }))
    );

    log.info(
      `Initialized fallback provider order: ${this.slots
        .map((slot) => `${slot.providerId} (${slot.provider.kind})`)
        .join(", ")}`
    );
  }

  complete(request: CompletionRequest): string {
    return this.report(
      executeFallbackSync(this.slots, "completion", (provider) => provider.complete(request))
    );
  }

  async acomplete(request: CompletionRequest, options: AsyncCallOptions = {}): Promise<string> {
    return this.report(
      await executeFallback(
        this.slots,
        "completion",
        (provider, signal) => provider.acomplete(request, { signal }),
        { signal: options.signal }
      )
    );
  }

  embed(input: EmbeddingInput): Embedding[] {
    return this.report(
      executeFallbackSync(this.slots, "embeddings", (provider) => provider.embed(input))
    );
  }

  async aembed(input: EmbeddingInput, options: AsyncCallOptions = {}): Promise<Embedding[]> {
    return this.report(
      await executeFallback(
        this.slots,
        "embeddings",
        (provider, signal) => provider.aembed(input, { signal }),
        { signal: options.signal }
      )
    );
  }

  /**
   * Breaker stats per slot, in order. `null` where breaking is disabled.
   */
  getBreakerStats(): Array<{ providerId: string; stats: CircuitBreakerStats | null }> {
    return this.slots.map((slot) => ({
      providerId: slot.providerId,
      stats: slot.breaker ? slot.breaker.getStats() : null,
    }));
  }

  private report<T>(outcome: FallbackResult<T>): T {
    if (outcome.usedFallback) {
      log.info(`Served by fallback provider ${outcome.providerId} after ${outcome.attempts} attempts`);
    }
    return outcome.result;
  }
}
