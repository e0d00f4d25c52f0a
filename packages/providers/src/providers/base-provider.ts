import {
  DEFAULT_RETRY_CONFIG,
  withRetry,
  withRetrySync,
  type AsyncRetryOptions,
  type RetryConfig,
  type SyncRetryOptions,
} from "../resilience/retry";
import { getDefaultMetrics, type MetricsSink } from "../telemetry/metrics";
import { DEFAULT_TLS_CONFIG, resolveTlsConfig, type TLSConfig } from "../tls/tls-config";
import { createLogger } from "../logger";
import type {
  AsyncCallOptions,
  CompletionRequest,
  Embedding,
  EmbeddingInput,
  Provider,
  ProviderKind,
} from "./types";

export interface BaseProviderOptions {
  retryConfig?: RetryConfig;
  tlsConfig?: TLSConfig;
  metrics?: MetricsSink;
}

const log = createLogger("Provider");

function freezeRetryConfig(config: RetryConfig): Readonly<RetryConfig> {
  return Object.freeze({ ...config, conditions: Object.freeze([...config.conditions]) });
}

/**
 * Common plumbing: immutable retry/TLS settings and the retry helpers that
 * report each retry to the log and the metrics sink.
 */
export abstract class BaseProvider implements Provider {
  abstract readonly kind: ProviderKind;
  abstract readonly id: string;

  readonly retryConfig: Readonly<RetryConfig>;
  readonly tlsConfig: TLSConfig;
  protected readonly metrics: MetricsSink;

  constructor(options: BaseProviderOptions = {}) {
    this.retryConfig = freezeRetryConfig(options.retryConfig ?? DEFAULT_RETRY_CONFIG);
    this.tlsConfig = options.tlsConfig ? resolveTlsConfig(options.tlsConfig) : DEFAULT_TLS_CONFIG;
    this.metrics = options.metrics ?? getDefaultMetrics();
  }

  abstract complete(request: CompletionRequest): string;
  abstract acomplete(request: CompletionRequest, options?: AsyncCallOptions): Promise<string>;
  abstract embed(input: EmbeddingInput): Embedding[];
  abstract aembed(input: EmbeddingInput, options?: AsyncCallOptions): Promise<Embedding[]>;

  protected emitRetryTelemetry(error: Error, attempt: number, delayMs: number): void {
    log.warn(
      `Retrying ${this.id} due to ${error.message} (attempt ${attempt}, delay ${Math.round(delayMs)}ms)`
    );
    if (this.retryConfig.trackMetrics) {
      this.metrics.increment("retry");
    }
  }

  protected retrySync<T>(
    fn: (attempt: number) => T,
    options: Omit<SyncRetryOptions, "onRetry"> = {}
  ): T {
    return withRetrySync(fn, this.retryConfig, {
      ...options,
      onRetry: (error, attempt, delayMs) => this.emitRetryTelemetry(error, attempt, delayMs),
    });
  }

  protected retryAsync<T>(
    fn: (attempt: number) => Promise<T>,
    options: Omit<AsyncRetryOptions, "onRetry"> = {}
  ): Promise<T> {
    return withRetry(fn, this.retryConfig, {
      ...options,
      onRetry: (error, attempt, delayMs) => this.emitRetryTelemetry(error, attempt, delayMs),
    });
  }
}
