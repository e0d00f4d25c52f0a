/**
 * Provider Factory
 *
 * Decides which concrete provider to build from a resolution context
 * (configuration + environment overrides). Resolution is deterministic for a
 * given context and performs no I/O; only network provider constructors can
 * throw, and only with ConfigurationError.
 *
 * Order of precedence:
 * 1. providers disabled  -> NullProvider
 * 2. offline             -> safe default (an explicit "stub" stays a stub)
 * 3. requested type, else the configured default
 * 4. missing credential  -> NullProvider when explicit, alternate backend or
 *                           safe default when resolving the default
 * 5. the network provider
 */

import { createResolutionContext, type ResolutionContext } from "../config/resolution-context";
import { createLogger } from "../logger";
import { FallbackProvider } from "../providers/fallback-provider";
import { LMStudioProvider } from "../providers/network/lmstudio-provider";
import { OpenAIProvider } from "../providers/network/openai-provider";
import { OpenRouterProvider } from "../providers/network/openrouter-provider";
import { NullProvider } from "../providers/null-provider";
import { StubProvider } from "../providers/stub-provider";
import type { Provider } from "../providers/types";
import type { RetryConfig } from "../resilience/retry";
import type { MetricsSink } from "../telemetry/metrics";
import { resolveTlsConfig, type TLSConfig } from "../tls/tls-config";
import type { HttpTransport } from "../transport/http-transport";

const log = createLogger("ProviderFactory");

export const DISABLED_REASON = "Disabled by LLM_RELAY_DISABLE_PROVIDERS";

export interface ProviderFactoryOptions {
  /** Snapshot to resolve against. Default: a fresh one from the current environment */
  context?: ResolutionContext;
  /** Overrides `config.retry` */
  retryConfig?: RetryConfig;
  /** Overrides `config.tls` */
  tlsConfig?: TLSConfig;
  metrics?: MetricsSink;
  /** Transport for network providers. Default: the Node transport */
  transport?: HttpTransport;
}

interface Resolution {
  context: ResolutionContext;
  shared: {
    retryConfig: RetryConfig;
    tlsConfig: TLSConfig;
    metrics?: MetricsSink;
  };
  transport?: HttpTransport;
}

function prepare(options: ProviderFactoryOptions): Resolution {
  const context = options.context ?? createResolutionContext();
  return {
    context,
    shared: {
      retryConfig: options.retryConfig ?? context.config.retry,
      tlsConfig: options.tlsConfig ?? resolveTlsConfig(context.config.tls),
      metrics: options.metrics,
    },
    transport: options.transport,
  };
}

function normalizeType(requestedType: string | null | undefined): string | undefined {
  const value = requestedType?.trim().toLowerCase();
  return value ? value : undefined;
}

function safeDefault({ context, shared }: Resolution, why: string): Provider {
  if (context.flags.safeDefaultProvider === "null") {
    log.info(`${why}; using null provider`);
    return new NullProvider({ ...shared, reason: why });
  }
  log.info(`${why}; using stub provider`);
  return new StubProvider(shared);
}

function buildLMStudio({ context, shared, transport }: Resolution): Provider {
  const { lmstudio } = context.config;
  return new LMStudioProvider({
    ...shared,
    endpoint: lmstudio.endpoint,
    model: lmstudio.model,
    timeoutMs: lmstudio.timeoutMs,
    transport,
  });
}

function missingCredential(
  resolution: Resolution,
  providerId: string,
  envVar: string,
  explicit: boolean
): Provider {
  const reason = `${envVar} is not set`;
  if (explicit) {
    log.warn(`${providerId} requested but ${reason}`);
    return new NullProvider({ ...resolution.shared, reason, cause: "credential" });
  }
  if (resolution.context.flags.lmstudioAvailable) {
    log.warn(`${reason}; falling back to LM Studio`);
    return buildLMStudio(resolution);
  }
  return safeDefault(resolution, `${reason} and LM Studio is not marked available`);
}

/**
 * Build the provider for `requestedType`, or for the configured default when
 * no type is given.
 */
export function createProvider(
  requestedType?: string | null,
  options: ProviderFactoryOptions = {}
): Provider {
  const resolution = prepare(options);
  const { context, shared, transport } = resolution;
  const { config, flags } = context;
  const requested = normalizeType(requestedType);

  if (flags.providersDisabled) {
    log.info("Providers disabled by environment");
    return new NullProvider({ ...shared, reason: DISABLED_REASON });
  }

  if (flags.offline) {
    if (requested === "stub") {
      return new StubProvider(shared);
    }
    return safeDefault(resolution, "Offline mode");
  }

  const explicit = requested !== undefined;
  const providerType = requested ?? config.defaultProvider;

  switch (providerType) {
    case "stub":
      return new StubProvider(shared);

    case "null":
      return new NullProvider({ ...shared, reason: "Null provider requested" });

    case "openai": {
      const { apiKey, model, baseUrl, timeoutMs } = config.openai;
      if (!apiKey) {
        return missingCredential(resolution, "openai", "OPENAI_API_KEY", explicit);
      }
      return new OpenAIProvider({ ...shared, apiKey, model, baseUrl, timeoutMs, transport });
    }

    case "openrouter": {
      const { apiKey, model, baseUrl, timeoutMs } = config.openrouter;
      if (!apiKey) {
        return missingCredential(resolution, "openrouter", "OPENROUTER_API_KEY", explicit);
      }
      return new OpenRouterProvider({ ...shared, apiKey, model, baseUrl, timeoutMs, transport });
    }

    case "lmstudio":
      if (!explicit && !flags.lmstudioAvailable) {
        return safeDefault(resolution, "LM Studio is not marked available");
      }
      return buildLMStudio(resolution);

    default:
      log.warn(`Unknown provider type "${providerType}"`);
      return safeDefault(resolution, `Unknown provider type "${providerType}"`);
  }
}

export interface FallbackFactoryOptions extends ProviderFactoryOptions {
  /** Overrides `config.fallback.order` */
  order?: readonly string[];
}

/**
 * Fallback chain over `config.fallback.order`. Every id in the order is
 * resolved as an explicit request against the same context.
 */
export function createFallbackProvider(options: FallbackFactoryOptions = {}): Provider {
  const { context, shared } = prepare(options);
  const { config } = context;
  const slotOptions: ProviderFactoryOptions = { ...options, context };

  return new FallbackProvider(options.order ?? config.fallback.order, {
    ...shared,
    fallbackEnabled: config.fallback.enabled,
    circuitBreaker: config.circuitBreaker,
    resolveProvider: (providerId) => createProvider(providerId, slotOptions),
  });
}

export interface GetProviderOptions extends FallbackFactoryOptions {
  providerType?: string | null;
  /** Wrap the configured order in a FallbackProvider. Default: false */
  fallback?: boolean;
}

export function getProvider(options: GetProviderOptions = {}): Provider {
  const { providerType, fallback = false, ...rest } = options;
  return fallback ? createFallbackProvider(rest) : createProvider(providerType, rest);
}
