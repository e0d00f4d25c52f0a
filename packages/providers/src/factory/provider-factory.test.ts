import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError, CredentialError, ProviderDisabledError } from "../errors";
import { createResolutionContext } from "../config/resolution-context";
import { setLogLevel } from "../logger";
import { FallbackProvider } from "../providers/fallback-provider";
import { LMStudioProvider } from "../providers/network/lmstudio-provider";
import { OpenAIProvider } from "../providers/network/openai-provider";
import { OpenRouterProvider } from "../providers/network/openrouter-provider";
import { NullProvider } from "../providers/null-provider";
import { StubProvider } from "../providers/stub-provider";
import type { HttpTransport } from "../transport/http-transport";
import { createFallbackProvider, createProvider, getProvider, DISABLED_REASON } from "./provider-factory";

const transport: HttpTransport = {
  name: "unused",
  send: async () => ({ status: 500, body: "" }),
  sendSync: () => ({ status: 500, body: "" }),
};

function resolve(requestedType: string | undefined, env: Record<string, string>) {
  return createProvider(requestedType, { context: createResolutionContext({ env }), transport });
}

describe("createProvider", () => {
  beforeEach(() => setLogLevel("silent"));
  afterEach(() => setLogLevel("info"));

  it("returns a NullProvider when providers are disabled", () => {
    const provider = resolve("openai", {
      LLM_RELAY_DISABLE_PROVIDERS: "1",
      OPENAI_API_KEY: "test-secret",
    });

    expect(provider).toBeInstanceOf(NullProvider);
    expect(provider.kind).toBe("null");
    expect(() => provider.complete({ prompt: "x" })).toThrow(ProviderDisabledError);
    expect(() => provider.complete({ prompt: "x" })).toThrow(`LLM provider is disabled: ${DISABLED_REASON}.`);
  });

  it("returns the stub when offline", () => {
    expect(resolve("openai", { LLM_RELAY_OFFLINE: "1", OPENAI_API_KEY: "test-secret" })).toBeInstanceOf(
      StubProvider
    );
  });

  it("honours a null safe default when offline", () => {
    const env = { LLM_RELAY_OFFLINE: "1", LLM_RELAY_SAFE_DEFAULT_PROVIDER: "null" };
    expect(resolve(undefined, env)).toBeInstanceOf(NullProvider);
    expect(resolve("stub", env)).toBeInstanceOf(StubProvider);
  });

  it("returns a credential NullProvider for an explicit request without a key", async () => {
    const provider = resolve("openai", {});

    expect(provider).toBeInstanceOf(NullProvider);
    await expect(provider.acomplete({ prompt: "x" })).rejects.toThrow(CredentialError);
    await expect(provider.acomplete({ prompt: "x" })).rejects.toThrow(
      "LLM provider is disabled: OPENAI_API_KEY is not set. Set OPENAI_API_KEY or start LM Studio."
    );
  });

  it("falls back to LM Studio for the default when it is marked available", () => {
    const provider = resolve(undefined, { LLM_RELAY_RESOURCE_LMSTUDIO_AVAILABLE: "1" });
    expect(provider).toBeInstanceOf(LMStudioProvider);
  });

  it("falls back to the safe default for the default otherwise", () => {
    expect(resolve(undefined, {})).toBeInstanceOf(StubProvider);
    expect(resolve(undefined, { LLM_RELAY_SAFE_DEFAULT_PROVIDER: "null" })).toBeInstanceOf(NullProvider);
  });

  it("builds the configured network provider with its settings", () => {
    const provider = resolve(undefined, {
      OPENAI_API_KEY: "test-secret",
      OPENAI_MODEL: "gpt-4o-mini",
      LLM_RELAY_MAX_RETRIES: "1",
      LLM_RELAY_TLS_VERIFY: "false",
      LLM_RELAY_TLS_CA_FILE: "/etc/ssl/ca.pem",
    });

    expect(provider).toBeInstanceOf(OpenAIProvider);
    expect(provider instanceof OpenAIProvider && provider.model).toBe("gpt-4o-mini");
    expect(provider.retryConfig.maxRetries).toBe(1);
    expect(provider.tlsConfig).toEqual({ verify: false, caFile: "/etc/ssl/ca.pem" });
  });

  it("builds OpenRouter when requested with a key", () => {
    expect(resolve("OpenRouter", { OPENROUTER_API_KEY: "test-secret" })).toBeInstanceOf(OpenRouterProvider);
  });

  it("requires the availability mark for LM Studio only as the default", () => {
    expect(resolve(undefined, { LLM_RELAY_PROVIDER: "lmstudio" })).toBeInstanceOf(StubProvider);
    expect(resolve("lmstudio", {})).toBeInstanceOf(LMStudioProvider);
  });

  it("resolves unknown types to the safe default", () => {
    expect(resolve("mystery", {})).toBeInstanceOf(StubProvider);
  });

  it("lets a transport ConfigurationError propagate", () => {
    const context = createResolutionContext({ env: { OPENAI_API_KEY: "test-secret" } });
    expect(() =>
      createProvider("openai", { context, transport: { name: "none" } })
    ).toThrow(ConfigurationError);
  });

  it("is deterministic for one context and builds fresh instances", () => {
    const context = createResolutionContext({ env: { OPENAI_API_KEY: "test-secret" } });
    const first = createProvider(undefined, { context, transport });
    const second = createProvider(undefined, { context, transport });

    expect(first).not.toBe(second);
    expect([first.kind, first.id]).toEqual([second.kind, second.id]);
  });
});

describe("createFallbackProvider", () => {
  beforeEach(() => setLogLevel("silent"));
  afterEach(() => setLogLevel("info"));

  it("resolves each id in the configured order as an explicit request", () => {
    const context = createResolutionContext({
      env: { LLM_RELAY_FALLBACK_ORDER: "openai,stub", LLM_RELAY_FAILURE_THRESHOLD: "2" },
    });
    const provider = createFallbackProvider({ context, transport });

    expect(provider).toBeInstanceOf(FallbackProvider);
    if (!(provider instanceof FallbackProvider)) return;
    expect(provider.slots.map((slot) => [slot.providerId, slot.provider.kind])).toEqual([
      ["openai", "null"],
      ["stub", "stub"],
    ]);
    expect(provider.complete({ prompt: "x" })).toBe("[stub:stub-llm] x");
  });

  it("skips breakers when circuit breaking is disabled", () => {
    const context = createResolutionContext({
      env: { LLM_RELAY_FALLBACK_ORDER: "stub", LLM_RELAY_CIRCUIT_BREAKER_ENABLED: "false" },
    });
    const provider = createFallbackProvider({ context });
    expect(provider instanceof FallbackProvider && provider.getBreakerStats()).toEqual([
      { providerId: "stub", stats: null },
    ]);
  });
});

describe("getProvider", () => {
  beforeEach(() => setLogLevel("silent"));
  afterEach(() => setLogLevel("info"));

  it("returns a single provider by default and a chain on request", () => {
    const context = createResolutionContext({ env: {} });
    expect(getProvider({ providerType: "stub", context })).toBeInstanceOf(StubProvider);
    expect(getProvider({ fallback: true, context, transport })).toBeInstanceOf(FallbackProvider);
  });
});
