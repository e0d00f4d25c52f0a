import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { ConfigurationError, HttpStatusError, ProviderError, TransientError } from "../../errors";
import { setLogLevel } from "../../logger";
import { DEFAULT_RETRY_CONFIG } from "../../resilience/retry";
import { InMemoryMetrics } from "../../telemetry/metrics";
import type { HttpRequest, HttpResponse, HttpTransport } from "../../transport/http-transport";
import { LMStudioProvider } from "./lmstudio-provider";
import { OpenAIProvider } from "./openai-provider";
import { OpenRouterProvider } from "./openrouter-provider";

type Reply = HttpResponse | Error;

function scriptedTransport(replies: Reply[]) {
  const requests: HttpRequest[] = [];
  const next = (request: HttpRequest): HttpResponse => {
    requests.push(request);
    const reply = replies.shift();
    if (!reply) throw new Error("no scripted reply left");
    if (reply instanceof Error) throw reply;
    return reply;
  };
  const transport: HttpTransport = {
    name: "scripted",
    sendSync: next,
    send: async (request) => next(request),
  };
  return { transport, requests };
}

const chatReply = (content: string): HttpResponse => ({
  status: 200,
  body: JSON.stringify({ choices: [{ message: { content } }] }),
});

const fastRetry = { ...DEFAULT_RETRY_CONFIG, initialDelayMs: 0, jitter: false };

describe("OpenAICompatibleProvider", () => {
  beforeEach(() => setLogLevel("silent"));
  afterEach(() => setLogLevel("info"));

  it("posts a chat request and returns the first choice", () => {
    const { transport, requests } = scriptedTransport([chatReply("hello back")]);
    const provider = new OpenAIProvider({ apiKey: "test-secret", transport });

    expect(provider.complete({ prompt: "hello", systemPrompt: "be nice" })).toBe("hello back");
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("https://api.openai.com/v1/chat/completions");
    expect(requests[0].headers.Authorization).toBe("Bearer test-secret");
    expect(JSON.parse(requests[0].body ?? "")).toEqual({
      model: "gpt-4",
      messages: [
        { role: "system", content: "be nice" },
        { role: "user", content: "hello" },
      ],
      temperature: 0.7,
      max_tokens: 2000,
    });
  });

  it("retries a 503 and succeeds", async () => {
    const metrics = new InMemoryMetrics();
    const { transport, requests } = scriptedTransport([
      { status: 503, body: "overloaded" },
      chatReply("recovered"),
    ]);
    const provider = new OpenAIProvider({ apiKey: "test-secret", transport, retryConfig: fastRetry, metrics });

    await expect(provider.acomplete({ prompt: "x" })).resolves.toBe("recovered");
    expect(requests).toHaveLength(2);
    expect(metrics.get("retry")).toBe(1);
  });

  it("retries a 429 as a rate limit", () => {
    const { transport, requests } = scriptedTransport([
      { status: 429, body: "slow down" },
      chatReply("ok"),
    ]);
    const provider = new OpenAIProvider({ apiKey: "test-secret", transport, retryConfig: fastRetry });

    expect(provider.complete({ prompt: "x" })).toBe("ok");
    expect(requests).toHaveLength(2);
  });

  it("does not retry a 400", () => {
    const { transport, requests } = scriptedTransport([
      { status: 400, body: "bad request" },
      chatReply("never"),
    ]);
    const provider = new OpenAIProvider({ apiKey: "test-secret", transport, retryConfig: fastRetry });

    expect(() => provider.complete({ prompt: "x" })).toThrow(HttpStatusError);
    expect(requests).toHaveLength(1);
  });

  it("gives up after maxRetries and surfaces the transient error", async () => {
    const { transport, requests } = scriptedTransport([
      new TransientError("connection refused", "network"),
      new TransientError("connection refused", "network"),
    ]);
    const provider = new OpenAIProvider({
      apiKey: "test-secret",
      transport,
      retryConfig: { ...fastRetry, maxRetries: 1 },
    });

    await expect(provider.aembed("x")).rejects.toThrow("connection refused");
    expect(requests).toHaveLength(2);
  });

  it("validates parameters before any request", () => {
    const { transport, requests } = scriptedTransport([]);
    const provider = new OpenAIProvider({ apiKey: "test-secret", transport });

    expect(() => provider.complete({ prompt: "x", parameters: { temperature: 3 } })).toThrow(
      "temperature must be between 0 and 2"
    );
    expect(() => provider.complete({ prompt: "x", maxTokens: 0 })).toThrow("max_tokens must be positive");
    expect(() => provider.complete({ prompt: "x", parameters: { topP: 1.5 } })).toThrow(
      "top_p must be between 0 and 1"
    );
    expect(requests).toHaveLength(0);
  });

  it("sends an explicit transcript and top_p as given", () => {
    const provider = new OpenAIProvider({ apiKey: "test-secret", transport: scriptedTransport([]).transport });
    const payload = provider.buildChatPayload({
      prompt: "ignored",
      parameters: { topP: 0.9, messages: [{ role: "user", content: "from transcript" }] },
    });
    expect(payload.messages).toEqual([{ role: "user", content: "from transcript" }]);
    expect(payload.top_p).toBe(0.9);
  });

  it("rejects a malformed response without retrying", () => {
    const { transport, requests } = scriptedTransport([{ status: 200, body: JSON.stringify({ choices: [] }) }]);
    const provider = new OpenAIProvider({ apiKey: "test-secret", transport, retryConfig: fastRetry });

    expect(() => provider.complete({ prompt: "x" })).toThrow(ProviderError);
    expect(requests).toHaveLength(1);
  });

  it("parses embedding vectors in order", async () => {
    const { transport, requests } = scriptedTransport([
      { status: 200, body: JSON.stringify({ data: [{ embedding: [0.1, 0.2] }, { embedding: [0.3] }] }) },
    ]);
    const provider = new OpenAIProvider({ apiKey: "test-secret", transport });

    await expect(provider.aembed(["a", "b"])).resolves.toEqual([[0.1, 0.2], [0.3]]);
    expect(JSON.parse(requests[0].body ?? "")).toEqual({
      model: "text-embedding-3-small",
      input: ["a", "b"],
    });
  });

  it("fails construction when the transport cannot block", () => {
    const transport: HttpTransport = { name: "async-only", send: async () => chatReply("x") };
    expect(() => new OpenAIProvider({ apiKey: "test-secret", transport })).toThrow(ConfigurationError);
  });

  it("fails construction when the transport cannot await", () => {
    const transport: HttpTransport = { name: "sync-only", sendSync: () => chatReply("x") };
    expect(() => new LMStudioProvider({ transport })).toThrow(
      /requires a transport supporting non-blocking requests/
    );
  });

  it("reports an unreadable CA file as configuration and does not retry it", async () => {
    const metrics = new InMemoryMetrics();
    const provider = new OpenAIProvider({
      apiKey: "test-secret",
      tlsConfig: { verify: true, caFile: "/nonexistent/ca.pem" },
      retryConfig: { ...fastRetry, maxRetries: 2, trackMetrics: true },
      metrics,
    });

    await expect(provider.acomplete({ prompt: "x" })).rejects.toMatchObject({
      name: "ConfigurationError",
      providerId: "openai",
    });
    expect(() => provider.complete({ prompt: "x" })).toThrow(ConfigurationError);
    expect(metrics.get("retry")).toBe(0);
  });
});

describe("LMStudioProvider", () => {
  it("talks to the /v1 API under the endpoint without a key", () => {
    const { transport, requests } = scriptedTransport([chatReply("local")]);
    const provider = new LMStudioProvider({ endpoint: "http://localhost:4321/", transport });

    expect(provider.complete({ prompt: "x" })).toBe("local");
    expect(requests[0].url).toBe("http://localhost:4321/v1/chat/completions");
    expect(requests[0].headers.Authorization).toBeUndefined();
  });
});

describe("OpenRouterProvider", () => {
  it("uses the default model and attribution headers", () => {
    const { transport, requests } = scriptedTransport([chatReply("routed")]);
    const provider = new OpenRouterProvider({
      apiKey: "test-secret",
      transport,
      referer: "https://example.test",
      title: "Example",
    });

    expect(provider.complete({ prompt: "x" })).toBe("routed");
    expect(requests[0].url).toBe("https://openrouter.ai/api/v1/chat/completions");
    expect(requests[0].headers["HTTP-Referer"]).toBe("https://example.test");
    expect(requests[0].headers["X-Title"]).toBe("Example");
    expect(JSON.parse(requests[0].body ?? "")).toMatchObject({ model: "google/gemini-flash-1.5" });
  });
});
