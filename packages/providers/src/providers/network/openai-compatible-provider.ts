/**
 * OpenAI-compatible chat/embedding client.
 *
 * Every request goes through the shared retry helpers. 429, 5xx and network
 * failures surface as TransientError and are retried; any other non-2xx
 * status is an HttpStatusError and is not.
 */

import { z } from "zod";
import { HttpStatusError, ProviderError, TransientError, errorMessage } from "../../errors";
import { createLogger } from "../../logger";
import {
  createNodeTransport,
  requireDuplexTransport,
  type DuplexTransport,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from "../../transport/http-transport";
import { BaseProvider, type BaseProviderOptions } from "../base-provider";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  toInputList,
  type AsyncCallOptions,
  type ChatMessage,
  type CompletionRequest,
  type Embedding,
  type EmbeddingInput,
  type NetworkProviderId,
} from "../types";

export const DEFAULT_REQUEST_TIMEOUT_MS = 60000;

export interface OpenAICompatibleOptions extends BaseProviderOptions {
  apiKey?: string;
  baseUrl: string;
  model: string;
  embeddingModel: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Defaults to the Node transport built from the provider's TLS config */
  transport?: HttpTransport;
}

const chatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1),
});

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

interface ChatPayload {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  top_p?: number;
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export abstract class OpenAICompatibleProvider extends BaseProvider {
  readonly kind = "network" as const;
  abstract override readonly id: NetworkProviderId;

  readonly baseUrl: string;
  readonly model: string;
  readonly embeddingModel: string;
  readonly timeoutMs: number;

  private readonly transport: DuplexTransport;
  private readonly headers: Record<string, string>;
  private readonly log: ReturnType<typeof createLogger>;

  constructor(providerId: NetworkProviderId, options: OpenAICompatibleOptions) {
    super(options);
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
    this.embeddingModel = options.embeddingModel;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.transport = requireDuplexTransport(
      options.transport ?? createNodeTransport(this.tlsConfig, undefined, providerId),
      providerId
    );
    this.headers = {
      "Content-Type": "application/json",
      ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      ...options.headers,
    };
    this.log = createLogger(providerId);
  }

  complete(request: CompletionRequest): string {
    const httpRequest = this.chatRequest(request);
    return this.retrySync(() => this.parseChat(this.transport.sendSync(httpRequest)), {
      retryableErrors: [TransientError],
      shouldRetry: shouldRetryError,
    });
  }

  async acomplete(request: CompletionRequest, options: AsyncCallOptions = {}): Promise<string> {
    const httpRequest = this.chatRequest(request);
    return this.retryAsync(
      async () => this.parseChat(await this.transport.send(httpRequest, options.signal)),
      { retryableErrors: [TransientError], shouldRetry: shouldRetryError, signal: options.signal }
    );
  }

  embed(input: EmbeddingInput): Embedding[] {
    const httpRequest = this.embeddingRequest(input);
    return this.retrySync(() => this.parseEmbeddings(this.transport.sendSync(httpRequest)), {
      retryableErrors: [TransientError],
      shouldRetry: shouldRetryError,
    });
  }

  async aembed(input: EmbeddingInput, options: AsyncCallOptions = {}): Promise<Embedding[]> {
    const httpRequest = this.embeddingRequest(input);
    return this.retryAsync(
      async () => this.parseEmbeddings(await this.transport.send(httpRequest, options.signal)),
      { retryableErrors: [TransientError], shouldRetry: shouldRetryError, signal: options.signal }
    );
  }

  /**
   * Validated chat payload. Values in `parameters` win over the top-level
   * fields; an explicit transcript replaces the prompt/system pair.
   */
  buildChatPayload(request: CompletionRequest): ChatPayload {
    const parameters = request.parameters ?? {};
    const temperature = parameters.temperature ?? request.temperature ?? DEFAULT_TEMPERATURE;
    const maxTokens = parameters.maxTokens ?? request.maxTokens ?? DEFAULT_MAX_TOKENS;
    const topP = parameters.topP;

    if (!(temperature >= 0 && temperature <= 2)) {
      throw this.invalidRequest("temperature must be between 0 and 2");
    }
    if (!(maxTokens > 0)) {
      throw this.invalidRequest("max_tokens must be positive");
    }
    if (topP !== undefined && !(topP >= 0 && topP <= 1)) {
      throw this.invalidRequest("top_p must be between 0 and 1");
    }

    const messages: ChatMessage[] = parameters.messages
      ? [...parameters.messages]
      : [
          ...(request.systemPrompt
            ? [{ role: "system" as const, content: request.systemPrompt }]
            : []),
          { role: "user" as const, content: request.prompt },
        ];

    return {
      model: this.model,
      messages,
      temperature,
      max_tokens: maxTokens,
      ...(topP === undefined ? {} : { top_p: topP }),
    };
  }

  private chatRequest(request: CompletionRequest): HttpRequest {
    return this.post("/chat/completions", this.buildChatPayload(request));
  }

  private embeddingRequest(input: EmbeddingInput): HttpRequest {
    return this.post("/embeddings", { model: this.embeddingModel, input: toInputList(input) });
  }

  private post(path: string, payload: object): HttpRequest {
    return {
      url: `${this.baseUrl}${path}`,
      method: "POST",
      headers: this.headers,
      body: JSON.stringify(payload),
      timeoutMs: this.timeoutMs,
    };
  }

  private parseChat(response: HttpResponse): string {
    const parsed = chatResponseSchema.safeParse(this.readBody(response));
    if (!parsed.success) {
      throw this.invalidResponse(`Invalid response format: ${response.body}`);
    }
    return parsed.data.choices[0].message.content;
  }

  private parseEmbeddings(response: HttpResponse): Embedding[] {
    const parsed = embeddingResponseSchema.safeParse(this.readBody(response));
    if (!parsed.success) {
      throw this.invalidResponse(`Invalid embedding response format: ${response.body}`);
    }
    return parsed.data.data.map((item) => item.embedding);
  }

  private readBody(response: HttpResponse): unknown {
    const { status } = response;
    if (status < 200 || status >= 300) {
      const message = `${this.id} API error: HTTP ${status}: ${response.body}`;
      this.log.error(message);
      if (status === 429) {
        throw new TransientError(message, "rate_limit", { providerId: this.id, status });
      }
      if (status >= 500) {
        throw new TransientError(message, "server_error", { providerId: this.id, status });
      }
      throw new HttpStatusError(message, status, { providerId: this.id });
    }
    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw this.invalidResponse(`Invalid JSON from ${this.id}: ${errorMessage(error)}`);
    }
  }

  private invalidRequest(message: string): ProviderError {
    return new ProviderError(message, { providerId: this.id }, "invalid_request");
  }

  private invalidResponse(message: string): ProviderError {
    return new ProviderError(message, { providerId: this.id }, "invalid_response");
  }
}

function shouldRetryError(error: Error): boolean {
  if (error instanceof TransientError && error.status !== undefined) {
    return isRetryableStatus(error.status);
  }
  return true;
}
