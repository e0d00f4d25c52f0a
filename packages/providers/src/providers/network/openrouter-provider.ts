import {
  OpenAICompatibleProvider,
  type OpenAICompatibleOptions,
} from "./openai-compatible-provider";

export const OPENROUTER_DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";
export const OPENROUTER_DEFAULT_MODEL = "google/gemini-flash-1.5";
export const OPENROUTER_EMBEDDING_MODEL = "text-embedding-ada-002";

export interface OpenRouterProviderOptions
  extends Omit<OpenAICompatibleOptions, "baseUrl" | "model" | "embeddingModel"> {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  /** Sent as HTTP-Referer for OpenRouter attribution */
  referer?: string;
  /** Sent as X-Title */
  title?: string;
}

export class OpenRouterProvider extends OpenAICompatibleProvider {
  readonly id = "openrouter" as const;

  constructor(options: OpenRouterProviderOptions) {
    super("openrouter", {
      ...options,
      baseUrl: options.baseUrl ?? OPENROUTER_DEFAULT_BASE_URL,
      model: options.model ?? OPENROUTER_DEFAULT_MODEL,
      embeddingModel: OPENROUTER_EMBEDDING_MODEL,
      headers: {
        ...(options.referer ? { "HTTP-Referer": options.referer } : {}),
        ...(options.title ? { "X-Title": options.title } : {}),
        ...options.headers,
      },
    });
  }
}
