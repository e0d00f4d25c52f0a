import {
  OpenAICompatibleProvider,
  type OpenAICompatibleOptions,
} from "./openai-compatible-provider";

export const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const OPENAI_DEFAULT_MODEL = "gpt-4";
export const OPENAI_EMBEDDING_MODEL = "text-embedding-3-small";

export interface OpenAIProviderOptions
  extends Omit<OpenAICompatibleOptions, "baseUrl" | "model" | "embeddingModel"> {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  embeddingModel?: string;
}

export class OpenAIProvider extends OpenAICompatibleProvider {
  readonly id = "openai" as const;

  constructor(options: OpenAIProviderOptions) {
    super("openai", {
      ...options,
      baseUrl: options.baseUrl ?? OPENAI_DEFAULT_BASE_URL,
      model: options.model ?? OPENAI_DEFAULT_MODEL,
      embeddingModel: options.embeddingModel ?? OPENAI_EMBEDDING_MODEL,
    });
  }
}
