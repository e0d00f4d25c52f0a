import {
  OpenAICompatibleProvider,
  type OpenAICompatibleOptions,
} from "./openai-compatible-provider";

export const LMSTUDIO_DEFAULT_ENDPOINT = "http://127.0.0.1:1234";
export const LMSTUDIO_DEFAULT_MODEL = "default";

export interface LMStudioProviderOptions
  extends Omit<OpenAICompatibleOptions, "apiKey" | "baseUrl" | "model" | "embeddingModel"> {
  endpoint?: string;
  model?: string;
}

/**
 * Local LM Studio server. Speaks the OpenAI wire format under `/v1`, no key.
 */
export class LMStudioProvider extends OpenAICompatibleProvider {
  readonly id = "lmstudio" as const;
  readonly endpoint: string;

  constructor(options: LMStudioProviderOptions = {}) {
    const endpoint = (options.endpoint ?? LMSTUDIO_DEFAULT_ENDPOINT).replace(/\/+$/, "");
    const model = options.model ?? LMSTUDIO_DEFAULT_MODEL;
    super("lmstudio", {
      ...options,
      baseUrl: `${endpoint}/v1`,
      model,
      embeddingModel: model,
    });
    this.endpoint = endpoint;
  }
}
