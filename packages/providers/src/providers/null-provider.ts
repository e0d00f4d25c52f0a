import { CredentialError, ProviderDisabledError, type ProviderError } from "../errors";
import { BaseProvider, type BaseProviderOptions } from "./base-provider";
import type { CompletionRequest, Embedding, EmbeddingInput } from "./types";

export type NullProviderCause = "disabled" | "credential";

export interface NullProviderOptions extends BaseProviderOptions {
  reason?: string;
  cause?: NullProviderCause;
}

/**
 * Fails fast with a fixed reason. Stands in for a backend that is disabled
 * or missing credentials so callers get an error instead of a hang.
 */
export class NullProvider extends BaseProvider {
  readonly kind = "null" as const;
  readonly id = "null";
  readonly reason: string;
  readonly cause: NullProviderCause;

  constructor(options: NullProviderOptions = {}) {
    super(options);
    this.reason = options.reason ?? "Provider disabled";
    this.cause = options.cause ?? "disabled";
  }

  complete(_request: CompletionRequest): string {
    throw this.completionError();
  }

  async acomplete(_request: CompletionRequest): Promise<string> {
    throw this.completionError();
  }

  embed(_input: EmbeddingInput): Embedding[] {
    throw this.embeddingError();
  }

  async aembed(_input: EmbeddingInput): Promise<Embedding[]> {
    throw this.embeddingError();
  }

  private completionError(): ProviderError {
    return this.build(
      `LLM provider is disabled: ${this.reason}. Set OPENAI_API_KEY or start LM Studio.`
    );
  }

  private embeddingError(): ProviderError {
    return this.build(`Embeddings unavailable because provider is disabled: ${this.reason}.`);
  }

  private build(message: string): ProviderError {
    return this.cause === "credential"
      ? new CredentialError(message, { providerId: this.id })
      : new ProviderDisabledError(message, { providerId: this.id });
  }
}
