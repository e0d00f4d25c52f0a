import { createHash } from "node:crypto";
import { BaseProvider, type BaseProviderOptions } from "./base-provider";
import {
  DEFAULT_MAX_TOKENS,
  toInputList,
  type CompletionRequest,
  type Embedding,
  type EmbeddingInput,
} from "./types";

export interface StubProviderOptions extends BaseProviderOptions {
  name?: string;
}

const EMBEDDING_SIZE = 8;
const MAX_STUB_LENGTH = 10000;

/**
 * Deterministic offline provider. No network, outputs derived from the input.
 */
export class StubProvider extends BaseProvider {
  readonly kind = "stub" as const;
  readonly id = "stub";
  readonly name: string;

  constructor(options: StubProviderOptions = {}) {
    super(options);
    this.name = options.name ?? "stub-llm";
  }

  /**
   * First `size` bytes of the SHA-256 digest, each mapped to [0, 1].
   */
  static toDeterministicFloats(data: string, size = EMBEDDING_SIZE): Embedding {
    const digest = createHash("sha256").update(data, "utf8").digest();
    return Array.from(digest.subarray(0, size), (byte) => byte / 255);
  }

  complete(request: CompletionRequest): string {
    const system = request.systemPrompt ? `[sys:${request.systemPrompt}] ` : "";
    const maxTokens = request.parameters?.maxTokens ?? request.maxTokens ?? DEFAULT_MAX_TOKENS;
    const limit = maxTokens || MAX_STUB_LENGTH;
    return `${system}[stub:${this.name}] ${request.prompt}`.slice(0, limit);
  }

  async acomplete(request: CompletionRequest): Promise<string> {
    return this.complete(request);
  }

  embed(input: EmbeddingInput): Embedding[] {
    return toInputList(input).map((text) => StubProvider.toDeterministicFloats(text));
  }

  async aembed(input: EmbeddingInput): Promise<Embedding[]> {
    return this.embed(input);
  }
}
