/**
 * Provider capability shared by every backend variant.
 */

import type { RetryConfig } from "../resilience/retry";
import type { TLSConfig } from "../tls/tls-config";

/**
 * Closed set of provider variants. The factory returns the interface; the
 * fallback provider only ever holds the interface.
 */
export type ProviderKind = "network" | "null" | "stub" | "fallback";

export type NetworkProviderId = "openai" | "lmstudio" | "openrouter";

export interface CompletionParameters {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  /** Full chat transcript; replaces the prompt/system pair when set */
  messages?: ChatMessage[];
}

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  prompt: string;
  systemPrompt?: string;
  /** Default: 0.7 */
  temperature?: number;
  /** Default: 2000 */
  maxTokens?: number;
  parameters?: CompletionParameters;
}

export type EmbeddingInput = string | readonly string[];

export type Embedding = number[];

export interface AsyncCallOptions {
  signal?: AbortSignal;
}

export interface Provider {
  readonly kind: ProviderKind;
  /** Stable identifier, e.g. "openai" or "stub" */
  readonly id: string;
  readonly retryConfig: Readonly<RetryConfig>;
  readonly tlsConfig: TLSConfig;

  complete(request: CompletionRequest): string;
  acomplete(request: CompletionRequest, options?: AsyncCallOptions): Promise<string>;
  embed(input: EmbeddingInput): Embedding[];
  aembed(input: EmbeddingInput, options?: AsyncCallOptions): Promise<Embedding[]>;
}

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 2000;

export function toInputList(input: EmbeddingInput): string[] {
  return typeof input === "string" ? [input] : [...input];
}
