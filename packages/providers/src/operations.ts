/**
 * Entry points for callers that do not manage providers themselves.
 *
 * Each call resolves a provider from a fresh resolution context (fallback
 * chain by default), so environment changes apply to the next call. Failures
 * bump the counter named after the operation and surface as ProviderError;
 * cancellations are rethrown as they are and not counted.
 */

import { isCancellation, toProviderError, type OperationLabel } from "./errors";
import { getProvider, type GetProviderOptions } from "./factory/provider-factory";
import type {
  AsyncCallOptions,
  CompletionRequest,
  Embedding,
  EmbeddingInput,
  Provider,
} from "./providers/types";
import { getDefaultMetrics } from "./telemetry/metrics";

export type OperationName = "complete" | "acomplete" | "embed" | "aembed";

export interface OperationOptions extends GetProviderOptions, AsyncCallOptions {}

function resolve(options: OperationOptions): Provider {
  return getProvider({ ...options, fallback: options.fallback ?? true });
}

function fail(
  name: OperationName,
  label: OperationLabel,
  options: OperationOptions,
  error: unknown
): never {
  if (isCancellation(error, options.signal)) {
    throw error;
  }
  (options.metrics ?? getDefaultMetrics()).increment(name);
  throw toProviderError(error, label);
}

export function complete(request: CompletionRequest, options: OperationOptions = {}): string {
  try {
    return resolve(options).complete(request);
  } catch (error) {
    return fail("complete", "Completion", options, error);
  }
}

export async function acomplete(
  request: CompletionRequest,
  options: OperationOptions = {}
): Promise<string> {
  try {
    return await resolve(options).acomplete(request, { signal: options.signal });
  } catch (error) {
    return fail("acomplete", "Completion", options, error);
  }
}

export function embed(input: EmbeddingInput, options: OperationOptions = {}): Embedding[] {
  try {
    return resolve(options).embed(input);
  } catch (error) {
    return fail("embed", "Embedding", options, error);
  }
}

export async function aembed(
  input: EmbeddingInput,
  options: OperationOptions = {}
): Promise<Embedding[]> {
  try {
    return await resolve(options).aembed(input, { signal: options.signal });
  } catch (error) {
    return fail("aembed", "Embedding", options, error);
  }
}
