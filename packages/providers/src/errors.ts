export type ProviderErrorCode =
  | "provider_failed"
  | "configuration"
  | "credential"
  | "disabled"
  | "transient"
  | "circuit_open"
  | "all_failed"
  | "invalid_request"
  | "invalid_response";

export interface ProviderErrorOptions {
  providerId?: string;
  cause?: unknown;
}

/**
 * Base error for everything the provider layer reports.
 * Callers only ever see this type (or a subclass), never raw backend errors.
 */
export class ProviderError extends Error {
  readonly code: ProviderErrorCode;
  readonly providerId?: string;

  constructor(
    message: string,
    options: ProviderErrorOptions = {},
    code: ProviderErrorCode = "provider_failed"
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ProviderError";
    this.code = code;
    this.providerId = options.providerId;
  }
}

/**
 * A mandatory native capability is missing, or the configuration is invalid.
 * Fatal and never retried.
 */
export class ConfigurationError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions = {}) {
    super(message, options, "configuration");
    this.name = "ConfigurationError";
  }
}

export class CredentialError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions = {}) {
    super(message, options, "credential");
    this.name = "CredentialError";
  }
}

export class ProviderDisabledError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions = {}) {
    super(message, options, "disabled");
    this.name = "ProviderDisabledError";
  }
}

export type TransientReason = "network" | "timeout" | "rate_limit" | "server_error";

/**
 * Network, timeout and rate-limit failures. Eligible for retry and counted
 * toward breaker thresholds.
 */
export class TransientError extends ProviderError {
  readonly reason: TransientReason;
  readonly status?: number;

  constructor(
    message: string,
    reason: TransientReason,
    options: ProviderErrorOptions & { status?: number } = {}
  ) {
    super(message, options, "transient");
    this.name = "TransientError";
    this.reason = reason;
    this.status = options.status;
  }
}

/**
 * Error thrown when circuit is open.
 */
export class CircuitOpenError extends ProviderError {
  constructor(
    message: string,
    public readonly retryAfterMs: number,
    options: ProviderErrorOptions = {}
  ) {
    super(message, options, "circuit_open");
    this.name = "CircuitOpenError";
  }
}

export interface ProviderAttemptError {
  providerId: string;
  error: string;
}

/**
 * Error thrown when all providers (including fallbacks) fail.
 */
export class AllProvidersFailedError extends ProviderError {
  constructor(
    message: string,
    public readonly errors: ProviderAttemptError[],
    options: ProviderErrorOptions = {}
  ) {
    super(message, options, "all_failed");
    this.name = "AllProvidersFailedError";
  }
}

/**
 * HTTP status carried by a failed request, if any.
 */
export class HttpStatusError extends ProviderError {
  constructor(
    message: string,
    public readonly status: number,
    options: ProviderErrorOptions = {}
  ) {
    super(message, options, "provider_failed");
    this.name = "HttpStatusError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * True for an aborted await. Cancellation is neither success nor failure.
 */
export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  if (!(error instanceof Error)) return false;
  return error.name === "AbortError" || ("code" in error && error.code === "ABORT_ERR");
}

export type OperationLabel = "Completion" | "Embedding";

/**
 * Pass ProviderErrors through intact; wrap anything else as
 * `"<Operation> call failed: <cause>"`.
 */
export function toProviderError(error: unknown, operation: OperationLabel): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  return new ProviderError(`${operation} call failed: ${errorMessage(error)}`, {
    cause: error,
  });
}
