/**
 * Provider configuration: one zod schema for the nested settings, and an
 * env-core reader that layers LLM_RELAY_* / vendor variables on top.
 *
 * The environment is read on every call; nothing is cached at import time.
 */

import { readFileSync } from "node:fs";
import { createEnv } from "@t3-oss/env-core";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../errors";
import { LMSTUDIO_DEFAULT_ENDPOINT, LMSTUDIO_DEFAULT_MODEL } from "../providers/network/lmstudio-provider";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "../providers/network/openai-compatible-provider";
import { OPENAI_DEFAULT_BASE_URL, OPENAI_DEFAULT_MODEL } from "../providers/network/openai-provider";
import { OPENROUTER_DEFAULT_BASE_URL } from "../providers/network/openrouter-provider";

const timeoutMs = z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS);

export const retryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  initialDelayMs: z.number().min(0).default(1000),
  exponentialBase: z.number().gt(1).default(2),
  maxDelayMs: z.number().min(0).default(60000),
  jitter: z.boolean().default(true),
  conditions: z.array(z.string().min(1)).default([]),
  trackMetrics: z.boolean().default(true),
});

export const tlsSettingsSchema = z.object({
  verify: z.boolean().default(true),
  certFile: z.string().min(1).optional(),
  keyFile: z.string().min(1).optional(),
  caFile: z.string().min(1).optional(),
});

export const providerConfigSchema = z.object({
  defaultProvider: z.string().trim().toLowerCase().min(1).default("openai"),
  openai: z
    .object({
      apiKey: z.string().min(1).optional(),
      model: z.string().min(1).default(OPENAI_DEFAULT_MODEL),
      baseUrl: z.string().url().default(OPENAI_DEFAULT_BASE_URL),
      timeoutMs,
    })
    .default({}),
  lmstudio: z
    .object({
      endpoint: z.string().url().default(LMSTUDIO_DEFAULT_ENDPOINT),
      model: z.string().min(1).default(LMSTUDIO_DEFAULT_MODEL),
      timeoutMs,
    })
    .default({}),
  openrouter: z
    .object({
      apiKey: z.string().min(1).optional(),
      model: z.string().min(1).optional(),
      baseUrl: z.string().url().default(OPENROUTER_DEFAULT_BASE_URL),
      timeoutMs,
    })
    .default({}),
  retry: retryConfigSchema.default({}),
  fallback: z
    .object({
      enabled: z.boolean().default(true),
      order: z.array(z.string().trim().toLowerCase().min(1)).default(["openai", "lmstudio"]),
    })
    .default({}),
  circuitBreaker: z
    .object({
      enabled: z.boolean().default(true),
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeoutMs: z.number().min(0).default(60000),
    })
    .default({}),
  tls: tlsSettingsSchema.default({}),
});

export type ProviderConfigInput = z.input<typeof providerConfigSchema>;
export type ProviderConfig = z.output<typeof providerConfigSchema>;

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type FrozenProviderConfig = DeepReadonly<ProviderConfig>;

function deepFreeze<T>(value: T): DeepReadonly<T>;
function deepFreeze(value: unknown): unknown {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate and freeze a configuration object. Missing blocks take defaults.
 */
export function parseProviderConfig(input: ProviderConfigInput = {}): FrozenProviderConfig {
  const result = providerConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid provider configuration: ${details}`, {
      cause: result.error,
    });
  }
  return deepFreeze(result.data);
}

export type EnvSource = Record<string, string | undefined>;

export interface EnvSnapshotOptions {
  env?: EnvSource;
  /** Optional dotenv file. Values already present in `env` win. */
  envFile?: string;
}

/**
 * Copy of the environment merged with an optional dotenv file.
 * `process.env` is never mutated.
 */
export function readEnvSnapshot(options: EnvSnapshotOptions = {}): EnvSource {
  const env = options.env ?? process.env;
  if (!options.envFile) {
    return { ...env };
  }
  let fileValues: Record<string, string>;
  try {
    fileValues = dotenv.parse(readFileSync(options.envFile, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read env file ${options.envFile}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  return { ...fileValues, ...env };
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

const strictBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUTHY.has(value) || FALSY.has(value), {
    message: "Expected one of 1/0, true/false, yes/no, on/off",
  })
  .transform((value) => TRUTHY.has(value))
  .optional();

/**
 * Lenient flag: unset or anything not truthy reads as false.
 */
export const envFlag = z
  .string()
  .optional()
  .transform((value) => (value === undefined ? false : TRUTHY.has(value.trim().toLowerCase())));

const csvList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )
  .optional();

const optionalNumber = z.coerce.number().optional();

function onEnvValidationError(error: z.ZodError): never {
  const details = error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new ConfigurationError(`Invalid provider environment: ${details}`, { cause: error });
}

function readProviderEnv(snapshot: EnvSource) {
  return createEnv({
    server: {
      LLM_RELAY_PROVIDER: z.string().optional(),
      OPENAI_API_KEY: z.string().optional(),
      OPENAI_MODEL: z.string().optional(),
      OPENAI_BASE_URL: z.string().optional(),
      LM_STUDIO_ENDPOINT: z.string().optional(),
      LM_STUDIO_MODEL: z.string().optional(),
      OPENROUTER_API_KEY: z.string().optional(),
      OPENROUTER_MODEL: z.string().optional(),
      OPENROUTER_BASE_URL: z.string().optional(),
      LLM_RELAY_MAX_RETRIES: optionalNumber,
      LLM_RELAY_INITIAL_DELAY_MS: optionalNumber,
      LLM_RELAY_EXPONENTIAL_BASE: optionalNumber,
      LLM_RELAY_MAX_DELAY_MS: optionalNumber,
      LLM_RELAY_RETRY_JITTER: strictBoolean,
      LLM_RELAY_RETRY_METRICS: strictBoolean,
      LLM_RELAY_RETRY_CONDITIONS: csvList,
      LLM_RELAY_FALLBACK_ENABLED: strictBoolean,
      LLM_RELAY_FALLBACK_ORDER: csvList,
      LLM_RELAY_CIRCUIT_BREAKER_ENABLED: strictBoolean,
      LLM_RELAY_FAILURE_THRESHOLD: optionalNumber,
      LLM_RELAY_RECOVERY_TIMEOUT_MS: optionalNumber,
      LLM_RELAY_REQUEST_TIMEOUT_MS: optionalNumber,
      LLM_RELAY_TLS_VERIFY: strictBoolean,
      LLM_RELAY_TLS_CERT_FILE: z.string().optional(),
      LLM_RELAY_TLS_KEY_FILE: z.string().optional(),
      LLM_RELAY_TLS_CA_FILE: z.string().optional(),
    },
    runtimeEnv: snapshot,
    emptyStringAsUndefined: true,
    onValidationError: onEnvValidationError,
  });
}

function definedOnly<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

export interface LoadProviderConfigOptions extends EnvSnapshotOptions {
  /** Base settings; environment values override them field by field */
  config?: ProviderConfigInput;
}

/**
 * Resolve the effective configuration from base settings plus the current
 * environment (and optional dotenv file).
 */
export function loadProviderConfig(options: LoadProviderConfigOptions = {}): FrozenProviderConfig {
  const env = readProviderEnv(readEnvSnapshot(options));
  const base = options.config ?? {};
  const timeout = env.LLM_RELAY_REQUEST_TIMEOUT_MS;

  return parseProviderConfig({
    ...base,
    ...definedOnly({ defaultProvider: env.LLM_RELAY_PROVIDER }),
    openai: {
      ...base.openai,
      ...definedOnly({
        apiKey: env.OPENAI_API_KEY,
        model: env.OPENAI_MODEL,
        baseUrl: env.OPENAI_BASE_URL,
        timeoutMs: timeout,
      }),
    },
    lmstudio: {
      ...base.lmstudio,
      ...definedOnly({
        endpoint: env.LM_STUDIO_ENDPOINT,
        model: env.LM_STUDIO_MODEL,
        timeoutMs: timeout,
      }),
    },
    openrouter: {
      ...base.openrouter,
      ...definedOnly({
        apiKey: env.OPENROUTER_API_KEY,
        model: env.OPENROUTER_MODEL,
        baseUrl: env.OPENROUTER_BASE_URL,
        timeoutMs: timeout,
      }),
    },
    retry: {
      ...base.retry,
      ...definedOnly({
        maxRetries: env.LLM_RELAY_MAX_RETRIES,
        initialDelayMs: env.LLM_RELAY_INITIAL_DELAY_MS,
        exponentialBase: env.LLM_RELAY_EXPONENTIAL_BASE,
        maxDelayMs: env.LLM_RELAY_MAX_DELAY_MS,
        jitter: env.LLM_RELAY_RETRY_JITTER,
        trackMetrics: env.LLM_RELAY_RETRY_METRICS,
        conditions: env.LLM_RELAY_RETRY_CONDITIONS,
      }),
    },
    fallback: {
      ...base.fallback,
      ...definedOnly({
        enabled: env.LLM_RELAY_FALLBACK_ENABLED,
        order: env.LLM_RELAY_FALLBACK_ORDER,
      }),
    },
    circuitBreaker: {
      ...base.circuitBreaker,
      ...definedOnly({
        enabled: env.LLM_RELAY_CIRCUIT_BREAKER_ENABLED,
        failureThreshold: env.LLM_RELAY_FAILURE_THRESHOLD,
        recoveryTimeoutMs: env.LLM_RELAY_RECOVERY_TIMEOUT_MS,
      }),
    },
    tls: {
      ...base.tls,
      ...definedOnly({
        verify: env.LLM_RELAY_TLS_VERIFY,
        certFile: env.LLM_RELAY_TLS_CERT_FILE,
        keyFile: env.LLM_RELAY_TLS_KEY_FILE,
        caFile: env.LLM_RELAY_TLS_CA_FILE,
      }),
    },
  });
}
