import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";
import {
  envFlag,
  loadProviderConfig,
  readEnvSnapshot,
  type EnvSource,
  type FrozenProviderConfig,
  type ProviderConfigInput,
} from "./provider-config";

export type SafeDefaultProvider = "stub" | "null";

/**
 * Overrides consulted on every provider resolution.
 */
export interface ResolutionFlags {
  readonly providersDisabled: boolean;
  readonly offline: boolean;
  readonly safeDefaultProvider: SafeDefaultProvider;
  readonly lmstudioAvailable: boolean;
}

export interface ResolutionContext {
  readonly config: FrozenProviderConfig;
  readonly flags: ResolutionFlags;
}

export function readResolutionFlags(env: EnvSource = process.env): ResolutionFlags {
  const parsed = createEnv({
    server: {
      LLM_RELAY_DISABLE_PROVIDERS: envFlag,
      LLM_RELAY_OFFLINE: envFlag,
      LLM_RELAY_SAFE_DEFAULT_PROVIDER: z
        .string()
        .optional()
        .transform((value): SafeDefaultProvider =>
          value?.trim().toLowerCase() === "null" ? "null" : "stub"
        ),
      LLM_RELAY_RESOURCE_LMSTUDIO_AVAILABLE: envFlag,
    },
    runtimeEnv: env,
    emptyStringAsUndefined: true,
  });

  return Object.freeze({
    providersDisabled: parsed.LLM_RELAY_DISABLE_PROVIDERS,
    offline: parsed.LLM_RELAY_OFFLINE,
    safeDefaultProvider: parsed.LLM_RELAY_SAFE_DEFAULT_PROVIDER,
    lmstudioAvailable: parsed.LLM_RELAY_RESOURCE_LMSTUDIO_AVAILABLE,
  });
}

export interface ResolutionContextOptions {
  env?: EnvSource;
  envFile?: string;
  config?: ProviderConfigInput;
}

/**
 * Fresh snapshot of configuration and overrides. Build one per resolution so
 * environment changes take effect on the next call.
 */
export function createResolutionContext(
  options: ResolutionContextOptions = {}
): ResolutionContext {
  const env = readEnvSnapshot(options);
  return Object.freeze({
    config: loadProviderConfig({ env, config: options.config }),
    flags: readResolutionFlags(env),
  });
}
