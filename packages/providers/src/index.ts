export * from "./errors";
export { createLogger, getLogLevel, setLogLevel, type LogLevel, type Logger } from "./logger";
export * from "./resilience";
export * from "./telemetry/metrics";
export * from "./tls/tls-config";
export * from "./transport/http-transport";
export * from "./providers/types";
export { BaseProvider, type BaseProviderOptions } from "./providers/base-provider";
export * from "./providers/null-provider";
export * from "./providers/stub-provider";
export * from "./providers/fallback-provider";
export * from "./providers/network";
export * from "./config/provider-config";
export * from "./config/resolution-context";
export * from "./factory/provider-factory";
export * from "./operations";
