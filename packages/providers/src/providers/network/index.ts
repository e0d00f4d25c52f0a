export * from "./openai-compatible-provider";
export * from "./openai-provider";
export * from "./lmstudio-provider";
export * from "./openrouter-provider";
