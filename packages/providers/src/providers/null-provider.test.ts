import { describe, expect, it } from "vitest";
import { CredentialError, ProviderDisabledError } from "../errors";
import { NullProvider } from "./null-provider";

describe("NullProvider", () => {
  it("never throws at construction", () => {
    expect(() => new NullProvider()).not.toThrow();
  });

  it("rejects completions with the disable reason", () => {
    const provider = new NullProvider({ reason: "maintenance" });
    expect(() => provider.complete({ prompt: "x" })).toThrow(ProviderDisabledError);
    expect(() => provider.complete({ prompt: "x" })).toThrow(
      "LLM provider is disabled: maintenance. Set OPENAI_API_KEY or start LM Studio."
    );
  });

  it("rejects embeddings with the disable reason", async () => {
    const provider = new NullProvider({ reason: "maintenance" });
    await expect(provider.aembed("x")).rejects.toThrow(
      "Embeddings unavailable because provider is disabled: maintenance."
    );
  });

  it("reports credential problems as CredentialError", async () => {
    const provider = new NullProvider({ reason: "OPENAI_API_KEY is not set", cause: "credential" });
    await expect(provider.acomplete({ prompt: "x" })).rejects.toBeInstanceOf(CredentialError);
    expect(() => provider.embed("x")).toThrow(CredentialError);
  });
});
