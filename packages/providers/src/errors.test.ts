import { describe, expect, it } from "vitest";
import {
  CredentialError,
  ProviderError,
  TransientError,
  isCancellation,
  toProviderError,
} from "./errors";

describe("toProviderError", () => {
  it("passes provider errors through untouched", () => {
    const error = new CredentialError("no key", { providerId: "openai" });
    expect(toProviderError(error, "Completion")).toBe(error);
  });

  it("wraps anything else with the operation label and cause", () => {
    const cause = new TypeError("bad input");
    const wrapped = toProviderError(cause, "Embedding");

    expect(wrapped).toBeInstanceOf(ProviderError);
    expect(wrapped.message).toBe("Embedding call failed: bad input");
    expect(wrapped.cause).toBe(cause);
    expect(toProviderError("plain string", "Completion").message).toBe(
      "Completion call failed: plain string"
    );
  });
});

describe("isCancellation", () => {
  it("recognizes abort errors and aborted signals", () => {
    const abort = new Error("stop");
    abort.name = "AbortError";
    const controller = new AbortController();
    controller.abort();

    expect(isCancellation(abort)).toBe(true);
    expect(isCancellation(new Error("other"), controller.signal)).toBe(true);
    expect(isCancellation(new TransientError("down", "network"))).toBe(false);
  });
});

describe("ProviderError", () => {
  it("carries a code and provider id", () => {
    const error = new TransientError("slow", "timeout", { providerId: "lmstudio", status: 504 });
    expect(error).toMatchObject({
      name: "TransientError",
      code: "transient",
      reason: "timeout",
      status: 504,
      providerId: "lmstudio",
    });
  });
});
