import { describe, expect, it, vi } from "vitest";
import { DEFAULT_TLS_CONFIG, resolveTlsConfig, toTlsConnectOptions } from "./tls-config";

describe("resolveTlsConfig", () => {
  it("verifies by default", () => {
    expect(resolveTlsConfig()).toEqual({ verify: true });
    expect(DEFAULT_TLS_CONFIG.verify).toBe(true);
  });

  it("passes explicit values through verbatim", () => {
    expect(
      resolveTlsConfig({
        verify: false,
        certFile: "./certs/client.pem",
        keyFile: "/no/such/key.pem",
        caFile: "ca.pem",
      })
    ).toEqual({
      verify: false,
      certFile: "./certs/client.pem",
      keyFile: "/no/such/key.pem",
      caFile: "ca.pem",
    });
  });

  it("returns a frozen value and does not touch its input", () => {
    const settings = { caFile: "ca.pem" };
    const config = resolveTlsConfig(settings);
    expect(Object.isFrozen(config)).toBe(true);
    expect(settings).toEqual({ caFile: "ca.pem" });
  });
});

describe("toTlsConnectOptions", () => {
  it("reads only the files that are configured", () => {
    const readFile = vi.fn((path: string) => `contents of ${path}`);
    const options = toTlsConnectOptions(resolveTlsConfig({ verify: false, caFile: "ca.pem" }), readFile);

    expect(options).toEqual({ rejectUnauthorized: false, ca: "contents of ca.pem" });
    expect(readFile).toHaveBeenCalledTimes(1);
  });
});
