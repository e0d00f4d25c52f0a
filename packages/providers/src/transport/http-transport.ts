/**
 * HTTP transports used by network providers.
 *
 * The async path goes through undici with a dispatcher carrying the TLS
 * settings; dispatchers are shared per TLS config. The blocking path runs the
 * request in a short-lived child process and waits for it, so the calling
 * thread never yields.
 */

import { spawnSync } from "node:child_process";
import { readFileSync } from "node:fs";
import { Agent, fetch as undiciFetch } from "undici";
import { z } from "zod";
import { ConfigurationError, TransientError, errorMessage } from "../errors";
import {
  toTlsConnectOptions,
  type TLSConfig,
  type TlsConnectOptions,
} from "../tls/tls-config";
import { abortError, throwIfAborted } from "../utils/sleep";

export interface HttpRequest {
  url: string;
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export type SendAsync = (request: HttpRequest, signal?: AbortSignal) => Promise<HttpResponse>;
export type SendSync = (request: HttpRequest) => HttpResponse;

/**
 * A transport advertises the capabilities it has. Network providers need both.
 */
export interface HttpTransport {
  readonly name: string;
  send?: SendAsync;
  sendSync?: SendSync;
}

export interface DuplexTransport {
  readonly name: string;
  send: SendAsync;
  sendSync: SendSync;
}

export function requireDuplexTransport(
  transport: HttpTransport,
  providerId: string
): DuplexTransport {
  const { send, sendSync } = transport;
  const missing = [
    ...(send ? [] : ["non-blocking requests"]),
    ...(sendSync ? [] : ["blocking requests"]),
  ];
  if (!send || !sendSync) {
    throw new ConfigurationError(
      `Provider ${providerId} requires a transport supporting ${missing.join(" and ")}; ` +
        `transport "${transport.name}" does not. Set LLM_RELAY_SAFE_DEFAULT_PROVIDER=stub to run without a network backend.`,
      { providerId }
    );
  }
  return { name: transport.name, send, sendSync };
}

export interface NativeTransportSupport {
  async: boolean;
  sync: boolean;
}

export function detectNativeTransport(): NativeTransportSupport {
  return {
    async: typeof undiciFetch === "function",
    sync:
      typeof spawnSync === "function" &&
      typeof process.execPath === "string" &&
      process.execPath.length > 0,
  };
}

// Child process body for blocking requests. Reads {request, tls} from stdin,
// tls being the already loaded connect options, and writes {status, body} or
// {error, timeout} to stdout.
const SYNC_REQUEST_SCRIPT = `
const http = require("node:http");
const https = require("node:https");
let raw = "";
process.stdin.setEncoding("utf8");
process.stdin.on("data", (chunk) => { raw += chunk; });
process.stdin.on("end", () => {
  const { request, tls } = JSON.parse(raw);
  const url = new URL(request.url);
  const secure = url.protocol === "https:";
  const options = { method: request.method, headers: request.headers, timeout: request.timeoutMs };
  if (secure) {
    options.rejectUnauthorized = tls.rejectUnauthorized;
    if (tls.cert) options.cert = tls.cert;
    if (tls.key) options.key = tls.key;
    if (tls.ca) options.ca = tls.ca;
  }
  let timedOut = false;
  const req = (secure ? https : http).request(url, options, (res) => {
    let body = "";
    res.setEncoding("utf8");
    res.on("data", (chunk) => { body += chunk; });
    res.on("end", () => { process.stdout.write(JSON.stringify({ status: res.statusCode, body })); });
  });
  req.on("timeout", () => { timedOut = true; req.destroy(new Error("request timed out")); });
  req.on("error", (error) => { process.stdout.write(JSON.stringify({ error: error.message, timeout: timedOut })); });
  if (request.body) req.write(request.body);
  req.end();
});
`;

const childResultSchema = z.union([
  z.object({ status: z.number().int(), body: z.string() }),
  z.object({ error: z.string(), timeout: z.boolean().optional() }),
]);

// Extra time given to the child beyond the request timeout
const SPAWN_GRACE_MS = 2000;

/**
 * Read the certificate files a TLS config names. An unreadable file is a
 * local misconfiguration, not a network failure.
 */
export function loadTlsConnectOptions(tls: TLSConfig, providerId?: string): TlsConnectOptions {
  try {
    return toTlsConnectOptions(tls, (path) => readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read TLS files${providerId ? ` for provider ${providerId}` : ""}: ${errorMessage(error)}`,
      { providerId, cause: error }
    );
  }
}

const tlsKey = (tls: TLSConfig): string =>
  JSON.stringify([tls.verify, tls.certFile ?? null, tls.keyFile ?? null, tls.caFile ?? null]);

const sharedDispatchers = new Map<string, Agent>();

function dispatcherFor(tls: TLSConfig, providerId?: string): Agent {
  const key = tlsKey(tls);
  let dispatcher = sharedDispatchers.get(key);
  if (!dispatcher) {
    dispatcher = new Agent({ connect: loadTlsConnectOptions(tls, providerId) });
    sharedDispatchers.set(key, dispatcher);
  }
  return dispatcher;
}

/**
 * Close every pooled dispatcher. Later requests open new ones.
 */
export async function closeSharedDispatchers(): Promise<void> {
  const dispatchers = [...sharedDispatchers.values()];
  sharedDispatchers.clear();
  await Promise.all(dispatchers.map((dispatcher) => dispatcher.close()));
}

function sendSyncViaChild(tls: TLSConfig, request: HttpRequest, providerId?: string): HttpResponse {
  const connect = loadTlsConnectOptions(tls, providerId);
  const result = spawnSync(process.execPath, ["-e", SYNC_REQUEST_SCRIPT], {
    input: JSON.stringify({ request, tls: connect }),
    encoding: "utf8",
    timeout: request.timeoutMs + SPAWN_GRACE_MS,
    maxBuffer: 64 * 1024 * 1024,
  });

  if (result.error) {
    const timedOut = "code" in result.error && result.error.code === "ETIMEDOUT";
    throw new TransientError(
      timedOut
        ? `Request to ${request.url} timed out after ${request.timeoutMs}ms`
        : `Request to ${request.url} failed: ${result.error.message}`,
      timedOut ? "timeout" : "network",
      { cause: result.error }
    );
  }

  let parsed: z.infer<typeof childResultSchema>;
  try {
    parsed = childResultSchema.parse(JSON.parse(result.stdout));
  } catch (error) {
    throw new TransientError(
      `Request to ${request.url} failed: ${result.stderr.trim() || errorMessage(error)}`,
      "network",
      { cause: error }
    );
  }

  if ("error" in parsed) {
    throw new TransientError(
      parsed.timeout
        ? `Request to ${request.url} timed out after ${request.timeoutMs}ms`
        : `Request to ${request.url} failed: ${parsed.error}`,
      parsed.timeout ? "timeout" : "network"
    );
  }
  return parsed;
}

/**
 * Transport backed by Node: undici for async, a child process for blocking.
 * Only the capabilities the runtime has are exposed.
 */
export function createNodeTransport(
  tls: TLSConfig,
  support: NativeTransportSupport = detectNativeTransport(),
  providerId?: string
): HttpTransport {
  const send: SendAsync = async (request, signal) => {
    throwIfAborted(signal);
    const dispatcher = dispatcherFor(tls, providerId);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), request.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await undiciFetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        dispatcher,
        signal: controller.signal,
      });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      if (signal?.aborted) {
        throw abortError(signal);
      }
      if (controller.signal.aborted) {
        throw new TransientError(
          `Request to ${request.url} timed out after ${request.timeoutMs}ms`,
          "timeout",
          { cause: error }
        );
      }
      throw new TransientError(`Request to ${request.url} failed: ${errorMessage(error)}`, "network", {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  };

  return {
    name: "node",
    ...(support.async ? { send } : {}),
    ...(support.sync ? { sendSync: (request: HttpRequest) => sendSyncViaChild(tls, request, providerId) } : {}),
  };
}
