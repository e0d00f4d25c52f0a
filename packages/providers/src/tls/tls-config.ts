/**
 * TLS settings for outbound provider connections.
 */

export interface TLSConfig {
  readonly verify: boolean;
  readonly certFile?: string;
  readonly keyFile?: string;
  readonly caFile?: string;
}

export interface TlsSettings {
  verify?: boolean;
  certFile?: string;
  keyFile?: string;
  caFile?: string;
}

export const DEFAULT_TLS_CONFIG: TLSConfig = Object.freeze({ verify: true });

/**
 * Pure: unset fields fall back to secure defaults, explicit values pass
 * through verbatim. Paths are not checked for existence.
 */
export function resolveTlsConfig(settings: TlsSettings = {}): TLSConfig {
  const config: TLSConfig = {
    verify: settings.verify ?? true,
    ...(settings.certFile !== undefined ? { certFile: settings.certFile } : {}),
    ...(settings.keyFile !== undefined ? { keyFile: settings.keyFile } : {}),
    ...(settings.caFile !== undefined ? { caFile: settings.caFile } : {}),
  };
  return Object.freeze(config);
}

export interface TlsConnectOptions {
  rejectUnauthorized: boolean;
  cert?: string;
  key?: string;
  ca?: string;
}

/**
 * Socket options for an undici Agent. Reads the referenced files, so only
 * call this when a connection is about to be made.
 */
export function toTlsConnectOptions(
  tls: TLSConfig,
  readFile: (path: string) => string
): TlsConnectOptions {
  return {
    rejectUnauthorized: tls.verify,
    ...(tls.certFile ? { cert: readFile(tls.certFile) } : {}),
    ...(tls.keyFile ? { key: readFile(tls.keyFile) } : {}),
    ...(tls.caFile ? { ca: readFile(tls.caFile) } : {}),
  };
}
