export const DEFAULT_HOST = '127.0.0.1:2283';
export const DEFAULT_TIMEOUT_MS = 30000;

export interface EnvDefaults {
  host: string;
  apiKey?: string;
  libraryRoot?: string;
  timeoutMs: number;
}

export function readEnvDefaults(env: NodeJS.ProcessEnv = process.env): EnvDefaults {
  const timeoutMs = Number.parseInt(env.IMMICH_TIMEOUT_MS || String(DEFAULT_TIMEOUT_MS), 10);
  return {
    host: env.IMMICH_HOST?.trim() || DEFAULT_HOST,
    apiKey: env.IMMICH_API_KEY?.trim() || undefined,
    libraryRoot: env.IMMICH_LIBRARY_ROOT?.trim() || undefined,
    timeoutMs: Number.isNaN(timeoutMs) || timeoutMs <= 0 ? DEFAULT_TIMEOUT_MS : timeoutMs
  };
}

/**
 * Addresses are normally `ip:port`; one without a port only draws a warning.
 */
export function hostHasPort(host: string): boolean {
  return host.replace(/^https?:\/\//i, '').includes(':');
}

/**
 * Builds the REST base URL for a host typed by the user. Accepts a bare
 * `host:port`, a full origin, or an origin that already ends in `/api`.
 */
export function buildApiBaseUrl(host: string): string {
  let base = host.trim().replace(/\/+$/, '');
  if (!/^https?:\/\//i.test(base)) {
    base = `http://${base}`;
  }
  base = base.replace(/\/api$/i, '');
  return `${base}/api`;
}

export function buildHeaders(apiKey: string): Record<string, string> {
  return {
    'x-api-key': apiKey,
    'Content-Type': 'application/json'
  };
}

export function maskApiKey(apiKey: string): string {
  if (apiKey.length <= 4) {
    return '*'.repeat(apiKey.length);
  }
  return '*'.repeat(apiKey.length - 4) + apiKey.slice(-4);
}
