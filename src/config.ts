import { ConfigError } from './errors.js';

export const DEFAULT_BASE_URL = 'https://api.library.cdisc.org/api';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_RESPONSE_CHARS = 130000;
export const DEFAULT_PORT = 3000;
export const MAX_PORT = 65535;
/** Largest delay a Node timer accepts */
export const MAX_TIMEOUT_MS = 2147483647;
export const DEFAULT_HOST = '127.0.0.1';

export type TransportMode = 'stdio' | 'http';

export interface ClientConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
}

export interface AppConfig extends ClientConfig {
  readonly maxResponseChars: number;
  readonly transport: TransportMode;
  readonly port: number;
  readonly host: string;
}

type Env = Record<string, string | undefined>;

/**
 * Resolves the process configuration from an environment record.
 * Throws ConfigError on the first missing or malformed value.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = env.CDISC_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError(
      'CDISC_API_KEY is not set. Export it or add it to a .env file before starting the server.',
      'CDISC_API_KEY'
    );
  }

  return Object.freeze({
    apiKey,
    baseUrl: parseBaseUrl(env.CDISC_API_BASE_URL),
    timeoutMs: parsePositiveInt(env, 'CDISC_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS),
    maxResponseChars: parsePositiveInt(env, 'CDISC_MAX_RESPONSE_CHARS', DEFAULT_MAX_RESPONSE_CHARS, Number.MAX_SAFE_INTEGER),
    transport: parseTransport(env.MCP_TRANSPORT),
    port: parsePositiveInt(env, 'PORT', DEFAULT_PORT, MAX_PORT),
    host: env.HOST?.trim() || DEFAULT_HOST,
  });
}

function parseBaseUrl(raw: string | undefined): string {
  const value = raw?.trim();
  if (!value) {
    return DEFAULT_BASE_URL;
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigError(`CDISC_API_BASE_URL is not a valid URL: '${value}'`, 'CDISC_API_BASE_URL');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(
      `CDISC_API_BASE_URL must use http or https, got '${url.protocol}'`,
      'CDISC_API_BASE_URL'
    );
  }
  return value.replace(/\/+$/, '');
}

function parsePositiveInt(env: Env, name: string, fallback: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number(raw) <= 0 || Number(raw) > max) {
    throw new ConfigError(`${name} must be an integer from 1 to ${max}, got '${raw}'`, name);
  }
  return Number(raw);
}

function parseTransport(raw: string | undefined): TransportMode {
  const value = raw?.trim().toLowerCase();
  if (!value || value === 'stdio') {
    return 'stdio';
  }
  if (value === 'http') {
    return 'http';
  }
  throw new ConfigError(`MCP_TRANSPORT must be 'stdio' or 'http', got '${raw}'`, 'MCP_TRANSPORT');
}
